/**
 * @module connector
 *
 * Byte-range access to a dataset file.
 *
 * The store reads the header, the index and feature ranges through a
 * {@link Connector} and never touches the filesystem directly, so tests can
 * substitute an in-memory implementation.
 */
export interface Connector {
  /**
   * Read a contiguous byte range.
   *
   * @returns The bytes read. Shorter than `length` when the range runs past
   *   the end of the file.
   * @throws {Error} If the file cannot be opened or read.
   */
  read(path: string, offset: number, length: number): Promise<Uint8Array>;

  /**
   * Read several ranges of one file. Results keep the order of `ranges`.
   */
  readRanges(
    path: string,
    ranges: ReadonlyArray<{ offset: number; length: number }>,
  ): Promise<Uint8Array[]>;

  /**
   * Release held file handles. Safe to call more than once.
   */
  close(): Promise<void>;
}

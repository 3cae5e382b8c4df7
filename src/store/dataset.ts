/**
 * @module store/dataset
 *
 * Startup validation of the dataset file.
 *
 * The header and the packed R-tree are read once and shared, read-only,
 * by every store handle. A file that cannot serve bbox queries is rejected
 * here rather than on the first tile request.
 */

import type { Connector } from '../connectors/connector.js';
import { LocalConnector } from '../connectors/local.js';
import { parseHeader, headerByteSize, INITIAL_HEADER_READ_SIZE } from '../fgb/header.js';
import { DatasetError, FgbFormatError } from '../errors.js';
import type { FgbHeader } from '../types.js';
import { GeomType } from '../types.js';

/** An opened dataset: where it lives and what its header and index say. */
export interface Dataset {
  readonly path: string;
  readonly header: Readonly<FgbHeader>;
  /** The packed R-tree section. Never written after open. */
  readonly indexBytes: Uint8Array;
}

/**
 * Read and validate the header and spatial index of `path`.
 *
 * @param connector - Used for the reads; a private {@link LocalConnector}
 *   is opened and closed when omitted.
 * @throws {DatasetError} If the file is missing or unreadable, is not
 *   FlatGeobuf, has no spatial index, or holds non-polygon geometry.
 */
export async function openDataset(path: string, connector?: Connector): Promise<Dataset> {
  const conn = connector ?? new LocalConnector();
  try {
    const { header, indexBytes } = await readHeader(conn, path);

    if (header.indexNodeSize === 0) {
      throw new DatasetError(path, 'Dataset has no spatial index');
    }
    if (header.geometryType !== GeomType.Unknown
      && header.geometryType !== GeomType.Polygon
      && header.geometryType !== GeomType.MultiPolygon) {
      throw new DatasetError(path, `Dataset geometry type ${header.geometryType} is not polygonal`);
    }
    if (indexBytes.length < header.indexSize) {
      throw new DatasetError(path, 'Spatial index is truncated');
    }

    return Object.freeze({ path, header: Object.freeze(header), indexBytes });
  } catch (err) {
    if (err instanceof DatasetError) throw err;
    if (err instanceof FgbFormatError) {
      throw new DatasetError(path, `Not a FlatGeobuf dataset (${err.message})`, { cause: err });
    }
    throw new DatasetError(path, 'Cannot read dataset', { cause: err });
  } finally {
    if (!connector) await conn.close();
  }
}

async function readHeader(
  connector: Connector,
  path: string,
): Promise<{ header: FgbHeader; indexBytes: Uint8Array }> {
  const initialBytes = await connector.read(path, 0, INITIAL_HEADER_READ_SIZE);
  const size = headerByteSize(initialBytes);
  const headerBytes = await connector.read(path, 0, size);
  const header = parseHeader(headerBytes);

  const indexBytes = header.indexSize > 0
    ? await connector.read(path, header.indexOffset, header.indexSize)
    : new Uint8Array(0);

  return { header, indexBytes };
}

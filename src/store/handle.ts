/**
 * @module store/handle
 *
 * Bbox queries against an opened dataset.
 *
 * A query runs in four steps: search the shared R-tree, read the merged
 * byte ranges, decode buildings, and drop buildings whose own bbox misses
 * the query (merged ranges carry neighbours along). The abort signal is
 * checked between steps.
 */

import type { Connector } from '../connectors/connector.js';
import { LocalConnector } from '../connectors/local.js';
import { queryIndex } from '../fgb/index.js';
import { decodeBuildings } from '../fgb/feature.js';
import { mercatorArea } from '../geometry/area.js';
import { throwIfAborted } from '../errors.js';
import type { AggregateStats, BBox, Building } from '../types.js';
import type { Dataset } from './dataset.js';

/** Bbox queries over the building table. */
export interface SpatialStore {
  /**
   * Buildings whose bbox overlaps `bbox`, in file order.
   *
   * @throws {QueryAbortedError} If `signal` aborts before the query ends.
   */
  queryInBBox(bbox: BBox, signal?: AbortSignal): Promise<Building[]>;

  /** Count and summed EPSG:3857 area of the buildings `queryInBBox` returns. */
  aggregateInBBox(bbox: BBox, signal?: AbortSignal): Promise<AggregateStats>;
}

/** Exclusive, scoped access to a {@link SpatialStore}. */
export interface StoreAccess {
  /**
   * Run `fn` with a store nobody else uses until `fn` settles.
   *
   * @throws {QueryAbortedError} If `signal` aborts while waiting.
   */
  withHandle<T>(fn: (store: SpatialStore) => Promise<T>, signal?: AbortSignal): Promise<T>;
}

/**
 * One reader of the dataset with its own file handle.
 *
 * Not safe for overlapping queries from several callers; {@link StorePool}
 * hands each handle to one caller at a time.
 */
export class SpatialStoreHandle implements SpatialStore {
  readonly dataset: Dataset;
  private readonly connector: Connector;

  /**
   * @param connector - Defaults to a {@link LocalConnector} holding a single
   *   descriptor.
   */
  constructor(dataset: Dataset, connector?: Connector) {
    this.dataset = dataset;
    this.connector = connector ?? new LocalConnector();
  }

  async queryInBBox(bbox: BBox, signal?: AbortSignal): Promise<Building[]> {
    throwIfAborted(signal);
    const { header, indexBytes, path } = this.dataset;

    const ranges = queryIndex(
      indexBytes,
      {
        featuresCount: header.featuresCount,
        nodeSize: header.indexNodeSize,
        featuresOffset: header.featuresOffset,
      },
      bbox,
    );
    if (ranges.length === 0) return [];

    const chunks = await this.connector.readRanges(path, ranges);
    throwIfAborted(signal);

    const buildings: Building[] = [];
    for (const chunk of chunks) {
      for (const building of decodeBuildings(chunk, header)) {
        if (overlaps(building.bbox, bbox)) buildings.push(building);
      }
    }
    return buildings;
  }

  async aggregateInBBox(bbox: BBox, signal?: AbortSignal): Promise<AggregateStats> {
    const buildings = await this.queryInBBox(bbox, signal);
    let area = 0;
    for (const building of buildings) {
      area += mercatorArea(building.geometry);
    }
    return { count: buildings.length, area };
  }

  async close(): Promise<void> {
    await this.connector.close();
  }
}

function overlaps(a: BBox, b: BBox): boolean {
  return a.minX <= b.maxX && a.maxX >= b.minX && a.minY <= b.maxY && a.maxY >= b.minY;
}

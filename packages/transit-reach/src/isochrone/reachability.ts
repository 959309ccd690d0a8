/**
 * Reachability Matrix
 *
 * Row builder: classifies every destination against one origin's cutoff
 * polygons and keeps the smallest cutoff whose polygon contains it. Polygons
 * returned by the routing engine are usually nested, but nothing here relies
 * on it: every cutoff is tested and the minimum is kept.
 *
 * UNITS:
 * Rows hold seconds (the engine's unit). `finalize()` is the single place
 * where seconds become minutes.
 */

import type { Point, QueryTime } from '../core/types.js';
import { isPointInBBox, type GeometryService } from '../geometry/geometry-service.js';
import type { PolygonSet } from './polygon-set.js';

/**
 * Out-of-band marker for destinations outside every cutoff polygon
 */
export const UNREACHABLE = Number.POSITIVE_INFINITY;

export interface ReachabilityRow {
  /** Origin id, or `<origin> @ <date> <time>` when several query times run */
  readonly key: string;
  readonly originId: string;
  readonly queryTime: QueryTime;
  /** Destination id → minimum cutoff in seconds, or UNREACHABLE */
  readonly values: ReadonlyMap<string, number>;
}

/**
 * Minutes per destination; `null` where unreachable
 */
export interface FinalReachabilityRow {
  readonly key: string;
  readonly originId: string;
  readonly queryTime: QueryTime;
  readonly values: Readonly<Record<string, number | null>>;
}

export interface FinalReachabilityMatrix {
  /** Destination ids in input order */
  readonly columns: readonly string[];
  readonly rows: readonly FinalReachabilityRow[];
}

/**
 * Build one origin's row
 */
export function buildRow(
  set: PolygonSet,
  destinations: readonly Point[],
  geometry: GeometryService,
  key: string = set.origin.id
): ReachabilityRow {
  const groups = set.polygons
    .map((polygon) => ({ polygon, box: geometry.bbox(polygon.geometry) }))
    .sort((a, b) => a.polygon.cutoffSeconds - b.polygon.cutoffSeconds);

  const values = new Map<string, number>();
  for (const destination of destinations) {
    let best = UNREACHABLE;
    for (const { polygon, box } of groups) {
      if (polygon.cutoffSeconds >= best) {
        continue;
      }
      if (!isPointInBBox(destination, box)) {
        continue;
      }
      if (geometry.contains(polygon.geometry, destination)) {
        best = polygon.cutoffSeconds;
      }
    }
    values.set(destination.id, best);
  }

  return {
    key,
    originId: set.origin.id,
    queryTime: set.queryTime,
    values,
  };
}

/**
 * Origin × destination table of minimum travel times, merged row by row
 */
export class ReachabilityMatrix {
  private readonly rows = new Map<string, ReachabilityRow>();

  constructor(readonly columns: readonly string[]) {}

  get size(): number {
    return this.rows.size;
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  /**
   * Add or replace a row. Destinations missing from the row count as unreachable.
   */
  merge(row: ReachabilityRow): void {
    this.rows.set(row.key, row);
  }

  keys(): string[] {
    return [...this.rows.keys()];
  }

  /**
   * Minutes table with `null` for every non-finite value
   */
  finalize(): FinalReachabilityMatrix {
    const rows: FinalReachabilityRow[] = [];
    for (const row of this.rows.values()) {
      const values: Record<string, number | null> = {};
      for (const column of this.columns) {
        const seconds = row.values.get(column) ?? UNREACHABLE;
        values[column] = Number.isFinite(seconds) ? seconds / 60 : null;
      }
      rows.push({ key: row.key, originId: row.originId, queryTime: row.queryTime, values });
    }
    return { columns: [...this.columns], rows };
  }
}

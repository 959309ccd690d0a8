/**
 * Point-to-Point Nearest
 *
 * Plans a trip from every origin to its `nearestNum` closest destinations by
 * straight-line distance. With `returnJourneys` the reverse trips are planned
 * after all outbound ones. Pairs sharing an id are dropped.
 */

import { ConfigurationError } from '../core/errors.js';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import type { BatchProgress } from '../batch/batch-runner.js';
import type { GeometryService } from '../geometry/geometry-service.js';
import type { RoutingClient } from '../routing/types.js';
import { toTripRow, type TripRow } from './itinerary.js';
import {
  runTripBatch,
  type TripBatchResult,
  type TripCheckpointSink,
  type TripRequest,
} from './trip-batch.js';

const defaultLogger = createLogger({ module: 'point-to-point-nearest' });

export interface PointToPointNearestDeps {
  readonly routing: RoutingClient;
  readonly geometry: GeometryService;
  readonly logger?: LoggerLike;
  readonly now?: () => number;
}

export interface PointToPointNearestOptions {
  readonly origins: readonly Point[];
  readonly destinations: readonly Point[];
  /** Destinations per origin; defaults to 1 */
  readonly nearestNum?: number;
  readonly returnJourneys?: boolean;
  readonly queryTime: QueryTime;
  readonly travelParams: TravelParams;
  readonly checkpointEvery?: number;
  readonly checkpoint?: TripCheckpointSink;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export type PointToPointNearestResult = TripBatchResult<TripRow>;

export interface NearestPair {
  readonly origin: Point;
  readonly destination: Point;
  readonly distanceKm: number;
}

export class PointToPointNearest {
  private readonly log: LoggerLike;

  constructor(private readonly deps: PointToPointNearestDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  async run(options: PointToPointNearestOptions): Promise<PointToPointNearestResult> {
    const nearestNum = options.nearestNum ?? 1;
    const pairs = nearestPairs(options.origins, options.destinations, nearestNum, this.deps.geometry);
    this.log.debug(`Matched ${options.origins.length} origins to their ${nearestNum} nearest destinations`);

    const outbound = pairs.map(
      ({ origin, destination }): TripRequest => ({ from: origin, to: destination, queryTime: options.queryTime })
    );
    const inbound = options.returnJourneys
      ? outbound.map(({ from, to, queryTime }): TripRequest => ({ from: to, to: from, queryTime }))
      : [];

    return runTripBatch(
      { routing: this.deps.routing, logger: this.log, now: this.deps.now },
      {
        requests: [...outbound, ...inbound],
        travelParams: options.travelParams,
        toRow: ({ from, to }, itinerary) => toTripRow(from, to, itinerary),
        skip: ({ from, to }) => (from.id === to.id ? `origin and destination are both ${from.id}` : null),
        checkpointEvery: options.checkpointEvery,
        checkpoint: options.checkpoint,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        onProgress: options.onProgress,
      }
    );
  }
}

/**
 * The `k` closest destinations of every origin, closest first. Ties keep the
 * destination file order. Origins stay in input order.
 *
 * @throws ConfigurationError when `k` is not a positive integer or there are
 *   no destinations
 */
export function nearestPairs(
  origins: readonly Point[],
  destinations: readonly Point[],
  k: number,
  geometry: GeometryService
): NearestPair[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigurationError(`nearestNum must be a positive integer, got ${k}`, 'nearestNum');
  }
  if (destinations.length === 0) {
    throw new ConfigurationError('No destinations to match origins against', 'destinations');
  }

  const pairs: NearestPair[] = [];
  for (const origin of origins) {
    const ranked = destinations
      .map((destination, index) => ({ destination, index, distanceKm: geometry.distanceKm(origin, destination) }))
      .sort((a, b) => a.distanceKm - b.distanceKm || a.index - b.index)
      .slice(0, k);
    for (const { destination, distanceKm } of ranked) {
      pairs.push({ origin, destination, distanceKm });
    }
  }
  return pairs;
}

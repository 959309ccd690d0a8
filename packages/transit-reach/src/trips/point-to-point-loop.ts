/**
 * Point-to-Point Loop
 *
 * Plans trips between origin and destination sets:
 * - `both`: every origin to every destination
 * - `origins`: every origin to the destination at `destinationRow`
 * - `destinations`: the origin at `originRow` to every destination
 *
 * With `returnJourneys` every pair is also planned in reverse.
 *
 * A pair is dropped (no request, total shrinks) when it is farther apart than
 * `distMaxKm`, when the same from/to call already ran, or when origin and
 * destination share a name. Failed trips stay in the table as null rows.
 */

import { ConfigurationError } from '../core/errors.js';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import type { BatchProgress } from '../batch/batch-runner.js';
import type { GeometryService } from '../geometry/geometry-service.js';
import { selectRow } from '../io/points.js';
import type { RoutingClient } from '../routing/types.js';
import { toTripRow, type TripRow } from './itinerary.js';
import { runTripBatch, type TripBatchResult, type TripCheckpointSink, type TripRequest } from './trip-batch.js';

const defaultLogger = createLogger({ module: 'point-to-point' });

export type LoopType = 'both' | 'origins' | 'destinations';

export const LOOP_TYPES: readonly LoopType[] = ['both', 'origins', 'destinations'];

export function isLoopType(value: string): value is LoopType {
  return LOOP_TYPES.some((type) => type === value);
}

export interface PointToPointDeps {
  readonly routing: RoutingClient;
  readonly geometry: GeometryService;
  readonly logger?: LoggerLike;
  readonly now?: () => number;
}

export interface PointToPointOptions {
  readonly origins: readonly Point[];
  readonly destinations: readonly Point[];
  readonly loop?: LoopType;
  /** 1-based, used by the `destinations` loop */
  readonly originRow?: number;
  /** 1-based, used by the `origins` loop */
  readonly destinationRow?: number;
  readonly returnJourneys?: boolean;
  readonly queryTime: QueryTime;
  readonly travelParams: TravelParams;
  /** Straight-line threshold; unset means no distance filter */
  readonly distMaxKm?: number;
  readonly checkpointEvery?: number;
  readonly checkpoint?: TripCheckpointSink;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export type PointToPointResult = TripBatchResult<TripRow>;

interface TripPair {
  readonly from: Point;
  readonly to: Point;
}

export class PointToPointLoop {
  private readonly log: LoggerLike;

  constructor(private readonly deps: PointToPointDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  async run(options: PointToPointOptions): Promise<PointToPointResult> {
    const calls = new Set<string>();
    const requests = buildPairs(options).map(
      ({ from, to }): TripRequest => ({ from, to, queryTime: options.queryTime })
    );

    return runTripBatch(
      { routing: this.deps.routing, logger: this.log, now: this.deps.now },
      {
        requests,
        travelParams: options.travelParams,
        toRow: ({ from, to }, itinerary) => toTripRow(from, to, itinerary),
        skip: ({ from, to }) => {
          if (
            options.distMaxKm !== undefined &&
            this.deps.geometry.distanceKm(from, to) > options.distMaxKm
          ) {
            return `${from.id} to ${to.id} is farther apart than ${options.distMaxKm} km`;
          }

          const call = `${from.id}\u0000${to.id}`;
          if (calls.has(call)) {
            return `${from.id} to ${to.id} has already been processed`;
          }
          calls.add(call);

          if (from.id === to.id) {
            return `origin and destination are both ${from.id}`;
          }
          return null;
        },
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
 * Ordered (from, to) pairs before drop filtering
 *
 * @throws ConfigurationError for a selected row outside its point set
 */
export function buildPairs(options: PointToPointOptions): TripPair[] {
  const loop = options.loop ?? 'both';
  let origins: readonly Point[];
  let destinations: readonly Point[];

  switch (loop) {
    case 'both':
      origins = options.origins;
      destinations = options.destinations;
      break;
    case 'origins':
      origins = options.origins;
      destinations = [selectRow(options.destinations, options.destinationRow ?? 1, 'destinationRow')];
      break;
    case 'destinations':
      origins = [selectRow(options.origins, options.originRow ?? 1, 'originRow')];
      destinations = options.destinations;
      break;
    default:
      throw new ConfigurationError(`Unknown loop type "${String(loop)}"`, 'loop');
  }

  const directions = options.returnJourneys ? [false, true] : [false];
  const pairs: TripPair[] = [];
  for (const reverse of directions) {
    for (const destination of destinations) {
      for (const origin of origins) {
        pairs.push(reverse ? { from: destination, to: origin } : { from: origin, to: destination });
      }
    }
  }
  return pairs;
}

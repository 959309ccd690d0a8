/**
 * Trip Batch
 *
 * Sequential driver shared by the trip tools. Each request is planned once;
 * a failed trip still produces a row (with null measures) so the table keeps
 * one line per processed call. Rows are checkpointed every N processed calls.
 */

import type { Point, QueryTime, TravelParams } from '../core/types.js';
import type { LoggerLike } from '../core/utils/logger.js';
import {
  dropped,
  failure,
  forEach,
  SUCCESS,
  type BatchProgress,
  type BatchSummary,
} from '../batch/batch-runner.js';
import { FailureSet, type ExclusionReport } from '../batch/failure-set.js';
import type { RoutingClient } from '../routing/types.js';
import { parseItinerary, type Itinerary, type TripRow } from './itinerary.js';

/**
 * Processed calls between two checkpoint writes
 */
export const DEFAULT_TRIP_CHECKPOINT_EVERY = 100;

export interface TripRequest {
  readonly from: Point;
  readonly to: Point;
  readonly queryTime: QueryTime;
}

export interface TripCheckpointSink<R = TripRow> {
  write(rows: readonly R[]): Promise<void>;
}

export interface TripBatchDeps {
  readonly routing: RoutingClient;
  readonly logger: LoggerLike;
  readonly now?: () => number;
}

export interface TripBatchOptions<R> {
  readonly requests: readonly TripRequest[];
  readonly travelParams: TravelParams;
  readonly toRow: (request: TripRequest, itinerary: Itinerary | null) => R;
  /** Reason to drop a request without calling the router, or null to plan it */
  readonly skip?: (request: TripRequest) => string | null;
  /** Failure key; `from → to` when unset */
  readonly failureKey?: (request: TripRequest) => string;
  readonly checkpointEvery?: number;
  readonly checkpoint?: TripCheckpointSink<R>;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export interface TripBatchResult<R> {
  readonly rows: readonly R[];
  readonly failures: FailureSet;
  readonly report: ExclusionReport;
  readonly summary: BatchSummary;
}

export async function runTripBatch<R>(
  deps: TripBatchDeps,
  options: TripBatchOptions<R>
): Promise<TripBatchResult<R>> {
  const log = deps.logger;
  const checkpointEvery = options.checkpointEvery ?? DEFAULT_TRIP_CHECKPOINT_EVERY;
  const failureKey = options.failureKey ?? ((request: TripRequest) => `${request.from.id} → ${request.to.id}`);
  const rows: R[] = [];
  const failures = new FailureSet();

  log.info(`Creating ${options.requests.length} point to point connections`);

  const summary = await forEach(
    options.requests,
    async (request) => {
      const reason = options.skip?.(request) ?? null;
      if (reason !== null) {
        return dropped(reason);
      }

      const { from, to, queryTime } = request;
      const raw = await deps.routing.requestTrip(from, to, queryTime, options.travelParams, {
        signal: options.signal,
        timeoutMs: options.timeoutMs,
      });
      const parsed = parseItinerary(raw, from, to);

      rows.push(options.toRow(request, parsed.success ? parsed.data : null));
      if (options.checkpoint && checkpointEvery > 0 && rows.length % checkpointEvery === 0) {
        log.info(`Large dataset, saving ${rows.length} trips so far`);
        await options.checkpoint.write(rows);
      }

      if (!parsed.success) {
        failures.add(failureKey(request), parsed.error);
        log.warn(`No trip found from ${from.id} to ${to.id}`, { reason: parsed.error.message });
        return failure(parsed.error.message);
      }
      return SUCCESS;
    },
    {
      noun: 'connections',
      signal: options.signal,
      onProgress: options.onProgress,
      now: deps.now,
      logger: log,
    }
  );

  const report = failures.report(summary.total, 'connections');
  if (failures.size > 0) {
    log.warn(report.message, { excluded: failures.keys() });
  }

  return { rows, failures, report, summary };
}

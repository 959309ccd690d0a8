/**
 * Point-to-Point Time
 *
 * One origin to one destination, planned at every step of a time series.
 * Each row carries the query time it was planned for; a failed step stays in
 * the table as a null row.
 */

import { ConfigurationError } from '../core/errors.js';
import { formatQueryTime } from '../core/query-time.js';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { createLogger, withContext, type LoggerLike } from '../core/utils/logger.js';
import type { BatchProgress } from '../batch/batch-runner.js';
import { selectRow } from '../io/points.js';
import type { RoutingClient } from '../routing/types.js';
import { toTripRow, type TripRow } from './itinerary.js';
import { runTripBatch, type TripBatchResult, type TripCheckpointSink } from './trip-batch.js';

const defaultLogger = createLogger({ module: 'point-to-point-time' });

export interface TimedTripRow extends TripRow {
  /** `YYYY-MM-DD HH:MM` */
  readonly queryTime: string;
}

export interface PointToPointTimeDeps {
  readonly routing: RoutingClient;
  readonly logger?: LoggerLike;
  readonly now?: () => number;
}

export interface PointToPointTimeOptions {
  readonly origins: readonly Point[];
  readonly destinations: readonly Point[];
  /** 1-based; defaults to 1 */
  readonly originRow?: number;
  /** 1-based; defaults to 1 */
  readonly destinationRow?: number;
  readonly queryTimes: readonly QueryTime[];
  readonly travelParams: TravelParams;
  readonly checkpointEvery?: number;
  readonly checkpoint?: TripCheckpointSink<TimedTripRow>;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export type PointToPointTimeResult = TripBatchResult<TimedTripRow>;

export class PointToPointTime {
  private readonly log: LoggerLike;

  constructor(private readonly deps: PointToPointTimeDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  /**
   * @throws ConfigurationError for a row outside its point set or an empty
   *   time series
   */
  async run(options: PointToPointTimeOptions): Promise<PointToPointTimeResult> {
    const from = selectRow(options.origins, options.originRow ?? 1, 'originRow');
    const to = selectRow(options.destinations, options.destinationRow ?? 1, 'destinationRow');
    if (options.queryTimes.length === 0) {
      throw new ConfigurationError('Time series is empty', 'queryTimes');
    }

    const log = withContext(this.log, { origin: from.id, destination: to.id });
    log.info(`Planning ${options.queryTimes.length} query times`);

    return runTripBatch(
      { routing: this.deps.routing, logger: log, now: this.deps.now },
      {
        requests: options.queryTimes.map((queryTime) => ({ from, to, queryTime })),
        travelParams: options.travelParams,
        toRow: (request, itinerary) => ({
          ...toTripRow(request.from, request.to, itinerary),
          queryTime: formatQueryTime(request.queryTime),
        }),
        failureKey: (request) => formatQueryTime(request.queryTime),
        checkpointEvery: options.checkpointEvery,
        checkpoint: options.checkpoint,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        onProgress: options.onProgress,
      }
    );
  }
}

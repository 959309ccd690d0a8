/**
 * Multi-Origin Aggregator
 *
 * Drives the isochrone pipeline over many origins (and optionally many query
 * times): request → parse → row → merge. Failed origins are recorded and the
 * run continues. Every `checkpointEvery` successful rows the matrix so far and
 * the failure list are written to the checkpoint sink.
 *
 * Only RequestError and ParseError are absorbed. Anything else (a failing
 * checkpoint write, a throwing progress callback) ends the run.
 */

import type { ItemError } from '../core/errors.js';
import { formatQueryTime } from '../core/query-time.js';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import { forEach, failure, SUCCESS, type BatchProgress, type BatchSummary } from '../batch/batch-runner.js';
import { FailureSet, type ExclusionReport, type FailureRecord } from '../batch/failure-set.js';
import { ItemStateTracker, type ItemState } from '../batch/item-state.js';
import type { GeometryService } from '../geometry/geometry-service.js';
import type { RoutingClient } from '../routing/types.js';
import { parsePolygonSet, type CutoffPolygon } from './polygon-set.js';
import { buildRow, ReachabilityMatrix, type FinalReachabilityMatrix } from './reachability.js';

const defaultLogger = createLogger({ module: 'isochrone-multi' });

/**
 * Default number of successful rows between checkpoint writes
 */
export const DEFAULT_CHECKPOINT_EVERY = 100;

// ============================================================================
// Checkpoints
// ============================================================================

export interface CheckpointSnapshot {
  readonly writtenAt: string;
  readonly aggregated: number;
  readonly matrix: FinalReachabilityMatrix;
  readonly failures: readonly FailureRecord[];
}

export interface CheckpointSink {
  write(snapshot: CheckpointSnapshot): Promise<void>;
}

/**
 * JSON checkpoint file, replaced atomically on every write
 */
export class FileCheckpointSink implements CheckpointSink {
  constructor(readonly path: string) {}

  async write(snapshot: CheckpointSnapshot): Promise<void> {
    await atomicWriteJSON(this.path, snapshot);
  }
}

// ============================================================================
// Run
// ============================================================================

export interface MultiOriginAggregatorDeps {
  readonly routing: RoutingClient;
  readonly geometry: GeometryService;
  readonly simplifyTolerance?: number;
  readonly logger?: LoggerLike;
  /** Clock in milliseconds, forwarded to the batch runner */
  readonly now?: () => number;
}

export interface MultiOriginRunOptions {
  readonly origins: readonly Point[];
  readonly destinations: readonly Point[];
  /** One or more query times; each origin is queried at every one */
  readonly queryTimes: readonly QueryTime[];
  readonly cutoffsMinutes: readonly number[];
  readonly travelParams: TravelParams;
  /** 0 disables checkpointing */
  readonly checkpointEvery?: number;
  readonly checkpoint?: CheckpointSink;
  /** Keep every parsed cutoff polygon in the result */
  readonly keepPolygons?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export interface MultiOriginResult {
  readonly matrix: FinalReachabilityMatrix;
  readonly failures: FailureSet;
  readonly report: ExclusionReport;
  readonly states: ReadonlyMap<string, ItemState>;
  readonly summary: BatchSummary;
  readonly polygons: readonly CutoffPolygon[];
}

interface WorkItem {
  readonly key: string;
  readonly origin: Point;
  readonly queryTime: QueryTime;
}

export class MultiOriginAggregator {
  private readonly log: LoggerLike;

  constructor(private readonly deps: MultiOriginAggregatorDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  async run(options: MultiOriginRunOptions): Promise<MultiOriginResult> {
    const items = expandItems(options.origins, options.queryTimes);
    const checkpointEvery = options.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY;
    const matrix = new ReachabilityMatrix(options.destinations.map((destination) => destination.id));
    const failures = new FailureSet();
    const states = new ItemStateTracker(items.map((item) => item.key));
    const polygons: CutoffPolygon[] = [];
    let aggregated = 0;

    const recordFailure = (item: WorkItem, error: ItemError): void => {
      states.transition(item.key, 'FAILED');
      failures.add(item.key, error);
      this.log.warn(
        `Removed ${item.key} from analysis as no polygon could be generated from it; ` +
          `now ${items.length - failures.size} not ${items.length} isochrones`,
        { code: error.code, reason: error.message }
      );
    };

    const summary = await forEach(
      items,
      async (item) => {
        states.transition(item.key, 'REQUESTING');
        const raw = await this.deps.routing.requestIsochrone(
          item.origin,
          options.cutoffsMinutes,
          item.queryTime,
          options.travelParams,
          { signal: options.signal, timeoutMs: options.timeoutMs }
        );

        const parsed = parsePolygonSet(raw, item.origin, options.cutoffsMinutes, item.queryTime, {
          geometry: this.deps.geometry,
          simplifyTolerance: this.deps.simplifyTolerance,
        });
        if (!parsed.success) {
          recordFailure(item, parsed.error);
          return failure(parsed.error.message);
        }
        states.transition(item.key, 'PARSED');

        const set = parsed.data;
        if (set.missingCutoffsMinutes.length > 0) {
          this.log.info(
            `Some polygons could not be generated, a cutoff level may be too small for ${item.key}`,
            { missingCutoffsMinutes: set.missingCutoffsMinutes }
          );
        }
        if (options.keepPolygons) {
          polygons.push(...set.polygons);
        }

        matrix.merge(buildRow(set, options.destinations, this.deps.geometry, item.key));
        states.transition(item.key, 'AGGREGATED');
        aggregated++;

        if (options.checkpoint && checkpointEvery > 0 && aggregated % checkpointEvery === 0) {
          await options.checkpoint.write({
            writtenAt: new Date().toISOString(),
            aggregated,
            matrix: matrix.finalize(),
            failures: failures.list(),
          });
          this.log.debug('Checkpoint written', { aggregated });
        }

        return SUCCESS;
      },
      {
        noun: 'isochrones',
        signal: options.signal,
        onProgress: options.onProgress,
        now: this.deps.now,
        logger: this.log,
      }
    );

    // Items never reached because of cancellation
    for (const key of states.inState('PENDING')) {
      states.transition(key, 'SKIPPED');
    }

    const report = failures.report(items.length, options.queryTimes.length > 1 ? 'origin time samples' : 'origins');
    if (failures.size > 0) {
      this.log.warn(report.message, { excluded: failures.keys() });
    }

    return {
      matrix: matrix.finalize(),
      failures,
      report,
      states: states.snapshot(),
      summary,
      polygons,
    };
  }
}

/**
 * Row key for an origin at a query time
 */
export function rowKey(origin: Point, queryTime: QueryTime, multipleTimes: boolean): string {
  return multipleTimes ? `${origin.id} @ ${formatQueryTime(queryTime)}` : origin.id;
}

function expandItems(origins: readonly Point[], queryTimes: readonly QueryTime[]): WorkItem[] {
  const multipleTimes = queryTimes.length > 1;
  const items: WorkItem[] = [];
  for (const origin of origins) {
    for (const queryTime of queryTimes) {
      items.push({ key: rowKey(origin, queryTime, multipleTimes), origin, queryTime });
    }
  }
  return items;
}

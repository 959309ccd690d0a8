/**
 * Multi-Origin Intersection
 *
 * Requests one isochrone per origin (single cutoff each), feeds every usable
 * polygon set to an IntersectionEngine and reports excluded origins.
 *
 * Origins may carry their own travel settings as point attributes:
 * `mode` (a label such as "Public Transport"), `max_duration` (minutes),
 * `date` (YYYY-MM-DD) and `time` (HH:MM). They are resolved for every origin
 * before the first request, so a bad value fails the run up front.
 *
 * The time-series variant ignores per-origin overrides and produces one
 * intersection per query time.
 */

import { ConfigurationError, type ItemError } from '../core/errors.js';
import { formatQueryTime, parseQueryTime } from '../core/query-time.js';
import type { Point, PolygonalGeometry, QueryTime, TravelParams } from '../core/types.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import { forEach, failure, SUCCESS, type BatchProgress, type BatchSummary } from '../batch/batch-runner.js';
import { FailureSet, type ExclusionReport } from '../batch/failure-set.js';
import { ItemStateTracker, type ItemState } from '../batch/item-state.js';
import type { GeometryService } from '../geometry/geometry-service.js';
import { resolveModes } from '../routing/modes.js';
import type { RoutingClient } from '../routing/types.js';
import { parsePolygonSet } from './polygon-set.js';
import { IntersectionEngine } from './intersection-engine.js';

const defaultLogger = createLogger({ module: 'isochrone-intersect' });

/**
 * Fully resolved request for one origin
 */
export interface OriginRequest {
  readonly origin: Point;
  readonly cutoffMinutes: number;
  readonly queryTime: QueryTime;
  readonly travelParams: TravelParams;
}

export interface RequestDefaults {
  readonly cutoffMinutes: number;
  readonly queryTime: QueryTime;
  readonly travelParams: TravelParams;
}

/**
 * Apply an origin's `mode`, `max_duration`, `date` and `time` attributes
 *
 * @throws ConfigurationError for a non-positive or non-numeric `max_duration`
 *   or an unparsable date/time
 */
export function resolveOriginRequest(origin: Point, defaults: RequestDefaults): OriginRequest {
  const { attributes } = origin;

  const modes = resolveModes(nonEmpty(attributes.mode), defaults.travelParams.modes);

  let cutoffMinutes = defaults.cutoffMinutes;
  const maxDuration = nonEmpty(attributes.max_duration);
  if (maxDuration !== undefined) {
    cutoffMinutes = Number(maxDuration);
    if (!Number.isFinite(cutoffMinutes) || cutoffMinutes <= 0) {
      throw new ConfigurationError(
        `Invalid max_duration "${maxDuration}" for origin ${origin.id}`,
        'max_duration'
      );
    }
  }

  const date = nonEmpty(attributes.date) ?? defaults.queryTime.date;
  const time = nonEmpty(attributes.time) ?? defaults.queryTime.time;
  const queryTime = parseQueryTime(`${date} ${time}`);

  return {
    origin,
    cutoffMinutes,
    queryTime,
    travelParams: { ...defaults.travelParams, modes },
  };
}

export interface MultiIntersectDeps {
  readonly routing: RoutingClient;
  readonly geometry: GeometryService;
  readonly simplifyTolerance?: number;
  readonly logger?: LoggerLike;
  readonly now?: () => number;
}

export interface MultiIntersectOptions extends RequestDefaults {
  readonly origins: readonly Point[];
  /** Apply per-origin attributes (default true) */
  readonly useOverrides?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export interface IntersectionRunResult {
  readonly intersection: PolygonalGeometry;
  readonly union: PolygonalGeometry;
  readonly isEmpty: boolean;
  readonly contributors: readonly string[];
  readonly degenerateSteps: number;
  readonly requests: readonly OriginRequest[];
  readonly failures: FailureSet;
  readonly report: ExclusionReport;
  readonly states: ReadonlyMap<string, ItemState>;
  readonly summary: BatchSummary;
}

export interface TimeSeriesOptions extends Omit<MultiIntersectOptions, 'queryTime' | 'useOverrides'> {
  readonly queryTimes: readonly QueryTime[];
}

export interface TimeSeriesIntersection {
  readonly queryTime: QueryTime;
  readonly result: IntersectionRunResult;
}

export class MultiIntersect {
  private readonly log: LoggerLike;

  constructor(private readonly deps: MultiIntersectDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  async run(options: MultiIntersectOptions): Promise<IntersectionRunResult> {
    const useOverrides = options.useOverrides ?? true;
    const requests = options.origins.map((origin) =>
      useOverrides
        ? resolveOriginRequest(origin, options)
        : {
            origin,
            cutoffMinutes: options.cutoffMinutes,
            queryTime: options.queryTime,
            travelParams: options.travelParams,
          }
    );

    const engine = new IntersectionEngine(this.deps.geometry);
    const failures = new FailureSet();
    const states = new ItemStateTracker(requests.map((request) => request.origin.id));

    const recordFailure = (originId: string, error: ItemError): void => {
      states.transition(originId, 'FAILED');
      failures.add(originId, error);
      this.log.warn(
        `Removed ${originId} from analysis as no polygon could be generated from it; ` +
          `now ${requests.length - failures.size} not ${requests.length} isochrones`,
        { code: error.code, reason: error.message }
      );
    };

    const summary = await forEach(
      requests,
      async (request) => {
        const key = request.origin.id;
        states.transition(key, 'REQUESTING');
        const raw = await this.deps.routing.requestIsochrone(
          request.origin,
          [request.cutoffMinutes],
          request.queryTime,
          request.travelParams,
          { signal: options.signal, timeoutMs: options.timeoutMs }
        );

        const parsed = parsePolygonSet(raw, request.origin, [request.cutoffMinutes], request.queryTime, {
          geometry: this.deps.geometry,
          simplifyTolerance: this.deps.simplifyTolerance,
        });
        if (!parsed.success) {
          recordFailure(key, parsed.error);
          return failure(parsed.error.message);
        }
        states.transition(key, 'PARSED');

        engine.accumulate(parsed.data);
        states.transition(key, 'AGGREGATED');
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

    for (const key of states.inState('PENDING')) {
      states.transition(key, 'SKIPPED');
    }

    const report = failures.report(requests.length);
    if (failures.size > 0) {
      this.log.warn(report.message, { excluded: failures.keys() });
    }
    if (engine.contributors.length > 0 && engine.isEmpty()) {
      this.log.warn(`No common reachable area across ${engine.contributors.length} origins`, {
        degenerateSteps: engine.degenerateSteps,
      });
    }

    return {
      intersection: engine.result(),
      union: engine.union(),
      isEmpty: engine.isEmpty(),
      contributors: engine.contributors,
      degenerateSteps: engine.degenerateSteps,
      requests,
      failures,
      report,
      states: states.snapshot(),
      summary,
    };
  }

  /**
   * One intersection per query time, same cutoff and travel settings for all
   * origins
   */
  async runTimeSeries(options: TimeSeriesOptions): Promise<TimeSeriesIntersection[]> {
    const results: TimeSeriesIntersection[] = [];
    for (const queryTime of options.queryTimes) {
      if (options.signal?.aborted) {
        break;
      }
      this.log.info(`Intersecting ${options.origins.length} isochrones at ${formatQueryTime(queryTime)}`);
      const result = await this.run({ ...options, queryTime, useOverrides: false });
      results.push({ queryTime, result });
    }
    return results;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Choropleth
 *
 * Plans a trip from every origin to one destination and classifies each
 * origin by duration, waiting time and transfers against fixed cutoffs. The
 * rows can then be joined onto origin polygons (e.g. census areas) by name.
 */

import type { Feature, FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import { forEach, failure, SUCCESS, type BatchProgress, type BatchSummary } from '../batch/batch-runner.js';
import { FailureSet, type ExclusionReport } from '../batch/failure-set.js';
import type { RoutingClient } from '../routing/types.js';
import { selectRow } from '../io/points.js';
import { parseItinerary, type Itinerary } from '../trips/itinerary.js';

const defaultLogger = createLogger({ module: 'choropleth' });

export interface ChoroplethCutoffs {
  /** Minutes */
  readonly duration: number;
  /** Minutes */
  readonly waitingTime: number;
  readonly transfers: number;
}

export const DEFAULT_CHOROPLETH_CUTOFFS: ChoroplethCutoffs = {
  duration: 60,
  waitingTime: 10,
  transfers: 1,
};

export interface ChoroplethCategories {
  readonly durationCategory: string;
  readonly waitingTimeCategory: string;
  readonly transfersCategory: string;
}

export interface ChoroplethRow {
  readonly name: string;
  /** `OK` or the failure status */
  readonly status: string;
  readonly durationMins: number | null;
  readonly waitingTimeMins: number | null;
  readonly transfers: number | null;
  readonly durationCategory: string | null;
  readonly waitingTimeCategory: string | null;
  readonly transfersCategory: string | null;
}

/**
 * Duration and waiting time are "Over" only when strictly above their cutoff;
 * transfers are "Over" from the cutoff itself
 */
export function categorize(itinerary: Itinerary, cutoffs: ChoroplethCutoffs): ChoroplethCategories {
  return {
    durationCategory:
      itinerary.durationMins > cutoffs.duration
        ? `Over ${cutoffs.duration} minutes`
        : `Under ${cutoffs.duration} minutes`,
    waitingTimeCategory:
      itinerary.waitingTimeMins > cutoffs.waitingTime
        ? `Over ${cutoffs.waitingTime} minutes`
        : `Under ${cutoffs.waitingTime} minutes`,
    transfersCategory:
      itinerary.transfers >= cutoffs.transfers
        ? `Over ${cutoffs.transfers} transfer(s)`
        : `Under ${cutoffs.transfers} transfer(s)`,
  };
}

export interface ChoroplethDeps {
  readonly routing: RoutingClient;
  readonly logger?: LoggerLike;
  readonly now?: () => number;
}

export interface ChoroplethOptions {
  readonly origins: readonly Point[];
  readonly destinations: readonly Point[];
  /** 1-based row of `destinations` */
  readonly destinationRow?: number;
  readonly queryTime: QueryTime;
  readonly travelParams: TravelParams;
  readonly cutoffs?: ChoroplethCutoffs;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
}

export interface ChoroplethResult {
  readonly destination: Point;
  readonly rows: readonly ChoroplethRow[];
  readonly failures: FailureSet;
  readonly report: ExclusionReport;
  readonly summary: BatchSummary;
}

export class Choropleth {
  private readonly log: LoggerLike;

  constructor(private readonly deps: ChoroplethDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  async run(options: ChoroplethOptions): Promise<ChoroplethResult> {
    const destination = selectRow(options.destinations, options.destinationRow ?? 1, 'destinationRow');
    const cutoffs = options.cutoffs ?? DEFAULT_CHOROPLETH_CUTOFFS;
    const rows: ChoroplethRow[] = [];
    const failures = new FailureSet();

    this.log.info(`Creating ${options.origins.length} point to point connections`, {
      destination: destination.id,
    });

    const summary = await forEach(
      options.origins,
      async (origin) => {
        const raw = await this.deps.routing.requestTrip(
          origin,
          destination,
          options.queryTime,
          options.travelParams,
          { signal: options.signal, timeoutMs: options.timeoutMs }
        );
        const parsed = parseItinerary(raw, origin, destination);

        if (!parsed.success) {
          failures.add(origin.id, parsed.error);
          const status = parsed.error.code === 'REQUEST_FAILED' ? parsed.error.status : parsed.error.code;
          rows.push(emptyRow(origin.id, status));
          return failure(parsed.error.message);
        }

        const itinerary = parsed.data;
        rows.push({
          name: origin.id,
          status: 'OK',
          durationMins: itinerary.durationMins,
          waitingTimeMins: itinerary.waitingTimeMins,
          transfers: itinerary.transfers,
          ...categorize(itinerary, cutoffs),
        });
        return SUCCESS;
      },
      {
        noun: 'connections',
        signal: options.signal,
        onProgress: options.onProgress,
        now: this.deps.now,
        logger: this.log,
      }
    );

    const report = failures.report(options.origins.length);
    if (failures.size > 0) {
      this.log.warn(report.message, { excluded: failures.keys() });
    }

    return { destination, rows, failures, report, summary };
  }
}

export type ChoroplethProperties = Record<string, unknown> & Omit<ChoroplethRow, 'name'>;

/**
 * Attach choropleth rows to polygons whose `nameProperty` matches a row name.
 * Polygons without a matching row are kept with null measures.
 */
export function joinChoropleth(
  polygons: FeatureCollection<Geometry | null, GeoJsonProperties>,
  rows: readonly ChoroplethRow[],
  nameProperty = 'name'
): FeatureCollection<Geometry | null, ChoroplethProperties> {
  const byName = new Map(rows.map((row) => [row.name, row]));

  const features = polygons.features.map((feature): Feature<Geometry | null, ChoroplethProperties> => {
    const properties = feature.properties ?? {};
    const rawName = properties[nameProperty];
    const name = rawName === undefined || rawName === null ? '' : String(rawName);
    const row = byName.get(name) ?? emptyRow(name, 'NO_DATA');

    return {
      type: 'Feature',
      geometry: feature.geometry,
      properties: {
        ...properties,
        status: row.status,
        durationMins: row.durationMins,
        waitingTimeMins: row.waitingTimeMins,
        transfers: row.transfers,
        durationCategory: row.durationCategory,
        waitingTimeCategory: row.waitingTimeCategory,
        transfersCategory: row.transfersCategory,
      },
    };
  });

  return { type: 'FeatureCollection', features };
}

function emptyRow(name: string, status: string): ChoroplethRow {
  return {
    name,
    status,
    durationMins: null,
    waitingTimeMins: null,
    transfers: null,
    durationCategory: null,
    waitingTimeCategory: null,
    transfersCategory: null,
  };
}

/**
 * Output writers: reachability matrix, failure list, trip tables and
 * choropleth tables as CSV; polygons as GeoJSON. Every file is written
 * atomically.
 */

import type { Feature, FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import type { FailureRecord } from '../batch/failure-set.js';
import type { ChoroplethRow } from '../choropleth/choropleth.js';
import type { PolygonalGeometry } from '../core/types.js';
import { atomicWriteFile, atomicWriteJSON } from '../core/utils/atomic-write.js';
import type { CutoffPolygon } from '../isochrone/polygon-set.js';
import type { FinalReachabilityMatrix, FinalReachabilityRow } from '../isochrone/reachability.js';
import { accessTimeColumn } from '../routing/modes.js';
import type { TripRow } from '../trips/itinerary.js';
import type { TimedTripRow } from '../trips/point-to-point-time.js';
import type { TripCheckpointSink } from '../trips/trip-batch.js';
import { formatCsv, type CsvColumn } from './csv.js';

// ============================================================================
// CSV
// ============================================================================

/**
 * Rows = origins (first column `origin`), one column per destination, minutes
 * or empty for unreachable
 */
export function formatMatrixCsv(matrix: FinalReachabilityMatrix): string {
  const columns: CsvColumn<FinalReachabilityRow>[] = [
    { header: 'origin', value: (row) => row.key },
    ...matrix.columns.map(
      (column): CsvColumn<FinalReachabilityRow> => ({ header: column, value: (row) => row.values[column] })
    ),
  ];
  return formatCsv(matrix.rows, columns);
}

export function formatFailuresCsv(failures: readonly FailureRecord[]): string {
  return formatCsv(failures, [
    { header: 'name', value: (record) => record.key },
    { header: 'code', value: (record) => record.code },
    { header: 'status', value: (record) => record.status },
    { header: 'message', value: (record) => record.message },
  ]);
}

function tripColumns<R extends TripRow>(modes: string): CsvColumn<R>[] {
  return [
    { header: 'origin', value: (row) => row.origin },
    { header: 'destination', value: (row) => row.destination },
    { header: 'start_time', value: (row) => row.startTime },
    { header: 'end_time', value: (row) => row.endTime },
    { header: 'distance_km', value: (row) => row.distanceKm },
    { header: 'duration_mins', value: (row) => row.durationMins },
    { header: accessTimeColumn(modes), value: (row) => row.accessTimeMins },
    { header: 'transit_time_mins', value: (row) => row.transitTimeMins },
    { header: 'waiting_time_mins', value: (row) => row.waitingTimeMins },
    { header: 'transfers', value: (row) => row.transfers },
    { header: 'journey_details', value: (row) => row.journeyDetails },
  ];
}

/**
 * Trip table; the access-time column is named after the modes
 * (`walk_time_mins`, `drive_time_mins` or `cycle_time_mins`)
 */
export function formatTripCsv(rows: readonly TripRow[], modes: string): string {
  return formatCsv(rows, tripColumns<TripRow>(modes));
}

/**
 * Trip table with a leading `query_time` column
 */
export function formatTripTimeCsv(rows: readonly TimedTripRow[], modes: string): string {
  return formatCsv(rows, [
    { header: 'query_time', value: (row) => row.queryTime },
    ...tripColumns<TimedTripRow>(modes),
  ]);
}

export function formatChoroplethCsv(rows: readonly ChoroplethRow[]): string {
  return formatCsv(rows, [
    { header: 'name', value: (row) => row.name },
    { header: 'status', value: (row) => row.status },
    { header: 'duration', value: (row) => row.durationMins },
    { header: 'waitingtime', value: (row) => row.waitingTimeMins },
    { header: 'transfers', value: (row) => row.transfers },
    { header: 'duration_cat', value: (row) => row.durationCategory },
    { header: 'waitingtime_cat', value: (row) => row.waitingTimeCategory },
    { header: 'transfers_cat', value: (row) => row.transfersCategory },
  ]);
}

export async function writeMatrixCsv(path: string, matrix: FinalReachabilityMatrix): Promise<void> {
  await atomicWriteFile(path, formatMatrixCsv(matrix));
}

export async function writeFailuresCsv(path: string, failures: readonly FailureRecord[]): Promise<void> {
  await atomicWriteFile(path, formatFailuresCsv(failures));
}

export async function writeTripCsv(path: string, rows: readonly TripRow[], modes: string): Promise<void> {
  await atomicWriteFile(path, formatTripCsv(rows, modes));
}

export async function writeTripTimeCsv(
  path: string,
  rows: readonly TimedTripRow[],
  modes: string
): Promise<void> {
  await atomicWriteFile(path, formatTripTimeCsv(rows, modes));
}

export async function writeChoroplethCsv(path: string, rows: readonly ChoroplethRow[]): Promise<void> {
  await atomicWriteFile(path, formatChoroplethCsv(rows));
}

/**
 * Trip checkpoint that rewrites the whole table so far
 */
export class CsvTripCheckpointSink implements TripCheckpointSink {
  constructor(
    readonly path: string,
    private readonly modes: string
  ) {}

  async write(rows: readonly TripRow[]): Promise<void> {
    await writeTripCsv(this.path, rows, this.modes);
  }
}

export class CsvTimedTripCheckpointSink implements TripCheckpointSink<TimedTripRow> {
  constructor(
    readonly path: string,
    private readonly modes: string
  ) {}

  async write(rows: readonly TimedTripRow[]): Promise<void> {
    await writeTripTimeCsv(this.path, rows, this.modes);
  }
}

// ============================================================================
// GeoJSON
// ============================================================================

/**
 * One feature per cutoff polygon with `name`, `time` (seconds) and `minutes`
 */
export function cutoffPolygonsToGeoJSON(
  polygons: readonly CutoffPolygon[]
): FeatureCollection<PolygonalGeometry> {
  return {
    type: 'FeatureCollection',
    features: polygons.map((polygon): Feature<PolygonalGeometry> => ({
      type: 'Feature',
      geometry: polygon.geometry,
      properties: {
        name: polygon.originId,
        time: polygon.cutoffSeconds,
        minutes: polygon.cutoffMinutes,
      },
    })),
  };
}

/**
 * Single-feature collection
 */
export function geometryToGeoJSON(
  geometry: PolygonalGeometry,
  properties: GeoJsonProperties = {}
): FeatureCollection<PolygonalGeometry> {
  const feature: Feature<PolygonalGeometry> = { type: 'Feature', geometry, properties };
  return { type: 'FeatureCollection', features: [feature] };
}

export async function writeGeoJSON(
  path: string,
  collection: FeatureCollection<Geometry | null, GeoJsonProperties>
): Promise<void> {
  await atomicWriteJSON(path, collection);
}

/**
 * Windows-safe timestamp used in output file names: `2018_08_18_12_00_00`
 */
export function fileStamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19).replace(/[-T:]/g, '_');
}

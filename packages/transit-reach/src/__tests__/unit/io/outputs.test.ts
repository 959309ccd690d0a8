/**
 * Output Writer Tests
 *
 * CSV layouts for matrices, failures, trips and choropleth rows, GeoJSON
 * conversion and file writes.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import type { ChoroplethRow } from '../../../choropleth/choropleth.js';
import type { FinalReachabilityMatrix } from '../../../isochrone/reachability.js';
import {
  CsvTripCheckpointSink,
  cutoffPolygonsToGeoJSON,
  fileStamp,
  formatChoroplethCsv,
  formatFailuresCsv,
  formatMatrixCsv,
  formatTripCsv,
  formatTripTimeCsv,
  geometryToGeoJSON,
  writeGeoJSON,
  writeMatrixCsv,
} from '../../../io/outputs.js';
import { toTripRow } from '../../../trips/itinerary.js';
import { point, QUERY_TIME, square } from '../../fixtures/routing.js';

const MATRIX: FinalReachabilityMatrix = {
  columns: ['D1', 'D2'],
  rows: [
    { key: 'O1', originId: 'O1', queryTime: QUERY_TIME, values: { D1: 30, D2: null } },
    { key: 'O2', originId: 'O2', queryTime: QUERY_TIME, values: { D1: 12.5, D2: 60 } },
  ],
};

const TRIP_HEADER =
  'origin,destination,start_time,end_time,distance_km,duration_mins,walk_time_mins,' +
  'transit_time_mins,waiting_time_mins,transfers,journey_details';

describe('CSV formatting', () => {
  it('lays out the matrix with origins as rows and blanks for unreachable', () => {
    expect(formatMatrixCsv(MATRIX)).toBe('origin,D1,D2\nO1,30,\nO2,12.5,60\n');
  });

  it('lists failures with their code and status', () => {
    const csv = formatFailuresCsv([
      { key: 'C', code: 'REQUEST_FAILED', status: 'PATH_NOT_FOUND', message: 'No trip found' },
      { key: 'D', code: 'PARSE_FAILED', status: null, message: 'Unexpected body, truncated' },
    ]);

    expect(csv).toBe(
      'name,code,status,message\n' +
        'C,REQUEST_FAILED,PATH_NOT_FOUND,No trip found\n' +
        'D,PARSE_FAILED,,"Unexpected body, truncated"\n'
    );
  });

  it('writes empty measures for failed trips', () => {
    const row = toTripRow(point('A', 0, 0), point('C', 1, 1), null);

    expect(formatTripCsv([row], 'WALK,TRANSIT')).toBe(`${TRIP_HEADER}\nA,C${','.repeat(9)}\n`);
  });

  it('leads the timed trip table with the query time', () => {
    const row = { ...toTripRow(point('A', 0, 0), point('C', 1, 1), null), queryTime: '2018-08-18 12:30' };

    expect(formatTripTimeCsv([row], 'WALK,TRANSIT')).toBe(
      `query_time,${TRIP_HEADER}\n2018-08-18 12:30,A,C${','.repeat(9)}\n`
    );
  });

  it('names the access time column after the modes', () => {
    const header = (modes: string): string | undefined =>
      formatTripCsv([], modes).trimEnd().split(',')[6];

    expect(header('car')).toBe('drive_time_mins');
    expect(header('BICYCLE')).toBe('cycle_time_mins');
    expect(header('TRANSIT,WALK')).toBe('walk_time_mins');
  });

  it('formats choropleth rows', () => {
    const rows: ChoroplethRow[] = [
      {
        name: 'B',
        status: 'OK',
        durationMins: 30,
        waitingTimeMins: 2,
        transfers: 0,
        durationCategory: 'Under 60 minutes',
        waitingTimeCategory: 'Under 10 minutes',
        transfersCategory: 'Under 1 transfer(s)',
      },
    ];

    expect(formatChoroplethCsv(rows)).toBe(
      'name,status,duration,waitingtime,transfers,duration_cat,waitingtime_cat,transfers_cat\n' +
        'B,OK,30,2,0,Under 60 minutes,Under 10 minutes,Under 1 transfer(s)\n'
    );
  });
});

describe('GeoJSON conversion', () => {
  it('tags cutoff polygons with origin and cutoff', () => {
    const geometry = square(0, 0, 0.01);
    const collection = cutoffPolygonsToGeoJSON([
      { originId: 'O1', cutoffSeconds: 1800, cutoffMinutes: 30, geometry },
    ]);

    expect(collection).toEqual({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry, properties: { name: 'O1', time: 1800, minutes: 30 } }],
    });
  });

  it('wraps a single geometry', () => {
    const geometry = square(1, 1, 0.5);

    expect(geometryToGeoJSON(geometry, { time: '2018-08-18 12:00' }).features).toEqual([
      { type: 'Feature', geometry, properties: { time: '2018-08-18 12:00' } },
    ]);
  });
});

describe('fileStamp', () => {
  it('uses underscores only', () => {
    expect(fileStamp(new Date(Date.UTC(2018, 7, 18, 12, 0, 0)))).toBe('2018_08_18_12_00_00');
  });
});

describe('file writers', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('creates missing directories', async () => {
    dir = await mkdtemp(join(tmpdir(), 'transit-reach-outputs-'));
    const path = join(dir, 'nested', 'matrix.csv');

    await writeMatrixCsv(path, MATRIX);

    await expect(readFile(path, 'utf-8')).resolves.toBe('origin,D1,D2\nO1,30,\nO2,12.5,60\n');
  });

  it('writes GeoJSON as indented JSON', async () => {
    dir = await mkdtemp(join(tmpdir(), 'transit-reach-outputs-'));
    const path = join(dir, 'footprint.geojson');
    const collection = geometryToGeoJSON(square(0, 0, 1));

    await writeGeoJSON(path, collection);

    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(collection);
  });

  it('rewrites the trip table on every checkpoint', async () => {
    dir = await mkdtemp(join(tmpdir(), 'transit-reach-outputs-'));
    const sink = new CsvTripCheckpointSink(join(dir, 'trips.csv'), 'CAR');
    const a = toTripRow(point('A', 0, 0), point('B', 1, 1), null);
    const b = toTripRow(point('A', 0, 0), point('C', 1, 1), null);

    await sink.write([a]);
    await sink.write([a, b]);

    const lines = (await readFile(sink.path, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0].split(',')[6]).toBe('drive_time_mins');
  });
});

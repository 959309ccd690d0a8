/**
 * MultiOriginAggregator Unit Tests
 *
 * End-to-end matrix over an in-process routing client, failure isolation,
 * multi-time row keys, cancellation and checkpoint durability.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_TRAVEL_PARAMS } from '../../../core/types.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { TurfGeometryService } from '../../../geometry/geometry-service.js';
import {
  FileCheckpointSink,
  MultiOriginAggregator,
  rowKey,
  type CheckpointSink,
  type CheckpointSnapshot,
} from '../../../isochrone/multi-origin-aggregator.js';
import {
  FakeRoutingClient,
  isochronePayload,
  point,
  QUERY_TIME,
  rawSuccess,
  square,
} from '../../fixtures/routing.js';

const geometry = new TurfGeometryService();

/**
 * 30-minute square of half-width 0.1° inside a 60-minute square of 1°
 */
function nestedIsochrone(lon: number, lat: number): string {
  return isochronePayload([
    { time: 1800, geometry: square(lon, lat, 0.1) },
    { time: 3600, geometry: square(lon, lat, 1) },
  ]);
}

const O1 = point('O1', 0, 0);
const O2 = point('O2', 0, 10);
const D1 = point('D1', 0.05, 0.05);
const D2 = point('D2', 0.5, 10.5);

class MemoryCheckpointSink implements CheckpointSink {
  readonly snapshots: CheckpointSnapshot[] = [];

  async write(snapshot: CheckpointSnapshot): Promise<void> {
    this.snapshots.push(snapshot);
  }
}

function aggregator(routing: FakeRoutingClient): MultiOriginAggregator {
  return new MultiOriginAggregator({ routing, geometry, simplifyTolerance: 0, logger: silentLogger });
}

function baseOptions() {
  return {
    destinations: [D1, D2],
    queryTimes: [QUERY_TIME],
    cutoffsMinutes: [30, 60],
    travelParams: DEFAULT_TRAVEL_PARAMS,
  };
}

describe('MultiOriginAggregator', () => {
  it('builds the origin × destination matrix in minutes', async () => {
    const routing = new FakeRoutingClient({
      O1: rawSuccess(nestedIsochrone(0, 0)),
      O2: rawSuccess(nestedIsochrone(10, 0)),
    });

    const result = await aggregator(routing).run({ ...baseOptions(), origins: [O1, O2] });

    expect(result.matrix.columns).toEqual(['D1', 'D2']);
    expect(result.matrix.rows.map((row) => [row.key, row.values])).toEqual([
      ['O1', { D1: 30, D2: null }],
      ['O2', { D1: null, D2: 60 }],
    ]);
    expect(result.report.message).toBe('0 out of 2 origins excluded (0%)');
    expect([...result.states.values()]).toEqual(['AGGREGATED', 'AGGREGATED']);
    expect(routing.isochroneCalls.map((call) => call.cutoffsMinutes)).toEqual([
      [30, 60],
      [30, 60],
    ]);
  });

  it('records failed origins and keeps going', async () => {
    const routing = new FakeRoutingClient({
      O1: rawSuccess(nestedIsochrone(0, 0)),
      O2: rawSuccess(isochronePayload([])),
      O3: rawSuccess(nestedIsochrone(10, 0)),
    });
    const O3 = point('O3', 0, 10);
    const O4 = point('O4', 1, 1);

    const result = await aggregator(routing).run({ ...baseOptions(), origins: [O1, O2, O3, O4] });

    expect(result.matrix.rows.map((row) => row.key)).toEqual(['O1', 'O3']);
    expect(result.failures.list()).toEqual([
      {
        key: 'O2',
        code: 'PARSE_FAILED',
        status: null,
        message: 'Isochrone response for O2 contains no polygon',
      },
      {
        key: 'O4',
        code: 'REQUEST_FAILED',
        status: 'HTTP_404',
        message: 'Routing request for O4 failed with HTTP_404: HTTP 404: Not Found',
      },
    ]);
    expect(result.report.message).toBe('2 out of 4 origins excluded (50%)');
    expect(result.states.get('O2')).toBe('FAILED');
    expect(result.summary.succeeded).toBe(2);
    expect(result.summary.failed).toBe(2);
  });

  it('isolates an origin whose geometry cannot be decoded', async () => {
    const broken = JSON.stringify({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry: { type: 'Polygon', coordinates: 'oops' }, properties: { time: 1800 } }],
    });
    const routing = new FakeRoutingClient({
      O1: rawSuccess(nestedIsochrone(0, 0)),
      O2: rawSuccess(broken),
    });

    const result = await aggregator(routing).run({ ...baseOptions(), origins: [O1, O2] });

    expect(result.matrix.rows.map((row) => [row.key, row.values])).toEqual([['O1', { D1: 30, D2: null }]]);
    expect(result.failures.keys()).toEqual(['O2']);
    expect(result.failures.list()[0].code).toBe('PARSE_FAILED');
    expect(result.states.get('O2')).toBe('FAILED');
  });

  it('takes the smallest cutoff per destination and reports the excluded origin', async () => {
    const routing = new FakeRoutingClient({
      O1: rawSuccess(
        isochronePayload([
          { time: 1800, geometry: square(0, 0, 0.1) },
          { time: 3600, geometry: square(0, 0, 0.5) },
          { time: 5400, geometry: square(0, 0, 1) },
        ])
      ),
    });

    const result = await aggregator(routing).run({
      ...baseOptions(),
      origins: [O1, O2],
      destinations: [point('D1', 0.3, 0.3), point('D2', 0.8, 0.8)],
      cutoffsMinutes: [30, 60, 90],
    });

    expect(result.matrix.rows.map((row) => [row.key, row.values])).toEqual([['O1', { D1: 60, D2: 90 }]]);
    expect(result.failures.list()).toEqual([
      {
        key: 'O2',
        code: 'REQUEST_FAILED',
        status: 'HTTP_404',
        message: 'Routing request for O2 failed with HTTP_404: HTTP 404: Not Found',
      },
    ]);
    expect(result.report.message).toBe('1 out of 2 origins excluded (50%)');
  });

  it('keys rows by origin and time when several query times run', async () => {
    const routing = new FakeRoutingClient({ O1: rawSuccess(nestedIsochrone(0, 0)) });
    const later = { date: '2018-08-18', time: '13:00' };

    const result = await aggregator(routing).run({
      ...baseOptions(),
      origins: [O1, point('Missing', 5, 5)],
      queryTimes: [QUERY_TIME, later],
    });

    expect(result.matrix.rows.map((row) => row.key)).toEqual([
      'O1 @ 2018-08-18 12:00',
      'O1 @ 2018-08-18 13:00',
    ]);
    expect(routing.isochroneCalls.map((call) => call.queryTime.time)).toEqual(['12:00', '13:00', '12:00', '13:00']);
    expect(result.report.message).toBe('2 out of 4 origin time samples excluded (50%)');
  });

  it('keeps parsed polygons on request', async () => {
    const routing = new FakeRoutingClient({ O1: rawSuccess(nestedIsochrone(0, 0)) });

    const result = await aggregator(routing).run({ ...baseOptions(), origins: [O1], keepPolygons: true });

    expect(result.polygons.map((polygon) => [polygon.originId, polygon.cutoffMinutes])).toEqual([
      ['O1', 30],
      ['O1', 60],
    ]);
  });

  it('skips the remaining origins after cancellation', async () => {
    const routing = new FakeRoutingClient({
      O1: rawSuccess(nestedIsochrone(0, 0)),
      O2: rawSuccess(nestedIsochrone(10, 0)),
    });
    const controller = new AbortController();

    const result = await aggregator(routing).run({
      ...baseOptions(),
      origins: [O1, O2],
      signal: controller.signal,
      onProgress: () => {
        controller.abort();
      },
    });

    expect(result.summary.cancelled).toBe(true);
    expect(result.states.get('O1')).toBe('AGGREGATED');
    expect(result.states.get('O2')).toBe('SKIPPED');
    expect(result.matrix.rows).toHaveLength(1);
  });

  describe('checkpoints', () => {
    const origins = ['A', 'B', 'C', 'D', 'E'].map((id) => point(id, 0, 0));
    const responses = Object.fromEntries(origins.map((origin) => [origin.id, rawSuccess(nestedIsochrone(0, 0))]));
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'transit-reach-checkpoint-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes every N successful origins', async () => {
      const sink = new MemoryCheckpointSink();

      await aggregator(new FakeRoutingClient(responses)).run({
        ...baseOptions(),
        origins,
        checkpoint: sink,
        checkpointEvery: 2,
      });

      expect(sink.snapshots.map((snapshot) => snapshot.aggregated)).toEqual([2, 4]);
      expect(sink.snapshots[1].matrix.rows.map((row) => row.key)).toEqual(['A', 'B', 'C', 'D']);
    });

    it('leaves the last checkpoint on disk when the run dies', async () => {
      const path = join(dir, 'checkpoint.json');

      await expect(
        aggregator(new FakeRoutingClient(responses)).run({
          ...baseOptions(),
          origins,
          checkpoint: new FileCheckpointSink(path),
          checkpointEvery: 2,
          onProgress: (progress) => {
            if (progress.completed === 4) throw new Error('process killed');
          },
        })
      ).rejects.toThrow('process killed');

      const snapshot: unknown = JSON.parse(await readFile(path, 'utf-8'));
      expect(snapshot).toMatchObject({
        aggregated: 4,
        failures: [],
        matrix: {
          columns: ['D1', 'D2'],
          rows: [{ key: 'A' }, { key: 'B' }, { key: 'C' }, { key: 'D', values: { D1: 30, D2: null } }],
        },
      });
    });

    it('never writes when disabled', async () => {
      const sink = new MemoryCheckpointSink();

      await aggregator(new FakeRoutingClient(responses)).run({
        ...baseOptions(),
        origins,
        checkpoint: sink,
        checkpointEvery: 0,
      });

      expect(sink.snapshots).toHaveLength(0);
    });
  });
});

describe('rowKey', () => {
  it('adds the query time only for multi-time runs', () => {
    expect(rowKey(O1, QUERY_TIME, false)).toBe('O1');
    expect(rowKey(O1, QUERY_TIME, true)).toBe('O1 @ 2018-08-18 12:00');
  });
});

/**
 * PointToPointLoop Unit Tests
 *
 * Pair ordering per loop type, drop rules (distance, duplicate call, same
 * name), null rows for failed trips and trip checkpoints.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../core/errors.js';
import { DEFAULT_TRAVEL_PARAMS } from '../../../core/types.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { TurfGeometryService } from '../../../geometry/geometry-service.js';
import type { TripRow } from '../../../trips/itinerary.js';
import {
  buildPairs,
  isLoopType,
  PointToPointLoop,
  type PointToPointOptions,
} from '../../../trips/point-to-point-loop.js';
import type { TripCheckpointSink } from '../../../trips/trip-batch.js';
import { FakeRoutingClient, planPayload, point, QUERY_TIME, rawSuccess } from '../../fixtures/routing.js';

const A = point('A', 0, 0);
const B = point('B', 0, 0.01);
const X = point('X', 0.01, 0);
const Y = point('Y', 0.02, 0);

function options(overrides: Partial<PointToPointOptions> = {}): PointToPointOptions {
  return {
    origins: [A, B],
    destinations: [X, Y],
    queryTime: QUERY_TIME,
    travelParams: DEFAULT_TRAVEL_PARAMS,
    ...overrides,
  };
}

function loop(routing: FakeRoutingClient): PointToPointLoop {
  return new PointToPointLoop({ routing, geometry: new TurfGeometryService(), logger: silentLogger });
}

function pairIds(pairs: readonly { from: { id: string }; to: { id: string } }[]): string[] {
  return pairs.map((pair) => `${pair.from.id}->${pair.to.id}`);
}

class MemoryTripSink implements TripCheckpointSink {
  readonly writes: TripRow[][] = [];

  async write(rows: readonly TripRow[]): Promise<void> {
    this.writes.push([...rows]);
  }
}

describe('buildPairs', () => {
  it('loops destinations outside origins', () => {
    expect(pairIds(buildPairs(options()))).toEqual(['A->X', 'B->X', 'A->Y', 'B->Y']);
  });

  it('appends the reverse journeys', () => {
    expect(pairIds(buildPairs(options({ returnJourneys: true })))).toEqual([
      'A->X',
      'B->X',
      'A->Y',
      'B->Y',
      'X->A',
      'X->B',
      'Y->A',
      'Y->B',
    ]);
  });

  it('selects one destination or one origin by 1-based row', () => {
    expect(pairIds(buildPairs(options({ loop: 'origins', destinationRow: 2 })))).toEqual(['A->Y', 'B->Y']);
    expect(pairIds(buildPairs(options({ loop: 'destinations', originRow: 2 })))).toEqual(['B->X', 'B->Y']);
  });

  it('rejects a row outside the point set', () => {
    expect(() => buildPairs(options({ loop: 'destinations', originRow: 3 }))).toThrow(ConfigurationError);
    expect(() => buildPairs(options({ loop: 'destinations', originRow: 3 }))).toThrow(
      'Row 3 is not in the point set (2 rows)'
    );
  });
});

describe('isLoopType', () => {
  it('accepts the three loop types only', () => {
    expect(isLoopType('origins')).toBe(true);
    expect(isLoopType('everything')).toBe(false);
  });
});

describe('PointToPointLoop', () => {
  it('keeps failed trips as null rows and drops same-name pairs', async () => {
    const routing = new FakeRoutingClient(
      {},
      { 'A->B': rawSuccess(planPayload()), 'B->C': rawSuccess(planPayload({ duration: 2400 })) }
    );
    const C = point('C', 0.03, 0);

    const result = await loop(routing).run(options({ destinations: [B, C] }));

    expect(routing.tripCalls.map((call) => `${call.fromId}->${call.toId}`)).toEqual(['A->B', 'A->C', 'B->C']);
    expect(result.rows.map((row) => [row.origin, row.destination, row.durationMins])).toEqual([
      ['A', 'B', 30],
      ['A', 'C', null],
      ['B', 'C', 40],
    ]);
    expect(result.failures.keys()).toEqual(['A → C']);
    expect(result.summary.dropped).toBe(1);
    expect(result.report.message).toBe('1 out of 3 connections excluded (33.33%)');
  });

  it('drops pairs farther apart than the distance limit', async () => {
    const far = point('Far', 1, 0);
    const routing = new FakeRoutingClient({}, { 'A->X': rawSuccess(planPayload()) });

    const result = await loop(routing).run(
      options({ origins: [A], destinations: [X, far], distMaxKm: 50 })
    );

    expect(routing.tripCalls).toHaveLength(1);
    expect(result.rows.map((row) => row.destination)).toEqual(['X']);
    expect(result.summary.dropped).toBe(1);
  });

  it('plans each from/to call once', async () => {
    const routing = new FakeRoutingClient(
      {},
      { 'A->B': rawSuccess(planPayload()), 'B->A': rawSuccess(planPayload()) }
    );

    const result = await loop(routing).run(
      options({ origins: [A, B], destinations: [A, B], returnJourneys: true })
    );

    expect(routing.tripCalls.map((call) => `${call.fromId}->${call.toId}`)).toEqual(['B->A', 'A->B']);
    expect(result.summary.total).toBe(2);
    expect(result.summary.dropped).toBe(6);
  });

  it('writes the table so far every N processed calls', async () => {
    const routing = new FakeRoutingClient({}, { 'A->X': rawSuccess(planPayload()) });
    const sink = new MemoryTripSink();

    await loop(routing).run(options({ checkpoint: sink, checkpointEvery: 2 }));

    expect(sink.writes.map((rows) => rows.length)).toEqual([2, 4]);
    expect(sink.writes[0].map((row) => row.durationMins)).toEqual([30, null]);
  });
});

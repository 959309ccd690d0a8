/**
 * In-process routing stand-ins and payload builders shared by the unit tests.
 */

import type { Polygon } from 'geojson';
import type { Point, QueryTime, TravelParams } from '../../core/types.js';
import { rawFailure, rawSuccess, type RawResult, type RequestOptions, type RoutingClient } from '../../routing/types.js';

export const QUERY_TIME: QueryTime = { date: '2018-08-18', time: '12:00' };

export function point(id: string, lat: number, lon: number, attributes: Record<string, string> = {}): Point {
  return { id, lat, lon, attributes };
}

/**
 * Axis-aligned square centred on (lon, lat), `half` degrees to each side
 */
export function square(lon: number, lat: number, half: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [lon - half, lat - half],
        [lon + half, lat - half],
        [lon + half, lat + half],
        [lon - half, lat + half],
        [lon - half, lat - half],
      ],
    ],
  };
}

/**
 * Isochrone response body, one feature per cutoff
 */
export function isochronePayload(polygons: readonly { time: number | string; geometry: Polygon }[]): string {
  return JSON.stringify({
    type: 'FeatureCollection',
    features: polygons.map(({ time, geometry }) => ({
      type: 'Feature',
      geometry,
      properties: { time },
    })),
  });
}

export interface PlanFixture {
  readonly duration?: number;
  readonly walkTime?: number;
  readonly transitTime?: number;
  readonly waitingTime?: number;
  readonly transfers?: number;
}

/**
 * Plan response body with a single two-leg itinerary starting 2018-08-18T12:00:00Z
 */
export function planPayload(fixture: PlanFixture = {}): string {
  const start = Date.UTC(2018, 7, 18, 12, 0, 0);
  const duration = fixture.duration ?? 1800;
  return JSON.stringify({
    plan: {
      itineraries: [
        {
          duration,
          startTime: start,
          endTime: start + duration * 1000,
          walkTime: fixture.walkTime ?? 600,
          transitTime: fixture.transitTime ?? 1080,
          waitingTime: fixture.waitingTime ?? 120,
          transfers: fixture.transfers ?? 0,
          legs: [
            {
              mode: 'WALK',
              startTime: start,
              endTime: start + 600_000,
              distance: 750,
              duration: 600,
              from: { name: 'Origin' },
              to: { name: 'Stop A' },
            },
            {
              mode: 'BUS',
              startTime: start + 720_000,
              endTime: start + duration * 1000,
              distance: 5250,
              duration: 1080,
              routeShortName: '42',
              from: { name: 'Stop A' },
              to: { name: 'Destination' },
            },
          ],
        },
      ],
    },
  });
}

export interface IsochroneCall {
  readonly originId: string;
  readonly cutoffsMinutes: readonly number[];
  readonly queryTime: QueryTime;
  readonly modes: string;
}

export interface TripCall {
  readonly fromId: string;
  readonly toId: string;
  readonly queryTime: QueryTime;
}

type Responder<A extends unknown[]> = RawResult | ((...args: A) => RawResult);

/**
 * Routing client answering from tables keyed by origin id (isochrones) or
 * `from->to` (trips). Unknown keys answer HTTP 404.
 */
export class FakeRoutingClient implements RoutingClient {
  readonly isochroneCalls: IsochroneCall[] = [];
  readonly tripCalls: TripCall[] = [];

  constructor(
    private readonly isochrones: Readonly<Record<string, Responder<[QueryTime]>>> = {},
    private readonly trips: Readonly<Record<string, Responder<[QueryTime]>>> = {}
  ) {}

  async requestIsochrone(
    origin: Point,
    cutoffsMinutes: readonly number[],
    queryTime: QueryTime,
    travelParams: TravelParams,
    _options?: RequestOptions
  ): Promise<RawResult> {
    this.isochroneCalls.push({ originId: origin.id, cutoffsMinutes, queryTime, modes: travelParams.modes });
    const responder = this.isochrones[origin.id];
    if (responder === undefined) {
      return rawFailure('HTTP_404', 'HTTP 404: Not Found');
    }
    return typeof responder === 'function' ? responder(queryTime) : responder;
  }

  async requestTrip(
    from: Point,
    to: Point,
    queryTime: QueryTime,
    _travelParams: TravelParams,
    _options?: RequestOptions
  ): Promise<RawResult> {
    this.tripCalls.push({ fromId: from.id, toId: to.id, queryTime });
    const responder = this.trips[`${from.id}->${to.id}`];
    if (responder === undefined) {
      return rawFailure('PATH_NOT_FOUND', 'No trip found');
    }
    return typeof responder === 'function' ? responder(queryTime) : responder;
  }
}

export { rawFailure, rawSuccess };

/**
 * Clock that advances by `stepMs` on every read
 */
export function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}

/**
 * Routing client contract
 */

import type { Point, QueryTime, TravelParams } from '../core/types.js';

/**
 * Raw routing engine answer.
 *
 * `payload` is the unparsed response body (GeoJSON for isochrones, plan JSON
 * for trips). Failures carry the engine's error id or a transport code.
 */
export type RawResult = RawSuccess | RawFailure;

export interface RawSuccess {
  readonly ok: true;
  readonly status: 'OK';
  readonly payload: string;
}

export interface RawFailure {
  readonly ok: false;
  readonly status: RoutingFailureCode;
  readonly message: string;
}

/**
 * `TIMEOUT`, `NETWORK_ERROR`, `ABORTED`, `HTTP_<status>` or an engine error id
 */
export type RoutingFailureCode = string;

export interface RequestOptions {
  /** Cancels the in-flight request */
  readonly signal?: AbortSignal;
  /** Overrides the client's per-request timeout */
  readonly timeoutMs?: number;
}

/**
 * Issues parameterized queries to the external routing engine
 */
export interface RoutingClient {
  /**
   * One polygon per reachable cutoff, tagged with its cutoff in seconds
   */
  requestIsochrone(
    origin: Point,
    cutoffsMinutes: readonly number[],
    queryTime: QueryTime,
    travelParams: TravelParams,
    options?: RequestOptions
  ): Promise<RawResult>;

  /**
   * Best itinerary between two points
   */
  requestTrip(
    from: Point,
    to: Point,
    queryTime: QueryTime,
    travelParams: TravelParams,
    options?: RequestOptions
  ): Promise<RawResult>;
}

export function rawSuccess(payload: string): RawSuccess {
  return { ok: true, status: 'OK', payload };
}

export function rawFailure(status: RoutingFailureCode, message: string): RawFailure {
  return { ok: false, status, message };
}

/**
 * Core domain types shared by the routing, isochrone and trip modules.
 */

import type { MultiPolygon, Polygon } from 'geojson';

// ============================================================================
// Points
// ============================================================================

/**
 * Named location loaded from an input file.
 *
 * `id` is the point's name and is unique within its point set.
 */
export interface Point {
  readonly id: string;
  readonly lat: number;
  readonly lon: number;
  readonly attributes: Readonly<Record<string, string>>;
}

// ============================================================================
// Query time
// ============================================================================

/**
 * Local date and time-of-day a routing query is made for.
 */
export interface QueryTime {
  /** YYYY-MM-DD */
  readonly date: string;
  /** HH:MM, 24-hour clock */
  readonly time: string;
}

// ============================================================================
// Travel parameters
// ============================================================================

export interface TravelParams {
  /** Comma-separated OTP modes, e.g. `TRANSIT,WALK` */
  readonly modes: string;
  /** Meters */
  readonly maxWalkDistance: number;
  /** Meters per second */
  readonly walkSpeed: number;
  /** Meters per second */
  readonly bikeSpeed: number;
  /** 0 (none) to 20 (strongest) */
  readonly walkReluctance: number;
  /** Minutes */
  readonly minTransferTime: number;
  readonly maxTransfers: number;
  readonly wheelchair: boolean;
  readonly arriveBy: boolean;
  /** Minutes of waiting allowed before the first transit leg (trips only) */
  readonly preWaitTime: number;
}

export const DEFAULT_TRAVEL_PARAMS: TravelParams = {
  modes: 'WALK,TRANSIT',
  maxWalkDistance: 1000,
  walkSpeed: 1.5,
  bikeSpeed: 5,
  walkReluctance: 2,
  minTransferTime: 1,
  maxTransfers: 5,
  wheelchair: false,
  arriveBy: false,
  preWaitTime: 15,
};

// ============================================================================
// Geometry
// ============================================================================

/**
 * Areal geometry. The empty polygon is a MultiPolygon without members.
 */
export type PolygonalGeometry = Polygon | MultiPolygon;

/**
 * [minLon, minLat, maxLon, maxLat]
 */
export type BBox = readonly [number, number, number, number];

// ============================================================================
// Result
// ============================================================================

/**
 * Outcome of an operation that can fail without throwing
 */
export type Result<T, E> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(data: T): { readonly success: true; readonly data: T } {
  return { success: true, data };
}

export function err<E>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

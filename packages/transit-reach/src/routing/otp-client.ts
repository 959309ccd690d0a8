/**
 * OpenTripPlanner Routing Client
 *
 * Builds isochrone and plan requests against an OTP 1.x router and folds every
 * outcome into a RawResult. Transport failures and non-2xx answers come back as
 * failure codes; nothing but programming errors is thrown.
 *
 * ENDPOINTS:
 * - `<router>/isochrone` → GeoJSON FeatureCollection, `properties.time` in seconds
 * - `<router>/plan`      → `{ plan: { itineraries } }` or `{ error: { id, msg } }`
 */

import {
  HTTPAbortedError,
  HTTPClient,
  HTTPError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import { formatOtpTime } from '../core/query-time.js';
import type { Point, QueryTime, TravelParams } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { normalizeModes } from './modes.js';
import {
  rawFailure,
  rawSuccess,
  type RawFailure,
  type RawResult,
  type RequestOptions,
  type RoutingClient,
} from './types.js';

const log = createLogger({ module: 'otp-client' });

export interface OtpRoutingClientOptions {
  /** e.g. `http://localhost:8080/otp/routers/default` */
  readonly routerUrl: string;
  readonly httpClient?: HTTPClient;
  /** Per-request timeout in milliseconds */
  readonly timeoutMs?: number;
}

export class OtpRoutingClient implements RoutingClient {
  private readonly routerUrl: string;
  private readonly http: HTTPClient;
  private readonly timeoutMs: number | undefined;

  constructor(options: OtpRoutingClientOptions) {
    this.routerUrl = options.routerUrl.replace(/\/+$/, '');
    this.http = options.httpClient ?? new HTTPClient();
    this.timeoutMs = options.timeoutMs;
  }

  async requestIsochrone(
    origin: Point,
    cutoffsMinutes: readonly number[],
    queryTime: QueryTime,
    travelParams: TravelParams,
    options?: RequestOptions
  ): Promise<RawResult> {
    const url = this.buildIsochroneUrl(origin, cutoffsMinutes, queryTime, travelParams);
    return this.execute(url, options);
  }

  async requestTrip(
    from: Point,
    to: Point,
    queryTime: QueryTime,
    travelParams: TravelParams,
    options?: RequestOptions
  ): Promise<RawResult> {
    const url = this.buildPlanUrl(from, to, queryTime, travelParams);
    const result = await this.execute(url, options);
    if (!result.ok) {
      return result;
    }

    // OTP answers 200 with an error object when no itinerary exists
    const engineError = readPlanError(result.payload);
    if (engineError) {
      return rawFailure(engineError.id, engineError.message);
    }
    return result;
  }

  /**
   * Isochrone request URL, one `cutoffSec` per cutoff
   */
  buildIsochroneUrl(
    origin: Point,
    cutoffsMinutes: readonly number[],
    queryTime: QueryTime,
    travelParams: TravelParams
  ): string {
    const params = this.commonParams(queryTime, travelParams);
    params.set('fromPlace', formatPlace(origin));
    params.set('batch', 'true');
    for (const cutoff of cutoffsMinutes) {
      params.append('cutoffSec', String(Math.round(cutoff * 60)));
    }
    return `${this.routerUrl}/isochrone?${params.toString()}`;
  }

  /**
   * Point-to-point plan request URL
   */
  buildPlanUrl(from: Point, to: Point, queryTime: QueryTime, travelParams: TravelParams): string {
    const params = this.commonParams(queryTime, travelParams);
    params.set('fromPlace', formatPlace(from));
    params.set('toPlace', formatPlace(to));
    params.set('maxPreTransitTime', String(Math.round(travelParams.preWaitTime * 60)));
    return `${this.routerUrl}/plan?${params.toString()}`;
  }

  private commonParams(queryTime: QueryTime, travel: TravelParams): URLSearchParams {
    return new URLSearchParams({
      mode: normalizeModes(travel.modes),
      date: queryTime.date,
      time: formatOtpTime(queryTime),
      maxWalkDistance: String(travel.maxWalkDistance),
      walkReluctance: String(travel.walkReluctance),
      walkSpeed: String(travel.walkSpeed),
      bikeSpeed: String(travel.bikeSpeed),
      minTransferTime: String(Math.round(travel.minTransferTime * 60)),
      maxTransfers: String(travel.maxTransfers),
      wheelchair: String(travel.wheelchair),
      arriveBy: String(travel.arriveBy),
    });
  }

  private async execute(url: string, options?: RequestOptions): Promise<RawResult> {
    try {
      const payload = await this.http.fetchText(url, {
        signal: options?.signal,
        timeoutMs: options?.timeoutMs ?? this.timeoutMs,
      });
      return rawSuccess(payload);
    } catch (error) {
      const failure = classifyFailure(error);
      log.debug('Routing request failed', { url, status: failure.status });
      return failure;
    }
  }
}

/**
 * `lat,lon` as OTP expects in fromPlace/toPlace
 */
export function formatPlace(point: Point): string {
  return `${point.lat},${point.lon}`;
}

function classifyFailure(error: unknown): RawFailure {
  if (error instanceof HTTPError) {
    return rawFailure(`HTTP_${error.statusCode}`, error.message);
  }
  if (error instanceof HTTPTimeoutError) {
    return rawFailure('TIMEOUT', error.message);
  }
  if (error instanceof HTTPAbortedError) {
    return rawFailure('ABORTED', error.message);
  }
  if (error instanceof HTTPNetworkError) {
    return rawFailure('NETWORK_ERROR', error.message);
  }
  throw error;
}

function readPlanError(payload: string): { id: string; message: string } | null {
  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch {
    // Unparsable bodies are reported by the itinerary parser
    return null;
  }

  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return null;
  }

  const error = body.error;
  if (typeof error !== 'object' || error === null) {
    return null;
  }

  const id = 'id' in error ? String(error.id) : 'UNKNOWN_ERROR';
  const message = 'msg' in error && typeof error.msg === 'string' ? error.msg : 'No itinerary found';
  return { id, message };
}

/**
 * Postcode Geocoder
 *
 * UK postcode → latitude/longitude through getthedata.com, falling back to
 * postcodes.io when the primary provider has no match or cannot be reached.
 * Responses are validated with zod; a provider answer that does not match its
 * schema counts as "no match".
 */

import { z } from 'zod';
import {
  HTTPAbortedError,
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import type { LatLon } from '../geometry/geometry-service.js';

const log = createLogger({ module: 'geocoder' });

export const GETTHEDATA_BASE_URL = 'https://api.getthedata.com/postcode';
export const POSTCODES_IO_BASE_URL = 'https://api.postcodes.io/postcodes';

const coordinate = z.coerce.number().finite();

const GetTheDataResponseSchema = z.object({
  status: z.literal('match'),
  data: z.object({
    latitude: coordinate,
    longitude: coordinate,
  }),
});

const PostcodesIoResponseSchema = z.object({
  status: z.literal(200),
  result: z.object({
    latitude: coordinate,
    longitude: coordinate,
  }),
});

export interface Geocoder {
  /** `null` when no provider knows the postcode */
  lookup(postcode: string): Promise<LatLon | null>;
}

export interface PostcodeGeocoderOptions {
  readonly httpClient?: HTTPClient;
  readonly primaryBaseUrl?: string;
  readonly fallbackBaseUrl?: string;
  readonly signal?: AbortSignal;
}

export class PostcodeGeocoder implements Geocoder {
  private readonly http: HTTPClient;
  private readonly primaryBaseUrl: string;
  private readonly fallbackBaseUrl: string;
  private readonly signal: AbortSignal | undefined;

  constructor(options: PostcodeGeocoderOptions = {}) {
    this.http = options.httpClient ?? new HTTPClient({ timeoutMs: 10_000 });
    this.primaryBaseUrl = options.primaryBaseUrl ?? GETTHEDATA_BASE_URL;
    this.fallbackBaseUrl = options.fallbackBaseUrl ?? POSTCODES_IO_BASE_URL;
    this.signal = options.signal;
  }

  async lookup(postcode: string): Promise<LatLon | null> {
    const normalized = normalizePostcode(postcode);
    if (normalized.length === 0) {
      return null;
    }

    const primary = await this.fetchBody(`${this.primaryBaseUrl}/${encodeURIComponent(normalized)}`);
    const primaryMatch = GetTheDataResponseSchema.safeParse(primary);
    if (primaryMatch.success) {
      return { lat: primaryMatch.data.data.latitude, lon: primaryMatch.data.data.longitude };
    }

    log.debug('Primary geocoder has no match, trying fallback', { postcode: normalized });

    const fallback = await this.fetchBody(`${this.fallbackBaseUrl}/${encodeURIComponent(normalized)}`);
    const fallbackMatch = PostcodesIoResponseSchema.safeParse(fallback);
    if (fallbackMatch.success) {
      return { lat: fallbackMatch.data.result.latitude, lon: fallbackMatch.data.result.longitude };
    }

    return null;
  }

  /**
   * JSON body, or null when the provider failed
   */
  private async fetchBody(url: string): Promise<unknown> {
    try {
      return await this.http.fetchJSON(url, { signal: this.signal });
    } catch (error) {
      if (error instanceof HTTPAbortedError) {
        throw error;
      }
      if (
        error instanceof HTTPError ||
        error instanceof HTTPTimeoutError ||
        error instanceof HTTPNetworkError ||
        error instanceof HTTPJSONParseError
      ) {
        log.debug('Geocoder request failed', { url, error: error.message });
        return null;
      }
      throw error;
    }
  }
}

/**
 * Upper-case, single inner space: `np10 8xg` → `NP10 8XG`
 */
export function normalizePostcode(postcode: string): string {
  return postcode.trim().toUpperCase().replace(/\s+/g, ' ');
}

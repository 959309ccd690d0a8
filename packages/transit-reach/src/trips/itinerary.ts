/**
 * Itinerary parsing for `/plan` responses.
 *
 * Only the first (best) itinerary is kept. Durations come back from the
 * engine in seconds and are converted to minutes here, rounded to two
 * decimals; leg distances are summed into `distanceKm`.
 */

import { z } from 'zod';
import { ParseError, RequestError } from '../core/errors.js';
import { err, ok, type Point, type Result } from '../core/types.js';
import type { RawResult } from '../routing/types.js';

const PlaceSchema = z
  .object({
    name: z.string().optional(),
  })
  .passthrough();

const LegSchema = z
  .object({
    mode: z.string(),
    startTime: z.number(),
    endTime: z.number(),
    distance: z.number().nonnegative(),
    duration: z.number().nonnegative(),
    routeShortName: z.string().optional(),
    route: z.string().optional(),
    from: PlaceSchema.optional(),
    to: PlaceSchema.optional(),
  })
  .passthrough();

const ItinerarySchema = z
  .object({
    duration: z.number().nonnegative(),
    startTime: z.number(),
    endTime: z.number(),
    walkTime: z.number().nonnegative(),
    transitTime: z.number().nonnegative(),
    waitingTime: z.number().nonnegative(),
    transfers: z.number().int().nonnegative(),
    legs: z.array(LegSchema),
  })
  .passthrough();

const PlanResponseSchema = z
  .object({
    plan: z
      .object({
        itineraries: z.array(ItinerarySchema),
      })
      .passthrough(),
  })
  .passthrough();

export interface TripLeg {
  readonly mode: string;
  readonly from: string;
  readonly to: string;
  /** ISO-8601 */
  readonly startTime: string;
  readonly endTime: string;
  readonly distanceM: number;
  readonly durationMins: number;
  readonly route: string | null;
}

export interface Itinerary {
  readonly startTime: string;
  readonly endTime: string;
  readonly durationMins: number;
  /** Walking, driving or cycling time, depending on the modes */
  readonly accessTimeMins: number;
  readonly transitTimeMins: number;
  readonly waitingTimeMins: number;
  readonly transfers: number;
  readonly distanceKm: number;
  readonly legs: readonly TripLeg[];
}

/**
 * Decode a raw plan result into the best itinerary
 *
 * @returns RequestError for engine/transport failures (including "no trip
 *   found" answers), ParseError for malformed or itinerary-less bodies
 */
export function parseItinerary(
  raw: RawResult,
  from: Point,
  to: Point
): Result<Itinerary, RequestError | ParseError> {
  const subject = `${from.id} → ${to.id}`;

  if (!raw.ok) {
    return err(
      new RequestError(`Trip ${subject} failed with ${raw.status}: ${raw.message}`, raw.status, subject)
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(raw.payload);
  } catch (error) {
    return err(
      new ParseError(
        `Plan response for ${subject} is not valid JSON`,
        subject,
        error instanceof Error ? error : undefined
      )
    );
  }

  const parsed = PlanResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(new ParseError(`Unexpected plan response for ${subject}: ${issues.join('; ')}`, subject));
  }

  const best = parsed.data.plan.itineraries[0];
  if (best === undefined) {
    return err(new ParseError(`Plan response for ${subject} contains no itinerary`, subject));
  }

  const legs: TripLeg[] = best.legs.map((leg) => ({
    mode: leg.mode,
    from: leg.from?.name ?? '',
    to: leg.to?.name ?? '',
    startTime: new Date(leg.startTime).toISOString(),
    endTime: new Date(leg.endTime).toISOString(),
    distanceM: leg.distance,
    durationMins: toMinutes(leg.duration),
    route: leg.routeShortName ?? leg.route ?? null,
  }));

  const distanceM = legs.reduce((total, leg) => total + leg.distanceM, 0);

  return ok({
    startTime: new Date(best.startTime).toISOString(),
    endTime: new Date(best.endTime).toISOString(),
    durationMins: toMinutes(best.duration),
    accessTimeMins: toMinutes(best.walkTime),
    transitTimeMins: toMinutes(best.transitTime),
    waitingTimeMins: toMinutes(best.waitingTime),
    transfers: best.transfers,
    distanceKm: round2(distanceM / 1000),
    legs,
  });
}

/**
 * One line of a trip table; every measure is null for a failed trip
 */
export interface TripRow {
  readonly origin: string;
  readonly destination: string;
  readonly startTime: string | null;
  readonly endTime: string | null;
  readonly distanceKm: number | null;
  readonly durationMins: number | null;
  readonly accessTimeMins: number | null;
  readonly transitTimeMins: number | null;
  readonly waitingTimeMins: number | null;
  readonly transfers: number | null;
  /** JSON array of legs */
  readonly journeyDetails: string | null;
}

export function toTripRow(from: Point, to: Point, itinerary: Itinerary | null): TripRow {
  return {
    origin: from.id,
    destination: to.id,
    startTime: itinerary?.startTime ?? null,
    endTime: itinerary?.endTime ?? null,
    distanceKm: itinerary?.distanceKm ?? null,
    durationMins: itinerary?.durationMins ?? null,
    accessTimeMins: itinerary?.accessTimeMins ?? null,
    transitTimeMins: itinerary?.transitTimeMins ?? null,
    waitingTimeMins: itinerary?.waitingTimeMins ?? null,
    transfers: itinerary?.transfers ?? null,
    journeyDetails: itinerary ? JSON.stringify(itinerary.legs) : null,
  };
}

function toMinutes(seconds: number): number {
  return round2(seconds / 60);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

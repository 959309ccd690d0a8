/**
 * Isochrone Polygon Set
 *
 * Parses one isochrone response (GeoJSON FeatureCollection, one polygon per
 * reached cutoff, cutoff in seconds under `properties.time`) into an ordered
 * collection of cutoff polygons for a single origin and query time.
 *
 * A response may legitimately hold fewer polygons than requested cutoffs
 * (a cutoff too small to reach anything). Missing cutoffs are recorded, the
 * set is still valid.
 */

import { z } from 'zod';
import { ParseError, RequestError } from '../core/errors.js';
import { err, ok, type Point, type PolygonalGeometry, type QueryTime, type Result } from '../core/types.js';
import { emptyPolygon, isEmptyPolygon, type GeometryService } from '../geometry/geometry-service.js';
import type { RawResult } from '../routing/types.js';

const PositionSchema = z.tuple([z.number(), z.number()]).rest(z.number());

/** Closed ring: first and last position repeat, so at least 4 positions */
const RingSchema = z.array(PositionSchema).min(4);

const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(RingSchema),
});

const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(RingSchema)),
});

/** Non-areal members are tolerated and skipped */
const OtherGeometrySchema = z
  .object({
    type: z.enum(['Point', 'MultiPoint', 'LineString', 'MultiLineString', 'GeometryCollection']),
  })
  .passthrough();

const IsochroneFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.union([PolygonSchema, MultiPolygonSchema, OtherGeometrySchema]).nullable(),
  properties: z
    .object({
      time: z.union([z.number(), z.string()]).optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
});

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

type IsochroneFeature = z.infer<typeof IsochroneFeatureSchema>;

interface DecodedFeature {
  readonly cutoffSeconds: number | null;
  readonly geometry: PolygonalGeometry | null;
}

/**
 * Default simplification tolerance in degrees
 */
export const DEFAULT_SIMPLIFY_TOLERANCE = 0.001;

export interface CutoffPolygon {
  readonly originId: string;
  /** Raw engine value */
  readonly cutoffSeconds: number;
  /** Display value; matrices convert from seconds themselves */
  readonly cutoffMinutes: number;
  readonly geometry: PolygonalGeometry;
}

export interface PolygonSet {
  readonly origin: Point;
  readonly queryTime: QueryTime;
  /** Ascending by cutoff, one entry per distinct cutoff */
  readonly polygons: readonly CutoffPolygon[];
  readonly requestedCutoffsMinutes: readonly number[];
  /** Requested cutoffs (minutes) with no polygon in the response */
  readonly missingCutoffsMinutes: readonly number[];
  readonly simplifyTolerance: number;
}

export interface ParseOptions {
  readonly geometry: GeometryService;
  /** Degrees; 0 disables simplification */
  readonly simplifyTolerance?: number;
}

/**
 * Build a PolygonSet from a raw isochrone result
 *
 * @returns RequestError for a non-OK result, ParseError for an unusable payload
 */
export function parsePolygonSet(
  raw: RawResult,
  origin: Point,
  requestedCutoffsMinutes: readonly number[],
  queryTime: QueryTime,
  options: ParseOptions
): Result<PolygonSet, RequestError | ParseError> {
  if (!raw.ok) {
    return err(
      new RequestError(
        `Routing request for ${origin.id} failed with ${raw.status}: ${raw.message}`,
        raw.status,
        origin.id
      )
    );
  }

  const decoded = decodeFeatures(raw.payload, origin.id);
  if (!decoded.success) {
    return decoded;
  }

  let polygons: CutoffPolygon[];
  try {
    polygons = collectPolygons(decoded.data, origin, options);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(
      new ParseError(`Isochrone geometry for ${origin.id} could not be processed: ${cause.message}`, origin.id, cause)
    );
  }

  if (polygons.length === 0) {
    return err(new ParseError(`Isochrone response for ${origin.id} contains no polygon`, origin.id));
  }

  const presentSeconds = new Set(polygons.map((polygon) => polygon.cutoffSeconds));
  const missingCutoffsMinutes = requestedCutoffsMinutes.filter(
    (minutes) => !presentSeconds.has(Math.round(minutes * 60))
  );

  return ok({
    origin,
    queryTime,
    polygons,
    requestedCutoffsMinutes: [...requestedCutoffsMinutes],
    missingCutoffsMinutes,
    simplifyTolerance: options.simplifyTolerance ?? DEFAULT_SIMPLIFY_TOLERANCE,
  });
}

/**
 * Merge features per cutoff, ascending, then simplify
 *
 * @throws whatever the geometry library raises for invalid rings
 */
function collectPolygons(
  features: readonly DecodedFeature[],
  origin: Point,
  options: ParseOptions
): CutoffPolygon[] {
  const byCutoff = new Map<number, PolygonalGeometry>();
  for (const { cutoffSeconds, geometry } of features) {
    if (cutoffSeconds === null || geometry === null || isEmptyPolygon(geometry)) {
      continue;
    }
    const existing = byCutoff.get(cutoffSeconds);
    byCutoff.set(cutoffSeconds, existing ? options.geometry.union(existing, geometry) : geometry);
  }

  const tolerance = options.simplifyTolerance ?? DEFAULT_SIMPLIFY_TOLERANCE;
  return [...byCutoff.entries()]
    .sort(([a], [b]) => a - b)
    .map(([cutoffSeconds, geometry]) => ({
      originId: origin.id,
      cutoffSeconds,
      cutoffMinutes: cutoffSeconds / 60,
      geometry: options.geometry.simplify(geometry, tolerance),
    }));
}

/**
 * Union of every cutoff polygon in the set (its outer reach)
 */
export function footprint(set: PolygonSet, geometry: GeometryService): PolygonalGeometry {
  let result: PolygonalGeometry | null = null;
  for (const polygon of set.polygons) {
    result = result ? geometry.union(result, polygon.geometry) : polygon.geometry;
  }
  // parsePolygonSet never produces an empty set
  return result ?? emptyPolygon();
}

function decodeFeatures(payload: string, originId: string): Result<DecodedFeature[], ParseError> {
  if (payload.trim().length === 0) {
    return err(new ParseError(`Empty isochrone response for ${originId}`, originId));
  }

  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch (error) {
    return err(
      new ParseError(
        `Isochrone response for ${originId} is not valid JSON`,
        originId,
        error instanceof Error ? error : undefined
      )
    );
  }

  const collection = FeatureCollectionSchema.safeParse(body);
  if (!collection.success) {
    return err(
      new ParseError(`Isochrone response for ${originId} is not a GeoJSON FeatureCollection`, originId)
    );
  }

  const features = z.array(IsochroneFeatureSchema).safeParse(collection.data.features);
  if (!features.success) {
    const issues = features.error.errors.map((issue) => `features.${issue.path.join('.')}: ${issue.message}`);
    return err(
      new ParseError(`Unexpected isochrone response for ${originId}: ${issues.join('; ')}`, originId)
    );
  }

  return ok(features.data.map(decodeFeature));
}

function decodeFeature(feature: IsochroneFeature): DecodedFeature {
  const { geometry } = feature;
  let polygonal: PolygonalGeometry | null = null;
  if (geometry?.type === 'Polygon') {
    polygonal = { type: 'Polygon', coordinates: geometry.coordinates };
  } else if (geometry?.type === 'MultiPolygon') {
    polygonal = { type: 'MultiPolygon', coordinates: geometry.coordinates };
  }
  return { cutoffSeconds: readCutoffSeconds(feature.properties?.time), geometry: polygonal };
}

function readCutoffSeconds(raw: number | string | undefined): number | null {
  const seconds = typeof raw === 'string' ? Number(raw) : raw;
  return seconds !== undefined && Number.isFinite(seconds) ? seconds : null;
}

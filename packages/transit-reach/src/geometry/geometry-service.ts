/**
 * Geometry Service
 *
 * Narrow capability set the pipeline needs from a geometry library:
 * simplify, intersect, union, point containment, plus polygonal extraction
 * and straight-line distance. The Turf implementation is the default; the
 * pipeline depends only on the interface.
 *
 * EMPTY POLYGON:
 * `{ type: 'MultiPolygon', coordinates: [] }`. Intersections that produce no
 * area return it instead of null or a point/line artifact.
 */

import * as turf from '@turf/turf';
import type { Feature, Geometry, MultiPolygon, Position } from 'geojson';
import type { BBox, PolygonalGeometry } from '../core/types.js';

export interface LatLon {
  readonly lat: number;
  readonly lon: number;
}

export interface GeometryService {
  simplify(geometry: PolygonalGeometry, tolerance: number): PolygonalGeometry;
  intersect(a: PolygonalGeometry, b: PolygonalGeometry): PolygonalGeometry;
  union(a: PolygonalGeometry, b: PolygonalGeometry): PolygonalGeometry;
  contains(geometry: PolygonalGeometry, point: LatLon): boolean;
  bbox(geometry: PolygonalGeometry): BBox;
  /** Square kilometres */
  area(geometry: PolygonalGeometry): number;
  /** Great-circle distance in kilometres */
  distanceKm(a: LatLon, b: LatLon): number;
}

/**
 * Fresh empty polygon value
 */
export function emptyPolygon(): MultiPolygon {
  return { type: 'MultiPolygon', coordinates: [] };
}

export function isEmptyPolygon(geometry: PolygonalGeometry): boolean {
  if (geometry.type === 'Polygon') {
    return geometry.coordinates.length === 0 || geometry.coordinates[0].length === 0;
  }
  return geometry.coordinates.every((polygon) => polygon.length === 0 || polygon[0].length === 0);
}

/**
 * Keep only the areal part of an arbitrary geometry.
 *
 * GeometryCollections (mixed points, lines, polygons) are reduced to their
 * polygon members; geometries without area become the empty polygon.
 */
export function extractPolygonal(geometry: Geometry | null | undefined): PolygonalGeometry {
  if (!geometry) {
    return emptyPolygon();
  }

  switch (geometry.type) {
    case 'Polygon':
      return geometry.coordinates.length > 0 ? geometry : emptyPolygon();
    case 'MultiPolygon': {
      const members = geometry.coordinates.filter((polygon) => polygon.length > 0);
      if (members.length === 0) return emptyPolygon();
      if (members.length === 1) return { type: 'Polygon', coordinates: members[0] };
      return { type: 'MultiPolygon', coordinates: members };
    }
    case 'GeometryCollection': {
      const parts: Position[][][] = [];
      for (const member of geometry.geometries) {
        const polygonal = extractPolygonal(member);
        parts.push(...polygonParts(polygonal));
      }
      if (parts.length === 0) return emptyPolygon();
      if (parts.length === 1) return { type: 'Polygon', coordinates: parts[0] };
      return { type: 'MultiPolygon', coordinates: parts };
    }
    default:
      return emptyPolygon();
  }
}

/**
 * Polygon members of a polygonal geometry
 */
export function polygonParts(geometry: PolygonalGeometry): Position[][][] {
  if (isEmptyPolygon(geometry)) {
    return [];
  }
  return geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
}

export function isPointInBBox(point: LatLon, box: BBox): boolean {
  const [minLon, minLat, maxLon, maxLat] = box;
  return point.lon >= minLon && point.lon <= maxLon && point.lat >= minLat && point.lat <= maxLat;
}

// ============================================================================
// Turf implementation
// ============================================================================

export class TurfGeometryService implements GeometryService {
  simplify(geometry: PolygonalGeometry, tolerance: number): PolygonalGeometry {
    if (tolerance <= 0 || isEmptyPolygon(geometry)) {
      return geometry;
    }
    return turf.simplify(geometry, { tolerance, highQuality: false, mutate: false });
  }

  intersect(a: PolygonalGeometry, b: PolygonalGeometry): PolygonalGeometry {
    if (isEmptyPolygon(a) || isEmptyPolygon(b)) {
      return emptyPolygon();
    }
    const result = turf.intersect(turf.featureCollection([toFeature(a), toFeature(b)]));
    return extractPolygonal(result?.geometry);
  }

  union(a: PolygonalGeometry, b: PolygonalGeometry): PolygonalGeometry {
    if (isEmptyPolygon(a)) return b;
    if (isEmptyPolygon(b)) return a;
    const result = turf.union(turf.featureCollection([toFeature(a), toFeature(b)]));
    return extractPolygonal(result?.geometry);
  }

  contains(geometry: PolygonalGeometry, point: LatLon): boolean {
    if (isEmptyPolygon(geometry)) {
      return false;
    }
    return turf.booleanPointInPolygon([point.lon, point.lat], geometry);
  }

  bbox(geometry: PolygonalGeometry): BBox {
    const [minLon, minLat, maxLon, maxLat] = turf.bbox(geometry);
    return [minLon, minLat, maxLon, maxLat];
  }

  area(geometry: PolygonalGeometry): number {
    if (isEmptyPolygon(geometry)) {
      return 0;
    }
    return turf.area(geometry) / 1_000_000;
  }

  distanceKm(a: LatLon, b: LatLon): number {
    return turf.distance([a.lon, a.lat], [b.lon, b.lat], { units: 'kilometers' });
  }
}

function toFeature(geometry: PolygonalGeometry): Feature<PolygonalGeometry> {
  return turf.feature(geometry);
}

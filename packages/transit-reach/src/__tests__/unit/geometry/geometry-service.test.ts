/**
 * TurfGeometryService Unit Tests
 *
 * Planar operations the pipeline relies on, including the empty-polygon
 * conventions for disjoint intersections and non-areal input.
 */

import { describe, it, expect } from 'vitest';
import type { GeometryCollection, LineString } from 'geojson';
import {
  emptyPolygon,
  extractPolygonal,
  isEmptyPolygon,
  isPointInBBox,
  polygonParts,
  TurfGeometryService,
} from '../../../geometry/geometry-service.js';
import { square } from '../../fixtures/routing.js';

const geometry = new TurfGeometryService();

describe('TurfGeometryService', () => {
  it('tests point containment', () => {
    const area = square(0, 0, 1);
    expect(geometry.contains(area, { lat: 0.5, lon: 0.5 })).toBe(true);
    expect(geometry.contains(area, { lat: 2, lon: 0 })).toBe(false);
    expect(geometry.contains(emptyPolygon(), { lat: 0, lon: 0 })).toBe(false);
  });

  it('intersects overlapping polygons', () => {
    const result = geometry.intersect(square(0, 0, 1), square(1, 0, 1));
    const [minLon, minLat, maxLon, maxLat] = geometry.bbox(result);

    expect(isEmptyPolygon(result)).toBe(false);
    expect(minLon).toBeCloseTo(0, 6);
    expect(minLat).toBeCloseTo(-1, 6);
    expect(maxLon).toBeCloseTo(1, 6);
    expect(maxLat).toBeCloseTo(1, 6);
  });

  it('returns the empty polygon for disjoint intersections', () => {
    const result = geometry.intersect(square(0, 0, 1), square(10, 10, 1));
    expect(isEmptyPolygon(result)).toBe(true);
    expect(geometry.area(result)).toBe(0);
  });

  it('keeps both members of a disjoint union', () => {
    const result = geometry.union(square(0, 0, 1), square(10, 10, 1));
    expect(result.type).toBe('MultiPolygon');
    expect(polygonParts(result)).toHaveLength(2);
  });

  it('treats the empty polygon as the union identity', () => {
    const area = square(0, 0, 1);
    expect(geometry.union(emptyPolygon(), area)).toBe(area);
    expect(geometry.union(area, emptyPolygon())).toBe(area);
  });

  it('measures area in square kilometres', () => {
    expect(geometry.area(square(0, 0, 0.5))).toBeCloseTo(12364, -2);
  });

  it('measures great-circle distance in kilometres', () => {
    expect(geometry.distanceKm({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo(111.19, 1);
  });

  it('skips simplification at zero tolerance', () => {
    const area = square(0, 0, 1);
    expect(geometry.simplify(area, 0)).toBe(area);
  });
});

describe('extractPolygonal', () => {
  it('keeps the polygon members of a geometry collection', () => {
    const collection: GeometryCollection = {
      type: 'GeometryCollection',
      geometries: [{ type: 'Point', coordinates: [0, 0] }, square(0, 0, 1)],
    };
    expect(extractPolygonal(collection)).toEqual(square(0, 0, 1));
  });

  it('turns non-areal geometry into the empty polygon', () => {
    const line: LineString = { type: 'LineString', coordinates: [[0, 0], [1, 1]] };
    expect(extractPolygonal(line)).toEqual(emptyPolygon());
    expect(extractPolygonal(null)).toEqual(emptyPolygon());
  });

  it('unwraps a single-member MultiPolygon', () => {
    const area = square(0, 0, 1);
    expect(extractPolygonal({ type: 'MultiPolygon', coordinates: [area.coordinates] })).toEqual(area);
  });
});

describe('isPointInBBox', () => {
  it('includes the box edges', () => {
    expect(isPointInBBox({ lat: 1, lon: 1 }, [-1, -1, 1, 1])).toBe(true);
    expect(isPointInBBox({ lat: 1.01, lon: 0 }, [-1, -1, 1, 1])).toBe(false);
  });
});

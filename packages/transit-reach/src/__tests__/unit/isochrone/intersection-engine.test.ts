/**
 * IntersectionEngine Unit Tests
 *
 * Running intersection and union, degenerate steps, and order independence
 * of the final area.
 */

import { describe, it, expect } from 'vitest';
import * as turf from '@turf/turf';
import type { Polygon } from 'geojson';
import { extractPolygonal, TurfGeometryService } from '../../../geometry/geometry-service.js';
import { IntersectionEngine } from '../../../isochrone/intersection-engine.js';
import type { PolygonSet } from '../../../isochrone/polygon-set.js';
import { point, QUERY_TIME, square } from '../../fixtures/routing.js';

const geometry = new TurfGeometryService();

function setOf(id: string, polygon: Polygon): PolygonSet {
  return {
    origin: point(id, 0, 0),
    queryTime: QUERY_TIME,
    polygons: [{ originId: id, cutoffSeconds: 3600, cutoffMinutes: 60, geometry: polygon }],
    requestedCutoffsMinutes: [60],
    missingCutoffsMinutes: [],
    simplifyTolerance: 0,
  };
}

describe('IntersectionEngine', () => {
  it('is empty before anything is accumulated', () => {
    const engine = new IntersectionEngine(geometry);
    expect(engine.isEmpty()).toBe(true);
    expect(engine.contributors).toEqual([]);
  });

  it('seeds both accumulators with the first set', () => {
    const engine = new IntersectionEngine(geometry);
    const area = square(0, 0, 1);
    engine.accumulate(setOf('A', area));

    expect(engine.result()).toBe(area);
    expect(engine.union()).toBe(area);
    expect(engine.degenerateSteps).toBe(0);
  });

  it('keeps the common area and the combined area', () => {
    const engine = new IntersectionEngine(geometry);
    engine.accumulate(setOf('A', square(0, 0, 1)));
    engine.accumulate(setOf('B', square(1, 0, 1)));

    const [iMinLon, iMinLat, iMaxLon, iMaxLat] = geometry.bbox(engine.result());
    const [uMinLon, , uMaxLon] = geometry.bbox(engine.union());

    expect(iMinLon).toBeCloseTo(0, 6);
    expect(iMinLat).toBeCloseTo(-1, 6);
    expect(iMaxLon).toBeCloseTo(1, 6);
    expect(iMaxLat).toBeCloseTo(1, 6);
    expect(uMinLon).toBeCloseTo(-1, 6);
    expect(uMaxLon).toBeCloseTo(2, 6);
    expect(engine.contributors).toEqual(['A', 'B']);
  });

  it('counts the step that empties the intersection once', () => {
    const engine = new IntersectionEngine(geometry);
    engine.accumulate(setOf('A', square(0, 0, 1)));
    engine.accumulate(setOf('B', square(10, 10, 1)));
    engine.accumulate(setOf('C', square(0, 0, 1)));

    expect(engine.isEmpty()).toBe(true);
    expect(engine.degenerateSteps).toBe(1);
    expect(engine.history.map((step) => step.degenerate)).toEqual([false, true, false]);
    expect(engine.history[2].areaKm2).toBe(0);
  });

  it('gives the same area whatever the accumulation order', () => {
    const sets = [
      setOf('A', square(0, 0, 1)),
      setOf('B', square(0.5, 0, 1)),
      setOf('C', square(0, 0.5, 1)),
    ];
    const forward = new IntersectionEngine(geometry);
    const backward = new IntersectionEngine(geometry);
    sets.forEach((set) => forward.accumulate(set));
    [...sets].reverse().forEach((set) => backward.accumulate(set));

    const forwardArea = geometry.area(forward.result());
    expect(forwardArea).toBeGreaterThan(0);
    expect(geometry.area(backward.result())).toBeCloseTo(forwardArea, 3);
    expect(geometry.area(backward.union())).toBeCloseTo(geometry.area(forward.union()), 3);
  });

  it('matches a single intersection of all sets at once', () => {
    const polygons = [square(0, 0, 1), square(0.5, 0, 1), square(0, 0.5, 1)];
    const engine = new IntersectionEngine(geometry);
    polygons.forEach((polygon, index) => engine.accumulate(setOf(`O${index + 1}`, polygon)));

    const direct = extractPolygonal(
      turf.intersect(turf.featureCollection(polygons.map((polygon) => turf.feature(polygon))))?.geometry
    );
    const [minLon, minLat, maxLon, maxLat] = geometry.bbox(engine.result());

    expect(geometry.area(engine.result())).toBeCloseTo(geometry.area(direct), 3);
    expect(minLon).toBeCloseTo(-0.5, 6);
    expect(minLat).toBeCloseTo(-0.5, 6);
    expect(maxLon).toBeCloseTo(1, 6);
    expect(maxLat).toBeCloseTo(1, 6);
  });
});

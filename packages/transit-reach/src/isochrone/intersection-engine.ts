/**
 * Intersection Engine
 *
 * Running intersection (common reachability) and running union (everything
 * reached by any origin) over polygon sets, one set at a time. Neither
 * accumulator is ever rebuilt from the full history.
 *
 * The first accumulated set seeds both accumulators. An intersection step
 * that leaves no area yields the empty polygon; it stays empty from then on
 * and the step is counted in `degenerateSteps`.
 */

import type { PolygonalGeometry } from '../core/types.js';
import { emptyPolygon, isEmptyPolygon, type GeometryService } from '../geometry/geometry-service.js';
import { footprint, type PolygonSet } from './polygon-set.js';

export interface IntersectionStep {
  readonly originId: string;
  /** Intersection area after this step, km² */
  readonly areaKm2: number;
  readonly degenerate: boolean;
}

export class IntersectionEngine {
  private intersection: PolygonalGeometry | null = null;
  private running: PolygonalGeometry | null = null;
  private readonly steps: IntersectionStep[] = [];

  constructor(private readonly geometry: GeometryService) {}

  accumulate(set: PolygonSet): void {
    const polygon = footprint(set, this.geometry);

    if (this.intersection === null || this.running === null) {
      this.intersection = polygon;
      this.running = polygon;
      this.recordStep(set.origin.id, polygon, isEmptyPolygon(polygon));
      return;
    }

    this.running = this.geometry.union(this.running, polygon);

    const wasEmpty = isEmptyPolygon(this.intersection);
    this.intersection = wasEmpty ? emptyPolygon() : this.geometry.intersect(this.intersection, polygon);
    this.recordStep(set.origin.id, this.intersection, !wasEmpty && isEmptyPolygon(this.intersection));
  }

  /**
   * Current intersection; the empty polygon before any set was accumulated
   * or when the origins share no reachable area
   */
  result(): PolygonalGeometry {
    return this.intersection ?? emptyPolygon();
  }

  /**
   * Union of every accumulated polygon
   */
  union(): PolygonalGeometry {
    return this.running ?? emptyPolygon();
  }

  isEmpty(): boolean {
    return isEmptyPolygon(this.result());
  }

  get contributors(): string[] {
    return this.steps.map((step) => step.originId);
  }

  /**
   * Steps that turned a non-empty intersection into the empty polygon
   */
  get degenerateSteps(): number {
    return this.steps.filter((step) => step.degenerate).length;
  }

  get history(): readonly IntersectionStep[] {
    return this.steps;
  }

  private recordStep(originId: string, polygon: PolygonalGeometry, degenerate: boolean): void {
    this.steps.push({ originId, areaKm2: this.geometry.area(polygon), degenerate });
  }
}

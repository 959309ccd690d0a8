/**
 * Command registration
 */

import type { Command } from 'commander';
import { registerChoroplethCommand } from './choropleth.js';
import { registerIsochroneIntersectCommand } from './isochrone-intersect.js';
import { registerIsochroneMultiCommand } from './isochrone-multi.js';
import { registerPointToPointCommand } from './point-to-point.js';
import { registerPointToPointNearestCommand } from './point-to-point-nearest.js';
import { registerPointToPointTimeCommand } from './point-to-point-time.js';

export function registerCommands(program: Command, signal: AbortSignal): void {
  registerIsochroneMultiCommand(program, signal);
  registerIsochroneIntersectCommand(program, signal);
  registerPointToPointCommand(program, signal);
  registerPointToPointNearestCommand(program, signal);
  registerPointToPointTimeCommand(program, signal);
  registerChoroplethCommand(program, signal);
}

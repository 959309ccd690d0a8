/**
 * Point-to-Point Command
 *
 * Trip table between origins and destinations.
 *
 * Usage:
 *   transit-reach point-to-point --origins origins.csv --destinations destinations.csv \
 *     --start "2018-08-13 09:00" [--loop both|origins|destinations] [--return] [--dist-max 20]
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { ConfigurationError } from '../../core/errors.js';
import { parseQueryTime } from '../../core/query-time.js';
import { loadPoints } from '../../io/points.js';
import { CsvTripCheckpointSink, fileStamp, writeTripCsv } from '../../io/outputs.js';
import { isLoopType, LOOP_TYPES, PointToPointLoop } from '../../trips/point-to-point-loop.js';
import {
  addTravelOptions,
  batchExitCode,
  createContext,
  parseInteger,
  parseNumber,
  readGlobalOptions,
  runCommand,
  type TravelOptions,
} from '../context.js';

interface PointToPointCommandOptions extends TravelOptions {
  readonly origins: string;
  readonly destinations: string;
  readonly start: string;
  readonly loop: string;
  readonly originRow: number;
  readonly destinationRow: number;
  readonly return?: boolean;
  readonly distMax?: number;
}

export function registerPointToPointCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('point-to-point')
      .description('Journey details between origins and destinations')
      .requiredOption('--origins <csv>', 'Origin points CSV')
      .requiredOption('--destinations <csv>', 'Destination points CSV')
      .requiredOption('--start <datetime>', 'Query time, YYYY-MM-DD HH:MM')
      .option('--loop <type>', `Loop type: ${LOOP_TYPES.join('|')}`, 'both')
      .option('--origin-row <n>', 'Origin row (1-based) for the destinations loop', parseInteger, 1)
      .option('--destination-row <n>', 'Destination row (1-based) for the origins loop', parseInteger, 1)
      .option('--return', 'Also plan the return journey')
      .option('--dist-max <km>', 'Skip pairs farther apart than this straight-line distance', parseNumber)
  ).action(async (options: PointToPointCommandOptions, command: Command) => {
    await runCommand(async () => {
      if (!isLoopType(options.loop)) {
        throw new ConfigurationError(`Parameter type for loop unknown: ${options.loop}`, 'loop');
      }
      const context = createContext(readGlobalOptions(command), options, signal);
      const { config } = context;
      const queryTime = parseQueryTime(options.start);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });
      const destinations = await loadPoints(options.destinations, {
        geocoder: context.geocoder,
        label: 'destinations',
      });

      const path = join(config.outputDir, `pointToPointLoop-${fileStamp()}.csv`);
      const loop = new PointToPointLoop({ routing: context.routing, geometry: context.geometry });
      const result = await loop.run({
        origins,
        destinations,
        loop: options.loop,
        originRow: options.originRow,
        destinationRow: options.destinationRow,
        returnJourneys: options.return ?? false,
        queryTime,
        travelParams: config.travel,
        distMaxKm: options.distMax,
        checkpointEvery: config.checkpointEvery,
        checkpoint: new CsvTripCheckpointSink(path, config.travel.modes),
        timeoutMs: config.timeoutMs,
        signal,
      });

      console.log(`Analysis complete, now saving outputs to ${config.outputDir}`);
      await writeTripCsv(path, result.rows, config.travel.modes);
      if (result.failures.size > 0) {
        console.log(result.report.message);
      }

      return batchExitCode(result.summary.cancelled, result.failures.size);
    });
  });
}

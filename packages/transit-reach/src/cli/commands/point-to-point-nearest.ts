/**
 * Point-to-Point Nearest Command
 *
 * Usage:
 *   transit-reach point-to-point-nearest --origins origins.csv --destinations destinations.csv \
 *     --start "2018-08-13 09:00" [--nearest-num 3] [--return]
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { parseQueryTime } from '../../core/query-time.js';
import { loadPoints } from '../../io/points.js';
import { CsvTripCheckpointSink, fileStamp, writeTripCsv } from '../../io/outputs.js';
import { PointToPointNearest } from '../../trips/point-to-point-nearest.js';
import {
  addTravelOptions,
  batchExitCode,
  createContext,
  parseInteger,
  readGlobalOptions,
  runCommand,
  type TravelOptions,
} from '../context.js';

interface PointToPointNearestCommandOptions extends TravelOptions {
  readonly origins: string;
  readonly destinations: string;
  readonly start: string;
  readonly nearestNum: number;
  readonly return?: boolean;
}

export function registerPointToPointNearestCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('point-to-point-nearest')
      .description('Journey details from each origin to its nearest destinations')
      .requiredOption('--origins <csv>', 'Origin points CSV')
      .requiredOption('--destinations <csv>', 'Destination points CSV')
      .requiredOption('--start <datetime>', 'Query time, YYYY-MM-DD HH:MM')
      .option('--nearest-num <n>', 'Nearest destinations per origin', parseInteger, 1)
      .option('--return', 'Also plan the return journeys')
  ).action(async (options: PointToPointNearestCommandOptions, command: Command) => {
    await runCommand(async () => {
      const context = createContext(readGlobalOptions(command), options, signal);
      const { config } = context;
      const queryTime = parseQueryTime(options.start);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });
      const destinations = await loadPoints(options.destinations, {
        geocoder: context.geocoder,
        label: 'destinations',
      });

      const path = join(config.outputDir, `pointToPointNearest-${fileStamp()}.csv`);
      const tool = new PointToPointNearest({ routing: context.routing, geometry: context.geometry });
      const result = await tool.run({
        origins,
        destinations,
        nearestNum: options.nearestNum,
        returnJourneys: options.return ?? false,
        queryTime,
        travelParams: config.travel,
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

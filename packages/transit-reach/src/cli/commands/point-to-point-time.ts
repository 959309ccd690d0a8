/**
 * Point-to-Point Time Command
 *
 * One origin and one destination over a time series.
 *
 * Usage:
 *   transit-reach point-to-point-time --origins origins.csv --destinations destinations.csv \
 *     --start "2018-08-13 07:00" --end "2018-08-13 10:00" [--increment 30] [--origin-row 2]
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { loadPoints } from '../../io/points.js';
import { CsvTimedTripCheckpointSink, fileStamp, writeTripTimeCsv } from '../../io/outputs.js';
import { PointToPointTime } from '../../trips/point-to-point-time.js';
import {
  addTravelOptions,
  batchExitCode,
  createContext,
  parseInteger,
  parseNumber,
  readGlobalOptions,
  resolveQueryTimes,
  runCommand,
  type TravelOptions,
} from '../context.js';

interface PointToPointTimeCommandOptions extends TravelOptions {
  readonly origins: string;
  readonly destinations: string;
  readonly start: string;
  readonly end: string;
  readonly increment: number;
  readonly originRow: number;
  readonly destinationRow: number;
}

export function registerPointToPointTimeCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('point-to-point-time')
      .description('Journey details between one origin and one destination over a time series')
      .requiredOption('--origins <csv>', 'Origin points CSV')
      .requiredOption('--destinations <csv>', 'Destination points CSV')
      .requiredOption('--start <datetime>', 'First query time, YYYY-MM-DD HH:MM')
      .requiredOption('--end <datetime>', 'Last query time, YYYY-MM-DD HH:MM')
      .option('--increment <mins>', 'Minutes between series samples', parseNumber, 60)
      .option('--origin-row <n>', 'Origin row (1-based)', parseInteger, 1)
      .option('--destination-row <n>', 'Destination row (1-based)', parseInteger, 1)
  ).action(async (options: PointToPointTimeCommandOptions, command: Command) => {
    await runCommand(async () => {
      const context = createContext(readGlobalOptions(command), options, signal);
      const { config } = context;
      const queryTimes = resolveQueryTimes(options.start, options.end, options.increment);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });
      const destinations = await loadPoints(options.destinations, {
        geocoder: context.geocoder,
        label: 'destinations',
      });

      const path = join(config.outputDir, `pointToPointTime-${fileStamp()}.csv`);
      const tool = new PointToPointTime({ routing: context.routing });
      const result = await tool.run({
        origins,
        destinations,
        originRow: options.originRow,
        destinationRow: options.destinationRow,
        queryTimes,
        travelParams: config.travel,
        checkpointEvery: config.checkpointEvery,
        checkpoint: new CsvTimedTripCheckpointSink(path, config.travel.modes),
        timeoutMs: config.timeoutMs,
        signal,
      });

      console.log(`Analysis complete, now saving outputs to ${config.outputDir}`);
      await writeTripTimeCsv(path, result.rows, config.travel.modes);
      if (result.failures.size > 0) {
        console.log(result.report.message);
      }

      return batchExitCode(result.summary.cancelled, result.failures.size);
    });
  });
}

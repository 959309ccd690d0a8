/**
 * Isochrone Multi Command
 *
 * Reachability matrix from many origins to many destinations.
 *
 * Usage:
 *   transit-reach isochrone-multi --origins origins.csv --destinations destinations.csv \
 *     --start "2018-08-18 12:00" [--end "2018-08-18 15:00" --increment 60] [--cutoffs 30,60,90]
 *
 * Writes `isochrone_multi-<stamp>.csv` (matrix), `isochrone_multi-<stamp>-failed.csv`,
 * `isochrone_multi-<stamp>.geojson` (cutoff polygons) and a JSON checkpoint
 * while running.
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { formatQueryTime } from '../../core/query-time.js';
import { loadPoints } from '../../io/points.js';
import {
  cutoffPolygonsToGeoJSON,
  fileStamp,
  writeFailuresCsv,
  writeGeoJSON,
  writeMatrixCsv,
} from '../../io/outputs.js';
import { FileCheckpointSink, MultiOriginAggregator } from '../../isochrone/multi-origin-aggregator.js';
import {
  addTravelOptions,
  batchExitCode,
  createContext,
  parseNumber,
  parseNumberList,
  readGlobalOptions,
  resolveQueryTimes,
  runCommand,
  type TravelOptions,
} from '../context.js';

interface IsochroneMultiOptions extends TravelOptions {
  readonly origins: string;
  readonly destinations: string;
  readonly start: string;
  readonly end?: string;
  readonly increment: number;
  readonly cutoffs?: number[];
}

export function registerIsochroneMultiCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('isochrone-multi')
      .description('Minimum travel time from every origin to every destination')
      .requiredOption('--origins <csv>', 'Origin points CSV')
      .requiredOption('--destinations <csv>', 'Destination points CSV')
      .requiredOption('--start <datetime>', 'Query time, YYYY-MM-DD HH:MM')
      .option('--end <datetime>', 'Last query time of a series')
      .option('--increment <mins>', 'Minutes between series samples', parseNumber, 60)
      .option('--cutoffs <mins>', 'Comma-separated cutoffs in minutes', parseNumberList)
  ).action(async (options: IsochroneMultiOptions, command: Command) => {
    await runCommand(async () => {
      const context = createContext(readGlobalOptions(command), options, signal, {
        cutoffs: options.cutoffs,
      });
      const { config } = context;

      const queryTimes = resolveQueryTimes(options.start, options.end, options.increment);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });
      const destinations = await loadPoints(options.destinations, {
        geocoder: context.geocoder,
        label: 'destinations',
      });

      const stamp = fileStamp();
      const base = join(config.outputDir, `isochrone_multi-${stamp}`);

      console.log(
        `Creating ${origins.length * queryTimes.length} isochrones from ${formatQueryTime(queryTimes[0])}`
      );

      const aggregator = new MultiOriginAggregator({
        routing: context.routing,
        geometry: context.geometry,
        simplifyTolerance: config.simplifyTolerance,
      });
      const result = await aggregator.run({
        origins,
        destinations,
        queryTimes,
        cutoffsMinutes: config.cutoffs,
        travelParams: config.travel,
        checkpointEvery: config.checkpointEvery,
        checkpoint: new FileCheckpointSink(`${base}-checkpoint.json`),
        keepPolygons: true,
        timeoutMs: config.timeoutMs,
        signal,
      });

      console.log(`Analysis complete, now saving outputs to ${config.outputDir}`);
      await writeMatrixCsv(`${base}.csv`, result.matrix);
      await writeGeoJSON(`${base}.geojson`, cutoffPolygonsToGeoJSON(result.polygons));
      if (result.failures.size > 0) {
        await writeFailuresCsv(`${base}-failed.csv`, result.failures.list());
        console.log(result.report.message);
      }

      return batchExitCode(result.summary.cancelled, result.failures.size);
    });
  });
}

/**
 * Isochrone Intersect Command
 *
 * Area reachable from every origin within one cutoff. Origins may override
 * mode, max_duration, date and time per row. With `--end` the same cutoff and
 * settings are intersected once per query time instead.
 *
 * Usage:
 *   transit-reach isochrone-intersect --origins origins.csv --start "2018-08-18 12:00" --cutoff 60
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import { formatQueryTime } from '../../core/query-time.js';
import { loadPoints } from '../../io/points.js';
import { fileStamp, geometryToGeoJSON, writeFailuresCsv, writeGeoJSON } from '../../io/outputs.js';
import { MultiIntersect, type IntersectionRunResult } from '../../isochrone/multi-intersect.js';
import {
  addTravelOptions,
  batchExitCode,
  createContext,
  EXIT_CODES,
  parseNumber,
  readGlobalOptions,
  resolveQueryTimes,
  runCommand,
  type TravelOptions,
} from '../context.js';

interface IsochroneIntersectOptions extends TravelOptions {
  readonly origins: string;
  readonly start: string;
  readonly end?: string;
  readonly increment: number;
  readonly cutoff: number;
}

export function registerIsochroneIntersectCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('isochrone-intersect')
      .description('Common reachable area across all origins')
      .requiredOption('--origins <csv>', 'Origin points CSV')
      .requiredOption('--start <datetime>', 'Query time, YYYY-MM-DD HH:MM')
      .option('--end <datetime>', 'Last query time; one intersection per sample')
      .option('--increment <mins>', 'Minutes between series samples', parseNumber, 60)
      .option('--cutoff <mins>', 'Cutoff in minutes for origins without max_duration', parseNumber, 60)
  ).action(async (options: IsochroneIntersectOptions, command: Command) => {
    await runCommand(async () => {
      const context = createContext(readGlobalOptions(command), options, signal);
      const { config } = context;
      const queryTimes = resolveQueryTimes(options.start, options.end, options.increment);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });

      const engine = new MultiIntersect({
        routing: context.routing,
        geometry: context.geometry,
        simplifyTolerance: config.simplifyTolerance,
      });
      const base = join(config.outputDir, `isochrone_multi_intersect-${fileStamp()}`);

      const runs: { label: string; result: IntersectionRunResult }[] = [];
      if (options.end === undefined) {
        const result = await engine.run({
          origins,
          queryTime: queryTimes[0],
          cutoffMinutes: options.cutoff,
          travelParams: config.travel,
          timeoutMs: config.timeoutMs,
          signal,
        });
        runs.push({ label: '', result });
      } else {
        const series = await engine.runTimeSeries({
          origins,
          queryTimes,
          cutoffMinutes: options.cutoff,
          travelParams: config.travel,
          timeoutMs: config.timeoutMs,
          signal,
        });
        for (const { queryTime, result } of series) {
          runs.push({ label: `-${formatQueryTime(queryTime).replace(/[ :]/g, '_')}`, result });
        }
      }

      console.log(`Analysis complete, now saving outputs to ${config.outputDir}`);
      let failures = 0;
      let cancelled = false;
      for (const { label, result } of runs) {
        const properties = { origins: result.contributors.join(','), empty: result.isEmpty };
        await writeGeoJSON(`${base}${label}.geojson`, geometryToGeoJSON(result.intersection, properties));
        await writeGeoJSON(`${base}${label}-all.geojson`, geometryToGeoJSON(result.union, properties));
        if (result.failures.size > 0) {
          await writeFailuresCsv(`${base}${label}-failed.csv`, result.failures.list());
          console.log(result.report.message);
        }
        if (result.isEmpty) {
          console.log(`No common reachable area${label ? ` for ${label.slice(1)}` : ''}`);
        }
        failures += result.failures.size;
        cancelled = cancelled || result.summary.cancelled;
      }

      if (runs.length < queryTimes.length) {
        return EXIT_CODES.USER_CANCELLED;
      }
      return batchExitCode(cancelled, failures);
    });
  });
}

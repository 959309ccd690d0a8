/**
 * Choropleth Command
 *
 * Trips from every origin to one destination, categorised by duration,
 * waiting time and transfers, joined onto origin polygons by name.
 *
 * Usage:
 *   transit-reach choropleth --origins centroids.csv --polygons areas.geojson \
 *     --destinations destinations.csv --start "2018-08-18 12:00"
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Command } from 'commander';
import type { FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import { Choropleth, joinChoropleth } from '../../choropleth/choropleth.js';
import { ConfigurationError } from '../../core/errors.js';
import { parseQueryTime } from '../../core/query-time.js';
import { loadPoints } from '../../io/points.js';
import { fileStamp, writeChoroplethCsv, writeGeoJSON } from '../../io/outputs.js';
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

interface ChoroplethCommandOptions extends TravelOptions {
  readonly origins: string;
  readonly polygons?: string;
  readonly nameProperty: string;
  readonly destinations: string;
  readonly destinationRow: number;
  readonly start: string;
  readonly durationCutoff: number;
  readonly waitingCutoff: number;
  readonly transferCutoff: number;
}

export function registerChoroplethCommand(program: Command, signal: AbortSignal): void {
  addTravelOptions(
    program
      .command('choropleth')
      .description('Trip measures from every origin to one destination, by origin area')
      .requiredOption('--origins <csv>', 'Origin points CSV (area centroids)')
      .option('--polygons <geojson>', 'Origin polygons to join the results onto')
      .option('--name-property <key>', 'Polygon property matching origin names', 'name')
      .requiredOption('--destinations <csv>', 'Destination points CSV')
      .option('--destination-row <n>', 'Destination row (1-based)', parseInteger, 1)
      .requiredOption('--start <datetime>', 'Query time, YYYY-MM-DD HH:MM')
      .option('--duration-cutoff <mins>', 'Duration category cutoff', parseNumber, 60)
      .option('--waiting-cutoff <mins>', 'Waiting time category cutoff', parseNumber, 10)
      .option('--transfer-cutoff <n>', 'Transfers category cutoff', parseNumber, 1)
  ).action(async (options: ChoroplethCommandOptions, command: Command) => {
    await runCommand(async () => {
      const context = createContext(readGlobalOptions(command), options, signal);
      const { config } = context;
      const queryTime = parseQueryTime(options.start);
      const origins = await loadPoints(options.origins, { geocoder: context.geocoder, label: 'origins' });
      const destinations = await loadPoints(options.destinations, {
        geocoder: context.geocoder,
        label: 'destinations',
      });
      const polygons = options.polygons ? await readPolygons(options.polygons) : null;

      const choropleth = new Choropleth({ routing: context.routing });
      const result = await choropleth.run({
        origins,
        destinations,
        destinationRow: options.destinationRow,
        queryTime,
        travelParams: config.travel,
        cutoffs: {
          duration: options.durationCutoff,
          waitingTime: options.waitingCutoff,
          transfers: options.transferCutoff,
        },
        timeoutMs: config.timeoutMs,
        signal,
      });

      console.log(`Analysis complete, now saving outputs to ${config.outputDir}`);
      const base = join(config.outputDir, `choropleth-${fileStamp()}`);
      await writeChoroplethCsv(`${base}.csv`, result.rows);
      if (polygons) {
        await writeGeoJSON(`${base}.geojson`, joinChoropleth(polygons, result.rows, options.nameProperty));
      }
      if (result.failures.size > 0) {
        console.log(result.report.message);
      }

      return batchExitCode(result.summary.cancelled, result.failures.size);
    });
  });
}

async function readPolygons(path: string): Promise<FeatureCollection<Geometry | null, GeoJsonProperties>> {
  const body: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (!isFeatureCollection(body)) {
    throw new ConfigurationError(`${path} is not a GeoJSON FeatureCollection`, 'polygons');
  }
  return body;
}

function isFeatureCollection(
  value: unknown
): value is FeatureCollection<Geometry | null, GeoJsonProperties> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'FeatureCollection' &&
    'features' in value &&
    Array.isArray(value.features)
  );
}

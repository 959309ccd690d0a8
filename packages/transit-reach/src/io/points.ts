/**
 * Point loading from CSV.
 *
 * Headers are case-insensitive. A `name` column is required, plus either
 * `lat` and `lon` or a `postcode` column (geocoded; unknown postcodes are
 * dropped with a warning). Every other column is kept as a string attribute.
 * Points come back sorted by name.
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../core/errors.js';
import type { Point } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { parseCsv } from './csv.js';
import type { Geocoder } from './geocoder.js';

const log = createLogger({ module: 'points' });

const RESERVED_COLUMNS = new Set(['name', 'lat', 'lon']);

export interface LoadPointsOptions {
  /** Needed only when the file has no coordinates */
  readonly geocoder?: Geocoder;
  /** Used in error messages, e.g. "origin" */
  readonly label?: string;
}

export async function loadPoints(path: string, options: LoadPointsOptions = {}): Promise<Point[]> {
  const content = await readFile(path, 'utf-8');
  return parsePoints(content, { label: path, ...options });
}

/**
 * @throws ConfigurationError for missing columns, bad coordinates or duplicate names
 */
export async function parsePoints(content: string, options: LoadPointsOptions = {}): Promise<Point[]> {
  const label = options.label ?? 'points';
  const { headers, records } = parseCsv(content);

  if (!headers.includes('name')) {
    throw new ConfigurationError(`No 'name' column present in ${label}`, 'name');
  }

  const hasLat = headers.includes('lat');
  if (hasLat && !headers.includes('lon')) {
    throw new ConfigurationError(`No longitudinal 'lon' column present in ${label}`, 'lon');
  }
  if (!hasLat && !headers.includes('postcode')) {
    throw new ConfigurationError(
      `Neither a latitude 'lat' and longitude 'lon' column nor a 'postcode' column is present in ${label}`,
      'lat'
    );
  }
  if (!hasLat && options.geocoder === undefined) {
    throw new ConfigurationError(`${label} has postcodes only and no geocoder was provided`, 'postcode');
  }

  const points: Point[] = [];
  const seen = new Set<string>();

  for (const [index, record] of records.entries()) {
    const name = record.name ?? '';
    if (name.length === 0) {
      throw new ConfigurationError(`Row ${index + 1} of ${label} has no name`, 'name');
    }
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate point name "${name}" in ${label}`, 'name');
    }
    seen.add(name);

    const coordinates = hasLat
      ? readCoordinates(record, name, label)
      : await geocode(record.postcode ?? '', name, options.geocoder);
    if (coordinates === null) {
      continue;
    }

    const attributes: Record<string, string> = {};
    for (const header of headers) {
      if (!RESERVED_COLUMNS.has(header)) {
        attributes[header] = record[header] ?? '';
      }
    }

    points.push({ id: name, lat: coordinates.lat, lon: coordinates.lon, attributes });
  }

  return points.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

/**
 * 1-based row selection
 *
 * @throws ConfigurationError when the row is not in the point set
 */
export function selectRow(points: readonly Point[], row: number, field: string): Point {
  const point: Point | undefined = Number.isInteger(row) && row >= 1 ? points[row - 1] : undefined;
  if (point === undefined) {
    throw new ConfigurationError(`Row ${row} is not in the point set (${points.length} rows)`, field);
  }
  return point;
}

function readCoordinates(
  record: Readonly<Record<string, string>>,
  name: string,
  label: string
): { lat: number; lon: number } {
  const lat = Number(record.lat);
  const lon = Number(record.lon);
  const valid =
    record.lat !== '' &&
    record.lon !== '' &&
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    Math.abs(lat) <= 90 &&
    Math.abs(lon) <= 180;

  if (!valid) {
    throw new ConfigurationError(
      `Invalid coordinates for "${name}" in ${label}: lat=${record.lat ?? ''}, lon=${record.lon ?? ''}`,
      'lat'
    );
  }
  return { lat, lon };
}

async function geocode(
  postcode: string,
  name: string,
  geocoder: Geocoder | undefined
): Promise<{ lat: number; lon: number } | null> {
  const location = geocoder ? await geocoder.lookup(postcode) : null;
  if (location === null) {
    log.warn(`Postcode for ${name} cannot be converted to a latitude and longitude; location removed`, {
      postcode,
    });
    return null;
  }
  return { lat: location.lat, lon: location.lon };
}

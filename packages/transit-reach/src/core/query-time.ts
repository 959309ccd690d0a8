/**
 * Query time parsing and time-series generation.
 *
 * Values are wall-clock times at the routing engine's location; arithmetic is
 * done on a UTC calendar so that no local time zone or DST shift leaks in.
 */

import { ConfigurationError } from './errors.js';
import type { QueryTime } from './types.js';

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse `YYYY-MM-DD HH:MM[:SS]` into a QueryTime (seconds are dropped)
 *
 * @throws {ConfigurationError} when the value does not match or is out of range
 */
export function parseQueryTime(value: string): QueryTime {
  const match = DATE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(
      `Invalid date and time "${value}", expected YYYY-MM-DD HH:MM:SS`,
      'startDateAndTime'
    );
  }

  const [, year, month, day, hour, minute] = match;
  const epoch = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute));
  const normalized = fromEpoch(epoch);

  // Date.UTC rolls 2018-02-30 over to March; reject instead
  if (normalized.date !== `${year}-${month}-${day}` || Number(hour) > 23 || Number(minute) > 59) {
    throw new ConfigurationError(`Date and time out of range: "${value}"`, 'startDateAndTime');
  }

  return normalized;
}

/**
 * Every query time from `start` to `end` inclusive, stepping `incrementMinutes`
 *
 * @example
 * ```typescript
 * buildTimeSeries(parseQueryTime('2018-08-18 12:00'), parseQueryTime('2018-08-18 13:00'), 30);
 * // 12:00, 12:30, 13:00
 * ```
 */
export function buildTimeSeries(
  start: QueryTime,
  end: QueryTime,
  incrementMinutes: number
): QueryTime[] {
  if (!Number.isFinite(incrementMinutes) || incrementMinutes <= 0) {
    throw new ConfigurationError(
      `Time increment must be a positive number of minutes, got ${incrementMinutes}`,
      'timeIncrease'
    );
  }

  const startEpoch = toEpoch(start);
  const endEpoch = toEpoch(end);
  if (endEpoch < startEpoch) {
    throw new ConfigurationError('End date and time is before the start', 'endDateAndTime');
  }

  const series: QueryTime[] = [];
  for (let epoch = startEpoch; epoch <= endEpoch; epoch += incrementMinutes * 60_000) {
    series.push(fromEpoch(epoch));
  }
  return series;
}

/**
 * OTP time-of-day parameter, e.g. `08:05am`, `12:00pm`
 */
export function formatOtpTime(queryTime: QueryTime): string {
  const [hourText, minute] = queryTime.time.split(':');
  const hour = Number(hourText);
  const suffix = hour >= 12 ? 'pm' : 'am';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${String(hour12).padStart(2, '0')}:${minute}${suffix}`;
}

/**
 * Human-readable label used in row keys and log messages
 */
export function formatQueryTime(queryTime: QueryTime): string {
  return `${queryTime.date} ${queryTime.time}`;
}

function toEpoch(queryTime: QueryTime): number {
  const [year, month, day] = queryTime.date.split('-').map(Number);
  const [hour, minute] = queryTime.time.split(':').map(Number);
  return Date.UTC(year, month - 1, day, hour, minute);
}

function fromEpoch(epoch: number): QueryTime {
  const iso = new Date(epoch).toISOString();
  return { date: iso.slice(0, 10), time: iso.slice(11, 16) };
}

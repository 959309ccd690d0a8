/**
 * Shared CLI plumbing: global options, configuration, clients and option
 * parsers used by every command.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { buildRouterUrl, loadConfig, type TransitReachConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import { buildTimeSeries, parseQueryTime } from '../core/query-time.js';
import type { QueryTime, TravelParams } from '../core/types.js';
import { TurfGeometryService, type GeometryService } from '../geometry/geometry-service.js';
import { PostcodeGeocoder } from '../io/geocoder.js';
import { OtpRoutingClient } from '../routing/otp-client.js';
import type { RoutingClient } from '../routing/types.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  PARTIAL: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly hostname?: string;
  readonly port?: number;
  readonly router?: string;
  readonly ssl?: boolean;
  readonly timeout?: number;
  readonly outputDir?: string;
  readonly checkpointEvery?: number;
}

/**
 * Travel flags shared by every command
 */
export interface TravelOptions {
  readonly modes?: string;
  readonly maxWalkDistance?: number;
  readonly walkSpeed?: number;
  readonly bikeSpeed?: number;
  readonly walkReluctance?: number;
  readonly minTransferTime?: number;
  readonly maxTransfers?: number;
  readonly wheelchair?: boolean;
  readonly arriveBy?: boolean;
  readonly preWaitTime?: number;
}

export interface CommandContext {
  readonly config: TransitReachConfig;
  readonly routing: RoutingClient;
  readonly geometry: GeometryService;
  readonly geocoder: PostcodeGeocoder;
  readonly signal: AbortSignal;
}

export function createContext(
  globals: GlobalOptions,
  travel: TravelOptions,
  signal: AbortSignal,
  extra: { readonly cutoffs?: readonly number[] } = {}
): CommandContext {
  const config = loadConfig({
    configPath: globals.config,
    overrides: {
      router: {
        ...(globals.hostname !== undefined && { hostname: globals.hostname }),
        ...(globals.port !== undefined && { port: globals.port }),
        ...(globals.router !== undefined && { router: globals.router }),
        ...(globals.ssl !== undefined && { ssl: globals.ssl }),
      },
      travel: travelOverrides(travel),
      cutoffs: extra.cutoffs,
      timeoutMs: globals.timeout,
      outputDir: globals.outputDir,
      checkpointEvery: globals.checkpointEvery,
    },
  });

  const httpClient = new HTTPClient({ timeoutMs: config.timeoutMs });
  return {
    config,
    routing: new OtpRoutingClient({
      routerUrl: buildRouterUrl(config.router),
      httpClient,
      timeoutMs: config.timeoutMs,
    }),
    geometry: new TurfGeometryService(),
    geocoder: new PostcodeGeocoder({ signal }),
    signal,
  };
}

/**
 * Root-level options as seen from a subcommand
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Register the travel-parameter flags on a command
 */
export function addTravelOptions(command: Command): Command {
  return command
    .option('--modes <modes>', 'OTP modes, e.g. TRANSIT,WALK')
    .option('--max-walk-distance <m>', 'Maximum walking distance in meters', parseNumber)
    .option('--walk-speed <mps>', 'Walking speed in m/s', parseNumber)
    .option('--bike-speed <mps>', 'Cycling speed in m/s', parseNumber)
    .option('--walk-reluctance <n>', 'Walk reluctance (0-20)', parseNumber)
    .option('--min-transfer-time <mins>', 'Minimum transfer time in minutes', parseNumber)
    .option('--max-transfers <n>', 'Maximum number of transfers', parseInteger)
    .option('--wheelchair', 'Wheelchair-accessible stops only')
    .option('--arrive-by', 'Treat the query time as the arrival time')
    .option('--pre-wait-time <mins>', 'Maximum wait before the first transit leg', parseNumber);
}

/**
 * Single query time or an inclusive series when `end` is given
 */
export function resolveQueryTimes(start: string, end?: string, incrementMinutes = 60): QueryTime[] {
  const startTime = parseQueryTime(start);
  return end === undefined ? [startTime] : buildTimeSeries(startTime, parseQueryTime(end), incrementMinutes);
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

/**
 * `30,60,90` → [30, 60, 90]
 */
export function parseNumberList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseNumber);
}

/**
 * Run a command body and translate its outcome into `process.exitCode`
 */
export async function runCommand(body: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.getSummary()}`);
      process.exitCode = EXIT_CODES.CONFIG_ERROR;
      return;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERRORS;
  }
}

/**
 * Exit code for a finished batch
 */
export function batchExitCode(cancelled: boolean, failures: number): ExitCode {
  if (cancelled) return EXIT_CODES.USER_CANCELLED;
  return failures > 0 ? EXIT_CODES.PARTIAL : EXIT_CODES.SUCCESS;
}

function travelOverrides(travel: TravelOptions): Partial<TravelParams> {
  return {
    ...(travel.modes !== undefined && { modes: travel.modes }),
    ...(travel.maxWalkDistance !== undefined && { maxWalkDistance: travel.maxWalkDistance }),
    ...(travel.walkSpeed !== undefined && { walkSpeed: travel.walkSpeed }),
    ...(travel.bikeSpeed !== undefined && { bikeSpeed: travel.bikeSpeed }),
    ...(travel.walkReluctance !== undefined && { walkReluctance: travel.walkReluctance }),
    ...(travel.minTransferTime !== undefined && { minTransferTime: travel.minTransferTime }),
    ...(travel.maxTransfers !== undefined && { maxTransfers: travel.maxTransfers }),
    ...(travel.wheelchair !== undefined && { wheelchair: travel.wheelchair }),
    ...(travel.arriveBy !== undefined && { arriveBy: travel.arriveBy }),
    ...(travel.preWaitTime !== undefined && { preWaitTime: travel.preWaitTime }),
  };
}

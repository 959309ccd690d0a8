/**
 * transit-reach Configuration Management
 *
 * Loads configuration from .transit-reachrc (YAML or JSON) with environment
 * variable overrides and defaults, then validates the merged result.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (TRANSIT_REACH_*)
 * 3. Config file (.transit-reachrc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_TRAVEL_PARAMS, type TravelParams } from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Routing engine connection
 */
export interface RouterConfig {
  readonly hostname: string;
  readonly port: number;
  readonly router: string;
  readonly ssl: boolean;
}

export interface TransitReachConfig {
  readonly router: RouterConfig;
  readonly travel: TravelParams;
  /** Isochrone cutoffs in minutes */
  readonly cutoffs: readonly number[];
  /** Flush a checkpoint every N successful origins */
  readonly checkpointEvery: number;
  /** Per-request timeout in milliseconds */
  readonly timeoutMs: number;
  /** Simplification tolerance in degrees */
  readonly simplifyTolerance: number;
  /** Directory receiving outputs and checkpoints */
  readonly outputDir: string;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Schema
// ============================================================================

const TravelSchema = z.object({
  modes: z.string().min(1),
  maxWalkDistance: z.number().nonnegative(),
  walkSpeed: z.number().positive(),
  bikeSpeed: z.number().positive(),
  walkReluctance: z.number().min(0).max(20),
  minTransferTime: z.number().nonnegative(),
  maxTransfers: z.number().int().nonnegative(),
  wheelchair: z.boolean(),
  arriveBy: z.boolean(),
  preWaitTime: z.number().nonnegative(),
});

const ConfigSchema = z.object({
  router: z.object({
    hostname: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    router: z.string().min(1),
    ssl: z.boolean(),
  }),
  travel: TravelSchema,
  cutoffs: z.array(z.number().positive()).min(1),
  checkpointEvery: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
  simplifyTolerance: z.number().nonnegative(),
  outputDir: z.string().min(1),
});

/**
 * Config file structure (YAML or JSON); values are checked again after merging
 */
const ConfigFileSchema = z.object({
  router: ConfigSchema.shape.router.partial().optional(),
  travel: TravelSchema.partial().optional(),
  cutoffs: z.array(z.number()).optional(),
  checkpoint_every: z.number().optional(),
  timeout_ms: z.number().optional(),
  simplify_tolerance: z.number().optional(),
  output_dir: z.string().optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<TransitReachConfig, 'configPath'> = {
  router: {
    hostname: 'localhost',
    port: 8080,
    router: 'default',
    ssl: false,
  },
  travel: DEFAULT_TRAVEL_PARAMS,
  cutoffs: [30, 60, 90],
  checkpointEvery: 100,
  timeoutMs: 60_000,
  simplifyTolerance: 0.001,
  outputDir: './output',
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.transit-reachrc',
  '.transit-reachrc.yaml',
  '.transit-reachrc.yml',
  '.transit-reachrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'config'
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}`,
      'config',
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[`TRANSIT_REACH_${name}`];
}

function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    router?: Partial<RouterConfig>;
    travel?: Partial<TravelParams>;
    cutoffs?: readonly number[];
    checkpointEvery?: number;
    timeoutMs?: number;
    simplifyTolerance?: number;
    outputDir?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} when the file is missing or a merged value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): TransitReachConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, 'config');
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};
  const envHostname = getEnvVar(env, 'HOSTNAME');
  const envPort = getEnvNumber(env, 'PORT');
  const envRouter = getEnvVar(env, 'ROUTER');
  const envSsl = getEnvBool(env, 'SSL');

  const merged = {
    router: {
      ...DEFAULT_CONFIG.router,
      ...fileConfig.router,
      ...(envHostname !== undefined && { hostname: envHostname }),
      ...(envPort !== undefined && { port: envPort }),
      ...(envRouter !== undefined && { router: envRouter }),
      ...(envSsl !== undefined && { ssl: envSsl }),
      ...overrides.router,
    },
    travel: {
      ...DEFAULT_CONFIG.travel,
      ...fileConfig.travel,
      ...overrides.travel,
    },
    cutoffs: overrides.cutoffs ?? fileConfig.cutoffs ?? DEFAULT_CONFIG.cutoffs,
    checkpointEvery:
      overrides.checkpointEvery ??
      getEnvNumber(env, 'CHECKPOINT_EVERY') ??
      fileConfig.checkpoint_every ??
      DEFAULT_CONFIG.checkpointEvery,
    timeoutMs:
      overrides.timeoutMs ??
      getEnvNumber(env, 'TIMEOUT_MS') ??
      fileConfig.timeout_ms ??
      DEFAULT_CONFIG.timeoutMs,
    simplifyTolerance:
      overrides.simplifyTolerance ??
      fileConfig.simplify_tolerance ??
      DEFAULT_CONFIG.simplifyTolerance,
    outputDir:
      overrides.outputDir ??
      getEnvVar(env, 'OUTPUT_DIR') ??
      fileConfig.output_dir ??
      DEFAULT_CONFIG.outputDir,
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid transit-reach configuration',
      'config',
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return { ...parsed.data, configPath };
}

/**
 * Router base URL, e.g. `http://localhost:8080/otp/routers/default`
 */
export function buildRouterUrl(router: RouterConfig): string {
  const scheme = router.ssl ? 'https' : 'http';
  return `${scheme}://${router.hostname}:${router.port}/otp/routers/${router.router}`;
}


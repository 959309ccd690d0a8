#!/usr/bin/env tsx
/**
 * transit-reach CLI Entry Point
 *
 * Thin wrapper over the isochrone, intersection, trip and choropleth runs.
 * Ctrl-C stops a batch between items; outputs for the completed part are
 * still written.
 *
 * @module transit-reach-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { parseInteger } from '../src/cli/context.js';

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(here, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

function createProgram(signal: AbortSignal): Command {
  const program = new Command();

  program
    .name('transit-reach')
    .description('Isochrone, reachability and trip analysis against an OpenTripPlanner router')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .transit-reachrc)')
    .option('--hostname <host>', 'Router hostname')
    .option('--port <port>', 'Router port', parseInteger)
    .option('--router <name>', 'Router id')
    .option('--ssl', 'Use https')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseInteger)
    .option('--output-dir <dir>', 'Directory for outputs and checkpoints')
    .option('--checkpoint-every <n>', 'Checkpoint after this many successful origins', parseInteger);

  registerCommands(program, signal);
  return program;
}

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('\nCancelling after the current request...');
    controller.abort();
  });

  await createProgram(controller.signal).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(2);
});

/**
 * Configuration Loading Tests
 *
 * File discovery, precedence (flags > env > file > defaults) and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { buildRouterUrl, DEFAULT_CONFIG, loadConfig } from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transit-reach-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the env-named file does not exist', () => {
    const missing = join(dir, 'missing.yaml');
    const config = loadConfig({ env: { TRANSIT_REACH_CONFIG: missing } });

    expect(config.router).toEqual(DEFAULT_CONFIG.router);
    expect(config.cutoffs).toEqual([30, 60, 90]);
    expect(config.checkpointEvery).toBe(100);
    expect(config.travel.modes).toBe('WALK,TRANSIT');
    expect(config.configPath).toBe(resolve(missing));
  });

  it('merges a YAML file over the defaults', async () => {
    const path = join(dir, '.transit-reachrc.yaml');
    await writeFile(
      path,
      ['router:', '  port: 9090', 'travel:', '  modes: CAR', 'cutoffs: [15]', 'checkpoint_every: 5'].join('\n')
    );

    const config = loadConfig({ configPath: path, env: {} });

    expect(config.router.port).toBe(9090);
    expect(config.router.hostname).toBe('localhost');
    expect(config.travel.modes).toBe('CAR');
    expect(config.travel.walkSpeed).toBe(1.5);
    expect(config.cutoffs).toEqual([15]);
    expect(config.checkpointEvery).toBe(5);
  });

  it('finds a config file by searching from cwd', async () => {
    await writeFile(join(dir, '.transit-reachrc.json'), JSON.stringify({ output_dir: '/data/out' }));

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.outputDir).toBe('/data/out');
    expect(config.configPath).toBe(join(dir, '.transit-reachrc.json'));
  });

  it('prefers flags over environment over file', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'router:\n  port: 9090\n');

    const fromEnv = loadConfig({ configPath: path, env: { TRANSIT_REACH_PORT: '7000' } });
    const fromFlag = loadConfig({
      configPath: path,
      env: { TRANSIT_REACH_PORT: '7000' },
      overrides: { router: { port: 6000 } },
    });

    expect(fromEnv.router.port).toBe(7000);
    expect(fromFlag.router.port).toBe(6000);
  });

  it('rejects invalid merged values with every issue listed', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'cutoffs: [-5]\n');

    let caught: unknown;
    try {
      loadConfig({ configPath: path, env: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message).toBe('Invalid transit-reach configuration');
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith('cutoffs.0:')).toBe(true);
    }
  });

  it('rejects a config file with the wrong value types', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'timeout_ms: soon\n');

    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(ConfigurationError);
  });

  it('rejects unparsable JSON', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '{ "router": ');

    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(/Cannot parse config file/);
  });

  it('rejects an explicit path that does not exist', () => {
    expect(() => loadConfig({ configPath: join(dir, 'nope.yaml'), env: {} })).toThrow(
      /Config file not found/
    );
  });
});

describe('buildRouterUrl', () => {
  it('builds the router base URL', () => {
    expect(buildRouterUrl({ hostname: 'localhost', port: 8080, router: 'default', ssl: false })).toBe(
      'http://localhost:8080/otp/routers/default'
    );
    expect(buildRouterUrl({ hostname: 'otp.example.org', port: 443, router: 'wales', ssl: true })).toBe(
      'https://otp.example.org:443/otp/routers/wales'
    );
  });
});

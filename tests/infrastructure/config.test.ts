import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidConfigError } from '../../src/domain/index.js';
import { Config, loadConfig } from '../../src/infrastructure/config/index.js';

describe('Config', () => {
  it('fills in defaults', () => {
    expect(Config.fromObject({}).toJSON()).toEqual({
      bus: { internal_queue_size_warning: 5, monitor_interval_ms: 100, consumer_stop_wait_seconds: 1 },
      apis: {},
      schema: { ttl_seconds: 60 },
    });
  });

  it('merges API overrides onto the default API config', () => {
    const config = Config.fromObject({
      apis: {
        default: { cast_values: false },
        shop: { validate: { incoming: false } },
      },
    });

    expect(config.api('shop')).toEqual({
      cast_values: false,
      strict_validation: false,
      validate: { incoming: false, outgoing: true },
    });
    expect(config.api('catalog')).toEqual({
      cast_values: false,
      strict_validation: false,
      validate: { incoming: true, outgoing: true },
    });
  });

  it('uses built-in API defaults when nothing is configured', () => {
    expect(Config.fromObject({}).api('shop')).toEqual({
      cast_values: true,
      strict_validation: false,
      validate: { incoming: true, outgoing: true },
    });
  });

  it('reports every invalid value', () => {
    try {
      Config.fromObject({ bus: { internal_queue_size_warning: 0 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      expect(err instanceof InvalidConfigError ? err.details : undefined).toEqual({
        issues: ['bus.internal_queue_size_warning: Number must be greater than or equal to 1'],
      });
    }
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'busline-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads an explicit file', () => {
    const file = join(dir, 'bus.json');
    writeFileSync(file, JSON.stringify({ schema: { ttl_seconds: 15 } }));
    expect(loadConfig(file).schema.ttl_seconds).toBe(15);
  });

  it('falls back to BUSLINE_CONFIG', () => {
    const file = join(dir, 'from-env.json');
    writeFileSync(file, JSON.stringify({ bus: { monitor_interval_ms: 250 } }));
    vi.stubEnv('BUSLINE_CONFIG', file);
    expect(loadConfig().bus.monitor_interval_ms).toBe(250);
  });

  it('uses defaults for a missing file', () => {
    expect(loadConfig(join(dir, 'missing.json')).bus.consumer_stop_wait_seconds).toBe(1);
  });

  it('treats an empty file as an empty config', () => {
    const file = join(dir, 'empty.json');
    writeFileSync(file, '  \n');
    expect(loadConfig(file).schema.ttl_seconds).toBe(60);
  });

  it('rejects a file that is not JSON', () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ bus: ');
    expect(() => loadConfig(file)).toThrow(`Configuration file ${file} is not valid JSON`);
  });
});

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { InvalidConfigError } from '../../domain/index.js';

const apiOverridesSchema = z.object({
  cast_values: z.boolean().optional(),
  strict_validation: z.boolean().optional(),
  validate: z.object({
    incoming: z.boolean().optional(),
    outgoing: z.boolean().optional(),
  }).optional(),
});

/**
 * Zod schema for the bus configuration file.
 *
 * `apis.default` overrides the built-in API defaults; any other key
 * under `apis` overrides them for that API only.
 */
export const configSchema = z.object({
  bus: z.object({
    internal_queue_size_warning: z.number().int().min(1).default(5),
    monitor_interval_ms: z.number().int().min(1).default(100),
    consumer_stop_wait_seconds: z.number().min(0).default(1),
  }).default({}),
  apis: z.record(z.string(), apiOverridesSchema).default({}),
  schema: z.object({
    ttl_seconds: z.number().int().min(1).default(60),
  }).default({}),
});

export type ConfigData = z.infer<typeof configSchema>;
export type ApiConfigOverrides = z.infer<typeof apiOverridesSchema>;

export interface ApiConfig {
  readonly cast_values: boolean;
  readonly strict_validation: boolean;
  readonly validate: { readonly incoming: boolean; readonly outgoing: boolean };
}

export const DEFAULT_API_CONFIG: ApiConfig = {
  cast_values: true,
  strict_validation: false,
  validate: { incoming: true, outgoing: true },
};

function mergeApiConfig(base: ApiConfig, overrides: ApiConfigOverrides | undefined): ApiConfig {
  if (!overrides) return base;
  return {
    cast_values: overrides.cast_values ?? base.cast_values,
    strict_validation: overrides.strict_validation ?? base.strict_validation,
    validate: {
      incoming: overrides.validate?.incoming ?? base.validate.incoming,
      outgoing: overrides.validate?.outgoing ?? base.validate.outgoing,
    },
  };
}

/**
 * Read-only bus configuration, one instance per process.
 */
export class Config {
  private constructor(private readonly data: ConfigData) {}

  /** Parses a plain object. Throws InvalidConfigError listing every issue. */
  static fromObject(input: unknown): Config {
    const parsed = configSchema.safeParse(input ?? {});
    if (!parsed.success) {
      throw new InvalidConfigError('Invalid bus configuration', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
      });
    }
    return new Config(parsed.data);
  }

  /** Loads and parses a JSON configuration file. */
  static load(filePath: string): Config {
    const content = readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
      raw = content.trim() === '' ? {} : JSON.parse(content);
    } catch (err: unknown) {
      throw new InvalidConfigError(`Configuration file ${filePath} is not valid JSON`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    return Config.fromObject(raw);
  }

  get bus(): ConfigData['bus'] {
    return this.data.bus;
  }

  get schema(): ConfigData['schema'] {
    return this.data.schema;
  }

  /** Effective configuration for one API: built-in defaults ← `default` ← `<apiName>`. */
  api(apiName: string): ApiConfig {
    const defaults = mergeApiConfig(DEFAULT_API_CONFIG, this.data.apis['default']);
    if (apiName === 'default') return defaults;
    return mergeApiConfig(defaults, this.data.apis[apiName]);
  }

  toJSON(): ConfigData {
    return this.data;
  }
}

/**
 * Resolves the configuration file path and loads it.
 *
 * Lookup order: explicit path, `BUSLINE_CONFIG`, `config/bus.json` under
 * the working directory. A missing file yields the defaults; an invalid
 * one throws.
 */
export function loadConfig(configPath?: string): Config {
  const filePath = configPath
    ?? process.env['BUSLINE_CONFIG']
    ?? resolve(process.cwd(), 'config', 'bus.json');

  if (!existsSync(filePath)) {
    return Config.fromObject({});
  }
  return Config.load(filePath);
}

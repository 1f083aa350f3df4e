import type { Logger } from 'pino';
import { normaliseParameter } from '../domain/index.js';
import type { Api, EventDefinition } from '../domain/index.js';
import type { Config } from '../infrastructure/config/index.js';
import { sleep } from '../infrastructure/messaging/index.js';
import type { ApiSchema, SchemaTransport } from '../infrastructure/transports/index.js';

export interface EventSchema {
  readonly parameters: {
    readonly type: 'object';
    readonly properties: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
    readonly required: readonly string[];
    readonly additionalProperties: false;
  };
}

/** JSON Schema for an event's kwargs. */
export function eventSchema(event: EventDefinition): EventSchema {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const raw of event.parameters) {
    const parameter = normaliseParameter(raw);
    properties[parameter.name] = parameter.type ? { type: parameter.type } : {};
    required.push(parameter.name);
  }

  return { parameters: { type: 'object', properties, required, additionalProperties: false } };
}

export function apiSchema(api: Api): ApiSchema {
  const events: Record<string, EventSchema> = {};
  for (const [eventName, event] of Object.entries(api.events)) {
    events[eventName] = eventSchema(event);
  }
  return { name: api.name, version: api.version, events };
}

/**
 * Schemas of local APIs plus those other processes have published.
 *
 * Local schemas win over remote ones with the same API name.
 */
export class Schema {
  private readonly localSchemas = new Map<string, ApiSchema>();
  private remoteSchemas = new Map<string, ApiSchema>();

  constructor(
    private readonly transport: SchemaTransport | null,
    private readonly config: Config,
    private readonly log: Logger,
  ) {}

  get apiNames(): string[] {
    return [...new Set([...this.localSchemas.keys(), ...this.remoteSchemas.keys()])];
  }

  addApi(api: Api): void {
    this.localSchemas.set(api.name, apiSchema(api));
  }

  get(apiName: string): ApiSchema | undefined {
    return this.localSchemas.get(apiName) ?? this.remoteSchemas.get(apiName);
  }

  async loadFromTransport(): Promise<void> {
    if (!this.transport) return;
    const loaded = await this.transport.load();
    this.remoteSchemas = new Map(Object.entries(loaded));
    this.log.debug({ apis: Object.keys(loaded) }, 'Loaded remote schemas');
  }

  /** Stores every local schema on the transport. */
  async publish(): Promise<void> {
    if (!this.transport) return;
    const ttl = this.config.schema.ttl_seconds;
    for (const [apiName, schema] of this.localSchemas) {
      await this.transport.store(apiName, schema, ttl);
    }
  }

  /**
   * Keeps local schemas alive and the remote set fresh until `signal`
   * aborts. Pings at 80% of the TTL.
   */
  async monitor(signal: AbortSignal): Promise<void> {
    if (!this.transport) return;
    const ttl = this.config.schema.ttl_seconds;
    const intervalMs = ttl * 0.8 * 1000;

    while (!signal.aborted) {
      await sleep(intervalMs, signal);
      if (signal.aborted) return;

      for (const [apiName, schema] of this.localSchemas) {
        await this.transport.ping(apiName, schema, ttl);
      }
      await this.loadFromTransport();
    }
  }
}

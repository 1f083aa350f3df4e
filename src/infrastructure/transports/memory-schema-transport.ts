import { SchemaTransport } from './base.js';
import type { ApiSchema } from './base.js';

export interface StoredSchema {
  readonly schema: ApiSchema;
  readonly expiresAt: number;
}

export interface MemorySchemaTransportOptions {
  /**
   * Backing map. Pass the same map to several transports to share
   * schemas between buses in one process.
   */
  store?: Map<string, StoredSchema>;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

/**
 * Process-local schema transport. Schemas expire `ttlSeconds` after
 * their last `store()`/`ping()`.
 */
export class MemorySchemaTransport extends SchemaTransport {
  private readonly schemas: Map<string, StoredSchema>;
  private readonly now: () => number;

  constructor(options: MemorySchemaTransportOptions = {}) {
    super();
    this.schemas = options.store ?? new Map();
    this.now = options.now ?? Date.now;
  }

  async store(apiName: string, schema: ApiSchema, ttlSeconds: number): Promise<void> {
    this.schemas.set(apiName, { schema, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async load(): Promise<Record<string, ApiSchema>> {
    const now = this.now();
    const loaded: Record<string, ApiSchema> = {};

    for (const [apiName, stored] of this.schemas) {
      if (stored.expiresAt <= now) {
        this.schemas.delete(apiName);
        continue;
      }
      loaded[apiName] = stored.schema;
    }

    return loaded;
  }
}

import { Ajv } from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { z } from 'zod';
import { UnknownApiError, ValidationError, canonicalName } from '../domain/index.js';
import type { EventMessage } from '../domain/index.js';
import type { ApiConfig } from '../infrastructure/config/index.js';
import type { Schema } from './schema.js';

/** Checks messages against API schemas as they leave and enter the process. */
export interface SchemaValidator {
  validateOutgoing(config: ApiConfig, schema: Schema, message: EventMessage): void;
  validateIncoming(config: ApiConfig, schema: Schema, message: EventMessage): void;
}

type Direction = 'incoming' | 'outgoing';

/** Shape every stored API schema must have; per-event schemas stay opaque. */
const apiSchemaShape = z.object({
  events: z.record(z.string(), z.object({
    parameters: z.record(z.string(), z.unknown()),
  })),
});

function formatAjvError(error: ErrorObject): string {
  const field = error.instancePath || 'kwargs';
  return `${field} ${error.message ?? 'is invalid'}`;
}

/** Validates event kwargs with ajv against the `parameters` JSON Schema. */
export class JsonSchemaValidator implements SchemaValidator {
  private readonly ajv = new Ajv({ allErrors: true });
  private readonly compiled = new WeakMap<object, Map<string, ValidateFunction>>();

  validateOutgoing(config: ApiConfig, schema: Schema, message: EventMessage): void {
    this.validate('outgoing', config, schema, message);
  }

  validateIncoming(config: ApiConfig, schema: Schema, message: EventMessage): void {
    this.validate('incoming', config, schema, message);
  }

  private validate(direction: Direction, config: ApiConfig, schema: Schema, message: EventMessage): void {
    if (!config.validate[direction]) return;

    const raw = schema.get(message.api_name);
    if (raw === undefined) {
      if (config.strict_validation) {
        throw new UnknownApiError(
          `No schema could be found for API ${message.api_name}. Either register the API locally, `
            + 'make sure the process providing it has published its schema, or turn off strict_validation.',
          message.api_name,
        );
      }
      return;
    }

    const parsed = apiSchemaShape.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        `Schema for API ${message.api_name} is malformed`,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const events = parsed.data.events;
    const event = Object.hasOwn(events, message.event_name) ? events[message.event_name] : undefined;
    if (event === undefined) {
      if (config.strict_validation) {
        throw new ValidationError(
          `No schema for event ${canonicalName(message)}`,
          [`event ${message.event_name} is not defined by API ${message.api_name}`],
        );
      }
      return;
    }

    const validateKwargs = this.compile(raw, message.event_name, event.parameters);
    if (!validateKwargs(message.kwargs)) {
      const issues = (validateKwargs.errors ?? []).map(formatAjvError);
      throw new ValidationError(
        `Validation of ${direction} event ${canonicalName(message)} failed: ${issues.join('; ')}`,
        issues,
      );
    }
  }

  /** Compiled validators are cached per stored API schema object and event. */
  private compile(apiSchema: object, eventName: string, parameters: object): ValidateFunction {
    let byEvent = this.compiled.get(apiSchema);
    if (!byEvent) {
      byEvent = new Map();
      this.compiled.set(apiSchema, byEvent);
    }

    let validateKwargs = byEvent.get(eventName);
    if (!validateKwargs) {
      validateKwargs = this.ajv.compile(parameters);
      byEvent.set(eventName, validateKwargs);
    }
    return validateKwargs;
  }
}

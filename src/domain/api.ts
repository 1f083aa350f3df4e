import { EventNotFoundError } from './errors.js';

/** JSON Schema primitive type names accepted for parameter typing. */
export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

export interface Parameter {
  readonly name: string;
  readonly type?: ParameterType;
}

export interface EventDefinition {
  readonly parameters: ReadonlyArray<string | Parameter>;
}

/**
 * An API this process is authoritative for.
 *
 * Only locally registered APIs may fire events.
 */
export interface Api {
  readonly name: string;
  readonly version: number;
  readonly events: Readonly<Record<string, EventDefinition>>;
}

export function normaliseParameter(parameter: string | Parameter): Parameter {
  return typeof parameter === 'string' ? { name: parameter } : parameter;
}

export function parameterNames(event: EventDefinition): string[] {
  return event.parameters.map((p) => normaliseParameter(p).name);
}

export function getEvent(api: Api, eventName: string): EventDefinition {
  const event = Object.hasOwn(api.events, eventName) ? api.events[eventName] : undefined;
  if (event === undefined) {
    throw new EventNotFoundError(
      `Tried to fire the event ${api.name}.${eventName}, but the API ${api.name} does not `
        + `seem to contain an event named ${eventName}. You may need to define the event, `
        + 'or you may be using the incorrect API. Also check for typos.',
      api.name,
      eventName,
    );
  }
  return event;
}

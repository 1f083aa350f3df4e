import { randomUUID } from 'node:crypto';

/**
 * Wire-safe keyword arguments carried by a message.
 *
 * Keys keep their insertion order; values have already been deformed
 * into JSON-compatible form before they reach a transport.
 */
export type Kwargs = Readonly<Record<string, unknown>>;

/**
 * Canonical representation of one event occurrence, independent of
 * any transport encoding.
 *
 * `native_id` is assigned by the transport that delivered the message
 * (e.g. a stream entry ID) and is what `acknowledge()` keys on.
 */
export interface EventMessage {
  readonly id: string;
  readonly api_name: string;
  readonly event_name: string;
  readonly version: number;
  readonly kwargs: Kwargs;
  readonly native_id?: string;
}

export interface RpcMessage {
  readonly id: string;
  readonly api_name: string;
  readonly procedure_name: string;
  readonly kwargs: Kwargs;
  readonly return_path?: string;
}

export interface ResultMessage {
  readonly id: string;
  readonly rpc_message_id: string;
  readonly result: unknown;
  readonly error: boolean;
  readonly trace?: string;
}

export interface CreateEventMessageInput {
  api_name: string;
  event_name: string;
  version: number;
  kwargs: Kwargs;
  id?: string;
  native_id?: string;
}

/** Builds a frozen EventMessage, generating an ID when none is given. */
export function createEventMessage(input: CreateEventMessageInput): EventMessage {
  return Object.freeze({
    id: input.id ?? randomUUID(),
    api_name: input.api_name,
    event_name: input.event_name,
    version: input.version,
    kwargs: Object.freeze({ ...input.kwargs }),
    ...(input.native_id !== undefined ? { native_id: input.native_id } : {}),
  });
}

/** Returns a copy of the message carrying the given transport-native ID. */
export function withNativeId(message: EventMessage, nativeId: string): EventMessage {
  return createEventMessage({ ...message, native_id: nativeId });
}

/** `api.event` label used in log lines. */
export function canonicalName(message: Pick<EventMessage, 'api_name' | 'event_name'>): string {
  return `${message.api_name}.${message.event_name}`;
}

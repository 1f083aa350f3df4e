import type { EventMessage } from './message.js';

/** Transport-specific options passed through untouched. */
export type CommandOptions = Readonly<Record<string, unknown>>;

/** `[api_name, event_name]` pair a listener is interested in. */
export type ListenFor = readonly [apiName: string, eventName: string];

/** Anything a transport can push received messages onto. */
export interface MessageSink<T> {
  put(item: T): void;
}

export interface SendEventCommand {
  readonly type: 'send_event';
  readonly message: EventMessage;
  readonly options: CommandOptions;
}

export interface AcknowledgeEventCommand {
  readonly type: 'acknowledge_event';
  readonly message: EventMessage;
  readonly options: CommandOptions;
}

export interface ConsumeEventsCommand {
  readonly type: 'consume_events';
  readonly events: readonly ListenFor[];
  readonly destinationQueue: MessageSink<EventMessage>;
  readonly listenerName: string;
}

export interface ReceiveEventCommand {
  readonly type: 'receive_event';
  readonly message: EventMessage;
  readonly listenerName: string;
}

/** Commands flowing from the client towards the transports. */
export type TransportCommand = SendEventCommand | AcknowledgeEventCommand | ConsumeEventsCommand;

/** Commands flowing from the transports back to the client. */
export type ClientCommand = ReceiveEventCommand;

export type Command = TransportCommand | ClientCommand;

export function sendEvent(message: EventMessage, options: CommandOptions = {}): SendEventCommand {
  return { type: 'send_event', message, options };
}

export function acknowledgeEvent(message: EventMessage, options: CommandOptions = {}): AcknowledgeEventCommand {
  return { type: 'acknowledge_event', message, options };
}

export function consumeEvents(
  events: readonly ListenFor[],
  destinationQueue: MessageSink<EventMessage>,
  listenerName: string,
): ConsumeEventsCommand {
  return { type: 'consume_events', events, destinationQueue, listenerName };
}

export function receiveEvent(message: EventMessage, listenerName: string): ReceiveEventCommand {
  return { type: 'receive_event', message, listenerName };
}

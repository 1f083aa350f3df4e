export type { EventMessage, RpcMessage, ResultMessage, Kwargs, CreateEventMessageInput } from './message.js';
export { createEventMessage, withNativeId, canonicalName } from './message.js';
export type { Api, EventDefinition, Parameter, ParameterType } from './api.js';
export { getEvent, parameterNames, normaliseParameter } from './api.js';
export type {
  Command,
  ClientCommand,
  TransportCommand,
  SendEventCommand,
  AcknowledgeEventCommand,
  ConsumeEventsCommand,
  ReceiveEventCommand,
  CommandOptions,
  ListenFor,
  MessageSink,
} from './commands.js';
export { sendEvent, acknowledgeEvent, consumeEvents, receiveEvent } from './commands.js';
export {
  BusError,
  ConfigurationError,
  UnknownApiError,
  EventNotFoundError,
  InvalidEventArgumentsError,
  InvalidEventListenerError,
  ListenerAlreadyRegisteredError,
  NothingToListenForError,
  InvalidNameError,
  InvalidConfigError,
  UnsupportedOperationError,
  ValidationError,
  UnrecognisedCommandError,
  toError,
} from './errors.js';

/**
 * Error taxonomy for the bus client.
 *
 * - ConfigurationError: raised synchronously at the offending call, never retried.
 * - UnsupportedOperationError: a transport does not implement a capability.
 * - ValidationError: a message failed schema validation.
 *
 * Errors raised inside background tasks are never thrown at a caller;
 * they are forwarded to the shared error channel instead.
 */
export class BusError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code = 'BUS_ERROR', details?: Record<string, unknown>) {
    super(message);
    this.name = 'BusError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, BusError.prototype);
  }

  toJSON(): { name: string; code: string; message: string; details?: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class ConfigurationError extends BusError {
  constructor(message: string, code = 'CONFIGURATION_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class UnknownApiError extends ConfigurationError {
  constructor(message: string, readonly apiName: string) {
    super(message, 'UNKNOWN_API', { api_name: apiName });
    this.name = 'UnknownApiError';
    Object.setPrototypeOf(this, UnknownApiError.prototype);
  }
}

export class EventNotFoundError extends ConfigurationError {
  constructor(message: string, readonly apiName: string, readonly eventName: string) {
    super(message, 'EVENT_NOT_FOUND', { api_name: apiName, event_name: eventName });
    this.name = 'EventNotFoundError';
    Object.setPrototypeOf(this, EventNotFoundError.prototype);
  }
}

/** Supplied kwargs do not match the event's declared parameter names. */
export class InvalidEventArgumentsError extends ConfigurationError {
  readonly supplied: readonly string[];
  readonly expected: readonly string[];

  constructor(supplied: readonly string[], expected: readonly string[]) {
    super(
      'Invalid event arguments supplied when firing event. '
        + `Attempted to fire event with ${supplied.length} arguments: ${supplied.join(', ')}. `
        + `Event expected ${expected.length}: ${expected.join(', ')}`,
      'INVALID_EVENT_ARGUMENTS',
      { supplied: [...supplied], expected: [...expected] },
    );
    this.name = 'InvalidEventArgumentsError';
    this.supplied = supplied;
    this.expected = expected;
    Object.setPrototypeOf(this, InvalidEventArgumentsError.prototype);
  }
}

export class InvalidEventListenerError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'INVALID_EVENT_LISTENER');
    this.name = 'InvalidEventListenerError';
    Object.setPrototypeOf(this, InvalidEventListenerError.prototype);
  }
}

export class ListenerAlreadyRegisteredError extends ConfigurationError {
  constructor(readonly listenerName: string) {
    super(`Listener with name ${listenerName} already registered`, 'LISTENER_ALREADY_REGISTERED', {
      listener_name: listenerName,
    });
    this.name = 'ListenerAlreadyRegisteredError';
    Object.setPrototypeOf(this, ListenerAlreadyRegisteredError.prototype);
  }
}

export class NothingToListenForError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'NOTHING_TO_LISTEN_FOR');
    this.name = 'NothingToListenForError';
    Object.setPrototypeOf(this, NothingToListenForError.prototype);
  }
}

export class InvalidNameError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'INVALID_NAME');
    this.name = 'InvalidNameError';
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', details);
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

export class UnsupportedOperationError extends BusError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_OPERATION');
    this.name = 'UnsupportedOperationError';
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}

export class ValidationError extends BusError {
  constructor(message: string, readonly issues: readonly string[]) {
    super(message, 'VALIDATION_ERROR', { issues: [...issues] });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnrecognisedCommandError extends BusError {
  constructor(command: unknown) {
    super(`Did not recognise command ${describeCommand(command)}`, 'UNRECOGNISED_COMMAND');
    this.name = 'UnrecognisedCommandError';
    Object.setPrototypeOf(this, UnrecognisedCommandError.prototype);
  }
}

function describeCommand(command: unknown): string {
  if (typeof command === 'object' && command !== null && 'type' in command) {
    return String(command.type);
  }
  return String(command);
}

/** Normalises a caught value into an Error instance. */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

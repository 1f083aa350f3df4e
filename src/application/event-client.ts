import type { Logger } from 'pino';
import {
  acknowledgeEvent,
  consumeEvents,
  createEventMessage,
  canonicalName,
  getEvent,
  parameterNames,
  sendEvent,
  toError,
  InvalidEventArgumentsError,
  InvalidEventListenerError,
  ListenerAlreadyRegisteredError,
  NothingToListenForError,
  UnknownApiError,
  UnrecognisedCommandError,
} from '../domain/index.js';
import type {
  ClientCommand,
  CommandOptions,
  EventMessage,
  ListenFor,
  ReceiveEventCommand,
  TransportCommand,
} from '../domain/index.js';
import type { Config } from '../infrastructure/config/index.js';
import { AsyncQueue, QueueGetAbortedError, waitUnlessAborted } from '../infrastructure/messaging/index.js';
import type { ErrorQueue, InternalProducer } from '../infrastructure/messaging/index.js';
import type { ApiRegistry } from './api-registry.js';
import { castToSignature } from './casting.js';
import type { ParameterSchema } from './casting.js';
import { deformKwargs } from './deform.js';
import { validateEventOrRpcName } from './names.js';
import type { PluginRegistry } from './plugins.js';
import type { Schema } from './schema.js';
import type { SchemaValidator } from './validator.js';

/**
 * Callable invoked once per received event.
 *
 * `kwargs` are the message's kwargs, cast to `parameters` when the
 * listener declared them.
 */
export type EventListener = (message: EventMessage, kwargs: Readonly<Record<string, unknown>>) => unknown;

export interface ListenOptions {
  /** Zod schema the kwargs are cast with before the listener is called. */
  parameters?: ParameterSchema;
  /** Passed to the transport with every acknowledgement. */
  acknowledgeOptions?: CommandOptions;
}

export interface EventClientDeps {
  config: Config;
  apiRegistry: ApiRegistry;
  schema: Schema;
  validator: SchemaValidator;
  plugins: PluginRegistry;
  producer: InternalProducer<TransportCommand>;
  errorQueue: ErrorQueue;
  log: Logger;
}

interface ListenerRegistration {
  readonly name: string;
  readonly events: readonly ListenFor[];
  readonly listener: EventListener;
  readonly options: ListenOptions;
  readonly queue: AsyncQueue<EventMessage>;
}

interface ListenerTask {
  readonly controller: AbortController;
  readonly task: Promise<void>;
}

// Matches a parameter list with at least one entry, rest parameters included
const DECLARES_PARAMETER = /^[^(]*\(\s*[^\s)]/;
const COMMENTS = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;

/**
 * Fires events and runs listeners.
 *
 * Outgoing work goes to the transports as commands on `producer`;
 * received events come back through `handle()`.
 */
export class EventClient {
  private readonly listeners = new Map<string, ListenerRegistration>();
  private readonly listenerTasks = new Map<string, ListenerTask>();

  constructor(private readonly deps: EventClientDeps) {}

  get listenerNames(): string[] {
    return [...this.listeners.keys()];
  }

  /**
   * Validates, serialises and sends an event, resolving once the
   * transport has accepted it.
   */
  async fireEvent(
    apiName: string,
    eventName: string,
    kwargs: Readonly<Record<string, unknown>> = {},
    options: CommandOptions = {},
  ): Promise<EventMessage> {
    const { apiRegistry, config, schema, validator, plugins, producer, log } = this.deps;

    const api = apiRegistry.get(apiName);
    if (!api) {
      throw new UnknownApiError(
        `An attempt was made to fire the event ${apiName}.${eventName}, but the API ${apiName} `
          + 'is not registered in this process. Only APIs registered locally may fire events. '
          + `Registered APIs: ${apiRegistry.names().join(', ') || '(none)'}`,
        apiName,
      );
    }

    validateEventOrRpcName(apiName, 'event', eventName);
    const event = getEvent(api, eventName);

    const expected = [...new Set(parameterNames(event))].sort();
    const supplied = Object.keys(kwargs).sort();
    if (supplied.length !== expected.length || supplied.some((name, i) => name !== expected[i])) {
      throw new InvalidEventArgumentsError(supplied, expected);
    }

    const message = createEventMessage({
      api_name: apiName,
      event_name: eventName,
      version: api.version,
      kwargs: deformKwargs(kwargs),
    });

    validator.validateOutgoing(config.api(apiName), schema, message);

    await plugins.executeHook('before_event_sent', { eventMessage: message });

    log.info({ event: canonicalName(message), message_id: message.id }, 'Sending event');
    await producer.send(sendEvent(message, options)).wait();

    await plugins.executeHook('after_event_sent', { eventMessage: message });
    return message;
  }

  /**
   * Registers `listener` for the given `[api, event]` pairs and starts
   * consuming. Resolves once the transport side is consuming.
   */
  async listen(
    events: readonly ListenFor[],
    listener: EventListener,
    listenerName: string,
    options: ListenOptions = {},
  ): Promise<void> {
    sanityCheckListener(listener);

    if (this.listeners.has(listenerName)) {
      throw new ListenerAlreadyRegisteredError(listenerName);
    }
    if (events.length === 0) {
      throw new NothingToListenForError(
        'EventClient.listen() was called without providing any events to listen for. '
          + 'Provide at least one [api_name, event_name] pair.',
      );
    }
    for (const [apiName, eventName] of events) {
      validateEventOrRpcName(apiName, 'event', eventName);
    }

    const registration: ListenerRegistration = {
      name: listenerName,
      events,
      listener,
      options,
      queue: new AsyncQueue<EventMessage>(),
    };
    this.listeners.set(listenerName, registration);

    await this.deps.producer.send(consumeEvents(events, registration.queue, listenerName)).wait();

    const controller = new AbortController();
    const task = this.listenerLoop(registration, controller.signal).catch((err: unknown) => {
      this.deps.errorQueue.put(toError(err));
    });
    this.listenerTasks.set(listenerName, { controller, task });

    this.deps.log.info(
      { listener: listenerName, events: events.map(([api, event]) => `${api}.${event}`) },
      'Listening for events',
    );
  }

  /** Routes a transport→client command. Rejects without acting once `signal` has aborted. */
  async handle(command: ClientCommand, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    switch (command.type) {
      case 'receive_event':
        return this.handleReceiveEvent(command);
      default:
        throw new UnrecognisedCommandError(command);
    }
  }

  /** Stops every listener loop. Messages still queued are left unacknowledged. */
  async close(): Promise<void> {
    const tasks = [...this.listenerTasks.values()];
    for (const { controller } of tasks) {
      controller.abort();
    }
    await Promise.all(tasks.map(({ task }) => task));
    this.listenerTasks.clear();
  }

  private async handleReceiveEvent(command: ReceiveEventCommand): Promise<void> {
    const registration = this.listeners.get(command.listenerName);
    if (!registration) {
      this.deps.log.debug(
        { listener: command.listenerName, event: canonicalName(command.message) },
        'Received event for unknown listener, dropping it',
      );
      return;
    }
    registration.queue.put(command.message);
  }

  private async listenerLoop(registration: ListenerRegistration, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: EventMessage;
      try {
        message = await registration.queue.get(signal);
      } catch (err: unknown) {
        if (err instanceof QueueGetAbortedError) return;
        throw err;
      }

      try {
        await this.onMessage(registration, message, signal);
      } catch (err: unknown) {
        this.deps.log.warn(
          { err, listener: registration.name, event: canonicalName(message) },
          'Failed to process received event',
        );
        this.deps.errorQueue.put(toError(err));
      } finally {
        registration.queue.taskDone();
      }
    }
  }

  private async onMessage(
    registration: ListenerRegistration,
    message: EventMessage,
    signal: AbortSignal,
  ): Promise<void> {
    const { config, schema, validator, plugins, producer, errorQueue, log } = this.deps;
    const apiConfig = config.api(message.api_name);

    log.info(
      { listener: registration.name, event: canonicalName(message), message_id: message.id },
      'Executing listener',
    );

    validator.validateIncoming(apiConfig, schema, message);
    await plugins.executeHook('before_event_execution', { eventMessage: message });

    const kwargs = apiConfig.cast_values
      ? castToSignature(message.kwargs, registration.options.parameters, log)
      : message.kwargs;

    try {
      await registration.listener(message, kwargs);
    } catch (err: unknown) {
      log.warn(
        { err, listener: registration.name, event: canonicalName(message), message_id: message.id },
        'Listener failed, event will not be acknowledged',
      );
      errorQueue.put(toError(err));
      return;
    }

    const acknowledged = await waitUnlessAborted(
      producer.send(acknowledgeEvent(message, registration.options.acknowledgeOptions)).wait(),
      signal,
    );
    if (!acknowledged) return;

    await plugins.executeHook('after_event_execution', { eventMessage: message });
  }
}

/** Rejects anything that is not a function taking at least one argument. */
export function sanityCheckListener(listener: unknown): void {
  if (typeof listener !== 'function') {
    throw new InvalidEventListenerError(
      `The specified event listener is not callable. Listeners must be functions, got ${typeof listener}.`,
    );
  }

  const source = Function.prototype.toString.call(listener).replace(COMMENTS, '');
  if (listener.length > 0 || DECLARES_PARAMETER.test(source)) {
    return;
  }

  throw new InvalidEventListenerError(
    `The event listener ${listener.name || '(anonymous)'} takes no parameters. Listeners are called `
      + 'with (message, kwargs), so they must declare at least one parameter.',
  );
}

import type { Logger } from 'pino';
import { receiveEvent, toError, UnrecognisedCommandError } from '../../domain/index.js';
import type {
  AcknowledgeEventCommand,
  ClientCommand,
  ConsumeEventsCommand,
  EventMessage,
  SendEventCommand,
  TransportCommand,
} from '../../domain/index.js';
import { waitUnlessAborted } from '../messaging/index.js';
import type { ErrorQueue, InternalProducer } from '../messaging/index.js';
import type { EventTransport } from './base.js';

export interface TransportDispatcherDeps {
  eventTransport: EventTransport;
  errorQueue: ErrorQueue;
  log: Logger;
  /**
   * Channel back to the client. When set, consumed messages travel as
   * `receive_event` commands; otherwise they go straight onto the
   * command's destination queue.
   */
  toClient?: InternalProducer<ClientCommand>;
}

interface ConsumeLoop {
  readonly controller: AbortController;
  readonly task: Promise<void>;
}

/**
 * Executes client→transport commands against the event transport.
 *
 * Used as the handler of the consumer draining the client→transport queue.
 */
export class TransportDispatcher {
  private readonly consumeLoops = new Map<string, ConsumeLoop>();

  constructor(private readonly deps: TransportDispatcherDeps) {}

  /** Listener names with an open consume loop. */
  get consuming(): string[] {
    return [...this.consumeLoops.keys()];
  }

  /** `signal` aborts when the consumer cancels the command. */
  async handle(command: TransportCommand, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    switch (command.type) {
      case 'send_event':
        return this.handleSendEvent(command, signal);
      case 'acknowledge_event':
        return this.handleAcknowledgeEvent(command);
      case 'consume_events':
        return this.handleConsumeEvents(command);
      default:
        throw new UnrecognisedCommandError(command);
    }
  }

  /** Stops every consume loop. */
  async close(): Promise<void> {
    const loops = [...this.consumeLoops.values()];
    for (const loop of loops) {
      loop.controller.abort();
    }
    await Promise.all(loops.map((loop) => loop.task));
    this.consumeLoops.clear();
  }

  private async handleSendEvent(command: SendEventCommand, signal: AbortSignal | undefined): Promise<void> {
    await this.deps.eventTransport.sendEvent(command.message, command.options, { signal });
  }

  private async handleAcknowledgeEvent(command: AcknowledgeEventCommand): Promise<void> {
    await this.deps.eventTransport.acknowledge(command.message);
  }

  private async handleConsumeEvents(command: ConsumeEventsCommand): Promise<void> {
    if (this.consumeLoops.has(command.listenerName)) {
      this.deps.log.warn({ listener: command.listenerName }, 'Already consuming events for listener, ignoring');
      return;
    }

    // Opening the stream here lets a bad listen-for set fail the command itself
    const controller = new AbortController();
    const stream = this.deps.eventTransport.consume(command.events, command.listenerName, {
      signal: controller.signal,
    });

    const task = this.consumeLoop(command, stream, controller.signal).catch((err: unknown) => {
      this.deps.log.warn({ err, listener: command.listenerName }, 'Event consume loop failed');
      this.deps.errorQueue.put(toError(err));
    });
    this.consumeLoops.set(command.listenerName, { controller, task });

    this.deps.log.info(
      { listener: command.listenerName, events: command.events.map(([api, event]) => `${api}.${event}`) },
      'Consuming events',
    );
  }

  private async consumeLoop(
    command: ConsumeEventsCommand,
    stream: AsyncIterable<EventMessage[]>,
    signal: AbortSignal,
  ): Promise<void> {
    const { toClient } = this.deps;

    for await (const batch of stream) {
      for (const message of batch) {
        if (signal.aborted) return;

        if (!toClient) {
          command.destinationQueue.put(message);
          continue;
        }

        const delivered = await waitUnlessAborted(
          toClient.send(receiveEvent(message, command.listenerName)).wait(),
          signal,
        );
        if (!delivered) return;
      }
    }
  }
}

import { withNativeId } from '../../domain/index.js';
import type { CommandOptions, EventMessage, ListenFor } from '../../domain/index.js';
import { AsyncQueue, QueueGetAbortedError } from '../messaging/index.js';
import { EventTransport } from './base.js';
import type { CallOptions, ConsumeOptions, HistoryOptions } from './base.js';

export interface MemoryEventTransportOptions {
  /** Max messages per yielded batch. Defaults to 100. */
  batchSize?: number;
  /** Clock used to timestamp sent events. */
  now?: () => Date;
  /** Oldest sent events are dropped from `history()` beyond this many. Unbounded by default. */
  maxHistory?: number;
}

interface LogEntry {
  readonly message: EventMessage;
  readonly sentAt: Date;
}

interface Subscriber {
  readonly keys: ReadonlySet<string>;
  readonly queue: AsyncQueue<EventMessage>;
}

const DEFAULT_BATCH_SIZE = 100;

function eventKey(apiName: string, eventName: string): string {
  return `${apiName}.${eventName}`;
}

/**
 * Process-local event transport.
 *
 * Sent events are appended to a log (used by `history()`) and fanned out
 * to every open `consume()` whose listen-for set matches.
 *
 * Delivery is at-least-once per listener name: each delivered copy gets a
 * `native_id` of `<listenerName>:<sequence>` and stays pending until
 * acknowledged. Reopening `consume()` for a listener redelivers its
 * pending messages before any new ones.
 */
export class MemoryEventTransport extends EventTransport {
  private readonly batchSize: number;
  private readonly now: () => Date;
  private readonly maxHistory: number;
  private readonly entries: LogEntry[] = [];
  private readonly subscribers = new Set<Subscriber>();
  private readonly pendingByListener = new Map<string, Map<string, EventMessage>>();
  private sequence = 0;

  constructor(options: MemoryEventTransportOptions = {}) {
    super();
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.now = options.now ?? (() => new Date());
    this.maxHistory = options.maxHistory ?? Number.POSITIVE_INFINITY;
  }

  async sendEvent(message: EventMessage, _options: CommandOptions, call: CallOptions = {}): Promise<void> {
    call.signal?.throwIfAborted();
    this.entries.push({ message, sentAt: this.now() });
    if (this.entries.length > this.maxHistory) {
      this.entries.splice(0, this.entries.length - this.maxHistory);
    }

    const key = eventKey(message.api_name, message.event_name);
    for (const subscriber of this.subscribers) {
      if (subscriber.keys.has(key)) {
        subscriber.queue.put(message);
      }
    }
  }

  consume(
    listenFor: readonly ListenFor[],
    listenerName: string,
    options: ConsumeOptions = {},
  ): AsyncIterable<EventMessage[]> {
    this.sanityCheckListenFor(listenFor);
    return this.stream(listenFor, listenerName, options.signal);
  }

  async acknowledge(...messages: EventMessage[]): Promise<void> {
    for (const message of messages) {
      if (message.native_id === undefined) continue;
      for (const pending of this.pendingByListener.values()) {
        pending.delete(message.native_id);
      }
    }
  }

  history(apiName: string, eventName: string, options: HistoryOptions = {}): AsyncIterable<EventMessage> {
    return this.historyNewestFirst(apiName, eventName, options);
  }

  /** Messages delivered to `listenerName` and not yet acknowledged, oldest first. */
  pending(listenerName: string): EventMessage[] {
    return [...(this.pendingByListener.get(listenerName)?.values() ?? [])];
  }

  private pendingFor(listenerName: string): Map<string, EventMessage> {
    let pending = this.pendingByListener.get(listenerName);
    if (!pending) {
      pending = new Map();
      this.pendingByListener.set(listenerName, pending);
    }
    return pending;
  }

  private deliver(message: EventMessage, listenerName: string): EventMessage {
    this.sequence++;
    const delivered = withNativeId(message, `${listenerName}:${this.sequence}`);
    this.pendingFor(listenerName).set(`${listenerName}:${this.sequence}`, delivered);
    return delivered;
  }

  private async *stream(
    listenFor: readonly ListenFor[],
    listenerName: string,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<EventMessage[]> {
    const subscriber: Subscriber = {
      keys: new Set(listenFor.map(([apiName, eventName]) => eventKey(apiName, eventName))),
      queue: new AsyncQueue<EventMessage>(),
    };
    this.subscribers.add(subscriber);

    try {
      const redelivery = this.pending(listenerName);
      if (redelivery.length > 0) {
        yield redelivery;
      }

      while (!signal?.aborted) {
        let first: EventMessage;
        try {
          first = await subscriber.queue.get(signal);
        } catch (err: unknown) {
          if (err instanceof QueueGetAbortedError) return;
          throw err;
        }

        const batch = [this.deliver(first, listenerName)];
        while (batch.length < this.batchSize) {
          const next = subscriber.queue.getNowait();
          if (next === undefined) break;
          batch.push(this.deliver(next, listenerName));
        }
        yield batch;
      }
    } finally {
      this.subscribers.delete(subscriber);
    }
  }

  private async *historyNewestFirst(
    apiName: string,
    eventName: string,
    options: HistoryOptions,
  ): AsyncGenerator<EventMessage> {
    const { start, stop, startInclusive = true } = options;

    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry === undefined) continue;
      if (entry.message.api_name !== apiName || entry.message.event_name !== eventName) continue;

      const at = entry.sentAt.getTime();
      if (stop && at > stop.getTime()) continue;
      if (start) {
        if (at < start.getTime()) continue;
        if (!startInclusive && at === start.getTime()) continue;
      }

      yield entry.message;
    }
  }
}

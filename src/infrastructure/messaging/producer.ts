import type { Logger } from 'pino';
import { toError } from '../../domain/index.js';
import type { AsyncQueue } from './async-queue.js';
import { CompletionSignal } from './completion-signal.js';
import { sleep } from './sleep.js';

/** A command paired with the signal set once its handler has finished. */
export interface QueuedCommand<C> {
  readonly command: C;
  readonly done: CompletionSignal;
}

/** Shared channel receiving every uncaught background error. */
export type ErrorQueue = AsyncQueue<Error>;

export interface InternalProducerOptions {
  /** Queue size at or above which growth warnings are logged. */
  sizeWarning?: number;
  monitorIntervalMs?: number;
  /** Label used in log lines to tell producers apart. */
  name?: string;
}

const DEFAULT_SIZE_WARNING = 5;
const DEFAULT_MONITOR_INTERVAL_MS = 100;

/**
 * Puts commands onto the shared queue for an InternalConsumer.
 *
 * Commands are executed concurrently by the consumer. Callers that need
 * to know when a command has been handled await the returned signal.
 */
export class InternalProducer<C extends NonNullable<unknown>> {
  readonly sizeWarning: number;
  readonly monitorIntervalMs: number;
  readonly name: string;

  private monitorTask: Promise<void> | null = null;
  private monitorController: AbortController | null = null;
  private monitorReady = new CompletionSignal();

  constructor(
    private readonly queue: AsyncQueue<QueuedCommand<C>>,
    private readonly errorQueue: ErrorQueue,
    private readonly log: Logger,
    options: InternalProducerOptions = {},
  ) {
    this.sizeWarning = options.sizeWarning ?? DEFAULT_SIZE_WARNING;
    this.monitorIntervalMs = options.monitorIntervalMs ?? DEFAULT_MONITOR_INTERVAL_MS;
    this.name = options.name ?? 'InternalProducer';
  }

  /** Starts the queue monitor. */
  start(): void {
    if (this.monitorController) return;

    const controller = new AbortController();
    this.monitorController = controller;
    this.monitorTask = this.queueMonitor(controller.signal).catch((err: unknown) => {
      this.errorQueue.put(toError(err));
    });
  }

  async stop(): Promise<void> {
    if (!this.monitorController) return;

    this.monitorController.abort();
    await this.monitorTask;
    this.monitorController = null;
    this.monitorTask = null;
    this.monitorReady = new CompletionSignal();
  }

  /** Resolves once the monitor loop is running. */
  waitUntilReady(): Promise<void> {
    return this.monitorReady.wait();
  }

  send(command: C): CompletionSignal {
    const done = new CompletionSignal();
    this.queue.put({ command, done });
    return done;
  }

  /** Watches the queue for growth. Logs only; never limits throughput. */
  private async queueMonitor(signal: AbortSignal): Promise<void> {
    this.monitorReady.set();

    let previousSize: number | null = null;
    while (!signal.aborted) {
      const currentSize = this.queue.size;
      const aboveThreshold = currentSize >= this.sizeWarning;

      const hasShrunk = previousSize !== null
        && currentSize < previousSize
        && previousSize >= this.sizeWarning;
      const hasGrown = aboveThreshold && (previousSize === null || currentSize > previousSize);

      if (hasShrunk && aboveThreshold) {
        this.log.warn(
          { queue: this.name, size: currentSize, threshold: this.sizeWarning },
          'Internal queue has shrunk but is still above the warning size',
        );
      } else if (hasShrunk) {
        this.log.info(
          { queue: this.name, size: currentSize, threshold: this.sizeWarning },
          'Internal queue is back to an OK size',
        );
      } else if (hasGrown) {
        this.log.warn(
          { queue: this.name, size: currentSize, threshold: this.sizeWarning },
          'Internal queue has grown',
        );
      }

      previousSize = currentSize;
      await sleep(this.monitorIntervalMs, signal);
    }
  }
}

import type { Logger } from 'pino';
import { toError } from '../../domain/index.js';
import { isAbortError } from './abort.js';
import { QueueGetAbortedError } from './async-queue.js';
import type { AsyncQueue } from './async-queue.js';
import { CompletionSignal } from './completion-signal.js';
import type { ErrorQueue, QueuedCommand } from './producer.js';
import { sleep } from './sleep.js';

/**
 * Executes one command. `signal` aborts when the consumer force-cancels
 * the task during shutdown; handlers stop at their next suspension point,
 * typically by rejecting with an `AbortError`.
 */
export type CommandHandler<C> = (command: C, signal: AbortSignal) => Promise<void>;

interface RunningTask {
  readonly controller: AbortController;
  readonly settled: Promise<void>;
}

const SHUTDOWN_POLL_STEPS = 100;

/**
 * Takes commands off the shared queue and runs each one in the background.
 *
 * Commands are picked up in FIFO order but complete in any order.
 */
export class InternalConsumer<C extends NonNullable<unknown>> {
  private consumerTask: Promise<void> | null = null;
  private consumerController: AbortController | null = null;
  private readonly runningTasks = new Set<RunningTask>();
  private ready = new CompletionSignal();

  constructor(
    private readonly queue: AsyncQueue<QueuedCommand<C>>,
    private readonly errorQueue: ErrorQueue,
    private readonly log: Logger,
  ) {}

  /** Number of handlers currently executing. */
  get runningCount(): number {
    return this.runningTasks.size;
  }

  /** Starts the consumer loop. Use `stop()` to shut it down. */
  start(handler: CommandHandler<C>): void {
    if (this.consumerController) {
      throw new Error('Consumer already started');
    }

    const controller = new AbortController();
    this.consumerController = controller;
    this.consumerTask = this.consumerLoop(handler, controller.signal).catch((err: unknown) => {
      this.errorQueue.put(toError(err));
    });
  }

  waitUntilReady(): Promise<void> {
    return this.ready.wait();
  }

  /**
   * Two-phase shutdown.
   *
   * 1. Stop taking commands off the queue, so no new task can be created.
   * 2. Give running tasks up to `waitSeconds` to finish, then cancel the rest
   *    and wait for them to wind down.
   *
   * The order matters: cancelling first would let the loop start tasks
   * that are never cancelled.
   */
  async stop(waitSeconds = 1): Promise<void> {
    if (this.consumerController) {
      this.consumerController.abort();
      await this.consumerTask;
      this.consumerController = null;
      this.consumerTask = null;
      this.ready = new CompletionSignal();
    }

    const stepMs = (waitSeconds * 1000) / SHUTDOWN_POLL_STEPS;
    for (let i = 0; i < SHUTDOWN_POLL_STEPS && this.runningTasks.size > 0; i++) {
      await sleep(stepMs);
    }

    const remaining = [...this.runningTasks];
    if (remaining.length > 0) {
      this.log.warn({ count: remaining.length, waitSeconds }, 'Cancelling commands still running after shutdown grace period');
    }
    for (const task of remaining) {
      task.controller.abort();
    }
    await Promise.all(remaining.map((task) => task.settled));
  }

  private async consumerLoop(handler: CommandHandler<C>, signal: AbortSignal): Promise<void> {
    this.ready.set();

    while (!signal.aborted) {
      let item: QueuedCommand<C>;
      try {
        item = await this.queue.get(signal);
      } catch (err: unknown) {
        if (err instanceof QueueGetAbortedError) return;
        throw err;
      }

      // Stopped between the item being handed over and this continuation running
      if (signal.aborted) {
        this.queue.requeue(item);
        return;
      }

      this.handleInBackground(handler, item.command, item.done);
    }
  }

  /**
   * Runs `handler(command)` as a tracked background task.
   *
   * Once the handler settles, the task leaves the running set, the queue
   * item is marked done and `done` is set. Handler errors go to the error
   * channel, not through `done`. An `AbortError` after cancellation is not
   * an error.
   */
  handleInBackground(handler: CommandHandler<C>, command: C, done: CompletionSignal): void {
    const controller = new AbortController();
    const run = (async () => handler(command, controller.signal))();

    const task: RunningTask = {
      controller,
      settled: run
        .then(
          () => undefined,
          (err: unknown) => {
            if (controller.signal.aborted && isAbortError(err)) return;
            this.errorQueue.put(toError(err));
          },
        )
        .finally(() => {
          this.runningTasks.delete(task);
          this.queue.taskDone();
          done.set();
        }),
    };

    this.runningTasks.add(task);
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AsyncQueue, InternalProducer } from '../../src/infrastructure/messaging/index.js';
import type { QueuedCommand } from '../../src/infrastructure/messaging/index.js';
import { fakeLogger } from '../helpers.js';

describe('InternalProducer', () => {
  let queue: AsyncQueue<QueuedCommand<string>>;
  let errors: AsyncQueue<Error>;
  let log: ReturnType<typeof fakeLogger>;
  let producer: InternalProducer<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    queue = new AsyncQueue();
    errors = new AsyncQueue();
    log = fakeLogger();
    producer = new InternalProducer(queue, errors, log, { sizeWarning: 5, monitorIntervalMs: 100, name: 'test' });
  });

  afterEach(async () => {
    await producer.stop();
    vi.useRealTimers();
  });

  it('send() enqueues the command with an unset completion signal', () => {
    const done = producer.send('cmd');
    expect(done.isSet).toBe(false);
    const item = queue.getNowait();
    expect(item?.command).toBe('cmd');
    expect(item?.done).toBe(done);
  });

  it('uses the default thresholds when none are given', () => {
    const p = new InternalProducer(queue, errors, log);
    expect(p.sizeWarning).toBe(5);
    expect(p.monitorIntervalMs).toBe(100);
  });

  it('waitUntilReady() resolves once the monitor is running', async () => {
    producer.start();
    await expect(producer.waitUntilReady()).resolves.toBeUndefined();
  });

  it('warns when the queue grows past the threshold, once per growth', async () => {
    producer.start();
    for (let i = 0; i < 5; i++) producer.send(`cmd-${i}`);

    await vi.advanceTimersByTimeAsync(100);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenLastCalledWith({ queue: 'test', size: 5, threshold: 5 }, 'Internal queue has grown');

    // Unchanged size: no new warning
    await vi.advanceTimersByTimeAsync(100);
    expect(log.warn).toHaveBeenCalledTimes(1);

    producer.send('cmd-5');
    await vi.advanceTimersByTimeAsync(100);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenLastCalledWith({ queue: 'test', size: 6, threshold: 5 }, 'Internal queue has grown');
  });

  it('reports shrinking above the threshold, then recovery below it', async () => {
    producer.start();
    for (let i = 0; i < 6; i++) producer.send(`cmd-${i}`);
    await vi.advanceTimersByTimeAsync(100);

    queue.getNowait();
    await vi.advanceTimersByTimeAsync(100);
    expect(log.warn).toHaveBeenLastCalledWith(
      { queue: 'test', size: 5, threshold: 5 },
      'Internal queue has shrunk but is still above the warning size',
    );

    queue.getNowait();
    await vi.advanceTimersByTimeAsync(100);
    expect(log.info).toHaveBeenCalledWith({ queue: 'test', size: 4, threshold: 5 }, 'Internal queue is back to an OK size');

    queue.getNowait();
    await vi.advanceTimersByTimeAsync(100);
    expect(log.info).toHaveBeenCalledTimes(1);
  });

  it('stays quiet below the threshold', async () => {
    producer.start();
    producer.send('a');
    await vi.advanceTimersByTimeAsync(300);
    expect(log.warn).not.toHaveBeenCalled();
    expect(log.info).not.toHaveBeenCalled();
  });

  it('stop() is idempotent', async () => {
    producer.start();
    await producer.stop();
    await producer.stop();
    expect(errors.size).toBe(0);
  });
});

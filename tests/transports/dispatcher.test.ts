import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  acknowledgeEvent,
  consumeEvents,
  receiveEvent,
  sendEvent,
  NothingToListenForError,
  UnrecognisedCommandError,
} from '../../src/domain/index.js';
import type { ClientCommand, EventMessage, TransportCommand } from '../../src/domain/index.js';
import { AsyncQueue, InternalProducer } from '../../src/infrastructure/messaging/index.js';
import type { QueuedCommand } from '../../src/infrastructure/messaging/index.js';
import {
  EventTransport,
  MemoryEventTransport,
  TransportDispatcher,
} from '../../src/infrastructure/transports/index.js';
import { fakeLogger, makeMessage } from '../helpers.js';

class BrokenStreamTransport extends EventTransport {
  consume(): AsyncIterable<EventMessage[]> {
    return (async function* () {
      throw new Error('stream broke');
    })();
  }
}

describe('TransportDispatcher', () => {
  let transport: MemoryEventTransport;
  let errors: AsyncQueue<Error>;
  let log: ReturnType<typeof fakeLogger>;
  let dispatcher: TransportDispatcher;

  beforeEach(() => {
    transport = new MemoryEventTransport();
    errors = new AsyncQueue();
    log = fakeLogger();
    dispatcher = new TransportDispatcher({ eventTransport: transport, errorQueue: errors, log });
  });

  afterEach(async () => {
    await dispatcher.close();
  });

  it('sends events through the transport', async () => {
    const spy = vi.spyOn(transport, 'sendEvent');
    const message = makeMessage();
    await dispatcher.handle(sendEvent(message, { stream: 'orders' }));
    expect(spy).toHaveBeenCalledWith(message, { stream: 'orders' }, { signal: undefined });
  });

  it('passes the cancellation signal to the transport', async () => {
    const spy = vi.spyOn(transport, 'sendEvent');
    const controller = new AbortController();
    const message = makeMessage();
    await dispatcher.handle(sendEvent(message), controller.signal);
    expect(spy).toHaveBeenCalledWith(message, {}, { signal: controller.signal });
  });

  it('does nothing for a command cancelled before it ran', async () => {
    const sendSpy = vi.spyOn(transport, 'sendEvent');
    const ackSpy = vi.spyOn(transport, 'acknowledge');
    const controller = new AbortController();
    controller.abort();

    await expect(dispatcher.handle(sendEvent(makeMessage()), controller.signal)).rejects.toThrow(
      'This operation was aborted',
    );
    await expect(dispatcher.handle(acknowledgeEvent(makeMessage()), controller.signal)).rejects.toThrow(
      'This operation was aborted',
    );
    expect(sendSpy).not.toHaveBeenCalled();
    expect(ackSpy).not.toHaveBeenCalled();
  });

  it('acknowledges events through the transport', async () => {
    const spy = vi.spyOn(transport, 'acknowledge');
    const message = makeMessage({ native_id: 'billing:1' });
    await dispatcher.handle(acknowledgeEvent(message));
    expect(spy).toHaveBeenCalledWith(message);
  });

  it('puts consumed messages on the destination queue without a client channel', async () => {
    const destination = new AsyncQueue<EventMessage>();
    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], destination, 'billing'));
    expect(dispatcher.consuming).toEqual(['billing']);

    await transport.sendEvent(makeMessage({ id: 'm1' }), {});

    const received = await destination.get();
    expect(received.id).toBe('m1');
    expect(received.native_id).toBe('billing:1');
  });

  it('sends consumed messages to the client as receive_event commands', async () => {
    const toClientQueue = new AsyncQueue<QueuedCommand<ClientCommand>>();
    const toClient = new InternalProducer(toClientQueue, errors, log);
    dispatcher = new TransportDispatcher({ eventTransport: transport, errorQueue: errors, log, toClient });

    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], new AsyncQueue<EventMessage>(), 'billing'));
    await transport.sendEvent(makeMessage({ id: 'm1' }), {});
    await transport.sendEvent(makeMessage({ id: 'm2' }), {});

    const first = await toClientQueue.get();
    expect(first.command).toEqual(receiveEvent(transport.pending('billing')[0] ?? makeMessage(), 'billing'));
    // The next message waits until the client has handled this one
    expect(toClientQueue.size).toBe(0);

    first.done.set();
    const second = await toClientQueue.get();
    expect(second.command.message.id).toBe('m2');
    second.done.set();
  });

  it('ignores a second consume for the same listener', async () => {
    const destination = new AsyncQueue<EventMessage>();
    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], destination, 'billing'));
    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], destination, 'billing'));

    expect(dispatcher.consuming).toEqual(['billing']);
    expect(log.warn).toHaveBeenCalledWith(
      { listener: 'billing' },
      'Already consuming events for listener, ignoring',
    );
  });

  it('fails the consume command for an empty listen-for list', async () => {
    await expect(
      dispatcher.handle(consumeEvents([], new AsyncQueue<EventMessage>(), 'billing')),
    ).rejects.toBeInstanceOf(NothingToListenForError);
  });

  it('forwards consume loop failures to the error channel', async () => {
    dispatcher = new TransportDispatcher({ eventTransport: new BrokenStreamTransport(), errorQueue: errors, log });
    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], new AsyncQueue<EventMessage>(), 'billing'));

    await vi.waitFor(() => expect(errors.size).toBe(1));
    expect(errors.getNowait()?.message).toBe('stream broke');
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ listener: 'billing' }),
      'Event consume loop failed',
    );
  });

  it('rejects unknown commands', async () => {
    const bogus = { type: 'bogus' } as unknown as TransportCommand;
    await expect(dispatcher.handle(bogus)).rejects.toThrow(UnrecognisedCommandError);
    await expect(dispatcher.handle(bogus)).rejects.toThrow('Did not recognise command bogus');
  });

  it('close() stops every consume loop', async () => {
    const destination = new AsyncQueue<EventMessage>();
    await dispatcher.handle(consumeEvents([['shop', 'order_placed']], destination, 'billing'));
    await dispatcher.close();

    expect(dispatcher.consuming).toEqual([]);
    await transport.sendEvent(makeMessage(), {});
    expect(destination.size).toBe(0);
  });
});

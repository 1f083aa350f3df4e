import {
  NothingToListenForError,
  UnsupportedOperationError,
} from '../../domain/index.js';
import type {
  Api,
  CommandOptions,
  EventMessage,
  ListenFor,
  ResultMessage,
  RpcMessage,
} from '../../domain/index.js';

/** JSON-compatible API schema as stored by a schema transport. */
export type ApiSchema = Readonly<Record<string, unknown>>;

export interface ConsumeOptions {
  /** Ends the sequence, including while it is waiting for messages. */
  signal?: AbortSignal;
}

export interface CallOptions {
  /** Aborts the call at its next suspension point. */
  signal?: AbortSignal;
}

export interface HistoryOptions {
  start?: Date;
  stop?: Date;
  /** Whether a message timestamped exactly at `start` is included. Defaults to true. */
  startInclusive?: boolean;
}

/**
 * Lifecycle shared by every transport role.
 *
 * `open()` and `close()` are each called once per instance by the owner
 * of the transport.
 */
export abstract class Transport {
  async open(): Promise<void> {
    // No-op by default
  }

  async close(): Promise<void> {
    // No-op by default
  }

  protected unsupported(operation: string, detail = `does not support ${operation}()`): UnsupportedOperationError {
    return new UnsupportedOperationError(`Transport ${this.constructor.name} ${detail}`);
  }
}

/** Sending and receiving of RPC calls. */
export abstract class RpcTransport extends Transport {
  /** Publishes a call to a remote procedure. */
  async callRpc(_message: RpcMessage, _options: CommandOptions): Promise<void> {
    throw this.unsupported('callRpc');
  }

  /** Returns pending RPC calls for the given APIs. */
  async consumeRpcs(_apis: readonly Api[]): Promise<RpcMessage[]> {
    throw this.unsupported('consumeRpcs');
  }
}

/** Delivery of RPC results back to the caller. */
export abstract class ResultTransport extends Transport {
  /** Where the result for `message` should be delivered. */
  getReturnPath(_message: RpcMessage): string {
    throw this.unsupported('getReturnPath');
  }

  async sendResult(_rpcMessage: RpcMessage, _resultMessage: ResultMessage, _returnPath: string): Promise<void> {
    throw this.unsupported('sendResult');
  }

  async receiveResult(_rpcMessage: RpcMessage, _returnPath: string, _options: CommandOptions): Promise<ResultMessage> {
    throw this.unsupported('receiveResult');
  }
}

/** Publishing and consumption of events. */
export abstract class EventTransport extends Transport {
  async sendEvent(_message: EventMessage, _options: CommandOptions, _call?: CallOptions): Promise<void> {
    throw this.unsupported('sendEvent');
  }

  /**
   * Yields batches of messages for the given `[api, event]` pairs.
   *
   * The sequence never ends on its own; aborting `options.signal` stops it
   * and calling `consume()` again reopens it. Implementations call
   * `sanityCheckListenFor()` first.
   */
  consume(
    _listenFor: readonly ListenFor[],
    _listenerName: string,
    _options?: ConsumeOptions,
  ): AsyncIterable<EventMessage[]> {
    throw this.unsupported('consume', 'does not support listening for events');
  }

  /**
   * Acknowledges that messages were processed.
   *
   * No-op by default, for transports without at-least-once delivery.
   */
  async acknowledge(..._messages: EventMessage[]): Promise<void> {
    // No-op by default
  }

  /** Past messages for one event, newest first. */
  history(_apiName: string, _eventName: string, _options?: HistoryOptions): AsyncIterable<EventMessage> {
    throw this.unsupported('history', 'does not support event history');
  }

  protected sanityCheckListenFor(listenFor: readonly ListenFor[]): void {
    if (listenFor.length === 0) {
      throw new NothingToListenForError(
        'consume() was called without providing anything to listen for in the "listenFor" argument',
      );
    }
  }
}

/** Sharing of API schemas between processes. */
export abstract class SchemaTransport extends Transport {
  async store(_apiName: string, _schema: ApiSchema, _ttlSeconds: number): Promise<void> {
    throw this.unsupported('store');
  }

  /** Keeps a stored schema alive. Defaults to storing it again, which refreshes the TTL. */
  async ping(apiName: string, schema: ApiSchema, ttlSeconds: number): Promise<void> {
    await this.store(apiName, schema, ttlSeconds);
  }

  /** Every currently stored schema, keyed by API name. */
  async load(): Promise<Record<string, ApiSchema>> {
    throw this.unsupported('load');
  }
}

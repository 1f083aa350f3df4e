import type { Logger } from 'pino';
import {
  ApiRegistry,
  EventClient,
  JsonSchemaValidator,
  PluginRegistry,
  Schema,
} from './application/index.js';
import type { BusPlugin, SchemaValidator } from './application/index.js';
import type { Api, ClientCommand, TransportCommand } from './domain/index.js';
import { toError } from './domain/index.js';
import { loadConfig } from './infrastructure/config/index.js';
import type { Config } from './infrastructure/config/index.js';
import { createLogger } from './infrastructure/logging/index.js';
import {
  AsyncQueue,
  InternalConsumer,
  InternalProducer,
  QueueGetAbortedError,
} from './infrastructure/messaging/index.js';
import type { ErrorQueue, QueuedCommand } from './infrastructure/messaging/index.js';
import { TransportDispatcher } from './infrastructure/transports/index.js';
import type { EventTransport, SchemaTransport } from './infrastructure/transports/index.js';

export interface CreateBusOptions {
  eventTransport: EventTransport;
  schemaTransport?: SchemaTransport;
  /** Defaults to `loadConfig()`. */
  config?: Config;
  /** APIs this process is authoritative for. */
  apis?: readonly Api[];
  plugins?: readonly BusPlugin[];
  validator?: SchemaValidator;
  log?: Logger;
  /** Called with every error raised in a background task, after it is logged. */
  onError?: (err: Error) => Promise<void> | void;
}

interface BackgroundTask {
  readonly controller: AbortController;
  readonly task: Promise<void>;
}

/**
 * A bus client: the event client, the transport side and the two
 * command channels between them.
 *
 * Lifecycle:
 * 1) `start()` opens transports, initialises plugins and starts the
 *    producers, consumers and monitors
 * 2) `client.fireEvent()` / `client.listen()`
 * 3) `close()` shuts everything down in reverse
 */
export class Bus {
  readonly client: EventClient;
  readonly schema: Schema;
  readonly apis = new ApiRegistry();
  /** Every error raised in a background task lands here. */
  readonly errors: ErrorQueue = new AsyncQueue<Error>();

  private readonly config: Config;
  private readonly log: Logger;
  private readonly plugins: PluginRegistry;
  private readonly eventTransport: EventTransport;
  private readonly schemaTransport: SchemaTransport | null;
  private readonly onError: CreateBusOptions['onError'];

  private readonly toTransportProducer: InternalProducer<TransportCommand>;
  private readonly toTransportConsumer: InternalConsumer<TransportCommand>;
  private readonly toClientProducer: InternalProducer<ClientCommand>;
  private readonly toClientConsumer: InternalConsumer<ClientCommand>;
  private readonly dispatcher: TransportDispatcher;

  private errorMonitor: BackgroundTask | null = null;
  private schemaMonitor: BackgroundTask | null = null;
  private started = false;

  constructor(options: CreateBusOptions) {
    this.config = options.config ?? loadConfig();
    this.log = options.log ?? createLogger({ name: 'busline' });
    this.eventTransport = options.eventTransport;
    this.schemaTransport = options.schemaTransport ?? null;
    this.onError = options.onError;

    this.plugins = new PluginRegistry(this.log.child({ component: 'plugins' }));
    for (const plugin of options.plugins ?? []) {
      this.plugins.register(plugin);
    }

    this.schema = new Schema(this.schemaTransport, this.config, this.log.child({ component: 'schema' }));
    for (const api of options.apis ?? []) {
      this.addApi(api);
    }

    const { internal_queue_size_warning, monitor_interval_ms } = this.config.bus;
    const producerOptions = { sizeWarning: internal_queue_size_warning, monitorIntervalMs: monitor_interval_ms };
    const channelLog = this.log.child({ component: 'channel' });

    const toTransportQueue = new AsyncQueue<QueuedCommand<TransportCommand>>();
    this.toTransportProducer = new InternalProducer(toTransportQueue, this.errors, channelLog, {
      ...producerOptions,
      name: 'client_to_transport',
    });
    this.toTransportConsumer = new InternalConsumer(toTransportQueue, this.errors, channelLog);

    const toClientQueue = new AsyncQueue<QueuedCommand<ClientCommand>>();
    this.toClientProducer = new InternalProducer(toClientQueue, this.errors, channelLog, {
      ...producerOptions,
      name: 'transport_to_client',
    });
    this.toClientConsumer = new InternalConsumer(toClientQueue, this.errors, channelLog);

    this.dispatcher = new TransportDispatcher({
      eventTransport: this.eventTransport,
      toClient: this.toClientProducer,
      errorQueue: this.errors,
      log: this.log.child({ component: 'transport_dispatcher' }),
    });

    this.client = new EventClient({
      config: this.config,
      apiRegistry: this.apis,
      schema: this.schema,
      validator: options.validator ?? new JsonSchemaValidator(),
      plugins: this.plugins,
      producer: this.toTransportProducer,
      errorQueue: this.errors,
      log: this.log.child({ component: 'event_client' }),
    });
  }

  get isStarted(): boolean {
    return this.started;
  }

  /** Registers an API as provided by this process. */
  addApi(api: Api): void {
    this.apis.add(api);
    this.schema.addApi(api);
  }

  async start(): Promise<void> {
    if (this.started) return;

    await this.eventTransport.open();
    await this.schemaTransport?.open();
    await this.plugins.init();

    this.toTransportProducer.start();
    this.toClientProducer.start();
    await Promise.all([
      this.toTransportProducer.waitUntilReady(),
      this.toClientProducer.waitUntilReady(),
    ]);

    this.toTransportConsumer.start((command, signal) => this.dispatcher.handle(command, signal));
    this.toClientConsumer.start((command, signal) => this.client.handle(command, signal));

    this.errorMonitor = this.runInBackground((signal) => this.monitorErrors(signal), (err) => {
      this.log.fatal({ err }, 'Error monitor failed');
    });

    if (this.schemaTransport) {
      await this.schema.publish();
      await this.schema.loadFromTransport();
      this.schemaMonitor = this.runInBackground((signal) => this.schema.monitor(signal), (err) => {
        this.errors.put(err);
      });
    }

    this.started = true;
    this.log.info({ apis: this.apis.names() }, 'Bus started');
  }

  async close(): Promise<void> {
    if (!this.started) return;

    const waitSeconds = this.config.bus.consumer_stop_wait_seconds;

    await this.client.close();
    await this.dispatcher.close();

    await this.toClientConsumer.stop(waitSeconds);
    await this.toTransportConsumer.stop(waitSeconds);
    await this.toClientProducer.stop();
    await this.toTransportProducer.stop();

    await this.stopBackground(this.schemaMonitor);
    this.schemaMonitor = null;
    await this.stopBackground(this.errorMonitor);
    this.errorMonitor = null;

    // Errors raised during shutdown, after the monitor stopped
    for (let err = this.errors.getNowait(); err !== undefined; err = this.errors.getNowait()) {
      await this.reportError(err);
      this.errors.taskDone();
    }

    await this.plugins.teardown();
    await this.schemaTransport?.close();
    await this.eventTransport.close();

    this.started = false;
    this.log.info('Bus closed');
  }

  private runInBackground(
    run: (signal: AbortSignal) => Promise<void>,
    onFailure: (err: Error) => void,
  ): BackgroundTask {
    const controller = new AbortController();
    const task = run(controller.signal).catch((err: unknown) => onFailure(toError(err)));
    return { controller, task };
  }

  private async stopBackground(background: BackgroundTask | null): Promise<void> {
    if (!background) return;
    background.controller.abort();
    await background.task;
  }

  private async monitorErrors(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let err: Error;
      try {
        err = await this.errors.get(signal);
      } catch (getErr: unknown) {
        if (getErr instanceof QueueGetAbortedError) return;
        throw getErr;
      }

      try {
        await this.reportError(err);
      } finally {
        this.errors.taskDone();
      }
    }
  }

  private async reportError(err: Error): Promise<void> {
    this.log.error({ err }, 'Unhandled error in background task');
    if (!this.onError) return;

    try {
      await this.onError(err);
    } catch (callbackErr: unknown) {
      this.log.error({ err: callbackErr }, 'onError callback failed');
    }
  }
}

export function createBus(options: CreateBusOptions): Bus {
  return new Bus(options);
}

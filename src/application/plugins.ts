import type { Logger } from 'pino';
import type { EventMessage } from '../domain/index.js';

export interface HookContext {
  readonly eventMessage: EventMessage;
}

export type HookName =
  | 'before_event_sent'
  | 'after_event_sent'
  | 'before_event_execution'
  | 'after_event_execution';

type Hook = (context: HookContext) => Promise<void> | void;

/**
 * Extension point for the event client. Every method is optional.
 */
export interface BusPlugin {
  readonly name: string;
  init?(): Promise<void> | void;
  teardown?(): Promise<void> | void;
  beforeEventSent?: Hook;
  afterEventSent?: Hook;
  beforeEventExecution?: Hook;
  afterEventExecution?: Hook;
}

const HOOK_METHODS = {
  before_event_sent: 'beforeEventSent',
  after_event_sent: 'afterEventSent',
  before_event_execution: 'beforeEventExecution',
  after_event_execution: 'afterEventExecution',
} as const satisfies Record<HookName, keyof BusPlugin>;

/** Plugins for a single bus, run in registration order. */
export class PluginRegistry {
  private readonly plugins: BusPlugin[] = [];

  constructor(private readonly log: Logger) {}

  get registered(): readonly BusPlugin[] {
    return this.plugins;
  }

  register(plugin: BusPlugin): void {
    this.plugins.push(plugin);
  }

  async init(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.init?.();
    }
  }

  /** Tears plugins down in reverse registration order. */
  async teardown(): Promise<void> {
    for (const plugin of [...this.plugins].reverse()) {
      await plugin.teardown?.();
    }
  }

  async executeHook(name: HookName, context: HookContext): Promise<void> {
    const method = HOOK_METHODS[name];
    for (const plugin of this.plugins) {
      const hook = plugin[method];
      if (!hook) continue;
      this.log.trace({ plugin: plugin.name, hook: name }, 'Executing plugin hook');
      await hook.call(plugin, context);
    }
  }
}

import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createEventMessage } from '../src/domain/index.js';
import type { Api, EventMessage, Kwargs } from '../src/domain/index.js';
import { Config } from '../src/infrastructure/config/index.js';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

let counter = 0;

/** Factory for event messages with sensible defaults. */
export function makeMessage(overrides: Partial<EventMessage> = {}): EventMessage {
  counter++;
  return createEventMessage({
    id: overrides.id ?? `msg-${counter}`,
    api_name: overrides.api_name ?? 'shop',
    event_name: overrides.event_name ?? 'order_placed',
    version: overrides.version ?? 1,
    kwargs: overrides.kwargs ?? ({ order_id: counter } satisfies Kwargs),
    ...(overrides.native_id !== undefined ? { native_id: overrides.native_id } : {}),
  });
}

export const shopApi: Api = {
  name: 'shop',
  version: 1,
  events: {
    order_placed: { parameters: ['order_id'] },
  },
};

export function defaultConfig(overrides: unknown = {}): Config {
  return Config.fromObject(overrides);
}

export { Transport, RpcTransport, ResultTransport, EventTransport, SchemaTransport } from './base.js';
export type { ApiSchema, CallOptions, ConsumeOptions, HistoryOptions } from './base.js';
export { MemoryEventTransport } from './memory-event-transport.js';
export type { MemoryEventTransportOptions } from './memory-event-transport.js';
export { MemorySchemaTransport } from './memory-schema-transport.js';
export type { MemorySchemaTransportOptions, StoredSchema } from './memory-schema-transport.js';
export { TransportDispatcher } from './dispatcher.js';
export type { TransportDispatcherDeps } from './dispatcher.js';

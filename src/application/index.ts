export { EventClient, sanityCheckListener } from './event-client.js';
export type { EventClientDeps, EventListener, ListenOptions } from './event-client.js';
export { ApiRegistry } from './api-registry.js';
export { PluginRegistry } from './plugins.js';
export type { BusPlugin, HookContext, HookName } from './plugins.js';
export { Schema, apiSchema, eventSchema } from './schema.js';
export type { EventSchema } from './schema.js';
export { JsonSchemaValidator } from './validator.js';
export type { SchemaValidator } from './validator.js';
export { castToSignature } from './casting.js';
export type { ParameterSchema } from './casting.js';
export { deformToBus, deformKwargs } from './deform.js';
export { validateEventOrRpcName, validateApiName } from './names.js';
export type { MemberKind } from './names.js';

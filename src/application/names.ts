import { InvalidNameError } from '../domain/index.js';

const MEMBER_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;
const API_NAME = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)*$/;

export type MemberKind = 'event' | 'rpc';

/**
 * Checks an event or RPC name before it is used on the bus.
 * Names starting with an underscore are reserved.
 */
export function validateEventOrRpcName(apiName: string, kind: MemberKind, name: string): void {
  if (!name) {
    throw new InvalidNameError(`Empty ${kind} name specified when calling API ${apiName}`);
  }
  if (name.startsWith('_')) {
    throw new InvalidNameError(
      `You can not use '${apiName}.${name}' as an ${kind} because it starts with an underscore. `
        + 'API attributes starting with underscores are not available on the bus.',
    );
  }
  if (!MEMBER_NAME.test(name)) {
    throw new InvalidNameError(
      `Invalid ${kind} name '${name}' on API ${apiName}. Names must start with a letter `
        + 'and contain only letters, digits and underscores.',
    );
  }
}

/** API names are one or more dot-separated identifiers, e.g. `shop.orders`. */
export function validateApiName(apiName: string): void {
  if (!API_NAME.test(apiName)) {
    throw new InvalidNameError(
      `Invalid API name '${apiName}'. API names are dot-separated identifiers, e.g. 'shop.orders'.`,
    );
  }
}

import type { Api } from '../domain/index.js';
import { validateApiName, validateEventOrRpcName } from './names.js';

/** APIs this process is authoritative for. */
export class ApiRegistry {
  private readonly apis = new Map<string, Api>();

  /** Registers an API, replacing any earlier one with the same name. */
  add(api: Api): void {
    validateApiName(api.name);
    for (const eventName of Object.keys(api.events)) {
      validateEventOrRpcName(api.name, 'event', eventName);
    }
    this.apis.set(api.name, api);
  }

  get(apiName: string): Api | undefined {
    return this.apis.get(apiName);
  }

  names(): string[] {
    return [...this.apis.keys()];
  }

  all(): Api[] {
    return [...this.apis.values()];
  }
}

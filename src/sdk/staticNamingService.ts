import type { Endpoint, NamingService } from "./types.js";

/**
 * In-memory naming service. Endpoint lists are set by hand and handed out as
 * copies, so callers never share arrays with the registry.
 */
export class StaticNamingService implements NamingService {
  private readonly services = new Map<string, Endpoint[]>();

  constructor(services?: Record<string, Endpoint[]>) {
    for (const [name, endpoints] of Object.entries(services ?? {})) {
      this.set(name, endpoints);
    }
  }

  set(serviceName: string, endpoints: Endpoint[]): void {
    this.services.set(serviceName, copyEndpoints(endpoints));
  }

  delete(serviceName: string): void {
    this.services.delete(serviceName);
  }

  async list(serviceNames: Set<string>): Promise<Map<string, Endpoint[]>> {
    const result = new Map<string, Endpoint[]>();
    for (const name of serviceNames) {
      const endpoints = this.services.get(name);
      if (endpoints) {
        result.set(name, copyEndpoints(endpoints));
      }
    }
    return result;
  }
}

export function copyEndpoints(endpoints: readonly Endpoint[]): Endpoint[] {
  return endpoints.map(({ host, port }) => ({ host, port }));
}

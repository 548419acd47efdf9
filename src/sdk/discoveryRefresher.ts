import { createLogger, type Logger } from "../logger.js";
import { ConfigurationError } from "./errors.js";
import { copyEndpoints } from "./staticNamingService.js";
import type {
  Endpoint,
  NamingService,
  ReInitCallback,
  RefresherOptions,
} from "./types.js";

/**
 * Periodically polls a naming service and re-applies changed endpoint lists.
 *
 * Every service in the snapshot is looked up in one batched call per cycle.
 * A list counts as changed when it differs element by element from the last
 * one seen, so a reordering is a change too. Failed cycles are logged and the
 * next one runs on schedule.
 *
 * @example
 * ```ts
 * const refresher = new DiscoveryRefresher({
 *   namingService,
 *   reInit: (service, endpoints) => strategy.reInitialize(service, endpoints),
 *   delayMs: 1000,
 *   periodMs: 1000,
 * });
 * refresher.start(new Map([["echo", initialEndpoints]]));
 * ```
 */
export class DiscoveryRefresher {
  private readonly namingService?: NamingService;
  private readonly reInit: ReInitCallback;
  private readonly delayMs: number;
  private readonly periodMs: number;
  private readonly logger: Logger;
  private snapshot = new Map<string, Endpoint[]>();
  private delayTimer?: ReturnType<typeof setTimeout>;
  private periodTimer?: ReturnType<typeof setInterval>;
  private running = false;
  private inFlight = false;
  // bumped on every start and stop; a cycle from an older run applies nothing
  private generation = 0;

  constructor(options: RefresherOptions) {
    assertPositive("delayMs", options.delayMs);
    assertPositive("periodMs", options.periodMs);

    this.namingService = options.namingService;
    this.reInit = options.reInit;
    this.delayMs = options.delayMs;
    this.periodMs = options.periodMs;
    this.logger = options.logger ?? createLogger("discovery");
  }

  /**
   * Start refreshing. Does nothing without a naming service or when already
   * running. The snapshot map is copied; later changes to it are not seen.
   */
  start(serviceMap: ReadonlyMap<string, readonly Endpoint[]>): void {
    if (!this.namingService || this.running) {
      return;
    }

    this.snapshot = new Map();
    for (const [service, endpoints] of serviceMap) {
      this.snapshot.set(service, copyEndpoints(endpoints));
    }
    this.running = true;
    this.generation++;

    this.delayTimer = setTimeout(() => {
      this.delayTimer = undefined;
      this.tick();
      this.periodTimer = setInterval(() => this.tick(), this.periodMs);
      this.periodTimer.unref();
    }, this.delayMs);
    this.delayTimer.unref();
  }

  /**
   * Stop refreshing. A cycle still waiting on the naming service applies
   * nothing once it resumes, even if the refresher was started again.
   */
  stop(): void {
    this.running = false;
    this.generation++;
    if (this.delayTimer) {
      clearTimeout(this.delayTimer);
      this.delayTimer = undefined;
    }
    if (this.periodTimer) {
      clearInterval(this.periodTimer);
      this.periodTimer = undefined;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Last endpoint list seen for a service.
   */
  getSnapshot(serviceName: string): Endpoint[] | undefined {
    const endpoints = this.snapshot.get(serviceName);
    return endpoints ? copyEndpoints(endpoints) : undefined;
  }

  /**
   * Run one refresh cycle. Never rejects.
   */
  async refresh(): Promise<void> {
    const namingService = this.namingService;
    if (!namingService || !this.running) {
      return;
    }
    const generation = this.generation;
    const snapshot = this.snapshot;

    try {
      const serviceNames = new Set(snapshot.keys());
      const latest =
        (await namingService.list(serviceNames)) ??
        new Map<string, Endpoint[]>();

      for (const [service, oldList] of snapshot) {
        // stopped (or restarted) while the lookup was pending
        if (generation !== this.generation) {
          return;
        }

        const newList = latest.get(service) ?? [];
        if (sameEndpoints(oldList, newList)) {
          continue;
        }

        const list = copyEndpoints(newList);
        this.logger.warn(
          `A new changed list getting from naming service name='${service}' value=${formatEndpoints(list)}`,
        );
        snapshot.set(service, list);
        await this.reInit(service, copyEndpoints(list));
      }
    } catch (error) {
      this.logger.warn(
        `Naming service refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }

  private tick(): void {
    if (this.inFlight) {
      return;
    }
    this.inFlight = true;
    void this.refresh().finally(() => {
      this.inFlight = false;
    });
  }
}

export function sameEndpoints(
  a: readonly Endpoint[],
  b: readonly Endpoint[],
): boolean {
  return (
    a.length === b.length &&
    a.every((endpoint, i) => endpoint.host === b[i].host && endpoint.port === b[i].port)
  );
}

function formatEndpoints(endpoints: readonly Endpoint[]): string {
  return `[${endpoints.map((e) => `${e.host}:${e.port}`).join(", ")}]`;
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive number of milliseconds, got ${value}.`,
    );
  }
}

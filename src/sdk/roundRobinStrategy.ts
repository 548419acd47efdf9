import { loadConfig } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { DiscoveryRefresher } from "./discoveryRefresher.js";
import { DiscoveryError, NotInitializedError } from "./errors.js";
import { copyEndpoints } from "./staticNamingService.js";
import {
  endpointKey,
  type Endpoint,
  type NamingService,
  type NamingServiceLoadBalanceStrategy,
  type StrategyOptions,
  type TargetChange,
  type TargetStatus,
} from "./types.js";
import { buildElectionSequence, normalizeWeight } from "./weights.js";

const DEFAULT_WEIGHT = 1;

type Discovery = {
  serviceName: string;
  namingService: NamingService;
  endpoints: Endpoint[];
};

/**
 * Weighted round-robin election over a set of targets.
 *
 * Weights are reduced to their smallest equivalent ratio and expanded into a
 * sequence that `elect()` walks through, wrapping at the end. Every
 * membership change rebuilds the sequence and restarts the rotation.
 *
 * All methods are synchronous, so an election always sees either the whole
 * sequence before a change or the whole sequence after it.
 *
 * @example
 * ```ts
 * const strategy = new RoundRobinLoadBalanceStrategy({
 *   "10.0.0.1:8080": 2,
 *   "10.0.0.2:8080": 1,
 * });
 *
 * strategy.elect(); // "10.0.0.1:8080"
 * strategy.elect(); // "10.0.0.1:8080"
 * strategy.elect(); // "10.0.0.2:8080"
 * ```
 */
export class RoundRobinLoadBalanceStrategy
  implements NamingServiceLoadBalanceStrategy
{
  private targets?: string[];
  private currentPos = 0;
  private currentTargets = new Map<string, number>();
  private failedTargets = new Map<string, number>();
  private discovery?: Discovery;
  private refresher?: DiscoveryRefresher;
  private refreshTimings?: { delayMs: number; periodMs: number };
  // no change events while fromDiscovery is still building the strategy
  private building = false;
  private readonly options: StrategyOptions;
  private readonly logger: Logger;

  constructor(
    weights: Map<string, number> | Record<string, number>,
    options: StrategyOptions = {},
  ) {
    this.options = options;
    this.logger = options.logger ?? createLogger("load-balancer");
    this.init(
      weights instanceof Map ? weights : new Map(Object.entries(weights)),
    );
  }

  /**
   * Build a strategy from the current endpoints of `serviceName`.
   * Rejects with `DiscoveryError` when the lookup fails.
   */
  static async fromDiscovery(
    serviceName: string,
    namingService: NamingService,
    options: StrategyOptions = {},
  ): Promise<RoundRobinLoadBalanceStrategy> {
    const strategy = new RoundRobinLoadBalanceStrategy({}, options);
    strategy.building = true;
    try {
      await strategy.doReInit(serviceName, namingService);
    } finally {
      strategy.building = false;
    }
    return strategy;
  }

  elect(): string {
    if (!this.targets) {
      throw new NotInitializedError();
    }
    if (this.currentPos >= this.targets.length) {
      this.currentPos = 0;
    }
    return this.targets[this.currentPos++];
  }

  getTargets(): Set<string> {
    return new Set(this.targets ?? []);
  }

  hasTargets(): boolean {
    return this.getTargets().size > 0;
  }

  removeTarget(target: string): void {
    const weight = this.currentTargets.get(target);
    if (weight === undefined) {
      return;
    }
    this.currentTargets.delete(target);
    this.failedTargets.set(target, weight);
    this.reInitTargets();
    this.notify({ kind: "removed", target });
  }

  recoverTarget(target: string): void {
    const weight = this.failedTargets.get(target);
    if (weight === undefined) {
      return;
    }
    this.failedTargets.delete(target);
    this.currentTargets.set(target, weight);
    this.reInitTargets();
    this.notify({ kind: "recovered", target });
  }

  getFailedTargets(): Set<string> {
    return new Set(this.failedTargets.keys());
  }

  /**
   * Weights of the targets eligible for election.
   */
  getWeights(): ReadonlyMap<string, number> {
    return new Map(this.currentTargets);
  }

  /**
   * Weights recorded for removed targets, restored on recovery.
   */
  getFailedWeights(): ReadonlyMap<string, number> {
    return new Map(this.failedTargets);
  }

  getStatus(): TargetStatus[] {
    return [
      ...Array.from(this.currentTargets, ([target, weight]) => ({
        target,
        weight,
        healthy: true,
      })),
      ...Array.from(this.failedTargets, ([target, weight]) => ({
        target,
        weight,
        healthy: false,
      })),
    ];
  }

  /**
   * Replace every target with the given endpoints at the default weight.
   * Removed targets are forgotten: the naming service is authoritative.
   */
  reInitialize(serviceName: string, endpoints: readonly Endpoint[]): void {
    if (this.discovery?.serviceName === serviceName) {
      this.discovery.endpoints = copyEndpoints(endpoints);
    }
    this.init(
      new Map(
        endpoints.map((endpoint): [string, number] => [
          endpointKey(endpoint),
          DEFAULT_WEIGHT,
        ]),
      ),
    );
    this.notify({ kind: "reinitialized", serviceName });
  }

  async doReInit(
    serviceName: string,
    namingService: NamingService,
  ): Promise<void> {
    let endpoints: Endpoint[];
    try {
      const result = await namingService.list(new Set([serviceName]));
      endpoints = result?.get(serviceName) ?? [];
    } catch (error) {
      throw new DiscoveryError(serviceName, error);
    }

    // a running refresher still tracks the previous list (or service)
    const timings = this.refresher?.isRunning() ? this.refreshTimings : undefined;
    this.stopRefresh();

    this.discovery = { serviceName, namingService, endpoints: [] };
    this.reInitialize(serviceName, endpoints);

    if (timings) {
      this.startRefresh(timings.delayMs, timings.periodMs);
    }
  }

  /**
   * Start polling the naming service this strategy was built from.
   * Does nothing for a strategy built from fixed weights.
   */
  startRefresh(delayMs?: number, periodMs?: number): void {
    if (!this.discovery || this.refresher?.isRunning()) {
      return;
    }

    let delay = delayMs ?? this.options.refreshDelayMs;
    let period = periodMs ?? this.options.refreshPeriodMs;
    if (delay === undefined || period === undefined) {
      const config = loadConfig();
      delay = delay ?? config.refreshDelayMs;
      period = period ?? config.refreshPeriodMs;
    }

    const discovery = this.discovery;
    this.refresher = new DiscoveryRefresher({
      namingService: discovery.namingService,
      reInit: (serviceName, endpoints) =>
        this.reInitialize(serviceName, endpoints),
      delayMs: delay,
      periodMs: period,
      logger: this.logger,
    });
    this.refreshTimings = { delayMs: delay, periodMs: period };
    this.refresher.start(new Map([[discovery.serviceName, discovery.endpoints]]));
    this.logger.info(
      `Refreshing "${discovery.serviceName}" from naming service`,
    );
  }

  stopRefresh(): void {
    this.refresher?.stop();
  }

  close(): void {
    this.stopRefresh();
  }

  private init(weights: ReadonlyMap<string, number>): void {
    this.currentTargets = new Map();
    for (const [target, weight] of weights) {
      this.currentTargets.set(target, normalizeWeight(weight));
    }
    this.failedTargets = new Map();
    this.reInitTargets();
  }

  private reInitTargets(): void {
    this.targets = buildElectionSequence(this.currentTargets);
    this.currentPos = 0;
  }

  private notify(
    change: Omit<TargetChange, "targets" | "timestamp">,
  ): void {
    const callback = this.options.onTargetsChanged;
    if (!callback || this.building) {
      return;
    }

    const event: TargetChange = {
      ...change,
      targets: Array.from(this.getTargets()),
      timestamp: Date.now(),
    };

    // Fire and forget - never let a listener break election
    try {
      Promise.resolve(callback(event)).catch((error: unknown) => {
        this.logger.error("Error in targets changed callback:", error);
      });
    } catch (error) {
      this.logger.error("Error in targets changed callback:", error);
    }
  }
}

import type { Logger } from "../logger.js";

/**
 * One addressable backend instance of a logical service.
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Mapping from target id (conventionally `host:port`) to its weight.
 */
export type WeightTable = ReadonlyMap<string, number>;

/**
 * Service registry lookup used to discover the endpoints of each service.
 */
export interface NamingService {
  /**
   * Resolve the current endpoints of every requested service.
   * Services the registry does not know may be left out of the result.
   */
  list(serviceNames: Set<string>): Promise<Map<string, Endpoint[]>>;
}

/**
 * Election operations exposed to the RPC client.
 */
export interface LoadBalanceStrategy {
  /** Pick the target for the next call */
  elect(): string;
  /** Distinct targets currently eligible for election */
  getTargets(): Set<string>;
  hasTargets(): boolean;
  /** Take a target out of service, keeping its weight for recovery */
  removeTarget(target: string): void;
  /** Put a previously removed target back at its recorded weight */
  recoverTarget(target: string): void;
  getFailedTargets(): Set<string>;
}

/**
 * A strategy that can rebuild itself from a naming service lookup.
 */
export interface NamingServiceLoadBalanceStrategy extends LoadBalanceStrategy {
  doReInit(serviceName: string, namingService: NamingService): Promise<void>;
}

/**
 * Membership change reported to `onTargetsChanged`.
 */
export interface TargetChange {
  kind: "removed" | "recovered" | "reinitialized";
  /** Target removed or recovered */
  target?: string;
  /** Service whose endpoint list was re-applied */
  serviceName?: string;
  /** Targets eligible for election after the change */
  targets: string[];
  /** Timestamp of the change */
  timestamp: number;
}

/**
 * Callback invoked after each membership change.
 */
export type TargetChangeCallback = (change: TargetChange) => void | Promise<void>;

/**
 * Options for the round-robin strategy.
 */
export interface StrategyOptions {
  /** Delay before the first refresh (default: LB_REFRESH_DELAY_MS or 1000) */
  refreshDelayMs?: number;
  /** Time between refreshes (default: LB_REFRESH_PERIOD_MS or 1000) */
  refreshPeriodMs?: number;
  /**
   * Optional: called after every membership change. Not called for the
   * initial lookup of `fromDiscovery`.
   */
  onTargetsChanged?: TargetChangeCallback;
  /** Optional: logger (default: console logger) */
  logger?: Logger;
}

/**
 * Status information for a known target.
 */
export interface TargetStatus {
  target: string;
  weight: number;
  healthy: boolean;
}

/**
 * Callback the refresher invokes with a changed endpoint list.
 */
export type ReInitCallback = (
  serviceName: string,
  endpoints: Endpoint[],
) => void | Promise<void>;

/**
 * Options for the discovery refresher.
 */
export interface RefresherOptions {
  /** Naming service to poll. Without one the refresher never starts. */
  namingService?: NamingService;
  reInit: ReInitCallback;
  /** Delay in milliseconds before the first refresh */
  delayMs: number;
  /** Time in milliseconds between successive refreshes */
  periodMs: number;
  logger?: Logger;
}

export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

// SDK - Weighted round-robin election and naming service refresh
export {
  RoundRobinLoadBalanceStrategy,
  DiscoveryRefresher,
  StaticNamingService,
  buildElectionSequence,
  reductionFactor,
  endpointKey,
  ConfigurationError,
  DiscoveryError,
  LoadBalancerError,
  NotInitializedError,
} from "./sdk/index.js";
export type {
  Endpoint,
  LoadBalanceStrategy,
  NamingService,
  NamingServiceLoadBalanceStrategy,
  StrategyOptions,
  TargetChange,
  TargetStatus,
} from "./sdk/index.js";

// Configuration and logging
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

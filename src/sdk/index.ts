export { RoundRobinLoadBalanceStrategy } from "./roundRobinStrategy.js";
export { DiscoveryRefresher, sameEndpoints } from "./discoveryRefresher.js";
export { StaticNamingService } from "./staticNamingService.js";
export {
  buildElectionSequence,
  getDivisors,
  normalizeWeight,
  reductionFactor,
} from "./weights.js";
export {
  ConfigurationError,
  DiscoveryError,
  LoadBalancerError,
  NotInitializedError,
} from "./errors.js";
export { endpointKey } from "./types.js";
export type {
  Endpoint,
  LoadBalanceStrategy,
  NamingService,
  NamingServiceLoadBalanceStrategy,
  ReInitCallback,
  RefresherOptions,
  StrategyOptions,
  TargetChange,
  TargetChangeCallback,
  TargetStatus,
  WeightTable,
} from "./types.js";

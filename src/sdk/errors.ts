/**
 * Base class for every error raised by the load balancer.
 */
export class LoadBalancerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by `elect()` when there is no election sequence to draw from.
 */
export class NotInitializedError extends LoadBalancerError {
  constructor() {
    super("Load balancer is not initialized: no target is available.");
  }
}

/**
 * Raised when the naming service lookup fails while building a strategy.
 */
export class DiscoveryError extends LoadBalancerError {
  readonly serviceName: string;

  constructor(serviceName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Naming service lookup failed for "${serviceName}": ${reason}`, {
      cause,
    });
    this.serviceName = serviceName;
  }
}

export class ConfigurationError extends LoadBalancerError {}

import { ConfigurationError } from "./sdk/errors.js";

/**
 * Refresh timing configuration.
 *
 * Values can be overridden via environment variables.
 */
export interface Config {
  /** Delay before the first naming service refresh (LB_REFRESH_DELAY_MS) */
  refreshDelayMs: number;
  /** Time between naming service refreshes (LB_REFRESH_PERIOD_MS) */
  refreshPeriodMs: number;
}

export const DEFAULT_REFRESH_DELAY_MS = 1000;
export const DEFAULT_REFRESH_PERIOD_MS = 1000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    refreshDelayMs: positiveInt(
      "LB_REFRESH_DELAY_MS",
      env.LB_REFRESH_DELAY_MS,
      DEFAULT_REFRESH_DELAY_MS,
    ),
    refreshPeriodMs: positiveInt(
      "LB_REFRESH_PERIOD_MS",
      env.LB_REFRESH_PERIOD_MS,
      DEFAULT_REFRESH_PERIOD_MS,
    ),
  };
}

function positiveInt(
  name: string,
  val: string | undefined,
  fallback: number,
): number {
  if (val === undefined || val.trim() === "") {
    return fallback;
  }
  const parsed = Number(val);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${val}".`,
    );
  }
  return parsed;
}

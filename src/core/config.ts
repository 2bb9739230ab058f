import debug from "debug";
import type { EngineConfig, EngineTimeouts } from "../types";

const log = debug("box-provision:config");

const MINUTE_MS = 60_000;

export const DEFAULT_TIMEOUTS: Readonly<EngineTimeouts> = Object.freeze({
  taskMs: 5 * MINUTE_MS,
  setupCommandMs: 10 * MINUTE_MS,
  packageQueryMs: 2 * MINUTE_MS,
});

export const ENV_KEYS = {
  disableParallel: "PROVISION_DISABLE_PARALLEL",
  maxWorkers: "PROVISION_MAX_WORKERS",
  setupWorkers: "PROVISION_SETUP_WORKERS",
  queryWorkers: "PROVISION_QUERY_WORKERS",
  setupTimeoutMs: "PROVISION_SETUP_TIMEOUT_MS",
  queryTimeoutMs: "PROVISION_QUERY_TIMEOUT_MS",
} as const;

const POSITIVE_INTEGER = /^\+?\d+$/;

/** Largest delay a Node.js timer honours; longer delays fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function defaultConfig(): EngineConfig {
  return Object.freeze({
    enableParallel: true,
    maxWorkers: 4,
    setupCommandWorkers: 3,
    packageQueryWorkers: 5,
    timeouts: DEFAULT_TIMEOUTS,
  });
}

/**
 * Builds the engine configuration from the defaults and the `PROVISION_*`
 * overrides in `env`. Overrides that are not positive integers, or that exceed
 * the longest timer delay, are ignored.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const defaults = defaultConfig();

  const config: EngineConfig = Object.freeze({
    enableParallel: env[ENV_KEYS.disableParallel] !== "true",
    maxWorkers: readPositiveInt(env, ENV_KEYS.maxWorkers, defaults.maxWorkers),
    setupCommandWorkers: readPositiveInt(
      env,
      ENV_KEYS.setupWorkers,
      defaults.setupCommandWorkers
    ),
    packageQueryWorkers: readPositiveInt(
      env,
      ENV_KEYS.queryWorkers,
      defaults.packageQueryWorkers
    ),
    timeouts: Object.freeze({
      taskMs: defaults.timeouts.taskMs,
      setupCommandMs: readPositiveInt(
        env,
        ENV_KEYS.setupTimeoutMs,
        defaults.timeouts.setupCommandMs
      ),
      packageQueryMs: readPositiveInt(
        env,
        ENV_KEYS.queryTimeoutMs,
        defaults.timeouts.packageQueryMs
      ),
    }),
  });

  log("Loaded config:", config);
  return config;
}

function readPositiveInt(
  env: Record<string, string | undefined>,
  key: string,
  fallback: number
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!POSITIVE_INTEGER.test(raw)) {
    log(`Ignoring ${key}=${raw}: not a positive integer`);
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (value <= 0 || value > MAX_TIMER_DELAY_MS) {
    log(`Ignoring ${key}=${raw}: out of range`);
    return fallback;
  }
  return value;
}

import {
  isRetryPolicy,
  remapCaps,
  retryPolicies,
  type RemapTuning,
  type RetryPolicy
} from "../../application/remap-identifiers/remap.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 600000 }
} as const;

export const defaultTimeoutMs = 60000;

export type RuntimeConfig = {
  remapTuning: Partial<RemapTuning>;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalRetryPolicy = (env: NodeJS.ProcessEnv, name: string): RetryPolicy | undefined => {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!isRetryPolicy(raw)) {
    throw new Error(`${name}=${raw} must be one of ${retryPolicies.join(", ")}`);
  }
  return raw;
};

/**
 * Tuning from the environment. Only keys that are set appear in `remapTuning`,
 * so CLI flags and defaults can be layered on top.
 */
export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const remapTuning: Partial<RemapTuning> = {};

  const chunkSize = parseOptionalIntInRange(env, "REMAP_CHUNK_SIZE", remapCaps.chunkSize);
  if (chunkSize != null) remapTuning.chunkSize = chunkSize;

  const sleepMs = parseOptionalIntInRange(env, "REMAP_SLEEP_MS", remapCaps.sleepMs);
  if (sleepMs != null) remapTuning.sleepMs = sleepMs;

  const maxRetries = parseOptionalIntInRange(env, "REMAP_MAX_RETRIES", remapCaps.maxRetries);
  if (maxRetries != null) remapTuning.maxRetries = maxRetries;

  const concurrency = parseOptionalIntInRange(env, "REMAP_CONCURRENCY", remapCaps.concurrency);
  if (concurrency != null) remapTuning.concurrency = concurrency;

  const outputFormat = env.REMAP_OUTPUT_FORMAT?.trim();
  if (outputFormat) remapTuning.outputFormat = outputFormat;

  const retryPolicy = parseOptionalRetryPolicy(env, "REMAP_RETRY_POLICY");
  if (retryPolicy) remapTuning.retryPolicy = retryPolicy;

  const timeoutMs = parseOptionalIntInRange(env, "MAPPING_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultTimeoutMs;

  return { remapTuning, timeoutMs };
};

export const retryPolicies = ["retry_all", "skip_client_errors"] as const;

export type RetryPolicy = (typeof retryPolicies)[number];

export type RemapTuning = {
  chunkSize: number;
  sleepMs: number;
  maxRetries: number;
  concurrency: number;
  outputFormat: string;
  retryPolicy: RetryPolicy;
};

export type RemapJobConfig = RemapTuning & {
  sourceNamespace: string;
  targetNamespace: string;
  contactEmail: string;
};

export type RemapJobConfigInput = Partial<RemapTuning> & {
  sourceNamespace?: string;
  targetNamespace?: string;
  contactEmail?: string;
};

export const defaultRemapTuning: RemapTuning = {
  chunkSize: 1000,
  sleepMs: 5000,
  maxRetries: 10,
  concurrency: 1,
  outputFormat: "tab",
  retryPolicy: "retry_all"
};

export const remapCaps = {
  chunkSize: { min: 1, max: 100000 },
  sleepMs: { min: 0, max: 600000 },
  maxRetries: { min: 0, max: 1000 },
  concurrency: { min: 1, max: 16 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const isRetryPolicy = (value: string): value is RetryPolicy =>
  retryPolicies.some((policy) => policy === value);

export const validateRemapTuning = (tuning: RemapTuning): RemapTuning => {
  assertIntegerInRange("chunkSize", tuning.chunkSize, remapCaps.chunkSize.min, remapCaps.chunkSize.max);
  assertIntegerInRange("sleepMs", tuning.sleepMs, remapCaps.sleepMs.min, remapCaps.sleepMs.max);
  assertIntegerInRange("maxRetries", tuning.maxRetries, remapCaps.maxRetries.min, remapCaps.maxRetries.max);
  assertIntegerInRange("concurrency", tuning.concurrency, remapCaps.concurrency.min, remapCaps.concurrency.max);
  if (tuning.outputFormat.trim() === "") {
    throw new Error("outputFormat must not be empty");
  }
  if (!isRetryPolicy(tuning.retryPolicy)) {
    throw new Error(`retryPolicy must be one of ${retryPolicies.join(", ")}. Received: ${String(tuning.retryPolicy)}`);
  }
  return tuning;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

const requireString = (name: string, value: string | undefined): string => {
  const normalized = normalizeOptionalString(value);
  if (normalized == null) {
    throw new Error(`${name} is required`);
  }
  return normalized;
};

export const resolveRemapJobConfig = (input: RemapJobConfigInput): RemapJobConfig => {
  const tuning = validateRemapTuning({
    chunkSize: input.chunkSize ?? defaultRemapTuning.chunkSize,
    sleepMs: input.sleepMs ?? defaultRemapTuning.sleepMs,
    maxRetries: input.maxRetries ?? defaultRemapTuning.maxRetries,
    concurrency: input.concurrency ?? defaultRemapTuning.concurrency,
    outputFormat: normalizeOptionalString(input.outputFormat) ?? defaultRemapTuning.outputFormat,
    retryPolicy: input.retryPolicy ?? defaultRemapTuning.retryPolicy
  });

  return {
    ...tuning,
    sourceNamespace: requireString("sourceNamespace", input.sourceNamespace),
    targetNamespace: requireString("targetNamespace", input.targetNamespace),
    contactEmail: requireString("contactEmail", input.contactEmail)
  };
};

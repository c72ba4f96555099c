#!/usr/bin/env node
import { parseArgs } from "util";
import { runRemap, type RemapOptions } from "../composition/root";
import { isRetryPolicy, retryPolicies, type RemapTuning } from "../application/remap-identifiers/remap.config";
import { runtimeCaps } from "../shared/config/runtime.config";

type ErrorContext = Partial<{
  chunksTotal: number;
  chunksFailed: number;
  firstFailedChunk: number;
}>;

type CliErrorEnvelope = {
  event: "remap.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

export type CliCommand = { kind: "help" } | { kind: "run"; options: RemapOptions };

export class CliUsageError extends Error {
  readonly code = "invalid_argument";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const usage = `Usage: id-remap -i <file> -f <from> -t <to> -o <file> -e <email> [options]

Maps identifiers listed one per line in <file> from one namespace to another.

  -i, --input <file>           identifiers to map, one per line
  -f, --from-id <namespace>    source namespace
  -t, --to-id <namespace>      target namespace
  -o, --output <file>          where the mapping table is written
  -e, --email <address>        contact address sent to the service (or REMAP_CONTACT_EMAIL)
  -m, --output-format <fmt>    requested response format (default: tab)
  -c, --chunk-size <n>         identifiers per request (default: 1000)
  -s, --sleep <seconds>        pause between chunks and retries (default: 5)
  -r, --retries <n>            retries per chunk before giving up (default: 10)
      --concurrency <n>        chunks in flight at once (default: 1)
      --retry-policy <policy>  ${retryPolicies.join(" | ")} (default: retry_all)
      --timeout-ms <ms>        per-request timeout (default: 60000)
      --allow-partial          exit 0 even if some chunks failed
  -h, --help                   show this help
`;

const allowedContextKeys: Array<keyof ErrorContext> = ["chunksTotal", "chunksFailed", "firstFailedChunk"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

const parseIntegerFlag = (flag: string, raw: string | undefined): number | undefined => {
  if (raw == null) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new CliUsageError(`--${flag} must be an integer. Received: ${raw}`);
  }
  return value;
};

const parseSecondsFlag = (flag: string, raw: string | undefined): number | undefined => {
  if (raw == null) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0) {
    throw new CliUsageError(`--${flag} must be a non-negative number of seconds. Received: ${raw}`);
  }
  return Math.round(value * 1000);
};

const requireFlag = (flag: string, value: string | undefined): string => {
  if (value == null || value.trim() === "") {
    throw new CliUsageError(`--${flag} is required`);
  }
  return value;
};

const cliOptions = {
  input: { type: "string", short: "i" },
  "from-id": { type: "string", short: "f" },
  "to-id": { type: "string", short: "t" },
  output: { type: "string", short: "o" },
  email: { type: "string", short: "e" },
  "output-format": { type: "string", short: "m" },
  "chunk-size": { type: "string", short: "c" },
  sleep: { type: "string", short: "s" },
  retries: { type: "string", short: "r" },
  concurrency: { type: "string" },
  "retry-policy": { type: "string" },
  "timeout-ms": { type: "string" },
  "allow-partial": { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false }
} as const;

const parseRawArgs = (argv: string[]) =>
  parseArgs({ args: argv, options: cliOptions, allowPositionals: false, strict: true });

export const parseCliArgs = (argv: string[]): CliCommand => {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const { values } = parsed;
  if (values.help) return { kind: "help" };

  const tuning: Partial<RemapTuning> = {};
  const chunkSize = parseIntegerFlag("chunk-size", values["chunk-size"]);
  if (chunkSize != null) tuning.chunkSize = chunkSize;
  const sleepMs = parseSecondsFlag("sleep", values.sleep);
  if (sleepMs != null) tuning.sleepMs = sleepMs;
  const maxRetries = parseIntegerFlag("retries", values.retries);
  if (maxRetries != null) tuning.maxRetries = maxRetries;
  const concurrency = parseIntegerFlag("concurrency", values.concurrency);
  if (concurrency != null) tuning.concurrency = concurrency;
  if (values["output-format"] != null) tuning.outputFormat = values["output-format"];

  const retryPolicy = values["retry-policy"];
  if (retryPolicy != null) {
    if (!isRetryPolicy(retryPolicy)) {
      throw new CliUsageError(`--retry-policy must be one of ${retryPolicies.join(", ")}. Received: ${retryPolicy}`);
    }
    tuning.retryPolicy = retryPolicy;
  }

  const timeoutMs = parseIntegerFlag("timeout-ms", values["timeout-ms"]);
  if (timeoutMs != null && (timeoutMs < runtimeCaps.timeoutMs.min || timeoutMs > runtimeCaps.timeoutMs.max)) {
    throw new CliUsageError(
      `--timeout-ms=${timeoutMs} is out of allowed range [${runtimeCaps.timeoutMs.min}..${runtimeCaps.timeoutMs.max}]`
    );
  }

  const options: RemapOptions = {
    input: requireFlag("input", values.input),
    from: requireFlag("from-id", values["from-id"]),
    to: requireFlag("to-id", values["to-id"]),
    output: requireFlag("output", values.output),
    tuning,
    allowPartial: values["allow-partial"] === true
  };
  if (values.email != null) options.email = values.email;
  if (timeoutMs != null) options.timeoutMs = timeoutMs;

  return { kind: "run", options };
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "remap.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeRemapCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      process.stdout.write(usage);
      return;
    }
    await runRemap(command.options, { signal: controller.signal });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", cancel);
    process.removeListener("SIGTERM", cancel);
  }
};

if (require.main === module) {
  void executeRemapCli();
}

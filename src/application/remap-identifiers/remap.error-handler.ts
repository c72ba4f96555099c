import { MappingProtocolError, MappingTransportError } from "../../core/remap/mapping.errors";
import type { ChunkFailureReason, ChunkResult } from "../../core/remap/remap.types";

export type RemapFailureCode = "chunks_failed" | "artifact_write_failed" | "run_record_failed";

export type RemapErrorContext = {
  chunksTotal: number;
  chunksFailed: number;
  firstFailedChunk?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class RemapIncompleteError extends Error {
  readonly code: RemapFailureCode;
  readonly context: RemapErrorContext;

  constructor(args: { message: string; context: RemapErrorContext }) {
    super(args.message);
    this.name = "RemapIncompleteError";
    this.code = "chunks_failed";
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The job ran, but its output could not be stored.
 */
export class RemapFatalError extends Error {
  readonly code: RemapFailureCode;
  readonly context: { runId: string; outputPath: string };
  readonly cause?: unknown;

  constructor(args: {
    code: Exclude<RemapFailureCode, "chunks_failed">;
    message: string;
    context: { runId: string; outputPath: string };
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "RemapFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapPersistFailure = (
  code: "artifact_write_failed" | "run_record_failed",
  reason: unknown,
  context: { runId: string; outputPath: string }
): RemapFatalError => {
  const what = code === "artifact_write_failed" ? "Artifact write" : "Run record";
  const message = `${what} failed for run=${context.runId}, path=${context.outputPath}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new RemapFatalError({ code, message, context, cause });
};

type AttemptErrorFields = {
  status: number | null;
  timeout: boolean;
  message: string;
};

/**
 * Log-safe view of an attempt error: never the response body, never the identifiers.
 */
export const describeAttemptError = (error: unknown): AttemptErrorFields => {
  if (error instanceof MappingProtocolError) {
    return { status: error.status, timeout: false, message: error.message };
  }
  if (error instanceof MappingTransportError) {
    return { status: null, timeout: error.isTimeout, message: error.message };
  }
  return { status: null, timeout: false, message: toErrorMessage(error) };
};

export type ChunkRetryLog = AttemptErrorFields & {
  event: "remap.chunk_retry";
  chunk: number;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
};

export type ChunkFailedLog = Partial<AttemptErrorFields> & {
  event: "remap.chunk_failed";
  chunk: number;
  reason: ChunkFailureReason;
  attempts: number;
  maxAttempts: number;
  identifiers: number;
};

export const buildChunkRetryLog = (ctx: {
  chunk: number;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}): ChunkRetryLog => ({
  event: "remap.chunk_retry",
  chunk: ctx.chunk,
  attempt: ctx.attempt,
  maxAttempts: ctx.maxAttempts,
  delayMs: ctx.delayMs,
  ...describeAttemptError(ctx.error)
});

export const buildChunkFailedLog = (ctx: {
  chunk: number;
  reason: ChunkFailureReason;
  attempts: number;
  maxAttempts: number;
  identifiers: number;
  error?: unknown;
}): ChunkFailedLog => {
  const log: ChunkFailedLog = {
    event: "remap.chunk_failed",
    chunk: ctx.chunk,
    reason: ctx.reason,
    attempts: ctx.attempts,
    maxAttempts: ctx.maxAttempts,
    identifiers: ctx.identifiers
  };
  return ctx.error === undefined ? log : { ...log, ...describeAttemptError(ctx.error) };
};

export type RemapRunSummary = {
  chunksTotal: number;
  chunksSucceeded: number;
  chunksFailed: number;
  identifiersTotal: number;
  identifiersMapped: number;
  attempts: number;
  failedByReason: Partial<Record<ChunkFailureReason, number>>;
};

export const summarizeChunks = (chunks: readonly ChunkResult[]): RemapRunSummary => {
  const summary: RemapRunSummary = {
    chunksTotal: chunks.length,
    chunksSucceeded: 0,
    chunksFailed: 0,
    identifiersTotal: 0,
    identifiersMapped: 0,
    attempts: 0,
    failedByReason: {}
  };

  for (const chunk of chunks) {
    summary.identifiersTotal += chunk.identifiers.length;
    summary.attempts += chunk.attempts;
    if (chunk.status === "success") {
      summary.chunksSucceeded += 1;
      summary.identifiersMapped += chunk.identifiers.length;
    } else {
      summary.chunksFailed += 1;
      summary.failedByReason[chunk.reason] = (summary.failedByReason[chunk.reason] ?? 0) + 1;
    }
  }

  return summary;
};

export const createIncompleteError = (chunks: readonly ChunkResult[]): RemapIncompleteError | undefined => {
  const failed = chunks.filter((chunk) => chunk.status === "failed");
  if (failed.length === 0) return undefined;

  const firstFailedChunk = failed[0]?.index;
  const context: RemapErrorContext = { chunksTotal: chunks.length, chunksFailed: failed.length };
  if (firstFailedChunk != null) context.firstFailedChunk = firstFailedChunk;

  return new RemapIncompleteError({
    message: `Not all identifiers were mapped: ${failed.length} of ${chunks.length} chunks failed`,
    context
  });
};

import { randomUUID } from "crypto";
import type { ArtifactWriter } from "../../ports/ArtifactWriter";
import type { MappingClient } from "../../ports/MappingClient";
import type { RemapRunRepository } from "../../ports/RemapRunRepository";
import { createLimiter } from "../../shared/concurrency/limiter";
import { retry } from "../../shared/retry/retry";
import { sleep as defaultSleep, type Sleeper } from "../../shared/retry/sleep";
import { isClientError } from "../../core/remap/mapping.errors";
import { partitionIdentifiers } from "../../core/remap/partition";
import {
  isChunkSuccess,
  type ChunkFailure,
  type ChunkResult,
  type IdentifierSet,
  type JobResult,
  type MappingRequest
} from "../../core/remap/remap.types";
import type { RemapRun, RemapRunStatus } from "../../core/runs/RemapRun";
import { resolveRemapJobConfig, type RemapJobConfig, type RemapJobConfigInput } from "./remap.config";
import {
  buildChunkFailedLog,
  buildChunkRetryLog,
  summarizeChunks,
  toErrorMessage,
  wrapPersistFailure,
  type RemapRunSummary
} from "./remap.error-handler";

export type RemapProgress = {
  completed: number;
  total: number;
  identifiersQueried: number;
};

export type RemapJobDeps = {
  client: MappingClient;
  identifiers: IdentifierSet;
  config: RemapJobConfigInput;
  sleep?: Sleeper;
  signal?: AbortSignal;
  onProgress?: (progress: RemapProgress) => void;
};

const buildShouldRetry = (config: RemapJobConfig) =>
  config.retryPolicy === "skip_client_errors" ? (err: unknown) => !isClientError(err) : () => true;

const canceledBeforeStart = (index: number, identifiers: readonly string[]): ChunkFailure => ({
  status: "failed",
  index,
  identifiers,
  reason: "canceled",
  attempts: 0
});

/**
 * Maps `identifiers` chunk by chunk. Chunk failures are reported in the result, never thrown;
 * only an invalid config rejects.
 */
export const runRemapJob = async (deps: RemapJobDeps): Promise<JobResult> => {
  const { client, signal, onProgress, sleep = defaultSleep } = deps;
  const config = resolveRemapJobConfig(deps.config);
  const partitions = partitionIdentifiers(deps.identifiers, config.chunkSize);
  const limit = createLimiter(config.concurrency);
  const shouldRetry = buildShouldRetry(config);
  const total = partitions.length;

  let completed = 0;
  let identifiersQueried = 0;

  const mapChunk = async (identifiers: readonly string[], index: number): Promise<ChunkResult> => {
    const request: MappingRequest = Object.freeze({
      sourceNamespace: config.sourceNamespace,
      targetNamespace: config.targetNamespace,
      identifiers,
      outputFormat: config.outputFormat
    });

    const outcome = await retry(() => client.send(request, { signal }), {
      retries: config.maxRetries,
      delayMs: config.sleepMs,
      shouldRetry,
      sleep,
      signal,
      onRetry: (ctx) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify(buildChunkRetryLog({ chunk: index, ...ctx })));
      },
      onGiveUp: ({ attempt, maxAttempts, reason, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify(buildChunkFailedLog({
          chunk: index,
          reason,
          attempts: attempt,
          maxAttempts,
          identifiers: identifiers.length,
          error
        })));
      }
    });

    if (outcome.state === "succeeded") {
      return { status: "success", index, identifiers, rawText: outcome.value, attempts: outcome.attempts };
    }

    const failure: ChunkFailure = {
      status: "failed",
      index,
      identifiers,
      reason: outcome.reason,
      attempts: outcome.attempts
    };
    if (outcome.error !== undefined) failure.error = outcome.error;
    return failure;
  };

  // Promise.all keeps slot i for chunk i whatever order the chunks finish in.
  const chunks = await Promise.all(
    partitions.map((partition, index) =>
      limit(async (): Promise<ChunkResult> => {
        const identifiers = Object.freeze(partition);
        if (signal?.aborted) return canceledBeforeStart(index, identifiers);

        const result = await mapChunk(identifiers, index);
        completed += 1;
        identifiersQueried += identifiers.length;
        console.log(JSON.stringify({
          event: "remap.chunk_completed",
          chunk: index,
          status: result.status,
          completed,
          total,
          identifiersQueried
        }));
        try {
          onProgress?.({ completed, total, identifiersQueried });
        } catch (error) {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({ event: "remap.progress_failed", chunk: index, message: toErrorMessage(error) }));
        }

        if (index < total - 1) await sleep(config.sleepMs, signal);
        return result;
      })
    )
  );

  const succeeded = chunks.filter(isChunkSuccess);
  return {
    chunks,
    succeeded: succeeded.length,
    failed: chunks.length - succeeded.length,
    identifiersMapped: succeeded.reduce((sum, chunk) => sum + chunk.identifiers.length, 0)
  };
};

/**
 * Successful chunks' raw text, in chunk order. Failed chunks contribute nothing.
 */
export const assembleMappingArtifact = (result: JobResult): string =>
  result.chunks
    .filter(isChunkSuccess)
    .map((chunk) => chunk.rawText)
    .join("");

export const resolveRunStatus = (chunks: readonly ChunkResult[]): RemapRunStatus => {
  if (chunks.some((chunk) => chunk.status === "failed" && chunk.reason === "canceled")) return "canceled";
  if (chunks.some((chunk) => chunk.status === "failed")) return "partial";
  return "completed";
};

export type RemapToArtifactDeps = Omit<RemapJobDeps, "onProgress"> & {
  writer: ArtifactWriter;
  outputPath: string;
  repo?: RemapRunRepository;
  runId?: string;
  now?: () => Date;
};

export type RemapReport = {
  runId: string;
  status: RemapRunStatus;
  outputPath: string;
  result: JobResult;
  summary: RemapRunSummary;
};

/**
 * Runs a job, writes the (possibly partial) artifact and records the run when a repository is given.
 */
export const remapToArtifact = async (deps: RemapToArtifactDeps): Promise<RemapReport> => {
  const { writer, repo, outputPath, now = () => new Date() } = deps;
  const config = resolveRemapJobConfig(deps.config);
  const runId = deps.runId ?? randomUUID();
  const startedAt = now();

  console.log(JSON.stringify({
    event: "remap.started",
    runId,
    from: config.sourceNamespace,
    to: config.targetNamespace,
    identifiers: deps.identifiers.length,
    chunkSize: config.chunkSize
  }));

  const result = await runRemapJob({
    client: deps.client,
    identifiers: deps.identifiers,
    config,
    sleep: deps.sleep,
    signal: deps.signal
  });

  try {
    await writer.persist(outputPath, assembleMappingArtifact(result));
  } catch (error) {
    throw wrapPersistFailure("artifact_write_failed", error, { runId, outputPath });
  }

  const status = resolveRunStatus(result.chunks);
  const summary = summarizeChunks(result.chunks);

  if (repo) {
    const run: RemapRun = {
      runId,
      status,
      sourceNamespace: config.sourceNamespace,
      targetNamespace: config.targetNamespace,
      outputFormat: config.outputFormat,
      identifierCount: deps.identifiers.length,
      chunkSize: config.chunkSize,
      outputPath,
      chunks: result.chunks.map((chunk) =>
        chunk.status === "success"
          ? { index: chunk.index, size: chunk.identifiers.length, status: chunk.status, attempts: chunk.attempts }
          : {
              index: chunk.index,
              size: chunk.identifiers.length,
              status: chunk.status,
              attempts: chunk.attempts,
              reason: chunk.reason
            }
      ),
      startedAt,
      finishedAt: now()
    };
    try {
      await repo.save(run);
    } catch (error) {
      throw wrapPersistFailure("run_record_failed", error, { runId, outputPath });
    }
  }

  const log = { event: status === "completed" ? "remap.completed" : "remap.incomplete", runId, status, outputPath, ...summary };
  if (status === "completed") {
    console.log(JSON.stringify(log));
  } else {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify(log));
  }

  return { runId, status, outputPath, result, summary };
};

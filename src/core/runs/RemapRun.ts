import type { ChunkFailureReason } from "../remap/remap.types";

export type RemapRunStatus = "completed" | "partial" | "canceled";

export type RemapRunChunk = {
  index: number;
  size: number;
  status: "success" | "failed";
  attempts: number;
  reason?: ChunkFailureReason;
};

/**
 * Audit record of one job. Written once, after the artifact has been persisted.
 */
export type RemapRun = {
  runId: string;
  status: RemapRunStatus;
  sourceNamespace: string;
  targetNamespace: string;
  outputFormat: string;
  identifierCount: number;
  chunkSize: number;
  outputPath: string;
  chunks: RemapRunChunk[];
  startedAt: Date;
  finishedAt: Date;
};

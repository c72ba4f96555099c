import type { GiveUpReason } from "../../shared/retry/retry";

export type IdentifierSet = readonly string[];

export type MappingRequest = Readonly<{
  sourceNamespace: string;
  targetNamespace: string;
  identifiers: readonly string[];
  outputFormat: string;
}>;

export type ChunkFailureReason = GiveUpReason;

export type ChunkSuccess = {
  status: "success";
  index: number;
  identifiers: readonly string[];
  rawText: string;
  attempts: number;
};

export type ChunkFailure = {
  status: "failed";
  index: number;
  identifiers: readonly string[];
  reason: ChunkFailureReason;
  attempts: number;
  error?: unknown;
};

export type ChunkResult = ChunkSuccess | ChunkFailure;

export type JobResult = {
  chunks: ChunkResult[];
  succeeded: number;
  failed: number;
  identifiersMapped: number;
};

export const isChunkSuccess = (chunk: ChunkResult): chunk is ChunkSuccess => chunk.status === "success";

export const isChunkFailure = (chunk: ChunkResult): chunk is ChunkFailure => chunk.status === "failed";

import type { RemapTuning } from "../application/remap-identifiers/remap.config";
import { resolveRemapJobConfig } from "../application/remap-identifiers/remap.config";
import { createIncompleteError, toErrorMessage } from "../application/remap-identifiers/remap.error-handler";
import { remapToArtifact, type RemapReport } from "../application/remap-identifiers/remapIdentifiers.usecase";
import { readIdentifierFile } from "../core/identifiers/readIdentifiers";
import { FileArtifactWriter } from "../infrastructure/fs/FileArtifactWriter";
import { MappingServiceHttpClient } from "../infrastructure/mapping-service/MappingServiceHttpClient";
import { MongoRemapRunRepository } from "../infrastructure/mongo/MongoRemapRunRepository";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type RemapOptions = {
  input: string;
  from: string;
  to: string;
  output: string;
  email?: string;
  tuning: Partial<RemapTuning>;
  timeoutMs?: number;
  allowPartial: boolean;
};

const closeQuietly = async (repo: MongoRemapRunRepository | undefined): Promise<void> => {
  try {
    await repo?.close();
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "remap.repo_close_failed", message: toErrorMessage(error) }));
  }
};

/**
 * Precedence: CLI options, then environment, then defaults.
 */
export const runRemap = async (options: RemapOptions, deps: { signal?: AbortSignal } = {}): Promise<RemapReport> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const config = resolveRemapJobConfig({
    ...runtime.remapTuning,
    ...options.tuning,
    sourceNamespace: options.from,
    targetNamespace: options.to,
    contactEmail: options.email ?? env.REMAP_CONTACT_EMAIL
  });

  const identifiers = await readIdentifierFile(options.input);
  console.log(JSON.stringify({ event: "remap.input_loaded", input: options.input, identifiers: identifiers.length }));

  const client = new MappingServiceHttpClient(
    env.MAPPING_BASE_URL,
    config.contactEmail,
    options.timeoutMs ?? runtime.timeoutMs
  );
  const writer = new FileArtifactWriter();
  const repo = env.MONGO_URI ? new MongoRemapRunRepository(env.MONGO_URI) : undefined;

  try {
    const report = await remapToArtifact({
      client,
      writer,
      repo,
      identifiers,
      config,
      outputPath: options.output,
      signal: deps.signal
    });

    // an interrupted run is never reported as success, even with allowPartial
    if (!options.allowPartial || report.status === "canceled") {
      const incomplete = createIncompleteError(report.result.chunks);
      if (incomplete) throw incomplete;
    }

    return report;
  } finally {
    await closeQuietly(repo);
  }
};

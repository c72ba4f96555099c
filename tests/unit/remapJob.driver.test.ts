import { runRemapJob, assembleMappingArtifact, resolveRunStatus } from "../../src/application/remap-identifiers/remapIdentifiers.usecase";
import type { RemapJobConfigInput } from "../../src/application/remap-identifiers/remap.config";
import { MappingProtocolError, MappingTransportError } from "../../src/core/remap/mapping.errors";
import type { MappingRequest } from "../../src/core/remap/remap.types";
import type { MappingClient } from "../../src/ports/MappingClient";

type Reply = string | Error;

const makeIds = (n: number) => Array.from({ length: n }, (_, i) => `ID${String(i).padStart(5, "0")}`);

const createScriptedClient = (script: (request: MappingRequest, attemptForChunk: number) => Reply) => {
  const calls: MappingRequest[] = [];
  const attemptsByFirstId = new Map<string, number>();

  const client: MappingClient = {
    send: async (request) => {
      calls.push(request);
      const key = request.identifiers[0] ?? "";
      const attempt = (attemptsByFirstId.get(key) ?? 0) + 1;
      attemptsByFirstId.set(key, attempt);

      const reply = script(request, attempt);
      if (reply instanceof Error) throw reply;
      return reply;
    }
  };

  return { client, calls };
};

const echo = (request: MappingRequest) => `mapped:${request.identifiers[0]}..${request.identifiers.length}\n`;

const transportError = () => new MappingTransportError("socket hang up", { requestUrl: "http://mapping.test/" });

const createRecordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
};

const baseConfig: RemapJobConfigInput = {
  sourceNamespace: "P_REFSEQ_AC",
  targetNamespace: "ACC",
  contactEmail: "test@example.org",
  sleepMs: 5000
};

describe("runRemapJob", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("maps 2500 identifiers in three chunks and retries the flaky second chunk", async () => {
    const ids = makeIds(2500);
    const { client, calls } = createScriptedClient((request, attempt) =>
      request.identifiers[0] === "ID01000" && attempt <= 2 ? transportError() : echo(request)
    );
    const { delays, sleep } = createRecordingSleep();

    const result = await runRemapJob({
      client,
      identifiers: ids,
      config: { ...baseConfig, chunkSize: 1000, maxRetries: 2 },
      sleep
    });

    expect(result.chunks.map((chunk) => chunk.status)).toEqual(["success", "success", "success"]);
    expect(result.chunks.map((chunk) => chunk.attempts)).toEqual([1, 3, 1]);
    expect(result.chunks.map((chunk) => chunk.identifiers.length)).toEqual([1000, 1000, 500]);
    expect(result.succeeded).toBe(3);
    expect(result.failed).toBe(0);
    expect(result.identifiersMapped).toBe(2500);
    expect(calls).toHaveLength(5);
    // 2 between chunks + 2 before the retries of chunk 1
    expect(delays).toEqual([5000, 5000, 5000, 5000]);

    const retryLogs = warnSpy.mock.calls.map((call) => JSON.parse(String(call[0])) as Record<string, unknown>);
    expect(retryLogs).toEqual([
      {
        event: "remap.chunk_retry",
        chunk: 1,
        attempt: 1,
        maxAttempts: 3,
        delayMs: 5000,
        status: null,
        timeout: false,
        message: "socket hang up"
      },
      {
        event: "remap.chunk_retry",
        chunk: 1,
        attempt: 2,
        maxAttempts: 3,
        delayMs: 5000,
        status: null,
        timeout: false,
        message: "socket hang up"
      }
    ]);
  });

  it("makes exactly one attempt with maxRetries=0 and reports exhausted retries", async () => {
    const { client, calls } = createScriptedClient(() => transportError());
    const { delays, sleep } = createRecordingSleep();

    const result = await runRemapJob({
      client,
      identifiers: ["A", "B"],
      config: { ...baseConfig, maxRetries: 0 },
      sleep
    });

    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]).toMatchObject({
      status: "failed",
      index: 0,
      identifiers: ["A", "B"],
      reason: "exhausted_retries",
      attempts: 1
    });
    expect(result.failed).toBe(1);
  });

  it("makes no calls for empty input", async () => {
    const { client, calls } = createScriptedClient(echo);
    const { delays, sleep } = createRecordingSleep();

    const result = await runRemapJob({ client, identifiers: [], config: baseConfig, sleep });

    expect(result).toEqual({ chunks: [], succeeded: 0, failed: 0, identifiersMapped: 0 });
    expect(calls).toHaveLength(0);
    expect(delays).toEqual([]);
  });

  it("keeps going after a chunk gives up and reports it in place", async () => {
    const { client } = createScriptedClient((request) => (request.identifiers[0] === "C" ? transportError() : echo(request)));
    const { delays, sleep } = createRecordingSleep();

    const result = await runRemapJob({
      client,
      identifiers: ["A", "B", "C", "D", "E"],
      config: { ...baseConfig, chunkSize: 2, maxRetries: 1, sleepMs: 10 },
      sleep
    });

    expect(result.chunks.map((chunk) => [chunk.index, chunk.status, chunk.attempts])).toEqual([
      [0, "success", 1],
      [1, "failed", 2],
      [2, "success", 1]
    ]);
    expect(delays).toEqual([10, 10, 10]);
    expect(assembleMappingArtifact(result)).toBe("mapped:A..2\nmapped:E..1\n");
    expect(resolveRunStatus(result.chunks)).toBe("partial");

    const failedLog = JSON.parse(String(warnSpy.mock.calls[1]?.[0])) as Record<string, unknown>;
    expect(failedLog).toEqual({
      event: "remap.chunk_failed",
      chunk: 1,
      reason: "exhausted_retries",
      attempts: 2,
      maxAttempts: 2,
      identifiers: 2,
      status: null,
      timeout: false,
      message: "socket hang up"
    });
  });

  it("builds one frozen request per chunk with the job's namespaces and format", async () => {
    const { client, calls } = createScriptedClient(echo);

    await runRemapJob({
      client,
      identifiers: ["A", "B", "C"],
      config: { ...baseConfig, chunkSize: 2, outputFormat: "list" },
      sleep: async () => undefined
    });

    expect(calls).toEqual([
      { sourceNamespace: "P_REFSEQ_AC", targetNamespace: "ACC", identifiers: ["A", "B"], outputFormat: "list" },
      { sourceNamespace: "P_REFSEQ_AC", targetNamespace: "ACC", identifiers: ["C"], outputFormat: "list" }
    ]);
    expect(Object.isFrozen(calls[0])).toBe(true);
    expect(Object.isFrozen(calls[0]?.identifiers)).toBe(true);
  });

  it("keeps results in input order when chunks run concurrently", async () => {
    const latencyByFirstId: Record<string, number> = { A: 40, C: 20, E: 1 };
    let inFlight = 0;
    let maxInFlight = 0;

    const client: MappingClient = {
      send: async (request) => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((r) => setTimeout(r, latencyByFirstId[request.identifiers[0] ?? ""] ?? 1));
        inFlight -= 1;
        return echo(request);
      }
    };

    const result = await runRemapJob({
      client,
      identifiers: ["A", "B", "C", "D", "E"],
      config: { ...baseConfig, chunkSize: 2, concurrency: 3 },
      sleep: async () => undefined
    });

    expect(maxInFlight).toBe(3);
    expect(result.chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2]);
    expect(assembleMappingArtifact(result)).toBe("mapped:A..2\nmapped:C..2\nmapped:E..1\n");
  });

  it("reports progress after every chunk", async () => {
    const { client } = createScriptedClient(echo);
    const progress: Array<{ completed: number; total: number; identifiersQueried: number }> = [];

    await runRemapJob({
      client,
      identifiers: makeIds(2500),
      config: { ...baseConfig, chunkSize: 1000 },
      sleep: async () => undefined,
      onProgress: (p) => progress.push(p)
    });

    expect(progress).toEqual([
      { completed: 1, total: 3, identifiersQueried: 1000 },
      { completed: 2, total: 3, identifiersQueried: 2000 },
      { completed: 3, total: 3, identifiersQueried: 2500 }
    ]);
  });

  it("returns every chunk result when the progress callback throws", async () => {
    const { client, calls } = createScriptedClient(echo);

    const result = await runRemapJob({
      client,
      identifiers: makeIds(3),
      config: { ...baseConfig, chunkSize: 1 },
      sleep: async () => undefined,
      onProgress: () => {
        throw new Error("progress sink closed");
      }
    });

    expect(calls).toHaveLength(3);
    expect(result.chunks.map((chunk) => [chunk.index, chunk.status])).toEqual([
      [0, "success"],
      [1, "success"],
      [2, "success"]
    ]);
    expect(result.succeeded).toBe(3);
    const progressWarnings = warnSpy.mock.calls
      .map(([line]) => JSON.parse(String(line)) as Record<string, unknown>)
      .filter((entry) => entry.event === "remap.progress_failed");
    expect(progressWarnings).toEqual([
      { event: "remap.progress_failed", chunk: 0, message: "progress sink closed" },
      { event: "remap.progress_failed", chunk: 1, message: "progress sink closed" },
      { event: "remap.progress_failed", chunk: 2, message: "progress sink closed" }
    ]);
  });

  it("stops starting chunks once the job is canceled", async () => {
    const controller = new AbortController();
    const { client, calls } = createScriptedClient(echo);

    const result = await runRemapJob({
      client,
      identifiers: ["A", "B", "C"],
      config: { ...baseConfig, chunkSize: 1 },
      signal: controller.signal,
      sleep: async () => {
        controller.abort();
      }
    });

    expect(calls).toHaveLength(1);
    expect(result.chunks).toEqual([
      { status: "success", index: 0, identifiers: ["A"], rawText: "mapped:A..1\n", attempts: 1 },
      { status: "failed", index: 1, identifiers: ["B"], reason: "canceled", attempts: 0 },
      { status: "failed", index: 2, identifiers: ["C"], reason: "canceled", attempts: 0 }
    ]);
    expect(resolveRunStatus(result.chunks)).toBe("canceled");
  });

  it("ends an in-flight chunk as canceled when the job aborts during an attempt", async () => {
    const controller = new AbortController();
    const client: MappingClient = {
      send: async () => {
        controller.abort();
        throw new MappingTransportError("Mapping request canceled", { requestUrl: "http://mapping.test/" });
      }
    };

    const result = await runRemapJob({
      client,
      identifiers: ["A"],
      config: baseConfig,
      signal: controller.signal,
      sleep: async () => undefined
    });

    expect(result.chunks[0]).toMatchObject({ status: "failed", reason: "canceled", attempts: 1 });
  });

  it("retries every protocol error under the default policy", async () => {
    const { client, calls } = createScriptedClient(
      () => new MappingProtocolError("Mapping request failed: 400", { status: 400, requestUrl: "http://mapping.test/" })
    );

    const result = await runRemapJob({
      client,
      identifiers: ["A"],
      config: { ...baseConfig, maxRetries: 2 },
      sleep: async () => undefined
    });

    expect(calls).toHaveLength(3);
    expect(result.chunks[0]).toMatchObject({ status: "failed", reason: "exhausted_retries", attempts: 3 });
  });

  it("does not retry 4xx responses under skip_client_errors", async () => {
    const { client, calls } = createScriptedClient(
      () => new MappingProtocolError("Mapping request failed: 400", { status: 400, requestUrl: "http://mapping.test/" })
    );

    const result = await runRemapJob({
      client,
      identifiers: ["A"],
      config: { ...baseConfig, maxRetries: 2, retryPolicy: "skip_client_errors" },
      sleep: async () => undefined
    });

    expect(calls).toHaveLength(1);
    expect(result.chunks[0]).toMatchObject({ status: "failed", reason: "not_retryable", attempts: 1 });
  });

  it("still retries 429 responses under skip_client_errors", async () => {
    const { client, calls } = createScriptedClient((request, attempt) =>
      attempt === 1
        ? new MappingProtocolError("Mapping request failed: 429", { status: 429, requestUrl: "http://mapping.test/" })
        : echo(request)
    );

    const result = await runRemapJob({
      client,
      identifiers: ["A"],
      config: { ...baseConfig, maxRetries: 2, retryPolicy: "skip_client_errors" },
      sleep: async () => undefined
    });

    expect(calls).toHaveLength(2);
    expect(result.chunks[0]).toMatchObject({ status: "success", attempts: 2 });
  });

  it("rejects an invalid config before any request", async () => {
    const { client, calls } = createScriptedClient(echo);

    await expect(
      runRemapJob({ client, identifiers: ["A"], config: { ...baseConfig, contactEmail: " " } })
    ).rejects.toThrow("contactEmail is required");
    expect(calls).toHaveLength(0);
  });
});

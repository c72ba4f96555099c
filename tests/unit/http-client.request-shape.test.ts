import http from "http";
import type { AddressInfo } from "net";
import { MappingServiceHttpClient } from "../../src/infrastructure/mapping-service/MappingServiceHttpClient";
import type { MappingRequest } from "../../src/core/remap/remap.types";

type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const request: MappingRequest = {
  sourceNamespace: "P_REFSEQ_AC",
  targetNamespace: "ACC",
  identifiers: ["NP_001179", "NP_000537", "XP_1"],
  outputFormat: "tab"
};

describe("MappingServiceHttpClient request shape", () => {
  it("sends namespaces, format and space-joined identifiers as query params", async () => {
    let receivedUrl = "";
    let receivedMethod = "";
    let receivedUserAgent = "";
    const server = await startServer((req, res) => {
      receivedUrl = req.url ?? "";
      receivedMethod = req.method ?? "";
      receivedUserAgent = String(req.headers["user-agent"] ?? "");
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("From\tTo\nNP_001179\tP38398\n");
    });

    const client = new MappingServiceHttpClient(`${server.baseUrl}/uploadlists/`, "test@example.org");
    const text = await client.send(request);

    const parsed = new URL(receivedUrl, server.baseUrl);
    expect(receivedMethod).toBe("GET");
    expect(parsed.pathname).toBe("/uploadlists/");
    expect(parsed.searchParams.get("from")).toBe("P_REFSEQ_AC");
    expect(parsed.searchParams.get("to")).toBe("ACC");
    expect(parsed.searchParams.get("format")).toBe("tab");
    expect(parsed.searchParams.get("query")).toBe("NP_001179 NP_000537 XP_1");
    expect(receivedUserAgent).toBe("id-remap (test@example.org)");
    expect(text).toBe("From\tTo\nNP_001179\tP38398\n");

    await server.close();
  });

  it("returns the raw body untouched, even when empty", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("");
    });

    const client = new MappingServiceHttpClient(server.baseUrl, "test@example.org");
    await expect(client.send(request)).resolves.toBe("");

    await server.close();
  });
});

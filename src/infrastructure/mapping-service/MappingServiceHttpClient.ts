import type { MappingClient, SendOptions } from "../../ports/MappingClient";
import { MappingProtocolError, MappingTransportError } from "../../core/remap/mapping.errors";
import type { MappingRequest } from "../../core/remap/remap.types";

export const buildUserAgent = (contactEmail: string): string => `id-remap (${contactEmail})`;

/**
 * Single-attempt client for an upload-list style mapping endpoint, using native fetch (Node 20).
 * The per-attempt timeout covers the response body as well as the headers.
 */
export class MappingServiceHttpClient implements MappingClient {
  constructor(
    private readonly baseUrl: string,
    private readonly contactEmail: string,
    private readonly timeoutMs = 60000
  ) {}

  async send(request: MappingRequest, options: SendOptions = {}): Promise<string> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("from", request.sourceNamespace);
    url.searchParams.set("to", request.targetNamespace);
    url.searchParams.set("format", request.outputFormat);
    url.searchParams.set("query", request.identifiers.join(" "));
    // the query carries the identifiers; keep it out of errors and logs
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const controller = new AbortController();
    const cancel = () => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener("abort", cancel, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: {
          "User-Agent": buildUserAgent(this.contactEmail)
        },
        signal: controller.signal
      });

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new MappingProtocolError(`Mapping request failed: ${res.status}`, {
          status: res.status,
          requestUrl: safeRequestUrl
        });
      }

      return await res.text();
    } catch (err) {
      if (err instanceof MappingProtocolError) throw err;
      if (options.signal?.aborted) {
        throw new MappingTransportError("Mapping request canceled", { requestUrl: safeRequestUrl, cause: err });
      }
      if (controller.signal.aborted) {
        throw new MappingTransportError(`Mapping request timeout after ${this.timeoutMs}ms`, {
          requestUrl: safeRequestUrl,
          isTimeout: true,
          cause: err
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new MappingTransportError(`Mapping request failed: ${reason}`, { requestUrl: safeRequestUrl, cause: err });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", cancel);
    }
  }
}

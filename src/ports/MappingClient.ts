import type { MappingRequest } from "../core/remap/remap.types";

export type SendOptions = {
  signal?: AbortSignal;
};

/**
 * One request, one attempt. Resolves with the raw response text or rejects with
 * `MappingTransportError` / `MappingProtocolError`.
 */
export interface MappingClient {
  send(request: MappingRequest, options?: SendOptions): Promise<string>;
}

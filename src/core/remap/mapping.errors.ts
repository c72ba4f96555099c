type MappingErrorDetails = {
  requestUrl: string;
  cause?: unknown;
};

/**
 * Connection-level failure: DNS, reset, per-attempt timeout or cancellation.
 */
export class MappingTransportError extends Error {
  readonly requestUrl: string;
  readonly isTimeout: boolean;
  readonly cause?: unknown;

  constructor(message: string, details: MappingErrorDetails & { isTimeout?: boolean }) {
    super(message);
    this.name = "MappingTransportError";
    this.requestUrl = details.requestUrl;
    this.isTimeout = details.isTimeout ?? false;
    this.cause = details.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The service answered, but not with a usable response.
 */
export class MappingProtocolError extends Error {
  readonly requestUrl: string;
  readonly status: number;

  constructor(message: string, details: MappingErrorDetails & { status: number }) {
    super(message);
    this.name = "MappingProtocolError";
    this.requestUrl = details.requestUrl;
    this.status = details.status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isClientError = (err: unknown): boolean =>
  err instanceof MappingProtocolError && err.status >= 400 && err.status < 500 && err.status !== 429;

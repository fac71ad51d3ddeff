/**
 * Errors raised by PMC requests.
 */

export interface TransportErrorDetails {
  url: string;
  status?: number;
  cause?: unknown;
}

/**
 * A request to an NCBI endpoint failed: either the network call itself or a
 * non-2xx HTTP status.
 */
export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = "TransportError";
    this.url = details.url;
    if (details.status !== undefined) this.status = details.status;
  }
}

/** Human-readable reason for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Non-2xx response, timeout or network fault while talking to the site.
 * `status` is null when no HTTP response was received; `code` is the
 * client's error code (ECONNREFUSED, ERR_BAD_REQUEST, ...) when known.
 */
export class TransportError extends Error {
  readonly url: string;
  readonly status: number | null;
  readonly code: string | null;

  constructor(
    url: string,
    status: number | null,
    message: string,
    code: string | null = null
  ) {
    super(`${message} (${url})`);
    this.name = "TransportError";
    this.url = url;
    this.status = status;
    this.code = code;
  }
}

/**
 * The site answered, but not in the shape the crawler relies on:
 * GraphQL `errors`, a fragment without its markers, a rejected
 * partial-content request. `payload` keeps the raw evidence.
 */
export class ProtocolContractError extends Error {
  readonly url: string;
  readonly payload: unknown;

  constructor(url: string, message: string, payload?: unknown) {
    super(`${message} (${url})`);
    this.name = "ProtocolContractError";
    this.url = url;
    this.payload = payload;
  }
}

/** Message of any thrown value, for run summaries. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

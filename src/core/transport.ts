import { AxiosError, AxiosInstance } from "axios";
import { TransportError } from "./errors";

export type HeaderMap = Record<string, string>;

const NETWORK_FAULTS: Record<string, string> = {
  ECONNABORTED: "timed out",
  ETIMEDOUT: "timed out",
  ERR_CANCELED: "request canceled",
  ENOTFOUND: "host not found",
  EAI_AGAIN: "DNS lookup failed",
  ECONNRESET: "connection reset by server",
  ECONNREFUSED: "connection refused",
  ERR_TLS_CERT_ALTNAME_INVALID: "TLS certificate does not match the host",
  CERT_HAS_EXPIRED: "TLS certificate expired",
};

/**
 * Wrap a failed request as TransportError, naming the operation
 * ("GET", "POST") and keeping the HTTP status and client error code.
 */
export function toTransportError(
  operation: string,
  url: string,
  err: unknown
): TransportError {
  if (err instanceof AxiosError) {
    const code = err.code ?? null;
    if (err.response) {
      const { status, statusText } = err.response;
      const reason = statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`;
      return new TransportError(url, status, `${operation} failed: ${reason}`, code);
    }
    const reason = (code !== null && NETWORK_FAULTS[code]) || err.message;
    return new TransportError(url, null, `${operation} failed: ${reason}`, code);
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new TransportError(url, null, `${operation} failed: ${reason}`);
}

/** The two request shapes every crawler needs. */
export interface Transport {
  fetchHtml(url: string, headers?: HeaderMap): Promise<string>;
  postJson(url: string, payload: unknown, headers?: HeaderMap): Promise<unknown>;
}

/**
 * Transport over a configured axios instance (see createHttpClient).
 * No retries here: any failure surfaces as TransportError.
 */
export class HttpTransport implements Transport {
  constructor(private readonly http: AxiosInstance) {}

  async fetchHtml(url: string, headers: HeaderMap = {}): Promise<string> {
    try {
      const response = await this.http.get<string>(url, {
        headers,
        responseType: "text",
      });
      return response.data;
    } catch (err) {
      throw toTransportError("GET", url, err);
    }
  }

  async postJson(
    url: string,
    payload: unknown,
    headers: HeaderMap = {}
  ): Promise<unknown> {
    try {
      const response = await this.http.post<unknown>(url, payload, {
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          ...headers,
        },
        responseType: "json",
      });
      return response.data;
    } catch (err) {
      throw toTransportError("POST", url, err);
    }
  }
}

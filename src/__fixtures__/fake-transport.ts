import { TransportError } from "../core/errors";
import { HeaderMap, Transport } from "../core/transport";

export interface RecordedCall {
  method: "GET" | "POST";
  url: string;
  headers: HeaderMap;
  payload?: unknown;
}

type Reply = string | unknown[] | object | TransportError;
type Handler = (call: RecordedCall) => Reply;

/**
 * In-process Transport: answers from a URL → reply table and records
 * every request. Unknown URLs fail like a 404.
 */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, Handler>();

  on(url: string, reply: Reply): this {
    return this.handle(url, () => reply);
  }

  handle(url: string, handler: Handler): this {
    this.routes.set(url, handler);
    return this;
  }

  private answer(call: RecordedCall): Reply {
    this.calls.push(call);
    const handler = this.routes.get(call.url);
    const reply = handler
      ? handler(call)
      : new TransportError(call.url, 404, "GET failed: HTTP 404 Not Found");
    if (reply instanceof TransportError) throw reply;
    return reply;
  }

  async fetchHtml(url: string, headers: HeaderMap = {}): Promise<string> {
    const reply = this.answer({ method: "GET", url, headers });
    if (typeof reply !== "string") {
      throw new Error(`FakeTransport: ${url} is not an HTML route`);
    }
    return reply;
  }

  async postJson(url: string, payload: unknown, headers: HeaderMap = {}): Promise<unknown> {
    return this.answer({ method: "POST", url, headers, payload });
  }
}

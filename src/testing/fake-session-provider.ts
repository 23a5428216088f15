import type {
  SessionProvider,
  Transport,
  TransportRequest,
  TransportResponse,
} from "../interfaces/transport.js";

/** A scripted reply: a response, or an error the transport rejects with. */
export type ScriptedReply = Partial<TransportResponse> | Error;

/**
 * Fake SessionProvider for testing.
 * Replies are scripted per call in order; once the script runs out every
 * request gets the fallback reply (200 with an empty JSON object).
 */
export class FakeSessionProvider implements SessionProvider {
  /** Every request the transport saw, in order. */
  readonly requests: TransportRequest[] = [];
  refreshCalls = 0;
  tokenCalls = 0;

  private readonly replies: ScriptedReply[] = [];
  private readonly refreshResults: boolean[] = [];
  private token: string;

  constructor(options: { token?: string } = {}) {
    this.token = options.token ?? "test-anti-forgery-token";
  }

  /** Queue replies for the next requests. */
  reply(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  /** Queue results for the next refresh() calls; unqueued calls succeed. */
  refreshWith(...results: boolean[]): this {
    this.refreshResults.push(...results);
    return this;
  }

  setToken(token: string): void {
    this.token = token;
  }

  getTransport(): Transport {
    return async (request) => {
      this.requests.push(request);
      const next = this.replies.shift() ?? {};
      if (next instanceof Error) throw next;
      return { status: 200, headers: {}, body: "{}", ...next };
    };
  }

  async getAntiForgeryToken(): Promise<string> {
    this.tokenCalls++;
    return this.token;
  }

  async refresh(): Promise<boolean> {
    this.refreshCalls++;
    return this.refreshResults.shift() ?? true;
  }
}

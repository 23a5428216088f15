export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Already serialized; the layer forwards bodies unmodified. */
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/** Raw network I/O. Rejects only when no response was received. */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

/**
 * Session / credential collaborator.
 * Owns authentication; the access layer only asks it for a transport, a token,
 * and a refresh when the remote rejects credentials.
 */
export interface SessionProvider {
  getTransport(): Transport;
  /** Short-lived token the remote requires on mutating requests. */
  getAntiForgeryToken(): Promise<string>;
  /** Resolves true when fresh credentials were obtained. */
  refresh(): Promise<boolean>;
}

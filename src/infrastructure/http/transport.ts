/** Request handed to the HTTP transport; the body is already compressed. */
export interface HttpRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
  readonly signal: AbortSignal;
}

/** The parts of a fetch Response the batch sender reads. */
export interface HttpReply {
  readonly status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

/**
 * Performs one POST. Rejects only when no response was obtained;
 * reading the body may still fail afterwards.
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpReply>;

/** Default transport backed by the global fetch. */
export const fetchTransport: HttpTransport = (request) =>
  fetch(request.url, {
    method: 'POST',
    headers: request.headers,
    body: request.body,
    signal: request.signal,
  });

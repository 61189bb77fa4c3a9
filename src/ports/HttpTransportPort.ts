export interface HttpRequest {
  url: URL;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: Uint8Array; // raw bytes; the client decodes JSON or gzip itself
}

export interface HttpTransportPort {
  /** Must reject with a TransportError on connection failure or timeout. */
  get(request: HttpRequest): Promise<HttpResponse>;
}

import type { HttpRequest, HttpResponse, HttpTransportPort } from '../../ports/HttpTransportPort.js';
import { TransportError } from '../../utils/errors.js';

export type FetchLike = (input: URL, init?: RequestInit) => Promise<Response>;

/**
 * Default transport: the global fetch with a per-request timeout signal.
 * Holds no state between calls apart from the fetch function itself.
 */
export class FetchTransport implements HttpTransportPort {
  constructor(private readonly fetcher: FetchLike = (input, init) => fetch(input, init)) {}

  async get(request: HttpRequest): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await this.fetcher(request.url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(`Request timed out after ${request.timeoutMs}ms`, {}, { cause: error });
      }
      throw new TransportError('Connection to the weather API failed', {}, { cause: error });
    }

    try {
      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, body };
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(
          `Response body not received within ${request.timeoutMs}ms`,
          { status: response.status },
          { cause: error }
        );
      }
      throw new TransportError('Failed to read response body', { status: response.status }, { cause: error });
    }
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

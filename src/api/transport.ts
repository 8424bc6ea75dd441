import { TransportError } from '../errors.js';
import type { HttpRequest, HttpResponse, Transport } from './types.js';

export const REQUEST_TIMEOUT_MS = 30000;

/**
 * Transport over the global fetch. Every request is bounded by a timeout and
 * by the caller's signal, whichever fires first.
 */
export class FetchTransport implements Transport {
  constructor(private readonly timeoutMs = REQUEST_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw new TransportError(`Request aborted: ${request.method} ${request.url}`, request.url);
    }
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });
      return { status: response.status, headers, body: await response.text() };
    } catch (error) {
      if (controller.signal.aborted) {
        const reason = request.signal?.aborted ? 'Request aborted' : `Request timed out after ${this.timeoutMs}ms`;
        throw new TransportError(`${reason}: ${request.method} ${request.url}`, request.url, { cause: error });
      }
      if (error instanceof Error) {
        throw new TransportError(`Request failed: ${error.message}`, request.url, { cause: error });
      }
      throw new TransportError('Unknown error during request', request.url);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}

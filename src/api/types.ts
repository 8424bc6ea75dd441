import type { Logging } from 'homebridge';

import type { WireFormat } from '../haystack/codec.js';

/**
 * The logging surface the client needs. Homebridge's `Logging` satisfies it.
 */
export type ClientLogger = Pick<Logging, 'debug' | 'info' | 'warn' | 'error'>;

export type HashName = 'SHA-256' | 'SHA-512';

/**
 * One HTTP exchange as seen by the client
 */
export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends HTTP requests. Implementations reject with TransportError on network
 * failure and resolve for every HTTP status.
 */
export interface Transport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Haystack client configuration
 */
export interface HaystackClientConfig {
  /** Project API root, e.g. `http://host/api/demo` */
  url: string;
  username: string;
  password: string;
  /** Default: zinc */
  format?: WireFormat;
  /** Default: 30000 */
  timeoutMs?: number;
  /** Default: `{origin}/ui` */
  authUrl?: string;
  /** Hash algorithms the client accepts. Default: SHA-256 only */
  hashes?: readonly HashName[];
  /** Reuse a token from an earlier session and skip the handshake */
  authToken?: string;
  /** Injected for tests; defaults to a fetch-based transport */
  transport?: Transport;
}

export interface CallOptions {
  format?: WireFormat;
  signal?: AbortSignal;
}

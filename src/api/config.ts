import { ValueError } from '../errors.js';
import type { WireFormat } from '../haystack/codec.js';
import { FetchTransport, REQUEST_TIMEOUT_MS } from './transport.js';
import type { HashName, HaystackClientConfig, Transport } from './types.js';

export interface ResolvedConfig {
  /** Project API URL, always ending in `/` */
  apiUrl: string;
  authUrl: string;
  /** Set when the URL path has the form `/api/{project}/` */
  projectName?: string;
  username: string;
  password: string;
  format: WireFormat;
  timeoutMs: number;
  hashes: readonly HashName[];
  transport: Transport;
  authToken?: string;
}

/**
 * Validate a client configuration and fill in defaults
 */
export function resolveConfig(config: HaystackClientConfig): ResolvedConfig {
  let parsed: URL;
  try {
    parsed = new URL(config.url.endsWith('/') ? config.url : `${config.url}/`);
  } catch {
    throw new ValueError(`Invalid project URL '${config.url}'`, 'url');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValueError(`Project URL must use http or https, got '${parsed.protocol}'`, 'url');
  }
  if (!config.username) {
    throw new ValueError('Username must not be empty', 'username');
  }
  if (!config.password) {
    throw new ValueError('Password must not be empty', 'password');
  }

  const timeoutMs = config.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const segments = parsed.pathname.split('/');
  const projectName =
    segments.length === 4 && segments[1] === 'api' && segments[2] !== '' && segments[3] === ''
      ? decodeURIComponent(segments[2])
      : undefined;

  return {
    apiUrl: parsed.href,
    authUrl: config.authUrl ?? `${parsed.origin}/ui`,
    projectName,
    username: config.username,
    password: config.password,
    format: config.format ?? 'zinc',
    timeoutMs,
    hashes: config.hashes ?? ['SHA-256'],
    transport: config.transport ?? new FetchTransport(timeoutMs),
    authToken: config.authToken,
  };
}

import { createHash, createHmac, pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto';
import { promisify } from 'node:util';

import { AuthError, TransportError } from '../errors.js';
import type { AuthFailureReason, AuthPhase } from '../errors.js';
import type { ClientLogger, HashName, HttpResponse, Transport } from './types.js';

const pbkdf2Async = promisify(pbkdf2);

const NONCE_BYTES = 24;

interface HashSpec {
  digest: 'sha256' | 'sha512';
  keyLength: number;
}

const HASHES: Readonly<Record<HashName, HashSpec>> = {
  'SHA-256': { digest: 'sha256', keyLength: 32 },
  'SHA-512': { digest: 'sha512', keyLength: 64 },
};

export type AuthState = AuthPhase | 'failed';

export interface ScramOptions {
  authUrl: string;
  username: string;
  password: string;
  transport: Transport;
  log: ClientLogger;
  /** Default: SHA-256 only */
  hashes?: readonly HashName[];
  /** Client nonce source; tests pin it */
  nonce?: () => string;
  signal?: AbortSignal;
}

export interface AuthHeader {
  scheme: string;
  params: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Message helpers
// ---------------------------------------------------------------------------

export function base64UrlEncode(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64url');
}

/**
 * Accepts padded or unpadded input in either base64 alphabet
 */
export function base64UrlDecode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

export function generateNonce(): string {
  return randomBytes(NONCE_BYTES).toString('base64url');
}

/**
 * SCRAM `saslname` escaping: `=` becomes `=3D` and `,` becomes `=2C`
 */
export function escapeUsername(username: string): string {
  return username.replace(/=/g, '=3D').replace(/,/g, '=2C');
}

/**
 * Parse `WWW-Authenticate` / `Authentication-Info` style headers:
 * `SCRAM handshakeToken=abc, hash=SHA-256` or bare `authToken=abc, data=xyz`.
 * Parameter names are lower-cased.
 */
export function parseAuthHeader(header: string): AuthHeader {
  const trimmed = header.trim();
  const space = trimmed.indexOf(' ');
  const firstEquals = trimmed.indexOf('=');
  const hasScheme = space > 0 && (firstEquals < 0 || space < firstEquals);
  const scheme = hasScheme ? trimmed.slice(0, space) : '';
  const rest = hasScheme ? trimmed.slice(space + 1) : trimmed;

  const params: Record<string, string> = {};
  for (const part of rest.split(',')) {
    const equals = part.indexOf('=');
    if (equals > 0) {
      params[part.slice(0, equals).trim().toLowerCase()] = part.slice(equals + 1).trim();
    }
  }
  return { scheme, params };
}

/**
 * Split a SCRAM message (`r=...,s=...,i=...`) into its attributes
 */
export function parseScramMessage(message: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const part of message.split(',')) {
    if (part.length >= 2 && part[1] === '=') {
      attributes.set(part[0], part.slice(2));
    }
  }
  return attributes;
}

// ---------------------------------------------------------------------------
// SCRAM arithmetic (RFC 5802)
// ---------------------------------------------------------------------------

export async function deriveSaltedPassword(
  password: string,
  salt: Buffer,
  iterations: number,
  hash: HashName = 'SHA-256',
): Promise<Buffer> {
  const { digest, keyLength } = HASHES[hash];
  return pbkdf2Async(password.normalize('NFKC'), salt, iterations, keyLength, digest);
}

function hmac(hash: HashName, key: Buffer, data: string): Buffer {
  return createHmac(HASHES[hash].digest, key).update(data, 'utf8').digest();
}

export function clientProof(saltedPassword: Buffer, authMessage: string, hash: HashName = 'SHA-256'): Buffer {
  const clientKey = hmac(hash, saltedPassword, 'Client Key');
  const storedKey = createHash(HASHES[hash].digest).update(clientKey).digest();
  const signature = hmac(hash, storedKey, authMessage);
  return Buffer.from(clientKey.map((byte, i) => byte ^ signature[i]));
}

export function serverSignature(saltedPassword: Buffer, authMessage: string, hash: HashName = 'SHA-256'): Buffer {
  const serverKey = hmac(hash, saltedPassword, 'Server Key');
  return hmac(hash, serverKey, authMessage);
}

// ---------------------------------------------------------------------------
// Handshake
// ---------------------------------------------------------------------------

interface Challenge {
  handshakeToken: string;
  hash: HashName;
}

/**
 * Client side of the Haystack SCRAM handshake.
 *
 * init -> helloSent -> firstSent -> authenticated, or failed from any step.
 * One instance performs one handshake.
 */
export class ScramAuthenticator {
  private currentState: AuthState = 'init';
  private readonly hashes: readonly HashName[];
  private readonly nonce: () => string;

  constructor(private readonly options: ScramOptions) {
    this.hashes = options.hashes ?? ['SHA-256'];
    this.nonce = options.nonce ?? generateNonce;
  }

  get state(): AuthState {
    return this.currentState;
  }

  /**
   * Run the handshake and resolve with the bearer token
   */
  async authenticate(): Promise<string> {
    if (this.currentState !== 'init') {
      throw new AuthError('Handshake already started', 'MalformedMessage', 'init');
    }
    try {
      const challenge = await this.hello();
      this.currentState = 'helloSent';

      const clientNonce = this.nonce();
      const clientFirstBare = `n=${escapeUsername(this.options.username)},r=${clientNonce}`;
      const { handshakeToken, serverFirst } = await this.sendClientFirst(challenge, clientFirstBare);
      this.currentState = 'firstSent';

      const authToken = await this.sendClientFinal(
        { handshakeToken, hash: challenge.hash },
        clientNonce,
        clientFirstBare,
        serverFirst,
      );
      this.currentState = 'authenticated';
      this.options.log.debug('[Auth] Handshake complete');
      return authToken;
    } catch (error) {
      const phase = this.state === 'failed' ? 'init' : this.state;
      this.currentState = 'failed';
      if (error instanceof AuthError) {
        throw error;
      }
      if (error instanceof TransportError) {
        throw new AuthError(`Authentication request failed: ${error.message}`, 'Transport', phase, { cause: error });
      }
      if (error instanceof Error) {
        throw new AuthError(`Authentication failed: ${error.message}`, 'MalformedMessage', phase, { cause: error });
      }
      throw new AuthError('Unknown error during authentication', 'MalformedMessage', phase);
    }
  }

  private async hello(): Promise<Challenge> {
    this.options.log.debug(`[Auth] Sending HELLO to ${this.options.authUrl}`);
    const response = await this.send(`HELLO username=${base64UrlEncode(this.options.username)}`);
    const header = this.expectChallenge(response);

    if (header.scheme.toUpperCase() !== 'SCRAM') {
      this.fail(`Server offered unsupported auth scheme '${header.scheme}'`, 'UnsupportedMechanism');
    }
    const hash = this.hashes.find((name) => name === header.params.hash?.toUpperCase());
    if (!hash) {
      this.fail(`Server requested unsupported hash '${header.params.hash ?? ''}'`, 'UnsupportedMechanism');
    }
    const handshakeToken = header.params.handshaketoken;
    if (!handshakeToken) {
      this.fail('HELLO challenge has no handshakeToken', 'MalformedMessage');
    }
    this.options.log.debug(`[Auth] Server requested SCRAM with ${hash}`);
    return { handshakeToken, hash };
  }

  private async sendClientFirst(
    challenge: Challenge,
    clientFirstBare: string,
  ): Promise<{ handshakeToken: string; serverFirst: string }> {
    this.options.log.debug('[Auth] Sending client-first message');
    const response = await this.send(
      `SCRAM handshakeToken=${challenge.handshakeToken}, data=${base64UrlEncode(`n,,${clientFirstBare}`)}`,
    );
    const header = this.expectChallenge(response);
    const data = header.params.data;
    if (!data) {
      this.fail('Server-first message missing', 'MalformedMessage');
    }
    return {
      handshakeToken: header.params.handshaketoken ?? challenge.handshakeToken,
      serverFirst: base64UrlDecode(data),
    };
  }

  private async sendClientFinal(
    challenge: Challenge,
    clientNonce: string,
    clientFirstBare: string,
    serverFirst: string,
  ): Promise<string> {
    const attributes = parseScramMessage(serverFirst);
    const serverError = attributes.get('e');
    if (serverError !== undefined) {
      this.fail(`Server rejected client-first message: ${serverError}`, 'Rejected');
    }
    const serverNonce = attributes.get('r');
    const salt = attributes.get('s');
    const iterations = Number(attributes.get('i'));
    if (!serverNonce || !salt || !Number.isInteger(iterations) || iterations < 1) {
      this.fail('Server-first message must carry r, s and a positive i', 'MalformedMessage');
    }
    if (!serverNonce.startsWith(clientNonce) || serverNonce.length === clientNonce.length) {
      this.fail('Server nonce does not extend the client nonce', 'MalformedMessage');
    }

    const salted = await deriveSaltedPassword(
      this.options.password,
      Buffer.from(salt, 'base64'),
      iterations,
      challenge.hash,
    );
    const withoutProof = `c=biws,r=${serverNonce}`;
    const authMessage = `${clientFirstBare},${serverFirst},${withoutProof}`;
    const proof = clientProof(salted, authMessage, challenge.hash).toString('base64');

    this.options.log.debug('[Auth] Sending client-final message');
    const response = await this.send(
      `SCRAM handshakeToken=${challenge.handshakeToken}, data=${base64UrlEncode(`${withoutProof},p=${proof}`)}`,
    );
    if (response.status !== 200) {
      this.fail(`Server rejected client proof with status ${response.status}`, 'Rejected');
    }
    const info = response.headers['authentication-info'];
    if (!info) {
      this.fail('Final response has no Authentication-Info header', 'MalformedMessage');
    }
    const { params } = parseAuthHeader(info);
    const final = parseScramMessage(base64UrlDecode(params.data ?? ''));
    const finalError = final.get('e');
    if (finalError !== undefined) {
      this.fail(`Server rejected client proof: ${finalError}`, 'Rejected');
    }
    const verifier = final.get('v');
    if (verifier === undefined) {
      this.fail('Server-final message has no verifier', 'MalformedMessage');
    }

    const expected = serverSignature(salted, authMessage, challenge.hash);
    const received = Buffer.from(verifier, 'base64');
    if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
      this.fail('Server signature does not match', 'ServerSignatureMismatch');
    }
    if (!params.authtoken) {
      this.fail('Final response has no authToken', 'MalformedMessage');
    }
    return params.authtoken;
  }

  private expectChallenge(response: HttpResponse): AuthHeader {
    if (response.status !== 401) {
      this.fail(`Expected 401 challenge but received status ${response.status}`, 'Rejected');
    }
    const header = response.headers['www-authenticate'];
    if (!header) {
      this.fail('Challenge has no WWW-Authenticate header', 'MalformedMessage');
    }
    return parseAuthHeader(header);
  }

  private send(authorization: string): Promise<HttpResponse> {
    return this.options.transport.send({
      method: 'GET',
      url: this.options.authUrl,
      headers: { Authorization: authorization },
      signal: this.options.signal,
    });
  }

  private fail(message: string, reason: AuthFailureReason): never {
    const phase = this.currentState === 'failed' ? 'init' : this.currentState;
    this.options.log.debug(`[Auth] Failed: ${message}`);
    throw new AuthError(message, reason, phase);
  }
}

import { createHash, createHmac, pbkdf2Sync } from 'node:crypto';

import type { API, Characteristic, Logging, PlatformAccessory, PlatformConfig, Service } from 'homebridge';
import { vi } from 'vitest';

import type { HttpRequest, HttpResponse, Transport } from '../api/types.js';

/**
 * Create a mock Homebridge Logging interface
 */
export function createMockLogger(): Logging {
  return {
    prefix: 'TestPlugin',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    success: vi.fn(),
  } as unknown as Logging;
}

// Internal mock characteristic type
interface MockCharacteristicInternal {
  setProps: ReturnType<typeof vi.fn>;
  onGet: ReturnType<typeof vi.fn>;
  onSet: ReturnType<typeof vi.fn>;
  updateValue: ReturnType<typeof vi.fn>;
  value: unknown;
}

export function createMockCharacteristic(): Characteristic & MockCharacteristicInternal {
  const char: MockCharacteristicInternal = {
    setProps: vi.fn().mockReturnThis(),
    onGet: vi.fn().mockReturnThis(),
    onSet: vi.fn().mockReturnThis(),
    updateValue: vi.fn().mockReturnThis(),
    value: null,
  };
  return char as unknown as Characteristic & MockCharacteristicInternal;
}

/**
 * Mock characteristic constants
 */
export const MockCharacteristicConstants = {
  CurrentTemperature: 'CurrentTemperature',
  StatusFault: {
    NO_FAULT: 0,
    GENERAL_FAULT: 1,
  },
  Name: 'Name',
  Manufacturer: 'Manufacturer',
  Model: 'Model',
  SerialNumber: 'SerialNumber',
};

export function createMockService(): Service {
  const characteristics = new Map<string, MockCharacteristicInternal>();

  const service = {
    setCharacteristic: vi.fn((name: string, value: unknown) => {
      const char = characteristics.get(name) || createMockCharacteristic();
      char.value = value;
      characteristics.set(name, char);
      return service;
    }),
    updateCharacteristic: vi.fn((name: string, value: unknown) => {
      const char = characteristics.get(name) || createMockCharacteristic();
      char.value = value;
      characteristics.set(name, char);
      return service;
    }),
    getCharacteristic: vi.fn((name: string) => {
      if (!characteristics.has(name)) {
        characteristics.set(name, createMockCharacteristic());
      }
      return characteristics.get(name);
    }),
    displayName: 'MockService',
    UUID: 'mock-service-uuid',
    _characteristics: characteristics,
  };

  return service as unknown as Service;
}

/**
 * Read a characteristic value a mock service holds
 */
export function characteristicValue(service: Service | undefined, name: string): unknown {
  const internal = service as unknown as { _characteristics: Map<string, MockCharacteristicInternal> } | undefined;
  return internal?._characteristics.get(name)?.value;
}

function serviceKey(serviceType: string | Service): string {
  return typeof serviceType === 'string' ? serviceType : (serviceType as unknown as { name: string }).name;
}

/**
 * Create a mock PlatformAccessory holding one point definition
 */
export function createMockAccessory(displayName = 'Mock Point', id = 'p:demo:r:mock'): PlatformAccessory {
  const services = new Map<string, Service>();
  services.set('AccessoryInformation', createMockService());

  const accessory = {
    UUID: `mock-uuid-${displayName.replace(/\s/g, '-').toLowerCase()}`,
    displayName,
    context: {
      point: { id, name: displayName },
    },
    getService: vi.fn((serviceType: string | Service) => services.get(serviceKey(serviceType))),
    addService: vi.fn((serviceType: string | Service) => {
      const service = createMockService();
      services.set(serviceKey(serviceType), service);
      return service;
    }),
    removeService: vi.fn(),
    _services: services,
  };

  return accessory as unknown as PlatformAccessory;
}

export function createMockServiceTypes(): typeof Service {
  return {
    TemperatureSensor: { name: 'TemperatureSensor', UUID: 'temp-sensor-uuid' },
    AccessoryInformation: { name: 'AccessoryInformation', UUID: 'info-uuid' },
  } as unknown as typeof Service;
}

export function createMockCharacteristicTypes(): typeof Characteristic {
  return { ...MockCharacteristicConstants } as unknown as typeof Characteristic;
}

/**
 * Mock PlatformAccessory class for use with 'new' keyword
 */
class MockPlatformAccessory {
  UUID: string;
  displayName: string;
  context: Record<string, unknown> = {};
  private services = new Map<string, Service>();

  constructor(name: string, uuid: string) {
    this.displayName = name;
    this.UUID = uuid;
    this.services.set('AccessoryInformation', createMockService());
  }

  getService(serviceType: string | Service): Service | undefined {
    return this.services.get(serviceKey(serviceType));
  }

  addService(serviceType: string | Service): Service {
    const service = createMockService();
    this.services.set(serviceKey(serviceType), service);
    return service;
  }
}

/**
 * Create a mock Homebridge API
 */
export function createMockAPI(): API {
  const accessories = new Map<string, PlatformAccessory>();

  return {
    hap: {
      Service: createMockServiceTypes(),
      Characteristic: createMockCharacteristicTypes(),
      uuid: {
        generate: vi.fn((input: string) => `uuid-${input}`),
      },
    },
    on: vi.fn(),
    registerPlatformAccessories: vi.fn((pluginName: string, platformName: string, accs: PlatformAccessory[]) => {
      for (const acc of accs) {
        accessories.set(acc.UUID, acc);
      }
    }),
    unregisterPlatformAccessories: vi.fn((pluginName: string, platformName: string, accs: PlatformAccessory[]) => {
      for (const acc of accs) {
        accessories.delete(acc.UUID);
      }
    }),
    platformAccessory: MockPlatformAccessory as unknown as typeof PlatformAccessory,
    _accessories: accessories,
  } as unknown as API;
}

/**
 * Create a mock platform config
 */
export function createMockConfig(overrides: Partial<PlatformConfig> = {}): PlatformConfig {
  return {
    platform: 'HaystackPoints',
    name: 'Haystack Points',
    url: 'http://haystack.test/api/demo',
    username: 'test-user',
    password: 'test-secret',
    pollingInterval: 60,
    ...overrides,
  } as PlatformConfig;
}

// ---------------------------------------------------------------------------
// In-process Haystack server
// ---------------------------------------------------------------------------

const FAKE_ORIGIN = 'http://haystack.test';
export const FAKE_API_URL = `${FAKE_ORIGIN}/api/demo/`;
export const FAKE_AUTH_URL = `${FAKE_ORIGIN}/ui`;

export interface FakeServerOptions {
  username?: string;
  password?: string;
  salt?: string;
  iterations?: number;
  hash?: 'SHA-256' | 'SHA-512';
  /** Appended to the client nonce to form the server nonce */
  nonceSuffix?: string;
}

export interface FakeReply {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

type Responder = (request: HttpRequest) => FakeReply | Promise<FakeReply>;

interface PendingHandshake {
  clientFirstBare: string;
  serverFirst: string;
}

function b64url(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64url');
}

function fromB64url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

function scramAttributes(message: string): Map<string, string> {
  return new Map(message.split(',').map((part) => [part.slice(0, 1), part.slice(2)]));
}

function authParams(header: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const part of header.slice(header.indexOf(' ') + 1).split(',')) {
    const equals = part.indexOf('=');
    params[part.slice(0, equals).trim()] = part.slice(equals + 1).trim();
  }
  return params;
}

/**
 * A Transport that plays the server side of the SCRAM handshake and answers
 * op calls from registered responders. Nothing leaves the process.
 */
export class FakeHaystackServer implements Transport {
  readonly requests: HttpRequest[] = [];
  handshakes = 0;
  /** Every bearer token is refused, even fresh ones */
  rejectAllTokens = false;
  /** Corrupt the server signature in the final message */
  tamperSignature = false;
  /** Answer HELLO with this error attribute instead of a server-first message */
  serverError?: string;

  private readonly validTokens = new Set<string>();
  private readonly responders = new Map<string, Responder>();
  private readonly pending = new Map<string, PendingHandshake>();
  private readonly options: Required<FakeServerOptions>;

  constructor(options: FakeServerOptions = {}) {
    this.options = {
      username: 'test-user',
      password: 'test-secret',
      salt: Buffer.from('fake-salt').toString('base64'),
      iterations: 4096,
      hash: 'SHA-256',
      nonceSuffix: 'server-part',
      ...options,
    };
  }

  /**
   * Answer POSTs to `op`. A string reply is a 200 Zinc body.
   */
  reply(op: string, responder: Responder | string): this {
    this.responders.set(op, typeof responder === 'string' ? () => ({ body: responder }) : responder);
    return this;
  }

  issueToken(token: string): void {
    this.validTokens.add(token);
  }

  expireTokens(): void {
    this.validTokens.clear();
  }

  opRequests(op: string): HttpRequest[] {
    return this.requests.filter((request) => request.method === 'POST' && request.url === `${FAKE_API_URL}${op}`);
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const reply = request.method === 'GET' ? this.authenticate(request) : await this.handleOp(request);
    return {
      status: reply.status ?? 200,
      headers: Object.fromEntries(Object.entries(reply.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])),
      body: reply.body ?? '',
    };
  }

  private async handleOp(request: HttpRequest): Promise<FakeReply> {
    const token = request.headers.Authorization?.replace('BEARER authToken=', '');
    if (this.rejectAllTokens || token === undefined || !this.validTokens.has(token)) {
      return { status: 403 };
    }
    const op = request.url.slice(FAKE_API_URL.length);
    const responder = this.responders.get(op);
    return responder ? responder(request) : { status: 404, body: 'Not found' };
  }

  private authenticate(request: HttpRequest): FakeReply {
    const authorization = request.headers.Authorization ?? '';
    const { hash } = this.options;

    if (authorization.startsWith('HELLO ')) {
      const username = fromB64url(authParams(authorization).username ?? '');
      return {
        status: 401,
        headers: { 'WWW-Authenticate': `SCRAM handshakeToken=${b64url(username)}, hash=${hash}` },
      };
    }

    const params = authParams(authorization);
    const handshakeToken = params.handshakeToken ?? '';
    const message = fromB64url(params.data ?? '');

    if (message.startsWith('n,,')) {
      const clientFirstBare = message.slice(3);
      const clientNonce = scramAttributes(clientFirstBare).get('r') ?? '';
      const serverFirst =
        this.serverError !== undefined
          ? `e=${this.serverError}`
          : `r=${clientNonce}${this.options.nonceSuffix},s=${this.options.salt},i=${this.options.iterations}`;
      this.pending.set(handshakeToken, { clientFirstBare, serverFirst });
      return {
        status: 401,
        headers: { 'WWW-Authenticate': `SCRAM handshakeToken=${handshakeToken}, hash=${hash}, data=${b64url(serverFirst)}` },
      };
    }

    const pending = this.pending.get(handshakeToken);
    if (!pending) {
      return { status: 400 };
    }
    const attributes = scramAttributes(message);
    const withoutProof = `c=${attributes.get('c')},r=${attributes.get('r')}`;
    const authMessage = `${pending.clientFirstBare},${pending.serverFirst},${withoutProof}`;

    const digest = hash === 'SHA-512' ? 'sha512' : 'sha256';
    const salted = pbkdf2Sync(
      this.options.password,
      Buffer.from(this.options.salt, 'base64'),
      this.options.iterations,
      hash === 'SHA-512' ? 64 : 32,
      digest,
    );
    const storedKey = createHash(digest).update(createHmac(digest, salted).update('Client Key').digest()).digest();
    const clientSignature = createHmac(digest, storedKey).update(authMessage).digest();
    const proof = Buffer.from(attributes.get('p') ?? '', 'base64');
    const clientKey = Buffer.from(proof.map((byte, i) => byte ^ clientSignature[i]));
    if (!createHash(digest).update(clientKey).digest().equals(storedKey)) {
      return { status: 403 };
    }

    const serverKey = createHmac(digest, salted).update('Server Key').digest();
    const signature = createHmac(digest, serverKey).update(authMessage).digest();
    if (this.tamperSignature) {
      signature[0] ^= 0xff;
    }
    this.handshakes++;
    const token = `token-${this.handshakes}`;
    this.validTokens.add(token);
    return {
      status: 200,
      headers: { 'Authentication-Info': `authToken=${token}, data=${b64url(`v=${signature.toString('base64')}`)}` },
    };
  }
}

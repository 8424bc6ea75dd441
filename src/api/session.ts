import { AuthExpiredError, OpError, ParseError } from '../errors.js';
import { CODECS } from '../haystack/codec.js';
import type { GridCodec } from '../haystack/codec.js';
import { errorMessage, errorTrace, isErrorGrid } from '../haystack/grid.js';
import type { Grid } from '../haystack/value.js';
import { resolveConfig } from './config.js';
import type { ResolvedConfig } from './config.js';
import { ScramAuthenticator } from './scram.js';
import type { CallOptions, ClientLogger, HaystackClientConfig, HttpResponse } from './types.js';

function gridError(op: string, grid: Grid, status: number): OpError {
  const errType = grid.meta.errType;
  return new OpError(op, errorMessage(grid) ?? `${op} returned an error grid`, {
    status,
    errType: errType?.kind === 'str' ? errType.val : undefined,
    trace: errorTrace(grid),
    grid,
  });
}

/**
 * Error grids sometimes accompany a 4xx/5xx status; anything else in the body is ignored
 */
function decodeErrorBody(codec: GridCodec, body: string): Grid | undefined {
  if (!body.trim()) {
    return undefined;
  }
  try {
    const grid = codec.decode(body);
    return isErrorGrid(grid) ? grid : undefined;
  } catch (error) {
    if (error instanceof ParseError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * An authenticated connection to one Haystack project.
 *
 * A 403 re-runs the handshake once and retries; concurrent 403s share one
 * handshake.
 */
export class Session {
  private token?: string;
  private refreshing?: Promise<string>;

  private constructor(
    private readonly config: ResolvedConfig,
    private readonly log: ClientLogger,
  ) {
    this.token = config.authToken;
  }

  /**
   * Authenticate (unless the config carries a token) and return a ready session
   */
  static async open(config: HaystackClientConfig, log: ClientLogger): Promise<Session> {
    const session = new Session(resolveConfig(config), log);
    if (session.token === undefined) {
      await session.refresh(undefined);
    } else {
      log.debug('Reusing existing auth token');
    }
    return session;
  }

  get authToken(): string | undefined {
    return this.token;
  }

  get apiUrl(): string {
    return this.config.apiUrl;
  }

  get projectName(): string | undefined {
    return this.config.projectName;
  }

  /**
   * POST a request grid to `{apiUrl}{op}` and return the response grid
   */
  async call(op: string, request: Grid, options: CallOptions = {}): Promise<Grid> {
    const codec = CODECS[options.format ?? this.config.format];
    const body = codec.encode(request);

    const token = this.token ?? (await this.refresh(undefined));
    let response = await this.post(op, body, codec, token, options.signal);

    if (response.status === 403) {
      this.log.warn(`${op} returned 403, re-authenticating`);
      const fresh = await this.refresh(token);
      response = await this.post(op, body, codec, fresh, options.signal);
      if (response.status === 403) {
        throw new AuthExpiredError(op);
      }
    }

    if (response.status < 200 || response.status > 299) {
      const errorGrid = decodeErrorBody(codec, response.body);
      if (errorGrid) {
        throw gridError(op, errorGrid, response.status);
      }
      throw new OpError(op, `${op} failed with status ${response.status}`, { status: response.status });
    }

    const grid = codec.decode(response.body);
    if (isErrorGrid(grid)) {
      throw gridError(op, grid, response.status);
    }
    this.log.debug(`${op} returned ${grid.rows.length} rows`);
    return grid;
  }

  private post(op: string, body: string, codec: GridCodec, token: string, signal?: AbortSignal): Promise<HttpResponse> {
    const url = `${this.config.apiUrl}${op}`;
    this.log.debug(`POST ${url}`);
    return this.config.transport.send({
      method: 'POST',
      url,
      headers: {
        Accept: codec.mimeType,
        'Content-Type': codec.mimeType,
        Authorization: `BEARER authToken=${token}`,
      },
      body,
      signal,
    });
  }

  /**
   * Obtain a token to replace `stale`. If another call already replaced it,
   * reuse that token; if a handshake is in flight, join it.
   */
  private refresh(stale: string | undefined): Promise<string> {
    if (this.token !== undefined && this.token !== stale) {
      return Promise.resolve(this.token);
    }
    this.refreshing ??= this.handshake().finally(() => {
      this.refreshing = undefined;
    });
    return this.refreshing;
  }

  private async handshake(): Promise<string> {
    this.log.info(`Authenticating with ${this.config.authUrl}`);
    const authenticator = new ScramAuthenticator({
      authUrl: this.config.authUrl,
      username: this.config.username,
      password: this.config.password,
      hashes: this.config.hashes,
      transport: this.config.transport,
      log: this.log,
    });
    this.token = await authenticator.authenticate();
    this.log.info('Successfully authenticated');
    return this.token;
  }
}

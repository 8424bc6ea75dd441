import { beforeEach, describe, expect, it } from 'vitest';

import { AuthExpiredError, OpError, ParseError, TransportError } from '../errors.js';
import { emptyGrid } from '../haystack/grid.js';
import { readHayson } from '../haystack/hayson.js';
import { str } from '../haystack/value.js';
import { FAKE_API_URL, FAKE_AUTH_URL, FakeHaystackServer, createMockLogger } from '../test/mocks.js';
import { Session } from './session.js';
import type { HaystackClientConfig } from './types.js';

const ABOUT = 'ver:"3.0"\nserverName,productName\n"test-host","Test Server"\n';

describe('Session', () => {
  let server: FakeHaystackServer;
  let log: ReturnType<typeof createMockLogger>;
  let config: HaystackClientConfig;

  beforeEach(() => {
    server = new FakeHaystackServer();
    log = createMockLogger();
    config = {
      url: 'http://haystack.test/api/demo',
      username: 'test-user',
      password: 'test-secret',
      transport: server,
    };
  });

  describe('open', () => {
    it('should authenticate and derive the project from the URL', async () => {
      const session = await Session.open(config, log);

      expect(session.authToken).toBe('token-1');
      expect(session.apiUrl).toBe(FAKE_API_URL);
      expect(session.projectName).toBe('demo');
      expect(server.requests.every((request) => request.url === FAKE_AUTH_URL)).toBe(true);
      expect(log.info).toHaveBeenCalledWith(`Authenticating with ${FAKE_AUTH_URL}`);
      expect(log.info).toHaveBeenCalledWith('Successfully authenticated');
    });

    it('should skip the handshake when given a token', async () => {
      server.issueToken('cached-token');
      server.reply('about', ABOUT);

      const session = await Session.open({ ...config, authToken: 'cached-token' }, log);
      await session.call('about', emptyGrid());

      expect(server.handshakes).toBe(0);
      expect(server.requests).toHaveLength(1);
      expect(server.requests[0].headers.Authorization).toBe('BEARER authToken=cached-token');
      expect(log.debug).toHaveBeenCalledWith('Reusing existing auth token');
    });
  });

  describe('call', () => {
    it('should post the request grid as Zinc', async () => {
      server.reply('about', ABOUT);
      const session = await Session.open(config, log);

      const grid = await session.call('about', emptyGrid());

      expect(grid.rows[0].serverName).toEqual(str('test-host'));
      const [request] = server.opRequests('about');
      expect(request.body).toBe('ver:"3.0"\nempty\n');
      expect(request.headers).toEqual({
        Accept: 'text/zinc; charset=utf-8',
        'Content-Type': 'text/zinc; charset=utf-8',
        Authorization: 'BEARER authToken=token-1',
      });
    });

    it('should use Hayson when configured', async () => {
      server.reply('about', () => ({
        body: JSON.stringify({
          _kind: 'grid',
          meta: { ver: '3.0' },
          cols: [{ name: 'serverName' }],
          rows: [{ serverName: 'json-host' }],
        }),
      }));
      const session = await Session.open({ ...config, format: 'hayson' }, log);

      const grid = await session.call('about', emptyGrid());

      expect(grid.rows[0].serverName).toEqual(str('json-host'));
      const [request] = server.opRequests('about');
      expect(request.headers.Accept).toBe('application/json');
      expect(readHayson(request.body ?? '').cols).toEqual([]);
    });

    it('should re-authenticate once after a 403 and retry', async () => {
      server.reply('about', ABOUT);
      const session = await Session.open(config, log);
      server.expireTokens();

      const grid = await session.call('about', emptyGrid());

      expect(grid.rows).toHaveLength(1);
      expect(server.handshakes).toBe(2);
      expect(session.authToken).toBe('token-2');
      expect(server.opRequests('about').map((request) => request.headers.Authorization)).toEqual([
        'BEARER authToken=token-1',
        'BEARER authToken=token-2',
      ]);
      expect(log.warn).toHaveBeenCalledWith('about returned 403, re-authenticating');
    });

    it('should give up when the fresh token is refused too', async () => {
      server.reply('about', ABOUT);
      const session = await Session.open(config, log);
      server.rejectAllTokens = true;

      const error = await session.call('about', emptyGrid()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthExpiredError);
      expect(error).toHaveProperty('message', 'Authentication expired for about: token rejected twice');
      expect(server.opRequests('about')).toHaveLength(2);
      expect(server.handshakes).toBe(2);
    });

    it('should share one handshake between concurrent 403s', async () => {
      server.reply('about', ABOUT);
      const session = await Session.open(config, log);
      server.expireTokens();

      const grids = await Promise.all([
        session.call('about', emptyGrid()),
        session.call('about', emptyGrid()),
        session.call('about', emptyGrid()),
      ]);

      expect(grids).toHaveLength(3);
      expect(server.handshakes).toBe(2);
      expect(server.opRequests('about')).toHaveLength(6);
    });

    it('should turn an error grid into an OpError', async () => {
      server.reply(
        'read',
        'ver:"3.0" err dis:"Invalid filter" errType:"sys::ParseErr" errTrace:"at line 1"\nempty\n',
      );
      const session = await Session.open(config, log);

      const error = await session.call('read', emptyGrid()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OpError);
      expect(error).toMatchObject({
        op: 'read',
        message: 'Invalid filter',
        status: 200,
        errType: 'sys::ParseErr',
        trace: 'at line 1',
      });
    });

    it('should read an error grid sent with a failure status', async () => {
      server.reply('read', () => ({ status: 400, body: 'ver:"3.0" err dis:"Bad request"\nempty\n' }));
      const session = await Session.open(config, log);

      await expect(session.call('read', emptyGrid())).rejects.toMatchObject({ message: 'Bad request', status: 400 });
    });

    it('should report a failure status without a grid body', async () => {
      server.reply('read', () => ({ status: 500, body: 'Internal error' }));
      const session = await Session.open(config, log);

      const error = await session.call('read', emptyGrid()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OpError);
      expect(error).toMatchObject({ message: 'read failed with status 500', status: 500 });
    });

    it('should surface an unreadable success body as a ParseError', async () => {
      server.reply('about', 'not a grid');
      const session = await Session.open(config, log);

      await expect(session.call('about', emptyGrid())).rejects.toBeInstanceOf(ParseError);
    });

    it('should propagate transport failures', async () => {
      server.reply('about', () => {
        throw new TransportError('Request failed: socket hang up', `${FAKE_API_URL}about`);
      });
      const session = await Session.open(config, log);

      await expect(session.call('about', emptyGrid())).rejects.toThrow('Request failed: socket hang up');
    });
  });
});

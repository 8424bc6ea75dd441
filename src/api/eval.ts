import type { Grid } from '../haystack/value.js';
import { evalRequest } from './client.js';
import { Session } from './session.js';
import type { ClientLogger, HaystackClientConfig } from './types.js';

export interface EvalOutput {
  grid: Grid;
  /** Set only when a handshake ran during the call */
  newAuthToken?: string;
}

/**
 * Evaluate one expression without keeping a client around. A supplied token
 * skips the handshake; a 403 re-authenticates once.
 */
export async function evalOnce(
  config: HaystackClientConfig,
  expr: string,
  log: ClientLogger,
  authToken?: string,
): Promise<EvalOutput> {
  const initialToken = authToken ?? config.authToken;
  const session = await Session.open({ ...config, authToken: initialToken }, log);
  const grid = await session.call('eval', evalRequest(expr));
  const token = session.authToken;
  return token !== undefined && token !== initialToken ? { grid, newAuthToken: token } : { grid };
}

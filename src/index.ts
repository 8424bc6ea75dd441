import type { API } from 'homebridge';

import { HaystackPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * This method registers the platform with Homebridge
 */
export default (api: API): void => {
  api.registerPlatform(PLATFORM_NAME, HaystackPlatform);
};

export * from './errors.js';
export * from './haystack/value.js';
export * from './haystack/grid.js';
export * from './haystack/timezone.js';
export * from './haystack/codec.js';
export { readZinc, readZincValue } from './haystack/zincReader.js';
export { writeZinc, writeZincValue } from './haystack/zincWriter.js';
export { csvCell, writeCsv } from './haystack/csv.js';
export { readHayson, readHaysonValue, haysonToValue, valueToHayson, writeHayson } from './haystack/hayson.js';
export type { JsonValue } from './haystack/hayson.js';
export * from './api/types.js';
export { FetchTransport } from './api/transport.js';
export { resolveConfig } from './api/config.js';
export type { ResolvedConfig } from './api/config.js';
export {
  ScramAuthenticator,
  clientProof,
  deriveSaltedPassword,
  escapeUsername,
  serverSignature,
} from './api/scram.js';
export type { AuthState, ScramOptions } from './api/scram.js';
export { Session } from './api/session.js';
export { HaystackClient, OP_CATALOGUE, hisReadRangeToString } from './api/client.js';
export type { HisItem, HisReadRange, OpEntry, OpName, PointWriteRequest } from './api/client.js';
export { evalOnce } from './api/eval.js';
export type { EvalOutput } from './api/eval.js';

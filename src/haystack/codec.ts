import { readHayson, writeHayson } from './hayson.js';
import { readZinc } from './zincReader.js';
import { writeZinc } from './zincWriter.js';
import type { Grid } from './value.js';

export type WireFormat = 'zinc' | 'hayson';

export interface GridCodec {
  readonly format: WireFormat;
  /** Value for the Content-Type and Accept headers */
  readonly mimeType: string;
  encode(grid: Grid): string;
  decode(text: string): Grid;
}

export const CODECS: Readonly<Record<WireFormat, GridCodec>> = {
  zinc: {
    format: 'zinc',
    mimeType: 'text/zinc; charset=utf-8',
    encode: writeZinc,
    decode: readZinc,
  },
  hayson: {
    format: 'hayson',
    mimeType: 'application/json',
    encode: writeHayson,
    decode: readHayson,
  },
};

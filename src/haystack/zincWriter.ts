import { GRID_VERSION } from './grid.js';
import { str } from './value.js';
import type { Grid, Tags, Value } from './value.js';

const CONTROL_ESCAPES: Readonly<Record<string, string>> = {
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '"': '\\"',
  '\\': '\\\\',
};

function quote(val: string): string {
  let out = '"';
  for (const c of val) {
    const escaped = CONTROL_ESCAPES[c];
    if (escaped !== undefined) {
      out += escaped;
    } else if (c < ' ') {
      out += `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`;
    } else {
      out += c;
    }
  }
  return `${out}"`;
}

function writeNumber(val: number, unit: string | undefined): string {
  if (Number.isNaN(val)) {
    return 'NaN';
  }
  if (!Number.isFinite(val)) {
    return val > 0 ? 'INF' : '-INF';
  }
  return `${String(val)}${unit ?? ''}`;
}

/**
 * ` name` for markers, ` name:value` otherwise
 */
function writeMetaItems(meta: Tags): string {
  return Object.entries(meta)
    .map(([name, value]) => ` ${value.kind === 'marker' ? name : `${name}:${writeZincValue(value)}`}`)
    .join('');
}

/**
 * Encode one value in canonical Zinc form
 */
export function writeZincValue(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'N';
    case 'marker':
      return 'M';
    case 'remove':
      return 'R';
    case 'na':
      return 'NA';
    case 'bool':
      return value.val ? 'T' : 'F';
    case 'number':
      return writeNumber(value.val, value.unit);
    case 'str':
      return quote(value.val);
    case 'uri':
      return `\`${value.val.replace(/[\\`]/g, (c) => `\\${c}`)}\``;
    case 'ref':
      return value.dis === undefined ? `@${value.id}` : `@${value.id} ${quote(value.dis)}`;
    case 'symbol':
      return `^${value.val}`;
    case 'date':
    case 'time':
      return value.val;
    case 'dateTime':
      return `${value.val} ${value.tz}`;
    case 'coord':
      return `C(${value.lat},${value.lng})`;
    case 'xstr':
      return `${value.type}(${quote(value.val)})`;
    case 'list':
      return `[${value.items.map(writeZincValue).join(',')}]`;
    case 'dict':
      return `{${writeMetaItems(value.tags).trimStart()}}`;
    case 'grid':
      return `<<\n${writeZinc(value)}>>`;
  }
}

/**
 * Encode a grid. Every line, including the last row, ends with a newline.
 */
export function writeZinc(grid: Grid): string {
  const { ver, ...meta } = grid.meta;
  const version = ver?.kind === 'str' ? ver : str(GRID_VERSION);
  const lines = [`ver:${quote(version.val)}${writeMetaItems(meta)}`];

  if (grid.cols.length === 0) {
    lines.push('empty');
  } else {
    lines.push(grid.cols.map((col) => `${col.name}${writeMetaItems(col.meta)}`).join(','));
    for (const row of grid.rows) {
      lines.push(
        grid.cols.map((col) => (Object.hasOwn(row, col.name) ? writeZincValue(row[col.name]) : '')).join(','),
      );
    }
  }
  return lines.map((line) => `${line}\n`).join('');
}

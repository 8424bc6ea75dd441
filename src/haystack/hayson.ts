import { ParseError, ValueError } from '../errors.js';
import { makeGrid } from './grid.js';
import type { ColInit } from './grid.js';
import {
  MARKER,
  NA,
  NULL,
  REMOVE,
  bool,
  coord,
  date,
  dateTime,
  dict,
  list,
  num,
  ref,
  str,
  symbol,
  time,
  uri,
  xstr,
} from './value.js';
import type { Grid, Tags, Value } from './value.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

type JsonObject = { [key: string]: unknown };

function isObject(node: unknown): node is JsonObject {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${path}[${key}]`;
  }
  return path ? `${path}.${key}` : key;
}

function shapeError(path: string, detail: string): ParseError {
  return new ParseError('hayson', 'Shape', detail, { path });
}

/**
 * Walks a parsed JSON tree, tracking the path for error reports
 */
class HaysonDecoder {
  decode(node: unknown, path: string): Value {
    if (node === null) return NULL;
    if (typeof node === 'boolean') return bool(node);
    if (typeof node === 'number') return num(node);
    if (typeof node === 'string') return str(node);
    if (Array.isArray(node)) {
      return list(node.map((item, index) => this.decode(item, childPath(path, index))));
    }
    if (!isObject(node)) {
      throw shapeError(path, `Unsupported JSON value of type ${typeof node}`);
    }

    const kind = node._kind;
    if (kind === undefined || kind === 'dict') {
      return this.build(path, () => dict(this.tags(node, path)));
    }
    if (typeof kind !== 'string') {
      throw shapeError(childPath(path, '_kind'), '_kind must be a string');
    }
    return this.decodeKind(kind, node, path);
  }

  private decodeKind(kind: string, node: JsonObject, path: string): Value {
    switch (kind) {
      case 'marker':
        return MARKER;
      case 'remove':
        return REMOVE;
      case 'na':
        return NA;
      case 'number': {
        const unit = this.optionalString(node, 'unit', path);
        return this.build(path, () => num(this.numberVal(node, path), unit));
      }
      case 'ref': {
        const id = this.string(node, 'val', path);
        const dis = this.optionalString(node, 'dis', path);
        return this.build(path, () => ref(id, dis));
      }
      case 'uri':
        return uri(this.string(node, 'val', path));
      case 'symbol':
        return this.build(path, () => symbol(this.string(node, 'val', path)));
      case 'date':
        return this.build(path, () => date(this.string(node, 'val', path)));
      case 'time':
        return this.build(path, () => time(this.string(node, 'val', path)));
      case 'dateTime': {
        const val = this.string(node, 'val', path);
        const tz = this.optionalString(node, 'tz', path) ?? 'UTC';
        return this.build(path, () => dateTime(val, tz));
      }
      case 'coord': {
        const lat = this.number(node, 'lat', path);
        const lng = this.number(node, 'lng', path);
        return this.build(path, () => coord(lat, lng));
      }
      case 'xstr': {
        const type = this.string(node, 'type', path);
        const val = this.string(node, 'val', path);
        return this.build(path, () => xstr(type, val));
      }
      case 'grid':
        return this.grid(node, path);
      default:
        throw new ParseError('hayson', 'UnknownKind', `Unknown _kind '${kind}'`, { path });
    }
  }

  grid(node: JsonObject, path: string): Grid {
    const metaNode = node.meta ?? {};
    if (!isObject(metaNode)) {
      throw shapeError(childPath(path, 'meta'), 'Grid meta must be an object');
    }
    const meta = this.tags(metaNode, childPath(path, 'meta'));

    const colsNode = node.cols ?? [];
    if (!Array.isArray(colsNode)) {
      throw shapeError(childPath(path, 'cols'), 'Grid cols must be an array');
    }
    const cols: ColInit[] = colsNode.map((col: unknown, index) => {
      const colPath = childPath(childPath(path, 'cols'), index);
      if (!isObject(col)) {
        throw shapeError(colPath, 'Column must be an object');
      }
      const name = this.string(col, 'name', colPath);
      const colMeta = col.meta ?? {};
      if (!isObject(colMeta)) {
        throw shapeError(childPath(colPath, 'meta'), 'Column meta must be an object');
      }
      return { name, meta: this.tags(colMeta, childPath(colPath, 'meta')) };
    });

    const rowsNode = node.rows ?? [];
    if (!Array.isArray(rowsNode)) {
      throw shapeError(childPath(path, 'rows'), 'Grid rows must be an array');
    }
    const rows = rowsNode.map((row: unknown, index) => {
      const rowPath = childPath(childPath(path, 'rows'), index);
      if (!isObject(row)) {
        throw shapeError(rowPath, 'Row must be an object');
      }
      return this.tags(row, rowPath);
    });

    return this.build(path, () => makeGrid({ meta, cols, rows }));
  }

  private tags(node: JsonObject, path: string): Record<string, Value> {
    // own properties, so a `__proto__` key reaches tag-name validation
    return Object.fromEntries(
      Object.entries(node)
        .filter(([key]) => key !== '_kind')
        .map(([key, child]): [string, Value] => [key, this.decode(child, childPath(path, key))]),
    );
  }

  private numberVal(node: JsonObject, path: string): number {
    const val = node.val;
    switch (val) {
      case 'INF':
        return Number.POSITIVE_INFINITY;
      case '-INF':
        return Number.NEGATIVE_INFINITY;
      case 'NaN':
        return Number.NaN;
      default:
        if (typeof val !== 'number') {
          throw shapeError(childPath(path, 'val'), 'Number val must be a number, "INF", "-INF" or "NaN"');
        }
        return val;
    }
  }

  private number(node: JsonObject, key: string, path: string): number {
    const val = node[key];
    if (typeof val !== 'number') {
      throw shapeError(childPath(path, key), `Expected number for '${key}'`);
    }
    return val;
  }

  private string(node: JsonObject, key: string, path: string): string {
    const val = node[key];
    if (typeof val !== 'string') {
      throw shapeError(childPath(path, key), `Expected string for '${key}'`);
    }
    return val;
  }

  private optionalString(node: JsonObject, key: string, path: string): string | undefined {
    return node[key] === undefined ? undefined : this.string(node, key, path);
  }

  private build<T>(path: string, construct: () => T): T {
    try {
      return construct();
    } catch (error) {
      if (error instanceof ValueError) {
        throw new ParseError('hayson', 'Value', error.message, { path }, { cause: error });
      }
      throw error;
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Invalid JSON';
    throw new ParseError('hayson', 'Syntax', message, {}, { cause: error });
  }
}

/**
 * Decode a Hayson (JSON) grid document
 */
export function readHayson(text: string): Grid {
  const root = parseJson(text);
  if (!isObject(root) || root._kind !== 'grid') {
    throw shapeError('', 'Top-level document must be an object with _kind "grid"');
  }
  return new HaysonDecoder().grid(root, '');
}

/**
 * Decode any Hayson value
 */
export function readHaysonValue(text: string): Value {
  return haysonToValue(parseJson(text));
}

export function haysonToValue(node: unknown): Value {
  return new HaysonDecoder().decode(node, '');
}

function tagsToHayson(tags: Tags): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [name, value] of Object.entries(tags)) {
    out[name] = valueToHayson(value);
  }
  return out;
}

function specialNumber(val: number): string {
  if (Number.isNaN(val)) return 'NaN';
  return val > 0 ? 'INF' : '-INF';
}

/**
 * Map a value to its Hayson JSON tree. Unitless finite numbers become plain JSON numbers.
 */
export function valueToHayson(value: Value): JsonValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'marker':
    case 'remove':
    case 'na':
      return { _kind: value.kind };
    case 'bool':
      return value.val;
    case 'number': {
      if (Number.isFinite(value.val) && value.unit === undefined) {
        return value.val;
      }
      const val = Number.isFinite(value.val) ? value.val : specialNumber(value.val);
      return value.unit === undefined ? { _kind: 'number', val } : { _kind: 'number', val, unit: value.unit };
    }
    case 'str':
      return value.val;
    case 'uri':
    case 'symbol':
    case 'date':
    case 'time':
      return { _kind: value.kind, val: value.val };
    case 'ref':
      return value.dis === undefined
        ? { _kind: 'ref', val: value.id }
        : { _kind: 'ref', val: value.id, dis: value.dis };
    case 'dateTime':
      return { _kind: 'dateTime', val: value.val, tz: value.tz };
    case 'coord':
      return { _kind: 'coord', lat: value.lat, lng: value.lng };
    case 'xstr':
      return { _kind: 'xstr', type: value.type, val: value.val };
    case 'list':
      return value.items.map(valueToHayson);
    case 'dict':
      return tagsToHayson(value.tags);
    case 'grid':
      return {
        _kind: 'grid',
        meta: tagsToHayson(value.meta),
        cols: value.cols.map((col): JsonValue =>
          Object.keys(col.meta).length === 0
            ? { name: col.name }
            : { name: col.name, meta: tagsToHayson(col.meta) },
        ),
        rows: value.rows.map(tagsToHayson),
      };
  }
}

export function writeHayson(value: Value): string {
  return JSON.stringify(valueToHayson(value));
}

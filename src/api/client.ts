import { OpError } from '../errors.js';
import { emptyGrid, makeGrid, missingCols } from '../haystack/grid.js';
import { dateTimeFromInstant } from '../haystack/timezone.js';
import { bool, num, ref, str } from '../haystack/value.js';
import type { DateTimeValue, DateValue, Grid, RefValue, Value } from '../haystack/value.js';
import { Session } from './session.js';
import type { CallOptions, ClientLogger, HaystackClientConfig } from './types.js';

export type OpName =
  | 'about'
  | 'ops'
  | 'formats'
  | 'defs'
  | 'read'
  | 'nav'
  | 'eval'
  | 'hisRead'
  | 'hisWrite'
  | 'pointWrite'
  | 'invokeAction'
  | 'watchSub'
  | 'watchUnsub'
  | 'watchPoll';

export interface OpEntry {
  name: OpName;
  /** Columns a response with at least one row must declare */
  requiredCols: readonly string[];
  supported: boolean;
}

function entry(name: OpName, requiredCols: readonly string[] = [], supported = true): OpEntry {
  return { name, requiredCols, supported };
}

export const OP_CATALOGUE: Readonly<Record<OpName, OpEntry>> = {
  about: entry('about', ['serverName']),
  ops: entry('ops', ['name']),
  formats: entry('formats', ['mime']),
  defs: entry('defs', ['def']),
  read: entry('read', ['id']),
  nav: entry('nav'),
  eval: entry('eval'),
  hisRead: entry('hisRead', ['ts', 'val']),
  hisWrite: entry('hisWrite'),
  // read mode additionally needs `level`, checked in pointWrite()
  pointWrite: entry('pointWrite'),
  invokeAction: entry('invokeAction'),
  watchSub: entry('watchSub', [], false),
  watchUnsub: entry('watchUnsub', [], false),
  watchPoll: entry('watchPoll', [], false),
};

function isOpName(name: string): name is OpName {
  return Object.hasOwn(OP_CATALOGUE, name);
}

export type HisReadRange =
  | { kind: 'today' }
  | { kind: 'yesterday' }
  | { kind: 'date'; date: DateValue }
  | { kind: 'dateSpan'; start: DateValue; end: DateValue }
  | { kind: 'dateTimeSpan'; start: DateTimeValue; end: DateTimeValue }
  | { kind: 'since'; start: DateTimeValue };

function rangeDateTime(value: DateTimeValue): string {
  return `${value.val} ${value.tz}`;
}

/**
 * The `range` string hisRead expects
 */
export function hisReadRangeToString(range: HisReadRange): string {
  switch (range.kind) {
    case 'today':
    case 'yesterday':
      return range.kind;
    case 'date':
      return range.date.val;
    case 'dateSpan':
      return `${range.start.val},${range.end.val}`;
    case 'dateTimeSpan':
      return `${rangeDateTime(range.start)},${rangeDateTime(range.end)}`;
    case 'since':
      return rangeDateTime(range.start);
  }
}

export interface HisItem {
  ts: DateTimeValue;
  val: Value;
}

export interface PointWriteRequest {
  level: number;
  val?: Value;
  who?: string;
  duration?: Value;
}

function toRef(id: RefValue | string): RefValue {
  return typeof id === 'string' ? ref(id) : id;
}

/**
 * Typed access to the Haystack HTTP operations of one project
 */
export class HaystackClient {
  private constructor(private readonly session: Session) {}

  static async open(config: HaystackClientConfig, log: ClientLogger): Promise<HaystackClient> {
    return new HaystackClient(await Session.open(config, log));
  }

  /** Current bearer token, for callers that cache it between runs */
  get authToken(): string | undefined {
    return this.session.authToken;
  }

  get projectName(): string | undefined {
    return this.session.projectName;
  }

  /**
   * Invoke any catalogued op by name. Unsupported ops reject without a request.
   */
  async op(name: string, request: Grid = emptyGrid(), options?: CallOptions): Promise<Grid> {
    if (!isOpName(name)) {
      throw new OpError(name, `Unknown operation '${name}'`);
    }
    const { supported, requiredCols } = OP_CATALOGUE[name];
    if (!supported) {
      throw new OpError(name, `Operation '${name}' is not supported`);
    }
    const grid = await this.session.call(name, request, options);
    this.checkCols(name, grid, requiredCols);
    return grid;
  }

  async about(options?: CallOptions): Promise<Grid> {
    return this.op('about', emptyGrid(), options);
  }

  async ops(options?: CallOptions): Promise<Grid> {
    return this.op('ops', emptyGrid(), options);
  }

  async formats(options?: CallOptions): Promise<Grid> {
    return this.op('formats', emptyGrid(), options);
  }

  async defs(filter?: string, limit?: number, options?: CallOptions): Promise<Grid> {
    if (filter === undefined) {
      return this.op('defs', emptyGrid(), options);
    }
    return this.op('defs', filterRequest(filter, limit), options);
  }

  /**
   * Records matching a filter. An empty result is a grid with no rows.
   */
  async read(filter: string, limit?: number, options?: CallOptions): Promise<Grid> {
    return this.op('read', filterRequest(filter, limit), options);
  }

  async readByIds(ids: readonly (RefValue | string)[], options?: CallOptions): Promise<Grid> {
    const request = makeGrid({ cols: ['id'], rows: ids.map((id) => ({ id: toRef(id) })) });
    return this.op('read', request, options);
  }

  async nav(navId?: string, options?: CallOptions): Promise<Grid> {
    const request =
      navId === undefined ? emptyGrid() : makeGrid({ cols: ['navId'], rows: [{ navId: str(navId) }] });
    return this.op('nav', request, options);
  }

  async eval(expr: string, options?: CallOptions): Promise<Grid> {
    return this.op('eval', evalRequest(expr), options);
  }

  async hisRead(id: RefValue | string, range: HisReadRange, options?: CallOptions): Promise<Grid> {
    const request = makeGrid({
      cols: ['id', 'range'],
      rows: [{ id: toRef(id), range: str(hisReadRangeToString(range)) }],
    });
    return this.op('hisRead', request, options);
  }

  async hisWrite(id: RefValue | string, items: readonly HisItem[], options?: CallOptions): Promise<Grid> {
    const request = makeGrid({
      meta: { id: toRef(id) },
      cols: ['ts', 'val'],
      rows: items.map(({ ts, val }) => ({ ts, val })),
    });
    return this.op('hisWrite', request, options);
  }

  async hisWriteBool(
    id: RefValue | string,
    items: readonly (readonly [Date, boolean])[],
    tz: string,
    options?: CallOptions,
  ): Promise<Grid> {
    return this.hisWrite(id, toHisItems(items, tz, (val) => bool(val)), options);
  }

  async hisWriteNum(
    id: RefValue | string,
    items: readonly (readonly [Date, number])[],
    tz: string,
    unit?: string,
    options?: CallOptions,
  ): Promise<Grid> {
    return this.hisWrite(id, toHisItems(items, tz, (val) => num(val, unit)), options);
  }

  async hisWriteStr(
    id: RefValue | string,
    items: readonly (readonly [Date, string])[],
    tz: string,
    options?: CallOptions,
  ): Promise<Grid> {
    return this.hisWrite(id, toHisItems(items, tz, (val) => str(val)), options);
  }

  /**
   * Without `write`, reads the point's priority array (one row per level).
   * With `write`, sets or clears (`val` omitted) one level.
   */
  async pointWrite(id: RefValue | string, write?: PointWriteRequest, options?: CallOptions): Promise<Grid> {
    const row: Record<string, Value> = { id: toRef(id) };
    if (write) {
      row.level = num(write.level);
      if (write.val !== undefined) row.val = write.val;
      if (write.who !== undefined) row.who = str(write.who);
      if (write.duration !== undefined) row.duration = write.duration;
    }
    const grid = await this.op('pointWrite', makeGrid({ cols: Object.keys(row), rows: [row] }), options);
    if (!write) {
      this.checkCols('pointWrite', grid, ['level']);
    }
    return grid;
  }

  async invokeAction(
    id: RefValue | string,
    action: string,
    args: Record<string, Value> = {},
    options?: CallOptions,
  ): Promise<Grid> {
    const request = makeGrid({
      meta: { id: toRef(id), action: str(action) },
      cols: Object.keys(args),
      rows: Object.keys(args).length > 0 ? [args] : [],
    });
    return this.op('invokeAction', request, options);
  }

  private checkCols(op: string, grid: Grid, required: readonly string[]): void {
    if (grid.rows.length === 0) {
      return;
    }
    const missing = missingCols(grid, required);
    if (missing.length > 0) {
      throw new OpError(op, `${op} response is missing columns: ${missing.join(', ')}`, { grid });
    }
  }
}

function filterRequest(filter: string, limit?: number): Grid {
  const row: Record<string, Value> = { filter: str(filter) };
  if (limit !== undefined) {
    row.limit = num(limit);
  }
  return makeGrid({ cols: Object.keys(row), rows: [row] });
}

export function evalRequest(expr: string): Grid {
  return makeGrid({ cols: ['expr'], rows: [{ expr: str(expr) }] });
}

function toHisItems<T>(items: readonly (readonly [Date, T])[], tz: string, toValue: (val: T) => Value): HisItem[] {
  return items.map(([instant, val]) => ({ ts: dateTimeFromInstant(instant, tz), val: toValue(val) }));
}

import { ValueError } from '../errors.js';
import { assertTagName, compareValues, isMarker, str, tags } from './value.js';
import type { Col, Grid, Tags, Value } from './value.js';

export const GRID_VERSION = '3.0';

export interface ColInit {
  name: string;
  meta?: Record<string, Value>;
}

export interface GridInit {
  meta?: Record<string, Value>;
  cols: readonly (string | ColInit)[];
  rows?: readonly Record<string, Value>[];
}

/**
 * Build a grid, checking every invariant:
 * - column names are unique tag names
 * - every row key names a declared column
 * - meta carries `ver`, first
 */
export function makeGrid(init: GridInit): Grid {
  const cols: Col[] = [];
  const seen = new Set<string>();
  for (const entry of init.cols) {
    const { name, meta = {} } = typeof entry === 'string' ? { name: entry } : entry;
    assertTagName(name);
    if (seen.has(name)) {
      throw new ValueError(`Duplicate column '${name}'`, 'gridColumns');
    }
    seen.add(name);
    cols.push(Object.freeze({ name, meta: tags(meta) }));
  }

  const initRows = init.rows ?? [];
  if (cols.length === 0 && initRows.length > 0) {
    throw new ValueError('A grid without columns cannot have rows', 'gridRow');
  }
  const rows = initRows.map((row, index) => {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        throw new ValueError(`Row ${index} has tag '${key}' with no matching column`, 'gridRow');
      }
    }
    return tags(row);
  });

  const meta: Record<string, Value> = init.meta ?? {};
  const { ver = str(GRID_VERSION), ...rest } = meta;
  return Object.freeze({
    kind: 'grid',
    meta: tags({ ver, ...rest }),
    cols: Object.freeze(cols),
    rows: Object.freeze(rows),
  });
}

export function emptyGrid(meta: Record<string, Value> = {}): Grid {
  return makeGrid({ meta, cols: [] });
}

/**
 * Build a grid whose columns are the sorted union of the rows' tag names
 */
export function gridFromRows(rows: readonly Record<string, Value>[], meta: Record<string, Value> = {}): Grid {
  const names = new Set<string>();
  for (const row of rows) {
    Object.keys(row).forEach((key) => names.add(key));
  }
  return makeGrid({ meta, cols: [...names].sort(), rows });
}

export function colNames(grid: Grid): string[] {
  return grid.cols.map((col) => col.name);
}

export function hasCol(grid: Grid, name: string): boolean {
  return grid.cols.some((col) => col.name === name);
}

/**
 * Values of one column, `undefined` where a row lacks the tag
 */
export function colValues(grid: Grid, name: string): (Value | undefined)[] {
  return grid.rows.map((row) => (Object.hasOwn(row, name) ? row[name] : undefined));
}

/**
 * Columns from `required` the grid does not declare
 */
export function missingCols(grid: Grid, required: readonly string[]): string[] {
  return required.filter((name) => !hasCol(grid, name));
}

function rebuild(grid: Grid, cols: readonly Col[], rows: readonly Tags[], meta: Tags = grid.meta): Grid {
  return makeGrid({
    meta,
    cols: cols.map((col) => ({ name: col.name, meta: col.meta })),
    rows,
  });
}

/**
 * Stable sort returning a new grid
 */
export function sortRows(grid: Grid, compare: (a: Tags, b: Tags) => number): Grid {
  return rebuild(grid, grid.cols, [...grid.rows].sort(compare));
}

/**
 * Sort by one column's values. Rows lacking the column go last.
 */
export function sortRowsBy(grid: Grid, name: string, descending = false): Grid {
  const direction = descending ? -1 : 1;
  return sortRows(grid, (a, b) => {
    const left = Object.hasOwn(a, name) ? a[name] : undefined;
    const right = Object.hasOwn(b, name) ? b[name] : undefined;
    if (left === undefined || right === undefined) {
      return Number(left === undefined) - Number(right === undefined);
    }
    return direction * compareValues(left, right);
  });
}

/**
 * Add a column (or replace an existing one) computed from each row.
 * Returning `undefined` leaves the row without the tag.
 */
export function addCol(
  grid: Grid,
  name: string,
  compute: (row: Tags) => Value | undefined,
  meta: Record<string, Value> = {},
): Grid {
  const cols = hasCol(grid, name)
    ? grid.cols.map((col) => (col.name === name ? { name, meta: tags(meta) } : col))
    : [...grid.cols, { name, meta: tags(meta) }];

  const rows = grid.rows.map((row) => {
    const { [name]: _previous, ...rest } = row;
    const value = compute(row);
    return value === undefined ? rest : { ...rest, [name]: value };
  });
  return rebuild(grid, cols, rows);
}

/**
 * Merge extra tags into the grid meta
 */
export function withMeta(grid: Grid, meta: Record<string, Value>): Grid {
  return rebuild(grid, grid.cols, grid.rows, { ...grid.meta, ...meta });
}

export function isErrorGrid(grid: Grid): boolean {
  return isMarker(grid.meta.err);
}

export function errorMessage(grid: Grid): string | undefined {
  const dis = grid.meta.dis;
  return dis?.kind === 'str' ? dis.val : undefined;
}

export function errorTrace(grid: Grid): string | undefined {
  const trace = grid.meta.errTrace;
  return trace?.kind === 'str' ? trace.val : undefined;
}

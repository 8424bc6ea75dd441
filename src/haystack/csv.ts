import { colNames } from './grid.js';
import { writeZincValue } from './zincWriter.js';
import type { Grid, Value } from './value.js';

/**
 * Text for one CSV cell. Lists, dicts and nested grids are not expanded.
 */
export function csvCell(value: Value | undefined): string {
  if (value === undefined) {
    return '';
  }
  switch (value.kind) {
    case 'null':
      return '';
    case 'marker':
      return '✓';
    case 'str':
    case 'uri':
      return value.val;
    case 'ref':
      return value.dis === undefined ? `@${value.id}` : `@${value.id} ${value.dis}`;
    case 'list':
      return '<List>';
    case 'dict':
      return '<Dict>';
    case 'grid':
      return '<Grid>';
    default:
      return writeZincValue(value);
  }
}

function escapeField(field: string): string {
  if (!/[",\r\n]/.test(field)) {
    return field;
  }
  return `"${field.replace(/"/g, '""')}"`;
}

/**
 * Export a grid as CSV: a header of column names, then one record per row.
 * Every record ends with a newline. A grid without columns exports as ''.
 */
export function writeCsv(grid: Grid): string {
  const names = colNames(grid);
  if (names.length === 0) {
    return '';
  }
  const records = [names.map(escapeField).join(',')];
  for (const row of grid.rows) {
    records.push(names.map((name) => escapeField(csvCell(row[name]))).join(','));
  }
  return records.map((record) => `${record}\n`).join('');
}

import { describe, expect, it } from 'vitest';

import { csvCell, writeCsv } from './csv.js';
import { emptyGrid, makeGrid } from './grid.js';
import {
  FALSE,
  MARKER,
  NA,
  NULL,
  TRUE,
  coord,
  dateTime,
  dict,
  list,
  num,
  ref,
  str,
  symbol,
  xstr,
} from './value.js';

describe('csvCell', () => {
  it('should show scalars in their display form', () => {
    expect(csvCell(MARKER)).toBe('✓');
    expect(csvCell(TRUE)).toBe('T');
    expect(csvCell(FALSE)).toBe('F');
    expect(csvCell(NA)).toBe('NA');
    expect(csvCell(num(72.5, '°F'))).toBe('72.5°F');
    expect(csvCell(str('plain text'))).toBe('plain text');
    expect(csvCell(ref('p1'))).toBe('@p1');
    expect(csvCell(ref('p1', 'Zone Temp'))).toBe('@p1 Zone Temp');
    expect(csvCell(symbol('site'))).toBe('^site');
    expect(csvCell(dateTime('2024-01-15T10:00:00-05:00', 'New_York'))).toBe('2024-01-15T10:00:00-05:00 New_York');
    expect(csvCell(coord(37.55, -77.45))).toBe('C(37.55,-77.45)');
    expect(csvCell(xstr('Bin', 'text/plain'))).toBe('Bin("text/plain")');
  });

  it('should leave null and absent cells empty', () => {
    expect(csvCell(NULL)).toBe('');
    expect(csvCell(undefined)).toBe('');
  });

  it('should not expand collections', () => {
    expect(csvCell(list([num(1)]))).toBe('<List>');
    expect(csvCell(dict({ a: MARKER }))).toBe('<Dict>');
    expect(csvCell(emptyGrid())).toBe('<Grid>');
  });
});

describe('writeCsv', () => {
  it('should write a header and one record per row', () => {
    const grid = makeGrid({
      cols: ['id', 'dis', 'curVal'],
      rows: [
        { id: ref('p1'), dis: str('Zone Temp'), curVal: num(72, '°F') },
        { id: ref('p2'), curVal: NULL },
      ],
    });

    expect(writeCsv(grid)).toBe('id,dis,curVal\n@p1,Zone Temp,72°F\n@p2,,\n');
  });

  it('should quote fields with commas, quotes or line breaks', () => {
    const grid = makeGrid({
      cols: ['a', 'b', 'c'],
      rows: [{ a: str('x,y'), b: str('say "hi"'), c: str('two\nlines') }],
    });

    expect(writeCsv(grid)).toBe('a,b,c\n"x,y","say ""hi""","two\nlines"\n');
  });

  it('should export a grid without columns as an empty string', () => {
    expect(writeCsv(emptyGrid())).toBe('');
  });
});

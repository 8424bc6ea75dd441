import { ParseError, ValueError } from '../errors.js';
import {
  FALSE,
  MARKER,
  NA,
  NULL,
  REMOVE,
  TRUE,
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
import { makeGrid } from './grid.js';
import type { ColInit } from './grid.js';
import type { Grid, StrValue, Value } from './value.js';

const TAG_ID = /[a-z][a-zA-Z0-9_]*/y;
const TYPE_ID = /[A-Za-z][a-zA-Z0-9_]*/y;
const REF_ID = /[a-zA-Z0-9_:\-.~]+/y;
const DATE_TIME = /(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}:\d{2})/y;
const DATE = /\d{4}-\d{2}-\d{2}/y;
const TIME = /\d{2}:\d{2}:\d{2}(?:\.\d+)?/y;
const HEX = /0x[0-9a-fA-F_]+/y;
const DECIMAL = /-?\d[\d_]*(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?/y;
const UNIT = /[a-zA-Z%_/$\u0080-\uFFFF]+/y;
const TZ = /[A-Z][a-zA-Z0-9_+\-/]*/y;

const STRING_ESCAPES: Readonly<Record<string, string>> = {
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
  $: '$',
};

/**
 * Recursive-descent Zinc parser over a single cursor.
 *
 * Line 1 is the grid meta, line 2 the columns, then one row per line until a
 * blank line or EOF. An empty cell means the row lacks that tag; `N` is NULL.
 */
class ZincReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  readTopLevelGrid(): Grid {
    this.skipWhitespace();
    const grid = this.readGrid(false);
    this.skipWhitespace();
    if (!this.atEnd()) {
      this.fail('Unexpected content after grid');
    }
    return grid;
  }

  readTopLevelValue(): Value {
    this.skipWhitespace();
    const value = this.readLiteral();
    this.skipWhitespace();
    if (!this.atEnd()) {
      this.fail('Unexpected content after value');
    }
    return value;
  }

  // ---------------------------------------------------------------------------
  // Grid structure
  // ---------------------------------------------------------------------------

  private readGrid(nested: boolean): Grid {
    const start = this.pos;
    const version = this.match(TAG_ID);
    if (version !== 'ver' || this.peek() !== ':') {
      this.pos = start;
      this.fail("Grid must start with ver:\"...\"");
    }
    this.pos++;
    if (this.peek() !== '"') {
      this.fail('Grid version must be a string');
    }
    const meta: Record<string, Value> = { ver: this.readStr() };
    Object.assign(meta, this.readMetaItems());
    this.expectNewline();

    const cols = this.readCols();
    const rows: Record<string, Value>[] = [];
    while (!this.rowsEnded(nested)) {
      if (this.atBlankLine()) {
        if (this.onlyWhitespaceRemains(nested)) {
          break;
        }
        if (cols.length !== 1) {
          this.fail('Blank line inside grid');
        }
        this.expectNewline();
        rows.push({});
        continue;
      }
      rows.push(this.readRow(cols));
    }

    // zero-column grids are written with a single `empty` column
    const placeholder =
      rows.length === 0 && cols.length === 1 && cols[0].name === 'empty' && Object.keys(cols[0].meta ?? {}).length === 0;
    return this.build(() => makeGrid({ meta, cols: placeholder ? [] : cols, rows }));
  }

  private readCols(): ColInit[] {
    const cols: ColInit[] = [];
    for (;;) {
      this.skipSpaces();
      const name = this.match(TAG_ID);
      if (name === undefined) {
        this.fail('Expected column name');
      }
      cols.push({ name, meta: this.readMetaItems() });
      this.skipSpaces();
      if (this.peek() !== ',') {
        break;
      }
      this.pos++;
    }
    this.expectNewline();
    return cols;
  }

  private readRow(cols: readonly ColInit[]): Record<string, Value> {
    const row: Record<string, Value> = {};
    cols.forEach((col, index) => {
      this.skipSpaces();
      const c = this.peek();
      if (c !== ',' && !this.atLineEnd()) {
        row[col.name] = this.readLiteral();
        this.skipSpaces();
      }
      if (index < cols.length - 1) {
        if (this.peek() !== ',') {
          this.fail(`Row has fewer cells than the ${cols.length} columns`);
        }
        this.pos++;
      }
    });
    if (this.peek() === ',') {
      this.fail(`Row has more cells than the ${cols.length} columns`);
    }
    this.expectNewline();
    return row;
  }

  /**
   * `name` or `name:value` items separated by spaces, up to the end of the line
   * (or a comma, for column meta)
   */
  private readMetaItems(): Record<string, Value> {
    const items: Record<string, Value> = {};
    for (;;) {
      const save = this.pos;
      this.skipSpaces();
      const name = this.match(TAG_ID);
      if (name === undefined) {
        this.pos = save;
        return items;
      }
      if (this.peek() === ':') {
        this.pos++;
        items[name] = this.readLiteral();
      } else {
        items[name] = MARKER;
      }
    }
  }

  private rowsEnded(nested: boolean): boolean {
    const save = this.pos;
    this.skipSpaces();
    if (nested && this.text.startsWith('>>', this.pos)) {
      this.pos += 2;
      return true;
    }
    if (this.atEnd()) {
      return true;
    }
    this.pos = save;
    return false;
  }

  private atBlankLine(): boolean {
    let p = this.pos;
    while (this.text[p] === ' ' || this.text[p] === '\t') p++;
    return this.text[p] === '\n' || this.text[p] === '\r';
  }

  private onlyWhitespaceRemains(nested: boolean): boolean {
    let p = this.pos;
    while (p < this.text.length && /\s/.test(this.text[p])) p++;
    if (p >= this.text.length) {
      this.pos = p;
      return true;
    }
    if (nested && this.text.startsWith('>>', p)) {
      this.pos = p + 2;
      return true;
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Literals
  // ---------------------------------------------------------------------------

  private readLiteral(): Value {
    const c = this.peek();
    switch (c) {
      case '"':
        return this.readStr();
      case '`':
        return this.readUri();
      case '@':
        return this.readRef();
      case '^':
        this.pos++;
        return this.build(() => symbol(this.expect(REF_ID, 'symbol name')));
      case '[':
        return this.readList();
      case '{':
        return this.readDict();
      case '<':
        if (this.text.startsWith('<<', this.pos)) {
          this.pos += 2;
          this.skipWhitespace();
          return this.readGrid(true);
        }
        break;
      case '-':
        if (this.text.startsWith('-INF', this.pos)) {
          this.pos += 4;
          return num(Number.NEGATIVE_INFINITY);
        }
        return this.readNumber();
      default:
        break;
    }
    if (c !== undefined && c >= '0' && c <= '9') {
      return this.readDigitLiteral();
    }
    if (c !== undefined && /[A-Za-z]/.test(c)) {
      return this.readKeyword();
    }
    this.fail(c === undefined ? 'Unexpected end of input' : `Unexpected character '${c}'`);
  }

  private readKeyword(): Value {
    const start = this.pos;
    const id = this.expect(TYPE_ID, 'literal');
    if (this.peek() === '(') {
      this.pos++;
      this.skipSpaces();
      if (id === 'C' && this.peek() !== '"') {
        return this.readCoord(start);
      }
      if (this.peek() !== '"') {
        this.fail(`Expected string inside ${id}(...)`);
      }
      const payload = this.readStr().val;
      this.skipSpaces();
      this.expectChar(')');
      return this.build(() => xstr(id, payload), start);
    }
    switch (id) {
      case 'T':
        return TRUE;
      case 'F':
        return FALSE;
      case 'N':
        return NULL;
      case 'M':
        return MARKER;
      case 'R':
        return REMOVE;
      case 'NA':
        return NA;
      case 'NaN':
        return num(Number.NaN);
      case 'INF':
        return num(Number.POSITIVE_INFINITY);
      default:
        this.pos = start;
        this.fail(`Unknown literal '${id}'`);
    }
  }

  private readCoord(start: number): Value {
    const lat = this.readPlainNumber();
    this.skipSpaces();
    this.expectChar(',');
    this.skipSpaces();
    const lng = this.readPlainNumber();
    this.skipSpaces();
    this.expectChar(')');
    return this.build(() => coord(lat, lng), start);
  }

  private readDigitLiteral(): Value {
    const start = this.pos;
    const dateTimeMatch = this.exec(DATE_TIME);
    if (dateTimeMatch) {
      const [, local, offset] = dateTimeMatch;
      let tz = offset === 'Z' ? 'UTC' : undefined;
      if (this.peek() === ' ' && /[A-Z]/.test(this.text[this.pos + 1] ?? '')) {
        this.pos++;
        tz = this.expect(TZ, 'time zone');
      }
      if (tz === undefined) {
        this.fail('Date-time with an offset needs a time zone name');
      }
      return this.build(() => dateTime(`${local}${offset}`, tz), start);
    }
    const dateMatch = this.match(DATE);
    if (dateMatch !== undefined) {
      return this.build(() => date(dateMatch), start);
    }
    const timeMatch = this.match(TIME);
    if (timeMatch !== undefined) {
      return this.build(() => time(timeMatch), start);
    }
    const hex = this.match(HEX);
    if (hex !== undefined) {
      return this.readUnit(Number.parseInt(hex.slice(2).replace(/_/g, ''), 16), start);
    }
    return this.readNumber();
  }

  private readNumber(): Value {
    const start = this.pos;
    return this.readUnit(this.readPlainNumber(), start);
  }

  private readPlainNumber(): number {
    const digits = this.expect(DECIMAL, 'number');
    return Number(digits.replace(/_/g, ''));
  }

  private readUnit(value: number, start: number): Value {
    const unit = this.match(UNIT);
    return this.build(() => num(value, unit), start);
  }

  private readStr(): StrValue {
    return str(this.readQuoted('"', STRING_ESCAPES));
  }

  private readUri(): Value {
    return uri(this.readQuoted('`', { '`': '`', '\\': '\\' }));
  }

  /**
   * Read a delimited literal. Escapes not in `escapes` (other than \u) are kept verbatim.
   */
  private readQuoted(quote: string, escapes: Readonly<Record<string, string>>): string {
    const start = this.pos;
    this.pos++;
    let out = '';
    for (;;) {
      const c = this.text[this.pos];
      if (c === undefined || c === '\n') {
        this.pos = start;
        this.fail('Unterminated literal');
      }
      if (c === quote) {
        this.pos++;
        return out;
      }
      if (c === '\\') {
        const next = this.text[this.pos + 1];
        if (next === 'u') {
          const hex = this.text.slice(this.pos + 2, this.pos + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            this.fail('Invalid \\u escape');
          }
          out += String.fromCharCode(Number.parseInt(hex, 16));
          this.pos += 6;
          continue;
        }
        if (next !== undefined && Object.hasOwn(escapes, next)) {
          out += escapes[next];
          this.pos += 2;
          continue;
        }
        if (quote === '"') {
          this.fail(`Invalid escape '\\${next ?? ''}'`);
        }
        out += c;
        this.pos++;
        continue;
      }
      out += c;
      this.pos++;
    }
  }

  private readRef(): Value {
    const start = this.pos;
    this.pos++;
    const id = this.expect(REF_ID, 'ref id');
    let dis: string | undefined;
    if (this.peek() === ' ' && this.text[this.pos + 1] === '"') {
      this.pos++;
      dis = this.readStr().val;
    }
    return this.build(() => ref(id, dis), start);
  }

  private readList(): Value {
    this.pos++;
    const items: Value[] = [];
    for (;;) {
      this.skipSpaces();
      if (this.peek() === ']') {
        this.pos++;
        return list(items);
      }
      items.push(this.readLiteral());
      this.skipSpaces();
      if (this.peek() === ',') {
        this.pos++;
      } else if (this.peek() !== ']') {
        this.fail("Expected ',' or ']' in list");
      }
    }
  }

  private readDict(): Value {
    const start = this.pos;
    this.pos++;
    const items: Record<string, Value> = {};
    for (;;) {
      this.skipSpaces();
      const c = this.peek();
      if (c === '}') {
        this.pos++;
        return this.build(() => dict(items), start);
      }
      if (c === ',') {
        this.pos++;
        continue;
      }
      const name = this.expect(TAG_ID, 'tag name');
      if (this.peek() === ':') {
        this.pos++;
        items[name] = this.readLiteral();
      } else {
        items[name] = MARKER;
      }
      const after = this.peek();
      if (after !== ' ' && after !== ',' && after !== '}') {
        this.fail("Expected ' ', ',' or '}' in dict");
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Cursor helpers
  // ---------------------------------------------------------------------------

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private atLineEnd(): boolean {
    const c = this.peek();
    return c === undefined || c === '\n' || c === '\r';
  }

  private skipSpaces(): void {
    while (this.peek() === ' ' || this.peek() === '\t') this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private expectNewline(): void {
    this.skipSpaces();
    if (this.text.startsWith('\r\n', this.pos)) {
      this.pos += 2;
    } else if (this.peek() === '\n') {
      this.pos++;
    } else if (!this.atEnd()) {
      this.fail(`Expected end of line but found '${this.peek()}'`);
    }
  }

  private expectChar(char: string): void {
    if (this.peek() !== char) {
      this.fail(`Expected '${char}'`);
    }
    this.pos++;
  }

  private exec(pattern: RegExp): RegExpExecArray | null {
    pattern.lastIndex = this.pos;
    const result = pattern.exec(this.text);
    if (result) {
      this.pos = pattern.lastIndex;
    }
    return result;
  }

  private match(pattern: RegExp): string | undefined {
    return this.exec(pattern)?.[0];
  }

  private expect(pattern: RegExp, what: string): string {
    const result = this.match(pattern);
    if (result === undefined) {
      this.fail(`Expected ${what}`);
    }
    return result;
  }

  /**
   * Run a value constructor, reporting its ValueError at `at`
   */
  private build<T>(construct: () => T, at = this.pos): T {
    try {
      return construct();
    } catch (error) {
      if (error instanceof ValueError) {
        this.pos = at;
        this.fail(error.message, 'Value', error);
      }
      throw error;
    }
  }

  private fail(detail: string, kind: 'Syntax' | 'Value' = 'Syntax', cause?: Error): never {
    const before = this.text.slice(0, this.pos);
    const line = before.split('\n').length;
    const column = this.pos - before.lastIndexOf('\n');
    throw new ParseError('zinc', kind, detail, { line, column }, cause ? { cause } : undefined);
  }
}

/**
 * Decode a Zinc grid
 */
export function readZinc(text: string): Grid {
  return new ZincReader(text).readTopLevelGrid();
}

/**
 * Decode a single Zinc scalar or collection literal
 */
export function readZincValue(text: string): Value {
  return new ZincReader(text).readTopLevelValue();
}

import { ValueError } from '../errors.js';

/**
 * Haystack value model
 *
 * Every value is a plain frozen object tagged by `kind`. Consumers switch on
 * `kind` exhaustively, so adding a variant breaks every codec that does not
 * handle it yet.
 */

/** Tag name -> value. A missing key means the tag is absent, which is not the same as NULL. */
export type Tags = Readonly<Record<string, Value>>;

export interface NullValue {
  readonly kind: 'null';
}

export interface MarkerValue {
  readonly kind: 'marker';
}

export interface RemoveValue {
  readonly kind: 'remove';
}

export interface NaValue {
  readonly kind: 'na';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly val: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly val: number;
  readonly unit?: string;
}

export interface StrValue {
  readonly kind: 'str';
  readonly val: string;
}

export interface UriValue {
  readonly kind: 'uri';
  readonly val: string;
}

export interface RefValue {
  readonly kind: 'ref';
  readonly id: string;
  readonly dis?: string;
}

export interface SymbolValue {
  readonly kind: 'symbol';
  readonly val: string;
}

/** `YYYY-MM-DD` */
export interface DateValue {
  readonly kind: 'date';
  readonly val: string;
}

/** `hh:mm:ss[.fff]` */
export interface TimeValue {
  readonly kind: 'time';
  readonly val: string;
}

/**
 * ISO 8601 date-time with its original offset (`2024-03-01T10:15:00-05:00`)
 * plus the Haystack time-zone name (`New_York`).
 */
export interface DateTimeValue {
  readonly kind: 'dateTime';
  readonly val: string;
  readonly tz: string;
}

export interface CoordValue {
  readonly kind: 'coord';
  readonly lat: number;
  readonly lng: number;
}

export interface XStrValue {
  readonly kind: 'xstr';
  readonly type: string;
  readonly val: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface DictValue {
  readonly kind: 'dict';
  readonly tags: Tags;
}

export interface Col {
  readonly name: string;
  readonly meta: Tags;
}

export interface Grid {
  readonly kind: 'grid';
  readonly meta: Tags;
  readonly cols: readonly Col[];
  /** Each row only holds keys naming declared columns */
  readonly rows: readonly Tags[];
}

export type Value =
  | NullValue
  | MarkerValue
  | RemoveValue
  | NaValue
  | BoolValue
  | NumberValue
  | StrValue
  | UriValue
  | RefValue
  | SymbolValue
  | DateValue
  | TimeValue
  | DateTimeValue
  | CoordValue
  | XStrValue
  | ListValue
  | DictValue
  | Grid;

export type ValueKind = Value['kind'];

const TAG_NAME = /^[a-z][a-zA-Z0-9_]*$/;
const REF_CHARS = /^[a-zA-Z0-9_:\-.~]+$/;
const UNIT_CHARS = /^[a-zA-Z%_/$\u0080-\uFFFF]+$/;
const XSTR_TYPE = /^[A-Z][a-zA-Z0-9_]*$/;
const TZ_NAME = /^[A-Z][a-zA-Z0-9_+\-/]*$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2}):(\d{2})(\.\d+)?$/;
const DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2}(?:\.\d+)?)(Z|[+-]\d{2}:\d{2})$/;

export const NULL: NullValue = Object.freeze({ kind: 'null' });
export const MARKER: MarkerValue = Object.freeze({ kind: 'marker' });
export const REMOVE: RemoveValue = Object.freeze({ kind: 'remove' });
export const NA: NaValue = Object.freeze({ kind: 'na' });
export const TRUE: BoolValue = Object.freeze({ kind: 'bool', val: true });
export const FALSE: BoolValue = Object.freeze({ kind: 'bool', val: false });

export function isTagName(name: string): boolean {
  return TAG_NAME.test(name);
}

export function isRefId(id: string): boolean {
  return REF_CHARS.test(id);
}

export function isUnit(unit: string): boolean {
  return UNIT_CHARS.test(unit);
}

export function isTimeZoneName(tz: string): boolean {
  return TZ_NAME.test(tz);
}

export function assertTagName(name: string): string {
  if (!isTagName(name)) {
    throw new ValueError(`Invalid tag name '${name}': must match [a-z][a-zA-Z0-9_]*`, 'tagName');
  }
  return name;
}

export function bool(val: boolean): BoolValue {
  return val ? TRUE : FALSE;
}

export function num(val: number, unit?: string): NumberValue {
  if (unit === undefined) {
    return Object.freeze({ kind: 'number', val });
  }
  if (!isUnit(unit)) {
    throw new ValueError(`Invalid unit '${unit}'`, 'unit');
  }
  return Object.freeze({ kind: 'number', val, unit });
}

export function str(val: string): StrValue {
  return Object.freeze({ kind: 'str', val });
}

export function uri(val: string): UriValue {
  return Object.freeze({ kind: 'uri', val });
}

export function ref(id: string, dis?: string): RefValue {
  if (!isRefId(id)) {
    throw new ValueError(`Invalid ref id '${id}'`, 'refId');
  }
  return Object.freeze(dis === undefined ? { kind: 'ref', id } : { kind: 'ref', id, dis });
}

export function symbol(val: string): SymbolValue {
  if (!isRefId(val)) {
    throw new ValueError(`Invalid symbol '${val}'`, 'symbol');
  }
  return Object.freeze({ kind: 'symbol', val });
}

export function date(val: string): DateValue {
  assertDate(val);
  return Object.freeze({ kind: 'date', val });
}

export function time(val: string): TimeValue {
  assertTime(val);
  return Object.freeze({ kind: 'time', val });
}

export function dateTime(val: string, tz = 'UTC'): DateTimeValue {
  const match = DATE_TIME_PATTERN.exec(val);
  if (!match) {
    throw new ValueError(`Invalid date-time '${val}'`, 'dateTime');
  }
  assertDate(match[1]);
  assertTime(match[2]);
  if (match[3] !== 'Z') {
    const [hours, minutes] = match[3].slice(1).split(':').map(Number);
    if (hours > 18 || minutes > 59) {
      throw new ValueError(`Invalid offset in date-time '${val}'`, 'dateTime');
    }
  }
  if (!isTimeZoneName(tz)) {
    throw new ValueError(`Invalid time zone name '${tz}'`, 'timeZone');
  }
  return Object.freeze({ kind: 'dateTime', val, tz });
}

export function coord(lat: number, lng: number): CoordValue {
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new ValueError(`Latitude ${lat} is outside -90..90`, 'coordLat');
  }
  if (!Number.isFinite(lng) || lng < -180 || lng > 180) {
    throw new ValueError(`Longitude ${lng} is outside -180..180`, 'coordLng');
  }
  return Object.freeze({ kind: 'coord', lat, lng });
}

export function xstr(type: string, val: string): XStrValue {
  if (!XSTR_TYPE.test(type)) {
    throw new ValueError(`Invalid XStr type '${type}': must start with an uppercase letter`, 'xstrType');
  }
  return Object.freeze({ kind: 'xstr', type, val });
}

export function list(items: readonly Value[]): ListValue {
  return Object.freeze({ kind: 'list', items: Object.freeze([...items]) });
}

/**
 * Validate tag names and freeze a tag record
 */
export function tags(record: Record<string, Value>): Tags {
  const out: Record<string, Value> = {};
  for (const [name, value] of Object.entries(record)) {
    out[assertTagName(name)] = value;
  }
  return Object.freeze(out);
}

export function dict(record: Record<string, Value>): DictValue {
  return Object.freeze({ kind: 'dict', tags: tags(record) });
}

function assertDate(val: string): void {
  const match = DATE_PATTERN.exec(val);
  if (!match) {
    throw new ValueError(`Invalid date '${val}': expected YYYY-MM-DD`, 'date');
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (month < 1 || month > 12 || probe.getUTCDate() !== day || probe.getUTCMonth() !== month - 1) {
    throw new ValueError(`Invalid date '${val}': no such calendar day`, 'date');
  }
}

function assertTime(val: string): void {
  const match = TIME_PATTERN.exec(val);
  if (!match || Number(match[1]) > 23 || Number(match[2]) > 59 || Number(match[3]) > 59) {
    throw new ValueError(`Invalid time '${val}': expected hh:mm:ss`, 'time');
  }
}

// ---------------------------------------------------------------------------
// Equality and ordering
// ---------------------------------------------------------------------------

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function tagsEqual(a: Tags, b: Tags): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => key in b && valueEquals(a[key], b[key]));
}

/**
 * Structural equality. Numbers compare value and unit; refs compare by id only.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'null':
    case 'marker':
    case 'remove':
    case 'na':
      return b.kind === a.kind;
    case 'bool':
      return b.kind === 'bool' && a.val === b.val;
    case 'number':
      return b.kind === 'number' && sameNumber(a.val, b.val) && a.unit === b.unit;
    case 'str':
    case 'uri':
    case 'symbol':
    case 'date':
    case 'time':
      return b.kind === a.kind && a.val === b.val;
    case 'ref':
      return b.kind === 'ref' && a.id === b.id;
    case 'dateTime':
      return b.kind === 'dateTime' && a.val === b.val && a.tz === b.tz;
    case 'coord':
      return b.kind === 'coord' && a.lat === b.lat && a.lng === b.lng;
    case 'xstr':
      return b.kind === 'xstr' && a.type === b.type && a.val === b.val;
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case 'dict':
      return b.kind === 'dict' && tagsEqual(a.tags, b.tags);
    case 'grid':
      return b.kind === 'grid' && gridEquals(a, b);
  }
}

export function gridEquals(a: Grid, b: Grid): boolean {
  return (
    tagsEqual(a.meta, b.meta) &&
    a.cols.length === b.cols.length &&
    a.cols.every((col, i) => col.name === b.cols[i].name && tagsEqual(col.meta, b.cols[i].meta)) &&
    a.rows.length === b.rows.length &&
    a.rows.every((row, i) => tagsEqual(row, b.rows[i]))
  );
}

const KIND_ORDER: readonly ValueKind[] = [
  'null',
  'marker',
  'remove',
  'na',
  'bool',
  'number',
  'str',
  'uri',
  'ref',
  'symbol',
  'date',
  'time',
  'dateTime',
  'coord',
  'xstr',
  'list',
  'dict',
  'grid',
];

function compareScalars<T extends string | number | boolean>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order used for sorting grid rows. Values of different kinds order by
 * kind; collections only order by size.
 */
export function compareValues(a: Value, b: Value): number {
  if (a.kind !== b.kind) {
    return KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind);
  }
  switch (a.kind) {
    case 'null':
    case 'marker':
    case 'remove':
    case 'na':
      return 0;
    case 'bool':
      return b.kind === 'bool' ? compareScalars(a.val, b.val) : 0;
    case 'number':
      if (b.kind !== 'number') return 0;
      if (Number.isNaN(a.val) || Number.isNaN(b.val)) {
        return Number(Number.isNaN(a.val)) - Number(Number.isNaN(b.val));
      }
      return compareScalars(a.val, b.val) || compareScalars(a.unit ?? '', b.unit ?? '');
    case 'str':
    case 'uri':
    case 'symbol':
    case 'date':
    case 'time':
      return b.kind === a.kind ? compareScalars(a.val, b.val) : 0;
    case 'ref':
      return b.kind === 'ref' ? compareScalars(a.dis ?? a.id, b.dis ?? b.id) : 0;
    case 'dateTime':
      return b.kind === 'dateTime' ? compareScalars(Date.parse(a.val), Date.parse(b.val)) : 0;
    case 'coord':
      return b.kind === 'coord' ? compareScalars(a.lat, b.lat) || compareScalars(a.lng, b.lng) : 0;
    case 'xstr':
      return b.kind === 'xstr' ? compareScalars(a.type, b.type) || compareScalars(a.val, b.val) : 0;
    case 'list':
      return b.kind === 'list' ? a.items.length - b.items.length : 0;
    case 'dict':
      return b.kind === 'dict' ? Object.keys(a.tags).length - Object.keys(b.tags).length : 0;
    case 'grid':
      return b.kind === 'grid' ? a.rows.length - b.rows.length : 0;
  }
}

// ---------------------------------------------------------------------------
// Typed accessors
// ---------------------------------------------------------------------------

export function asNumber(value: Value | undefined): NumberValue | undefined {
  return value?.kind === 'number' ? value : undefined;
}

export function asRef(value: Value | undefined): RefValue | undefined {
  return value?.kind === 'ref' ? value : undefined;
}

export function asStr(value: Value | undefined): string | undefined {
  return value?.kind === 'str' ? value.val : undefined;
}

export function asUri(value: Value | undefined): string | undefined {
  return value?.kind === 'uri' ? value.val : undefined;
}

export function asDate(value: Value | undefined): DateValue | undefined {
  return value?.kind === 'date' ? value : undefined;
}

export function asTime(value: Value | undefined): TimeValue | undefined {
  return value?.kind === 'time' ? value : undefined;
}

export function asDateTime(value: Value | undefined): DateTimeValue | undefined {
  return value?.kind === 'dateTime' ? value : undefined;
}

export function asCoord(value: Value | undefined): CoordValue | undefined {
  return value?.kind === 'coord' ? value : undefined;
}

export function asXStr(value: Value | undefined): XStrValue | undefined {
  return value?.kind === 'xstr' ? value : undefined;
}

export function isMarker(value: Value | undefined): value is MarkerValue {
  return value?.kind === 'marker';
}

export function isNA(value: Value | undefined): value is NaValue {
  return value?.kind === 'na';
}

export function isRemove(value: Value | undefined): value is RemoveValue {
  return value?.kind === 'remove';
}

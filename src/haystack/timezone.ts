import { ValueError } from '../errors.js';
import { dateTime } from './value.js';
import type { DateTimeValue } from './value.js';

const UTC_ALIASES = new Set(['UTC', 'Etc/UTC', 'GMT', 'Etc/GMT', 'Z']);

const REGIONS = ['America', 'Europe', 'Asia', 'Africa', 'Australia', 'Pacific', 'Atlantic', 'Indian', 'Antarctica'];

let zoneCache: readonly string[] | undefined;

function knownZones(): readonly string[] {
  zoneCache ??= Intl.supportedValuesOf('timeZone');
  return zoneCache;
}

function isUsableZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function lastSegment(name: string): string {
  const segments = name.split('/');
  return segments[segments.length - 1];
}

/**
 * Resolve a Haystack time-zone name (`New_York`) or a full IANA name
 * (`America/New_York`) to the IANA name the runtime understands.
 */
export function toIanaTimeZone(name: string): string | undefined {
  if (UTC_ALIASES.has(name)) {
    return 'UTC';
  }
  const zones = knownZones();
  const match = zones.find((zone) => zone === name) ?? zones.find((zone) => lastSegment(zone) === name);
  if (match) {
    return match;
  }
  // Intl lists canonical ids only (Asia/Calcutta, not Asia/Kolkata) and leaves
  // out Etc/GMT+5 style zones, though it accepts both
  for (const candidate of [name, `Etc/${name}`, ...REGIONS.map((region) => `${region}/${name}`)]) {
    if (isUsableZone(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Shorten an IANA name to the Haystack convention (its last path segment)
 */
export function toHaystackTimeZone(iana: string): string {
  return UTC_ALIASES.has(iana) ? 'UTC' : lastSegment(iana);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) {
    return 'Z';
  }
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Build a DateTime value for an instant as seen in the given time zone,
 * carrying that zone's offset at the instant.
 */
export function dateTimeFromInstant(instant: Date, tz: string): DateTimeValue {
  const iana = toIanaTimeZone(tz);
  if (!iana) {
    throw new ValueError(`Unknown time zone '${tz}'`, 'timeZone');
  }
  const millis = instant.getTime();
  if (Number.isNaN(millis)) {
    throw new ValueError('Invalid Date instant', 'dateTime');
  }

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: iana,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? Number.NaN);

  const wallClock = Date.UTC(
    part('year'),
    part('month') - 1,
    part('day'),
    part('hour'),
    part('minute'),
    part('second'),
  );
  const wholeSeconds = Math.floor(millis / 1000) * 1000;
  const offsetMinutes = Math.round((wallClock - wholeSeconds) / 60000);
  const fraction = millis - wholeSeconds;

  const local = new Date(wallClock).toISOString().slice(0, 19);
  const val = `${local}${fraction > 0 ? `.${pad(fraction, 3)}` : ''}${formatOffset(offsetMinutes)}`;
  return dateTime(val, toHaystackTimeZone(iana));
}

/**
 * The UTC instant a DateTime value denotes
 */
export function dateTimeInstant(value: DateTimeValue): Date {
  return new Date(Date.parse(value.val));
}

/**
 * Date and time grammars of RFC 6350 section 4.3 (ISO 8601 basic format).
 *
 *   date              YYYYMMDD | YYYY | YYYY-MM | --MMDD | --MM | ---DD
 *   time              HH[MM[SS]][zone] | -MM[SS][zone] | --SS[zone]
 *   date-time         date-noreduc "T" time-notrunc
 *   timestamp         YYYYMMDD "T" HHMMSS[zone]
 *   date-and-or-time  date-time | date | "T" time
 *   zone              "Z" | (+|-)HH[MM]
 *
 * Extended forms (YYYY-MM-DD, HH:MM:SS) are rejected. Parsers return null
 * when the input does not match; formatters throw ValueError for values that
 * have no textual form.
 */

import type { DateAndOrTime, DateTime, PartialDate, PartialTime, UtcOffset, Zone } from './types.js';
import { ValueError } from './errors.js';

const ZONE = '([Zz]|[+-]\\d{2}(?:\\d{2})?)';

const DATE_FULL = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_YEAR = /^(\d{4})$/;
const DATE_YEAR_MONTH = /^(\d{4})-(\d{2})$/;
const DATE_MONTH_DAY = /^--(\d{2})(\d{2})?$/;
const DATE_DAY = /^---(\d{2})$/;

const TIME_HOUR = new RegExp(`^(\\d{2})(?:(\\d{2})(\\d{2})?)?${ZONE}?$`);
const TIME_MINUTE = new RegExp(`^-(\\d{2})(\\d{2})?${ZONE}?$`);
const TIME_SECOND = new RegExp(`^--(\\d{2})${ZONE}?$`);

const UTC_OFFSET = /^([+-])(\d{2})(\d{2})?$/;

// ── Helpers ────────────────────────────────────────────────────────────────

function num(s: string | undefined): number | undefined {
  return s === undefined ? undefined : parseInt(s, 10);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function daysInMonth(month: number, year?: number): number {
  if (month === 2) {
    if (year === undefined) return 29;
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Reason a partial date is out of range, or undefined */
function dateRangeError(d: PartialDate): string | undefined {
  if (d.year !== undefined && (!Number.isInteger(d.year) || d.year < 0 || d.year > 9999)) {
    return `year ${d.year} out of range`;
  }
  if (d.month !== undefined && (!Number.isInteger(d.month) || d.month < 1 || d.month > 12)) {
    return `month ${d.month} out of range`;
  }
  if (d.day !== undefined) {
    const max = d.month === undefined ? 31 : daysInMonth(d.month, d.year);
    if (!Number.isInteger(d.day) || d.day < 1 || d.day > max) return `day ${d.day} out of range`;
  }
  return undefined;
}

function timeRangeError(t: PartialTime): string | undefined {
  if (t.hour !== undefined && (!Number.isInteger(t.hour) || t.hour < 0 || t.hour > 23)) {
    return `hour ${t.hour} out of range`;
  }
  if (t.minute !== undefined && (!Number.isInteger(t.minute) || t.minute < 0 || t.minute > 59)) {
    return `minute ${t.minute} out of range`;
  }
  // 60 admits a leap second
  if (t.second !== undefined && (!Number.isInteger(t.second) || t.second < 0 || t.second > 60)) {
    return `second ${t.second} out of range`;
  }
  if (t.zone !== undefined && t.zone !== 'Z') return utcOffsetRangeError(t.zone);
  return undefined;
}

function utcOffsetRangeError(o: UtcOffset): string | undefined {
  const minutes = o.minutes ?? 0;
  if (!Number.isInteger(o.hours) || o.hours < 0 || o.hours > 23) return `offset hours ${o.hours} out of range`;
  if (!Number.isInteger(minutes) || minutes < 0 || minutes > 59) return `offset minutes ${minutes} out of range`;
  if (o.sign === '-' && o.hours === 0 && minutes === 0) return 'negative zero offset is not allowed';
  return undefined;
}

// Builders leave absent components off the object entirely
function partialDate(year?: number, month?: number, day?: number): PartialDate {
  const date: { year?: number; month?: number; day?: number } = {};
  if (year !== undefined) date.year = year;
  if (month !== undefined) date.month = month;
  if (day !== undefined) date.day = day;
  return date;
}

function partialTime(hour?: number, minute?: number, second?: number, zone?: Zone): PartialTime {
  const time: { hour?: number; minute?: number; second?: number; zone?: Zone } = {};
  if (hour !== undefined) time.hour = hour;
  if (minute !== undefined) time.minute = minute;
  if (second !== undefined) time.second = second;
  if (zone !== undefined) time.zone = zone;
  return time;
}

// ── UTC offset ─────────────────────────────────────────────────────────────

/** Parse `(+|-)HH[MM]`; `-00` / `-0000` are rejected */
export function parseUtcOffset(value: string): UtcOffset | null {
  const m = UTC_OFFSET.exec(value);
  if (!m) return null;
  const minutes = num(m[3]);
  const offset: UtcOffset = {
    sign: m[1] === '-' ? '-' : '+',
    hours: parseInt(m[2] ?? '', 10),
    ...(minutes !== undefined ? { minutes } : {}),
  };
  return utcOffsetRangeError(offset) ? null : offset;
}

export function formatUtcOffset(offset: UtcOffset): string {
  const reason = utcOffsetRangeError(offset);
  if (reason) throw new ValueError(`Invalid UTC offset: ${reason}`);
  return offset.sign + pad(offset.hours) + (offset.minutes !== undefined ? pad(offset.minutes) : '');
}

/** Offset in minutes east of UTC */
export function utcOffsetMinutes(offset: UtcOffset): number {
  const total = offset.hours * 60 + (offset.minutes ?? 0);
  return offset.sign === '-' ? -total : total;
}

function parseZone(value: string | undefined): Zone | undefined | null {
  if (value === undefined) return undefined;
  if (value === 'Z' || value === 'z') return 'Z';
  return parseUtcOffset(value);
}

function formatZone(zone: Zone | undefined): string {
  if (zone === undefined) return '';
  return zone === 'Z' ? 'Z' : formatUtcOffset(zone);
}

// ── Date ───────────────────────────────────────────────────────────────────

export interface DateForms {
  /** Only YYYYMMDD, --MMDD and ---DD (date-noreduc) */
  noReduc?: boolean;
  /** Only YYYYMMDD (date-complete) */
  complete?: boolean;
}

/** Parse an RFC 6350 date value */
export function parseDate(value: string, forms: DateForms = {}): PartialDate | null {
  let date: PartialDate | undefined;
  let m: RegExpExecArray | null;

  if ((m = DATE_FULL.exec(value))) {
    date = partialDate(num(m[1]), num(m[2]), num(m[3]));
  } else if (forms.complete) {
    return null;
  } else if ((m = DATE_MONTH_DAY.exec(value))) {
    if (forms.noReduc && m[2] === undefined) return null;
    date = partialDate(undefined, num(m[1]), num(m[2]));
  } else if ((m = DATE_DAY.exec(value))) {
    date = partialDate(undefined, undefined, num(m[1]));
  } else if (forms.noReduc) {
    return null;
  } else if ((m = DATE_YEAR.exec(value))) {
    date = partialDate(num(m[1]));
  } else if ((m = DATE_YEAR_MONTH.exec(value))) {
    date = partialDate(num(m[1]), num(m[2]));
  }

  if (!date) return null;
  return dateRangeError(date) ? null : date;
}

/** Format a partial date in its canonical basic-format token */
export function formatDate(date: PartialDate): string {
  const reason = dateRangeError(date);
  if (reason) throw new ValueError(`Invalid date: ${reason}`);
  const { year, month, day } = date;

  if (year !== undefined) {
    if (month === undefined) {
      if (day !== undefined) throw new ValueError('Invalid date: a day needs a month when the year is given');
      return pad(year, 4);
    }
    return day === undefined ? `${pad(year, 4)}-${pad(month)}` : pad(year, 4) + pad(month) + pad(day);
  }
  if (month !== undefined) return `--${pad(month)}${day !== undefined ? pad(day) : ''}`;
  if (day !== undefined) return `---${pad(day)}`;
  throw new ValueError('Invalid date: no components');
}

// ── Time ───────────────────────────────────────────────────────────────────

export interface TimeForms {
  /** Hour must be present (time-notrunc) */
  noTrunc?: boolean;
  /** Hour, minute and second must be present (time-complete) */
  complete?: boolean;
}

/** Parse an RFC 6350 time value (without the leading `T`) */
export function parseTime(value: string, forms: TimeForms = {}): PartialTime | null {
  let time: PartialTime | undefined;
  let m: RegExpExecArray | null;

  if ((m = TIME_HOUR.exec(value))) {
    if (forms.complete && m[3] === undefined) return null;
    const zone = parseZone(m[4]);
    if (zone === null) return null;
    time = partialTime(num(m[1]), num(m[2]), num(m[3]), zone);
  } else if (forms.noTrunc || forms.complete) {
    return null;
  } else if ((m = TIME_MINUTE.exec(value))) {
    const zone = parseZone(m[3]);
    if (zone === null) return null;
    time = partialTime(undefined, num(m[1]), num(m[2]), zone);
  } else if ((m = TIME_SECOND.exec(value))) {
    const zone = parseZone(m[2]);
    if (zone === null) return null;
    time = partialTime(undefined, undefined, num(m[1]), zone);
  }

  if (!time) return null;
  return timeRangeError(time) ? null : time;
}

/** Format a partial time (without the leading `T`) */
export function formatTime(time: PartialTime): string {
  const reason = timeRangeError(time);
  if (reason) throw new ValueError(`Invalid time: ${reason}`);
  const { hour, minute, second } = time;
  let out: string;

  if (hour !== undefined) {
    if (minute === undefined && second !== undefined) {
      throw new ValueError('Invalid time: a second needs a minute when the hour is given');
    }
    out = pad(hour) + (minute !== undefined ? pad(minute) : '') + (second !== undefined ? pad(second) : '');
  } else if (minute !== undefined) {
    out = `-${pad(minute)}${second !== undefined ? pad(second) : ''}`;
  } else if (second !== undefined) {
    out = `--${pad(second)}`;
  } else {
    throw new ValueError('Invalid time: no components');
  }
  return out + formatZone(time.zone);
}

// ── Combined forms ─────────────────────────────────────────────────────────

function splitAtDesignator(value: string): [string, string] | null {
  const t = value.search(/[Tt]/);
  if (t === -1) return null;
  return [value.slice(0, t), value.slice(t + 1)];
}

/** Parse `date-noreduc T time-notrunc` */
export function parseDateTime(value: string): DateTime | null {
  const parts = splitAtDesignator(value);
  if (!parts) return null;
  const date = parseDate(parts[0], { noReduc: true });
  const time = parseTime(parts[1], { noTrunc: true });
  return date && time ? { date, time } : null;
}

/** Parse `date-complete T time-complete` */
export function parseTimestamp(value: string): DateTime | null {
  const parts = splitAtDesignator(value);
  if (!parts) return null;
  const date = parseDate(parts[0], { complete: true });
  const time = parseTime(parts[1], { complete: true });
  return date && time ? { date, time } : null;
}

/**
 * Parse an RFC 6350 date-and-or-time value.
 *
 * Supported formats (RFC 6350 §4.3.4):
 *   YYYY, YYYY-MM, YYYYMMDD, --MMDD, --MM, ---DD
 *   THH, THHMM, THHMMSS, THHMMSSZ, T-MM, T--SS
 *   YYYYMMDDTHHMMSS, --MMDDTHHMM, ---DDTHH, etc.
 */
export function parseDateAndOrTime(value: string): DateAndOrTime | null {
  const parts = splitAtDesignator(value);
  if (!parts) {
    const date = parseDate(value);
    return date ? { date } : null;
  }
  if (parts[0] === '') {
    const time = parseTime(parts[1]);
    return time ? { time } : null;
  }
  const dateTime = parseDateTime(value);
  return dateTime ? { date: dateTime.date, time: dateTime.time } : null;
}

function isNoReduc(date: PartialDate): boolean {
  return date.day !== undefined && (date.month !== undefined || date.year === undefined);
}

export function formatDateTime(value: DateTime): string {
  if (!isNoReduc(value.date)) {
    throw new ValueError('Invalid date-time: the date must not be reduced (needs a day)');
  }
  if (value.time.hour === undefined) {
    throw new ValueError('Invalid date-time: the time must not be truncated (needs an hour)');
  }
  return `${formatDate(value.date)}T${formatTime(value.time)}`;
}

export function formatTimestamp(value: DateTime): string {
  const { date, time } = value;
  if (date.year === undefined || date.month === undefined || date.day === undefined) {
    throw new ValueError('Invalid timestamp: year, month and day are required');
  }
  if (time.hour === undefined || time.minute === undefined || time.second === undefined) {
    throw new ValueError('Invalid timestamp: hour, minute and second are required');
  }
  return `${formatDate(date)}T${formatTime(time)}`;
}

/** Format a DateAndOrTime back to RFC 6350 text */
export function formatDateAndOrTime(value: DateAndOrTime): string {
  if (value.date && value.time) return formatDateTime({ date: value.date, time: value.time });
  if (value.date) return formatDate(value.date);
  if (value.time) return `T${formatTime(value.time)}`;
  throw new ValueError('Invalid date-and-or-time: neither date nor time given');
}

/**
 * Convert a complete date-time to a JavaScript Date. A missing zone is
 * read as UTC. Returns null for reduced or truncated values.
 */
export function toJsDate(value: DateTime): Date | null {
  const { year, month, day } = value.date;
  const { hour, minute, second, zone } = value.time;
  if (year === undefined || month === undefined || day === undefined || hour === undefined) return null;
  const offset = zone === undefined || zone === 'Z' ? 0 : utcOffsetMinutes(zone);
  const at = new Date(Date.UTC(2000, 0, 1, hour, minute ?? 0, Math.min(second ?? 0, 59)));
  // Date.UTC reads years 0-99 as 1900-1999
  at.setUTCFullYear(year, month - 1, day);
  return new Date(at.getTime() - offset * 60_000);
}

/** Build a UTC timestamp value from a JavaScript Date */
export function fromJsDate(date: Date): DateTime {
  return {
    date: { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() },
    time: { hour: date.getUTCHours(), minute: date.getUTCMinutes(), second: date.getUTCSeconds(), zone: 'Z' },
  };
}

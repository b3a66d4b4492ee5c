/**
 * Date and time functions for expressions
 *
 * Dates are `Date` values read and built in UTC. Arguments that expect a
 * date also take an ISO 8601 or common-layout string, or a Unix timestamp
 * in seconds.
 *
 * Layouts use the tokens YYYY, MM, DD, HH, mm, ss and SSS; any other text
 * is literal.
 */

import type { ExpressionFunction } from './registry';

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const LAYOUT_TOKEN = /YYYY|MM|DD|HH|mm|ss|SSS/g;
const INTEGER = /^[+-]?\d+$/;
const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})$/;

/** Layouts tried in order when parseDate is given none; US before EU */
export const COMMON_LAYOUTS = [
  'YYYY-MM-DDTHH:mm:ss.SSS',
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'MM/DD/YYYY',
  'DD/MM/YYYY',
  'DD-MM-YYYY',
] as const;

type LayoutToken = 'YYYY' | 'MM' | 'DD' | 'HH' | 'mm' | 'ss' | 'SSS';

const TOKEN_PATTERNS: Record<LayoutToken, string> = {
  YYYY: '(\\d{4})',
  MM: '(\\d{2})',
  DD: '(\\d{2})',
  HH: '(\\d{2})',
  mm: '(\\d{2})',
  ss: '(\\d{2})',
  SSS: '(\\d{3})',
};

function isLayoutToken(text: string): text is LayoutToken {
  return text in TOKEN_PATTERNS;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Format a date with a token layout, in UTC
 *
 * @example
 * ```ts
 * formatDate(new Date(Date.UTC(2024, 2, 5)), 'DD/MM/YYYY'); // => '05/03/2024'
 * ```
 */
export function formatDate(date: Date, layout: string): string {
  return layout.replace(LAYOUT_TOKEN, (token) => {
    switch (token) {
      case 'YYYY':
        return pad(date.getUTCFullYear(), 4);
      case 'MM':
        return pad(date.getUTCMonth() + 1, 2);
      case 'DD':
        return pad(date.getUTCDate(), 2);
      case 'HH':
        return pad(date.getUTCHours(), 2);
      case 'mm':
        return pad(date.getUTCMinutes(), 2);
      case 'ss':
        return pad(date.getUTCSeconds(), 2);
      default:
        return pad(date.getUTCMilliseconds(), 3);
    }
  });
}

/**
 * Parse text that matches a token layout exactly, as UTC
 *
 * @returns null when the text does not match or names an impossible date
 */
export function parseWithLayout(text: string, layout: string): Date | null {
  const tokens: LayoutToken[] = [];
  let pattern = '';
  let last = 0;
  for (const found of layout.matchAll(LAYOUT_TOKEN)) {
    const token = found[0];
    const index = found.index ?? 0;
    if (!isLayoutToken(token)) {
      continue;
    }
    pattern += escapeRegExp(layout.slice(last, index)) + TOKEN_PATTERNS[token];
    tokens.push(token);
    last = index + token.length;
  }
  pattern += escapeRegExp(layout.slice(last));

  const match = new RegExp(`^${pattern}$`).exec(text);
  if (!match) {
    return null;
  }

  const parts: Record<LayoutToken, number> = { YYYY: 1970, MM: 1, DD: 1, HH: 0, mm: 0, ss: 0, SSS: 0 };
  tokens.forEach((token, i) => {
    parts[token] = Number(match[i + 1]);
  });

  const { YYYY: year, MM: month, DD: day, HH: hours, mm: minutes, ss: seconds } = parts;
  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, parts.SSS));
  // Day overflow (Feb 30) rolls into the next month
  if (date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse an ISO 8601 timestamp with a zone, or text in one of COMMON_LAYOUTS
 */
export function parseDateText(text: string): Date | null {
  const trimmed = text.trim();
  if (ISO_WITH_ZONE.test(trimmed)) {
    const date = new Date(trimmed);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  for (const layout of COMMON_LAYOUTS) {
    const date = parseWithLayout(trimmed, layout);
    if (date) {
      return date;
    }
  }
  return null;
}

/**
 * Coerce a date argument: Date values, parseable strings, Unix seconds
 * @throws If the value cannot be read as a date
 */
export function toDate(value: unknown, fnName: string): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value === 'string') {
    const date = parseDateText(value);
    if (date) {
      return date;
    }
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value * 1000);
  }
  throw new TypeError(`${fnName}() expected a date argument`);
}

function toInteger(value: unknown, fnName: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  throw new TypeError(`${fnName}() expected an integer argument`);
}

function toLayout(value: unknown, fnName: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${fnName}() expected a date format layout string`);
  }
  return value;
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}

/**
 * Whole days from `from` to `to`, truncated toward zero
 */
export function diffDays(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / MS_PER_DAY);
}

export function weekday(date: Date): string {
  return WEEKDAYS[date.getUTCDay()] ?? '';
}

function parseDate(args: unknown[]): Date {
  const [text, layout] = args;
  if (typeof text !== 'string') {
    throw new TypeError('parseDate() expected a string argument');
  }
  const date =
    args.length > 1 ? parseWithLayout(text, toLayout(layout, 'parseDate')) : parseDateText(text);
  if (!date) {
    throw new TypeError(`parseDate() invalid time format '${text}'`);
  }
  return date;
}

/**
 * The date family; `now` reads the given millisecond clock
 */
export function createDateTimeFunctions(clock: () => number = Date.now): ExpressionFunction[] {
  return [
    { name: 'now', minArgs: 0, maxArgs: 0, fn: () => new Date(clock()) },
    {
      name: 'formatDate',
      minArgs: 2,
      maxArgs: 2,
      fn: ([d, layout]) => formatDate(toDate(d, 'formatDate'), toLayout(layout, 'formatDate')),
    },
    { name: 'parseDate', minArgs: 1, maxArgs: 2, fn: parseDate },
    {
      name: 'addDays',
      minArgs: 2,
      maxArgs: 2,
      fn: ([d, n]) => addDays(toDate(d, 'addDays'), toInteger(n, 'addDays')),
    },
    {
      name: 'addHours',
      minArgs: 2,
      maxArgs: 2,
      fn: ([d, n]) =>
        new Date(toDate(d, 'addHours').getTime() + toInteger(n, 'addHours') * MS_PER_HOUR),
    },
    {
      name: 'addMinutes',
      minArgs: 2,
      maxArgs: 2,
      fn: ([d, n]) =>
        new Date(toDate(d, 'addMinutes').getTime() + toInteger(n, 'addMinutes') * MS_PER_MINUTE),
    },
    {
      name: 'diffDays',
      minArgs: 2,
      maxArgs: 2,
      fn: ([a, b]) => diffDays(toDate(a, 'diffDays'), toDate(b, 'diffDays')),
    },
    { name: 'year', minArgs: 1, maxArgs: 1, fn: ([d]) => toDate(d, 'year').getUTCFullYear() },
    { name: 'month', minArgs: 1, maxArgs: 1, fn: ([d]) => toDate(d, 'month').getUTCMonth() + 1 },
    { name: 'day', minArgs: 1, maxArgs: 1, fn: ([d]) => toDate(d, 'day').getUTCDate() },
    { name: 'weekday', minArgs: 1, maxArgs: 1, fn: ([d]) => weekday(toDate(d, 'weekday')) },
    {
      name: 'isAfter',
      minArgs: 2,
      maxArgs: 2,
      fn: ([a, b]) => toDate(a, 'isAfter').getTime() > toDate(b, 'isAfter').getTime(),
    },
    {
      name: 'isBefore',
      minArgs: 2,
      maxArgs: 2,
      fn: ([a, b]) => toDate(a, 'isBefore').getTime() < toDate(b, 'isBefore').getTime(),
    },
  ];
}

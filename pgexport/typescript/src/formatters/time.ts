/**
 * User time layouts.
 *
 * Layouts are built from the tokens yyyy, yy, MM, dd, HH, mm, ss, SSS, SS
 * and S; every other character is copied literally.
 */

import type { Logger } from '../observability/index.js';
import { isValidTimeZone } from '../config/index.js';

type TimeToken = 'yyyy' | 'yy' | 'MM' | 'dd' | 'HH' | 'mm' | 'ss' | 'SSS' | 'SS' | 'S';

// Longest first so that yyyy wins over yy and SSS over S.
const TOKENS: readonly TimeToken[] = ['yyyy', 'yy', 'MM', 'dd', 'HH', 'mm', 'ss', 'SSS', 'SS', 'S'];

const DATE_TOKENS: readonly TimeToken[] = ['yyyy', 'yy', 'MM', 'dd'];

type LayoutPart = { token: TimeToken } | { literal: string };

/**
 * Calendar fields of an instant in some zone.
 */
export interface TimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const layoutCache = new Map<string, LayoutPart[]>();

function parseLayout(layout: string): LayoutPart[] {
  const cached = layoutCache.get(layout);
  if (cached) {
    return cached;
  }

  const parts: LayoutPart[] = [];
  let literal = '';
  let i = 0;
  while (i < layout.length) {
    const token = TOKENS.find(t => layout.startsWith(t, i));
    if (token === undefined) {
      literal += layout[i];
      i++;
      continue;
    }
    if (literal !== '') {
      parts.push({ literal });
      literal = '';
    }
    parts.push({ token });
    i += token.length;
  }
  if (literal !== '') {
    parts.push({ literal });
  }

  layoutCache.set(layout, parts);
  return parts;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function renderToken(token: TimeToken, p: TimeParts): string {
  switch (token) {
    case 'yyyy':
      return pad(p.year, 4);
    case 'yy':
      return pad(p.year % 100, 2);
    case 'MM':
      return pad(p.month, 2);
    case 'dd':
      return pad(p.day, 2);
    case 'HH':
      return pad(p.hour, 2);
    case 'mm':
      return pad(p.minute, 2);
    case 'ss':
      return pad(p.second, 2);
    case 'SSS':
      return pad(p.millisecond, 3);
    case 'SS':
      return pad(Math.floor(p.millisecond / 10), 2);
    case 'S':
      return String(Math.floor(p.millisecond / 100));
  }
}

/**
 * Renders calendar fields with a user layout.
 */
export function formatParts(parts: TimeParts, layout: string): string {
  return parseLayout(layout)
    .map(part => ('token' in part ? renderToken(part.token, parts) : part.literal))
    .join('');
}

/**
 * Keeps only the date portion of a layout.
 *
 * The rightmost occurrence of each of yyyy, yy, MM and dd is located and the
 * layout is cut right after the one that ends last, so
 * `yyyy-MM-dd HH:mm:ss` becomes `yyyy-MM-dd`. A layout without date tokens
 * is returned unchanged.
 */
export function extractDateLayout(layout: string): string {
  let last = -1;
  for (const token of DATE_TOKENS) {
    const idx = layout.lastIndexOf(token);
    if (idx !== -1) {
      last = Math.max(last, idx + token.length);
    }
  }
  return last === -1 ? layout : layout.slice(0, last).trim();
}

/**
 * Calendar fields read with UTC getters, for values that carry no zone.
 */
export function utcParts(date: Date): TimeParts {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
  };
}

const zoneFormatters = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string | undefined): Intl.DateTimeFormat {
  const key = timeZone ?? '';
  let formatter = zoneFormatters.get(key);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    zoneFormatters.set(key, formatter);
  }
  return formatter;
}

/**
 * Calendar fields of an instant in an IANA zone (`undefined` = local).
 */
export function zonedParts(date: Date, timeZone: string | undefined): TimeParts {
  const fields: Record<string, number> = {};
  for (const part of zoneFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year ?? date.getUTCFullYear(),
    month: fields.month ?? date.getUTCMonth() + 1,
    day: fields.day ?? date.getUTCDate(),
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    millisecond: date.getUTCMilliseconds(),
  };
}

/**
 * Resolves a user zone name for formatting.
 *
 * An empty name means local time. An unknown name also falls back to local
 * time and logs a warning.
 */
export function resolveTimeZone(timeZone: string, logger: Logger): string | undefined {
  if (timeZone === '') {
    return undefined;
  }
  if (!isValidTimeZone(timeZone)) {
    logger.warn('invalid timezone, using local time', { timeZone });
    return undefined;
  }
  return timeZone;
}

/**
 * Formats a zone-less value (DATE, TIMESTAMP) with its stored wall clock.
 */
export function formatWallClock(date: Date, layout: string): string {
  return formatParts(utcParts(date), layout);
}

/**
 * Formats an instant in the given zone (`undefined` = local).
 */
export function formatInZone(date: Date, layout: string, timeZone: string | undefined): string {
  return formatParts(zonedParts(date, timeZone), layout);
}

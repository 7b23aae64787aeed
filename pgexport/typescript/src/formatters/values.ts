/**
 * Type-driven value formatting.
 *
 * Every raw driver value is first normalized by a pure function chosen by
 * its wire kind, then shaped for the target format. Kinds without a
 * dedicated normalizer pass through unchanged.
 */

import {
  isJsonKind,
  isTemporalKind,
  type ExportOptions,
  type WireKind,
} from '../types/index.js';
import type { Logger } from '../observability/index.js';
import {
  extractDateLayout,
  formatInZone,
  formatWallClock,
  resolveTimeZone,
} from './time.js';

// ============================================================================
// Format Context
// ============================================================================

/**
 * Per-call formatting settings, resolved once before the first row.
 */
export interface FormatContext {
  /** Full user layout, used for TIMESTAMP and TIMESTAMPTZ */
  readonly timeFormat: string;
  /** Date-only portion of the layout, used for DATE */
  readonly dateFormat: string;
  /** Resolved zone; undefined means local time */
  readonly timeZone: string | undefined;
}

/**
 * Resolves layouts and zone for one export call.
 */
export function createFormatContext(
  options: Pick<ExportOptions, 'timeFormat' | 'timeZone'>,
  logger: Logger
): FormatContext {
  return {
    timeFormat: options.timeFormat,
    dateFormat: extractDateLayout(options.timeFormat),
    timeZone: resolveTimeZone(options.timeZone, logger),
  };
}

// ============================================================================
// Primitive Conversions
// ============================================================================

const utf8 = new TextDecoder('utf-8');

/**
 * Renders a double with 15 significant digits, shortest form (`%.15g`).
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }
  if (value === 0) {
    return Object.is(value, -0) ? '-0' : '0';
  }

  const [mantissa, exponentText] = value.toExponential(14).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 15) {
    const digits = Math.abs(exponent);
    return `${trimFraction(mantissa)}e${exponent < 0 ? '-' : '+'}${digits < 10 ? '0' : ''}${digits}`;
  }
  return trimFraction(value.toFixed(14 - exponent));
}

function trimFraction(text: string): string {
  if (!text.includes('.')) {
    return text;
  }
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Parses a NUMERIC value; invalid or non-finite input yields null.
 */
export function toFloat(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Renders 16 raw bytes as a lower-hex 8-4-4-4-12 UUID.
 */
export function formatUuid(bytes: Uint8Array): string {
  const hex = Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  return value;
}

/**
 * Compact JSON text, or `fallback` when the value cannot be serialized.
 */
export function toJsonText(value: unknown, fallback: string): string {
  try {
    const text: string | undefined = JSON.stringify(value, jsonReplacer);
    return text ?? fallback;
  } catch {
    return fallback;
  }
}

function emptyContainer(value: unknown): string {
  return Array.isArray(value) ? '[]' : '{}';
}

/**
 * Quotes an identifier per dot-separated segment: `a.b` → `"a"."b"`.
 */
export function quoteIdent(name: string): string {
  return name
    .split('.')
    .map(part => `"${part.replaceAll('"', '""')}"`)
    .join('.');
}

/**
 * Single-quoted SQL literal with embedded quotes doubled.
 */
export function quoteLiteral(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}

const ARRAY_ELEMENT_NEEDS_QUOTES = /[{},"\\\s]/;

function arrayElementText(element: unknown): string {
  if (element === null || element === undefined) {
    return 'NULL';
  }
  if (Array.isArray(element)) {
    return arrayText(element);
  }
  const text = scalarText(element);
  if (text === '' || text.toUpperCase() === 'NULL' || ARRAY_ELEMENT_NEEDS_QUOTES.test(text)) {
    return `"${text.replaceAll('\\', '\\\\').replaceAll('"', '\\"')}"`;
  }
  return text;
}

/**
 * PostgreSQL array literal body: `{a,b,c}`, `{}` when empty.
 */
export function arrayText(values: readonly unknown[]): string {
  return `{${values.map(arrayElementText).join(',')}}`;
}

function scalarText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return formatFloat(value);
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  if (Array.isArray(value)) {
    return arrayText(value);
  }
  if (typeof value === 'object' && value !== null) {
    return toJsonText(value, '{}');
  }
  return String(value);
}

// ============================================================================
// Normalization
// ============================================================================

type Normalizer = (raw: unknown, ctx: FormatContext) => unknown;

const passthrough: Normalizer = raw => raw;

const INT8_TEXT = /^-?\d+$/;

const NORMALIZERS: Record<WireKind, Normalizer> = {
  date: (raw, ctx) => (raw instanceof Date ? formatWallClock(raw, ctx.dateFormat) : raw),
  timestamp: (raw, ctx) => (raw instanceof Date ? formatWallClock(raw, ctx.timeFormat) : raw),
  timestamptz: (raw, ctx) =>
    raw instanceof Date ? formatInZone(raw, ctx.timeFormat, ctx.timeZone) : raw,
  uuid: raw => (raw instanceof Uint8Array && raw.length === 16 ? formatUuid(raw) : raw),
  bytea: raw => (raw instanceof Uint8Array ? utf8.decode(raw) : raw),
  numeric: raw => toFloat(raw),
  int8: raw => (typeof raw === 'string' && INT8_TEXT.test(raw) ? BigInt(raw) : raw),
  interval: raw => (raw instanceof Uint8Array ? utf8.decode(raw) : raw),
  json: passthrough,
  jsonb: passthrough,
  bool: passthrough,
  int2: passthrough,
  int4: passthrough,
  float4: passthrough,
  float8: passthrough,
  text: passthrough,
  passthrough,
};

/**
 * Applies the wire-kind conversion shared by every target. NULL stays null.
 */
export function normalizeValue(raw: unknown, kind: WireKind, ctx: FormatContext): unknown {
  if (raw === null || raw === undefined) {
    return null;
  }
  return NORMALIZERS[kind](raw, ctx);
}

// ============================================================================
// Targets
// ============================================================================

/**
 * Text for delimited and markup formats. NULL is the empty string, JSON is
 * compact text, arrays are `{a,b}` literals, floats use 15 digits.
 */
export function formatTextValue(raw: unknown, kind: WireKind, ctx: FormatContext): string {
  const value = normalizeValue(raw, kind, ctx);
  if (value === null) {
    return '';
  }
  if (isJsonKind(kind)) {
    return toJsonText(value, emptyContainer(value));
  }
  return scalarText(value);
}

export const formatCsvValue = formatTextValue;

export const formatXmlValue = formatTextValue;

/**
 * Structural value for the JSON encoder: JSON documents stay objects,
 * int8 becomes bigint, NULL becomes null.
 */
export function formatJsonValue(raw: unknown, kind: WireKind, ctx: FormatContext): unknown {
  const value = normalizeValue(raw, kind, ctx);
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return value;
}

/**
 * Structural value for the YAML encoder.
 */
export function formatYamlValue(raw: unknown, kind: WireKind, ctx: FormatContext): unknown {
  const value = normalizeValue(raw, kind, ctx);
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  return value;
}

/**
 * SQL literal. Temporal values use fixed ISO layouts (TIMESTAMPTZ in UTC)
 * so the statement replays identically regardless of the export layout.
 */
export function formatSqlValue(raw: unknown, kind: WireKind): string {
  if (raw === null || raw === undefined) {
    return 'NULL';
  }

  switch (kind) {
    case 'date':
      if (raw instanceof Date) return `'${formatWallClock(raw, 'yyyy-MM-dd')}'::date`;
      break;
    case 'timestamp':
      if (raw instanceof Date) return `'${formatWallClock(raw, 'yyyy-MM-dd HH:mm:ss.SSS')}'::timestamp`;
      break;
    case 'timestamptz':
      if (raw instanceof Date) return `'${formatWallClock(raw, 'yyyy-MM-dd HH:mm:ss.SSS')}+00'::timestamptz`;
      break;
    case 'uuid':
      if (raw instanceof Uint8Array && raw.length === 16) return `'${formatUuid(raw)}'::uuid`;
      if (typeof raw === 'string') return `${quoteLiteral(raw)}::uuid`;
      break;
    case 'bytea':
      if (raw instanceof Uint8Array) return `${quoteLiteral(utf8.decode(raw))}::bytea`;
      break;
    case 'bool':
      if (typeof raw === 'boolean') return raw ? 'true' : 'false';
      break;
    case 'numeric': {
      const n = toFloat(raw);
      return n === null ? 'NULL' : formatFloat(n);
    }
    case 'int8':
      if (typeof raw === 'string' && INT8_TEXT.test(raw)) return raw;
      break;
    case 'interval':
      if (typeof raw === 'string') return `${quoteLiteral(raw)}::interval`;
      break;
    case 'json':
    case 'jsonb':
      return `${quoteLiteral(toJsonText(raw, '{}'))}::${kind}`;
    default:
      break;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? formatFloat(raw) : quoteLiteral(String(raw));
  }
  if (typeof raw === 'bigint') {
    return raw.toString();
  }
  if (typeof raw === 'boolean') {
    return raw ? 'true' : 'false';
  }
  if (Array.isArray(raw)) {
    return quoteLiteral(arrayText(raw));
  }
  return quoteLiteral(scalarText(raw));
}

/**
 * Spreadsheet cell value.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * Cell value for XLSX. Temporal values stay native dates; JSON documents
 * and arrays become JSON text.
 */
export function formatXlsxValue(raw: unknown, kind: WireKind, ctx: FormatContext): CellValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (isTemporalKind(kind) && raw instanceof Date) {
    return raw;
  }
  if (isJsonKind(kind)) {
    return toJsonText(raw, emptyContainer(raw));
  }
  if (Array.isArray(raw)) {
    return toJsonText(raw, '[]');
  }

  const value = normalizeValue(raw, kind, ctx);
  if (value === null || typeof value === 'string' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  return scalarText(value);
}

/**
 * Template context value. Temporal kinds arrive already laid out; JSON
 * documents and arrays become JSON text.
 */
export function formatTemplateValue(raw: unknown, kind: WireKind, ctx: FormatContext): unknown {
  const value = normalizeValue(raw, kind, ctx);
  if (value === null) {
    return null;
  }
  if (isJsonKind(kind)) {
    return toJsonText(value, emptyContainer(value));
  }
  if (Array.isArray(value)) {
    return toJsonText(value, '[]');
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  return value;
}

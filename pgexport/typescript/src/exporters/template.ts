/**
 * Template exporter (Handlebars).
 *
 * Full mode renders one template once with every row; streaming mode
 * renders an optional header, a row template per row and an optional
 * footer. Output is never HTML-escaped.
 * @module exporters/template
 */

import { readFile } from 'node:fs/promises';
import { format as printf } from 'node:util';
import Handlebars from 'handlebars';
import { TemplateError, toError } from '../errors/index.js';
import { OrderedRow, type RowEntry } from '../encoders/index.js';
import { createFormatContext, formatInZone, formatTemplateValue } from '../formatters/index.js';
import type { ExportOptions, RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

type TemplateEngine = typeof Handlebars;

/**
 * Compiled template: context in, text out.
 */
export type RenderFn = (context: unknown) => string;

// ============================================================================
// Helpers
// ============================================================================

function text(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

function num(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

function toNumeric(value: unknown): number | bigint | undefined {
  if (isNumeric(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isNaN(n) ? undefined : n;
  }
  return undefined;
}

function isIntegral(value: number | bigint): boolean {
  return typeof value === 'bigint' || Number.isInteger(value);
}

function order<T extends number | bigint | string>(left: T, right: T): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

// int8 columns arrive as bigint, so numbers and bigints compare by value.
function compareNumeric(a: unknown, b: unknown): number | undefined {
  if (!isNumeric(a) && !isNumeric(b)) {
    return undefined;
  }
  const left = toNumeric(a);
  const right = toNumeric(b);
  if (left === undefined || right === undefined) {
    return undefined;
  }
  if (isIntegral(left) && isIntegral(right)) {
    return order(BigInt(left), BigInt(right));
  }
  return order(Number(left), Number(right));
}

function compare(a: unknown, b: unknown): number {
  return compareNumeric(a, b) ?? order(text(a), text(b));
}

function equals(a: unknown, b: unknown): boolean {
  const numeric = compareNumeric(a, b);
  return numeric === undefined ? a === b : numeric === 0;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function toJson(value: unknown, indent?: number): string {
  try {
    return JSON.stringify(value ?? null, jsonReplacer, indent);
  } catch (error) {
    return `ERROR: ${toError(error).message}`;
  }
}

function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|\s)(\S)/g, (_m, space: string, first: string) => space + first.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Row Contexts
// ============================================================================

const orderedRows = new WeakMap<object, OrderedRow>();

/**
 * Row context handed to templates.
 *
 * Columns are own properties (first column wins on duplicate names) so
 * `{{name}}` resolves; iteration through `each` and `entries` follows
 * the row's column order, integer-like names included.
 */
export function templateRow(row: OrderedRow): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const [key, value] of row.entries()) {
    if (!Object.hasOwn(context, key)) {
      Object.defineProperty(context, key, { value, enumerable: true, writable: true, configurable: true });
    }
  }
  orderedRows.set(context, row);
  return context;
}

function orderedRowOf(value: unknown): OrderedRow | undefined {
  if (value instanceof OrderedRow) {
    return value;
  }
  return typeof value === 'object' && value !== null ? orderedRows.get(value) : undefined;
}

/**
 * Column/value pairs of a row context in column order.
 */
export function rowEntries(row: unknown): readonly RowEntry[] {
  const ordered = orderedRowOf(row);
  if (ordered) {
    return ordered.entries();
  }
  return isRecord(row) ? Object.entries(row) : [];
}

/**
 * Value of a named column in a row context.
 */
export function getColumn(row: unknown, key: unknown): unknown {
  const name = text(key);
  const ordered = orderedRowOf(row);
  if (ordered) {
    return ordered.has(name) ? ordered.get(name) : null;
  }
  if (isRecord(row) && Object.hasOwn(row, name)) {
    return row[name];
  }
  return null;
}

/**
 * Formats a date (or date-like text) with a user layout in local time.
 */
export function formatTime(value: unknown, layout: unknown): string {
  const date = value instanceof Date ? value : new Date(text(value));
  if (Number.isNaN(date.getTime())) {
    return text(value);
  }
  return formatInZone(date, text(layout), undefined);
}

type PlainHelper = (...args: unknown[]) => unknown;

// Handlebars passes its options object as the last argument of every call.
function helper(fn: PlainHelper): Handlebars.HelperDelegate {
  return (...args: unknown[]) => fn(...args.slice(0, -1));
}

/**
 * Helper table registered on every template engine.
 */
export function templateHelpers(now: () => Date): Record<string, Handlebars.HelperDelegate> {
  const table: Record<string, PlainHelper> = {
    upper: s => text(s).toUpperCase(),
    lower: s => text(s).toLowerCase(),
    title: s => titleCase(text(s)),
    trim: s => text(s).trim(),
    replace: (s, from, to) => text(s).replaceAll(text(from), text(to)),
    join: (list, sep) => (Array.isArray(list) ? list.map(text).join(text(sep)) : text(list)),
    split: (s, sep) => text(s).split(text(sep)),
    contains: (s, sub) => text(s).includes(text(sub)),
    hasPrefix: (s, prefix) => text(s).startsWith(text(prefix)),
    hasSuffix: (s, suffix) => text(s).endsWith(text(suffix)),
    printf: (layout, ...args) => printf(text(layout), ...args),
    json: v => toJson(v),
    jsonPretty: v => toJson(v, 2),
    now: () => now(),
    formatTime: (v, layout) => formatTime(v, layout),
    eq: (a, b) => equals(a, b),
    ne: (a, b) => !equals(a, b),
    lt: (a, b) => compare(a, b) < 0,
    le: (a, b) => compare(a, b) <= 0,
    gt: (a, b) => compare(a, b) > 0,
    ge: (a, b) => compare(a, b) >= 0,
    and: (...args) => args.every(Boolean),
    or: (...args) => args.some(Boolean),
    not: v => !v,
    add: (a, b) => num(a) + num(b),
    sub: (a, b) => num(a) - num(b),
    mul: (a, b) => num(a) * num(b),
    div: (a, b) => (num(b) === 0 ? 0 : Math.trunc(num(a) / num(b))),
    get: (row, key) => getColumn(row, key),
    entries: row => rowEntries(row).map(([key, value]) => ({ key, value })),
  };

  return Object.fromEntries(Object.entries(table).map(([name, fn]) => [name, helper(fn)]));
}

/**
 * Isolated Handlebars environment with the helper table.
 */
export function createTemplateEngine(now: () => Date = () => new Date()): TemplateEngine {
  const engine = Handlebars.create();
  engine.registerHelper(templateHelpers(now));
  engine.registerHelper('each', orderedEach(engine.helpers.each));
  return engine;
}

/**
 * `each` that walks row contexts in column order with `@key` set to the
 * column name; anything else goes to the built-in helper.
 */
function orderedEach(builtin: Handlebars.HelperDelegate): Handlebars.HelperDelegate {
  return function (this: unknown, context: unknown, options: Handlebars.HelperOptions): unknown {
    const row = orderedRowOf(context);
    if (!row) {
      return builtin.call(this, context, options);
    }
    const entries = row.entries();
    if (entries.length === 0) {
      return options.inverse(this);
    }
    return entries
      .map(([key, value], index) => {
        const data: Record<string, unknown> = Handlebars.createFrame(options.data ?? {});
        data.key = key;
        data.index = index;
        data.first = index === 0;
        data.last = index === entries.length - 1;
        return options.fn(value, { data, blockParams: [value, key] });
      })
      .join('');
  };
}

/**
 * Compiles template text; syntax errors surface here rather than on first render.
 */
export function compileTemplate(engine: TemplateEngine, source: string, name: string): RenderFn {
  try {
    engine.parse(source);
  } catch (error) {
    throw new TemplateError(`failed to parse template "${name}": ${toError(error).message}`, error);
  }
  const template = engine.compile(source, { noEscape: true });
  return context => template(context);
}

/**
 * Reads and compiles a template file.
 *
 * A blank path yields undefined for optional templates and fails with
 * `template file path is empty` for required ones.
 */
export async function loadTemplate(
  engine: TemplateEngine,
  path: string,
  required: boolean
): Promise<RenderFn | undefined> {
  if (path.trim() === '') {
    if (required) {
      throw new TemplateError('template file path is empty');
    }
    return undefined;
  }

  let source: string;
  try {
    source = await readFile(path, 'utf8');
  } catch (error) {
    throw new TemplateError(`failed to read template file "${path}": ${toError(error).message}`, error);
  }
  return compileTemplate(engine, source, path);
}

function render(fn: RenderFn, context: unknown, part: string): string {
  try {
    return fn(context);
  } catch (error) {
    throw new TemplateError(`error executing ${part} template: ${toError(error).message}`, error);
  }
}

/**
 * RFC 3339 timestamp in local time, e.g. `2024-03-01T10:00:00+01:00`.
 */
export function formatRfc3339(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const local = new Date(date.getTime() + offsetMinutes * 60_000).toISOString().slice(0, 19);
  if (offsetMinutes === 0) {
    return `${local}Z`;
  }
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${local}${offsetMinutes > 0 ? '+' : '-'}${hours}:${minutes}`;
}

// ============================================================================
// Exporter
// ============================================================================

export class TemplateExporter extends BaseExporter {
  private readonly engine: TemplateEngine;

  constructor(context: ExporterContext) {
    super('template', context);
    this.engine = createTemplateEngine(() => this.now());
  }

  export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    return options.templateStreaming ? this.exportStreaming(cursor, options) : this.exportFull(cursor, options);
  }

  private rowContext(names: string[], values: unknown[]): Record<string, unknown> {
    return templateRow(new OrderedRow(names, values));
  }

  private async exportFull(cursor: RowCursor, options: ExportOptions): Promise<number> {
    this.logger.debug('preparing export', { mode: 'full', compression: options.compression });

    const template = await loadTemplate(this.engine, options.templateFile, true);
    if (!template) {
      throw new TemplateError('template file path is empty');
    }

    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);

    return this.withSink(options, async sink => {
      const records: Record<string, unknown>[] = [];
      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, values => {
        records.push(this.rowContext(names, kinds.map((kind, i) => formatTemplateValue(values[i], kind, ctx))));
      });

      await sink.write(
        render(
          template,
          { Rows: records, Columns: names, Count: rows, GeneratedAt: formatRfc3339(this.now()) },
          'full'
        )
      );

      progress.finish('export completed');
      return rows;
    });
  }

  private async exportStreaming(cursor: RowCursor, options: ExportOptions): Promise<number> {
    this.logger.debug('preparing export', { mode: 'streaming', compression: options.compression });

    const header = await loadTemplate(this.engine, options.templateHeader, false);
    const rowTemplate = await loadTemplate(this.engine, options.templateRow, true);
    const footer = await loadTemplate(this.engine, options.templateFooter, false);
    if (!rowTemplate) {
      throw new TemplateError('template file path is empty');
    }

    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);
    const generatedAt = formatRfc3339(this.now());

    return this.withSink(options, async sink => {
      if (header) {
        await sink.write(render(header, { Columns: names, GeneratedAt: generatedAt }, 'header'));
      }

      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, async values => {
        const row = this.rowContext(names, kinds.map((kind, i) => formatTemplateValue(values[i], kind, ctx)));
        await sink.write(render(rowTemplate, row, 'row'));
      });

      if (footer) {
        await sink.write(render(footer, { Columns: names, GeneratedAt: generatedAt, Count: rows }, 'footer'));
      }

      progress.finish('export completed');
      return rows;
    });
  }
}

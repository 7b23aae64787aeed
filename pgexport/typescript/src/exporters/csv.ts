/**
 * CSV exporter with a COPY fast path.
 * @module exporters/csv
 */

import { CopyError, SinkError } from '../errors/index.js';
import { createFormatContext, formatCsvValue, quoteLiteral } from '../formatters/index.js';
import type { OutputSink } from '../output/index.js';
import type { CopySource, ExportOptions, RowCursor } from '../types/index.js';
import {
  BaseExporter,
  describeColumns,
  type CopyCapable,
  type ExporterContext,
} from './exporter.js';

/**
 * Encoded lines held before they are handed to the sink.
 */
export const CSV_LINE_BUFFER_SIZE = 64 * 1024;

const NEEDS_QUOTES = /["\r\n]/;

function fieldNeedsQuotes(field: string, delimiter: string): boolean {
  if (field === '') {
    return false;
  }
  // a lone \. is the end-of-data marker for COPY FROM
  if (field === '\\.') {
    return true;
  }
  if (field.includes(delimiter) || NEEDS_QUOTES.test(field)) {
    return true;
  }
  return /^\s/u.test(field);
}

/**
 * Encodes one field, quoting and doubling quotes when needed.
 */
export function encodeCsvField(field: string, delimiter: string): string {
  return fieldNeedsQuotes(field, delimiter) ? `"${field.replaceAll('"', '""')}"` : field;
}

/**
 * Encodes one record terminated by `\n`.
 */
export function encodeCsvRecord(fields: readonly string[], delimiter: string): string {
  return `${fields.map(f => encodeCsvField(f, delimiter)).join(delimiter)}\n`;
}

/**
 * Builds the COPY statement for a query; a trailing `;` is dropped.
 */
export function buildCopySql(query: string, options: Pick<ExportOptions, 'noHeader' | 'delimiter'>): string {
  const body = query.trim().replace(/;+\s*$/, '');
  return `COPY (${body}) TO STDOUT WITH (FORMAT csv, HEADER ${!options.noHeader}, DELIMITER ${quoteLiteral(options.delimiter)})`;
}

class CsvLineWriter {
  private lines: string[] = [];
  private size = 0;

  constructor(
    private readonly sink: OutputSink,
    private readonly delimiter: string
  ) {}

  async writeRecord(fields: readonly string[]): Promise<void> {
    const line = encodeCsvRecord(fields, this.delimiter);
    this.lines.push(line);
    this.size += line.length;
    if (this.size >= CSV_LINE_BUFFER_SIZE) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.lines.length === 0) {
      return;
    }
    const text = this.lines.join('');
    this.lines = [];
    this.size = 0;
    await this.sink.write(text);
  }
}

export class CsvExporter extends BaseExporter implements CopyCapable {
  constructor(context: ExporterContext) {
    super('csv', context);
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);

    this.logger.debug('preparing export', {
      delimiter: options.delimiter,
      compression: options.compression,
      noHeader: options.noHeader,
    });

    return this.withSink(options, async sink => {
      const writer = new CsvLineWriter(sink, options.delimiter);

      if (!options.noHeader) {
        await writer.writeRecord(names);
        this.logger.debug('header written', { columns: names.length });
      }

      const progress = this.createProgress();
      const rows = await this.forEachRow(
        cursor,
        progress,
        values => writer.writeRecord(kinds.map((kind, i) => formatCsvValue(values[i], kind, ctx))),
        () => writer.flush()
      );
      await writer.flush();

      progress.finish('export completed');
      return rows;
    });
  }

  async exportCopy(source: CopySource, query: string, options: ExportOptions): Promise<number> {
    const sql = buildCopySql(query, options);
    this.logger.debug('starting COPY export', {
      noHeader: options.noHeader,
      compression: options.compression,
    });

    const started = this.now().getTime();
    const rows = await this.withSink(options, async sink => {
      try {
        return await source.copyTo(sql, chunk => sink.write(chunk));
      } catch (error) {
        if (error instanceof SinkError) {
          throw error;
        }
        throw new CopyError(error);
      }
    });

    this.logger.debug('COPY export completed', { rows, elapsedMs: this.now().getTime() - started });
    return rows;
  }
}

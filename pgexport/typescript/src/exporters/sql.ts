/**
 * SQL INSERT exporter.
 * @module exporters/sql
 */

import { ConfigurationError } from '../errors/index.js';
import { formatSqlValue, quoteIdent } from '../formatters/index.js';
import type { ExportOptions, RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

/**
 * Renders one INSERT statement:
 *
 * ```sql
 * INSERT INTO "public"."users" ("id", "name") VALUES
 * 	(1, 'a'),
 * 	(2, 'b');
 * ```
 */
export function buildInsertStatement(
  table: string,
  quotedColumns: readonly string[],
  records: readonly (readonly string[])[]
): string {
  const lines = records.map(
    (record, i) => `\t(${record.join(', ')})${i === records.length - 1 ? ';' : ','}\n`
  );
  return `INSERT INTO ${quoteIdent(table)} (${quotedColumns.join(', ')}) VALUES\n${lines.join('')}`;
}

export class SqlExporter extends BaseExporter {
  constructor(context: ExporterContext) {
    super('sql', context);
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const table = options.insertTable.trim();
    if (table === '') {
      throw new ConfigurationError('table name is required for SQL format');
    }
    const batchSize = Math.max(1, Math.floor(options.rowsPerStatement));
    const { names, kinds } = describeColumns(cursor);
    const columns = names.map(quoteIdent);

    this.logger.debug('preparing export', {
      table,
      compression: options.compression,
      rowsPerStatement: batchSize,
    });

    return this.withSink(options, async sink => {
      let batch: string[][] = [];
      let statements = 0;

      const writeBatch = async (): Promise<void> => {
        if (batch.length === 0) {
          return;
        }
        const statement = buildInsertStatement(table, columns, batch);
        batch = [];
        await sink.write(statement);
        statements++;
      };

      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, async values => {
        batch.push(kinds.map((kind, i) => formatSqlValue(values[i], kind)));
        if (batch.length === batchSize) {
          await writeBatch();
        }
      });
      await writeBatch();

      this.logger.debug('statements written', { statements });
      progress.finish('export completed');
      return rows;
    });
  }
}

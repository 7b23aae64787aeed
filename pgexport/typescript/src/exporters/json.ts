/**
 * JSON array exporter; streams one element per row.
 * @module exporters/json
 */

import { encodeJsonRow, OrderedRow } from '../encoders/index.js';
import { createFormatContext, formatJsonValue } from '../formatters/index.js';
import type { ExportOptions, RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

export class JsonExporter extends BaseExporter {
  constructor(context: ExporterContext) {
    super('json', context);
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);

    this.logger.debug('preparing export', { compression: options.compression });

    return this.withSink(options, async sink => {
      await sink.write('[\n');

      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, async (values, rowIndex) => {
        const row = new OrderedRow(
          names,
          kinds.map((kind, i) => formatJsonValue(values[i], kind, ctx))
        );
        const element = `  ${encodeJsonRow(row)}`;
        await sink.write(rowIndex === 1 ? element : `,\n${element}`);
      });

      await sink.write('\n]\n');
      progress.finish('export completed');
      return rows;
    });
  }
}

/**
 * YAML exporter. The sequence is encoded once, after the last row.
 * @module exporters/yaml
 */

import { OrderedRow, YamlSequenceEncoder } from '../encoders/index.js';
import { createFormatContext, formatYamlValue } from '../formatters/index.js';
import type { ExportOptions, RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

export class YamlExporter extends BaseExporter {
  constructor(context: ExporterContext) {
    super('yaml', context);
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);
    const encoder = new YamlSequenceEncoder();

    this.logger.debug('preparing export', { compression: options.compression });

    return this.withSink(options, async sink => {
      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, values => {
        encoder.append(
          new OrderedRow(
            names,
            kinds.map((kind, i) => formatYamlValue(values[i], kind, ctx))
          )
        );
      });

      this.logger.debug('encoding document', { rows: encoder.length });
      await sink.write(encoder.toString());

      progress.finish('export completed');
      return rows;
    });
  }
}

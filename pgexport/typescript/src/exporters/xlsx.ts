/**
 * XLSX exporter.
 *
 * Rows are streamed into a workbook writer whose zip output goes straight to
 * the sink. A sheet that is full is committed and a new `Sheet<N>` is
 * started with its own header.
 * @module exporters/xlsx
 */

import { Writable } from 'node:stream';
import ExcelJS, { type Worksheet } from 'exceljs';
import { toError } from '../errors/index.js';
import { createFormatContext, formatXlsxValue } from '../formatters/index.js';
import type { OutputSink } from '../output/index.js';
import { XLSX_MAX_ROWS_PER_SHEET, type ExportOptions, type RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

/**
 * XLSX exporter options.
 */
export interface XlsxExporterOptions {
  /** Rows per sheet, header included */
  maxRowsPerSheet?: number;
}

function sinkStream(sink: OutputSink): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      sink.write(chunk).then(
        () => callback(),
        (error: unknown) => callback(toError(error))
      );
    },
  });
}

export class XlsxExporter extends BaseExporter {
  private readonly maxRowsPerSheet: number;

  constructor(context: ExporterContext, options: XlsxExporterOptions = {}) {
    super('xlsx', context);
    this.maxRowsPerSheet = options.maxRowsPerSheet ?? XLSX_MAX_ROWS_PER_SHEET;
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);

    this.logger.debug('preparing export', {
      compression: options.compression,
      noHeader: options.noHeader,
    });

    return this.withSink(options, async sink => {
      const workbook = new ExcelJS.stream.xlsx.WorkbookWriter({
        stream: sinkStream(sink),
        useStyles: true,
        useSharedStrings: false,
      });

      let sheetIndex = 0;
      let currentRow = 1;

      const openSheet = (): Worksheet => {
        sheetIndex++;
        currentRow = 1;
        const sheet = workbook.addWorksheet(`Sheet${sheetIndex}`);
        if (!options.noHeader) {
          const header = sheet.addRow(names);
          header.font = { bold: true };
          header.commit();
          currentRow++;
        }
        return sheet;
      };

      let sheet = openSheet();

      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, values => {
        if (currentRow > this.maxRowsPerSheet) {
          sheet.commit();
          sheet = openSheet();
          this.logger.debug('started new sheet', { sheet: `Sheet${sheetIndex}` });
        }
        sheet.addRow(kinds.map((kind, i) => formatXlsxValue(values[i], kind, ctx))).commit();
        currentRow++;
      });

      sheet.commit();
      await workbook.commit();

      this.logger.debug('workbook written', { sheets: sheetIndex });
      progress.finish('export completed');
      return rows;
    });
  }
}

/**
 * XML exporter.
 *
 * Layout:
 * ```xml
 * <?xml version="1.0" encoding="UTF-8"?>
 * <results>
 *   <row><id>1</id><name>Alice</name></row>
 * </results>
 * ```
 * @module exporters/xml
 */

import { createFormatContext, formatXmlValue } from '../formatters/index.js';
import type { ExportOptions, RowCursor } from '../types/index.js';
import { BaseExporter, describeColumns, type ExporterContext } from './exporter.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Escapes XML special characters.
 *
 * @example
 * ```typescript
 * escapeXml('Hello & "World"'); // 'Hello &amp; &quot;World&quot;'
 * ```
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Element content: JSON documents (starting with `{` or `[`) are kept
 * verbatim, everything else is escaped.
 */
export function xmlContent(text: string): string {
  if (text.startsWith('{') || text.startsWith('[')) {
    return text;
  }
  return escapeXml(text);
}

export class XmlExporter extends BaseExporter {
  constructor(context: ExporterContext) {
    super('xml', context);
  }

  /**
   * One `<column>text</column>` element; empty text gives `<column></column>`.
   * The column name is used as the tag as-is, `#text` and `?pi` included.
   */
  element(column: string, text: string): string {
    return `<${column}>${xmlContent(text)}</${column}>`;
  }

  async export(cursor: RowCursor, options: ExportOptions): Promise<number> {
    const { names, kinds } = describeColumns(cursor);
    const ctx = createFormatContext(options, this.logger);
    const root = options.xmlRootElement;
    const rowTag = options.xmlRowElement;

    this.logger.debug('preparing export', {
      rootElement: root,
      rowElement: rowTag,
      compression: options.compression,
    });

    return this.withSink(options, async sink => {
      await sink.write(`${XML_DECLARATION}<${root}>\n`);

      const progress = this.createProgress();
      const rows = await this.forEachRow(cursor, progress, async values => {
        const cells = kinds.map((kind, i) => this.element(names[i], formatXmlValue(values[i], kind, ctx)));
        await sink.write(`  <${rowTag}>${cells.join('')}</${rowTag}>\n`);
      });

      await sink.write(`</${root}>\n`);
      progress.finish('export completed');
      return rows;
    });
  }
}

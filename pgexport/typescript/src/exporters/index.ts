/**
 * Per-format exporters and their registry.
 * @module exporters
 */

import { CsvExporter } from './csv.js';
import { JsonExporter } from './json.js';
import { FORMAT_NAMES, type FormatName } from '../types/index.js';
import type { ExporterFactory, ExporterRegistry } from './registry.js';
import { SqlExporter } from './sql.js';
import { TemplateExporter } from './template.js';
import { XlsxExporter } from './xlsx.js';
import { XmlExporter } from './xml.js';
import { YamlExporter } from './yaml.js';

export * from './exporter.js';
export * from './registry.js';
export * from './csv.js';
export * from './json.js';
export * from './xml.js';
export * from './yaml.js';
export * from './sql.js';
export * from './xlsx.js';
export * from './template.js';

const DEFAULT_EXPORTERS: Record<FormatName, ExporterFactory> = {
  csv: context => new CsvExporter(context),
  json: context => new JsonExporter(context),
  xml: context => new XmlExporter(context),
  yaml: context => new YamlExporter(context),
  sql: context => new SqlExporter(context),
  xlsx: context => new XlsxExporter(context),
  template: context => new TemplateExporter(context),
};

/**
 * Registers every name in {@link FORMAT_NAMES}.
 */
export function registerDefaultExporters(registry: ExporterRegistry): ExporterRegistry {
  for (const format of FORMAT_NAMES) {
    registry.register(format, DEFAULT_EXPORTERS[format]);
  }
  return registry;
}

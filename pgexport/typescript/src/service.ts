/**
 * Export service: validates a request, picks the exporter and runs it
 * against the store.
 * @module service
 */

import { createExportOptions, type ExportOptionsInput } from './config/index.js';
import { EmptyResultError } from './errors/index.js';
import { isCopyCapable, type ExporterRegistry } from './exporters/index.js';
import { NoopLogger, type Logger, type ProgressCallback } from './observability/index.js';
import { resolveOutputPath, type SinkFactory } from './output/index.js';
import type { ExportStore } from './types/index.js';
import { validateQuery } from './validation/index.js';

/**
 * One export request.
 */
export interface ExportRequest {
  store: ExportStore;
  registry: ExporterRegistry;
  query: string;
  options: ExportOptionsInput;
  /** Use COPY when the format supports it */
  withCopy?: boolean;
  /** Fail with {@link EmptyResultError} when no row was exported */
  failOnEmpty?: boolean;
  /** Rows per cursor round trip */
  fetchSize?: number;
  logger?: Logger;
  onProgress?: ProgressCallback;
  createSink?: SinkFactory;
}

/**
 * Outcome of a successful export.
 */
export interface ExportResult {
  /** Rows written */
  rows: number;
  /** Effective output path */
  path: string;
  format: string;
  durationMs: number;
}

/**
 * Runs one export.
 *
 * @throws {ConfigurationError} If the options are invalid
 * @throws {UnsupportedFormatError} If no exporter is registered for the format
 * @throws {InvalidQueryError} If the query is not a single read-only statement
 * @throws {EmptyResultError} If `failOnEmpty` is set and no row was exported
 */
export async function exportQuery(request: ExportRequest): Promise<ExportResult> {
  const started = Date.now();
  const logger = request.logger ?? new NoopLogger();
  const options = createExportOptions(request.options);

  validateQuery(request.query);

  const exporter = request.registry.get(options.format, {
    logger,
    onProgress: request.onProgress,
    createSink: request.createSink,
  });

  logger.info('starting export', {
    format: options.format,
    compression: options.compression,
    output: options.outputPath,
  });

  let rows: number;
  if (request.withCopy && isCopyCapable(exporter)) {
    rows = await exporter.exportCopy(request.store, request.query, options);
  } else {
    if (request.withCopy) {
      logger.warn('COPY mode is not supported for this format, using row mode', { format: options.format });
    }
    const cursor = await request.store.openCursor(request.query, request.fetchSize);
    try {
      rows = await exporter.export(cursor, options);
    } finally {
      await cursor.close();
    }
  }

  if (rows === 0) {
    if (request.failOnEmpty) {
      throw new EmptyResultError();
    }
    logger.warn('query returned 0 rows');
  }

  const result: ExportResult = {
    rows,
    path: resolveOutputPath(options.outputPath, options.compression),
    format: options.format,
    durationMs: Date.now() - started,
  };
  logger.info('export completed', { ...result });
  return result;
}

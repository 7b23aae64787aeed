/**
 * Streaming PostgreSQL export pipeline.
 *
 * Exports query results as CSV, JSON, XML, YAML, SQL INSERT statements,
 * XLSX workbooks or user templates, optionally compressed with gzip, zip,
 * zstd or lz4.
 *
 * @example Basic usage
 * ```typescript
 * import {
 *   ExporterRegistry,
 *   PgStore,
 *   exportQuery,
 *   loadDatabaseConfig,
 *   registerDefaultExporters,
 * } from 'pg-export-pipeline';
 *
 * const registry = registerDefaultExporters(new ExporterRegistry());
 * const store = await PgStore.connect(loadDatabaseConfig());
 *
 * const result = await exportQuery({
 *   store,
 *   registry,
 *   query: 'SELECT id, name FROM users',
 *   options: { format: 'csv', outputPath: 'users.csv', compression: 'gzip' },
 * });
 * // result.path === 'users.csv.gz'
 *
 * await store.close();
 * ```
 *
 * @module pg-export-pipeline
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './formatters/index.js';
export * from './encoders/index.js';
export * from './output/index.js';
export * from './exporters/index.js';
export * from './validation/index.js';
export * from './db/index.js';
export * from './service.js';

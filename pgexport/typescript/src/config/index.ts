/**
 * Configuration module for exports and the database connection.
 * @module config
 */

import { z } from 'zod';
import {
  COMPRESSION_TYPES,
  DEFAULT_TIME_FORMAT,
  type CompressionType,
  type ExportOptions,
} from '../types/index.js';
import { ConfigurationError, UnsupportedCompressionError } from '../errors/index.js';

// ============================================================================
// Export Options
// ============================================================================

/**
 * Default export options. `format` and `outputPath` have no default.
 */
export const DEFAULT_EXPORT_OPTIONS: Omit<ExportOptions, 'format' | 'outputPath'> = {
  delimiter: ',',
  compression: 'none',
  timeFormat: DEFAULT_TIME_FORMAT,
  timeZone: '',
  noHeader: false,
  xmlRootElement: 'results',
  xmlRowElement: 'row',
  insertTable: '',
  rowsPerStatement: 1,
  templateFile: '',
  templateHeader: '',
  templateRow: '',
  templateFooter: '',
  templateStreaming: false,
};

/**
 * Caller-supplied options; everything but format and output path is optional.
 */
export type ExportOptionsInput = Pick<ExportOptions, 'format' | 'outputPath'> &
  Partial<Omit<ExportOptions, 'format' | 'outputPath' | 'compression'>> & {
    compression?: string;
  };

const XML_NAME = /^[A-Za-z_][A-Za-z0-9._-]*$/;

/**
 * Zod schema for export option validation.
 */
const exportOptionsSchema = z
  .object({
    format: z.string().trim().min(1, 'format is required'),
    outputPath: z.string().trim().min(1, 'output path is required'),
    delimiter: z.string().refine(d => [...d].length === 1, 'delimiter must be a single character'),
    compression: z.enum(COMPRESSION_TYPES),
    timeFormat: z.string().min(1, 'time format cannot be empty'),
    timeZone: z.string().refine(isValidTimeZone, tz => ({ message: `invalid timezone "${tz}"` })),
    noHeader: z.boolean(),
    xmlRootElement: z.string().regex(XML_NAME, 'invalid XML element name'),
    xmlRowElement: z.string().regex(XML_NAME, 'invalid XML element name'),
    insertTable: z.string(),
    rowsPerStatement: z.number().int().min(1, 'rows per statement must be at least 1'),
    templateFile: z.string(),
    templateHeader: z.string(),
    templateRow: z.string(),
    templateFooter: z.string(),
    templateStreaming: z.boolean(),
  })
  .superRefine((opts, ctx) => {
    const format = opts.format.trim().toLowerCase();
    if (format === 'sql' && opts.insertTable.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['insertTable'],
        message: 'table name is required for SQL format',
      });
    }
    if (format === 'template') {
      const hasFull = opts.templateFile.trim() !== '';
      const hasRow = opts.templateRow.trim() !== '';
      if (opts.templateStreaming && !hasRow) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['templateRow'],
          message: 'streaming mode requires a row template',
        });
      }
      if (!opts.templateStreaming && !hasFull) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['templateFile'],
          message: 'full mode requires a template file',
        });
      }
      if (hasFull && hasRow) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['templateFile'],
          message: 'use either a template file or a row template, not both',
        });
      }
    }
  });

/**
 * Normalizes a compression name (trimmed, case-insensitive).
 *
 * @throws {UnsupportedCompressionError} If the name is not supported
 */
export function parseCompression(value: string): CompressionType {
  const normalized = value.trim().toLowerCase();
  const match = COMPRESSION_TYPES.find(c => c === normalized);
  if (match === undefined) {
    throw new UnsupportedCompressionError(value);
  }
  return match;
}

/**
 * Merges defaults into caller options and validates the result.
 *
 * @throws {ConfigurationError} If the options are invalid
 * @throws {UnsupportedCompressionError} If the compression name is unknown
 */
export function createExportOptions(input: ExportOptionsInput): ExportOptions {
  const options: ExportOptions = {
    ...DEFAULT_EXPORT_OPTIONS,
    ...input,
    format: input.format.trim().toLowerCase(),
    compression: parseCompression(input.compression ?? DEFAULT_EXPORT_OPTIONS.compression),
  };
  validateExportOptions(options);
  return Object.freeze(options);
}

/**
 * Validates an export options snapshot.
 *
 * @throws {ConfigurationError} If the options are invalid
 */
export function validateExportOptions(options: ExportOptions): void {
  const result = exportOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid export options: ${issues.join(', ')}`, {
      issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    });
  }
}

/**
 * Parses a delimiter argument: `\t` means tab, anything else must be a
 * single character.
 *
 * @throws {ConfigurationError} If the delimiter is not one character
 */
export function parseDelimiter(value: string): string {
  if (value === '\\t') {
    return '\t';
  }
  const chars = [...value];
  if (chars.length !== 1) {
    throw new ConfigurationError(`delimiter must be a single character (use \\t for tab), got "${value}"`);
  }
  return value;
}

/**
 * Whether the zone name is empty (local time) or known to the runtime.
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone === '') {
    return true;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Database Configuration
// ============================================================================

/**
 * Default database settings.
 */
export const DEFAULT_DB_HOST = 'localhost';
export const DEFAULT_DB_PORT = 5432;
export const DEFAULT_DB_USER = 'postgres';
export const DEFAULT_DB_NAME = 'postgres';

/**
 * Database connection settings.
 *
 * SECURITY: password is never logged; use {@link redactConfig}.
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  /** @sensitive */
  password: string;
  database: string;
  /** Empty means the driver default */
  sslMode: string;
}

const databaseConfigSchema = z.object({
  host: z.string().trim().min(1, 'DB_HOST cannot be empty or contain only whitespace'),
  port: z.number().int().min(1).max(65535, 'DB_PORT must be a valid port number (1-65535)'),
  user: z.string().trim().min(1, 'DB_USER cannot be empty or contain only whitespace'),
  password: z.string(),
  database: z.string().trim().min(1, 'DB_NAME cannot be empty or contain only whitespace'),
  sslMode: z.string(),
});

/**
 * Reads database settings from the environment.
 *
 * Recognized variables: DB_HOST, DB_PORT, DB_USER, DB_PASS, DB_NAME,
 * DB_SSLMODE. An unparseable DB_PORT falls back to the default.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const port = Number.parseInt(env.DB_PORT ?? '', 10);
  return {
    host: env.DB_HOST || DEFAULT_DB_HOST,
    port: Number.isNaN(port) ? DEFAULT_DB_PORT : port,
    user: env.DB_USER || DEFAULT_DB_USER,
    password: env.DB_PASS ?? '',
    database: env.DB_NAME || DEFAULT_DB_NAME,
    sslMode: env.DB_SSLMODE ?? '',
  };
}

/**
 * Validates database settings.
 *
 * @throws {ConfigurationError} If a setting is out of range or blank
 */
export function validateDatabaseConfig(config: DatabaseConfig): void {
  const result = databaseConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(i => i.message).join('; '));
  }
}

/**
 * Builds a `postgres://` connection string.
 *
 * SECURITY NOTE: The returned string contains the password in plain text.
 * Only use for internal purposes, never log or expose.
 */
export function toConnectionString(config: DatabaseConfig): string {
  const url = new URL('postgres://localhost');
  url.hostname = config.host;
  url.port = config.port.toString();
  url.username = config.user;
  url.password = config.password;
  url.pathname = `/${config.database}`;
  if (config.sslMode.trim() !== '') {
    url.searchParams.set('sslmode', config.sslMode);
  }
  return url.toString();
}

/**
 * Redacts sensitive information from configuration for logging.
 */
export function redactConfig(config: DatabaseConfig): DatabaseConfig {
  return {
    ...config,
    password: '[REDACTED]',
  };
}

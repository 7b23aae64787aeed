/**
 * Core types for the export pipeline.
 *
 * Cursor contract, field descriptors, wire type identifiers and the
 * per-call export options snapshot.
 */

// ============================================================================
// Wire Types
// ============================================================================

/**
 * PostgreSQL type OIDs the value formatter knows about.
 */
export const TypeOid = {
  Bool: 16,
  Bytea: 17,
  Int8: 20,
  Int2: 21,
  Int4: 23,
  Text: 25,
  Json: 114,
  Float4: 700,
  Float8: 701,
  Bpchar: 1042,
  Varchar: 1043,
  Date: 1082,
  Timestamp: 1114,
  Timestamptz: 1184,
  Interval: 1186,
  Numeric: 1700,
  Uuid: 2950,
  Jsonb: 3802,
} as const;

/**
 * Closed set of wire kinds the formatter dispatches on.
 *
 * `passthrough` is the fallback for every OID not listed in {@link TypeOid}.
 */
export type WireKind =
  | 'bool'
  | 'bytea'
  | 'int2'
  | 'int4'
  | 'int8'
  | 'float4'
  | 'float8'
  | 'numeric'
  | 'text'
  | 'date'
  | 'timestamp'
  | 'timestamptz'
  | 'interval'
  | 'uuid'
  | 'json'
  | 'jsonb'
  | 'passthrough';

const KIND_BY_OID: ReadonlyMap<number, WireKind> = new Map<number, WireKind>([
  [TypeOid.Bool, 'bool'],
  [TypeOid.Bytea, 'bytea'],
  [TypeOid.Int8, 'int8'],
  [TypeOid.Int2, 'int2'],
  [TypeOid.Int4, 'int4'],
  [TypeOid.Text, 'text'],
  [TypeOid.Bpchar, 'text'],
  [TypeOid.Varchar, 'text'],
  [TypeOid.Json, 'json'],
  [TypeOid.Float4, 'float4'],
  [TypeOid.Float8, 'float8'],
  [TypeOid.Date, 'date'],
  [TypeOid.Timestamp, 'timestamp'],
  [TypeOid.Timestamptz, 'timestamptz'],
  [TypeOid.Interval, 'interval'],
  [TypeOid.Numeric, 'numeric'],
  [TypeOid.Uuid, 'uuid'],
  [TypeOid.Jsonb, 'jsonb'],
]);

/**
 * Maps a type OID to its wire kind.
 */
export function wireKindOf(typeOid: number): WireKind {
  return KIND_BY_OID.get(typeOid) ?? 'passthrough';
}

/**
 * Whether the kind carries a calendar value.
 */
export function isTemporalKind(kind: WireKind): boolean {
  return kind === 'date' || kind === 'timestamp' || kind === 'timestamptz';
}

/**
 * Whether the kind carries a JSON document.
 */
export function isJsonKind(kind: WireKind): boolean {
  return kind === 'json' || kind === 'jsonb';
}

// ============================================================================
// Cursor Types
// ============================================================================

/**
 * One projected column: name plus wire type identifier.
 */
export interface FieldDescriptor {
  /** Column name as reported by the server */
  readonly name: string;
  /** PostgreSQL type OID */
  readonly typeOid: number;
}

/**
 * Forward-only, single-pass cursor over query results.
 *
 * `fields()` is available before the first `next()` and never changes.
 * `values()` returns the current row and is only valid after `next()`
 * resolved to true. A fault may be deferred until exhaustion, so callers
 * check `err()` once after the loop.
 */
export interface RowCursor {
  fields(): readonly FieldDescriptor[];
  next(): Promise<boolean>;
  values(): unknown[];
  err(): Error | undefined;
  close(): Promise<void>;
}

/**
 * Server-side bulk copy used by the CSV fast path.
 */
export interface CopySource {
  /**
   * Runs a `COPY ... TO STDOUT` statement, handing every chunk to `write`.
   *
   * @returns Row count reported by the server
   */
  copyTo(sql: string, write: (chunk: Buffer) => Promise<void>): Promise<number>;
}

/**
 * Opens cursors for queries; implemented by the database store.
 */
export interface CursorSource {
  /**
   * Opens a forward-only cursor.
   *
   * @param fetchSize - Rows fetched per round trip
   */
  openCursor(query: string, fetchSize?: number): Promise<RowCursor>;
}

/**
 * Everything an export needs from the database.
 */
export type ExportStore = CursorSource & CopySource;

// ============================================================================
// Export Options
// ============================================================================

/**
 * Supported compression modes.
 */
export const COMPRESSION_TYPES = ['none', 'gzip', 'zip', 'zstd', 'lz4'] as const;

export type CompressionType = (typeof COMPRESSION_TYPES)[number];

/**
 * Format names registered by default.
 */
export const FORMAT_NAMES = ['csv', 'json', 'xml', 'yaml', 'sql', 'xlsx', 'template'] as const;

export type FormatName = (typeof FORMAT_NAMES)[number];

/**
 * Immutable option snapshot for one export call.
 */
export interface ExportOptions {
  /** Registered format name */
  readonly format: string;
  /** Output path before compression rewrites its extension */
  readonly outputPath: string;
  /** CSV field delimiter (single character) */
  readonly delimiter: string;
  /** Compression mode */
  readonly compression: CompressionType;
  /** Layout built from yyyy, yy, MM, dd, HH, mm, ss, SSS, SS, S */
  readonly timeFormat: string;
  /** IANA zone name; empty means local time */
  readonly timeZone: string;
  /** Skip the header row (CSV, XLSX) */
  readonly noHeader: boolean;
  /** XML document element */
  readonly xmlRootElement: string;
  /** XML per-row element */
  readonly xmlRowElement: string;
  /** Target table for SQL output, optionally schema-qualified */
  readonly insertTable: string;
  /** Rows grouped into one INSERT statement */
  readonly rowsPerStatement: number;
  /** Full-mode template file */
  readonly templateFile: string;
  /** Streaming-mode header template file */
  readonly templateHeader: string;
  /** Streaming-mode row template file */
  readonly templateRow: string;
  /** Streaming-mode footer template file */
  readonly templateFooter: string;
  /** Render the template once per row instead of once per result */
  readonly templateStreaming: boolean;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Default time layout.
 */
export const DEFAULT_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Write buffer in front of the output file (256 KiB).
 */
export const SINK_BUFFER_SIZE = 256 * 1024;

/**
 * Rows per XLSX worksheet.
 */
export const XLSX_MAX_ROWS_PER_SHEET = 1_048_576;

/**
 * Rows between progress reports.
 */
export const PROGRESS_ROW_INTERVAL = 10_000;

/**
 * Milliseconds between progress reports.
 */
export const PROGRESS_TIME_INTERVAL_MS = 2_000;

/**
 * Rows fetched per server-side cursor round trip.
 */
export const DEFAULT_FETCH_SIZE = 1_000;

/**
 * PostgreSQL store: server-side cursors and COPY over a pg pool.
 * @module db
 */

import { Pool, types, type PoolClient } from 'pg';
import { to as copyToStdout } from 'pg-copy-streams';
import {
  toConnectionString,
  validateDatabaseConfig,
  type DatabaseConfig,
} from '../config/index.js';
import { ConnectionFailedError, parseDriverError, toError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  DEFAULT_FETCH_SIZE,
  TypeOid,
  type ExportStore,
  type FieldDescriptor,
  type RowCursor,
} from '../types/index.js';

// ============================================================================
// Type Parsers
// ============================================================================

const DATE_TIME = /^(\d{4,})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Parses DATE and TIMESTAMP text into a Date whose UTC fields are the
 * stored wall clock. Values such as `infinity` stay text.
 */
export function parseWallClock(value: string): Date | string {
  const match = DATE_TIME.exec(value);
  if (!match) {
    return value;
  }
  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = match;
  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  date.setUTCHours(Number(hour), Number(minute), Number(second), Number(fraction.padEnd(3, '0').slice(0, 3)));
  return date;
}

let parsersRegistered = false;

/**
 * Installs the process-wide parsers: DATE and TIMESTAMP as wall-clock
 * dates, INTERVAL as its text form.
 */
export function registerTypeParsers(): void {
  if (parsersRegistered) {
    return;
  }
  types.setTypeParser(TypeOid.Date, parseWallClock);
  types.setTypeParser(TypeOid.Timestamp, parseWallClock);
  types.setTypeParser(TypeOid.Interval, (value: string) => value);
  parsersRegistered = true;
}

// ============================================================================
// Cursor
// ============================================================================

/**
 * Strips trailing semicolons so the query can be embedded in another
 * statement.
 */
export function stripTrailingSemicolons(query: string): string {
  return query.trim().replace(/;+\s*$/, '').trim();
}

const CURSOR_NAME = 'export_cursor';

/**
 * Cursor over `DECLARE ... NO SCROLL CURSOR` inside a transaction.
 *
 * A failed fetch ends iteration; the error is reported by `err()`.
 */
export class PgRowCursor implements RowCursor {
  private buffer: unknown[][];
  private position = 0;
  private current: unknown[] = [];
  private exhausted: boolean;
  private failure: Error | undefined;
  private closed = false;

  private constructor(
    private readonly client: PoolClient,
    private readonly descriptors: readonly FieldDescriptor[],
    firstBatch: unknown[][],
    private readonly fetchSize: number,
    private readonly logger: Logger
  ) {
    this.buffer = firstBatch;
    this.exhausted = firstBatch.length < fetchSize;
  }

  /**
   * Begins a transaction, declares the cursor and fetches the first batch,
   * which also yields the field descriptors.
   */
  static async open(
    client: PoolClient,
    query: string,
    fetchSize: number,
    logger: Logger
  ): Promise<PgRowCursor> {
    await client.query('BEGIN');
    try {
      await client.query(`DECLARE ${CURSOR_NAME} NO SCROLL CURSOR FOR ${stripTrailingSemicolons(query)}`);
      const first = await PgRowCursor.fetch(client, fetchSize);
      const fields = first.fields.map(f => ({ name: f.name, typeOid: f.dataTypeID }));
      logger.debug('cursor opened', { columns: fields.length, fetchSize });
      return new PgRowCursor(client, fields, first.rows, fetchSize, logger);
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn('rollback failed', { error: toError(rollbackError).message });
      });
      throw parseDriverError(error);
    }
  }

  private static fetch(client: PoolClient, fetchSize: number) {
    return client.query<unknown[]>({
      text: `FETCH FORWARD ${fetchSize} FROM ${CURSOR_NAME}`,
      rowMode: 'array',
    });
  }

  fields(): readonly FieldDescriptor[] {
    return this.descriptors;
  }

  async next(): Promise<boolean> {
    if (this.position >= this.buffer.length) {
      if (this.exhausted || this.failure || this.closed) {
        return false;
      }
      try {
        const batch = await PgRowCursor.fetch(this.client, this.fetchSize);
        this.buffer = batch.rows;
        this.position = 0;
        this.exhausted = batch.rows.length < this.fetchSize;
      } catch (error) {
        this.failure = parseDriverError(error);
        return false;
      }
      if (this.buffer.length === 0) {
        return false;
      }
    }
    this.current = this.buffer[this.position];
    this.position++;
    return true;
  }

  values(): unknown[] {
    return this.current;
  }

  err(): Error | undefined {
    return this.failure;
  }

  /**
   * Closes the cursor and ends the transaction (rolled back after a
   * failure), then returns the connection to the pool.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      if (this.failure) {
        await this.client.query('ROLLBACK');
      } else {
        await this.client.query(`CLOSE ${CURSOR_NAME}`);
        await this.client.query('COMMIT');
      }
      this.client.release();
    } catch (error) {
      this.logger.warn('failed to close cursor', { error: toError(error).message });
      this.client.release(true);
    }
  }
}

// ============================================================================
// Store
// ============================================================================

/**
 * Store options.
 */
export interface PgStoreOptions {
  logger?: Logger;
  /** Maximum pooled connections */
  maxConnections?: number;
}

export class PgStore implements ExportStore {
  private readonly logger: Logger;

  private constructor(
    private readonly pool: Pool,
    logger: Logger
  ) {
    this.logger = logger;
  }

  /**
   * Validates the settings, registers type parsers and checks that the
   * server is reachable.
   *
   * @throws {ConfigurationError} If the settings are invalid
   * @throws {ConnectionFailedError} If the server cannot be reached
   */
  static async connect(config: DatabaseConfig, options: PgStoreOptions = {}): Promise<PgStore> {
    validateDatabaseConfig(config);
    registerTypeParsers();

    const logger = (options.logger ?? new NoopLogger()).child({ component: 'store' });
    const pool = new Pool({
      connectionString: toConnectionString(config),
      max: options.maxConnections ?? 2,
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        logger.warn('failed to close pool', { error: toError(endError).message });
      });
      throw new ConnectionFailedError(config.host, config.port, error);
    }

    logger.debug('connected', { host: config.host, port: config.port, database: config.database });
    return new PgStore(pool, logger);
  }

  async openCursor(query: string, fetchSize: number = DEFAULT_FETCH_SIZE): Promise<RowCursor> {
    const client = await this.pool.connect();
    try {
      return await PgRowCursor.open(client, query, fetchSize, this.logger);
    } catch (error) {
      client.release();
      throw error;
    }
  }

  async copyTo(sql: string, write: (chunk: Buffer) => Promise<void>): Promise<number> {
    const client = await this.pool.connect();
    let released = false;
    try {
      const stream = client.query(copyToStdout(sql));
      for await (const chunk of stream) {
        const data: unknown = chunk;
        await write(Buffer.isBuffer(data) ? data : Buffer.from(String(data)));
      }
      return stream.rowCount;
    } catch (error) {
      client.release(true);
      released = true;
      throw parseDriverError(error);
    } finally {
      if (!released) {
        client.release();
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.debug('pool closed');
  }
}

/**
 * In-process stand-ins for the database and the output sink.
 * @module testing
 */

import type { OutputSink, SinkConfig, SinkFactory } from '../output/index.js';
import type {
  CopySource,
  ExportStore,
  FieldDescriptor,
  RowCursor,
} from '../types/index.js';

/**
 * ArrayCursor behaviour switches.
 */
export interface ArrayCursorOptions {
  /** `next()` rejects with this error when asked for the given 1-based row */
  failAt?: { row: number; error: Error };
  /** Reported by `err()` once the rows are exhausted */
  terminalError?: Error;
}

/**
 * Cursor over rows held in memory.
 */
export class ArrayCursor implements RowCursor {
  private position = 0;
  private current: unknown[] = [];
  private exhausted = false;
  closeCount = 0;

  constructor(
    private readonly descriptors: readonly FieldDescriptor[],
    private readonly rows: readonly unknown[][],
    private readonly options: ArrayCursorOptions = {}
  ) {}

  fields(): readonly FieldDescriptor[] {
    return this.descriptors;
  }

  async next(): Promise<boolean> {
    const failAt = this.options.failAt;
    if (failAt && this.position + 1 === failAt.row) {
      throw failAt.error;
    }
    if (this.position >= this.rows.length) {
      this.exhausted = true;
      return false;
    }
    this.current = [...this.rows[this.position]];
    this.position++;
    return true;
  }

  values(): unknown[] {
    return this.current;
  }

  err(): Error | undefined {
    return this.exhausted ? this.options.terminalError : undefined;
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

/**
 * COPY source that replays fixed chunks.
 */
export class FakeCopySource implements CopySource {
  readonly statements: string[] = [];

  constructor(
    private readonly chunks: readonly string[],
    private readonly rowCount: number,
    private readonly failWith?: Error
  ) {}

  async copyTo(sql: string, write: (chunk: Buffer) => Promise<void>): Promise<number> {
    this.statements.push(sql);
    for (const chunk of this.chunks) {
      await write(Buffer.from(chunk, 'utf8'));
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return this.rowCount;
  }
}

/**
 * Store serving one result set for every query, with COPY replaying the
 * given chunks.
 */
export class MemoryStore implements ExportStore {
  readonly cursors: ArrayCursor[] = [];
  readonly queries: string[] = [];

  constructor(
    private readonly descriptors: readonly FieldDescriptor[],
    private readonly rows: readonly unknown[][],
    private readonly copy: FakeCopySource = new FakeCopySource([], rows.length)
  ) {}

  async openCursor(query: string): Promise<RowCursor> {
    this.queries.push(query);
    const cursor = new ArrayCursor(this.descriptors, this.rows);
    this.cursors.push(cursor);
    return cursor;
  }

  copyTo(sql: string, write: (chunk: Buffer) => Promise<void>): Promise<number> {
    return this.copy.copyTo(sql, write);
  }
}

/**
 * Sink that keeps everything in memory.
 */
export class MemorySink implements OutputSink {
  private readonly chunks: Buffer[] = [];
  closeCount = 0;

  constructor(
    readonly path: string,
    private readonly failOnWrite?: number
  ) {}

  async write(chunk: string | Uint8Array): Promise<void> {
    if (this.failOnWrite !== undefined && this.chunks.length + 1 === this.failOnWrite) {
      throw new Error(`write ${this.failOnWrite} failed`);
    }
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  /** Everything written, as UTF-8 text */
  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Sink factory recording every sink it creates.
 */
export function memorySinkFactory(options: { failOnWrite?: number } = {}): SinkFactory & {
  sinks: MemorySink[];
  configs: SinkConfig[];
} {
  const sinks: MemorySink[] = [];
  const configs: SinkConfig[] = [];
  const factory = async (config: SinkConfig): Promise<OutputSink> => {
    configs.push(config);
    const sink = new MemorySink(config.path, options.failOnWrite);
    sinks.push(sink);
    return sink;
  };
  return Object.assign(factory, { sinks, configs });
}

/**
 * Field descriptor shorthand.
 */
export function field(name: string, typeOid: number): FieldDescriptor {
  return { name, typeOid };
}

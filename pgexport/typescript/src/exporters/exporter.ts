/**
 * Exporter contract and shared row loop.
 * @module exporters/exporter
 */

import {
  CursorError,
  RowExportError,
  toError,
} from '../errors/index.js';
import { ProgressTracker, type Logger, type ProgressCallback } from '../observability/index.js';
import { createSink, type OutputSink, type SinkFactory } from '../output/index.js';
import {
  wireKindOf,
  type CopySource,
  type ExportOptions,
  type RowCursor,
  type WireKind,
} from '../types/index.js';

// ============================================================================
// Contracts
// ============================================================================

/**
 * Collaborators handed to every exporter instance.
 */
export interface ExporterContext {
  /** Logger; exporters log through a child tagged with their format */
  readonly logger: Logger;
  /** Called with the running row count on every progress report */
  readonly onProgress?: ProgressCallback;
  /** Sink factory (defaults to {@link createSink}) */
  readonly createSink?: SinkFactory;
  /** Wall clock used for progress timing and template timestamps */
  readonly clock?: () => Date;
}

/**
 * Writes every row of a cursor to one output.
 */
export interface Exporter {
  /** Registered format name */
  readonly format: string;
  /**
   * Exports the cursor to `options.outputPath`.
   *
   * @returns Number of data rows written (header excluded)
   */
  export(cursor: RowCursor, options: ExportOptions): Promise<number>;
}

/**
 * Optional capability: server-side bulk export through COPY.
 */
export interface CopyCapable {
  /**
   * Runs the query through COPY and streams the result into the sink.
   *
   * @returns Row count reported by the server
   */
  exportCopy(source: CopySource, query: string, options: ExportOptions): Promise<number>;
}

/**
 * Checks if an exporter supports the COPY fast path.
 */
export function isCopyCapable(exporter: Exporter): exporter is Exporter & CopyCapable {
  return 'exportCopy' in exporter && typeof exporter.exportCopy === 'function';
}

/**
 * Column names and wire kinds in descriptor order.
 */
export interface ColumnLayout {
  readonly names: string[];
  readonly kinds: WireKind[];
}

/**
 * Reads the projected columns once, before the first row.
 */
export function describeColumns(cursor: RowCursor): ColumnLayout {
  const fields = cursor.fields();
  return {
    names: fields.map(f => f.name),
    kinds: fields.map(f => wireKindOf(f.typeOid)),
  };
}

// ============================================================================
// Base Exporter
// ============================================================================

/**
 * Row handler; receives the raw values and the 1-based row index.
 */
export type RowHandler = (values: unknown[], rowIndex: number) => Promise<void> | void;

/**
 * Shared plumbing: sink lifetime, the row loop, progress and error wrapping.
 */
export abstract class BaseExporter implements Exporter {
  protected readonly logger: Logger;

  protected constructor(
    readonly format: string,
    protected readonly context: ExporterContext
  ) {
    this.logger = context.logger.child({ format });
  }

  abstract export(cursor: RowCursor, options: ExportOptions): Promise<number>;

  /**
   * Current time from the context clock.
   */
  protected now(): Date {
    return this.context.clock ? this.context.clock() : new Date();
  }

  /**
   * Progress tracker wired to the context callback and clock.
   */
  protected createProgress(): ProgressTracker {
    return new ProgressTracker(this.logger, {
      onProgress: this.context.onProgress,
      clock: () => this.now().getTime(),
    });
  }

  /**
   * Opens the sink, runs `fn` and closes the sink exactly once.
   *
   * When `fn` fails its error wins; a close failure on that path is logged.
   */
  protected async withSink<T>(options: ExportOptions, fn: (sink: OutputSink) => Promise<T>): Promise<T> {
    const factory = this.context.createSink ?? createSink;
    const sink = await factory(
      { path: options.outputPath, compression: options.compression, format: options.format },
      this.logger
    );

    let result: T;
    try {
      result = await fn(sink);
    } catch (error) {
      await sink.close().catch((closeError: unknown) => {
        this.logger.warn('failed to close output after export error', {
          path: sink.path,
          error: toError(closeError).message,
        });
      });
      throw error;
    }

    await sink.close();
    return result;
  }

  /**
   * Pulls the cursor to exhaustion.
   *
   * Handler failures become {@link RowExportError} with the row index;
   * cursor failures, including the terminal one checked after the loop,
   * become {@link CursorError}. `onReport` runs after every progress report.
   *
   * @returns Number of rows handled
   */
  protected async forEachRow(
    cursor: RowCursor,
    progress: ProgressTracker,
    onRow: RowHandler,
    onReport?: () => Promise<void>
  ): Promise<number> {
    let rowIndex = 0;

    for (;;) {
      let hasRow: boolean;
      try {
        hasRow = await cursor.next();
      } catch (error) {
        throw new CursorError(error);
      }
      if (!hasRow) {
        break;
      }

      rowIndex++;
      try {
        await onRow(cursor.values(), rowIndex);
      } catch (error) {
        throw new RowExportError(rowIndex, error);
      }

      if (progress.tick() && onReport) {
        await onReport();
      }
    }

    const terminal = cursor.err();
    if (terminal) {
      throw new CursorError(terminal);
    }
    return rowIndex;
  }
}

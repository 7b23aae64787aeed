/**
 * Output sink factory.
 *
 * A sink is the single write destination of one export call: an optional
 * compressor, a 256 KiB buffer and the file, closed in that order.
 * @module output
 */

import { parseCompression } from '../config/index.js';
import { SinkError, toError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { createCompressionLayer } from './compressors.js';
import { BufferLayer, FileLayer, type SinkLayer } from './layers.js';
import { resolveOutputPath, zipEntryName } from './paths.js';

export * from './paths.js';
export * from './layers.js';
export * from './compressors.js';

/**
 * Exclusive write destination for one export call.
 */
export interface OutputSink {
  /** Effective path after compression adjusted the extension */
  readonly path: string;
  /** Writes text (UTF-8) or bytes */
  write(chunk: string | Uint8Array): Promise<void>;
  /** Closes every layer; later calls are no-ops */
  close(): Promise<void>;
}

/**
 * Sink parameters.
 */
export interface SinkConfig {
  /** Requested output path */
  path: string;
  /** Compression name (trimmed, case-insensitive) */
  compression: string;
  /** Logical format name, used to name zip entries */
  format: string;
}

/**
 * Creates sinks; injectable for tests.
 */
export type SinkFactory = (config: SinkConfig, logger: Logger) => Promise<OutputSink>;

function toBuffer(chunk: string | Uint8Array): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

class LayeredSink implements OutputSink {
  private closed = false;

  constructor(
    readonly path: string,
    private readonly layers: readonly [SinkLayer, ...SinkLayer[]],
    private readonly logger: Logger
  ) {}

  async write(chunk: string | Uint8Array): Promise<void> {
    if (this.closed) {
      throw new SinkError('write', this.path, new Error('sink is closed'));
    }
    try {
      await this.layers[0].write(toBuffer(chunk));
    } catch (error) {
      throw new SinkError('write', this.path, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    let failure: Error | undefined;
    for (const layer of this.layers) {
      try {
        await layer.close();
      } catch (error) {
        this.logger.warn('failed to close output layer', {
          path: this.path,
          layer: layer.name,
          error: toError(error).message,
        });
        failure ??= toError(error);
      }
    }

    if (failure) {
      throw new SinkError('close', this.path, failure);
    }
    this.logger.debug('output closed', { path: this.path, layers: this.layers.map(l => l.name) });
  }
}

/**
 * Opens the sink for one export call.
 *
 * @throws {UnsupportedCompressionError} Before any file is created
 * @throws {SinkError} If the file or the compressor cannot be created
 */
export const createSink: SinkFactory = async (config, logger = new NoopLogger()) => {
  const compression = parseCompression(config.compression);
  const path = resolveOutputPath(config.path, compression);

  logger.debug('creating output file', { path, compression });

  let file: FileLayer;
  try {
    file = await FileLayer.open(path);
  } catch (error) {
    throw new SinkError('create', path, error);
  }

  const buffer = new BufferLayer(file);
  try {
    const compressor = await createCompressionLayer(
      compression,
      buffer,
      zipEntryName(config.path, config.format)
    );
    const layers: [SinkLayer, ...SinkLayer[]] = compressor ? [compressor, buffer, file] : [buffer, file];
    return new LayeredSink(path, layers, logger);
  } catch (error) {
    await file.close().catch((closeError: unknown) => {
      logger.warn('failed to close output after setup error', {
        path,
        error: toError(closeError).message,
      });
    });
    throw new SinkError('create', path, error);
  }
};

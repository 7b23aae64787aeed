/**
 * Sink layers.
 *
 * A sink is an ordered list of layers: writes enter the first one and
 * every layer forwards to the next. Layers are closed in the same order,
 * so a compressor finishes its trailer before the buffer under it is
 * flushed and the file is closed.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { Writable } from 'node:stream';
import { toError } from '../errors/index.js';
import { SINK_BUFFER_SIZE } from '../types/index.js';

/**
 * Bytes staged in front of a compressor before they are handed to it.
 */
export const STREAM_STAGE_SIZE = 64 * 1024;

/**
 * One stage of an output sink.
 */
export interface SinkLayer {
  /** Layer name used in logs */
  readonly name: string;
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// File
// ============================================================================

/**
 * Plain file opened for writing (truncated if it exists).
 */
export class FileLayer implements SinkLayer {
  readonly name = 'file';

  private constructor(private readonly handle: FileHandle) {}

  static async open(path: string): Promise<FileLayer> {
    return new FileLayer(await open(path, 'w'));
  }

  async write(chunk: Buffer): Promise<void> {
    let offset = 0;
    while (offset < chunk.length) {
      const { bytesWritten } = await this.handle.write(chunk, offset, chunk.length - offset);
      offset += bytesWritten;
    }
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

// ============================================================================
// Buffer
// ============================================================================

/**
 * Fixed-capacity write buffer. Chunks at least as large as the capacity
 * bypass it once it has been flushed.
 */
export class BufferLayer implements SinkLayer {
  readonly name = 'buffer';
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(
    private readonly next: SinkLayer,
    private readonly capacity: number = SINK_BUFFER_SIZE
  ) {}

  async write(chunk: Buffer): Promise<void> {
    if (this.size + chunk.length > this.capacity) {
      await this.flush();
    }
    if (chunk.length >= this.capacity) {
      await this.next.write(chunk);
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  async flush(): Promise<void> {
    if (this.size === 0) {
      return;
    }
    const data = Buffer.concat(this.chunks, this.size);
    this.chunks = [];
    this.size = 0;
    await this.next.write(data);
  }

  close(): Promise<void> {
    return this.flush();
  }
}

// ============================================================================
// Stream
// ============================================================================

/**
 * Writable that hands every chunk to a layer, in order.
 */
export function forwardTo(layer: SinkLayer): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      layer.write(chunk).then(
        () => callback(),
        (error: unknown) => callback(toError(error))
      );
    },
  });
}

/**
 * Layer in front of a Node stream (a compressor or an archive entry).
 *
 * `completion` settles once everything written to `input` has been
 * forwarded to the next layer. A failure is recorded as soon as it happens
 * and rethrown by the next `write` or by `close`.
 */
export class StreamLayer implements SinkLayer {
  private failure: Error | undefined;
  private readonly settled: Promise<void>;
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  constructor(
    readonly name: string,
    private readonly input: Writable,
    completion: Promise<void>,
    private readonly stageSize: number = STREAM_STAGE_SIZE
  ) {
    this.settled = completion.then(
      () => undefined,
      (error: unknown) => {
        this.failure ??= toError(error);
      }
    );
  }

  async write(chunk: Buffer): Promise<void> {
    this.throwIfFailed();
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    if (this.pendingBytes >= this.stageSize) {
      await this.drain();
    }
  }

  async close(): Promise<void> {
    try {
      await this.drain();
    } finally {
      this.input.end();
      await this.settled;
    }
    this.throwIfFailed();
  }

  private async drain(): Promise<void> {
    if (this.pendingBytes === 0) {
      return;
    }
    const data = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    await new Promise<void>((resolve, reject) => {
      this.input.write(data, error => (error ? reject(error) : resolve()));
    });
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * Compression layers: gzip via zlib, zstd and lz4 as standard frames,
 * zip as a single-entry archive.
 */

import { PassThrough, Transform, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import archiver from 'archiver';
import lz4js from 'lz4js';
import zstdCodec, { type ZstdSimple } from 'zstd-codec';
import { toError } from '../errors/index.js';
import type { CompressionType } from '../types/index.js';
import { StreamLayer, forwardTo, type SinkLayer } from './layers.js';

/**
 * Uncompressed bytes per zstd or lz4 frame.
 */
export const FRAME_BLOCK_SIZE = 4 * 1024 * 1024;

/**
 * zstd compression level.
 */
export const ZSTD_LEVEL = 3;

/**
 * Compresses input in blocks, emitting one self-contained frame per block.
 * Concatenated frames form a valid stream for the standard decoders; an
 * empty input still produces one (empty) frame.
 */
export class FrameEncoder extends Transform {
  private chunks: Buffer[] = [];
  private size = 0;
  private emitted = false;

  constructor(
    private readonly encodeFrame: (block: Uint8Array) => Uint8Array,
    private readonly blockSize: number = FRAME_BLOCK_SIZE
  ) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    try {
      if (this.size >= this.blockSize) {
        this.emitFrame();
      }
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }

  override _flush(callback: TransformCallback): void {
    try {
      if (this.size > 0 || !this.emitted) {
        this.emitFrame();
      }
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }

  private emitFrame(): void {
    const block = Buffer.concat(this.chunks, this.size);
    this.chunks = [];
    this.size = 0;
    this.push(Buffer.from(this.encodeFrame(block)));
    this.emitted = true;
  }
}

let zstdSimple: Promise<ZstdSimple> | undefined;

/**
 * Loads the zstd codec once per process.
 */
export function loadZstd(): Promise<ZstdSimple> {
  zstdSimple ??= new Promise<ZstdSimple>(resolve => {
    zstdCodec.ZstdCodec.run(binding => resolve(new binding.Simple()));
  });
  return zstdSimple;
}

/**
 * Builds the compression layer that feeds `next`, or undefined for `none`.
 *
 * @param entryName - Archive entry name, used by `zip` only
 */
export async function createCompressionLayer(
  compression: CompressionType,
  next: SinkLayer,
  entryName: string
): Promise<SinkLayer | undefined> {
  switch (compression) {
    case 'none':
      return undefined;

    case 'gzip': {
      const gzip = createGzip();
      return new StreamLayer('gzip', gzip, pipeline(gzip, forwardTo(next)));
    }

    case 'zstd': {
      const codec = await loadZstd();
      const encoder = new FrameEncoder(block => {
        const frame = codec.compress(block, ZSTD_LEVEL);
        if (!frame) {
          throw new Error('zstd compression failed');
        }
        return frame;
      });
      return new StreamLayer('zstd', encoder, pipeline(encoder, forwardTo(next)));
    }

    case 'lz4': {
      const encoder = new FrameEncoder(block => lz4js.compress(block));
      return new StreamLayer('lz4', encoder, pipeline(encoder, forwardTo(next)));
    }

    case 'zip': {
      const archive = archiver('zip', { zlib: { level: 6 } });
      const entry = new PassThrough();
      archive.append(entry, { name: entryName });
      const completion = Promise.all([pipeline(archive, forwardTo(next)), archive.finalize()]).then(
        () => undefined
      );
      return new StreamLayer('zip', entry, completion);
    }
  }
}

/**
 * Type declarations for codec packages that ship none.
 */

declare module 'zstd-codec' {
  export interface ZstdSimple {
    compress(data: Uint8Array, compressionLevel?: number): Uint8Array | null;
    decompress(data: Uint8Array): Uint8Array | null;
  }

  export interface ZstdBinding {
    Simple: new () => ZstdSimple;
  }

  const zstdCodec: {
    ZstdCodec: {
      run(callback: (binding: ZstdBinding) => void): void;
    };
  };
  export default zstdCodec;
}

declare module 'lz4js' {
  const lz4js: {
    /** Encodes a complete LZ4 frame. */
    compress(src: Uint8Array, maxSize?: number): Uint8Array;
    /** Decodes one LZ4 frame. */
    decompress(src: Uint8Array, maxSize?: number): Uint8Array;
  };
  export default lz4js;
}

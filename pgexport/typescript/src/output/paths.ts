/**
 * Output path and archive entry naming.
 */

import { basename } from 'node:path';
import type { CompressionType } from '../types/index.js';

/**
 * File extension appended by each streaming compressor.
 */
export const COMPRESSION_EXTENSIONS: Readonly<Record<Exclude<CompressionType, 'none' | 'zip'>, string>> = {
  gzip: '.gz',
  zstd: '.zst',
  lz4: '.lz4',
};

/**
 * Extension of the last path element, from its last dot (`.zip` for
 * `/a/.zip`), or the empty string.
 */
export function extensionOf(path: string): string {
  const base = basename(path);
  const dot = base.lastIndexOf('.');
  return dot === -1 ? '' : base.slice(dot);
}

/**
 * Replaces the final extension with `extension` unless it already matches
 * (case-insensitive). `data` → `data.zip`, `data.csv` → `data.zip`.
 */
export function fixExtension(path: string, extension: string): string {
  const current = extensionOf(path);
  if (current.toLowerCase() === extension) {
    return path;
  }
  return path.slice(0, path.length - current.length) + extension;
}

/**
 * Appends `extension` unless the path already ends with it
 * (case-insensitive).
 */
export function withCompressionExtension(path: string, extension: string): string {
  return path.toLowerCase().endsWith(extension) ? path : path + extension;
}

/**
 * Name of the single entry inside a zip archive.
 *
 * Lower-cased base name with a trailing `.zip` removed (`export` if nothing
 * is left), then `.<format>` unless already present or the format is
 * `template`, whose output has no canonical extension.
 */
export function zipEntryName(outputPath: string, format: string): string {
  let name = basename(outputPath).toLowerCase();
  if (name.endsWith('.zip')) {
    name = name.slice(0, -'.zip'.length);
  }
  if (name === '') {
    name = 'export';
  }
  if (format !== 'template' && !name.endsWith(`.${format}`)) {
    name = `${name}.${format}`;
  }
  return name;
}

/**
 * Effective location of the artifact once compression has adjusted the path.
 */
export function resolveOutputPath(path: string, compression: CompressionType): string {
  switch (compression) {
    case 'none':
      return path;
    case 'zip':
      return fixExtension(path, '.zip');
    default:
      return withCompressionExtension(path, COMPRESSION_EXTENSIONS[compression]);
  }
}

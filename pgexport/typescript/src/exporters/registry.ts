/**
 * Exporter registry.
 *
 * Name → factory table, filled once by an explicit call and read-only
 * afterwards. Every `get` builds a fresh exporter.
 * @module exporters/registry
 */

import { DuplicateFormatError, UnsupportedFormatError } from '../errors/index.js';
import type { Exporter, ExporterContext } from './exporter.js';

/**
 * Builds one exporter for one export call.
 */
export type ExporterFactory = (context: ExporterContext) => Exporter;

function normalizeName(format: string): string {
  return format.trim().toLowerCase();
}

export class ExporterRegistry {
  private readonly factories = new Map<string, ExporterFactory>();

  /**
   * Registers a factory under a trimmed, lower-cased name.
   *
   * @throws {DuplicateFormatError} If the name is already taken
   */
  register(format: string, factory: ExporterFactory): void {
    const name = normalizeName(format);
    if (this.factories.has(name)) {
      throw new DuplicateFormatError(name);
    }
    this.factories.set(name, factory);
  }

  /**
   * Creates an exporter for a registered format.
   *
   * @throws {UnsupportedFormatError} Listing the available names
   */
  get(format: string, context: ExporterContext): Exporter {
    const factory = this.factories.get(normalizeName(format));
    if (!factory) {
      throw new UnsupportedFormatError(format, this.list());
    }
    return factory(context);
  }

  has(format: string): boolean {
    return this.factories.has(normalizeName(format));
  }

  /**
   * Registered names in ascending order.
   */
  list(): string[] {
    return Array.from(this.factories.keys()).sort();
  }
}

/**
 * Order-preserving row representation.
 *
 * A row is an explicit sequence of (column, value) pairs in field
 * descriptor order, with a lookup index for keyed access.
 */

export type RowEntry = readonly [key: string, value: unknown];

export class OrderedRow {
  private readonly pairs: RowEntry[];
  private readonly index = new Map<string, number>();

  constructor(keys: readonly string[], values: readonly unknown[]) {
    this.pairs = keys.map((key, i) => [key, values[i] ?? null] as const);
    this.pairs.forEach(([key], i) => {
      if (!this.index.has(key)) {
        this.index.set(key, i);
      }
    });
  }

  /** Number of columns */
  get size(): number {
    return this.pairs.length;
  }

  /**
   * Value of the first column with this name, or undefined.
   */
  get(key: string): unknown {
    const i = this.index.get(key);
    return i === undefined ? undefined : this.pairs[i][1];
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  keys(): string[] {
    return this.pairs.map(([key]) => key);
  }

  values(): unknown[] {
    return this.pairs.map(([, value]) => value);
  }

  entries(): readonly RowEntry[] {
    return this.pairs;
  }
}

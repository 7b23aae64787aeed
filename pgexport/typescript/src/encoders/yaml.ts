/**
 * Ordered YAML row encoder.
 *
 * Each row becomes an explicit mapping node of key scalars and value nodes,
 * appended to one sequence that is stringified once.
 */

import { Document, Pair, Scalar, YAMLMap, YAMLSeq } from 'yaml';
import type { OrderedRow } from './ordered-row.js';

export class YamlSequenceEncoder {
  private readonly doc = new Document();
  private readonly seq = new YAMLSeq();

  /** Rows appended so far */
  get length(): number {
    return this.seq.items.length;
  }

  /**
   * Builds the mapping node for one row.
   */
  encodeRow(row: OrderedRow): YAMLMap {
    const map = new YAMLMap();
    for (const [key, value] of row.entries()) {
      map.items.push(new Pair(new Scalar(key), this.doc.createNode(value)));
    }
    return map;
  }

  append(row: OrderedRow): void {
    this.seq.items.push(this.encodeRow(row));
  }

  /**
   * Serializes the sequence with 2-space indentation; `[]` when empty.
   */
  toString(): string {
    this.doc.contents = this.seq;
    return this.doc.toString({ indent: 2 });
  }
}

/**
 * Ordered JSON row encoder.
 *
 * Emits one array element per row with keys in column order. `<`, `>` and
 * `&` are written as-is.
 */

import { EncodeError } from '../errors/index.js';
import type { OrderedRow } from './ordered-row.js';

const MEMBER_INDENT = '    ';
const NESTED_INDENT = '  ';

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Encodes one member value. Nested objects are indented to sit under their
 * key; arrays and scalars are compact.
 */
export function encodeJsonValue(key: string, value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new EncodeError(`error marshaling value for key "${key}": unsupported value ${value}`, { key });
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  try {
    if (isPlainObject(value)) {
      return JSON.stringify(value, replacer, NESTED_INDENT).replaceAll('\n', `\n${MEMBER_INDENT}`);
    }
    return JSON.stringify(value, replacer);
  } catch (error) {
    throw new EncodeError(
      `error marshaling value for key "${key}": ${error instanceof Error ? error.message : String(error)}`,
      { key }
    );
  }
}

/**
 * Encodes a row as an indented object, `{}` when it has no columns.
 *
 * @throws {EncodeError} If a value cannot be represented in JSON
 */
export function encodeJsonRow(row: OrderedRow): string {
  if (row.size === 0) {
    return '{}';
  }
  const members = row
    .entries()
    .map(([key, value]) => `${MEMBER_INDENT}${JSON.stringify(key)}: ${encodeJsonValue(key, value)}`);
  return `{\n${members.join(',\n')}\n  }`;
}

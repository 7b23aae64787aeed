/**
 * Value formatting module.
 * @module formatters
 */

export * from './time.js';
export * from './values.js';

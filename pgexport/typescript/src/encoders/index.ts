/**
 * Row encoders.
 * @module encoders
 */

export * from './ordered-row.js';
export * from './json.js';
export * from './yaml.js';

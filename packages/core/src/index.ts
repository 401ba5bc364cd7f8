/**
 * @n8nkit/core
 *
 * Pure workflow logic with no I/O: structural validation, health scoring from
 * execution history, list filtering and clone preparation.
 */

export * from './constants.js';
export * from './health/index.js';
export * from './types/index.js';
export * from './validator/index.js';
export * from './workflows/index.js';
export { describeType, isPlainObject } from './utils.js';

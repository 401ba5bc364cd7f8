import { isPlainObject } from '@n8nkit/core';
import { ToolInputError } from './errors.js';

/*
 * Structured tool arguments arrive as JSON strings. JSON.parse failures are
 * left to surface as SyntaxError, which the error adapter reports as
 * "Invalid JSON".
 */

export function parseJson(text: string): unknown {
  return JSON.parse(text);
}

export function parseJsonObject(argument: string, text: string): Record<string, unknown> {
  const value = parseJson(text);
  if (!isPlainObject(value)) {
    throw new ToolInputError(`'${argument}' must be a JSON object`);
  }
  return value;
}

export function parseJsonStringArray(argument: string, text: string): string[] {
  const value = parseJson(text);
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ToolInputError(`'${argument}' must be a JSON array of strings`);
  }
  return value;
}

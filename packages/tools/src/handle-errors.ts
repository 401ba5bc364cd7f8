import type { ApiErrorResult } from '@n8nkit/sdk';
import { z } from 'zod';
import { McpProtocolError, ToolInputError } from './errors.js';

/**
 * Map anything a tool throws to the same error shape the SDK returns, so
 * callers only ever see values.
 */
export function toErrorResult(error: unknown): ApiErrorResult {
  if (error instanceof SyntaxError) {
    return { error: 'Invalid JSON', message: error.message };
  }
  if (error instanceof z.ZodError) {
    return { error: 'Invalid arguments', message: formatIssues(error) };
  }
  if (error instanceof ToolInputError) {
    return { error: 'Invalid arguments', message: error.message };
  }
  if (error instanceof Error) {
    return { error: error.message };
  }
  return { error: String(error) };
}

/** Wrap a tool handler so it resolves to an error result instead of rejecting */
export function handleErrors<A extends unknown[]>(
  handler: (...args: A) => Promise<unknown>,
): (...args: A) => Promise<unknown> {
  return async (...args: A) => {
    try {
      return await handler(...args);
    } catch (error) {
      // Protocol errors belong to the server, not the tool result
      if (error instanceof McpProtocolError) throw error;
      return toErrorResult(error);
    }
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

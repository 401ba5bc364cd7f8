import { InvalidArgumentError } from 'commander';

/** Flags shared by commands that talk to n8n */
export interface ConnectionOptions {
  apiUrl?: string;
  apiKey?: string;
}

export type OutputFormat = 'pretty' | 'json';

export function parseFormat(value: string): OutputFormat {
  if (value !== 'pretty' && value !== 'json') {
    throw new InvalidArgumentError('Expected pretty or json.');
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

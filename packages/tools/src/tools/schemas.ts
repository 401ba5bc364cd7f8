import { z } from 'zod';

export const workflowId = z.string().min(1).describe('The ID of the workflow');

export const executionId = z.string().min(1).describe('The ID of the execution');

export const credentialId = z.string().min(1).describe('The ID of the credential');

export const tagId = z.string().min(1).describe('The ID of the tag');

export const destinationProjectId = z.string().min(1).describe('The ID of the project to transfer to');

export function jsonArgument(description: string) {
  return z.string().describe(`JSON string: ${description}`);
}

export const executionLimit = z
  .number()
  .int()
  .positive()
  .default(20)
  .describe('Number of recent executions (default: 20)');

import type { ExecutionRecord } from '../src/index.js';

export function triggerNode(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'node-1',
    name: 'Start',
    type: 'n8n-nodes-base.manualTrigger',
    typeVersion: 1,
    position: [250, 300],
    parameters: {},
    ...overrides,
  };
}

export function minimalWorkflow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'Test Workflow',
    nodes: [triggerNode()],
    connections: {},
    settings: { executionOrder: 'v1' },
    ...overrides,
  };
}

export function twoNodeWorkflow(): Record<string, unknown> {
  return minimalWorkflow({
    nodes: [
      triggerNode(),
      triggerNode({ id: 'node-2', name: 'Set Fields', type: 'n8n-nodes-base.set', position: [450, 300] }),
    ],
    connections: {
      Start: { main: [[{ node: 'Set Fields', type: 'main', index: 0 }]] },
    },
  });
}

/** A run that finished successfully and took `seconds` */
export function succeeded(seconds = 2): ExecutionRecord {
  return {
    finished: true,
    status: 'success',
    startedAt: '2024-01-01T10:00:00.000Z',
    stoppedAt: new Date(Date.parse('2024-01-01T10:00:00.000Z') + seconds * 1000).toISOString(),
  };
}

export function failed(): ExecutionRecord {
  return {
    finished: false,
    status: 'error',
    startedAt: '2024-01-01T11:00:00.000Z',
    stoppedAt: '2024-01-01T11:00:04.000Z',
  };
}

export function running(): ExecutionRecord {
  return { finished: false, status: 'running', startedAt: '2024-01-01T12:00:00.000Z', stoppedAt: null };
}

export function times<T>(count: number, make: () => T): T[] {
  return Array.from({ length: count }, make);
}

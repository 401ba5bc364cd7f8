import { describe, expect, it } from 'vitest';
import { filterWorkflows, prepareClone, validateWorkflow } from '../src/index.js';
import { triggerNode } from './fixtures.js';

const WORKFLOWS = [
  { id: '1', name: 'Order Sync', active: true, tags: [{ id: 't1' }, { id: 't2' }] },
  { id: '2', name: 'Invoice export', active: false, tags: [{ id: 't1' }] },
  { id: '3', name: 'order cleanup' },
];

function ids(workflows: ReadonlyArray<{ id: string }>): string[] {
  return workflows.map((workflow) => workflow.id);
}

describe('filterWorkflows', () => {
  it('returns everything without filters', () => {
    expect(ids(filterWorkflows(WORKFLOWS))).toEqual(['1', '2', '3']);
  });

  it('matches names case-insensitively', () => {
    expect(ids(filterWorkflows(WORKFLOWS, { nameContains: 'ORDER' }))).toEqual(['1', '3']);
  });

  it('treats a missing active flag as inactive', () => {
    expect(ids(filterWorkflows(WORKFLOWS, { active: false }))).toEqual(['2', '3']);
    expect(ids(filterWorkflows(WORKFLOWS, { active: true }))).toEqual(['1']);
  });

  it('requires every requested tag', () => {
    expect(ids(filterWorkflows(WORKFLOWS, { tagIds: ['t1'] }))).toEqual(['1', '2']);
    expect(ids(filterWorkflows(WORKFLOWS, { tagIds: ['t1', 't2'] }))).toEqual(['1']);
    expect(ids(filterWorkflows(WORKFLOWS, { tagIds: ['t9'] }))).toEqual([]);
  });

  it('combines filters', () => {
    expect(ids(filterWorkflows(WORKFLOWS, { nameContains: 'order', active: true }))).toEqual(['1']);
  });
});

describe('prepareClone', () => {
  const source = {
    id: 'wf-1',
    name: 'Original',
    active: true,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-02T00:00:00.000Z',
    versionId: 'version-1',
    pinData: {},
    tags: [{ id: 't1', name: 'billing' }],
    nodes: [triggerNode()],
    connections: {},
    settings: { timezone: 'UTC' },
  };

  it('keeps only creatable fields under the new name', () => {
    const { workflow, fieldsRemoved } = prepareClone(source, 'Copy');

    expect(workflow).toEqual({
      name: 'Copy',
      nodes: [triggerNode()],
      connections: {},
      settings: { timezone: 'UTC', executionOrder: 'v1' },
    });
    expect(fieldsRemoved).toEqual(['active', 'createdAt', 'id', 'pinData', 'updatedAt', 'versionId']);
  });

  it('produces a workflow the validator accepts cleanly', () => {
    const report = validateWorkflow(prepareClone(source, 'Copy').workflow);

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it('deep-copies so the source is untouched', () => {
    const { workflow } = prepareClone(source, 'Copy');
    const nodes = workflow.nodes;
    if (Array.isArray(nodes)) nodes.pop();

    expect(source.nodes).toHaveLength(1);
  });

  it('keeps an existing execution order', () => {
    const { workflow } = prepareClone({ ...source, settings: { executionOrder: 'v0' } }, 'Copy');

    expect(workflow.settings).toEqual({ executionOrder: 'v0' });
  });

  it.each([[undefined], [null], ['fast']])('replaces settings %j', (settings) => {
    const { workflow } = prepareClone({ name: 'Original', nodes: [], connections: {}, settings }, 'Copy');

    expect(workflow.settings).toEqual({ executionOrder: 'v1' });
  });

  it('reports nothing removed for a clean source', () => {
    expect(prepareClone({ name: 'Original' }, 'Copy').fieldsRemoved).toEqual([]);
  });
});

export interface WorkflowFilters {
  /** Case-insensitive substring of the workflow name */
  nameContains?: string;
  active?: boolean;
  /** Every listed tag id must be attached to the workflow */
  tagIds?: readonly string[];
}

export interface FilterableWorkflow {
  name?: string;
  active?: boolean | null;
  tags?: ReadonlyArray<{ id?: string }> | null;
}

/** Apply all given filters (AND); omitted filters match everything */
export function filterWorkflows<T extends FilterableWorkflow>(
  workflows: readonly T[],
  filters: WorkflowFilters = {},
): T[] {
  const needle = filters.nameContains ? filters.nameContains.toLowerCase() : undefined;
  const tagIds = filters.tagIds ?? [];

  return workflows.filter((workflow) => {
    if (needle !== undefined && !(workflow.name ?? '').toLowerCase().includes(needle)) {
      return false;
    }

    if (filters.active !== undefined && Boolean(workflow.active) !== filters.active) {
      return false;
    }

    if (tagIds.length > 0) {
      const attached = new Set((workflow.tags ?? []).map((tag) => tag.id));
      if (!tagIds.every((id) => attached.has(id))) return false;
    }

    return true;
  });
}

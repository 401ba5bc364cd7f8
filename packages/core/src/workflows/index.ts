export { prepareClone, type PreparedClone } from './clone.js';
export { filterWorkflows, type FilterableWorkflow, type WorkflowFilters } from './filter.js';

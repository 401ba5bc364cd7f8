export { cloneWorkflow, type CloneResult } from './clone.js';
export { getWorkflowHealth } from './health.js';

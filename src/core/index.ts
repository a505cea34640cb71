export { RunOrchestrator, type RunOptions } from './orchestrator.js';
export { ResultSetBuilder, countResults } from './result-set.js';
export { createNameFilter, type NameFilter } from './filter.js';

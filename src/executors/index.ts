export type { CaseExecutor } from './base.js';
export { ProcessExecutor, type ProcessExecutorConfig } from './process.js';

/**
 * runspec public API
 */

export { loadRunConfig, parseRunConfig, DEFAULT_TIMEOUT_MS, type LoadOptions } from './loader/index.js';
export { evaluate, stripTrailingNewlines, unifiedDiff, globToRegex } from './matcher/index.js';
export { ProcessExecutor, type CaseExecutor, type ProcessExecutorConfig } from './executors/index.js';
export { RunOrchestrator, ResultSetBuilder, createNameFilter, type RunOptions } from './core/index.js';
export { render, exitCodeFor, type RenderOptions, type Report } from './reporter/index.js';
export { loadSettings, type Settings } from './config/index.js';
export { createLogger, silentLogger } from './utils/logger.js';
export * from './models/index.js';

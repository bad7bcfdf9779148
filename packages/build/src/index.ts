/**
 * @fileoverview Build-matrix orchestration for the ebm_native shared library
 *
 * Expands the (platform × architecture × build type) matrix of the host,
 * compiles every target in order with fail-fast semantics, and stages the
 * artifacts for the Python binding and packaging.
 */

export * from './types.js';
export * from './config.js';
export * from './platforms.js';
export * from './step-executor.js';
export * from './toolchain.js';
export * from './targets.js';
export * from './target-runner.js';
export * from './build-matrix.js';
export { Logger, ProgressReporter, configureLogger, createLogger, logger } from './utils/logger.js';
export type { LoggerConfig, LogOutput } from './utils/logger.js';

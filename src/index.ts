/**
 * java-code-graph
 *
 * Library entry point: extraction, reference resolution and idempotent graph writes
 * for Java repositories.
 */

// Re-export all modules for library usage
export * from './parsers';
export * from './database';
export * from './database/services';
export * from './graph';
export * from './utils/errors';

// Main components for programmatic usage
export { GraphBuilder } from './graph/builder';
export { config } from './utils/config';
export { logger, createComponentLogger, flushLogs } from './utils/logger';

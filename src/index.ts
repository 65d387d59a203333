/**
 * throughline
 *
 * Turns a free-form product idea into a Resolved Specification: a frozen
 * concept anchor, capabilities, architecture decisions, entities and
 * ordered work items, every reference resolved. Each phase is verified
 * against the anchor and reviewed by a human before the next one starts.
 *
 * @example
 * ```typescript
 * import { SchemaRegistry, WorkflowEngine, createValidatedGenerator, CommandBackend, DEFAULT_CONFIG } from 'throughline';
 *
 * const registry = await SchemaRegistry.load();
 * const backend = new CommandBackend({ command: 'my-generator', timeoutMs: 120000 });
 * const engine = new WorkflowEngine({ generator: createValidatedGenerator(backend, registry), config: DEFAULT_CONFIG });
 * const { state, outcome } = await engine.start('A seedling swap for our gardening club.');
 * ```
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './anchor/index.js';
export * from './store/index.js';
export * from './diff/index.js';
export * from './assembly/index.js';
export * from './context/index.js';
export * from './generation/index.js';
export * from './verification/index.js';
export * from './workflow/index.js';
export * from './tracker/index.js';
export * from './config/index.js';
export * from './servers/artifact/index.js';
export { Logger, createSilentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from './utils/logger.js';

/**
 * Wiring shared by commands: registry, engine and run state.
 */

import { CommandBackend } from '../generation/command-backend.js';
import { SchemaRegistry } from '../generation/schema-registry.js';
import type { GenerationBackend } from '../generation/types.js';
import { createValidatedGenerator } from '../generation/validated.js';
import { WorkflowEngine } from '../workflow/engine.js';
import { NotificationHooksExecutor } from '../workflow/hooks.js';
import { StatePersistenceError, loadState } from '../workflow/persistence.js';
import type { PipelineState } from '../workflow/types.js';
import { isNotFoundError } from '../utils/safe-fs.js';
import { CliUsageError } from './errors.js';
import type { CliContext } from './types.js';

export async function getRegistry(context: CliContext): Promise<SchemaRegistry> {
  context.registry ??= await SchemaRegistry.load();
  return context.registry;
}

function backendFor(context: CliContext): GenerationBackend {
  if (context.backend !== undefined) {
    return context.backend;
  }
  const { command, timeout_ms } = context.config.generation;
  if (command.trim() === '') {
    throw new CliUsageError(
      'No generation command configured; set generation.command in throughline.toml or THROUGHLINE_GENERATION_COMMAND'
    );
  }
  return new CommandBackend({ command, timeoutMs: timeout_ms, cwd: context.projectRoot });
}

/**
 * Builds an engine from the configuration.
 *
 * @throws CliUsageError when no generation command is configured.
 */
export async function createEngine(context: CliContext): Promise<WorkflowEngine> {
  const { config, logger } = context;
  const generation = config.generation;
  const generator = createValidatedGenerator(backendFor(context), await getRegistry(context), {
    retry: {
      maxRetries: generation.max_retries,
      baseDelayMs: generation.retry_base_delay_ms,
      maxDelayMs: generation.retry_max_delay_ms,
      jitterFactor: generation.jitter_factor,
    },
    timeoutMs: generation.timeout_ms,
    logger: logger.child('ValidatedGenerator'),
  });

  return new WorkflowEngine({
    generator,
    config,
    hooks: new NotificationHooksExecutor(config.notifications.hooks, {
      cwd: context.projectRoot,
      logger: logger.child('NotificationHooks'),
    }),
    logger: logger.child('WorkflowEngine'),
    ...(context.now !== undefined ? { now: context.now } : {}),
  });
}

/**
 * Loads the saved run.
 *
 * @throws CliUsageError when no run has been started.
 * @throws StatePersistenceError when the state file cannot be read.
 */
export async function loadRunState(context: CliContext): Promise<PipelineState> {
  try {
    return await loadState(context.config.paths.state, await getRegistry(context));
  } catch (error) {
    if (error instanceof StatePersistenceError && isNotFoundError(error.cause)) {
      throw new CliUsageError(
        `No run found at ${context.config.paths.state}; start one with "throughline start <idea-file>"`
      );
    }
    throw error;
  }
}

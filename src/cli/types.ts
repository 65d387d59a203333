/**
 * CLI types.
 */

import type { Config } from '../config/types.js';
import type { SchemaRegistry } from '../generation/schema-registry.js';
import type { GenerationBackend } from '../generation/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /** Arguments after the command name. */
  args: string[];

  /** Directory holding throughline.toml. */
  projectRoot: string;

  /** Effective configuration with every path resolved against the project root. */
  config: Config;

  logger: Logger;

  /** Backend used instead of the configured generation command. */
  backend?: GenerationBackend;

  /** Preloaded schema registry. */
  registry?: SchemaRegistry;

  /** Aborts a running stage; the run is saved as cancelled. */
  signal?: AbortSignal;

  now?: () => Date;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;

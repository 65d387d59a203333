/**
 * CLI context creation.
 */

import * as path from 'node:path';
import { loadConfig, type EnvRecord } from '../config/index.js';
import type { Config } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import type { CliContext } from './types.js';

export interface CliAppOptions {
  /** Defaults to the working directory. */
  readonly projectRoot?: string;
  readonly args?: string[];
  readonly env?: EnvRecord;
}

/**
 * Resolves every configured path against the project root.
 */
export function resolveConfigPaths(config: Config, projectRoot: string): Config {
  const resolve = (target: string): string => path.resolve(projectRoot, target);
  return {
    ...config,
    paths: {
      state: resolve(config.paths.state),
      reports: resolve(config.paths.reports),
      tracker: resolve(config.paths.tracker),
      output: resolve(config.paths.output),
    },
  };
}

/**
 * Loads throughline.toml and environment overrides into a command context.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function createCliApp(options: CliAppOptions = {}): Promise<CliContext> {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const config = resolveConfigPaths(await loadConfig(projectRoot, options.env), projectRoot);

  return {
    args: options.args ?? [],
    projectRoot,
    config,
    logger: new Logger({ component: 'cli', debugMode: config.logging.debug }),
  };
}

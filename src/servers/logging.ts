/**
 * Logging for MCP servers.
 *
 * Servers speak JSON-RPC on stdout, so their log lines always go to stderr.
 *
 * @packageDocumentation
 */

import { Logger } from '../utils/logger.js';

export interface ServerLoggerOptions {
  /** Name of the server, used as the log component. */
  readonly serverName: string;
  /** Emit debug entries. */
  readonly debug?: boolean;
  readonly now?: () => Date;
}

/**
 * Creates a logger writing JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = createServerLogger({ serverName: 'artifact-server', debug: true });
 * logger.debug('tool_call', { name: 'get_work_item' });
 * ```
 */
export function createServerLogger(options: ServerLoggerOptions): Logger {
  return new Logger({
    component: options.serverName,
    debugMode: options.debug ?? false,
    sink: (line) => {
      process.stderr.write(line);
    },
    ...(options.now !== undefined ? { now: options.now } : {}),
  });
}

/**
 * Shared error handling for CLI commands.
 */

import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a command and exits with its code. A thrown error is printed with
 * suggestions and exits with 1.
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void (async () => {
    try {
      const result = await fn();
      if (result.message !== undefined) {
        console.log(result.message);
      }
      process.exit(result.exitCode);
    } catch (error) {
      console.error(formatErrorWithSuggestions(error));
      process.exit(1);
    }
  })();
}

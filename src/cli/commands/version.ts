/**
 * Version command: reads the version from package.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isRecord } from '../../utils/guards.js';
import type { CliCommandResult } from '../types.js';

const PACKAGE_JSON = fileURLToPath(new URL('../../../package.json', import.meta.url));

/**
 * The package version, or '(unknown)' when package.json cannot be read.
 */
export function getVersion(): string {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
  } catch {
    return '(unknown)';
  }
  return isRecord(data) && typeof data.version === 'string' ? data.version : '(unknown)';
}

export function handleVersionCommand(): CliCommandResult {
  return { exitCode: 0, message: `throughline v${getVersion()}` };
}

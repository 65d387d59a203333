#!/usr/bin/env node
/**
 * CLI entry point for the artifact server.
 *
 * Usage:
 *   throughline-artifact-server [--project-root <path>] [--state <path>] [--debug]
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { loadConfig } from '../../config/index.js';
import { createServerLogger } from '../logging.js';
import { startArtifactServer } from './server.js';

const HELP_TEXT = `
throughline-artifact-server - MCP server for the Resolved Specification

Usage:
  throughline-artifact-server [options]

Options:
  --project-root, -p <path>  Directory holding throughline.toml (default: cwd)
  --state, -s <path>         Pipeline state file (default: paths.state from the config)
  --debug, -d                Enable debug logging
  --help, -h                 Show this help message

Tools provided (all read-only):
  - get_specification: The Resolved Specification of the run
  - get_work_item: One work item with resolved capabilities and dependencies
  - get_artifact: Any stored artifact by ID with its derived status
  - list_uncovered: Capabilities no architecture decision serves
`;

interface ServerArgs {
  projectRoot: string;
  statePath: string | undefined;
  debug: boolean;
}

function parseArgs(): ServerArgs {
  const args = process.argv.slice(2);
  const parsed: ServerArgs = { projectRoot: process.cwd(), statePath: undefined, debug: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === '--project-root' || arg === '-p') && next !== undefined) {
      parsed.projectRoot = path.resolve(next);
      i++;
    } else if ((arg === '--state' || arg === '-s') && next !== undefined) {
      parsed.statePath = path.resolve(next);
      i++;
    } else if (arg === '--debug' || arg === '-d') {
      parsed.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      process.stdout.write(HELP_TEXT);
      process.exit(0);
    }
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = await loadConfig(args.projectRoot);
  const debug = args.debug || config.logging.debug;
  const statePath = args.statePath ?? path.resolve(args.projectRoot, config.paths.state);
  const logger = createServerLogger({ serverName: 'artifact-server', debug });

  logger.debug('server_start', { statePath });
  await startArtifactServer({ statePath, debug, logger });
}

main().catch((err: unknown) => {
  const errorMessage = err instanceof Error ? err.message : String(err);
  createServerLogger({ serverName: 'artifact-server' }).error('startup_failed', { error: errorMessage });
  process.exit(1);
});

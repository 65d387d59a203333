#!/usr/bin/env node

/**
 * throughline CLI entry point.
 */

import { createCliApp } from './app.js';
import { handleAssembleCommand } from './commands/assemble.js';
import { handleDiffCommand } from './commands/diff.js';
import { handleExportCommand } from './commands/export.js';
import { handleRerunCommand } from './commands/rerun.js';
import { handleResumeCommand } from './commands/resume.js';
import { handleStartCommand } from './commands/start.js';
import { handleStatusCommand } from './commands/status.js';
import { getVersion, handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  start: handleStartCommand,
  status: handleStatusCommand,
  resume: handleResumeCommand,
  rerun: handleRerunCommand,
  diff: handleDiffCommand,
  assemble: handleAssembleCommand,
  export: handleExportCommand,
};

/** Commands that run stages and can be interrupted. */
const CANCELLABLE = new Set(['start', 'resume', 'rerun']);

function showHelp(): void {
  console.log(`
throughline v${getVersion()}

Turns an idea into a resolved specification of capabilities, decisions,
entities and ordered work items, with human review at every phase.

USAGE:
  throughline <command> [options]

COMMANDS:
  start       Start a run from an idea file
  status      Show phase progress and the open gate
  resume      Answer the open gate, or continue a cancelled run
  rerun       Re-run a phase and everything after it
  diff        Show what needs attention in the stored artifacts
  assemble    Print the resolved specification
  export      Push work items of a completed run to the tracker file
  help        Show this help message
  version     Show version information

Run "throughline help <command>" for the options of a command.
`);
}

const COMMAND_HELP: Readonly<Record<string, string>> = {
  start: `
USAGE: throughline start <idea-file> [--force]

Extracts the concept anchor from the idea and stops for review.

OPTIONS:
  --force    Replace an existing run
`,
  status: `
USAGE: throughline status [--json]
`,
  resume: `
USAGE: throughline resume [decision] [options]

DECISIONS:
  approve                                   Accept the gate and continue
  request-changes --feedback <text>         Re-run with feedback
                  [--stage <stage>]         Stage to re-run (phase reviews)
  resolve --select <invariant>=<option>     Answer an ambiguous anchor invariant
  override --ack <invariant>:<stage>:<reason>
                                            Accept a violation or an unmet entry condition

Without a decision, continues a cancelled run.
`,
  rerun: `
USAGE: throughline rerun <phase>

PHASES: validation, scope, architecture, work-items
`,
  diff: `
USAGE: throughline diff [--json]
`,
  assemble: `
USAGE: throughline assemble [--format json|markdown] [--output <file>]
`,
  export: `
USAGE: throughline export [--tracker <file>] [--plain-labels] [--no-criteria]

Creates one draft per work item not yet tracked, in resolved order.
`,
};

function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "throughline help" for usage information.');
}

function main(): void {
  const [command = 'help', ...commandArgs] = process.argv.slice(2);

  if (command === 'help' || command === '--help' || command === '-h') {
    const topic = commandArgs[0];
    const help = topic !== undefined ? COMMAND_HELP[topic] : undefined;
    if (help !== undefined) {
      console.log(help);
    } else {
      showHelp();
    }
    process.exit(0);
  }

  if (command === 'version' || command === '--version' || command === '-v') {
    withErrorHandling(() => handleVersionCommand());
    return;
  }

  const handler = COMMANDS[command];
  if (handler === undefined) {
    showError(`Unknown command: ${command}`);
    process.exit(1);
  }

  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    console.log(COMMAND_HELP[command] ?? '');
    process.exit(0);
  }

  withErrorHandling(async () => {
    const context = await createCliApp({ args: commandArgs });
    if (CANCELLABLE.has(command)) {
      const controller = new AbortController();
      process.once('SIGINT', () => {
        controller.abort();
      });
      context.signal = controller.signal;
    }
    return handler(context);
  });
}

main();

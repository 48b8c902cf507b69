#!/usr/bin/env node
/**
 * @fileoverview Fiqh Advisor CLI
 *
 * Commands:
 *   fiqh-advisor status              - Show backend mode and lifecycle state
 *   fiqh-advisor analyze <kind> ...  - Analyze a token, text, contract or audio file
 *   fiqh-advisor chat <message>      - Stream an answer to a chat message
 *   fiqh-advisor diagnose            - Run the step-by-step system check
 *   fiqh-advisor help [command]      - Show help
 *
 * @packageDocumentation
 */

import { ADVISOR_VERSION } from '../version.js';
import { analyzeCommand } from './commands/analyze.js';
import { chatCommand } from './commands/chat.js';
import { diagnoseCommand } from './commands/diagnose.js';
import { statusCommand } from './commands/status.js';
import type { CommandOptions } from './context.js';
import { createError, formatError, formatErrorJson, getExitCode, toCliError } from './errors.js';
import { showHelp } from './help.js';

type Command = 'status' | 'analyze' | 'chat' | 'diagnose' | 'help';

const COMMANDS: Record<Command, (options: CommandOptions) => Promise<void>> = {
  status: statusCommand,
  analyze: analyzeCommand,
  chat: chatCommand,
  diagnose: diagnoseCommand,
  help: async (options) => showHelp(options.rawArgs[1]),
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Output an error in the requested format
 */
function outputError(error: unknown, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(error) : formatError(error));
  process.exitCode = getExitCode(toCliError(error));
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const jsonMode = argv.includes('--json');

  if (argv.includes('--version') || argv.includes('-v')) {
    console.log(`fiqh-advisor ${ADVISOR_VERSION}`);
    return;
  }

  const command = argv[0];
  if (!command || command.startsWith('-') || argv.includes('--help') || argv.includes('-h')) {
    showHelp(command && !command.startsWith('-') ? command : undefined);
    return;
  }

  if (!isCommand(command)) {
    outputError(
      createError('INVALID_ARGUMENT', `Unknown command: ${command}`, { available: Object.keys(COMMANDS) }),
      jsonMode
    );
    return;
  }

  try {
    await COMMANDS[command]({ rawArgs: argv });
  } catch (error) {
    outputError(error, jsonMode);
  }
}

main().catch((error: unknown) => {
  outputError(error, process.argv.includes('--json'));
});

/**
 * @fileoverview Detailed help text for fiqh-advisor CLI commands
 */

const HELP_TEXT = {
  main: `
Fiqh Advisor CLI - Islamic finance guidance from the terminal

USAGE:
    fiqh-advisor <command> [options]

COMMANDS:
    status              Show backend mode, lifecycle state and agent
    analyze <kind> ...  Analyze a token, text, contract or audio file
    chat <message>      Ask a question and stream the answer
    diagnose            Check configuration, startup and two sample queries
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -l, --language      Answer language (default: en)
    -u, --user          User id recorded with analyses
    --timeout <ms>      Per-call timeout in milliseconds
    --verbose           Enable verbose output
    --json              Print results and errors as JSON

ENVIRONMENT:
    GROQ_API_KEY, OPENAI_API_KEY, XAI_API_KEY    Provider API keys
    FIQH_ADVISOR_PROVIDER                        mock | groq | openai | grok
    FIQH_ADVISOR_MODEL                           Model override
    FIQH_ADVISOR_STORAGE_PATH                    Analysis history file (default: in memory)
    FIQH_ADVISOR_CHAIN_RPC_URL, FIQH_ADVISOR_ENABLE_CHAIN
    FIQH_ADVISOR_VECTOR_STORE_URL
    FIQH_ADVISOR_INIT_TIMEOUT_MS, FIQH_ADVISOR_MINIMAL_FALLBACK
    FIQH_ADVISOR_DEBUG                           Enable debug logging

EXAMPLES:
    fiqh-advisor status
    fiqh-advisor analyze token SOL
    fiqh-advisor analyze text "Is staking permissible?"
    fiqh-advisor chat "What is riba?" --user alice

For more information on a specific command, run:
    fiqh-advisor help <command>
`,

  status: `
fiqh-advisor status - Show backend mode, lifecycle state and agent

USAGE:
    fiqh-advisor status [--json]

Starts the native subsystem and reports whether answers come from it or
from the offline fallback.
`,

  analyze: `
fiqh-advisor analyze - Analyze a single query

USAGE:
    fiqh-advisor analyze <kind> <payload...> [options]

KINDS:
    token           Token symbol, e.g. SOL or $BTC
    text            Free-form question
    contract        Smart contract address
    audio           Path to an audio file
    chat_message    Chat message without streaming

OPTIONS:
    -l, --language <code>   Answer language (default: en)
    -u, --user <id>         User id recorded with the analysis
    --timeout <ms>          Call timeout (default: 30000)
    --json                  Print the response as JSON
    --verbose               Show how long the answer took
`,

  chat: `
fiqh-advisor chat - Ask a question and stream the answer

USAGE:
    fiqh-advisor chat "<message>" [options]

OPTIONS:
    -l, --language <code>   Answer language (default: en)
    -u, --user <id>         User id; also names the conversation
    --timeout <ms>          Stream timeout (default: 120000)
    --json                  Print only the final response as JSON

Press Ctrl+C to cancel a running answer.
`,

  diagnose: `
fiqh-advisor diagnose - Step-by-step system check

USAGE:
    fiqh-advisor diagnose [--verbose] [--json]

CHECKS:
    Configuration           Provider and masked API keys
    System Initialization   Native subsystem startup
    Token Analysis          One BTC token analysis
    General Query           One general question

Exits with code 1 when any check reports ERROR.
`,

  help: `
fiqh-advisor help - Show help information

USAGE:
    fiqh-advisor help [command]
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getHelpText(command));
}

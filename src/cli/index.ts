#!/usr/bin/env node

/**
 * arcade-forge CLI entry point.
 */

import { getEnvVarDocumentation } from '../config/env.js';
import { handleBuildCommand } from './commands/build.js';
import { handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';

const HELP_TEXT = `
arcade-forge: turn a game idea into a playable browser game

USAGE:
  arcade-forge <command> [options]

COMMANDS:
  build [idea]   Clarify, plan, generate and validate a game
  help           Show this help message
  version        Show version information

BUILD OPTIONS:
  --config, -c <path>   Configuration file (default: ./arcade-forge.toml)

EXAMPLES:
  arcade-forge build "a snake game where the walls wrap around"
  arcade-forge build --config games.toml

Exit codes: 0 game validated, 1 error, 2 best-effort game saved.
`;

function formatEnvHelp(): string {
  const lines = ['ENVIRONMENT:'];
  for (const [name, doc] of Object.entries(getEnvVarDocumentation())) {
    lines.push(`  ${name.padEnd(36)} ${doc.description}`);
  }
  return lines.join('\n');
}

function showHelp(): void {
  console.log(HELP_TEXT);
  console.log(formatEnvHelp());
}

function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "arcade-forge help" for usage information.');
}

function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);
  const display = { colors: process.stderr.isTTY, unicode: process.stderr.isTTY };

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'build':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelp();
        process.exit(0);
      }
      withErrorHandling(() => handleBuildCommand(commandArgs), display);
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

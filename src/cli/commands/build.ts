/**
 * Build command handler for the arcade-forge CLI.
 *
 * Loads configuration, connects to the Claude Code CLI and runs an
 * interactive build session.
 */

import { createPhaseAgents } from '../../agents/index.js';
import { loadConfig } from '../../config/loader.js';
import { FileArtifactStore } from '../../persistence/artifact-store.js';
import { Orchestrator } from '../../pipeline/orchestrator.js';
import { createClaudeCodeClient } from '../../router/claude-code-client.js';
import { Logger } from '../../utils/logger.js';
import { createInputReader } from '../input.js';
import { runBuildSession } from '../session.js';
import type { CliCommandResult, DisplayOptions, InputReader } from '../types.js';

/**
 * Parsed arguments of the build command.
 */
export interface BuildArgs {
  /** Game idea given on the command line; empty when omitted. */
  idea: string;
  /** Path to the configuration file. */
  configPath?: string;
}

/**
 * Error thrown for malformed build arguments.
 */
export class BuildArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BuildArgsError';
  }
}

/**
 * Parses the build command's arguments.
 *
 * @example
 * ```typescript
 * parseBuildArgs(['--config', 'games.toml', 'a', 'snake', 'game']);
 * // { idea: 'a snake game', configPath: 'games.toml' }
 * ```
 *
 * @throws BuildArgsError when --config has no value.
 */
export function parseBuildArgs(args: readonly string[]): BuildArgs {
  const words: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new BuildArgsError(`${arg} requires a file path`);
      }
      configPath = value;
      i++;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }

  const idea = words.join(' ').trim();
  return configPath !== undefined ? { idea, configPath } : { idea };
}

function getDisplayOptions(): DisplayOptions {
  const tty = process.stdout.isTTY;
  return { colors: tty && process.env.NO_COLOR === undefined, unicode: tty };
}

async function readIdea(given: string, input: InputReader): Promise<string> {
  if (given !== '') {
    return given;
  }
  return (await input.readLine('Describe the game you want to build: ')).trim();
}

/**
 * Handles the build command.
 *
 * @param args - Arguments after the command name.
 * @returns Exit code 0 for a validated game, 2 for a best-effort one, 1
 * when no idea was given.
 */
export async function handleBuildCommand(args: readonly string[]): Promise<CliCommandResult> {
  const parsed = parseBuildArgs(args);
  const config = await loadConfig(
    parsed.configPath !== undefined ? { path: parsed.configPath } : {}
  );
  const logger = new Logger({ component: 'arcade-forge', level: config.logging.level });
  const display = getDisplayOptions();
  const input = createInputReader();

  try {
    const idea = await readIdea(parsed.idea, input);
    if (idea === '') {
      return { exitCode: 1, message: 'A game idea is required.' };
    }

    const router = await createClaudeCodeClient({ timeoutMs: config.pipeline.call_timeout_ms });
    const orchestrator = new Orchestrator({
      agents: createPhaseAgents({ router, config, logger }),
      store: new FileArtifactStore({ outputDir: config.pipeline.output_dir, logger }),
      config,
      logger,
    });

    return await runBuildSession(idea, {
      orchestrator,
      input,
      write: (text) => {
        console.log(text);
      },
      maxRounds: config.clarification.max_rounds,
      display,
    });
  } finally {
    input.close();
  }
}

/**
 * Claude Code CLI client.
 *
 * Implements the ModelRouter interface by spawning the `claude` CLI in print
 * mode and parsing its JSON output.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type {
  ModelRouter,
  ModelRouterError,
  ModelRouterRequest,
  ModelRouterResult,
  ModelUsage,
} from './types.js';
import {
  createAuthenticationError,
  createFailureResult,
  createModelError,
  createNetworkError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
} from './types.js';

/**
 * Provider name reported in response metadata.
 */
export const CLAUDE_CODE_PROVIDER = 'claude-code';

const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * Options for creating a ClaudeCodeClient.
 */
export interface ClaudeCodeClientOptions {
  /** Path to the claude executable (default: 'claude'). */
  executablePath?: string;
  /** Additional CLI flags to pass to every invocation. */
  additionalFlags?: readonly string[];
  /** Timeout used when a request carries none (default: 300000 = 5 minutes). */
  timeoutMs?: number;
  /** Working directory for subprocess execution. */
  cwd?: string;
}

/**
 * Error thrown when Claude Code CLI is not installed or not accessible.
 */
export class ClaudeCodeNotInstalledError extends Error {
  readonly code = 'CLAUDE_CODE_NOT_INSTALLED';

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ClaudeCodeNotInstalledError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringField(value: unknown, key: string): string | undefined {
  if (!isObject(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
}

function numberField(value: unknown, key: string): number | undefined {
  if (!isObject(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'number' ? field : undefined;
}

/**
 * The parts of a finished subprocess this client reads.
 */
interface ProcessOutcome {
  exitCode?: number | undefined;
  stdout: unknown;
  stderr: unknown;
  timedOut: boolean;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Checks if Claude Code CLI is installed and accessible.
 *
 * @param executablePath - Path to the claude executable.
 * @returns True if Claude Code is available.
 * @throws ClaudeCodeNotInstalledError if not installed.
 */
export async function checkClaudeCodeInstalled(executablePath = 'claude'): Promise<boolean> {
  let result: ProcessOutcome;
  try {
    result = await execa(executablePath, ['--version'], { timeout: 10000, reject: false });
  } catch (error) {
    if (stringField(error, 'code') === 'ENOENT') {
      throw new ClaudeCodeNotInstalledError(
        `Claude Code CLI not found at '${executablePath}'. Install it and make sure it is on PATH.`,
        toError(error)
      );
    }
    throw new ClaudeCodeNotInstalledError(
      `Failed to check Claude Code installation: ${toError(error).message}`,
      toError(error)
    );
  }

  if (stringField(result, 'code') === 'ENOENT') {
    throw new ClaudeCodeNotInstalledError(
      `Claude Code CLI not found at '${executablePath}'. Install it and make sure it is on PATH.`
    );
  }

  if (result.exitCode !== 0) {
    throw new ClaudeCodeNotInstalledError(
      `Claude Code CLI returned non-zero exit code: ${String(result.exitCode)}. ` +
        `Stderr: ${String(result.stderr) || '(empty)'}`
    );
  }

  return true;
}

function readUsage(raw: unknown): ModelUsage | undefined {
  if (!isObject(raw)) {
    return undefined;
  }
  const input =
    (numberField(raw, 'input_tokens') ?? 0) +
    (numberField(raw, 'cache_read_input_tokens') ?? 0) +
    (numberField(raw, 'cache_creation_input_tokens') ?? 0);
  const output = numberField(raw, 'output_tokens') ?? 0;
  return { promptTokens: input, completionTokens: output, totalTokens: input + output };
}

/**
 * Fields read from the CLI's JSON output.
 */
export interface ParsedClaudeOutput {
  content: string;
  usage: ModelUsage;
  modelId: string | undefined;
  latencyMs: number | undefined;
  isError: boolean;
}

/**
 * Parses Claude Code JSON output, one message object per line.
 *
 * Assistant text blocks are concatenated; the `result` message supplies the
 * content when no assistant text was seen, and its usage wins.
 *
 * @param output - The raw stdout from Claude Code.
 * @returns Parsed content, usage, and metadata.
 */
export function parseClaudeCodeOutput(output: string): ParsedClaudeOutput {
  const parsed: ParsedClaudeOutput = {
    content: '',
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    modelId: undefined,
    latencyMs: undefined,
    isError: false,
  };

  for (const line of output.trim().split('\n')) {
    if (!line.trim()) {
      continue;
    }

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      // Non-JSON lines (banners, warnings) are not part of the reply
      continue;
    }
    if (!isObject(message)) {
      continue;
    }

    if (message.type === 'assistant' && isObject(message.message)) {
      const inner = message.message;
      if (Array.isArray(inner.content)) {
        for (const block of inner.content) {
          const text = stringField(block, 'text');
          if (stringField(block, 'type') === 'text' && text !== undefined) {
            parsed.content += text;
          }
        }
      }
      const model = stringField(inner, 'model');
      if (model !== undefined && model !== '') {
        parsed.modelId = model;
      }
      parsed.usage = readUsage(inner.usage) ?? parsed.usage;
    }

    if (message.type === 'result') {
      const result = stringField(message, 'result');
      if (result !== undefined && parsed.content === '') {
        parsed.content = result;
      }
      parsed.latencyMs = numberField(message, 'duration_ms') ?? parsed.latencyMs;
      parsed.usage = readUsage(message.usage) ?? parsed.usage;
      if (message.is_error === true) {
        parsed.isError = true;
      }
    }
  }

  return parsed;
}

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b|overloaded/i;
const AUTH_PATTERN = /authenticat|unauthori[sz]ed|invalid api key|\b401\b|\b403\b|please run \/login/i;

/**
 * Maps a failed CLI run to an error kind from its diagnostic text.
 *
 * @param exitCode - Process exit code.
 * @param diagnostic - stderr, or the error result text.
 * @returns The matching router error.
 */
export function classifyFailure(exitCode: number | undefined, diagnostic: string): ModelRouterError {
  const detail = diagnostic.trim();
  if (RATE_LIMIT_PATTERN.test(detail)) {
    return createRateLimitError(`Claude Code rate limited: ${detail}`);
  }
  if (AUTH_PATTERN.test(detail)) {
    return createAuthenticationError(
      `Claude Code authentication failed: ${detail}`,
      CLAUDE_CODE_PROVIDER
    );
  }
  const exit = exitCode !== undefined ? String(exitCode) : 'unknown';
  return createModelError(
    `Claude Code execution failed with exit code ${exit}${detail ? `: ${detail}` : ''}`,
    true,
    { errorCode: `EXIT_${exit}` }
  );
}

/**
 * Claude Code CLI client implementing the ModelRouter interface.
 *
 * @example
 * ```typescript
 * const client = new ClaudeCodeClient();
 * const result = await client.complete(buildRequest('planner', system, context, config));
 * if (result.success) {
 *   console.log(result.response.content);
 * }
 * ```
 */
export class ClaudeCodeClient implements ModelRouter {
  private readonly executablePath: string;
  private readonly additionalFlags: readonly string[];
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;

  /**
   * Creates a new ClaudeCodeClient.
   *
   * @param options - Client configuration options.
   */
  constructor(options: ClaudeCodeClientOptions = {}) {
    this.executablePath = options.executablePath ?? 'claude';
    this.additionalFlags = options.additionalFlags ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cwd = options.cwd;
  }

  /**
   * Builds CLI arguments for a request.
   *
   * The CLI exposes no sampling flags, so temperature, top-p, top-k and the
   * token ceiling stay with the model's own defaults.
   *
   * @param request - The model router request.
   * @returns Array of CLI arguments.
   */
  buildArgs(request: ModelRouterRequest): string[] {
    const args: string[] = [
      '-p',
      '--output-format',
      'json',
      '--model',
      request.parameters.model,
      '--no-session-persistence',
      ...this.additionalFlags,
    ];

    if (request.systemPrompt !== '') {
      args.push('--system-prompt', request.systemPrompt);
    }

    args.push(request.prompt);
    return args;
  }

  /**
   * Sends a complete request.
   *
   * @param request - Agent, prompts and parameters.
   * @returns A result containing the response or an error.
   */
  async complete(request: ModelRouterRequest): Promise<ModelRouterResult> {
    const timeoutMs = request.parameters.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    let result: ProcessOutcome;
    try {
      result = await execa(this.executablePath, this.buildArgs(request), {
        timeout: timeoutMs,
        reject: false,
        ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
      });
    } catch (error) {
      return createFailureResult(this.classifyThrown(error, timeoutMs));
    }

    if (result.timedOut) {
      return createFailureResult(
        createTimeoutError(`Request timed out after ${String(timeoutMs)}ms`, timeoutMs)
      );
    }

    if (stringField(result, 'code') === 'ENOENT') {
      return createFailureResult(this.notFoundError());
    }

    const stdout = String(result.stdout);
    const stderr = String(result.stderr);

    if (result.exitCode !== 0) {
      const fromStdout = parseClaudeCodeOutput(stdout);
      return createFailureResult(
        classifyFailure(result.exitCode, stderr || (fromStdout.isError ? fromStdout.content : ''))
      );
    }

    const parsed = parseClaudeCodeOutput(stdout);
    if (parsed.isError) {
      return createFailureResult(classifyFailure(result.exitCode, parsed.content));
    }

    return createSuccessResult({
      content: parsed.content,
      usage: parsed.usage,
      metadata: {
        modelId: parsed.modelId ?? request.parameters.model,
        provider: CLAUDE_CODE_PROVIDER,
        latencyMs: parsed.latencyMs ?? Date.now() - startTime,
      },
      ...(request.requestId !== undefined ? { requestId: request.requestId } : {}),
    });
  }

  private notFoundError(): ModelRouterError {
    return createNetworkError(
      `Claude Code CLI not found at '${this.executablePath}'. Please install Claude Code.`,
      { endpoint: this.executablePath }
    );
  }

  private classifyThrown(error: unknown, timeoutMs: number): ModelRouterError {
    if (isObject(error) && error.timedOut === true) {
      return createTimeoutError(`Request timed out after ${String(timeoutMs)}ms`, timeoutMs, {
        cause: toError(error),
      });
    }
    if (stringField(error, 'code') === 'ENOENT') {
      return this.notFoundError();
    }
    return createModelError(`Subprocess execution failed: ${toError(error).message}`, true, {
      cause: toError(error),
    });
  }
}

/**
 * Creates a Claude Code client after checking that the CLI is installed.
 *
 * @param options - Client configuration options.
 * @returns A configured ClaudeCodeClient.
 * @throws ClaudeCodeNotInstalledError if Claude Code is not installed.
 */
export async function createClaudeCodeClient(
  options: ClaudeCodeClientOptions = {}
): Promise<ClaudeCodeClient> {
  await checkClaudeCodeInstalled(options.executablePath);
  return new ClaudeCodeClient(options);
}

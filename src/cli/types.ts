/**
 * CLI types and interfaces for the arcade-forge CLI.
 */

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code: 0 for success, 1 for errors, 2 for a best-effort build.
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * Terminal rendering options.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors. */
  colors: boolean;
  /** Whether to use Unicode symbols. */
  unicode: boolean;
}

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /** Read a line of input. */
  readLine(prompt: string): Promise<string>;
  /** Close the reader. */
  close(): void;
}

/**
 * Where the CLI writes user-facing text.
 */
export type OutputWriter = (text: string) => void;

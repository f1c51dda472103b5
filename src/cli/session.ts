/**
 * Interactive build session.
 *
 * Drives an {@link Orchestrator} from the terminal one step at a time: asks
 * the clarifier's questions, hands unanswered details to the agents once the
 * question rounds run out, reports progress between the long generation
 * calls, and reports the outcome.
 *
 * @packageDocumentation
 */

import type { Orchestrator } from '../pipeline/orchestrator.js';
import type { Phase, PipelineState } from '../pipeline/types.js';
import type { CliCommandResult, DisplayOptions, InputReader, OutputWriter } from './types.js';
import {
  formatAttemptIssues,
  formatFilesSummary,
  formatPlanSummary,
  formatQuestion,
  formatRunSummary,
} from './utils/displayUtils.js';

/**
 * Prompt shown when the clarifier wants more input but asked nothing.
 */
export const OPEN_PROMPT = 'Anything else you would like to add? ';

/**
 * Notice printed when the question rounds are used up.
 */
export const ROUND_LIMIT_NOTICE =
  'Question limit reached; the agents will decide the remaining details.';

/** Exit code for a build that passed validation. */
export const EXIT_VALID = 0;
/** Exit code for a best-effort build. */
export const EXIT_BEST_EFFORT = 2;

/**
 * Options for {@link runBuildSession}.
 */
export interface BuildSessionOptions {
  /** Orchestrator to drive. */
  orchestrator: Orchestrator;
  /** Source of the human's answers. */
  input: InputReader;
  /** Sink for user-facing text. */
  write: OutputWriter;
  /** Question rounds before the remaining details are delegated. */
  maxRounds: number;
  /** Display options. */
  display: DisplayOptions;
}

async function askQuestions(
  questions: readonly string[],
  input: InputReader,
  write: OutputWriter,
  display: DisplayOptions
): Promise<string[]> {
  if (questions.length === 0) {
    return [await input.readLine(OPEN_PROMPT)];
  }

  const answers: string[] = [];
  for (const [index, question] of questions.entries()) {
    write(formatQuestion(question, index, questions.length, display));
    answers.push(await input.readLine('> '));
  }
  return answers;
}

/** Printed before the planner runs. */
export const PLANNING_NOTICE = 'Planning the game...';

/**
 * Notice printed before each generation attempt.
 */
export function generatingNotice(attempt: number): string {
  return `Generating game files (attempt ${String(attempt)})...`;
}

function reportBefore(state: Readonly<PipelineState>, write: OutputWriter): void {
  if (state.phase === 'planning' && state.plan === undefined) {
    write(PLANNING_NOTICE);
  } else if (state.phase === 'generating') {
    write(generatingNotice(state.retryCount + 1));
  }
}

function reportAfter(
  from: Phase,
  state: Readonly<PipelineState>,
  write: OutputWriter,
  display: DisplayOptions
): void {
  if (from === 'planning' && state.plan !== undefined) {
    write(formatPlanSummary(state.plan, display));
  } else if (from === 'validating' && state.phase === 'generating') {
    write(formatAttemptIssues(state.retryCount, state.validationResult?.issues ?? [], display));
  }
}

/**
 * Runs one game build from idea to saved files.
 *
 * @param idea - The human's game idea.
 * @param options - Session options.
 * @returns Exit code 0 when the game passed validation, 2 for a best-effort build.
 * @throws GenerationError when an agent call fails for good.
 */
export async function runBuildSession(
  idea: string,
  options: BuildSessionOptions
): Promise<CliCommandResult> {
  const { orchestrator, input, write, maxRounds, display } = options;

  let state = orchestrator.start(idea);
  let rounds = 0;

  while (!state.done) {
    const from = state.phase;
    reportBefore(state, write);
    const result = await orchestrator.step();
    state = result.state;
    reportAfter(from, state, write, display);

    if (!result.awaitingAnswers) {
      continue;
    }
    if (rounds >= maxRounds) {
      write(ROUND_LIMIT_NOTICE);
      orchestrator.delegateRemaining();
    } else {
      rounds += 1;
      orchestrator.applyAnswers(await askQuestions(state.pendingQuestions, input, write, display));
    }
  }

  write(formatFilesSummary(state.artifacts, display));
  write(formatRunSummary(state, display));
  return {
    exitCode: state.validationResult?.valid === true ? EXIT_VALID : EXIT_BEST_EFFORT,
  };
}

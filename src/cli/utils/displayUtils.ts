/**
 * Shared display utilities for CLI commands.
 *
 * Formats clarification questions, progress reports and the final build summary.
 */

import { isPlainObject } from '../../parser/record.js';
import type { ArtifactSet, PipelineState, Plan } from '../../pipeline/types.js';
import type { DisplayOptions } from '../types.js';

interface Palette {
  bold: string;
  dim: string;
  green: string;
  yellow: string;
  red: string;
  reset: string;
}

export function getPalette(options: DisplayOptions): Palette {
  if (!options.colors) {
    return { bold: '', dim: '', green: '', yellow: '', red: '', reset: '' };
  }
  return {
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    reset: '\x1b[0m',
  };
}

export function getSymbols(options: DisplayOptions): { ok: string; warn: string; bullet: string } {
  return options.unicode
    ? { ok: '✔', warn: '⚠', bullet: '•' }
    : { ok: '[ok]', warn: '[!]', bullet: '-' };
}

/**
 * Formats one clarification question with its position.
 *
 * @example
 * ```typescript
 * formatQuestion('Keyboard or mouse?', 0, 2, { colors: false, unicode: false });
 * // '(1/2) Keyboard or mouse?'
 * ```
 */
export function formatQuestion(
  question: string,
  index: number,
  total: number,
  options: DisplayOptions
): string {
  const { bold, reset } = getPalette(options);
  return `${bold}(${String(index + 1)}/${String(total)})${reset} ${question}`;
}

const LABEL_WIDTH = 16;
const MAX_CONTROLS = 5;

function section(plan: Readonly<Plan>, key: string): Record<string, unknown> {
  const value = plan[key];
  return isPlainObject(value) ? value : {};
}

function text(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  return typeof value === 'number' ? String(value) : undefined;
}

function keyboardControls(plan: Readonly<Plan>, arrow: string): string | undefined {
  const keyboard = section(plan, 'controls').keyboard;
  if (!Array.isArray(keyboard)) {
    return undefined;
  }
  const bindings = keyboard
    .filter(isPlainObject)
    .slice(0, MAX_CONTROLS)
    .map((binding) => `${text(binding, 'key') ?? '?'} ${arrow} ${text(binding, 'action') ?? '?'}`);
  return bindings.length > 0 ? bindings.join(', ') : undefined;
}

/**
 * Formats the design document's headline facts. Rows the plan leaves out
 * are skipped.
 *
 * @example
 * ```typescript
 * formatPlanSummary({ metadata: { game_title: 'Pong' } }, { colors: false, unicode: false });
 * // 'Game design document\n  Title           Pong'
 * ```
 */
export function formatPlanSummary(plan: Readonly<Plan>, options: DisplayOptions): string {
  const { bold, reset } = getPalette(options);
  const metadata = section(plan, 'metadata');
  const rules = section(plan, 'game_rules');
  const choice = section(section(plan, 'technical_architecture'), 'framework_choice');

  const rows: [string, string | undefined][] = [
    ['Title', text(metadata, 'game_title')],
    ['Type', text(metadata, 'game_type')],
    ['Framework', text(metadata, 'framework') ?? text(choice, 'selected')],
    ['Complexity', text(metadata, 'estimated_complexity')],
    ['Win condition', text(rules, 'win_condition')],
    ['Lose condition', text(rules, 'lose_condition')],
    ['Scoring', text(rules, 'scoring')],
    ['Controls', keyboardControls(plan, options.unicode ? '→' : '->')],
    ['Why framework', text(choice, 'reasoning')],
  ];

  const lines = [`${bold}Game design document${reset}`];
  for (const [label, value] of rows) {
    if (value !== undefined) {
      lines.push(`  ${label.padEnd(LABEL_WIDTH)}${value}`);
    }
  }
  return lines.join('\n');
}

/**
 * Formats the issues of a failed attempt that is about to be retried.
 */
export function formatAttemptIssues(
  attempt: number,
  issues: readonly string[],
  options: DisplayOptions
): string {
  const { yellow, reset } = getPalette(options);
  const symbols = getSymbols(options);
  const lines = [`${yellow}${symbols.warn} Attempt ${String(attempt)} failed validation${reset}`];
  for (const issue of issues) {
    lines.push(`  ${symbols.bullet} ${issue}`);
  }
  return lines.join('\n');
}

/**
 * Formats per-file sizes of the generated artifacts in KB.
 *
 * @example
 * ```typescript
 * formatFilesSummary({ 'index.html': 'x'.repeat(2048), 'style.css': '', 'game.js': '' }, opts);
 * // 'Generated files\n  index.html    2.0 KB\n  style.css     0.0 KB\n  game.js       0.0 KB'
 * ```
 */
export function formatFilesSummary(artifacts: Readonly<ArtifactSet>, options: DisplayOptions): string {
  const { bold, reset } = getPalette(options);
  const lines = [`${bold}Generated files${reset}`];
  for (const [name, content] of Object.entries(artifacts)) {
    const size = `${(Buffer.byteLength(content, 'utf8') / 1024).toFixed(1)} KB`;
    lines.push(`  ${name.padEnd(12)}${size.padStart(8)}`);
  }
  return lines.join('\n');
}

/**
 * Formats the outcome of a finished run.
 *
 * @param state - Terminal pipeline state.
 * @param options - Display options.
 * @returns Lines for the terminal, joined with newlines.
 */
export function formatRunSummary(state: Readonly<PipelineState>, options: DisplayOptions): string {
  const { green, yellow, dim, reset } = getPalette(options);
  const symbols = getSymbols(options);
  const lines: string[] = [];
  const location = state.outputLocation;

  if (state.validationResult?.valid === true) {
    lines.push(
      location !== undefined
        ? `${green}${symbols.ok} Game saved to ${location}${reset}`
        : `${green}${symbols.ok} Game passed validation${reset}`
    );
    if (location !== undefined) {
      lines.push(`${dim}Open index.html in a browser to play.${reset}`);
    }
  } else {
    lines.push(`${yellow}${symbols.warn} Validation still failing; retry budget used up${reset}`);
    if (location !== undefined) {
      lines.push(`Best-effort files saved to ${location}`);
    }
    const issues = state.validationResult?.issues ?? [];
    if (issues.length > 0) {
      lines.push('Unresolved issues:');
      for (const issue of issues) {
        lines.push(`  ${symbols.bullet} ${issue}`);
      }
    }
  }

  if (location === undefined) {
    lines.push(`${yellow}Files could not be saved; see the log for details.${reset}`);
  }

  return lines.join('\n');
}

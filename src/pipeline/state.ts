/**
 * Pure helpers over pipeline state. The orchestrator is the only caller
 * that writes their results back into a {@link PipelineState}.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { REQUIREMENT_FIELDS } from '../config/defaults.js';
import {
  AGENT_DECIDES,
  type DialogueEntry,
  type Plan,
  type RequirementField,
  type Requirements,
} from './types.js';

/**
 * Answer recorded when the human leaves a question blank.
 */
export const NO_PREFERENCE_ANSWER = 'No preference, use your best judgement.';

/**
 * Title used when the plan does not name the game.
 */
export const DEFAULT_GAME_TITLE = 'Generated Game';

/**
 * Creates requirements with every field unknown.
 */
export function emptyRequirements(): Requirements {
  return {
    game_type: null,
    core_mechanic: null,
    win_condition: null,
    lose_condition: null,
    control_scheme: null,
    visual_style: null,
    additional_features: [],
  };
}

/**
 * Merges a clarifier round into the requirements gathered so far.
 *
 * A field the new round leaves `null` keeps its previous value, so nothing
 * the human already settled is lost. Additional features are unioned in
 * first-seen order.
 *
 * @param current - Requirements before this round.
 * @param incoming - Requirements reported by this round.
 * @returns The merged requirements, or `undefined` when both are absent.
 */
export function mergeRequirements(
  current: Readonly<Requirements> | undefined,
  incoming: Readonly<Requirements> | undefined
): Requirements | undefined {
  if (incoming === undefined) {
    return current !== undefined
      ? { ...current, additional_features: [...current.additional_features] }
      : undefined;
  }
  const merged: Requirements = current !== undefined ? { ...current } : emptyRequirements();
  for (const field of REQUIREMENT_FIELDS) {
    const value = incoming[field];
    if (value !== null) {
      merged[field] = value;
    }
  }
  merged.additional_features = [
    ...new Set([...(current?.additional_features ?? []), ...incoming.additional_features]),
  ];
  return merged;
}

/**
 * Checks whether a string names a scalar requirement field.
 */
export function isRequirementField(value: string): value is RequirementField {
  return REQUIREMENT_FIELDS.some((field) => field === value);
}

/**
 * Whether a requirement field holds a usable value. The delegation
 * sentinel counts as filled.
 */
export function isFilled(value: string | null): boolean {
  return value !== null && value.trim() !== '';
}

/**
 * Counts how many of the given fields are filled.
 */
export function countFilled(
  requirements: Readonly<Requirements> | undefined,
  fields: readonly RequirementField[]
): number {
  if (requirements === undefined) {
    return 0;
  }
  return fields.filter((field) => isFilled(requirements[field])).length;
}

/**
 * Whether enough of the required fields are filled to stop clarifying.
 *
 * @param requirements - Requirements gathered so far.
 * @param requiredFields - Fields that count toward the threshold.
 * @param threshold - Number of those fields that must be filled.
 */
export function meetsThreshold(
  requirements: Readonly<Requirements> | undefined,
  requiredFields: readonly RequirementField[],
  threshold: number
): boolean {
  return countFilled(requirements, requiredFields) >= threshold;
}

/**
 * Fills every unknown field with {@link AGENT_DECIDES}.
 *
 * @param requirements - Requirements gathered so far.
 * @returns A copy with no `null` fields.
 */
export function delegateUnfilled(requirements: Readonly<Requirements> | undefined): Requirements {
  const delegated: Requirements = requirements !== undefined
    ? { ...requirements, additional_features: [...requirements.additional_features] }
    : emptyRequirements();
  for (const field of REQUIREMENT_FIELDS) {
    if (!isFilled(delegated[field])) {
      delegated[field] = AGENT_DECIDES;
    }
  }
  return delegated;
}

/**
 * Turns pending questions and the human's answers into dialogue entries.
 *
 * Answers pair with questions by position. A blank or missing answer is
 * recorded as {@link NO_PREFERENCE_ANSWER}; answers beyond the last
 * question are dropped.
 *
 * @param questions - Questions that were asked.
 * @param answers - Answers in question order.
 * @returns Alternating assistant and user entries.
 */
export function pairAnswers(
  questions: readonly string[],
  answers: readonly string[]
): DialogueEntry[] {
  const entries: DialogueEntry[] = [];
  questions.forEach((question, index) => {
    const answer = answers[index]?.trim() ?? '';
    entries.push({ role: 'assistant', content: question });
    entries.push({ role: 'user', content: answer !== '' ? answer : NO_PREFERENCE_ANSWER });
  });
  return entries;
}

/**
 * Reads `metadata.game_title` from a plan.
 *
 * @returns The title, or {@link DEFAULT_GAME_TITLE}.
 */
export function planTitle(plan: Readonly<Plan> | undefined): string {
  const metadata = plan?.['metadata'];
  if (isRecord(metadata)) {
    const title = metadata['game_title'];
    if (typeof title === 'string' && title.trim() !== '') {
      return title;
    }
  }
  return DEFAULT_GAME_TITLE;
}

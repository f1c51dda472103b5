/**
 * Structural validation of generated game artifacts.
 *
 * Deterministic, offline checks that run before the semantic check. The
 * orchestrator skips the semantic call whenever these report an issue.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { REQUIRED_ARTIFACTS, type ArtifactSet, type Plan } from '../pipeline/types.js';
import {
  COMPLETENESS_PATTERNS,
  COMPLETENESS_TARGETS,
  FRAMEWORK_RULES,
  MARKUP_REQUIREMENTS,
  SCRIPT_REQUIREMENTS,
  type ShapeRequirement,
} from './patterns.js';

/**
 * Default minimum size of a trimmed artifact, in UTF-8 bytes.
 */
export const DEFAULT_MIN_ARTIFACT_BYTES = 100;

/** Matches shown per completeness pattern. */
const MAX_REPORTED_MATCHES = 3;

/** Characters kept from each reported match. */
const MAX_MATCH_LENGTH = 40;

/**
 * Options for {@link runStructuralChecks}.
 */
export interface StructuralCheckOptions {
  /** Minimum trimmed byte length per artifact. Default: 100. */
  minArtifactBytes?: number;
}

/**
 * Outcome of the structural checks.
 */
export interface StructuralCheckResult {
  /** True when no issue was found. */
  ok: boolean;
  /** Every issue found, in check order. */
  issues: string[];
}

function truncate(text: string): string {
  return text.length > MAX_MATCH_LENGTH ? `${text.slice(0, MAX_MATCH_LENGTH)}...` : text;
}

function checkPresence(artifacts: Readonly<ArtifactSet>): string[] {
  return REQUIRED_ARTIFACTS.filter((name) => artifacts[name].trim() === '').map(
    (name) => `Missing or empty file: ${name}`
  );
}

function checkMinimumSize(artifacts: Readonly<ArtifactSet>, minBytes: number): string[] {
  const issues: string[] = [];
  for (const name of REQUIRED_ARTIFACTS) {
    const bytes = Buffer.byteLength(artifacts[name].trim(), 'utf8');
    if (bytes < minBytes) {
      issues.push(`${name} is suspiciously short (${String(bytes)} bytes)`);
    }
  }
  return issues;
}

function checkCompleteness(artifacts: Readonly<ArtifactSet>): string[] {
  const issues: string[] = [];
  for (const name of COMPLETENESS_TARGETS) {
    for (const { label, pattern } of COMPLETENESS_PATTERNS) {
      const matches = Array.from(artifacts[name].matchAll(pattern), (m) => m[0]);
      if (matches.length > 0) {
        const shown = matches
          .slice(0, MAX_REPORTED_MATCHES)
          .map((m) => JSON.stringify(truncate(m)))
          .join(', ');
        issues.push(`[${name}] Found incomplete pattern '${label}': ${shown}`);
      }
    }
  }
  return issues;
}

function checkShape(
  prefix: string,
  content: string,
  requirements: readonly ShapeRequirement[]
): string[] {
  return requirements
    .filter(({ anyOf }) => !anyOf.some((pattern) => pattern.test(content)))
    .map(({ issue }) => `[${prefix}] ${issue}`);
}

/**
 * Reads the framework the plan declares, lower-cased.
 *
 * Looks at `technical_architecture.framework_choice.selected` first and
 * falls back to `metadata.framework`. Returns `''` when neither is a
 * non-empty string.
 */
export function declaredFramework(plan: Readonly<Plan> | undefined): string {
  if (plan === undefined) {
    return '';
  }
  const architecture = plan['technical_architecture'];
  if (isRecord(architecture)) {
    const choice = architecture['framework_choice'];
    if (isRecord(choice)) {
      const selected = choice['selected'];
      if (typeof selected === 'string' && selected.trim() !== '') {
        return selected.toLowerCase();
      }
    }
  }
  const metadata = plan['metadata'];
  if (isRecord(metadata)) {
    const framework = metadata['framework'];
    if (typeof framework === 'string') {
      return framework.toLowerCase();
    }
  }
  return '';
}

function checkFramework(artifacts: Readonly<ArtifactSet>, plan: Readonly<Plan> | undefined): string[] {
  const framework = declaredFramework(plan);
  if (framework === '') {
    return [];
  }
  const rule = FRAMEWORK_RULES.find(({ declared }) => declared.test(framework));
  if (rule === undefined) {
    return [];
  }
  const inUse = rule.evidence(artifacts);
  const broken = rule.mode === 'requires' ? !inUse : inUse;
  return broken ? [rule.issue] : [];
}

/**
 * Runs the structural checks over a set of artifacts.
 *
 * A missing or blank artifact stops the run with one issue per such file.
 * Otherwise every check runs and all issues are returned.
 *
 * @param artifacts - The generated files.
 * @param plan - The design document, read for the declared framework.
 * @param options - Check thresholds.
 * @returns Whether the artifacts passed, and every issue found.
 *
 * @example
 * ```typescript
 * const result = runStructuralChecks(state.artifacts, state.plan);
 * if (!result.ok) {
 *   console.log(result.issues.join('\n'));
 * }
 * ```
 */
export function runStructuralChecks(
  artifacts: Readonly<ArtifactSet>,
  plan: Readonly<Plan> | undefined,
  options: StructuralCheckOptions = {}
): StructuralCheckResult {
  const missing = checkPresence(artifacts);
  if (missing.length > 0) {
    return { ok: false, issues: missing };
  }

  const issues = [
    ...checkMinimumSize(artifacts, options.minArtifactBytes ?? DEFAULT_MIN_ARTIFACT_BYTES),
    ...checkCompleteness(artifacts),
    ...checkShape('index.html', artifacts['index.html'], MARKUP_REQUIREMENTS),
    ...checkShape('game.js', artifacts['game.js'], SCRIPT_REQUIREMENTS),
    ...checkFramework(artifacts, plan),
  ];

  return { ok: issues.length === 0, issues };
}

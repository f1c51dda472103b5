/**
 * Declarative pattern tables for the structural checks.
 *
 * Each table maps evidence patterns to the issue text reported when the
 * evidence is found (completeness markers) or missing (shape requirements).
 *
 * @packageDocumentation
 */

import type { ArtifactName, ArtifactSet } from '../pipeline/types.js';

/**
 * A stub indicator searched for in generated code.
 */
export interface CompletenessPattern {
  /** Short name shown in the issue. */
  readonly label: string;
  /** Global pattern; every match is collected. */
  readonly pattern: RegExp;
}

/**
 * A piece of evidence an artifact must contain.
 */
export interface ShapeRequirement {
  /** Issue reported when none of `anyOf` matches. */
  readonly issue: string;
  /** Any one match satisfies the requirement. */
  readonly anyOf: readonly RegExp[];
}

/**
 * A rule tying the plan's declared framework to evidence in the artifacts.
 */
export interface FrameworkRule {
  /** Matched against the lower-cased declared framework. */
  readonly declared: RegExp;
  /** `requires`: the evidence must be present. `forbids`: it must be absent. */
  readonly mode: 'requires' | 'forbids';
  /** Whether the artifacts show the framework in use. */
  readonly evidence: (artifacts: Readonly<ArtifactSet>) => boolean;
  /** Issue reported when the rule is broken. */
  readonly issue: string;
}

/**
 * Artifacts scanned for completeness markers.
 */
export const COMPLETENESS_TARGETS: readonly ArtifactName[] = ['index.html', 'game.js'] as const;

/**
 * Stub indicators. Matching is case-insensitive.
 */
export const COMPLETENESS_PATTERNS: readonly CompletenessPattern[] = [
  { label: 'TODO', pattern: /\bTODO\b/gi },
  { label: '// implement', pattern: /\/\/\s*implement/gi },
  { label: '// add', pattern: /\/\/\s*add\s/gi },
  { label: 'PLACEHOLDER', pattern: /PLACEHOLDER/gi },
  { label: 'empty function body', pattern: /function\s+\w+\s*\(\s*\)\s*\{\s*\}/gi },
  { label: 'empty arrow function body', pattern: /=>\s*\{\s*\}/gi },
] as const;

/**
 * What `index.html` must contain.
 */
export const MARKUP_REQUIREMENTS: readonly ShapeRequirement[] = [
  { issue: 'Missing <!DOCTYPE html>', anyOf: [/<!doctype\s+html\s*>/i] },
  {
    issue: 'Missing <canvas> element (or Phaser container)',
    anyOf: [/<canvas/i, /phaser/i],
  },
  { issue: 'Missing <script> tag', anyOf: [/<script/i] },
] as const;

/**
 * What `game.js` must contain.
 */
export const SCRIPT_REQUIREMENTS: readonly ShapeRequirement[] = [
  {
    issue: 'No game loop detected (requestAnimationFrame / setInterval / update / Phaser)',
    anyOf: [/requestAnimationFrame/, /setInterval/, /function\s+update\s*\(/, /Phaser\.Game/],
  },
  {
    issue: 'No input event listeners detected',
    anyOf: [/addEventListener/, /this\.input/, /cursors/],
  },
] as const;

const usesPhaser = (artifacts: Readonly<ArtifactSet>): boolean =>
  artifacts['game.js'].includes('Phaser') || /phaser/i.test(artifacts['index.html']);

/**
 * Framework consistency rules, checked in order; the first whose `declared`
 * pattern matches is the only one applied.
 */
export const FRAMEWORK_RULES: readonly FrameworkRule[] = [
  {
    declared: /phaser/,
    mode: 'requires',
    evidence: usesPhaser,
    issue: 'Plan specifies Phaser but code does not use it',
  },
  {
    declared: /vanilla/,
    mode: 'forbids',
    evidence: (artifacts) => artifacts['game.js'].includes('Phaser'),
    issue: 'Plan specifies Vanilla JS but code uses Phaser',
  },
] as const;

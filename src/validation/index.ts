/**
 * Structural validation of generated artifacts.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_MIN_ARTIFACT_BYTES,
  type StructuralCheckOptions,
  type StructuralCheckResult,
  declaredFramework,
  runStructuralChecks,
} from './structural.js';
export {
  COMPLETENESS_PATTERNS,
  COMPLETENESS_TARGETS,
  FRAMEWORK_RULES,
  MARKUP_REQUIREMENTS,
  SCRIPT_REQUIREMENTS,
  type CompletenessPattern,
  type FrameworkRule,
  type ShapeRequirement,
} from './patterns.js';

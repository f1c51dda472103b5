/**
 * Record-mode response parsing.
 *
 * Recovers a JSON object from model output that may be wrapped in code
 * fences or surrounded by prose. Never throws.
 *
 * @packageDocumentation
 */

import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Which strategy produced a record.
 */
export type RecordSource = 'direct' | 'fenced' | 'braces' | 'fallback';

/**
 * Result of {@link parseRecord}.
 */
export interface ParsedRecord {
  /** The decoded object, or a copy of the fallback. */
  value: Record<string, unknown>;
  /** Strategy that produced `value`. */
  source: RecordSource;
}

/**
 * Options for {@link parseRecord}.
 */
export interface ParseRecordOptions {
  /** Logger for the fallback warning. */
  logger?: Logger;
  /** Names the caller in the fallback warning. */
  label?: string;
}

const FENCE_LINE_RE = /^```[\w+-]*$/;
const FENCED_REGION_RE = /```[\w+-]*[ \t]*\r?\n([\s\S]*?)```/g;
const PREVIEW_LENGTH = 200;

/**
 * Checks for a plain object: not null, not an array, not a class instance.
 *
 * @param value - Value to check.
 * @returns True for `{}`-style objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function decodeObject(text: string): Record<string, unknown> | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isPlainObject(decoded) ? decoded : undefined;
}

/**
 * Removes fence marker lines when the text opens with a fence.
 *
 * @param text - Trimmed model output.
 * @returns The text without lines that are only a fence marker.
 */
export function stripFenceLines(text: string): string {
  if (!text.startsWith('```')) {
    return text;
  }
  return text
    .split('\n')
    .filter((line) => !FENCE_LINE_RE.test(line.trim()))
    .join('\n');
}

/**
 * Parses model output into a JSON object.
 *
 * Strategies, in order: decode the (fence-stripped) text directly; decode the
 * body of each fenced region in turn, keeping the first object; decode the
 * span from the first `{` to the last `}`. When all fail a `record_parse_fallback` warning is logged and a
 * copy of `fallback` is returned. Arrays and primitives never count as a
 * successful decode.
 *
 * @param raw - Model output.
 * @param fallback - Value to return when nothing decodes.
 * @param options - Logger and caller label.
 * @returns The decoded object and the strategy that produced it.
 *
 * @example
 * ```typescript
 * const { value, source } = parseRecord('Sure!\n{"complete": true}', { complete: false });
 * // value: { complete: true }, source: 'braces'
 * ```
 */
export function parseRecord(
  raw: string,
  fallback: Record<string, unknown>,
  options: ParseRecordOptions = {}
): ParsedRecord {
  const text = stripFenceLines(raw.trim());

  const direct = decodeObject(text);
  if (direct !== undefined) {
    return { value: direct, source: 'direct' };
  }

  for (const match of raw.matchAll(FENCED_REGION_RE)) {
    const fenced = decodeObject((match[1] ?? '').trim());
    if (fenced !== undefined) {
      return { value: fenced, source: 'fenced' };
    }
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const braces = decodeObject(text.slice(start, end + 1));
    if (braces !== undefined) {
      return { value: braces, source: 'braces' };
    }
  }

  (options.logger ?? silentLogger).warn('record_parse_fallback', {
    ...(options.label !== undefined ? { label: options.label } : {}),
    length: raw.length,
    preview: raw.slice(0, PREVIEW_LENGTH),
  });
  return { value: structuredClone(fallback), source: 'fallback' };
}

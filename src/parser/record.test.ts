import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from '../utils/logger.js';
import { isPlainObject, parseRecord, stripFenceLines } from './record.js';

const FALLBACK = { complete: false, questions: ['Could you say more?'] };

describe('stripFenceLines', () => {
  it('drops fence marker lines with or without a language tag', () => {
    expect(stripFenceLines('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(stripFenceLines('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('leaves text that does not open with a fence alone', () => {
    expect(stripFenceLines('note\n```\n{}\n```')).toBe('note\n```\n{}\n```');
  });
});

describe('isPlainObject', () => {
  it('accepts object literals only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
    expect(isPlainObject(new Date(0))).toBe(false);
  });
});

describe('parseRecord', () => {
  it('decodes bare JSON directly', () => {
    expect(parseRecord('{"complete": true}', FALLBACK)).toEqual({
      value: { complete: true },
      source: 'direct',
    });
  });

  it('decodes a fully fenced reply directly after stripping fences', () => {
    const result = parseRecord('```json\n{"complete": true, "questions": []}\n```', FALLBACK);
    expect(result).toEqual({ value: { complete: true, questions: [] }, source: 'direct' });
  });

  it('decodes the first fenced region when prose surrounds it', () => {
    const raw = 'Here is the plan:\n```json\n{"metadata": {"game_title": "Pong"}}\n```\nEnjoy {really}!';
    expect(parseRecord(raw, FALLBACK)).toEqual({
      value: { metadata: { game_title: 'Pong' } },
      source: 'fenced',
    });
  });

  it('skips fenced regions that do not decode and takes a later one', () => {
    const raw = 'Example shape:\n```text\n{ valid: bool }\n```\nAnswer:\n```json\n{"valid": true}\n```';
    expect(parseRecord(raw, FALLBACK)).toEqual({ value: { valid: true }, source: 'fenced' });
  });

  it('skips a fenced array and takes the next fenced object', () => {
    const raw = 'Issues:\n```json\n["a", "b"]\n```\nResult:\n```json\n{"valid": false}\n```\n{oops}';
    expect(parseRecord(raw, FALLBACK)).toEqual({ value: { valid: false }, source: 'fenced' });
  });

  it('decodes the brace span when there is no fence', () => {
    const raw = 'Sure thing. {"valid": true, "issues": []} Let me know.';
    expect(parseRecord(raw, FALLBACK)).toEqual({
      value: { valid: true, issues: [] },
      source: 'braces',
    });
  });

  it('falls back for unparseable text and logs a warning', () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'Test', sink: (l) => lines.push(l) });

    const result = parseRecord('no json here', FALLBACK, { logger, label: 'clarifier' });

    expect(result).toEqual({ value: FALLBACK, source: 'fallback' });
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'warn',
      event: 'record_parse_fallback',
      data: { label: 'clarifier', length: 12, preview: 'no json here' },
    });
  });

  it('returns a copy of the fallback, not the same object', () => {
    const result = parseRecord('', FALLBACK);
    expect(result.value).not.toBe(FALLBACK);
    expect(result.value).toEqual(FALLBACK);
  });

  it('does not accept arrays or primitives as records', () => {
    expect(parseRecord('[1, 2, 3]', FALLBACK).source).toBe('fallback');
    expect(parseRecord('42', FALLBACK).source).toBe('fallback');
    expect(parseRecord('"text"', FALLBACK).source).toBe('fallback');
  });

  it('falls back when braces are in the wrong order', () => {
    expect(parseRecord('} then {', FALLBACK).source).toBe('fallback');
  });

  it('property: never throws on arbitrary input', () => {
    fc.assert(
      fc.property(fc.string(), (raw) => {
        const result = parseRecord(raw, FALLBACK);
        return isPlainObject(result.value);
      })
    );
  });

  it('property: recovers a fenced object wherever prose places it', () => {
    const prose = fc.string().filter((s) => !s.includes('`'));
    const key = fc.string().filter((s) => !s.includes('`') && s !== '__proto__');
    const scalar = fc.oneof(fc.integer(), fc.boolean(), fc.constant(null), prose);
    const record = fc.dictionary(key, scalar);

    fc.assert(
      fc.property(prose, record, prose, (before, obj, after) => {
        const raw = `${before}\n\`\`\`json\n${JSON.stringify(obj)}\n\`\`\`\n${after}`;
        expect(parseRecord(raw, FALLBACK).value).toEqual(obj);
      })
    );
  });

  it('property: any JSON object round-trips directly', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (obj) => {
        const result = parseRecord(JSON.stringify(obj), FALLBACK);
        return result.source === 'direct';
      })
    );
  });
});

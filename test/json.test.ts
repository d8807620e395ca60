import { describe, expect, it } from 'vitest';

import { extractJsonArray, findJsonSlice, requireJsonArray } from '../src/review/json.js';
import { MalformedOutputError } from '../src/lib/errors.js';

describe('extractJsonArray', () => {
  it('parses a bare array directly', () => {
    expect(extractJsonArray('[{"a":1}]')).toEqual({ value: [{ a: 1 }], strategy: 'direct' });
  });

  it('falls back to a fenced block', () => {
    const text = 'Here you go:\n```json\n[{"a":1}]\n```\nThanks';
    expect(extractJsonArray(text)).toEqual({ value: [{ a: 1 }], strategy: 'fenced-block' });
  });

  it('falls back to the first balanced bracket span', () => {
    const text = 'Result: [1, "a]b", 3] done';
    expect(extractJsonArray(text)).toEqual({ value: [1, 'a]b', 3], strategy: 'bracket-span' });
  });

  it('moves past a bracket span that is not JSON', () => {
    const text = 'Issues [consolidated]: [{"line_number": 4}]';
    expect(extractJsonArray(text)).toEqual({ value: [{ line_number: 4 }], strategy: 'bracket-span' });
  });

  it('rejects objects and prose', () => {
    expect(extractJsonArray('{"a":1}')).toBeNull();
    expect(extractJsonArray('no json here')).toBeNull();
  });

  it('requireJsonArray throws MalformedOutputError', () => {
    expect(() => requireJsonArray('nothing')).toThrow(MalformedOutputError);
  });
});

describe('findJsonSlice', () => {
  it('skips an unclosed opener', () => {
    expect(findJsonSlice('x [ [1] y', '[', ']')).toBe('[1]');
  });

  it('ignores brackets inside strings', () => {
    expect(findJsonSlice('{"k": "}"} tail', '{', '}')).toBe('{"k": "}"}');
  });
});

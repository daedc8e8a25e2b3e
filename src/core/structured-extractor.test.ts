import { describe, it, expect } from 'vitest';
import { extract } from './structured-extractor.js';
import { arrayShape, objectShape } from './shapes.js';

describe('extract', () => {
  const issuesShape = objectShape({ requiredKeys: ['issues'], defaultValues: { issues: [] } });

  describe('strict parse', () => {
    it('returns a well-formed array as is', () => {
      const result = extract('[{"risk":"x"}]', arrayShape());
      expect(result).toEqual({
        value: [{ risk: 'x' }],
        source: 'strict_parse',
        rawText: '[{"risk":"x"}]'
      });
    });

    it('returns a well-formed object matching the shape', () => {
      const result = extract('{"issues":[{"issue":"consideration"}]}', issuesShape);
      expect(result.source).toBe('strict_parse');
      expect(result.value).toEqual({ issues: [{ issue: 'consideration' }] });
    });

    it('tolerates surrounding whitespace', () => {
      expect(extract('  \n{"issues":[]}\n', issuesShape).source).toBe('strict_parse');
    });

    it('fills a missing required key from its default', () => {
      const shape = objectShape({ requiredKeys: ['a', 'b'], defaultValues: { b: [] } });
      const result = extract('{"a": 1}', shape);
      expect(result.source).toBe('strict_parse');
      expect(result.value).toEqual({ a: 1, b: [] });
    });
  });

  describe('recovered parse', () => {
    it('finds an array wrapped in prose', () => {
      const raw = 'Here is my analysis:\n[{"risk":"x"}]\nHope that helps!';
      const result = extract(raw, arrayShape());
      expect(result.source).toBe('recovered_parse');
      expect(result.value).toEqual([{ risk: 'x' }]);
      expect(result.rawText).toBe(raw);
    });

    it('finds an object inside a fenced code block', () => {
      const raw = 'Sure.\n```json\n{"issues": ["ambiguous term"]}\n```';
      const result = extract(raw, issuesShape);
      expect(result.source).toBe('recovered_parse');
      expect(result.value).toEqual({ issues: ['ambiguous term'] });
    });

    it('recovers an object whose required key must be filled', () => {
      const shape = objectShape({ requiredKeys: ['a', 'b'], defaultValues: { b: [] } });
      const result = extract('Result: {"a": 1} done', shape);
      expect(result.source).toBe('recovered_parse');
      expect(result.value).toEqual({ a: 1, b: [] });
    });

    it('does not unwrap an object quoted inside a JSON string', () => {
      const result = extract('"{\\"issues\\": []}"', issuesShape);
      expect(result.source).toBe('default_fallback');
    });
  });

  describe('default fallback', () => {
    it('falls back when there is no JSON at all', () => {
      const result = extract('I could not complete this analysis.', issuesShape);
      expect(result).toEqual({
        value: { issues: [] },
        source: 'default_fallback',
        rawText: 'I could not complete this analysis.'
      });
    });

    it('falls back on empty text', () => {
      expect(extract('', arrayShape())).toEqual({ value: [], source: 'default_fallback', rawText: '' });
    });

    it('falls back when the closing delimiter comes first', () => {
      expect(extract('] then [', arrayShape()).source).toBe('default_fallback');
    });

    it('slices an object out of an array but not out of scalars', () => {
      expect(extract('[{"issues": []}]', issuesShape).source).toBe('recovered_parse');
      expect(extract('[1, 2]', issuesShape).source).toBe('default_fallback');
    });

    it('falls back when a required key without a default is missing', () => {
      const shape = objectShape({ requiredKeys: ['position'] });
      const result = extract('{"argument": "x"}', shape);
      expect(result.source).toBe('default_fallback');
      expect(result.value).toEqual({ position: null });
    });

    it('falls back when two separate blocks make the slice invalid', () => {
      const raw = 'First {"issues": []} and second {"issues": [1]}';
      expect(extract(raw, issuesShape).source).toBe('default_fallback');
    });

    it('returns the caller-supplied fallback for arrays', () => {
      const shape = arrayShape({ fallback: [{ risk: 'unavailable' }] });
      expect(extract('no answer', shape).value).toEqual([{ risk: 'unavailable' }]);
    });

    it('never hands out the shape fallback itself', () => {
      const first = extract('nothing', issuesShape);
      first.value.issues = ['mutated'];
      const second = extract('nothing', issuesShape);
      expect(second.value).toEqual({ issues: [] });
      expect(issuesShape.fallback).toEqual({ issues: [] });
    });
  });

  it('fills a required key named like an Object member', () => {
    const shape = objectShape({ requiredKeys: ['constructor'], defaultValues: { constructor: [] } });
    const result = extract('{"other":1}', shape);

    expect(result.source).toBe('strict_parse');
    expect(JSON.stringify(result.value)).toBe('{"other":1,"constructor":[]}');
  });

  it('is idempotent', () => {
    const inputs = [
      '{"issues": []}',
      'prose {"issues": ["x"]} prose',
      'nothing usable'
    ];
    for (const raw of inputs) {
      expect(extract(raw, issuesShape)).toEqual(extract(raw, issuesShape));
    }
  });
});

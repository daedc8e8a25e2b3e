import { describe, it, expect } from 'vitest';
import {
  arrayShape,
  completeObject,
  conformsTo,
  isJsonObject,
  objectShape,
  objectShapeFromTemplate
} from './shapes.js';
import { InvalidArgumentError } from './errors.js';
import type { JsonValue } from '../types.js';

describe('objectShape', () => {
  it('fills the fallback from defaults and null for required keys without one', () => {
    const shape = objectShape({ requiredKeys: ['a', 'b'], defaultValues: { b: [] } });

    expect(shape.kind).toBe('object');
    expect(shape.requiredKeys).toEqual(['a', 'b']);
    expect(shape.fallback).toEqual({ a: null, b: [] });
  });

  it('deduplicates required keys', () => {
    const shape = objectShape({ requiredKeys: ['issues', 'issues'] });
    expect(shape.requiredKeys).toEqual(['issues']);
  });

  it('keeps an explicit fallback that covers every required key', () => {
    const shape = objectShape({
      requiredKeys: ['issues'],
      fallback: { issues: [], note: 'none' }
    });
    expect(shape.fallback).toEqual({ issues: [], note: 'none' });
  });

  it('rejects an explicit fallback missing a required key', () => {
    expect(() => objectShape({ requiredKeys: ['issues', 'risks'], fallback: { issues: [] } }))
      .toThrow('fallback is missing required keys risks');
  });

  it('rejects empty key names', () => {
    expect(() => objectShape({ requiredKeys: [''] })).toThrow(InvalidArgumentError);
  });

  it('rejects defaults that are not JSON', () => {
    expect(() => objectShape({
      requiredKeys: ['when'],
      defaultValues: { when: Number.NaN }
    })).toThrow(InvalidArgumentError);
  });

  it('is frozen and does not alias the declaration', () => {
    const defaults = { issues: ['seed'] };
    const shape = objectShape({ requiredKeys: ['issues'], defaultValues: defaults });
    defaults.issues.push('later');

    expect(Object.isFrozen(shape)).toBe(true);
    expect(shape.defaultValues).toEqual({ issues: ['seed'] });
  });
});

describe('arrayShape', () => {
  it('defaults the fallback to an empty array', () => {
    expect(arrayShape()).toEqual({ kind: 'array', fallback: [] });
  });

  it('keeps a supplied fallback', () => {
    expect(arrayShape({ fallback: [{ risk: 'unknown' }] }).fallback).toEqual([{ risk: 'unknown' }]);
  });
});

describe('objectShapeFromTemplate', () => {
  it('requires every template key with its template value as default', () => {
    const shape = objectShapeFromTemplate({ explanation: '', exceptions: [] });
    expect(shape.requiredKeys).toEqual(['explanation', 'exceptions']);
    expect(shape.defaultValues).toEqual({ explanation: '', exceptions: [] });
    expect(shape.fallback).toEqual({ explanation: '', exceptions: [] });
  });
});

describe('completeObject', () => {
  const shape = objectShape({ requiredKeys: ['a', 'b'], defaultValues: { b: [] } });

  it('fills a missing key from its default', () => {
    expect(completeObject({ a: 1 }, shape)).toEqual({ a: 1, b: [] });
  });

  it('returns null when a required key has no default', () => {
    expect(completeObject({ b: [1] }, shape)).toBeNull();
  });

  it('keeps extra keys and present values', () => {
    expect(completeObject({ a: 1, b: [2], c: true }, shape)).toEqual({ a: 1, b: [2], c: true });
  });

  it('never hands out the default itself', () => {
    const first = completeObject({ a: 1 }, shape);
    const second = completeObject({ a: 2 }, shape);
    expect(first?.b).not.toBe(second?.b);
    expect(first?.b).not.toBe(shape.defaultValues.b);
  });
});

describe('inherited member names as required keys', () => {
  const shape = objectShape({
    requiredKeys: ['constructor', 'toString'],
    defaultValues: { constructor: [] }
  });

  it('counts only own keys as present', () => {
    expect(JSON.stringify(completeObject({ toString: 'x' }, shape))).toBe('{"toString":"x","constructor":[]}');
    expect(completeObject({ constructor: [] }, shape)).toBeNull();
    expect(conformsTo({}, shape)).toBe(false);
  });

  it('puts them in the derived fallback', () => {
    expect(Object.hasOwn(shape.fallback, 'constructor')).toBe(true);
    expect(JSON.stringify(shape.fallback)).toBe('{"constructor":[],"toString":null}');
  });

  it('fills a __proto__ default as an own property', () => {
    const entries: Array<[string, JsonValue]> = [['__proto__', []]];
    const protoShape = objectShape({ requiredKeys: ['__proto__'], defaultValues: Object.fromEntries(entries) });
    const completed = completeObject({}, protoShape);

    expect(completed !== null && Object.hasOwn(completed, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(completed)).toBe(Object.prototype);
    expect(JSON.stringify(completed)).toBe('{"__proto__":[]}');
  });
});

describe('conformsTo', () => {
  it('checks required keys for objects', () => {
    const shape = objectShape({ requiredKeys: ['issues'] });
    expect(conformsTo({ issues: [] }, shape)).toBe(true);
    expect(conformsTo({ other: [] }, shape)).toBe(false);
    expect(conformsTo([], shape)).toBe(false);
  });

  it('checks array-ness only for arrays', () => {
    expect(conformsTo([1, 'two'], arrayShape())).toBe(true);
    expect(conformsTo({}, arrayShape())).toBe(false);
  });
});

describe('isJsonObject', () => {
  it('excludes arrays and null', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});

/**
 * Tests for JSON recovery from model output
 */

import { describe, it, expect } from 'vitest';
import { objectArrayField, recoverJsonObject, stringField } from '../lib/tools/json-recovery';

describe('recoverJsonObject', () => {
  it('should read plain, fenced and embedded objects', () => {
    expect(recoverJsonObject('{"a": 1}')).toEqual({ a: 1 });
    expect(recoverJsonObject('Here you go:\n```json\n{"a": 2}\n```')).toEqual({ a: 2 });
    expect(recoverJsonObject('Sure! {"a": 3} Hope that helps.')).toEqual({ a: 3 });
  });

  it('should reject arrays and unparseable text', () => {
    expect(recoverJsonObject('[1, 2]')).toBeNull();
    expect(recoverJsonObject('{not json}')).toBeNull();
  });
});

describe('field readers', () => {
  const obj = { title: '  Hi ', count: 3, flag: true, items: [{ x: 1 }, 'skip', null, { y: 2 }] };

  it('should read strings and numbers as trimmed text', () => {
    expect(stringField(obj, 'title')).toBe('Hi');
    expect(stringField(obj, 'count')).toBe('3');
    expect(stringField(obj, 'flag')).toBe('');
    expect(stringField(obj, 'missing')).toBe('');
  });

  it('should keep only objects from arrays', () => {
    expect(objectArrayField(obj, 'items')).toEqual([{ x: 1 }, { y: 2 }]);
    expect(objectArrayField(obj, 'title')).toEqual([]);
  });
});

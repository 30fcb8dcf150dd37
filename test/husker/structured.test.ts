import { describe, it, expect } from 'vitest';
import { HuskerError, HuskerNotUniqueError, HuskerValueError } from '../../src/core/errors.js';
import { husk, NULL_HUSKER, StructuredHusker, TextHusker } from '../../src/husker/index.js';

describe('StructuredHusker', () => {
  const data = husk({
    items: [
      { name: 'lamp', price: 12 },
      { name: 'desk', price: 90 },
    ],
    meta: { count: 2, next: null },
  });

  it('should reject malformed expressions', () => {
    expect(() => data.selection('items[[')).toThrow(HuskerValueError);
    expect(() => data.selection('items[[')).toThrow("Invalid JMESPath 'items[['");
  });

  it('should select a single value with a plain path', () => {
    expect(data.one('meta.count').raw).toBe(2);
    expect(data.one('meta.count').int).toBe(2);
    expect(data.get('items[0]').get('name').str).toBe('lamp');
  });

  it('should select a list with a projection', () => {
    expect(data.all('items[*].name').strs).toEqual(['lamp', 'desk']);
    expect(data.all('items[*].price').ints).toEqual([12, 90]);
  });

  it('should refuse a projection where one value is required', () => {
    expect(() => data.some('items[*].name')).toThrow(HuskerNotUniqueError);
    expect(() => data.some('items[*].name')).toThrow(
      "StructuredHusker expected 1 match for 'items[*].name', found 2"
    );
  });

  it('should treat null results as no match', () => {
    expect(data.some('meta.next')).toBe(NULL_HUSKER);
    expect(data.some('missing.path')).toBe(NULL_HUSKER);
    expect(data.selection('missing[*]').length).toBe(0);
  });

  it('should return string values as text', () => {
    expect(data.get('items[1].name')).toBeInstanceOf(TextHusker);
  });

  it('should list the elements of an array', () => {
    expect(data.get('items').list.length).toBe(2);
    expect(data.get('items').list.at(1).get('price').int).toBe(90);
  });

  it('should refuse to list a non-array', () => {
    expect(() => data.get('meta').list).toThrow(HuskerError);
    expect(() => data.get('meta').list).toThrow('StructuredHusker holds an object, not a list');
  });

  it('should serialise objects with sorted keys', () => {
    const value = husk({ b: 1, a: [1, 'x'] });
    expect(value.text.str).toBe('{"a":[1,"x"],"b":1}');
    expect(value.multiline.str).toBe('{\n    "a": [\n        1,\n        "x"\n    ],\n    "b": 1\n}');
  });

  it('should return itself from json()', () => {
    expect(data.json()).toBe(data);
  });

  it('should build children by value type', () => {
    expect(StructuredHusker.child(null)).toBe(NULL_HUSKER);
    expect(StructuredHusker.child('x')).toBeInstanceOf(TextHusker);
    expect(StructuredHusker.child(3)).toBeInstanceOf(StructuredHusker);
  });
});

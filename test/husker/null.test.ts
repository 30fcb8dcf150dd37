import { describe, it, expect } from 'vitest';
import { EMPTY_LIST_HUSKER, husk, NULL_HUSKER, type Husker } from '../../src/husker/index.js';

describe('NullHusker', () => {
  it('should be what husk() makes of null and undefined', () => {
    expect(husk(null)).toBe(NULL_HUSKER);
    expect(husk(undefined)).toBe(NULL_HUSKER);
  });

  it('should not exist', () => {
    expect(NULL_HUSKER.exists()).toBe(false);
  });

  it('should return itself from every node-valued operation', () => {
    const operations: Array<(node: Husker) => Husker> = [
      (n) => n.one('a'),
      (n) => n.some('a'),
      (n) => n.first('a'),
      (n) => n.last('a'),
      (n) => n.any('a'),
      (n) => n.oneOf('a', 'b'),
      (n) => n.someOf('a', 'b'),
      (n) => n.firstOf('a', 'b'),
      (n) => n.anyOf('a', 'b'),
      (n) => n.text,
      (n) => n.multiline,
      (n) => n.json(),
      (n) => n.filter(() => true),
      (n) => n.attrib('href'),
      (n) => n.attr('href'),
      (n) => n.sub('a', 'b'),
      (n) => n.lower(),
      (n) => n.upper(),
      (n) => n.js(),
      (n) => n.join(', '),
      (n) => n.get('a.b'),
      (n) => n.parent,
      (n) => n.next,
      (n) => n.previous,
      (n) => n.head,
      (n) => n.tail,
      (n) => n.tag,
    ];
    for (const operation of operations) {
      expect(operation(NULL_HUSKER)).toBe(NULL_HUSKER);
    }
  });

  it('should return the empty list from sequence-valued operations', () => {
    expect(NULL_HUSKER.selection()).toBe(EMPTY_LIST_HUSKER);
    expect(NULL_HUSKER.all('a')).toBe(EMPTY_LIST_HUSKER);
    expect(NULL_HUSKER.allOf('a', 'b')).toBe(EMPTY_LIST_HUSKER);
    expect(NULL_HUSKER.selectionOf('a', 'b')).toBe(EMPTY_LIST_HUSKER);
    expect(NULL_HUSKER.list).toBe(EMPTY_LIST_HUSKER);
    expect(NULL_HUSKER.children).toBe(EMPTY_LIST_HUSKER);
  });

  it('should return null from scalar accessors', () => {
    expect(NULL_HUSKER.raw).toBeNull();
    expect(NULL_HUSKER.str).toBeNull();
    expect(NULL_HUSKER.int).toBeNull();
    expect(NULL_HUSKER.float).toBeNull();
    expect(NULL_HUSKER.decimal).toBeNull();
    expect(NULL_HUSKER.date()).toBeNull();
    expect(NULL_HUSKER.datetime()).toBeNull();
    expect(NULL_HUSKER.lookup({ a: 1 })).toBeNull();
  });

  it('should propagate through a chain of searches', () => {
    const price = husk('no price here').some(/\$(\d+)/).sub(',', '').int;
    expect(price).toBeNull();
  });

  it('should map every requested part to itself', () => {
    const { name, price } = NULL_HUSKER.parts({ name: '.name', price: '.price' });
    expect(name).toBe(NULL_HUSKER);
    expect(price).toBe(NULL_HUSKER);
  });

  it('should equal only absent values', () => {
    expect(NULL_HUSKER.equals(null)).toBe(true);
    expect(NULL_HUSKER.equals(undefined)).toBe(true);
    expect(NULL_HUSKER.equals(NULL_HUSKER)).toBe(true);
    expect(NULL_HUSKER.equals('')).toBe(false);
    expect(NULL_HUSKER.equals(husk(''))).toBe(false);
  });

  it('should compare equal only to Null', () => {
    expect(NULL_HUSKER.compare(NULL_HUSKER)).toBe(0);
    expect(NULL_HUSKER.compare('a')).toBeNaN();
  });

  it('should render as empty text', () => {
    expect(String(NULL_HUSKER)).toBe('');
    expect(NULL_HUSKER.reprValue()).toBe('<Null>');
  });
});

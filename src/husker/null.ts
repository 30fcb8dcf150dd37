import type { Decimal } from 'decimal.js';
import { EMPTY_LIST_HUSKER, Husker, type ListHusker } from './internal.js';
import type { LookupTable, Spec, SpecArg } from './types.js';

/**
 * The absent value.
 *
 * Absorbs every search, navigation and projection so that optional parts of a
 * document can be chained without checks; scalar accessors give `null`.
 */
export class NullHusker extends Husker<null> {
  constructor() {
    super(null);
  }

  selection(): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  one(): NullHusker {
    return this;
  }

  some(): NullHusker {
    return this;
  }

  first(): NullHusker {
    return this;
  }

  last(): NullHusker {
    return this;
  }

  any(): NullHusker {
    return this;
  }

  all(..._spec: SpecArg[]): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  oneOf(): NullHusker {
    return this;
  }

  someOf(): NullHusker {
    return this;
  }

  firstOf(): NullHusker {
    return this;
  }

  anyOf(): NullHusker {
    return this;
  }

  allOf(..._specs: Spec[]): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  selectionOf(..._specs: Spec[]): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  parts(fields: Readonly<Record<string, unknown>>): Record<string, Husker> {
    return Object.fromEntries(Object.keys(fields).map((key): [string, Husker] => [key, this]));
  }

  get raw(): null {
    return null;
  }

  exists(): boolean {
    return false;
  }

  equals(other: unknown): boolean {
    return other === null || other === undefined || other instanceof NullHusker;
  }

  /**
   * Null is unordered against everything but itself
   */
  compare(other: unknown): number {
    return this.equals(other) ? 0 : Number.NaN;
  }

  get text(): NullHusker {
    return this;
  }

  get multiline(): NullHusker {
    return this;
  }

  get str(): null {
    return null;
  }

  get int(): null {
    return null;
  }

  get float(): null {
    return null;
  }

  get decimal(): Decimal | null {
    return null;
  }

  date(): null {
    return null;
  }

  datetime(): null {
    return null;
  }

  json(): NullHusker {
    return this;
  }

  filter(): NullHusker {
    return this;
  }

  lookup<V extends {} | null>(_table: LookupTable<V>, ..._fallback: [] | [V]): V | null {
    return null;
  }

  attrib(): NullHusker {
    return this;
  }

  attr(): NullHusker {
    return this;
  }

  sub(): NullHusker {
    return this;
  }

  lower(): NullHusker {
    return this;
  }

  upper(): NullHusker {
    return this;
  }

  js(): NullHusker {
    return this;
  }

  join(): NullHusker {
    return this;
  }

  get list(): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  get(): NullHusker {
    return this;
  }

  get parent(): NullHusker {
    return this;
  }

  get next(): NullHusker {
    return this;
  }

  get previous(): NullHusker {
    return this;
  }

  get head(): NullHusker {
    return this;
  }

  get tail(): NullHusker {
    return this;
  }

  get children(): ListHusker {
    return EMPTY_LIST_HUSKER;
  }

  get tag(): NullHusker {
    return this;
  }

  reprValue(): string {
    return '<Null>';
  }

  toString(): string {
    return '';
  }
}

export const NULL_HUSKER: NullHusker = new NullHusker();

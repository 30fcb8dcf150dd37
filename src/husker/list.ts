import type { Decimal } from 'decimal.js';
import { DEFAULT_DATE_FORMAT, DEFAULT_DATETIME_FORMAT } from '../constants.js';
import { Husker, NULL_HUSKER, TextHusker, isTruthy } from './internal.js';
import type { HuskerPredicate, Replacement, SpecArg } from './types.js';

/**
 * Ordered sequence of nodes, as returned by every search.
 *
 * Projections are broadcast over the children: `list.text` is the list of the
 * children's texts, `list.strs` the array of their strings.
 */
export class ListHusker extends Husker<readonly Husker[]> implements Iterable<Husker> {
  constructor(values: Iterable<Husker>) {
    super(Array.from(values));
  }

  get length(): number {
    return this.value.length;
  }

  [Symbol.iterator](): Iterator<Husker> {
    return this.value[Symbol.iterator]();
  }

  /**
   * Child at `index` (negative counts from the end), Null when out of range
   */
  at(index: number): Husker {
    return this.value.at(index) ?? NULL_HUSKER;
  }

  toArray(): Husker[] {
    return [...this.value];
  }

  exists(): boolean {
    return this.value.length > 0;
  }

  /**
   * Children kept by a predicate, or children in which the spec matches
   *
   * @example
   * ```typescript
   * rows.selection('td.price');            // rows that contain a price cell
   * rows.selection((row) => row.some('a')); // rows with a single link
   * ```
   */
  selection(test?: SpecArg, ...rest: SpecArg[]): ListHusker {
    if (test === undefined) return new ListHusker(this.value);
    if (typeof test === 'function') {
      return new ListHusker(this.value.filter((child) => isTruthy(test(child))));
    }
    return new ListHusker(this.value.filter((child) => child.selection(test, ...rest).exists()));
  }

  filter(predicate: HuskerPredicate): ListHusker {
    return new ListHusker(this.value.filter((child) => isTruthy(predicate(child))));
  }

  /**
   * Drops repeated children, keeping first occurrences. Children are compared
   * by `raw` value unless a key function is given.
   */
  dedup(key: (child: Husker) => unknown = (child) => child.raw): ListHusker {
    const seen = new Set<unknown>();
    const unique: Husker[] = [];
    for (const child of this.value) {
      const identity = key(child);
      if (seen.has(identity)) continue;
      seen.add(identity);
      unique.push(child);
    }
    return new ListHusker(unique);
  }

  map<R>(fn: (child: Husker, index: number) => R): R[] {
    return this.value.map((child, index) => fn(child, index));
  }

  mapRaw<R>(fn: (raw: unknown, index: number) => R): R[] {
    return this.value.map((child, index) => fn(child.raw, index));
  }

  concat(other: Iterable<Husker>): ListHusker {
    return new ListHusker([...this.value, ...other]);
  }

  join(separator: string): TextHusker {
    return new TextHusker(this.value.map((child) => child.str ?? '').join(separator));
  }

  // ===========================================================================
  // Broadcast projections
  // ===========================================================================

  get text(): ListHusker {
    return new ListHusker(this.value.map((child) => child.text));
  }

  get multiline(): ListHusker {
    return new ListHusker(this.value.map((child) => child.multiline));
  }

  js(stripComments = true): ListHusker {
    return new ListHusker(this.value.map((child) => child.js(stripComments)));
  }

  json(): ListHusker {
    return new ListHusker(this.value.map((child) => child.json()));
  }

  sub(pattern: string | RegExp, replacement: Replacement, flags = ''): ListHusker {
    return new ListHusker(this.value.map((child) => child.sub(pattern, replacement, flags)));
  }

  attrib(name: string, fallback: Husker = NULL_HUSKER): ListHusker {
    return new ListHusker(this.value.map((child) => child.attrib(name, fallback)));
  }

  lower(): ListHusker {
    return new ListHusker(this.value.map((child) => child.lower()));
  }

  upper(): ListHusker {
    return new ListHusker(this.value.map((child) => child.upper()));
  }

  get raw(): unknown[] {
    return this.value.map((child) => child.raw);
  }

  get strs(): (string | null)[] {
    return this.value.map((child) => child.str);
  }

  get ints(): (number | null)[] {
    return this.value.map((child) => child.int);
  }

  get floats(): (number | null)[] {
    return this.value.map((child) => child.float);
  }

  get decimals(): (Decimal | null)[] {
    return this.value.map((child) => child.decimal);
  }

  dates(format: string = DEFAULT_DATE_FORMAT): (Date | null)[] {
    return this.value.map((child) => child.date(format));
  }

  datetimes(format: string = DEFAULT_DATETIME_FORMAT): (Date | null)[] {
    return this.value.map((child) => child.datetime(format));
  }

  // Singular accessors have no meaning on a sequence
  get str(): string | null {
    throw this.unsupported('str', 'Use strs for the strings of every child, or join() to concatenate them.');
  }

  get int(): number | null {
    throw this.unsupported('int', 'Use ints for the integers of every child.');
  }

  get float(): number | null {
    throw this.unsupported('float', 'Use floats for the numbers of every child.');
  }

  get decimal(): Decimal | null {
    throw this.unsupported('decimal', 'Use decimals for the decimals of every child.');
  }

  date(_format?: string): Date | null {
    throw this.unsupported('date', 'Use dates() for the dates of every child.');
  }

  datetime(_format?: string): Date | null {
    throw this.unsupported('datetime', 'Use datetimes() for the timestamps of every child.');
  }

  equals(other: unknown): boolean {
    if (!(other instanceof ListHusker) || other.length !== this.length) return false;
    return this.value.every((child, index) => child.equals(other.at(index)));
  }

  compare(_other: unknown): number {
    throw this.unsupported('compare');
  }

  reprValue(): string {
    return `[${this.value.map((child) => child.reprValue()).join(', ')}]`;
  }

  toString(): string {
    return `[${this.value.map((child) => child.toString()).join(', ')}]`;
  }
}

export const EMPTY_LIST_HUSKER: ListHusker = new ListHusker([]);

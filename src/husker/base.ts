import { isValid, parse as parseDate } from 'date-fns';
import { Decimal } from 'decimal.js';
import { DATETIME_SUFFIX_PATTERN, DEFAULT_DATE_FORMAT, DEFAULT_DATETIME_FORMAT } from '../constants.js';
import {
  HuskerLookupError,
  HuskerMismatchError,
  HuskerMultipleSpecMatchError,
  HuskerNotUniqueError,
  HuskerUnsupportedError,
  HuskerValueError,
} from '../core/errors.js';
import { lenientJsonParse } from '../utils/json.js';
import { quote } from '../utils/text.js';
import { ListHusker, NULL_HUSKER, StructuredHusker } from './internal.js';
import type { HuskerPredicate, LookupTable, Replacement, Spec, SpecArg } from './types.js';

const INTEGER_LITERAL = /^\s*[+-]?\d+\s*$/;

// Dates without a year parse into 1900, like most strptime-style parsers
const DATE_REFERENCE = new Date(1900, 0, 1);

/**
 * Abstract node of the query tree.
 *
 * Every variant implements `selection()`; the cardinality operators
 * (`one`, `some`, `first`, `last`, `any`, `all` and their `…Of` forms) are all
 * derived from it. Operations a variant has no meaning for throw
 * {@link HuskerUnsupportedError}.
 *
 * @example
 * ```typescript
 * const page = parseHtml(markup);
 * const title = page.one('h1').text.str;
 * const price = page.some('.price').sub(/[^\d.]/, '').decimal;
 * ```
 */
export abstract class Husker<T = unknown> {
  protected readonly value: T;

  constructor(value: T) {
    this.value = value;
  }

  /**
   * Variant name used in error messages
   */
  get id(): string {
    return this.constructor.name;
  }

  /**
   * All matches of the spec, in document order
   */
  abstract selection(...spec: SpecArg[]): ListHusker;

  // ===========================================================================
  // Cardinality
  // ===========================================================================

  /**
   * Exactly one match, else HuskerMismatchError / HuskerNotUniqueError
   */
  one(...spec: SpecArg[]): Husker {
    const selected = this.selection(...spec);
    if (selected.length === 0) throw this.mismatch(spec);
    if (selected.length > 1) throw this.notUnique(spec, selected.length);
    return selected.at(0);
  }

  /**
   * Zero or one match: Null when nothing matches
   */
  some(...spec: SpecArg[]): Husker {
    const selected = this.selection(...spec);
    if (selected.length > 1) throw this.notUnique(spec, selected.length);
    return selected.at(0);
  }

  first(...spec: SpecArg[]): Husker {
    const selected = this.selection(...spec);
    if (selected.length === 0) throw this.mismatch(spec);
    return selected.at(0);
  }

  last(...spec: SpecArg[]): Husker {
    const selected = this.selection(...spec);
    if (selected.length === 0) throw this.mismatch(spec);
    return selected.at(-1);
  }

  /**
   * First match, or Null
   */
  any(...spec: SpecArg[]): Husker {
    return this.selection(...spec).at(0);
  }

  /**
   * Every match; at least one is required
   */
  all(...spec: SpecArg[]): ListHusker {
    const selected = this.selection(...spec);
    if (selected.length === 0) throw this.mismatch(spec);
    return selected;
  }

  oneOf(...specs: Spec[]): Husker {
    const match = this.someOf(...specs);
    if (!match.exists()) {
      throw new HuskerMismatchError(
        `${this.id}: none of the specified specs matched ${this.reprValue()}: ${this.reprSpecs(specs)}`
      );
    }
    return match;
  }

  /**
   * Result of the single spec that matches, or Null. Two matching specs are an error.
   */
  someOf(...specs: Spec[]): Husker {
    let match: Husker = NULL_HUSKER;
    let matchingSpec: readonly SpecArg[] | undefined;

    for (const spec of specs) {
      const args = specArgs(spec);
      const selected = this.some(...args);
      if (!selected.exists()) continue;

      if (matchingSpec !== undefined) {
        throw new HuskerMultipleSpecMatchError(
          `${this.id}: both ${this.reprSpec(...matchingSpec)} and ${this.reprSpec(...args)} matched`
        );
      }
      match = selected;
      matchingSpec = args;
    }

    return match;
  }

  firstOf(...specs: Spec[]): Husker {
    const match = this.anyOf(...specs);
    if (!match.exists()) {
      throw new HuskerMismatchError(`${this.id}: none of the specified specs matched: ${this.reprSpecs(specs)}`);
    }
    return match;
  }

  anyOf(...specs: Spec[]): Husker {
    for (const spec of specs) {
      const match = this.any(...specArgs(spec));
      if (match.exists()) return match;
    }
    return NULL_HUSKER;
  }

  allOf(...specs: Spec[]): ListHusker {
    return new ListHusker(specs.flatMap((spec) => [...this.all(...specArgs(spec))]));
  }

  selectionOf(...specs: Spec[]): ListHusker {
    return new ListHusker(specs.flatMap((spec) => [...this.selection(...specArgs(spec))]));
  }

  /**
   * Runs `one()` for each field, keeping fields that already are nodes
   *
   * @example
   * ```typescript
   * const { name, price } = row.parts({ name: '.name', price: '.price' });
   * ```
   */
  parts(fields: Readonly<Record<string, SpecArg | Husker>>): Record<string, Husker> {
    const result: Record<string, Husker> = {};
    for (const [key, field] of Object.entries(fields)) {
      result[key] = field instanceof Husker ? field : this.one(field);
    }
    return result;
  }

  // ===========================================================================
  // Value access
  // ===========================================================================

  get raw(): unknown {
    return this.value;
  }

  exists(): boolean {
    return this.value !== null && this.value !== undefined;
  }

  equals(other: unknown): boolean {
    return this.value === (other instanceof Husker ? other.raw : other);
  }

  /**
   * Orders by underlying value; only strings and numbers are ordered
   */
  compare(other: unknown): number {
    const left = this.value;
    const right = other instanceof Husker ? other.raw : other;
    if (typeof left === 'string' && typeof right === 'string') return order(left, right);
    if (typeof left === 'number' && typeof right === 'number') return order(left, right);
    throw this.unsupported('compare', 'Only text and numbers are ordered.');
  }

  get text(): Husker {
    throw this.unsupported('text');
  }

  get multiline(): Husker {
    throw this.unsupported('multiline');
  }

  get str(): string | null {
    return this.text.str;
  }

  get int(): number | null {
    const text = this.str;
    return text === null ? null : parseInteger(text);
  }

  get float(): number | null {
    const text = this.str;
    return text === null ? null : parseFloatStrict(text);
  }

  get decimal(): Decimal | null {
    const text = this.str;
    return text === null ? null : parseDecimal(text);
  }

  date(format: string = DEFAULT_DATE_FORMAT): Date | null {
    const text = this.str;
    return text === null ? null : parseDateStrict(text, format);
  }

  /**
   * Parses a timestamp, dropping fractional seconds and UTC offsets first
   */
  datetime(format: string = DEFAULT_DATETIME_FORMAT): Date | null {
    const text = this.str;
    return text === null ? null : parseDateStrict(text.trim().replace(DATETIME_SUFFIX_PATTERN, ''), format);
  }

  /**
   * Structured node of the text, parsed as lenient JSON
   */
  json(): Husker {
    const text = this.str;
    return text === null ? NULL_HUSKER : StructuredHusker.child(lenientJsonParse(text));
  }

  filter(predicate: HuskerPredicate): Husker {
    return isTruthy(predicate(this)) ? this : NULL_HUSKER;
  }

  /**
   * Maps the text through a table
   *
   * @example
   * ```typescript
   * const inStock = node.one('.availability').text.lookup({ 'In stock': true, 'Sold out': false });
   * ```
   */
  lookup<V extends {} | null>(table: LookupTable<V>, ...fallback: [] | [V]): V | null {
    const key = this.str;
    if (key !== null) {
      const entry = lookupEntry(table, key);
      if (entry.found) return entry.value;
    }
    if (fallback.length === 1) return fallback[0];
    throw new HuskerLookupError(key ?? this.raw);
  }

  // ===========================================================================
  // Capabilities some variants provide
  // ===========================================================================

  attrib(_name: string, _fallback?: Husker): Husker {
    throw this.unsupported('attrib');
  }

  attr(_name: string): Husker {
    throw this.unsupported('attr');
  }

  sub(_pattern: string | RegExp, _replacement: Replacement, _flags?: string): Husker {
    throw this.unsupported('sub');
  }

  lower(): Husker {
    throw this.unsupported('lower');
  }

  upper(): Husker {
    throw this.unsupported('upper');
  }

  js(_stripComments?: boolean): Husker {
    throw this.unsupported('js');
  }

  join(_separator: string): Husker {
    throw this.unsupported('join');
  }

  get list(): ListHusker {
    throw this.unsupported('list');
  }

  get(_path: string): Husker {
    throw this.unsupported('get');
  }

  get parent(): Husker {
    throw this.unsupported('parent');
  }

  get next(): Husker {
    throw this.unsupported('next');
  }

  get previous(): Husker {
    throw this.unsupported('previous');
  }

  get head(): Husker {
    throw this.unsupported('head');
  }

  get tail(): Husker {
    throw this.unsupported('tail');
  }

  get children(): ListHusker {
    throw this.unsupported('children');
  }

  get tag(): Husker {
    throw this.unsupported('tag');
  }

  // ===========================================================================
  // Representation
  // ===========================================================================

  reprSpec(...spec: SpecArg[]): string {
    return spec.length === 1 ? quote(spec[0]) : quote(spec);
  }

  reprValue(): string {
    return quote(this.str);
  }

  toString(): string {
    return this.str ?? '';
  }

  protected unsupported(operation: string, hint?: string): HuskerUnsupportedError {
    return new HuskerUnsupportedError(this.id, operation, hint);
  }

  private mismatch(spec: readonly SpecArg[]): HuskerMismatchError {
    return new HuskerMismatchError(`${this.id} found no matches for ${this.reprSpec(...spec)} in ${this.reprValue()}`);
  }

  private notUnique(spec: readonly SpecArg[], count: number): HuskerNotUniqueError {
    return new HuskerNotUniqueError(`${this.id} expected 1 match for ${this.reprSpec(...spec)}, found ${count}`, count);
  }

  private reprSpecs(specs: readonly Spec[]): string {
    return specs.map((spec) => `"${this.reprSpec(...specArgs(spec))}"`).join(', ');
  }
}

/**
 * Constructor guard shared by the value-carrying variants
 */
export function requireValue<V>(value: V | null | undefined, variant: string): V {
  if (value === null || value === undefined) {
    throw new HuskerValueError(`${variant} cannot wrap ${String(value)}; use NULL_HUSKER for absent values`, value);
  }
  return value;
}

/**
 * Truthiness of a predicate result: nodes count as true when they exist
 */
export function isTruthy(result: unknown): boolean {
  return result instanceof Husker ? result.exists() : Boolean(result);
}

function isSpecList(spec: Spec): spec is readonly SpecArg[] {
  return Array.isArray(spec);
}

function specArgs(spec: Spec): readonly SpecArg[] {
  return isSpecList(spec) ? spec : [spec];
}

function order<V extends string | number>(left: V, right: V): number {
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

function isMap<V>(table: LookupTable<V>): table is ReadonlyMap<string, V> {
  return table instanceof Map;
}

function lookupEntry<V extends {} | null>(
  table: LookupTable<V>,
  key: string
): { found: true; value: V } | { found: false } {
  if (isMap(table)) {
    const value = table.get(key);
    return value === undefined ? { found: false } : { found: true, value };
  }
  return Object.prototype.hasOwnProperty.call(table, key) ? { found: true, value: table[key] } : { found: false };
}

function parseInteger(text: string): number {
  if (!INTEGER_LITERAL.test(text)) {
    throw new HuskerValueError(`Invalid integer: ${quote(text)}`, text);
  }
  return Number.parseInt(text, 10);
}

function parseFloatStrict(text: string): number {
  const trimmed = text.trim();
  const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
  if (Number.isNaN(parsed) && trimmed.toLowerCase() !== 'nan') {
    throw new HuskerValueError(`Invalid number: ${quote(text)}`, text);
  }
  return parsed;
}

function parseDecimal(text: string): Decimal {
  try {
    return new Decimal(text.trim());
  } catch (error) {
    throw new HuskerValueError(`Invalid decimal: ${quote(text)} (${error instanceof Error ? error.message : String(error)})`, text);
  }
}

function parseDateStrict(text: string, format: string): Date {
  const parsed = parseDate(text.trim(), format, DATE_REFERENCE);
  if (!isValid(parsed)) {
    throw new HuskerValueError(`${quote(text)} does not match date format '${format}'`, text);
  }
  return parsed;
}

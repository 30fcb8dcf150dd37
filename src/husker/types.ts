import type { JsonObject } from '../types/json.js';
import type { Husker } from './base.js';

/**
 * Predicate accepted wherever a spec is: filters a list by calling it on each child
 */
export type HuskerPredicate = (husker: Husker) => unknown;

/**
 * One argument of a `selection()` call: an XPath/CSS path, a regex, a JMESPath
 * expression, regex flags, or a predicate
 */
export type SpecArg = string | RegExp | HuskerPredicate;

/**
 * A spec as accepted by the `…Of` combinators: a single argument, or the
 * argument list of one `selection()` call
 */
export type Spec = SpecArg | readonly SpecArg[];

export type LookupTable<V> = Readonly<Record<string, V>> | ReadonlyMap<string, V>;

export type Replacement = string | ((match: string, ...groups: string[]) => string);

/**
 * Anything `husk()` knows how to wrap
 */
export type Huskable =
  | Husker
  | string
  | number
  | boolean
  | Node
  | JsonObject
  | null
  | undefined
  | Iterable<Huskable>;

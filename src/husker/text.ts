import { HuskerValueError } from '../core/errors.js';
import { normalizeSpaces, quote } from '../utils/text.js';
import { Husker, ListHusker, husk, requireValue } from './internal.js';
import type { Replacement, SpecArg } from './types.js';

const REGEX_FLAGS: ReadonlySet<string> = new Set(['i', 'm', 's', 'u']);

/**
 * A piece of text: searched with regular expressions
 *
 * @example
 * ```typescript
 * const text = husk('Order #123 shipped on 2024-05-01');
 * text.one(/#(\d+)/).int;                       // 123
 * text.one(String.raw`(\d{4})-(\d\d)-(\d\d)`).strs; // ['2024', '05', '01']
 * ```
 */
export class TextHusker extends Husker<string> {
  constructor(value: string) {
    super(requireValue(value, 'TextHusker'));
  }

  /**
   * Every match of `pattern`. With zero or one capturing group each result is
   * the match (or the group) as a node; with more groups it is the list of groups.
   */
  selection(pattern: string | RegExp, flags = ''): ListHusker {
    const regex = compilePattern(pattern, flags);
    const groups = countGroups(regex);
    const matches = Array.from(this.value.matchAll(regex));

    if (groups < 2) {
      return new ListHusker(matches.map((match) => husk(match[groups])));
    }
    return new ListHusker(matches.map((match) => new ListHusker(match.slice(1).map((group) => husk(group)))));
  }

  sub(pattern: string | RegExp, replacement: Replacement, flags = ''): TextHusker {
    const regex = compilePattern(pattern, flags);
    const replaced =
      typeof replacement === 'string' ? this.value.replace(regex, replacement) : this.value.replace(regex, replacement);
    return new TextHusker(replaced);
  }

  get text(): TextHusker {
    return this;
  }

  get multiline(): TextHusker {
    return this;
  }

  get str(): string {
    return this.value;
  }

  get raw(): string {
    return this.value;
  }

  get normalized(): TextHusker {
    return new TextHusker(normalizeSpaces(this.value));
  }

  get length(): number {
    return this.value.length;
  }

  lower(): TextHusker {
    return new TextHusker(this.value.toLowerCase());
  }

  upper(): TextHusker {
    return new TextHusker(this.value.toUpperCase());
  }

  trim(): TextHusker {
    return new TextHusker(this.value.trim());
  }

  split(separator: string | RegExp): ListHusker {
    return new ListHusker(this.value.split(separator).map((part) => new TextHusker(part)));
  }

  startsWith(prefix: string): boolean {
    return this.value.startsWith(prefix);
  }

  endsWith(suffix: string): boolean {
    return this.value.endsWith(suffix);
  }

  includes(search: string): boolean {
    return this.value.includes(search);
  }

  concat(other: TextHusker | string): TextHusker {
    return new TextHusker(this.value + (typeof other === 'string' ? other : other.str));
  }

  reprSpec(...spec: SpecArg[]): string {
    const [pattern, flags] = spec;
    if (typeof pattern === 'string') return `/${pattern}/${typeof flags === 'string' ? flags : ''}`;
    if (pattern instanceof RegExp) return String(pattern);
    return super.reprSpec(...spec);
  }

  toString(): string {
    return this.value;
  }
}

/**
 * Global regex for `pattern`. Flags only apply to string patterns; a RegExp
 * carries its own.
 */
function compilePattern(pattern: string | RegExp, flags: string): RegExp {
  if (pattern instanceof RegExp) {
    if (flags !== '') {
      throw new HuskerValueError(`Flags ${quote(flags)} cannot be combined with a RegExp; set them on ${pattern}`, flags);
    }
    return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  }

  const letters = new Set(flags.toLowerCase());
  for (const letter of letters) {
    if (!REGEX_FLAGS.has(letter)) {
      throw new HuskerValueError(`Unsupported regex flag ${quote(letter)}; use any of i, m, s, u`, flags);
    }
  }
  try {
    return new RegExp(pattern, `g${[...letters].join('')}`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HuskerValueError(`Invalid regular expression ${quote(pattern)}: ${reason}`, pattern);
  }
}

function countGroups(regex: RegExp): number {
  // An empty alternative always matches, exposing one slot per capturing group
  const empty = new RegExp(`${regex.source}|`, regex.flags.replace('g', '')).exec('');
  return empty ? empty.length - 1 : 0;
}

/**
 * Lenient JSON
 *
 * Repairs JavaScript object-literal text (as found in inline <script> blocks)
 * into strict JSON and parses it.
 */

import { HuskerValueError } from '../core/errors.js';
import type { JsonObject, JsonValue } from '../types/json.js';

const DOUBLE_QUOTED = String.raw`"(?:[^"\\]|\\[\s\S])*"`;
const SINGLE_QUOTED = String.raw`'(?:[^'\\]|\\[\s\S])*'`;
const BACKTICK_QUOTED = '`(?:[^`\\\\]|\\\\[\\s\\S])*`';
const COMMENT = String.raw`\/\/[^\n]*|\/\*[\s\S]*?\*\/`;

// Literals are matched first so that comment markers inside them survive
const JS_TOKEN = new RegExp(`(${DOUBLE_QUOTED}|${SINGLE_QUOTED}|${BACKTICK_QUOTED})|(?:${COMMENT})`, 'g');

// Whitespace and comments between structural characters
const GAP = String.raw`(?:\s|${COMMENT})*`;
const GAP_COMMENT = new RegExp(COMMENT, 'g');

// One alternation for every fix: a span consumed by one alternative is never revisited by another
const LENIENT_TOKEN = new RegExp(
  [
    `(${DOUBLE_QUOTED}|${SINGLE_QUOTED})`,
    `(?:${COMMENT})`,
    `([{,]${GAP})([\\w$]+)(\\s*:)`,
    `,(${GAP}[\\]}])`,
    `([[,])(?=${GAP},)`,
  ].join('|'),
  'g'
);

/**
 * Remove `//` and `/* *\/` comments from JavaScript source, leaving string
 * literals untouched.
 */
export function stripJsComments(js: string): string {
  return js.replace(JS_TOKEN, (_match: string, literal: string | undefined) => literal ?? '');
}

/**
 * Rewrite a single- or double-quoted JavaScript string literal as a JSON string.
 */
function toJsonString(literal: string): string {
  const body = literal
    .slice(1, -1)
    .replace(/\\x([0-9a-fA-F]{2})|\\([\s\S])|"/g, (match: string, hex: string | undefined, escaped: string | undefined) => {
      if (hex !== undefined) return `\\u00${hex}`;
      if (escaped !== undefined) return escaped === "'" ? "'" : match;
      return '\\"';
    });
  return `"${body}"`;
}

function stripGap(gap: string | undefined): string {
  return (gap ?? '').replace(GAP_COMMENT, '');
}

/**
 * Repair near-JSON text into strict JSON:
 *
 * - `//` and `/* *\/` comments are dropped
 * - `\xNN` escapes become `\u00NN`
 * - single-quoted strings become double-quoted
 * - bare object keys are quoted
 * - elided array elements become `null` (`[,,1]` → `[null,null,1]`)
 * - trailing commas before `]` or `}` are dropped
 */
export function repairJson(text: string): string {
  return text.replace(
    LENIENT_TOKEN,
    (
      _match: string,
      literal: string | undefined,
      keyPrefix: string | undefined,
      key: string | undefined,
      keySuffix: string | undefined,
      closing: string | undefined,
      elided: string | undefined
    ) => {
      if (literal !== undefined) return toJsonString(literal);
      if (key !== undefined) return `${stripGap(keyPrefix)}"${key}"${keySuffix ?? ''}`;
      if (closing !== undefined) return stripGap(closing);
      if (elided !== undefined) return `${elided}null`;
      return '';
    }
  );
}

/**
 * Parse JavaScript object-literal text as JSON.
 *
 * @example
 * ```typescript
 * lenientJsonParse("{a: 'x', b: [1,,3],}"); // { a: 'x', b: [1, null, 3] }
 * ```
 */
export function lenientJsonParse(text: string): JsonValue {
  const repaired = repairJson(text);
  try {
    const parsed: JsonValue = JSON.parse(repaired);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HuskerValueError(`Invalid JSON after repair: ${reason}`, repaired);
  }
}

/**
 * Copy of `value` with object keys in sorted order, for stable serialisation
 */
export function sortJsonKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortJsonKeys);
  if (value === null || typeof value !== 'object') return value;

  const sorted: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortJsonKeys(value[key]);
  }
  return sorted;
}

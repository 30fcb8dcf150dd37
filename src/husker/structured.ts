import jmespath from 'jmespath';
import { HuskerError, HuskerValueError } from '../core/errors.js';
import type { JsonValue } from '../types/json.js';
import { sortJsonKeys } from '../utils/json.js';
import { EMPTY_LIST_HUSKER, Husker, ListHusker, NULL_HUSKER, TextHusker, requireValue } from './internal.js';

/**
 * Decoded JSON-like data, searched with JMESPath expressions.
 *
 * Expressions without `[` are expected to select one value; expressions with a
 * projection or index (`items[*].name`, `items[0]`) select a list.
 *
 * @example
 * ```typescript
 * const data = husk({ items: [{ name: 'a' }, { name: 'b' }] });
 * data.all('items[*].name').strs; // ['a', 'b']
 * data.one('items').list.length;  // 2
 * ```
 */
export class StructuredHusker extends Husker<JsonValue> {
  constructor(value: JsonValue) {
    super(requireValue(value, 'StructuredHusker'));
  }

  /**
   * Node for one value inside the structure: Null for `null`, Text for strings
   */
  static child(value: JsonValue | undefined): Husker {
    if (value === null || value === undefined) return NULL_HUSKER;
    if (typeof value === 'string') return new TextHusker(value);
    return new StructuredHusker(value);
  }

  selection(path: string): ListHusker {
    let selected: JsonValue;
    try {
      selected = jmespath.search(this.value, path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HuskerValueError(`Invalid JMESPath '${path}': ${reason}`, path);
    }
    if (selected === null) return EMPTY_LIST_HUSKER;

    if (path.includes('[') && Array.isArray(selected)) {
      return new ListHusker(selected.map((item) => StructuredHusker.child(item)));
    }
    return new ListHusker([StructuredHusker.child(selected)]);
  }

  get(path: string): Husker {
    return this.one(path);
  }

  get list(): ListHusker {
    if (!Array.isArray(this.value)) {
      throw new HuskerError(`${this.id} holds ${describe(this.value)}, not a list`, [
        'Select the array itself, or use a projection such as `items[*]`.',
      ]);
    }
    return new ListHusker(this.value.map((item) => StructuredHusker.child(item)));
  }

  get text(): TextHusker {
    return new TextHusker(typeof this.value === 'string' ? this.value : JSON.stringify(sortJsonKeys(this.value)));
  }

  get multiline(): TextHusker {
    return new TextHusker(
      typeof this.value === 'string' ? this.value : JSON.stringify(sortJsonKeys(this.value), null, 4)
    );
  }

  get raw(): JsonValue {
    return this.value;
  }

  json(): Husker {
    return typeof this.value === 'string' ? super.json() : this;
  }
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}

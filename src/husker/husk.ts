import { HuskerValueError } from '../core/errors.js';
import type { JsonObject } from '../types/json.js';
import { isAttr, isCharacterData, isDocument, isDomNode, isElement } from './dom.js';
import {
  ElementHusker,
  Husker,
  ListHusker,
  NULL_HUSKER,
  ScalarHusker,
  StructuredHusker,
  TextHusker,
} from './internal.js';
import type { Huskable } from './types.js';

/**
 * Wrap any supported value in the matching node type.
 *
 * @example
 * ```typescript
 * husk('text');                    // TextHusker
 * husk(42);                        // ScalarHusker
 * husk(document);                  // ElementHusker on the document element
 * husk({ a: 1 });                  // StructuredHusker
 * husk(['a', 'b']);                // ListHusker of TextHuskers
 * husk(null);                      // NULL_HUSKER
 * ```
 */
export function husk(value: Huskable): Husker {
  if (value instanceof Husker) return value;
  if (value === null || value === undefined) return NULL_HUSKER;
  if (typeof value === 'string') return new TextHusker(value);
  if (typeof value === 'number' || typeof value === 'boolean') return new ScalarHusker(value);

  if (isBinary(value)) {
    throw new HuskerValueError(
      `Cannot husk binary data (${value.constructor.name}); decode it to a string with a known encoding first`,
      value
    );
  }
  if (isDomNode(value)) return huskNode(value);
  if (isIterable(value)) return new ListHusker(Array.from(value, (item) => husk(item)));
  if (isPlainObject(value)) return new StructuredHusker(value);

  throw new HuskerValueError(`Cannot husk ${describe(value)}`, value);
}

function huskNode(node: Node): Husker {
  if (isElement(node)) return new ElementHusker(node);
  if (isDocument(node)) {
    const root: Element | null = node.documentElement;
    return root === null ? NULL_HUSKER : new ElementHusker(root, { fullDocument: true });
  }
  if (isAttr(node)) return new TextHusker(node.value);
  if (isCharacterData(node)) return new TextHusker(node.data);
  throw new HuskerValueError(`Cannot husk DOM node ${node.nodeName} (type ${node.nodeType})`, node);
}

function isBinary(value: object): value is ArrayBuffer | ArrayBufferView {
  return value instanceof ArrayBuffer || ArrayBuffer.isView(value);
}

function isIterable(value: object): value is Iterable<Huskable> {
  return Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === 'function';
}

function isPlainObject(value: object): value is JsonObject {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) return `object of type ${value.constructor.name}`;
  return `value of type ${typeof value}`;
}

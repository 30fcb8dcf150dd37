import { HuskerValueError } from '../core/errors.js';
import type { FetchRequest, HttpMethod } from '../fetcher/fetcher.js';
import { ElementHusker, type Husker } from '../husker/index.js';

/**
 * Override value marking a submit button as the one clicked
 */
export const FORM_CLICK: unique symbol = Symbol('form.click');

export type FormValue = string | null | typeof FORM_CLICK;

/**
 * Field values to set, by name. A plain object or a sequence of pairs; names
 * the form lacks are appended in the order given, and `null` leaves a field out.
 */
export type FormOverride = Readonly<Record<string, FormValue>> | Iterable<readonly [string, FormValue]>;

export type FormField = [name: string, value: string];

const METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']);

/**
 * An HTML `<form>`, serialised the way a browser submits it
 *
 * @example
 * ```typescript
 * const form = new Form(page.one('form#search'));
 * const req = form.request({ q: 'lamps', go: FORM_CLICK }, 'https://example.com/');
 * const results = await fetcher.fetchHtml(req);
 * ```
 */
export class Form {
  readonly husker: ElementHusker;

  constructor(husker: Husker) {
    if (!(husker instanceof ElementHusker)) {
      throw new HuskerValueError(`Form needs an element node, got ${husker.id}`, husker);
    }
    this.husker = husker;
  }

  /**
   * Submitted `[name, value]` pairs, in document order
   */
  fields(override: FormOverride = {}): FormField[] {
    const overrides = overridePairs(override);
    const pending = new Map(overrides);
    const fields: FormField[] = [];

    for (const [node, type] of this.inputs()) {
      const name = node.attrib('name').str;
      if (!name) continue;

      let value: string | null;
      const overridden = pending.get(name);
      if (overridden === undefined) {
        value = fieldValue(node, type, false);
      } else {
        pending.delete(name);
        value = overridden === FORM_CLICK ? fieldValue(node, type, true) : overridden;
      }
      if (value !== null) fields.push([name, value]);
    }

    for (const [name, value] of overrides) {
      if (pending.has(name) && value !== FORM_CLICK && value !== null) fields.push([name, value]);
    }
    return fields;
  }

  /**
   * The request the form submits: fields go to `params` for GET and HEAD,
   * which the fetcher appends to the query string, and to `data` otherwise.
   * A relative action is resolved against `base`.
   */
  request(override: FormOverride = {}, base?: string): FetchRequest {
    const method = this.method();
    const action = this.husker.attrib('action').str ?? '';
    const url = base ? new URL(action, base).toString() : action;
    const values = Object.fromEntries(this.fields(override));

    return method === 'GET' || method === 'HEAD' ? { method, url, params: values } : { method, url, data: values };
  }

  private method(): HttpMethod {
    const method = (this.husker.attrib('method').str || 'GET').toUpperCase();
    if (!isHttpMethod(method)) {
      throw new HuskerValueError(`Unsupported form method '${method}'`, method);
    }
    return method;
  }

  private *inputs(): Generator<[ElementHusker, string]> {
    for (const node of this.husker.descendants()) {
      const tag = node.tag.str;
      if (tag === 'input') {
        yield [node, (node.attrib('type').str || 'text').toLowerCase()];
      } else if (tag === 'select') {
        yield [node, 'select'];
      }
    }
  }
}

function isHttpMethod(method: string): method is HttpMethod {
  return METHODS.has(method);
}

function isPairs(override: FormOverride): override is Iterable<readonly [string, FormValue]> {
  return Symbol.iterator in override;
}

function overridePairs(override: FormOverride): [string, FormValue][] {
  return isPairs(override) ? Array.from(override, ([name, value]): [string, FormValue] => [name, value]) : Object.entries(override);
}

/**
 * Value a field submits by default, or null when it submits nothing
 */
function fieldValue(node: ElementHusker, type: string, clicked: boolean): string | null {
  switch (type) {
    case 'radio':
    case 'checkbox':
      return node.raw.hasAttribute('checked') ? (node.attrib('value').str ?? 'on') : null;
    case 'submit':
    case 'image':
      return clicked ? (node.attrib('value').str ?? '') : null;
    case 'select': {
      const option = node.anyOf('.//option[@selected]', './/option');
      return option.exists() ? (option.attrib('value').str ?? '') : null;
    }
    case 'button':
      return null;
    default:
      // text, password, hidden, search and unknown types
      return node.attrib('value').str ?? '';
  }
}

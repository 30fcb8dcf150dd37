import {
  DEFAULT_PREVIEW_MAX_LINES,
  DEFAULT_PREVIEW_MAX_WIDTH,
  DEFAULT_PREVIEW_MIN_TRIM,
  NON_TEXT_TAGS,
  PARAGRAPH_BREAKING_TAGS,
} from '../constants.js';
import { HuskerAttributeNotFoundError, HuskerValueError } from '../core/errors.js';
import { stripJsComments } from '../utils/json.js';
import { collapseSpaces, normalizeSpaces } from '../utils/text.js';
import { isElement, isTextLike } from './dom.js';
import { Husker, ListHusker, NULL_HUSKER, TextHusker, husk, requireValue } from './internal.js';
import { evaluateXPath } from './xpath.js';

// Anything with a slash, an attribute axis, or a bare tag name is XPath; the rest is CSS
const XPATH_LIKE = /(?:^\.(?=\/)|\/|@|^\w+$)/;
const XPATH_PREFIX = /^(\.?)(\/{0,2})/;

export interface ElementHuskerOptions {
  /**
   * The element is the root of a parsed document: absolute paths search from it
   */
  fullDocument?: boolean;
}

export interface PreviewOptions {
  maxWidth?: number;
  maxLines?: number;
  minTrim?: number;
}

/**
 * One element of an HTML or XML document.
 *
 * Searches take XPath or CSS. Relative XPath is a descendant search, so
 * `row.all('td')` and `row.all('.//td')` are the same query.
 *
 * @example
 * ```typescript
 * const page = parseHtml(markup);
 * for (const row of page.all('table.results tr')) {
 *   const { name, link } = row.parts({ name: 'td[1]', link: 'a/@href' });
 * }
 * ```
 */
export class ElementHusker extends Husker<Element> implements Iterable<ElementHusker> {
  readonly isFullDocument: boolean;

  constructor(value: Element, options: ElementHuskerOptions = {}) {
    super(requireValue(value, 'ElementHusker'));
    this.isFullDocument = options.fullDocument ?? false;
  }

  *[Symbol.iterator](): Iterator<ElementHusker> {
    for (const child of Array.from(this.value.children)) {
      yield new ElementHusker(child);
    }
  }

  /**
   * Number of element children
   */
  get length(): number {
    return this.value.children.length;
  }

  get raw(): Element {
    return this.value;
  }

  selection(path: string): ListHusker {
    if (XPATH_LIKE.test(path)) {
      return new ListHusker(evaluateXPath(this.value, this.toXPath(path)).map((node) => husk(node)));
    }
    return new ListHusker(this.select(path).map((element) => new ElementHusker(element)));
  }

  /**
   * Attribute value as the parser decoded it, or `fallback` when absent
   */
  attrib(name: string, fallback: Husker = NULL_HUSKER): Husker {
    const value = this.value.getAttribute(name);
    return value === null ? fallback : new TextHusker(value);
  }

  attr(name: string): TextHusker {
    const value = this.value.getAttribute(name);
    if (value === null) throw new HuskerAttributeNotFoundError(name);
    return new TextHusker(value);
  }

  get text(): TextHusker {
    return new TextHusker(normalizeSpaces(this.value.textContent ?? ''));
  }

  /**
   * Text with line breaks and paragraphs kept, roughly as a browser renders it
   */
  get multiline(): TextHusker {
    return new TextHusker(multilineText(this.value));
  }

  /**
   * Source of the `<script>` elements inside this one
   */
  js(stripComments = true): TextHusker {
    const source = Array.from(this.value.getElementsByTagName('script'))
      .map((script) => (script.textContent ?? '').replace(/^\s*<!--/, '').replace(/-->\s*$/, ''))
      .join('\n');
    return new TextHusker(stripComments ? stripJsComments(source) : source);
  }

  get tag(): TextHusker {
    return new TextHusker(this.value.localName.toLowerCase());
  }

  get parent(): Husker {
    return husk(this.value.parentElement);
  }

  get next(): Husker {
    return husk(this.value.nextElementSibling);
  }

  get previous(): Husker {
    return husk(this.value.previousElementSibling);
  }

  get children(): ListHusker {
    return new ListHusker(this);
  }

  /**
   * Text before the first child element
   */
  get head(): Husker {
    let text = '';
    for (const node of Array.from(this.value.childNodes)) {
      if (!isTextLike(node)) break;
      text += node.data;
    }
    return text === '' ? NULL_HUSKER : new TextHusker(text);
  }

  /**
   * Text between the end of this element and the next sibling element
   */
  get tail(): Husker {
    let text = '';
    for (let node = this.value.nextSibling; node !== null && isTextLike(node); node = node.nextSibling) {
      text += node.data;
    }
    return text === '' ? NULL_HUSKER : new TextHusker(text);
  }

  /**
   * This element and every element below it, in document order
   */
  *descendants(): Generator<ElementHusker> {
    yield this;
    for (const element of Array.from(this.value.getElementsByTagName('*'))) {
      yield new ElementHusker(element);
    }
  }

  html(): string {
    return this.value.outerHTML;
  }

  /**
   * Bounded rendering of the markup, for error messages
   */
  reprValue(options: PreviewOptions = {}): string {
    const {
      maxWidth = DEFAULT_PREVIEW_MAX_WIDTH,
      maxLines = DEFAULT_PREVIEW_MAX_LINES,
      minTrim = DEFAULT_PREVIEW_MIN_TRIM,
    } = options;

    let lines = this.html()
      .split('\n')
      .map((line) => (line.length > maxWidth ? `${line.slice(0, maxWidth)}…` : line));

    if (lines.length >= maxLines + minTrim) {
      const half = Math.floor(maxLines / 2);
      lines = [
        ...lines.slice(0, half),
        '',
        `    [… ${lines.length - 2 * half} lines snipped …]`,
        '',
        ...lines.slice(-half),
      ];
    }

    const rule = '-'.repeat(maxWidth);
    return `element:\n\n${rule}\n${lines.join('\n').trim()}\n${rule}\n`;
  }

  /**
   * Bare paths search descendants; paths from the root stay absolute only on a
   * document root
   */
  private toXPath(path: string): string {
    return path.replace(
      XPATH_PREFIX,
      (_match: string, dot: string, slashes: string) => `${this.isFullDocument ? dot : '.'}${slashes || '//'}`
    );
  }

  /**
   * CSS matches, including this element itself. Below a document root the
   * selector runs on a detached copy, so its combinators only see this
   * element and its descendants.
   */
  private select(selector: string): Element[] {
    const scope = this.isFullDocument ? this.value : this.value.cloneNode(true);
    if (!isElement(scope)) return [];

    let matches: Element[];
    try {
      matches = Array.from(scope.querySelectorAll(selector));
      if (scope.matches(selector)) matches.unshift(scope);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HuskerValueError(`Invalid CSS selector '${selector}': ${reason}`, selector);
    }
    if (scope === this.value) return matches;

    const originals = new Map<Element, Element>([[scope, this.value]]);
    const copies = scope.getElementsByTagName('*');
    const elements = this.value.getElementsByTagName('*');
    for (let i = 0; i < copies.length; i++) {
      const copy = copies.item(i);
      const element = elements.item(i);
      if (copy && element) originals.set(copy, element);
    }
    return matches.flatMap((match) => {
      const element = originals.get(match);
      return element ? [element] : [];
    });
  }
}

/**
 * Paragraph-preserving text of an element tree: `<br>` is a line break,
 * block elements are separated by blank lines, `<pre>` keeps its newlines.
 */
function multilineText(root: Element): string {
  const parts: string[] = [];

  const visit = (element: Element, preformatted: boolean): void => {
    const tag = element.localName.toLowerCase();
    const breaksParagraph = PARAGRAPH_BREAKING_TAGS.has(tag);
    const inPre = preformatted || tag === 'pre';

    if (tag === 'br') parts.push('\n');
    if (breaksParagraph) parts.push('\n\n');

    if (!NON_TEXT_TAGS.has(tag)) {
      for (const node of Array.from(element.childNodes)) {
        if (isTextLike(node)) {
          parts.push(inPre ? node.data : collapseSpaces(node.data));
        } else if (isElement(node)) {
          visit(node, inPre);
        }
      }
    }

    if (breaksParagraph) parts.push('\n\n');
  };

  visit(root, false);

  return parts
    .join('')
    .replace(/\s+/g, (run) => {
      if (run.includes('\n\n')) return '\n\n';
      return run.includes('\n') ? '\n' : ' ';
    })
    .trim();
}

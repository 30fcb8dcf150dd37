import xpath from 'xpath';
import { EXSLT_REGEXP_NS } from '../constants.js';
import { HuskerValueError } from '../core/errors.js';
import { isDomNode, isHtmlDocument } from './dom.js';

/**
 * The part of the xpath package used here: parsed expressions evaluated with
 * custom functions and HTML-aware name matching.
 */
interface XPathResult {
  booleanValue(): boolean;
}

type XPathFunction = (context: unknown, ...args: unknown[]) => XPathResult;

interface XPathFunctionResolver {
  addFunction(namespace: string, localName: string, fn: XPathFunction): void;
  getFunction(localName: string, namespace: string): unknown;
}

interface XPathSelectOptions {
  node: Node;
  namespaces: Record<string, string>;
  functions: XPathFunctionResolver | Record<string, XPathFunction>;
  isHtml: boolean;
  allowAnyNamespaceForNoPrefix: boolean;
}

interface XPathEvaluator {
  select(options: XPathSelectOptions): unknown;
}

interface XPathEngine {
  parse(expression: string): XPathEvaluator;
  XBoolean: new (value: boolean) => XPathResult;
  FunctionResolver?: new () => XPathFunctionResolver;
}

const REGEX_FLAG = /[imsu]/g;

function isXPathEngine(candidate: object): candidate is XPathEngine {
  return (
    'parse' in candidate &&
    typeof candidate.parse === 'function' &&
    'XBoolean' in candidate &&
    typeof candidate.XBoolean === 'function'
  );
}

function loadEngine(module: object): XPathEngine {
  if (!isXPathEngine(module)) {
    throw new HuskerValueError('The installed xpath package does not expose parse() and XBoolean');
  }
  return module;
}

const engine = loadEngine(xpath);

function hasMethod<K extends string>(value: unknown, method: K): value is Record<K, (...args: unknown[]) => unknown> {
  return typeof value === 'object' && value !== null && method in value && typeof Reflect.get(value, method) === 'function';
}

/**
 * String value of a custom-function argument, which the evaluator passes
 * either as an unevaluated expression or as an XPath value
 */
function argumentString(context: unknown, argument: unknown): string {
  const value = hasMethod(argument, 'evaluate') ? argument.evaluate(context) : argument;
  if (hasMethod(value, 'stringValue')) return String(value.stringValue());
  return value === null || value === undefined ? '' : String(value);
}

/**
 * EXSLT `re:test(input, pattern, flags?)`
 */
function regexTest(context: unknown, ...args: unknown[]): XPathResult {
  const [input = '', pattern = '', flags = ''] = args.map((argument) => argumentString(context, argument));
  const jsFlags = (flags.match(REGEX_FLAG) ?? []).join('');
  return new engine.XBoolean(new RegExp(pattern, jsFlags).test(input));
}

/**
 * Built-in functions plus the EXSLT extensions. Releases without an exported
 * FunctionResolver take custom functions keyed by `{namespace}name`.
 */
function createFunctions(): XPathSelectOptions['functions'] {
  if (engine.FunctionResolver === undefined) {
    return { [`{${EXSLT_REGEXP_NS}}test`]: regexTest };
  }
  const resolver = new engine.FunctionResolver();
  resolver.addFunction(EXSLT_REGEXP_NS, 'test', regexTest);
  return resolver;
}

const functions = createFunctions();

/**
 * Nodes selected by `expression`, evaluated with `node` as the context node
 */
export function evaluateXPath(node: Node, expression: string): Node[] {
  let evaluator: XPathEvaluator;
  try {
    evaluator = engine.parse(expression);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HuskerValueError(`Invalid XPath '${expression}': ${reason}`, expression);
  }

  const selected = evaluator.select({
    node,
    namespaces: { re: EXSLT_REGEXP_NS },
    functions,
    isHtml: isHtmlDocument(node),
    allowAnyNamespaceForNoPrefix: true,
  });

  return Array.isArray(selected) ? selected.filter(isDomNode) : [];
}

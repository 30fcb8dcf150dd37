export {
  Husker,
  NullHusker,
  NULL_HUSKER,
  ListHusker,
  EMPTY_LIST_HUSKER,
  TextHusker,
  ScalarHusker,
  StructuredHusker,
  ElementHusker,
  husk,
} from './internal.js';
export type { ElementHuskerOptions, PreviewOptions } from './internal.js';
export { parseHtml, parseXml } from './document.js';
export type { ParseOptions } from './document.js';
export type { Huskable, HuskerPredicate, LookupTable, Replacement, Spec, SpecArg } from './types.js';

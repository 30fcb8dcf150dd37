/**
 * Global constants for Husker
 * Centralizes magic numbers and configuration defaults
 */

// Fetcher defaults
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_ENCODING = 'utf-8';
export const DEFAULT_MAX_REDIRECTS = 5;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:115.0) Gecko/20100101 Firefox/115.0';

// Error previews
export const DEFAULT_PREVIEW_MAX_WIDTH = 200;
export const DEFAULT_PREVIEW_MAX_LINES = 100;
export const DEFAULT_PREVIEW_MIN_TRIM = 10;

// Date parsing (date-fns format tokens)
export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd';
export const DEFAULT_DATETIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

// Stripped from datetime strings before parsing: fractional seconds, UTC offsets, Zulu marker
export const DATETIME_SUFFIX_PATTERN = /(?:\.\d+|[+-]\d\d?(?::\d\d?)?|Z)*$/;

// XPath extensions, usable as `re:test(text(), "pattern", "i")`
export const EXSLT_REGEXP_NS = 'http://exslt.org/regular-expressions';

// DOM node types (there is no global `Node` outside the browser)
export const ELEMENT_NODE = 1;
export const ATTRIBUTE_NODE = 2;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;

// Multiline text extraction
export const PARAGRAPH_BREAKING_TAGS: ReadonlySet<string> = new Set([
  'address', 'applet', 'blockquote', 'body', 'center', 'cite', 'dd', 'div', 'dl', 'dt', 'fieldset', 'form', 'frame',
  'frameset', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'head', 'hr', 'iframe', 'li', 'noscript', 'object', 'ol', 'p', 'table',
  'tbody', 'td', 'textarea', 'tfoot', 'th', 'thead', 'title', 'tr', 'ul',
]);
export const NON_TEXT_TAGS: ReadonlySet<string> = new Set(['script', 'style']);

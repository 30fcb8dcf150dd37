/**
 * husker
 *
 * Chainable, cardinality-checked queries over HTML/XML trees, text and
 * JSON-like data, plus the fetching and crawling around them.
 *
 * @example
 * ```typescript
 * import { Fetcher } from 'husker';
 *
 * const page = await new Fetcher().fetchHtml('https://example.com/catalogue');
 * const products = page.all('.product').map((item) => ({
 *   name: item.one('h2').str,
 *   price: item.one('.price').sub(/[^\d.]/, '').decimal,
 *   tags: item.selection('.tag').strs,
 * }));
 * ```
 */

export * from './husker/index.js';
export * from './core/errors.js';
export * from './constants.js';

export { Fetcher } from './fetcher/fetcher.js';
export type { FetcherOptions, FetchRequest, FetchedBody, HttpMethod } from './fetcher/fetcher.js';

export { Form, FORM_CLICK } from './forms/form.js';
export type { FormField, FormOverride, FormValue } from './forms/form.js';

export { Crawler } from './crawler/crawler.js';
export type { CrawlContext, CrawlerOptions, CrawlQuery, PageHandler } from './crawler/crawler.js';
export { QueueScheduler, StackScheduler } from './crawler/scheduler.js';
export type { Scheduler } from './crawler/scheduler.js';

export { normalizeSpaces, collapseSpaces } from './utils/text.js';
export { lenientJsonParse, repairJson, stripJsComments, sortJsonKeys } from './utils/json.js';
export { detectCharset, decodeText } from './utils/charset.js';
export type { CharsetInfo } from './utils/charset.js';
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types/json.js';

export { Logger, getLogger, setLogger } from './utils/logger.js';
export type { LogLevel, LoggerOptions } from './utils/logger.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export type { Logger as LoggerLike, LoggerLevel } from './types/logger.js';

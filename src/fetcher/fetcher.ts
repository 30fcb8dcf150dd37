import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import {
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '../constants.js';
import { HttpError, HuskerError, HuskerValueError, NetworkError } from '../core/errors.js';
import { parseHtml, parseXml, StructuredHusker, type ElementHusker, type Husker } from '../husker/index.js';
import type { Logger } from '../types/logger.js';
import { decodeText, detectCharset, isCharsetSupported } from '../utils/charset.js';
import { lenientJsonParse } from '../utils/json.js';
import { getLogger } from '../utils/logger.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * A request to fetch. `params` go to the query string; `data` is sent as an
 * urlencoded form body.
 */
export interface FetchRequest {
  url: string;
  method?: HttpMethod;
  params?: Record<string, string>;
  data?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface FetcherOptions {
  /**
   * @default a desktop Firefox user agent
   */
  userAgent?: string;
  /**
   * Headers and body timeout in milliseconds
   * @default 30000
   */
  timeout?: number;
  /**
   * Extra headers sent with every request
   */
  headers?: Record<string, string>;
  /**
   * Charset for every body, overriding headers and markup declarations
   */
  encoding?: string;
  /**
   * @default 5
   */
  maxRedirects?: number;
  /**
   * undici dispatcher (Agent, ProxyAgent, MockAgent…)
   * @default the global dispatcher
   */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * A fetched response body, before decoding
 */
export interface FetchedBody {
  url: string;
  status: number;
  contentType: string | null;
  body: Uint8Array;
}

const fetcherOptionsSchema = z.object({
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  timeout: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  headers: z.record(z.string()).default({}),
  encoding: z
    .string()
    .refine(isCharsetSupported, (encoding) => ({ message: `unsupported charset '${encoding}'` }))
    .optional(),
  maxRedirects: z.number().int().nonnegative().default(DEFAULT_MAX_REDIRECTS),
});

type FetcherConfig = z.infer<typeof fetcherOptionsSchema>;

/**
 * Fetches pages and hands them over as nodes
 *
 * @example
 * ```typescript
 * const fetcher = new Fetcher({ timeout: 10_000 });
 * const page = await fetcher.fetchHtml('https://example.com/');
 * console.log(page.one('h1').str);
 * ```
 */
export class Fetcher {
  private readonly config: FetcherConfig;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: FetcherOptions = {}) {
    const { dispatcher, logger, ...settings } = options;
    const parsed = fetcherOptionsSchema.safeParse(settings);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new HuskerValueError(`Invalid fetcher options: ${issues}`, settings);
    }
    this.config = parsed.data;
    this.dispatcher = dispatcher;
    this.logger = logger ?? getLogger();
  }

  /**
   * Raw body of a successful response, following redirects
   */
  async fetchBody(target: string | FetchRequest): Promise<FetchedBody> {
    const req = typeof target === 'string' ? { url: target } : target;
    const method = req.method ?? 'GET';
    const body = req.data ? new URLSearchParams(req.data).toString() : undefined;
    const headers: Record<string, string> = {
      'user-agent': this.config.userAgent,
      ...lowerCaseKeys(this.config.headers),
      ...lowerCaseKeys(req.headers ?? {}),
    };
    if (body !== undefined) headers['content-type'] = 'application/x-www-form-urlencoded';

    let currentUrl = withParams(req.url, req.params);
    let currentMethod: HttpMethod = method;
    let currentBody = body;

    for (let redirects = 0; ; redirects++) {
      const startTime = Date.now();
      this.logger.debug({ method: currentMethod, url: currentUrl }, 'request');

      const response = await this.send(currentUrl, currentMethod, headers, currentBody);
      const location = headerValue(response.headers, 'location');
      const isRedirect = response.statusCode >= 300 && response.statusCode < 400 && location !== null;

      if (isRedirect && redirects < this.config.maxRedirects) {
        await response.body.dump();
        this.logger.debug({ status: response.statusCode, url: currentUrl, location }, 'redirect');
        currentUrl = new URL(location, currentUrl).toString();
        // 303, and 301/302 after a POST, continue as GET without a body
        if (response.statusCode === 303 || (currentMethod === 'POST' && response.statusCode <= 302)) {
          currentMethod = 'GET';
          currentBody = undefined;
          delete headers['content-type'];
        }
        continue;
      }

      if (response.statusCode < 200 || response.statusCode >= 300) {
        await response.body.dump();
        this.logger.debug({ status: response.statusCode, url: currentUrl, durationMs: Date.now() - startTime }, 'response');
        throw new HttpError(currentUrl, response.statusCode);
      }

      const bytes = new Uint8Array(await response.body.arrayBuffer());
      this.logger.debug(
        { status: response.statusCode, url: currentUrl, durationMs: Date.now() - startTime, bytes: bytes.length },
        'response'
      );
      return {
        url: currentUrl,
        status: response.statusCode,
        contentType: headerValue(response.headers, 'content-type'),
        body: bytes,
      };
    }
  }

  /**
   * Decoded body. The charset comes from the `encoding` option, else the
   * response headers, BOM or markup; undecodable bytes throw.
   */
  async fetchText(target: string | FetchRequest): Promise<string> {
    const { text } = await this.fetchDecoded(target);
    return text;
  }

  async fetchHtml(target: string | FetchRequest): Promise<ElementHusker> {
    const { url, text } = await this.fetchDecoded(target);
    return parseHtml(text, { url });
  }

  async fetchXml(target: string | FetchRequest): Promise<ElementHusker> {
    const { url, text } = await this.fetchDecoded(target);
    return parseXml(text, { url });
  }

  /**
   * Body parsed as lenient JSON
   */
  async fetchJson(target: string | FetchRequest): Promise<Husker> {
    const { text } = await this.fetchDecoded(target);
    return StructuredHusker.child(lenientJsonParse(text));
  }

  private async fetchDecoded(target: string | FetchRequest): Promise<{ url: string; text: string }> {
    const fetched = await this.fetchBody(target);
    const charset = this.config.encoding ?? detectCharset(fetched.body, fetched.contentType).charset;
    return { url: fetched.url, text: decodeText(fetched.body, charset) };
  }

  private async send(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    body: string | undefined
  ): Promise<Dispatcher.ResponseData> {
    try {
      return await request(url, {
        method,
        headers,
        body,
        dispatcher: this.dispatcher,
        headersTimeout: this.config.timeout,
        bodyTimeout: this.config.timeout,
      });
    } catch (error) {
      if (error instanceof HuskerError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request to ${url} failed: ${message}`, url, errorCode(error));
    }
  }
}

function withParams(url: string, params: Record<string, string> | undefined): string {
  if (!params || Object.keys(params).length === 0) return url;
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.append(key, value);
  }
  return parsed.toString();
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
}

function headerValue(headers: Dispatcher.ResponseData['headers'], name: string): string | null {
  const value = headers[name];
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

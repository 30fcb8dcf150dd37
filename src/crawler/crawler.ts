import { SkipPageError } from '../core/errors.js';
import { Fetcher, type FetchRequest } from '../fetcher/fetcher.js';
import type { ElementHusker } from '../husker/index.js';
import type { Logger } from '../types/logger.js';
import { getLogger } from '../utils/logger.js';
import { StackScheduler, type Scheduler } from './scheduler.js';

export type PageHandler = (page: ElementHusker, context: CrawlContext) => void | Promise<void>;

/**
 * A page waiting to be visited, with the handler that will scrape it
 */
export interface CrawlQuery {
  request: FetchRequest;
  handler: PageHandler;
}

export interface CrawlContext {
  /**
   * Final URL of the page, after redirects
   */
  readonly url: string;
  readonly query: CrawlQuery;
  /**
   * Queue a link found on the page, resolved against its URL. The page's own
   * handler is used when none is given.
   */
  enqueue(target: string | FetchRequest, handler?: PageHandler): void;
}

export interface CrawlerOptions {
  fetcher?: Fetcher;
  /**
   * @default a StackScheduler (depth-first)
   */
  scheduler?: Scheduler<CrawlQuery>;
  logger?: Logger;
}

/**
 * Visits pages one at a time, letting each page's handler queue more
 *
 * @example
 * ```typescript
 * const crawler = new Crawler();
 * crawler.enqueue('https://example.com/list', (page, ctx) => {
 *   for (const href of page.all('a.item').attrib('href').strs) {
 *     if (href) ctx.enqueue(href, scrapeItem);
 *   }
 *   const next = page.some('a.next').attrib('href').str;
 *   if (next) ctx.enqueue(next);
 * });
 * const visited = await crawler.crawl();
 * ```
 */
export class Crawler {
  readonly scheduler: Scheduler<CrawlQuery>;
  private readonly fetcher: Fetcher;
  private readonly logger: Logger;

  constructor(options: CrawlerOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.fetcher = options.fetcher ?? new Fetcher({ logger: this.logger });
    this.scheduler = options.scheduler ?? new StackScheduler<CrawlQuery>();
  }

  enqueue(target: string | FetchRequest, handler: PageHandler): void {
    this.scheduler.add({ request: toRequest(target), handler });
  }

  /**
   * Visit queued pages until the scheduler is empty. A handler throwing
   * SkipPageError drops that page and the links it queued; any other error
   * stops the crawl.
   *
   * @returns the number of pages fetched
   */
  async crawl(): Promise<number> {
    let visited = 0;

    for (let query = this.scheduler.pop(); query !== undefined; query = this.scheduler.pop()) {
      const current = query;
      this.logger.debug({ url: current.request.url, pending: this.scheduler.size }, 'crawling');
      const page = await this.fetcher.fetchHtml(current.request);
      visited++;

      const url = page.raw.ownerDocument.URL;
      const batch: CrawlQuery[] = [];
      const context: CrawlContext = {
        url,
        query: current,
        enqueue: (target, handler = current.handler) => {
          batch.push({ request: toRequest(target, url), handler });
        },
      };

      try {
        await current.handler(page, context);
      } catch (error) {
        if (!(error instanceof SkipPageError)) throw error;
        this.logger.info({ url, reason: error.reason }, 'Skipped page');
        continue;
      }

      this.scheduler.addAll(batch);
    }

    return visited;
  }
}

/**
 * Absolute request for `target`; links found on a page carry it as referer
 */
function toRequest(target: string | FetchRequest, referer?: string): FetchRequest {
  const request = typeof target === 'string' ? { url: target } : target;
  if (referer === undefined) return request;
  return {
    ...request,
    url: new URL(request.url, referer).toString(),
    headers: { referer, ...request.headers },
  };
}

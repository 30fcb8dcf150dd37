import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { SkipPageError } from '../../src/core/errors.js';
import { Crawler, type PageHandler } from '../../src/crawler/crawler.js';
import { QueueScheduler } from '../../src/crawler/scheduler.js';
import { Fetcher } from '../../src/fetcher/fetcher.js';
import { silentLogger } from '../../src/types/logger.js';

const ORIGIN = 'https://shop.test';

function html(body: string): string {
  return `<html><body>${body}</body></html>`;
}

describe('Crawler', () => {
  let mockAgent: MockAgent;
  let fetcher: Fetcher;

  const serve = (path: string, body: string): void => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path, method: 'GET' })
      .reply(200, html(body), { headers: { 'content-type': 'text/html; charset=utf-8' } });
  };

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    fetcher = new Fetcher({ dispatcher: mockAgent, logger: silentLogger });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should visit queued pages and the links their handlers enqueue', async () => {
    serve(
      '/list',
      '<a class="item" href="/item/1">1</a><a class="item" href="item/2">2</a><a class="next" href="/list2">next</a>'
    );
    serve('/item/1', '<h1>Lamp</h1>');
    serve('/item/2', '<h1>Desk</h1>');
    serve('/list2', '<a class="item" href="/item/3">3</a>');
    serve('/item/3', '<h1>Chair</h1>');

    const visited: string[] = [];
    const names: (string | null)[] = [];
    const scrapeItem: PageHandler = (page, ctx) => {
      visited.push(ctx.url);
      names.push(page.one('h1').str);
    };
    const scrapeList: PageHandler = (page, ctx) => {
      visited.push(ctx.url);
      for (const href of page.all('a.item').attrib('href').strs) {
        if (href) ctx.enqueue(href, scrapeItem);
      }
      const next = page.some('a.next').attrib('href').str;
      if (next) ctx.enqueue(next);
    };

    const crawler = new Crawler({ fetcher, logger: silentLogger });
    crawler.enqueue(`${ORIGIN}/list`, scrapeList);

    expect(await crawler.crawl()).toBe(5);
    expect(visited).toEqual([
      `${ORIGIN}/list`,
      `${ORIGIN}/item/1`,
      `${ORIGIN}/item/2`,
      `${ORIGIN}/list2`,
      `${ORIGIN}/item/3`,
    ]);
    expect(names).toEqual(['Lamp', 'Desk', 'Chair']);
    expect(crawler.scheduler.empty).toBe(true);
  });

  it('should visit breadth-first with a queue scheduler', async () => {
    serve('/', '<a href="/a">a</a><a href="/b">b</a>');
    serve('/a', '<a href="/a/deep">deep</a>');
    serve('/b', '');
    serve('/a/deep', '');

    const visited: string[] = [];
    const follow: PageHandler = (page, ctx) => {
      visited.push(new URL(ctx.url).pathname);
      for (const href of page.selection('a').attrib('href').strs) {
        if (href) ctx.enqueue(href);
      }
    };

    const crawler = new Crawler({ fetcher, logger: silentLogger, scheduler: new QueueScheduler() });
    crawler.enqueue(`${ORIGIN}/`, follow);
    await crawler.crawl();

    expect(visited).toEqual(['/', '/a', '/b', '/a/deep']);
  });

  it('should send the page URL as referer for enqueued links', async () => {
    serve('/start', '<a href="/next">next</a>');
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/next', method: 'GET', headers: { referer: `${ORIGIN}/start` } })
      .reply(200, html('<p>done</p>'));

    const texts: (string | null)[] = [];
    const crawler = new Crawler({ fetcher, logger: silentLogger });
    crawler.enqueue(`${ORIGIN}/start`, (page, ctx) => {
      if (ctx.query.request.url.endsWith('/start')) ctx.enqueue('/next');
      else texts.push(page.one('p').str);
    });

    expect(await crawler.crawl()).toBe(2);
    expect(texts).toEqual(['done']);
  });

  it('should skip a page and drop its links when the handler throws SkipPageError', async () => {
    serve('/discontinued', '<h1>Old lamp</h1><a href="/never">never</a>');
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const crawler = new Crawler({ fetcher, logger });
    crawler.enqueue(`${ORIGIN}/discontinued`, (page, ctx) => {
      ctx.enqueue(page.one('a').attrib('href').str ?? '');
      throw new SkipPageError('discontinued');
    });

    expect(await crawler.crawl()).toBe(1);
    expect(logger.info).toHaveBeenCalledWith({ url: `${ORIGIN}/discontinued`, reason: 'discontinued' }, 'Skipped page');
    expect(crawler.scheduler.size).toBe(0);
  });

  it('should stop on any other handler error', async () => {
    serve('/broken', '<p>no heading</p>');

    const crawler = new Crawler({ fetcher, logger: silentLogger });
    crawler.enqueue(`${ORIGIN}/broken`, (page) => {
      page.one('h1');
    });

    await expect(crawler.crawl()).rejects.toThrow("ElementHusker found no matches for 'h1'");
  });

  it('should await asynchronous handlers', async () => {
    serve('/slow', '<p>slow</p>');

    const seen: (string | null)[] = [];
    const crawler = new Crawler({ fetcher, logger: silentLogger });
    crawler.enqueue(`${ORIGIN}/slow`, async (page) => {
      await Promise.resolve();
      seen.push(page.one('p').str);
    });

    await crawler.crawl();
    expect(seen).toEqual(['slow']);
  });
});

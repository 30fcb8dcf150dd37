import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { HttpError, HuskerValueError, NetworkError } from '../../src/core/errors.js';
import { Fetcher } from '../../src/fetcher/fetcher.js';
import { Form } from '../../src/forms/form.js';
import { parseHtml } from '../../src/husker/index.js';
import { silentLogger } from '../../src/types/logger.js';

const ORIGIN = 'https://shop.test';

describe('Fetcher', () => {
  let mockAgent: MockAgent;
  let fetcher: Fetcher;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    fetcher = new Fetcher({ dispatcher: mockAgent, logger: silentLogger });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  describe('fetching pages', () => {
    it('should parse HTML responses into a document node', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/page', method: 'GET' })
        .reply(200, '<html><body><h1>Catalogue</h1></body></html>', {
          headers: { 'content-type': 'text/html; charset=utf-8' },
        });

      const page = await fetcher.fetchHtml(`${ORIGIN}/page`);

      expect(page.one('h1').str).toBe('Catalogue');
      expect(page.raw.ownerDocument.URL).toBe(`${ORIGIN}/page`);
    });

    it('should parse XML responses', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/feed.xml', method: 'GET' })
        .reply(200, '<feed><entry>A</entry><entry>B</entry></feed>', {
          headers: { 'content-type': 'application/xml' },
        });

      const feed = await fetcher.fetchXml(`${ORIGIN}/feed.xml`);

      expect(feed.all('entry').strs).toEqual(['A', 'B']);
    });

    it('should parse JSON responses leniently', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/api/items', method: 'GET' })
        .reply(200, "{items: [{name: 'lamp'}, {name: 'desk'},]}", {
          headers: { 'content-type': 'application/json' },
        });

      const data = await fetcher.fetchJson(`${ORIGIN}/api/items`);

      expect(data.all('items[*].name').strs).toEqual(['lamp', 'desk']);
    });

    it('should return the raw body with its metadata', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/raw', method: 'GET' })
        .reply(200, 'abc', { headers: { 'content-type': 'text/plain' } });

      const fetched = await fetcher.fetchBody(`${ORIGIN}/raw`);

      expect(fetched.url).toBe(`${ORIGIN}/raw`);
      expect(fetched.status).toBe(200);
      expect(fetched.contentType).toBe('text/plain');
      expect(Array.from(fetched.body)).toEqual([97, 98, 99]);
    });
  });

  describe('requests', () => {
    it('should send the user agent and configured headers', async () => {
      fetcher = new Fetcher({
        dispatcher: mockAgent,
        logger: silentLogger,
        userAgent: 'test-agent',
        headers: { 'X-Token': 'test-secret' },
      });
      mockAgent
        .get(ORIGIN)
        .intercept({
          path: '/private',
          method: 'GET',
          headers: { 'user-agent': 'test-agent', 'x-token': 'test-secret' },
        })
        .reply(200, 'welcome');

      expect(await fetcher.fetchText(`${ORIGIN}/private`)).toBe('welcome');
    });

    it('should put params in the query string', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/search', method: 'GET', query: { q: 'desk lamp' } })
        .reply(200, 'results');

      expect(await fetcher.fetchText({ url: `${ORIGIN}/search`, params: { q: 'desk lamp' } })).toBe('results');
    });

    it('should submit GET form fields in the query string', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/search', method: 'GET', query: { lang: 'en', q: 'lamp' } })
        .reply(200, 'results');

      const form = new Form(parseHtml('<form action="/search?lang=en"><input name="q"></form>').one('form'));
      const request = form.request({ q: 'lamp' }, `${ORIGIN}/catalogue`);

      expect(request.url).toBe(`${ORIGIN}/search?lang=en`);
      expect(await fetcher.fetchText(request)).toBe('results');
    });

    it('should send data as an urlencoded body', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({
          path: '/login',
          method: 'POST',
          body: 'user=test-user&password=test-secret',
          headers: { 'content-type': 'application/x-www-form-urlencoded' },
        })
        .reply(200, 'logged in');

      const text = await fetcher.fetchText({
        url: `${ORIGIN}/login`,
        method: 'POST',
        data: { user: 'test-user', password: 'test-secret' },
      });

      expect(text).toBe('logged in');
    });

    it('should log requests and responses at debug level', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      fetcher = new Fetcher({ dispatcher: mockAgent, logger });
      mockAgent.get(ORIGIN).intercept({ path: '/page', method: 'GET' }).reply(200, 'ok');

      await fetcher.fetchText(`${ORIGIN}/page`);

      expect(logger.debug).toHaveBeenCalledWith({ method: 'GET', url: `${ORIGIN}/page` }, 'request');
      expect(logger.debug).toHaveBeenLastCalledWith(
        expect.objectContaining({ status: 200, url: `${ORIGIN}/page`, bytes: 2 }),
        'response'
      );
    });
  });

  describe('redirects', () => {
    it('should follow redirects and report the final URL', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/old', method: 'GET' }).reply(301, '', { headers: { location: '/new' } });
      pool.intercept({ path: '/new', method: 'GET' }).reply(200, 'moved');

      const fetched = await fetcher.fetchBody(`${ORIGIN}/old`);

      expect(fetched.url).toBe(`${ORIGIN}/new`);
      expect(new TextDecoder().decode(fetched.body)).toBe('moved');
    });

    it('should continue a redirected POST as GET', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/order', method: 'POST' }).reply(302, '', { headers: { location: '/thanks' } });
      pool.intercept({ path: '/thanks', method: 'GET' }).reply(200, 'thank you');

      const text = await fetcher.fetchText({ url: `${ORIGIN}/order`, method: 'POST', data: { sku: '42' } });

      expect(text).toBe('thank you');
    });

    it('should stop after maxRedirects', async () => {
      fetcher = new Fetcher({ dispatcher: mockAgent, logger: silentLogger, maxRedirects: 1 });
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/a', method: 'GET' }).reply(302, '', { headers: { location: '/b' } });
      pool.intercept({ path: '/b', method: 'GET' }).reply(302, '', { headers: { location: '/c' } });

      await expect(fetcher.fetchText(`${ORIGIN}/a`)).rejects.toMatchObject({
        name: 'HttpError',
        status: 302,
        url: `${ORIGIN}/b`,
      });
    });
  });

  describe('decoding', () => {
    it('should use the charset from the Content-Type header', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/latin', method: 'GET' })
        .reply(200, Buffer.from([0x63, 0x61, 0x66, 0xe9]), {
          headers: { 'content-type': 'text/plain; charset=iso-8859-1' },
        });

      expect(await fetcher.fetchText(`${ORIGIN}/latin`)).toBe('café');
    });

    it('should let the encoding option override detection', async () => {
      fetcher = new Fetcher({ dispatcher: mockAgent, logger: silentLogger, encoding: 'latin1' });
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/latin', method: 'GET' })
        .reply(200, Buffer.from([0x63, 0x61, 0x66, 0xe9]), {
          headers: { 'content-type': 'text/plain; charset=utf-8' },
        });

      expect(await fetcher.fetchText(`${ORIGIN}/latin`)).toBe('café');
    });

    it('should reject bytes that are invalid in the detected charset', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/broken', method: 'GET' })
        .reply(200, Buffer.from([0x63, 0x61, 0x66, 0xe9]), { headers: { 'content-type': 'text/plain' } });

      await expect(fetcher.fetchText(`${ORIGIN}/broken`)).rejects.toThrow(HuskerValueError);
    });
  });

  describe('errors', () => {
    it('should throw HttpError for non-2xx responses', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/missing', method: 'GET' }).reply(404, 'not here');

      const promise = fetcher.fetchText(`${ORIGIN}/missing`);

      await expect(promise).rejects.toThrow(HttpError);
      await expect(promise).rejects.toMatchObject({
        status: 404,
        message: `Request to ${ORIGIN}/missing failed with status code 404`,
      });
    });

    it('should wrap transport failures in NetworkError', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/down', method: 'GET' }).replyWithError(new Error('boom'));

      const promise = fetcher.fetchText(`${ORIGIN}/down`);

      await expect(promise).rejects.toThrow(NetworkError);
      await expect(promise).rejects.toThrow(`Request to ${ORIGIN}/down failed: boom`);
    });
  });

  describe('options', () => {
    it('should reject invalid options', () => {
      expect(() => new Fetcher({ timeout: -1 })).toThrow(HuskerValueError);
      expect(() => new Fetcher({ timeout: -1 })).toThrow(/^Invalid fetcher options: timeout: /);
    });

    it('should reject unsupported encodings', () => {
      expect(() => new Fetcher({ encoding: 'klingon' })).toThrow(
        "Invalid fetcher options: encoding: unsupported charset 'klingon'"
      );
    });
  });
});

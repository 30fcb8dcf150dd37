import { JSDOM } from 'jsdom';
import { HuskerValueError } from '../core/errors.js';
import { ElementHusker } from './internal.js';

export interface ParseOptions {
  /**
   * Document URL, used to resolve relative links
   */
  url?: string;
}

/**
 * Parse an HTML page into a document-rooted node. Scripts are not run.
 */
export function parseHtml(markup: string, options: ParseOptions = {}): ElementHusker {
  const { window } = new JSDOM(markup, { url: options.url });
  return new ElementHusker(window.document.documentElement, { fullDocument: true });
}

/**
 * Parse an XML document into a document-rooted node
 */
export function parseXml(markup: string, options: ParseOptions = {}): ElementHusker {
  let dom: JSDOM;
  try {
    dom = new JSDOM(markup, { url: options.url, contentType: 'text/xml' });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HuskerValueError(`Invalid XML: ${reason}`, markup);
  }
  return new ElementHusker(dom.window.document.documentElement, { fullDocument: true });
}

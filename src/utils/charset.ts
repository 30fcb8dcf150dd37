/**
 * Charset Detection and Decoding
 *
 * Detects the character encoding of a fetched body from:
 * - Content-Type header
 * - BOM (Byte Order Mark)
 * - XML declaration
 * - HTML meta tags
 *
 * Decoding is strict: bytes that are invalid in the chosen charset throw
 * instead of being replaced.
 */

import { DEFAULT_ENCODING } from '../constants.js';
import { HuskerValueError } from '../core/errors.js';

export interface CharsetInfo {
  /** Detected charset name (normalized to lowercase) */
  charset: string;
  /** Source of detection */
  source: 'header' | 'bom' | 'xml' | 'html-meta' | 'default';
}

const charsetAliases: Record<string, string> = {
  utf8: 'utf-8',
  utf_8: 'utf-8',
  utf16: 'utf-16le',
  utf16le: 'utf-16le',
  utf16be: 'utf-16be',
  latin1: 'iso-8859-1',
  'latin-1': 'iso-8859-1',
  iso8859_1: 'iso-8859-1',
  cp1252: 'windows-1252',
  'us-ascii': 'windows-1252',
  ascii: 'windows-1252',
  sjis: 'shift_jis',
  'shift-jis': 'shift_jis',
};

/**
 * Normalize charset name to the label TextDecoder expects
 */
export function normalizeCharset(charset: string): string {
  const lower = charset.toLowerCase().trim();
  return charsetAliases[lower] ?? lower;
}

/**
 * Detect charset from Content-Type header
 *
 * @example
 * detectFromContentType('text/html; charset=utf-8') // 'utf-8'
 * detectFromContentType('application/json') // null
 */
export function detectFromContentType(contentType: string | null | undefined): string | null {
  if (!contentType) return null;
  const match = contentType.match(/charset=["']?([^"';\s]+)["']?/i);
  return match ? normalizeCharset(match[1]) : null;
}

/**
 * Detect charset from BOM: EF BB BF (UTF-8), FE FF (UTF-16 BE), FF FE (UTF-16 LE)
 */
export function detectFromBOM(buffer: Uint8Array): string | null {
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) return 'utf-8';
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) return 'utf-16be';
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) return 'utf-16le';
  return null;
}

/**
 * Detect charset from XML declaration
 *
 * @example
 * detectFromXMLDeclaration('<?xml version="1.0" encoding="ISO-8859-1"?>') // 'iso-8859-1'
 */
export function detectFromXMLDeclaration(content: string): string | null {
  const match = content.match(/<\?xml[^?]*encoding=["']([^"']+)["'][^?]*\?>/i);
  return match ? normalizeCharset(match[1]) : null;
}

/**
 * Detect charset from `<meta charset>` or `<meta http-equiv="Content-Type">`
 * within the first kilobyte
 */
export function detectFromHTMLMeta(html: string): string | null {
  const head = html.slice(0, 1024);

  const charsetMeta = head.match(/<meta[^>]+charset=["']?([^"'>\s;]+)["']?/i);
  return charsetMeta ? normalizeCharset(charsetMeta[1]) : null;
}

/**
 * Detect charset from response data
 *
 * Priority:
 * 1. Content-Type header
 * 2. BOM
 * 3. XML declaration
 * 4. HTML meta tags
 * 5. Default (utf-8)
 */
export function detectCharset(buffer: Uint8Array, contentType?: string | null): CharsetInfo {
  const headerCharset = detectFromContentType(contentType);
  if (headerCharset) return { charset: headerCharset, source: 'header' };

  const bomCharset = detectFromBOM(buffer);
  if (bomCharset) return { charset: bomCharset, source: 'bom' };

  // Markup declarations are ASCII in every charset we can detect
  const preview = new TextDecoder('utf-8', { fatal: false }).decode(buffer.subarray(0, 1024));

  if (preview.trimStart().startsWith('<?xml')) {
    const xmlCharset = detectFromXMLDeclaration(preview);
    if (xmlCharset) return { charset: xmlCharset, source: 'xml' };
  }

  const metaCharset = detectFromHTMLMeta(preview);
  if (metaCharset) return { charset: metaCharset, source: 'html-meta' };

  return { charset: DEFAULT_ENCODING, source: 'default' };
}

export function isCharsetSupported(charset: string): boolean {
  try {
    new TextDecoder(normalizeCharset(charset));
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode `buffer` in `charset`, dropping a leading BOM
 */
export function decodeText(buffer: Uint8Array, charset: string): string {
  const label = normalizeCharset(charset);
  if (!isCharsetSupported(label)) {
    throw new HuskerValueError(`Unsupported charset '${charset}'`, charset);
  }

  try {
    return new TextDecoder(label, { fatal: true }).decode(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HuskerValueError(`Body is not valid ${label}: ${reason}`, charset);
  }
}

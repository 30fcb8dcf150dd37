/**
 * Collapse every run of whitespace to a single space and trim the ends.
 */
export function normalizeSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collapse whitespace runs inside a text fragment, leaving the edges as they are.
 * Used where neighbouring fragments are concatenated and trimmed later.
 */
export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ');
}

/**
 * Quote a value the way error messages render it: strings in single quotes,
 * everything else through `String()`.
 */
export function quote(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value instanceof RegExp) return String(value);
  if (typeof value === 'function') return `<function ${value.name || 'anonymous'}>`;
  if (Array.isArray(value)) return `(${value.map(quote).join(', ')})`;
  return String(value);
}

/**
 * Base class for every error raised by husker.
 *
 * Carries a list of human-readable suggestions, the same way across the
 * query core and the fetch/crawl collaborators.
 */
export class HuskerError extends Error {
  suggestions: string[];

  constructor(message: string, suggestions: string[] = []) {
    super(message);
    this.name = 'HuskerError';
    this.suggestions = suggestions;
  }
}

/**
 * A search that required at least one result found none
 */
export class HuskerMismatchError extends HuskerError {
  constructor(message: string) {
    super(message, [
      'Check the spec against the document preview included in the message.',
      'Use some()/any() instead if the value is optional.',
    ]);
    this.name = 'HuskerMismatchError';
  }
}

/**
 * A search that allowed at most one result found several
 */
export class HuskerNotUniqueError extends HuskerError {
  count?: number;

  constructor(message: string, count?: number) {
    super(message, [
      'Make the spec more specific so that it matches a single node.',
      'Use first()/last()/any() if picking one of several matches is intended.',
    ]);
    this.name = 'HuskerNotUniqueError';
    this.count = count;
  }
}

/**
 * More than one of the specs given to oneOf()/someOf() matched
 */
export class HuskerMultipleSpecMatchError extends HuskerNotUniqueError {
  constructor(message: string) {
    super(message);
    this.name = 'HuskerMultipleSpecMatchError';
    this.suggestions = [
      'Make the alternative specs mutually exclusive.',
      'Use firstOf()/anyOf() to take the first spec that matches.',
    ];
  }
}

/**
 * Strict attribute access found no such attribute
 */
export class HuskerAttributeNotFoundError extends HuskerError {
  attribute: string;

  constructor(attribute: string) {
    super(`'${attribute}'`, [`Use attrib('${attribute}') to get Null instead of an error when the attribute is optional.`]);
    this.name = 'HuskerAttributeNotFoundError';
    this.attribute = attribute;
  }
}

/**
 * lookup() found no entry for the text and no fallback was given
 */
export class HuskerLookupError extends HuskerError {
  key: unknown;

  constructor(key: unknown) {
    super(typeof key === 'string' ? `'${key}'` : String(key), [
      'Add the missing key to the lookup table.',
      'Pass a fallback value as the second argument to lookup().',
    ]);
    this.name = 'HuskerLookupError';
    this.key = key;
  }
}

/**
 * A value had an unsupported shape or could not be converted
 */
export class HuskerValueError extends HuskerError {
  value?: unknown;

  constructor(message: string, value?: unknown) {
    super(message, [
      'Decode binary data to a string before husking it.',
      'Check that the text matches the expected format.',
    ]);
    this.name = 'HuskerValueError';
    this.value = value;
  }
}

/**
 * An operation was invoked on a node variant that does not support it
 */
export class HuskerUnsupportedError extends HuskerError {
  variant: string;
  operation: string;

  constructor(variant: string, operation: string, hint?: string) {
    super(`${variant} does not support ${operation}`, hint ? [hint] : []);
    this.name = 'HuskerUnsupportedError';
    this.variant = variant;
    this.operation = operation;
  }
}

/**
 * A fetched URL answered with a non-2xx status
 */
export class HttpError extends HuskerError {
  status: number;
  statusText: string;
  url: string;

  constructor(url: string, status: number, statusText = '') {
    super(
      `Request to ${url} failed with status code ${status}${statusText ? ` ${statusText}` : ''}`,
      [
        'Check that the URL is correct and publicly reachable.',
        'Inspect the response body for details from the server.',
      ]
    );
    this.name = 'HttpError';
    this.url = url;
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * The transport failed before a response was received
 */
export class NetworkError extends HuskerError {
  code?: string;
  url: string;

  constructor(message: string, url: string, code?: string) {
    super(message, [
      'Confirm the host is reachable from this environment.',
      'Check proxy/VPN/firewall settings that might block the request.',
    ]);
    this.name = 'NetworkError';
    this.url = url;
    this.code = code;
  }
}

/**
 * Thrown by a crawl handler to skip the current page without aborting the crawl
 */
export class SkipPageError extends HuskerError {
  reason: string;

  constructor(reason: string) {
    super(reason);
    this.name = 'SkipPageError';
    this.reason = reason;
  }
}

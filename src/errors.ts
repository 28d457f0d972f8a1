// Error taxonomy for the movie log.
//
// Errors are data: every failure the core can predict is a MovieError value
// returned inside a result union. Only the external lookup throws, and it
// throws ExternalServiceError so callers can tell it apart from a bug.

export type MovieError =
  | { readonly kind: 'parse-error'; readonly message: string; readonly file?: string }
  | { readonly kind: 'schema-invariant-violation'; readonly message: string; readonly file?: string }
  | { readonly kind: 'invalid-field'; readonly field: string; readonly message: string }
  | { readonly kind: 'not-found'; readonly title: string; readonly year: number }
  | { readonly kind: 'no-match'; readonly query: string; readonly yearHint?: number };

/** Network, auth or protocol failure in the metadata service */
export class ExternalServiceError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalServiceError';
    this.status = status;
  }
}

export function parseError(message: string, file?: string): MovieError {
  return file === undefined ? { kind: 'parse-error', message } : { kind: 'parse-error', message, file };
}

export function invariantViolation(message: string): MovieError {
  return { kind: 'schema-invariant-violation', message };
}

export function invalidField(field: string, message: string): MovieError {
  return { kind: 'invalid-field', field, message };
}

/** Attach the originating file to a load-time error */
export function inFile(error: MovieError, file: string): MovieError {
  if (error.kind === 'parse-error' || error.kind === 'schema-invariant-violation') {
    return { ...error, file };
  }
  // Field errors surface while decoding a document, so they are parse errors there
  if (error.kind === 'invalid-field') {
    return { kind: 'parse-error', message: `${error.field}: ${error.message}`, file };
  }
  return error;
}

/** Render any MovieError as one line for logs and tool responses */
export function describeError(error: MovieError): string {
  switch (error.kind) {
    case 'parse-error':
      return error.file ? `Parse error in ${error.file}: ${error.message}` : `Parse error: ${error.message}`;
    case 'schema-invariant-violation':
      return error.file
        ? `Schema invariant violation in ${error.file}: ${error.message}`
        : `Schema invariant violation: ${error.message}`;
    case 'invalid-field':
      return `Invalid ${error.field}: ${error.message}`;
    case 'not-found':
      return `Not found: "${error.title}" (${error.year})`;
    case 'no-match':
      return error.yearHint === undefined
        ? `No match for "${error.query}"`
        : `No match for "${error.query}" (${error.yearHint})`;
  }
}

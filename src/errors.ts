// src/errors.ts

export type ScrapeErrorKind = 'fetch' | 'read' | 'extraction' | 'rewrite';

/**
 * Base class for failures raised inside a scrape stage. The pipeline turns these
 * into the `error` string of the returned record.
 */
export abstract class ScrapeError extends Error {
  abstract readonly kind: ScrapeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Transport-level failure of the page request. `causes` holds the messages of the
 * underlying error chain, outermost first.
 */
export class FetchError extends ScrapeError {
  readonly kind = 'fetch';
  readonly causes: string[];
  readonly statusCode?: number;

  constructor(message: string, causes: string[] = [], statusCode?: number) {
    super([`Failed to fetch URL: ${message}`, ...causes].join(' => '));
    this.causes = causes;
    this.statusCode = statusCode;
  }
}

export class ReadError extends ScrapeError {
  readonly kind = 'read';

  constructor(message: string) {
    super(`Failed to read response body: ${message}`);
  }
}

export class ExtractionError extends ScrapeError {
  readonly kind = 'extraction';

  constructor(message: string = 'Could not extract meaningful content from the page.') {
    super(message);
  }
}

export class RewriteError extends ScrapeError {
  readonly kind = 'rewrite';
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Walks `Error.cause` links below `error` and returns their messages. Stops on
 * cycles and on causes that repeat the previous message.
 */
export function collectCauses(error: unknown): string[] {
  const causes: string[] = [];
  const seen = new Set<unknown>([error]);
  let current: unknown = error instanceof Error ? error.cause : undefined;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const message = getErrorMessage(current);
    if (message !== causes[causes.length - 1]) {
      causes.push(message);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return causes;
}

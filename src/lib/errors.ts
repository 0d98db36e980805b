import type { Repository } from '../types';

export type LinkParseErrorKind = 'malformed_link' | 'missing_relation';

/**
 * A Link header that could not be parsed. The whole header is rejected;
 * there is never a partially parsed result.
 */
export class LinkParseError extends Error {
  readonly kind: LinkParseErrorKind;
  readonly item: string;

  constructor(kind: LinkParseErrorKind, item: string) {
    super(
      kind === 'malformed_link'
        ? `Link item has no <url> part: ${item.trim()}`
        : `Link item has no rel attribute: ${item.trim()}`
    );
    this.name = 'LinkParseError';
    this.kind = kind;
    this.item = item;
  }
}

/**
 * A page body that did not decode into the expected items
 */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export type FetchErrorKind = 'transport' | 'http_status' | 'bad_pagination' | 'bad_payload';

interface FetchErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Fatal failure of a (possibly multi-page) fetch. No partial results are
 * returned alongside it.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, options: FetchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = options.status;
  }
}

/**
 * A single repository that failed to clone. Reported per repository and
 * never stops the remaining clones.
 */
export class CloneError extends Error {
  readonly repository: Repository;
  readonly exitCode: number | null;

  constructor(repository: Repository, message: string, options: { exitCode?: number | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CloneError';
    this.repository = repository;
    this.exitCode = options.exitCode ?? null;
  }
}

/**
 * Renders any thrown value as a one-line diagnostic
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

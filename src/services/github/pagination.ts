import { FetchError, LinkParseError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { LinkHeader, PageDecoder } from '../../types';
import type { GithubClient } from './client';
import { findRelation, parseLinkHeader } from './linkHeader';

export type QueryParams = Record<string, string | number>;

export interface FetchAllOptions {
  /**
   * Maximum number of requests before the fetch is aborted with
   * `bad_pagination`. Unset means the server's `next` links are followed
   * for as long as they appear, so a server that links back to a page it
   * already served keeps the loop going.
   */
  maxPages?: number;
}

/**
 * Merges `params` into the query string of `url`. Parameters already on the
 * URL are kept; a key present in both takes the value from `params`.
 */
export function withQueryParams(url: string, params: QueryParams): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new FetchError('transport', url, `Invalid request URL: ${url}`, { cause: error });
  }
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.set(key, String(value));
  }
  return parsed.toString();
}

function readLinkHeader(raw: string, url: string): LinkHeader {
  try {
    return parseLinkHeader(raw);
  } catch (error) {
    if (error instanceof LinkParseError) {
      throw new FetchError('bad_pagination', url, `Malformed Link header from ${url}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

// Absolute URL of the `next` relation, or null on the last page
function resolveNextUrl(rawLink: string, pageUrl: string): string | null {
  const next = findRelation(readLinkHeader(rawLink, pageUrl), 'next');
  if (!next) return null;
  try {
    return new URL(next.targetUrl, pageUrl).toString();
  } catch (error) {
    throw new FetchError('bad_pagination', pageUrl, `Invalid next link from ${pageUrl}: ${next.targetUrl}`, { cause: error });
  }
}

/**
 * Fetches every page of a list endpoint by following `Link: rel="next"`
 *
 * Requests are strictly sequential. Items keep page-arrival order and each
 * page's internal order. Any failure (transport, non-2xx, malformed Link
 * header, undecodable body) aborts the whole fetch; partial lists are never
 * returned.
 *
 * @param client - Authenticated client issuing the GETs
 * @param startUrl - First page URL
 * @param queryParams - Merged into the first URL only; later URLs come from the server verbatim
 * @param decodePage - Turns one response body into items; throwing marks the payload bad
 * @throws {FetchError}
 * @example
 * ```typescript
 * const repos = await fetchAll(client, org.reposUrl, { per_page: 100 }, decodeRepositories('ssh'));
 * ```
 */
export async function fetchAll<T>(
  client: GithubClient,
  startUrl: string,
  queryParams: QueryParams,
  decodePage: PageDecoder<T>,
  options: FetchAllOptions = {}
): Promise<T[]> {
  let currentUrl = withQueryParams(startUrl, queryParams);
  const items: T[] = [];
  let requests = 0;

  for (;;) {
    const pageUrl = currentUrl;
    if (options.maxPages !== undefined && requests >= options.maxPages) {
      throw new FetchError(
        'bad_pagination',
        pageUrl,
        `Pagination exceeded ${options.maxPages} pages; refusing to follow ${pageUrl}`
      );
    }

    logger.debug('Fetching page', { url: pageUrl, page: requests + 1 });
    const res = await client.get(pageUrl);
    requests++;

    let hasMorePages = false;
    const rawLink = res.headers.get('link');
    if (rawLink !== null) {
      let next: string | null;
      try {
        next = resolveNextUrl(rawLink, pageUrl);
      } catch (error) {
        await res.body?.cancel();
        throw error;
      }
      if (next !== null) {
        currentUrl = next;
        hasMorePages = true;
      }
    }

    let body: string;
    try {
      body = await res.text();
    } catch (error) {
      throw new FetchError('transport', pageUrl, `Failed to read response body from ${pageUrl}`, { cause: error });
    }

    let pageItems: T[];
    try {
      pageItems = decodePage(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError('bad_payload', pageUrl, `Unexpected payload from ${pageUrl}: ${reason}`, { cause: error });
    }
    items.push(...pageItems);

    if (!hasMorePages) {
      logger.debug('Pagination complete', { url: startUrl, pages: requests, items: items.length });
      return items;
    }
  }
}

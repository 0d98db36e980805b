import { LinkParseError } from '../../lib/errors';
import type { LinkHeader, LinkItem } from '../../types';

const LINK_URL_PATTERN = /<(.+)>/;
const LINK_REL_PATTERN = /rel="?([^"]+)"?/;

function onlyCapture(pattern: RegExp, value: string): string | undefined {
  const match = pattern.exec(value);
  return match?.[1];
}

function parseItem(item: string): LinkItem {
  const [urlPart, ...attributes] = item.split(';');

  const targetUrl = onlyCapture(LINK_URL_PATTERN, urlPart);
  if (targetUrl === undefined) {
    throw new LinkParseError('malformed_link', item);
  }

  for (const attribute of attributes) {
    const relation = onlyCapture(LINK_REL_PATTERN, attribute);
    if (relation !== undefined) {
      return { targetUrl, relation };
    }
  }

  throw new LinkParseError('missing_relation', item);
}

/**
 * Parses an RFC 5988 `Link` header value
 *
 * Items are separated by `,` and attributes by `;`. Every item needs an
 * angle-bracketed URL and a `rel` attribute; the first `rel` attribute wins.
 * A header is either fully parsed or rejected.
 *
 * @throws {LinkParseError} `malformed_link` or `missing_relation`
 * @example
 * ```typescript
 * const header = parseLinkHeader('<https://api.github.com/orgs/acme/repos?page=2>; rel="next"');
 * findRelation(header, 'next')?.targetUrl;
 * ```
 */
export function parseLinkHeader(raw: string): LinkHeader {
  return { items: raw.split(',').map(parseItem) };
}

/**
 * First item whose relation equals `relation` exactly
 */
export function findRelation(header: LinkHeader, relation: string): LinkItem | undefined {
  return header.items.find(item => item.relation === relation);
}

import { FetchError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { DEFAULT_API_BASE_URL, GITHUB_ACCEPT_HEADER, USER_AGENT } from '../../config/constants';
import type { Credential } from '../../types';

export interface ClientOptions {
  baseUrl?: string;
}

/**
 * Authenticated GitHub REST client
 *
 * `get` resolves only for 2xx responses; everything else becomes a
 * `FetchError`. The body is left unread so callers can inspect headers first.
 */
export interface GithubClient {
  readonly baseUrl: string;
  get(url: string): Promise<Response>;
}

function basicAuthorization(credential: Credential): string {
  const encoded = Buffer.from(`${credential.identity}:${credential.secret}`, 'utf8').toString('base64');
  return `Basic ${encoded}`;
}

async function failureMessage(res: Response): Promise<string> {
  let msg = `GitHub request failed (status ${res.status})`;
  try {
    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      msg += `: ${body.message}`;
    }
  } catch (error) {
    logger.debug('Error response carried no JSON message', { status: res.status, error });
  }
  return msg;
}

/**
 * Creates a REST client that sends the credential as HTTP Basic auth
 *
 * @param credential - Username and personal access token
 * @param options - Optional API base URL (GitHub Enterprise or a test server)
 * @example
 * ```typescript
 * const client = makeClient({ identity: 'octocat', secret: token });
 * const orgs = await listOrganizations(client);
 * ```
 */
export function makeClient(credential: Credential, options: ClientOptions = {}): GithubClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
  const headers = {
    'Authorization': basicAuthorization(credential),
    'Accept': GITHUB_ACCEPT_HEADER,
    'User-Agent': USER_AGENT,
  };

  return {
    baseUrl,
    async get(url: string): Promise<Response> {
      let res: Response;
      try {
        res = await fetch(url, { method: 'GET', headers });
      } catch (error) {
        logger.error('GitHub request could not be sent', { url, error });
        throw new FetchError('transport', url, `Could not reach ${url}`, { cause: error });
      }

      if (!res.ok) {
        const msg = await failureMessage(res);
        logger.error('GitHub request failed', { url, status: res.status, error: msg });
        throw new FetchError('http_status', url, msg, { status: res.status });
      }

      return res;
    },
  };
}

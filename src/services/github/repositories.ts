import { z } from 'zod';
import { DecodeError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { DEFAULT_PAGE_SIZE } from '../../config/constants';
import type { CloneProtocol, Organization, PageDecoder, Repository } from '../../types';
import type { GithubClient } from './client';
import { fetchAll } from './pagination';

const OrganizationSchema = z.object({
  login: z.string(),
  repos_url: z.string(),
  description: z.string().nullable().optional(),
});

const RepositorySchema = z.object({
  name: z.string(),
  ssh_url: z.string(),
  clone_url: z.string(),
});

function decodeArray<S extends z.ZodTypeAny>(schema: S, body: string, what: string): z.infer<S>[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(`${what} response is not valid JSON`, { cause: error });
  }

  const parsed = z.array(schema).safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    throw new DecodeError(`${what} response has an unexpected shape at ${where}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function toOrganization(raw: z.infer<typeof OrganizationSchema>): Organization {
  return {
    login: raw.login,
    reposUrl: raw.repos_url,
    description: raw.description ?? '',
    displayLabel: () => raw.login,
  };
}

export function toRepository(raw: z.infer<typeof RepositorySchema>, protocol: CloneProtocol): Repository {
  return {
    name: raw.name,
    cloneUrl: protocol === 'ssh' ? raw.ssh_url : raw.clone_url,
    sshUrl: raw.ssh_url,
    httpsUrl: raw.clone_url,
    displayLabel: () => raw.name,
  };
}

/**
 * Page decoder for `GET /user/orgs`
 */
export const decodeOrganizations: PageDecoder<Organization> = body =>
  decodeArray(OrganizationSchema, body, 'Organizations').map(toOrganization);

/**
 * Page decoder for an organization's repositories listing
 */
export function decodeRepositories(protocol: CloneProtocol): PageDecoder<Repository> {
  return body => decodeArray(RepositorySchema, body, 'Repositories').map(raw => toRepository(raw, protocol));
}

export interface ListOrganizationsOptions {
  maxPages?: number;
}

/**
 * Lists the organizations of the authenticated user
 *
 * The endpoint normally fits in one page, but any `Link: rel="next"` the
 * server sends is still followed.
 *
 * @throws {FetchError}
 */
export async function listOrganizations(
  client: GithubClient,
  options: ListOrganizationsOptions = {}
): Promise<Organization[]> {
  const orgs = await fetchAll(client, `${client.baseUrl}/user/orgs`, {}, decodeOrganizations, {
    maxPages: options.maxPages,
  });
  logger.info('Fetched organizations', { count: orgs.length });
  return orgs;
}

export interface ListRepositoriesOptions {
  perPage?: number;
  protocol?: CloneProtocol;
  maxPages?: number;
}

/**
 * Lists every repository at `reposUrl`, following pagination to the end
 *
 * @param client - Authenticated client
 * @param reposUrl - The organization's `repos_url`
 * @param options - Page size (default 100), clone protocol (default ssh), optional page bound
 * @throws {FetchError}
 * @example
 * ```typescript
 * const repos = await listRepositories(client, org.reposUrl, { protocol: 'https' });
 * repos.map(r => r.cloneUrl);
 * ```
 */
export async function listRepositories(
  client: GithubClient,
  reposUrl: string,
  options: ListRepositoriesOptions = {}
): Promise<Repository[]> {
  const perPage = options.perPage ?? DEFAULT_PAGE_SIZE;
  const repos = await fetchAll(
    client,
    reposUrl,
    { per_page: perPage },
    decodeRepositories(options.protocol ?? 'ssh'),
    { maxPages: options.maxPages }
  );
  logger.info('Fetched repositories', { reposUrl, count: repos.length });
  return repos;
}

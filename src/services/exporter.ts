import { CloneError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Organization, Repository } from '../types';
import type { Cloner } from './git/cloner';
import type { GithubClient } from './github/client';
import { listRepositories } from './github/repositories';
import type { ListRepositoriesOptions } from './github/repositories';

export type CloneResult =
  | { repository: Repository; ok: true }
  | { repository: Repository; ok: false; error: CloneError };

export interface ExportSummary {
  organization: string;
  targetDir: string;
  total: number;
  succeeded: number;
  failures: CloneError[];
}

export type ExportEvent =
  | { type: 'listing'; organization: string }
  | { type: 'listed'; total: number }
  | { type: 'clone_started'; repository: Repository; index: number; total: number }
  | { type: 'clone_finished'; result: CloneResult; index: number; total: number };

export interface ExportOptions extends ListRepositoriesOptions {
  cloner: Cloner;
  onEvent?: (event: ExportEvent) => void;
}

async function cloneOne(cloner: Cloner, repository: Repository, targetDir: string): Promise<CloneResult> {
  try {
    const outcome = await cloner.clone(repository.cloneUrl, targetDir);
    if (outcome.exitCode === 0) {
      return { repository, ok: true };
    }
    const detail = outcome.stderr ? `: ${outcome.stderr.split('\n').pop()}` : '';
    const status = outcome.exitCode === null ? 'was terminated' : `exited with code ${outcome.exitCode}`;
    return {
      repository,
      ok: false,
      error: new CloneError(repository, `git clone of ${repository.name} ${status}${detail}`, { exitCode: outcome.exitCode }),
    };
  } catch (error) {
    return {
      repository,
      ok: false,
      error: new CloneError(repository, `Could not start clone of ${repository.name}: ${describeError(error)}`, { cause: error }),
    };
  }
}

/**
 * Clones repositories one at a time, in list order
 *
 * A failed clone is recorded and the next one still runs.
 */
export async function cloneRepositories(
  repositories: readonly Repository[],
  targetDir: string,
  cloner: Cloner,
  onEvent?: (event: ExportEvent) => void
): Promise<CloneResult[]> {
  const results: CloneResult[] = [];
  const total = repositories.length;

  for (const [index, repository] of repositories.entries()) {
    onEvent?.({ type: 'clone_started', repository, index, total });
    const result = await cloneOne(cloner, repository, targetDir);
    if (result.ok) {
      logger.info('Cloned repository', { name: repository.name, targetDir });
    } else {
      logger.warn('Clone failed', { name: repository.name, exitCode: result.error.exitCode, error: result.error.message });
    }
    results.push(result);
    onEvent?.({ type: 'clone_finished', result, index, total });
  }

  return results;
}

/**
 * Lists every repository of `organization` and clones each into `targetDir`
 *
 * Listing failures are fatal and propagate as `FetchError`; clone failures
 * are collected in the summary.
 *
 * @example
 * ```typescript
 * const summary = await exportOrganization(client, org, '/backups/acme', { cloner: makeGitCloner() });
 * console.log(`${summary.succeeded}/${summary.total} cloned`);
 * ```
 */
export async function exportOrganization(
  client: GithubClient,
  organization: Organization,
  targetDir: string,
  options: ExportOptions
): Promise<ExportSummary> {
  const { cloner, onEvent, ...listOptions } = options;

  onEvent?.({ type: 'listing', organization: organization.login });
  const repositories = await listRepositories(client, organization.reposUrl, listOptions);
  onEvent?.({ type: 'listed', total: repositories.length });

  logger.info('Starting export', { organization: organization.login, targetDir, repositories: repositories.length });
  const results = await cloneRepositories(repositories, targetDir, cloner, onEvent);

  const failures = results.flatMap(result => (result.ok ? [] : [result.error]));
  const summary: ExportSummary = {
    organization: organization.login,
    targetDir,
    total: results.length,
    succeeded: results.length - failures.length,
    failures,
  };
  logger.info('Export finished', { organization: summary.organization, total: summary.total, succeeded: summary.succeeded, failed: failures.length });
  return summary;
}

import fs from 'fs';
import path from 'path';
import os from 'os';
import { logger } from '../lib/logger';

export type PrepareDirectoryResult =
  | { ok: true; path: string; created: boolean }
  | { ok: false; path: string; reason: 'empty_input' | 'not_empty' | 'not_a_directory' };

/**
 * Expands a leading `~` and resolves against the working directory
 */
export function resolveTargetPath(input: string): string {
  const trimmed = input.trim();
  if (trimmed === '~' || trimmed.startsWith('~/')) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  return path.resolve(trimmed);
}

/**
 * Validates and, if needed, creates the export destination
 *
 * An absent directory is created (with parents) and an existing empty one
 * is accepted. An existing non-empty directory or a file at the path is
 * refused so the caller can prompt again.
 */
export function prepareTargetDirectory(input: string): PrepareDirectoryResult {
  if (!input.trim()) {
    return { ok: false, path: input, reason: 'empty_input' };
  }

  const target = resolveTargetPath(input);
  const stats = fs.statSync(target, { throwIfNoEntry: false });

  if (stats === undefined) {
    fs.mkdirSync(target, { recursive: true });
    logger.info('Created export directory', { path: target });
    return { ok: true, path: target, created: true };
  }

  if (!stats.isDirectory()) {
    return { ok: false, path: target, reason: 'not_a_directory' };
  }

  if (fs.readdirSync(target).length > 0) {
    return { ok: false, path: target, reason: 'not_empty' };
  }

  return { ok: true, path: target, created: false };
}

export function describeDirectoryProblem(result: Extract<PrepareDirectoryResult, { ok: false }>): string {
  switch (result.reason) {
    case 'empty_input':
      return 'Please enter a directory';
    case 'not_empty':
      return `${result.path} already exists and is not empty.`;
    case 'not_a_directory':
      return `${result.path} exists and is not a directory.`;
  }
}

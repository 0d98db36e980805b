import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { z } from 'zod';
import { logger } from '../lib/logger';
import type { LogLevel } from '../lib/logger';
import type { CloneProtocol } from '../types';
import {
  APP_NAME,
  DEFAULT_API_BASE_URL,
  DEFAULT_GIT_BINARY,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
} from './constants';

const ConfigSchema = z.object({
  apiBaseUrl: z.string().url().optional(),
  perPage: z.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  maxPages: z.number().int().positive().optional(),
  cloneProtocol: z.enum(['ssh', 'https']).optional(),
  gitBinary: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ConfigShape = z.infer<typeof ConfigSchema>;

/**
 * Effective settings for one run: the config file merged over defaults
 */
export interface ExporterSettings {
  apiBaseUrl: string;
  perPage: number;
  /** Upper bound on requests per listing; undefined trusts the server's pagination */
  maxPages?: number;
  cloneProtocol: CloneProtocol;
  gitBinary: string;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: ExporterSettings = {
  apiBaseUrl: DEFAULT_API_BASE_URL,
  perPage: DEFAULT_PAGE_SIZE,
  maxPages: undefined,
  cloneProtocol: 'ssh',
  gitBinary: DEFAULT_GIT_BINARY,
  logLevel: 'info',
};

const paths = envPaths(APP_NAME);
const configFile = path.join(paths.config, 'config.json');

/**
 * Gets the absolute path to the configuration file
 *
 * @returns Absolute path to config.json in the user's config directory
 */
export function getConfigPath() {
  return configFile;
}

/**
 * Reads and validates the configuration file
 *
 * Returns an empty object if the file doesn't exist. A file that fails to
 * parse or validate is logged and ignored, so a bad edit never blocks an
 * export.
 */
export function readConfig(): ConfigShape {
  let raw: string;
  try {
    raw = fs.readFileSync(configFile, 'utf8');
  } catch (error) {
    logger.debug('No config file loaded', { path: configFile, error });
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn('Config file is not valid JSON, using defaults', { path: configFile, error });
    return {};
  }

  const parsed = ConfigSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('Config file failed validation, using defaults', {
      path: configFile,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

/**
 * Whether debug logging was requested through the environment
 */
export function isDebugEnv(): boolean {
  return process.env.ORG_EXPORTER_DEBUG === '1';
}

/**
 * Resolves the settings for this run
 *
 * @example
 * ```typescript
 * const settings = getSettings();
 * logger.setLevel(settings.logLevel);
 * ```
 */
export function getSettings(): ExporterSettings {
  const cfg = readConfig();
  return {
    apiBaseUrl: (cfg.apiBaseUrl ?? DEFAULT_SETTINGS.apiBaseUrl).replace(/\/+$/, ''),
    perPage: cfg.perPage ?? DEFAULT_SETTINGS.perPage,
    maxPages: cfg.maxPages ?? DEFAULT_SETTINGS.maxPages,
    cloneProtocol: cfg.cloneProtocol ?? DEFAULT_SETTINGS.cloneProtocol,
    gitBinary: cfg.gitBinary ?? DEFAULT_SETTINGS.gitBinary,
    logLevel: isDebugEnv() ? 'debug' : cfg.logLevel ?? DEFAULT_SETTINGS.logLevel,
  };
}

#!/usr/bin/env tsx
import React from 'react';
import fs from 'fs';
import { render } from 'ink';
import chalk from 'chalk';
import { z } from 'zod';
import App from './ui/App';
import { getConfigPath, getSettings } from './config/config';
import { describeError } from './lib/errors';
import { getLogPath, logger } from './lib/logger';
import { makeGitCloner } from './services/git/cloner';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

const USAGE = `Usage: org-repo-exporter

Interactively pick one of your GitHub organizations and clone all of its
repositories into a new directory.

Options:
  -h, --help       Show this help
  -v, --version    Show the version

Config file: ${getConfigPath()}
Log file:    ${getLogPath()}
Set ORG_EXPORTER_DEBUG=1 for debug logging.`;

async function main(argv: string[]): Promise<number> {
  const version = readVersion();

  if (argv.includes('-h') || argv.includes('--help')) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (argv.includes('-v') || argv.includes('--version')) {
    process.stdout.write(`${version}\n`);
    return 0;
  }
  const unknown = argv.find(arg => arg.startsWith('-'));
  if (unknown) {
    process.stderr.write(chalk.red(`Unknown option: ${unknown}\n\n`) + `${USAGE}\n`);
    return 2;
  }

  const settings = getSettings();
  logger.setLevel(settings.logLevel);
  logger.info('Starting', { version, apiBaseUrl: settings.apiBaseUrl, cloneProtocol: settings.cloneProtocol });

  const instance = render(
    <App settings={settings} cloner={makeGitCloner({ gitBinary: settings.gitBinary })} version={version} />,
    { exitOnCtrlC: false }
  );

  try {
    await instance.waitUntilExit();
    return 0;
  } catch (error) {
    process.stderr.write(chalk.red(`\nExport failed: ${describeError(error)}\n`));
    process.stderr.write(chalk.gray(`See ${getLogPath()} for details.\n`));
    return 1;
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Unhandled failure', { error });
    process.stderr.write(chalk.red(`${describeError(error)}\n`));
    process.exitCode = 1;
  }
);

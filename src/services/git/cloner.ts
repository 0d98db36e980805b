import { spawn } from 'child_process';
import { logger } from '../../lib/logger';
import { CLONE_STDERR_TAIL_CHARS, DEFAULT_GIT_BINARY } from '../../config/constants';

export interface CloneOutcome {
  /** Exit code of the clone process; null when it was killed by a signal */
  exitCode: number | null;
  /** Trailing part of the process's stderr */
  stderr: string;
}

/**
 * Runs one clone to completion. Resolves with the exit status, rejects only
 * when the process cannot be launched.
 */
export interface Cloner {
  clone(url: string, destination: string): Promise<CloneOutcome>;
}

export interface GitClonerOptions {
  gitBinary?: string;
}

/**
 * Cloner backed by `git clone <url>` run inside the destination directory
 *
 * stdout is discarded and stderr captured so git's progress output does not
 * draw over the terminal UI.
 */
export function makeGitCloner(options: GitClonerOptions = {}): Cloner {
  const gitBinary = options.gitBinary ?? DEFAULT_GIT_BINARY;

  return {
    clone(url: string, destination: string): Promise<CloneOutcome> {
      return new Promise((resolve, reject) => {
        logger.debug('Spawning clone', { gitBinary, url, destination });
        const child = spawn(gitBinary, ['clone', url], {
          cwd: destination,
          stdio: ['ignore', 'ignore', 'pipe'],
        });

        let stderr = '';
        child.stderr?.setEncoding('utf8');
        child.stderr?.on('data', (chunk: string) => {
          stderr = (stderr + chunk).slice(-CLONE_STDERR_TAIL_CHARS);
        });

        child.on('error', reject);
        child.on('close', (code: number | null) => {
          resolve({ exitCode: code, stderr: stderr.trim() });
        });
      });
    },
  };
}

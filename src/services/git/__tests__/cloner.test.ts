import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { makeGitCloner } from '../cloner';
import { CLONE_STDERR_TAIL_CHARS } from '../../../config/constants';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));
vi.mock('../../../lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  },
}));

class MockStream extends EventEmitter {
  setEncoding = vi.fn();
}

class MockChild extends EventEmitter {
  stderr = new MockStream();
}

// Emits on the next tick so the cloner has attached its listeners
function mockSpawnOnce(script: (child: MockChild) => void) {
  const child = new MockChild();
  vi.mocked(spawn).mockImplementationOnce((() => {
    setTimeout(() => script(child), 0);
    return child;
  }) as unknown as typeof spawn);
  return child;
}

describe('makeGitCloner', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset();
  });

  it('should run git clone inside the destination directory', async () => {
    mockSpawnOnce(child => child.emit('close', 0));

    const outcome = await makeGitCloner().clone('git@github.com:acme/api.git', '/backups/acme');

    expect(outcome).toEqual({ exitCode: 0, stderr: '' });
    expect(spawn).toHaveBeenCalledWith('git', ['clone', 'git@github.com:acme/api.git'], {
      cwd: '/backups/acme',
      stdio: ['ignore', 'ignore', 'pipe'],
    });
  });

  it('should use a configured git binary', async () => {
    mockSpawnOnce(child => child.emit('close', 0));

    await makeGitCloner({ gitBinary: '/usr/local/bin/git' }).clone('u', '/d');

    expect(vi.mocked(spawn).mock.calls[0][0]).toBe('/usr/local/bin/git');
  });

  it('should resolve with a non-zero exit code and the captured stderr', async () => {
    mockSpawnOnce(child => {
      child.stderr.emit('data', "Cloning into 'api'...\n");
      child.stderr.emit('data', 'fatal: Could not read from remote repository.\n');
      child.emit('close', 128);
    });

    const outcome = await makeGitCloner().clone('git@github.com:acme/api.git', '/backups/acme');

    expect(outcome).toEqual({
      exitCode: 128,
      stderr: "Cloning into 'api'...\nfatal: Could not read from remote repository.",
    });
  });

  it('should decode stderr as UTF-8 and keep only its tail', async () => {
    const child = mockSpawnOnce(c => {
      c.stderr.emit('data', 'x'.repeat(CLONE_STDERR_TAIL_CHARS));
      c.stderr.emit('data', 'fatal: dépôt introuvable');
      c.emit('close', 128);
    });

    const outcome = await makeGitCloner().clone('u', '/d');

    expect(child.stderr.setEncoding).toHaveBeenCalledWith('utf8');
    expect(outcome.stderr).toHaveLength(CLONE_STDERR_TAIL_CHARS);
    expect(outcome.stderr.endsWith('fatal: dépôt introuvable')).toBe(true);
  });

  it('should reject when git cannot be launched', async () => {
    mockSpawnOnce(child => child.emit('error', new Error('spawn git ENOENT')));

    await expect(makeGitCloner().clone('u', '/d')).rejects.toThrow('spawn git ENOENT');
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import type { Stats } from 'fs';

vi.mock('fs');
vi.mock('env-paths', () => ({
  default: vi.fn(() => ({
    config: '/mock/config/path',
    data: '/mock/data/path',
    cache: '/mock/cache/path',
    log: '/mock/log/path',
    temp: '/mock/temp/path',
  })),
}));

import { logger, getLogPath } from '../logger';

const LOG_FILE = '/mock/log/path/exporter.log';

function writtenEntries(): unknown[] {
  return vi.mocked(fs.appendFileSync).mock.calls.map(call => JSON.parse(String(call[1])));
}

describe('logger', () => {
  beforeEach(() => {
    logger.setLevel('info');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should write to exporter.log in the platform log directory', () => {
    expect(getLogPath()).toBe(LOG_FILE);
  });

  it('should append one JSON line per entry with the context merged in', () => {
    logger.info('Fetched organizations', { count: 2 });

    expect(fs.mkdirSync).toHaveBeenCalledWith('/mock/log/path', { recursive: true });
    expect(vi.mocked(fs.appendFileSync).mock.calls[0][0]).toBe(LOG_FILE);
    expect(String(vi.mocked(fs.appendFileSync).mock.calls[0][1]).endsWith('\n')).toBe(true);
    expect(writtenEntries()).toEqual([
      expect.objectContaining({ level: 'info', message: 'Fetched organizations', count: 2 }),
    ]);
  });

  it('should not let context keys replace the entry fields', () => {
    logger.warn('Clone failed', { level: 'debug', message: 'other', time: 'never', name: 'api' });

    const [entry] = writtenEntries();
    expect(entry).toMatchObject({ level: 'warn', message: 'Clone failed', name: 'api' });
    expect(entry).not.toMatchObject({ time: 'never' });
  });

  it('should drop entries below the configured level', () => {
    logger.debug('Fetching page', { url: 'https://api.example.com' });
    logger.warn('Clone failed');

    expect(writtenEntries()).toEqual([expect.objectContaining({ level: 'warn', message: 'Clone failed' })]);
  });

  it('should write debug entries once the level allows them', () => {
    logger.setLevel('debug');

    logger.debug('Fetching page');

    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(writtenEntries()).toEqual([expect.objectContaining({ level: 'debug' })]);
  });

  it('should serialize errors with their message', () => {
    logger.error('Export aborted', { error: new Error('boom') });

    expect(writtenEntries()).toEqual([
      expect.objectContaining({ error: expect.objectContaining({ name: 'Error', message: 'boom' }) }),
    ]);
  });

  it('should rotate the file once it reaches the size limit', () => {
    vi.mocked(fs.statSync).mockReturnValueOnce({ size: 5 * 1024 * 1024 } as Stats);
    vi.mocked(fs.existsSync).mockReturnValue(true);

    logger.info('Starting');

    expect(fs.unlinkSync).toHaveBeenCalledWith(`${LOG_FILE}.4`);
    expect(vi.mocked(fs.renameSync).mock.calls).toEqual([
      [`${LOG_FILE}.3`, `${LOG_FILE}.4`],
      [`${LOG_FILE}.2`, `${LOG_FILE}.3`],
      [`${LOG_FILE}.1`, `${LOG_FILE}.2`],
      [LOG_FILE, `${LOG_FILE}.1`],
    ]);
    expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
  });
});

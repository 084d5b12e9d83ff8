import { describe, expect, it, vi } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {
  AutomationSessionError,
  ConfigError,
  Logger,
  RunInterruptedError,
  ScanprobeError,
  SetupError,
  ValidationError,
  fileTimestamp,
  formatDuration,
  isInterruption,
  retry,
  throwIfInterrupted,
  truncate,
  type Clock,
} from './index.js';

const instantClock: Clock = { now: () => 0, sleep: async () => {} };

describe('retry', () => {
  it('returns the first successful value', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { retries: 3, clock: instantClock, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ message: 'flaky' }), 1);
  });

  it('rethrows the last error after the final attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(retry(fn, { retries: 2, clock: instantClock })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('backs off exponentially between attempts', async () => {
    const waits: number[] = [];
    const clock: Clock = { now: () => 0, sleep: async (ms) => void waits.push(ms) };
    const fn = vi.fn<() => Promise<number>>().mockRejectedValue(new Error('x'));

    await expect(retry(fn, { retries: 3, delay: 100, backoff: 2, clock })).rejects.toThrow('x');
    expect(waits).toEqual([100, 200]);
  });
});

describe('interruption helpers', () => {
  it('recognises interruption errors', () => {
    expect(isInterruption(new RunInterruptedError())).toBe(true);
    expect(isInterruption(new SetupError('no session'))).toBe(false);
    expect(new RunInterruptedError()).toBeInstanceOf(ScanprobeError);
    expect(new RunInterruptedError().message).toBe('Test interrupted by user');
  });

  it('gives every error its code', () => {
    expect(
      [
        new ConfigError('bad config'),
        new ValidationError('bad rules'),
        new SetupError('no session'),
        new AutomationSessionError('device gone'),
        new RunInterruptedError(),
      ].map((error) => [error.name, error.code])
    ).toEqual([
      ['ConfigError', 'CONFIG_ERROR'],
      ['ValidationError', 'VALIDATION_ERROR'],
      ['SetupError', 'SETUP_ERROR'],
      ['AutomationSessionError', 'AUTOMATION_SESSION_ERROR'],
      ['RunInterruptedError', 'RUN_INTERRUPTED'],
    ]);
  });

  it('throws only once the signal is aborted', () => {
    const controller = new AbortController();
    expect(() => throwIfInterrupted(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfInterrupted(controller.signal)).toThrow(RunInterruptedError);
    expect(() => throwIfInterrupted(undefined)).not.toThrow();
  });
});

describe('formatting', () => {
  it('formats durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(3720000)).toBe('1h 2m');
  });

  it('truncates long strings', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });

  it('builds file timestamps from local time', () => {
    expect(fileTimestamp(new Date(2026, 9, 18, 9, 5, 7))).toBe('20261018_090507');
  });
});

describe('Logger', () => {
  it('respects the level threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new Logger({ level: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('⚠ shown');
  });

  it('writes plain lines to the log file with the child prefix', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanprobe-log-'));
    const logFile = path.join(dir, 'nested', 'run.log');
    const logger = new Logger({ logFile }).child('[Runner]');

    logger.info('hello');

    const content = await fs.readFile(logFile, 'utf-8');
    expect(content).toMatch(/ - INFO - \[Runner\] hello\n$/);
    await fs.remove(dir);
  });

  it('stays quiet when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ silent: true });

    logger.info('a');
    logger.error('b');

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});

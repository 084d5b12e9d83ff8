/**
 * @scanprobe/shared
 *
 * Shared utilities and types for scanprobe packages.
 */

import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';

// ============================================================================
// Logger
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  silent?: boolean;
  /** Plain-text copy of every emitted line is appended here */
  logFile?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private silent: boolean;
  private logFile?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.silent = options.silent ?? false;
    this.logFile = options.logFile;

    if (this.logFile) {
      fs.ensureDirSync(path.dirname(this.logFile));
    }
  }

  /**
   * Logger sharing level and file sink, with `prefix` appended to the current one.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix} ${prefix}` : prefix,
      silent: this.silent,
      logFile: this.logFile,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  private persist(level: LogLevel, message: string): void {
    if (!this.logFile) return;
    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${this.formatMessage(message)}\n`;
    fs.appendFileSync(this.logFile, line);
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(this.formatMessage(message)));
      this.persist('debug', message);
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage(message));
      this.persist('info', message);
    }
  }

  success(message: string): void {
    if (this.shouldLog('info')) {
      console.log(chalk.green(this.formatMessage(`✓ ${message}`)));
      this.persist('info', `✓ ${message}`);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.log(chalk.yellow(this.formatMessage(`⚠ ${message}`)));
      this.persist('warn', message);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.formatMessage(`✗ ${message}`)));
      this.persist('error', message);
    }
  }

  step(number: number, total: number, message: string): void {
    if (this.shouldLog('info')) {
      console.log(chalk.cyan(`[${number}/${total}]`), this.formatMessage(message));
      this.persist('info', `[${number}/${total}] ${message}`);
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class ScanprobeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScanprobeError';
  }
}

export class ConfigError extends ScanprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends ScanprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * The run could not be prepared (no automation session, app not launchable).
 * Fatal for the whole run.
 */
export class SetupError extends ScanprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SETUP_ERROR', details);
    this.name = 'SetupError';
  }
}

/**
 * The automation link did not answer (CLI crashed, timed out, device gone).
 */
export class AutomationSessionError extends ScanprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTOMATION_SESSION_ERROR', details);
    this.name = 'AutomationSessionError';
  }
}

/**
 * Raised when the operator cancels the run. Unwinds through steps and is
 * converted into an `interrupted` test result at the case boundary.
 */
export class RunInterruptedError extends ScanprobeError {
  constructor(message = 'Test interrupted by user') {
    super(message, 'RUN_INTERRUPTED');
    this.name = 'RunInterruptedError';
  }
}

export function isInterruption(error: unknown): error is RunInterruptedError {
  return error instanceof RunInterruptedError;
}

/**
 * Throws `RunInterruptedError` once the signal has been aborted.
 */
export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunInterruptedError();
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Time source used by every bounded wait. Swapped for a manual clock in tests.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    retries?: number;
    delay?: number;
    backoff?: number;
    onRetry?: (error: Error, attempt: number) => void;
    clock?: Clock;
  } = {}
): Promise<T> {
  const { retries = 3, delay = 1000, backoff = 2, onRetry, clock = systemClock } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < retries) {
        onRetry?.(lastError, attempt);
        await clock.sleep(delay * Math.pow(backoff, attempt - 1));
      }
    }
  }

  throw lastError ?? new Error('retry called with no attempts');
}

/**
 * Format duration in milliseconds to human readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * `20261018_210455` style stamp used in artifact file names (local time).
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// ============================================================================
// Types
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

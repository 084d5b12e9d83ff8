import type { TestResult } from '@scanprobe/evaluation';
import type { RunMode, RunState } from './types.js';

export interface RunSession {
  id: string;
  mode: RunMode;
  state: RunState;
  totalCases: number;
  startedAt: Date;
  endedAt?: Date;
  passed: number;
  failed: number;
  errors: number;
  interrupted: number;
  error?: string;
  log: string[];
}

const MAX_LOG_ENTRIES = 100;

/**
 * Bookkeeping for one run: state transitions, per-status counters and a
 * short rolling log.
 */
export class RunSessionManager {
  private session: RunSession | null = null;

  createSession(mode: RunMode, now: Date = new Date()): RunSession {
    this.session = {
      id: `run_${now.getTime()}_${Math.random().toString(36).slice(2, 11)}`,
      mode,
      state: 'ready',
      totalCases: 0,
      startedAt: now,
      passed: 0,
      failed: 0,
      errors: 0,
      interrupted: 0,
      log: [],
    };
    return this.session;
  }

  getSession(): RunSession | null {
    return this.session;
  }

  setTotal(totalCases: number): void {
    if (!this.session) return;
    this.session.totalCases = totalCases;
  }

  updateState(state: RunState, error?: string): void {
    if (!this.session) return;

    this.session.state = state;
    if (error) {
      this.session.error = error;
    }
    if (state === 'completed' || state === 'interrupted' || state === 'failed') {
      this.session.endedAt = new Date();
    }
  }

  recordResult(result: TestResult): void {
    if (!this.session) return;

    switch (result.status) {
      case 'passed':
        this.session.passed++;
        break;
      case 'failed':
        this.session.failed++;
        break;
      case 'error':
        this.session.errors++;
        break;
      case 'interrupted':
        this.session.interrupted++;
        break;
    }
    this.addLogEntry(`${result.testId}: ${result.status}`);
  }

  addLogEntry(message: string): void {
    if (!this.session) return;

    this.session.log.push(`[${new Date().toISOString()}] ${message}`);
    if (this.session.log.length > MAX_LOG_ENTRIES) {
      this.session.log = this.session.log.slice(-MAX_LOG_ENTRIES);
    }
  }
}

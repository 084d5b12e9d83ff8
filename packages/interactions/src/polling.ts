/**
 * Bounded polling for asynchronous on-device work.
 */

import {
  Logger,
  errorMessage,
  isInterruption,
  systemClock,
  throwIfInterrupted,
  type Clock,
} from '@scanprobe/shared';

export type ScanState = 'SCANNING' | 'DONE';

export interface ScanSample {
  /** A busy indicator is on screen */
  busy: boolean;
  /** A result marker is on screen */
  resultVisible: boolean;
}

export function scanStateOf(sample: ScanSample): ScanState {
  return !sample.busy || sample.resultVisible ? 'DONE' : 'SCANNING';
}

export type PollOutcome = 'matched' | 'session_unresponsive' | 'timeout';

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  /** Consecutive sample failures treated as an implicit match */
  maxConsecutiveFailures: number;
  /** Extra wait after a failed sample */
  failureBackoffMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Sample until the predicate holds, the ceiling passes, or the session stops
 * answering. Only an interruption escapes.
 */
export async function pollUntil(
  sample: () => Promise<boolean>,
  options: PollOptions
): Promise<PollOutcome> {
  const clock = options.clock ?? systemClock;
  const deadline = clock.now() + options.timeoutMs;
  let failures = 0;

  while (clock.now() < deadline) {
    throwIfInterrupted(options.signal);

    try {
      if (await sample()) {
        return 'matched';
      }
      failures = 0;
    } catch (error) {
      if (isInterruption(error)) throw error;

      failures += 1;
      options.logger?.debug(`Sample failed (${failures}/${options.maxConsecutiveFailures}): ${errorMessage(error)}`);
      if (failures >= options.maxConsecutiveFailures) {
        return 'session_unresponsive';
      }
      await clock.sleep(options.failureBackoffMs ?? 0);
    }

    await clock.sleep(options.intervalMs);
  }

  throwIfInterrupted(options.signal);
  return 'timeout';
}

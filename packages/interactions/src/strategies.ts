/**
 * Fallback chains
 *
 * A step is an ordered list of strategies tried until one reports success.
 * Strategies never surface "element not found" as an error; a thrown error
 * counts as a failed attempt, except an interruption, which always unwinds.
 */

import {
  Logger,
  errorMessage,
  isInterruption,
  systemClock,
  throwIfInterrupted,
  type Clock,
  type Point,
} from '@scanprobe/shared';
import {
  describeLocator,
  type DeviceControl,
  type Locator,
  type UiAutomationClient,
} from '@scanprobe/device';
import { resolvePosition, type ScreenPosition } from './profile.js';

export interface InteractionStrategy {
  readonly name: string;
  attempt(): Promise<boolean>;
}

export interface ChainResult {
  success: boolean;
  method: string;
  attemptedMethods: string[];
  error?: string;
}

export interface ChainOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Run strategies in order and stop at the first success.
 */
export async function runFallbackChain(
  strategies: readonly InteractionStrategy[],
  options: ChainOptions = {}
): Promise<ChainResult> {
  const attemptedMethods: string[] = [];
  let lastError: string | undefined;

  for (const strategy of strategies) {
    throwIfInterrupted(options.signal);
    attemptedMethods.push(strategy.name);

    try {
      if (await strategy.attempt()) {
        options.logger?.debug(`✓ ${strategy.name}`);
        return { success: true, method: strategy.name, attemptedMethods };
      }
      lastError = `${strategy.name} had no effect`;
    } catch (error) {
      if (isInterruption(error)) throw error;
      lastError = `${strategy.name}: ${errorMessage(error)}`;
      options.logger?.debug(lastError);
    }
  }

  return {
    success: false,
    method: 'none',
    error: lastError ?? 'No strategy available',
    attemptedMethods,
  };
}

// =============================================================================
// Concrete strategies
// =============================================================================

/**
 * Find an element through the automation client and click it.
 */
export class LocatorClickStrategy implements InteractionStrategy {
  readonly name: string;

  constructor(
    private readonly client: UiAutomationClient,
    private readonly locator: Locator,
    private readonly timeoutMs: number
  ) {
    this.name = `click ${describeLocator(locator)}`;
  }

  async attempt(): Promise<boolean> {
    const located = await this.client.locate(this.locator, this.timeoutMs);
    if (!located.found) return false;
    return this.client.click(located.element);
  }
}

/**
 * Shell-level tap at a fixed layout point.
 */
export class DeviceTapStrategy implements InteractionStrategy {
  readonly name: string;

  constructor(
    private readonly device: DeviceControl,
    private readonly point: Point,
    label?: string
  ) {
    this.name = `rawTap(${point.x},${point.y})${label ? ` ${label}` : ''}`;
  }

  attempt(): Promise<boolean> {
    return this.device.rawTap(this.point.x, this.point.y);
  }
}

/**
 * Shell-level tap at a point derived from the current window size.
 */
export class ProportionalTapStrategy implements InteractionStrategy {
  readonly name: string;

  constructor(
    private readonly client: UiAutomationClient,
    private readonly device: DeviceControl,
    private readonly position: ScreenPosition
  ) {
    this.name = `rawTap(${describePosition(position)})`;
  }

  async attempt(): Promise<boolean> {
    const size = await this.client.windowSize();
    if (!size) return false;
    const { x, y } = resolvePosition(this.position, size);
    return this.device.rawTap(x, y);
  }
}

/**
 * Repeat another strategy; succeeds if any repetition did.
 */
export class RepeatedTapStrategy implements InteractionStrategy {
  readonly name: string;

  constructor(
    private readonly inner: InteractionStrategy,
    private readonly times: number,
    private readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    this.name = `${inner.name} x${times}`;
  }

  async attempt(): Promise<boolean> {
    let anySucceeded = false;
    for (let i = 0; i < this.times; i++) {
      anySucceeded = (await this.inner.attempt()) || anySucceeded;
      await this.clock.sleep(this.intervalMs);
    }
    return anySucceeded;
  }
}

/**
 * Success only when the post-condition holds after the settle delay.
 */
export class VerifiedStrategy implements InteractionStrategy {
  readonly name: string;

  constructor(
    private readonly inner: InteractionStrategy,
    private readonly check: () => Promise<boolean>,
    private readonly settleMs: number,
    private readonly clock: Clock = systemClock
  ) {
    this.name = `${inner.name} (verified)`;
  }

  async attempt(): Promise<boolean> {
    if (!(await this.inner.attempt())) return false;
    await this.clock.sleep(this.settleMs);
    return this.check();
  }
}

export function verifiedBy(
  strategy: InteractionStrategy,
  check: () => Promise<boolean>,
  options: { settleMs?: number; clock?: Clock } = {}
): InteractionStrategy {
  return new VerifiedStrategy(strategy, check, options.settleMs ?? 0, options.clock);
}

function describePosition(position: ScreenPosition): string {
  switch (position.kind) {
    case 'fraction':
      return `${position.x}w,${position.y}h`;
    case 'topRight':
      return `top-right -${position.inset}`;
    case 'bottomCenter':
      return `bottom-center -${position.inset}`;
  }
}

/**
 * UI automation over the Maestro CLI.
 *
 * Every interaction is a one-command flow written to a temp file and run with
 * `maestro test`; lookups are resolved against `maestro hierarchy` output.
 */

import { execa } from 'execa';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  AutomationSessionError,
  Logger,
  errorMessage,
  retry,
  systemClock,
  truncate,
  type Clock,
  type Size,
} from '@scanprobe/shared';
import {
  describeLocator,
  matchLocator,
  parseHierarchy,
  type BoundingBox,
  type ParsedHierarchy,
} from './hierarchy-parser.js';
import type { ElementHandle, LocateResult, Locator, UiAutomationClient } from './types.js';

export interface MaestroClientOptions {
  /** Android package the flows are scoped to */
  appId: string;
  /** `--device` passed to every Maestro call */
  deviceId?: string;
  maestroPath?: string;
  /** Timeout of one `maestro test` flow */
  commandTimeoutMs?: number;
  /** Timeout of one `maestro hierarchy` dump */
  hierarchyTimeoutMs?: number;
  /** Interval between hierarchy samples while locating */
  pollIntervalMs?: number;
  logger?: Logger;
  clock?: Clock;
}

const MIN_DUMP_TIMEOUT_MS = 1000;

export class MaestroClient implements UiAutomationClient {
  private readonly appId: string;
  private readonly deviceId?: string;
  private readonly maestroPath: string;
  private readonly commandTimeoutMs: number;
  private readonly hierarchyTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private workDir: string | null = null;
  private screen: BoundingBox | null = null;

  constructor(options: MaestroClientOptions) {
    this.appId = options.appId;
    this.deviceId = options.deviceId;
    this.maestroPath = options.maestroPath ?? 'maestro';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30000;
    this.hierarchyTimeoutMs = options.hierarchyTimeoutMs ?? 10000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.logger = options.logger ?? new Logger({ prefix: '[Maestro]' });
    this.clock = options.clock ?? systemClock;
  }

  private get globalArgs(): string[] {
    return this.deviceId ? ['--device', this.deviceId] : [];
  }

  private async ensureWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanprobe-maestro-'));
    }
    return this.workDir;
  }

  /**
   * Run a flow made of the given commands. Throws AutomationSessionError when
   * Maestro exits non-zero or times out.
   */
  private async runFlow(commands: string): Promise<void> {
    const workDir = await this.ensureWorkDir();
    const flowPath = path.join(workDir, `flow-${Date.now()}.yaml`);
    await fs.writeFile(flowPath, `appId: ${this.appId}\n---\n${commands}\n`);

    try {
      const result = await execa(this.maestroPath, [...this.globalArgs, 'test', flowPath], {
        cwd: workDir,
        timeout: this.commandTimeoutMs,
        reject: false,
      });

      if (result.failed) {
        const output = result.stderr || result.stdout || `exit code ${result.exitCode}`;
        throw new AutomationSessionError(`Maestro command failed: ${truncate(output, 200)}`, {
          commands,
          timedOut: result.timedOut,
        });
      }
    } finally {
      await fs.remove(flowPath);
    }
  }

  private async rawHierarchy(timeoutMs = this.hierarchyTimeoutMs): Promise<string> {
    const result = await execa(this.maestroPath, [...this.globalArgs, 'hierarchy'], {
      timeout: timeoutMs,
      reject: false,
    });

    if (result.failed) {
      throw new AutomationSessionError(
        `Hierarchy failed: ${truncate(result.stderr || `exit code ${result.exitCode}`, 200)}`,
        { timedOut: result.timedOut }
      );
    }

    const jsonMatch = result.stdout.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new AutomationSessionError('No JSON found in hierarchy output');
    }
    return jsonMatch[0];
  }

  async start(): Promise<void> {
    this.logger.info(`Starting session for ${this.appId}${this.deviceId ? ` on ${this.deviceId}` : ''}`);

    await retry(() => this.runFlow('- launchApp'), {
      retries: 2,
      delay: 2000,
      clock: this.clock,
      onRetry: (error, attempt) =>
        this.logger.warn(`launchApp attempt ${attempt} failed: ${error.message}`),
    });

    // The session is only usable once the device answers a dump
    await this.hierarchy();
    this.logger.success('Automation session ready');
  }

  async stop(): Promise<void> {
    if (this.workDir) {
      await fs.remove(this.workDir);
      this.workDir = null;
    }
    this.screen = null;
  }

  async treeDump(): Promise<string> {
    return this.rawHierarchy();
  }

  hierarchy(): Promise<ParsedHierarchy> {
    return this.parsedHierarchy(this.hierarchyTimeoutMs);
  }

  private async parsedHierarchy(timeoutMs: number): Promise<ParsedHierarchy> {
    const raw = await this.rawHierarchy(timeoutMs);
    let tree: unknown;
    try {
      tree = JSON.parse(raw);
    } catch (error) {
      throw new AutomationSessionError(`Hierarchy is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = parseHierarchy(tree);
    this.screen = parsed.screenBounds ?? this.screen;
    return parsed;
  }

  async locate(locator: Locator, timeoutMs: number): Promise<LocateResult> {
    const deadline = this.clock.now() + timeoutMs;
    let reason = `${describeLocator(locator)} not on screen`;

    for (;;) {
      try {
        // A dump never outlives the lookup; execa reads a zero timeout as none
        const remaining = Math.max(deadline - this.clock.now(), MIN_DUMP_TIMEOUT_MS);
        const dump = await this.parsedHierarchy(Math.min(this.hierarchyTimeoutMs, remaining));
        const [match] = matchLocator(dump, locator);
        if (match) {
          return { found: true, element: match };
        }
        reason = `${describeLocator(locator)} not on screen`;
      } catch (error) {
        if (!(error instanceof AutomationSessionError)) throw error;
        reason = error.message;
      }

      if (this.clock.now() >= deadline) {
        return { found: false, reason };
      }
      await this.clock.sleep(this.pollIntervalMs);
    }
  }

  /**
   * Tap the element centre, expressed as screen percentages when the screen
   * size is known.
   */
  async click(element: ElementHandle): Promise<boolean> {
    if (!element.bounds) return false;
    const { centerX, centerY } = element.bounds;

    if (!this.screen) {
      return this.tap(centerX, centerY);
    }

    const xPercent = Math.round((centerX / this.screen.width) * 100);
    const yPercent = Math.round((centerY / this.screen.height) * 100);
    return this.attempt(`- tapOn:\n    point: ${xPercent}%,${yPercent}%`);
  }

  async textOf(element: ElementHandle): Promise<string | null> {
    return element.text ?? element.accessibilityLabel;
  }

  async tap(x: number, y: number): Promise<boolean> {
    return this.attempt(`- tapOn:\n    point: ${Math.round(x)},${Math.round(y)}`);
  }

  async navigateBack(): Promise<boolean> {
    return this.attempt('- back');
  }

  async screenshot(filePath: string): Promise<boolean> {
    const name = `screen-${Date.now()}`;
    if (!(await this.attempt(`- takeScreenshot: ${name}`))) {
      return false;
    }

    const workDir = await this.ensureWorkDir();
    const captured = path.join(workDir, `${name}.png`);
    if (!(await fs.pathExists(captured))) {
      this.logger.warn(`Screenshot not found at ${captured}`);
      return false;
    }

    await fs.ensureDir(path.dirname(filePath));
    await fs.move(captured, filePath, { overwrite: true });
    return true;
  }

  async windowSize(): Promise<Size | null> {
    if (!this.screen) {
      try {
        await this.hierarchy();
      } catch (error) {
        this.logger.debug(`Window size unavailable: ${errorMessage(error)}`);
        return null;
      }
    }
    return this.screen ? { width: this.screen.width, height: this.screen.height } : null;
  }

  private async attempt(commands: string): Promise<boolean> {
    try {
      await this.runFlow(commands);
      return true;
    } catch (error) {
      this.logger.debug(errorMessage(error));
      return false;
    }
  }
}

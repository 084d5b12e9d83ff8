/**
 * Run Orchestrator
 *
 * ready -> running -> completed | interrupted, or failed when setup fails.
 * Every case that starts is recorded exactly once, in start order.
 */

import fs from 'fs-extra';
import {
  Logger,
  SetupError,
  errorMessage,
  isInterruption,
  systemClock,
  throwIfInterrupted,
  truncate,
  type Clock,
} from '@scanprobe/shared';
import type { UiAutomationClient } from '@scanprobe/device';
import {
  buildReport,
  writeReport,
  type Report,
  type ResultClassifier,
  type TestCase,
  type TestResult,
} from '@scanprobe/evaluation';
import { RunSessionManager, type RunSession } from './session.js';
import type {
  CaseSequencer,
  ImageSource,
  RunEvent,
  RunEventCallback,
  RunMode,
  RunOutcome,
  RunState,
  UploadMethod,
} from './types.js';

export interface RunOrchestratorOptions {
  client: UiAutomationClient;
  sequencer: CaseSequencer;
  classifier: ResultClassifier;
  images: ImageSource;
  mode?: RunMode;
  uploadMethod?: UploadMethod;
  /** Pause after each automated case */
  settleBetweenCasesMs?: number;
  logger?: Logger;
  clock?: Clock;
  signal?: AbortSignal;
  onEvent?: RunEventCallback;
}

export class RunOrchestrator {
  private readonly client: UiAutomationClient;
  private readonly sequencer: CaseSequencer;
  private readonly classifier: ResultClassifier;
  private readonly images: ImageSource;
  private readonly mode: RunMode;
  private readonly uploadMethod: UploadMethod;
  private readonly settleBetweenCasesMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;
  private readonly onEvent?: RunEventCallback;
  private readonly session = new RunSessionManager();
  private readonly recorded: TestResult[] = [];
  private runState: RunState = 'ready';
  private setupDone = false;

  constructor(options: RunOrchestratorOptions) {
    this.client = options.client;
    this.sequencer = options.sequencer;
    this.classifier = options.classifier;
    this.images = options.images;
    this.mode = options.mode ?? 'automated';
    this.uploadMethod = options.uploadMethod ?? 'gallery';
    this.settleBetweenCasesMs = options.settleBetweenCasesMs ?? 2000;
    this.logger = options.logger ?? new Logger({ prefix: '[Runner]' });
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
    this.onEvent = options.onEvent;
    this.session.createSession(this.mode);
  }

  get state(): RunState {
    return this.runState;
  }

  /** Recorded results, in start order */
  get results(): readonly TestResult[] {
    return this.recorded;
  }

  getSession(): RunSession | null {
    return this.session.getSession();
  }

  private transition(state: RunState, error?: string): void {
    this.runState = state;
    this.session.updateState(state, error);
    this.session.addLogEntry(`state -> ${state}`);
  }

  private emit(event: RunEvent): void {
    this.onEvent?.(event);
  }

  // ===========================================================================
  // Setup / teardown
  // ===========================================================================

  /**
   * Start the automation session and get the app to its home screen.
   * @throws SetupError when no session can be started
   */
  async setup(): Promise<void> {
    if (this.runState !== 'ready') {
      throw new SetupError(`Cannot set up a run in state ${this.runState}`);
    }

    this.logger.info('Setting up test environment...');
    try {
      throwIfInterrupted(this.signal);
      await this.client.start();
    } catch (error) {
      if (isInterruption(error)) {
        this.transition('interrupted');
        throw error;
      }
      const message = `Could not start automation session: ${errorMessage(error)}`;
      this.transition('failed', message);
      throw new SetupError(message);
    }

    try {
      if (this.mode === 'manual') {
        this.logger.info('Manual mode: select each image on the device when prompted');
        await this.sequencer.grantPermissions();
      } else {
        await this.clock.sleep(500);
        await this.sequencer.skipOnboarding();
        await this.sequencer.grantPermissions();
      }
    } catch (error) {
      if (isInterruption(error)) this.transition('interrupted');
      throw error;
    }

    this.setupDone = true;
    this.logger.success('Test environment ready');
  }

  /**
   * Stop the automation session. Never throws.
   */
  async teardown(): Promise<void> {
    try {
      await this.client.stop();
      this.logger.debug('Automation session stopped');
    } catch (error) {
      this.logger.warn(`Error during teardown: ${errorMessage(error)}`);
    }
  }

  // ===========================================================================
  // Cases
  // ===========================================================================

  private async upload(imagePath: string): Promise<void> {
    if (this.uploadMethod === 'intent') {
      await this.sequencer.uploadViaIntent(imagePath);
      return;
    }

    if (await this.sequencer.openGallery()) {
      if (await this.sequencer.selectImage(imagePath)) {
        this.logger.info('Image uploaded via gallery');
        return;
      }
      this.logger.info('Gallery selection failed, trying intent...');
    }
    await this.sequencer.uploadViaIntent(imagePath);
  }

  /**
   * Run one case end to end. Failures become an `error` result; an
   * interruption is recorded as `interrupted` (unless the case already has a
   * terminal result) and rethrown.
   */
  async runSingle(testCase: TestCase): Promise<TestResult> {
    const seq = this.sequencer;
    const result: TestResult = {
      testId: testCase.testId,
      imageName: testCase.imageName,
      imageType: testCase.imageType,
      augmentation: testCase.augmentation,
      expectedSpecies: testCase.expectedSpecies,
      timestamp: new Date(this.clock.now()).toISOString(),
      status: 'failed',
    };

    let isRecorded = false;
    const record = () => {
      if (isRecorded) return;
      isRecorded = true;
      this.recorded.push(result);
      this.session.recordResult(result);
    };

    this.logger.info(`Running test case ${testCase.testId} - ${testCase.imageName}`);

    try {
      throwIfInterrupted(this.signal);

      const imagePath = await this.images.resolveImagePath(testCase.imageName, testCase.imageType);
      if (!(await fs.pathExists(imagePath))) {
        throw new Error(`Image not found: ${imagePath}`);
      }

      await seq.captureScreenshot(`screenshot_before_${testCase.testId}.png`);

      if (this.mode === 'manual') {
        this.logger.info(`Select ${testCase.imageName} on the device (expected: ${testCase.expectedSpecies})`);
        await seq.waitForImageSelection();
      } else {
        this.logger.info(`Uploading image: ${imagePath}`);
        await this.upload(imagePath);
      }
      await seq.waitForScan();
      await seq.dismissAdvertisement();

      const appResult = await seq.extractResult();
      result.appResult = appResult;

      const classification = this.classifier.classify(appResult, testCase.expectedSpecies);
      result.classification = classification;
      result.status = classification.category === 'correct_species' ? 'passed' : 'failed';

      await seq.captureScreenshot(`screenshot_after_${testCase.testId}.png`);
      record();

      this.logger.info(
        `${testCase.testId}: ${classification.category} (${classification.appSpecies}) - ${classification.reason}`
      );
      if (appResult.fullText) {
        this.logger.debug(`Full text: ${truncate(appResult.fullText, 100)}`);
      }

      if (this.mode === 'manual') {
        await seq.clickIdentify();
      } else {
        await seq.resetForNextTest();
      }
    } catch (error) {
      if (isInterruption(error)) {
        if (!isRecorded) {
          this.logger.warn(`Test ${testCase.testId} interrupted`);
          result.status = 'interrupted';
          result.error = error.message;
          record();
        }
        throw error;
      }

      if (isRecorded) {
        this.logger.warn(`Error after recording ${testCase.testId}: ${errorMessage(error)}`);
      } else {
        this.logger.error(`Error in test ${testCase.testId}: ${errorMessage(error)}`);
        result.status = 'error';
        result.error = errorMessage(error);
        record();
      }
    }

    return result;
  }

  /**
   * Run cases in order. Returns every recorded result, also on interruption.
   */
  async runAll(testCases: readonly TestCase[]): Promise<RunOutcome> {
    if (!this.setupDone || this.runState !== 'ready') {
      throw new SetupError(`Cannot start a run in state ${this.runState}${this.setupDone ? '' : ' before setup'}`);
    }

    const total = testCases.length;
    const startedAt = this.clock.now();
    this.session.setTotal(total);
    this.transition('running');
    this.emit({ type: 'run_started', total, mode: this.mode });
    this.logger.info(`Running ${total} test case(s)...`);

    try {
      for (const [i, testCase] of testCases.entries()) {
        throwIfInterrupted(this.signal);
        this.logger.step(i + 1, total, testCase.testId);
        this.emit({ type: 'case_started', index: i, total, testCase });

        const result = await this.runSingle(testCase);
        this.emit({ type: 'case_finished', index: i, total, result });

        if (this.mode === 'automated') {
          await this.clock.sleep(this.settleBetweenCasesMs);
        }
      }
      this.transition('completed');
    } catch (error) {
      if (!isInterruption(error)) {
        this.transition('failed', errorMessage(error));
        throw error;
      }
      this.transition('interrupted');
      this.logger.warn(`Run interrupted. Completed ${this.recorded.length}/${total} tests`);
    }

    const outcome: RunOutcome = {
      state: this.runState,
      results: [...this.recorded],
      total,
      durationMs: this.clock.now() - startedAt,
    };
    this.emit({ type: 'run_finished', outcome });
    return outcome;
  }

  /**
   * Build and persist the report for the recorded results. Nothing is
   * written for an empty run.
   */
  async writeReport(reportsDir: string, now: Date = new Date()): Promise<{ report: Report; path: string } | null> {
    if (this.recorded.length === 0) {
      this.logger.warn('No test results to report');
      return null;
    }

    const report = buildReport(this.recorded, now);
    const reportPath = await writeReport(report, reportsDir);
    this.logger.info(`Report saved to: ${reportPath}`);
    return { report, path: reportPath };
  }
}

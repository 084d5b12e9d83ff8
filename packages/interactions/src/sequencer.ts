/**
 * Interaction Sequencer
 *
 * Drives the target app from "idle" to "result visible" for one test case.
 * Every step degrades to a logged warning; only an interruption escapes.
 */

import fs from 'fs-extra';
import path from 'path';
import {
  Logger,
  errorMessage,
  isInterruption,
  systemClock,
  throwIfInterrupted,
  type Clock,
} from '@scanprobe/shared';
import {
  collectTextFragments,
  matchLocator,
  screenContains,
  type AppTarget,
  type DeviceControl,
  type Locator,
  type ParsedHierarchy,
  type UiAutomationClient,
} from '@scanprobe/device';
import type { ScrapedResult } from '@scanprobe/evaluation';
import { emptyScrapedResult, mineScrapedResult } from './extraction.js';
import { pollUntil, scanStateOf } from './polling.js';
import type { AppProfile } from './profile.js';
import {
  DeviceTapStrategy,
  LocatorClickStrategy,
  ProportionalTapStrategy,
  RepeatedTapStrategy,
  runFallbackChain,
  verifiedBy,
  type ChainResult,
  type InteractionStrategy,
} from './strategies.js';

export interface SequencerTimings {
  /** Default wait per locator */
  locateTimeoutMs: number;
  permissionTimeoutMs: number;
  galleryTimeoutMs: number;
  identifyTimeoutMs: number;
  /** A busy indicator must show up within this window or the scan wait is skipped */
  scanDetectTimeoutMs: number;
  scanPollIntervalMs: number;
  scanTimeoutMs: number;
  manualPollIntervalMs: number;
  manualTimeoutMs: number;
  maxConsecutiveFailures: number;
  adDwellMs: number;
}

export const DEFAULT_TIMINGS: SequencerTimings = {
  locateTimeoutMs: 2000,
  permissionTimeoutMs: 1000,
  galleryTimeoutMs: 3000,
  identifyTimeoutMs: 3000,
  scanDetectTimeoutMs: 3000,
  scanPollIntervalMs: 1000,
  scanTimeoutMs: 30000,
  manualPollIntervalMs: 2000,
  manualTimeoutMs: 300000,
  maxConsecutiveFailures: 5,
  adDwellMs: 5000,
};

export interface SequencerOptions {
  client: UiAutomationClient;
  device: DeviceControl;
  profile: AppProfile;
  /** Screenshots and tree dumps land here */
  resultsDir: string;
  timings?: Partial<SequencerTimings>;
  logger?: Logger;
  clock?: Clock;
  signal?: AbortSignal;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class InteractionSequencer {
  private readonly client: UiAutomationClient;
  private readonly device: DeviceControl;
  private readonly profile: AppProfile;
  private readonly resultsDir: string;
  private readonly timings: SequencerTimings;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;

  constructor(options: SequencerOptions) {
    this.client = options.client;
    this.device = options.device;
    this.profile = options.profile;
    this.resultsDir = options.resultsDir;
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.logger = options.logger ?? new Logger({ prefix: '[Sequencer]' });
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
  }

  get target(): AppTarget {
    return {
      packageName: this.profile.app.packageName,
      activity: this.profile.app.activity,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async settle(ms: number): Promise<void> {
    throwIfInterrupted(this.signal);
    await this.clock.sleep(ms);
    throwIfInterrupted(this.signal);
  }

  /**
   * Run a step body; anything but an interruption becomes `fallback`.
   */
  private async guard<T>(step: string, fallback: T, body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (error) {
      if (isInterruption(error)) throw error;
      this.logger.warn(`Error in ${step}: ${errorMessage(error)}`);
      return fallback;
    }
  }

  private chain(strategies: readonly InteractionStrategy[]): Promise<ChainResult> {
    return runFallbackChain(strategies, { signal: this.signal, logger: this.logger });
  }

  private clicks(
    locators: readonly Locator[],
    timeoutMs: number = this.timings.locateTimeoutMs
  ): InteractionStrategy[] {
    return locators.map((locator) => new LocatorClickStrategy(this.client, locator, timeoutMs));
  }

  private async screenShows(needles: readonly string[]): Promise<boolean> {
    return screenContains(await this.client.hierarchy(), needles);
  }

  private async isPresent(locator: Locator, timeoutMs: number): Promise<boolean> {
    return (await this.client.locate(locator, timeoutMs)).found;
  }

  private findAdIndicator(hierarchy: ParsedHierarchy): string | undefined {
    const { texts, descriptions } = collectTextFragments(hierarchy);
    const fragments = [...texts, ...descriptions];
    // Whole words: "Ad" must not match "Add" or "Download"
    return this.profile.advertisement.indicators.find((indicator) => {
      const pattern = new RegExp(`\\b${escapeRegExp(indicator)}\\b`);
      return fragments.some((fragment) => pattern.test(fragment));
    });
  }

  private async dumpTree(fileName: string): Promise<void> {
    try {
      const dump = await this.client.treeDump();
      await fs.ensureDir(this.resultsDir);
      const filePath = path.join(this.resultsDir, fileName);
      await fs.writeFile(filePath, dump);
      this.logger.info(`Saved UI tree to ${filePath}`);
    } catch (error) {
      if (isInterruption(error)) throw error;
      this.logger.debug(`Could not save UI tree: ${errorMessage(error)}`);
    }
  }

  private async allowNotifications(): Promise<boolean> {
    const { onboarding } = this.profile;
    const allow = this.clicks(onboarding.notificationAllowLocators, this.timings.permissionTimeoutMs);

    for (let round = 0; round < onboarding.notificationRounds; round++) {
      const result = await this.chain(allow);
      if (result.success) {
        this.logger.success("Clicked 'Allow' on notifications");
        await this.settle(500);
        return true;
      }
      if (round < onboarding.notificationRounds - 1) await this.settle(300);
    }
    return false;
  }

  // ===========================================================================
  // Setup steps
  // ===========================================================================

  /**
   * Skip the welcome flow. Success means the onboarding marker is gone.
   */
  async skipOnboarding(): Promise<boolean> {
    return this.guard('skipOnboarding', false, async () => {
      const { onboarding } = this.profile;
      this.logger.info('Checking for onboarding screen...');
      await this.settle(500);

      let shown = true;
      try {
        shown = await this.screenShows([onboarding.marker.value]);
      } catch (error) {
        if (isInterruption(error)) throw error;
        this.logger.debug(`Could not inspect screen: ${errorMessage(error)}`);
      }

      if (!shown) {
        this.logger.info('No onboarding screen');
        await this.allowNotifications();
        return true;
      }

      const onboardingGone = async () => !(await this.isPresent(onboarding.marker, 500));
      const getStartedTap = new DeviceTapStrategy(this.device, onboarding.getStartedPoint, 'Get Started');

      const result = await this.chain([
        verifiedBy(new DeviceTapStrategy(this.device, onboarding.skipButton, 'Skip'), onboardingGone, {
          settleMs: 1000,
          clock: this.clock,
        }),
        ...this.clicks(onboarding.getStartedLocators),
        verifiedBy(getStartedTap, onboardingGone, { settleMs: 1500, clock: this.clock }),
        verifiedBy(new RepeatedTapStrategy(getStartedTap, onboarding.retapCount, 300, this.clock), onboardingGone, {
          settleMs: 1000,
          clock: this.clock,
        }),
      ]);

      if (result.success) {
        this.logger.success(`Onboarding skipped via ${result.method}`);
        // bottom sheet animation
        await this.settle(2000);
      } else {
        this.logger.warn(`Still on onboarding after: ${result.attemptedMethods.join(', ')}`);
      }

      await this.allowNotifications();
      return result.success;
    });
  }

  /**
   * Accept whichever runtime permission dialog is showing. No dialog is success.
   */
  async grantPermissions(): Promise<boolean> {
    return this.guard('grantPermissions', true, async () => {
      const result = await this.chain(
        this.clicks(this.profile.permissions.buttons, this.timings.permissionTimeoutMs)
      );
      if (result.success) {
        this.logger.success(`Permission granted (${result.method})`);
        await this.settle(500);
      }
      return true;
    });
  }

  // ===========================================================================
  // Upload
  // ===========================================================================

  async openGallery(): Promise<boolean> {
    return this.guard('openGallery', false, async () => {
      const { gallery } = this.profile;
      this.logger.info('Opening gallery...');
      await this.settle(1000);

      const byLocator = await this.chain(this.clicks(gallery.locators, this.timings.galleryTimeoutMs));
      if (byLocator.success) {
        this.logger.success(`Gallery opened via ${byLocator.method}`);
        await this.settle(2000);
        return true;
      }

      await this.dumpTree(gallery.debugDumpFile);

      const byPosition = await this.chain(
        gallery.fallbackPositions.map((position) =>
          verifiedBy(
            new ProportionalTapStrategy(this.client, this.device, position),
            () => this.screenShows(gallery.pickerMarkers),
            { settleMs: 1000, clock: this.clock }
          )
        )
      );
      if (byPosition.success) {
        this.logger.success(`Gallery opened via ${byPosition.method}`);
        return true;
      }

      this.logger.warn('Could not find gallery button');
      return false;
    });
  }

  async selectImage(imagePath: string): Promise<boolean> {
    return this.guard('selectImage', false, async () => {
      const { imageSelection } = this.profile;
      const imageName = path.basename(imagePath);
      const stem = path.parse(imageName).name;
      const devicePath = path.posix.join(imageSelection.deviceDirectory, imageName);
      this.logger.info(`Selecting image: ${imageName}`);

      if (await this.device.pushFile(imagePath, devicePath)) {
        this.logger.info(`Image copied to ${devicePath}`);
      } else {
        this.logger.warn('Could not copy image to device');
      }
      await this.settle(500);

      const folder = await this.chain(this.clicks(imageSelection.folderLocators));
      if (folder.success) await this.settle(500);

      let selected = await this.chain(
        this.clicks([
          { strategy: 'textContains', value: stem, className: 'android.widget.TextView' },
          { strategy: 'text', value: imageName, className: 'android.widget.TextView' },
          { strategy: 'descriptionContains', value: stem },
        ])
      );

      if (selected.success) {
        this.logger.success(`Image selected by name: ${imageName}`);
      } else {
        // Heuristic: the newest file is usually among the first thumbnails
        this.logger.info('Image name not found in picker, falling back to first images');
        const thumbnails: Locator[] = [];
        for (let index = 1; index <= imageSelection.fallbackImageCount; index++) {
          thumbnails.push({ strategy: 'className', value: imageSelection.imageClassName, index });
        }
        selected = await this.chain(this.clicks(thumbnails));
      }

      if (!selected.success) {
        this.logger.warn('Could not select an image');
        await this.dumpTree('select_image_debug.json');
        return false;
      }

      await this.settle(1500);
      return true;
    });
  }

  /**
   * Relaunch the target when something else is in the foreground.
   */
  async ensureAppRunning(): Promise<boolean> {
    return this.guard('ensureAppRunning', false, async () => {
      const foreground = await this.device.foregroundApp();
      if (foreground === this.target.packageName) return true;

      this.logger.info(`App not in foreground (${foreground ?? 'unknown'}), relaunching...`);
      const launched = await this.device.launch(this.target);
      await this.settle(2000);
      return launched;
    });
  }

  /**
   * Hand the image to the app with a VIEW intent instead of the picker.
   */
  async uploadViaIntent(imagePath: string): Promise<boolean> {
    return this.guard('uploadViaIntent', false, async () => {
      const { onboarding, imageSelection } = this.profile;
      const imageName = path.basename(imagePath);
      const devicePath = path.posix.join(imageSelection.deviceDirectory, imageName);
      this.logger.info(`Uploading via intent: ${imageName}`);

      await this.ensureAppRunning();

      if (!(await this.device.pushFile(imagePath, devicePath))) {
        this.logger.warn('Could not copy image to device');
        return false;
      }
      if (!(await this.device.viewImage(this.target, devicePath))) {
        this.logger.warn('Image intent failed');
        await this.ensureAppRunning();
        return false;
      }

      await this.settle(2000);
      await this.ensureAppRunning();

      // The intent sometimes restarts the app on its welcome screen
      const hierarchy = await this.client.hierarchy();
      if (onboarding.resetMarkers.every((marker) => screenContains(hierarchy, [marker]))) {
        const { x, y } = onboarding.getStartedPoint;
        this.logger.info('App reset to onboarding, tapping Get Started');
        await this.device.rawTap(x, y);
        await this.settle(1000);
        await this.device.rawTap(x, y);
        await this.allowNotifications();
        await this.settle(2000);
      }

      return true;
    });
  }

  // ===========================================================================
  // Waiting
  // ===========================================================================

  /**
   * Wait for the on-device scan to finish. Always proceeds; the outcome is logged.
   */
  async waitForScan(): Promise<boolean> {
    return this.guard('waitForScan', true, async () => {
      const { scan } = this.profile;
      const t = this.timings;
      this.logger.info('Waiting for scan to complete...');

      const started = await pollUntil(() => this.screenShows(scan.busyIndicators), {
        intervalMs: 500,
        timeoutMs: t.scanDetectTimeoutMs,
        maxConsecutiveFailures: t.maxConsecutiveFailures,
        clock: this.clock,
        signal: this.signal,
        logger: this.logger,
      });
      if (started !== 'matched') {
        this.logger.info('No scanning indicator, assuming result is ready');
        return true;
      }

      const outcome = await pollUntil(
        async () => {
          const hierarchy = await this.client.hierarchy();
          return (
            scanStateOf({
              busy: screenContains(hierarchy, scan.stillScanningIndicators),
              resultVisible: screenContains(hierarchy, scan.resultMarkers),
            }) === 'DONE'
          );
        },
        {
          intervalMs: t.scanPollIntervalMs,
          timeoutMs: t.scanTimeoutMs,
          maxConsecutiveFailures: t.maxConsecutiveFailures,
          clock: this.clock,
          signal: this.signal,
          logger: this.logger,
        }
      );

      switch (outcome) {
        case 'matched':
          this.logger.success('Scan complete');
          break;
        case 'session_unresponsive':
          this.logger.warn('Automation session unresponsive, assuming scan complete');
          break;
        case 'timeout':
          this.logger.warn(`Scan did not finish within ${t.scanTimeoutMs / 1000}s, continuing`);
          break;
      }
      return true;
    });
  }

  /**
   * Manual mode: wait for the operator to pick an image, i.e. for a scan or a
   * result to show up.
   */
  async waitForImageSelection(): Promise<boolean> {
    return this.guard('waitForImageSelection', true, async () => {
      const { scan } = this.profile;
      const t = this.timings;
      const markers = [...scan.resultMarkers, ...scan.manualResultMarkers];
      this.logger.info(`Waiting for manual image selection (up to ${t.manualTimeoutMs / 1000}s)...`);

      let checks = 0;
      const outcome = await pollUntil(
        async () => {
          checks += 1;
          if (checks % 5 === 0) {
            this.logger.info(`Still waiting for image selection (check ${checks})`);
          }
          const hierarchy = await this.client.hierarchy();
          return screenContains(hierarchy, scan.busyIndicators) || screenContains(hierarchy, markers);
        },
        {
          intervalMs: t.manualPollIntervalMs,
          timeoutMs: t.manualTimeoutMs,
          maxConsecutiveFailures: t.maxConsecutiveFailures,
          failureBackoffMs: 1000,
          clock: this.clock,
          signal: this.signal,
          logger: this.logger,
        }
      );

      if (outcome === 'matched') {
        this.logger.success('Image selection detected');
      } else {
        this.logger.warn('No image selection detected, continuing');
      }
      return true;
    });
  }

  // ===========================================================================
  // Result screen
  // ===========================================================================

  /**
   * Close an interstitial if one is showing. Never blocks the case.
   */
  async dismissAdvertisement(): Promise<boolean> {
    return this.guard('dismissAdvertisement', true, async () => {
      const { advertisement } = this.profile;
      await this.settle(1000);

      const indicator = this.findAdIndicator(await this.client.hierarchy());
      if (!indicator) {
        this.logger.debug('No advertisement detected');
        return true;
      }

      this.logger.info(`Advertisement detected ("${indicator}"), waiting before closing...`);
      await this.settle(this.timings.adDwellMs);

      const adGone = async () => this.findAdIndicator(await this.client.hierarchy()) === undefined;
      const result = await this.chain([
        ...this.clicks(advertisement.closeLocators),
        ...advertisement.closePositions.map((position) =>
          verifiedBy(new ProportionalTapStrategy(this.client, this.device, position), adGone, {
            settleMs: 500,
            clock: this.clock,
          })
        ),
      ]);

      if (result.success) {
        this.logger.success(`Advertisement closed via ${result.method}`);
        await this.settle(1000);
      } else {
        this.logger.warn('Could not close advertisement');
      }
      return true;
    });
  }

  /**
   * Scrape the result screen. Falls back to an empty "no identification".
   */
  async extractResult(): Promise<ScrapedResult> {
    return this.guard('extractResult', emptyScrapedResult(), async () => {
      const { extraction } = this.profile;
      this.logger.info('Extracting result...');

      await this.ensureAppRunning();
      await this.settle(2000);

      const hierarchy = await this.client.hierarchy();
      const { texts, descriptions } = collectTextFragments(hierarchy);

      const targeted: string[] = [];
      for (const locator of extraction.targetedLocators) {
        for (const element of matchLocator(hierarchy, locator)) {
          const text = await this.client.textOf(element);
          if (text?.trim()) targeted.push(text.trim());
        }
      }

      const result = mineScrapedResult({ texts, descriptions, targeted }, extraction);
      if (result.species) {
        const confidence = result.confidence !== null ? ` (${result.confidence}%)` : '';
        this.logger.success(`Found: ${result.species}${confidence}`);
      } else {
        this.logger.info('No identification on screen');
      }
      return result;
    });
  }

  async captureScreenshot(fileName: string): Promise<boolean> {
    return this.guard('captureScreenshot', false, async () => {
      await fs.ensureDir(this.resultsDir);
      const saved = await this.client.screenshot(path.join(this.resultsDir, fileName));
      if (!saved) this.logger.warn(`Screenshot ${fileName} was not saved`);
      return saved;
    });
  }

  // ===========================================================================
  // Between cases
  // ===========================================================================

  /**
   * Manual mode: get the app back to a screen where the next image can be picked.
   */
  async clickIdentify(): Promise<boolean> {
    return this.guard('clickIdentify', false, async () => {
      const result = await this.chain(
        this.clicks(this.profile.reset.identifyLocators, this.timings.identifyTimeoutMs)
      );
      if (result.success) {
        this.logger.success('Clicked Identify, ready for next test');
        await this.settle(2000);
        return true;
      }
      this.logger.warn('Identify button not found');
      return false;
    });
  }

  async resetForNextTest(): Promise<boolean> {
    return this.guard('resetForNextTest', false, async () => {
      const { reset } = this.profile;

      const again = await this.chain(this.clicks(reset.locators));
      if (again.success) {
        this.logger.info(`Reset via ${again.method}`);
        await this.settle(2000);
        return true;
      }

      if (await this.clickIdentify()) return true;

      const back = await this.chain([
        ...this.clicks(reset.backLocators),
        { name: 'navigate back', attempt: () => this.client.navigateBack() },
      ]);
      if (back.success) {
        this.logger.info(`Reset via ${back.method}`);
        await this.settle(2000);
        return true;
      }

      this.logger.warn('Could not reset app state');
      return false;
    });
  }
}

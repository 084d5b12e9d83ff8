/**
 * @scanprobe/runner - Type definitions
 */

import type { ImageType, ScrapedResult, TestCase, TestResult } from '@scanprobe/evaluation';

export type RunState = 'ready' | 'running' | 'completed' | 'interrupted' | 'failed';

export type RunMode = 'automated' | 'manual';

export type UploadMethod = 'gallery' | 'intent';

/**
 * The sequencer steps a run needs. `InteractionSequencer` is the real one.
 */
export interface CaseSequencer {
  skipOnboarding(): Promise<boolean>;
  grantPermissions(): Promise<boolean>;
  openGallery(): Promise<boolean>;
  selectImage(imagePath: string): Promise<boolean>;
  uploadViaIntent(imagePath: string): Promise<boolean>;
  waitForScan(): Promise<boolean>;
  waitForImageSelection(): Promise<boolean>;
  dismissAdvertisement(): Promise<boolean>;
  extractResult(): Promise<ScrapedResult>;
  captureScreenshot(fileName: string): Promise<boolean>;
  resetForNextTest(): Promise<boolean>;
  clickIdentify(): Promise<boolean>;
}

/** Where a test case's image file lives on this machine */
export interface ImageSource {
  resolveImagePath(imageName: string, imageType: ImageType): Promise<string>;
}

export interface RunOutcome {
  state: RunState;
  /** Every recorded result, in start order */
  results: TestResult[];
  total: number;
  durationMs: number;
}

export type RunEvent =
  | { type: 'run_started'; total: number; mode: RunMode }
  | { type: 'case_started'; index: number; total: number; testCase: TestCase }
  | { type: 'case_finished'; index: number; total: number; result: TestResult }
  | { type: 'run_finished'; outcome: RunOutcome };

export type RunEventCallback = (event: RunEvent) => void;

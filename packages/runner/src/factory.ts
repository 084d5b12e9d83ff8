import { Logger, type Clock } from '@scanprobe/shared';
import { AdbDeviceControl, MaestroClient } from '@scanprobe/device';
import { ResultClassifier, loadRules } from '@scanprobe/evaluation';
import { InteractionSequencer, loadProfile, type AppProfile } from '@scanprobe/interactions';
import type { RunConfig } from './config.js';
import { RunOrchestrator } from './orchestrator.js';
import { TestCaseStore } from './test-data.js';
import type { RunEventCallback } from './types.js';

export interface CreateRunOptions {
  logger?: Logger;
  clock?: Clock;
  signal?: AbortSignal;
  onEvent?: RunEventCallback;
}

export interface RunContext {
  profile: AppProfile;
  store: TestCaseStore;
  client: MaestroClient;
  device: AdbDeviceControl;
  sequencer: InteractionSequencer;
  orchestrator: RunOrchestrator;
}

function withAppOverrides(profile: AppProfile, config: RunConfig): AppProfile {
  return {
    ...profile,
    app: {
      ...profile.app,
      packageName: config.appPackage ?? profile.app.packageName,
      activity: config.appActivity ?? profile.app.activity,
    },
  };
}

export function createTestCaseStore(config: RunConfig, logger?: Logger): TestCaseStore {
  return new TestCaseStore({
    casesFile: config.testCasesFile,
    originalImagesDir: config.originalImagesDir,
    augmentedImagesDir: config.augmentedImagesDir,
    alternativeImageDirs: config.alternativeImageDirs,
    logger: logger?.child('[TestData]'),
  });
}

/**
 * Wire a Maestro session, adb, the sequencer and the classifier for one run.
 */
export function createRun(config: RunConfig, options: CreateRunOptions = {}): RunContext {
  const logger = options.logger ?? new Logger({ level: config.logLevel, logFile: config.logFile });
  const profile = withAppOverrides(loadProfile(config.profilePath), config);

  const client = new MaestroClient({
    appId: profile.app.packageName,
    deviceId: config.deviceId,
    maestroPath: config.maestroPath,
    commandTimeoutMs: config.maestroCommandTimeoutMs,
    hierarchyTimeoutMs: config.hierarchyTimeoutMs,
    logger: logger.child('[Maestro]'),
    clock: options.clock,
  });

  const device = new AdbDeviceControl({
    deviceId: config.deviceId,
    adbPath: config.adbPath,
    logger: logger.child('[ADB]'),
  });

  const sequencer = new InteractionSequencer({
    client,
    device,
    profile,
    resultsDir: config.resultsDir,
    timings: config.timings,
    logger: logger.child('[Sequencer]'),
    clock: options.clock,
    signal: options.signal,
  });

  const store = createTestCaseStore(config, logger);

  const orchestrator = new RunOrchestrator({
    client,
    sequencer,
    classifier: new ResultClassifier(loadRules(config.rulesPath)),
    images: store,
    mode: config.manualMode ? 'manual' : 'automated',
    uploadMethod: config.uploadMethod,
    settleBetweenCasesMs: config.settleBetweenCasesMs,
    logger: logger.child('[Runner]'),
    clock: options.clock,
    signal: options.signal,
    onEvent: options.onEvent,
  });

  return { profile, store, client, device, sequencer, orchestrator };
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { Logger, RunInterruptedError, SetupError, type Clock } from '@scanprobe/shared';
import type { UiAutomationClient } from '@scanprobe/device';
import { ResultClassifier, type ScrapedResult, type TestCase } from '@scanprobe/evaluation';
import { RunOrchestrator, type RunOrchestratorOptions } from './orchestrator.js';
import type { CaseSequencer, RunEvent } from './types.js';

const dragonfly: ScrapedResult = {
  species: 'Dragonfly',
  confidence: 87,
  fullText: 'dragonfly anisoptera 87% match',
  status: 'identified',
};

const housefly: ScrapedResult = {
  species: 'Housefly',
  confidence: 80,
  fullText: 'housefly 80% match',
  status: 'identified',
};

class FakeSequencer implements CaseSequencer {
  readonly calls: string[] = [];
  galleryOpens = true;
  selectionWorks = true;
  extracted: ScrapedResult = dragonfly;
  /** Runs before each step; throw from here to fail a step */
  onStep?: (step: string) => void;

  private step(name: string): void {
    this.calls.push(name);
    this.onStep?.(name);
  }

  async skipOnboarding() {
    this.step('skipOnboarding');
    return true;
  }
  async grantPermissions() {
    this.step('grantPermissions');
    return true;
  }
  async openGallery() {
    this.step('openGallery');
    return this.galleryOpens;
  }
  async selectImage(imagePath: string) {
    this.step(`selectImage:${path.basename(imagePath)}`);
    return this.selectionWorks;
  }
  async uploadViaIntent(imagePath: string) {
    this.step(`uploadViaIntent:${path.basename(imagePath)}`);
    return true;
  }
  async waitForScan() {
    this.step('waitForScan');
    return true;
  }
  async waitForImageSelection() {
    this.step('waitForImageSelection');
    return true;
  }
  async dismissAdvertisement() {
    this.step('dismissAdvertisement');
    return true;
  }
  async extractResult() {
    this.step('extractResult');
    return this.extracted;
  }
  async captureScreenshot(fileName: string) {
    this.step(`captureScreenshot:${fileName}`);
    return true;
  }
  async resetForNextTest() {
    this.step('resetForNextTest');
    return true;
  }
  async clickIdentify() {
    this.step('clickIdentify');
    return true;
  }
}

function fakeClient(): UiAutomationClient {
  const unused = () => Promise.reject(new Error('not used by the orchestrator'));
  return {
    start: vi.fn(async () => undefined),
    stop: vi.fn(async () => undefined),
    locate: unused,
    click: unused,
    textOf: unused,
    treeDump: unused,
    hierarchy: unused,
    screenshot: unused,
    tap: unused,
    navigateBack: unused,
    windowSize: unused,
  };
}

function testClock(): Clock & { sleeps: number[] } {
  let t = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

const testCase = (n: number, imageName = `dragonfly_${n}.jpg`): TestCase => ({
  testId: `TC00${n}`,
  imageName,
  imageType: 'original',
  expectedSpecies: 'dragonfly',
  augmentation: 'none',
});

let imagesDir: string;

beforeEach(async () => {
  imagesDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanprobe-run-'));
  for (const n of [1, 2, 3]) {
    await fs.writeFile(path.join(imagesDir, `dragonfly_${n}.jpg`), 'jpeg');
  }
});

afterEach(async () => {
  await fs.remove(imagesDir);
});

function build(overrides: Partial<RunOrchestratorOptions> = {}) {
  const client = fakeClient();
  const sequencer = new FakeSequencer();
  const clock = testClock();
  const events: RunEvent[] = [];
  const orchestrator = new RunOrchestrator({
    client,
    sequencer,
    classifier: new ResultClassifier(),
    images: { resolveImagePath: async (imageName) => path.join(imagesDir, imageName) },
    logger: new Logger({ silent: true }),
    clock,
    onEvent: (event) => events.push(event),
    ...overrides,
  });
  return { client, sequencer, clock, events, orchestrator };
}

describe('setup', () => {
  it('starts the session, skips onboarding and grants permissions', async () => {
    const { client, sequencer, clock, orchestrator } = build();

    await orchestrator.setup();

    expect(client.start).toHaveBeenCalledTimes(1);
    expect(sequencer.calls).toEqual(['skipOnboarding', 'grantPermissions']);
    expect(clock.sleeps).toEqual([500]);
    expect(orchestrator.state).toBe('ready');
  });

  it('only grants permissions in manual mode', async () => {
    const { sequencer, orchestrator } = build({ mode: 'manual' });

    await orchestrator.setup();

    expect(sequencer.calls).toEqual(['grantPermissions']);
  });

  it('fails the run when no session can be started', async () => {
    const { client, sequencer, orchestrator } = build();
    vi.mocked(client.start).mockRejectedValue(new Error('maestro not found'));

    const setup = orchestrator.setup();

    await expect(setup).rejects.toBeInstanceOf(SetupError);
    await expect(setup).rejects.toThrow('Could not start automation session: maestro not found');
    expect(orchestrator.state).toBe('failed');
    expect(orchestrator.getSession()?.error).toBe('Could not start automation session: maestro not found');
    expect(sequencer.calls).toEqual([]);
  });

  it('refuses to run before setup', async () => {
    const { orchestrator } = build();

    await expect(orchestrator.runAll([testCase(1)])).rejects.toThrow(
      'Cannot start a run in state ready before setup'
    );
  });
});

describe('runAll', () => {
  it('runs every case through the gallery flow and completes', async () => {
    const { sequencer, clock, events, orchestrator } = build();
    await orchestrator.setup();
    sequencer.calls.length = 0;

    const outcome = await orchestrator.runAll([testCase(1), testCase(2)]);

    expect(outcome.state).toBe('completed');
    expect(outcome.total).toBe(2);
    expect(outcome.results.map((r) => [r.testId, r.status])).toEqual([
      ['TC001', 'passed'],
      ['TC002', 'passed'],
    ]);
    expect(outcome.results[0].classification?.category).toBe('correct_species');
    expect(outcome.results[0].appResult).toEqual(dragonfly);
    expect(sequencer.calls.slice(0, 8)).toEqual([
      'captureScreenshot:screenshot_before_TC001.png',
      'openGallery',
      'selectImage:dragonfly_1.jpg',
      'waitForScan',
      'dismissAdvertisement',
      'extractResult',
      'captureScreenshot:screenshot_after_TC001.png',
      'resetForNextTest',
    ]);
    expect(clock.sleeps).toEqual([500, 2000, 2000]);
    expect(outcome.durationMs).toBe(4000);
    expect(outcome.results.map((r) => r.timestamp)).toEqual([
      '1970-01-01T00:00:00.500Z',
      '1970-01-01T00:00:02.500Z',
    ]);
    expect(events.map((e) => e.type)).toEqual([
      'run_started',
      'case_started',
      'case_finished',
      'case_started',
      'case_finished',
      'run_finished',
    ]);
    expect(orchestrator.state).toBe('completed');
  });

  it('falls back to the intent upload when gallery selection fails', async () => {
    const { sequencer, orchestrator } = build();
    sequencer.selectionWorks = false;
    await orchestrator.setup();

    await orchestrator.runAll([testCase(1)]);

    expect(sequencer.calls).toContain('uploadViaIntent:dragonfly_1.jpg');
    expect(sequencer.calls.indexOf('selectImage:dragonfly_1.jpg')).toBeLessThan(
      sequencer.calls.indexOf('uploadViaIntent:dragonfly_1.jpg')
    );
  });

  it('skips the gallery with the intent upload method', async () => {
    const { sequencer, orchestrator } = build({ uploadMethod: 'intent' });
    await orchestrator.setup();

    await orchestrator.runAll([testCase(1)]);

    expect(sequencer.calls).not.toContain('openGallery');
    expect(sequencer.calls).toContain('uploadViaIntent:dragonfly_1.jpg');
  });

  it('marks a wrong identification as failed', async () => {
    const { sequencer, orchestrator } = build();
    sequencer.extracted = housefly;
    await orchestrator.setup();

    const { results } = await orchestrator.runAll([testCase(1)]);

    expect(results[0].status).toBe('failed');
    expect(results[0].classification?.category).toBe('incorrect_species');
    expect(results[0].classification?.appSpecies).toBe('Housefly');
  });

  it('records a missing image as an error and moves on', async () => {
    const { sequencer, orchestrator } = build();
    await orchestrator.setup();
    sequencer.calls.length = 0;

    const { results, state } = await orchestrator.runAll([testCase(9, 'missing.jpg'), testCase(1)]);

    expect(state).toBe('completed');
    expect(results[0].status).toBe('error');
    expect(results[0].error).toBe(`Image not found: ${path.join(imagesDir, 'missing.jpg')}`);
    expect(results[0].appResult).toBeUndefined();
    expect(results[1].status).toBe('passed');
    expect(sequencer.calls[0]).toBe('captureScreenshot:screenshot_before_TC001.png');
  });

  it('records a step failure as an error result', async () => {
    const { sequencer, orchestrator } = build();
    sequencer.onStep = (step) => {
      if (step === 'extractResult') throw new Error('session lost');
    };
    await orchestrator.setup();

    const { results } = await orchestrator.runAll([testCase(1)]);

    expect(results).toHaveLength(1);
    expect(results[0].status).toBe('error');
    expect(results[0].error).toBe('session lost');
  });

  it('keeps one result when the reset after recording fails', async () => {
    const { sequencer, orchestrator } = build();
    sequencer.onStep = (step) => {
      if (step === 'resetForNextTest') throw new Error('back button missing');
    };
    await orchestrator.setup();

    const { results } = await orchestrator.runAll([testCase(1)]);

    expect(results).toHaveLength(1);
    expect(results[0].status).toBe('passed');
    expect(results[0].error).toBeUndefined();
  });

  it('stops at the interrupted case and keeps what was recorded', async () => {
    const controller = new AbortController();
    const { sequencer, events, orchestrator } = build({ signal: controller.signal });
    let scans = 0;
    sequencer.onStep = (step) => {
      if (step === 'waitForScan' && ++scans === 2) {
        controller.abort();
        throw new RunInterruptedError();
      }
    };
    await orchestrator.setup();

    const outcome = await orchestrator.runAll([testCase(1), testCase(2), testCase(3)]);

    expect(outcome.state).toBe('interrupted');
    expect(outcome.total).toBe(3);
    expect(outcome.results.map((r) => [r.testId, r.status])).toEqual([
      ['TC001', 'passed'],
      ['TC002', 'interrupted'],
    ]);
    expect(outcome.results[1].error).toBe('Test interrupted by user');
    expect(sequencer.calls).not.toContain('captureScreenshot:screenshot_before_TC003.png');
    expect(events.at(-1)).toEqual({ type: 'run_finished', outcome });
    expect(orchestrator.getSession()?.interrupted).toBe(1);
  });

  it('does not re-record a case interrupted after its result was saved', async () => {
    const controller = new AbortController();
    const { sequencer, orchestrator } = build({ signal: controller.signal });
    sequencer.onStep = (step) => {
      if (step === 'resetForNextTest') {
        controller.abort();
        throw new RunInterruptedError();
      }
    };
    await orchestrator.setup();

    const outcome = await orchestrator.runAll([testCase(1), testCase(2)]);

    expect(outcome.state).toBe('interrupted');
    expect(outcome.results.map((r) => [r.testId, r.status])).toEqual([['TC001', 'passed']]);
  });

  it('uses the manual flow without pauses between cases', async () => {
    const { sequencer, clock, orchestrator } = build({ mode: 'manual' });
    await orchestrator.setup();
    sequencer.calls.length = 0;

    const outcome = await orchestrator.runAll([testCase(1), testCase(2)]);

    expect(sequencer.calls.slice(0, 7)).toEqual([
      'captureScreenshot:screenshot_before_TC001.png',
      'waitForImageSelection',
      'waitForScan',
      'dismissAdvertisement',
      'extractResult',
      'captureScreenshot:screenshot_after_TC001.png',
      'clickIdentify',
    ]);
    expect(clock.sleeps).toEqual([]);
    expect(outcome.results).toHaveLength(2);
  });
});

describe('writeReport', () => {
  let reportsDir: string;

  beforeEach(async () => {
    reportsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanprobe-reports-'));
  });

  afterEach(async () => {
    await fs.remove(reportsDir);
  });

  it('writes nothing for an empty run', async () => {
    const { orchestrator } = build();

    await expect(orchestrator.writeReport(reportsDir)).resolves.toBeNull();
    expect(await fs.readdir(reportsDir)).toEqual([]);
  });

  it('writes the report for the recorded results', async () => {
    const { sequencer, orchestrator } = build();
    await orchestrator.setup();
    let n = 0;
    sequencer.onStep = (step) => {
      if (step === 'extractResult') sequencer.extracted = ++n === 1 ? dragonfly : housefly;
    };
    await orchestrator.runAll([testCase(1), testCase(2)]);

    const written = await orchestrator.writeReport(reportsDir, new Date(2026, 9, 18, 21, 4, 55));

    expect(written).not.toBeNull();
    expect(written?.path).toBe(path.join(reportsDir, 'test_report_20261018_210455.json'));
    expect(written?.report.totalTests).toBe(2);
    expect(written?.report.summary.correct_species).toBe(1);
    expect(written?.report.summary.incorrect_species).toBe(1);
    expect(written?.report.summary.accuracy).toBe(50);
    expect(await fs.pathExists(path.join(reportsDir, 'test_report_20261018_210455.json'))).toBe(true);
  });
});

describe('teardown', () => {
  it('swallows errors from stopping the session', async () => {
    const { client, orchestrator } = build();
    vi.mocked(client.stop).mockRejectedValue(new Error('already gone'));

    await expect(orchestrator.teardown()).resolves.toBeUndefined();
    expect(client.stop).toHaveBeenCalledTimes(1);
  });
});

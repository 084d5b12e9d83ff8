/**
 * @scanprobe/runner
 *
 * Run orchestration, run configuration and the test-case store.
 */

export * from './types.js';
export {
  CONFIG_FILE_NAME,
  RunConfigSchema,
  configFromEnv,
  loadConfig,
  type LoadConfigOptions,
  type RunConfig,
  type RunConfigInput,
} from './config.js';
export {
  DEFAULT_AUGMENTATION_EFFECTS,
  DEFAULT_TEST_CASES,
  IMAGE_EXTENSIONS,
  TestCaseStore,
  expectedSpeciesFor,
  type TestCaseStoreOptions,
} from './test-data.js';
export { RunSessionManager, type RunSession } from './session.js';
export { RunOrchestrator, type RunOrchestratorOptions } from './orchestrator.js';
export { createRun, createTestCaseStore, type CreateRunOptions, type RunContext } from './factory.js';

/**
 * Run configuration
 *
 * Layered as: defaults <- scanprobe.config.yaml <- SCANPROBE_* environment
 * <- explicit overrides. Relative paths resolve against the working directory.
 */

import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@scanprobe/shared';

export const CONFIG_FILE_NAME = 'scanprobe.config.yaml';

const duration = z.number().int().nonnegative();

const TimingsSchema = z
  .object({
    locateTimeoutMs: duration,
    permissionTimeoutMs: duration,
    galleryTimeoutMs: duration,
    identifyTimeoutMs: duration,
    scanDetectTimeoutMs: duration,
    scanPollIntervalMs: duration,
    scanTimeoutMs: duration,
    manualPollIntervalMs: duration,
    manualTimeoutMs: duration,
    maxConsecutiveFailures: z.number().int().positive(),
    adDwellMs: duration,
  })
  .partial()
  .strict();

export const RunConfigSchema = z
  .object({
    /** adb serial / emulator id; the first connected device when unset */
    deviceId: z.string().min(1).optional(),
    adbPath: z.string().min(1).default('adb'),
    maestroPath: z.string().min(1).default('maestro'),
    /** Override the profile's package and launcher activity */
    appPackage: z.string().min(1).optional(),
    appActivity: z.string().min(1).optional(),
    profilePath: z.string().min(1).optional(),
    rulesPath: z.string().min(1).optional(),

    testCasesFile: z.string().min(1).default('test_data/test-cases.yaml'),
    originalImagesDir: z.string().min(1).default('samples/original'),
    augmentedImagesDir: z.string().min(1).default('samples/augmented'),
    alternativeImageDirs: z.array(z.string().min(1)).default([]),
    resultsDir: z.string().min(1).default('test_results'),
    reportsDir: z.string().min(1).default('reports'),
    logFile: z.string().min(1).default('logs/scanprobe.log'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    manualMode: z.boolean().default(false),
    uploadMethod: z.enum(['gallery', 'intent']).default('gallery'),
    settleBetweenCasesMs: duration.default(2000),
    maestroCommandTimeoutMs: duration.default(30000),
    hierarchyTimeoutMs: duration.default(10000),
    timings: TimingsSchema.default({}),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

// =============================================================================
// Environment
// =============================================================================

type EnvKind = 'string' | 'number' | 'boolean';

const ENV_KEYS: Record<string, [keyof RunConfigInput, EnvKind]> = {
  SCANPROBE_DEVICE: ['deviceId', 'string'],
  SCANPROBE_ADB_PATH: ['adbPath', 'string'],
  SCANPROBE_MAESTRO_PATH: ['maestroPath', 'string'],
  SCANPROBE_APP_PACKAGE: ['appPackage', 'string'],
  SCANPROBE_APP_ACTIVITY: ['appActivity', 'string'],
  SCANPROBE_PROFILE: ['profilePath', 'string'],
  SCANPROBE_RULES: ['rulesPath', 'string'],
  SCANPROBE_TEST_CASES: ['testCasesFile', 'string'],
  SCANPROBE_ORIGINAL_IMAGES: ['originalImagesDir', 'string'],
  SCANPROBE_AUGMENTED_IMAGES: ['augmentedImagesDir', 'string'],
  SCANPROBE_RESULTS_DIR: ['resultsDir', 'string'],
  SCANPROBE_REPORTS_DIR: ['reportsDir', 'string'],
  SCANPROBE_LOG_FILE: ['logFile', 'string'],
  SCANPROBE_LOG_LEVEL: ['logLevel', 'string'],
  SCANPROBE_MANUAL: ['manualMode', 'boolean'],
  SCANPROBE_UPLOAD_METHOD: ['uploadMethod', 'string'],
  SCANPROBE_SETTLE_MS: ['settleBetweenCasesMs', 'number'],
};

function fromEnvValue(raw: string, kind: EnvKind): string | number | boolean {
  switch (kind) {
    case 'string':
      return raw;
    case 'number':
      return Number(raw);
    case 'boolean':
      return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
  }
}

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, [key, kind]] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    values[key] = fromEnvValue(raw, kind);
  }

  const scanTimeout = env.SCANPROBE_SCAN_TIMEOUT_MS;
  if (scanTimeout) {
    values.timings = { scanTimeoutMs: Number(scanTimeout) };
  }
  return values;
}

// =============================================================================
// Loading
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}`, { cause: errorMessage(error) });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}`, { cause: errorMessage(error) });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Shallow merge, except `timings`, which is merged key by key.
 */
function mergeLayers(layers: readonly Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  let timings: Record<string, unknown> | undefined;

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      if (key === 'timings' && isRecord(value)) {
        timings = { ...timings, ...value };
      } else {
        merged[key] = value;
      }
    }
  }

  if (timings) merged.timings = timings;
  return merged;
}

function resolvePaths(config: RunConfig, cwd: string): RunConfig {
  const resolve = (p: string) => path.resolve(cwd, p);
  return {
    ...config,
    profilePath: config.profilePath && resolve(config.profilePath),
    rulesPath: config.rulesPath && resolve(config.rulesPath),
    testCasesFile: resolve(config.testCasesFile),
    originalImagesDir: resolve(config.originalImagesDir),
    augmentedImagesDir: resolve(config.augmentedImagesDir),
    alternativeImageDirs: config.alternativeImageDirs.map(resolve),
    resultsDir: resolve(config.resultsDir),
    reportsDir: resolve(config.reportsDir),
    logFile: resolve(config.logFile),
  };
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist. Defaults to `./scanprobe.config.yaml` if present. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RunConfigInput;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<RunConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fileLayer: Record<string, unknown> = {};
  if (options.configFile) {
    fileLayer = await readConfigFile(path.resolve(cwd, options.configFile));
  } else {
    const defaultFile = path.join(cwd, CONFIG_FILE_NAME);
    if (await fs.pathExists(defaultFile)) {
      fileLayer = await readConfigFile(defaultFile);
    }
  }

  const merged = mergeLayers([fileLayer, configFromEnv(env), { ...options.overrides }]);
  const result = RunConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return resolvePaths(result.data, cwd);
}

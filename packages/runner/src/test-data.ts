/**
 * Test-case store
 *
 * Test cases live in a YAML file; images live in an "original" and an
 * "augmented" directory.
 */

import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { Logger, ValidationError, errorMessage } from '@scanprobe/shared';
import type { ImageType, TestCase } from '@scanprobe/evaluation';
import type { ImageSource } from './types.js';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp'];

export const DEFAULT_AUGMENTATION_EFFECTS = ['rain', 'snow', 'fog', 'night', 'sunny', 'autumn', 'motion_blur'];

export const DEFAULT_TEST_CASES: TestCase[] = [
  {
    testId: 'TC001',
    imageName: 'dragonfly_closeup_1.jpg',
    expectedSpecies: 'dragonfly',
    imageType: 'original',
    augmentation: 'none',
  },
  {
    testId: 'TC002',
    imageName: 'dragonfly_in_flight_3.jpg',
    expectedSpecies: 'dragonfly',
    imageType: 'original',
    augmentation: 'none',
  },
  {
    testId: 'TC003',
    imageName: 'dragonfly_perched_on_leaf_2.jpg',
    expectedSpecies: 'dragonfly',
    imageType: 'original',
    augmentation: 'none',
  },
];

const TestCaseRecordSchema = z.object({
  test_id: z.string().min(1),
  image_name: z.string().min(1),
  expected_species: z.string().min(1).default('dragonfly'),
  image_type: z.enum(['original', 'augmented']).default('original'),
  augmentation: z.string().min(1).default('none'),
});

const TestCaseFileSchema = z.object({
  test_cases: z.array(TestCaseRecordSchema).default([]),
});

type TestCaseRecord = z.infer<typeof TestCaseRecordSchema>;

function toRecord(testCase: TestCase): TestCaseRecord {
  return {
    test_id: testCase.testId,
    image_name: testCase.imageName,
    expected_species: testCase.expectedSpecies,
    image_type: testCase.imageType,
    augmentation: testCase.augmentation,
  };
}

function fromRecord(record: TestCaseRecord): TestCase {
  return {
    testId: record.test_id,
    imageName: record.image_name,
    expectedSpecies: record.expected_species,
    imageType: record.image_type,
    augmentation: record.augmentation,
  };
}

/**
 * Expected label from an image file name.
 */
export function expectedSpeciesFor(imageName: string): string {
  const name = imageName.toLowerCase();
  if (name.includes('darner')) return 'darner';
  if (name.includes('skimmer')) return 'skimmer';
  return 'dragonfly';
}

function isImageFile(fileName: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

const pad = (n: number, width: number) => String(n).padStart(width, '0');

export interface TestCaseStoreOptions {
  casesFile: string;
  originalImagesDir: string;
  augmentedImagesDir: string;
  /** Searched, in order, when an image is not in its own directory */
  alternativeImageDirs?: string[];
  logger?: Logger;
}

export class TestCaseStore implements ImageSource {
  private readonly casesFile: string;
  private readonly originalImagesDir: string;
  private readonly augmentedImagesDir: string;
  private readonly alternativeImageDirs: string[];
  private readonly logger: Logger;

  constructor(options: TestCaseStoreOptions) {
    this.casesFile = options.casesFile;
    this.originalImagesDir = options.originalImagesDir;
    this.augmentedImagesDir = options.augmentedImagesDir;
    this.alternativeImageDirs = options.alternativeImageDirs ?? [];
    this.logger = options.logger ?? new Logger({ prefix: '[TestData]' });
  }

  get filePath(): string {
    return this.casesFile;
  }

  imageDir(imageType: ImageType): string {
    return imageType === 'original' ? this.originalImagesDir : this.augmentedImagesDir;
  }

  /**
   * Write the default cases unless a case file already exists.
   * @returns whether a file was created
   */
  async createDefaults(): Promise<boolean> {
    if (await fs.pathExists(this.casesFile)) {
      this.logger.debug(`Test cases file already exists: ${this.casesFile}`);
      return false;
    }
    await this.save(DEFAULT_TEST_CASES);
    this.logger.info(`Created default test cases file: ${this.casesFile}`);
    return true;
  }

  async save(testCases: readonly TestCase[]): Promise<void> {
    await fs.ensureDir(path.dirname(this.casesFile));
    const document = { test_cases: testCases.map(toRecord) };
    await fs.writeFile(this.casesFile, stringifyYaml(document));
    this.logger.debug(`Saved ${testCases.length} test cases to ${this.casesFile}`);
  }

  async load(): Promise<TestCase[]> {
    if (!(await fs.pathExists(this.casesFile))) {
      this.logger.warn('Test cases file not found, creating defaults...');
      await this.createDefaults();
    }

    let raw: unknown;
    try {
      raw = parseYaml(await fs.readFile(this.casesFile, 'utf-8'));
    } catch (error) {
      throw new ValidationError(`Could not read test cases from ${this.casesFile}`, {
        cause: errorMessage(error),
      });
    }

    const result = TestCaseFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ValidationError(`Invalid test cases in ${this.casesFile}`, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const testCases = result.data.test_cases.map(fromRecord);
    const seen = new Set<string>();
    for (const testCase of testCases) {
      if (seen.has(testCase.testId)) {
        throw new ValidationError(`Duplicate test id ${testCase.testId} in ${this.casesFile}`);
      }
      seen.add(testCase.testId);
    }

    this.logger.debug(`Loaded ${testCases.length} test cases from ${this.casesFile}`);
    return testCases;
  }

  /**
   * Image file names in one directory, sorted.
   */
  async listImages(imageType: ImageType = 'original'): Promise<string[]> {
    const dir = this.imageDir(imageType);
    if (!(await fs.pathExists(dir))) {
      this.logger.warn(`Image directory not found: ${dir}`);
      return [];
    }
    const entries = await fs.readdir(dir);
    return entries.filter(isImageFile).sort();
  }

  /**
   * Path of an image, looking in the alternative locations when it is not in
   * its own directory. Returns the primary path when nothing exists.
   */
  async resolveImagePath(imageName: string, imageType: ImageType = 'original'): Promise<string> {
    const primary = path.join(this.imageDir(imageType), imageName);
    if (await fs.pathExists(primary)) return primary;

    const otherType: ImageType = imageType === 'original' ? 'augmented' : 'original';
    const candidates = [this.imageDir(otherType), ...this.alternativeImageDirs].map((dir) =>
      path.join(dir, imageName)
    );
    for (const candidate of candidates) {
      if (await fs.pathExists(candidate)) {
        this.logger.info(`Found image at alternative location: ${candidate}`);
        return candidate;
      }
    }

    this.logger.warn(`Image not found: ${primary}`);
    return primary;
  }

  /**
   * Append `<base>_AUG01...` cases for `<stem>_<effect>.png` variants of an
   * original image. Ids that already exist are left alone.
   */
  async addAugmentedTestCases(originalImage: string, effects: readonly string[]): Promise<TestCase[]> {
    const existing = await this.load();
    const base = existing.find((testCase) => testCase.imageName === originalImage);
    const baseId = base?.testId ?? `TC${pad(existing.length + 1, 3)}`;
    const expectedSpecies = base?.expectedSpecies ?? expectedSpeciesFor(originalImage);
    const stem = path.parse(originalImage).name;
    const knownIds = new Set(existing.map((testCase) => testCase.testId));

    const added: TestCase[] = [];
    effects.forEach((effect, i) => {
      const testId = `${baseId}_AUG${pad(i + 1, 2)}`;
      if (knownIds.has(testId)) return;
      added.push({
        testId,
        imageName: `${stem}_${effect}.png`,
        expectedSpecies,
        imageType: 'augmented',
        augmentation: effect,
      });
    });

    if (added.length > 0) {
      await this.save([...existing, ...added]);
    }
    this.logger.info(`Added ${added.length} augmented test cases for ${originalImage}`);
    return added;
  }

  /**
   * Augmented cases for every original image with "dragonfly" in its name.
   */
  async addAugmentedForAll(effects: readonly string[] = DEFAULT_AUGMENTATION_EFFECTS): Promise<TestCase[]> {
    const added: TestCase[] = [];
    for (const image of await this.listImages('original')) {
      if (image.toLowerCase().includes('dragonfly')) {
        added.push(...(await this.addAugmentedTestCases(image, effects)));
      }
    }
    return added;
  }

  /**
   * Replace the case file with one original case per image in the original
   * directory, deriving the expected label from the file name.
   */
  async generateFromImages(): Promise<TestCase[]> {
    const images = await this.listImages('original');
    const testCases = images.map((imageName, i): TestCase => ({
      testId: `TC${pad(i + 1, 3)}`,
      imageName,
      expectedSpecies: expectedSpeciesFor(imageName),
      imageType: 'original',
      augmentation: 'none',
    }));

    if (testCases.length > 0) {
      await this.save(testCases);
      this.logger.info(`Generated ${testCases.length} test cases in ${this.casesFile}`);
    } else {
      this.logger.warn(`No images found in ${this.originalImagesDir}`);
    }
    return testCases;
  }
}

/**
 * @scanprobe/evaluation - Type definitions
 */

// =============================================================================
// Test cases and scraped output
// =============================================================================

export type ImageType = 'original' | 'augmented';

export interface TestCase {
  testId: string;
  imageName: string;
  imageType: ImageType;
  /** Expected label: a subtype (`darner`, `skimmer`) or the bare genus */
  expectedSpecies: string;
  /** Effect tag, `none` for originals */
  augmentation: string;
}

export type ScrapedStatus = 'identified' | 'no_identification';

/** What the app showed after a scan */
export interface ScrapedResult {
  species: string | null;
  /** 0-100 */
  confidence: number | null;
  /** Lowercased concatenation of every text fragment on screen */
  fullText: string | null;
  status: ScrapedStatus;
}

// =============================================================================
// Classification
// =============================================================================

export const CLASSIFICATION_CATEGORIES = [
  'correct_species',
  'incorrect_species',
  'no_identification',
] as const;

export type ClassificationCategory = (typeof CLASSIFICATION_CATEGORIES)[number];

/** Legacy category, read as `no_identification` */
export type LegacyCategory = 'uncertain';

export interface Classification {
  category: ClassificationCategory;
  reason: string;
  /** e.g. `dragonfly_darner`, the raw species, or `no_insect_visible` */
  appSpecies: string;
  expectedSpecies: string;
  confidence: number | null;
}

// =============================================================================
// Results and reports
// =============================================================================

export type TestStatus = 'passed' | 'failed' | 'error' | 'interrupted';

export interface TestResult {
  testId: string;
  imageName: string;
  imageType: ImageType;
  augmentation: string;
  expectedSpecies: string;
  /** ISO timestamp of when the case started */
  timestamp: string;
  status: TestStatus;
  appResult?: ScrapedResult;
  classification?: Classification;
  error?: string;
}

export interface CategorySummary {
  total: number;
  correct_species: number;
  incorrect_species: number;
  no_identification: number;
  /** Percentage of correct_species, 2 decimals */
  accuracy: number;
}

export interface DetailedSummary {
  correctSpecies: TestResult[];
  incorrectSpecies: TestResult[];
  noIdentification: TestResult[];
  errors: TestResult[];
}

export interface Report {
  timestamp: string;
  totalTests: number;
  summary: CategorySummary;
  testResults: TestResult[];
  detailedSummary: DetailedSummary;
}

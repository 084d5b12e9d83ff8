/**
 * Report aggregation over the results of one run
 */

import {
  CLASSIFICATION_CATEGORIES,
  type CategorySummary,
  type ClassificationCategory,
  type Report,
  type TestResult,
} from './types.js';

/**
 * Anything with an optional category, including legacy `uncertain` records.
 */
export interface CategorizedItem {
  category?: string;
}

/**
 * Folds legacy and unknown categories into `no_identification`.
 */
export function normalizeCategory(category: string | undefined): ClassificationCategory {
  return CLASSIFICATION_CATEGORIES.find((known) => known === category) ?? 'no_identification';
}

export function getCategorySummary(classifications: readonly CategorizedItem[]): CategorySummary {
  const summary: CategorySummary = {
    total: classifications.length,
    correct_species: 0,
    incorrect_species: 0,
    no_identification: 0,
    accuracy: 0,
  };

  if (summary.total === 0) {
    return summary;
  }

  for (const classification of classifications) {
    summary[normalizeCategory(classification.category)] += 1;
  }

  summary.accuracy = Math.round((summary.correct_species / summary.total) * 100 * 100) / 100;
  return summary;
}

function inCategory(result: TestResult, category: ClassificationCategory): boolean {
  return result.classification !== undefined && normalizeCategory(result.classification.category) === category;
}

/**
 * Summary counts only results that reached classification; `totalTests`
 * counts every recorded result.
 */
export function buildReport(results: readonly TestResult[], now: Date = new Date()): Report {
  const classified = results.flatMap((result) => (result.classification ? [result.classification] : []));

  return {
    timestamp: now.toISOString(),
    totalTests: results.length,
    summary: getCategorySummary(classified),
    testResults: [...results],
    detailedSummary: {
      correctSpecies: results.filter((result) => inCategory(result, 'correct_species')),
      incorrectSpecies: results.filter((result) => inCategory(result, 'incorrect_species')),
      noIdentification: results.filter((result) => inCategory(result, 'no_identification')),
      errors: results.filter((result) => result.status === 'error'),
    },
  };
}

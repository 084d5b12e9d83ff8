/**
 * Report persistence
 *
 * Reports are written as `test_report_YYYYMMDD_HHMMSS.json` with snake_case
 * fields, the format downstream consumers read.
 */

import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ValidationError, fileTimestamp } from '@scanprobe/shared';
import { normalizeCategory } from './summary.js';
import type { Classification, Report, ScrapedResult, TestResult } from './types.js';

// =============================================================================
// Persisted schema
// =============================================================================

const ScrapedRecordSchema = z.object({
  species: z.string().nullable(),
  confidence: z.number().nullable(),
  full_text: z.string().nullable(),
  status: z.enum(['identified', 'no_identification']),
});

const ClassificationRecordSchema = z.object({
  category: z.enum(['correct_species', 'incorrect_species', 'no_identification', 'uncertain']),
  reason: z.string(),
  app_species: z.string(),
  expected_species: z.string(),
  confidence: z.number().nullable(),
});

const TestResultRecordSchema = z.object({
  test_id: z.string(),
  image_name: z.string(),
  image_type: z.enum(['original', 'augmented']),
  augmentation: z.string(),
  expected_species: z.string(),
  timestamp: z.string(),
  status: z.enum(['passed', 'failed', 'error', 'interrupted']),
  app_result: ScrapedRecordSchema.nullable().default(null),
  classification: ClassificationRecordSchema.nullable().default(null),
  error: z.string().nullable().default(null),
});

const SummaryRecordSchema = z.object({
  total: z.number().int().nonnegative(),
  correct_species: z.number().int().nonnegative(),
  incorrect_species: z.number().int().nonnegative(),
  no_identification: z.number().int().nonnegative(),
  accuracy: z.number(),
});

export const ReportRecordSchema = z.object({
  timestamp: z.string(),
  total_tests: z.number().int().nonnegative(),
  summary: SummaryRecordSchema,
  test_results: z.array(TestResultRecordSchema),
  detailed_summary: z.object({
    correct_species: z.array(TestResultRecordSchema),
    incorrect_species: z.array(TestResultRecordSchema),
    no_identification: z.array(TestResultRecordSchema),
    /** Older reports carry a separate bucket; read into no_identification */
    uncertain: z.array(TestResultRecordSchema).default([]),
    errors: z.array(TestResultRecordSchema),
  }),
});

export type TestResultRecord = z.infer<typeof TestResultRecordSchema>;
export type ReportRecord = z.infer<typeof ReportRecordSchema>;

// =============================================================================
// Mapping
// =============================================================================

function toScrapedRecord(result: ScrapedResult): TestResultRecord['app_result'] {
  return {
    species: result.species,
    confidence: result.confidence,
    full_text: result.fullText,
    status: result.status,
  };
}

function toClassificationRecord(classification: Classification): TestResultRecord['classification'] {
  return {
    category: classification.category,
    reason: classification.reason,
    app_species: classification.appSpecies,
    expected_species: classification.expectedSpecies,
    confidence: classification.confidence,
  };
}

export function toTestResultRecord(result: TestResult): TestResultRecord {
  return {
    test_id: result.testId,
    image_name: result.imageName,
    image_type: result.imageType,
    augmentation: result.augmentation,
    expected_species: result.expectedSpecies,
    timestamp: result.timestamp,
    status: result.status,
    app_result: result.appResult ? toScrapedRecord(result.appResult) : null,
    classification: result.classification ? toClassificationRecord(result.classification) : null,
    error: result.error ?? null,
  };
}

export function fromTestResultRecord(record: TestResultRecord): TestResult {
  const result: TestResult = {
    testId: record.test_id,
    imageName: record.image_name,
    imageType: record.image_type,
    augmentation: record.augmentation,
    expectedSpecies: record.expected_species,
    timestamp: record.timestamp,
    status: record.status,
  };

  if (record.app_result) {
    result.appResult = {
      species: record.app_result.species,
      confidence: record.app_result.confidence,
      fullText: record.app_result.full_text,
      status: record.app_result.status,
    };
  }
  if (record.classification) {
    result.classification = {
      category: normalizeCategory(record.classification.category),
      reason: record.classification.reason,
      appSpecies: record.classification.app_species,
      expectedSpecies: record.classification.expected_species,
      confidence: record.classification.confidence,
    };
  }
  if (record.error !== null) {
    result.error = record.error;
  }
  return result;
}

export function toReportRecord(report: Report): ReportRecord {
  const records = (results: TestResult[]) => results.map(toTestResultRecord);

  return {
    timestamp: report.timestamp,
    total_tests: report.totalTests,
    summary: { ...report.summary },
    test_results: records(report.testResults),
    detailed_summary: {
      correct_species: records(report.detailedSummary.correctSpecies),
      incorrect_species: records(report.detailedSummary.incorrectSpecies),
      no_identification: records(report.detailedSummary.noIdentification),
      uncertain: [],
      errors: records(report.detailedSummary.errors),
    },
  };
}

export function fromReportRecord(record: ReportRecord): Report {
  const results = (records: TestResultRecord[]) => records.map(fromTestResultRecord);

  return {
    timestamp: record.timestamp,
    totalTests: record.total_tests,
    summary: { ...record.summary },
    testResults: results(record.test_results),
    detailedSummary: {
      correctSpecies: results(record.detailed_summary.correct_species),
      incorrectSpecies: results(record.detailed_summary.incorrect_species),
      noIdentification: results([
        ...record.detailed_summary.no_identification,
        ...record.detailed_summary.uncertain,
      ]),
      errors: results(record.detailed_summary.errors),
    },
  };
}

// =============================================================================
// Files
// =============================================================================

export function reportFileName(report: Report): string {
  return `test_report_${fileTimestamp(new Date(report.timestamp))}.json`;
}

/**
 * Write the report into `dir` and return the file path.
 */
export async function writeReport(report: Report, dir: string): Promise<string> {
  await fs.ensureDir(dir);
  const filePath = path.join(dir, reportFileName(report));
  await fs.writeJson(filePath, toReportRecord(report), { spaces: 2 });
  return filePath;
}

export async function readReport(filePath: string): Promise<Report> {
  const raw: unknown = await fs.readJson(filePath);
  const parsed = ReportRecordSchema.safeParse(raw);

  if (!parsed.success) {
    throw new ValidationError(`Invalid report file ${filePath}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return fromReportRecord(parsed.data);
}

/**
 * @scanprobe/evaluation
 *
 * Outcome classification and run reports.
 */

export * from './types.js';
export {
  ClassificationRulesSchema,
  loadRules,
  parseRules,
  type ClassificationRules,
} from './rules.js';
export { ResultClassifier, classify } from './classifier.js';
export { buildReport, getCategorySummary, normalizeCategory, type CategorizedItem } from './summary.js';
export {
  ReportRecordSchema,
  fromReportRecord,
  readReport,
  reportFileName,
  toReportRecord,
  toTestResultRecord,
  writeReport,
  type ReportRecord,
  type TestResultRecord,
} from './report-writer.js';

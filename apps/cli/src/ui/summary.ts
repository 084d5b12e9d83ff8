import chalk from 'chalk';
import type { Report } from '@scanprobe/evaluation';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(60);

/**
 * Plain-text run summary followed by a per-category breakdown.
 */
export function formatSummary(report: Report): string[] {
  const { summary, detailedSummary } = report;
  const lines = [
    RULE,
    '📊 TEST EXECUTION SUMMARY',
    RULE,
    `Total Tests Executed: ${summary.total}`,
    `✓ Correct Species: ${summary.correct_species}`,
    `✗ Incorrect Species: ${summary.incorrect_species}`,
    `✗ No Identification: ${summary.no_identification}`,
    summary.total > 0
      ? `📈 Accuracy: ${summary.accuracy}% (Correct: ${summary.correct_species}/${summary.total})`
      : '📈 Accuracy: N/A (no tests executed)',
    RULE,
    '',
    '📋 DETAILED BREAKDOWN:',
    THIN_RULE,
  ];

  if (detailedSummary.correctSpecies.length > 0) {
    lines.push('', `✓ Correct Species (${detailedSummary.correctSpecies.length}):`);
    for (const result of detailedSummary.correctSpecies) {
      lines.push(`   • ${result.testId}: ${result.expectedSpecies} → ${result.classification?.appSpecies ?? 'unknown'}`);
    }
  }

  if (detailedSummary.incorrectSpecies.length > 0) {
    lines.push('', `✗ Incorrect Species (${detailedSummary.incorrectSpecies.length}):`);
    for (const result of detailedSummary.incorrectSpecies) {
      lines.push(
        `   • ${result.testId}: Expected '${result.expectedSpecies}', Got '${result.classification?.appSpecies ?? 'unknown'}'`
      );
    }
  }

  if (detailedSummary.noIdentification.length > 0) {
    lines.push('', `✗ No Identification (${detailedSummary.noIdentification.length}):`);
    for (const result of detailedSummary.noIdentification) {
      lines.push(`   • ${result.testId}: ${result.classification?.appSpecies ?? 'no_insect_visible'}`);
    }
  }

  if (detailedSummary.errors.length > 0) {
    lines.push('', `⚠️  Errors (${detailedSummary.errors.length}):`);
    for (const result of detailedSummary.errors) {
      lines.push(`   • ${result.testId}: ${result.error ?? 'Unknown error'}`);
    }
  }

  const interrupted = report.testResults.filter((result) => result.status === 'interrupted');
  if (interrupted.length > 0) {
    lines.push('', `⏸  Interrupted (${interrupted.length}):`);
    for (const result of interrupted) {
      lines.push(`   • ${result.testId}`);
    }
  }

  lines.push(RULE);
  return lines;
}

export function printSummary(report: Report): void {
  for (const line of formatSummary(report)) {
    console.log(line === RULE ? chalk.gray(line) : line);
  }
}

/**
 * Classification rules: keyword tables the classifier matches scraped text
 * against. Loaded from JSON so a new target species needs no code change.
 */

import fs from 'fs-extra';
import { z } from 'zod';
import { ValidationError, errorMessage } from '@scanprobe/shared';
import dragonflyRules from '../rules/dragonfly.json' with { type: 'json' };

const keywordList = z.array(z.string().min(1)).min(1);

export const ClassificationRulesSchema = z.object({
  genus: z.object({
    /** app_species for a genus hit without a known subtype */
    label: z.string().min(1),
    displayName: z.string().min(1),
    keywords: keywordList,
  }),
  subtypes: z.record(
    z.string(),
    z.object({
      label: z.string().min(1),
      synonyms: keywordList,
    })
  ),
  noInsect: z.object({
    label: z.string().min(1),
    noneLikeSpecies: keywordList,
    phrases: keywordList,
  }),
  noIdentificationKeywords: keywordList,
  errorKeywords: keywordList,
  minSpeciesLength: z.number().int().nonnegative(),
  /** Kept for report readers; classify() never consults them */
  uncertainKeywords: z.array(z.string()).default([]),
  confidenceThreshold: z.number().min(0).max(100).default(50),
});

export type ClassificationRules = z.infer<typeof ClassificationRulesSchema>;

export function parseRules(raw: unknown, source = 'rules'): ClassificationRules {
  const result = ClassificationRulesSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid classification rules in ${source}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

/**
 * Read and validate a rules file, or the bundled dragonfly rules without one.
 */
export function loadRules(filePath?: string): ClassificationRules {
  if (!filePath) {
    return parseRules(dragonflyRules, 'bundled dragonfly rules');
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(filePath);
  } catch (error) {
    throw new ValidationError(`Could not read classification rules from ${filePath}`, {
      cause: errorMessage(error),
    });
  }
  return parseRules(raw, filePath);
}

/**
 * Outcome classifier
 *
 * Maps what the app showed onto one of three categories. The checks run in a
 * fixed order: an explicit "no insect" screen beats any genus mention.
 */

import { loadRules, type ClassificationRules } from './rules.js';
import type { Classification, ClassificationCategory, ScrapedResult } from './types.js';

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

function subtypeFor(rules: ClassificationRules, expectedLower: string) {
  return Object.hasOwn(rules.subtypes, expectedLower) ? rules.subtypes[expectedLower] : undefined;
}

function isNoIdentification(allText: string, speciesLower: string, rules: ClassificationRules): boolean {
  return (
    containsAny(allText, rules.noIdentificationKeywords) ||
    speciesLower.trim().length < rules.minSpeciesLength ||
    containsAny(allText, rules.errorKeywords)
  );
}

/**
 * Rescue check for a species that lacks the genus keyword: the expected label
 * itself, or the expected subtype's own synonym/family/genus table. A bare
 * genus expectation has no table to rescue through.
 */
function matchesExpected(
  speciesLower: string,
  allText: string,
  expectedLower: string,
  rules: ClassificationRules
): boolean {
  if (expectedLower && speciesLower.includes(expectedLower)) {
    return true;
  }

  const subtype = subtypeFor(rules, expectedLower);
  return subtype !== undefined && containsAny(allText, subtype.synonyms);
}

/**
 * Classify one scraped result against the expected label. Pure.
 */
export function classify(
  scraped: ScrapedResult,
  expectedSpecies: string,
  rules: ClassificationRules
): Classification {
  const species = scraped.species ?? '';
  const speciesLower = species.toLowerCase();
  const fullText = (scraped.fullText ?? '').toLowerCase();
  const expectedLower = expectedSpecies.toLowerCase();

  const outcome = (
    category: ClassificationCategory,
    reason: string,
    appSpecies: string
  ): Classification => ({
    category,
    reason,
    appSpecies,
    expectedSpecies,
    confidence: scraped.confidence,
  });

  // 1. No insect on screen
  if (!species || rules.noInsect.noneLikeSpecies.includes(speciesLower)) {
    if (containsAny(fullText, rules.noInsect.phrases)) {
      return outcome('no_identification', 'App detected no insect in the image', rules.noInsect.label);
    }
  }

  // 2. Genus detected: in the species when there is one, otherwise anywhere on screen
  const showsGenus = containsAny(species ? speciesLower : fullText, rules.genus.keywords);
  if (showsGenus) {
    const { displayName, label } = rules.genus;
    const subtype = subtypeFor(rules, expectedLower);

    if (subtype) {
      return outcome(
        'correct_species',
        `App correctly identified as ${displayName} (expected: ${expectedSpecies})`,
        subtype.label
      );
    }
    if (expectedLower === label) {
      return outcome('correct_species', `App correctly identified as ${displayName}`, label);
    }
    return outcome('correct_species', `App identified as ${displayName} (expected: ${expectedSpecies})`, label);
  }

  // 3. Nothing usable, or an error screen
  const allText = `${speciesLower} ${fullText}`;
  if (isNoIdentification(allText, speciesLower, rules)) {
    return outcome(
      'no_identification',
      'App did not provide identification or returned error',
      rules.noInsect.label
    );
  }

  // 4. Some other species
  if (species.length > rules.minSpeciesLength) {
    if (matchesExpected(speciesLower, allText, expectedLower, rules)) {
      return outcome('correct_species', `App correctly identified as ${species}`, species);
    }
    return outcome(
      'incorrect_species',
      `App identified as '${species}' but expected ${rules.genus.label} species (got: ${expectedSpecies})`,
      species
    );
  }

  // 5. Ambiguous
  return outcome(
    'no_identification',
    'Could not extract valid identification from app',
    rules.noInsect.label
  );
}

/**
 * Classifier bound to one rule set.
 */
export class ResultClassifier {
  readonly rules: ClassificationRules;

  constructor(rules: ClassificationRules = loadRules()) {
    this.rules = rules;
  }

  /** Defaults the expected label to the bare genus */
  classify(scraped: ScrapedResult, expectedSpecies: string = this.rules.genus.label): Classification {
    return classify(scraped, expectedSpecies, this.rules);
  }
}

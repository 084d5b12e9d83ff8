/**
 * Result text-mining
 *
 * Turns the text fragments of a result screen into a ScrapedResult. Pure, so
 * the matching rules are testable without a device.
 */

import type { ScrapedResult } from '@scanprobe/evaluation';
import type { AppProfile } from './profile.js';

export type ExtractionRules = AppProfile['extraction'];

export interface ScreenText {
  /** Visible texts, document order */
  texts: string[];
  /** Accessibility descriptions, document order */
  descriptions: string[];
  /** Texts read through the targeted locators */
  targeted: string[];
}

export function emptyScrapedResult(): ScrapedResult {
  return {
    species: null,
    confidence: null,
    fullText: null,
    status: 'no_identification',
  };
}

/**
 * First `NN%` among the fragments, clamped to 0-100.
 */
export function findConfidence(fragments: readonly string[]): number | null {
  for (const fragment of fragments) {
    const match = fragment.match(/(\d+)%/);
    if (match) {
      return Math.min(100, Math.max(0, parseInt(match[1], 10)));
    }
  }
  return null;
}

function isUiChrome(fragment: string, rules: ExtractionRules): boolean {
  return rules.uiChrome.some((chrome) => fragment.includes(chrome));
}

/**
 * Apply, in order: no-insect phrases, the species pattern, a freeform
 * fallback over non-chrome fragments, then an independent confidence scan.
 */
export function mineScrapedResult(screen: ScreenText, rules: ExtractionRules): ScrapedResult {
  const fragments = [...screen.texts, ...screen.targeted, ...screen.descriptions];
  const fullText = fragments.join(' ').toLowerCase();

  if (rules.noInsectPhrases.some((phrase) => fullText.includes(phrase.toLowerCase()))) {
    return { species: null, confidence: null, fullText, status: 'no_identification' };
  }

  let species: string | null = null;
  if (new RegExp(rules.speciesPattern, 'i').test(fullText)) {
    species = rules.canonicalSpecies;
  } else {
    for (const fragment of fragments) {
      const clean = fragment.trim();
      if (clean.length <= 2 || isUiChrome(clean, rules)) continue;
      if (clean.length > rules.minFragmentLength) {
        species = clean;
        break;
      }
    }
  }

  return {
    species,
    confidence: findConfidence(fragments),
    fullText,
    status: species ? 'identified' : 'no_identification',
  };
}

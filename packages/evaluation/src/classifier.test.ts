import { describe, expect, it } from 'vitest';
import { ValidationError } from '@scanprobe/shared';
import { ResultClassifier, classify } from './classifier.js';
import { loadRules, parseRules } from './rules.js';
import type { ScrapedResult } from './types.js';

const rules = loadRules();

function scraped(overrides: Partial<ScrapedResult> = {}): ScrapedResult {
  return {
    species: null,
    confidence: null,
    fullText: null,
    status: 'identified',
    ...overrides,
  };
}

describe('classify', () => {
  it('combines a genus hit with the darner subtype', () => {
    expect(classify(scraped({ species: 'Dragonfly' }), 'darner', rules)).toEqual({
      category: 'correct_species',
      reason: 'App correctly identified as Dragonfly (expected: darner)',
      appSpecies: 'dragonfly_darner',
      expectedSpecies: 'darner',
      confidence: null,
    });
  });

  it('combines a genus hit with the skimmer subtype', () => {
    const result = classify(scraped({ species: 'Dragonfly', confidence: 87 }), 'skimmer', rules);

    expect(result.category).toBe('correct_species');
    expect(result.appSpecies).toBe('dragonfly_skimmer');
    expect(result.confidence).toBe(87);
  });

  it('uses the bare genus label for the generic expectation', () => {
    const result = classify(scraped({ species: 'Dragonfly' }), 'dragonfly', rules);

    expect(result.appSpecies).toBe('dragonfly');
    expect(result.reason).toBe('App correctly identified as Dragonfly');
  });

  it('keeps the bare label for expectations outside the subtypes', () => {
    const result = classify(scraped({ species: 'Dragon fly' }), 'odonata', rules);

    expect(result.category).toBe('correct_species');
    expect(result.appSpecies).toBe('dragonfly');
    expect(result.reason).toBe('App identified as Dragonfly (expected: odonata)');
  });

  it('detects the genus in the screen text when no species was scraped', () => {
    const result = classify(scraped({ fullText: 'basic info a species of dragonfly' }), 'darner', rules);

    expect(result.appSpecies).toBe('dragonfly_darner');
  });

  it('reports a no-insect screen', () => {
    const result = classify(
      scraped({ fullText: 'No Insect Detected. Tips for Better Photos', status: 'no_identification' }),
      'dragonfly',
      rules
    );

    expect(result).toEqual({
      category: 'no_identification',
      reason: 'App detected no insect in the image',
      appSpecies: 'no_insect_visible',
      expectedSpecies: 'dragonfly',
      confidence: null,
    });
  });

  it('lets the no-insect phrase win over a genus mention in the text', () => {
    const result = classify(
      scraped({ fullText: 'dragonfly or damselfly we couldn\'t detect any insects' }),
      'darner',
      rules
    );

    expect(result.category).toBe('no_identification');
    expect(result.appSpecies).toBe('no_insect_visible');
  });

  it('treats none-like species as empty', () => {
    const result = classify(scraped({ species: 'None', fullText: 'no insect visible' }), 'skimmer', rules);

    expect(result.appSpecies).toBe('no_insect_visible');
  });

  it('marks another species as incorrect', () => {
    expect(classify(scraped({ species: 'Butterfly' }), 'dragonfly', rules)).toEqual({
      category: 'incorrect_species',
      reason: "App identified as 'Butterfly' but expected dragonfly species (got: dragonfly)",
      appSpecies: 'Butterfly',
      expectedSpecies: 'dragonfly',
      confidence: null,
    });
  });

  it('accepts a family or genus name of the expected subtype', () => {
    const result = classify(scraped({ species: 'Aeshna cyanea' }), 'darner', rules);

    expect(result.category).toBe('correct_species');
    expect(result.reason).toBe('App correctly identified as Aeshna cyanea');
    expect(result.appSpecies).toBe('Aeshna cyanea');
  });

  it('does not rescue a wrong species because the genus appears elsewhere on screen', () => {
    const result = classify(
      scraped({ species: 'Butterfly', fullText: 'butterfly dragonfly or damselfly' }),
      'dragonfly',
      rules
    );

    expect(result.category).toBe('incorrect_species');
  });

  it('does not count a related insect as the bare genus', () => {
    const result = classify(
      scraped({ species: 'Damselfly', confidence: 90, fullText: 'damselfly suborder zygoptera, order odonata 90%' }),
      'dragonfly',
      rules
    );

    expect(result.category).toBe('incorrect_species');
    expect(result.appSpecies).toBe('Damselfly');
  });

  it('rescues only through the expected subtype table', () => {
    const fullText = 'libellula depressa family libellulidae';

    expect(classify(scraped({ species: 'Libellula depressa', fullText }), 'skimmer', rules).category).toBe(
      'correct_species'
    );
    expect(classify(scraped({ species: 'Libellula depressa', fullText }), 'darner', rules).category).toBe(
      'incorrect_species'
    );
  });

  it('reports error screens as no identification', () => {
    const result = classify(
      scraped({ species: 'Something went wrong', fullText: 'error loading result' }),
      'darner',
      rules
    );

    expect(result.category).toBe('no_identification');
    expect(result.reason).toBe('App did not provide identification or returned error');
  });

  it('treats a one-letter species as missing', () => {
    const result = classify(scraped({ species: 'A' }), 'darner', rules);

    expect(result.reason).toBe('App did not provide identification or returned error');
  });

  it('falls back to no identification for ambiguous short output', () => {
    expect(classify(scraped({ species: 'Ox' }), 'darner', rules)).toMatchObject({
      category: 'no_identification',
      reason: 'Could not extract valid identification from app',
      appSpecies: 'no_insect_visible',
    });
  });

  it('is deterministic', () => {
    const input = scraped({ species: 'Dragonfly', fullText: 'dragonfly 92%', confidence: 92 });
    expect(classify(input, 'darner', rules)).toEqual(classify(input, 'darner', rules));
  });

  it('only ever produces the three categories', () => {
    const inputs = [
      scraped(),
      scraped({ species: '' }),
      scraped({ fullText: 'uncertain maybe possibly' }),
      scraped({ species: 'Probably a bee', confidence: 10 }),
      scraped({ species: 'Dragonfly', fullText: 'try again' }),
    ];

    for (const input of inputs) {
      expect(['correct_species', 'incorrect_species', 'no_identification']).toContain(
        classify(input, 'darner', rules).category
      );
    }
  });
});

describe('ResultClassifier', () => {
  it('defaults the expectation to the genus', () => {
    const classifier = new ResultClassifier(rules);

    expect(classifier.classify(scraped({ species: 'Dragonfly' })).expectedSpecies).toBe('dragonfly');
  });
});

describe('rules', () => {
  it('rejects incomplete rule files', () => {
    expect(() => parseRules({ genus: { label: 'x' } })).toThrow(ValidationError);
  });

  it('reports unreadable rule files', () => {
    expect(() => loadRules('/nonexistent/rules.json')).toThrow(
      'Could not read classification rules from /nonexistent/rules.json'
    );
  });

  it('keeps the legacy uncertain settings', () => {
    expect(rules.confidenceThreshold).toBe(50);
    expect(rules.uncertainKeywords).toContain('similar to');
  });
});

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { countMatches, similarityRatio } from '../sequence-matcher.js';
import { fuzzyMatch } from '../fuzzy-match.js';

describe('similarityRatio', () => {
  it('scores shared characters against total length', () => {
    expect(similarityRatio('usr', 'user')).toBeCloseTo(6 / 7);
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    expect(similarityRatio('abc', 'xyz')).toBe(0);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('counts matching blocks on both sides of the longest run', () => {
    expect(countMatches('usr', 'clustering')).toBe(3);
    expect(countMatches('table', 'tablet')).toBe(5);
  });

  it('stays within [0, 1] and scores identical strings 1', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 30 }), fc.string({ maxLength: 30 }), (a, b) => {
        const ratio = similarityRatio(a, b);
        expect(ratio).toBeGreaterThanOrEqual(0);
        expect(ratio).toBeLessThanOrEqual(1);
        expect(similarityRatio(a, a)).toBe(1);
      })
    );
  });
});

describe('fuzzyMatch', () => {
  it('matches on plain containment', () => {
    expect(fuzzyMatch('weekly user signups', 'user sign')).toBe(true);
  });

  it('matches a misspelt word by similarity', () => {
    expect(fuzzyMatch('user signups', 'usr')).toBe(true);
  });

  it('matches when a text word is contained in a query word', () => {
    expect(fuzzyMatch('revenue by region', 'revenues')).toBe(true);
  });

  it('ignores query words shorter than three characters', () => {
    expect(fuzzyMatch('alpha beta', 'ab')).toBe(false);
  });

  it('rejects unrelated text', () => {
    expect(fuzzyMatch('bar chart visualization.', 'xyz123')).toBe(false);
  });
});

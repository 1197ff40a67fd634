import { describe, it, expect } from 'vitest';
import { calculateDistance, didYouMean, suggestAlternatives } from '../suggestions.js';

describe('Suggestion Helpers', () => {
  it('calculateDistance behaves reasonably for basics', () => {
    expect(calculateDistance('abc', 'abc')).toBe(0);
    expect(calculateDistance('abc', 'ab')).toBe(1);
    expect(calculateDistance('', 'abcd')).toBe(4);
  });

  it('didYouMean finds close matches, closest first', () => {
    expect(didYouMean('dompurfy', ['noop', 'dompurify'])).toEqual(['dompurify']);
    expect(didYouMean('chromiun', ['chromium', 'firefox', 'webkit'])).toEqual(['chromium']);
  });

  it('didYouMean returns nothing for distant input', () => {
    expect(didYouMean('bleach', ['noop', 'dompurify'])).toEqual([]);
  });

  it('suggestAlternatives falls back to the full list', () => {
    expect(suggestAlternatives('nop', ['noop', 'dompurify'])).toBe('Did you mean: noop?');
    expect(suggestAlternatives('bleach', ['noop', 'dompurify'])).toBe(
      'Available: noop, dompurify'
    );
  });
});

describe('calculateDistance', () => {
  it('counts insertions, deletions and substitutions', () => {
    expect(calculateDistance('kitten', 'sitting')).toBe(3);
    expect(calculateDistance('dompurfy', 'dompurify')).toBe(1);
  });

  it('ignores case', () => {
    expect(calculateDistance('Noop', 'noop')).toBe(0);
  });

  it('keeps input order between equally close options', () => {
    expect(didYouMean('ab', ['ax', 'ay', 'zz'])).toEqual(['ax', 'ay', 'zz']);
  });
});

import { describe, expect, it } from 'vitest';
import { isRegexPatternSafe, matchPattern } from '../../../src/utils/regexGuard.js';

describe('isRegexPatternSafe', () => {
  it('accepts empty and simple patterns', () => {
    expect(isRegexPatternSafe('')).toBe(true);
    expect(isRegexPatternSafe('   ')).toBe(true);
    expect(isRegexPatternSafe('^star(board)?$')).toBe(true);
  });

  it('rejects nested quantifiers', () => {
    expect(isRegexPatternSafe('(a+)+$')).toBe(false);
  });

  it('rejects patterns that do not compile', () => {
    expect(isRegexPatternSafe('[')).toBe(false);
  });

  it('rejects overly long patterns', () => {
    expect(isRegexPatternSafe('a'.repeat(1025))).toBe(false);
  });
});

describe('matchPattern', () => {
  it('reports matches and misses', () => {
    expect(matchPattern('a shiny star', 'star', 50)).toBe('match');
    expect(matchPattern('a shiny moon', 'star', 50)).toBe('no-match');
  });

  it('reports invalid patterns', () => {
    expect(matchPattern('anything', '(', 50)).toBe('invalid');
  });

  it('interrupts catastrophic backtracking', () => {
    expect(matchPattern(`${'a'.repeat(40)}!`, '^(a+)+$', 20)).toBe('timeout');
  });
});

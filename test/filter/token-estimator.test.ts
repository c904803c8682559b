import { describe, it, expect } from 'vitest';
import { estimateTokens, TokenEstimator } from '../../src/filter/token-estimator.js';

describe('estimateTokens', () => {
  it('returns zero for empty text', () => {
    expect(estimateTokens('')).toBe(0);
  });

  it('floors length divided by four', () => {
    expect(estimateTokens('abc')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('a'.repeat(17))).toBe(4);
    expect(estimateTokens('x'.repeat(400))).toBe(100);
  });

  it('matches floor(len / 4) across lengths', () => {
    for (let length = 0; length <= 40; length++) {
      expect(estimateTokens('y'.repeat(length))).toBe(Math.floor(length / 4));
    }
  });
});

describe('TokenEstimator', () => {
  it('uses a custom chars-per-token ratio', () => {
    const estimator = new TokenEstimator(2);
    expect(estimator.estimate('abcde')).toBe(2);
  });

  it('falls back to four chars per token for invalid ratios', () => {
    const estimator = new TokenEstimator(0);
    expect(estimator.estimate('abcdefgh')).toBe(2);
  });
});

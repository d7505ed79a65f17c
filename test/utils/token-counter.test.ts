/**
 * Tests for approximate token counting.
 */

import { describe, it, expect } from 'vitest';
import { approximateTokens } from '../../src/utils/token-counter.js';

describe('approximateTokens', () => {
  it('returns 0 for empty text', () => {
    expect(approximateTokens('')).toBe(0);
  });

  it('counts ~3.5 characters per token for latin text', () => {
    expect(approximateTokens('abcdefg')).toBe(2);
    expect(approximateTokens('abcdefgh')).toBe(3);
    expect(approximateTokens('a')).toBe(1);
  });

  it('counts each CJK character as a token', () => {
    expect(approximateTokens('劳动合同')).toBe(4);
  });

  it('adds both parts for mixed text', () => {
    // 2 CJK characters, 8 others
    expect(approximateTokens('合同 abc def')).toBe(2 + Math.ceil(8 / 3.5));
  });
});

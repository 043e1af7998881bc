import { describe, it, expect } from 'vitest';
import { createSession } from '../session/types.js';
import {
  COUNTER_MARKER,
  VariationTokenGenerator,
  encodeCounter,
  isInvisibleToken,
} from './token-generator.js';

describe('VariationTokenGenerator', () => {
  it('returns invisible tokens of the configured length', () => {
    const generator = new VariationTokenGenerator({ length: 6 });
    const token = generator.next(createSession('c1'));
    expect(token).toHaveLength(6);
    expect(isInvisibleToken(token)).toBe(true);
  });

  it('never repeats a token across many regenerations', () => {
    const generator = new VariationTokenGenerator();
    const session = createSession('c1');
    const tokens: string[] = [];
    for (let i = 0; i < 50; i++) {
      const before = new Set(session.variationHistory);
      const token = generator.next(session);
      expect(before.has(token)).toBe(false);
      tokens.push(token);
    }
    expect(new Set(tokens).size).toBe(50);
    expect(session.variationHistory.size).toBe(50);
  });

  it('retries a colliding draw', () => {
    // First draw: all zeros, second draw: all ones
    const draws = [0, 0, 1, 1];
    const generator = new VariationTokenGenerator({
      length: 2,
      random: () => draws.shift() ?? 3,
    });
    const session = createSession('c1');
    session.variationHistory.add('\u200B\u200B');

    expect(generator.next(session)).toBe('\u200C\u200C');
  });

  it('falls back to a counter once the retry bound is spent', () => {
    const generator = new VariationTokenGenerator({ length: 3, maxAttempts: 2, random: () => 0 });
    const session = createSession('c1');

    expect(generator.next(session)).toBe('\u200B\u200B\u200B');
    expect(generator.next(session)).toBe(`${COUNTER_MARKER}\u200B`);
    expect(generator.next(session)).toBe(`${COUNTER_MARKER}\u200C`);
    expect(session.variationCounter).toBe(2);
  });

  it('skips counter tokens that are already taken', () => {
    const generator = new VariationTokenGenerator({ length: 1, maxAttempts: 1, random: () => 0 });
    const session = createSession('c1');
    session.variationHistory.add('\u200B');
    session.variationHistory.add(`${COUNTER_MARKER}\u200B`);

    expect(generator.next(session)).toBe(`${COUNTER_MARKER}\u200C`);
  });
});

describe('encodeCounter', () => {
  it('writes base-4 digits', () => {
    expect(encodeCounter(0)).toBe('\u200B');
    expect(encodeCounter(3)).toBe('\u2060');
    expect(encodeCounter(4)).toBe('\u200C\u200B');
    expect(encodeCounter(6)).toBe('\u200C\u200D');
  });
});

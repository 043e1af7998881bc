import { randomInt } from 'node:crypto';
import type { Session } from '../session/types.js';

// Zero-width space, non-joiner, joiner and word joiner: invisible in chat,
// but they still change the prompt the image backend sees.
export const ZERO_WIDTH_ALPHABET = ['\u200B', '\u200C', '\u200D', '\u2060'] as const;

// Marks counter-based tokens; never produced by a random draw.
export const COUNTER_MARKER = '\uFEFF';

export const DEFAULT_TOKEN_LENGTH = 8;
export const DEFAULT_MAX_ATTEMPTS = 5;

export interface VariationTokenOptions {
  length?: number;
  maxAttempts?: number;
  /** Returns an integer in [0, max). */
  random?: (max: number) => number;
}

export class VariationTokenGenerator {
  private length: number;
  private maxAttempts: number;
  private random: (max: number) => number;

  constructor(options: VariationTokenOptions = {}) {
    this.length = options.length ?? DEFAULT_TOKEN_LENGTH;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.random = options.random ?? ((max) => randomInt(max));
  }

  /**
   * Draw a token not yet used for the session's current script and record it
   * in `variationHistory`. Must run inside a session update.
   */
  next(session: Session): string {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const token = this.draw();
      if (!session.variationHistory.has(token)) {
        session.variationHistory.add(token);
        return token;
      }
    }

    let token: string;
    do {
      token = COUNTER_MARKER + encodeCounter(session.variationCounter);
      session.variationCounter += 1;
    } while (session.variationHistory.has(token));

    session.variationHistory.add(token);
    return token;
  }

  private draw(): string {
    let token = '';
    for (let i = 0; i < this.length; i++) {
      token += ZERO_WIDTH_ALPHABET[this.random(ZERO_WIDTH_ALPHABET.length)];
    }
    return token;
  }
}

/** Base-4 digits of `value`, written with the zero-width alphabet. */
export function encodeCounter(value: number): string {
  const base = ZERO_WIDTH_ALPHABET.length;
  let remaining = value;
  let out = '';
  do {
    out = ZERO_WIDTH_ALPHABET[remaining % base] + out;
    remaining = Math.floor(remaining / base);
  } while (remaining > 0);
  return out;
}

export function isInvisibleToken(token: string): boolean {
  return /^[\u200B\u200C\u200D\u2060\uFEFF]+$/.test(token);
}

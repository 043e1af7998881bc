export const LANGUAGES = ['bangla', 'english'] as const;

export type Language = (typeof LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = 'english';

// Bengali Unicode block, U+0980–U+09FF
const BANGLA_SCRIPT = /[\u0980-\u09FF]/;

/**
 * Classify a script as Bangla or English. Any Bangla character wins.
 * Blank text carries no signal, so the caller's prior language (or English) is kept.
 */
export function detectLanguage(text: string, fallback: Language = DEFAULT_LANGUAGE): Language {
  if (!text.trim()) return fallback;
  return BANGLA_SCRIPT.test(text) ? 'bangla' : 'english';
}

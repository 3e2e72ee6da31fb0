// ============================================================================
// TEXT HELPERS
// ============================================================================
// Unicode-aware word matching. JavaScript's \b only knows ASCII word
// characters, so "recuérdame" or "mañana" need explicit letter classes.

const WORD_CHAR = "[\\p{L}\\p{N}_]";

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Builds a case-insensitive regex that matches any of the phrases as whole
 * words. Longer phrases are tried first so "pasado mañana" wins over "mañana".
 */
export function phraseRegExp(phrases: readonly string[], flags = "giu"): RegExp | null {
  const alternatives = [...phrases]
    .filter((p) => p.trim().length > 0)
    .sort((a, b) => b.length - a.length)
    .map((p) => collapseWhitespace(escapeRegExp(p)).replace(/ /g, "\\s+"));
  if (alternatives.length === 0) return null;
  return new RegExp(`(?<!${WORD_CHAR})(?:${alternatives.join("|")})(?!${WORD_CHAR})`, flags);
}

export function containsPhrase(text: string, phrases: readonly string[]): boolean {
  const pattern = phraseRegExp(phrases, "iu");
  return pattern !== null && pattern.test(text);
}

/**
 * Plain lower-case substring test, the matching mode of the keyword tables
 * (some keywords carry a trailing space on purpose, e.g. "comprar ").
 */
export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((kw) => kw.length > 0 && lower.includes(kw.toLowerCase()));
}

/** Lower-case word tokens: letters, digits and underscore. */
export function tokenize(value: string): string[] {
  return value.toLowerCase().match(new RegExp(`${WORD_CHAR}+`, "gu")) ?? [];
}

export function wordCount(value: string): number {
  const trimmed = value.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

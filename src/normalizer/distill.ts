// ============================================================================
// IDEA DISTILLATION
// ============================================================================
// Reduces the idea text the oracle proposed to its core: never the verbatim
// note, never a structural command, at most five words.

import type { Lexicon } from "../lexicon/index.js";
import {
  collapseWhitespace,
  containsPhrase,
  escapeRegExp,
  phraseRegExp,
  tokenize,
} from "../lexicon/text.js";

export const OVERLAP_THRESHOLD = 0.65;
export const MAX_MEANINGFUL_TOKENS = 4;
export const MAX_IDEA_WORDS = 5;

function stripFillerPrefix(idea: string, lexicon: Lexicon): string {
  const alternatives = [...lexicon.fillerPrefixes]
    .sort((a, b) => b.length - a.length)
    .map((p) => collapseWhitespace(escapeRegExp(p)).replace(/ /g, "\\s+"));
  if (alternatives.length === 0) return idea;
  return idea.replace(new RegExp(`^(?:${alternatives.join("|")})\\s+`, "iu"), "").trim();
}

/**
 * Share of the idea's meaningful tokens that also appear in the note.
 */
export function tokenOverlap(idea: string, note: string, stopwords: ReadonlySet<string>): number {
  const noteTokens = new Set(tokenize(note).filter((t) => !stopwords.has(t)));
  if (noteTokens.size === 0) return 0;
  const ideaTokens = tokenize(idea).filter((t) => !stopwords.has(t));
  const shared = new Set(ideaTokens.filter((t) => noteTokens.has(t)));
  return shared.size / Math.max(ideaTokens.length, 1);
}

/**
 * First four meaningful tokens, spelled as they appear in the idea.
 */
function keepMeaningful(idea: string, stopwords: ReadonlySet<string>): string {
  const original = idea.split(/\s+/);
  const meaningful = tokenize(idea)
    .filter((t) => !stopwords.has(t))
    .slice(0, MAX_MEANINGFUL_TOKENS);

  const words = meaningful.map((token) => original.find((w) => w.toLowerCase() === token) ?? token);
  return words.length > 0 ? words.join(" ") : idea;
}

function isStructuralCommand(idea: string, lexicon: Lexicon): boolean {
  if (containsPhrase(idea, lexicon.creationKeywords)) return true;
  const structure = new Set(lexicon.structureWords.map((w) => w.toLowerCase()));
  return tokenize(idea)
    .slice(0, MAX_MEANINGFUL_TOKENS)
    .some((t) => structure.has(t));
}

function isVerbatimCopy(idea: string, noteText: string): boolean {
  return collapseWhitespace(idea.toLowerCase()) === collapseWhitespace(noteText.toLowerCase());
}

function startsWithCommandVerb(idea: string, lexicon: Lexicon): boolean {
  const verbs = phraseRegExp(lexicon.commandVerbs, "iu");
  if (!verbs) return false;
  const match = verbs.exec(idea);
  return match !== null && match.index === 0;
}

/**
 * Distill a proposed idea. Returns null when nothing usable remains.
 */
export function distillIdea(idea: string | null | undefined, noteText: string, lexicon: Lexicon): string | null {
  if (!idea || idea.trim() === "") return null;

  const stopwords = new Set(lexicon.stopwords);
  let result = stripFillerPrefix(collapseWhitespace(idea), lexicon);
  const words = result.split(" ").filter((w) => w.length > 0);

  if (words.length > MAX_MEANINGFUL_TOKENS && tokenOverlap(result, noteText, stopwords) >= OVERLAP_THRESHOLD) {
    result = keepMeaningful(result, stopwords);
  } else if (words.length > MAX_IDEA_WORDS) {
    result = words.slice(0, MAX_IDEA_WORDS).join(" ");
  }

  if (result === "") return null;
  if (isStructuralCommand(result, lexicon)) return null;
  if (isVerbatimCopy(result, noteText)) return null;
  if (startsWithCommandVerb(result, lexicon)) return null;

  return result;
}

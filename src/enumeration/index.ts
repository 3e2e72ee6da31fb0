// ============================================================================
// ENUMERATION SPLITTER
// ============================================================================
// A single add result sometimes hides a list ("pan, queso y leche"). The list
// is expanded into one mutation per item; only the first keeps the flags that
// create structure.

import type { Lexicon } from "../lexicon/index.js";
import { escapeRegExp, wordCount } from "../lexicon/text.js";
import { withoutStructuralFlags } from "../normalizer/index.js";
import type { CanonicalMutation } from "../types/index.js";

export const MAX_IDEA_ITEM_WORDS = 4;
export const MAX_NOTE_ITEM_WORDS = 3;
export const MIN_NOTE_ITEMS = 3;

function trimItem(item: string): string {
  return item.replace(/^[\s\p{P}]+|[\s\p{P}]+$/gu, "").replace(/\s+/g, " ");
}

/**
 * Splits on commas and on the locale's conjunctions used as separators.
 */
export function splitList(text: string, lexicon: Lexicon): string[] {
  const conjunctions = lexicon.conjunctions.map(escapeRegExp).join("|");
  const separated = text.replace(new RegExp(`\\s+(?:${conjunctions})\\s+`, "giu"), ",");
  return separated.split(",").map(trimItem);
}

/**
 * Case A: the idea is itself a list whose parts are all 1-4 words.
 */
export function itemsFromIdea(idea: string, lexicon: Lexicon): string[] | null {
  const items = splitList(idea, lexicon);
  if (items.length < 2) return null;
  return items.every((item) => {
    const words = wordCount(item);
    return words >= 1 && words <= MAX_IDEA_ITEM_WORDS;
  })
    ? items
    : null;
}

/**
 * Case B: the note ends with at least three short items. The fragment in
 * front of the trailing run contributes its last word ("comprar pan" → "pan").
 */
export function itemsFromNoteTail(noteText: string, lexicon: Lexicon): string[] | null {
  const segments = splitList(noteText, lexicon);
  if (segments.length < MIN_NOTE_ITEMS) return null;

  const items: string[] = [];
  let index = segments.length - 1;
  while (index > 0) {
    const words = wordCount(segments[index]);
    if (words < 1 || words > MAX_NOTE_ITEM_WORDS) break;
    items.unshift(segments[index]);
    index--;
  }

  const lead = segments[index].split(" ").filter((w) => w.length > 0);
  const representative = lead.length > 0 ? trimItem(lead[lead.length - 1]) : "";
  if (representative !== "") items.unshift(representative);

  return items.length >= MIN_NOTE_ITEMS ? items : null;
}

function expand(mutation: CanonicalMutation, items: readonly string[]): CanonicalMutation[] {
  return items.map((item, index) => {
    const base = index === 0 ? mutation : withoutStructuralFlags(mutation);
    return { ...base, idea: item };
  });
}

/**
 * Expand a disguised list into one mutation per item. Batches of more than
 * one mutation, refusals and non-add actions pass through untouched.
 */
export function splitEnumeration(
  batch: readonly CanonicalMutation[],
  noteText: string,
  lexicon: Lexicon
): CanonicalMutation[] {
  if (batch.length !== 1) return [...batch];
  const [mutation] = batch;
  if (mutation.action !== "add" || !mutation.makesSense) return [mutation];

  const fromIdea = mutation.idea ? itemsFromIdea(mutation.idea, lexicon) : null;
  if (fromIdea) return expand(mutation, fromIdea);

  const fromNote = itemsFromNoteTail(noteText, lexicon);
  if (fromNote) return expand(mutation, fromNote);

  return [mutation];
}

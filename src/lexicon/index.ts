// ============================================================================
// LEXICONS
// ============================================================================
// Locale keyword tables used by the deterministic parts of the engine.
// The tables live in lexicons/<locale>.json at the package root, which is one
// directory above both src/ and dist/.

import { readFileSync } from "fs";
import { z } from "zod";

import type { Locale } from "../types/index.js";

// ---- Schema ----

const FewShotExampleSchema = z.object({
  note: z.string(),
  tree: z.object({
    groups: z.array(
      z.object({
        name: z.string(),
        ideas: z.array(z.string()),
        subgroups: z.array(z.object({ name: z.string(), ideas: z.array(z.string()) })),
      })
    ),
  }),
  result: z.record(z.unknown()),
});

const LexiconSchema = z.object({
  locale: z.enum(["es", "en"]),
  predefinedCategories: z.array(z.string()).min(1),
  categoryKeywords: z.record(z.array(z.string())),
  routineCategory: z.string(),
  routineActivities: z.record(z.string()),
  deleteKeywords: z.array(z.string()),
  fillerPrefixes: z.array(z.string()),
  stopwords: z.array(z.string()),
  creationKeywords: z.array(z.string()),
  structureWords: z.array(z.string()),
  commandVerbs: z.array(z.string()),
  conjunctions: z.array(z.string()).min(1),
  reminder: z.object({
    triggers: z.array(z.string()).min(1),
    tomorrow: z.array(z.string()),
    dayAfterTomorrow: z.array(z.string()),
    weekdays: z.record(z.number().int().min(0).max(6)),
    timePrefixes: z.array(z.string()),
    connectors: z.array(z.string()),
  }),
  examples: z.array(FewShotExampleSchema),
});

export type Lexicon = z.infer<typeof LexiconSchema>;
export type ReminderLexicon = Lexicon["reminder"];
export type FewShotExample = z.infer<typeof FewShotExampleSchema>;

export const SUPPORTED_LOCALES: readonly Locale[] = ["es", "en"];

// ---- Loading ----

const cache = new Map<Locale, Lexicon>();

function lexiconUrl(locale: Locale): URL {
  return new URL(`../../lexicons/${locale}.json`, import.meta.url);
}

export function isLocale(value: string): value is Locale {
  return (SUPPORTED_LOCALES as readonly string[]).includes(value);
}

/**
 * Load (and memoize) the keyword tables for a locale.
 * Throws if the file is missing or does not match the schema.
 */
export function loadLexicon(locale: Locale): Lexicon {
  const cached = cache.get(locale);
  if (cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(lexiconUrl(locale), "utf-8"));
  const parsed = LexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid lexicon for locale "${locale}": ${parsed.error.message}`);
  }
  if (parsed.data.locale !== locale) {
    throw new Error(`Lexicon file for "${locale}" declares locale "${parsed.data.locale}"`);
  }

  cache.set(locale, parsed.data);
  return parsed.data;
}

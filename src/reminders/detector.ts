// ============================================================================
// REMINDER PRE-DETECTOR
// ============================================================================
// Runs before any model call. When a note reads like a reminder request the
// fire time is resolved here from relative day/time phrases and the oracle is
// never consulted.

import type { Lexicon } from "../lexicon/index.js";
import { collapseWhitespace, escapeRegExp, phraseRegExp } from "../lexicon/text.js";
import type { CanonicalMutation } from "../types/index.js";
import { addDays, addMinutes, atTime, formatLocalIso } from "./time.js";

export const FALLBACK_DELAY_MINUTES = 5;

interface TimeOfDay {
  hours: number;
  minutes: number;
}

interface Extraction<T> {
  value: T | null;
  rest: string;
}

// ---- Day offset ----

function stripPhrase(text: string, phrases: readonly string[]): Extraction<string> {
  const pattern = phraseRegExp(phrases, "iu");
  const match = pattern?.exec(text);
  if (!match) return { value: null, rest: text };
  return {
    value: match[0],
    rest: text.slice(0, match.index) + " " + text.slice(match.index + match[0].length),
  };
}

function daysUntilWeekday(now: Date, weekday: number): number {
  const diff = (weekday - now.getDay() + 7) % 7;
  return diff === 0 ? 7 : diff;
}

function extractDayOffset(text: string, now: Date, lexicon: Lexicon): Extraction<number> {
  const vocab = lexicon.reminder;

  const dayAfter = stripPhrase(text, vocab.dayAfterTomorrow);
  if (dayAfter.value !== null) return { value: 2, rest: dayAfter.rest };

  const tomorrow = stripPhrase(text, vocab.tomorrow);
  if (tomorrow.value !== null) return { value: 1, rest: tomorrow.rest };

  const weekday = stripPhrase(text, Object.keys(vocab.weekdays));
  if (weekday.value !== null) {
    const index = vocab.weekdays[collapseWhitespace(weekday.value.toLowerCase())];
    if (index !== undefined) {
      return { value: daysUntilWeekday(now, index), rest: weekday.rest };
    }
  }

  return { value: null, rest: text };
}

// ---- Time of day ----

function timePattern(prefixes: readonly string[]): RegExp {
  const alternatives = [...prefixes]
    .sort((a, b) => b.length - a.length)
    .map((p) => collapseWhitespace(escapeRegExp(p)).replace(/ /g, "\\s+"));
  const prefix = alternatives.length > 0 ? `(?:(?:${alternatives.join("|")})\\s+)?` : "";
  return new RegExp(
    `(?<![\\p{L}\\p{N}_:])${prefix}(\\d{1,2})(?::(\\d{2}))?(?:\\s*([ap])\\.?m\\.?)?(?![\\p{L}\\p{N}_])`,
    "giu"
  );
}

function toTimeOfDay(hourText: string, minuteText: string | undefined, meridiem: string | undefined): TimeOfDay | null {
  let hours = Number.parseInt(hourText, 10);
  const minutes = minuteText === undefined ? 0 : Number.parseInt(minuteText, 10);
  if (minutes > 59) return null;

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    const pm = meridiem.toLowerCase() === "p";
    if (pm && hours < 12) hours += 12;
    if (!pm && hours === 12) hours = 0;
  }

  return hours > 23 ? null : { hours, minutes };
}

function extractTime(text: string, lexicon: Lexicon): Extraction<TimeOfDay> {
  for (const match of text.matchAll(timePattern(lexicon.reminder.timePrefixes))) {
    const time = toTimeOfDay(match[1], match[2], match[3]);
    if (time && match.index !== undefined) {
      return {
        value: time,
        rest: text.slice(0, match.index) + " " + text.slice(match.index + match[0].length),
      };
    }
  }
  return { value: null, rest: text };
}

// ---- Message ----

function distillMessage(text: string, connectors: readonly string[]): string {
  const fillers = new Set(connectors.map((c) => c.toLowerCase()));
  const isFiller = (word: string): boolean => {
    const bare = word.replace(/^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu, "").toLowerCase();
    return bare === "" || fillers.has(bare);
  };

  const words = collapseWhitespace(text).split(" ").filter((w) => w.length > 0);
  while (words.length > 0 && isFiller(words[0])) words.shift();
  while (words.length > 0 && isFiller(words[words.length - 1])) words.pop();

  return words.join(" ").replace(/^[¿¡,;:]+/u, "").replace(/[.,;:!?]+$/u, "").trim();
}

// ---- Detection ----

/**
 * Resolve the absolute fire time for a reminder note.
 * No time at all → now + 5 minutes. A time without a day → today, or
 * tomorrow when that time has already passed.
 */
export function resolveFireTime(dayOffset: number | null, time: TimeOfDay | null, now: Date): Date {
  if (!time) return addMinutes(now, FALLBACK_DELAY_MINUTES);
  if (dayOffset !== null) return atTime(addDays(now, dayOffset), time.hours, time.minutes);

  const today = atTime(now, time.hours, time.minutes);
  return today.getTime() < now.getTime() ? atTime(addDays(now, 1), time.hours, time.minutes) : today;
}

/**
 * Returns a remind mutation when the note is a reminder request, null otherwise.
 */
export function detectReminder(text: string, now: Date, lexicon: Lexicon): CanonicalMutation | null {
  const vocab = lexicon.reminder;
  const trigger = stripPhrase(text, vocab.triggers);
  if (trigger.value === null) return null;

  const day = extractDayOffset(trigger.rest, now, lexicon);
  const time = extractTime(day.rest, lexicon);
  const fireAt = resolveFireTime(day.value, time.value, now);

  const message = distillMessage(time.rest, vocab.connectors);

  return {
    action: "remind",
    makesSense: true,
    reason: null,
    group: null,
    subgroup: null,
    idea: message.length > 0 ? message : text.trim(),
    isNewGroup: false,
    isNewSubgroup: false,
    inheritParentIdeas: false,
    rename: null,
    remindAt: formatLocalIso(fireAt),
  };
}

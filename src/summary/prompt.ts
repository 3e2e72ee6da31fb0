// ============================================================================
// SUMMARY PROMPTS
// ============================================================================

import type { Group, GroupSummary, IdeaTree, Locale } from "../types/index.js";

const LANGUAGE: Record<Locale, string> = { es: "Spanish", en: "English" };

export function buildSummarySystemPrompt(locale: Locale): string {
  return `You are an organisation and productivity assistant. You read a user's notes, grouped
into groups and subgroups, and produce a structured summary with actionable key points.
Write every text in ${LANGUAGE[locale]}.

RULES:
- Answer ONLY with valid JSON, no text before or after.
- Each group summary is a clear, encouraging paragraph of 2 to 4 sentences.
- Key points are concrete and actionable, phrased as instructions ("Buy X", "Book Y").
- The category of a key point is one of "action", "goal", "reminder" or "resource".
- "suggested_title" is a short descriptive title for the group (at most 4 words).
- "global_summary" sums up every group in 2 or 3 sentences.

ANSWER FORMAT:
{
  "groups": [
    {
      "group_name": "group name",
      "suggested_title": "suggested title",
      "summary": "group summary...",
      "key_points": [{"text": "Book the flights", "category": "action"}]
    }
  ],
  "global_summary": "summary of every group..."
}`;
}

export function buildTreeSummaryPrompt(tree: IdeaTree): string {
  return `Summarise these groups and their notes:

GROUPS:
${JSON.stringify(tree.groups, null, 2)}

Answer (JSON only):`;
}

export function buildGroupSummaryPrompt(group: Group): string {
  return `Summarise this group and its notes:

GROUP:
${JSON.stringify(group, null, 2)}

Answer with exactly this JSON:
{
  "group_name": ${JSON.stringify(group.name)},
  "suggested_title": "suggested title (at most 4 words)",
  "summary": "group summary in 2 to 4 sentences",
  "key_points": [{"text": "actionable key point", "category": "action|goal|reminder|resource"}]
}

JSON only:`;
}

export function buildGlobalSummarySystemPrompt(locale: Locale): string {
  return `You are a concise, encouraging assistant. Write in ${LANGUAGE[locale]}.`;
}

export function buildGlobalSummaryPrompt(summaries: readonly GroupSummary[]): string {
  const digest = summaries.map((s) => ({ group: s.group, summary: s.summary }));
  return `Given these group summaries, write one paragraph (2 or 3 sentences) describing the
overall picture of the user's ideas.

${JSON.stringify(digest, null, 2)}

Answer with the paragraph only, no JSON or formatting:`;
}

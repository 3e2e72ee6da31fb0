// ============================================================================
// CLASSIFICATION PROMPT
// ============================================================================

import type { Lexicon } from "../lexicon/index.js";
import { formatLocalIso } from "../reminders/time.js";
import type { IdeaTree } from "../types/index.js";

const quoteList = (items: readonly string[]): string => items.map((i) => `"${i}"`).join(", ");

export function buildSystemPrompt(lexicon: Lexicon): string {
  return `You organise a user's notes into a two-level tree: group → optional subgroup → ideas.
Distil each note to the smallest schematic form. Answer in the language of the note.

STEP 0 - Does the user want to DELETE something?
  Signals: ${quoteList(lexicon.deleteKeywords.map((k) => k.trim()))}, or an implicit
  "I'm not going to ... anymore".
  → action="delete". Find the idea (and its group/subgroup) in the existing tree;
  the user may name it approximately. idea=null deletes a whole subgroup (or the whole
  group when subgroup is also null). If nothing matches → makes_sense=false.
  All is_new_* / inherit / rename fields are false/null for deletes.

STEP 1 - Does the note make sense?
  Random keystrokes, meaningless text or questions addressed to you do not.
  → {"makes_sense": false, "reason": "short explanation"}

STEP 2 - MANDATORY categories (they always exist, even if the tree is empty):
  ${quoteList(lexicon.predefinedCategories)}.
  "${lexicon.routineCategory}": habits and schedules; the SUBGROUP is the concrete area
  (sleep, breakfast, sports...). Every physical activity goes under one shared sports
  subgroup and the concrete activity is the idea.
  If the note fits a mandatory category you MUST use it.

STEP 3 - Be maximally schematic.
  The idea is the essential noun or concept, 1 to 4 words, without the verb the group
  already implies. NEVER copy or paraphrase the note.
    group="${lexicon.predefinedCategories[1] ?? "shopping"}", subgroup="super", idea="bread"  (not "buy bread at the super")

STEP 4 - Use a SUBGROUP when the note names a concrete place, shop, platform or context
  in which the group's action repeats. Otherwise subgroup=null.

STEP 5 - idea=null when:
  a) the note describes the user's own initiative (the group name says it all);
  b) the note only asks to create/add a group or subgroup with no content of its own.
  c) When the note mixes a creation command with real content, ignore the command and
     distil only the content.
  d) When the note lists several distinct things for the same group, return a JSON ARRAY
     with one object per idea. Only the first object may set is_new_group,
     is_new_subgroup, inherit_parent_ideas or rename.

STEP 6 - Group names have at most 3 words and name the topic. Reuse an existing group
  when the note is about the same topic; otherwise is_new_group=true.
  When a new subgroup should start with the group's current root ideas, set
  inherit_parent_ideas=true.

STEP 7 - Rename only when a NEW group collides with an existing one:
  rename={"old_name": "...", "new_name": "..."}; otherwise rename=null.

STEP 8 - Reminders: for "remind me"-style notes use action="remind", the message as
  idea and remind_at as an absolute local timestamp (YYYY-MM-DDTHH:MM:SS).

Return ONLY JSON, no text before or after:
{"action":"add","makes_sense":true,"reason":null,"group":"...","subgroup":null,"idea":"...",
 "is_new_group":false,"is_new_subgroup":false,"inherit_parent_ideas":false,"rename":null,"remind_at":null}`;
}

function describeTree(tree: IdeaTree): string {
  return JSON.stringify(tree.groups);
}

/**
 * Few-shot examples followed by the note to classify.
 */
export function buildClassificationPrompt(noteText: string, tree: IdeaTree, lexicon: Lexicon, now: Date): string {
  const examples = lexicon.examples
    .map(
      (ex) => `EXAMPLE:
Note: "${ex.note}"
Existing groups: ${describeTree(ex.tree)}
Answer: ${JSON.stringify(ex.result)}`
    )
    .join("\n\n");

  const names = tree.groups.map((g) => g.name);
  const relationHint =
    names.length > 0
      ? `Existing group names: ${quoteList(names)}.
Ask yourself: is the note about the same topic as one of these groups or a mandatory category?
If NOT → is_new_group=true with a new descriptive name. If YES → use that group with is_new_group=false.`
      : "(No existing groups: use a mandatory category when it fits, otherwise create a new group.)";

  return `${examples}

NOW CLASSIFY:
Note: "${noteText}"
Current time: ${formatLocalIso(now)}
Existing groups: ${describeTree(tree)}
MANDATORY CATEGORIES (always exist): ${quoteList(lexicon.predefinedCategories)}
${relationHint}
Answer (JSON only):`;
}

/**
 * Function-calling definition mirroring the JSON answer shape.
 */
export const CLASSIFY_NOTE_TOOL = {
  type: "function",
  function: {
    name: "classify_note",
    description: "Record one classified idea from the user's note. Call once per distinct idea.",
    parameters: {
      type: "object",
      properties: {
        action: { type: "string", enum: ["add", "delete", "remind"] },
        makes_sense: { type: "boolean" },
        reason: { type: ["string", "null"] },
        group: { type: ["string", "null"] },
        subgroup: { type: ["string", "null"] },
        idea: { type: ["string", "null"] },
        is_new_group: { type: "boolean" },
        is_new_subgroup: { type: "boolean" },
        inherit_parent_ideas: { type: "boolean" },
        rename: {
          type: ["object", "null"],
          properties: {
            old_name: { type: "string" },
            new_name: { type: "string" },
          },
        },
        remind_at: { type: ["string", "null"] },
      },
      required: ["action", "makes_sense"],
    },
  },
} as const;

// ============================================================================
// CLASSIFICATION NORMALIZER
// ============================================================================
// Converts oracle proposals into internally consistent CanonicalMutations,
// correcting the oracle where deterministic keyword rules know better.

import { EMPTY_RESPONSE_REASON } from "../decoder/proposal.js";
import type { Lexicon } from "../lexicon/index.js";
import { containsKeyword } from "../lexicon/text.js";
import { FALLBACK_DELAY_MINUTES } from "../reminders/detector.js";
import { addMinutes, formatLocalIso, parseTimestamp } from "../reminders/time.js";
import type {
  CanonicalMutation,
  ClassificationProposal,
  IdeaTree,
  MutationAction,
} from "../types/index.js";
import { distillIdea } from "./distill.js";

export { distillIdea } from "./distill.js";

export interface NormalizationContext {
  tree: IdeaTree;
  noteText: string;
  lexicon: Lexicon;
  now: Date;
}

export const DEFAULT_REFUSAL_REASON = "The note does not express a classifiable idea.";

// ---- Helpers ----

function clean(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseAction(value: string | undefined): MutationAction {
  const action = value?.trim().toLowerCase();
  return action === "delete" || action === "remind" ? action : "add";
}

export function noopMutation(reason: string, action: MutationAction = "add"): CanonicalMutation {
  return {
    action,
    makesSense: false,
    reason,
    group: null,
    subgroup: null,
    idea: null,
    isNewGroup: false,
    isNewSubgroup: false,
    inheritParentIdeas: false,
    rename: null,
    remindAt: null,
  };
}

/**
 * Copy of a mutation that can no longer create structure: used for every
 * element of a batch after the first.
 */
export function withoutStructuralFlags(mutation: CanonicalMutation): CanonicalMutation {
  return {
    ...mutation,
    isNewGroup: false,
    isNewSubgroup: false,
    inheritParentIdeas: false,
    rename: null,
  };
}

// ---- Keyword rules ----

export function isDeleteIntent(noteText: string, lexicon: Lexicon): boolean {
  return containsKeyword(noteText, lexicon.deleteKeywords);
}

/**
 * Name of an existing group the note mentions literally, if any.
 */
export function findMentionedGroup(noteText: string, tree: IdeaTree): string | null {
  const note = noteText.toLowerCase();
  return tree.groups.find((g) => g.name.trim() !== "" && note.includes(g.name.toLowerCase()))?.name ?? null;
}

/**
 * First predefined category whose keyword table matches the note.
 */
export function guessPredefinedCategory(noteText: string, lexicon: Lexicon): string | null {
  for (const [category, keywords] of Object.entries(lexicon.categoryKeywords)) {
    if (containsKeyword(noteText, keywords)) return category;
  }
  return null;
}

export function routineSubgroup(noteText: string, lexicon: Lexicon): string | null {
  const note = noteText.toLowerCase();
  for (const [activity, subgroup] of Object.entries(lexicon.routineActivities)) {
    if (note.includes(activity.toLowerCase())) return subgroup;
  }
  return null;
}

// ---- Per-action normalization ----

function normalizeDelete(proposal: ClassificationProposal): CanonicalMutation {
  return {
    action: "delete",
    makesSense: true,
    reason: clean(proposal.reason),
    group: clean(proposal.group),
    subgroup: clean(proposal.subgroup),
    idea: clean(proposal.idea),
    isNewGroup: false,
    isNewSubgroup: false,
    inheritParentIdeas: false,
    rename: null,
    remindAt: null,
  };
}

function normalizeRemind(proposal: ClassificationProposal, context: NormalizationContext): CanonicalMutation {
  const parsed = proposal.remindAt ? parseTimestamp(proposal.remindAt) : null;
  const fireAt = parsed ?? addMinutes(context.now, FALLBACK_DELAY_MINUTES);

  return {
    action: "remind",
    makesSense: true,
    reason: clean(proposal.reason),
    group: null,
    subgroup: null,
    idea: clean(proposal.idea) ?? context.noteText.trim(),
    isNewGroup: false,
    isNewSubgroup: false,
    inheritParentIdeas: false,
    rename: null,
    remindAt: formatLocalIso(fireAt),
  };
}

function normalizeAdd(proposal: ClassificationProposal, context: NormalizationContext): CanonicalMutation {
  const { tree, noteText, lexicon } = context;

  let group = clean(proposal.group);
  let isNewGroup = proposal.isNewGroup ?? false;
  let subgroup = clean(proposal.subgroup);
  let isNewSubgroup = proposal.isNewSubgroup ?? false;

  if (isNewGroup && tree.groups.length > 0) {
    const mentioned = findMentionedGroup(noteText, tree);
    if (mentioned) {
      group = mentioned;
      isNewGroup = false;
    }
  }

  const predefined = lexicon.predefinedCategories.map((c) => c.toLowerCase());
  if (!predefined.includes((group ?? "").toLowerCase())) {
    const guessed = guessPredefinedCategory(noteText, lexicon);
    if (guessed) {
      const existing = tree.groups.find((g) => g.name.toLowerCase() === guessed.toLowerCase());
      group = existing?.name ?? guessed;
      isNewGroup = existing === undefined;

      if (guessed === lexicon.routineCategory && !subgroup) {
        const activity = routineSubgroup(noteText, lexicon);
        if (activity) {
          subgroup = activity;
          isNewSubgroup = true;
        }
      }
    }
  }

  const rename = isNewGroup ? (proposal.rename ?? null) : null;

  return {
    action: "add",
    makesSense: true,
    reason: clean(proposal.reason),
    group,
    subgroup,
    idea: distillIdea(proposal.idea, noteText, lexicon),
    isNewGroup,
    isNewSubgroup: subgroup ? isNewSubgroup : false,
    inheritParentIdeas: subgroup ? (proposal.inheritParentIdeas ?? false) : false,
    rename,
    remindAt: null,
  };
}

// ---- Public API ----

/**
 * Normalize a single proposal against the current tree.
 */
export function normalizeProposal(proposal: ClassificationProposal, context: NormalizationContext): CanonicalMutation {
  if (proposal.makesSense === false) {
    return noopMutation(clean(proposal.reason) ?? DEFAULT_REFUSAL_REASON, parseAction(proposal.action));
  }

  let action = parseAction(proposal.action);
  if (action === "add" && isDeleteIntent(context.noteText, context.lexicon)) {
    action = "delete";
  }

  switch (action) {
    case "delete":
      return normalizeDelete(proposal);
    case "remind":
      return normalizeRemind(proposal, context);
    case "add":
      return normalizeAdd(proposal, context);
  }
}

/**
 * Normalize every proposal produced for one note. Only the first result may
 * create structure or carry a rename.
 */
export function normalizeBatch(
  proposals: readonly ClassificationProposal[],
  context: NormalizationContext
): CanonicalMutation[] {
  if (proposals.length === 0) return [noopMutation(EMPTY_RESPONSE_REASON)];

  return proposals.map((proposal, index) => {
    const mutation = normalizeProposal(proposal, context);
    return index === 0 ? mutation : withoutStructuralFlags(mutation);
  });
}

/**
 * Re-apply the batch rules to mutations that did not come through
 * normalizeBatch: a rename needs a new group, and only the first mutation
 * may create structure.
 */
export function enforceBatchInvariants(mutations: readonly CanonicalMutation[]): CanonicalMutation[] {
  return mutations.map((mutation, index) => {
    if (index > 0) return withoutStructuralFlags(mutation);
    return mutation.isNewGroup ? mutation : { ...mutation, rename: null };
  });
}

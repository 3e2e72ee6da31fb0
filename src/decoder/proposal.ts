// ============================================================================
// PROPOSAL READER
// ============================================================================
// Turns a decoded value (or a tool-call argument object) into typed
// ClassificationProposals. The oracle speaks snake_case; camelCase is accepted
// too because some tool-calling models rewrite argument names.

import { z } from "zod";

import { DecodeError } from "../engine/errors.js";
import type { ClassificationProposal, GroupRename, RawProposal } from "../types/index.js";
import { decodeStructuredResponse } from "./index.js";

// ---- Lenient field schemas ----
// A malformed field is dropped (undefined) instead of rejecting the proposal.

const looseBoolean = z
  .preprocess((v) => (v === "true" ? true : v === "false" ? false : v), z.boolean())
  .optional()
  .catch(undefined);

const looseString = z
  .preprocess((v) => (typeof v === "string" && v.trim() === "" ? null : v), z.string().nullable())
  .optional()
  .catch(undefined);

const renameSchema = z
  .object({
    old_name: z.string().optional(),
    oldName: z.string().optional(),
    new_name: z.string().optional(),
    newName: z.string().optional(),
  })
  .nullable()
  .optional()
  .catch(undefined);

const ProposalSchema = z
  .object({
    action: looseString,
    makes_sense: looseBoolean,
    makesSense: looseBoolean,
    reason: looseString,
    group: looseString,
    subgroup: looseString,
    idea: looseString,
    is_new_group: looseBoolean,
    isNewGroup: looseBoolean,
    is_new_subgroup: looseBoolean,
    isNewSubgroup: looseBoolean,
    inherit_parent_ideas: looseBoolean,
    inheritParentIdeas: looseBoolean,
    rename: renameSchema,
    rename_group: renameSchema,
    remind_at: looseString,
    remindAt: looseString,
  })
  .passthrough();

type ProposalWire = z.infer<typeof ProposalSchema>;

function readRename(wire: ProposalWire): GroupRename | null | undefined {
  const rename = wire.rename ?? wire.rename_group;
  if (rename === undefined) return undefined;
  if (rename === null) return null;
  const oldName = rename.old_name ?? rename.oldName;
  const newName = rename.new_name ?? rename.newName;
  return oldName && newName ? { oldName, newName } : null;
}

function toProposal(wire: ProposalWire): ClassificationProposal {
  return {
    action: wire.action ?? undefined,
    makesSense: wire.makes_sense ?? wire.makesSense,
    reason: wire.reason,
    group: wire.group,
    subgroup: wire.subgroup,
    idea: wire.idea,
    isNewGroup: wire.is_new_group ?? wire.isNewGroup,
    isNewSubgroup: wire.is_new_subgroup ?? wire.isNewSubgroup,
    inheritParentIdeas: wire.inherit_parent_ideas ?? wire.inheritParentIdeas,
    rename: readRename(wire),
    remindAt: wire.remind_at ?? wire.remindAt,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const EMPTY_RESPONSE_REASON = "The classifier returned an empty response.";

/**
 * Read one or more proposals out of a decoded value. Objects give one
 * proposal, arrays one per object element; an empty array is a refusal.
 */
export function readProposals(value: unknown, raw = JSON.stringify(value)): ClassificationProposal[] {
  if (Array.isArray(value)) {
    const proposals = value.filter(isRecord).map((item) => toProposal(ProposalSchema.parse(item)));
    return proposals.length > 0
      ? proposals
      : [{ makesSense: false, reason: EMPTY_RESPONSE_REASON }];
  }

  if (isRecord(value)) {
    // Some models wrap the list: {"proposals": [...]} / {"results": [...]}
    for (const key of ["proposals", "results"]) {
      const inner = value[key];
      if (Array.isArray(inner)) return readProposals(inner, raw);
    }
    return [toProposal(ProposalSchema.parse(value))];
  }

  throw new DecodeError("Classifier response is not an object or a list of objects", raw);
}

/**
 * Decode whatever the oracle returned into proposals.
 * Text goes through the repairing decoder; tool-call arguments are read as-is.
 */
export function proposalsFromRaw(raw: RawProposal): ClassificationProposal[] {
  if (raw.kind === "text") {
    return readProposals(decodeStructuredResponse(raw.text), raw.text);
  }

  const calls = raw.calls.flatMap((call) => (Array.isArray(call) ? call : [call]));
  return readProposals(calls, JSON.stringify(raw.calls));
}

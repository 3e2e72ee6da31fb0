// ============================================================================
// TREE SUMMARIZER
// ============================================================================
// Per-group summaries, actionable key points and one overall paragraph.
// Small trees go to the model in a single call; larger ones one group at a
// time, followed by a plain-text call for the overall paragraph.

import { z } from "zod";

import { decodeStructuredResponse } from "../decoder/index.js";
import { DecodeError } from "../engine/errors.js";
import type { GroupSummary, IdeaTree, KeyPoint, KeyPointCategory, Locale, TreeSummary } from "../types/index.js";
import {
  buildGlobalSummaryPrompt,
  buildGlobalSummarySystemPrompt,
  buildGroupSummaryPrompt,
  buildSummarySystemPrompt,
  buildTreeSummaryPrompt,
} from "./prompt.js";

/** Trees with more groups than this are summarised one group per call */
export const SINGLE_CALL_GROUP_LIMIT = 3;

/**
 * A model that answers a system + user prompt with text.
 * Implementations throw OracleUnavailableError on transport failure or timeout.
 */
export interface TextCompleter {
  complete(system: string, prompt: string): Promise<string>;
}

export interface TreeSummarizer {
  summarize(tree: IdeaTree, locale: Locale): Promise<TreeSummary>;
}

// ---- Reading the model's answer ----

const CATEGORY_ALIASES: Record<string, KeyPointCategory> = {
  action: "action",
  acción: "action",
  accion: "action",
  goal: "goal",
  meta: "goal",
  reminder: "reminder",
  recordatorio: "reminder",
  resource: "resource",
  recurso: "resource",
};

const optionalText = z.string().optional().catch(undefined);

const KeyPointSchema = z.union([
  z.string(),
  z.object({ text: z.string(), category: optionalText }).passthrough(),
]);

const GroupSummarySchema = z
  .object({
    group_name: optionalText,
    groupName: optionalText,
    group: optionalText,
    suggested_title: optionalText,
    suggestedTitle: optionalText,
    summary: optionalText,
    key_points: z.array(z.unknown()).optional().catch(undefined),
    keyPoints: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

function readCategory(value: string | undefined): KeyPointCategory {
  return CATEGORY_ALIASES[value?.trim().toLowerCase() ?? ""] ?? "action";
}

function readKeyPoints(items: readonly unknown[]): KeyPoint[] {
  const points: KeyPoint[] = [];
  for (const item of items) {
    const parsed = KeyPointSchema.safeParse(item);
    if (!parsed.success) continue;
    const point = typeof parsed.data === "string" ? { text: parsed.data, category: undefined } : parsed.data;
    const text = point.text.trim();
    if (text) points.push({ text, category: readCategory(point.category) });
  }
  return points;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one group summary. `fallbackName` is used when the answer does not
 * name its group.
 */
export function readGroupSummary(value: unknown, fallbackName = ""): GroupSummary | null {
  if (!isRecord(value)) return null;
  const wire = GroupSummarySchema.parse(value);
  const group = (wire.group_name ?? wire.groupName ?? wire.group ?? fallbackName).trim();
  if (!group) return null;

  return {
    group,
    suggestedTitle: (wire.suggested_title ?? wire.suggestedTitle ?? "").trim() || group,
    summary: (wire.summary ?? "").trim(),
    keyPoints: readKeyPoints(wire.key_points ?? wire.keyPoints ?? []),
  };
}

/**
 * Read a whole-tree summary: `{ groups, global_summary }`, or a bare list of
 * group summaries.
 */
export function readTreeSummary(value: unknown, raw = JSON.stringify(value)): TreeSummary {
  let items: unknown[];
  let globalSummary = "";

  if (Array.isArray(value)) {
    items = value;
  } else if (isRecord(value)) {
    items = Array.isArray(value.groups) ? value.groups : [];
    const global = value.global_summary ?? value.globalSummary;
    if (typeof global === "string") globalSummary = global.trim();
  } else {
    throw new DecodeError("Summary response is not an object or a list of objects", raw);
  }

  const groups: GroupSummary[] = [];
  for (const item of items) {
    const summary = readGroupSummary(item);
    if (summary) groups.push(summary);
  }
  return { groups, globalSummary };
}

// ============================================================================
// ORACLE SUMMARIZER
// ============================================================================

export class OracleSummarizer implements TreeSummarizer {
  constructor(private readonly completer: TextCompleter) {}

  /**
   * @throws DecodeError when an answer cannot be decoded
   */
  async summarize(tree: IdeaTree, locale: Locale): Promise<TreeSummary> {
    if (tree.groups.length === 0) return { groups: [], globalSummary: "" };
    return tree.groups.length <= SINGLE_CALL_GROUP_LIMIT
      ? this.summarizeTogether(tree, locale)
      : this.summarizeEachGroup(tree, locale);
  }

  private async summarizeTogether(tree: IdeaTree, locale: Locale): Promise<TreeSummary> {
    const raw = await this.completer.complete(buildSummarySystemPrompt(locale), buildTreeSummaryPrompt(tree));
    return readTreeSummary(decodeStructuredResponse(raw), raw);
  }

  private async summarizeEachGroup(tree: IdeaTree, locale: Locale): Promise<TreeSummary> {
    const system = buildSummarySystemPrompt(locale);
    const groups: GroupSummary[] = [];

    for (const group of tree.groups) {
      const raw = await this.completer.complete(system, buildGroupSummaryPrompt(group));
      const summary = readGroupSummary(decodeStructuredResponse(raw), group.name);
      if (!summary) throw new DecodeError(`Summary of "${group.name}" is not an object`, raw);
      groups.push(summary);
    }

    const globalSummary = await this.completer.complete(
      buildGlobalSummarySystemPrompt(locale),
      buildGlobalSummaryPrompt(groups)
    );
    return { groups, globalSummary: globalSummary.trim() };
  }
}

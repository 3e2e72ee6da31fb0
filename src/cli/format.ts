// ============================================================================
// TERMINAL RENDERING
// ============================================================================

import type {
  CanonicalMutation,
  Group,
  IdeaTree,
  NoteProcessingResult,
  Reminder,
  SearchHit,
  TreeChange,
  TreeSummary,
  UnclassifiedNote,
} from "../types/index.js";

const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
const dim = (s: string) => `\x1b[90m${s}\x1b[0m`;
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;

export function renderGroup(group: Group): string[] {
  const lines = [`${cyan("■")} ${bold(group.name)}`];
  for (const idea of group.ideas) lines.push(`  • ${idea}`);
  for (const subgroup of group.subgroups) {
    lines.push(`  ${cyan("▸")} ${subgroup.name}`);
    for (const idea of subgroup.ideas) lines.push(`    • ${idea}`);
  }
  return lines;
}

export function renderTree(tree: IdeaTree): string[] {
  if (tree.groups.length === 0) return [dim("(empty tree)")];
  return tree.groups.flatMap((group) => [...renderGroup(group), ""]);
}

export function describeChange(change: TreeChange): string {
  const where = (group: string, subgroup: string | null) => (subgroup ? `${group} / ${subgroup}` : group);

  switch (change.type) {
    case "group_renamed":
      return `${yellow("↺")} group "${change.from}" renamed to "${change.to}"`;
    case "group_created":
      return `${green("+")} group "${change.group}"`;
    case "group_removed":
      return `${red("-")} group "${change.group}"`;
    case "subgroup_created":
      return `${green("+")} subgroup "${where(change.group, change.subgroup)}"${
        change.inherited.length > 0 ? dim(` (inherited ${change.inherited.length})`) : ""
      }`;
    case "subgroup_removed":
      return `${red("-")} subgroup "${where(change.group, change.subgroup)}"`;
    case "idea_added":
      return `${green("+")} "${change.idea}" → ${where(change.group, change.subgroup)}`;
    case "idea_removed":
      return `${red("-")} "${change.idea}" from ${where(change.group, change.subgroup)}`;
  }
}

function describeRefusal(mutation: CanonicalMutation): string {
  return `${yellow("○")} ${mutation.reason ?? "not classified"}`;
}

export function renderResult(result: NoteProcessingResult): string[] {
  if (result.source === "degraded") {
    return [`${yellow("⚠")} Classifier unavailable; note saved for later ${dim(`(${result.unclassified?.id ?? "?"})`)}`];
  }

  const lines: string[] = [];
  for (const mutation of result.results) {
    if (!mutation.makesSense) lines.push(describeRefusal(mutation));
  }
  for (const change of result.changes.changes) lines.push(describeChange(change));
  for (const reminder of result.changes.reminders) lines.push(renderReminder(reminder));
  for (const conflict of result.changes.conflicts) lines.push(`${red("✗")} ${conflict.reason}`);

  if (lines.length === 0) lines.push(dim("No changes"));
  return lines;
}

export function renderReminder(reminder: Reminder): string {
  const status = reminder.sent ? green("✓") : yellow("⏰");
  return `${status} ${reminder.fireAt.replace("T", " ")}  ${reminder.message}`;
}

export function renderUnclassified(note: UnclassifiedNote): string {
  return `${yellow("○")} ${bold(note.id.slice(0, 8))}  ${note.text} ${dim(`(${note.reason})`)}`;
}

export function renderSearchHit(hit: SearchHit): string {
  switch (hit.kind) {
    case "group":
      return `${cyan("■")} ${bold(hit.group)}`;
    case "subgroup":
      return `${cyan("▸")} ${hit.group} / ${bold(hit.subgroup ?? "")}`;
    case "idea":
      return `  • ${hit.idea ?? ""} ${dim(`(${hit.subgroup ? `${hit.group} / ${hit.subgroup}` : hit.group})`)}`;
  }
}

export function renderSummary(summary: TreeSummary): string[] {
  if (summary.groups.length === 0) return [dim("(empty tree)")];

  const lines: string[] = [];
  for (const group of summary.groups) {
    const title = group.suggestedTitle === group.group ? "" : ` ${dim(`(${group.suggestedTitle})`)}`;
    lines.push(`${cyan("■")} ${bold(group.group)}${title}`);
    if (group.summary) lines.push(`  ${group.summary}`);
    for (const point of group.keyPoints) lines.push(`  ${green("→")} ${point.text} ${dim(`[${point.category}]`)}`);
    lines.push("");
  }
  if (summary.globalSummary) lines.push(bold(summary.globalSummary));
  return lines;
}

// ============================================================================
// TREE SEARCH
// ============================================================================
// Case-insensitive substring search over group names, subgroup names and
// ideas, in tree order.

import { normalizeKey } from "../reconciler/fuzzy.js";
import type { IdeaTree, SearchHit } from "../types/index.js";

export function searchTree(tree: IdeaTree, query: string): SearchHit[] {
  const key = normalizeKey(query);
  if (!key) return [];

  const matches = (value: string) => normalizeKey(value).includes(key);
  const hits: SearchHit[] = [];

  for (const group of tree.groups) {
    if (matches(group.name)) {
      hits.push({ kind: "group", group: group.name, subgroup: null, idea: null });
    }
    for (const idea of group.ideas) {
      if (matches(idea)) hits.push({ kind: "idea", group: group.name, subgroup: null, idea });
    }
    for (const subgroup of group.subgroups) {
      if (matches(subgroup.name)) {
        hits.push({ kind: "subgroup", group: group.name, subgroup: subgroup.name, idea: null });
      }
      for (const idea of subgroup.ideas) {
        if (matches(idea)) hits.push({ kind: "idea", group: group.name, subgroup: subgroup.name, idea });
      }
    }
  }

  return hits;
}

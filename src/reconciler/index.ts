// ============================================================================
// TREE RECONCILER
// ============================================================================
// Applies an ordered batch of CanonicalMutations to a tree. The input tree is
// never modified: the result is a new tree plus the list of structural
// changes. Applying the same add batch twice leaves the tree as it was after
// the first application.

import type {
  CanonicalMutation,
  Group,
  IdeaTree,
  ReconciliationConflict,
  ReminderDraft,
  Subgroup,
  TreeChange,
} from "../types/index.js";
import { findExactKey, findFuzzyMatch, fuzzyEquals } from "./fuzzy.js";

export { findFuzzyMatch, fuzzyEquals, normalizeKey } from "./fuzzy.js";

export interface ReconcileOutcome {
  tree: IdeaTree;
  changes: TreeChange[];
  conflicts: ReconciliationConflict[];
  reminders: ReminderDraft[];
}

export function cloneTree(tree: IdeaTree): IdeaTree {
  return {
    groups: tree.groups.map((g) => ({
      name: g.name,
      ideas: [...g.ideas],
      subgroups: g.subgroups.map((s) => ({ name: s.name, ideas: [...s.ideas] })),
    })),
  };
}

export function findGroup(tree: IdeaTree, name: string): Group | undefined {
  const index = findExactKey(
    tree.groups.map((g) => g.name),
    name
  );
  return index === -1 ? undefined : tree.groups[index];
}

export function findSubgroup(group: Group, name: string): Subgroup | undefined {
  const index = findExactKey(
    group.subgroups.map((s) => s.name),
    name
  );
  return index === -1 ? undefined : group.subgroups[index];
}

/**
 * Removes every entry of `ideas` fuzzy-equal to `idea`, in place.
 */
function removeMatching(ideas: string[], idea: string): string[] {
  const removed = ideas.filter((existing) => fuzzyEquals(existing, idea));
  if (removed.length > 0) {
    const kept = ideas.filter((existing) => !fuzzyEquals(existing, idea));
    ideas.splice(0, ideas.length, ...kept);
  }
  return removed;
}

// ============================================================================
// RECONCILER
// ============================================================================

class Reconciler {
  readonly changes: TreeChange[] = [];
  readonly conflicts: ReconciliationConflict[] = [];
  readonly reminders: ReminderDraft[] = [];

  constructor(readonly tree: IdeaTree) {}

  apply(mutation: CanonicalMutation, index: number): void {
    if (!mutation.makesSense) return;

    switch (mutation.action) {
      case "add":
        this.add(mutation, index);
        break;
      case "delete":
        this.delete(mutation, index);
        break;
      case "remind":
        this.remind(mutation, index);
        break;
    }
  }

  private conflict(mutationIndex: number, reason: string): void {
    this.conflicts.push({ mutationIndex, reason });
  }

  // ---- add ----

  private add(mutation: CanonicalMutation, index: number): void {
    if (mutation.rename) this.rename(mutation.rename.oldName, mutation.rename.newName, index);

    if (!mutation.group) {
      this.conflict(index, "Add without a target group");
      return;
    }

    let group = findGroup(this.tree, mutation.group);
    if (!group) {
      group = { name: mutation.group, ideas: [], subgroups: [] };
      this.tree.groups.push(group);
      this.changes.push({ type: "group_created", group: group.name });
    }

    let target = group.ideas;
    let subgroupName: string | null = null;

    if (mutation.subgroup) {
      let subgroup = findSubgroup(group, mutation.subgroup);
      if (!subgroup) {
        const inherited = mutation.inheritParentIdeas ? [...group.ideas] : [];
        subgroup = { name: mutation.subgroup, ideas: [...inherited] };
        group.subgroups.push(subgroup);
        this.changes.push({ type: "subgroup_created", group: group.name, subgroup: subgroup.name, inherited });
      }
      target = subgroup.ideas;
      subgroupName = subgroup.name;
    }

    if (mutation.idea && findFuzzyMatch(target, mutation.idea) === -1) {
      target.push(mutation.idea);
      this.changes.push({ type: "idea_added", group: group.name, subgroup: subgroupName, idea: mutation.idea });
    }
  }

  private rename(oldName: string, newName: string, index: number): void {
    const source = findGroup(this.tree, oldName);
    if (!source) {
      this.conflict(index, `Rename source "${oldName}" does not exist`);
      return;
    }

    const clash = findGroup(this.tree, newName);
    if (clash && clash !== source) {
      this.conflict(index, `Rename of "${oldName}" to "${newName}" would collide with an existing group`);
      return;
    }
    if (source.name === newName) return;

    this.changes.push({ type: "group_renamed", from: source.name, to: newName });
    source.name = newName;
  }

  // ---- delete ----

  private delete(mutation: CanonicalMutation, index: number): void {
    const idea = mutation.idea;
    if (!mutation.group) {
      // No group named: the first group holding the idea loses it
      if (idea && this.tree.groups.some((g) => this.deleteIdeaFromGroup(g, idea))) return;
      this.conflict(index, "Delete target not found");
      return;
    }

    const group = findGroup(this.tree, mutation.group);
    if (!group) {
      this.conflict(index, `Group "${mutation.group}" does not exist`);
      return;
    }

    if (mutation.subgroup) {
      const subgroup = findSubgroup(group, mutation.subgroup);
      if (!subgroup) {
        this.conflict(index, `Subgroup "${mutation.subgroup}" does not exist in "${group.name}"`);
        return;
      }

      if (mutation.idea) {
        const removed = removeMatching(subgroup.ideas, mutation.idea);
        for (const idea of removed) {
          this.changes.push({ type: "idea_removed", group: group.name, subgroup: subgroup.name, idea });
        }
        if (removed.length === 0) this.conflict(index, `No idea matching "${mutation.idea}" in "${subgroup.name}"`);
      } else {
        group.subgroups = group.subgroups.filter((s) => s !== subgroup);
        this.changes.push({ type: "subgroup_removed", group: group.name, subgroup: subgroup.name });
      }
      return;
    }

    if (mutation.idea) {
      if (!this.deleteIdeaFromGroup(group, mutation.idea)) {
        this.conflict(index, `No idea matching "${mutation.idea}" in "${group.name}"`);
      }
      return;
    }

    this.tree.groups = this.tree.groups.filter((g) => g !== group);
    this.changes.push({ type: "group_removed", group: group.name });
  }

  /**
   * Root ideas first, then the first subgroup holding a match.
   */
  private deleteIdeaFromGroup(group: Group, idea: string): boolean {
    const fromRoot = removeMatching(group.ideas, idea);
    if (fromRoot.length > 0) {
      for (const removed of fromRoot) {
        this.changes.push({ type: "idea_removed", group: group.name, subgroup: null, idea: removed });
      }
      return true;
    }

    for (const subgroup of group.subgroups) {
      const removed = removeMatching(subgroup.ideas, idea);
      if (removed.length > 0) {
        for (const entry of removed) {
          this.changes.push({ type: "idea_removed", group: group.name, subgroup: subgroup.name, idea: entry });
        }
        return true;
      }
    }
    return false;
  }

  // ---- remind ----

  private remind(mutation: CanonicalMutation, index: number): void {
    if (!mutation.idea || !mutation.remindAt) {
      this.conflict(index, "Reminder without a message or fire time");
      return;
    }
    this.reminders.push({ message: mutation.idea, fireAt: mutation.remindAt });
  }
}

/**
 * Apply mutations in order to a copy of `tree`.
 */
export function reconcile(tree: IdeaTree, mutations: readonly CanonicalMutation[]): ReconcileOutcome {
  const reconciler = new Reconciler(cloneTree(tree));
  mutations.forEach((mutation, index) => reconciler.apply(mutation, index));

  return {
    tree: reconciler.tree,
    changes: reconciler.changes,
    conflicts: reconciler.conflicts,
    reminders: reconciler.reminders,
  };
}

/**
 * Lower-cased names of the groups a batch reads or writes.
 */
export function touchedGroups(mutations: readonly CanonicalMutation[]): string[] {
  const names = new Set<string>();
  for (const m of mutations) {
    if (m.group) names.add(m.group.toLowerCase());
    if (m.rename) {
      names.add(m.rename.oldName.toLowerCase());
      names.add(m.rename.newName.toLowerCase());
    }
  }
  return [...names].sort();
}

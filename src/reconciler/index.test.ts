import { describe, expect, it } from "vitest";

import { noopMutation } from "../normalizer/index.js";
import { emptyTree, type CanonicalMutation, type IdeaTree } from "../types/index.js";
import { reconcile, touchedGroups } from "./index.js";

function mutation(fields: Partial<CanonicalMutation>): CanonicalMutation {
  return { ...noopMutation(""), reason: null, makesSense: true, ...fields };
}

const compras = (): IdeaTree => ({
  groups: [{ name: "compras", ideas: ["leche", "pan"], subgroups: [{ name: "super", ideas: ["queso"] }] }],
});

describe("reconcile: add", () => {
  it("creates the group, the subgroup and the idea in order", () => {
    const outcome = reconcile(emptyTree(), [
      mutation({ action: "add", group: "compras", subgroup: "super", idea: "pan", isNewGroup: true, isNewSubgroup: true }),
    ]);

    expect(outcome.tree).toEqual({
      groups: [{ name: "compras", ideas: [], subgroups: [{ name: "super", ideas: ["pan"] }] }],
    });
    expect(outcome.changes).toEqual([
      { type: "group_created", group: "compras" },
      { type: "subgroup_created", group: "compras", subgroup: "super", inherited: [] },
      { type: "idea_added", group: "compras", subgroup: "super", idea: "pan" },
    ]);
    expect(outcome.conflicts).toEqual([]);
  });

  it("does not modify the input tree", () => {
    const tree = compras();
    reconcile(tree, [mutation({ action: "add", group: "compras", idea: "huevos" })]);
    expect(tree).toEqual(compras());
  });

  it("is idempotent for add batches", () => {
    const batch = [
      mutation({ action: "add", group: "Compras", idea: "huevos", isNewGroup: true }),
      mutation({ action: "add", group: "compras", subgroup: "Super", idea: "Queso" }),
    ];

    const once = reconcile(compras(), batch);
    const twice = reconcile(once.tree, batch);

    expect(twice.tree).toEqual(once.tree);
    expect(twice.changes).toEqual([]);
    expect(once.tree.groups[0].ideas).toEqual(["leche", "pan", "huevos"]);
  });

  it("seeds a new subgroup with a copy of the parent's root ideas", () => {
    const tree: IdeaTree = { groups: [{ name: "pagina web", ideas: ["fondo azul"], subgroups: [] }] };

    const outcome = reconcile(tree, [
      mutation({
        action: "add",
        group: "pagina web",
        subgroup: "web de gatos",
        isNewSubgroup: true,
        inheritParentIdeas: true,
      }),
      mutation({ action: "add", group: "pagina web", idea: "logo grande" }),
    ]);

    const group = outcome.tree.groups[0];
    expect(group.subgroups[0].ideas).toEqual(["fondo azul"]);
    expect(group.ideas).toEqual(["fondo azul", "logo grande"]);
  });

  it("records a conflict for an add without a group", () => {
    const outcome = reconcile(emptyTree(), [mutation({ action: "add", idea: "algo" })]);

    expect(outcome.tree).toEqual(emptyTree());
    expect(outcome.conflicts).toEqual([{ mutationIndex: 0, reason: "Add without a target group" }]);
  });
});

describe("reconcile: rename", () => {
  const movies = (): IdeaTree => ({ groups: [{ name: "pelis", ideas: ["Alien"], subgroups: [] }] });

  it("renames before creating the new group", () => {
    const outcome = reconcile(movies(), [
      mutation({
        action: "add",
        group: "rodar una peli",
        idea: "peli de terror",
        isNewGroup: true,
        rename: { oldName: "Pelis", newName: "ver pelis" },
      }),
    ]);

    expect(outcome.tree.groups.map((g) => g.name)).toEqual(["ver pelis", "rodar una peli"]);
    expect(outcome.changes[0]).toEqual({ type: "group_renamed", from: "pelis", to: "ver pelis" });
  });

  it("skips a rename onto an existing name", () => {
    const tree: IdeaTree = {
      groups: [
        { name: "pelis", ideas: [], subgroups: [] },
        { name: "series", ideas: [], subgroups: [] },
      ],
    };
    const outcome = reconcile(tree, [
      mutation({ action: "add", group: "cine", isNewGroup: true, rename: { oldName: "pelis", newName: "Series" } }),
    ]);

    expect(outcome.tree.groups.map((g) => g.name)).toEqual(["pelis", "series", "cine"]);
    expect(outcome.conflicts).toHaveLength(1);
  });

  it("reports a missing rename source", () => {
    const outcome = reconcile(movies(), [
      mutation({ action: "add", group: "cine", isNewGroup: true, rename: { oldName: "libros", newName: "leer" } }),
    ]);

    expect(outcome.conflicts).toEqual([{ mutationIndex: 0, reason: 'Rename source "libros" does not exist' }]);
    expect(outcome.tree.groups.map((g) => g.name)).toEqual(["pelis", "cine"]);
  });
});

describe("reconcile: delete", () => {
  it("removes only the matching root idea", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "compras", idea: "leche" })]);

    expect(outcome.tree.groups[0].ideas).toEqual(["pan"]);
    expect(outcome.changes).toEqual([{ type: "idea_removed", group: "compras", subgroup: null, idea: "leche" }]);
  });

  it("falls back to the first subgroup holding the idea", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "compras", idea: "Queso" })]);

    expect(outcome.tree.groups[0].subgroups[0].ideas).toEqual([]);
    expect(outcome.tree.groups[0].ideas).toEqual(["leche", "pan"]);
  });

  it("removes a whole subgroup when no idea is given", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "compras", subgroup: "super" })]);

    expect(outcome.tree.groups[0].subgroups).toEqual([]);
    expect(outcome.changes).toEqual([{ type: "subgroup_removed", group: "compras", subgroup: "super" }]);
  });

  it("removes a whole group when neither subgroup nor idea is given", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "Compras" })]);
    expect(outcome.tree).toEqual(emptyTree());
  });

  it("does not remove a group whose name only partly matches", () => {
    const tree: IdeaTree = { groups: [{ name: "casa", ideas: ["pintar salón"], subgroups: [] }] };
    const outcome = reconcile(tree, [mutation({ action: "delete", group: "casa de playa" })]);

    expect(outcome.tree).toEqual(tree);
    expect(outcome.changes).toEqual([]);
    expect(outcome.conflicts).toEqual([{ mutationIndex: 0, reason: 'Group "casa de playa" does not exist' }]);
  });

  it("does not remove a subgroup whose name only partly matches", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "compras", subgroup: "supermercado" })]);

    expect(outcome.tree).toEqual(compras());
    expect(outcome.conflicts).toEqual([
      { mutationIndex: 0, reason: 'Subgroup "supermercado" does not exist in "compras"' },
    ]);
  });

  it("searches every group when none is named", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", idea: "pan" })]);
    expect(outcome.tree.groups[0].ideas).toEqual(["leche"]);
  });

  it("reports a delete that matches nothing without changing the tree", () => {
    const outcome = reconcile(compras(), [mutation({ action: "delete", group: "compras", idea: "chocolate" })]);

    expect(outcome.tree).toEqual(compras());
    expect(outcome.changes).toEqual([]);
    expect(outcome.conflicts).toEqual([{ mutationIndex: 0, reason: 'No idea matching "chocolate" in "compras"' }]);
  });
});

describe("reconcile: remind", () => {
  it("emits a reminder draft and leaves the tree alone", () => {
    const outcome = reconcile(compras(), [
      mutation({ action: "remind", idea: "llamar al dentista", remindAt: "2026-03-01T09:00:00" }),
    ]);

    expect(outcome.tree).toEqual(compras());
    expect(outcome.reminders).toEqual([{ message: "llamar al dentista", fireAt: "2026-03-01T09:00:00" }]);
  });
});

describe("touchedGroups", () => {
  it("returns the sorted lower-case names a batch touches", () => {
    expect(
      touchedGroups([
        mutation({ action: "add", group: "Viajes", rename: { oldName: "Pelis", newName: "ver pelis" } }),
        mutation({ action: "delete", group: "compras" }),
        mutation({ action: "remind", idea: "x" }),
      ])
    ).toEqual(["compras", "pelis", "ver pelis", "viajes"]);
  });
});

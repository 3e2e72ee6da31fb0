import { describe, expect, it } from "vitest";

import { DecodeError } from "../engine/errors.js";
import type { IdeaTree } from "../types/index.js";
import { OracleSummarizer, readGroupSummary, readTreeSummary, type TextCompleter } from "./index.js";

class ScriptedCompleter implements TextCompleter {
  readonly prompts: string[] = [];

  constructor(private readonly answers: string[]) {}

  async complete(_system: string, prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error("no scripted answer left");
    return answer;
  }
}

function treeOf(...names: string[]): IdeaTree {
  return { groups: names.map((name) => ({ name, ideas: [`idea de ${name}`], subgroups: [] })) };
}

describe("readGroupSummary", () => {
  it("reads snake_case fields and maps key point categories", () => {
    expect(
      readGroupSummary({
        group_name: "gimnasio",
        suggested_title: "Plan de fuerza",
        summary: " Entrenar tres días. ",
        key_points: [
          { text: "Hacer bíceps el día de espalda", category: "acción" },
          { text: "Ser constante", category: "Meta" },
          "Comprar guantes",
          { text: "  " },
          42,
        ],
      })
    ).toEqual({
      group: "gimnasio",
      suggestedTitle: "Plan de fuerza",
      summary: "Entrenar tres días.",
      keyPoints: [
        { text: "Hacer bíceps el día de espalda", category: "action" },
        { text: "Ser constante", category: "goal" },
        { text: "Comprar guantes", category: "action" },
      ],
    });
  });

  it("falls back to the given name and uses it as the title", () => {
    expect(readGroupSummary({ summary: "Nada más." }, "viajes")).toEqual({
      group: "viajes",
      suggestedTitle: "viajes",
      summary: "Nada más.",
      keyPoints: [],
    });
  });

  it("returns null for an answer without a group", () => {
    expect(readGroupSummary({ summary: "huérfano" })).toBeNull();
    expect(readGroupSummary("texto")).toBeNull();
  });
});

describe("readTreeSummary", () => {
  it("accepts a bare list of group summaries", () => {
    expect(readTreeSummary([{ group_name: "compras", summary: "Pan." }])).toEqual({
      groups: [{ group: "compras", suggestedTitle: "compras", summary: "Pan.", keyPoints: [] }],
      globalSummary: "",
    });
  });

  it("rejects a value that is neither an object nor a list", () => {
    expect(() => readTreeSummary("hola", "hola")).toThrow(DecodeError);
  });
});

describe("OracleSummarizer", () => {
  it("does not call the model for an empty tree", async () => {
    const completer = new ScriptedCompleter([]);
    expect(await new OracleSummarizer(completer).summarize({ groups: [] }, "es")).toEqual({
      groups: [],
      globalSummary: "",
    });
    expect(completer.prompts).toEqual([]);
  });

  it("summarises a small tree in one call, reading prose-wrapped JSON", async () => {
    const completer = new ScriptedCompleter([
      'Aquí tienes:\n```json\n{"groups": [{"group_name": "compras", "summary": "Lista corta.", "key_points": [{"text": "Comprar pan", "category": "acción"}]}], "global_summary": "Todo en orden."}\n```',
    ]);

    const summary = await new OracleSummarizer(completer).summarize(treeOf("compras", "viajes"), "es");

    expect(completer.prompts).toHaveLength(1);
    expect(completer.prompts[0]).toContain('"name": "viajes"');
    expect(summary).toEqual({
      groups: [
        {
          group: "compras",
          suggestedTitle: "compras",
          summary: "Lista corta.",
          keyPoints: [{ text: "Comprar pan", category: "action" }],
        },
      ],
      globalSummary: "Todo en orden.",
    });
  });

  it("summarises a larger tree one group at a time, then asks for the overall paragraph", async () => {
    const completer = new ScriptedCompleter([
      '{"summary": "A."}',
      '{"group_name": "b", "summary": "B."}',
      '{"summary": "C."}',
      '{"summary": "D."}',
      "  Un panorama general.  ",
    ]);

    const summary = await new OracleSummarizer(completer).summarize(treeOf("a", "b", "c", "d"), "es");

    expect(completer.prompts).toHaveLength(5);
    expect(summary.groups.map((g) => [g.group, g.summary])).toEqual([
      ["a", "A."],
      ["b", "B."],
      ["c", "C."],
      ["d", "D."],
    ]);
    expect(summary.globalSummary).toBe("Un panorama general.");
    expect(completer.prompts[4]).toContain('"summary": "D."');
  });

  it("raises a decode error when an answer holds no JSON", async () => {
    const completer = new ScriptedCompleter(["no sé qué decir"]);
    await expect(new OracleSummarizer(completer).summarize(treeOf("compras"), "es")).rejects.toBeInstanceOf(
      DecodeError
    );
  });
});

import { FakeListChatModel } from "@langchain/core/utils/testing";
import { afterEach, describe, expect, it, vi } from "vitest";

import { OracleUnavailableError } from "../engine/errors.js";
import { loadLexicon } from "../lexicon/index.js";
import { OracleSummarizer } from "../summary/index.js";
import { buildClassificationPrompt, contentToText, LangChainOracle } from "./index.js";

const NOW = new Date(2026, 1, 28, 10, 0, 0);
const tree = { groups: [{ name: "compras", ideas: ["pan"], subgroups: [] }] };

describe("contentToText", () => {
  it("keeps string content", () => {
    expect(contentToText('{"a": 1}')).toBe('{"a": 1}');
  });

  it("joins the text parts of structured content", () => {
    expect(
      contentToText([
        { type: "text", text: "[{" },
        { type: "image_url", image_url: "data:image/png;base64,AAAA" },
        { type: "text", text: "}]" },
      ])
    ).toBe("[{}]");
  });
});

describe("buildClassificationPrompt", () => {
  it("includes the note, the time and the existing groups", () => {
    const prompt = buildClassificationPrompt("comprar queso", tree, loadLexicon("es"), NOW);

    expect(prompt).toContain('Note: "comprar queso"');
    expect(prompt).toContain("Current time: 2026-02-28T10:00:00");
    expect(prompt).toContain('Existing group names: "compras".');
  });

  it("tells the model when the tree is empty", () => {
    const prompt = buildClassificationPrompt("comprar queso", { groups: [] }, loadLexicon("es"), NOW);
    expect(prompt).toContain("(No existing groups: use a mandatory category when it fits, otherwise create a new group.)");
  });
});

describe("LangChainOracle", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the model's text answer undecoded", async () => {
    const model = new FakeListChatModel({ responses: ['```json\n{"group": "compras"}\n```'] });
    const oracle = new LangChainOracle(model);

    await expect(oracle.classify("comprar queso", tree, "es", NOW)).resolves.toEqual({
      kind: "text",
      text: '```json\n{"group": "compras"}\n```',
    });
  });

  it("wraps transport failures", async () => {
    const model = new FakeListChatModel({ responses: ["unused"] });
    vi.spyOn(model, "invoke").mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:11434"));
    const oracle = new LangChainOracle(model);

    const failure = oracle.classify("comprar queso", tree, "es", NOW);
    await expect(failure).rejects.toBeInstanceOf(OracleUnavailableError);
    await expect(failure).rejects.toThrow("Classifier unavailable: connect ECONNREFUSED 127.0.0.1:11434");
  });

  it("reports a timeout as such", async () => {
    const model = new FakeListChatModel({ responses: ["unused"] });
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    vi.spyOn(model, "invoke").mockRejectedValue(timeout);
    const oracle = new LangChainOracle(model, { timeoutMs: 10 });

    await expect(oracle.classify("comprar queso", tree, "es", NOW)).rejects.toThrow(
      "Classifier unavailable: request timed out"
    );
  });

  it("summarises a tree through the chat model", async () => {
    const model = new FakeListChatModel({
      responses: ['{"groups": [{"group_name": "compras", "summary": "Pan y poco más."}], "global_summary": "Casi nada."}'],
    });
    const summary = await new OracleSummarizer(new LangChainOracle(model)).summarize(tree, "es");

    expect(summary).toEqual({
      groups: [{ group: "compras", suggestedTitle: "compras", summary: "Pan y poco más.", keyPoints: [] }],
      globalSummary: "Casi nada.",
    });
  });

  it("wraps transport failures of free-form completions", async () => {
    const model = new FakeListChatModel({ responses: ["unused"] });
    vi.spyOn(model, "invoke").mockRejectedValue(new Error("socket hang up"));

    await expect(new LangChainOracle(model).complete("system", "prompt")).rejects.toThrow(
      "Summarizer unavailable: socket hang up"
    );
  });
});

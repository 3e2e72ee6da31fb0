import { describe, expect, it } from "vitest";

import { DecodeError } from "../engine/errors.js";
import { closeIncompleteJson, decodeStructuredResponse, sanitizeJsonString } from "./index.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("sanitizeJsonString", () => {
  it("replaces newlines inside strings only", () => {
    expect(sanitizeJsonString('{"idea": "pan\nqueso"}\n')).toBe('{"idea": "pan queso"}\n');
  });

  it("ignores escaped quotes when tracking strings", () => {
    expect(sanitizeJsonString('{"a": "say \\"hi\\"\nnow"}')).toBe('{"a": "say \\"hi\\" now"}');
  });
});

describe("closeIncompleteJson", () => {
  it("closes an open string and the open containers in nesting order", () => {
    expect(closeIncompleteJson('{"list": ["pan", "que')).toBe('{"list": ["pan", "que"]}');
  });

  it("drops a dangling comma before closing", () => {
    expect(closeIncompleteJson('[{"idea": "pan"},')).toBe('[{"idea": "pan"}]');
  });

  it("leaves balanced text alone", () => {
    expect(closeIncompleteJson('{"a": 1}')).toBe('{"a": 1}');
  });
});

describe("decodeStructuredResponse", () => {
  it("parses clean JSON as-is", () => {
    expect(decodeStructuredResponse('  {"group": "compras", "idea": "pan"}  ')).toEqual({
      group: "compras",
      idea: "pan",
    });
  });

  it("recovers a value with its last closing brace removed", () => {
    const value = { a: [1, 2], b: { c: true } };
    const truncated = JSON.stringify(value).slice(0, -1);
    expect(decodeStructuredResponse(truncated)).toEqual(value);
  });

  it("repairs raw newlines inside strings", () => {
    expect(decodeStructuredResponse('{"idea": "pan\nqueso"}')).toEqual({ idea: "pan queso" });
  });

  it("closes a response cut off inside a string", () => {
    expect(decodeStructuredResponse('{"group": "compras", "idea": "pa')).toEqual({ group: "compras", idea: "pa" });
  });

  it("reads the contents of a fenced block", () => {
    const raw = 'Here you go:\n```json\n{"group": "compras"}\n```\nAnything else?';
    expect(decodeStructuredResponse(raw)).toEqual({ group: "compras" });
  });

  it("reads an unterminated fenced block", () => {
    const raw = '```json\n{"group": "compras", "idea": "leche"';
    expect(decodeStructuredResponse(raw)).toEqual({ group: "compras", idea: "leche" });
  });

  it("extracts an object surrounded by prose", () => {
    expect(decodeStructuredResponse('Sure! {"group": "viajes"} hope this helps')).toEqual({ group: "viajes" });
  });

  it("falls back to the array span when the object span is not valid", () => {
    expect(decodeStructuredResponse('Result: [{"idea":"a"},{"idea":"b"}] done')).toEqual([
      { idea: "a" },
      { idea: "b" },
    ]);
  });

  it("throws DecodeError carrying the original text", () => {
    const raw = "I cannot classify that note.";
    const error = captureError(() => decodeStructuredResponse(raw));

    expect(error).toBeInstanceOf(DecodeError);
    expect(error instanceof DecodeError && error.raw).toBe(raw);
    expect(error instanceof DecodeError && error.retryable).toBe(true);
  });

  it("rejects bare scalars", () => {
    expect(() => decodeStructuredResponse("42")).toThrow(DecodeError);
  });
});

import { describe, expect, it } from "vitest";
import {
  describeJsonType,
  locateJsonError,
  parseJson,
  positionToLineColumn,
} from "./json";

describe("parseJson", () => {
  it("returns the parsed value", () => {
    expect(parseJson('[{"a":1}]')).toEqual({ ok: true, value: [{ a: 1 }] });
  });

  it("returns the parser message on failure", () => {
    const result = parseJson("[1,");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.message.length).toBeGreaterThan(0);
  });
});

describe("positionToLineColumn", () => {
  it("converts an offset to a 1-based line and column", () => {
    expect(positionToLineColumn('[\n  {"a"', 4)).toEqual({ line: 2, column: 3 });
    expect(positionToLineColumn("[1]", 0)).toEqual({ line: 1, column: 1 });
  });
});

describe("locateJsonError", () => {
  const text = '[\n  {"name": }\n]';

  it("uses an explicit line and column", () => {
    expect(
      locateJsonError(
        text,
        "Unexpected token '}', ... is not valid JSON (line 2 column 12)"
      )
    ).toEqual({ line: 2, column: 12 });
  });

  it("derives the location from a character position", () => {
    expect(
      locateJsonError(text, "Unexpected token } in JSON at position 13")
    ).toEqual({ line: 2, column: 12 });
  });

  it("points at the end of the text for truncated input", () => {
    expect(locateJsonError("[1,\n2", "Unexpected end of JSON input")).toEqual({
      line: 2,
      column: 2,
    });
  });

  it("returns nothing when the message has no location", () => {
    expect(
      locateJsonError(text, `Unexpected token 'x', "x" is not valid JSON`)
    ).toEqual({});
  });
});

describe("describeJsonType", () => {
  it("names JSON value types", () => {
    expect(describeJsonType(null)).toBe("null");
    expect(describeJsonType([])).toBe("array");
    expect(describeJsonType({})).toBe("object");
    expect(describeJsonType("x")).toBe("string");
    expect(describeJsonType(1)).toBe("number");
  });
});

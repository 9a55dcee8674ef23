import { describe, expect, it } from "vitest";
import {
  EMPTY_MAPPING,
  decodeComment,
  encodeComment,
  indexSymbols,
  isValidNamespace,
  isValidSymbol,
  symbolOwner,
} from "./comment.js";

const empty = EMPTY_MAPPING;

describe("decodeComment", () => {
  it.each([
    ["CA0:L", { symbol: "L", note: null }],
    ["CA0:L #Length parameter", { symbol: "L", note: "Length parameter" }],
    ["CA0:rho #Density", { symbol: "rho", note: "Density" }],
    ["CA0:η #Efficiency", { symbol: "η", note: "Efficiency" }],
    ["CA1:T_in #Inlet temperature", { symbol: "T_in", note: "Inlet temperature" }],
    ["CA12:d", { symbol: "d", note: null }],
    ["CA0:L  #  Spaces  ", { symbol: "L", note: "Spaces" }],
    [" CA0:L #Note ", { symbol: "L", note: "Note" }],
    ["CA0 : L", { symbol: "L", note: null }],
  ])("decodes %j", (raw, expected) => {
    expect(decodeComment(raw)).toEqual(expected);
  });

  it("splits only on the first #", () => {
    expect(decodeComment("CA0:L #`Length #1` #`Design #3`")).toEqual({
      symbol: "L",
      note: "`Length #1` #`Design #3`",
    });
    expect(decodeComment("CA0:L #a # b")).toEqual({ symbol: "L", note: "a # b" });
  });

  it("ignores colons inside the note", () => {
    expect(decodeComment("CA0:ratio #1:2 scale")).toEqual({
      symbol: "ratio",
      note: "1:2 scale",
    });
  });

  it("treats an empty note as absent", () => {
    expect(decodeComment("CA0:L #")).toEqual({ symbol: "L", note: null });
    expect(decodeComment("CA0:L #   ")).toEqual({ symbol: "L", note: null });
  });

  it.each(["", "   ", "\t\n"])("returns the empty record for blank input %j", (raw) => {
    expect(decodeComment(raw)).toEqual(empty);
  });

  it.each([
    "L #Note",
    "just a plain comment",
    "#CA0:L",
    "XY:L #Note",
    "CA:L #Note",
    "CAX:L #Note",
    "CA-1:L",
    "ca0:L",
    "CA0:ratio:1 #Note",
    "CA0:",
    "CA0: #Note",
  ])("rejects %j", (raw) => {
    expect(decodeComment(raw)).toEqual(empty);
  });

  it("drops the note when the mapping part is invalid", () => {
    expect(decodeComment("Length of beam #CA0:L")).toEqual(empty);
  });
});

describe("encodeComment", () => {
  it("writes namespace and symbol", () => {
    expect(encodeComment("L", null)).toBe("CA0:L");
    expect(encodeComment("L")).toBe("CA0:L");
  });

  it("appends a trimmed note", () => {
    expect(encodeComment("L", "Length parameter")).toBe("CA0:L #Length parameter");
    expect(encodeComment("L", "  padded  ")).toBe("CA0:L #padded");
    expect(encodeComment("L", "`Length #1` #`Design #3`")).toBe(
      "CA0:L #`Length #1` #`Design #3`",
    );
  });

  it("skips a blank note", () => {
    expect(encodeComment("L", "   ")).toBe("CA0:L");
  });

  it("uses the given namespace", () => {
    expect(encodeComment("T_in", "Inlet", "CA1")).toBe("CA1:T_in #Inlet");
  });

  it("returns an empty string without a symbol", () => {
    expect(encodeComment(null, "Note")).toBe("");
    expect(encodeComment(undefined, "Note")).toBe("");
    expect(encodeComment("", "Note")).toBe("");
  });
});

describe("round trip", () => {
  it.each([
    ["L", null],
    ["L", "Length parameter"],
    ["L", "`Length #1` #`Design #3`"],
    ["rho", "Density of water"],
    ["η", "Pump efficiency"],
    ["T_in", "Inlet temperature"],
  ])("preserves symbol %j with note %j", (symbol, note) => {
    expect(decodeComment(encodeComment(symbol, note))).toEqual({ symbol, note });
  });

  it("maps an empty note back to null", () => {
    expect(decodeComment(encodeComment("L", ""))).toEqual({ symbol: "L", note: null });
  });

  it("is stable when re-encoding a decoded comment", () => {
    for (const raw of [" CA3:x  #  first # second ", "CA0:L", "CA0:w #`a #b`"]) {
      const once = decodeComment(raw);
      expect(decodeComment(encodeComment(once.symbol, once.note))).toEqual(once);
    }
  });
});

describe("validators", () => {
  it("accepts CA followed by digits only", () => {
    expect(isValidNamespace("CA0")).toBe(true);
    expect(isValidNamespace("CA12")).toBe(true);
    expect(isValidNamespace("CA")).toBe(false);
    expect(isValidNamespace("CA1a")).toBe(false);
    expect(isValidNamespace("XY0")).toBe(false);
  });

  it("accepts non-empty colon-free symbols", () => {
    expect(isValidSymbol("L")).toBe(true);
    expect(isValidSymbol(" L ")).toBe(true);
    expect(isValidSymbol("   ")).toBe(false);
    expect(isValidSymbol("a:b")).toBe(false);
  });
});

describe("indexSymbols", () => {
  it("maps symbols to parameters and reports duplicates", () => {
    const index = indexSymbols([
      { name: "d0", mapping: "L" },
      { name: "d1", mapping: null },
      { name: "Width", mapping: "W" },
      { name: "d2", mapping: "L" },
    ]);
    expect(index.symbols).toEqual({ L: "d0", W: "Width" });
    expect(index.conflicts).toEqual([{ symbol: "L", parameters: ["d0", "d2"] }]);
  });

  it("keeps symbols named like Object.prototype members", () => {
    const index = indexSymbols([
      { name: "d0", mapping: decodeComment("CA0:__proto__").symbol },
      { name: "d1", mapping: "constructor" },
    ]);
    expect(Object.entries(index.symbols)).toEqual([
      ["__proto__", "d0"],
      ["constructor", "d1"],
    ]);
    expect(JSON.stringify(index.symbols)).toBe('{"__proto__":"d0","constructor":"d1"}');
  });
});

describe("symbolOwner", () => {
  const index = indexSymbols([
    { name: "d0", mapping: "L" },
    { name: "d1", mapping: "__proto__" },
  ]);

  it("returns the bound parameter", () => {
    expect(symbolOwner(index, "L")).toBe("d0");
    expect(symbolOwner(index, "__proto__")).toBe("d1");
  });

  it.each(["constructor", "toString", "hasOwnProperty", "W"])(
    "returns undefined for unbound %s",
    (symbol) => {
      expect(symbolOwner(index, symbol)).toBeUndefined();
    },
  );
});

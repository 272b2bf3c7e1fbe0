import { describe, it, expect } from "vitest";
import { internPropertyKey, internedKeyCount, isInternedPropertyKey } from "../convert/StringInterner";
import { readSymbolLibrary } from "../format/symbol";

describe("StringInterner", () => {
  it("returns the shared key for listed property names", () => {
    const built = ["Foot", "print"].join("");
    expect(isInternedPropertyKey(built)).toBe(true);
    expect(internPropertyKey(built)).toBe("Footprint");
    expect(internPropertyKey(internPropertyKey(built))).toBe(internPropertyKey(built));
  });

  it("passes unlisted keys through unchanged", () => {
    expect(isInternedPropertyKey("MPN")).toBe(false);
    expect(internPropertyKey("MPN")).toBe("MPN");
    expect(internPropertyKey("")).toBe("");
  });

  it("holds the fixed allow-list", () => {
    expect(internedKeyCount()).toBe(15);
    for (const key of ["Value", "Reference", "ki_fp_filters", "extends"]) {
      expect(isInternedPropertyKey(key)).toBe(true);
    }
  });

  it("has no effect on parsed property keys", () => {
    const text =
      '(kicad_symbol_lib (version 1) (generator x) (symbol "R" (in_bom yes) (on_board yes) ' +
      '(property "Value" "10k" (at 0 0 0)) (property "MPN" "RC0603" (at 0 0 0))))';
    const [sym] = readSymbolLibrary(text, "owned").symbols;
    if (sym.type !== "root") throw new Error("expected a root symbol");
    expect(sym.properties.map((p) => p.key)).toEqual(["Value", "MPN"]);
  });
});

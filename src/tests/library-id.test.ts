import { describe, it, expect } from "vitest";
import { KiCadParseError } from "../convert/errors";
import { formatLibraryId, parseLibraryId } from "../format/common/LibraryId";
import { formatUnitId, parseUnitId } from "../format/symbol/SymbolUnit";

function catchParseError(fn: () => unknown): KiCadParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof KiCadParseError) return err;
    throw err;
  }
  throw new Error("expected a KiCadParseError");
}

describe("LibraryId", () => {
  it("splits library and item name at the first colon", () => {
    expect(parseLibraryId("Device:R")).toEqual({ library: "Device", name: "R" });
    expect(parseLibraryId("Lib:a:b")).toEqual({ library: "Lib", name: "a:b" });
  });

  it("allows a bare item name", () => {
    expect(parseLibraryId("R_Small")).toEqual({ name: "R_Small" });
  });

  it("formats back to the original text", () => {
    for (const text of ["Device:R", "Lib:a:b", "R_Small", "power:+3V3"]) {
      expect(formatLibraryId(parseLibraryId(text))).toBe(text);
    }
  });

  it.each([
    ["", "identifier is empty"],
    [":R", "library nickname is empty"],
    ["Device:", "item name is empty"],
  ])("rejects %j (%s)", (input, reason) => {
    const err = catchParseError(() => parseLibraryId(input));
    expect(err.detail).toEqual({ type: "LibraryIdentifierMalformed", input, reason });
    expect(err.message).toBe(`Malformed library identifier "${input}": ${reason}`);
  });
});

describe("unit identifiers", () => {
  it("parses NAME_UNIT_STYLE", () => {
    expect(parseUnitId("R_0_1")).toEqual({ name: "R", unit: 0, style: 1 });
    expect(parseUnitId("Q_NMOS_GDS_1_2")).toEqual({ name: "Q_NMOS_GDS", unit: 1, style: 2 });
  });

  it("formats back to the original text", () => {
    expect(formatUnitId({ name: "+3V3", unit: 1, style: 1 })).toBe("+3V3_1_1");
  });

  it.each(["R_1", "R_x_1", "R_01_1", "_1_1"])("rejects %j", (input) => {
    const err = catchParseError(() => parseUnitId(input));
    expect(err.detail).toEqual({ type: "UnitIdentifierMalformed", input });
    expect(err.message).toBe(`Malformed unit identifier "${input}"`);
  });
});

import { describe, it, expect } from "vitest";
import { KiCadParseError } from "../convert/errors";
import { Parser } from "../convert/Parser";
import { ParserRef } from "../convert/ParserRef";
import type { SexprCursor } from "../convert/traits";
import { PositionFormat } from "../format/common/Position";
import { SExpressionParser } from "../sexpr/SExpressionParser";
import { SexprArena } from "../sexpr/SexprArena";
import { number, string } from "../sexpr/Sexpr";

function catchParseError(fn: () => unknown): KiCadParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof KiCadParseError) return err;
    throw err;
  }
  throw new Error("expected a KiCadParseError");
}

/** The same behaviour is required of the owning and the borrowing cursor. */
function describeCursorContract<P extends SexprCursor<P>>(name: string, open: (text: string) => P): void {
  describe(`${name} cursor`, () => {
    it("reads atoms in order and accepts the end", () => {
      const parser = open("(version 20211014)");
      parser.expectSymbolMatching("version");
      expect(parser.expectNumber()).toBe(20211014);
      expect(parser.isEmpty()).toBe(true);
      parser.expectEnd();
    });

    it("fails with UnexpectedTokenKind on the wrong atom kind", () => {
      const err = catchParseError(() => open('("x")').expectSymbol());
      expect(err.detail).toEqual({ type: "UnexpectedTokenKind", expected: "symbol" });
      expect(err.message).toBe("Expected a symbol");
    });

    it("fails with UnexpectedEndOfList when nothing is left", () => {
      const parser = open("(a)");
      parser.expectSymbol();
      expect(catchParseError(() => parser.expectString()).type).toBe("UnexpectedEndOfList");
    });

    it("fails with NonMatchingSymbol on the wrong keyword", () => {
      const err = catchParseError(() => open("(foo)").expectSymbolMatching("bar"));
      expect(err.detail).toEqual({ type: "NonMatchingSymbol", found: "foo", expected: "bar" });
      expect(err.message).toBe('Expected symbol "bar" but found "foo"');
    });

    it("accepts the yes/no/true/false bool vocabulary", () => {
      const parser = open("(x (a yes) (b no) (c true) (d false) (e maybe))");
      parser.expectSymbol();
      expect(parser.expectBoolWithName("a")).toBe(true);
      expect(parser.expectBoolWithName("b")).toBe(false);
      expect(parser.maybeBoolWithName("c")).toBe(true);
      expect(parser.expectBoolWithName("d")).toBe(false);
      const err = catchParseError(() => parser.expectBoolWithName("e"));
      expect(err.detail).toEqual({ type: "InvalidEnumValue", value: "maybe", enumName: "bool" });
    });

    it("reports which bool spelling was read", () => {
      const parser = open("(x (a yes) (b false) (c no))");
      parser.expectSymbol();
      expect(parser.expectSpelledBoolWithName("a")).toEqual({ value: true, spelling: "yes_no" });
      expect(parser.maybeSpelledBoolWithName("a")).toBeUndefined();
      expect(parser.maybeSpelledBoolWithName("b")).toEqual({ value: false, spelling: "true_false" });
      expect(parser.expectBoolWithName("c")).toBe(false);
    });

    it("leaves the cursor untouched when an optional field is absent", () => {
      const parser = open('(x (a yes) (name "R"))');
      parser.expectSymbol();
      expect(parser.maybeBoolWithName("b")).toBeUndefined();
      expect(parser.maybeStringWithName("name")).toBeUndefined();
      expect(parser.maybeNumberWithName("offset")).toBeUndefined();
      expect(parser.expectBoolWithName("a")).toBe(true);
      expect(parser.maybeStringWithName("name")).toBe("R");
    });

    it("reports leftovers through expectEnd", () => {
      const parser = open("(x 1)");
      parser.expectSymbol();
      const err = catchParseError(() => parser.expectEnd());
      expect(err.detail).toEqual({ type: "ExpectedEndOfList", found: number(1) });
      expect(err.message).toBe("Expected end of list but found 1");
    });

    it("requires named values to be the only child", () => {
      const parser = open('(x (name "a" "b"))');
      parser.expectSymbol();
      const err = catchParseError(() => parser.expectStringWithName("name"));
      expect(err.detail).toEqual({ type: "ExpectedEndOfList", found: string("b") });
      expect(err.message).toBe('Expected end of list but found "b"');
    });

    it("matches bare keywords only when they are next", () => {
      const parser = open("(hide (at 1 2))");
      expect(parser.maybeSymbolMatching("shown")).toBe(false);
      expect(parser.maybeSymbolMatching("hide")).toBe(true);
      expect(parser.maybeSymbolMatching("hide")).toBe(false);
      expect(parser.peekListHead()).toBe("at");
    });

    it("reads optional numbers and empty marker lists", () => {
      const parser = open("(x 3 (show_name) (y 1))");
      parser.expectSymbol();
      expect(parser.maybeNumber()).toBe(3);
      expect(parser.maybeNumber()).toBeUndefined();
      expect(parser.maybeEmptyListWithName("do_not_autoplace")).toBe(false);
      expect(parser.maybeEmptyListWithName("show_name")).toBe(true);
      expect(parser.peekKind()).toBe("list");
      expect(parser.expectNumberWithName("y")).toBe(1);
      expect(parser.peekKind()).toBeUndefined();
    });

    it("gives clones an independent position", () => {
      const parser = open("(a b c)");
      const snapshot = parser.clone();
      parser.expectSymbol();
      parser.expectSymbol();
      expect(snapshot.expectSymbol()).toBe("a");
      expect(parser.expectSymbol()).toBe("c");
      expect(snapshot.expectSymbol()).toBe("b");
    });

    it("collects repeated entities until the presence test fails", () => {
      const parser = open("(x (at 1 2) (at 3 4 90) (other))");
      parser.expectSymbol();
      expect(parser.expectMany(PositionFormat)).toEqual([
        { x: 1, y: 2 },
        { x: 3, y: 4, angle: 90 },
      ]);
      expect(parser.maybe(PositionFormat)).toBeUndefined();
      expect(parser.peekListHead()).toBe("other");
    });

    it("surfaces a malformed entity instead of ending the sequence", () => {
      const parser = open("(x (at 1) (at 2 3))");
      parser.expectSymbol();
      expect(catchParseError(() => parser.expectMany(PositionFormat)).type).toBe("UnexpectedEndOfList");
    });

    it("does not treat an atom as an entity", () => {
      const parser = open("(x 5)");
      parser.expectSymbol();
      expect(parser.maybe(PositionFormat)).toBeUndefined();
      expect(parser.expectNumber()).toBe(5);
    });

    it("copies raw subtrees out", () => {
      const parser = open("(x (polyline (pts (xy 0 0))) y)");
      parser.expectSymbol();
      expect(parser.expectRaw()).toEqual(SExpressionParser.parse("(polyline (pts (xy 0 0)))"));
      expect(parser.expectRaw()).toEqual(SExpressionParser.parse("y"));
    });
  });
}

describeCursorContract("owning", (text) => Parser.fromSexpr(SExpressionParser.parse(text)));
describeCursorContract("borrowing", (text) => ParserRef.fromArena(SexprArena.fromText(text)));

describe("cursor construction", () => {
  it("requires a list", () => {
    expect(catchParseError(() => Parser.fromSexpr(SExpressionParser.parse("atom"))).detail).toEqual({
      type: "UnexpectedTokenKind",
      expected: "list",
    });
    expect(catchParseError(() => ParserRef.fromArena(SexprArena.fromText("42"))).detail).toEqual({
      type: "UnexpectedTokenKind",
      expected: "list",
    });
  });

  it("peeks at later siblings without consuming", () => {
    const owned = Parser.fromSexpr(SExpressionParser.parse('(symbol "R" (extends "Base"))'));
    expect(owned.peekAt(1)).toEqual(string("R"));
    expect(owned.peekAt(3)).toBeUndefined();
    expect(owned.position).toBe(0);

    const borrowed = ParserRef.fromArena(SexprArena.fromText('(symbol "R" (extends "Base"))'));
    expect(borrowed.peekAt(1)?.asString()).toBe("R");
    expect(borrowed.peekAt(2)?.firstSymbol()).toBe("extends");
    expect(borrowed.peekAt(3)).toBeUndefined();
    expect(borrowed.expectSymbol()).toBe("symbol");
  });
});

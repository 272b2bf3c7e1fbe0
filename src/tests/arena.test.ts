import { describe, it, expect } from "vitest";
import { SExpressionParser } from "../sexpr/SExpressionParser";
import { SexprArena, SexprRef } from "../sexpr/SexprArena";
import { sexprEquals } from "../sexpr/Sexpr";

describe("SexprArena", () => {
  const text = '(a (b 1) "s")';

  it("lays nodes out in preorder with subtree ends", () => {
    const arena = SexprArena.fromText(text);
    expect(arena.size).toBe(6);
    expect(arena.kindAt(0)).toBe("list");
    expect(arena.kindAt(2)).toBe("list");
    expect(arena.endOf(0)).toBe(6);
    expect(arena.endOf(2)).toBe(5);
    expect(arena.textAt(3)).toBe("b");
    expect(arena.numberAt(4)).toBe(1);
  });

  it("materializes the same tree the reader builds", () => {
    const arena = SexprArena.fromText(text);
    expect(sexprEquals(arena.root.toSexpr(), SExpressionParser.parse(text))).toBe(true);
  });

  it("can be built from an existing tree", () => {
    const tree = SExpressionParser.parse(text);
    const arena = SexprArena.fromSexpr(tree);
    expect(arena.size).toBe(6);
    expect(sexprEquals(arena.materialize(0), tree)).toBe(true);
  });

  it("rejects malformed text", () => {
    expect(() => SexprArena.fromText("")).toThrow("Empty input at offset 0");
    expect(() => SexprArena.fromText("(a) (b)")).toThrow("Unexpected content after top-level form at offset 4");
    expect(() => SexprArena.fromText("(a")).toThrow("Unclosed '(' at offset 0");
    expect(() => SexprArena.fromText(")")).toThrow("Unbalanced ')' at offset 0");
  });
});

describe("SexprRef", () => {
  const arena = SexprArena.fromText('(a (b 1) "s")');

  it("reads atoms by kind", () => {
    const head = new SexprRef(arena, 1);
    expect(head.kind).toBe("symbol");
    expect(head.asSymbol()).toBe("a");
    expect(head.asString()).toBeUndefined();

    const str = new SexprRef(arena, 5);
    expect(str.asString()).toBe("s");
    expect(new SexprRef(arena, 4).asNumber()).toBe(1);
  });

  it("counts children and finds the head keyword of a list", () => {
    expect(arena.root.length).toBe(3);
    expect(arena.root.firstSymbol()).toBe("a");
    expect(new SexprRef(arena, 2).firstSymbol()).toBe("b");
    expect(new SexprRef(arena, 1).firstSymbol()).toBeUndefined();
    expect(new SexprRef(arena, 1).length).toBe(0);
  });

  it("copies a subtree out", () => {
    expect(new SexprRef(arena, 2).toSexpr()).toEqual(SExpressionParser.parse("(b 1)"));
  });
});

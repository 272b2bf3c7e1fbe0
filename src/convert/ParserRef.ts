import type { Sexpr, SexprKind } from "../sexpr/Sexpr";
import { type SexprArena, SexprRef } from "../sexpr/SexprArena";
import { KiCadParseError } from "./errors";
import { type FromSexpr, type FromSexprRef, type MaybeFromSexpr, type SexprCursor, type SpelledBool, parseSpelledBool } from "./traits";

/**
 * Zero-copy counterpart of {@link Parser}.
 *
 * A `ParserRef` is an index range over the children of one list inside a
 * {@link SexprArena}. Atoms are read straight out of the arena and child
 * cursors are just narrower ranges, so walking a document allocates nothing
 * but the cursors themselves.
 */
export class ParserRef implements SexprCursor<ParserRef> {
  private pos: number;

  private constructor(
    private readonly arena: SexprArena,
    start: number,
    private readonly end: number,
  ) {
    this.pos = start;
  }

  /** Cursor over the children of the list at `ref`. */
  static fromRef(ref: SexprRef): ParserRef {
    if (!ref.isList) {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "list" });
    }
    return new ParserRef(ref.arena, ref.index + 1, ref.arena.endOf(ref.index));
  }

  /** Cursor over the children of the arena's root list. */
  static fromArena(arena: SexprArena): ParserRef {
    return this.fromRef(arena.root);
  }

  clone(): ParserRef {
    return new ParserRef(this.arena, this.pos, this.end);
  }

  isEmpty(): boolean {
    return this.pos >= this.end;
  }

  // ── Raw access ─────────────────────────────────────────────────────

  peek(): SexprRef | undefined {
    return this.isEmpty() ? undefined : new SexprRef(this.arena, this.pos);
  }

  /** Look `offset` siblings ahead without consuming anything. */
  peekAt(offset: number): SexprRef | undefined {
    let index = this.pos;
    for (let i = 0; i < offset && index < this.end; i++) {
      index = this.arena.endOf(index);
    }
    return index < this.end ? new SexprRef(this.arena, index) : undefined;
  }

  next(): SexprRef {
    const index = this.advance();
    return new SexprRef(this.arena, index);
  }

  peekKind(): SexprKind | undefined {
    return this.isEmpty() ? undefined : this.arena.kindAt(this.pos);
  }

  peekListHead(): string | undefined {
    if (this.peekKind() !== "list") return undefined;
    const head = this.pos + 1;
    if (head >= this.arena.endOf(this.pos) || this.arena.kindAt(head) !== "symbol") {
      return undefined;
    }
    return this.arena.textAt(head);
  }

  expectRaw(): Sexpr {
    return this.arena.materialize(this.advance());
  }

  private advance(): number {
    if (this.isEmpty()) {
      throw new KiCadParseError({ type: "UnexpectedEndOfList" });
    }
    const index = this.pos;
    this.pos = this.arena.endOf(index);
    return index;
  }

  private advanceKind(expected: SexprKind): number {
    const index = this.advance();
    if (this.arena.kindAt(index) !== expected) {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected });
    }
    return index;
  }

  // ── Lists ──────────────────────────────────────────────────────────

  expectList(): ParserRef {
    const index = this.advanceKind("list");
    return new ParserRef(this.arena, index + 1, this.arena.endOf(index));
  }

  expectListWithName(name: string): ParserRef {
    const list = this.expectList();
    list.expectSymbolMatching(name);
    return list;
  }

  maybeListWithName(name: string): ParserRef | undefined {
    if (this.peekListHead() !== name) return undefined;
    return this.expectListWithName(name);
  }

  maybeEmptyListWithName(name: string): boolean {
    const list = this.maybeListWithName(name);
    if (!list) return false;
    list.expectEnd();
    return true;
  }

  // ── Atoms ──────────────────────────────────────────────────────────

  expectSymbol(): string {
    return this.arena.textAt(this.advanceKind("symbol"));
  }

  expectSymbolMatching(expected: string): void {
    const found = this.expectSymbol();
    if (found !== expected) {
      throw new KiCadParseError({ type: "NonMatchingSymbol", found, expected });
    }
  }

  maybeSymbolMatching(expected: string): boolean {
    if (this.peekKind() === "symbol" && this.arena.textAt(this.pos) === expected) {
      this.advance();
      return true;
    }
    return false;
  }

  expectString(): string {
    return this.arena.textAt(this.advanceKind("string"));
  }

  expectNumber(): number {
    return this.arena.numberAt(this.advanceKind("number"));
  }

  maybeNumber(): number | undefined {
    return this.peekKind() === "number" ? this.expectNumber() : undefined;
  }

  // ── Named values: (name value) ─────────────────────────────────────

  expectSymbolWithName(name: string): string {
    const list = this.expectListWithName(name);
    const value = list.expectSymbol();
    list.expectEnd();
    return value;
  }

  expectStringWithName(name: string): string {
    const list = this.expectListWithName(name);
    const value = list.expectString();
    list.expectEnd();
    return value;
  }

  maybeStringWithName(name: string): string | undefined {
    return this.peekListHead() === name ? this.expectStringWithName(name) : undefined;
  }

  expectNumberWithName(name: string): number {
    const list = this.expectListWithName(name);
    const value = list.expectNumber();
    list.expectEnd();
    return value;
  }

  maybeNumberWithName(name: string): number | undefined {
    return this.peekListHead() === name ? this.expectNumberWithName(name) : undefined;
  }

  expectBoolWithName(name: string): boolean {
    return this.expectSpelledBoolWithName(name).value;
  }

  maybeBoolWithName(name: string): boolean | undefined {
    return this.maybeSpelledBoolWithName(name)?.value;
  }

  expectSpelledBoolWithName(name: string): SpelledBool {
    const list = this.expectListWithName(name);
    const value = parseSpelledBool(list.expectSymbol());
    list.expectEnd();
    return value;
  }

  maybeSpelledBoolWithName(name: string): SpelledBool | undefined {
    return this.peekListHead() === name ? this.expectSpelledBoolWithName(name) : undefined;
  }

  expectEnd(): void {
    if (!this.isEmpty()) {
      throw new KiCadParseError({ type: "ExpectedEndOfList", found: this.arena.materialize(this.pos) });
    }
  }

  // ── Entities ───────────────────────────────────────────────────────

  expect<T>(entity: FromSexpr<T> & FromSexprRef<T>): T {
    return entity.fromSexprRef(this.expectList());
  }

  maybe<T>(entity: FromSexpr<T> & FromSexprRef<T> & MaybeFromSexpr): T | undefined {
    if (this.peekKind() !== "list" || !entity.isPresentRef(new SexprRef(this.arena, this.pos))) {
      return undefined;
    }
    return this.expect(entity);
  }

  expectMany<T>(entity: FromSexpr<T> & FromSexprRef<T> & MaybeFromSexpr): T[] {
    const result: T[] = [];
    for (let item = this.maybe(entity); item !== undefined; item = this.maybe(entity)) {
      result.push(item);
    }
    return result;
  }
}

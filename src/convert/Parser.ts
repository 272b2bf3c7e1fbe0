import { type Sexpr, type SexprKind, firstSymbol } from "../sexpr/Sexpr";
import { KiCadParseError } from "./errors";
import { type FromSexpr, type FromSexprRef, type MaybeFromSexpr, type SexprCursor, type SpelledBool, parseSpelledBool } from "./traits";

/**
 * Sequential, consuming cursor over the children of one list.
 *
 * The cursor holds the sibling nodes themselves and hands out owned token
 * trees. Its position only moves forward; to look ahead speculatively, take a
 * {@link Parser.clone} and advance that instead.
 *
 * @example
 * ```ts
 * const parser = Parser.fromSexpr(SExpressionParser.parse("(version 20211014)"));
 * parser.expectSymbolMatching("version");
 * parser.expectNumber(); // 20211014
 * parser.expectEnd();
 * ```
 */
export class Parser implements SexprCursor<Parser> {
  private pos: number;

  constructor(
    private readonly items: readonly Sexpr[],
    start: number = 0,
  ) {
    this.pos = start;
  }

  /** Cursor over the children of a list node. */
  static fromSexpr(expr: Sexpr): Parser {
    if (expr.kind !== "list") {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "list" });
    }
    return new Parser(expr.items);
  }

  get position(): number {
    return this.pos;
  }

  clone(): Parser {
    return new Parser(this.items, this.pos);
  }

  isEmpty(): boolean {
    return this.pos >= this.items.length;
  }

  // ── Raw access ─────────────────────────────────────────────────────

  peek(): Sexpr | undefined {
    return this.items[this.pos];
  }

  /** Look `offset` siblings ahead without consuming anything. */
  peekAt(offset: number): Sexpr | undefined {
    return this.items[this.pos + offset];
  }

  next(): Sexpr {
    const next = this.items[this.pos];
    if (next === undefined) {
      throw new KiCadParseError({ type: "UnexpectedEndOfList" });
    }
    this.pos++;
    return next;
  }

  peekKind(): SexprKind | undefined {
    return this.peek()?.kind;
  }

  peekListHead(): string | undefined {
    const next = this.peek();
    return next?.kind === "list" ? firstSymbol(next.items) : undefined;
  }

  expectRaw(): Sexpr {
    return this.next();
  }

  // ── Lists ──────────────────────────────────────────────────────────

  expectList(): Parser {
    const next = this.next();
    if (next.kind !== "list") {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "list" });
    }
    return new Parser(next.items);
  }

  expectListWithName(name: string): Parser {
    const list = this.expectList();
    list.expectSymbolMatching(name);
    return list;
  }

  maybeListWithName(name: string): Parser | undefined {
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
    const next = this.next();
    if (next.kind !== "symbol") {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "symbol" });
    }
    return next.value;
  }

  expectSymbolMatching(expected: string): void {
    const found = this.expectSymbol();
    if (found !== expected) {
      throw new KiCadParseError({ type: "NonMatchingSymbol", found, expected });
    }
  }

  maybeSymbolMatching(expected: string): boolean {
    const next = this.peek();
    if (next?.kind === "symbol" && next.value === expected) {
      this.pos++;
      return true;
    }
    return false;
  }

  expectString(): string {
    const next = this.next();
    if (next.kind !== "string") {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "string" });
    }
    return next.value;
  }

  expectNumber(): number {
    const next = this.next();
    if (next.kind !== "number") {
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "number" });
    }
    return next.value;
  }

  maybeNumber(): number | undefined {
    const next = this.peek();
    if (next?.kind !== "number") return undefined;
    this.pos++;
    return next.value;
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
    const found = this.peek();
    if (found !== undefined) {
      throw new KiCadParseError({ type: "ExpectedEndOfList", found });
    }
  }

  // ── Entities ───────────────────────────────────────────────────────

  expect<T>(entity: FromSexpr<T> & FromSexprRef<T>): T {
    return entity.fromSexpr(this.expectList());
  }

  maybe<T>(entity: FromSexpr<T> & FromSexprRef<T> & MaybeFromSexpr): T | undefined {
    const next = this.peek();
    if (next?.kind !== "list" || !entity.isPresent(next.items)) {
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

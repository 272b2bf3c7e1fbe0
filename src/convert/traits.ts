import { type BoolSpelling, type Sexpr, type SexprKind, firstSymbol } from "../sexpr/Sexpr";
import type { SexprRef } from "../sexpr/SexprArena";
import { KiCadParseError } from "./errors";
import type { Parser } from "./Parser";
import type { ParserRef } from "./ParserRef";

/** Parse from an owning cursor positioned just inside the entity's list. */
export interface FromSexpr<T> {
  fromSexpr(parser: Parser): T;
}

/** Parse from a borrowing cursor positioned just inside the entity's list. */
export interface FromSexprRef<T> {
  fromSexprRef(parser: ParserRef): T;
}

/**
 * Presence test: decides whether a list belongs to the entity without parsing it.
 * Must agree with a successful full parse on well-formed input.
 */
export interface MaybeFromSexpr {
  isPresent(list: readonly Sexpr[]): boolean;
  isPresentRef(list: SexprRef): boolean;
}

export interface ToSexpr<T> {
  toSexpr(value: T): Sexpr;
}

/** Everything a grammar entity provides: both parse paths, the presence test and the writer. */
export interface SexprEntity<T> extends FromSexpr<T>, FromSexprRef<T>, MaybeFromSexpr, ToSexpr<T> {}

/**
 * The cursor contract shared by {@link Parser} and {@link ParserRef}.
 * Grammar that is the same on both paths is written once against this.
 */
export interface SexprCursor<Self extends SexprCursor<Self>> {
  peekKind(): SexprKind | undefined;
  peekListHead(): string | undefined;
  isEmpty(): boolean;
  clone(): Self;

  expectList(): Self;
  expectListWithName(name: string): Self;
  maybeListWithName(name: string): Self | undefined;
  maybeEmptyListWithName(name: string): boolean;

  expectSymbol(): string;
  expectSymbolMatching(expected: string): void;
  maybeSymbolMatching(expected: string): boolean;
  expectString(): string;
  expectNumber(): number;
  maybeNumber(): number | undefined;

  expectSymbolWithName(name: string): string;
  expectStringWithName(name: string): string;
  maybeStringWithName(name: string): string | undefined;
  expectNumberWithName(name: string): number;
  maybeNumberWithName(name: string): number | undefined;
  expectBoolWithName(name: string): boolean;
  maybeBoolWithName(name: string): boolean | undefined;
  expectSpelledBoolWithName(name: string): SpelledBool;
  maybeSpelledBoolWithName(name: string): SpelledBool | undefined;

  /** Next element as an owned tree, for opaque pass-through. */
  expectRaw(): Sexpr;

  expectEnd(): void;

  expect<T>(entity: FromSexpr<T> & FromSexprRef<T>): T;
  maybe<T>(entity: FromSexpr<T> & FromSexprRef<T> & MaybeFromSexpr): T | undefined;
  expectMany<T>(entity: FromSexpr<T> & FromSexprRef<T> & MaybeFromSexpr): T[];
}

/** The usual presence test: the list's head symbol is `keyword`. */
export function keywordPresence(keyword: string): MaybeFromSexpr {
  return {
    isPresent: (items) => firstSymbol(items) === keyword,
    isPresentRef: (ref) => ref.firstSymbol() === keyword,
  };
}

/** Presence test accepting any of several head symbols. */
export function keywordsPresence(keywords: readonly string[]): MaybeFromSexpr {
  const accepted = new Set(keywords);
  return {
    isPresent: (items) => {
      const head = firstSymbol(items);
      return head !== undefined && accepted.has(head);
    },
    isPresentRef: (ref) => {
      const head = ref.firstSymbol();
      return head !== undefined && accepted.has(head);
    },
  };
}

export interface SpelledBool {
  value: boolean;
  spelling: BoolSpelling;
}

const BOOL_VALUES: ReadonlyMap<string, SpelledBool> = new Map<string, SpelledBool>([
  ["yes", { value: true, spelling: "yes_no" }],
  ["no", { value: false, spelling: "yes_no" }],
  ["true", { value: true, spelling: "true_false" }],
  ["false", { value: false, spelling: "true_false" }],
]);

/** Accepts `yes`/`no` and the older `true`/`false`, reporting which pair was used. */
export function parseSpelledBool(value: string): SpelledBool {
  const result = BOOL_VALUES.get(value);
  if (result === undefined) {
    throw new KiCadParseError({ type: "InvalidEnumValue", value, enumName: "bool" });
  }
  return { value: result.value, spelling: result.spelling };
}

/**
 * The spelling as stored on a model: `undefined` for the usual `yes`/`no`, so
 * only files that use `true`/`false` carry the field.
 */
export function recordedSpelling(spelled: SpelledBool | undefined): BoolSpelling | undefined {
  return spelled?.spelling === "true_false" ? spelled.spelling : undefined;
}

/** Narrow a symbol to one of a closed set of values. */
export function parseEnum<T extends string>(value: string, allowed: readonly T[], enumName: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new KiCadParseError({ type: "InvalidEnumValue", value, enumName });
  }
  return match;
}

export type SexprKind = "symbol" | "string" | "number" | "list";

export type SexprSymbol = { readonly kind: "symbol"; readonly value: string };
export type SexprString = { readonly kind: "string"; readonly value: string };
export type SexprNumber = { readonly kind: "number"; readonly value: number };
export type SexprList = { readonly kind: "list"; readonly items: readonly Sexpr[] };

/**
 * A node of the generic token tree produced by the reader.
 * Atoms are bare symbols, quoted strings and numbers; lists hold ordered children.
 */
export type Sexpr = SexprSymbol | SexprString | SexprNumber | SexprList;

// ─── Constructors ────────────────────────────────────────────────────

export function symbol(value: string): SexprSymbol {
  return { kind: "symbol", value };
}

export function string(value: string): SexprString {
  return { kind: "string", value };
}

export function number(value: number): SexprNumber {
  return { kind: "number", value };
}

/**
 * Build a list, skipping `undefined` entries so optional fields can be
 * written inline.
 */
export function list(items: ReadonlyArray<Sexpr | undefined>): SexprList {
  return { kind: "list", items: items.filter((item): item is Sexpr => item !== undefined) };
}

/** `(name ...items)` */
export function listWithName(name: string, items: ReadonlyArray<Sexpr | undefined> = []): SexprList {
  return list([symbol(name), ...items]);
}

export function symbolWithName(name: string, value: string): SexprList {
  return listWithName(name, [symbol(value)]);
}

export function stringWithName(name: string, value: string): SexprList {
  return listWithName(name, [string(value)]);
}

export function numberWithName(name: string, value: number): SexprList {
  return listWithName(name, [number(value)]);
}

/**
 * How a bool was written: KiCad writes `yes`/`no`, some older files `true`/`false`.
 */
export type BoolSpelling = "yes_no" | "true_false";

export function boolSymbol(value: boolean, spelling: BoolSpelling = "yes_no"): SexprSymbol {
  if (spelling === "true_false") {
    return symbol(value ? "true" : "false");
  }
  return symbol(value ? "yes" : "no");
}

export function boolWithName(name: string, value: boolean, spelling: BoolSpelling = "yes_no"): SexprList {
  return listWithName(name, [boolSymbol(value, spelling)]);
}

// ─── Queries ─────────────────────────────────────────────────────────

export function kindOf(expr: Sexpr): SexprKind {
  return expr.kind;
}

/** Head keyword of a list, if its first child is a bare symbol. */
export function firstSymbol(items: readonly Sexpr[]): string | undefined {
  const head = items[0];
  return head !== undefined && head.kind === "symbol" ? head.value : undefined;
}

export function sexprEquals(a: Sexpr, b: Sexpr): boolean {
  switch (a.kind) {
    case "symbol":
    case "string":
      return b.kind === a.kind && b.value === a.value;
    case "number":
      return b.kind === "number" && b.value === a.value;
    case "list":
      if (b.kind !== "list" || b.items.length !== a.items.length) return false;
      return a.items.every((item, i) => sexprEquals(item, b.items[i]));
  }
}

/** Short human-readable rendering for error messages. */
export function describeSexpr(expr: Sexpr): string {
  switch (expr.kind) {
    case "symbol":
      return expr.value;
    case "string":
      return JSON.stringify(expr.value);
    case "number":
      return String(expr.value);
    case "list": {
      const head = firstSymbol(expr.items);
      return head !== undefined ? `(${head} …)` : `(list of ${expr.items.length})`;
    }
  }
}

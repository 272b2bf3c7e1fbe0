import { KiCadParseError } from "../../convert/errors";
import type { Parser } from "../../convert/Parser";
import type { ParserRef } from "../../convert/ParserRef";
import { type SexprCursor, type SexprEntity, keywordPresence, parseEnum, recordedSpelling } from "../../convert/traits";
import { type Sexpr, boolWithName, listWithName, stringWithName, symbol } from "../../sexpr/Sexpr";
import { type LibraryId, libraryIdToSexpr, parseLibraryId } from "../common/LibraryId";
import { PinNamesFormat, PinNumbersFormat } from "./PinNames";
import { SymbolBodyItemFormat } from "./Pin";
import { SymbolPropertyFormat } from "./SymbolProperty";
import { SymbolUnitFormat } from "./SymbolUnit";
import type { DerivedSymbol, PowerScope, RootSymbol, SymbolDefinition } from "./types";

const POWER_SCOPES: readonly PowerScope[] = ["global", "local"];

/**
 * Runs `parse` and re-raises any {@link KiCadParseError} under the symbol's
 * name so the error chain says which definition failed.
 */
function withSymbolContext<T>(id: string | undefined, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof KiCadParseError) {
      throw err.withContext(id !== undefined ? `symbol "${id}"` : "symbol");
    }
    throw err;
  }
}

function expectSymbolHeader<P extends SexprCursor<P>>(parser: P): LibraryId {
  parser.expectSymbolMatching("symbol");
  return parseLibraryId(parser.expectString());
}

// ─── Root ────────────────────────────────────────────────────────────

function parseRootSymbol<P extends SexprCursor<P>>(parser: P): RootSymbol {
  const id = expectSymbolHeader(parser);

  let power = false;
  let powerScope: PowerScope | undefined;
  const powerList = parser.maybeListWithName("power");
  if (powerList) {
    power = true;
    if (powerList.peekKind() === "symbol") {
      powerScope = parseEnum(powerList.expectSymbol(), POWER_SCOPES, "power scope");
    }
    powerList.expectEnd();
  }

  const pinNumbers = parser.maybe(PinNumbersFormat);
  const pinNames = parser.maybe(PinNamesFormat);
  const excludeFromSim = parser.maybeSpelledBoolWithName("exclude_from_sim");
  const inBom = parser.expectSpelledBoolWithName("in_bom");
  const onBoard = parser.expectSpelledBoolWithName("on_board");
  const properties = parser.expectMany(SymbolPropertyFormat);
  const body = parser.expectMany(SymbolBodyItemFormat);
  const units = parser.expectMany(SymbolUnitFormat);
  const embeddedFonts = parser.maybeSpelledBoolWithName("embedded_fonts");
  parser.expectEnd();

  return {
    type: "root",
    id,
    power,
    powerScope,
    pinNumbers,
    pinNames,
    excludeFromSim: excludeFromSim?.value,
    excludeFromSimSpelling: recordedSpelling(excludeFromSim),
    inBom: inBom.value,
    inBomSpelling: recordedSpelling(inBom),
    onBoard: onBoard.value,
    onBoardSpelling: recordedSpelling(onBoard),
    properties,
    body,
    units,
    embeddedFonts: embeddedFonts?.value,
    embeddedFontsSpelling: recordedSpelling(embeddedFonts),
  };
}

function rootSymbolToSexpr(sym: RootSymbol): Sexpr {
  return listWithName("symbol", [
    libraryIdToSexpr(sym.id),
    sym.power ? listWithName("power", [sym.powerScope !== undefined ? symbol(sym.powerScope) : undefined]) : undefined,
    sym.pinNumbers ? PinNumbersFormat.toSexpr(sym.pinNumbers) : undefined,
    sym.pinNames ? PinNamesFormat.toSexpr(sym.pinNames) : undefined,
    sym.excludeFromSim !== undefined
      ? boolWithName("exclude_from_sim", sym.excludeFromSim, sym.excludeFromSimSpelling)
      : undefined,
    boolWithName("in_bom", sym.inBom, sym.inBomSpelling),
    boolWithName("on_board", sym.onBoard, sym.onBoardSpelling),
    ...sym.properties.map(SymbolPropertyFormat.toSexpr),
    ...sym.body.map(SymbolBodyItemFormat.toSexpr),
    ...sym.units.map(SymbolUnitFormat.toSexpr),
    sym.embeddedFonts !== undefined
      ? boolWithName("embedded_fonts", sym.embeddedFonts, sym.embeddedFontsSpelling)
      : undefined,
  ]);
}

// ─── Derived ─────────────────────────────────────────────────────────

/** Remainder of a derived symbol once its `(extends …)` has been read. */
function parseDerivedRest<P extends SexprCursor<P>>(parser: P, id: LibraryId, parent: string): DerivedSymbol {
  const properties = parser.expectMany(SymbolPropertyFormat);
  parser.expectEnd();
  return { type: "derived", id, extends: parent, properties };
}

function readExtends<P extends SexprCursor<P>>(list: P): string {
  const parent = list.expectString();
  list.expectEnd();
  return parent;
}

function derivedSymbolToSexpr(sym: DerivedSymbol): Sexpr {
  return listWithName("symbol", [
    libraryIdToSexpr(sym.id),
    stringWithName("extends", sym.extends),
    ...sym.properties.map(SymbolPropertyFormat.toSexpr),
  ]);
}

// ─── Disambiguation ──────────────────────────────────────────────────

/**
 * Root and derived symbols share the `(symbol "ID"` prefix and differ only in
 * whether `(extends …)` comes next. The owning path reads the prefix from the
 * live cursor and probes for `extends`; if it is absent the live cursor is
 * dropped and a snapshot taken beforehand is parsed from the start as a root.
 */
function parseSymbolDefinition(parser: Parser): SymbolDefinition {
  const head = parser.peekAt(1);
  const idText = head?.kind === "string" ? head.value : undefined;
  return withSymbolContext(idText, () => {
    const snapshot = parser.clone();
    const id = expectSymbolHeader(parser);
    const extendsList = parser.maybeListWithName("extends");
    if (extendsList) {
      return parseDerivedRest(parser, id, readExtends(extendsList));
    }
    return parseRootSymbol(snapshot);
  });
}

/**
 * The borrowing path looks at the head symbol of the third child directly in
 * the arena and commits to a branch before consuming anything.
 */
function parseSymbolDefinitionRef(parser: ParserRef): SymbolDefinition {
  const idText = parser.peekAt(1)?.asString();
  return withSymbolContext(idText, () => {
    if (parser.peekAt(2)?.firstSymbol() === "extends") {
      const id = expectSymbolHeader(parser);
      return parseDerivedRest(parser, id, readExtends(parser.expectListWithName("extends")));
    }
    return parseRootSymbol(parser);
  });
}

function symbolDefinitionToSexpr(definition: SymbolDefinition): Sexpr {
  switch (definition.type) {
    case "root":
      return rootSymbolToSexpr(definition);
    case "derived":
      return derivedSymbolToSexpr(definition);
  }
}

export const SymbolDefinitionFormat: SexprEntity<SymbolDefinition> = {
  ...keywordPresence("symbol"),
  fromSexpr: parseSymbolDefinition,
  fromSexprRef: parseSymbolDefinitionRef,
  toSexpr: symbolDefinitionToSexpr,
};

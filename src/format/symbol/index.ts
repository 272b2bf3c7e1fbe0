import { type ParseResult, tryParse } from "../../convert/errors";
import { Parser } from "../../convert/Parser";
import { ParserRef } from "../../convert/ParserRef";
import type { Sexpr } from "../../sexpr/Sexpr";
import { SexprArena } from "../../sexpr/SexprArena";
import { SExpressionParser, type SerializeOptions } from "../../sexpr/SExpressionParser";
import { SymbolLibraryFileFormat } from "./SymbolLibraryFile";
import type { SymbolLibraryFile } from "./types";

/**
 * `owned` walks a materialized token tree; `fast` reads the flat arena
 * directly and only copies out the opaque graphic items.
 */
export type ParseStrategy = "owned" | "fast";

export const PARSE_STRATEGIES: readonly ParseStrategy[] = ["owned", "fast"];

/** Parse a `kicad_symbol_lib` tree through the owning cursor. */
export function parseSymbolLibrary(tree: Sexpr): SymbolLibraryFile {
  return SymbolLibraryFileFormat.fromSexpr(Parser.fromSexpr(tree));
}

/** Parse through the borrowing cursor. Text is tokenized straight into an arena. */
export function parseSymbolLibraryFast(input: SexprArena | string): SymbolLibraryFile {
  const arena = typeof input === "string" ? SexprArena.fromText(input) : input;
  return SymbolLibraryFileFormat.fromSexprRef(ParserRef.fromArena(arena));
}

export function serializeSymbolLibrary(file: SymbolLibraryFile): Sexpr {
  return SymbolLibraryFileFormat.toSexpr(file);
}

export function readSymbolLibrary(text: string, strategy: ParseStrategy = "fast"): SymbolLibraryFile {
  switch (strategy) {
    case "owned":
      return parseSymbolLibrary(SExpressionParser.parse(text));
    case "fast":
      return parseSymbolLibraryFast(text);
  }
}

export function writeSymbolLibrary(file: SymbolLibraryFile, options?: SerializeOptions): string {
  return SExpressionParser.serialize(serializeSymbolLibrary(file), options) + "\n";
}

/** Like {@link readSymbolLibrary}, but syntax and parse errors come back as values. */
export function tryParseSymbolLibrary(
  text: string,
  strategy: ParseStrategy = "fast",
): ParseResult<SymbolLibraryFile> {
  return tryParse(() => readSymbolLibrary(text, strategy));
}

export { formatUnitId, parseUnitId } from "./SymbolUnit";
export { SymbolBodyItemFormat } from "./Pin";
export { PinNamesFormat, PinNumbersFormat } from "./PinNames";
export { SymbolDefinitionFormat } from "./SymbolDefinition";
export { SymbolLibraryFileFormat } from "./SymbolLibraryFile";
export { SymbolPropertyFormat } from "./SymbolProperty";
export * from "./types";

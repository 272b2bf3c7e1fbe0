import { KiCadParseError } from "../../convert/errors";
import { type SexprCursor, type SexprEntity, keywordPresence } from "../../convert/traits";
import { type Sexpr, listWithName, numberWithName, stringWithName, symbolWithName } from "../../sexpr/Sexpr";
import { SymbolDefinitionFormat } from "./SymbolDefinition";
import type { SymbolLibraryFile } from "./types";

/** `(generator kicad_symbol_editor)` in older files, `(generator "kicad_symbol_editor")` in current ones. */
function parseGenerator<P extends SexprCursor<P>>(parser: P): { generator: string; generatorIsString: boolean } {
  const list = parser.expectListWithName("generator");
  let result: { generator: string; generatorIsString: boolean };
  switch (list.peekKind()) {
    case "string":
      result = { generator: list.expectString(), generatorIsString: true };
      break;
    case "symbol":
      result = { generator: list.expectSymbol(), generatorIsString: false };
      break;
    case undefined:
      throw new KiCadParseError({ type: "UnexpectedEndOfList" });
    default:
      throw new KiCadParseError({ type: "UnexpectedTokenKind", expected: "string" });
  }
  list.expectEnd();
  return result;
}

function parseSymbolLibraryFile<P extends SexprCursor<P>>(parser: P): SymbolLibraryFile {
  parser.expectSymbolMatching("kicad_symbol_lib");

  const version = parser.expectNumberWithName("version");
  const { generator, generatorIsString } = parseGenerator(parser);
  const generatorVersion = parser.maybeStringWithName("generator_version");
  const symbols = parser.expectMany(SymbolDefinitionFormat);

  parser.expectEnd();

  return { version, generator, generatorIsString, generatorVersion, symbols };
}

function symbolLibraryFileToSexpr(file: SymbolLibraryFile): Sexpr {
  return listWithName("kicad_symbol_lib", [
    numberWithName("version", file.version),
    file.generatorIsString
      ? stringWithName("generator", file.generator)
      : symbolWithName("generator", file.generator),
    file.generatorVersion !== undefined ? stringWithName("generator_version", file.generatorVersion) : undefined,
    ...file.symbols.map(SymbolDefinitionFormat.toSexpr),
  ]);
}

export const SymbolLibraryFileFormat: SexprEntity<SymbolLibraryFile> = {
  ...keywordPresence("kicad_symbol_lib"),
  fromSexpr: parseSymbolLibraryFile,
  fromSexprRef: parseSymbolLibraryFile,
  toSexpr: symbolLibraryFileToSexpr,
};

import { KiCadParseError } from "../../convert/errors";
import { type SexprCursor, type SexprEntity, keywordPresence } from "../../convert/traits";
import { type Sexpr, listWithName, string, stringWithName } from "../../sexpr/Sexpr";
import { SymbolBodyItemFormat } from "./Pin";
import type { SymbolUnit, UnitId } from "./types";

// Unit and style numbers must be written canonically, otherwise they would not re-serialize verbatim.
const UNIT_ID_PATTERN = /^(.+)_(0|[1-9]\d*)_(0|[1-9]\d*)$/;

export function parseUnitId(input: string): UnitId {
  const match = UNIT_ID_PATTERN.exec(input);
  if (!match) {
    throw new KiCadParseError({ type: "UnitIdentifierMalformed", input });
  }
  return { name: match[1], unit: Number(match[2]), style: Number(match[3]) };
}

export function formatUnitId(id: UnitId): string {
  return `${id.name}_${id.unit}_${id.style}`;
}

function parseSymbolUnit<P extends SexprCursor<P>>(parser: P): SymbolUnit {
  parser.expectSymbolMatching("symbol");
  const id = parseUnitId(parser.expectString());
  const unitName = parser.maybeStringWithName("unit_name");
  const body = parser.expectMany(SymbolBodyItemFormat);
  parser.expectEnd();
  return { id, unitName, body };
}

function symbolUnitToSexpr(unit: SymbolUnit): Sexpr {
  return listWithName("symbol", [
    string(formatUnitId(unit.id)),
    unit.unitName !== undefined ? stringWithName("unit_name", unit.unitName) : undefined,
    ...unit.body.map(SymbolBodyItemFormat.toSexpr),
  ]);
}

export const SymbolUnitFormat: SexprEntity<SymbolUnit> = {
  ...keywordPresence("symbol"),
  fromSexpr: parseSymbolUnit,
  fromSexprRef: parseSymbolUnit,
  toSexpr: symbolUnitToSexpr,
};

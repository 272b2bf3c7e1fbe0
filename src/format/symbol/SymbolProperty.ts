import { type SexprCursor, type SexprEntity, keywordPresence, recordedSpelling } from "../../convert/traits";
import { internPropertyKey } from "../../convert/StringInterner";
import { type Sexpr, boolWithName, listWithName, numberWithName, string } from "../../sexpr/Sexpr";
import { listFlagToSexpr, maybeListFlag } from "../common/flags";
import { PositionFormat } from "../common/Position";
import { TextEffectsFormat } from "../common/TextEffects";
import type { SymbolProperty } from "./types";

/**
 * `(property "KEY" "VALUE" (id N)? (at …) (show_name)? (do_not_autoplace)? (hide B)? (effects …)?)`
 */
function parseSymbolProperty<P extends SexprCursor<P>>(parser: P): SymbolProperty {
  parser.expectSymbolMatching("property");

  const key = internPropertyKey(parser.expectString());
  const value = parser.expectString();
  const legacyId = parser.maybeNumberWithName("id");
  const position = parser.expect(PositionFormat);
  const showName = maybeListFlag(parser, "show_name");
  const doNotAutoplace = maybeListFlag(parser, "do_not_autoplace");
  const hide = parser.maybeSpelledBoolWithName("hide");
  const effects = parser.maybe(TextEffectsFormat);

  parser.expectEnd();

  return {
    key,
    value,
    legacyId,
    position,
    showName: showName.value,
    showNameLegacyFormat: showName.legacyFormat,
    showNameSpelling: showName.spelling,
    doNotAutoplace: doNotAutoplace.value,
    doNotAutoplaceLegacyFormat: doNotAutoplace.legacyFormat,
    doNotAutoplaceSpelling: doNotAutoplace.spelling,
    hide: hide?.value,
    hideSpelling: recordedSpelling(hide),
    effects,
  };
}

function symbolPropertyToSexpr(property: SymbolProperty): Sexpr {
  return listWithName("property", [
    string(property.key),
    string(property.value),
    property.legacyId !== undefined ? numberWithName("id", property.legacyId) : undefined,
    PositionFormat.toSexpr(property.position),
    listFlagToSexpr("show_name", {
      value: property.showName,
      legacyFormat: property.showNameLegacyFormat,
      spelling: property.showNameSpelling,
    }),
    listFlagToSexpr("do_not_autoplace", {
      value: property.doNotAutoplace,
      legacyFormat: property.doNotAutoplaceLegacyFormat,
      spelling: property.doNotAutoplaceSpelling,
    }),
    property.hide !== undefined ? boolWithName("hide", property.hide, property.hideSpelling) : undefined,
    property.effects ? TextEffectsFormat.toSexpr(property.effects) : undefined,
  ]);
}

export const SymbolPropertyFormat: SexprEntity<SymbolProperty> = {
  ...keywordPresence("property"),
  fromSexpr: parseSymbolProperty,
  fromSexprRef: parseSymbolProperty,
  toSexpr: symbolPropertyToSexpr,
};

import { type SexprCursor, type SexprEntity, keywordPresence } from "../../convert/traits";
import { type Sexpr, listWithName, numberWithName } from "../../sexpr/Sexpr";
import { keywordFlagToSexpr, maybeKeywordFlag } from "../common/flags";
import type { PinNames, PinNumbers } from "./types";

// Older files write a bare `hide`, current ones `(hide yes)`; both are kept as written.

function parsePinNames<P extends SexprCursor<P>>(parser: P): PinNames {
  parser.expectSymbolMatching("pin_names");
  const offset = parser.maybeNumberWithName("offset");
  const hide = maybeKeywordFlag(parser, "hide");
  parser.expectEnd();
  return { offset, hide: hide.value, hideLegacyFormat: hide.legacyFormat, hideSpelling: hide.spelling };
}

function pinNamesToSexpr(pinNames: PinNames): Sexpr {
  return listWithName("pin_names", [
    pinNames.offset !== undefined ? numberWithName("offset", pinNames.offset) : undefined,
    keywordFlagToSexpr("hide", {
      value: pinNames.hide,
      legacyFormat: pinNames.hideLegacyFormat,
      spelling: pinNames.hideSpelling,
    }),
  ]);
}

export const PinNamesFormat: SexprEntity<PinNames> = {
  ...keywordPresence("pin_names"),
  fromSexpr: parsePinNames,
  fromSexprRef: parsePinNames,
  toSexpr: pinNamesToSexpr,
};

function parsePinNumbers<P extends SexprCursor<P>>(parser: P): PinNumbers {
  parser.expectSymbolMatching("pin_numbers");
  const hide = maybeKeywordFlag(parser, "hide");
  parser.expectEnd();
  return { hide: hide.value, hideLegacyFormat: hide.legacyFormat, hideSpelling: hide.spelling };
}

function pinNumbersToSexpr(pinNumbers: PinNumbers): Sexpr {
  return listWithName("pin_numbers", [
    keywordFlagToSexpr("hide", {
      value: pinNumbers.hide,
      legacyFormat: pinNumbers.hideLegacyFormat,
      spelling: pinNumbers.hideSpelling,
    }),
  ]);
}

export const PinNumbersFormat: SexprEntity<PinNumbers> = {
  ...keywordPresence("pin_numbers"),
  fromSexpr: parsePinNumbers,
  fromSexprRef: parsePinNumbers,
  toSexpr: pinNumbersToSexpr,
};

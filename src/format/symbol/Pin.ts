import { type SexprCursor, type SexprEntity, keywordsPresence, parseEnum } from "../../convert/traits";
import { type Sexpr, list, listWithName, numberWithName, string, symbol } from "../../sexpr/Sexpr";
import { keywordFlagToSexpr, maybeKeywordFlag } from "../common/flags";
import { PositionFormat } from "../common/Position";
import { TextEffectsFormat } from "../common/TextEffects";
import {
  PIN_ELECTRICAL_TYPES,
  PIN_GRAPHIC_STYLES,
  type Pin,
  type PinAlternate,
  type PinText,
  type SymbolBodyItem,
} from "./types";

const GRAPHIC_KEYWORDS = ["arc", "bezier", "circle", "polyline", "rectangle", "text", "text_box"];

function parsePinText<P extends SexprCursor<P>>(parser: P): PinText {
  const text = parser.expectString();
  const effects = parser.maybe(TextEffectsFormat);
  parser.expectEnd();
  return effects ? { text, effects } : { text };
}

function pinTextToSexpr(keyword: string, pinText: PinText): Sexpr {
  return listWithName(keyword, [
    string(pinText.text),
    pinText.effects ? TextEffectsFormat.toSexpr(pinText.effects) : undefined,
  ]);
}

/** Everything after the `pin` keyword; pins are only read as body items. */
function parsePinFields<P extends SexprCursor<P>>(parser: P): Pin {
  const electricalType = parseEnum(parser.expectSymbol(), PIN_ELECTRICAL_TYPES, "pin electrical type");
  const graphicStyle = parseEnum(parser.expectSymbol(), PIN_GRAPHIC_STYLES, "pin graphic style");
  const position = parser.expect(PositionFormat);
  const length = parser.expectNumberWithName("length");
  const hide = maybeKeywordFlag(parser, "hide");
  const name = parsePinText(parser.expectListWithName("name"));
  const number = parsePinText(parser.expectListWithName("number"));

  const alternates: PinAlternate[] = [];
  for (let alt = parser.maybeListWithName("alternate"); alt; alt = parser.maybeListWithName("alternate")) {
    alternates.push({
      name: alt.expectString(),
      electricalType: parseEnum(alt.expectSymbol(), PIN_ELECTRICAL_TYPES, "pin electrical type"),
      graphicStyle: parseEnum(alt.expectSymbol(), PIN_GRAPHIC_STYLES, "pin graphic style"),
    });
    alt.expectEnd();
  }
  parser.expectEnd();

  return {
    electricalType,
    graphicStyle,
    position,
    length,
    hide: hide.value,
    hideLegacyFormat: hide.legacyFormat,
    hideSpelling: hide.spelling,
    name,
    number,
    alternates,
  };
}

function pinToSexpr(pin: Pin): Sexpr {
  return listWithName("pin", [
    symbol(pin.electricalType),
    symbol(pin.graphicStyle),
    PositionFormat.toSexpr(pin.position),
    numberWithName("length", pin.length),
    keywordFlagToSexpr("hide", { value: pin.hide, legacyFormat: pin.hideLegacyFormat, spelling: pin.hideSpelling }),
    pinTextToSexpr("name", pin.name),
    pinTextToSexpr("number", pin.number),
    ...pin.alternates.map((alt) =>
      listWithName("alternate", [string(alt.name), symbol(alt.electricalType), symbol(alt.graphicStyle)]),
    ),
  ]);
}

// ─── Body items: pins and opaque drawing primitives ──────────────────

function parseBodyItem<P extends SexprCursor<P>>(parser: P): SymbolBodyItem {
  if (parser.maybeSymbolMatching("pin")) {
    return { type: "pin", pin: parsePinFields(parser) };
  }
  const items: Sexpr[] = [];
  while (!parser.isEmpty()) {
    items.push(parser.expectRaw());
  }
  return { type: "graphic", node: list(items) };
}

function bodyItemToSexpr(item: SymbolBodyItem): Sexpr {
  switch (item.type) {
    case "pin":
      return pinToSexpr(item.pin);
    case "graphic":
      return item.node;
  }
}

export const SymbolBodyItemFormat: SexprEntity<SymbolBodyItem> = {
  ...keywordsPresence(["pin", ...GRAPHIC_KEYWORDS]),
  fromSexpr: parseBodyItem,
  fromSexprRef: parseBodyItem,
  toSexpr: bodyItemToSexpr,
};

import { type SexprCursor, type SexprEntity, keywordPresence, parseEnum } from "../../convert/traits";
import { type BoolSpelling, type Sexpr, listWithName, number, numberWithName, stringWithName, symbol } from "../../sexpr/Sexpr";
import { keywordFlagToSexpr, maybeKeywordFlag } from "./flags";

export const JUSTIFY_VALUES = ["left", "right", "top", "bottom", "mirror"] as const;
export type Justify = (typeof JUSTIFY_VALUES)[number];

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Font {
  face?: string;
  /** `(size HEIGHT WIDTH)` */
  height: number;
  width: number;
  thickness?: number;
  bold?: boolean;
  /** Written as a bare `bold` instead of `(bold yes)`. */
  boldLegacyFormat: boolean;
  boldSpelling?: BoolSpelling;
  italic?: boolean;
  italicLegacyFormat: boolean;
  italicSpelling?: BoolSpelling;
  lineSpacing?: number;
  color?: Color;
}

export interface TextEffects {
  font: Font;
  justify?: Justify[];
  hide?: boolean;
  /** Written as a bare `hide` instead of `(hide yes)`. */
  hideLegacyFormat: boolean;
  hideSpelling?: BoolSpelling;
  href?: string;
}

// ─── Font ────────────────────────────────────────────────────────────

function parseFont<P extends SexprCursor<P>>(parser: P): Font {
  parser.expectSymbolMatching("font");
  const face = parser.maybeStringWithName("face");

  const size = parser.expectListWithName("size");
  const height = size.expectNumber();
  const width = size.expectNumber();
  size.expectEnd();

  const thickness = parser.maybeNumberWithName("thickness");
  const bold = maybeKeywordFlag(parser, "bold");
  const italic = maybeKeywordFlag(parser, "italic");
  const lineSpacing = parser.maybeNumberWithName("line_spacing");

  let color: Color | undefined;
  const colorList = parser.maybeListWithName("color");
  if (colorList) {
    color = {
      r: colorList.expectNumber(),
      g: colorList.expectNumber(),
      b: colorList.expectNumber(),
      a: colorList.expectNumber(),
    };
    colorList.expectEnd();
  }
  parser.expectEnd();

  return {
    face,
    height,
    width,
    thickness,
    bold: bold.value,
    boldLegacyFormat: bold.legacyFormat,
    boldSpelling: bold.spelling,
    italic: italic.value,
    italicLegacyFormat: italic.legacyFormat,
    italicSpelling: italic.spelling,
    lineSpacing,
    color,
  };
}

function fontToSexpr(font: Font): Sexpr {
  return listWithName("font", [
    font.face !== undefined ? stringWithName("face", font.face) : undefined,
    listWithName("size", [number(font.height), number(font.width)]),
    font.thickness !== undefined ? numberWithName("thickness", font.thickness) : undefined,
    keywordFlagToSexpr("bold", { value: font.bold, legacyFormat: font.boldLegacyFormat, spelling: font.boldSpelling }),
    keywordFlagToSexpr("italic", {
      value: font.italic,
      legacyFormat: font.italicLegacyFormat,
      spelling: font.italicSpelling,
    }),
    font.lineSpacing !== undefined ? numberWithName("line_spacing", font.lineSpacing) : undefined,
    font.color
      ? listWithName("color", [number(font.color.r), number(font.color.g), number(font.color.b), number(font.color.a)])
      : undefined,
  ]);
}

export const FontFormat: SexprEntity<Font> = {
  ...keywordPresence("font"),
  fromSexpr: parseFont,
  fromSexprRef: parseFont,
  toSexpr: fontToSexpr,
};

// ─── Effects ─────────────────────────────────────────────────────────

function parseTextEffects<P extends SexprCursor<P>>(parser: P): TextEffects {
  parser.expectSymbolMatching("effects");
  const font = parser.expect(FontFormat);

  let justify: Justify[] | undefined;
  const justifyList = parser.maybeListWithName("justify");
  if (justifyList) {
    justify = [];
    while (!justifyList.isEmpty()) {
      justify.push(parseEnum(justifyList.expectSymbol(), JUSTIFY_VALUES, "justify"));
    }
  }

  const hide = maybeKeywordFlag(parser, "hide");
  const href = parser.maybeStringWithName("href");
  parser.expectEnd();

  return {
    font,
    justify,
    hide: hide.value,
    hideLegacyFormat: hide.legacyFormat,
    hideSpelling: hide.spelling,
    href,
  };
}

function textEffectsToSexpr(effects: TextEffects): Sexpr {
  return listWithName("effects", [
    fontToSexpr(effects.font),
    effects.justify ? listWithName("justify", effects.justify.map((j) => symbol(j))) : undefined,
    keywordFlagToSexpr("hide", {
      value: effects.hide,
      legacyFormat: effects.hideLegacyFormat,
      spelling: effects.hideSpelling,
    }),
    effects.href !== undefined ? stringWithName("href", effects.href) : undefined,
  ]);
}

export const TextEffectsFormat: SexprEntity<TextEffects> = {
  ...keywordPresence("effects"),
  fromSexpr: parseTextEffects,
  fromSexprRef: parseTextEffects,
  toSexpr: textEffectsToSexpr,
};

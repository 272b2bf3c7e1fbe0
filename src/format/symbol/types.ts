import type { BoolSpelling, SexprList } from "../../sexpr/Sexpr";
import type { LibraryId } from "../common/LibraryId";
import type { Position } from "../common/Position";
import type { TextEffects } from "../common/TextEffects";

// ─── Pins ────────────────────────────────────────────────────────────

export const PIN_ELECTRICAL_TYPES = [
  "input",
  "output",
  "bidirectional",
  "tri_state",
  "passive",
  "free",
  "unspecified",
  "power_in",
  "power_out",
  "open_collector",
  "open_emitter",
  "no_connect",
] as const;
export type PinElectricalType = (typeof PIN_ELECTRICAL_TYPES)[number];

export const PIN_GRAPHIC_STYLES = [
  "line",
  "inverted",
  "clock",
  "inverted_clock",
  "input_low",
  "clock_low",
  "output_low",
  "edge_clock_high",
  "non_logic",
] as const;
export type PinGraphicStyle = (typeof PIN_GRAPHIC_STYLES)[number];

/** `(name "TEXT" (effects …))` or `(number "TEXT" (effects …))` */
export interface PinText {
  text: string;
  effects?: TextEffects;
}

export interface PinAlternate {
  name: string;
  electricalType: PinElectricalType;
  graphicStyle: PinGraphicStyle;
}

export interface Pin {
  electricalType: PinElectricalType;
  graphicStyle: PinGraphicStyle;
  position: Position;
  length: number;
  hide?: boolean;
  /** Written as a bare `hide` instead of `(hide yes)`. */
  hideLegacyFormat: boolean;
  hideSpelling?: BoolSpelling;
  name: PinText;
  number: PinText;
  alternates: PinAlternate[];
}

/**
 * Drawing primitives (`arc`, `circle`, `polyline`, …) are carried through
 * unmodified.
 */
export type SymbolBodyItem =
  | { type: "pin"; pin: Pin }
  | { type: "graphic"; node: SexprList };

// ─── Symbol header fields ────────────────────────────────────────────

export interface PinNames {
  offset?: number;
  hide?: boolean;
  hideLegacyFormat: boolean;
  hideSpelling?: BoolSpelling;
}

export interface PinNumbers {
  hide?: boolean;
  hideLegacyFormat: boolean;
  hideSpelling?: BoolSpelling;
}

export type PowerScope = "global" | "local";

export interface SymbolProperty {
  key: string;
  value: string;
  /** `(id N)` from older files. Preserved as-is, never interpreted. */
  legacyId?: number;
  position: Position;
  showName?: boolean;
  /** Written as `(show_name)` instead of `(show_name yes)`. */
  showNameLegacyFormat: boolean;
  showNameSpelling?: BoolSpelling;
  doNotAutoplace?: boolean;
  doNotAutoplaceLegacyFormat: boolean;
  doNotAutoplaceSpelling?: BoolSpelling;
  hide?: boolean;
  hideSpelling?: BoolSpelling;
  effects?: TextEffects;
}

// ─── Units and definitions ───────────────────────────────────────────

/** Sub-unit name `NAME_UNIT_STYLE`, e.g. `R_0_1`. */
export interface UnitId {
  name: string;
  unit: number;
  style: number;
}

export interface SymbolUnit {
  id: UnitId;
  unitName?: string;
  body: SymbolBodyItem[];
}

/**
 * Every `…Spelling` field is set only when the source wrote that bool as
 * `true`/`false`; left out, it is written as `yes`/`no`.
 */
export interface RootSymbol {
  type: "root";
  id: LibraryId;
  power: boolean;
  powerScope?: PowerScope;
  pinNumbers?: PinNumbers;
  pinNames?: PinNames;
  excludeFromSim?: boolean;
  excludeFromSimSpelling?: BoolSpelling;
  inBom: boolean;
  inBomSpelling?: BoolSpelling;
  onBoard: boolean;
  onBoardSpelling?: BoolSpelling;
  properties: SymbolProperty[];
  body: SymbolBodyItem[];
  units: SymbolUnit[];
  embeddedFonts?: boolean;
  embeddedFontsSpelling?: BoolSpelling;
}

/**
 * Inherits from another symbol of the same library. `extends` is the parent's
 * name only; resolving it is left to the caller.
 */
export interface DerivedSymbol {
  type: "derived";
  id: LibraryId;
  extends: string;
  properties: SymbolProperty[];
}

export type SymbolDefinition = RootSymbol | DerivedSymbol;

export interface SymbolLibraryFile {
  /** `YYYYMMDD` format version. */
  version: number;
  generator: string;
  /** Generator was a quoted string (current files) rather than a bare symbol (older files). */
  generatorIsString: boolean;
  generatorVersion?: string;
  symbols: SymbolDefinition[];
}

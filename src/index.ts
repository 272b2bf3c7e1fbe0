export * as sexpr from "./sexpr/Sexpr";
export type { BoolSpelling, Sexpr, SexprKind, SexprList } from "./sexpr/Sexpr";
export { SExpressionParser, type SerializeOptions } from "./sexpr/SExpressionParser";
export { SexprSyntaxError } from "./sexpr/SexprScanner";
export { SexprArena, SexprRef } from "./sexpr/SexprArena";

export { KiCadParseError, type KiCadParseErrorDetail, type ParseResult, tryParse } from "./convert/errors";
export { Parser } from "./convert/Parser";
export { ParserRef } from "./convert/ParserRef";
export { internPropertyKey, internedKeyCount, isInternedPropertyKey } from "./convert/StringInterner";
export {
  type FromSexpr,
  type FromSexprRef,
  type MaybeFromSexpr,
  type SexprCursor,
  type SexprEntity,
  type SpelledBool,
  type ToSexpr,
  keywordPresence,
  keywordsPresence,
} from "./convert/traits";

export { type LibraryId, formatLibraryId, parseLibraryId } from "./format/common/LibraryId";
export { type Position, PositionFormat } from "./format/common/Position";
export { type Color, type Font, type Justify, type TextEffects, FontFormat, TextEffectsFormat } from "./format/common/TextEffects";
export * from "./format/symbol";

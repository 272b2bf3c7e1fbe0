import { type SexprCursor, parseSpelledBool, recordedSpelling } from "../../convert/traits";
import { type BoolSpelling, type Sexpr, boolWithName, listWithName, symbol } from "../../sexpr/Sexpr";

/**
 * A yes/no field together with how it was spelled. `value` is undefined when
 * the source had no node for it; `legacyFormat` marks the older spelling
 * (a bare keyword such as `hide`, or an empty list such as `(show_name)`);
 * `spelling` is set when the value was written `true`/`false`.
 */
export interface FlagState {
  value?: boolean;
  legacyFormat: boolean;
  spelling?: BoolSpelling;
}

/** `keyword` (legacy, always true) or `(keyword yes|no)`. */
export function maybeKeywordFlag<P extends SexprCursor<P>>(parser: P, keyword: string): FlagState {
  if (parser.maybeSymbolMatching(keyword)) {
    return { value: true, legacyFormat: true };
  }
  const spelled = parser.maybeSpelledBoolWithName(keyword);
  return { value: spelled?.value, legacyFormat: false, spelling: recordedSpelling(spelled) };
}

/** `(keyword)` (legacy, always true) or `(keyword yes|no)`. */
export function maybeListFlag<P extends SexprCursor<P>>(parser: P, keyword: string): FlagState {
  const list = parser.maybeListWithName(keyword);
  if (!list) {
    return { value: undefined, legacyFormat: false };
  }
  if (list.isEmpty()) {
    return { value: true, legacyFormat: true };
  }
  const spelled = parseSpelledBool(list.expectSymbol());
  list.expectEnd();
  return { value: spelled.value, legacyFormat: false, spelling: recordedSpelling(spelled) };
}

export function keywordFlagToSexpr(keyword: string, state: FlagState): Sexpr | undefined {
  if (state.legacyFormat && state.value === true) {
    return symbol(keyword);
  }
  return state.value !== undefined ? boolWithName(keyword, state.value, state.spelling) : undefined;
}

export function listFlagToSexpr(keyword: string, state: FlagState): Sexpr | undefined {
  if (state.legacyFormat && state.value === true) {
    return listWithName(keyword);
  }
  return state.value !== undefined ? boolWithName(keyword, state.value, state.spelling) : undefined;
}

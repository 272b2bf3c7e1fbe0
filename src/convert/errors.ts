import { type Sexpr, type SexprKind, describeSexpr } from "../sexpr/Sexpr";
import { SexprSyntaxError } from "../sexpr/SexprScanner";

export type KiCadParseErrorDetail =
  | { type: "UnexpectedEndOfList" }
  | { type: "UnexpectedTokenKind"; expected: SexprKind }
  | { type: "NonMatchingSymbol"; found: string; expected: string }
  | { type: "InvalidEnumValue"; value: string; enumName: string }
  | { type: "ExpectedEndOfList"; found: Sexpr }
  | { type: "LibraryIdentifierMalformed"; input: string; reason: string }
  | { type: "UnitIdentifierMalformed"; input: string };

export type KiCadParseErrorType = KiCadParseErrorDetail["type"];

function describeDetail(detail: KiCadParseErrorDetail): string {
  switch (detail.type) {
    case "UnexpectedEndOfList":
      return "Unexpected end of list";
    case "UnexpectedTokenKind":
      return `Expected a ${detail.expected}`;
    case "NonMatchingSymbol":
      return `Expected symbol "${detail.expected}" but found "${detail.found}"`;
    case "InvalidEnumValue":
      return `Invalid ${detail.enumName} value "${detail.value}"`;
    case "ExpectedEndOfList":
      return `Expected end of list but found ${describeSexpr(detail.found)}`;
    case "LibraryIdentifierMalformed":
      return `Malformed library identifier "${detail.input}": ${detail.reason}`;
    case "UnitIdentifierMalformed":
      return `Malformed unit identifier "${detail.input}"`;
  }
}

/**
 * Raised by every grammar entity and cursor operation. Terminal for the
 * document being parsed: nothing partial is returned.
 */
export class KiCadParseError extends Error {
  /**
   * @param context Name of the entity whose parse failed, when one wraps the error.
   */
  constructor(
    public readonly detail: KiCadParseErrorDetail,
    public readonly context?: string,
  ) {
    super(context ? `${context}: ${describeDetail(detail)}` : describeDetail(detail));
    this.name = "KiCadParseError";
  }

  get type(): KiCadParseErrorType {
    return this.detail.type;
  }

  /** Re-raise under the name of the enclosing entity. */
  withContext(context: string): KiCadParseError {
    return new KiCadParseError(this.detail, this.context ? `${context} > ${this.context}` : context);
  }
}

export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; error: KiCadParseError | SexprSyntaxError };

/**
 * Run a parse and return its outcome as a value instead of throwing.
 * Anything other than a syntax or parse error is a bug and still throws.
 */
export function tryParse<T>(parse: () => T): ParseResult<T> {
  try {
    return { success: true, value: parse() };
  } catch (err) {
    if (err instanceof KiCadParseError || err instanceof SexprSyntaxError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

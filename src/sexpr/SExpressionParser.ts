import { type Sexpr, type SexprList, firstSymbol, list, number, string, symbol } from "./Sexpr";
import { SexprScanner, SexprSyntaxError, isBareSymbol } from "./SexprScanner";

export interface SerializeOptions {
  /** Indentation unit for nested lines. Defaults to a tab. */
  indent?: string;
  /** Keywords whose lists always render on a single line. */
  inlineKeywords?: readonly string[];
}

const DEFAULT_INLINE_KEYWORDS = ["at", "font", "size", "offset", "length", "xy", "color"];

function formatNumber(value: number): string {
  return Object.is(value, -0) ? "0" : String(value);
}

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .replace(/\r/g, "\\r");
  return `"${escaped}"`;
}

/**
 * Reader and writer for KiCad S-expression text.
 * The reader yields a typed token tree; the writer renders one back to text.
 */
export class SExpressionParser {
  /**
   * Parse text holding exactly one top-level form.
   */
  static parse(input: string): Sexpr {
    const forms = this.parseAll(input);
    if (forms.length === 0) {
      throw new SexprSyntaxError("Empty input", 0);
    }
    if (forms.length > 1) {
      throw new SexprSyntaxError("Unexpected content after top-level form", input.length);
    }
    return forms[0];
  }

  /**
   * Parse every top-level form in the input.
   */
  static parseAll(input: string): Sexpr[] {
    const scanner = new SexprScanner(input);
    const stack: { items: Sexpr[]; offset: number }[] = [];
    const roots: Sexpr[] = [];

    for (let token = scanner.next(); token !== undefined; token = scanner.next()) {
      let node: Sexpr;
      switch (token.type) {
        case "open":
          stack.push({ items: [], offset: token.offset });
          continue;
        case "close": {
          const frame = stack.pop();
          if (!frame) throw new SexprSyntaxError("Unbalanced ')'", token.offset);
          node = list(frame.items);
          break;
        }
        case "symbol":
          node = symbol(token.value);
          break;
        case "string":
          node = string(token.value);
          break;
        case "number":
          node = number(token.value);
          break;
      }

      const parent = stack[stack.length - 1];
      if (parent) {
        parent.items.push(node);
      } else {
        roots.push(node);
      }
    }

    const unclosed = stack.pop();
    if (unclosed) {
      throw new SexprSyntaxError("Unclosed '('", unclosed.offset);
    }
    return roots;
  }

  /**
   * Serialize a token tree into text.
   * Formatting rules:
   * - Lists holding only atoms, and lists named in `inlineKeywords`, stay on one line.
   * - Other lists keep their leading atoms on the opening line, then put every
   *   sub-list on its own indented line; the closing parenthesis gets its own line.
   * Throws {@link SexprSyntaxError} for a symbol that would not read back as
   * the same symbol (empty, numeric, or holding whitespace, quotes or parentheses).
   */
  static serialize(expr: Sexpr, options: SerializeOptions = {}, indentLevel: number = 0): string {
    const indentation = options.indent ?? "\t";
    const inlineKeywords = options.inlineKeywords ?? DEFAULT_INLINE_KEYWORDS;

    switch (expr.kind) {
      case "symbol":
        if (!isBareSymbol(expr.value)) {
          throw new SexprSyntaxError(`Cannot write ${JSON.stringify(expr.value)} as a bare symbol`);
        }
        return expr.value;
      case "string":
        return quote(expr.value);
      case "number":
        return formatNumber(expr.value);
      case "list":
        break;
    }

    if (expr.items.length === 0) {
      return "()";
    }

    const keyword = firstSymbol(expr.items) ?? "";
    const isSimple = expr.items.every(e => e.kind !== "list");
    if (isSimple || inlineKeywords.includes(keyword)) {
      return this.serializeInline(expr);
    }

    const nodeIndent = indentation.repeat(indentLevel);
    const childIndent = indentation.repeat(indentLevel + 1);

    let result = "(";
    let first = true;
    for (const child of expr.items) {
      if (child.kind === "list") {
        result += "\n" + childIndent + this.serialize(child, options, indentLevel + 1);
      } else {
        result += (first ? "" : " ") + this.serialize(child, options, 0);
      }
      first = false;
    }

    return result + "\n" + nodeIndent + ")";
  }

  private static serializeInline(expr: SexprList): string {
    return "(" + expr.items.map(e => (e.kind === "list" ? this.serializeInline(e) : this.serialize(e))).join(" ") + ")";
  }
}

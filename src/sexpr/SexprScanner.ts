export type Token =
  | { type: "open"; offset: number }
  | { type: "close"; offset: number }
  | { type: "symbol"; value: string; offset: number }
  | { type: "string"; value: string; offset: number }
  | { type: "number"; value: number; offset: number };

export class SexprSyntaxError extends Error {
  /** `offset` is left out for errors raised while writing a tree. */
  constructor(message: string, public readonly offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = "SexprSyntaxError";
  }
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
};

function isDelimiter(char: string): boolean {
  return char === "(" || char === ")" || char === '"' || /\s/.test(char);
}

/** Whether `text` reads back as a single bare symbol. */
export function isBareSymbol(text: string): boolean {
  if (text.length === 0 || NUMBER_PATTERN.test(text)) return false;
  for (const char of text) {
    if (isDelimiter(char)) return false;
  }
  return true;
}

/**
 * Streaming tokenizer shared by the tree reader and the arena builder.
 * Handles:
 * - Parentheses
 * - Quoted strings with backslash escapes
 * - Numeric literals; every other bare run of characters is a symbol
 */
export class SexprScanner {
  private pos = 0;

  constructor(private readonly input: string) {}

  next(): Token | undefined {
    const input = this.input;

    while (this.pos < input.length && /\s/.test(input[this.pos])) {
      this.pos++;
    }
    if (this.pos >= input.length) return undefined;

    const start = this.pos;
    const char = input[start];

    if (char === "(") {
      this.pos++;
      return { type: "open", offset: start };
    }
    if (char === ")") {
      this.pos++;
      return { type: "close", offset: start };
    }

    if (char === '"') {
      let value = "";
      this.pos++;
      while (this.pos < input.length) {
        const c = input[this.pos];
        if (c === "\\") {
          const escaped = input[this.pos + 1];
          if (escaped === undefined) break;
          value += ESCAPES[escaped] ?? escaped;
          this.pos += 2;
        } else if (c === '"') {
          this.pos++;
          return { type: "string", value, offset: start };
        } else {
          value += c;
          this.pos++;
        }
      }
      throw new SexprSyntaxError("Unterminated string", start);
    }

    while (this.pos < input.length && !isDelimiter(input[this.pos])) {
      this.pos++;
    }
    const atom = input.slice(start, this.pos);
    if (NUMBER_PATTERN.test(atom)) {
      return { type: "number", value: Number(atom), offset: start };
    }
    return { type: "symbol", value: atom, offset: start };
  }
}

import { type Sexpr, type SexprKind, list, number, string, symbol } from "./Sexpr";
import { SexprScanner, SexprSyntaxError } from "./SexprScanner";

const KIND_SYMBOL = 0;
const KIND_STRING = 1;
const KIND_NUMBER = 2;
const KIND_LIST = 3;

const KIND_NAMES: readonly SexprKind[] = ["symbol", "string", "number", "list"];

/** Growable column storage used only while an arena is being built. */
class ArenaBuilder {
  readonly kinds: number[] = [];
  readonly ends: number[] = [];
  readonly numbers: number[] = [];
  readonly texts: (string | undefined)[] = [];

  push(kind: number, text?: string, value = 0): number {
    const index = this.kinds.length;
    this.kinds.push(kind);
    this.ends.push(index + 1);
    this.numbers.push(value);
    this.texts.push(text);
    return index;
  }

  close(index: number): void {
    this.ends[index] = this.kinds.length;
  }

  finish(): SexprArena {
    return new SexprArena(
      Uint8Array.from(this.kinds),
      Uint32Array.from(this.ends),
      Float64Array.from(this.numbers),
      Object.freeze([...this.texts]),
    );
  }
}

/**
 * An immutable, flat preorder encoding of one token tree.
 *
 * Node `i` is a list when `kind(i)` is "list"; its first child is `i + 1` and
 * each child's successor is that child's `end`. Views into the arena
 * ({@link SexprRef}) hold the arena itself, so it stays alive for as long as
 * anything derived from it does. There is no API that mutates an arena.
 */
export class SexprArena {
  /** @internal use {@link SexprArena.fromText} or {@link SexprArena.fromSexpr} */
  constructor(
    private readonly kinds: Uint8Array,
    private readonly ends: Uint32Array,
    private readonly numbers: Float64Array,
    private readonly texts: readonly (string | undefined)[],
  ) {
    if (kinds.length === 0) {
      throw new SexprSyntaxError("Empty input", 0);
    }
  }

  /**
   * Tokenize text straight into the arena without building an intermediate tree.
   */
  static fromText(input: string): SexprArena {
    const scanner = new SexprScanner(input);
    const builder = new ArenaBuilder();
    const open: { index: number; offset: number }[] = [];
    let roots = 0;

    for (let token = scanner.next(); token !== undefined; token = scanner.next()) {
      if (open.length === 0 && token.type !== "close") {
        if (roots > 0) {
          throw new SexprSyntaxError("Unexpected content after top-level form", token.offset);
        }
        roots++;
      }
      switch (token.type) {
        case "open":
          open.push({ index: builder.push(KIND_LIST), offset: token.offset });
          break;
        case "close": {
          const frame = open.pop();
          if (!frame) throw new SexprSyntaxError("Unbalanced ')'", token.offset);
          builder.close(frame.index);
          break;
        }
        case "symbol":
          builder.push(KIND_SYMBOL, token.value);
          break;
        case "string":
          builder.push(KIND_STRING, token.value);
          break;
        case "number":
          builder.push(KIND_NUMBER, undefined, token.value);
          break;
      }
    }

    const unclosed = open.pop();
    if (unclosed) {
      throw new SexprSyntaxError("Unclosed '('", unclosed.offset);
    }
    return builder.finish();
  }

  static fromSexpr(tree: Sexpr): SexprArena {
    const builder = new ArenaBuilder();
    const visit = (node: Sexpr): void => {
      switch (node.kind) {
        case "symbol":
          builder.push(KIND_SYMBOL, node.value);
          return;
        case "string":
          builder.push(KIND_STRING, node.value);
          return;
        case "number":
          builder.push(KIND_NUMBER, undefined, node.value);
          return;
        case "list": {
          const index = builder.push(KIND_LIST);
          node.items.forEach(visit);
          builder.close(index);
          return;
        }
      }
    };
    visit(tree);
    return builder.finish();
  }

  get root(): SexprRef {
    return new SexprRef(this, 0);
  }

  get size(): number {
    return this.kinds.length;
  }

  kindAt(index: number): SexprKind {
    return KIND_NAMES[this.kinds[index]];
  }

  /** Index one past the last node of the subtree rooted at `index`. */
  endOf(index: number): number {
    return this.ends[index];
  }

  textAt(index: number): string {
    return this.texts[index] ?? "";
  }

  numberAt(index: number): number {
    return this.numbers[index];
  }

  /** Copy the subtree at `index` out into an owned token tree. */
  materialize(index: number): Sexpr {
    switch (this.kinds[index]) {
      case KIND_SYMBOL:
        return symbol(this.textAt(index));
      case KIND_STRING:
        return string(this.textAt(index));
      case KIND_NUMBER:
        return number(this.numbers[index]);
      default: {
        const items: Sexpr[] = [];
        for (let child = index + 1; child < this.ends[index]; child = this.ends[child]) {
          items.push(this.materialize(child));
        }
        return list(items);
      }
    }
  }
}

/**
 * A borrowed view of one node inside a {@link SexprArena}.
 */
export class SexprRef {
  constructor(
    readonly arena: SexprArena,
    readonly index: number,
  ) {}

  get kind(): SexprKind {
    return this.arena.kindAt(this.index);
  }

  get isList(): boolean {
    return this.kind === "list";
  }

  asSymbol(): string | undefined {
    return this.kind === "symbol" ? this.arena.textAt(this.index) : undefined;
  }

  asString(): string | undefined {
    return this.kind === "string" ? this.arena.textAt(this.index) : undefined;
  }

  asNumber(): number | undefined {
    return this.kind === "number" ? this.arena.numberAt(this.index) : undefined;
  }

  /** Number of direct children; zero for atoms. */
  get length(): number {
    if (!this.isList) return 0;
    let count = 0;
    for (let child = this.index + 1; child < this.arena.endOf(this.index); child = this.arena.endOf(child)) {
      count++;
    }
    return count;
  }

  /** Head keyword of a list, looked up without materializing anything. */
  firstSymbol(): string | undefined {
    if (!this.isList) return undefined;
    const head = this.index + 1;
    if (head >= this.arena.endOf(this.index) || this.arena.kindAt(head) !== "symbol") {
      return undefined;
    }
    return this.arena.textAt(head);
  }

  toSexpr(): Sexpr {
    return this.arena.materialize(this.index);
  }
}

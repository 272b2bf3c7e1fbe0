import * as fs from "fs";
import { type Config, getConfig } from "../config";
import { die, readSourceFile, splitArgs } from "../utils";
import { readSymbolLibrary, writeSymbolLibrary } from "../../format/symbol";

/** Parse a symbol library and render it again with the configured writer settings. */
export function formatText(text: string, config: Config): string {
  const model = readSymbolLibrary(text, config.parser);
  return writeSymbolLibrary(model, { indent: config.indent, inlineKeywords: config.inlineKeywords });
}

/**
 * fmt: Re-render a symbol library. Prints to stdout unless --write is given.
 */
export async function cmdFmt(args: string[]): Promise<void> {
  const { positional, flags } = splitArgs(args);
  const file = positional[0];
  if (!file) {
    die("Usage: kicad-format fmt <file> [--write]");
  }

  const source = readSourceFile(file);
  const formatted = formatText(source, getConfig());

  if (!flags.has("write")) {
    process.stdout.write(formatted);
    return;
  }
  if (formatted === source) {
    console.log(`✅  ${file} already formatted`);
    return;
  }
  fs.writeFileSync(file, formatted);
  console.log(`✅  Formatted ${file}`);
}

import { die, readSourceFile, splitArgs } from "../utils";
import { PARSE_STRATEGIES, serializeSymbolLibrary, tryParseSymbolLibrary, type SymbolLibraryFile } from "../../format/symbol";
import { SExpressionParser } from "../../sexpr/SExpressionParser";
import { sexprEquals } from "../../sexpr/Sexpr";

export interface CheckReport {
  ok: boolean;
  symbols: number;
  problems: string[];
}

/**
 * Parse `text` with every strategy and verify that the strategies agree and
 * that writing the model back reproduces the input tree.
 */
export function checkText(text: string): CheckReport {
  const problems: string[] = [];
  const models: SymbolLibraryFile[] = [];

  for (const strategy of PARSE_STRATEGIES) {
    const result = tryParseSymbolLibrary(text, strategy);
    if (result.success) {
      models.push(result.value);
    } else {
      problems.push(`${strategy}: ${result.error.message}`);
    }
  }

  if (problems.length > 0 || models.length === 0) {
    return { ok: false, symbols: 0, problems };
  }

  const [first, ...rest] = models.map(serializeSymbolLibrary);
  if (rest.some((tree) => !sexprEquals(first, tree))) {
    problems.push("parse strategies produced different models");
  }
  if (!sexprEquals(first, SExpressionParser.parse(text))) {
    problems.push("re-serialized tree differs from the input");
  }

  return { ok: problems.length === 0, symbols: models[0].symbols.length, problems };
}

/**
 * check: Verify that symbol libraries parse and round-trip.
 */
export async function cmdCheck(args: string[]): Promise<void> {
  const { positional } = splitArgs(args);
  if (positional.length === 0) {
    die("Usage: kicad-format check <file...>");
  }

  let hasErrors = false;
  for (const file of positional) {
    const report = checkText(readSourceFile(file));
    if (report.ok) {
      console.log(`  ✅ ${file} (${report.symbols} symbols)`);
    } else {
      hasErrors = true;
      console.error(`  ❌ ${file}`);
      for (const problem of report.problems) {
        console.error(`     → ${problem}`);
      }
    }
  }

  if (hasErrors) {
    console.log(`\n❌  Check failed.\n`);
    process.exit(1);
  }
  console.log(`\n✨  All ${positional.length} file(s) OK\n`);
}

import { getConfig } from "../config";
import { die, readSourceFile, splitArgs } from "../utils";
import { formatLibraryId } from "../../format/common/LibraryId";
import { readSymbolLibrary, type SymbolBodyItem, type SymbolDefinition, type SymbolLibraryFile } from "../../format/symbol";

export interface SymbolSummary {
  id: string;
  kind: "root" | "derived";
  extends?: string;
  properties: number;
  units: number;
  pins: number;
}

export interface LibrarySummary {
  version: number;
  generator: string;
  generatorVersion?: string;
  symbols: SymbolSummary[];
}

function countPins(body: readonly SymbolBodyItem[]): number {
  return body.filter((item) => item.type === "pin").length;
}

function summarizeSymbol(definition: SymbolDefinition): SymbolSummary {
  const id = formatLibraryId(definition.id);
  if (definition.type === "derived") {
    return { id, kind: "derived", extends: definition.extends, properties: definition.properties.length, units: 0, pins: 0 };
  }
  const pins = countPins(definition.body) + definition.units.reduce((sum, unit) => sum + countPins(unit.body), 0);
  return { id, kind: "root", properties: definition.properties.length, units: definition.units.length, pins };
}

export function summarizeLibrary(file: SymbolLibraryFile): LibrarySummary {
  return {
    version: file.version,
    generator: file.generator,
    generatorVersion: file.generatorVersion,
    symbols: file.symbols.map(summarizeSymbol),
  };
}

export function formatSummary(summary: LibrarySummary): string[] {
  const generator =
    summary.generatorVersion !== undefined ? `${summary.generator} ${summary.generatorVersion}` : summary.generator;
  const lines = [`version ${summary.version}, generator ${generator}, ${summary.symbols.length} symbols`];
  for (const sym of summary.symbols) {
    if (sym.kind === "derived") {
      lines.push(`  ${sym.id} extends ${sym.extends ?? "?"} (${sym.properties} properties)`);
    } else {
      lines.push(`  ${sym.id} (${sym.properties} properties, ${sym.units} units, ${sym.pins} pins)`);
    }
  }
  return lines;
}

/**
 * inspect: Print an outline of a symbol library.
 */
export async function cmdInspect(args: string[]): Promise<void> {
  const { positional, flags } = splitArgs(args);
  const file = positional[0];
  if (!file) {
    die("Usage: kicad-format inspect <file> [--json]");
  }

  const { parser } = getConfig();
  const summary = summarizeLibrary(readSymbolLibrary(readSourceFile(file), parser));

  if (flags.has("json")) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  for (const line of formatSummary(summary)) {
    console.log(line);
  }
}

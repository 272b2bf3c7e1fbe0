#!/usr/bin/env node

/**
 * KiCad format CLI
 */

import { cmdCheck } from "./commands/check";
import { cmdFmt } from "./commands/fmt";
import { cmdInspect } from "./commands/inspect";

function printHelp(): void {
  console.log(`
KiCad format CLI

Usage:
  kicad-format <command> [options]

Commands:
  check <file...>                Parse with both strategies and verify the round trip
  inspect <file> [--json]        Print version, generator and an outline of each symbol
  fmt <file> [--write]           Re-render a symbol library with the configured writer

Configuration:
  Settings are read from kicad-format.yml in the working directory, or from
  the file named by KICAD_FORMAT_CONFIG. KICAD_FORMAT_PARSER=owned|fast
  overrides the parse strategy.

Examples:
  kicad-format check Device.kicad_sym
  kicad-format inspect Device.kicad_sym --json
  kicad-format fmt Device.kicad_sym --write
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "check":
      return cmdCheck(commandArgs);
    case "inspect":
      return cmdInspect(commandArgs);
    case "fmt":
      return cmdFmt(commandArgs);
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? `❌  ${err.message}` : err);
  process.exit(1);
});

import * as fs from "fs";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

/** Read a library file given on the command line, exiting if it is missing. */
export function readSourceFile(file: string): string {
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
    die(`File not found: ${file}`);
  }
  return fs.readFileSync(file, "utf-8");
}

/** Split `args` into positional values and `--flags`. */
export function splitArgs(args: string[]): { positional: string[]; flags: Set<string> } {
  const positional: string[] = [];
  const flags = new Set<string>();
  for (const arg of args) {
    if (arg.startsWith("--")) {
      flags.add(arg.slice(2));
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { PARSE_STRATEGIES, type ParseStrategy } from "../format/symbol";

export const CONFIG_FILE_NAME = "kicad-format.yml";

export const DEFAULT_INLINE_KEYWORDS: readonly string[] = ["at", "font", "size", "offset", "length", "xy", "color"];

export interface Config {
  /** The YAML file the settings came from, if one was found. */
  configPath: string | null;
  parser: ParseStrategy;
  indent: string;
  inlineKeywords: readonly string[];
}

let configCache: Config | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isParseStrategy(value: unknown): value is ParseStrategy {
  return PARSE_STRATEGIES.some((strategy) => strategy === value);
}

function findConfigFile(cwd: string): string | null {
  // 1. Env var
  if (process.env.KICAD_FORMAT_CONFIG) {
    const explicit = path.resolve(cwd, process.env.KICAD_FORMAT_CONFIG);
    if (fs.existsSync(explicit)) return explicit;
    console.warn(`⚠️  Config file not found: ${explicit}`);
    return null;
  }
  // 2. Default: kicad-format.yml in cwd
  const local = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(local) ? local : null;
}

function loadConfigFile(configPath: string): Record<string, unknown> {
  try {
    const content = yaml.load(fs.readFileSync(configPath, "utf-8"));
    if (content === undefined || content === null) return {};
    if (!isRecord(content)) {
      console.warn(`⚠️  Ignoring ${configPath}: expected a mapping at the top level`);
      return {};
    }
    return content;
  } catch (e) {
    console.warn(`⚠️  Failed to parse ${configPath}: ${e}`);
    return {};
  }
}

/**
 * Settings for the CLI, computed once. A YAML file supplies the base values
 * and `KICAD_FORMAT_PARSER` overrides the parse strategy.
 */
export function getConfig(): Config {
  if (configCache) return configCache;

  const cwd = process.env.INIT_CWD || process.cwd();
  const configPath = findConfigFile(cwd);
  const raw = configPath ? loadConfigFile(configPath) : {};

  let parser: ParseStrategy = "fast";
  if (raw.parser !== undefined) {
    if (isParseStrategy(raw.parser)) {
      parser = raw.parser;
    } else {
      console.warn(`⚠️  Unknown parser "${String(raw.parser)}" in config, using "${parser}"`);
    }
  }

  const envParser = process.env.KICAD_FORMAT_PARSER;
  if (envParser) {
    if (isParseStrategy(envParser)) {
      parser = envParser;
    } else {
      console.warn(`⚠️  Unknown KICAD_FORMAT_PARSER "${envParser}", using "${parser}"`);
    }
  }

  let indent = "\t";
  if (raw.indent !== undefined) {
    if (typeof raw.indent === "string" && /^[ \t]+$/.test(raw.indent)) {
      indent = raw.indent;
    } else {
      console.warn(`⚠️  indent must be a non-empty run of spaces or tabs, using a tab`);
    }
  }

  let inlineKeywords = DEFAULT_INLINE_KEYWORDS;
  if (raw.inlineKeywords !== undefined) {
    const value = raw.inlineKeywords;
    if (Array.isArray(value) && value.every((kw): kw is string => typeof kw === "string")) {
      inlineKeywords = value;
    } else {
      console.warn(`⚠️  inlineKeywords must be a list of strings, using the defaults`);
    }
  }

  configCache = { configPath, parser, indent, inlineKeywords };
  return configCache;
}

export function resetConfig(): void {
  configCache = null;
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_INLINE_KEYWORDS, getConfig, resetConfig } from "../cli/config";

const ENV_KEYS = ["INIT_CWD", "KICAD_FORMAT_CONFIG", "KICAD_FORMAT_PARSER"] as const;

describe("getConfig", () => {
  let tmpDir: string;
  let savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>>;

  beforeEach(() => {
    savedEnv = {};
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "kicad-format-config-"));
    process.env.INIT_CWD = tmpDir;
    resetConfig();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
    resetConfig();
    vi.restoreAllMocks();
  });

  it("falls back to defaults without a config file", () => {
    expect(getConfig()).toEqual({
      configPath: null,
      parser: "fast",
      indent: "\t",
      inlineKeywords: DEFAULT_INLINE_KEYWORDS,
    });
  });

  it("reads kicad-format.yml from the working directory", () => {
    fs.writeFileSync(path.join(tmpDir, "kicad-format.yml"), 'parser: owned\nindent: "  "\ninlineKeywords: [at, xy]\n');
    expect(getConfig()).toEqual({
      configPath: path.join(tmpDir, "kicad-format.yml"),
      parser: "owned",
      indent: "  ",
      inlineKeywords: ["at", "xy"],
    });
  });

  it("lets KICAD_FORMAT_PARSER override the file", () => {
    fs.writeFileSync(path.join(tmpDir, "kicad-format.yml"), "parser: owned\n");
    process.env.KICAD_FORMAT_PARSER = "fast";
    expect(getConfig().parser).toBe("fast");
  });

  it("reads the file named by KICAD_FORMAT_CONFIG", () => {
    fs.writeFileSync(path.join(tmpDir, "custom.yml"), "parser: owned\n");
    process.env.KICAD_FORMAT_CONFIG = "custom.yml";
    const config = getConfig();
    expect(config.configPath).toBe(path.join(tmpDir, "custom.yml"));
    expect(config.parser).toBe("owned");
  });

  it("warns about a missing explicit config file", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env.KICAD_FORMAT_CONFIG = "missing.yml";
    expect(getConfig().configPath).toBeNull();
    expect(warn).toHaveBeenCalledWith(`⚠️  Config file not found: ${path.join(tmpDir, "missing.yml")}`);
  });

  it("warns about invalid values and keeps the defaults", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(tmpDir, "kicad-format.yml"), "parser: turbo\nindent: 4\ninlineKeywords: at\n");
    process.env.KICAD_FORMAT_PARSER = "slow";
    expect(getConfig()).toMatchObject({ parser: "fast", indent: "\t", inlineKeywords: DEFAULT_INLINE_KEYWORDS });
    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith('⚠️  Unknown parser "turbo" in config, using "fast"');
    expect(warn).toHaveBeenCalledWith('⚠️  Unknown KICAD_FORMAT_PARSER "slow", using "fast"');
  });

  it("ignores a file that is not valid YAML", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(tmpDir, "kicad-format.yml"), "parser: [owned\n");
    expect(getConfig().parser).toBe("fast");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("caches the result until reset", () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    process.env.KICAD_FORMAT_PARSER = "owned";
    expect(getConfig().parser).toBe("fast");
    resetConfig();
    expect(getConfig().parser).toBe("owned");
  });
});

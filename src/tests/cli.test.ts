import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { loadConfig, parseConfigFile } from "../cli/config";
import { parseArgs } from "../cli/utils";
import { ValidationError } from "../kicad/errors";

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Config ──────────────────────────────────────────────────────────

describe("parseConfigFile", () => {
  it("fills in defaults for an empty file", () => {
    expect(parseConfigFile("", "/work")).toEqual({
      symbolDirs: [],
      footprintDirs: [],
      variables: {},
      includeSystemLibraries: true,
      paper: "A4",
      generator: "eeschema",
    });
  });

  it("resolves directories against the file's location", () => {
    const config = parseConfigFile(
      ["symbolDirs:", "  - libs/symbols", "  - /opt/symbols", "variables:", "  VENDOR: /opt/vendor", "paper: A3"].join("\n"),
      "/work/project",
    );
    expect(config.symbolDirs).toEqual(["/work/project/libs/symbols", "/opt/symbols"]);
    expect(config.variables).toEqual({ VENDOR: "/opt/vendor" });
    expect(config.paper).toBe("A3");
  });

  it("names the offending keys", () => {
    expect(() => parseConfigFile("symbolDirs: libs", "/work")).toThrow(
      "Invalid eda-files.yml: symbolDirs: Expected array, received string",
    );
    expect(() => parseConfigFile("symbolDir: [libs]", "/work")).toThrow(ValidationError);
  });
});

describe("loadConfig", () => {
  it("reads eda-files.yml from the working directory and puts environment directories first", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "eda-files-cfg-"));
    fs.writeFileSync(path.join(dir, "eda-files.yml"), "footprintDirs: [fp]\nincludeSystemLibraries: false\n");

    const config = loadConfig(dir, { EDA_FILES_FOOTPRINT_DIRS: ["env-fp", "/abs/fp"].join(path.delimiter) });
    expect(config.configPath).toBe(path.join(dir, "eda-files.yml"));
    expect(config.projectRoot).toBe(dir);
    expect(config.includeSystemLibraries).toBe(false);
    expect(config.footprintDirs).toEqual([path.join(dir, "env-fp"), "/abs/fp", path.join(dir, "fp")]);
    expect(config.symbolDirs).toEqual([]);
  });

  it("warns when the configured file is missing and uses defaults", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "eda-files-cfg-"));

    const config = loadConfig(dir, { EDA_FILES_CONFIG: "missing.yml" });
    expect(config.configPath).toBeUndefined();
    expect(config.generator).toBe("eeschema");
    expect(warn).toHaveBeenCalledWith(`⚠️  Config file ${path.join(dir, "missing.yml")} does not exist, using defaults`);
  });
});

// ─── Arguments ───────────────────────────────────────────────────────

describe("parseArgs", () => {
  it("separates flags with values, switches and positionals", () => {
    const { positional, flags } = parseArgs(["add-symbol", "a.kicad_sch", "--lib-id", "Device:R", "--dry", "--x", "10"]);
    expect(positional).toEqual(["add-symbol", "a.kicad_sch"]);
    expect([...flags]).toEqual([
      ["lib-id", "Device:R"],
      ["dry", true],
      ["x", "10"],
    ]);
  });
});

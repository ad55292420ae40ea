import { describe, it, expect } from "vitest";
import * as path from "path";
import { FootprintLibrary, filterToRegExp } from "../kicad/FootprintLibrary";
import { childValue } from "../kicad/SExprTree";
import { NotFoundError, ValidationError } from "../kicad/errors";

const ASSETS = path.join(__dirname, "assets");
const FOOTPRINTS = path.join(ASSETS, "footprints");

function library(): FootprintLibrary {
  return new FootprintLibrary({ footprintDirs: [FOOTPRINTS], includeSystem: false });
}

describe("filterToRegExp", () => {
  it("turns wildcards into an anchored pattern", () => {
    const re = filterToRegExp("R_*");
    expect(re.test("R_0603_1608Metric")).toBe(true);
    expect(re.test("r_0805")).toBe(true);
    expect(re.test("CR_0603")).toBe(false);
  });

  it("matches one character for ? and escapes the rest", () => {
    expect(filterToRegExp("C_060?").test("C_0603")).toBe(true);
    expect(filterToRegExp("C_060?").test("C_06031")).toBe(false);
    expect(filterToRegExp("SOT.23").test("SOTx23")).toBe(false);
  });
});

describe("FootprintLibrary", () => {
  it("lists .pretty directories and their footprints", () => {
    const lib = library();
    expect([...lib.listLibraries().keys()]).toEqual(["Capacitor_SMD", "Resistor_SMD"]);
    expect(lib.listFootprints("Resistor_SMD")).toEqual(["R_0603_1608Metric", "R_0805_2012Metric"]);
    expect(lib.listFootprints("Nope")).toEqual([]);
  });

  it("loads a footprint by id", () => {
    const fp = library().load("Resistor_SMD:R_0603_1608Metric");
    expect(childValue(fp, "descr")).toBe("SMD test footprint");
  });

  it("reports bad ids, missing libraries and missing footprints", () => {
    const lib = library();
    expect(() => lib.load("R_0603")).toThrow(ValidationError);
    expect(() => lib.load("Nope:R_0603")).toThrow("library not found: Nope");
    expect(() => lib.load("Resistor_SMD:R_1206")).toThrow(NotFoundError);
  });

  it("reads the project footprint table", () => {
    const lib = new FootprintLibrary({ projectDir: path.join(ASSETS, "project"), includeSystem: false });
    expect([...lib.listLibraries().keys()]).toEqual(["Resistor_SMD"]);
    expect(lib.listFootprints("Resistor_SMD")).toHaveLength(2);
  });

  it("finds footprints by part of their name", () => {
    expect(library().search("0603")).toEqual([
      { footprint: "Capacitor_SMD:C_0603_1608Metric", library: "Capacitor_SMD", name: "C_0603_1608Metric" },
      { footprint: "Resistor_SMD:R_0603_1608Metric", library: "Resistor_SMD", name: "R_0603_1608Metric" },
    ]);
    expect(library().search("r_08").map(m => m.footprint)).toEqual(["Resistor_SMD:R_0805_2012Metric"]);
    expect(library().search("metric", 2)).toHaveLength(2);
    expect(library().search("QFN")).toEqual([]);
  });

  it("describes a footprint and its pads", () => {
    const info = library().getFootprintInfo("Resistor_SMD:R_0603_1608Metric");
    expect(info).toEqual({
      footprint: "Resistor_SMD:R_0603_1608Metric",
      library: "Resistor_SMD",
      name: "R_0603_1608Metric",
      file: path.join(FOOTPRINTS, "Resistor_SMD.pretty", "R_0603_1608Metric.kicad_mod"),
      description: "SMD test footprint",
      keywords: "",
      attributes: ["smd"],
      pads: [
        { number: "1", type: "smd", shape: "roundrect", x: -0.825, y: 0, layers: ["F.Cu", "F.Mask", "F.Paste"] },
        { number: "2", type: "smd", shape: "roundrect", x: 0.825, y: 0, layers: ["F.Cu", "F.Mask", "F.Paste"] },
      ],
      padCount: 2,
      smd: true,
    });
    expect(() => library().getFootprintInfo("Resistor_SMD:R_1206")).toThrow(NotFoundError);
  });

  it("suggests footprints matching symbol filters", () => {
    expect(library().suggest(["R_*"])).toEqual([
      { footprint: "Resistor_SMD:R_0603_1608Metric", library: "Resistor_SMD", name: "R_0603_1608Metric", filter: "R_*" },
      { footprint: "Resistor_SMD:R_0805_2012Metric", library: "Resistor_SMD", name: "R_0805_2012Metric", filter: "R_*" },
    ]);
    expect(library().suggest(["Capacitor_SMD:*"]).map(s => s.footprint)).toEqual(["Capacitor_SMD:C_0603_1608Metric"]);
    expect(library().suggest(["*0603*"], 1).map(s => s.footprint)).toEqual(["Capacitor_SMD:C_0603_1608Metric"]);
    expect(library().suggest([])).toEqual([]);
  });
});

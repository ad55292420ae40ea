import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { FileBackend } from "../backend/FileBackend";
import { NotFoundError, StructuralInvariantViolationError, ValidationError } from "../kicad/errors";

const ASSETS = path.join(__dirname, "assets");

let tmpDir: string;
let schPath: string;
let pcbPath: string;
let backend: FileBackend;

function sheetFile(sheets: [string, string][]): string {
  const blocks = sheets.map(
    ([name, file], i) => `	(sheet
		(at 10 ${10 + i * 20})
		(size 20 10)
		(uuid "00000000-0000-4000-8000-0000000001${String(i).padStart(2, "0")}")
		(property "Sheetname" "${name}"
			(at 10 ${9 + i * 20} 0)
		)
		(property "Sheetfile" "${file}"
			(at 10 ${21 + i * 20} 0)
		)
	)
`,
  );
  return `(kicad_sch
	(version 20250114)
	(generator "eeschema")
	(uuid "00000000-0000-4000-8000-000000000001")
	(paper "A4")
	(lib_symbols)
${blocks.join("")})
`;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "eda-files-backend-"));
  schPath = path.join(tmpDir, "sample.kicad_sch");
  pcbPath = path.join(tmpDir, "sample.kicad_pcb");
  fs.copyFileSync(path.join(ASSETS, "project", "sample.kicad_sch"), schPath);
  fs.copyFileSync(path.join(ASSETS, "project", "sample.kicad_pcb"), pcbPath);
  backend = new FileBackend({
    includeSystemLibraries: false,
    symbolDirs: [path.join(ASSETS, "symbols")],
    footprintDirs: [path.join(ASSETS, "footprints")],
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Connectivity on the sample ──────────────────────────────────────

describe("FileBackend connectivity", () => {
  it("places pins from the cached definition", () => {
    expect(backend.getPinPositions(schPath, "R1")).toEqual([
      {
        reference: "R1",
        unit: 1,
        pins: [
          { number: "1", name: "~", x: 100, y: 96.19, rotation: 270, electricalType: "passive" },
          { number: "2", name: "~", x: 100, y: 103.81, rotation: 90, electricalType: "passive" },
        ],
      },
    ]);
    expect(() => backend.getPinPositions(schPath, "R42")).toThrow(NotFoundError);
  });

  it("resolves pin nets through labels and power symbols", () => {
    expect(backend.getPinNet(schPath, "R1", "1")).toEqual({ connected: true, reference: "R1", pin: "1", net: "VIN", explicit: true });
    expect(backend.getPinNet(schPath, "R2", "1")).toEqual({ connected: true, reference: "R2", pin: "1", net: "VIN", explicit: true });
    expect(backend.getPinNet(schPath, "R1", "2")).toEqual({ connected: true, reference: "R1", pin: "2", net: "GND", explicit: true });
    expect(backend.getPinNet(schPath, "R2", "2")).toEqual({ connected: false, reference: "R2", pin: "2", noConnect: true });
    expect(backend.getPinNet(schPath, "R3", "1")).toEqual({ connected: false, reference: "R3", pin: "1", noConnect: false });
  });

  it("lists nets and their members", () => {
    expect(backend.listNets(schPath).map(n => n.net)).toEqual(["GND", "VIN"]);
    const vin = backend.getNetMembers(schPath, "VIN");
    expect(vin.pins).toEqual([
      { reference: "R1", pin: "1" },
      { reference: "R2", pin: "1" },
    ]);
    expect(vin.labels.map(l => l.text)).toEqual(["VIN"]);
    expect(() => backend.getNetMembers(schPath, "VCC")).toThrow("net not found: VCC");
  });

  it("validates the sample with warnings only", () => {
    expect(backend.validateSchematic(schPath)).toEqual({
      valid: true,
      errors: [],
      warnings: [
        { severity: "warning", rule: "missing_field", message: "R3 has no dnp", reference: "R3" },
        { severity: "warning", rule: "missing_field", message: "R3 has no instances", reference: "R3" },
        {
          severity: "warning",
          rule: "pin_unconnected",
          message: "R3 pin 1 is not connected",
          reference: "R3",
          position: { x: 140, y: 96.19 },
        },
        {
          severity: "warning",
          rule: "pin_unconnected",
          message: "R3 pin 2 is not connected",
          reference: "R3",
          position: { x: 140, y: 103.81 },
        },
      ],
    });
  });

  it("flags a reference shared by two different symbols", () => {
    const text = fs.readFileSync(schPath, "utf-8");
    const mixed = text
      .replace('(lib_id "Device:R")\n\t\t(at 120 100 0)\n\t\t(unit 1)', '(lib_id "Device:C")\n\t\t(at 120 100 0)\n\t\t(unit 2)')
      .replace('(property "Reference" "R2"', '(property "Reference" "R1"');
    expect(mixed).not.toBe(text);
    fs.writeFileSync(schPath, mixed);

    const report = backend.validateSchematic(schPath);
    expect(report.valid).toBe(false);
    expect(report.errors.filter(e => e.rule === "duplicate_reference")).toEqual([
      {
        severity: "error",
        rule: "duplicate_reference",
        message: "R1 names both Device:R and Device:C",
        reference: "R1",
        position: { x: 120, y: 100, rotation: 0, mirror: undefined },
      },
    ]);
  });

  it("warns about a power symbol connected to nothing", () => {
    const file = path.join(tmpDir, "power.kicad_sch");
    backend.createSchematic(file);
    backend.addPowerSymbol(file, { name: "GND", x: 20, y: 30 });
    expect(backend.validateSchematic(file)).toEqual({
      valid: true,
      errors: [],
      warnings: [
        {
          severity: "warning",
          rule: "power_unconnected",
          message: "Power symbol #PWR001 (GND) is connected to nothing",
          reference: "#PWR001",
          position: { x: 20, y: 30 },
        },
      ],
    });

    backend.addWire(file, { x: 20, y: 30 }, { x: 20, y: 40 });
    expect(backend.validateSchematic(file).warnings).toEqual([]);
  });

  it("reports conflicting names as validation errors", () => {
    backend.addLabel(schPath, { text: "VOUT", x: 115, y: 96.19 });
    const report = backend.validateSchematic(schPath);
    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      { severity: "error", rule: "conflicting_net_names", message: "Connected names disagree: VIN, VOUT" },
    ]);
  });
});

// ─── Editing through the backend ─────────────────────────────────────

describe("FileBackend editing", () => {
  it("builds a small circuit in a new schematic", () => {
    const file = path.join(tmpDir, "new.kicad_sch");
    expect(backend.createSchematic(file).symbols).toEqual([]);

    const placed = backend.addSymbol(file, { libId: "Device:R_Pack", reference: "RN1", value: "10k", x: 50.8, y: 50.8 });
    expect(placed).toMatchObject({ reference: "RN1", unit: 1, cached: true });
    expect(placed.uuid).toMatch(/^[0-9a-f-]{36}$/);

    const power = backend.addPowerSymbol(file, { name: "GND", x: 50.8, y: 60 });
    expect(power).toMatchObject({ reference: "#PWR001", unit: 1, cached: true });
    backend.addWire(file, { x: 50.8, y: 54.61 }, { x: 50.8, y: 60 });

    const [unit] = backend.getPinPositions(file, "RN1");
    expect(unit.pins.map(p => [p.number, p.x, p.y])).toEqual([
      ["1", 50.8, 46.99],
      ["2", 50.8, 54.61],
    ]);
    expect(backend.getPinNet(file, "RN1", "2")).toMatchObject({ connected: true, net: "GND" });

    const snapshot = backend.readSchematic(file);
    expect(Object.keys(snapshot)).not.toContain("reader");
    expect(snapshot.libSymbols.map(s => s.libId)).toEqual(["Device:R_Pack", "power:GND"]);
    expect(snapshot.symbols[0].missingFields).toEqual([]);
    expect(backend.validateSchematic(file).errors).toEqual([]);
  });

  it("reuses the cache for a second instance of the same symbol", () => {
    expect(backend.addSymbol(schPath, { libId: "Device:R", reference: "R4", value: "1k", x: 160, y: 100 }).cached).toBe(false);
    expect(backend.readSchematic(schPath).libSymbols).toHaveLength(2);
  });

  it("shifts every pin by the distance a symbol moves", () => {
    const before = backend.getPinPositions(schPath, "R1")[0].pins;
    const moved = backend.moveSymbol(schPath, "R1", { x: 105.08, y: 102.54 });
    expect(moved.pins.map(p => [p.number, p.x, p.y, p.rotation])).toEqual([
      ["1", 105.08, 98.73, 270],
      ["2", 105.08, 106.35, 90],
    ]);
    expect(before.map(p => [p.number, p.x + 5.08, p.y + 2.54, p.rotation])).toEqual(
      moved.pins.map(p => [p.number, expect.closeTo(p.x, 9), expect.closeTo(p.y, 9), p.rotation]),
    );
  });

  it("rejects a second unit from another symbol and keeps the file", () => {
    const before = fs.readFileSync(schPath, "utf-8");
    expect(() => backend.addSymbol(schPath, { libId: "Device:C", reference: "R1", value: "1u", x: 0, y: 0, unit: 2 })).toThrow(
      StructuralInvariantViolationError,
    );
    expect(fs.readFileSync(schPath, "utf-8")).toBe(before);
  });

  it("moves a symbol and returns its new pins", () => {
    const moved = backend.moveSymbol(schPath, "R3", { x: 150, y: 100, rotation: 90 });
    expect(moved.pins.map(p => [p.number, p.x, p.y, p.rotation])).toEqual([
      ["1", 146.19, 100, 0],
      ["2", 153.81, 100, 180],
    ]);
  });

  it("leaves the file untouched when an edit fails", () => {
    const before = fs.readFileSync(schPath, "utf-8");
    expect(() => backend.addSymbol(schPath, { libId: "Device:Missing", reference: "R9", value: "1", x: 0, y: 0 })).toThrow(
      NotFoundError,
    );
    expect(() => backend.addSymbol(schPath, { libId: "Device:R", reference: "R1", value: "1", x: 0, y: 0 })).toThrow(
      ValidationError,
    );
    expect(() => backend.removeWire(schPath, { x: 0, y: 0 }, { x: 1, y: 0 })).toThrow(NotFoundError);
    expect(fs.readFileSync(schPath, "utf-8")).toBe(before);
  });

  it("updates and removes symbols", () => {
    expect(backend.updateSymbol(schPath, "R2", { value: "4k99", reference: "R20" })).toEqual({ reference: "R20", units: 1 });
    expect(backend.removeSymbol(schPath, "R3")).toEqual({ removed: 1 });
    expect(backend.readSchematic(schPath).symbols.map(s => [s.reference, s.value])).toEqual([
      ["R1", "10k"],
      ["R20", "4k99"],
      ["#PWR01", "GND"],
    ]);
  });
});

// ─── Sheets ──────────────────────────────────────────────────────────

describe("FileBackend.getSheetHierarchy", () => {
  it("walks sub-sheets and marks missing files", () => {
    const root = path.join(tmpDir, "root.kicad_sch");
    fs.writeFileSync(root, sheetFile([["Power", "power.kicad_sch"]]));
    fs.writeFileSync(path.join(tmpDir, "power.kicad_sch"), sheetFile([["Gone", "missing.kicad_sch"]]));

    expect(backend.getSheetHierarchy(root)).toEqual({
      name: "root",
      path: root,
      exists: true,
      sheets: [
        {
          name: "Power",
          path: path.join(tmpDir, "power.kicad_sch"),
          exists: true,
          sheets: [{ name: "Gone", path: path.join(tmpDir, "missing.kicad_sch"), exists: false, sheets: [] }],
        },
      ],
    });
  });

  it("rejects a sheet that includes its ancestor", () => {
    const a = path.join(tmpDir, "a.kicad_sch");
    fs.writeFileSync(a, sheetFile([["B", "b.kicad_sch"]]));
    fs.writeFileSync(path.join(tmpDir, "b.kicad_sch"), sheetFile([["A", "a.kicad_sch"]]));
    expect(() => backend.getSheetHierarchy(a)).toThrow(StructuralInvariantViolationError);
  });
});

// ─── Libraries ───────────────────────────────────────────────────────

describe("FileBackend libraries", () => {
  it("looks up symbols and searches", () => {
    expect(backend.resolveLibrarySymbol("Device:R").description).toBe("Resistor");
    expect(backend.searchSymbols("amplifier")).toEqual([{ libId: "Device:OpAmp_Dual", description: "Dual operational amplifier" }]);
  });

  it("suggests footprints from the symbol's filters", () => {
    expect(backend.suggestFootprints("Device:R").map(s => s.footprint)).toEqual([
      "Resistor_SMD:R_0603_1608Metric",
      "Resistor_SMD:R_0805_2012Metric",
    ]);
    expect(backend.suggestFootprints("Device:C")).toEqual([
      { footprint: "Capacitor_SMD:C_0603_1608Metric", library: "Capacitor_SMD", name: "C_0603_1608Metric", filter: "C_*" },
    ]);
  });

  it("puts a default footprint outside the filters first", () => {
    const libDir = fs.mkdtempSync(path.join(os.tmpdir(), "eda-files-extra-"));
    fs.writeFileSync(
      path.join(libDir, "Extra.kicad_sym"),
      `(kicad_symbol_lib
	(version 20241209)
	(symbol "Fuse"
		(property "Footprint" "Fuse:Fuse_1206"
			(at 0 0 0)
		)
		(property "ki_fp_filters" "R_0805*"
			(at 0 0 0)
		)
		(symbol "Fuse_1_1"
			(pin passive line (at 0 3.81 270) (length 1.27) (name "~") (number "1"))
		)
	)
)
`,
    );
    const extra = new FileBackend({
      includeSystemLibraries: false,
      symbolDirs: [libDir],
      footprintDirs: [path.join(ASSETS, "footprints")],
    });
    expect(extra.suggestFootprints("Extra:Fuse")).toEqual([
      { footprint: "Fuse:Fuse_1206", library: "Fuse", name: "Fuse_1206", filter: "(default)" },
      { footprint: "Resistor_SMD:R_0805_2012Metric", library: "Resistor_SMD", name: "R_0805_2012Metric", filter: "R_0805*" },
    ]);
  });
});

// ─── Boards ──────────────────────────────────────────────────────────

describe("FileBackend boards", () => {
  it("reads and validates the sample board", () => {
    const board = backend.readBoard(pcbPath);
    expect(board.footprints[0].pads[0].position).toEqual({ x: 50, y: 50.825 });
    const report = backend.validateBoard(pcbPath);
    expect(report.valid).toBe(false);
    expect(report.errors.map(e => [e.rule, e.reference])).toEqual([["pad_net_undeclared", "R9"]]);

    backend.assignNet(pcbPath, "R9", "1", "OUT");
    expect(backend.validateBoard(pcbPath).valid).toBe(true);
  });

  it("places a footprint from the library, or a shell with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(
      backend.placeFootprint(pcbPath, { footprintId: "Capacitor_SMD:C_0603_1608Metric", reference: "C1", value: "100n", x: 80, y: 50 }),
    ).toEqual({ reference: "C1", fromLibrary: true });
    expect(backend.placeFootprint(pcbPath, { footprintId: "Nope:X", reference: "J1", value: "CONN", x: 90, y: 50 })).toEqual({
      reference: "J1",
      fromLibrary: false,
    });
    expect(warn).toHaveBeenCalledWith("⚠️  Nope:X not found in any footprint library; placing J1 without pads");

    const footprints = backend.readBoard(pcbPath).footprints;
    expect(footprints.map(f => [f.reference, f.pads.length])).toEqual([
      ["R1", 2],
      ["R9", 2],
      ["C1", 2],
      ["J1", 0],
    ]);
  });

  it("routes tracks and vias", () => {
    backend.addTrack(pcbPath, { start: { x: 40, y: 50 }, end: { x: 40, y: 60 }, net: "VIN", width: 0.5 });
    backend.addVia(pcbPath, { x: 40, y: 60, net: "VIN" });
    const board = backend.readBoard(pcbPath);
    expect(board.tracks.map(t => [t.net, t.width])).toEqual([
      [1, 0.25],
      [1, 0.5],
    ]);
    expect(board.vias.map(v => v.position)).toEqual([{ x: 40, y: 60 }]);
  });

  it("compares the schematic with the board", () => {
    expect(backend.compareSchematicBoard(schPath, pcbPath)).toEqual({
      missingFromBoard: [{ reference: "R2", value: "4k7", footprint: "Resistor_SMD:R_0603_1608Metric" }],
      missingFromSchematic: [{ reference: "R9", value: "1k", footprint: "Resistor_SMD:R_0805_2012Metric" }],
      footprintMismatches: [],
      valueMismatches: [{ reference: "R1", schematic: "10k", board: "22k" }],
      matched: ["R1"],
    });
  });

  it("syncs the board and saves it", () => {
    const result = backend.syncSchematicToBoard(schPath, pcbPath);
    expect(result.placed.map(p => [p.reference, p.fromLibrary])).toEqual([["R2", true]]);

    const board = backend.readBoard(pcbPath);
    expect(board.footprints.map(f => [f.reference, f.value, f.position.x, f.position.y])).toEqual([
      ["R1", "10k", 50, 50],
      ["R9", "1k", 60, 50],
      ["R2", "4k7", 70.16, 50],
    ]);
    expect(backend.compareSchematicBoard(schPath, pcbPath).missingFromBoard).toEqual([]);
  });

  it("creates boards and moves, relabels and removes footprints", () => {
    const file = path.join(tmpDir, "blank.kicad_pcb");
    expect(backend.createBoard(file).footprints).toEqual([]);
    expect(() => backend.createBoard(file)).toThrow("Refusing to overwrite existing file");

    backend.moveFootprint(pcbPath, "R9", { x: 70, y: 40, rotation: 270 });
    backend.setFootprintProperty(pcbPath, "R9", "Value", "2k2");
    backend.removeFootprint(pcbPath, "R1");
    expect(backend.readBoard(pcbPath).footprints.map(f => [f.reference, f.value, f.position])).toEqual([
      ["R9", "2k2", { x: 70, y: 40, rotation: 270 }],
    ]);
  });
});

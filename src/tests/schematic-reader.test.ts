import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { SchematicDocument } from "../kicad/SchematicDocument";
import { readSchematic, readWithFallback, StrictSchematicReader, TolerantSchematicReader } from "../kicad/SchematicReader";
import { StructuralInvariantViolationError } from "../kicad/errors";

const SAMPLE = path.join(__dirname, "assets", "project", "sample.kicad_sch");

const BROKEN = `(kicad_sch
	(version 20250114)
	(generator "eeschema")
	(uuid "00000000-0000-4000-8000-0000000000aa")
	(lib_symbols)
	(symbol
		(lib_id "Device:R")
		(unit 1)
		(property "Reference" "R7"
			(at 0 0 0)
		)
	)
	(symbol
		(lib_id "Device:R")
		(at 10 10 0)
		(property "Reference" "R8"
			(at 10 8 0)
		)
		(property "Value" "1k"
			(at 10 12 0)
		)
	)
)
`;

const EXTENDS_ONLY = `(kicad_sch
	(version 20250114)
	(lib_symbols
		(symbol "Device:R_Pack"
			(extends "R")
			(property "Reference" "RN"
				(at 0 0 0)
			)
		)
	)
)
`;

afterEach(() => {
  vi.restoreAllMocks();
});

describe("readSchematic", () => {
  it("reads the sample with the strict reader", () => {
    const { snapshot, reader } = readWithFallback(SchematicDocument.load(SAMPLE));

    expect(reader).toBe("strict");
    expect(Object.keys(snapshot)).not.toContain("reader");
    expect(snapshot.uuid).toBe("0b6c1f2e-0000-4000-8000-000000000001");
    expect(snapshot.version).toBe("20250114");
    expect(snapshot.paper).toBe("A4");
    expect(snapshot.titleBlock).toEqual({
      title: "Divider",
      date: undefined,
      revision: "A",
      company: undefined,
      comments: [],
    });
    expect(snapshot.symbols.map(s => s.reference)).toEqual(["R1", "R2", "R3", "#PWR01"]);
    expect(snapshot.wires.map(w => [w.start, w.end])).toEqual([
      [{ x: 100, y: 96.19 }, { x: 120, y: 96.19 }],
      [{ x: 100, y: 103.81 }, { x: 100, y: 110 }],
    ]);
    expect(snapshot.labels).toEqual([
      {
        kind: "label",
        text: "VIN",
        position: { x: 110, y: 96.19 },
        rotation: 0,
        shape: undefined,
        uuid: "0b6c1f2e-0000-4000-8000-000000000030",
      },
    ]);
    expect(snapshot.junctions.map(j => j.position)).toEqual([{ x: 110, y: 96.19 }]);
    expect(snapshot.noConnects.map(n => n.position)).toEqual([{ x: 120, y: 103.81 }]);
    expect(snapshot.unrenderable).toEqual([]);
  });

  it("reads instance fields and notes the ones that are missing", () => {
    const { symbols } = readSchematic(SchematicDocument.load(SAMPLE));
    const [r1, , r3] = symbols;

    expect(r1.footprint).toBe("Resistor_SMD:R_0603_1608Metric");
    expect(r1.instances).toEqual([
      { project: "sample", path: "/0b6c1f2e-0000-4000-8000-000000000001", reference: "R1", unit: 1 },
    ]);
    expect(r1.missingFields).toEqual([]);

    expect(r3.footprint).toBeUndefined();
    expect(r3.inBom).toBe(false);
    expect(r3.onBoard).toBe(false);
    expect(r3.dnp).toBe(false);
    expect(r3.missingFields).toEqual(["dnp", "instances"]);
  });

  it("reads the lib_symbols cache", () => {
    const { libSymbols } = readSchematic(SchematicDocument.load(SAMPLE));
    expect(libSymbols.map(s => [s.libId, s.isPower, s.pins.map(p => p.number)])).toEqual([
      ["Device:R", false, ["1", "2"]],
      ["power:GND", true, ["1"]],
    ]);
    expect(libSymbols[1].pins[0]).toMatchObject({ name: "GND", electricalType: "power_in", hidden: true });
  });

  it("falls back to the tolerant reader and skips what it cannot model", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const doc = SchematicDocument.parse(BROKEN);

    expect(() => new StrictSchematicReader().read(doc)).toThrow("Placed symbol R7 lacks lib_id, position or reference");

    const { snapshot, reader } = readWithFallback(doc);
    expect(reader).toBe("tolerant");
    expect(snapshot.symbols.map(s => s.reference)).toEqual(["R8"]);
    expect(snapshot.symbols[0].missingFields).toEqual(["unit", "in_bom", "on_board", "dnp", "instances"]);
    expect(snapshot.unrenderable).toEqual(["R8"]);
    expect(warn).toHaveBeenCalledWith("⚠️  Placed symbol R7 lacks lib_id, position or reference; skipped");
  });

  it("reads a cache entry that only extends another through the tolerant reader", () => {
    const doc = SchematicDocument.parse(EXTENDS_ONLY);
    expect(() => new StrictSchematicReader().read(doc)).toThrow(
      "Cached symbol Device:R_Pack only extends R and carries no units",
    );

    const { snapshot, reader } = readWithFallback(doc);
    expect(reader).toBe("tolerant");
    expect(readSchematic(doc)).toEqual(snapshot);
    expect(snapshot.libSymbols).toMatchObject([{ libId: "Device:R_Pack", extends: "R", pins: [] }]);
  });

  it("names every reader when all of them fail", () => {
    const doc = SchematicDocument.parse(BROKEN);
    const readers = [new StrictSchematicReader()];
    expect(() => readSchematic(doc, readers)).toThrow(StructuralInvariantViolationError);
    expect(() => readSchematic(doc, readers)).toThrow(
      "Schematic could not be read: strict: Placed symbol R7 lacks lib_id, position or reference",
    );
  });

  it("reads every schematic the tolerant reader is given", () => {
    const text = fs.readFileSync(SAMPLE, "utf-8");
    const strict = new StrictSchematicReader().read(SchematicDocument.parse(text));
    const tolerant = new TolerantSchematicReader().read(SchematicDocument.parse(text));
    expect(tolerant).toEqual(strict);
  });
});

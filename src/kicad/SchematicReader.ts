import { SList } from "./SExpressionParser";
import { atomAt, childNumbers, childValue, findChild, findChildren, headOf, propertiesOf } from "./SExprTree";
import { SchematicDocument } from "./SchematicDocument";
import { EdaFileError, StructuralInvariantViolationError } from "./errors";
import { readCachedSymbol } from "./LibrarySymbol";
import {
  CachedSymbol,
  InstancePath,
  Label,
  LabelKind,
  Marker,
  Mirror,
  SchematicSnapshot,
  Sheet,
  SymbolInstance,
  TitleBlock,
  Wire,
} from "./types";

/**
 * Turns a schematic document into a typed snapshot. Two implementations
 * exist: the strict one models everything and rejects what it cannot model;
 * the tolerant one walks the raw tree and skips what it does not understand.
 */
export interface SchematicReader {
  readonly name: "strict" | "tolerant";
  read(doc: SchematicDocument): SchematicSnapshot;
}

const REQUIRED_FLAGS = ["unit", "in_bom", "on_board", "dnp"];

function flag(sym: SList, key: string, fallback: boolean): boolean {
  const value = childValue(sym, key);
  return value === undefined ? fallback : value === "yes";
}

function mirrorOf(sym: SList): Mirror | undefined {
  const value = childValue(sym, "mirror");
  return value === "x" || value === "y" ? value : undefined;
}

function readInstancePaths(sym: SList): InstancePath[] {
  const block = findChild(sym, "instances");
  if (!block) return [];
  const paths: InstancePath[] = [];
  for (const project of findChildren(block, "project")) {
    const projectName = atomAt(project, 1) ?? "";
    for (const p of findChildren(project, "path")) {
      paths.push({
        project: projectName,
        path: atomAt(p, 1) ?? "",
        reference: childValue(p, "reference") ?? "",
        unit: childNumbers(p, "unit")[0] ?? 1,
      });
    }
  }
  return paths;
}

function readSymbolInstance(sym: SList, strict: boolean): SymbolInstance | undefined {
  const libId = childValue(sym, "lib_id");
  const [x, y, rotation = 0] = childNumbers(sym, "at");
  const reference = SchematicDocument.referenceOf(sym);

  if (libId === undefined || x === undefined || y === undefined || reference === "") {
    const problem = `Placed symbol ${reference || "(unnamed)"} lacks lib_id, position or reference`;
    if (strict) throw new StructuralInvariantViolationError(problem, { reference });
    console.warn(`⚠️  ${problem}; skipped`);
    return undefined;
  }

  const properties = Object.fromEntries(propertiesOf(sym));
  const instances = readInstancePaths(sym);
  const missingFields = REQUIRED_FLAGS.filter(key => findChild(sym, key) === undefined);
  if (instances.length === 0) missingFields.push("instances");

  return {
    libId,
    reference,
    value: properties["Value"] ?? "",
    footprint: properties["Footprint"] || undefined,
    unit: SchematicDocument.unitOf(sym),
    position: { x, y, rotation, mirror: mirrorOf(sym) },
    inBom: flag(sym, "in_bom", true),
    onBoard: flag(sym, "on_board", true),
    dnp: flag(sym, "dnp", false),
    excludeFromSim: flag(sym, "exclude_from_sim", false),
    uuid: childValue(sym, "uuid"),
    properties,
    instances,
    missingFields,
  };
}

function readWire(wire: SList): Wire | undefined {
  const ends = SchematicDocument.wireEnds(wire);
  if (!ends) return undefined;
  return { start: ends[0], end: ends[1], uuid: childValue(wire, "uuid") };
}

function readLabel(label: SList): Label | undefined {
  const [x, y, rotation = 0] = childNumbers(label, "at");
  const text = atomAt(label, 1);
  const kind = headOf(label);
  if (x === undefined || y === undefined || text === undefined) return undefined;
  if (kind !== "label" && kind !== "global_label" && kind !== "hierarchical_label") return undefined;
  const labelKind: LabelKind = kind;
  return {
    kind: labelKind,
    text,
    position: { x, y },
    rotation,
    shape: childValue(label, "shape"),
    uuid: childValue(label, "uuid"),
  };
}

function readMarker(marker: SList): Marker | undefined {
  const [x, y] = childNumbers(marker, "at");
  if (x === undefined || y === undefined) return undefined;
  return { position: { x, y }, uuid: childValue(marker, "uuid") };
}

function readSheet(sheet: SList): Sheet {
  const props = propertiesOf(sheet);
  const [x = 0, y = 0] = childNumbers(sheet, "at");
  const [width = 0, height = 0] = childNumbers(sheet, "size");
  return {
    name: props.get("Sheetname") ?? props.get("Sheet name") ?? "",
    file: props.get("Sheetfile") ?? props.get("Sheet file") ?? "",
    position: { x, y },
    size: { width, height },
    uuid: childValue(sheet, "uuid"),
    pins: findChildren(sheet, "pin").map(pin => {
      const [px = 0, py = 0] = childNumbers(pin, "at");
      return { name: atomAt(pin, 1) ?? "", shape: atomAt(pin, 2) ?? "", position: { x: px, y: py } };
    }),
  };
}

export function readTitleBlock(root: SList): TitleBlock | undefined {
  const block = findChild(root, "title_block");
  if (!block) return undefined;
  return {
    title: childValue(block, "title"),
    date: childValue(block, "date"),
    revision: childValue(block, "rev"),
    company: childValue(block, "company"),
    comments: findChildren(block, "comment").map(c => atomAt(c, 2) ?? ""),
  };
}

function compact<T>(items: (T | undefined)[]): T[] {
  return items.filter((item): item is T => item !== undefined);
}

function readDocument(doc: SchematicDocument, strict: boolean, readCache: (entry: SList) => CachedSymbol): SchematicSnapshot {
  const root = doc.root;
  const libSymbols = doc.cachedSymbols().map(readCache);
  const cachedIds = new Set(libSymbols.map(s => s.libId));
  const symbols = compact(doc.placedSymbols().map(sym => readSymbolInstance(sym, strict)));

  return {
    path: doc.path,
    uuid: childValue(root, "uuid"),
    version: childValue(root, "version"),
    generator: childValue(root, "generator"),
    paper: childValue(root, "paper"),
    titleBlock: readTitleBlock(root),
    symbols,
    wires: compact(doc.wires().map(readWire)),
    labels: compact(doc.labels().map(readLabel)),
    junctions: compact(findChildren(root, "junction").map(readMarker)),
    noConnects: compact(findChildren(root, "no_connect").map(readMarker)),
    sheets: findChildren(root, "sheet").map(readSheet),
    libSymbols,
    unrenderable: [...new Set(symbols.filter(s => !cachedIds.has(s.libId)).map(s => s.reference))],
  };
}

export class StrictSchematicReader implements SchematicReader {
  readonly name = "strict";

  read(doc: SchematicDocument): SchematicSnapshot {
    return readDocument(doc, true, entry => {
      const cached = readCachedSymbol(entry);
      // A cache entry must carry its own drawing; a bare `extends` needs the library to render.
      if (cached.extends !== undefined && findChildren(entry, "symbol").length === 0) {
        throw new StructuralInvariantViolationError(
          `Cached symbol ${cached.libId} only extends ${cached.extends} and carries no units`,
          { libId: cached.libId, construct: "extends" },
        );
      }
      return cached;
    });
  }
}

export class TolerantSchematicReader implements SchematicReader {
  readonly name = "tolerant";

  read(doc: SchematicDocument): SchematicSnapshot {
    return readDocument(doc, false, readCachedSymbol);
  }
}

const defaultReaders: SchematicReader[] = [new StrictSchematicReader(), new TolerantSchematicReader()];

export interface ReaderOutcome {
  snapshot: SchematicSnapshot;
  reader: SchematicReader["name"];
}

/**
 * Read with the first reader that succeeds and report which one it was.
 * When every reader fails, the error names each reader and what it rejected.
 */
export function readWithFallback(doc: SchematicDocument, readers: SchematicReader[] = defaultReaders): ReaderOutcome {
  const failures: { reader: string; error: EdaFileError }[] = [];
  for (const reader of readers) {
    try {
      return { snapshot: reader.read(doc), reader: reader.name };
    } catch (err) {
      if (!(err instanceof EdaFileError)) throw err;
      failures.push({ reader: reader.name, error: err });
    }
  }
  throw new StructuralInvariantViolationError(
    `Schematic could not be read: ${failures.map(f => `${f.reader}: ${f.error.message}`).join("; ")}`,
    { path: doc.path, failures: failures.map(f => ({ reader: f.reader, ...f.error.toJSON() })) },
  );
}

/** Typed snapshot of a schematic; the reader that produced it stays internal. */
export function readSchematic(doc: SchematicDocument, readers: SchematicReader[] = defaultReaders): SchematicSnapshot {
  return readWithFallback(doc, readers).snapshot;
}

import * as fs from "fs";
import * as path from "path";
import { SDocument, SExpr, SExpressionParser, SList } from "./SExpressionParser";
import { KicadDocument } from "./KicadDocument";
import {
  atomAt,
  childNumbers,
  childValue,
  findChild,
  findChildren,
  findProperty,
  fmt,
  headOf,
  insertChild,
  numberAt,
  quote,
  removeChild,
  setAtom,
  setNumber,
  walkLists,
} from "./SExprTree";
import { newUuid, readDocumentFile, stripBom, writeAtomic } from "./DocumentFile";
import { DocumentExistsError, NotFoundError, StructuralInvariantViolationError, ValidationError } from "./errors";
import { normalizeRotation, samePoint } from "./Geometry";
import { extendsOf, unitCount } from "./LibrarySymbol";
import { LabelKind, Mirror, Point } from "./types";

export const SCHEMATIC_VERSION = "20250114";
export const POSITION_TOLERANCE = 0.01;

export const REFERENCE_PATTERN = /^[A-Za-z_]+\d+[A-Za-z]?$/;
export const POWER_REFERENCE_PATTERN = /^#[A-Za-z_]+\d+$/;

// Top-level element order as the schematic editor writes it.
const TOP_LEVEL_ORDER = [
  "version",
  "generator",
  "generator_version",
  "uuid",
  "paper",
  "title_block",
  "lib_symbols",
  "junction",
  "no_connect",
  "bus_entry",
  "wire",
  "bus",
  "polyline",
  "text",
  "label",
  "global_label",
  "hierarchical_label",
  "symbol",
  "sheet",
  "sheet_instances",
  "symbol_instances",
  "embedded_fonts",
];

export interface CreateSchematicOptions {
  title?: string;
  revision?: string;
  company?: string;
  date?: string;
  paper?: string;
  generator?: string;
}

export interface AddSymbolOptions {
  libId: string;
  reference: string;
  value: string;
  x: number;
  y: number;
  rotation?: number;
  mirror?: Mirror;
  unit?: number;
  footprint?: string;
  properties?: Record<string, string>;
  inBom?: boolean;
  onBoard?: boolean;
  dnp?: boolean;
  /** Pin numbers to list on the instance; the editor fills them in when absent. */
  pins?: string[];
}

export interface MoveTarget {
  x: number;
  y: number;
  rotation?: number;
  /** `null` removes an existing mirror. */
  mirror?: Mirror | null;
}

export interface SymbolUpdate {
  reference?: string;
  value?: string;
  footprint?: string;
  properties?: Record<string, string>;
  inBom?: boolean;
  onBoard?: boolean;
  dnp?: boolean;
  excludeFromSim?: boolean;
}

export interface AddLabelOptions {
  text: string;
  x: number;
  y: number;
  kind?: LabelKind;
  rotation?: number;
  /** Shape of global and hierarchical labels. */
  shape?: "input" | "output" | "bidirectional" | "tri_state" | "passive";
}

export interface AddPowerOptions {
  name: string;
  x: number;
  y: number;
  rotation?: number;
  pins?: string[];
}

function yesNo(flag: boolean): string {
  return flag ? "yes" : "no";
}

function fontEffects(hidden: boolean, ...extra: SExpr[]): SExpr {
  return ["effects", ["font", ["size", "1.27", "1.27"]], ...extra, ...(hidden ? [["hide", "yes"]] : [])];
}

function propertyExpr(name: string, value: string, x: number, y: number, hidden: boolean): SExpr {
  return ["property", quote(name), quote(value), ["at", fmt(x), fmt(y), "0"], fontEffects(hidden)];
}

export function validateReference(reference: string) {
  if (!REFERENCE_PATTERN.test(reference) && !POWER_REFERENCE_PATTERN.test(reference)) {
    throw new ValidationError(`Invalid reference "${reference}": expected letters followed by a number, e.g. R1 or U3A`, {
      reference,
    });
  }
}

export function validateNetName(name: string) {
  if (name.trim().length === 0 || /[\r\n]/.test(name)) {
    throw new ValidationError(`Invalid net name "${name}"`, { name });
  }
}

/**
 * An open `.kicad_sch` file. Every mutator edits one subtree in place, so
 * everything else is written back exactly as it was read.
 */
export class SchematicDocument extends KicadDocument {
  private constructor(tree: SDocument, filePath?: string, hash?: string, bom = false) {
    super("kicad_sch", TOP_LEVEL_ORDER, tree, filePath, hash, bom);
  }

  static parse(text: string, filePath?: string): SchematicDocument {
    const source = stripBom(text);
    return new SchematicDocument(SExpressionParser.parse(source.text), filePath, undefined, source.bom);
  }

  static load(filePath: string): SchematicDocument {
    const file = readDocumentFile(filePath);
    return new SchematicDocument(SExpressionParser.parse(file.text), filePath, file.hash, file.bom);
  }

  /**
   * Write a new, empty schematic.
   * @throws DocumentExistsError when the file is already there
   */
  static create(filePath: string, options: CreateSchematicOptions = {}): SchematicDocument {
    if (fs.existsSync(filePath)) {
      throw new DocumentExistsError(filePath, { operation: "create_schematic" });
    }
    writeAtomic(filePath, this.skeleton(options));
    return this.load(filePath);
  }

  static skeleton(options: CreateSchematicOptions = {}): string {
    const titleBlock: SExpr[] = ["title_block"];
    if (options.title) titleBlock.push(["title", quote(options.title)]);
    if (options.date) titleBlock.push(["date", quote(options.date)]);
    if (options.revision) titleBlock.push(["rev", quote(options.revision)]);
    if (options.company) titleBlock.push(["company", quote(options.company)]);

    const schematic: SExpr[] = [
      "kicad_sch",
      ["version", SCHEMATIC_VERSION],
      ["generator", quote(options.generator ?? "eeschema")],
      ["generator_version", quote("9.0")],
      ["uuid", quote(newUuid())],
      ["paper", quote(options.paper ?? "A4")],
    ];
    if (titleBlock.length > 1) schematic.push(titleBlock);
    schematic.push(["lib_symbols"]);
    schematic.push(["sheet_instances", ["path", quote("/"), ["page", quote("1")]]]);
    schematic.push(["embedded_fonts", "no"]);

    return SExpressionParser.format(schematic) + "\n";
  }

  get uuid(): string | undefined {
    return childValue(this.root, "uuid");
  }

  /** The document UUID, written first when the file has none. */
  ensureUuid(): string {
    const existing = this.uuid;
    if (existing) return existing;
    const id = newUuid();
    this.insertTopLevel("uuid", ["uuid", quote(id)]);
    return id;
  }

  /**
   * Project name used in `instances` blocks: the `.kicad_pro` beside the
   * file when there is exactly one, the file's own name otherwise.
   */
  get projectName(): string {
    if (!this.path) return "";
    const dir = path.dirname(this.path);
    if (fs.existsSync(dir)) {
      const projects = fs.readdirSync(dir).filter(f => f.endsWith(".kicad_pro"));
      if (projects.length === 1) return path.basename(projects[0], ".kicad_pro");
    }
    return path.basename(this.path, ".kicad_sch");
  }

  // ─── lib_symbols cache ─────────────────────────────────────────────

  libSymbols(): SList {
    return findChild(this.root, "lib_symbols") ?? this.insertTopLevel("lib_symbols", ["lib_symbols"]);
  }

  cachedSymbols(): SList[] {
    const cache = findChild(this.root, "lib_symbols");
    return cache ? findChildren(cache, "symbol") : [];
  }

  cachedSymbol(libId: string): SList | undefined {
    return this.cachedSymbols().find(sym => atomAt(sym, 1) === libId);
  }

  /** Add a definition to the cache. Returns false when the id is already cached. */
  cacheSymbol(libId: string, definition: SExpr): boolean {
    if (this.cachedSymbol(libId)) return false;
    const cache = this.libSymbols();
    const existing = findChildren(cache, "symbol");
    const index = existing.length > 0 ? cache.items.indexOf(existing[existing.length - 1]) + 1 : cache.items.length;
    insertChild(cache, index, definition, this.indentUnit);
    return true;
  }

  // ─── symbol instances ──────────────────────────────────────────────

  placedSymbols(): SList[] {
    return findChildren(this.root, "symbol").filter(sym => findChild(sym, "lib_id") !== undefined);
  }

  static referenceOf(sym: SList): string {
    const prop = findProperty(sym, "Reference");
    const fromProp = prop ? atomAt(prop, 2) : undefined;
    if (fromProp) return fromProp;
    let fromInstances = "";
    walkLists(sym, list => {
      if (!fromInstances && headOf(list) === "reference") fromInstances = atomAt(list, 1) ?? "";
    });
    return fromInstances;
  }

  static unitOf(sym: SList): number {
    return childNumbers(sym, "unit")[0] ?? 1;
  }

  findSymbols(reference: string): SList[] {
    return this.placedSymbols().filter(sym => SchematicDocument.referenceOf(sym) === reference);
  }

  /**
   * One placed unit. Without `unit`, the reference must name a single unit.
   * @throws NotFoundError when nothing matches
   */
  findSymbol(reference: string, unit?: number): SList {
    const matches = this.findSymbols(reference).filter(sym => unit === undefined || SchematicDocument.unitOf(sym) === unit);
    if (matches.length === 0) {
      throw new NotFoundError("symbol", unit === undefined ? reference : `${reference} unit ${unit}`, { path: this.path });
    }
    if (matches.length > 1) {
      throw new ValidationError(`${reference} has ${matches.length} units; pass the unit to pick one`, { reference });
    }
    return matches[0];
  }

  /** Next free `#PWRnnn` reference. */
  nextPowerReference(): string {
    let max = 0;
    for (const sym of this.placedSymbols()) {
      const match = SchematicDocument.referenceOf(sym).match(/^#PWR(\d+)$/);
      if (match) max = Math.max(max, Number(match[1]));
    }
    return `#PWR${String(max + 1).padStart(3, "0")}`;
  }

  addSymbol(options: AddSymbolOptions): SList {
    validateReference(options.reference);
    const unit = options.unit ?? 1;
    const rotation = normalizeRotation(options.rotation ?? 0);
    const placed = this.findSymbols(options.reference);
    if (placed.some(sym => SchematicDocument.unitOf(sym) === unit)) {
      throw new ValidationError(`Reference ${options.reference} (unit ${unit}) is already placed`, {
        reference: options.reference,
        unit,
      });
    }
    // Further units of a reference must come from the same symbol.
    const other = placed.map(sym => childValue(sym, "lib_id")).find(libId => libId !== options.libId);
    if (other !== undefined && !options.reference.startsWith("#")) {
      throw new StructuralInvariantViolationError(
        `Reference ${options.reference} is already used by ${other}; it cannot also name a ${options.libId}`,
        { reference: options.reference, libId: options.libId, existing: other },
      );
    }
    const cached = this.cachedSymbol(options.libId);
    if (cached && extendsOf(cached) === undefined) {
      const units = unitCount(cached);
      if (unit < 1 || unit > units) {
        throw new ValidationError(`${options.libId} has ${units} unit(s); unit ${unit} does not exist`, {
          libId: options.libId,
          unit,
        });
      }
    }

    const { x, y } = options;
    const isPower = options.reference.startsWith("#");
    const symbol: SExpr[] = [
      "symbol",
      ["lib_id", quote(options.libId)],
      ["at", fmt(x), fmt(y), fmt(rotation)],
    ];
    if (options.mirror) symbol.push(["mirror", options.mirror]);
    symbol.push(
      ["unit", String(unit)],
      ["exclude_from_sim", "no"],
      ["in_bom", yesNo(options.inBom ?? !isPower)],
      ["on_board", yesNo(options.onBoard ?? true)],
      ["dnp", yesNo(options.dnp ?? false)],
      ["uuid", quote(newUuid())],
      propertyExpr("Reference", options.reference, x, y - 2.54, isPower),
      propertyExpr("Value", options.value, x, y + 2.54, false),
      propertyExpr("Footprint", options.footprint ?? "", x, y, true),
      propertyExpr("Datasheet", "~", x, y, true),
    );

    let offset = 6;
    for (const [name, value] of Object.entries(options.properties ?? {})) {
      symbol.push(propertyExpr(name, value, x, y + offset, true));
      offset += 2;
    }

    for (const pin of options.pins ?? []) {
      symbol.push(["pin", quote(pin), ["uuid", quote(newUuid())]]);
    }

    const documentUuid = this.ensureUuid();
    symbol.push([
      "instances",
      ["project", quote(this.projectName), ["path", quote(`/${documentUuid}`), ["reference", quote(options.reference)], ["unit", String(unit)]]],
    ]);

    return this.insertTopLevel("symbol", symbol);
  }

  /** Remove every unit of a reference, or one unit. Returns how many were removed. */
  removeSymbol(reference: string, unit?: number): number {
    const targets = this.findSymbols(reference).filter(sym => unit === undefined || SchematicDocument.unitOf(sym) === unit);
    if (targets.length === 0) {
      throw new NotFoundError("symbol", reference, { path: this.path });
    }
    for (const sym of targets) {
      removeChild(this.root, sym);
    }
    return targets.length;
  }

  /**
   * Move a symbol. Its properties shift by the same delta, so labels keep
   * their place relative to the body.
   */
  moveSymbol(reference: string, target: MoveTarget, unit?: number): SList {
    const sym = this.findSymbol(reference, unit);
    const at = findChild(sym, "at");
    if (!at) {
      throw new StructuralInvariantViolationError(`Symbol ${reference} has no position`, { reference });
    }
    const [ox = 0, oy = 0] = childNumbers(sym, "at");
    const dx = target.x - ox;
    const dy = target.y - oy;

    setNumber(at, 1, target.x);
    setNumber(at, 2, target.y);
    if (target.rotation !== undefined) setNumber(at, 3, normalizeRotation(target.rotation));

    if (target.mirror !== undefined) {
      const mirror = findChild(sym, "mirror");
      if (target.mirror === null) {
        if (mirror) removeChild(sym, mirror);
      } else if (mirror) {
        if (atomAt(mirror, 1) !== target.mirror) setAtom(mirror, 1, target.mirror);
      } else {
        insertChild(sym, sym.items.indexOf(at) + 1, ["mirror", target.mirror], this.indentUnit);
      }
    }

    if (dx !== 0 || dy !== 0) {
      for (const prop of findChildren(sym, "property")) {
        const propAt = findChild(prop, "at");
        if (!propAt) continue;
        const [px = 0, py = 0] = childNumbers(prop, "at");
        setNumber(propAt, 1, px + dx);
        setNumber(propAt, 2, py + dy);
      }
    }
    return sym;
  }

  /** Apply property and flag changes to every unit of a reference. */
  updateSymbol(reference: string, changes: SymbolUpdate): SList[] {
    const units = this.findSymbols(reference);
    if (units.length === 0) {
      throw new NotFoundError("symbol", reference, { path: this.path });
    }
    const rename = changes.reference !== undefined && changes.reference !== reference ? changes.reference : undefined;
    if (rename !== undefined) {
      validateReference(rename);
      if (this.findSymbols(rename).length > 0) {
        throw new ValidationError(`Reference ${rename} is already in use`, { reference: rename });
      }
    }

    for (const sym of units) {
      if (changes.value !== undefined) this.setProperty(sym, "Value", changes.value);
      if (changes.footprint !== undefined) this.setProperty(sym, "Footprint", changes.footprint);
      for (const [name, value] of Object.entries(changes.properties ?? {})) {
        this.setProperty(sym, name, value);
      }
      if (changes.inBom !== undefined) this.setFlag(sym, "in_bom", changes.inBom);
      if (changes.onBoard !== undefined) this.setFlag(sym, "on_board", changes.onBoard);
      if (changes.dnp !== undefined) this.setFlag(sym, "dnp", changes.dnp);
      if (changes.excludeFromSim !== undefined) this.setFlag(sym, "exclude_from_sim", changes.excludeFromSim);
      if (rename !== undefined) {
        this.setProperty(sym, "Reference", rename);
        walkLists(sym, list => {
          if (headOf(list) === "reference") setAtom(list, 1, quote(rename));
        });
      }
    }
    return units;
  }

  private setProperty(sym: SList, name: string, value: string) {
    const prop = findProperty(sym, name);
    if (prop) {
      if (atomAt(prop, 2) !== value) setAtom(prop, 2, quote(value));
      return;
    }
    const [x = 0, y = 0] = childNumbers(sym, "at");
    const props = findChildren(sym, "property");
    const anchor = props.length > 0 ? props[props.length - 1] : findChild(sym, "uuid");
    const index = anchor ? sym.items.indexOf(anchor) + 1 : sym.items.length;
    insertChild(sym, index, propertyExpr(name, value, x, y + 6, true), this.indentUnit);
  }

  private setFlag(sym: SList, key: string, flag: boolean) {
    const existing = findChild(sym, key);
    if (existing) {
      if (atomAt(existing, 1) !== yesNo(flag)) setAtom(existing, 1, yesNo(flag));
      return;
    }
    const anchor = findChild(sym, "unit") ?? findChild(sym, "at");
    const index = anchor ? sym.items.indexOf(anchor) + 1 : sym.items.length;
    insertChild(sym, index, [key, yesNo(flag)], this.indentUnit);
  }

  // ─── wires ─────────────────────────────────────────────────────────

  wires(): SList[] {
    return findChildren(this.root, "wire");
  }

  static wireEnds(wire: SList): [Point, Point] | undefined {
    const pts = findChild(wire, "pts");
    if (!pts) return undefined;
    const xys = findChildren(pts, "xy");
    if (xys.length < 2) return undefined;
    const point = (xy: SList): Point => ({ x: numberAt(xy, 1) ?? NaN, y: numberAt(xy, 2) ?? NaN });
    return [point(xys[0]), point(xys[xys.length - 1])];
  }

  private findWire(start: Point, end: Point): SList | undefined {
    return this.wires().find(wire => {
      const ends = SchematicDocument.wireEnds(wire);
      if (!ends) return false;
      const [a, b] = ends;
      return (
        (samePoint(a, start, POSITION_TOLERANCE) && samePoint(b, end, POSITION_TOLERANCE)) ||
        (samePoint(a, end, POSITION_TOLERANCE) && samePoint(b, start, POSITION_TOLERANCE))
      );
    });
  }

  /** Add a wire segment. An identical segment already present is returned as is. */
  addWire(start: Point, end: Point): SList {
    if (samePoint(start, end, POSITION_TOLERANCE)) {
      throw new ValidationError("Wire start and end are the same point", { start, end });
    }
    const existing = this.findWire(start, end);
    if (existing) return existing;
    return this.insertTopLevel("wire", [
      "wire",
      ["pts", ["xy", fmt(start.x), fmt(start.y)], ["xy", fmt(end.x), fmt(end.y)]],
      ["stroke", ["width", "0"], ["type", "default"]],
      ["uuid", quote(newUuid())],
    ]);
  }

  /** Remove the wire between two points, matched in either direction. */
  removeWire(start: Point, end: Point) {
    const wire = this.findWire(start, end);
    if (!wire) {
      throw new NotFoundError("wire", `(${start.x}, ${start.y}) - (${end.x}, ${end.y})`, { path: this.path });
    }
    removeChild(this.root, wire);
  }

  // ─── labels ────────────────────────────────────────────────────────

  labels(): SList[] {
    return this.root.items.filter(
      (item): item is SList =>
        item.type === "list" && ["label", "global_label", "hierarchical_label"].includes(headOf(item) ?? ""),
    );
  }

  addLabel(options: AddLabelOptions): SList {
    validateNetName(options.text);
    const kind = options.kind ?? "label";
    const rotation = normalizeRotation(options.rotation ?? 0);
    const at = ["at", fmt(options.x), fmt(options.y), fmt(rotation)];
    const justify = rotation === 180 || rotation === 270 ? "right" : "left";

    const existing = this.labels().find(label => {
      const [lx = NaN, ly = NaN] = childNumbers(label, "at");
      return headOf(label) === kind && atomAt(label, 1) === options.text &&
        samePoint({ x: lx, y: ly }, options, POSITION_TOLERANCE);
    });
    if (existing) return existing;

    let label: SExpr[];
    if (kind === "label") {
      label = ["label", quote(options.text), at, ["fields_autoplaced", "yes"],
        fontEffects(false, ["justify", justify, "bottom"]), ["uuid", quote(newUuid())]];
    } else if (kind === "global_label") {
      label = ["global_label", quote(options.text), ["shape", options.shape ?? "bidirectional"], at,
        ["fields_autoplaced", "yes"], fontEffects(false, ["justify", justify]), ["uuid", quote(newUuid())],
        ["property", quote("Intersheetrefs"), quote("${INTERSHEET_REFS}"), ["at", fmt(options.x), fmt(options.y), "0"],
          fontEffects(true)]];
    } else {
      label = ["hierarchical_label", quote(options.text), ["shape", options.shape ?? "input"], at,
        fontEffects(false, ["justify", justify]), ["uuid", quote(newUuid())]];
    }
    return this.insertTopLevel(kind, label);
  }

  /** Remove labels by text, optionally only the one at `at`. Returns how many were removed. */
  removeLabel(text: string, at?: Point): number {
    const targets = this.labels().filter(label => {
      if (atomAt(label, 1) !== text) return false;
      if (!at) return true;
      const [lx = NaN, ly = NaN] = childNumbers(label, "at");
      return samePoint({ x: lx, y: ly }, at, POSITION_TOLERANCE);
    });
    if (targets.length === 0) {
      throw new NotFoundError("label", text, { path: this.path });
    }
    for (const label of targets) removeChild(this.root, label);
    return targets.length;
  }

  // ─── junctions and no-connect markers ──────────────────────────────

  private markers(kind: "junction" | "no_connect"): SList[] {
    return findChildren(this.root, kind);
  }

  private findMarker(kind: "junction" | "no_connect", at: Point): SList | undefined {
    return this.markers(kind).find(marker => {
      const [mx = NaN, my = NaN] = childNumbers(marker, "at");
      return samePoint({ x: mx, y: my }, at, POSITION_TOLERANCE);
    });
  }

  addJunction(at: Point): SList {
    return this.findMarker("junction", at) ?? this.insertTopLevel("junction", [
      "junction",
      ["at", fmt(at.x), fmt(at.y)],
      ["diameter", "0"],
      ["color", "0", "0", "0", "0"],
      ["uuid", quote(newUuid())],
    ]);
  }

  removeJunction(at: Point) {
    this.removeMarker("junction", at);
  }

  addNoConnect(at: Point): SList {
    return this.findMarker("no_connect", at) ?? this.insertTopLevel("no_connect", [
      "no_connect",
      ["at", fmt(at.x), fmt(at.y)],
      ["uuid", quote(newUuid())],
    ]);
  }

  removeNoConnect(at: Point) {
    this.removeMarker("no_connect", at);
  }

  private removeMarker(kind: "junction" | "no_connect", at: Point) {
    const marker = this.findMarker(kind, at);
    if (!marker) {
      throw new NotFoundError(kind, `(${at.x}, ${at.y})`, { path: this.path });
    }
    removeChild(this.root, marker);
  }

  // ─── power symbols ─────────────────────────────────────────────────

  /** Place a `power:<name>` symbol under the next free `#PWR` reference. */
  addPowerSymbol(options: AddPowerOptions): SList {
    validateNetName(options.name);
    return this.addSymbol({
      libId: `power:${options.name}`,
      reference: this.nextPowerReference(),
      value: options.name,
      x: options.x,
      y: options.y,
      rotation: options.rotation,
      inBom: false,
      pins: options.pins,
    });
  }
}

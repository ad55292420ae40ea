import * as fs from "fs";
import { SDocument, SExpr, SExpressionParser, SList } from "./SExpressionParser";
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
  isList,
  numberAt,
  propertiesOf,
  quote,
  removeChild,
  setAtom,
  setNumber,
} from "./SExprTree";
import { KicadDocument } from "./KicadDocument";
import { newUuid, readDocumentFile, stripBom, writeAtomic } from "./DocumentFile";
import { DocumentExistsError, NotFoundError, ValidationError } from "./errors";
import { rotateOffset, round4 } from "./Geometry";
import { validateNetName, validateReference } from "./SchematicDocument";
import { readTitleBlock } from "./SchematicReader";
import {
  BoardFootprint,
  BoardInfo,
  BoardLayer,
  BoardNet,
  BoardPad,
  BoardSnapshot,
  DesignRuleValue,
  Point,
  Track,
  ValidationIssue,
  ValidationReport,
  Via,
  Zone,
} from "./types";

export const BOARD_VERSION = "20241229";

// Top-level element order as the board editor writes it.
const TOP_LEVEL_ORDER = [
  "version",
  "generator",
  "generator_version",
  "general",
  "paper",
  "title_block",
  "layers",
  "setup",
  "property",
  "net",
  "footprint",
  "gr_line",
  "gr_rect",
  "gr_circle",
  "gr_arc",
  "gr_poly",
  "gr_text",
  "segment",
  "arc",
  "via",
  "zone",
  "group",
  "embedded_fonts",
];

const LAYER_TABLE: SExpr[] = [
  "layers",
  ["0", '"F.Cu"', "signal"],
  ["2", '"B.Cu"', "signal"],
  ["9", '"F.Adhes"', "user", '"F.Adhesive"'],
  ["11", '"B.Adhes"', "user", '"B.Adhesive"'],
  ["13", '"F.Paste"', "user"],
  ["15", '"B.Paste"', "user"],
  ["5", '"F.SilkS"', "user", '"F.Silkscreen"'],
  ["7", '"B.SilkS"', "user", '"B.Silkscreen"'],
  ["1", '"F.Mask"', "user"],
  ["3", '"B.Mask"', "user"],
  ["17", '"Dwgs.User"', "user", '"User.Drawings"'],
  ["19", '"Cmts.User"', "user", '"User.Comments"'],
  ["25", '"Edge.Cuts"', "user"],
  ["27", '"Margin"', "user"],
  ["31", '"F.CrtYd"', "user", '"F.Courtyard"'],
  ["29", '"B.CrtYd"', "user", '"B.Courtyard"'],
  ["35", '"F.Fab"', "user"],
  ["33", '"B.Fab"', "user"],
];

export interface PlaceFootprintOptions {
  footprintId: string;
  reference: string;
  value: string;
  x: number;
  y: number;
  rotation?: number;
  layer?: "F.Cu" | "B.Cu";
  /** Library definition to copy pads and graphics from; a bare shell is written without it. */
  definition?: SList;
}

export interface TrackOptions {
  start: Point;
  end: Point;
  width?: number;
  layer?: string;
  net?: string;
}

export interface ViaOptions {
  x: number;
  y: number;
  size?: number;
  drill?: number;
  layers?: [string, string];
  net?: string;
}

function textProperty(name: string, value: string, offsetY: number, layer: string, hidden: boolean): SExpr {
  return [
    "property",
    quote(name),
    quote(value),
    ["at", "0", fmt(offsetY), "0"],
    ["layer", quote(layer)],
    ...(hidden ? [["hide", "yes"]] : []),
    ["uuid", quote(newUuid())],
    ["effects", ["font", ["size", "1", "1"], ["thickness", "0.15"]]],
  ];
}

/**
 * An open `.kicad_pcb` file, edited in place like the schematic.
 */
export class BoardDocument extends KicadDocument {
  private constructor(tree: SDocument, filePath?: string, hash?: string, bom = false) {
    super("kicad_pcb", TOP_LEVEL_ORDER, tree, filePath, hash, bom);
  }

  static parse(text: string, filePath?: string): BoardDocument {
    const source = stripBom(text);
    return new BoardDocument(SExpressionParser.parse(source.text), filePath, undefined, source.bom);
  }

  static load(filePath: string): BoardDocument {
    const file = readDocumentFile(filePath);
    return new BoardDocument(SExpressionParser.parse(file.text), filePath, file.hash, file.bom);
  }

  /**
   * Write a new two-layer board with only the empty net.
   * @throws DocumentExistsError when the file is already there
   */
  static create(filePath: string, options: { paper?: string; thickness?: number } = {}): BoardDocument {
    if (fs.existsSync(filePath)) {
      throw new DocumentExistsError(filePath, { operation: "create_board" });
    }
    writeAtomic(filePath, this.skeleton(options));
    return this.load(filePath);
  }

  static skeleton(options: { paper?: string; thickness?: number } = {}): string {
    return SExpressionParser.format([
      "kicad_pcb",
      ["version", BOARD_VERSION],
      ["generator", quote("pcbnew")],
      ["generator_version", quote("9.0")],
      ["general", ["thickness", fmt(options.thickness ?? 1.6)], ["legacy_teardrops", "no"]],
      ["paper", quote(options.paper ?? "A4")],
      LAYER_TABLE,
      ["setup", ["pad_to_mask_clearance", "0"], ["allow_soldermask_bridges_in_footprints", "no"]],
      ["net", "0", '""'],
      ["embedded_fonts", "no"],
    ]) + "\n";
  }

  // ─── nets ──────────────────────────────────────────────────────────

  /** The `(net N "name")` table. */
  nets(): BoardNet[] {
    return findChildren(this.root, "net").map(net => ({ code: numberAt(net, 1) ?? 0, name: atomAt(net, 2) ?? "" }));
  }

  /** Code of a net, declared in the table first when it is new. */
  ensureNet(name: string): BoardNet {
    validateNetName(name);
    const nets = this.nets();
    const existing = nets.find(n => n.name === name);
    if (existing) return existing;
    const code = nets.reduce((max, n) => Math.max(max, n.code), 0) + 1;
    this.insertTopLevel("net", ["net", String(code), quote(name)]);
    return { code, name };
  }

  // ─── footprints ────────────────────────────────────────────────────

  footprints(): SList[] {
    return findChildren(this.root, "footprint");
  }

  static referenceOf(fp: SList): string {
    const prop = findProperty(fp, "Reference");
    if (prop) return atomAt(prop, 2) ?? "";
    // KiCad 6 and older keep reference and value in fp_text.
    const text = findChildren(fp, "fp_text").find(t => atomAt(t, 1) === "reference");
    return text ? atomAt(text, 2) ?? "" : "";
  }

  static valueOf(fp: SList): string {
    const prop = findProperty(fp, "Value");
    if (prop) return atomAt(prop, 2) ?? "";
    const text = findChildren(fp, "fp_text").find(t => atomAt(t, 1) === "value");
    return text ? atomAt(text, 2) ?? "" : "";
  }

  findFootprint(reference: string): SList {
    const fp = this.footprints().find(f => BoardDocument.referenceOf(f) === reference);
    if (!fp) {
      throw new NotFoundError("footprint", reference, { path: this.path });
    }
    return fp;
  }

  /**
   * Place a footprint. With a library definition its pads and graphics are
   * copied; file-level headers of the `.kicad_mod` are dropped. On `B.Cu`
   * the copy is mirrored onto the back layers.
   */
  placeFootprint(options: PlaceFootprintOptions): SList {
    validateReference(options.reference);
    if (this.footprints().some(f => BoardDocument.referenceOf(f) === options.reference)) {
      throw new ValidationError(`Footprint ${options.reference} is already on the board`, { reference: options.reference });
    }

    const layer = options.layer ?? "F.Cu";
    const side = layer === "B.Cu" ? "B" : "F";
    const rotation = options.rotation ?? 0;
    const at = ["at", fmt(options.x), fmt(options.y), ...(rotation !== 0 ? [fmt(rotation)] : [])];
    const body: SExpr[] = [];
    const skip = new Set(["version", "generator", "generator_version", "tedit", "layer", "uuid", "at", "tstamp"]);

    if (options.definition) {
      for (const item of options.definition.items.slice(2)) {
        const head = headOf(item);
        if (head !== undefined && skip.has(head)) continue;
        const plain = SExpressionParser.toPlain(item);
        if (head === "property" && Array.isArray(plain) && typeof plain[1] === "string") {
          const name = SExpressionParser.unquote(plain[1]);
          if (name === "Reference") plain[2] = quote(options.reference);
          if (name === "Value") plain[2] = quote(options.value);
        }
        if (head === "fp_text" && Array.isArray(plain)) {
          if (plain[1] === "reference") plain[2] = quote(options.reference);
          if (plain[1] === "value") plain[2] = quote(options.value);
        }
        if (side === "B") flipToBack(plain);
        if (rotation !== 0 && head !== undefined && ROTATED_ITEMS.has(head)) rotateItem(plain, head, rotation);
        body.push(plain);
      }
    }
    const hasReference = body.some(item => Array.isArray(item) && (item[0] === "property" || item[0] === "fp_text") &&
      (item[1] === '"Reference"' || item[1] === "reference"));
    if (!hasReference) {
      body.unshift(
        textProperty("Reference", options.reference, -2, `${side}.SilkS`, false),
        textProperty("Value", options.value, 2, `${side}.Fab`, false),
      );
    }

    return this.insertTopLevel("footprint", [
      "footprint",
      quote(options.footprintId),
      ["layer", quote(layer)],
      ["uuid", quote(newUuid())],
      at,
      ...body,
    ]);
  }

  moveFootprint(reference: string, target: { x: number; y: number; rotation?: number }): SList {
    const fp = this.findFootprint(reference);
    const at = findChild(fp, "at");
    if (!at) {
      const layer = findChild(fp, "layer");
      insertChild(fp, layer ? fp.items.indexOf(layer) + 1 : 2, ["at", fmt(target.x), fmt(target.y)], this.indentUnit);
      return this.moveFootprint(reference, target);
    }
    const previous = numberAt(at, 3) ?? 0;
    setNumber(at, 1, target.x);
    setNumber(at, 2, target.y);
    if (target.rotation !== undefined) {
      if (target.rotation === 0 && at.items.length > 3) at.items.splice(3, 1);
      else if (target.rotation !== 0) setNumber(at, 3, target.rotation);
      const delta = target.rotation - previous;
      if (normalizeAngle(delta) !== 0) this.rotateChildren(fp, delta);
    }
    return fp;
  }

  /** Pads and texts carry the footprint rotation in their own angle; keep them in step. */
  private rotateChildren(fp: SList, delta: number) {
    for (const item of fp.items) {
      if (item.type !== "list") continue;
      const head = headOf(item);
      if (head === undefined || !ROTATED_ITEMS.has(head)) continue;
      const at = findChild(item, "at");
      if (!at) continue;
      const current = numberAt(at, 3);
      const angle = normalizeAngle((current ?? 0) + delta);
      if (angle === 0 && head === "pad") {
        if (current !== undefined) at.items.splice(3, 1);
      } else if (current !== undefined) {
        setNumber(at, 3, angle);
      } else {
        at.items.splice(3, 0, { type: "atom", text: fmt(angle), pre: " " });
      }
    }
  }

  removeFootprint(reference: string) {
    removeChild(this.root, this.findFootprint(reference));
  }

  /** Set a footprint property; `Reference` renames the footprint. */
  setFootprintProperty(reference: string, name: string, value: string): SList {
    const fp = this.findFootprint(reference);
    if (name === "Reference") {
      validateReference(value);
      if (value !== reference && this.footprints().some(f => BoardDocument.referenceOf(f) === value)) {
        throw new ValidationError(`Footprint ${value} is already on the board`, { reference: value });
      }
    }
    const prop = findProperty(fp, name);
    if (prop) {
      if (atomAt(prop, 2) !== value) setAtom(prop, 2, quote(value));
      return fp;
    }
    const legacy = findChildren(fp, "fp_text").find(t => atomAt(t, 1) === name.toLowerCase());
    if (legacy) {
      if (atomAt(legacy, 2) !== value) setAtom(legacy, 2, quote(value));
      return fp;
    }
    const props = findChildren(fp, "property");
    const anchor = props.length > 0 ? props[props.length - 1] : findChild(fp, "at");
    insertChild(fp, anchor ? fp.items.indexOf(anchor) + 1 : fp.items.length,
      textProperty(name, value, 0, "F.Fab", true), this.indentUnit);
    return fp;
  }

  /** Put a pad on a net, declaring the net when it is new. */
  assignNet(reference: string, padNumber: string, netName: string): BoardNet {
    const fp = this.findFootprint(reference);
    const pads = findChildren(fp, "pad").filter(p => atomAt(p, 1) === padNumber);
    if (pads.length === 0) {
      throw new NotFoundError("pin", `${reference}.${padNumber}`, { path: this.path });
    }
    const net = this.ensureNet(netName);
    for (const pad of pads) {
      const existing = findChild(pad, "net");
      if (existing) {
        setNumber(existing, 1, net.code);
        if (atomAt(existing, 2) !== net.name) setAtom(existing, 2, quote(net.name));
      } else {
        const anchor = findChild(pad, "uuid") ?? findChild(pad, "layers");
        insertChild(pad, anchor ? pad.items.indexOf(anchor) : pad.items.length, ["net", String(net.code), quote(net.name)],
          this.indentUnit);
      }
    }
    return net;
  }

  // ─── routing ───────────────────────────────────────────────────────

  addTrack(options: TrackOptions): SList {
    const net = options.net !== undefined ? this.ensureNet(options.net).code : 0;
    return this.insertTopLevel("segment", [
      "segment",
      ["start", fmt(options.start.x), fmt(options.start.y)],
      ["end", fmt(options.end.x), fmt(options.end.y)],
      ["width", fmt(options.width ?? 0.25)],
      ["layer", quote(options.layer ?? "F.Cu")],
      ["net", String(net)],
      ["uuid", quote(newUuid())],
    ]);
  }

  addVia(options: ViaOptions): SList {
    const size = options.size ?? 0.6;
    const drill = options.drill ?? 0.3;
    if (drill >= size) {
      throw new ValidationError(`Via drill ${drill} must be smaller than its size ${size}`, { size, drill });
    }
    const net = options.net !== undefined ? this.ensureNet(options.net).code : 0;
    const [from, to] = options.layers ?? ["F.Cu", "B.Cu"];
    return this.insertTopLevel("via", [
      "via",
      ["at", fmt(options.x), fmt(options.y)],
      ["size", fmt(size)],
      ["drill", fmt(drill)],
      ["layers", quote(from), quote(to)],
      ["net", String(net)],
      ["uuid", quote(newUuid())],
    ]);
  }

  // ─── reading ───────────────────────────────────────────────────────

  static readFootprint(fp: SList): BoardFootprint {
    const [x = 0, y = 0, rotation = 0] = childNumbers(fp, "at");
    const pads: BoardPad[] = findChildren(fp, "pad").map(pad => {
      const [px = 0, py = 0] = childNumbers(pad, "at");
      const offset = rotateOffset({ x: px, y: py }, rotation);
      const net = findChild(pad, "net");
      return {
        number: atomAt(pad, 1) ?? "",
        type: atomAt(pad, 2) ?? "",
        shape: atomAt(pad, 3) ?? "",
        position: { x: round4(x + offset.x), y: round4(y + offset.y) },
        net: net ? { code: numberAt(net, 1) ?? 0, name: atomAt(net, 2) ?? "" } : undefined,
      };
    });
    return {
      reference: BoardDocument.referenceOf(fp),
      value: BoardDocument.valueOf(fp),
      footprint: atomAt(fp, 1) ?? "",
      layer: childValue(fp, "layer") ?? "F.Cu",
      position: { x, y, rotation },
      uuid: childValue(fp, "uuid") ?? childValue(fp, "tstamp"),
      pads,
    };
  }

  snapshot(): BoardSnapshot {
    const root = this.root;
    const layerTable = findChild(root, "layers");
    const tracks: Track[] = findChildren(root, "segment").map(seg => {
      const [sx = 0, sy = 0] = childNumbers(seg, "start");
      const [ex = 0, ey = 0] = childNumbers(seg, "end");
      return {
        start: { x: sx, y: sy },
        end: { x: ex, y: ey },
        width: childNumbers(seg, "width")[0] ?? 0,
        layer: childValue(seg, "layer") ?? "",
        net: childNumbers(seg, "net")[0] ?? 0,
        uuid: childValue(seg, "uuid"),
      };
    });
    const vias: Via[] = findChildren(root, "via").map(via => {
      const [vx = 0, vy = 0] = childNumbers(via, "at");
      const layers = findChild(via, "layers");
      return {
        position: { x: vx, y: vy },
        size: childNumbers(via, "size")[0] ?? 0,
        drill: childNumbers(via, "drill")[0] ?? 0,
        layers: layers ? layers.items.slice(1).map((_, i) => atomAt(layers, i + 1) ?? "") : [],
        net: childNumbers(via, "net")[0] ?? 0,
        uuid: childValue(via, "uuid"),
      };
    });
    const zones: Zone[] = findChildren(root, "zone").map(zone => {
      const layers = findChild(zone, "layers");
      return {
        net: childNumbers(zone, "net")[0] ?? 0,
        netName: childValue(zone, "net_name") ?? "",
        layers: layers
          ? layers.items.slice(1).map((_, i) => atomAt(layers, i + 1) ?? "")
          : [childValue(zone, "layer") ?? ""],
        uuid: childValue(zone, "uuid"),
      };
    });

    return {
      path: this.path,
      version: childValue(root, "version"),
      generator: childValue(root, "generator"),
      layers: layerTable ? findLayerNames(layerTable) : [],
      nets: this.nets(),
      footprints: this.footprints().map(fp => BoardDocument.readFootprint(fp)),
      tracks,
      vias,
      zones,
    };
  }

  /** Title, stack-up and element counts. */
  info(): BoardInfo {
    const root = this.root;
    const snapshot = this.snapshot();
    const general = findChild(root, "general");
    const layerTable = findChild(root, "layers");
    return {
      path: this.path,
      version: snapshot.version,
      generator: snapshot.generator,
      paper: childValue(root, "paper"),
      thickness: general ? childNumbers(general, "thickness")[0] : undefined,
      titleBlock: readTitleBlock(root),
      layers: layerTable ? readLayerTable(layerTable) : [],
      footprintCount: snapshot.footprints.length,
      netCount: snapshot.nets.filter(net => net.code !== 0).length,
      trackCount: snapshot.tracks.length,
      viaCount: snapshot.vias.length,
      zoneCount: snapshot.zones.length,
    };
  }

  /**
   * Values of the `(setup ...)` section by keyword. Nested sections such as
   * `pcbplotparams` and `stackup` are left out.
   */
  designRules(): Record<string, DesignRuleValue> {
    const rules: Record<string, DesignRuleValue> = {};
    const setup = findChild(this.root, "setup");
    if (!setup) return rules;

    for (const item of setup.items) {
      if (!isList(item)) continue;
      const name = headOf(item);
      if (name === undefined || item.items.some(child => child.type === "list")) continue;
      const words: string[] = [];
      for (let i = 1; i < item.items.length; i++) {
        words.push(atomAt(item, i) ?? "");
      }
      if (words.length === 0) continue;
      if (words.every(word => NUMBER.test(word))) {
        const values = words.map(Number);
        rules[name] = values.length === 1 ? values[0] : values;
      } else {
        rules[name] = words.join(" ");
      }
    }
    return rules;
  }

  /** Right-most footprint x coordinate and the top-most y, for placing new parts beside existing ones. */
  extent(): { maxX: number; minY: number } | undefined {
    const positions = this.footprints().map(fp => childNumbers(fp, "at"));
    const placed = positions.filter(p => p.length >= 2);
    if (placed.length === 0) return undefined;
    return {
      maxX: Math.max(...placed.map(p => p[0])),
      minY: Math.min(...placed.map(p => p[1])),
    };
  }

  /**
   * Board consistency: every pad net declared in the net table with the
   * same code, and unique references.
   */
  validate(): ValidationReport {
    const issues: ValidationIssue[] = [];
    const table = new Map(this.nets().map(n => [n.code, n.name]));
    const seen = new Map<string, number>();

    for (const fp of this.footprints().map(f => BoardDocument.readFootprint(f))) {
      seen.set(fp.reference, (seen.get(fp.reference) ?? 0) + 1);
      for (const pad of fp.pads) {
        if (!pad.net || (pad.net.code === 0 && pad.net.name === "")) continue;
        const declared = table.get(pad.net.code);
        if (declared === undefined || declared !== pad.net.name) {
          issues.push({
            severity: "error",
            rule: "pad_net_undeclared",
            message: `Pad ${fp.reference}.${pad.number} is on net ${pad.net.code} "${pad.net.name}", which the net table does not declare`,
            reference: fp.reference,
            position: pad.position,
          });
        }
      }
    }
    for (const [reference, count] of seen) {
      if (count > 1) {
        issues.push({ severity: "error", rule: "duplicate_reference", message: `${reference} appears ${count} times`, reference });
      }
    }
    for (const props of this.footprints().map(f => propertiesOf(f))) {
      if (props.get("Reference") === "") {
        issues.push({ severity: "warning", rule: "empty_reference", message: "Footprint with an empty reference" });
      }
    }

    const errors = issues.filter(i => i.severity === "error");
    return { valid: errors.length === 0, errors, warnings: issues.filter(i => i.severity === "warning") };
  }
}

const ROTATED_ITEMS = new Set(["pad", "property", "fp_text"]);
const POINT_LISTS = new Set(["at", "start", "end", "center", "mid", "xy"]);

function normalizeAngle(degrees: number): number {
  return round4(((degrees % 360) + 360) % 360);
}

function childList(item: SExpr[], head: string): SExpr[] | undefined {
  return item.find((child): child is SExpr[] => Array.isArray(child) && child[0] === head);
}

/**
 * Pads and texts store their orientation on the board, footprint rotation
 * included. A pad at 0 degrees is written without an angle.
 */
function rotateItem(item: SExpr, head: string, rotation: number) {
  if (!Array.isArray(item)) return;
  const at = childList(item, "at");
  if (!at) return;
  const current = typeof at[3] === "string" ? Number(at[3]) : 0;
  const angle = normalizeAngle(current + rotation);
  if (angle === 0 && head === "pad") at.splice(3, 1);
  else at[3] = fmt(angle);
}

/** `F.Cu` ↔ `B.Cu` and so on; `*.Cu` and non-sided layers are kept. */
function flipLayerName(raw: string): string {
  const match = raw.match(/^("?)([FB])\.([^"]+)\1$/);
  if (!match) return raw;
  const [, q, sideLetter, rest] = match;
  return `${q}${sideLetter === "F" ? "B" : "F"}.${rest}${q}`;
}

/**
 * Mirror a copied footprint item onto the back of the board: sided layers
 * swap, x coordinates and pad angles change sign, texts are drawn mirrored.
 */
function flipToBack(item: SExpr) {
  if (!Array.isArray(item)) return;
  const head = item[0];
  if (head === "layer" || head === "layers") {
    for (let i = 1; i < item.length; i++) {
      const layer = item[i];
      if (typeof layer === "string") item[i] = flipLayerName(layer);
    }
    return;
  }
  if (typeof head === "string" && POINT_LISTS.has(head)) {
    const x = typeof item[1] === "string" ? Number(item[1]) : NaN;
    if (Number.isFinite(x)) item[1] = fmt(-x);
    return;
  }
  for (const child of item.slice(1)) flipToBack(child);

  if (head === "pad") {
    const at = childList(item, "at");
    const angle = at && typeof at[3] === "string" ? Number(at[3]) : 0;
    if (at && angle !== 0) at[3] = fmt(normalizeAngle(-angle));
  }
  if (head === "property" || head === "fp_text") {
    const effects = childList(item, "effects");
    if (!effects) return;
    const justify = childList(effects, "justify");
    if (!justify) effects.push(["justify", "mirror"]);
    else if (!justify.includes("mirror")) justify.push("mirror");
  }
}

const NUMBER = /^-?(\d+\.?\d*|\.\d+)$/;

function readLayerTable(layers: SList): BoardLayer[] {
  return layers.items.filter(isList).map(layer => ({
    ordinal: numberAt(layer, 0) ?? -1,
    name: atomAt(layer, 1) ?? "",
    type: atomAt(layer, 2) ?? "",
    userName: atomAt(layer, 3),
  }));
}

function findLayerNames(layers: SList): string[] {
  return layers.items
    .filter((item): item is SList => item.type === "list")
    .map(layer => atomAt(layer, 1) ?? "")
    .filter(name => name.length > 0);
}

import * as fs from "fs";
import * as path from "path";
import { BoardDocument, TrackOptions, ViaOptions } from "../kicad/BoardDocument";
import { ConnectivityGraph, NetMembers, NetSummary, PinNet, PinSite } from "../kicad/Connectivity";
import { EdaFileError, GeometryUnresolvedError, NotFoundError, StructuralInvariantViolationError } from "../kicad/errors";
import { FootprintInfo, FootprintLibrary, FootprintMatch, FootprintSuggestion } from "../kicad/FootprintLibrary";
import { placePins } from "../kicad/Geometry";
import {
  AddLabelOptions,
  AddPowerOptions,
  AddSymbolOptions,
  CreateSchematicOptions,
  MoveTarget,
  SchematicDocument,
  SymbolUpdate,
} from "../kicad/SchematicDocument";
import {
  CreatedLibrary,
  createProjectLibrary,
  ImportedFootprint,
  importFootprint,
  ImportedSymbol,
  importSymbol,
  LibraryKind,
  RegisteredLibrary,
  registerProjectLibrary,
} from "../kicad/ProjectLibrary";
import { readSchematic } from "../kicad/SchematicReader";
import { childValue } from "../kicad/SExprTree";
import { SList } from "../kicad/SExpressionParser";
import { SymbolInfo, SymbolLibrary } from "../kicad/SymbolLibrary";
import { compare, ComparisonResult, sync, SyncResult } from "../kicad/SyncEngine";
import {
  BoardInfo,
  BoardNet,
  BoardSnapshot,
  DesignRuleValue,
  LibraryPin,
  Point,
  SchematicSnapshot,
  SymbolInstance,
  ValidationIssue,
  ValidationReport,
} from "../kicad/types";
import { BackendCapabilities, BoardPlacement, EdaBackend, PlacedSymbolResult, SheetNode, UnitPins } from "./types";

export interface FileBackendOptions {
  symbolDirs?: string[];
  footprintDirs?: string[];
  /** Search the KiCad install locations. Defaults to true. */
  includeSystemLibraries?: boolean;
  variables?: Record<string, string>;
  paper?: string;
  generator?: string;
}

function report(issues: ValidationIssue[]): ValidationReport {
  const errors = issues.filter(i => i.severity === "error");
  return { valid: errors.length === 0, errors, warnings: issues.filter(i => i.severity === "warning") };
}

function isPowerSymbol(snapshot: SchematicSnapshot, sym: SymbolInstance): boolean {
  const cached = snapshot.libSymbols.find(entry => entry.libId === sym.libId);
  return cached?.isPower ?? sym.libId.startsWith("power:");
}

/** A project is named by its directory or by any file in it. */
function projectDirOf(project: string): string {
  if (fs.existsSync(project) && fs.statSync(project).isDirectory()) return project;
  return path.extname(project) !== "" ? path.dirname(project) : project;
}

function uuidOf(node: SList): string {
  return childValue(node, "uuid") ?? "";
}

/**
 * Backend that edits `.kicad_sch` and `.kicad_pcb` files directly. Every
 * call loads the file, applies one change and writes it back atomically;
 * nothing is kept between calls.
 */
export class FileBackend implements EdaBackend {
  private readonly options: FileBackendOptions;

  constructor(options: FileBackendOptions = {}) {
    this.options = options;
  }

  capabilities(): BackendCapabilities {
    return { name: "file", live: false, schematic: true, board: true, connectivity: true, sync: true };
  }

  private symbolLibrary(projectDir?: string): SymbolLibrary {
    return new SymbolLibrary({
      projectDir,
      symbolDirs: this.options.symbolDirs,
      includeSystem: this.options.includeSystemLibraries,
      variables: this.options.variables,
    });
  }

  private footprintLibrary(projectDir?: string): FootprintLibrary {
    return new FootprintLibrary({
      projectDir,
      footprintDirs: this.options.footprintDirs,
      includeSystem: this.options.includeSystemLibraries,
      variables: this.options.variables,
    });
  }

  private editSchematic<T>(filePath: string, edit: (doc: SchematicDocument) => T): T {
    const doc = SchematicDocument.load(filePath);
    const result = edit(doc);
    doc.save();
    return result;
  }

  private editBoard<T>(filePath: string, edit: (doc: BoardDocument) => T): T {
    const doc = BoardDocument.load(filePath);
    const result = edit(doc);
    doc.save();
    return result;
  }

  // ─── schematic documents ───────────────────────────────────────────

  readSchematic(filePath: string): SchematicSnapshot {
    return { ...readSchematic(SchematicDocument.load(filePath)), path: filePath };
  }

  createSchematic(filePath: string, options: CreateSchematicOptions = {}): SchematicSnapshot {
    SchematicDocument.create(filePath, {
      paper: this.options.paper,
      generator: this.options.generator,
      ...options,
    });
    return this.readSchematic(filePath);
  }

  /**
   * Place a library symbol. Its definition is copied into `lib_symbols`
   * first, so the file stays self-contained.
   */
  addSymbol(filePath: string, options: AddSymbolOptions): PlacedSymbolResult {
    const library = this.symbolLibrary(path.dirname(filePath));
    return this.editSchematic(filePath, doc => {
      const cached = library.populateCache(doc, options.libId);
      const unit = options.unit ?? 1;
      const pins = options.pins ?? this.cachedPins(doc, options.libId, library)
        .filter(pin => pin.unit === 0 || pin.unit === unit)
        .map(pin => pin.number);
      const sym = doc.addSymbol({ ...options, pins: [...new Set(pins)] });
      return { reference: options.reference, uuid: uuidOf(sym), unit, cached };
    });
  }

  removeSymbol(filePath: string, reference: string, unit?: number): { removed: number } {
    return this.editSchematic(filePath, doc => ({ removed: doc.removeSymbol(reference, unit) }));
  }

  moveSymbol(filePath: string, reference: string, target: MoveTarget, unit?: number): UnitPins {
    this.editSchematic(filePath, doc => doc.moveSymbol(reference, target, unit));
    const placed = this.getPinPositions(filePath, reference);
    const moved = placed.find(p => unit === undefined || p.unit === unit);
    if (!moved) throw new NotFoundError("symbol", reference, { path: filePath });
    return moved;
  }

  updateSymbol(filePath: string, reference: string, changes: SymbolUpdate): { reference: string; units: number } {
    return this.editSchematic(filePath, doc => ({
      reference: changes.reference ?? reference,
      units: doc.updateSymbol(reference, changes).length,
    }));
  }

  addWire(filePath: string, start: Point, end: Point): { uuid: string } {
    return this.editSchematic(filePath, doc => ({ uuid: uuidOf(doc.addWire(start, end)) }));
  }

  removeWire(filePath: string, start: Point, end: Point) {
    this.editSchematic(filePath, doc => doc.removeWire(start, end));
  }

  addLabel(filePath: string, options: AddLabelOptions): { uuid: string } {
    return this.editSchematic(filePath, doc => ({ uuid: uuidOf(doc.addLabel(options)) }));
  }

  removeLabel(filePath: string, text: string, at?: Point): { removed: number } {
    return this.editSchematic(filePath, doc => ({ removed: doc.removeLabel(text, at) }));
  }

  addJunction(filePath: string, at: Point): { uuid: string } {
    return this.editSchematic(filePath, doc => ({ uuid: uuidOf(doc.addJunction(at)) }));
  }

  removeJunction(filePath: string, at: Point) {
    this.editSchematic(filePath, doc => doc.removeJunction(at));
  }

  addNoConnect(filePath: string, at: Point): { uuid: string } {
    return this.editSchematic(filePath, doc => ({ uuid: uuidOf(doc.addNoConnect(at)) }));
  }

  removeNoConnect(filePath: string, at: Point) {
    this.editSchematic(filePath, doc => doc.removeNoConnect(at));
  }

  addPowerSymbol(filePath: string, options: AddPowerOptions): PlacedSymbolResult {
    const library = this.symbolLibrary(path.dirname(filePath));
    const libId = `power:${options.name}`;
    return this.editSchematic(filePath, doc => {
      const cached = library.populateCache(doc, libId);
      const pins = options.pins ?? this.cachedPins(doc, libId, library).map(pin => pin.number);
      const sym = doc.addPowerSymbol({ ...options, pins });
      return { reference: SchematicDocument.referenceOf(sym), uuid: uuidOf(sym), unit: 1, cached };
    });
  }

  // ─── geometry and connectivity ─────────────────────────────────────

  /** Pins of a cached definition, following `extends` into the libraries when the cache has none. */
  private cachedPins(doc: SchematicDocument, libId: string, library: SymbolLibrary): LibraryPin[] {
    const cached = doc.cachedSymbol(libId);
    try {
      return cached ? library.resolvePins(cached) : library.resolvePinsById(libId);
    } catch (err) {
      if (err instanceof NotFoundError) throw new GeometryUnresolvedError(libId, { cause: err.message });
      throw err;
    }
  }

  private symbolPins(snapshot: SchematicSnapshot, sym: SymbolInstance, library: SymbolLibrary): LibraryPin[] {
    const cached = snapshot.libSymbols.find(entry => entry.libId === sym.libId);
    if (cached && cached.pins.length > 0) return cached.pins;
    try {
      return library.resolvePinsById(sym.libId);
    } catch (err) {
      if (err instanceof NotFoundError) throw new GeometryUnresolvedError(sym.libId, { reference: sym.reference });
      throw err;
    }
  }

  getPinPositions(filePath: string, reference: string): UnitPins[] {
    const snapshot = this.readSchematic(filePath);
    const library = this.symbolLibrary(path.dirname(filePath));
    const units = snapshot.symbols.filter(sym => sym.reference === reference).sort((a, b) => a.unit - b.unit);
    if (units.length === 0) {
      throw new NotFoundError("symbol", reference, { path: filePath });
    }
    return units.map(sym => ({
      reference,
      unit: sym.unit,
      pins: placePins(this.symbolPins(snapshot, sym, library), sym.position, sym.unit),
    }));
  }

  private pinSites(snapshot: SchematicSnapshot, library: SymbolLibrary): PinSite[] {
    const sites: PinSite[] = [];
    for (const sym of snapshot.symbols) {
      let pins: LibraryPin[];
      try {
        pins = this.symbolPins(snapshot, sym, library);
      } catch (err) {
        if (!(err instanceof EdaFileError)) throw err;
        console.warn(`⚠️  ${sym.reference}: ${err.message}; its pins are left out of connectivity`);
        continue;
      }
      const isPower = isPowerSymbol(snapshot, sym);
      const byNumber = new Map(pins.map(pin => [pin.number, pin]));

      for (const placed of placePins(pins, sym.position, sym.unit)) {
        const pin = byNumber.get(placed.number);
        // Hidden power inputs join the net named after the pin.
        const implicit = pin && pin.hidden && pin.electricalType === "power_in" ? pin.name : undefined;
        sites.push({
          reference: sym.reference,
          pin: placed.number,
          name: placed.name,
          position: { x: placed.x, y: placed.y },
          electricalType: placed.electricalType,
          netName: isPower ? sym.value : implicit,
        });
      }
    }
    return sites;
  }

  private graph(filePath: string): { graph: ConnectivityGraph; snapshot: SchematicSnapshot; sites: PinSite[] } {
    const snapshot = this.readSchematic(filePath);
    const sites = this.pinSites(snapshot, this.symbolLibrary(path.dirname(filePath)));
    const graph = ConnectivityGraph.build({
      wires: snapshot.wires,
      labels: snapshot.labels,
      junctions: snapshot.junctions,
      noConnects: snapshot.noConnects,
      pins: sites,
    });
    return { graph, snapshot, sites };
  }

  getPinNet(filePath: string, reference: string, pin: string): PinNet {
    return this.graph(filePath).graph.netOf(reference, pin);
  }

  getNetMembers(filePath: string, net: string): NetMembers {
    return this.graph(filePath).graph.membersOf(net);
  }

  listNets(filePath: string): NetSummary[] {
    return this.graph(filePath).graph.listNets();
  }

  /**
   * File-level checks: annotation, required instance fields, cache
   * completeness, conflicting net names, floating power symbols and
   * unconnected pins.
   */
  validateSchematic(filePath: string): ValidationReport {
    const { graph, snapshot, sites } = this.graph(filePath);
    const issues: ValidationIssue[] = [];

    const seen = new Set<string>();
    const libIds = new Map<string, string>();
    for (const sym of snapshot.symbols) {
      const key = `${sym.reference}/${sym.unit}`;
      if (seen.has(key)) {
        issues.push({
          severity: "error",
          rule: "duplicate_reference",
          message: `${sym.reference} unit ${sym.unit} is placed more than once`,
          reference: sym.reference,
          position: sym.position,
        });
      }
      seen.add(key);
      const firstLibId = libIds.get(sym.reference);
      if (firstLibId === undefined) {
        libIds.set(sym.reference, sym.libId);
      } else if (firstLibId !== sym.libId && !sym.reference.startsWith("#")) {
        issues.push({
          severity: "error",
          rule: "duplicate_reference",
          message: `${sym.reference} names both ${firstLibId} and ${sym.libId}`,
          reference: sym.reference,
          position: sym.position,
        });
      }
      if (sym.reference.endsWith("?")) {
        issues.push({ severity: "warning", rule: "unannotated", message: `${sym.reference} is not annotated`, reference: sym.reference });
      }
      for (const field of sym.missingFields) {
        issues.push({
          severity: "warning",
          rule: "missing_field",
          message: `${sym.reference} has no ${field}`,
          reference: sym.reference,
        });
      }
    }
    for (const reference of snapshot.unrenderable) {
      issues.push({
        severity: "error",
        rule: "missing_lib_symbol",
        message: `${reference} uses a symbol that is not in lib_symbols`,
        reference,
      });
    }
    for (const names of graph.conflicts()) {
      issues.push({ severity: "error", rule: "conflicting_net_names", message: `Connected names disagree: ${names.join(", ")}` });
    }

    const powerReferences = new Set(snapshot.symbols.filter(sym => isPowerSymbol(snapshot, sym)).map(sym => sym.reference));
    for (const pin of graph.floatingPowerPins(powerReferences)) {
      const site = sites.find(s => s.reference === pin.reference && s.pin === pin.pin);
      issues.push({
        severity: "warning",
        rule: "power_unconnected",
        message: `Power symbol ${pin.reference} (${site?.netName ?? pin.pin}) is connected to nothing`,
        reference: pin.reference,
        position: site?.position,
      });
    }

    const sitesByPin = new Map(sites.map(site => [`${site.reference}\u0000${site.pin}`, site]));
    for (const pin of graph.isolatedPins()) {
      if (pin.connected || pin.noConnect) continue;
      const site = sitesByPin.get(`${pin.reference}\u0000${pin.pin}`);
      if (site && site.electricalType === "no_connect") continue;
      issues.push({
        severity: "warning",
        rule: "pin_unconnected",
        message: `${pin.reference} pin ${pin.pin} is not connected`,
        reference: pin.reference,
        position: site?.position,
      });
    }
    return report(issues);
  }

  /**
   * Sheet tree below a root schematic. A sheet that includes one of its
   * ancestors is a structural error.
   */
  getSheetHierarchy(filePath: string): SheetNode {
    const visit = (file: string, name: string, ancestors: string[]): SheetNode => {
      const resolved = path.resolve(file);
      if (ancestors.includes(resolved)) {
        throw new StructuralInvariantViolationError(`Sheet ${file} includes itself`, {
          path: file,
          chain: [...ancestors, resolved],
        });
      }
      if (!fs.existsSync(resolved)) return { name, path: file, exists: false, sheets: [] };
      const snapshot = this.readSchematic(resolved);
      return {
        name,
        path: file,
        exists: true,
        sheets: snapshot.sheets.map(sheet =>
          visit(path.join(path.dirname(resolved), sheet.file), sheet.name, [...ancestors, resolved]),
        ),
      };
    };
    return visit(filePath, path.basename(filePath, ".kicad_sch"), []);
  }

  // ─── libraries ─────────────────────────────────────────────────────

  resolveLibrarySymbol(libId: string, projectDir?: string): SymbolInfo {
    return this.symbolLibrary(projectDir).getSymbolInfo(libId);
  }

  searchSymbols(query: string, projectDir?: string): { libId: string; description: string }[] {
    return this.symbolLibrary(projectDir).search(query);
  }

  /** Footprints matching the symbol's `ki_fp_filters`, led by its default footprint when it has one. */
  suggestFootprints(libId: string, projectDir?: string): FootprintSuggestion[] {
    const info = this.symbolLibrary(projectDir).getSymbolInfo(libId);
    const footprints = this.footprintLibrary(projectDir);
    const suggestions = footprints.suggest(info.footprintFilters);
    if (info.footprint === "" || suggestions.some(s => s.footprint === info.footprint)) return suggestions;
    const idx = info.footprint.indexOf(":");
    return [
      {
        footprint: info.footprint,
        library: idx > 0 ? info.footprint.slice(0, idx) : "",
        name: idx > 0 ? info.footprint.slice(idx + 1) : info.footprint,
        filter: "(default)",
      },
      ...suggestions,
    ];
  }

  searchFootprints(query: string, projectDir?: string): FootprintMatch[] {
    return this.footprintLibrary(projectDir).search(query);
  }

  getFootprintInfo(footprintId: string, projectDir?: string): FootprintInfo {
    return this.footprintLibrary(projectDir).getFootprintInfo(footprintId);
  }

  createProjectLibrary(project: string, name: string, kinds?: LibraryKind[]): CreatedLibrary {
    return createProjectLibrary(projectDirOf(project), name, kinds);
  }

  registerProjectLibrary(project: string, name: string, libraryPath: string, kind: LibraryKind): RegisteredLibrary {
    return registerProjectLibrary(projectDirOf(project), name, libraryPath, kind);
  }

  /** Copy a library symbol into a project `.kicad_sym`, parents included. */
  importSymbol(libId: string, targetFile: string, projectDir?: string): ImportedSymbol {
    return importSymbol(this.symbolLibrary(projectDir ?? path.dirname(targetFile)), libId, targetFile);
  }

  importFootprint(footprintId: string, targetDir: string, projectDir?: string): ImportedFootprint {
    return importFootprint(this.footprintLibrary(projectDir ?? path.dirname(targetDir)), footprintId, targetDir);
  }

  // ─── boards ────────────────────────────────────────────────────────

  readBoard(filePath: string): BoardSnapshot {
    return BoardDocument.load(filePath).snapshot();
  }

  getBoardInfo(filePath: string): BoardInfo {
    return BoardDocument.load(filePath).info();
  }

  getDesignRules(filePath: string): Record<string, DesignRuleValue> {
    return BoardDocument.load(filePath).designRules();
  }

  createBoard(filePath: string): BoardSnapshot {
    BoardDocument.create(filePath, { paper: this.options.paper });
    return this.readBoard(filePath);
  }

  private loadFootprint(projectDir: string): (footprintId: string) => SList | undefined {
    const library = this.footprintLibrary(projectDir);
    return footprintId => {
      try {
        return library.load(footprintId);
      } catch (err) {
        if (err instanceof NotFoundError) return undefined;
        throw err;
      }
    };
  }

  placeFootprint(filePath: string, options: BoardPlacement): { reference: string; fromLibrary: boolean } {
    const definition = this.loadFootprint(path.dirname(filePath))(options.footprintId);
    if (!definition) {
      console.warn(`⚠️  ${options.footprintId} not found in any footprint library; placing ${options.reference} without pads`);
    }
    this.editBoard(filePath, doc => doc.placeFootprint({ ...options, definition }));
    return { reference: options.reference, fromLibrary: definition !== undefined };
  }

  moveFootprint(filePath: string, reference: string, target: { x: number; y: number; rotation?: number }) {
    this.editBoard(filePath, doc => doc.moveFootprint(reference, target));
  }

  removeFootprint(filePath: string, reference: string) {
    this.editBoard(filePath, doc => doc.removeFootprint(reference));
  }

  setFootprintProperty(filePath: string, reference: string, name: string, value: string) {
    this.editBoard(filePath, doc => doc.setFootprintProperty(reference, name, value));
  }

  addTrack(filePath: string, options: TrackOptions): { uuid: string } {
    return this.editBoard(filePath, doc => ({ uuid: uuidOf(doc.addTrack(options)) }));
  }

  addVia(filePath: string, options: ViaOptions): { uuid: string } {
    return this.editBoard(filePath, doc => ({ uuid: uuidOf(doc.addVia(options)) }));
  }

  assignNet(filePath: string, reference: string, pad: string, net: string): BoardNet {
    return this.editBoard(filePath, doc => doc.assignNet(reference, pad, net));
  }

  validateBoard(filePath: string): ValidationReport {
    return BoardDocument.load(filePath).validate();
  }

  // ─── schematic against board ───────────────────────────────────────

  compareSchematicBoard(schematicPath: string, boardPath: string): ComparisonResult {
    return compare(this.readSchematic(schematicPath), this.readBoard(boardPath));
  }

  syncSchematicToBoard(schematicPath: string, boardPath: string): SyncResult {
    const schematic = this.readSchematic(schematicPath);
    const loader = this.loadFootprint(path.dirname(boardPath));
    return this.editBoard(boardPath, doc => sync(schematic, doc, loader));
  }
}

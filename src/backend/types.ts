import type { NetMembers, NetSummary, PinNet } from "../kicad/Connectivity";
import type { PlaceFootprintOptions, TrackOptions, ViaOptions } from "../kicad/BoardDocument";
import type { FootprintInfo, FootprintMatch, FootprintSuggestion } from "../kicad/FootprintLibrary";
import type {
  CreatedLibrary,
  ImportedFootprint,
  ImportedSymbol,
  LibraryKind,
  RegisteredLibrary,
} from "../kicad/ProjectLibrary";
import type {
  AddLabelOptions,
  AddPowerOptions,
  AddSymbolOptions,
  CreateSchematicOptions,
  MoveTarget,
  SymbolUpdate,
} from "../kicad/SchematicDocument";
import type { SymbolInfo } from "../kicad/SymbolLibrary";
import type { ComparisonResult, SyncResult } from "../kicad/SyncEngine";
import type {
  BoardInfo,
  BoardNet,
  BoardSnapshot,
  DesignRuleValue,
  PlacedPin,
  Point,
  SchematicSnapshot,
  ValidationReport,
} from "../kicad/types";

export interface BackendCapabilities {
  name: string;
  /** Talks to a running editor session rather than files on disk. */
  live: boolean;
  schematic: boolean;
  board: boolean;
  connectivity: boolean;
  sync: boolean;
}

export interface PlacedSymbolResult {
  reference: string;
  uuid: string;
  unit: number;
  /** The library definition was copied into the document's cache. */
  cached: boolean;
}

export interface UnitPins {
  reference: string;
  unit: number;
  pins: PlacedPin[];
}

export interface SheetNode {
  name: string;
  path: string;
  exists: boolean;
  sheets: SheetNode[];
}

/** Schematic placement for a footprint taken from a library. */
export type BoardPlacement = Omit<PlaceFootprintOptions, "definition">;

/**
 * Operations an EDA backend exposes to the tool layer. Every call names the
 * file it works on and either returns a structured result or throws an
 * `EdaFileError`; a failed mutation leaves the file untouched.
 */
export interface EdaBackend {
  capabilities(): BackendCapabilities;

  // schematic documents
  readSchematic(path: string): SchematicSnapshot;
  createSchematic(path: string, options?: CreateSchematicOptions): SchematicSnapshot;
  addSymbol(path: string, options: AddSymbolOptions): PlacedSymbolResult;
  removeSymbol(path: string, reference: string, unit?: number): { removed: number };
  moveSymbol(path: string, reference: string, target: MoveTarget, unit?: number): UnitPins;
  updateSymbol(path: string, reference: string, changes: SymbolUpdate): { reference: string; units: number };
  addWire(path: string, start: Point, end: Point): { uuid: string };
  removeWire(path: string, start: Point, end: Point): void;
  addLabel(path: string, options: AddLabelOptions): { uuid: string };
  removeLabel(path: string, text: string, at?: Point): { removed: number };
  addJunction(path: string, at: Point): { uuid: string };
  removeJunction(path: string, at: Point): void;
  addNoConnect(path: string, at: Point): { uuid: string };
  removeNoConnect(path: string, at: Point): void;
  addPowerSymbol(path: string, options: AddPowerOptions): PlacedSymbolResult;

  // geometry and connectivity
  getPinPositions(path: string, reference: string): UnitPins[];
  getPinNet(path: string, reference: string, pin: string): PinNet;
  getNetMembers(path: string, net: string): NetMembers;
  listNets(path: string): NetSummary[];
  validateSchematic(path: string): ValidationReport;
  getSheetHierarchy(path: string): SheetNode;

  // libraries
  resolveLibrarySymbol(libId: string, projectDir?: string): SymbolInfo;
  searchSymbols(query: string, projectDir?: string): { libId: string; description: string }[];
  suggestFootprints(libId: string, projectDir?: string): FootprintSuggestion[];
  searchFootprints(query: string, projectDir?: string): FootprintMatch[];
  getFootprintInfo(footprintId: string, projectDir?: string): FootprintInfo;
  createProjectLibrary(project: string, name: string, kinds?: LibraryKind[]): CreatedLibrary;
  registerProjectLibrary(project: string, name: string, libraryPath: string, kind: LibraryKind): RegisteredLibrary;
  importSymbol(libId: string, targetFile: string, projectDir?: string): ImportedSymbol;
  importFootprint(footprintId: string, targetDir: string, projectDir?: string): ImportedFootprint;

  // boards
  readBoard(path: string): BoardSnapshot;
  getBoardInfo(path: string): BoardInfo;
  getDesignRules(path: string): Record<string, DesignRuleValue>;
  createBoard(path: string): BoardSnapshot;
  placeFootprint(path: string, options: BoardPlacement): { reference: string; fromLibrary: boolean };
  moveFootprint(path: string, reference: string, target: { x: number; y: number; rotation?: number }): void;
  removeFootprint(path: string, reference: string): void;
  setFootprintProperty(path: string, reference: string, name: string, value: string): void;
  addTrack(path: string, options: TrackOptions): { uuid: string };
  addVia(path: string, options: ViaOptions): { uuid: string };
  assignNet(path: string, reference: string, pad: string, net: string): BoardNet;
  validateBoard(path: string): ValidationReport;

  // schematic against board
  compareSchematicBoard(schematicPath: string, boardPath: string): ComparisonResult;
  syncSchematicToBoard(schematicPath: string, boardPath: string): SyncResult;
}

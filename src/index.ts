export * from "./kicad/errors";
export * from "./kicad/types";
export { SExpressionParser } from "./kicad/SExpressionParser";
export type { SAtom, SDocument, SExpr, SList, SNode } from "./kicad/SExpressionParser";
export { KicadDocument } from "./kicad/KicadDocument";
export {
  SchematicDocument,
  SCHEMATIC_VERSION,
  validateNetName,
  validateReference,
} from "./kicad/SchematicDocument";
export type {
  AddLabelOptions,
  AddPowerOptions,
  AddSymbolOptions,
  CreateSchematicOptions,
  MoveTarget,
  SymbolUpdate,
} from "./kicad/SchematicDocument";
export { BoardDocument, BOARD_VERSION } from "./kicad/BoardDocument";
export type { PlaceFootprintOptions, TrackOptions, ViaOptions } from "./kicad/BoardDocument";
export { readSchematic, readWithFallback, StrictSchematicReader, TolerantSchematicReader } from "./kicad/SchematicReader";
export type { ReaderOutcome, SchematicReader } from "./kicad/SchematicReader";
export { SymbolLibrary, MAX_INHERITANCE_DEPTH, splitLibId } from "./kicad/SymbolLibrary";
export type { LibrarySearchOptions, LibrarySymbolDefinition, SymbolInfo } from "./kicad/SymbolLibrary";
export { FootprintLibrary, MAX_FOOTPRINT_SUGGESTIONS, filterToRegExp } from "./kicad/FootprintLibrary";
export type { FootprintInfo, FootprintMatch, FootprintPad, FootprintSuggestion } from "./kicad/FootprintLibrary";
export { LibraryTable, substituteVariables } from "./kicad/LibraryTable";
export type { LibraryTableEntry, LibraryTableKind } from "./kicad/LibraryTable";
export { SymbolLibraryDocument, SYMBOL_LIBRARY_VERSION } from "./kicad/SymbolLibraryDocument";
export {
  createProjectLibrary,
  importFootprint,
  importSymbol,
  projectUri,
  registerProjectLibrary,
} from "./kicad/ProjectLibrary";
export type {
  CreatedLibrary,
  ImportedFootprint,
  ImportedSymbol,
  LibraryKind,
  RegisteredLibrary,
} from "./kicad/ProjectLibrary";
export { transformPoint, transformPin, placePins, normalizeRotation, rotateOffset } from "./kicad/Geometry";
export { ConnectivityGraph, WIRE_TOLERANCE } from "./kicad/Connectivity";
export type { ConnectivityInput, NetMembers, NetSummary, PinNet, PinSite } from "./kicad/Connectivity";
export { compare, sync } from "./kicad/SyncEngine";
export type { ComparisonResult, SyncResult, SyncWarning } from "./kicad/SyncEngine";
export { writeAtomic, contentHash } from "./kicad/DocumentFile";
export { FileBackend } from "./backend/FileBackend";
export type { FileBackendOptions } from "./backend/FileBackend";
export type * from "./backend/types";
export { getConfig, loadConfig, parseConfigFile } from "./cli/config";
export type { Config } from "./cli/config";

export interface Point {
  x: number;
  y: number;
}

export type Mirror = "x" | "y";

/** Where a symbol sits on the sheet. Rotation is in degrees, counter-clockwise on screen. */
export interface Placement extends Point {
  rotation: number;
  mirror?: Mirror;
}

export interface InstancePath {
  project: string;
  path: string;
  reference: string;
  unit: number;
}

export interface SymbolInstance {
  libId: string;
  reference: string;
  value: string;
  footprint?: string;
  unit: number;
  position: Placement;
  inBom: boolean;
  onBoard: boolean;
  dnp: boolean;
  excludeFromSim: boolean;
  uuid?: string;
  properties: Record<string, string>;
  instances: InstancePath[];
  /** Required instance fields absent from the file. */
  missingFields: string[];
}

export interface Wire {
  start: Point;
  end: Point;
  uuid?: string;
}

export type LabelKind = "label" | "global_label" | "hierarchical_label";

export interface Label {
  kind: LabelKind;
  text: string;
  position: Point;
  rotation: number;
  shape?: string;
  uuid?: string;
}

export interface Marker {
  position: Point;
  uuid?: string;
}

export interface SheetPin {
  name: string;
  shape: string;
  position: Point;
}

export interface Sheet {
  name: string;
  file: string;
  position: Point;
  size: { width: number; height: number };
  uuid?: string;
  pins: SheetPin[];
}

export type PinElectricalType =
  | "input"
  | "output"
  | "bidirectional"
  | "tri_state"
  | "passive"
  | "free"
  | "unspecified"
  | "power_in"
  | "power_out"
  | "open_collector"
  | "open_emitter"
  | "no_connect";

/** Pin as drawn in the library, in library (Y-up) coordinates. */
export interface LibraryPin {
  number: string;
  name: string;
  x: number;
  y: number;
  /** Direction the pin points away from its connection point, degrees. */
  rotation: number;
  length: number;
  electricalType: string;
  /** Unit the pin belongs to; 0 means shared by every unit. */
  unit: number;
  hidden: boolean;
}

/** Pin after placement, in sheet coordinates. */
export interface PlacedPin {
  number: string;
  name: string;
  x: number;
  y: number;
  rotation: number;
  electricalType: string;
}

export interface CachedSymbol {
  libId: string;
  extends?: string;
  isPower: boolean;
  properties: Record<string, string>;
  pins: LibraryPin[];
  unitCount: number;
}

export interface TitleBlock {
  title?: string;
  date?: string;
  revision?: string;
  company?: string;
  comments: string[];
}

export interface SchematicSnapshot {
  path?: string;
  uuid?: string;
  version?: string;
  generator?: string;
  paper?: string;
  titleBlock?: TitleBlock;
  symbols: SymbolInstance[];
  wires: Wire[];
  labels: Label[];
  junctions: Marker[];
  noConnects: Marker[];
  sheets: Sheet[];
  libSymbols: CachedSymbol[];
  /** References whose lib_id has no cache entry. */
  unrenderable: string[];
}

// ─── Board ──────────────────────────────────────────────────────────

export interface BoardNet {
  code: number;
  name: string;
}

export interface BoardPad {
  number: string;
  type: string;
  shape: string;
  position: Point;
  net?: BoardNet;
}

export interface BoardFootprint {
  reference: string;
  value: string;
  footprint: string;
  layer: string;
  position: Placement;
  uuid?: string;
  pads: BoardPad[];
}

export interface Track {
  start: Point;
  end: Point;
  width: number;
  layer: string;
  net: number;
  uuid?: string;
}

export interface Via {
  position: Point;
  size: number;
  drill: number;
  layers: string[];
  net: number;
  uuid?: string;
}

export interface Zone {
  net: number;
  netName: string;
  layers: string[];
  uuid?: string;
}

export interface BoardSnapshot {
  path?: string;
  version?: string;
  generator?: string;
  layers: string[];
  nets: BoardNet[];
  footprints: BoardFootprint[];
  tracks: Track[];
  vias: Via[];
  zones: Zone[];
}

export interface BoardLayer {
  ordinal: number;
  name: string;
  /** `signal`, `power`, `mixed`, `jumper` or `user`. */
  type: string;
  userName?: string;
}

export interface BoardInfo {
  path?: string;
  version?: string;
  generator?: string;
  paper?: string;
  /** Board thickness in mm, from `(general (thickness ...))`. */
  thickness?: number;
  titleBlock?: TitleBlock;
  layers: BoardLayer[];
  footprintCount: number;
  /** Named nets; the empty net 0 is not counted. */
  netCount: number;
  trackCount: number;
  viaCount: number;
  zoneCount: number;
}

/** A `(setup ...)` value: one number, several numbers, or words such as `yes`. */
export type DesignRuleValue = number | number[] | string;

export interface ValidationIssue {
  severity: "error" | "warning";
  rule: string;
  message: string;
  reference?: string;
  position?: Point;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

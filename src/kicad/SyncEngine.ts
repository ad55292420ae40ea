import { BoardDocument } from "./BoardDocument";
import { EdaFileError } from "./errors";
import { SList } from "./SExpressionParser";
import { BoardSnapshot, Point, SchematicSnapshot, SymbolInstance } from "./types";

/** Spacing of the grid new footprints are dropped onto, in mm. */
export const PLACEMENT_PITCH = 5.08;
export const PLACEMENT_COLUMNS = 10;

export interface PartEntry {
  reference: string;
  value: string;
  footprint: string;
}

export interface Mismatch {
  reference: string;
  schematic: string;
  board: string;
}

export interface ComparisonResult {
  missingFromBoard: PartEntry[];
  missingFromSchematic: PartEntry[];
  footprintMismatches: Mismatch[];
  valueMismatches: Mismatch[];
  matched: string[];
}

export interface SyncWarning {
  reference: string;
  kind: "footprint_mismatch" | "board_only" | "no_footprint" | "footprint_unavailable";
  message: string;
}

export interface SyncResult {
  comparison: ComparisonResult;
  placed: { reference: string; footprint: string; position: Point; fromLibrary: boolean }[];
  valuesUpdated: Mismatch[];
  warnings: SyncWarning[];
}

/** Supplies library footprints for placement; undefined means "not available". */
export type FootprintLoader = (footprintId: string) => SList | undefined;

function byReference(a: { reference: string }, b: { reference: string }): number {
  return a.reference.localeCompare(b.reference, undefined, { numeric: true });
}

/** Parts the board is expected to carry, one per reference. */
export function schematicParts(snapshot: SchematicSnapshot): PartEntry[] {
  const powerIds = new Set(snapshot.libSymbols.filter(s => s.isPower).map(s => s.libId));
  const parts = new Map<string, PartEntry>();
  const eligible = (sym: SymbolInstance) =>
    !sym.reference.startsWith("#") && !powerIds.has(sym.libId) && sym.onBoard;

  for (const sym of snapshot.symbols.filter(eligible)) {
    if (parts.has(sym.reference)) continue;
    parts.set(sym.reference, { reference: sym.reference, value: sym.value, footprint: sym.footprint ?? "" });
  }
  return [...parts.values()].sort(byReference);
}

export function boardParts(snapshot: BoardSnapshot): PartEntry[] {
  const parts = new Map<string, PartEntry>();
  for (const fp of snapshot.footprints) {
    if (fp.reference === "" || fp.reference.startsWith("#") || parts.has(fp.reference)) continue;
    parts.set(fp.reference, { reference: fp.reference, value: fp.value, footprint: fp.footprint });
  }
  return [...parts.values()].sort(byReference);
}

/**
 * Diff of the parts on a schematic against the footprints on a board.
 * Footprint and value differences only count when both sides name one.
 */
export function compare(schematic: SchematicSnapshot, board: BoardSnapshot): ComparisonResult {
  const sch = schematicParts(schematic);
  const brd = new Map(boardParts(board).map(p => [p.reference, p]));
  const result: ComparisonResult = {
    missingFromBoard: [],
    missingFromSchematic: [],
    footprintMismatches: [],
    valueMismatches: [],
    matched: [],
  };

  for (const part of sch) {
    const onBoard = brd.get(part.reference);
    if (!onBoard) {
      result.missingFromBoard.push(part);
      continue;
    }
    brd.delete(part.reference);
    result.matched.push(part.reference);
    if (part.footprint !== "" && onBoard.footprint !== "" && part.footprint !== onBoard.footprint) {
      result.footprintMismatches.push({ reference: part.reference, schematic: part.footprint, board: onBoard.footprint });
    }
    if (part.value !== "" && onBoard.value !== "" && part.value !== onBoard.value) {
      result.valueMismatches.push({ reference: part.reference, schematic: part.value, board: onBoard.value });
    }
  }
  result.missingFromSchematic = [...brd.values()];
  return result;
}

/**
 * Bring the board in line with the schematic: place missing parts on a grid
 * right of the existing footprints and copy values over. Footprint choice is
 * left to the user; those differences come back as warnings.
 */
export function sync(schematic: SchematicSnapshot, board: BoardDocument, loadFootprint: FootprintLoader): SyncResult {
  const comparison = compare(schematic, board.snapshot());
  const result: SyncResult = { comparison, placed: [], valuesUpdated: [], warnings: [] };

  const extent = board.extent();
  const originX = extent ? extent.maxX + 2 * PLACEMENT_PITCH : 100;
  const originY = extent ? extent.minY : 100;
  let slot = 0;

  for (const part of comparison.missingFromBoard) {
    if (part.footprint === "") {
      result.warnings.push({
        reference: part.reference,
        kind: "no_footprint",
        message: `${part.reference} has no footprint assigned; assign one and sync again`,
      });
      continue;
    }
    let definition: SList | undefined;
    try {
      definition = loadFootprint(part.footprint);
    } catch (error) {
      if (!(error instanceof EdaFileError)) throw error;
      definition = undefined;
    }
    if (!definition) {
      result.warnings.push({
        reference: part.reference,
        kind: "footprint_unavailable",
        message: `${part.footprint} was not found in any footprint library; ${part.reference} was placed without pads`,
      });
    }

    const position = {
      x: originX + (slot % PLACEMENT_COLUMNS) * PLACEMENT_PITCH,
      y: originY + Math.floor(slot / PLACEMENT_COLUMNS) * PLACEMENT_PITCH,
    };
    slot++;
    board.placeFootprint({
      footprintId: part.footprint,
      reference: part.reference,
      value: part.value,
      x: position.x,
      y: position.y,
      definition,
    });
    result.placed.push({ reference: part.reference, footprint: part.footprint, position, fromLibrary: definition !== undefined });
  }

  for (const mismatch of comparison.valueMismatches) {
    board.setFootprintProperty(mismatch.reference, "Value", mismatch.schematic);
    result.valuesUpdated.push(mismatch);
  }

  for (const mismatch of comparison.footprintMismatches) {
    result.warnings.push({
      reference: mismatch.reference,
      kind: "footprint_mismatch",
      message: `${mismatch.reference}: schematic uses ${mismatch.schematic}, board has ${mismatch.board}`,
    });
  }
  for (const part of comparison.missingFromSchematic) {
    result.warnings.push({
      reference: part.reference,
      kind: "board_only",
      message: `${part.reference} is on the board but not in the schematic`,
    });
  }
  return result;
}

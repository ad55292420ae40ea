import { SList } from "./SExpressionParser";
import { atomAt, childNumbers, childValue, findChild, findChildren, propertiesOf } from "./SExprTree";
import { CachedSymbol, LibraryPin } from "./types";

/** Reads `(symbol "Name" ...)` definitions from libraries and lib_symbols caches. */

export function symbolName(node: SList): string {
  return atomAt(node, 1) ?? "";
}

export function extendsOf(node: SList): string | undefined {
  return childValue(node, "extends");
}

/** `R_1_2` → unit 1, body style 2. Names without the suffix count as unit 0. */
export function unitSuffix(name: string): { unit: number; style: number } {
  const match = name.match(/_(\d+)_(\d+)$/);
  return match ? { unit: Number(match[1]), style: Number(match[2]) } : { unit: 0, style: 0 };
}

function readPin(pin: SList, unit: number): LibraryPin | undefined {
  const at = childNumbers(pin, "at");
  if (at.length < 2) return undefined;
  const hideChild = findChild(pin, "hide");
  const hidden =
    pin.items.some(item => item.type === "atom" && item.text === "hide") ||
    (hideChild !== undefined && atomAt(hideChild, 1) !== "no");
  return {
    number: childValue(pin, "number") ?? "",
    name: childValue(pin, "name") ?? "",
    x: at[0],
    y: at[1],
    rotation: at[2] ?? 0,
    length: childNumbers(pin, "length")[0] ?? 0,
    electricalType: atomAt(pin, 1) ?? "unspecified",
    unit,
    hidden,
  };
}

/**
 * Pins drawn by this definition itself, excluding anything it inherits.
 * Alternate body styles (De Morgan) repeat the same pins and are skipped.
 */
export function ownPins(node: SList): LibraryPin[] {
  const pins: LibraryPin[] = [];
  for (const pin of findChildren(node, "pin")) {
    const parsed = readPin(pin, 0);
    if (parsed) pins.push(parsed);
  }
  for (const sub of findChildren(node, "symbol")) {
    const { unit, style } = unitSuffix(symbolName(sub));
    if (style > 1) continue;
    for (const pin of findChildren(sub, "pin")) {
      const parsed = readPin(pin, unit);
      if (parsed) pins.push(parsed);
    }
  }
  return pins;
}

export function isPowerDefinition(node: SList): boolean {
  return findChild(node, "power") !== undefined;
}

export function unitCount(node: SList): number {
  let max = 1;
  for (const sub of findChildren(node, "symbol")) {
    max = Math.max(max, unitSuffix(symbolName(sub)).unit);
  }
  return max;
}

export function readCachedSymbol(node: SList): CachedSymbol {
  const props = propertiesOf(node);
  return {
    libId: symbolName(node),
    extends: extendsOf(node),
    isPower: isPowerDefinition(node),
    properties: Object.fromEntries(props),
    pins: ownPins(node),
    unitCount: unitCount(node),
  };
}

/** `ki_fp_filters` holds space separated wildcard patterns. */
export function footprintFilters(properties: Record<string, string>): string[] {
  const raw = properties["ki_fp_filters"];
  return raw ? raw.split(/\s+/).filter(f => f.length > 0) : [];
}

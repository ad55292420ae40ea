import * as fs from "fs";
import * as path from "path";

export type LibraryKind = "symbols" | "footprints";

const ENV_VARS: Record<LibraryKind, string[]> = {
  symbols: ["KICAD_SYMBOL_DIR", "KICAD9_SYMBOL_DIR", "KICAD8_SYMBOL_DIR", "KICAD7_SYMBOL_DIR"],
  footprints: ["KICAD_FOOTPRINT_DIR", "KICAD9_FOOTPRINT_DIR", "KICAD8_FOOTPRINT_DIR", "KICAD7_FOOTPRINT_DIR"],
};

// Standard install locations of the KiCad library share directory
const SHARE_DIRS = [
  "/usr/share/kicad",
  "/usr/local/share/kicad",
  "/Applications/KiCad/KiCad.app/Contents/SharedSupport",
  "C:\\Program Files\\KiCad\\share\\kicad",
];

/**
 * Library roots known to the system: directories named by the KiCad
 * environment variables (colon separated), then platform install locations.
 * Only existing directories are returned.
 */
export function systemLibraryRoots(kind: LibraryKind, env: NodeJS.ProcessEnv = process.env): string[] {
  const roots: string[] = [];
  for (const name of ENV_VARS[kind]) {
    const value = env[name];
    if (value) roots.push(...value.split(path.delimiter).filter(p => p.length > 0));
  }
  for (const share of SHARE_DIRS) {
    roots.push(path.join(share, kind));
  }
  return [...new Set(roots)].filter(p => fs.existsSync(p));
}

/** Variables for lib-table substitution, e.g. `${KICAD9_SYMBOL_DIR}`, from the first system root found. */
export function systemTableVariables(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const variables: Record<string, string> = {};
  const symbolRoot = systemLibraryRoots("symbols", env)[0];
  const footprintRoot = systemLibraryRoots("footprints", env)[0];
  for (const version of ["", "7", "8", "9"]) {
    if (symbolRoot && !env[`KICAD${version}_SYMBOL_DIR`]) variables[`KICAD${version}_SYMBOL_DIR`] = symbolRoot;
    if (footprintRoot && !env[`KICAD${version}_FOOTPRINT_DIR`]) variables[`KICAD${version}_FOOTPRINT_DIR`] = footprintRoot;
  }
  return variables;
}

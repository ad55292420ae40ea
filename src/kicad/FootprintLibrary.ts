import * as fs from "fs";
import * as path from "path";
import { SExpressionParser, SList } from "./SExpressionParser";
import { atomAt, childNumbers, childValue, findChild, findChildren, headOf } from "./SExprTree";
import { readLibraryText } from "./DocumentFile";
import { LibraryTable } from "./LibraryTable";
import { systemLibraryRoots, systemTableVariables } from "./KicadPaths";
import { NotFoundError, ValidationError } from "./errors";

export const MAX_FOOTPRINT_SUGGESTIONS = 100;

export interface FootprintSearchOptions {
  /** Directory holding the project's `fp-lib-table`. */
  projectDir?: string;
  /** Extra directories containing `<Library>.pretty` folders. */
  footprintDirs?: string[];
  includeSystem?: boolean;
  variables?: Record<string, string>;
}

export interface FootprintMatch {
  footprint: string;
  library: string;
  name: string;
}

export interface FootprintPad {
  number: string;
  /** `smd`, `thru_hole`, `np_thru_hole` or `connect`. */
  type: string;
  shape: string;
  x: number;
  y: number;
  layers: string[];
}

export interface FootprintInfo extends FootprintMatch {
  file: string;
  description: string;
  keywords: string;
  /** Words of the `(attr ...)` list, e.g. `smd` or `through_hole`. */
  attributes: string[];
  pads: FootprintPad[];
  /** Distinct pad numbers; unnumbered mounting pads are left out. */
  padCount: number;
  smd: boolean;
}

export interface FootprintSuggestion {
  footprint: string;
  library: string;
  name: string;
  filter: string;
}

/** `ki_fp_filters` wildcard (`*`, `?`) to an anchored, case-insensitive pattern. */
export function filterToRegExp(filter: string): RegExp {
  const body = filter
    .split("")
    .map(ch => (ch === "*" ? ".*" : ch === "?" ? "." : ch.replace(/[.+^${}()|[\]\\]/g, "\\$&")))
    .join("");
  return new RegExp(`^${body}$`, "i");
}

function atomsOf(list: SList): string[] {
  const values: string[] = [];
  for (let i = 1; i < list.items.length; i++) {
    const value = atomAt(list, i);
    if (value !== undefined) values.push(value);
  }
  return values;
}

/**
 * Footprint libraries are `<Library>.pretty` directories holding one
 * `<Name>.kicad_mod` file per footprint.
 */
export class FootprintLibrary {
  private libraries: Map<string, string> | undefined;
  private readonly options: FootprintSearchOptions;

  constructor(options: FootprintSearchOptions = {}) {
    this.options = options;
  }

  /** Library nickname → `.pretty` directory. Project table entries win. */
  listLibraries(): Map<string, string> {
    if (this.libraries) return this.libraries;

    const libraries = new Map<string, string>();
    const includeSystem = this.options.includeSystem ?? true;
    if (this.options.projectDir) {
      const variables = { ...(includeSystem ? systemTableVariables() : {}), ...(this.options.variables ?? {}) };
      const table = LibraryTable.load(path.join(this.options.projectDir, "fp-lib-table"), "fp_lib_table", variables);
      for (const entry of table.entries) {
        if (entry.resolved && fs.existsSync(entry.resolved)) libraries.set(entry.name, entry.resolved);
      }
    }

    const roots = [...(this.options.footprintDirs ?? []), ...(includeSystem ? systemLibraryRoots("footprints") : [])];
    for (const root of roots) {
      if (!fs.existsSync(root)) continue;
      for (const dir of fs.readdirSync(root).sort()) {
        if (!dir.endsWith(".pretty")) continue;
        const name = path.basename(dir, ".pretty");
        if (!libraries.has(name)) libraries.set(name, path.join(root, dir));
      }
    }

    this.libraries = libraries;
    return libraries;
  }

  listFootprints(library: string): string[] {
    const dir = this.listLibraries().get(library);
    if (!dir) return [];
    return fs
      .readdirSync(dir)
      .filter(f => f.endsWith(".kicad_mod"))
      .map(f => path.basename(f, ".kicad_mod"))
      .sort();
  }

  /**
   * File of the footprint `Library:Name`.
   * @throws NotFoundError when the library or file does not exist
   */
  locate(footprintId: string): string {
    const idx = footprintId.indexOf(":");
    if (idx <= 0) {
      throw new ValidationError(`Footprint id must look like "Library:Name", got "${footprintId}"`, { footprintId });
    }
    const library = footprintId.slice(0, idx);
    const name = footprintId.slice(idx + 1);
    const dir = this.listLibraries().get(library);
    if (!dir) throw new NotFoundError("library", library, { footprintId });

    const file = path.join(dir, `${name}.kicad_mod`);
    if (!fs.existsSync(file)) throw new NotFoundError("footprint", footprintId, { file });
    return file;
  }

  /**
   * Parsed `(footprint ...)` for `Library:Name`.
   * @throws NotFoundError when the library or file does not exist
   */
  load(footprintId: string): SList {
    const file = this.locate(footprintId);
    const root = SExpressionParser.parse(readLibraryText(file)).root;
    const head = headOf(root);
    // KiCad 5 files use `module` instead of `footprint`.
    if (root.type !== "list" || (head !== "footprint" && head !== "module")) {
      throw new NotFoundError("footprint", footprintId, { file, reason: "not a footprint file" });
    }
    return root;
  }

  /** Description, attributes and pads of a footprint. */
  getFootprintInfo(footprintId: string): FootprintInfo {
    const file = this.locate(footprintId);
    const root = this.load(footprintId);
    const idx = footprintId.indexOf(":");
    const pads = findChildren(root, "pad").map(pad => {
      const [x = 0, y = 0] = childNumbers(pad, "at");
      const layers = findChild(pad, "layers");
      return {
        number: atomAt(pad, 1) ?? "",
        type: atomAt(pad, 2) ?? "",
        shape: atomAt(pad, 3) ?? "",
        x,
        y,
        layers: layers ? atomsOf(layers) : [],
      };
    });
    const attr = findChild(root, "attr");
    return {
      footprint: footprintId,
      library: footprintId.slice(0, idx),
      name: footprintId.slice(idx + 1),
      file,
      description: childValue(root, "descr") ?? "",
      keywords: childValue(root, "tags") ?? "",
      attributes: attr ? atomsOf(attr) : [],
      pads,
      padCount: new Set(pads.map(p => p.number).filter(n => n !== "")).size,
      smd: pads.some(p => p.type === "smd"),
    };
  }

  /** Footprints whose name contains `query`, ignoring case. */
  search(query: string, limit = 50): FootprintMatch[] {
    const needle = query.toLowerCase();
    const results: FootprintMatch[] = [];
    for (const library of [...this.listLibraries().keys()].sort()) {
      for (const name of this.listFootprints(library)) {
        if (!name.toLowerCase().includes(needle)) continue;
        results.push({ footprint: `${library}:${name}`, library, name });
        if (results.length >= limit) return results;
      }
    }
    return results;
  }

  /**
   * Footprints matching any of the wildcard filters. A filter containing `:`
   * is matched against `Library:Name`, others against the name alone.
   */
  suggest(filters: string[], limit = MAX_FOOTPRINT_SUGGESTIONS): FootprintSuggestion[] {
    if (filters.length === 0) return [];
    const patterns = filters.map(filter => ({ filter, regex: filterToRegExp(filter), qualified: filter.includes(":") }));
    const results: FootprintSuggestion[] = [];

    for (const library of [...this.listLibraries().keys()].sort()) {
      for (const name of this.listFootprints(library)) {
        const footprint = `${library}:${name}`;
        const hit = patterns.find(p => p.regex.test(p.qualified ? footprint : name));
        if (!hit) continue;
        results.push({ footprint, library, name, filter: hit.filter });
        if (results.length >= limit) return results;
      }
    }
    return results;
  }
}

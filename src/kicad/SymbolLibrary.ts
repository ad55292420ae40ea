import * as fs from "fs";
import * as path from "path";
import { SExpr, SExpressionParser, SList } from "./SExpressionParser";
import { findChildren, headOf, propertiesOf } from "./SExprTree";
import { LibraryTable } from "./LibraryTable";
import { systemLibraryRoots, systemTableVariables } from "./KicadPaths";
import { readLibraryText } from "./DocumentFile";
import { extendsOf, footprintFilters, isPowerDefinition, ownPins, symbolName, unitCount } from "./LibrarySymbol";
import { SchematicDocument } from "./SchematicDocument";
import {
  EdaFileError,
  GeometryUnresolvedError,
  InheritanceDepthExceededError,
  NotFoundError,
  ValidationError,
} from "./errors";
import { LibraryPin } from "./types";

/** Longest `extends` chain followed before giving up. */
export const MAX_INHERITANCE_DEPTH = 5;

export interface LibrarySearchOptions {
  /** Directory holding the project's `sym-lib-table`. */
  projectDir?: string;
  /** Extra directories searched for `<library>.kicad_sym`. */
  symbolDirs?: string[];
  /** Search the KiCad install locations too. Defaults to true. */
  includeSystem?: boolean;
  /** Values for `${VAR}` references in library tables. */
  variables?: Record<string, string>;
}

export interface LibrarySymbolDefinition {
  libId: string;
  library: string;
  name: string;
  file: string;
  /** Definition as written in the library file. */
  node: SList;
  extends?: string;
}

export interface SymbolInfo {
  libId: string;
  description: string;
  keywords: string;
  datasheet: string;
  footprint: string;
  footprintFilters: string[];
  isPower: boolean;
  unitCount: number;
  pins: LibraryPin[];
}

export function splitLibId(libId: string): { library: string; name: string } {
  const idx = libId.indexOf(":");
  if (idx <= 0 || idx === libId.length - 1) {
    throw new ValidationError(`Library id must look like "Library:Symbol", got "${libId}"`, { libId });
  }
  return { library: libId.slice(0, idx), name: libId.slice(idx + 1) };
}

/** `extends` names inside a library are usually unqualified and refer to the same library. */
function qualify(name: string, library: string): string {
  return name.includes(":") || library === "" ? name : `${library}:${name}`;
}

function plainList(node: SList): SExpr[] {
  return node.items.map(item => SExpressionParser.toPlain(item));
}

function keywordOf(expr: SExpr): string {
  return Array.isArray(expr) && typeof expr[0] === "string" ? expr[0] : "";
}

/**
 * Finds symbol definitions across the project library table, configured
 * directories and the system libraries, and copies them into documents.
 */
export class SymbolLibrary {
  private loadedLibraries = new Map<string, Map<string, SList>>();
  private searchPaths: string[];
  private projectTable: LibraryTable | undefined;

  constructor(options: LibrarySearchOptions = {}) {
    const includeSystem = options.includeSystem ?? true;
    const variables = { ...(includeSystem ? systemTableVariables() : {}), ...(options.variables ?? {}) };
    this.projectTable = options.projectDir
      ? LibraryTable.load(path.join(options.projectDir, "sym-lib-table"), "sym_lib_table", variables)
      : undefined;
    this.searchPaths = [...(options.symbolDirs ?? []), ...(includeSystem ? systemLibraryRoots("symbols") : [])];
  }

  /** Location of `<library>.kicad_sym`: project table first, then search directories. */
  libraryFile(library: string): string | undefined {
    const fromTable = this.projectTable?.locate(library);
    if (fromTable && fs.existsSync(fromTable)) return fromTable;

    for (const searchPath of this.searchPaths) {
      const filePath = path.join(searchPath, `${library}.kicad_sym`);
      if (fs.existsSync(filePath)) return filePath;
    }
    return undefined;
  }

  /** Nicknames of every library reachable from the project table and search paths. */
  listLibraries(): string[] {
    const names = new Set<string>();
    for (const entry of this.projectTable?.entries ?? []) names.add(entry.name);
    for (const searchPath of this.searchPaths) {
      if (!fs.existsSync(searchPath)) continue;
      for (const file of fs.readdirSync(searchPath)) {
        if (file.endsWith(".kicad_sym")) names.add(path.basename(file, ".kicad_sym"));
      }
    }
    return [...names].sort();
  }

  private loadLibrary(filePath: string): Map<string, SList> {
    const loaded = this.loadedLibraries.get(filePath);
    if (loaded) return loaded;

    const symbolMap = new Map<string, SList>();
    try {
      const root = SExpressionParser.parse(readLibraryText(filePath)).root;
      if (root.type === "list" && headOf(root) === "kicad_symbol_lib") {
        for (const item of findChildren(root, "symbol")) {
          symbolMap.set(symbolName(item), item);
        }
      }
    } catch (e) {
      if (!(e instanceof EdaFileError)) throw e;
      console.warn(`⚠️  Failed to parse library ${filePath}: ${e.message}`);
    }
    this.loadedLibraries.set(filePath, symbolMap);
    return symbolMap;
  }

  /**
   * Find a definition by `Library:Symbol`.
   * @throws NotFoundError when the library or the symbol does not exist
   */
  resolve(libId: string): LibrarySymbolDefinition {
    const { library, name } = splitLibId(libId);
    const file = this.libraryFile(library);
    if (!file) {
      throw new NotFoundError("library", library, { libId });
    }
    const node = this.loadLibrary(file).get(name);
    if (!node) {
      throw new NotFoundError("symbol", libId, { file });
    }
    return { libId, library, name, file, node, extends: extendsOf(node) };
  }

  /**
   * The definition followed by its ancestors, nearest first.
   * @throws InheritanceDepthExceededError on cycles or chains deeper than MAX_INHERITANCE_DEPTH
   */
  resolveChain(libId: string): LibrarySymbolDefinition[] {
    const chain = [this.resolve(libId)];
    const visited = new Set([libId]);
    let current = chain[0];

    while (current.extends !== undefined) {
      const parentId = qualify(current.extends, current.library);
      const ids = [...chain.map(c => c.libId), parentId];
      if (visited.has(parentId)) throw new InheritanceDepthExceededError(ids, "cycle");
      if (chain.length > MAX_INHERITANCE_DEPTH) throw new InheritanceDepthExceededError(ids, "depth");
      visited.add(parentId);
      current = this.resolve(parentId);
      chain.push(current);
    }
    return chain;
  }

  /**
   * Pins of a definition. A definition without pins of its own takes them
   * from its `extends` parent, re-read from the library file.
   */
  resolvePins(definition: SList, library = ""): LibraryPin[] {
    const startId = symbolName(definition);
    const lib = startId.includes(":") ? splitLibId(startId).library : library;
    const chain = [qualify(startId, lib)];
    const visited = new Set(chain);
    let node = definition;
    let nodeLibrary = lib;

    for (let depth = 0; ; depth++) {
      const pins = ownPins(node);
      if (pins.length > 0) return pins;

      const parent = extendsOf(node);
      if (parent === undefined) {
        throw new GeometryUnresolvedError(chain[0], { chain });
      }
      const parentId = qualify(parent, nodeLibrary);
      chain.push(parentId);
      if (visited.has(parentId)) throw new InheritanceDepthExceededError(chain, "cycle");
      if (depth >= MAX_INHERITANCE_DEPTH) throw new InheritanceDepthExceededError(chain, "depth");
      visited.add(parentId);

      const resolved = this.resolve(parentId);
      node = resolved.node;
      nodeLibrary = resolved.library;
    }
  }

  resolvePinsById(libId: string): LibraryPin[] {
    const def = this.resolve(libId);
    return this.resolvePins(def.node, def.library);
  }

  /**
   * Self-contained definition for a `lib_symbols` cache. The outer name is
   * qualified; inherited units are renamed after the derived symbol; unit
   * names never carry the library prefix.
   */
  flatten(libId: string): SExpr[] {
    const chain = this.resolveChain(libId);
    const own = plainList(chain[0].node).filter(item => keywordOf(item) !== "extends");
    own[1] = SExpressionParser.quote(libId);
    if (chain.length === 1) return own;

    const childShortName = chain[0].name;
    const mergedProps = new Map<string, SExpr>();
    const mergedUnits: SExpr[] = [];
    const inheritedOthers = new Map<string, SExpr>();

    // Root-most ancestor first, so nearer definitions override farther ones.
    for (const ancestor of chain.slice(1).reverse()) {
      for (const item of plainList(ancestor.node).slice(2)) {
        const keyword = keywordOf(item);
        if (!Array.isArray(item) || keyword === "extends") continue;
        if (keyword === "property" && typeof item[1] === "string") {
          mergedProps.set(SExpressionParser.unquote(item[1]), item);
        } else if (keyword === "symbol" && typeof item[1] === "string") {
          const match = SExpressionParser.unquote(item[1]).match(/(_\d+_\d+)$/);
          const unit = [...item];
          unit[1] = SExpressionParser.quote(`${childShortName}${match ? match[1] : ""}`);
          mergedUnits.push(unit);
        } else {
          inheritedOthers.set(keyword, item);
        }
      }
    }

    const others: SExpr[] = [];
    const childUnits: SExpr[] = [];
    for (const item of own.slice(2)) {
      const keyword = keywordOf(item);
      if (keyword === "property" && Array.isArray(item) && typeof item[1] === "string") {
        mergedProps.set(SExpressionParser.unquote(item[1]), item);
      } else if (keyword === "symbol") {
        childUnits.push(item);
      } else {
        others.push(item);
        inheritedOthers.delete(keyword);
      }
    }

    const trailing = [...inheritedOthers.values(), ...others].filter(item => keywordOf(item) === "embedded_fonts");
    const leading = [...inheritedOthers.values(), ...others].filter(item => keywordOf(item) !== "embedded_fonts");

    return [
      "symbol",
      SExpressionParser.quote(libId),
      ...leading,
      ...mergedProps.values(),
      ...mergedUnits,
      ...childUnits,
      ...trailing.slice(0, 1),
    ];
  }

  /**
   * Copy a definition into the document's `lib_symbols`, flattened.
   * Returns false when it was already cached.
   */
  populateCache(doc: SchematicDocument, libId: string): boolean {
    if (doc.cachedSymbol(libId)) return false;
    return doc.cacheSymbol(libId, this.flatten(libId));
  }

  getSymbolInfo(libId: string): SymbolInfo {
    const chain = this.resolveChain(libId);
    const props: Record<string, string> = {};
    for (const def of [...chain].reverse()) {
      Object.assign(props, Object.fromEntries(propertiesOf(def.node)));
    }
    return {
      libId,
      description: props["Description"] ?? props["ki_description"] ?? "",
      keywords: props["ki_keywords"] ?? "",
      datasheet: props["Datasheet"] ?? "",
      footprint: props["Footprint"] ?? "",
      footprintFilters: footprintFilters(props),
      isPower: chain.some(def => isPowerDefinition(def.node)),
      unitCount: Math.max(...chain.map(def => unitCount(def.node))),
      pins: this.resolvePins(chain[0].node, chain[0].library),
    };
  }

  /** Case-insensitive search over names, descriptions and keywords. */
  search(query: string, limit = 50): { libId: string; description: string }[] {
    const needle = query.toLowerCase();
    const results: { libId: string; description: string }[] = [];
    for (const library of this.listLibraries()) {
      const file = this.libraryFile(library);
      if (!file) continue;
      for (const [name, node] of this.loadLibrary(file)) {
        const props = propertiesOf(node);
        const description = props.get("Description") ?? props.get("ki_description") ?? "";
        const haystack = [name, description, props.get("ki_keywords") ?? ""].join(" ").toLowerCase();
        if (haystack.includes(needle)) {
          results.push({ libId: `${library}:${name}`, description });
          if (results.length >= limit) return results;
        }
      }
    }
    return results;
  }
}

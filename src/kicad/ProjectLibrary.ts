import * as fs from "fs";
import * as path from "path";
import { LibraryTable, LibraryTableKind } from "./LibraryTable";
import { SymbolLibraryDocument } from "./SymbolLibraryDocument";
import { SymbolLibrary } from "./SymbolLibrary";
import { FootprintLibrary } from "./FootprintLibrary";
import { readDocumentFile, writeAtomic } from "./DocumentFile";
import { DocumentExistsError, NotFoundError, ValidationError } from "./errors";

export type LibraryKind = "symbol" | "footprint";

export interface CreatedLibrary {
  library: string;
  projectDir: string;
  symbolFile?: string;
  footprintDir?: string;
  /** Paths written by this call; existing ones are reused. */
  created: string[];
}

export interface RegisteredLibrary {
  library: string;
  kind: LibraryKind;
  tableFile: string;
  uri: string;
  /** The table already held this nickname with the same URI. */
  alreadyRegistered: boolean;
}

export interface ImportedSymbol {
  libId: string;
  target: string;
  /** Names written to the target, parents first. */
  imported: string[];
}

export interface ImportedFootprint {
  footprintId: string;
  target: string;
}

const TABLES: Record<LibraryKind, { file: string; kind: LibraryTableKind }> = {
  symbol: { file: "sym-lib-table", kind: "sym_lib_table" },
  footprint: { file: "fp-lib-table", kind: "fp_lib_table" },
};

export function validateLibraryName(name: string) {
  if (!/^[A-Za-z0-9_.+-]+$/.test(name)) {
    throw new ValidationError(`Invalid library name "${name}": use letters, digits and _ . + -`, { name });
  }
}

/**
 * Create `<name>.kicad_sym` and/or `<name>.pretty` in the project
 * directory. Nothing is registered; see `registerProjectLibrary`.
 */
export function createProjectLibrary(
  projectDir: string,
  name: string,
  kinds: LibraryKind[] = ["symbol", "footprint"],
): CreatedLibrary {
  validateLibraryName(name);
  const result: CreatedLibrary = { library: name, projectDir, created: [] };

  if (kinds.includes("symbol")) {
    const file = path.join(projectDir, `${name}.kicad_sym`);
    if (!fs.existsSync(file)) {
      SymbolLibraryDocument.create(file);
      result.created.push(file);
    }
    result.symbolFile = file;
  }
  if (kinds.includes("footprint")) {
    const dir = path.join(projectDir, `${name}.pretty`);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      result.created.push(dir);
    }
    result.footprintDir = dir;
  }
  return result;
}

/** `${KIPRJMOD}/...` inside the project directory, the absolute path outside it. */
export function projectUri(projectDir: string, libraryPath: string): string {
  const absolute = path.resolve(projectDir, libraryPath);
  const relative = path.relative(path.resolve(projectDir), absolute);
  if (relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return "${KIPRJMOD}/" + relative.split(path.sep).join("/");
  }
  return absolute.split(path.sep).join("/");
}

/**
 * Add a library to the project's `sym-lib-table` or `fp-lib-table`,
 * creating the table when there is none. An entry with the same nickname
 * but another URI is replaced.
 */
export function registerProjectLibrary(
  projectDir: string,
  name: string,
  libraryPath: string,
  kind: LibraryKind,
): RegisteredLibrary {
  validateLibraryName(name);
  const tableFile = path.join(projectDir, TABLES[kind].file);
  const uri = projectUri(projectDir, libraryPath);
  const hash = fs.existsSync(tableFile) ? readDocumentFile(tableFile).hash : undefined;
  const table = LibraryTable.load(tableFile, TABLES[kind].kind);

  const existing = table.entries.find(entry => entry.name === name);
  if (existing?.uri === uri) {
    return { library: name, kind, tableFile, uri, alreadyRegistered: true };
  }
  table.upsert({ name, type: "KiCad", uri, options: "", description: existing?.description ?? "" });
  writeAtomic(tableFile, table.toString(), hash);
  return { library: name, kind, tableFile, uri, alreadyRegistered: false };
}

/**
 * Copy a symbol into a `.kicad_sym` file, with the parents it extends
 * that the target does not have yet.
 * @throws DocumentExistsError when the target already defines the symbol
 */
export function importSymbol(library: SymbolLibrary, libId: string, targetFile: string): ImportedSymbol {
  const chain = library.resolveChain(libId);
  const target = SymbolLibraryDocument.load(targetFile);
  if (target.has(chain[0].name)) {
    throw new DocumentExistsError(`${targetFile}:${chain[0].name}`, { operation: "import_symbol", libId });
  }

  const imported: string[] = [];
  for (const definition of [...chain].reverse()) {
    if (target.has(definition.name)) continue;
    target.addDefinition(definition.node);
    imported.push(definition.name);
  }
  target.save();
  return { libId, target: targetFile, imported };
}

/**
 * Copy a `.kicad_mod` file into a `.pretty` directory, unchanged.
 * @throws DocumentExistsError when the directory already holds the footprint
 */
export function importFootprint(library: FootprintLibrary, footprintId: string, targetDir: string): ImportedFootprint {
  const source = library.locate(footprintId);
  if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
    throw new NotFoundError("library", targetDir, { operation: "import_footprint" });
  }
  const target = path.join(targetDir, path.basename(source));
  if (fs.existsSync(target)) {
    throw new DocumentExistsError(target, { operation: "import_footprint", footprintId });
  }
  writeAtomic(target, fs.readFileSync(source, "utf-8"));
  return { footprintId, target };
}

import * as fs from "fs";
import * as path from "path";
import { SDocument, SExpr, SExpressionParser, SList } from "./SExpressionParser";
import { appendChild, childValue, detectIndentUnit, findChildren, headOf, isList, quote, replaceChild } from "./SExprTree";
import { readLibraryText } from "./DocumentFile";
import { StructuralInvariantViolationError } from "./errors";

export type LibraryTableKind = "sym_lib_table" | "fp_lib_table";

export interface LibraryTableEntry {
  name: string;
  type: string;
  /** URI as written, with `${VAR}` references. */
  uri: string;
  /** URI after substitution, or undefined when a variable could not be resolved. */
  resolved?: string;
  options: string;
  description: string;
}

const VARIABLE = /\$\{([^}]+)\}/g;

/**
 * Expand `${NAME}` references from `variables`, then from the environment.
 * Returns undefined when any reference stays unresolved.
 */
export function substituteVariables(uri: string, variables: Record<string, string>): string | undefined {
  let unresolved = false;
  const result = uri.replace(VARIABLE, (_, name: string) => {
    const value = variables[name] ?? process.env[name];
    if (value === undefined) {
      unresolved = true;
      return "";
    }
    return value;
  });
  return unresolved ? undefined : result;
}

/**
 * A `sym-lib-table` or `fp-lib-table` file. Project tables resolve
 * `${KIPRJMOD}` (and `${PROJ_DIR}`) to the directory holding the table.
 * Entries are edited in the parsed tree, so `toString` keeps everything
 * it did not touch as it was read.
 */
export class LibraryTable {
  readonly kind: LibraryTableKind;
  readonly entries: LibraryTableEntry[];
  private readonly document: SDocument;
  private readonly variables: Record<string, string>;
  private readonly indentUnit: string;

  private constructor(kind: LibraryTableKind, document: SDocument, variables: Record<string, string>) {
    this.kind = kind;
    this.document = document;
    this.variables = variables;
    this.indentUnit = detectIndentUnit(document.root);
    const root = document.root;
    const libs: SList[] = root.type === "list" ? findChildren(root, "lib") : [];
    this.entries = libs.map(lib => this.readEntry(lib)).filter(e => e.name.length > 0);
  }

  private readEntry(lib: SList): LibraryTableEntry {
    const uri = childValue(lib, "uri") ?? "";
    return {
      name: childValue(lib, "name") ?? "",
      type: childValue(lib, "type") ?? "KiCad",
      uri,
      resolved: substituteVariables(uri, this.variables),
      options: childValue(lib, "options") ?? "",
      description: childValue(lib, "descr") ?? "",
    };
  }

  static parse(text: string, variables: Record<string, string> = {}): LibraryTable {
    const document = SExpressionParser.parse(text);
    const head = headOf(document.root);
    const kind: LibraryTableKind = head === "fp_lib_table" ? "fp_lib_table" : "sym_lib_table";
    return new LibraryTable(kind, document, variables);
  }

  static empty(kind: LibraryTableKind, variables: Record<string, string> = {}): LibraryTable {
    return new LibraryTable(kind, SExpressionParser.parse(`(${kind}\n\t(version 7)\n)\n`), variables);
  }

  /** Load a table file; a missing file gives an empty table. */
  static load(filePath: string, kind: LibraryTableKind, variables: Record<string, string> = {}): LibraryTable {
    const dir = path.dirname(path.resolve(filePath));
    const all = { KIPRJMOD: dir, PROJ_DIR: dir, ...variables };
    if (!fs.existsSync(filePath)) return this.empty(kind, all);
    const table = this.parse(readLibraryText(filePath), all);
    for (const entry of table.entries) {
      if (entry.resolved === undefined) {
        console.warn(`⚠️  ${path.basename(filePath)}: cannot resolve ${entry.uri} for library ${entry.name}`);
      }
    }
    return table;
  }

  /** Resolved location of a library by nickname. */
  locate(name: string): string | undefined {
    return this.entries.find(e => e.name === name)?.resolved;
  }

  /** Add or replace an entry by nickname. A replaced entry keeps its place in the file. */
  upsert(entry: Omit<LibraryTableEntry, "resolved">): LibraryTableEntry {
    const root = this.document.root;
    if (root.type !== "list") {
      throw new StructuralInvariantViolationError(`Expected (${this.kind} ...)`);
    }
    const expr: SExpr = [
      "lib",
      ["name", quote(entry.name)],
      ["type", quote(entry.type)],
      ["uri", quote(entry.uri)],
      ["options", quote(entry.options)],
      ["descr", quote(entry.description)],
    ];
    const existing = findChildren(root, "lib").find(lib => childValue(lib, "name") === entry.name);
    const node = existing ? replaceChild(root, existing, expr, this.indentUnit) : appendChild(root, expr, this.indentUnit);
    if (!isList(node)) {
      throw new StructuralInvariantViolationError(`Library entry ${entry.name} did not build as a list`);
    }
    const full = this.readEntry(node);

    const idx = this.entries.findIndex(e => e.name === entry.name);
    if (idx >= 0) this.entries[idx] = full;
    else this.entries.push(full);
    return full;
  }

  toString(): string {
    return SExpressionParser.serialize(this.document);
  }
}

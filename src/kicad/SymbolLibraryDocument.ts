import * as fs from "fs";
import { SDocument, SExpr, SExpressionParser, SList } from "./SExpressionParser";
import { findChildren, quote } from "./SExprTree";
import { KicadDocument } from "./KicadDocument";
import { readDocumentFile, stripBom, writeAtomic } from "./DocumentFile";
import { symbolName } from "./LibrarySymbol";
import { DocumentExistsError } from "./errors";

export const SYMBOL_LIBRARY_VERSION = "20241209";

const TOP_LEVEL_ORDER = ["version", "generator", "generator_version", "symbol"];

/** An editable `.kicad_sym` file. */
export class SymbolLibraryDocument extends KicadDocument {
  private constructor(tree: SDocument, filePath?: string, hash?: string, bom = false) {
    super("kicad_symbol_lib", TOP_LEVEL_ORDER, tree, filePath, hash, bom);
  }

  static parse(text: string, filePath?: string): SymbolLibraryDocument {
    const source = stripBom(text);
    return new SymbolLibraryDocument(SExpressionParser.parse(source.text), filePath, undefined, source.bom);
  }

  static load(filePath: string): SymbolLibraryDocument {
    const file = readDocumentFile(filePath);
    return new SymbolLibraryDocument(SExpressionParser.parse(file.text), filePath, file.hash, file.bom);
  }

  /** @throws DocumentExistsError when the file is already there */
  static create(filePath: string, generator = "kicad_symbol_editor"): SymbolLibraryDocument {
    if (fs.existsSync(filePath)) {
      throw new DocumentExistsError(filePath, { operation: "create_library" });
    }
    const expr: SExpr = [
      "kicad_symbol_lib",
      ["version", SYMBOL_LIBRARY_VERSION],
      ["generator", quote(generator)],
      ["generator_version", quote("9.0")],
    ];
    writeAtomic(filePath, SExpressionParser.format(expr) + "\n");
    return this.load(filePath);
  }

  symbols(): SList[] {
    return findChildren(this.root, "symbol");
  }

  has(name: string): boolean {
    return this.symbols().some(sym => symbolName(sym) === name);
  }

  /** Append a definition read from another library, text unchanged. */
  addDefinition(definition: SList): SList {
    return this.insertTopLevelCopy(definition);
  }
}

import { SDocument, SExpr, SExpressionParser, SList, SNode } from "./SExpressionParser";
import { detectIndentUnit, headOf, insertChild, insertCopy } from "./SExprTree";
import { withBom, writeAtomic } from "./DocumentFile";
import { StructuralInvariantViolationError, ValidationError } from "./errors";

export function asList(node: SNode): SList {
  if (node.type !== "list") {
    throw new StructuralInvariantViolationError("Expected a list node");
  }
  return node;
}

/**
 * A KiCad S-expression file held as a lossless tree. Subclasses add the
 * typed mutators; this class owns parsing, printing and the atomic save.
 */
export abstract class KicadDocument {
  readonly path: string | undefined;
  readonly indentUnit: string;
  private readonly rootKeyword: string;
  private readonly elementOrder: string[];
  private tree: SDocument;
  private hash: string | undefined;
  private readonly bom: boolean;

  protected constructor(
    rootKeyword: string,
    elementOrder: string[],
    tree: SDocument,
    filePath?: string,
    hash?: string,
    bom = false,
  ) {
    this.rootKeyword = rootKeyword;
    this.elementOrder = elementOrder;
    this.tree = tree;
    this.path = filePath;
    this.hash = hash;
    this.bom = bom;
    this.indentUnit = detectIndentUnit(tree.root);
    // Reject files of the wrong kind right away.
    this.checkRoot();
  }

  private checkRoot(): SList {
    const root = this.tree.root;
    if (root.type !== "list" || headOf(root) !== this.rootKeyword) {
      throw new StructuralInvariantViolationError(`Expected (${this.rootKeyword} ...)`, { path: this.path });
    }
    return root;
  }

  get root(): SList {
    return this.checkRoot();
  }

  toString(): string {
    return SExpressionParser.serialize(this.tree);
  }

  /**
   * Atomically write the document back, with the byte-order mark it was read
   * with. Fails with IOConflictError when the file changed since it was loaded.
   */
  save() {
    if (!this.path) {
      throw new ValidationError("Document has no file path");
    }
    this.hash = writeAtomic(this.path, withBom(this.toString(), this.bom), this.hash);
  }

  /**
   * Insert a top-level element after the last one of its kind, or where the
   * editor's element order puts it.
   */
  insertTopLevel(keyword: string, expr: SExpr): SList {
    return asList(insertChild(this.root, this.topLevelIndex(keyword), expr, this.indentUnit));
  }

  /** Insert a copy of an element read from another file, placed like `insertTopLevel`. */
  insertTopLevelCopy(node: SList): SList {
    return insertCopy(this.root, this.topLevelIndex(headOf(node) ?? ""), node, this.indentUnit);
  }

  private topLevelIndex(keyword: string): number {
    const root = this.root;
    let index = -1;
    for (let i = 1; i < root.items.length; i++) {
      if (headOf(root.items[i]) === keyword) index = i + 1;
    }
    if (index >= 0) return index;

    const rank = this.elementOrder.indexOf(keyword);
    for (let i = 1; i < root.items.length; i++) {
      const head = headOf(root.items[i]);
      const otherRank = head === undefined ? -1 : this.elementOrder.indexOf(head);
      if (rank >= 0 && otherRank > rank) return i;
    }
    return root.items.length;
  }
}

import { ParseError, ParseErrorKind } from "./errors";

/** Plain nested form, used to describe new content before it is laid out. */
export type SExpr = string | SExpr[];

/**
 * Lossless tree nodes. `pre` holds the whitespace that preceded the token and
 * `trail` the whitespace before a list's closing parenthesis, so printing an
 * untouched tree reproduces the input byte for byte.
 */
export interface SAtom {
  type: "atom";
  /** Raw token text; quoted strings keep their quotes and escapes. */
  text: string;
  pre: string;
}

export interface SList {
  type: "list";
  items: SNode[];
  pre: string;
  trail: string;
}

export type SNode = SAtom | SList;

export interface SDocument {
  root: SNode;
  /** Whitespace after the top-level expression. */
  tail: string;
}

const indentation = "\t";

// Keywords whose lists KiCad keeps on a single line.
const forceInlineKeywords = ["pts", "stroke", "effects", "font", "fill", "color", "justify", "size", "lib"];

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isDelimiter(ch: string): boolean {
  return ch === "(" || ch === ")" || ch === '"' || isWhitespace(ch);
}

/**
 * S-expression parser for KiCad files.
 * Handles:
 * - Nested lists: (a b)
 * - Quoted strings: "string with spaces" and escaped quotes
 * - Atoms: unquoted tokens
 * and keeps all inter-token whitespace.
 */
export class SExpressionParser {
  /**
   * Parse exactly one top-level expression.
   * @throws ParseError with the offset, line and column of the problem
   */
  static parse(input: string): SDocument {
    const stack: { node: SList; offset: number }[] = [];
    const roots: SNode[] = [];
    let wsStart = 0;
    let i = 0;

    const fail = (kind: ParseErrorKind, offset: number): never => {
      const { line, column } = this.position(input, offset);
      throw new ParseError(kind, offset, line, column);
    };

    const attach = (node: SNode, offset: number) => {
      if (stack.length > 0) {
        stack[stack.length - 1].node.items.push(node);
      } else if (roots.length === 0) {
        roots.push(node);
      } else {
        fail("trailing-content", offset);
      }
    };

    while (i < input.length) {
      const ch = input[i];

      if (isWhitespace(ch)) {
        i++;
        continue;
      }

      const pre = input.slice(wsStart, i);

      if (ch === "(") {
        const node: SList = { type: "list", items: [], pre, trail: "" };
        attach(node, i);
        stack.push({ node, offset: i });
        i++;
      } else if (ch === ")") {
        const open = stack.pop();
        if (!open) fail("unexpected-close", i);
        else open.node.trail = pre;
        i++;
      } else if (ch === '"') {
        const start = i;
        i++;
        while (i < input.length && input[i] !== '"') {
          i += input[i] === "\\" ? 2 : 1;
        }
        if (i >= input.length) fail("unterminated-string", start);
        i++;
        attach({ type: "atom", text: input.slice(start, i), pre }, start);
      } else {
        const start = i;
        while (i < input.length && !isDelimiter(input[i])) i++;
        attach({ type: "atom", text: input.slice(start, i), pre }, start);
      }

      wsStart = i;
    }

    if (stack.length > 0) {
      fail("unclosed-list", stack[stack.length - 1].offset);
    }
    if (roots.length === 0) {
      fail("empty", input.length);
    }

    return { root: roots[0], tail: input.slice(wsStart) };
  }

  /**
   * Print a document or a node. Untouched regions come out exactly as parsed.
   */
  static serialize(value: SDocument | SNode): string {
    const out: string[] = [];
    if ("root" in value) {
      this.write(value.root, out);
      out.push(value.tail);
    } else {
      this.write(value, out);
    }
    return out.join("");
  }

  private static write(node: SNode, out: string[]) {
    out.push(node.pre);
    if (node.type === "atom") {
      out.push(node.text);
      return;
    }
    out.push("(");
    for (const item of node.items) {
      this.write(item, out);
    }
    out.push(node.trail, ")");
  }

  /**
   * Lay out a plain expression as KiCad does.
   * Formatting rules:
   * - Simple expressions (only atoms, no nested lists) are kept on a single line.
   * - Expressions with sub-expressions are expanded:
   *   - Every sub-expression starts on a new line, one unit deeper than `indent`.
   *   - The closing parenthesis is on its own line (matching the opening indentation).
   */
  static format(expr: SExpr, indent = "", unit = indentation, forceInline = false): string {
    if (typeof expr === "string") {
      return expr;
    }

    if (expr.length === 0) {
      return "()";
    }

    const isSimple = expr.every(e => typeof e === "string");
    const keyword = typeof expr[0] === "string" ? expr[0] : "";
    if (isSimple || forceInline || forceInlineKeywords.includes(keyword)) {
      return "(" + expr.map(e => this.format(e, "", unit, true)).join(" ") + ")";
    }

    const childIndent = indent + unit;
    let result = "(" + (typeof expr[0] === "string" ? expr[0] : this.format(expr[0], childIndent, unit));

    for (let i = 1; i < expr.length; i++) {
      const child = expr[i];
      if (typeof child === "string") {
        result += " " + child;
      } else {
        result += "\n" + childIndent + this.format(child, childIndent, unit);
      }
    }

    return result + "\n" + indent + ")";
  }

  /**
   * Build a lossless node from a plain expression, laid out at `indent`.
   */
  static build(expr: SExpr, indent = "", unit = indentation): SNode {
    return this.parse(this.format(expr, indent, unit)).root;
  }

  static toPlain(node: SNode): SExpr {
    if (node.type === "atom") return node.text;
    return node.items.map(item => this.toPlain(item));
  }

  /**
   * Structural equality: same tokens in the same nesting, whitespace ignored.
   */
  static equals(a: SNode, b: SNode): boolean {
    if (a.type === "atom" || b.type === "atom") {
      return a.type === b.type && a.text === b.text;
    }
    if (a.items.length !== b.items.length) return false;
    return a.items.every((item, i) => this.equals(item, b.items[i]));
  }

  /**
   * Helper to strip quotes from a string if present, resolving escapes.
   */
  static unquote(s: string): string {
    if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) {
      return s.slice(1, -1).replace(/\\(.)/g, (_, c: string) => (c === "n" ? "\n" : c));
    }
    return s;
  }

  static quote(s: string): string {
    return '"' + s.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n") + '"';
  }

  static position(input: string, offset: number): { line: number; column: number } {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < offset && i < input.length; i++) {
      if (input[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, column: offset - lineStart + 1 };
  }
}

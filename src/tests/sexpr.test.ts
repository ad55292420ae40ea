import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { SExpressionParser, SList } from "../kicad/SExpressionParser";
import { ParseError } from "../kicad/errors";
import {
  atomAt,
  childNumbers,
  detectIndentUnit,
  findChild,
  fmt,
  insertChild,
  propertiesOf,
  removeChild,
  setNumber,
} from "../kicad/SExprTree";

const ASSETS = path.join(__dirname, "assets");

function parseError(input: string): ParseError {
  try {
    SExpressionParser.parse(input);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error("expected a parse error");
}

function rootList(input: string): SList {
  const root = SExpressionParser.parse(input).root;
  if (root.type !== "list") throw new Error("expected a list");
  return root;
}

// ─── Parsing and printing ────────────────────────────────────────────

describe("SExpressionParser", () => {
  it("reproduces untouched input byte for byte", () => {
    const input = '(kicad_sch\n\t(version 20250114)\n  (odd   spacing "a \\"quoted\\" str")\r\n\t(empty ) )\n\n';
    expect(SExpressionParser.serialize(SExpressionParser.parse(input))).toBe(input);
  });

  it("round-trips the sample schematic, board and libraries", () => {
    for (const file of [
      "project/sample.kicad_sch",
      "project/sample.kicad_pcb",
      "symbols/Device.kicad_sym",
      "symbols/power.kicad_sym",
      "project/sym-lib-table",
    ]) {
      const text = fs.readFileSync(path.join(ASSETS, file), "utf-8");
      expect(SExpressionParser.serialize(SExpressionParser.parse(text))).toBe(text);
    }
  });

  it("keeps quoted atoms raw", () => {
    const root = rootList('(property "Value" "say \\"hi\\"")');
    expect(root.items.map(item => (item.type === "atom" ? item.text : ""))).toEqual([
      "property",
      '"Value"',
      '"say \\"hi\\""',
    ]);
    expect(atomAt(root, 2)).toBe('say "hi"');
  });

  it("reports an unclosed list at the innermost open parenthesis", () => {
    const err = parseError("(a\n  (b\n");
    expect(err.kind).toBe("unclosed-list");
    expect(err.offset).toBe(5);
    expect(err.line).toBe(2);
    expect(err.column).toBe(3);
    expect(err.message).toBe("Unclosed '(' at line 2, column 3");
  });

  it("reports a stray closing parenthesis", () => {
    const err = parseError("(a))");
    expect(err.kind).toBe("unexpected-close");
    expect(err.offset).toBe(3);
    expect(err.column).toBe(4);
  });

  it("reports an unterminated string at its opening quote", () => {
    const err = parseError('(a "open');
    expect(err.kind).toBe("unterminated-string");
    expect(err.offset).toBe(3);
  });

  it("rejects empty input and a second top-level expression", () => {
    expect(parseError("   ").kind).toBe("empty");
    const trailing = parseError("(a) (b)");
    expect(trailing.kind).toBe("trailing-content");
    expect(trailing.offset).toBe(4);
    expect(trailing.code).toBe("PARSE_ERROR");
  });

  it("formats nested expressions the way KiCad lays them out", () => {
    const out = SExpressionParser.format(["a", "x", ["b", "1"], ["effects", ["font", ["size", "1", "1"]]]]);
    expect(out).toBe("(a x\n\t(b 1)\n\t(effects (font (size 1 1)))\n)");
  });

  it("compares structure without whitespace", () => {
    const a = SExpressionParser.parse("(a  b\n(c))").root;
    const b = SExpressionParser.parse("(a b (c))").root;
    const c = SExpressionParser.parse("(a b (d))").root;
    expect(SExpressionParser.equals(a, b)).toBe(true);
    expect(SExpressionParser.equals(a, c)).toBe(false);
  });

  it("quotes and unquotes escapes", () => {
    expect(SExpressionParser.quote('a "b"\nc\\')).toBe('"a \\"b\\"\\nc\\\\"');
    expect(SExpressionParser.unquote('"a \\"b\\"\\nc\\\\"')).toBe('a "b"\nc\\');
    expect(SExpressionParser.unquote("bare")).toBe("bare");
  });
});

// ─── Tree editing ────────────────────────────────────────────────────

describe("SExprTree", () => {
  it("formats numbers with at most four decimals", () => {
    expect(fmt(1.23456)).toBe("1.2346");
    expect(fmt(100)).toBe("100");
    expect(fmt(2.5)).toBe("2.5");
    expect(fmt(-1.27)).toBe("-1.27");
    expect(fmt(-0.00001)).toBe("0");
  });

  it("inserts a child with the indentation of its siblings", () => {
    const doc = SExpressionParser.parse("(root\n\t(a 1)\n)\n");
    const root = doc.root;
    if (root.type !== "list") throw new Error("expected a list");
    insertChild(root, 2, ["b", "2"], "\t");
    expect(SExpressionParser.serialize(doc)).toBe("(root\n\t(a 1)\n\t(b 2)\n)\n");
  });

  it("opens up an empty list one level deeper than its parent", () => {
    const doc = SExpressionParser.parse("(kicad_sch\n\t(lib_symbols)\n)");
    const root = doc.root;
    if (root.type !== "list") throw new Error("expected a list");
    const cache = findChild(root, "lib_symbols");
    if (!cache) throw new Error("expected lib_symbols");
    insertChild(cache, 1, ["symbol", '"A"', ["pin", "1"]], "\t");
    expect(SExpressionParser.serialize(doc)).toBe('(kicad_sch\n\t(lib_symbols\n\t\t(symbol "A"\n\t\t\t(pin 1)\n\t\t)\n\t)\n)');
  });

  it("keeps CRLF line endings when inserting", () => {
    const doc = SExpressionParser.parse("(root\r\n  (a 1)\r\n)");
    const root = doc.root;
    if (root.type !== "list") throw new Error("expected a list");
    insertChild(root, 2, ["b", "2"], detectIndentUnit(root));
    expect(SExpressionParser.serialize(doc)).toBe("(root\r\n  (a 1)\r\n  (b 2)\r\n)");
  });

  it("removes a child without touching its neighbours", () => {
    const doc = SExpressionParser.parse("(root\n\t(a 1)\n\t(b 2)\n\t(c 3)\n)");
    const root = doc.root;
    if (root.type !== "list") throw new Error("expected a list");
    const b = findChild(root, "b");
    if (!b) throw new Error("expected b");
    expect(removeChild(root, b)).toBe(true);
    expect(SExpressionParser.serialize(doc)).toBe("(root\n\t(a 1)\n\t(c 3)\n)");
  });

  it("leaves the original spelling of an unchanged number", () => {
    const root = rootList("(at 10.0 5.50 90)");
    setNumber(root, 1, 10);
    setNumber(root, 2, 6);
    expect(SExpressionParser.serialize(root)).toBe("(at 10.0 6 90)");
    expect(childNumbers(rootList("(x (at 1 2 3))"), "at")).toEqual([1, 2, 3]);
  });

  it("reads properties by name", () => {
    const root = rootList('(symbol (property "Reference" "R1") (property "Value" "10k"))');
    expect([...propertiesOf(root)]).toEqual([
      ["Reference", "R1"],
      ["Value", "10k"],
    ]);
  });
});

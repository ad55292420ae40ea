import { SAtom, SExpr, SExpressionParser, SList, SNode } from "./SExpressionParser";

export function isList(node: SNode | undefined): node is SList {
  return node !== undefined && node.type === "list";
}

/** Keyword of a list: its first atom, e.g. `symbol` for `(symbol ...)`. */
export function headOf(node: SNode): string | undefined {
  if (node.type !== "list") return undefined;
  const first = node.items[0];
  return first && first.type === "atom" ? first.text : undefined;
}

export function findChildren(node: SList, keyword: string): SList[] {
  return node.items.filter((item): item is SList => isList(item) && headOf(item) === keyword);
}

export function findChild(node: SList, keyword: string): SList | undefined {
  return node.items.find((item): item is SList => isList(item) && headOf(item) === keyword);
}

/** Unquoted value of the atom at `index`, if that item is an atom. */
export function atomAt(node: SList, index: number): string | undefined {
  const item = node.items[index];
  return item && item.type === "atom" ? SExpressionParser.unquote(item.text) : undefined;
}

export function numberAt(node: SList, index: number): number | undefined {
  const raw = atomAt(node, index);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/** `(keyword value)` lookup: the unquoted value of the first matching child. */
export function childValue(node: SList, keyword: string, index = 1): string | undefined {
  const child = findChild(node, keyword);
  return child ? atomAt(child, index) : undefined;
}

export function childNumbers(node: SList, keyword: string): number[] {
  const child = findChild(node, keyword);
  if (!child) return [];
  const values: number[] = [];
  for (let i = 1; i < child.items.length; i++) {
    const value = numberAt(child, i);
    if (value !== undefined) values.push(value);
  }
  return values;
}

/** `(property "Name" "Value" ...)` children as a name → value map. */
export function propertiesOf(node: SList): Map<string, string> {
  const props = new Map<string, string>();
  for (const prop of findChildren(node, "property")) {
    const name = atomAt(prop, 1);
    const value = atomAt(prop, 2);
    if (name !== undefined && value !== undefined) props.set(name, value);
  }
  return props;
}

export function findProperty(node: SList, name: string): SList | undefined {
  return findChildren(node, "property").find(prop => atomAt(prop, 1) === name);
}

/** Replace an atom's text in place, keeping its leading whitespace. */
export function setAtom(node: SList, index: number, raw: string) {
  const item = node.items[index];
  if (item && item.type === "atom") {
    item.text = raw;
  } else {
    const atom: SAtom = { type: "atom", text: raw, pre: " " };
    node.items.splice(index, item ? 1 : 0, atom);
  }
}

/** Write a number unless the atom already holds that value, keeping its original spelling. */
export function setNumber(node: SList, index: number, value: number) {
  const text = fmt(value);
  if (numberAt(node, index) === Number(text)) return;
  setAtom(node, index, text);
}

/** Number formatting used for every coordinate written: at most 4 decimals. */
export function fmt(value: number): string {
  const rounded = Math.round(value * 10000) / 10000;
  const text = rounded.toFixed(4).replace(/0+$/, "").replace(/\.$/, "");
  return text === "-0" ? "0" : text;
}

export function quote(value: string): string {
  return SExpressionParser.quote(value);
}

function lastLine(ws: string): string | undefined {
  const idx = ws.lastIndexOf("\n");
  return idx < 0 ? undefined : ws.slice(idx + 1);
}

/**
 * Indentation unit of a document: whatever precedes the first nested child
 * of the root, tab when nothing can be detected.
 */
export function detectIndentUnit(root: SNode): string {
  if (root.type === "list") {
    for (const item of root.items.slice(1)) {
      const indent = lastLine(item.pre);
      if (indent) return indent;
    }
  }
  return "\t";
}

/**
 * Line break and indentation for a new child, taken from its siblings. When
 * the parent has no child on a line of its own yet, it is opened up one
 * level deeper than the parent itself.
 */
function childLayout(parent: SList, unit: string): { indent: string; newline: string } {
  let siblingPre: string | undefined;
  for (let i = parent.items.length - 1; i >= 1; i--) {
    if (parent.items[i].pre.includes("\n")) {
      siblingPre = parent.items[i].pre;
      break;
    }
  }

  if (siblingPre !== undefined) {
    return { indent: lastLine(siblingPre) ?? "", newline: siblingPre.includes("\r\n") ? "\r\n" : "\n" };
  }
  const parentIndent = lastLine(parent.pre) ?? "";
  if (!parent.trail.includes("\n")) parent.trail = "\n" + parentIndent;
  return { indent: parentIndent + unit, newline: "\n" };
}

/** Insert a new child laid out like its siblings. */
export function insertChild(parent: SList, index: number, expr: SExpr, unit: string): SNode {
  const { indent, newline } = childLayout(parent, unit);
  const node = SExpressionParser.build(expr, indent, unit);
  node.pre = newline + indent;
  parent.items.splice(Math.max(1, Math.min(index, parent.items.length)), 0, node);
  return node;
}

/**
 * Insert a copy of a node taken from another tree. Its inner whitespace is
 * kept; only the break before it follows the new siblings.
 */
export function insertCopy<T extends SNode>(parent: SList, index: number, node: T, unit: string): T {
  const { indent, newline } = childLayout(parent, unit);
  const copy = cloneNode(node);
  copy.pre = newline + indent;
  parent.items.splice(Math.max(1, Math.min(index, parent.items.length)), 0, copy);
  return copy;
}

export function appendChild(parent: SList, expr: SExpr, unit: string): SNode {
  return insertChild(parent, parent.items.length, expr, unit);
}

export function removeChild(parent: SList, node: SNode): boolean {
  const idx = parent.items.indexOf(node);
  if (idx < 0) return false;
  parent.items.splice(idx, 1);
  return true;
}

/** Replace a child with a freshly laid-out expression at the same position. */
export function replaceChild(parent: SList, node: SNode, expr: SExpr, unit: string): SNode {
  const idx = parent.items.indexOf(node);
  const indent = lastLine(node.pre) ?? "";
  const fresh = SExpressionParser.build(expr, indent, unit);
  fresh.pre = node.pre;
  if (idx >= 0) parent.items[idx] = fresh;
  return fresh;
}

/** Depth-first visit of every list below (and including) `node`. */
export function walkLists(node: SNode, visit: (list: SList, parent: SList | undefined) => void, parent?: SList) {
  if (node.type !== "list") return;
  visit(node, parent);
  for (const item of node.items) {
    walkLists(item, visit, node);
  }
}

/** Deep copy of a subtree, whitespace included. */
export function cloneNode<T extends SNode>(node: T): T;
export function cloneNode(node: SNode): SNode {
  if (node.type === "atom") return { ...node };
  return { ...node, items: node.items.map(item => cloneNode(item)) };
}

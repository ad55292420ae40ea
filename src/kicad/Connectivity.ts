import { AmbiguousConnectivityError, NotFoundError } from "./errors";
import { samePoint } from "./Geometry";
import { Label, Marker, Point, Wire } from "./types";

/** Distance within which a point counts as lying on a wire. */
export const WIRE_TOLERANCE = 0.02;

/** A placed pin as the analyzer sees it. */
export interface PinSite {
  reference: string;
  pin: string;
  name: string;
  position: Point;
  electricalType: string;
  /** Name this pin forces onto its net: power symbols and hidden power inputs. */
  netName?: string;
}

export interface ConnectivityInput {
  wires: Wire[];
  labels: Label[];
  junctions: Marker[];
  noConnects: Marker[];
  pins: PinSite[];
}

export interface PinRef {
  reference: string;
  pin: string;
}

export type PinNet =
  | { connected: true; reference: string; pin: string; net: string; explicit: boolean }
  | { connected: false; reference: string; pin: string; noConnect: boolean };

export interface NetMembers {
  net: string;
  explicit: boolean;
  pins: PinRef[];
  labels: Label[];
  wires: Wire[];
}

export interface NetSummary {
  net: string;
  explicit: boolean;
  pins: PinRef[];
  /** Every explicit name on the group when they disagree. */
  conflictingNames?: string[];
}

interface Component {
  names: Set<string>;
  pins: PinSite[];
  labels: Label[];
  wires: Wire[];
}

/** Coordinates hashed on a 1 µm grid. */
export function pointKey(p: Point): string {
  return `${Math.round(p.x * 1000)},${Math.round(p.y * 1000)}`;
}

class UnionFind {
  private parent = new Map<string, string>();
  private rank = new Map<string, number>();

  add(key: string) {
    if (!this.parent.has(key)) {
      this.parent.set(key, key);
      this.rank.set(key, 0);
    }
  }

  find(key: string): string {
    this.add(key);
    let root = key;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    let current = key;
    while (current !== root) {
      const up = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = up;
    }
    return root;
  }

  union(a: string, b: string) {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    const rankA = this.rank.get(ra) ?? 0;
    const rankB = this.rank.get(rb) ?? 0;
    if (rankA < rankB) this.parent.set(ra, rb);
    else if (rankA > rankB) this.parent.set(rb, ra);
    else {
      this.parent.set(rb, ra);
      this.rank.set(ra, rankA + 1);
    }
  }
}

/**
 * Axis-aligned wires bucketed by their fixed coordinate, so finding the wires
 * through a point only looks at a handful of candidates.
 */
class WireIndex {
  private horizontal = new Map<number, Wire[]>();
  private vertical = new Map<number, Wire[]>();
  private diagonal: Wire[] = [];

  constructor(wires: Wire[]) {
    for (const wire of wires) {
      if (Math.abs(wire.start.y - wire.end.y) <= WIRE_TOLERANCE) {
        this.bucket(this.horizontal, wire.start.y).push(wire);
      } else if (Math.abs(wire.start.x - wire.end.x) <= WIRE_TOLERANCE) {
        this.bucket(this.vertical, wire.start.x).push(wire);
      } else {
        this.diagonal.push(wire);
      }
    }
  }

  private bucket(map: Map<number, Wire[]>, value: number): Wire[] {
    const key = Math.round(value * 100);
    let list = map.get(key);
    if (!list) {
      list = [];
      map.set(key, list);
    }
    return list;
  }

  private candidates(map: Map<number, Wire[]>, value: number): Wire[] {
    const key = Math.round(value * 100);
    const found: Wire[] = [];
    for (let k = key - 2; k <= key + 2; k++) {
      found.push(...(map.get(k) ?? []));
    }
    return found;
  }

  through(p: Point): Wire[] {
    const hits: Wire[] = [];
    for (const w of this.candidates(this.horizontal, p.y)) {
      const lo = Math.min(w.start.x, w.end.x) - WIRE_TOLERANCE;
      const hi = Math.max(w.start.x, w.end.x) + WIRE_TOLERANCE;
      if (Math.abs(w.start.y - p.y) <= WIRE_TOLERANCE && p.x >= lo && p.x <= hi) hits.push(w);
    }
    for (const w of this.candidates(this.vertical, p.x)) {
      const lo = Math.min(w.start.y, w.end.y) - WIRE_TOLERANCE;
      const hi = Math.max(w.start.y, w.end.y) + WIRE_TOLERANCE;
      if (Math.abs(w.start.x - p.x) <= WIRE_TOLERANCE && p.y >= lo && p.y <= hi) hits.push(w);
    }
    for (const w of this.diagonal) {
      if (distanceToSegment(p, w.start, w.end) <= WIRE_TOLERANCE) hits.push(w);
    }
    return hits;
  }
}

function distanceToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  const t = lengthSq === 0 ? 0 : Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

function comparePins(a: PinRef, b: PinRef): number {
  return (
    a.reference.localeCompare(b.reference, undefined, { numeric: true }) ||
    a.pin.localeCompare(b.pin, undefined, { numeric: true })
  );
}

/**
 * Nets inferred from one sheet: wires join their endpoints, points on a
 * wire join that wire, and equal names (labels, power symbols) join
 * otherwise separate groups. Built fresh for every query.
 */
export class ConnectivityGraph {
  private components = new Map<string, Component>();
  private pinRoots = new Map<string, string>();
  private readonly noConnects: Marker[];

  private constructor(input: ConnectivityInput) {
    const uf = new UnionFind();
    const index = new WireIndex(input.wires);

    const attach = (p: Point): string => {
      const key = pointKey(p);
      uf.add(key);
      for (const wire of index.through(p)) {
        uf.union(key, pointKey(wire.start));
      }
      return key;
    };

    for (const wire of input.wires) {
      uf.union(pointKey(wire.start), pointKey(wire.end));
    }
    for (const wire of input.wires) {
      attach(wire.start);
      attach(wire.end);
    }
    for (const junction of input.junctions) attach(junction.position);

    const named: { key: string; name: string }[] = [];
    const labelKeys = input.labels.map(label => {
      const key = attach(label.position);
      named.push({ key, name: label.text });
      return key;
    });

    const pinKeys = new Map<string, string>();
    const siteKeys = input.pins.map(site => {
      const key = attach(site.position);
      const id = `${site.reference}\u0000${site.pin}`;
      // Pins shared by all units show up once per placed unit; they are one pin.
      const first = pinKeys.get(id);
      if (first === undefined) pinKeys.set(id, key);
      else uf.union(first, key);
      if (site.netName !== undefined) named.push({ key, name: site.netName });
      return key;
    });

    const firstByName = new Map<string, string>();
    for (const { key, name } of named) {
      const first = firstByName.get(name);
      if (first === undefined) firstByName.set(name, key);
      else uf.union(first, key);
    }

    const component = (key: string): Component => {
      const root = uf.find(key);
      let c = this.components.get(root);
      if (!c) {
        c = { names: new Set(), pins: [], labels: [], wires: [] };
        this.components.set(root, c);
      }
      return c;
    };

    for (const { key, name } of named) component(key).names.add(name);
    input.labels.forEach((label, i) => component(labelKeys[i]).labels.push(label));
    input.pins.forEach((site, i) => component(siteKeys[i]).pins.push(site));
    for (const wire of input.wires) component(pointKey(wire.start)).wires.push(wire);
    for (const [id, key] of pinKeys) this.pinRoots.set(id, uf.find(key));

    this.noConnects = input.noConnects;
  }

  static build(input: ConnectivityInput): ConnectivityGraph {
    return new ConnectivityGraph(input);
  }

  private uniquePins(c: Component): PinRef[] {
    const seen = new Map<string, PinRef>();
    for (const site of c.pins) {
      seen.set(`${site.reference}\u0000${site.pin}`, { reference: site.reference, pin: site.pin });
    }
    return [...seen.values()].sort(comparePins);
  }

  private nameOf(c: Component): { net: string; explicit: boolean } {
    if (c.names.size > 1) {
      throw new AmbiguousConnectivityError([...c.names].sort());
    }
    const [explicitName] = c.names;
    if (explicitName !== undefined) return { net: explicitName, explicit: true };
    const [first] = this.uniquePins(c);
    return { net: first ? `Net-(${first.reference}-Pad${first.pin})` : "", explicit: false };
  }

  private isIsolated(c: Component): boolean {
    return c.names.size === 0 && this.uniquePins(c).length <= 1;
  }

  /**
   * Net of one pin.
   * @throws NotFoundError when the pin is not placed
   * @throws AmbiguousConnectivityError when its group carries conflicting names
   */
  netOf(reference: string, pin: string): PinNet {
    const root = this.pinRoots.get(`${reference}\u0000${pin}`);
    const c = root === undefined ? undefined : this.components.get(root);
    if (!c) {
      throw new NotFoundError("pin", `${reference}.${pin}`);
    }
    if (this.isIsolated(c)) {
      const sites = c.pins.filter(site => site.reference === reference && site.pin === pin);
      const noConnect = sites.some(site =>
        this.noConnects.some(nc => samePoint(nc.position, site.position, WIRE_TOLERANCE)),
      );
      return { connected: false, reference, pin, noConnect };
    }
    return { connected: true, reference, pin, ...this.nameOf(c) };
  }

  /**
   * Everything on the net called `net`, explicit or synthesized.
   * @throws NotFoundError when no net has that name
   */
  membersOf(net: string): NetMembers {
    for (const c of this.components.values()) {
      if (this.isIsolated(c)) continue;
      const matches = c.names.has(net) || (c.names.size === 0 && this.nameOf(c).net === net);
      if (!matches) continue;
      const name = this.nameOf(c);
      return {
        net: name.net,
        explicit: name.explicit,
        pins: this.uniquePins(c),
        labels: c.labels,
        wires: c.wires,
      };
    }
    throw new NotFoundError("net", net);
  }

  /** All nets with at least two pins or an explicit name, sorted by name. */
  listNets(): NetSummary[] {
    const nets: NetSummary[] = [];
    for (const c of this.components.values()) {
      if (this.isIsolated(c)) continue;
      const pins = this.uniquePins(c);
      if (c.names.size > 1) {
        const names = [...c.names].sort();
        nets.push({ net: names[0], explicit: true, pins, conflictingNames: names });
      } else {
        nets.push({ ...this.nameOf(c), pins });
      }
    }
    return nets.sort((a, b) => a.net.localeCompare(b.net, undefined, { numeric: true }));
  }

  /** Placed pins whose group holds nothing else. */
  isolatedPins(): PinNet[] {
    const result: PinNet[] = [];
    for (const [id, root] of this.pinRoots) {
      const c = this.components.get(root);
      if (!c || !this.isIsolated(c)) continue;
      const [reference, pin] = id.split("\u0000");
      const net = this.netOf(reference, pin);
      if (!net.connected) result.push(net);
    }
    return result;
  }

  /**
   * Pins of power symbols whose group holds nothing but power-symbol pins:
   * no wire, no label and no pin of a real part.
   */
  floatingPowerPins(powerReferences: ReadonlySet<string>): PinRef[] {
    const result: PinRef[] = [];
    for (const c of this.components.values()) {
      if (c.wires.length > 0 || c.labels.length > 0) continue;
      if (!c.pins.every(site => powerReferences.has(site.reference))) continue;
      result.push(...this.uniquePins(c));
    }
    return result.sort(comparePins);
  }

  /** Names that would merge groups with other names, per conflicting group. */
  conflicts(): string[][] {
    return [...this.components.values()].filter(c => c.names.size > 1).map(c => [...c.names].sort());
  }
}

// src/octree/tree/octree.ts
import { Arena, type ReadonlyArena } from "../core/index.js";
import { InvalidConfigError, InvalidPositionError, UnsupportedOperationError } from "../errors.js";
import {
  NONE,
  OCTANTS,
  type Equals,
  type FormatValue,
  type Handle,
  type MixedNode,
  type OctNode,
  type OctNodeView,
  type OctreeConfig,
  type OctreeStats,
} from "../interfaces.js";
import { octantIndex } from "../octant.js";
import { copyPos, formatPos, type Position } from "../position.js";
import { dumpOctree, formatValueDefault } from "./dump.js";

const ROOT: Handle = 0;
const MAX_HALF_WIDTH = 128;

function isPowerOfTwo(n: number) {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

function emptyChildren(): Int32Array {
  return new Int32Array(OCTANTS).fill(NONE);
}

function snapshot(node: OctNode): OctNodeView {
  if (node.kind === "full") return Object.freeze({ kind: "full", leaf: node.leaf });
  return Object.freeze({ kind: "mixed", children: Object.freeze(Array.from(node.children)) });
}

function mixedWith(child: Handle, idx: number): MixedNode {
  const children = emptyChildren();
  children[idx] = child;
  return { kind: "mixed", children };
}

/**
 * Sparse voxel octree over the cube [0, 2 * halfWidth)^3.
 *
 * Nodes and leaf values live in two arenas addressed by integer handles; the
 * root is always node 0. A region holding a single value is stored as one
 * `full` node, and insertion keeps it that way: it splits `full` nodes when a
 * differing value lands inside them and collapses `mixed` nodes the moment the
 * insert makes them uniform.
 */
export class Octree<V> {
  readonly halfWidth: number;
  readonly equals: Equals<V>;
  readonly formatValue: FormatValue<V>;

  protected _nodes: Arena<OctNode>;
  protected _leaves: Arena<V>;
  private _nodeView: ReadonlyArena<OctNodeView>;
  private _leafView: ReadonlyArena<V>;

  constructor(cfg: OctreeConfig<V>) {
    if (!isPowerOfTwo(cfg.halfWidth) || cfg.halfWidth > MAX_HALF_WIDTH) {
      throw new InvalidConfigError(`halfWidth must be a power of two in [1, ${MAX_HALF_WIDTH}], got ${cfg.halfWidth}`);
    }
    const cap = cfg.initialCapacity ?? 64;
    this.halfWidth = cfg.halfWidth;
    this.equals = cfg.equals ?? Object.is;
    this.formatValue = cfg.formatValue ?? formatValueDefault;
    this._nodes = new Arena<OctNode>("nodes", cap);
    this._leaves = new Arena<V>("leaves", cap);
    this._nodeView = this._nodes.view(snapshot);
    this._leafView = this._leaves.view((v) => v);

    const root = this._nodes.insert({ kind: "mixed", children: emptyChildren() });
    if (root !== ROOT) throw new Error(`Root must occupy node handle ${ROOT}, got ${root}`);
  }

  /** Read-only node arena for diagnostics; nodes come out as frozen copies. */
  get nodes(): ReadonlyArena<OctNodeView> {
    return this._nodeView;
  }
  get leaves(): ReadonlyArena<V> {
    return this._leafView;
  }

  /** Side length of the cube. */
  get width() {
    return this.halfWidth * 2;
  }
  get nodeCount() {
    return this._nodes.size;
  }
  get leafCount() {
    return this._leaves.size;
  }
  stats(): OctreeStats {
    return { nodes: this._nodes.size, leaves: this._leaves.size };
  }

  contains(p: Readonly<Position>): boolean {
    const w = this.width;
    const ok = (a: number) => Number.isInteger(a) && a >= 0 && a < w;
    return ok(p.x) && ok(p.y) && ok(p.z);
  }

  private checkPosition(p: Readonly<Position>): Position {
    if (!this.contains(p)) {
      throw new InvalidPositionError(`${formatPos(p)} is outside [0, ${this.width}) on some axis`);
    }
    return copyPos(p);
  }

  get(position: Readonly<Position>): V | undefined {
    const p = this.checkPosition(position);
    let nodeHandle = ROOT;
    let halfWidth = this.halfWidth;
    for (;;) {
      const node = this._nodes.get(nodeHandle);
      if (node.kind === "full") return this._leaves.get(node.leaf);

      const idx = octantIndex(p, halfWidth);
      const child = node.children[idx];
      if (child === NONE) return undefined;
      if (halfWidth === 1) return this._leaves.get(child);
      halfWidth >>= 1;
      nodeHandle = child;
    }
  }

  has(position: Readonly<Position>): boolean {
    return this.get(position) !== undefined;
  }

  insert(position: Readonly<Position>, value: V): void {
    const p = this.checkPosition(position);
    let nodeHandle = ROOT;
    let halfWidth = this.halfWidth;
    for (;;) {
      const node = this._nodes.get(nodeHandle);

      if (node.kind === "full") {
        const fullValue = this._leaves.get(node.leaf);
        if (this.equals(fullValue, value)) return;

        const idx = octantIndex(p, halfWidth);
        const children = this.splitFull(fullValue, idx, value, p, halfWidth);
        this._nodes.set(nodeHandle, { kind: "mixed", children });
        this._leaves.remove(node.leaf);
        return;
      }

      const { children } = node;
      const idx = octantIndex(p, halfWidth);

      if (this.wouldBecomeFull(children, idx, value, p, halfWidth)) {
        this.deleteChildren(children, halfWidth);
        const leaf = this._leaves.insert(value);
        this._nodes.set(nodeHandle, { kind: "full", leaf });
        return;
      }

      const child = children[idx];
      if (child === NONE) {
        children[idx] = halfWidth === 1 ? this._leaves.insert(value) : this.buildPath(p, value, halfWidth >> 1);
        return;
      }
      if (halfWidth === 1) {
        this._leaves.set(child, value);
        return;
      }
      halfWidth >>= 1;
      nodeHandle = child;
    }
  }

  /** Removal is not implemented. */
  remove(_position: Readonly<Position>): never {
    throw new UnsupportedOperationError("Octree.remove");
  }

  /** In-place mutable access is not implemented; use insert. */
  getMut(_position: Readonly<Position>): never {
    throw new UnsupportedOperationError("Octree.getMut");
  }

  /**
   * Would inserting `value` at octant `idx` (with `pos` already in that
   * octant's frame) leave this mixed node uniformly `value`?
   * Siblings only count when they are already `full` with that value.
   */
  private wouldBecomeFull(
    children: Int32Array,
    idx: number,
    value: V,
    pos: Readonly<Position>,
    halfWidth: number
  ): boolean {
    if (halfWidth === 1) {
      for (let i = 0; i < OCTANTS; i++) {
        if (i === idx) continue;
        const leaf = children[i];
        if (leaf === NONE || !this.equals(this._leaves.get(leaf), value)) return false;
      }
      return true;
    }

    for (let i = 0; i < OCTANTS; i++) {
      if (i === idx) continue;
      const child = children[i];
      if (child === NONE) return false;
      const node = this._nodes.get(child);
      if (node.kind !== "full" || !this.equals(this._leaves.get(node.leaf), value)) return false;
    }

    const target = children[idx];
    if (target === NONE) return false;
    const node = this._nodes.get(target);
    if (node.kind === "full") return this.equals(this._leaves.get(node.leaf), value);

    const childHalf = halfWidth >> 1;
    const local = copyPos(pos);
    const childIdx = octantIndex(local, childHalf);
    return this.wouldBecomeFull(node.children, childIdx, value, local, childHalf);
  }

  /**
   * Children for a `full` node of `majority` split by `value` at octant `idx`:
   * seven uniform siblings and one branch carrying `value` down to a leaf.
   */
  private splitFull(majority: V, idx: number, value: V, pos: Position, halfWidth: number): Int32Array {
    const children = emptyChildren();
    if (halfWidth === 1) {
      for (let i = 0; i < OCTANTS; i++) {
        children[i] = this._leaves.insert(i === idx ? value : majority);
      }
      return children;
    }

    const childHalf = halfWidth >> 1;
    for (let i = 0; i < OCTANTS; i++) {
      if (i === idx) {
        const childIdx = octantIndex(pos, childHalf);
        const grandChildren = this.splitFull(majority, childIdx, value, pos, childHalf);
        children[i] = this._nodes.insert({ kind: "mixed", children: grandChildren });
      } else {
        const leaf = this._leaves.insert(majority);
        children[i] = this._nodes.insert({ kind: "full", leaf });
      }
    }
    return children;
  }

  /** Frees every live descendant of a mixed node at `halfWidth`. */
  private deleteChildren(children: Int32Array, halfWidth: number): void {
    for (let i = 0; i < OCTANTS; i++) {
      const child = children[i];
      if (child === NONE) continue;
      if (halfWidth === 1) {
        this._leaves.remove(child);
        continue;
      }
      const node = this._nodes.remove(child);
      if (node.kind === "full") this._leaves.remove(node.leaf);
      else this.deleteChildren(node.children, halfWidth >> 1);
    }
  }

  /** Chain of single-child mixed nodes from `halfWidth` down to a new leaf. Returns the top node. */
  private buildPath(pos: Position, value: V, halfWidth: number): Handle {
    const idx = octantIndex(pos, halfWidth);
    const child = halfWidth === 1 ? this._leaves.insert(value) : this.buildPath(pos, value, halfWidth >> 1);
    return this._nodes.insert(mixedWith(child, idx));
  }

  clone(): Octree<V> {
    const out = new Octree<V>({
      halfWidth: this.halfWidth,
      initialCapacity: 1,
      equals: this.equals,
      formatValue: this.formatValue,
    });
    out._nodes = this._nodes.clone((n): OctNode =>
      n.kind === "full" ? { kind: "full", leaf: n.leaf } : { kind: "mixed", children: Int32Array.from(n.children) }
    );
    out._leaves = this._leaves.clone();
    out._nodeView = out._nodes.view(snapshot);
    out._leafView = out._leaves.view((v) => v);
    return out;
  }

  toString(): string {
    return dumpOctree(this);
  }

  print(): void {
    console.log(this.toString());
  }
}

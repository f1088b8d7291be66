// src/octree/tree/validate.ts
import { OctreeError } from "../errors.js";
import { NONE, OCTANTS, type Handle } from "../interfaces.js";
import { octantOrigin } from "../octant.js";
import { addPos, formatPos, ZERO, type Position } from "../position.js";
import type { Octree } from "./octree.js";

/** Result of resolving a subtree: a single value, or not uniform. */
type Uniformity<V> = { uniform: true; value: V } | { uniform: false };

/**
 * Walks the tree and reports broken structure: dangling or doubly referenced
 * handles, unreachable live slots, and mixed nodes that should have collapsed.
 * Returns an empty list for a healthy tree.
 */
export function validateOctree<V>(tree: Octree<V>): string[] {
  const problems: string[] = [];
  const seenNodes = new Set<Handle>([0]);
  const seenLeaves = new Set<Handle>();

  const claimLeaf = (leaf: Handle, where: string): boolean => {
    if (!tree.leaves.isAlive(leaf)) {
      problems.push(`${where}: dangling leaf handle ${leaf}`);
      return false;
    }
    if (seenLeaves.has(leaf)) {
      problems.push(`${where}: leaf handle ${leaf} referenced twice`);
      return false;
    }
    seenLeaves.add(leaf);
    return true;
  };

  const walk = (handle: Handle, halfWidth: number, origin: Position): Uniformity<V> => {
    const where = `node ${handle} at ${formatPos(origin)}`;
    const node = tree.nodes.get(handle);
    if (node.kind === "full") {
      if (!claimLeaf(node.leaf, where)) return { uniform: false };
      return { uniform: true, value: tree.leaves.get(node.leaf) };
    }

    const resolved: Uniformity<V>[] = [];
    for (let i = 0; i < OCTANTS; i++) {
      const child = node.children[i];
      if (child === NONE) {
        resolved.push({ uniform: false });
        continue;
      }
      if (halfWidth === 1) {
        resolved.push(claimLeaf(child, where) ? { uniform: true, value: tree.leaves.get(child) } : { uniform: false });
        continue;
      }
      if (!tree.nodes.isAlive(child)) {
        problems.push(`${where}: dangling node handle ${child}`);
        resolved.push({ uniform: false });
        continue;
      }
      if (seenNodes.has(child)) {
        problems.push(`${where}: node handle ${child} referenced twice`);
        resolved.push({ uniform: false });
        continue;
      }
      seenNodes.add(child);
      resolved.push(walk(child, halfWidth >> 1, addPos(origin, octantOrigin(i, halfWidth))));
    }

    const [head] = resolved;
    if (head === undefined || !head.uniform) return { uniform: false };
    for (const r of resolved) {
      if (!r.uniform || !tree.equals(head.value, r.value)) return { uniform: false };
    }
    problems.push(`${where}: mixed node is uniformly ${tree.formatValue(head.value)} and should be full`);
    return head;
  };

  walk(0, tree.halfWidth, { ...ZERO });

  for (const h of tree.nodes.handles()) {
    if (!seenNodes.has(h)) problems.push(`node ${h} is live but unreachable`);
  }
  for (const h of tree.leaves.handles()) {
    if (!seenLeaves.has(h)) problems.push(`leaf ${h} is live but unreachable`);
  }
  return problems;
}

export function assertValidOctree<V>(tree: Octree<V>): void {
  const problems = validateOctree(tree);
  if (problems.length) throw new OctreeError("INVARIANT", `Octree invariants violated:\n${problems.join("\n")}`);
}

// src/octree/tree/dump.ts
import { NONE, OCTANTS, type Handle } from "../interfaces.js";
import type { Octree } from "./octree.js";

const INDENT = "   ";

export function formatValueDefault(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object" && value !== null) return JSON.stringify(value) ?? String(value);
  return String(value);
}

/**
 * Depth-first listing of the tree, octants in ascending order. Empty octants
 * of a mixed node are summarised on one line after its occupied ones.
 */
export function dumpOctree<V>(tree: Octree<V>): string {
  const lines: string[] = [];
  const fmt = (v: V) => tree.formatValue(v);

  const visit = (handle: Handle, halfWidth: number, depth: number, prefix: string) => {
    const pad = INDENT.repeat(depth);
    const inner = INDENT.repeat(depth + 1);
    lines.push(`${pad}${prefix}Node ${handle} (${halfWidth}):`);

    const node = tree.nodes.get(handle);
    if (node.kind === "full") {
      lines.push(`${inner}All: ${fmt(tree.leaves.get(node.leaf))}`);
      return;
    }

    const empties: number[] = [];
    for (let i = 0; i < OCTANTS; i++) {
      const child = node.children[i];
      if (child === NONE) empties.push(i);
      else if (halfWidth === 1) lines.push(`${inner}${i}: Leaf: ${fmt(tree.leaves.get(child))}`);
      else visit(child, halfWidth >> 1, depth + 1, `${i}: `);
    }
    if (empties.length) lines.push(`${inner}${empties.join(", ")}: Empty`);
  };

  visit(0, tree.halfWidth, 0, "");
  return lines.join("\n");
}

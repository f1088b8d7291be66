// src/octree/octant.ts
import type { Position } from "./position.js";

/**
 * Octant of `pos` inside a cube of the given half-width: each axis at or past
 * the midpoint sets a bit (x = 4, y = 2, z = 1).
 *
 * Mutates `pos` into the child octant's local frame.
 */
export function octantIndex(pos: Position, halfWidth: number): number {
  let idx = 0;
  if (pos.x >= halfWidth) {
    pos.x -= halfWidth;
    idx |= 4;
  }
  if (pos.y >= halfWidth) {
    pos.y -= halfWidth;
    idx |= 2;
  }
  if (pos.z >= halfWidth) {
    pos.z -= halfWidth;
    idx |= 1;
  }
  return idx;
}

/** Corner of octant `idx` relative to its parent's origin. */
export function octantOrigin(idx: number, halfWidth: number): Position {
  return {
    x: idx & 4 ? halfWidth : 0,
    y: idx & 2 ? halfWidth : 0,
    z: idx & 1 ? halfWidth : 0,
  };
}

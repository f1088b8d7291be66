// src/octree/position.ts
import { InvalidPositionError } from "./errors.js";

/** Voxel coordinate; each axis an unsigned 8-bit integer. */
export interface Position {
  x: number;
  y: number;
  z: number;
}

const U8_MAX = 255;

export const ZERO: Readonly<Position> = Object.freeze({ x: 0, y: 0, z: 0 });
export const UNIT_X: Readonly<Position> = Object.freeze({ x: 1, y: 0, z: 0 });
export const UNIT_Y: Readonly<Position> = Object.freeze({ x: 0, y: 1, z: 0 });
export const UNIT_Z: Readonly<Position> = Object.freeze({ x: 0, y: 0, z: 1 });

export function isU8(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= U8_MAX;
}

export function isPosU8(p: Readonly<Position>): boolean {
  return isU8(p.x) && isU8(p.y) && isU8(p.z);
}

function checked(x: number, y: number, z: number): Position {
  const p = { x, y, z };
  if (!isPosU8(p)) throw new InvalidPositionError(`(${x}, ${y}, ${z}) is outside the unsigned 8-bit range`);
  return p;
}

export function pos(x: number, y: number, z: number): Position {
  return checked(x, y, z);
}

export function copyPos(p: Readonly<Position>): Position {
  return { x: p.x, y: p.y, z: p.z };
}

export function addPos(a: Readonly<Position>, b: Readonly<Position>): Position {
  return checked(a.x + b.x, a.y + b.y, a.z + b.z);
}

export function subPos(a: Readonly<Position>, b: Readonly<Position>): Position {
  return checked(a.x - b.x, a.y - b.y, a.z - b.z);
}

export function equalsPos(a: Readonly<Position>, b: Readonly<Position>): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatPos(p: Readonly<Position>): string {
  return `(${p.x}, ${p.y}, ${p.z})`;
}

export { Octree } from "./octree/tree/octree.js";
export { dumpOctree, formatValueDefault } from "./octree/tree/dump.js";
export { validateOctree, assertValidOctree } from "./octree/tree/validate.js";
export { Arena, type ReadonlyArena } from "./octree/core/arena.js";
export { octantIndex, octantOrigin } from "./octree/octant.js";
export {
  pos,
  copyPos,
  addPos,
  subPos,
  equalsPos,
  formatPos,
  isU8,
  isPosU8,
  ZERO,
  UNIT_X,
  UNIT_Y,
  UNIT_Z,
  type Position,
} from "./octree/position.js";
export {
  NONE,
  OCTANTS,
  type Handle,
  type OctNode,
  type OctNodeView,
  type FullNode,
  type MixedNode,
  type OctreeConfig,
  type OctreeStats,
  type Equals,
  type FormatValue,
} from "./octree/interfaces.js";
export {
  OctreeError,
  InvalidPositionError,
  ArenaFaultError,
  UnsupportedOperationError,
  InvalidConfigError,
  type OctreeErrorCode,
  type ArenaFaultReason,
} from "./octree/errors.js";

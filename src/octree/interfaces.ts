export type Handle = number;

/** Sentinel for an unset octant slot. */
export const NONE: Handle = -1;

export const OCTANTS = 8;

export type FullNode = {
  kind: "full";
  leaf: Handle;
};

export type MixedNode = {
  kind: "mixed";
  /**
   * One slot per octant, x bit most significant:
   * 0 -x-y-z, 1 -x-y+z, 2 -x+y-z, 3 -x+y+z, 4 +x-y-z, 5 +x-y+z, 6 +x+y-z, 7 +x+y+z.
   * Slots hold leaf handles when the node's half-width is 1, node handles otherwise.
   */
  children: Int32Array;
};

export type OctNode = FullNode | MixedNode;

/** Node as handed out of the tree: a frozen snapshot. */
export type OctNodeView =
  | Readonly<FullNode>
  | { readonly kind: "mixed"; readonly children: ReadonlyArray<Handle> };

export type Equals<V> = (a: V, b: V) => boolean;
export type FormatValue<V> = (value: V) => string;

export interface OctreeConfig<V> {
  /** Half the side of the cube; a power of two in [1, 128]. */
  halfWidth: number;
  initialCapacity?: number; // default 64
  equals?: Equals<V>; // default Object.is
  formatValue?: FormatValue<V>;
}

export interface OctreeStats {
  nodes: number;
  leaves: number;
}

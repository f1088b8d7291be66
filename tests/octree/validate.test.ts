// tests/octree/validate.test.ts
import { OctreeError } from "../../src/octree/errors.js";
import { pos } from "../../src/octree/position.js";
import { assertValidOctree, validateOctree } from "../../src/octree/tree/validate.js";
import { makeTree, OpenOctree } from "../testUtils.js";

const openTree = (halfWidth: number) => new OpenOctree<string>({ halfWidth });

describe("validateOctree", () => {
  it("accepts healthy trees", () => {
    const tree = makeTree(4);
    tree.insert(pos(1, 2, 3), "a");
    tree.insert(pos(7, 7, 7), "b");
    expect(validateOctree(tree)).toEqual([]);
    expect(() => assertValidOctree(tree)).not.toThrow();
  });

  it("reports mixed nodes that should be full", () => {
    const tree = openTree(1);
    const children = tree.rootChildren();
    for (let i = 0; i < 8; i++) children[i] = tree.rawLeaves.insert("a");
    expect(validateOctree(tree)).toEqual(['node 0 at (0, 0, 0): mixed node is uniformly "a" and should be full']);
  });

  it("reports a node handle left pointing at a freed node", () => {
    const tree = openTree(2);
    tree.insert(pos(0, 0, 0), "a");
    const child = tree.rootChildren()[0];
    tree.rawNodes.remove(child);
    expect(validateOctree(tree)).toEqual([
      `node 0 at (0, 0, 0): dangling node handle ${child}`,
      "leaf 0 is live but unreachable",
    ]);
  });

  it("reports dangling and unreachable handles", () => {
    const tree = openTree(1);
    tree.insert(pos(0, 0, 0), "a");
    tree.rawLeaves.remove(0);
    tree.rawLeaves.insert("z");
    tree.rawLeaves.insert("y");
    expect(validateOctree(tree)).toEqual(["leaf 1 is live but unreachable"]);

    const other = openTree(1);
    other.insert(pos(0, 0, 0), "a");
    other.rawLeaves.remove(0);
    expect(validateOctree(other)).toEqual(["node 0 at (0, 0, 0): dangling leaf handle 0"]);
  });

  it("reports handles referenced twice", () => {
    const tree = openTree(1);
    tree.insert(pos(0, 0, 0), "a");
    const children = tree.rootChildren();
    children[1] = children[0];
    expect(validateOctree(tree)).toEqual(["node 0 at (0, 0, 0): leaf handle 0 referenced twice"]);
  });

  it("assertValidOctree throws an invariant error", () => {
    const tree = openTree(1);
    tree.insert(pos(0, 0, 0), "a");
    tree.rawLeaves.insert("stray");

    let caught: unknown;
    try {
      assertValidOctree(tree);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(OctreeError);
    if (caught instanceof OctreeError) {
      expect(caught.code).toBe("INVARIANT");
      expect(caught.message).toBe("Octree invariants violated:\nleaf 1 is live but unreachable");
    }
  });
});

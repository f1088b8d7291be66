// tests/octree/dump.test.ts
import { octantOrigin } from "../../src/octree/octant.js";
import { pos } from "../../src/octree/position.js";
import { dumpOctree, formatValueDefault } from "../../src/octree/tree/dump.js";
import { Octree } from "../../src/octree/tree/octree.js";
import { makeTree } from "../testUtils.js";

describe("dumpOctree", () => {
  it("lists leaves and summarises empty octants", () => {
    const tree = makeTree(1);
    tree.insert(pos(0, 0, 0), "a");
    expect(dumpOctree(tree)).toBe(['Node 0 (1):', '   0: Leaf: "a"', "   1, 2, 3, 4, 5, 6, 7: Empty"].join("\n"));
  });

  it("nests subtrees under their octant index", () => {
    const tree = makeTree(2);
    tree.insert(pos(3, 0, 0), "b");
    expect(tree.toString()).toBe(
      [
        "Node 0 (2):",
        "   4: Node 1 (1):",
        '      4: Leaf: "b"',
        "      0, 1, 2, 3, 5, 6, 7: Empty",
        "   0, 1, 2, 3, 5, 6, 7: Empty",
      ].join("\n")
    );
  });

  it("prints full nodes as one value", () => {
    const tree = makeTree<number>(1);
    for (let i = 0; i < 8; i++) tree.insert(octantOrigin(i, 1), 7);
    expect(tree.toString()).toBe("Node 0 (1):\n   All: 7");

    tree.insert(pos(0, 0, 0), 9);
    expect(tree.toString()).toBe(
      [
        "Node 0 (1):",
        "   0: Leaf: 9",
        "   1: Leaf: 7",
        "   2: Leaf: 7",
        "   3: Leaf: 7",
        "   4: Leaf: 7",
        "   5: Leaf: 7",
        "   6: Leaf: 7",
        "   7: Leaf: 7",
      ].join("\n")
    );
  });

  it("uses the configured value formatter", () => {
    const tree = new Octree<{ id: number }>({ halfWidth: 1, formatValue: (v) => `#${v.id}` });
    tree.insert(pos(1, 1, 1), { id: 3 });
    expect(tree.toString()).toBe("Node 0 (1):\n   7: Leaf: #3\n   0, 1, 2, 3, 4, 5, 6: Empty");
  });

  it("formats values by type by default", () => {
    expect(formatValueDefault("hi")).toBe('"hi"');
    expect(formatValueDefault(3)).toBe("3");
    expect(formatValueDefault({ a: 1 })).toBe('{"a":1}');
    expect(formatValueDefault(null)).toBe("null");
    expect(formatValueDefault(undefined)).toBe("undefined");
  });

  it("print writes the dump to the console", () => {
    const tree = makeTree(1);
    tree.insert(pos(0, 0, 0), "a");
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      tree.print();
      expect(log).toHaveBeenCalledWith(tree.toString());
    } finally {
      log.mockRestore();
    }
  });
});

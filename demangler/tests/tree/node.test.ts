/**
 * Tests for node ownership, sibling views, cloning and sealing
 */

import { describe, expect, test } from "vitest";
import { Node, NodeKind, TreeInvariantError, treesEqual, verifyTreeLinks } from "../../src/tree/index.ts";

function sampleTree(): Node {
  const root = Node.create(NodeKind.Structure);
  root.addChildren(Node.create(NodeKind.Module, "M"), Node.create(NodeKind.Identifier, "Int"));
  return root;
}

describe("Node construction", () => {
  test("should create an unlinked leaf with its text", () => {
    const leaf = Node.create(NodeKind.Identifier, "foo");
    expect(leaf.kind).toBe(NodeKind.Identifier);
    expect(leaf.text).toBe("foo");
    expect(leaf.parent).toBeNull();
    expect(leaf.isUnlinked).toBe(true);
    expect(leaf.indexInParent).toBe(-1);
    expect(leaf.hasChildren()).toBe(false);
  });

  test("should leave text undefined on containers", () => {
    expect(Node.create(NodeKind.TypeList).text).toBeUndefined();
  });

  test("should link a child to its parent and position", () => {
    const root = Node.create(NodeKind.TypeList);
    const a = root.addChild(Node.create(NodeKind.Identifier, "a"));
    const b = root.addChild(Node.create(NodeKind.Identifier, "b"));

    expect(root.childCount).toBe(2);
    expect(a.parent).toBe(root);
    expect(b.indexInParent).toBe(1);
    expect(root.getFirstChild()).toBe(a);
    expect(root.getChild(1)).toBe(b);
    expect([...root]).toEqual([a, b]);
  });

  test("should reject a child that already has a parent", () => {
    const first = Node.create(NodeKind.Type);
    const second = Node.create(NodeKind.Type);
    const shared = first.addChild(Node.create(NodeKind.ErrorType));

    expect(() => second.addChild(shared)).toThrow(TreeInvariantError);
    expect(second.childCount).toBe(0);
    expect(shared.parent).toBe(first);
  });

  test("should reject a node as its own child", () => {
    const node = Node.create(NodeKind.Type);
    expect(() => node.addChild(node)).toThrow(TreeInvariantError);
  });

  test("should report a missing child as an invariant violation", () => {
    const node = Node.create(NodeKind.Type);
    expect(() => node.getFirstChild()).toThrow("Type has no child at index 0");
  });
});

describe("Subtree size", () => {
  test("should count the node and all its descendants", () => {
    const type = Node.create(NodeKind.Type);
    type.addChild(sampleTree());
    expect(type.countNodes()).toBe(4);
    expect(Node.create(NodeKind.ErrorType).countNodes()).toBe(1);
  });
});

describe("Sibling views", () => {
  test("should agree with the parent's child order", () => {
    const root = Node.create(NodeKind.TypeList);
    const a = root.addChild(Node.create(NodeKind.Identifier, "a"));
    const b = root.addChild(Node.create(NodeKind.Identifier, "b"));
    const c = root.addChild(Node.create(NodeKind.Identifier, "c"));

    expect(a.previousSibling).toBeNull();
    expect(a.nextSibling).toBe(b);
    expect(b.previousSibling).toBe(a);
    expect(b.nextSibling).toBe(c);
    expect(c.nextSibling).toBeNull();
  });

  test("should have no siblings on a root", () => {
    const root = sampleTree();
    expect(root.previousSibling).toBeNull();
    expect(root.nextSibling).toBeNull();
  });
});

describe("Cloning", () => {
  test("should produce an equal tree sharing no nodes", () => {
    const original = sampleTree();
    const copy = original.clone();

    expect(treesEqual(original, copy)).toBe(true);
    expect(copy).not.toBe(original);
    expect(copy.getChild(0)).not.toBe(original.getChild(0));
    expect(copy.getChild(0).parent).toBe(copy);
  });

  test("should be unlinked even when the source is a child", () => {
    const root = sampleTree();
    const copy = root.getChild(1).clone();
    expect(copy.isUnlinked).toBe(true);
    expect(copy.text).toBe("Int");
  });

  test("should not be affected by later changes to the source", () => {
    const original = Node.create(NodeKind.TypeList);
    const copy = original.clone();
    original.addChild(Node.create(NodeKind.ErrorType));

    expect(copy.childCount).toBe(0);
    expect(treesEqual(original, copy)).toBe(false);
  });

  test("should unseal the copy", () => {
    const original = sampleTree();
    original.seal();
    const copy = original.clone();

    expect(copy.isSealed).toBe(false);
    copy.addChild(Node.create(NodeKind.Identifier, "extra"));
    expect(copy.childCount).toBe(3);
  });
});

describe("Sealing", () => {
  test("should seal every descendant", () => {
    const root = sampleTree();
    root.seal();

    expect(root.isSealed).toBe(true);
    expect(root.getChild(0).isSealed).toBe(true);
    expect(() => root.addChild(Node.create(NodeKind.Identifier, "x"))).toThrow(TreeInvariantError);
    expect(() => root.getChild(1).addChild(Node.create(NodeKind.Identifier, "x"))).toThrow(
      "tree invariant violated: cannot add a child to sealed Identifier"
    );
  });
});

describe("Link verification", () => {
  test("should find no problems in a well-formed tree", () => {
    const root = sampleTree();
    const type = Node.create(NodeKind.Type);
    type.addChild(root);
    expect(verifyTreeLinks(type)).toEqual([]);
  });
});

describe("Structural equality", () => {
  test("should compare kinds, texts and child order", () => {
    const a = sampleTree();
    const b = Node.create(NodeKind.Structure);
    b.addChildren(Node.create(NodeKind.Identifier, "Int"), Node.create(NodeKind.Module, "M"));

    expect(treesEqual(a, sampleTree())).toBe(true);
    expect(treesEqual(a, b)).toBe(false);
    expect(treesEqual(Node.create(NodeKind.Module, "M"), Node.create(NodeKind.Module, "N"))).toBe(
      false
    );
  });
});

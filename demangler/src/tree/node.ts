/**
 * The tree a linkage name decodes into.
 *
 * A parent owns its children through an ordered list. Each child keeps a
 * back-reference to its parent and its position in that list; siblings are
 * read through the parent's list rather than stored as separate links, so the
 * two views cannot drift apart.
 *
 * The linking contract is between the decoder and this module. Breaking it
 * (attaching a node twice, extending a sealed tree, asking for a child that
 * does not exist) is a bug in the caller and throws {@link TreeInvariantError}.
 */

import type { NodeKind } from "./kinds.ts";

export class TreeInvariantError extends Error {
  constructor(message: string) {
    super(`tree invariant violated: ${message}`);
    this.name = "TreeInvariantError";
  }
}

function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new TreeInvariantError(message);
  }
}

export class Node implements Iterable<Node> {
  readonly kind: NodeKind;
  readonly text: string | undefined;
  private readonly childList: Node[] = [];
  private parentNode: Node | null = null;
  private position = -1;
  private sealed = false;

  private constructor(kind: NodeKind, text: string | undefined) {
    this.kind = kind;
    this.text = text;
  }

  /** Creates an unlinked node, with a text payload for leaves. */
  static create(kind: NodeKind, text?: string): Node {
    return new Node(kind, text);
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  get parent(): Node | null {
    return this.parentNode;
  }

  get children(): ReadonlyArray<Node> {
    return this.childList;
  }

  get childCount(): number {
    return this.childList.length;
  }

  hasChildren(): boolean {
    return this.childList.length > 0;
  }

  getChild(index: number): Node {
    const child = this.childList[index];
    invariant(child !== undefined, `${this.kind} has no child at index ${index}`);
    return child;
  }

  getFirstChild(): Node {
    return this.getChild(0);
  }

  get previousSibling(): Node | null {
    if (this.parentNode === null) return null;
    return this.parentNode.childList[this.position - 1] ?? null;
  }

  get nextSibling(): Node | null {
    if (this.parentNode === null) return null;
    return this.parentNode.childList[this.position + 1] ?? null;
  }

  /** Position in the parent's child list, or -1 for a root. */
  get indexInParent(): number {
    return this.position;
  }

  /** Number of nodes in the subtree rooted here, this node included. */
  countNodes(): number {
    let count = 1;
    for (const child of this.childList) {
      count += child.countNodes();
    }
    return count;
  }

  get isUnlinked(): boolean {
    return this.parentNode === null;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  [Symbol.iterator](): Iterator<Node> {
    return this.childList[Symbol.iterator]();
  }

  // ─── Construction ─────────────────────────────────────────────────────

  /**
   * Appends `child` to this node's children.
   *
   * `child` must be unlinked: a subtree object occupies at most one position.
   * Returns `child`.
   */
  addChild(child: Node): Node {
    invariant(!this.sealed, `cannot add a child to sealed ${this.kind}`);
    invariant(child !== this, `${this.kind} cannot be its own child`);
    invariant(
      child.isUnlinked,
      `${child.kind} is already a child of ${child.parentNode?.kind ?? "another node"}`
    );
    child.parentNode = this;
    child.position = this.childList.length;
    this.childList.push(child);
    return child;
  }

  addChildren(first: Node, second: Node): void {
    this.addChild(first);
    this.addChild(second);
  }

  /** Deep copy, unlinked and unsealed, sharing no node with this tree. */
  clone(): Node {
    const copy = new Node(this.kind, this.text);
    for (const child of this.childList) {
      copy.addChild(child.clone());
    }
    return copy;
  }

  /** Marks this node and all its descendants immutable. */
  seal(): void {
    this.sealed = true;
    for (const child of this.childList) {
      child.seal();
    }
  }
}

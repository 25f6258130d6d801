import { DecodeError, DecodeErrorKind } from "../errors/index.ts";
import type { Node } from "../tree/node.ts";

/**
 * Back-reference cache for one decode.
 *
 * Entries are appended when a production finishes, so an index names the
 * n-th subtree to complete, not the n-th to start: in `CC3foo3bar3baz` the
 * inner class `foo.bar` is entry 1 and the enclosing `foo.bar.baz` entry 2.
 */
export class SubstitutionTable {
  private readonly entries: Node[] = [];
  private readonly maxCopiedNodes: number;
  private copiedNodes = 0;

  constructor(maxCopiedNodes: number) {
    this.maxCopiedNodes = maxCopiedNodes;
  }

  /** Nodes handed out by {@link resolve} so far. */
  get copied(): number {
    return this.copiedNodes;
  }

  get size(): number {
    return this.entries.length;
  }

  add(node: Node): void {
    this.entries.push(node);
  }

  /** The cached subtree itself; read-only access for inspection. */
  entryAt(index: number): Node | undefined {
    return this.entries[index];
  }

  /**
   * Returns a fresh, unlinked copy of entry `index`. The cached subtree may
   * already sit in the tree under construction, so it is never handed out.
   * Fails once the copies made during this decode exceed the node budget.
   */
  resolve(index: number, offset: number): Node {
    const entry = this.entries[index];
    if (entry === undefined) {
      throw new DecodeError(
        DecodeErrorKind.InvalidBackReference,
        `substitution ${index} is out of range (${this.entries.length} entries)`,
        offset
      );
    }
    const size = entry.countNodes();
    if (this.copiedNodes + size > this.maxCopiedNodes) {
      throw new DecodeError(
        DecodeErrorKind.RecursionLimitExceeded,
        `back-references expand past the limit of ${this.maxCopiedNodes} nodes`,
        offset
      );
    }
    this.copiedNodes += size;
    return entry.clone();
  }
}

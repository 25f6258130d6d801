import type { Node } from "./node.ts";

/**
 * Walks `root` and reports every child whose parent, position or sibling view
 * disagrees with the child list that holds it. A healthy tree yields `[]`.
 */
export function verifyTreeLinks(root: Node): string[] {
  const problems: string[] = [];
  const seen = new Set<Node>();

  const walk = (node: Node, path: string): void => {
    if (seen.has(node)) {
      problems.push(`${path}: ${node.kind} appears at more than one position`);
      return;
    }
    seen.add(node);

    node.children.forEach((child, index) => {
      const childPath = `${path}/${index}:${child.kind}`;
      if (child.parent !== node) {
        problems.push(`${childPath}: parent is ${child.parent?.kind ?? "null"}, expected ${node.kind}`);
      }
      if (child.indexInParent !== index) {
        problems.push(`${childPath}: recorded position ${child.indexInParent}`);
      }
      if (child.previousSibling !== (node.children[index - 1] ?? null)) {
        problems.push(`${childPath}: previous sibling does not match child order`);
      }
      if (child.nextSibling !== (node.children[index + 1] ?? null)) {
        problems.push(`${childPath}: next sibling does not match child order`);
      }
      walk(child, childPath);
    });
  };

  walk(root, root.kind);
  return problems;
}

/** Structural equality: same kinds, texts and child sequences. */
export function treesEqual(a: Node, b: Node): boolean {
  if (a.kind !== b.kind || a.text !== b.text || a.childCount !== b.childCount) {
    return false;
  }
  return a.children.every((child, index) => {
    const other = b.children[index];
    return other !== undefined && treesEqual(child, other);
  });
}

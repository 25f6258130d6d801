import type { Node } from "../tree/node.ts";

/**
 * Raw structure of a tree, one node per line:
 * `kind=<Kind>[, text="<text>"]`, indented two spaces per level.
 */
export function dumpTree(tree: Node): string {
  const lines: string[] = [];

  const walk = (node: Node, depth: number): void => {
    const text = node.text === undefined ? "" : `, text=${JSON.stringify(node.text)}`;
    lines.push(`${"  ".repeat(depth)}kind=${node.kind}${text}`);
    for (const child of node) {
      walk(child, depth + 1);
    }
  };

  walk(tree, 0);
  return lines.join("\n");
}

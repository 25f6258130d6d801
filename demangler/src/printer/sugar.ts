/**
 * Recognizes standard library generic instantiations that have a shorthand
 * spelling: `[T]`, `[K : V]`, `T?` and `T!`.
 */

import { SWIFT_MODULE } from "../cursor/discriminators.ts";
import { NodeKind } from "../tree/kinds.ts";
import type { Node } from "../tree/node.ts";

export type Sugar = "array" | "dictionary" | "optional" | "implicitlyUnwrappedOptional";

interface SugarRule {
  kind: NodeKind.BoundGenericStructure | NodeKind.BoundGenericEnum;
  name: string;
  arity: number;
  sugar: Sugar;
}

const SUGAR_RULES: readonly SugarRule[] = [
  { kind: NodeKind.BoundGenericStructure, name: "Array", arity: 1, sugar: "array" },
  { kind: NodeKind.BoundGenericStructure, name: "Dictionary", arity: 2, sugar: "dictionary" },
  { kind: NodeKind.BoundGenericEnum, name: "Optional", arity: 1, sugar: "optional" },
  {
    kind: NodeKind.BoundGenericEnum,
    name: "ImplicitlyUnwrappedOptional",
    arity: 1,
    sugar: "implicitlyUnwrappedOptional",
  },
];

/** The shorthand `node` can be written with, or `null` when it has none. */
export function findSugar(node: Node): Sugar | null {
  const nominal = node.children[0]?.children[0];
  const args = node.children[1];
  if (nominal === undefined || args === undefined) return null;

  const module = nominal.children[0];
  const name = nominal.children[1];
  if (module?.kind !== NodeKind.Module || module.text !== SWIFT_MODULE) return null;
  if (name?.kind !== NodeKind.Identifier) return null;

  const rule = SUGAR_RULES.find(
    (r) => r.kind === node.kind && r.name === name.text && r.arity === args.childCount
  );
  return rule?.sugar ?? null;
}

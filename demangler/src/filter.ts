/**
 * Finds linkage names in free text. Sits in front of the decoder: it only
 * recognizes the `_T` marker and never looks at the grammar.
 */

import { MANGLING_PREFIX } from "./cursor/discriminators.ts";
import { Decoder } from "./decoder/index.ts";
import { type DemangleOptions, resolveOptions } from "./options.ts";
import { renderTree } from "./printer/index.ts";
import { NodeKind } from "./tree/index.ts";

const MANGLED_NAME = /_T[0-9A-Za-z_]+/g;

export function isMangledName(text: string): boolean {
  return text.length > MANGLING_PREFIX.length && text.startsWith(MANGLING_PREFIX);
}

/** Every `_T`-prefixed run of name characters in `text`, in order. */
export function findMangledNames(text: string): string[] {
  return text.match(MANGLED_NAME) ?? [];
}

/**
 * Replaces each linkage name in `text` with its rendering. Names that do not
 * decode are left as they are.
 */
export function demangleText(text: string, options?: Partial<DemangleOptions>): string {
  const resolved = resolveOptions(options);
  return text.replace(MANGLED_NAME, (name) => {
    const { tree } = new Decoder(name, resolved).decode();
    return tree.kind === NodeKind.Failure ? name : renderTree(tree, resolved);
  });
}

/** `name ---> rendering`, or the rendering alone when `compact`. */
export function formatDemangled(
  name: string,
  options?: Partial<DemangleOptions>,
  compact = false
): string {
  const resolved = resolveOptions(options);
  const { tree } = new Decoder(name, resolved).decode();
  const text = renderTree(tree, resolved);
  return compact ? text : `${name} ---> ${text}`;
}

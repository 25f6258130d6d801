/**
 * Public surface: decode a linkage name into a tree, render a tree as text,
 * or do both at once.
 *
 * @module demangler
 */

import { type DecodeResult, Decoder } from "./decoder/index.ts";
import { type DemangleOptions, resolveOptions } from "./options.ts";
import { renderTree } from "./printer/index.ts";
import type { Node } from "./tree/index.ts";

export { DecodeErrorKind, type Diagnostic, Severity } from "./errors/index.ts";
export { demangleText, findMangledNames, formatDemangled, isMangledName } from "./filter.ts";
export { DEFAULT_OPTIONS, type DemangleOptions, resolveOptions } from "./options.ts";
export { dumpTree, renderTree } from "./printer/index.ts";
export { Node, NodeKind, TreeInvariantError, treesEqual, verifyTreeLinks } from "./tree/index.ts";
export type { DecodeResult };

/** Decodes `mangled` and reports why decoding stopped, if it did. */
export function decodeWithDiagnostics(
  mangled: string,
  options?: Partial<DemangleOptions>
): DecodeResult {
  return new Decoder(mangled, resolveOptions(options)).decode();
}

/**
 * Decodes `mangled` into a sealed tree. Input the grammar does not accept
 * yields a single Failure node whose text is `mangled`.
 */
export function decodeToTree(mangled: string, options?: Partial<DemangleOptions>): Node {
  return decodeWithDiagnostics(mangled, options).tree;
}

/** {@link decodeToTree} followed by {@link renderTree}. */
export function decodeToText(mangled: string, options?: Partial<DemangleOptions>): string {
  return renderTree(decodeToTree(mangled, options), options);
}

/**
 * Test utilities for decoding.
 */

import { decodeToText, decodeWithDiagnostics, dumpTree } from "../../src/index.ts";
import type { DemangleOptions } from "../../src/options.ts";
import type { Node } from "../../src/tree/index.ts";

/** Decode `mangled`, failing the test if any diagnostic is reported. */
export function decodeOk(mangled: string, options?: Partial<DemangleOptions>): Node {
  const { tree, diagnostics } = decodeWithDiagnostics(mangled, options);
  if (diagnostics.length > 0) {
    const msgs = diagnostics.map((d) => `${d.kind} at ${d.offset}: ${d.message}`).join(", ");
    throw new Error(`Decode errors for ${mangled}: ${msgs}`);
  }
  return tree;
}

/** Decode and return the dumped tree structure. */
export function decodeAndDump(mangled: string): string {
  return dumpTree(decodeOk(mangled));
}

/** Decode and render with the given options. */
export function demangle(mangled: string, options?: Partial<DemangleOptions>): string {
  decodeOk(mangled, options);
  return decodeToText(mangled, options);
}

/** Join dump lines written one per array element. */
export function lines(...rows: string[]): string {
  return rows.join("\n");
}

/**
 * Recursive-descent decoder for linkage names.
 *
 * Global records live in global-decoder.ts, contexts, entities and names in
 * entity-decoder.ts, types in type-decoder.ts. All of them operate on the
 * DecoderContext interface implemented by the Decoder class below.
 */

import { Cursor } from "../cursor/cursor.ts";
import { MANGLING_PREFIX } from "../cursor/discriminators.ts";
import { SubstitutionTable } from "../cursor/substitutions.ts";
import { DecodeError, DecodeErrorKind, type Diagnostic } from "../errors/index.ts";
import type { DemangleOptions } from "../options.ts";
import { NodeKind, type TypeSlotKind } from "../tree/kinds.ts";
import { Node } from "../tree/node.ts";
import { decodeContext, decodeEntity, decodeProtocolName } from "./entity-decoder.ts";
import { decodeGlobal } from "./global-decoder.ts";
import { decodeType } from "./type-decoder.ts";

/**
 * Interface exposed to the extracted production modules.
 * Keeps them decoupled from the Decoder class internals.
 */
export interface DecoderContext {
  readonly cursor: Cursor;
  readonly substitutions: SubstitutionTable;

  /** Runs `production` one nesting level deeper, failing past the depth limit. */
  descend<T>(production: () => T): T;

  // Cross-module callbacks
  decodeGlobal(): Node;
  decodeEntity(): Node;
  decodeContext(): Node;
  decodeProtocolName(): Node;
  decodeType(slot?: TypeSlotKind): Node;
}

export interface DecodeResult {
  tree: Node;
  diagnostics: Diagnostic[];
}

/** The resource limits a decode runs under. */
export type DecodeLimits = Pick<DemangleOptions, "maxDepth" | "maxNodes">;

export class Decoder implements DecoderContext {
  readonly cursor: Cursor;
  readonly substitutions: SubstitutionTable;
  private readonly maxDepth: number;
  private depth: number;

  constructor(input: string, limits: DecodeLimits) {
    this.cursor = new Cursor(input);
    this.substitutions = new SubstitutionTable(limits.maxNodes);
    this.maxDepth = limits.maxDepth;
    this.depth = 0;
  }

  /**
   * Decodes the whole input. Never throws for bad input: any mismatch yields
   * a sealed Failure leaf carrying the original text, plus one diagnostic.
   */
  decode(): DecodeResult {
    const { input } = this.cursor;
    try {
      this.cursor.nextIf(MANGLING_PREFIX);
      const tree = this.decodeGlobal();
      if (!this.cursor.isAtEnd()) {
        this.cursor.fail(
          DecodeErrorKind.Structural,
          `unexpected trailing input '${this.cursor.rest()}'`
        );
      }
      tree.seal();
      return { tree, diagnostics: [] };
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      const failure = Node.create(NodeKind.Failure, input);
      failure.seal();
      return { tree: failure, diagnostics: [error.toDiagnostic()] };
    }
  }

  descend<T>(production: () => T): T {
    if (this.depth >= this.maxDepth) {
      this.cursor.fail(
        DecodeErrorKind.RecursionLimitExceeded,
        `nesting exceeds the limit of ${this.maxDepth}`
      );
    }
    this.depth++;
    try {
      return production();
    } finally {
      this.depth--;
    }
  }

  // ─── Cross-module callbacks ─────────────────────────────────────────

  decodeGlobal(): Node {
    return this.descend(() => decodeGlobal(this));
  }

  decodeEntity(): Node {
    return decodeEntity(this);
  }

  decodeContext(): Node {
    return this.descend(() => decodeContext(this));
  }

  decodeProtocolName(): Node {
    return decodeProtocolName(this);
  }

  decodeType(slot: TypeSlotKind = NodeKind.Type): Node {
    return this.descend(() => decodeType(this, slot));
  }
}

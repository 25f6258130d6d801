/**
 * Top-level productions: runtime metadata records, witness tables, thunks,
 * standalone types and plain entities.
 */

import { DIRECTNESS, VALUE_WITNESS_KINDS } from "../cursor/discriminators.ts";
import { NodeKind } from "../tree/kinds.ts";
import { Node } from "../tree/node.ts";
import type { DecoderContext } from "./decoder.ts";
import { decodeModuleRef } from "./entity-decoder.ts";

type ConformanceRecordKind =
  | NodeKind.ProtocolWitnessTable
  | NodeKind.LazyProtocolWitnessTableAccessor
  | NodeKind.LazyProtocolWitnessTableTemplate
  | NodeKind.DependentProtocolWitnessTableGenerator
  | NodeKind.DependentProtocolWitnessTableTemplate;

const CONFORMANCE_RECORDS: ReadonlyMap<string, ConformanceRecordKind> = new Map([
  ["P", NodeKind.ProtocolWitnessTable],
  ["Z", NodeKind.LazyProtocolWitnessTableAccessor],
  ["z", NodeKind.LazyProtocolWitnessTableTemplate],
  ["D", NodeKind.DependentProtocolWitnessTableGenerator],
  ["d", NodeKind.DependentProtocolWitnessTableTemplate],
]);

export function decodeGlobal(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("M")) return decodeMetadata(ctx);
  if (cursor.nextIf("w")) return decodeValueWitness(ctx);
  if (cursor.nextIf("W")) return decodeWitnessRecord(ctx);
  if (cursor.nextIf("T")) return decodeThunk(ctx);
  if (cursor.nextIf("t")) return ctx.decodeType();
  return ctx.decodeEntity();
}

// ─── Metadata ─────────────────────────────────────────────────────────

function decodeMetadata(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("P")) {
    const pattern = Node.create(NodeKind.GenericTypeMetadataPattern);
    pattern.addChildren(decodeDirectness(ctx), ctx.decodeType());
    return pattern;
  }
  if (cursor.nextIf("m")) {
    return wrap(NodeKind.Metaclass, ctx.decodeType());
  }
  if (cursor.nextIf("n")) {
    return wrap(NodeKind.NominalTypeDescriptor, ctx.decodeType());
  }

  const metadata = Node.create(NodeKind.TypeMetadata);
  metadata.addChildren(decodeDirectness(ctx), ctx.decodeType());
  return metadata;
}

function decodeValueWitness(ctx: DecoderContext): Node {
  const name = ctx.cursor.lookup(VALUE_WITNESS_KINDS, 2, "value witness kind");
  return wrap(NodeKind.ValueWitnessKind, ctx.decodeType(), name);
}

// ─── Witness tables and offsets ───────────────────────────────────────

function decodeWitnessRecord(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("V")) {
    return wrap(NodeKind.ValueWitnessTable, ctx.decodeType());
  }
  if (cursor.nextIf("o")) {
    return wrap(NodeKind.WitnessTableOffset, ctx.decodeEntity());
  }
  if (cursor.nextIf("v")) {
    const offset = Node.create(NodeKind.FieldOffset);
    const directness = decodeDirectness(ctx);
    offset.addChildren(directness, ctx.decodeEntity());
    return offset;
  }

  const kind = cursor.lookup(CONFORMANCE_RECORDS, 1, "witness record");
  return wrap(kind, decodeProtocolConformance(ctx));
}

/** `type protocol-name module`: the type conforms to the protocol in the module. */
export function decodeProtocolConformance(ctx: DecoderContext): Node {
  const conformance = Node.create(NodeKind.ProtocolConformance);
  conformance.addChild(ctx.decodeType());
  conformance.addChild(ctx.decodeProtocolName());
  conformance.addChild(decodeModuleRef(ctx));
  return conformance;
}

function decodeDirectness(ctx: DecoderContext): Node {
  return Node.create(NodeKind.Directness, ctx.cursor.lookup(DIRECTNESS, 1, "directness"));
}

// ─── Thunks ───────────────────────────────────────────────────────────

function decodeThunk(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("o")) {
    return wrap(NodeKind.ObjCAttribute, ctx.decodeGlobal());
  }
  if (cursor.nextIf("b")) {
    return wrap(NodeKind.BridgeToBlockFunction, ctx.decodeType());
  }
  if (cursor.nextIf("W")) {
    const witness = Node.create(NodeKind.ProtocolWitness);
    const conformance = decodeProtocolConformance(ctx);
    witness.addChildren(conformance, ctx.decodeEntity());
    return witness;
  }
  return cursor.unexpected("a thunk kind");
}

function wrap(kind: NodeKind, child: Node, text?: string): Node {
  const node = Node.create(kind, text);
  node.addChild(child);
  return node;
}

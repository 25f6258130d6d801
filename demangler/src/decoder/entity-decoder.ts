/**
 * Contexts, entities and declaration names.
 * Extracted from decoder.ts: all productions operate on a DecoderContext.
 */

import { isDigit } from "../cursor/cursor.ts";
import {
  KNOWN_MODULES,
  KNOWN_TYPES,
  NOMINAL_TYPE_KINDS,
  OPERATOR_CHARS,
  OPERATOR_FIXITIES,
  SWIFT_MODULE,
  type KnownType,
} from "../cursor/discriminators.ts";
import { DecodeErrorKind } from "../errors/index.ts";
import { isNominalKind, NodeKind } from "../tree/kinds.ts";
import { Node } from "../tree/node.ts";
import type { DecoderContext } from "./decoder.ts";

/** Kinds a back-reference may name where a declaration context is expected. */
const CONTEXT_SUBSTITUTIONS: ReadonlySet<NodeKind> = new Set([
  NodeKind.Module,
  NodeKind.Class,
  NodeKind.Structure,
  NodeKind.Enum,
  NodeKind.Protocol,
]);

type FunctionEntityKind =
  | NodeKind.Allocator
  | NodeKind.Constructor
  | NodeKind.Deallocator
  | NodeKind.Destructor;

const SPECIAL_FUNCTIONS: ReadonlyMap<string, { kind: FunctionEntityKind; typed: boolean }> =
  new Map([
    ["C", { kind: NodeKind.Allocator, typed: true }],
    ["c", { kind: NodeKind.Constructor, typed: true }],
    ["D", { kind: NodeKind.Deallocator, typed: false }],
    ["d", { kind: NodeKind.Destructor, typed: false }],
  ]);

type AccessorKind = NodeKind.Getter | NodeKind.Setter | NodeKind.Addressor;

const ACCESSORS: ReadonlyMap<string, AccessorKind> = new Map([
  ["g", NodeKind.Getter],
  ["s", NodeKind.Setter],
  ["a", NodeKind.Addressor],
]);

// ─── Entities ─────────────────────────────────────────────────────────

export function decodeEntity(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("F")) return decodeFunctionEntity(ctx);
  if (cursor.nextIf("v")) return decodeVariableEntity(ctx);
  return decodeNominalType(ctx);
}

/** After `F`: a context, then a special member, an accessor or a named function. */
function decodeFunctionEntity(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const context = declContext(ctx.decodeContext());

  const special = SPECIAL_FUNCTIONS.get(cursor.peek());
  if (special !== undefined) {
    cursor.next();
    const node = Node.create(special.kind);
    node.addChild(context);
    if (special.typed) {
      node.addChild(ctx.decodeType());
    }
    return node;
  }

  const accessor = ACCESSORS.get(cursor.peek());
  if (accessor !== undefined) {
    cursor.next();
    return declaration(ctx, accessor, context);
  }

  return declaration(ctx, NodeKind.Declaration, context);
}

function decodeVariableEntity(ctx: DecoderContext): Node {
  const context = declContext(ctx.decodeContext());
  return declaration(ctx, NodeKind.Declaration, context);
}

function declaration(
  ctx: DecoderContext,
  kind: NodeKind.Declaration | AccessorKind,
  context: Node
): Node {
  const node = Node.create(kind);
  node.addChild(context);
  node.addChild(decodeDeclName(ctx));
  node.addChild(ctx.decodeType());
  return node;
}

function declContext(context: Node): Node {
  const node = Node.create(NodeKind.DeclContext);
  node.addChild(context);
  return node;
}

// ─── Contexts ─────────────────────────────────────────────────────────

export function decodeContext(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const ch = cursor.peek();

  if (ch === "S") {
    const offset = cursor.pos;
    const node = decodeSubstitution(ctx);
    if (!CONTEXT_SUBSTITUTIONS.has(node.kind)) {
      cursor.pos = offset;
      cursor.fail(DecodeErrorKind.Structural, `${node.kind} cannot be a declaration context`);
    }
    return node;
  }
  if (NOMINAL_TYPE_KINDS.has(ch)) return decodeNominalType(ctx);
  if (cursor.nextIf("P")) return ctx.decodeProtocolName();
  if (cursor.nextIf("F")) return decodeFunctionEntity(ctx);
  if (isDigit(ch)) return decodeModule(ctx);
  return cursor.unexpected("a declaration context");
}

function decodeModule(ctx: DecoderContext): Node {
  const module = Node.create(NodeKind.Module, ctx.cursor.readLengthPrefixed());
  ctx.substitutions.add(module);
  return module;
}

/** A module named in full, or by a back-reference or abbreviation that names one. */
export function decodeModuleRef(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  if (cursor.peek() !== "S") return decodeModule(ctx);

  const offset = cursor.pos;
  const node = decodeSubstitution(ctx);
  if (node.kind !== NodeKind.Module) {
    cursor.pos = offset;
    cursor.fail(DecodeErrorKind.Structural, `expected a module but ${node.kind} was referenced`);
  }
  return node;
}

// ─── Nominal types and protocols ──────────────────────────────────────

/** `C`, `V` or `O` followed by a context and a name, or a back-reference to one. */
export function decodeNominalType(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.peek() === "S") {
    const offset = cursor.pos;
    const node = decodeSubstitution(ctx);
    if (!isNominalKind(node.kind)) {
      cursor.pos = offset;
      cursor.fail(DecodeErrorKind.Structural, `expected a nominal type but ${node.kind} was referenced`);
    }
    return node;
  }

  const kind = cursor.lookup(NOMINAL_TYPE_KINDS, 1, "nominal type kind");
  const nominal = Node.create(kind);
  nominal.addChild(ctx.decodeContext());
  nominal.addChild(decodeDeclName(ctx));
  ctx.substitutions.add(nominal);
  return nominal;
}

/** A protocol back-reference, or a module followed by the protocol's name. */
export function decodeProtocolName(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  let module: Node;
  if (cursor.peek() === "S") {
    const offset = cursor.pos;
    const node = decodeSubstitution(ctx);
    if (node.kind === NodeKind.Protocol) return node;
    if (node.kind !== NodeKind.Module) {
      cursor.pos = offset;
      cursor.fail(DecodeErrorKind.Structural, `expected a protocol but ${node.kind} was referenced`);
    }
    module = node;
  } else {
    module = decodeModule(ctx);
  }

  const protocol = Node.create(NodeKind.Protocol);
  protocol.addChildren(module, decodeIdentifier(ctx));
  ctx.substitutions.add(protocol);
  return protocol;
}

// ─── Substitutions ────────────────────────────────────────────────────

/** `S` followed by an index into the table or a one-letter abbreviation. */
export function decodeSubstitution(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const offset = cursor.pos;
  cursor.expect("S");

  const ch = cursor.peek();
  if (ch === "_" || isDigit(ch)) {
    return ctx.substitutions.resolve(cursor.readIndex(), offset);
  }

  const module = KNOWN_MODULES.get(ch);
  if (module !== undefined) {
    cursor.next();
    return Node.create(NodeKind.Module, module);
  }

  const known = KNOWN_TYPES.get(ch);
  if (known !== undefined) {
    cursor.next();
    return knownTypeNode(known);
  }

  return cursor.unexpected("a substitution");
}

function knownTypeNode(known: KnownType): Node {
  const node = Node.create(known.kind);
  node.addChildren(
    Node.create(NodeKind.Module, SWIFT_MODULE),
    Node.create(NodeKind.Identifier, known.name)
  );
  return node;
}

// ─── Names ────────────────────────────────────────────────────────────

export function decodeIdentifier(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  if (!isDigit(cursor.peek())) {
    cursor.unexpected("an identifier");
  }
  return Node.create(NodeKind.Identifier, cursor.readLengthPrefixed());
}

/** An identifier, an operator (`o` fixity letters) or a local name (`L` index identifier). */
export function decodeDeclName(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("o")) {
    const kind = cursor.lookup(OPERATOR_FIXITIES, 1, "operator fixity");
    return Node.create(kind, decodeOperatorSpelling(ctx));
  }

  if (cursor.nextIf("L")) {
    const local = Node.create(NodeKind.LocalEntity);
    const discriminator = Node.create(NodeKind.Number, String(cursor.readIndex()));
    local.addChildren(discriminator, decodeIdentifier(ctx));
    return local;
  }

  return decodeIdentifier(ctx);
}

function decodeOperatorSpelling(ctx: DecoderContext): string {
  const { cursor } = ctx;
  const start = cursor.pos;
  const encoded = cursor.readLengthPrefixed();
  let spelling = "";
  for (const letter of encoded) {
    const ch = OPERATOR_CHARS.get(letter);
    if (ch === undefined) {
      cursor.pos = start;
      return cursor.fail(
        DecodeErrorKind.UnknownDiscriminator,
        `unknown operator character '${letter}'`
      );
    }
    spelling += ch;
  }
  return spelling;
}

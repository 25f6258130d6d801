/**
 * Type productions: nominal and builtin types, functions, tuples, generics
 * and archetypes.
 * Extracted from decoder.ts: all productions operate on a DecoderContext.
 */

import { isDigit } from "../cursor/cursor.ts";
import { BUILTIN_PREFIX, BUILTIN_SIMPLE_TYPES } from "../cursor/discriminators.ts";
import { DecodeErrorKind } from "../errors/index.ts";
import { boundGenericKindFor, isNominalKind, NodeKind, type TypeSlotKind } from "../tree/kinds.ts";
import { Node } from "../tree/node.ts";
import type { DecoderContext } from "./decoder.ts";
import { decodeIdentifier, decodeNominalType } from "./entity-decoder.ts";

type FunctionShapeKind = NodeKind.FunctionType | NodeKind.UncurriedFunctionType | NodeKind.ObjCBlock;

type WrapperTypeKind = NodeKind.MetaType | NodeKind.InOut | NodeKind.Weak | NodeKind.Unowned;

const FUNCTION_SHAPES: ReadonlyMap<string, FunctionShapeKind> = new Map([
  ["F", NodeKind.FunctionType],
  ["f", NodeKind.UncurriedFunctionType],
  ["b", NodeKind.ObjCBlock],
]);

const REFERENCE_OWNERSHIP: ReadonlyMap<string, WrapperTypeKind> = new Map([
  ["o", NodeKind.Unowned],
  ["w", NodeKind.Weak],
]);

const LETTER_A = 65;
const LETTER_COUNT = 26;

/** Decodes one type and places it in a `slot` node. */
export function decodeType(ctx: DecoderContext, slot: TypeSlotKind): Node {
  const node = Node.create(slot);
  node.addChild(decodeBareType(ctx));
  return node;
}

function decodeBareType(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const ch = cursor.peek();

  const shape = FUNCTION_SHAPES.get(ch);
  if (shape !== undefined) {
    cursor.next();
    return decodeFunctionShape(ctx, shape);
  }

  switch (ch) {
    case "A":
      cursor.next();
      return decodeArrayType(ctx);
    case "B":
      cursor.next();
      return Node.create(NodeKind.BuiltinTypeName, BUILTIN_PREFIX + decodeBuiltinName(ctx));
    case "E":
      cursor.next();
      return Node.create(NodeKind.ErrorType);
    case "G":
      cursor.next();
      return decodeBoundGeneric(ctx);
    case "M":
      cursor.next();
      return wrapType(ctx, NodeKind.MetaType);
    case "P":
      cursor.next();
      return decodeProtocolList(ctx);
    case "Q":
      cursor.next();
      return decodeArchetype(ctx);
    case "R":
      cursor.next();
      return wrapType(ctx, NodeKind.InOut);
    case "T":
      cursor.next();
      return decodeTuple(ctx, NodeKind.NonVariadicTuple);
    case "t":
      cursor.next();
      return decodeTuple(ctx, NodeKind.VariadicTuple);
    case "U":
      cursor.next();
      return decodeGenericType(ctx);
    case "X":
      cursor.next();
      return wrapType(ctx, cursor.lookup(REFERENCE_OWNERSHIP, 1, "reference ownership"));
    case "C":
    case "V":
    case "O":
      return decodeNominalType(ctx);
    case "S":
      return decodeTypeSubstitution(ctx);
    default:
      return cursor.unexpected("a type");
  }
}

function wrapType(ctx: DecoderContext, kind: WrapperTypeKind): Node {
  const node = Node.create(kind);
  node.addChild(ctx.decodeType());
  return node;
}

/** A back-reference in type position names a nominal type or an associated type. */
function decodeTypeSubstitution(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const offset = cursor.pos;
  const node = decodeNominalTypeOrAssociated(ctx);
  if (node === null) {
    cursor.pos = offset;
    return cursor.fail(DecodeErrorKind.Structural, "back-reference does not name a type");
  }
  return node;
}

function decodeNominalTypeOrAssociated(ctx: DecoderContext): Node | null {
  const { cursor } = ctx;
  const start = cursor.pos;
  cursor.expect("S");
  if (cursor.peek() === "_" || isDigit(cursor.peek())) {
    const node = ctx.substitutions.resolve(cursor.readIndex(), start);
    const isType = isNominalKind(node.kind) || node.kind === NodeKind.AssociatedTypeRef;
    return isType ? node : null;
  }
  cursor.pos = start;
  return decodeNominalType(ctx);
}

// ─── Functions ────────────────────────────────────────────────────────

/** The argument tuple is always the first child and the return type the second. */
function decodeFunctionShape(ctx: DecoderContext, kind: FunctionShapeKind): Node {
  const fn = Node.create(kind);
  const args = ctx.decodeType(NodeKind.ArgumentTuple);
  const result = ctx.decodeType(NodeKind.ReturnType);
  fn.addChildren(args, result);
  return fn;
}

// ─── Tuples and arrays ────────────────────────────────────────────────

function decodeTuple(
  ctx: DecoderContext,
  kind: NodeKind.NonVariadicTuple | NodeKind.VariadicTuple
): Node {
  const { cursor } = ctx;
  const tuple = Node.create(kind);

  while (!cursor.nextIf("_")) {
    const element = Node.create(NodeKind.TupleElement);
    if (isDigit(cursor.peek())) {
      element.addChild(Node.create(NodeKind.TupleElementName, cursor.readLengthPrefixed()));
    }
    element.addChild(ctx.decodeType(NodeKind.TupleElementType));
    tuple.addChild(element);
  }

  return tuple;
}

function decodeArrayType(ctx: DecoderContext): Node {
  const array = Node.create(NodeKind.ArrayType);
  const size = ctx.cursor.readNumberNode();
  array.addChildren(size, ctx.decodeType());
  return array;
}

// ─── Builtins ─────────────────────────────────────────────────────────

/** The part of a builtin type name after `Builtin.`, e.g. `Int32` or `Vec4xInt8`. */
function decodeBuiltinName(ctx: DecoderContext): string {
  const { cursor } = ctx;

  if (cursor.nextIf("f")) return `Float${readBitWidth(ctx)}`;
  if (cursor.nextIf("i")) return `Int${readBitWidth(ctx)}`;
  if (cursor.nextIf("v")) {
    const count = cursor.readNatural();
    cursor.expect("B");
    return `Vec${count}x${ctx.descend(() => decodeBuiltinName(ctx))}`;
  }
  return cursor.lookup(BUILTIN_SIMPLE_TYPES, 1, "builtin type");
}

function readBitWidth(ctx: DecoderContext): number {
  const width = ctx.cursor.readNatural();
  ctx.cursor.expect("_");
  return width;
}

// ─── Generics ─────────────────────────────────────────────────────────

/** `G` base-type argument-type+ `_`, bound on the base's nominal kind. */
function decodeBoundGeneric(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const start = cursor.pos;
  const base = ctx.decodeType();
  const nominal = base.getFirstChild();
  if (!isNominalKind(nominal.kind)) {
    cursor.pos = start;
    return cursor.fail(
      DecodeErrorKind.Structural,
      `${nominal.kind} cannot be instantiated with generic arguments`
    );
  }

  const args = Node.create(NodeKind.TypeList);
  while (!cursor.nextIf("_")) {
    args.addChild(ctx.decodeType());
  }
  if (!args.hasChildren()) {
    return cursor.fail(DecodeErrorKind.Structural, "generic instantiation has no arguments");
  }

  const bound = Node.create(boundGenericKindFor(nominal.kind));
  bound.addChildren(base, args);
  return bound;
}

/** `P` protocol-name* `_`. */
function decodeProtocolList(ctx: DecoderContext): Node {
  const list = Node.create(NodeKind.ProtocolList);
  list.addChild(decodeProtocolTypeList(ctx));
  return list;
}

function decodeProtocolTypeList(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const types = Node.create(NodeKind.TypeList);
  while (!cursor.nextIf("_")) {
    const type = Node.create(NodeKind.Type);
    type.addChild(ctx.decodeProtocolName());
    types.addChild(type);
  }
  return types;
}

/**
 * `U` then one `Q` protocol-name* `_` per generic parameter, a closing `_`,
 * then the type the parameters are bound over.
 */
function decodeGenericType(ctx: DecoderContext): Node {
  const { cursor } = ctx;
  const archetypes = Node.create(NodeKind.ArchetypeList);

  let index = 0;
  while (!cursor.nextIf("_")) {
    cursor.expect("Q");
    const archetype = Node.create(NodeKind.ArchetypeRef, archetypeName(index, 0));
    index++;
    const protocols = decodeProtocolTypeList(ctx);
    if (!protocols.hasChildren()) {
      archetypes.addChild(archetype);
      continue;
    }
    const constraint = Node.create(NodeKind.ProtocolList);
    constraint.addChild(protocols);
    const constrained = Node.create(NodeKind.ArchetypeAndProtocol);
    constrained.addChildren(archetype, constraint);
    archetypes.addChild(constrained);
  }

  const generic = Node.create(NodeKind.GenericType);
  generic.addChildren(archetypes, ctx.decodeType());
  return generic;
}

/** After `Q`: a plain, deep, qualified, associated or `Self` archetype. */
function decodeArchetype(ctx: DecoderContext): Node {
  const { cursor } = ctx;

  if (cursor.nextIf("d")) {
    const depth = cursor.readIndex() + 1;
    return Node.create(NodeKind.ArchetypeRef, archetypeName(cursor.readIndex(), depth));
  }

  if (cursor.nextIf("q")) {
    const qualified = Node.create(NodeKind.QualifiedArchetype);
    const index = Node.create(NodeKind.Number, String(cursor.readIndex()));
    const context = Node.create(NodeKind.DeclContext);
    context.addChild(ctx.decodeContext());
    qualified.addChildren(index, context);
    return qualified;
  }

  if (cursor.nextIf("a")) {
    const associated = Node.create(NodeKind.AssociatedTypeRef);
    const base = ctx.decodeType();
    associated.addChildren(base, decodeIdentifier(ctx));
    ctx.substitutions.add(associated);
    return associated;
  }

  if (cursor.nextIf("P")) {
    const self = Node.create(NodeKind.SelfTypeRef);
    self.addChild(ctx.decodeProtocolName());
    return self;
  }

  return Node.create(NodeKind.ArchetypeRef, archetypeName(cursor.readIndex(), 0));
}

/** `A`…`Z`, then `A1`…`Z1` and so on; a nested depth appends `_depth`. */
export function archetypeName(index: number, depth: number): string {
  const letter = String.fromCharCode(LETTER_A + (index % LETTER_COUNT));
  const round = Math.floor(index / LETTER_COUNT);
  const name = round > 0 ? `${letter}${round}` : letter;
  return depth > 0 ? `${name}_${depth}` : name;
}

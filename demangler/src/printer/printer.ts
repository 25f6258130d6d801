/**
 * Renders a decoded tree as a readable declaration.
 *
 * Rendering is total: every kind has a rule, a missing child renders as
 * empty text, and the tree is only read.
 */

import { type DemangleOptions, resolveOptions } from "../options.ts";
import { isFunctionLikeKind, NodeKind } from "../tree/kinds.ts";
import type { Node } from "../tree/node.ts";
import { findSugar } from "./sugar.ts";

export const FAILURE_PLACEHOLDER = "<<invalid>>";
export const UNKNOWN_PLACEHOLDER = "<unknown>";

export function renderTree(tree: Node, options?: Partial<DemangleOptions>): string {
  return printNode(tree, resolveOptions(options));
}

function printNode(node: Node, opts: DemangleOptions): string {
  switch (node.kind) {
    // Leaves
    case NodeKind.Failure:
      return node.text || FAILURE_PLACEHOLDER;
    case NodeKind.Unknown:
      return node.text ?? UNKNOWN_PLACEHOLDER;
    case NodeKind.Identifier:
    case NodeKind.Number:
    case NodeKind.Directness:
    case NodeKind.BuiltinTypeName:
    case NodeKind.Module:
    case NodeKind.ArchetypeRef:
    case NodeKind.TupleElementName:
      return node.text ?? "";
    case NodeKind.PrefixOperator:
      return `${node.text ?? ""} prefix`;
    case NodeKind.InfixOperator:
      return `${node.text ?? ""} infix`;
    case NodeKind.PostfixOperator:
      return `${node.text ?? ""} postfix`;
    case NodeKind.ErrorType:
      return "<<error type>>";

    // Structural containers
    case NodeKind.DeclContext:
    case NodeKind.Type:
    case NodeKind.ReturnType:
    case NodeKind.TupleElementType:
      return printChild(node, 0, opts);
    case NodeKind.Path:
    case NodeKind.Class:
    case NodeKind.Structure:
    case NodeKind.Enum:
    case NodeKind.Protocol:
      return printJoined(node, ".", opts);
    case NodeKind.TypeList:
      return printJoined(node, ", ", opts);
    case NodeKind.ArgumentTuple:
      return printArguments(node, opts);
    case NodeKind.NonVariadicTuple:
    case NodeKind.VariadicTuple:
      return printTuple(node, opts);
    case NodeKind.TupleElement:
      return printTupleElement(node, opts);

    // Nominal instantiations
    case NodeKind.BoundGenericClass:
    case NodeKind.BoundGenericStructure:
    case NodeKind.BoundGenericEnum:
      return printBoundGeneric(node, opts);
    case NodeKind.ProtocolList:
      return printProtocolList(node, opts);

    // Entities
    case NodeKind.Declaration:
      return printDeclaration(node, opts, true);
    case NodeKind.LocalEntity:
      return `(${printChild(node, 1, opts)} #${printChild(node, 0, opts)})`;
    case NodeKind.Getter:
      return printAccessor(node, "getter", opts);
    case NodeKind.Setter:
      return printAccessor(node, "setter", opts);
    case NodeKind.Addressor:
      return printAccessor(node, "addressor", opts);
    case NodeKind.Allocator:
      return printSpecialMember(node, "__allocating_init", opts);
    case NodeKind.Constructor:
      return printSpecialMember(node, "init", opts);
    case NodeKind.Deallocator:
      return printSpecialMember(node, "__deallocating_deinit", opts);
    case NodeKind.Destructor:
      return printSpecialMember(node, "deinit", opts);

    // Function shapes
    case NodeKind.FunctionType:
      return `${printArgumentsAt(node, opts)} -> ${printChild(node, 1, opts)}`;
    case NodeKind.UncurriedFunctionType:
      return `${printArgumentsAt(node, opts)}${printChild(node, 1, opts)}`;
    case NodeKind.ObjCBlock:
      return `@objc_block ${printArgumentsAt(node, opts)} -> ${printChild(node, 1, opts)}`;

    // Type modifiers
    case NodeKind.ArrayType:
      return `${printChild(node, 1, opts)}[${printChild(node, 0, opts)}]`;
    case NodeKind.InOut:
      return `inout ${printChild(node, 0, opts)}`;
    case NodeKind.MetaType:
      return `${printChild(node, 0, opts)}.Type`;
    case NodeKind.Weak:
      return `[weak] ${printChild(node, 0, opts)}`;
    case NodeKind.Unowned:
      return `[unowned] ${printChild(node, 0, opts)}`;

    // Generics
    case NodeKind.GenericType:
      return `${printChild(node, 0, opts)} ${printChild(node, 1, opts)}`;
    case NodeKind.ArchetypeList:
      return `<${printJoined(node, ", ", opts)}>`;
    case NodeKind.ArchetypeAndProtocol:
      return `${printChild(node, 0, opts)} : ${printChild(node, 1, opts)}`;
    case NodeKind.QualifiedArchetype:
      return `(archetype ${printChild(node, 0, opts)} of ${printChild(node, 1, opts)})`;
    case NodeKind.AssociatedTypeRef:
      return `${printChild(node, 0, opts)}.${printChild(node, 1, opts)}`;
    case NodeKind.SelfTypeRef:
      return `${printChild(node, 0, opts)}.Self`;

    // Runtime metadata records
    case NodeKind.TypeMetadata:
      return `${printChild(node, 0, opts)} type metadata for ${printChild(node, 1, opts)}`;
    case NodeKind.GenericTypeMetadataPattern:
      return `${printChild(node, 0, opts)} generic type metadata pattern for ${printChild(node, 1, opts)}`;
    case NodeKind.Metaclass:
      return `metaclass for ${printChild(node, 0, opts)}`;
    case NodeKind.NominalTypeDescriptor:
      return `nominal type descriptor for ${printChild(node, 0, opts)}`;
    case NodeKind.ValueWitnessKind:
      return `${node.text ?? ""} value witness for ${printChild(node, 0, opts)}`;
    case NodeKind.ValueWitnessTable:
      return `value witness table for ${printChild(node, 0, opts)}`;
    case NodeKind.WitnessTableOffset:
      return `witness table offset for ${printChild(node, 0, opts)}`;
    case NodeKind.FieldOffset:
      return printFieldOffset(node, opts);
    case NodeKind.ProtocolWitnessTable:
      return `protocol witness table for ${printChild(node, 0, opts)}`;
    case NodeKind.LazyProtocolWitnessTableAccessor:
      return `lazy protocol witness table accessor for ${printChild(node, 0, opts)}`;
    case NodeKind.LazyProtocolWitnessTableTemplate:
      return `lazy protocol witness table template for ${printChild(node, 0, opts)}`;
    case NodeKind.DependentProtocolWitnessTableGenerator:
      return `dependent protocol witness table generator for ${printChild(node, 0, opts)}`;
    case NodeKind.DependentProtocolWitnessTableTemplate:
      return `dependent protocol witness table template for ${printChild(node, 0, opts)}`;
    case NodeKind.ProtocolConformance:
      return `${printChild(node, 0, opts)} : ${printChild(node, 1, opts)} in ${printChild(node, 2, opts)}`;
    case NodeKind.ProtocolWitness:
      return `protocol witness for ${printChild(node, 1, opts)} in conformance ${printChild(node, 0, opts)}`;

    // Foreign interop
    case NodeKind.ObjCAttribute:
      return `@objc ${printChild(node, 0, opts)}`;
    case NodeKind.BridgeToBlockFunction:
      return `bridge-to-block function for ${printChild(node, 0, opts)}`;
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────

function printChild(node: Node, index: number, opts: DemangleOptions): string {
  const child = node.children[index];
  return child === undefined ? "" : printNode(child, opts);
}

function printJoined(node: Node, separator: string, opts: DemangleOptions): string {
  return node.children.map((child) => printNode(child, opts)).join(separator);
}

/** A tuple already carries its parentheses; any other argument type gets them. */
function printArguments(args: Node, opts: DemangleOptions): string {
  const inner = args.children[0];
  if (inner?.kind === NodeKind.NonVariadicTuple || inner?.kind === NodeKind.VariadicTuple) {
    return printNode(inner, opts);
  }
  return `(${printChild(args, 0, opts)})`;
}

function printArgumentsAt(fn: Node, opts: DemangleOptions): string {
  const args = fn.children[0];
  return args === undefined ? "()" : printArguments(args, opts);
}

function printTuple(tuple: Node, opts: DemangleOptions): string {
  const elements = tuple.children.map((element) => printNode(element, opts));
  const body = elements.join(", ");
  if (tuple.kind === NodeKind.VariadicTuple && elements.length > 0) {
    return `(${body}...)`;
  }
  return `(${body})`;
}

function printTupleElement(element: Node, opts: DemangleOptions): string {
  const name = element.children.find((child) => child.kind === NodeKind.TupleElementName);
  const type = element.children.find((child) => child.kind !== NodeKind.TupleElementName);
  const typeText = type === undefined ? "" : printNode(type, opts);
  return name === undefined ? typeText : `${printNode(name, opts)} : ${typeText}`;
}

function printBoundGeneric(node: Node, opts: DemangleOptions): string {
  const sugar = opts.synthesizeSugarOnTypes ? findSugar(node) : null;
  const args = node.children[1]?.children ?? [];

  switch (sugar) {
    case "array":
      return `[${printTypeArgument(args[0], opts)}]`;
    case "dictionary":
      return `[${printTypeArgument(args[0], opts)} : ${printTypeArgument(args[1], opts)}]`;
    case "optional":
      return `${printWrappedArgument(args[0], opts)}?`;
    case "implicitlyUnwrappedOptional":
      return `${printWrappedArgument(args[0], opts)}!`;
    case null:
      return `${printChild(node, 0, opts)}<${printChild(node, 1, opts)}>`;
  }
}

function printTypeArgument(arg: Node | undefined, opts: DemangleOptions): string {
  return arg === undefined ? "" : printNode(arg, opts);
}

/** Postfix sugar binds tighter than `->`, so function types need parentheses. */
function printWrappedArgument(arg: Node | undefined, opts: DemangleOptions): string {
  const text = printTypeArgument(arg, opts);
  const inner = arg?.children[0];
  if (inner !== undefined && (isFunctionLikeKind(inner.kind) || inner.kind === NodeKind.ObjCBlock)) {
    return `(${text})`;
  }
  return text;
}

function printProtocolList(node: Node, opts: DemangleOptions): string {
  const protocols = node.children[0];
  if (protocols === undefined || protocols.childCount === 0) return "protocol<>";
  if (protocols.childCount === 1) return printNode(protocols, opts);
  return `protocol<${printNode(protocols, opts)}>`;
}

// ─── Entities ─────────────────────────────────────────────────────────

/** ` <type>` for signatures, ` : <type>` for values, nothing when absent. */
function printEntityType(type: Node | undefined, opts: DemangleOptions): string {
  if (type === undefined) return "";
  const inner = type.children[0];
  const text = printNode(type, opts);
  return inner !== undefined && isFunctionLikeKind(inner.kind) ? ` ${text}` : ` : ${text}`;
}

function printDeclaration(node: Node, opts: DemangleOptions, withType: boolean): string {
  const name = `${printChild(node, 0, opts)}.${printChild(node, 1, opts)}`;
  return withType ? name + printEntityType(node.children[2], opts) : name;
}

function printAccessor(node: Node, accessor: string, opts: DemangleOptions): string {
  const type = node.children[2];
  const suffix = type === undefined ? "" : ` : ${printNode(type, opts)}`;
  return `${printChild(node, 0, opts)}.${printChild(node, 1, opts)}.${accessor}${suffix}`;
}

function printSpecialMember(node: Node, member: string, opts: DemangleOptions): string {
  return `${printChild(node, 0, opts)}.${member}${printEntityType(node.children[1], opts)}`;
}

function printFieldOffset(node: Node, opts: DemangleOptions): string {
  const entity = node.children[1];
  let target = "";
  if (entity !== undefined) {
    target =
      entity.kind === NodeKind.Declaration
        ? printDeclaration(entity, opts, opts.displayTypeOfIVarFieldOffset)
        : printNode(entity, opts);
  }
  return `${printChild(node, 0, opts)} field offset for ${target}`;
}

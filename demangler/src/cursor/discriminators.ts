/**
 * Closed discriminator tables for the linkage-name grammar.
 *
 * @module discriminators
 */

import { type NominalKind, NodeKind, type OperatorKind } from "../tree/kinds.ts";

/** Marker that starts every linkage name produced by the compiler. */
export const MANGLING_PREFIX = "_T";

export const SWIFT_MODULE = "Swift";

// ─── Substitution abbreviations ──────────────────────────────────────────

/** Modules abbreviated as `S` + letter. */
export const KNOWN_MODULES: ReadonlyMap<string, string> = new Map([
  ["s", SWIFT_MODULE],
  ["o", "__ObjC"],
  ["C", "__C"],
]);

export interface KnownType {
  kind: NominalKind;
  name: string;
}

/** Standard library types abbreviated as `S` + letter, all in module Swift. */
export const KNOWN_TYPES: ReadonlyMap<string, KnownType> = new Map([
  ["a", { kind: NodeKind.Structure, name: "Array" }],
  ["b", { kind: NodeKind.Structure, name: "Bool" }],
  ["c", { kind: NodeKind.Structure, name: "UnicodeScalar" }],
  ["d", { kind: NodeKind.Structure, name: "Double" }],
  ["f", { kind: NodeKind.Structure, name: "Float" }],
  ["i", { kind: NodeKind.Structure, name: "Int" }],
  ["u", { kind: NodeKind.Structure, name: "UInt" }],
  ["S", { kind: NodeKind.Structure, name: "String" }],
  ["P", { kind: NodeKind.Structure, name: "UnsafePointer" }],
  ["p", { kind: NodeKind.Structure, name: "UnsafeMutablePointer" }],
  ["R", { kind: NodeKind.Structure, name: "UnsafeBufferPointer" }],
  ["r", { kind: NodeKind.Structure, name: "UnsafeMutableBufferPointer" }],
  ["q", { kind: NodeKind.Enum, name: "Optional" }],
  ["Q", { kind: NodeKind.Enum, name: "ImplicitlyUnwrappedOptional" }],
]);

// ─── Declarations ────────────────────────────────────────────────────────

export const NOMINAL_TYPE_KINDS: ReadonlyMap<string, NominalKind> = new Map([
  ["C", NodeKind.Class],
  ["V", NodeKind.Structure],
  ["O", NodeKind.Enum],
]);

export const OPERATOR_FIXITIES: ReadonlyMap<string, OperatorKind> = new Map([
  ["p", NodeKind.PrefixOperator],
  ["P", NodeKind.PostfixOperator],
  ["i", NodeKind.InfixOperator],
]);

/** Letters standing for operator characters inside an encoded operator name. */
export const OPERATOR_CHARS: ReadonlyMap<string, string> = new Map([
  ["a", "&"],
  ["c", "@"],
  ["d", "/"],
  ["e", "="],
  ["g", ">"],
  ["l", "<"],
  ["m", "*"],
  ["n", "!"],
  ["o", "|"],
  ["p", "+"],
  ["r", "%"],
  ["s", "-"],
  ["t", "~"],
  ["x", "^"],
  ["z", "."],
]);

// ─── Runtime records ─────────────────────────────────────────────────────

export const DIRECTNESS: ReadonlyMap<string, string> = new Map([
  ["d", "direct"],
  ["i", "indirect"],
]);

export const VALUE_WITNESS_KINDS: ReadonlyMap<string, string> = new Map([
  ["al", "allocateBuffer"],
  ["ca", "assignWithCopy"],
  ["ta", "assignWithTake"],
  ["de", "deallocateBuffer"],
  ["xx", "destroy"],
  ["XX", "destroyBuffer"],
  ["CP", "initializeBufferWithCopyOfBuffer"],
  ["Cp", "initializeBufferWithCopy"],
  ["cp", "initializeWithCopy"],
  ["TK", "initializeBufferWithTakeOfBuffer"],
  ["Tk", "initializeBufferWithTake"],
  ["tk", "initializeWithTake"],
  ["pr", "projectBuffer"],
  ["ty", "typeof"],
  ["xs", "storeExtraInhabitant"],
  ["xg", "getExtraInhabitantIndex"],
  ["ug", "getEnumTag"],
  ["up", "inplaceProjectEnumData"],
]);

// ─── Builtin types ───────────────────────────────────────────────────────

export const BUILTIN_PREFIX = "Builtin.";

/** Builtin types spelled by a single letter after `B`. */
export const BUILTIN_SIMPLE_TYPES: ReadonlyMap<string, string> = new Map([
  ["o", "ObjectPointer"],
  ["O", "ObjCPointer"],
  ["p", "RawPointer"],
  ["w", "Word"],
]);

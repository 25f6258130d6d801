/**
 * The closed set of node kinds a decoded linkage name is built from.
 *
 * @module kinds
 */

/** Discriminator for every node the decoder can produce or the printer can render. */
export enum NodeKind {
  // Leaves
  Failure = "Failure",
  Unknown = "Unknown",
  Identifier = "Identifier",
  Number = "Number",
  Directness = "Directness",
  PrefixOperator = "PrefixOperator",
  InfixOperator = "InfixOperator",
  PostfixOperator = "PostfixOperator",
  BuiltinTypeName = "BuiltinTypeName",
  ErrorType = "ErrorType",

  // Structural containers
  Path = "Path",
  DeclContext = "DeclContext",
  Type = "Type",
  TypeList = "TypeList",
  ArgumentTuple = "ArgumentTuple",
  ReturnType = "ReturnType",
  NonVariadicTuple = "NonVariadicTuple",
  VariadicTuple = "VariadicTuple",
  TupleElement = "TupleElement",
  TupleElementName = "TupleElementName",
  TupleElementType = "TupleElementType",

  // Nominal declarations
  Module = "Module",
  Class = "Class",
  Structure = "Structure",
  Enum = "Enum",
  Protocol = "Protocol",
  ProtocolList = "ProtocolList",
  BoundGenericClass = "BoundGenericClass",
  BoundGenericStructure = "BoundGenericStructure",
  BoundGenericEnum = "BoundGenericEnum",

  // Entities and function shapes
  Declaration = "Declaration",
  LocalEntity = "LocalEntity",
  FunctionType = "FunctionType",
  UncurriedFunctionType = "UncurriedFunctionType",
  Constructor = "Constructor",
  Destructor = "Destructor",
  Allocator = "Allocator",
  Deallocator = "Deallocator",
  Addressor = "Addressor",
  Getter = "Getter",
  Setter = "Setter",

  // Type modifiers
  ArrayType = "ArrayType",
  InOut = "InOut",
  MetaType = "MetaType",
  Weak = "Weak",
  Unowned = "Unowned",

  // Generics
  GenericType = "GenericType",
  ArchetypeList = "ArchetypeList",
  ArchetypeRef = "ArchetypeRef",
  ArchetypeAndProtocol = "ArchetypeAndProtocol",
  QualifiedArchetype = "QualifiedArchetype",
  AssociatedTypeRef = "AssociatedTypeRef",
  SelfTypeRef = "SelfTypeRef",

  // Runtime metadata records
  TypeMetadata = "TypeMetadata",
  GenericTypeMetadataPattern = "GenericTypeMetadataPattern",
  Metaclass = "Metaclass",
  NominalTypeDescriptor = "NominalTypeDescriptor",
  FieldOffset = "FieldOffset",
  WitnessTableOffset = "WitnessTableOffset",
  ValueWitnessKind = "ValueWitnessKind",
  ValueWitnessTable = "ValueWitnessTable",
  ProtocolWitnessTable = "ProtocolWitnessTable",
  ProtocolWitness = "ProtocolWitness",
  ProtocolConformance = "ProtocolConformance",
  LazyProtocolWitnessTableAccessor = "LazyProtocolWitnessTableAccessor",
  LazyProtocolWitnessTableTemplate = "LazyProtocolWitnessTableTemplate",
  DependentProtocolWitnessTableGenerator = "DependentProtocolWitnessTableGenerator",
  DependentProtocolWitnessTableTemplate = "DependentProtocolWitnessTableTemplate",

  // Foreign interop
  ObjCAttribute = "ObjCAttribute",
  ObjCBlock = "ObjCBlock",
  BridgeToBlockFunction = "BridgeToBlockFunction",
}

export type NominalKind = NodeKind.Class | NodeKind.Structure | NodeKind.Enum;

export type BoundGenericKind =
  | NodeKind.BoundGenericClass
  | NodeKind.BoundGenericStructure
  | NodeKind.BoundGenericEnum;

export type OperatorKind = NodeKind.PrefixOperator | NodeKind.InfixOperator | NodeKind.PostfixOperator;

/** Wrapper kinds a decoded type is placed in. */
export type TypeSlotKind =
  | NodeKind.Type
  | NodeKind.ArgumentTuple
  | NodeKind.ReturnType
  | NodeKind.TupleElementType;

const NOMINAL_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.Class,
  NodeKind.Structure,
  NodeKind.Enum,
]);

const FUNCTION_LIKE_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.FunctionType,
  NodeKind.UncurriedFunctionType,
  NodeKind.GenericType,
]);

export function isNominalKind(kind: NodeKind): kind is NominalKind {
  return NOMINAL_KINDS.has(kind);
}

/** Kinds whose rendering reads as a signature rather than a value type. */
export function isFunctionLikeKind(kind: NodeKind): boolean {
  return FUNCTION_LIKE_KINDS.has(kind);
}

export function boundGenericKindFor(kind: NominalKind): BoundGenericKind {
  switch (kind) {
    case NodeKind.Class:
      return NodeKind.BoundGenericClass;
    case NodeKind.Structure:
      return NodeKind.BoundGenericStructure;
    case NodeKind.Enum:
      return NodeKind.BoundGenericEnum;
  }
}

export {
  type BoundGenericKind,
  boundGenericKindFor,
  isFunctionLikeKind,
  isNominalKind,
  type NominalKind,
  NodeKind,
  type OperatorKind,
  type TypeSlotKind,
} from "./kinds.ts";
export { Node, TreeInvariantError } from "./node.ts";
export { treesEqual, verifyTreeLinks } from "./verify.ts";

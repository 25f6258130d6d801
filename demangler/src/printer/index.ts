export { dumpTree } from "./dump.ts";
export { FAILURE_PLACEHOLDER, renderTree, UNKNOWN_PLACEHOLDER } from "./printer.ts";
export { findSugar, type Sugar } from "./sugar.ts";

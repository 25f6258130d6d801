export { DecodeError } from "./decode-error.ts";
export { type Diagnostic, DecodeErrorKind, Severity } from "./diagnostic.ts";

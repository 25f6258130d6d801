import { type Diagnostic, type DecodeErrorKind, Severity } from "./diagnostic.ts";

/**
 * Thrown by the cursor and the decoder productions when the input does not
 * match the grammar. Caught once, at the outermost decode call, and turned
 * into a Failure result plus a {@link Diagnostic}.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  readonly offset: number;

  constructor(kind: DecodeErrorKind, message: string, offset: number) {
    super(message);
    this.name = "DecodeError";
    this.kind = kind;
    this.offset = offset;
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: Severity.Error,
      kind: this.kind,
      message: this.message,
      offset: this.offset,
    };
  }
}

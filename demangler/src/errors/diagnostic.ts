export enum Severity {
  Error = "error",
}

/** Why a decode was abandoned. */
export enum DecodeErrorKind {
  /** Truncated or malformed length-prefixed literal, or input ended early. */
  Structural = "StructuralError",
  /** A discriminator that no production accepts at this position. */
  UnknownDiscriminator = "UnknownDiscriminatorError",
  /** A substitution index past the end of the table. */
  InvalidBackReference = "InvalidBackReferenceError",
  /** Nesting deeper than `maxDepth`, or back-references copying more than `maxNodes`. */
  RecursionLimitExceeded = "RecursionLimitExceeded",
}

export interface Diagnostic {
  severity: Severity;
  kind: DecodeErrorKind;
  message: string;
  /** Offset into the original input where decoding diverged. */
  offset: number;
}

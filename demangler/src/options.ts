/** Formatting and resource options shared by decoding and rendering. */
export interface DemangleOptions {
  /**
   * Render `Swift.Array`, `Swift.Dictionary`, `Swift.Optional` and
   * `Swift.ImplicitlyUnwrappedOptional` instantiations with their shorthand.
   */
  synthesizeSugarOnTypes: boolean;
  /** Include the declared type when rendering a field offset record. */
  displayTypeOfIVarFieldOffset: boolean;
  /** Nesting depth past which the decoder gives up with a Failure. */
  maxDepth: number;
  /**
   * Nodes that back-references may copy into one tree. A reference copies
   * its whole entry, and entries can nest earlier references, so the copy
   * count can grow exponentially in the input length.
   */
  maxNodes: number;
}

export const DEFAULT_MAX_DEPTH = 256;
export const DEFAULT_MAX_NODES = 100_000;

export const DEFAULT_OPTIONS: Readonly<DemangleOptions> = {
  synthesizeSugarOnTypes: false,
  displayTypeOfIVarFieldOffset: true,
  maxDepth: DEFAULT_MAX_DEPTH,
  maxNodes: DEFAULT_MAX_NODES,
};

export function resolveOptions(options?: Partial<DemangleOptions>): DemangleOptions {
  return { ...DEFAULT_OPTIONS, ...options };
}

/**
 * Test utilities for the cursor and substitution table.
 */

import { DecodeError } from "../../src/errors/index.ts";

/** Runs `read` and returns the DecodeError it throws. */
export function captureError(read: () => unknown): DecodeError {
  try {
    read();
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

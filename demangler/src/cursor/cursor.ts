/**
 * Left-to-right reader over an encoded linkage name.
 *
 * Every read either consumes input or throws a {@link DecodeError}; the
 * cursor never reads past the end of its input.
 */

import { DecodeError, DecodeErrorKind } from "../errors/index.ts";
import { Node } from "../tree/node.ts";
import { NodeKind } from "../tree/kinds.ts";

// ─── Character helpers ────────────────────────────────────────────────────

const CHAR_0 = 48; // '0'
const CHAR_9 = 57; // '9'

export function isDigit(ch: string): boolean {
  if (ch.length === 0) return false;
  const code = ch.charCodeAt(0);
  return code >= CHAR_0 && code <= CHAR_9;
}

function describeChar(ch: string): string {
  return ch === "" ? "end of input" : `'${ch}'`;
}

// ─── Cursor ───────────────────────────────────────────────────────────────

export class Cursor {
  readonly input: string;
  pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  get remaining(): number {
    return this.input.length - this.pos;
  }

  isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  /** The character `offset` places ahead, or `""` past the end. */
  peek(offset = 0): string {
    return this.input[this.pos + offset] ?? "";
  }

  /** The unread rest of the input. */
  rest(): string {
    return this.input.slice(this.pos);
  }

  /** Consumes `prefix` if the input continues with it. */
  nextIf(prefix: string): boolean {
    if (this.input.startsWith(prefix, this.pos)) {
      this.pos += prefix.length;
      return true;
    }
    return false;
  }

  next(): string {
    const ch = this.peek();
    if (ch === "") {
      this.fail(DecodeErrorKind.Structural, "unexpected end of input");
    }
    this.pos++;
    return ch;
  }

  expect(ch: string): void {
    if (!this.nextIf(ch)) {
      this.unexpected(`'${ch}'`);
    }
  }

  /** Reads one or more decimal digits. */
  readNatural(): number {
    const start = this.pos;
    while (isDigit(this.peek())) {
      this.pos++;
    }
    if (this.pos === start) {
      this.unexpected("a decimal number");
    }
    const value = Number(this.input.slice(start, this.pos));
    if (!Number.isSafeInteger(value)) {
      this.pos = start;
      this.fail(DecodeErrorKind.Structural, "decimal number is too large");
    }
    return value;
  }

  /** Reads an index: `_` is 0, `N_` is N + 1. */
  readIndex(): number {
    if (this.nextIf("_")) return 0;
    const value = this.readNatural();
    this.expect("_");
    return value + 1;
  }

  /**
   * Reads a decimal count followed by exactly that many bytes of UTF-8 text.
   * The count must end on a character boundary.
   */
  readLengthPrefixed(): string {
    const start = this.pos;
    const length = this.readNatural();
    if (length === 0) {
      this.pos = start;
      this.fail(DecodeErrorKind.Structural, "length-prefixed literal is empty");
    }

    let end = this.pos;
    let bytes = 0;
    while (bytes < length && end < this.input.length) {
      const codePoint = this.input.codePointAt(end) ?? 0;
      const ch = String.fromCodePoint(codePoint);
      bytes += Buffer.byteLength(ch, "utf8");
      end += ch.length;
    }
    if (bytes < length) {
      this.fail(
        DecodeErrorKind.Structural,
        `length-prefixed literal of ${length} bytes overruns the input (${bytes} left)`
      );
    }
    if (bytes > length) {
      this.fail(
        DecodeErrorKind.Structural,
        `length-prefixed literal of ${length} bytes ends inside a multi-byte character`
      );
    }

    const text = this.input.slice(this.pos, end);
    this.pos = end;
    return text;
  }

  /** Reads a bare decimal numeral as a standalone Number leaf. */
  readNumberNode(): Node {
    return Node.create(NodeKind.Number, String(this.readNatural()));
  }

  /** Consumes a `width`-character discriminator and maps it through `table`. */
  lookup<T>(table: ReadonlyMap<string, T>, width: 1 | 2, what: string): T {
    if (this.remaining < width) {
      this.fail(DecodeErrorKind.Structural, `unexpected end of input, expected ${what}`);
    }
    const code = this.input.slice(this.pos, this.pos + width);
    const value = table.get(code);
    if (value === undefined) {
      this.fail(DecodeErrorKind.UnknownDiscriminator, `unknown ${what} '${code}'`);
    }
    this.pos += width;
    return value;
  }

  /** Fails on the current character, which no alternative of `expected` accepts. */
  unexpected(expected: string): never {
    const ch = this.peek();
    const kind = ch === "" ? DecodeErrorKind.Structural : DecodeErrorKind.UnknownDiscriminator;
    this.fail(kind, `expected ${expected} but found ${describeChar(ch)}`);
  }

  fail(kind: DecodeErrorKind, message: string): never {
    throw new DecodeError(kind, message, this.pos);
  }
}

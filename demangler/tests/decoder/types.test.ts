/**
 * Tests for type productions
 */

import { describe, expect, test } from "vitest";
import { decodeAndDump, demangle, lines } from "./helpers.ts";

describe("Known type abbreviations", () => {
  test("should expand standard library abbreviations", () => {
    expect(demangle("_TtSi")).toBe("Swift.Int");
    expect(demangle("_TtSS")).toBe("Swift.String");
    expect(demangle("_TtSb")).toBe("Swift.Bool");
    expect(demangle("_TtSd")).toBe("Swift.Double");
    expect(demangle("_TtSp")).toBe("Swift.UnsafeMutablePointer");
  });

  test("should give abbreviated Optional the enum kind", () => {
    expect(decodeAndDump("_TtSq")).toBe(
      lines(
        "kind=Type",
        "  kind=Enum",
        '    kind=Module, text="Swift"',
        '    kind=Identifier, text="Optional"'
      )
    );
  });
});

describe("Builtin types", () => {
  test("should decode sized integers and floats", () => {
    expect(demangle("_TtBi32_")).toBe("Builtin.Int32");
    expect(demangle("_TtBf64_")).toBe("Builtin.Float64");
  });

  test("should decode vectors", () => {
    expect(demangle("_TtBv4Bi8_")).toBe("Builtin.Vec4xInt8");
  });

  test("should decode the pointer types and the word", () => {
    expect(demangle("_TtBo")).toBe("Builtin.ObjectPointer");
    expect(demangle("_TtBO")).toBe("Builtin.ObjCPointer");
    expect(demangle("_TtBp")).toBe("Builtin.RawPointer");
    expect(demangle("_TtBw")).toBe("Builtin.Word");
  });
});

describe("Functions", () => {
  test("should decode curried function types", () => {
    expect(demangle("_TtFSiFScSu")).toBe("(Swift.Int) -> (Swift.UnicodeScalar) -> Swift.UInt");
  });

  test("should decode a block type", () => {
    expect(demangle("_TtbSiSu")).toBe("@objc_block (Swift.Int) -> Swift.UInt");
  });

  test("should place arguments and result in their slots", () => {
    expect(decodeAndDump("_TtFT_Si")).toBe(
      lines(
        "kind=Type",
        "  kind=FunctionType",
        "    kind=ArgumentTuple",
        "      kind=NonVariadicTuple",
        "    kind=ReturnType",
        "      kind=Structure",
        '        kind=Module, text="Swift"',
        '        kind=Identifier, text="Int"'
      )
    );
  });
});

describe("Tuples", () => {
  test("should decode the empty tuple", () => {
    expect(demangle("_TtT_")).toBe("()");
  });

  test("should decode a variadic tuple", () => {
    expect(demangle("_TttSiSu_")).toBe("(Swift.Int, Swift.UInt...)");
  });

  test("should decode labeled elements", () => {
    expect(demangle("_TtT3fooSi3barSu_")).toBe("(foo : Swift.Int, bar : Swift.UInt)");
  });

  test("should decode a mix of labeled and unlabeled elements", () => {
    expect(demangle("_TtTSi3barSu_")).toBe("(Swift.Int, bar : Swift.UInt)");
  });
});

describe("Type modifiers", () => {
  test("should decode metatypes and inout", () => {
    expect(demangle("_TtMSi")).toBe("Swift.Int.Type");
    expect(demangle("_TtRSi")).toBe("inout Swift.Int");
  });

  test("should decode reference ownership", () => {
    expect(demangle("_TtXoSi")).toBe("[unowned] Swift.Int");
    expect(demangle("_TtXwSi")).toBe("[weak] Swift.Int");
  });

  test("should decode fixed-size arrays", () => {
    expect(demangle("_TtA10Si")).toBe("Swift.Int[10]");
  });

  test("should decode the error type", () => {
    expect(demangle("_TtE")).toBe("<<error type>>");
  });
});

describe("Protocol compositions", () => {
  test("should decode the empty composition", () => {
    expect(demangle("_TtP_")).toBe("protocol<>");
  });

  test("should print a single protocol bare", () => {
    expect(demangle("_TtP3foo3bar_")).toBe("foo.bar");
  });

  test("should decode several protocols sharing a module", () => {
    expect(demangle("_TtP3foo3barS_3bas_")).toBe("protocol<foo.bar, foo.bas>");
  });
});

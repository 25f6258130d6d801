/**
 * Tests for function, variable and accessor entities
 */

import { describe, expect, test } from "vitest";
import { decodeAndDump, demangle, lines } from "./helpers.ts";

describe("Functions", () => {
  test("should decode a module-level function", () => {
    expect(demangle("_TF1M1fFVS_3IntVS_3Str")).toBe("M.f (M.Int) -> M.Str");
  });

  test("should build the declaration tree in production order", () => {
    expect(decodeAndDump("_TF1M1fFVS_3IntVS_3Str")).toBe(
      lines(
        "kind=Declaration",
        "  kind=DeclContext",
        '    kind=Module, text="M"',
        '  kind=Identifier, text="f"',
        "  kind=Type",
        "    kind=FunctionType",
        "      kind=ArgumentTuple",
        "        kind=Structure",
        '          kind=Module, text="M"',
        '          kind=Identifier, text="Int"',
        "      kind=ReturnType",
        "        kind=Structure",
        '          kind=Module, text="M"',
        '          kind=Identifier, text="Str"'
      )
    );
  });

  test("should decode a method with an uncurried self argument", () => {
    expect(demangle("_TFC3foo3bar3basfS0_FT3zimCS_3zim_T_")).toBe(
      "foo.bar.bas (foo.bar)(zim : foo.zim) -> ()"
    );
  });

  test("should decode an operator function", () => {
    expect(demangle("_TF3foooi1pFTCS_3barVS_3bas_OS_3zim")).toBe(
      "foo.+ infix (foo.bar, foo.bas) -> foo.zim"
    );
  });

  test("should decode prefix and postfix operators", () => {
    expect(demangle("_TF3foooP1xFSiSi")).toBe("foo.^ postfix (Swift.Int) -> Swift.Int");
    expect(demangle("_TF3foooP2snFSiSi")).toBe("foo.-! postfix (Swift.Int) -> Swift.Int");
    expect(demangle("_TF3foooP1sFSiSi")).toBe("foo.- postfix (Swift.Int) -> Swift.Int");
    expect(demangle("_TF3foooP1tFSiSi")).toBe("foo.~ postfix (Swift.Int) -> Swift.Int");
  });

  test("should decode a local function", () => {
    expect(demangle("_TF3fooL_3barFT_T_")).toBe("foo.(bar #0) () -> ()");
    expect(demangle("_TF3fooL0_3barFT_T_")).toBe("foo.(bar #1) () -> ()");
  });

  test("should decode a function nested in a function", () => {
    expect(demangle("_TFF3foo3barFT_T_L_3bazFT_T_")).toBe(
      "foo.bar () -> ().(baz #0) () -> ()"
    );
  });
});

describe("Special members", () => {
  test("should decode an allocating initializer", () => {
    expect(demangle("_TFC3foo3barCfMS0_FT_S0_")).toBe(
      "foo.bar.__allocating_init (foo.bar.Type)() -> foo.bar"
    );
  });

  test("should decode an initializer", () => {
    expect(demangle("_TFC3foo3barcfMS0_FT_S0_")).toBe(
      "foo.bar.init (foo.bar.Type)() -> foo.bar"
    );
  });

  test("should decode deinitializers without a type", () => {
    expect(demangle("_TFC3foo3barD")).toBe("foo.bar.__deallocating_deinit");
    expect(demangle("_TFC3foo3bard")).toBe("foo.bar.deinit");
  });
});

describe("Variables and accessors", () => {
  test("should decode a variable", () => {
    expect(demangle("_Tv3foo3barSi")).toBe("foo.bar : Swift.Int");
  });

  test("should decode a getter in the C module", () => {
    expect(demangle("_TFSCg5greenVSC5Color")).toBe("__C.green.getter : __C.Color");
  });

  test("should decode setters and addressors", () => {
    expect(demangle("_TFC3foo3bars3bazSi")).toBe("foo.bar.baz.setter : Swift.Int");
    expect(demangle("_TFC3foo3bara3bazSi")).toBe("foo.bar.baz.addressor : Swift.Int");
  });

  test("should decode a member of a protocol", () => {
    expect(demangle("_TFP3foo3barg3bazSi")).toBe("foo.bar.baz.getter : Swift.Int");
  });

  test("should accept a name without the marker", () => {
    expect(demangle("F1M1fFVS_3IntVS_3Str")).toBe("M.f (M.Int) -> M.Str");
  });
});

/**
 * Tests for back-references between parts of one name
 */

import { describe, expect, test } from "vitest";
import { NodeKind, verifyTreeLinks } from "../../src/tree/index.ts";
import { decodeOk, demangle } from "./helpers.ts";

describe("Back-references", () => {
  test("should number entries by completion order", () => {
    // 0 = foo, 1 = foo.bar, 2 = foo.bar.baz
    expect(demangle("_TtTCC3foo3bar3bazS1_S0__")).toBe("(foo.bar.baz, foo.bar.baz, foo.bar)");
  });

  test("should register modules as they are read", () => {
    expect(demangle("_TtT3fooC3bar3bazVS_3zim_")).toBe("(foo : bar.baz, bar.zim)");
  });

  test("should register associated types", () => {
    expect(demangle("_TtTQaQ_7ElementS__")).toBe("(A.Element, A.Element)");
  });

  test("should not register known abbreviations", () => {
    // Si takes no slot, so S0_ still names foo.bar
    expect(demangle("_TtTSiC3foo3barS0__")).toBe("(Swift.Int, foo.bar, foo.bar)");
  });

  test("should copy a referenced subtree instead of sharing it", () => {
    const tree = decodeOk("_TtTC3foo3barS0__");
    const tuple = tree.getFirstChild();
    const first = tuple.getChild(0).getFirstChild().getFirstChild();
    const second = tuple.getChild(1).getFirstChild().getFirstChild();

    expect(first.kind).toBe(NodeKind.Class);
    expect(second.kind).toBe(NodeKind.Class);
    expect(first).not.toBe(second);
    expect(verifyTreeLinks(tree)).toEqual([]);
  });

  test("should keep link invariants on a name full of references", () => {
    const tree = decodeOk("_TTWC3foo3barS_8barrableSsFS1_3bazFT_T_");
    expect(verifyTreeLinks(tree)).toEqual([]);
  });
});

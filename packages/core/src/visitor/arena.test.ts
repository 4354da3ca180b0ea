/**
 * Arena tests
 */

import { describe, expect, test } from "vitest";
import { TreeError } from "../syntax/errors.js";
import { ArenaTree, type CddlNode, StructuralKeys } from "./arena.js";

function text(value: string): CddlNode {
  return { kind: "value", node: { kind: "value", type: "text", value } };
}

describe("ArenaTree", () => {
  test("interns structurally equal nodes into one slot", () => {
    const arena = new ArenaTree();
    const first = arena.intern(text("x"));
    const second = arena.intern(text("x"));
    const other = arena.intern(text("y"));

    expect(first).toBe(0);
    expect(second).toBe(0);
    expect(other).toBe(1);
    expect(arena.size).toBe(2);
  });

  test("keeps equal contents under different kinds apart", () => {
    const arena = new ArenaTree();
    const ident = { kind: "identifier" as const, ident: "x" };
    arena.intern({ kind: "identifier", node: ident });
    arena.intern({ kind: "type2", node: { kind: "typename", ident } });

    expect(arena.size).toBe(2);
    expect(arena.find("type2", { kind: "typename", ident })).toBe(1);
  });

  test("keeps integers that differ past 2^53 apart", () => {
    const arena = new ArenaTree();
    const big = arena.intern({ kind: "value", node: { kind: "value", type: "uint", value: 9007199254740993n } });
    const near = arena.intern({ kind: "value", node: { kind: "value", type: "uint", value: 9007199254740992n } });

    expect(big).not.toBe(near);
    expect(arena.find("value", { kind: "value", type: "uint", value: 9007199254740993n })).toBe(big);
  });

  test("find does not insert", () => {
    const arena = new ArenaTree();
    expect(arena.find("value", text("x").node)).toBeUndefined();
    expect(arena.size).toBe(0);
  });

  test("link records the first parent and every membership", () => {
    const arena = new ArenaTree();
    const p1 = arena.intern(text("p1"));
    const p2 = arena.intern(text("p2"));
    const child = arena.intern(text("c"));

    arena.link(p1, child);
    arena.link(p2, child);

    expect(arena.get(child)?.parent).toBe(p1);
    expect(arena.get(p1)?.children).toEqual([child]);
    expect(arena.get(p2)?.children).toEqual([child]);
  });

  test("link does not repeat a child", () => {
    const arena = new ArenaTree();
    const parent = arena.intern(text("p"));
    const child = arena.intern(text("c"));

    arena.link(parent, child);
    arena.link(parent, child);

    expect(arena.get(parent)?.children).toEqual([child]);
  });

  test("link rejects self loops and cycles", () => {
    const arena = new ArenaTree();
    const a = arena.intern(text("a"));
    const b = arena.intern(text("b"));
    const c = arena.intern(text("c"));

    arena.link(a, b);
    arena.link(b, c);

    expect(() => arena.link(a, a)).toThrow(TreeError);
    expect(() => arena.link(c, a)).toThrow("attempt to overwrite existing tree node");
    expect(arena.get(a)?.parent).toBeUndefined();
  });

  test("link rejects unknown slots", () => {
    const arena = new ArenaTree();
    const a = arena.intern(text("a"));
    expect(() => arena.link(a, 5)).toThrow(RangeError);
  });
});

describe("StructuralKeys", () => {
  test("ignores key order and undefined properties", () => {
    const keys = new StructuralKeys();
    expect(keys.keyOf({ a: 1, b: "x", c: undefined })).toBe(keys.keyOf({ b: "x", a: 1 }));
  });

  test("distinguishes numbers, bigints and strings", () => {
    const keys = new StructuralKeys();
    const forms = [1, 1n, "1", [1], { value: 1 }, null, true].map((value) => keys.keyOf(value));
    expect(new Set(forms).size).toBe(forms.length);
  });

  test("gives structurally equal subtrees the same key", () => {
    const keys = new StructuralKeys();
    const leaf = { kind: "identifier", ident: "x" };
    const first = { items: [leaf, { kind: "identifier", ident: "y" }] };
    const second = { items: [{ ident: "x", kind: "identifier" }, { kind: "identifier", ident: "y" }] };

    expect(keys.keyOf(first)).toBe(keys.keyOf(second));
    expect(keys.keyOf(first)).not.toBe(keys.keyOf({ items: [leaf] }));
  });
});

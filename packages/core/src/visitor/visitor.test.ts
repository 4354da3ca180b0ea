/**
 * Visitor protocol tests
 */

import { describe, expect, test } from "vitest";
import type { ValueMemberKeyEntry } from "../syntax/ast.js";
import { formatValue } from "../syntax/format.js";
import { parseOrThrow } from "../syntax/parser.js";
import {
  type Visitor,
  visitCddl,
  visitValueMemberKeyEntry,
  walkCddl,
  walkType2,
} from "./visitor.js";

function firstMemberEntry(source: string): ValueMemberKeyEntry {
  const found: ValueMemberKeyEntry[] = [];
  visitCddl({ visitValueMemberKeyEntry: (entry) => found.push(entry) }, parseOrThrow(source));
  const [entry] = found;
  if (!entry) throw new Error("no member entry");
  return entry;
}

describe("Visitor", () => {
  test("an empty visitor reaches every identifier in source order", () => {
    const names: string[] = [];
    const visitor: Visitor = {
      visitIdentifier(ident) {
        names.push(ident.ident);
      },
    };

    visitCddl(visitor, parseOrThrow("a = b\nc = { d: e }\nf //= g: h"));
    expect(names).toEqual(["a", "b", "c", "d", "e", "f", "g", "h"]);
  });

  test("walks member entries as occurrence, key, then type", () => {
    const order: string[] = [];
    const visitor: Visitor = {
      visitOccurrence: () => order.push("occurrence"),
      visitMemberKey: () => order.push("member_key"),
      visitType: () => order.push("type"),
    };

    visitValueMemberKeyEntry(visitor, firstMemberEntry("a = { ? k: tstr }"));
    expect(order).toEqual(["occurrence", "member_key", "type"]);
  });

  test("walks type rules as name, generic params, then type", () => {
    const order: string[] = [];
    const visitor: Visitor = {
      visitIdentifier: (ident) => order.push(`identifier ${ident.ident}`),
      visitGenericParams: () => order.push("generic_params"),
      visitType: () => order.push("type"),
    };

    visitCddl(visitor, parseOrThrow("pair<k> = [k, k]"));
    expect(order).toEqual(["identifier pair", "generic_params", "type"]);
  });

  test("walks group name entries as occurrence, name, then generic args", () => {
    const order: string[] = [];
    const visitor: Visitor = {
      visitOccurrence: () => order.push("occurrence"),
      visitIdentifier: (ident) => order.push(`identifier ${ident.ident}`),
      visitGenericArgs: () => order.push("generic_args"),
    };

    visitCddl(visitor, parseOrThrow("a = [* pair<int>]"));
    expect(order).toEqual(["identifier a", "occurrence", "identifier pair", "generic_args"]);
  });

  test("visits type2 before its operator", () => {
    const values: string[] = [];
    visitCddl({ visitValue: (value) => values.push(formatValue(value)) }, parseOrThrow("a = 1..5"));
    expect(values).toEqual(["1", "5"]);
  });

  test("major types and any have no children to walk", () => {
    const kinds: string[] = [];
    const visitor: Visitor = {
      visitType2: (type2) => {
        kinds.push(type2.kind);
        walkType2(visitor, type2);
      },
      visitIdentifier: (ident) => kinds.push(`identifier ${ident.ident}`),
      visitValue: (value) => kinds.push(`value ${formatValue(value)}`),
    };

    visitCddl(visitor, parseOrThrow("a = # / #7.25 / #0"));
    expect(kinds).toEqual(["identifier a", "any", "data_major_type", "data_major_type"]);
  });

  test("visits literal keys and literal types as values", () => {
    const values: string[] = [];
    visitCddl(
      { visitValue: (value) => values.push(formatValue(value)) },
      parseOrThrow('a = { 1: "one", "two": 2.5 }')
    );
    expect(values).toEqual(["1", '"one"', '"two"', "2.5"]);
  });

  test("an override stops the descent unless it walks", () => {
    const cddl = parseOrThrow('a = "x"');
    let values = 0;

    visitCddl({ visitType2: () => {}, visitValue: () => values++ }, cddl);
    expect(values).toBe(0);

    const walking: Visitor = {
      visitType2(type2) {
        walkType2(this, type2);
      },
      visitValue: () => values++,
    };
    visitCddl(walking, cddl);
    expect(values).toBe(1);
  });

  test("an overridden root can delegate to the default walk", () => {
    const seen: string[] = [];
    const visitor: Visitor = {
      visitCddl(cddl) {
        seen.push(`${cddl.rules.length} rules`);
        walkCddl(this, cddl);
      },
      visitRule: (rule) => seen.push(rule.rule.name.ident),
    };

    visitCddl(visitor, parseOrThrow("a = int\nb = tstr"));
    expect(seen).toEqual(["2 rules", "a", "b"]);
  });

  test("reaches generic params, generic args and non-member keys", () => {
    const counts = { params: 0, args: 0, nonMemberKeys: 0 };
    const visitor: Visitor = {
      visitGenericParam: () => counts.params++,
      visitGenericArg: () => counts.args++,
      visitNonMemberKey: () => counts.nonMemberKeys++,
    };

    visitCddl(visitor, parseOrThrow("m<k, v> = { (k) => v }\nu = m<int, tstr>"));
    expect(counts).toEqual({ params: 2, args: 2, nonMemberKeys: 1 });
  });
});

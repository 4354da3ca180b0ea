/**
 * Formatter tests
 */

import { describe, expect, test } from "vitest";
import { formatIdentifier, formatRule, formatValue } from "./format.js";
import { parseOrThrow } from "./parser.js";

function formatFirstRule(source: string): string {
  const [rule] = parseOrThrow(source).rules;
  if (!rule) throw new Error("expected a rule");
  return formatRule(rule);
}

describe("Formatter", () => {
  describe("values", () => {
    test("formats numbers", () => {
      expect(formatValue({ kind: "value", type: "int", value: -3n })).toBe("-3");
      expect(formatValue({ kind: "value", type: "float", value: 1 })).toBe("1.0");
      expect(formatValue({ kind: "value", type: "float", value: 2.5 })).toBe("2.5");
    });

    test("formats 64-bit integers exactly", () => {
      expect(formatValue({ kind: "value", type: "uint", value: 18446744073709551615n })).toBe(
        "18446744073709551615"
      );
      expect(formatValue({ kind: "value", type: "int", value: -9007199254740993n })).toBe("-9007199254740993");
    });

    test("leaves exponent floats without a fraction suffix", () => {
      expect(formatValue({ kind: "value", type: "float", value: 1e21 })).toBe("1e+21");
      expect(formatValue({ kind: "value", type: "float", value: 1.5e-7 })).toBe("1.5e-7");
    });

    test("quotes text and escapes quotes once", () => {
      expect(formatValue({ kind: "value", type: "text", value: 'a"b' })).toBe('"a\\"b"');
    });

    test("re-escapes control characters and backslashes", () => {
      expect(formatValue({ kind: "value", type: "text", value: "a\nb\tc\rd\\e" })).toBe('"a\\nb\\tc\\rd\\\\e"');
    });

    test("formats byte strings with their prefix", () => {
      expect(formatValue({ kind: "value", type: "bytes", encoding: "b16", value: "0102" })).toBe("h'0102'");
      expect(formatValue({ kind: "value", type: "bytes", encoding: "b64", value: "AQ==" })).toBe("b64'AQ=='");
      expect(formatValue({ kind: "value", type: "bytes", encoding: "utf8", value: "hi" })).toBe("'hi'");
    });
  });

  test("formats identifiers with sockets", () => {
    expect(formatIdentifier({ kind: "identifier", ident: "ext", socket: "$" })).toBe("$ext");
  });

  describe("rules", () => {
    test.each([
      ["a = b", "a = b"],
      ["a /= int / tstr", "a /= int / tstr"],
      ["person = { name: tstr, ? age: uint }", "person = { name: tstr, ? age: uint }"],
      ["a = 0..10", "a = 0 .. 10"],
      ["a = 0...10", "a = 0 ... 10"],
      ["a = tstr .size 3", "a = tstr .size 3"],
      ["a = #6.32(tstr)", "a = #6.32(tstr)"],
      ["a = #", "a = #"],
      ["a = #7.25", "a = #7.25"],
      ["a = 18446744073709551615", "a = 18446744073709551615"],
      ["a = 0..18446744073709551615", "a = 0 .. 18446744073709551615"],
      ['a = "line\\nbreak"', 'a = "line\\nbreak"'],
      ["g //= b: int", "g //= b: int"],
      ["m<t> = [* t]", "m<t> = [ * t ]"],
      ["a = [1*3 int]", "a = [ 1*3 int ]"],
      ["a = { * tstr => any }", "a = { * tstr => any }"],
      ['a = { "k" ^ => int }', 'a = { "k" ^ => int }'],
      ["a = { (tstr) => int }", "a = { (tstr) => int }"],
      ["a = { 1: int }", "a = { 1: int }"],
      ["a = &(x: 1)", "a = &( x: 1 )"],
      ["a = &b", "a = &b"],
      ["a = ~b", "a = ~b"],
      ["a = [ (b // c) ]", "a = [ ( b // c ) ]"],
      ["a = pair<int, tstr>", "a = pair<int, tstr>"],
      ["a = { k: (int / null) }", "a = { k: (int / null) }"],
    ])("formats %s", (source, expected) => {
      expect(formatFirstRule(source)).toBe(expected);
    });
  });
});

/**
 * AST helper tests
 */

import { describe, expect, test } from "vitest";
import {
  type Value,
  ruleName,
  type2Value,
  valueToType2,
} from "./ast.js";
import { parseOrThrow } from "./parser.js";

describe("AST helpers", () => {
  test("ruleName reads either kind of rule", () => {
    const cddl = parseOrThrow("a = int\ng //= b: tstr");
    expect(cddl.rules.map(ruleName)).toEqual(["a", "g"]);
  });

  test("type2Value extracts the literal leaf", () => {
    expect(type2Value({ kind: "b16_bytes", value: "00ff" })).toEqual({
      kind: "value",
      type: "bytes",
      encoding: "b16",
      value: "00ff",
    });
    expect(type2Value({ kind: "map", group: { kind: "group", groupChoices: [] } })).toBeUndefined();
  });

  test("valueToType2 maps every value type", () => {
    const values: Value[] = [
      { kind: "value", type: "int", value: -1n },
      { kind: "value", type: "uint", value: 1n },
      { kind: "value", type: "float", value: 1.5 },
      { kind: "value", type: "text", value: "t" },
      { kind: "value", type: "bytes", encoding: "b64", value: "AA==" },
    ];
    expect(values.map((value) => valueToType2(value).kind)).toEqual([
      "int_value",
      "uint_value",
      "float_value",
      "text_value",
      "b64_bytes",
    ]);
  });

  test("valueToType2 and type2Value agree", () => {
    const value: Value = { kind: "value", type: "bytes", encoding: "utf8", value: "abc" };
    expect(type2Value(valueToType2(value))).toEqual(value);
  });
});

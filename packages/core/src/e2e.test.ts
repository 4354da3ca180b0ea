/**
 * End-to-End Tests
 * Source text through parsing, traversal and parent lookups
 */

import { describe, expect, test } from "vitest";
import {
  type CDDL,
  type Visitor,
  buildParentIndex,
  formatRule,
  parse,
  ruleName,
  visitCddl,
  walkType2,
} from "./index.js";

const SCHEMA = `; device registry
device = {
  id: uuid,
  name: tstr .size (1..64),
  ? tags: [* tstr],
  status: &device-status,
  * tstr => any,
}

uuid = #6.37(bstr)

device-status = (
  online: 1,
  offline: 2,
)

reading<T> = [timestamp: uint, value: T]
temperature = reading<float>

command = reboot / shutdown
reboot = "reboot"
shutdown = "shutdown"
command /= "ping"
`;

/** Helper to assert a parse result has a document */
function assertDocument(result: ReturnType<typeof parse>): asserts result is {
  success: true;
  cddl: CDDL;
  errors: never[];
} {
  if (!result.success) {
    throw new Error(`Expected successful parse: ${result.errors.map((e) => e.message).join("; ")}`);
  }
}

describe("E2E: parse and index", () => {
  test("stops at a parenthesized rule body", () => {
    const result = parse(SCHEMA);
    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(["UNIMPLEMENTED"]);
    expect(result.errors[0]?.location?.line).toBe(12);
  });

  describe("without parenthesized rule bodies", () => {
    const source = SCHEMA.replace(/device-status = \([^)]*\)/, "device-status = &(online: 1, offline: 2)");
    const result = parse(source);
    assertDocument(result);
    const cddl = result.cddl;

    test("parses every rule in order", () => {
      expect(cddl.rules.map(ruleName)).toEqual([
        "device",
        "uuid",
        "device-status",
        "reading",
        "temperature",
        "command",
        "reboot",
        "shutdown",
        "command",
      ]);
    });

    test("renders rules back to compact text", () => {
      expect(cddl.rules.slice(5).map(formatRule)).toEqual([
        "command = reboot / shutdown",
        'reboot = "reboot"',
        'shutdown = "shutdown"',
        'command /= "ping"',
      ]);
    });

    test("collects every typename reference with a visitor", () => {
      const references: string[] = [];
      const visitor: Visitor = {
        visitType2(type2) {
          if (type2.kind === "typename") references.push(type2.ident.ident);
          walkType2(this, type2);
        },
      };

      visitCddl(visitor, cddl);
      expect(references).toEqual([
        "uuid",
        "tstr",
        "tstr",
        "any",
        "bstr",
        "uint",
        "T",
        "reading",
        "float",
        "reboot",
        "shutdown",
      ]);
    });

    test("walks from any literal back to its rule", () => {
      const index = buildParentIndex(cddl);
      const ping = { kind: "value" as const, type: "text" as const, value: "ping" };

      const rule = index.ancestors("value", ping).find((node) => node.kind === "rule");
      expect(rule?.kind === "rule" ? ruleName(rule.node) : undefined).toBe("command");
    });

    test("shares equal literals across rules", () => {
      const index = buildParentIndex(cddl);
      const values = index.entries().filter((entry) => entry.kind === "value");
      // The range bound 1 and the choice value 1 share a slot
      expect(values.map((entry) => entry.label)).toEqual([
        "1",
        "64",
        "2",
        '"reboot"',
        '"shutdown"',
        '"ping"',
      ]);
    });
  });
});

/**
 * Index arena for parent/child relations between AST nodes.
 *
 * Nodes are interned by structural equality: two nodes with the same kind and
 * deeply equal contents share a slot. Spans keep most nodes distinct; literal
 * Values carry none and collapse.
 */

import type {
  CDDL,
  GenericArg,
  GenericArgs,
  GenericParam,
  GenericParams,
  Group,
  GroupChoice,
  GroupEntry,
  GroupRule,
  Identifier,
  MemberKey,
  NonMemberKey,
  Occurrence,
  Operator,
  Rule,
  Type,
  Type1,
  Type2,
  TypeChoice,
  TypeGroupnameEntry,
  TypeRule,
  Value,
  ValueMemberKeyEntry,
} from "../syntax/ast.js";
import { TreeError } from "../syntax/errors.js";

/** Node kinds tracked by the arena, keyed by tag */
export interface NodeKindMap {
  cddl: CDDL;
  rule: Rule;
  type_rule: TypeRule;
  group_rule: GroupRule;
  type: Type;
  type_choice: TypeChoice;
  type1: Type1;
  operator: Operator;
  type2: Type2;
  group: Group;
  group_choice: GroupChoice;
  group_entry: GroupEntry;
  value_member_key_entry: ValueMemberKeyEntry;
  type_groupname_entry: TypeGroupnameEntry;
  occurrence: Occurrence;
  member_key: MemberKey;
  non_member_key: NonMemberKey;
  generic_params: GenericParams;
  generic_param: GenericParam;
  generic_args: GenericArgs;
  generic_arg: GenericArg;
  identifier: Identifier;
  value: Value;
}

export type NodeKind = keyof NodeKindMap;

/** A reference to an AST node tagged with its kind */
export type CddlNode = { [K in NodeKind]: { kind: K; node: NodeKindMap[K] } }[NodeKind];

export type CddlNodeOf<K extends NodeKind> = Extract<CddlNode, { kind: K }>;

export function isNodeKind<K extends NodeKind>(value: CddlNode, kind: K): value is CddlNodeOf<K> {
  return value.kind === kind;
}

export interface ArenaNode {
  readonly idx: number;
  readonly value: CddlNode;
  parent?: number;
  readonly children: number[];
}

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Hash-consed structural keys. Every distinct object shape gets a small id,
 * and an object's canonical form refers to its children by id, so a subtree
 * is serialized once no matter how often it is asked for.
 *
 * Properties holding `undefined` are treated as absent, and key order does not
 * matter. Keys are cached per object, so nodes must not be mutated once keyed.
 */
export class StructuralKeys {
  private readonly ids = new Map<string, number>();
  private readonly cache = new WeakMap<object, number>();

  keyOf(value: unknown): string {
    switch (typeof value) {
      case "string":
        return JSON.stringify(value);
      case "number":
        return Object.is(value, -0) ? "-0" : String(value);
      case "bigint":
        return `${value}n`;
      case "boolean":
      case "undefined":
        return String(value);
      case "object":
        return value === null ? "null" : `#${this.idOf(value)}`;
      default:
        throw new TypeError(`Cannot key a ${typeof value} value`);
    }
  }

  private idOf(value: object): number {
    const cached = this.cache.get(value);
    if (cached !== undefined) return cached;

    const canonical = Array.isArray(value)
      ? `[${value.map((item: unknown) => this.keyOf(item)).join(",")}]`
      : `{${Object.entries(value)
          .filter(([, field]) => field !== undefined)
          .sort(compareKeys)
          .map(([name, field]) => `${JSON.stringify(name)}:${this.keyOf(field)}`)
          .join(",")}}`;

    let id = this.ids.get(canonical);
    if (id === undefined) {
      id = this.ids.size;
      this.ids.set(canonical, id);
    }
    this.cache.set(value, id);
    return id;
  }
}

export class ArenaTree {
  private readonly arena: ArenaNode[] = [];
  private readonly slots = new Map<string, number>();
  private readonly keys = new StructuralKeys();

  get size(): number {
    return this.arena.length;
  }

  /** Slot of a structurally equal node, without inserting */
  find(kind: NodeKind, node: unknown): number | undefined {
    return this.slots.get(this.slotKey(kind, node));
  }

  /** Slot for the node, inserting a new one when no equal node exists */
  intern(value: CddlNode): number {
    const key = this.slotKey(value.kind, value.node);
    const existing = this.slots.get(key);
    if (existing !== undefined) return existing;

    const idx = this.arena.length;
    this.arena.push({ idx, value, children: [] });
    this.slots.set(key, idx);
    return idx;
  }

  get(idx: number): ArenaNode | undefined {
    return this.arena[idx];
  }

  /**
   * Record `child` under `parent`. The first parent recorded for a slot is
   * kept; later links only add to the parent's child list. A child list holds
   * each slot once, so relinking the same pair changes nothing.
   *
   * @throws TreeError when the link would make a node its own ancestor
   */
  link(parent: number, child: number): void {
    const parentNode = this.arena[parent];
    const childNode = this.arena[child];
    if (!parentNode || !childNode) {
      throw new RangeError(`No arena slot for link ${parent} -> ${child}`);
    }

    if (this.isAncestorOrSelf(child, parent)) {
      throw new TreeError();
    }

    if (childNode.parent === undefined) {
      childNode.parent = parent;
    }
    if (!parentNode.children.includes(child)) {
      parentNode.children.push(child);
    }
  }

  nodes(): readonly ArenaNode[] {
    return this.arena;
  }

  private slotKey(kind: NodeKind, node: unknown): string {
    return `${kind}:${this.keys.keyOf(node)}`;
  }

  private isAncestorOrSelf(candidate: number, idx: number): boolean {
    let current: number | undefined = idx;
    while (current !== undefined) {
      if (current === candidate) return true;
      current = this.arena[current]?.parent;
    }
    return false;
  }
}

/**
 * Parent index: upward navigation over a parsed document.
 *
 * The index is built once by walking the AST with a visitor that interns
 * every node in an arena and links it to the node it was reached from.
 * Afterwards it answers "what contains this node?" for any node reachable
 * from the document root. Nodes are held by reference, so the document must
 * stay unmodified while the index is in use.
 */

import { ruleName } from "../syntax/ast.js";
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
import {
  formatGenericArgs,
  formatGenericParams,
  formatGroup,
  formatGroupChoice,
  formatGroupEntry,
  formatIdentifier,
  formatMemberKey,
  formatNonMemberKey,
  formatOccurrence,
  formatOperator,
  formatType,
  formatType1,
  formatType2,
  formatValue,
} from "../syntax/format.js";
import {
  ArenaTree,
  type CddlNode,
  type CddlNodeOf,
  type NodeKind,
  type NodeKindMap,
  isNodeKind,
} from "./arena.js";
import {
  type Visitor,
  walkCddl,
  walkGenericArg,
  walkGenericArgs,
  walkGenericParam,
  walkGenericParams,
  walkGroup,
  walkGroupChoice,
  walkGroupEntry,
  walkGroupRule,
  walkMemberKey,
  walkNonMemberKey,
  walkOperator,
  walkRule,
  walkType,
  walkType1,
  walkType2,
  walkTypeChoice,
  walkTypeGroupnameEntry,
  walkTypeRule,
  walkValueMemberKeyEntry,
} from "./visitor.js";

/** Which node kinds can directly contain each node kind */
export const PARENT_KINDS = {
  cddl: [],
  rule: ["cddl"],
  type_rule: ["rule"],
  group_rule: ["rule"],
  type: ["type_rule", "type2", "value_member_key_entry", "non_member_key"],
  type_choice: ["type"],
  type1: ["type_choice", "member_key", "generic_arg"],
  operator: ["type1"],
  type2: ["type1", "operator"],
  group: ["type2", "group_entry", "non_member_key"],
  group_choice: ["group"],
  group_entry: ["group_rule", "group_choice"],
  value_member_key_entry: ["group_entry"],
  type_groupname_entry: ["group_entry"],
  occurrence: ["value_member_key_entry", "type_groupname_entry", "group_entry"],
  member_key: ["value_member_key_entry"],
  non_member_key: ["member_key"],
  generic_params: ["type_rule", "group_rule"],
  generic_param: ["generic_params"],
  generic_args: ["type2", "type_groupname_entry"],
  generic_arg: ["generic_args"],
  identifier: ["type_rule", "group_rule", "type2", "type_groupname_entry", "member_key", "generic_param"],
  value: ["type2", "member_key"],
} as const satisfies Record<NodeKind, readonly NodeKind[]>;

export type ParentKind<C extends NodeKind> = (typeof PARENT_KINDS)[C][number];

/** One arena slot, flattened for listing */
export interface ParentIndexEntry {
  index: number;
  kind: NodeKind;
  label: string;
  parent?: number;
  children: number[];
}

/**
 * Visitor that records every node it reaches under the node it came from.
 */
export class ParentVisitor implements Visitor {
  readonly arena = new ArenaTree();
  private readonly stack: number[] = [];

  private enter(value: CddlNode, walk: () => void): void {
    const idx = this.arena.intern(value);
    const parent = this.stack[this.stack.length - 1];
    if (parent !== undefined) {
      this.arena.link(parent, idx);
    }

    this.stack.push(idx);
    walk();
    this.stack.pop();
  }

  visitCddl(cddl: CDDL): void {
    this.enter({ kind: "cddl", node: cddl }, () => walkCddl(this, cddl));
  }

  visitRule(rule: Rule): void {
    this.enter({ kind: "rule", node: rule }, () => walkRule(this, rule));
  }

  visitTypeRule(rule: TypeRule): void {
    this.enter({ kind: "type_rule", node: rule }, () => walkTypeRule(this, rule));
  }

  visitGroupRule(rule: GroupRule): void {
    this.enter({ kind: "group_rule", node: rule }, () => walkGroupRule(this, rule));
  }

  visitType(type: Type): void {
    this.enter({ kind: "type", node: type }, () => walkType(this, type));
  }

  visitTypeChoice(choice: TypeChoice): void {
    this.enter({ kind: "type_choice", node: choice }, () => walkTypeChoice(this, choice));
  }

  visitType1(type1: Type1): void {
    this.enter({ kind: "type1", node: type1 }, () => walkType1(this, type1));
  }

  visitOperator(operator: Operator): void {
    this.enter({ kind: "operator", node: operator }, () => walkOperator(this, operator));
  }

  visitType2(type2: Type2): void {
    this.enter({ kind: "type2", node: type2 }, () => walkType2(this, type2));
  }

  visitGroup(group: Group): void {
    this.enter({ kind: "group", node: group }, () => walkGroup(this, group));
  }

  visitGroupChoice(choice: GroupChoice): void {
    this.enter({ kind: "group_choice", node: choice }, () => walkGroupChoice(this, choice));
  }

  visitGroupEntry(entry: GroupEntry): void {
    this.enter({ kind: "group_entry", node: entry }, () => walkGroupEntry(this, entry));
  }

  visitValueMemberKeyEntry(entry: ValueMemberKeyEntry): void {
    this.enter({ kind: "value_member_key_entry", node: entry }, () =>
      walkValueMemberKeyEntry(this, entry)
    );
  }

  visitTypeGroupnameEntry(entry: TypeGroupnameEntry): void {
    this.enter({ kind: "type_groupname_entry", node: entry }, () =>
      walkTypeGroupnameEntry(this, entry)
    );
  }

  visitOccurrence(occurrence: Occurrence): void {
    this.enter({ kind: "occurrence", node: occurrence }, () => {});
  }

  visitMemberKey(key: MemberKey): void {
    this.enter({ kind: "member_key", node: key }, () => walkMemberKey(this, key));
  }

  visitNonMemberKey(key: NonMemberKey): void {
    this.enter({ kind: "non_member_key", node: key }, () => walkNonMemberKey(this, key));
  }

  visitGenericParams(params: GenericParams): void {
    this.enter({ kind: "generic_params", node: params }, () => walkGenericParams(this, params));
  }

  visitGenericParam(param: GenericParam): void {
    this.enter({ kind: "generic_param", node: param }, () => walkGenericParam(this, param));
  }

  visitGenericArgs(args: GenericArgs): void {
    this.enter({ kind: "generic_args", node: args }, () => walkGenericArgs(this, args));
  }

  visitGenericArg(arg: GenericArg): void {
    this.enter({ kind: "generic_arg", node: arg }, () => walkGenericArg(this, arg));
  }

  visitIdentifier(ident: Identifier): void {
    this.enter({ kind: "identifier", node: ident }, () => {});
  }

  visitValue(value: Value): void {
    this.enter({ kind: "value", node: value }, () => {});
  }
}

export class ParentIndex {
  private constructor(private readonly arena: ArenaTree) {}

  /**
   * Walk the document and record every parent/child pair.
   *
   * @throws TreeError if linking would create a cycle
   */
  static build(cddl: CDDL): ParentIndex {
    const visitor = new ParentVisitor();
    visitor.visitCddl(cddl);
    return new ParentIndex(visitor.arena);
  }

  /** Number of distinct interned nodes */
  get size(): number {
    return this.arena.size;
  }

  has<K extends NodeKind>(kind: K, node: NodeKindMap[K]): boolean {
    return this.arena.find(kind, node) !== undefined;
  }

  /** Immediate parent of a node, whatever its kind */
  parent<K extends NodeKind>(kind: K, node: NodeKindMap[K]): CddlNode | undefined {
    const idx = this.arena.find(kind, node);
    if (idx === undefined) return undefined;

    const parentIdx = this.arena.get(idx)?.parent;
    return parentIdx === undefined ? undefined : this.arena.get(parentIdx)?.value;
  }

  /**
   * Immediate parent of `child` when it is a `parentKind` node.
   *
   * Returns undefined when the child is not in the index, is the root, or its
   * recorded parent has a different kind.
   */
  parentOf<C extends NodeKind, P extends ParentKind<C>>(
    childKind: C,
    child: NodeKindMap[C],
    parentKind: P
  ): CddlNodeOf<P> | undefined {
    const parent = this.parent(childKind, child);
    return parent !== undefined && isNodeKind(parent, parentKind) ? parent : undefined;
  }

  // Kinds with exactly one possible parent kind

  ruleParent(rule: Rule): CDDL | undefined {
    return this.parentOf("rule", rule, "cddl")?.node;
  }

  typeRuleParent(rule: TypeRule): Rule | undefined {
    return this.parentOf("type_rule", rule, "rule")?.node;
  }

  groupRuleParent(rule: GroupRule): Rule | undefined {
    return this.parentOf("group_rule", rule, "rule")?.node;
  }

  typeChoiceParent(choice: TypeChoice): Type | undefined {
    return this.parentOf("type_choice", choice, "type")?.node;
  }

  operatorParent(operator: Operator): Type1 | undefined {
    return this.parentOf("operator", operator, "type1")?.node;
  }

  groupChoiceParent(choice: GroupChoice): Group | undefined {
    return this.parentOf("group_choice", choice, "group")?.node;
  }

  memberKeyParent(key: MemberKey): ValueMemberKeyEntry | undefined {
    return this.parentOf("member_key", key, "value_member_key_entry")?.node;
  }

  nonMemberKeyParent(key: NonMemberKey): MemberKey | undefined {
    return this.parentOf("non_member_key", key, "member_key")?.node;
  }

  genericParamParent(param: GenericParam): GenericParams | undefined {
    return this.parentOf("generic_param", param, "generic_params")?.node;
  }

  genericArgParent(arg: GenericArg): GenericArgs | undefined {
    return this.parentOf("generic_arg", arg, "generic_args")?.node;
  }

  /** Nodes linked under this node, in first-visit order */
  childrenOf<K extends NodeKind>(kind: K, node: NodeKindMap[K]): CddlNode[] {
    const idx = this.arena.find(kind, node);
    if (idx === undefined) return [];

    const children: CddlNode[] = [];
    for (const childIdx of this.arena.get(idx)?.children ?? []) {
      const child = this.arena.get(childIdx);
      if (child) children.push(child.value);
    }
    return children;
  }

  /** Chain of containing nodes from the immediate parent up to the root */
  ancestors<K extends NodeKind>(kind: K, node: NodeKindMap[K]): CddlNode[] {
    const result: CddlNode[] = [];
    const start = this.arena.find(kind, node);
    let current = start === undefined ? undefined : this.arena.get(start)?.parent;

    while (current !== undefined) {
      const entry = this.arena.get(current);
      if (!entry) break;
      result.push(entry.value);
      current = entry.parent;
    }
    return result;
  }

  entries(): ParentIndexEntry[] {
    return this.arena.nodes().map((entry) => ({
      index: entry.idx,
      kind: entry.value.kind,
      label: describeNode(entry.value),
      parent: entry.parent,
      children: [...entry.children],
    }));
  }
}

export function buildParentIndex(cddl: CDDL): ParentIndex {
  return ParentIndex.build(cddl);
}

/** Short text form of a node for listings */
export function describeNode(value: CddlNode): string {
  switch (value.kind) {
    case "cddl":
      return `${value.node.rules.length} rule(s)`;
    case "rule":
      return ruleName(value.node);
    case "type_rule":
    case "group_rule":
      return formatIdentifier(value.node.name);
    case "type":
      return formatType(value.node);
    case "type_choice":
      return formatType1(value.node.type1);
    case "type1":
      return formatType1(value.node);
    case "operator":
      return formatOperator(value.node);
    case "type2":
      return formatType2(value.node);
    case "group":
      return formatGroup(value.node);
    case "group_choice":
      return formatGroupChoice(value.node);
    case "group_entry":
      return formatGroupEntry(value.node);
    case "value_member_key_entry":
      return formatGroupEntry({ kind: "value_member_key", ge: value.node });
    case "type_groupname_entry":
      return formatGroupEntry({ kind: "type_groupname", ge: value.node });
    case "occurrence":
      return formatOccurrence(value.node);
    case "member_key":
      return formatMemberKey(value.node);
    case "non_member_key":
      return formatNonMemberKey(value.node);
    case "generic_params":
      return formatGenericParams(value.node);
    case "generic_param":
      return formatIdentifier(value.node.param);
    case "generic_args":
      return formatGenericArgs(value.node);
    case "generic_arg":
      return formatType1(value.node.arg);
    case "identifier":
      return formatIdentifier(value.node);
    case "value":
      return formatValue(value.node);
  }
}

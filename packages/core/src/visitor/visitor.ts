/**
 * Visitor protocol over the CDDL AST
 *
 * A visitor implements only the methods it cares about. For every other node
 * kind the dispatch functions fall back to the matching walk function, which
 * descends into the node's children in grammar order. Overriding methods that
 * still want the children visited call the walk function themselves.
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
import { type2Value } from "../syntax/ast.js";

export interface Visitor {
  visitCddl?(cddl: CDDL): void;
  visitRule?(rule: Rule): void;
  visitTypeRule?(rule: TypeRule): void;
  visitGroupRule?(rule: GroupRule): void;
  visitType?(type: Type): void;
  visitTypeChoice?(choice: TypeChoice): void;
  visitType1?(type1: Type1): void;
  visitOperator?(operator: Operator): void;
  visitType2?(type2: Type2): void;
  visitGroup?(group: Group): void;
  visitGroupChoice?(choice: GroupChoice): void;
  visitGroupEntry?(entry: GroupEntry): void;
  visitValueMemberKeyEntry?(entry: ValueMemberKeyEntry): void;
  visitTypeGroupnameEntry?(entry: TypeGroupnameEntry): void;
  visitOccurrence?(occurrence: Occurrence): void;
  visitMemberKey?(key: MemberKey): void;
  visitNonMemberKey?(key: NonMemberKey): void;
  visitGenericParams?(params: GenericParams): void;
  visitGenericParam?(param: GenericParam): void;
  visitGenericArgs?(args: GenericArgs): void;
  visitGenericArg?(arg: GenericArg): void;
  visitIdentifier?(ident: Identifier): void;
  visitValue?(value: Value): void;
}

// =============================================================================
// DISPATCH
// =============================================================================

export function visitCddl(v: Visitor, cddl: CDDL): void {
  if (v.visitCddl) v.visitCddl(cddl);
  else walkCddl(v, cddl);
}

export function visitRule(v: Visitor, rule: Rule): void {
  if (v.visitRule) v.visitRule(rule);
  else walkRule(v, rule);
}

export function visitTypeRule(v: Visitor, rule: TypeRule): void {
  if (v.visitTypeRule) v.visitTypeRule(rule);
  else walkTypeRule(v, rule);
}

export function visitGroupRule(v: Visitor, rule: GroupRule): void {
  if (v.visitGroupRule) v.visitGroupRule(rule);
  else walkGroupRule(v, rule);
}

export function visitType(v: Visitor, type: Type): void {
  if (v.visitType) v.visitType(type);
  else walkType(v, type);
}

export function visitTypeChoice(v: Visitor, choice: TypeChoice): void {
  if (v.visitTypeChoice) v.visitTypeChoice(choice);
  else walkTypeChoice(v, choice);
}

export function visitType1(v: Visitor, type1: Type1): void {
  if (v.visitType1) v.visitType1(type1);
  else walkType1(v, type1);
}

export function visitOperator(v: Visitor, operator: Operator): void {
  if (v.visitOperator) v.visitOperator(operator);
  else walkOperator(v, operator);
}

export function visitType2(v: Visitor, type2: Type2): void {
  if (v.visitType2) v.visitType2(type2);
  else walkType2(v, type2);
}

export function visitGroup(v: Visitor, group: Group): void {
  if (v.visitGroup) v.visitGroup(group);
  else walkGroup(v, group);
}

export function visitGroupChoice(v: Visitor, choice: GroupChoice): void {
  if (v.visitGroupChoice) v.visitGroupChoice(choice);
  else walkGroupChoice(v, choice);
}

export function visitGroupEntry(v: Visitor, entry: GroupEntry): void {
  if (v.visitGroupEntry) v.visitGroupEntry(entry);
  else walkGroupEntry(v, entry);
}

export function visitValueMemberKeyEntry(v: Visitor, entry: ValueMemberKeyEntry): void {
  if (v.visitValueMemberKeyEntry) v.visitValueMemberKeyEntry(entry);
  else walkValueMemberKeyEntry(v, entry);
}

export function visitTypeGroupnameEntry(v: Visitor, entry: TypeGroupnameEntry): void {
  if (v.visitTypeGroupnameEntry) v.visitTypeGroupnameEntry(entry);
  else walkTypeGroupnameEntry(v, entry);
}

export function visitOccurrence(v: Visitor, occurrence: Occurrence): void {
  if (v.visitOccurrence) v.visitOccurrence(occurrence);
}

export function visitMemberKey(v: Visitor, key: MemberKey): void {
  if (v.visitMemberKey) v.visitMemberKey(key);
  else walkMemberKey(v, key);
}

export function visitNonMemberKey(v: Visitor, key: NonMemberKey): void {
  if (v.visitNonMemberKey) v.visitNonMemberKey(key);
  else walkNonMemberKey(v, key);
}

export function visitGenericParams(v: Visitor, params: GenericParams): void {
  if (v.visitGenericParams) v.visitGenericParams(params);
  else walkGenericParams(v, params);
}

export function visitGenericParam(v: Visitor, param: GenericParam): void {
  if (v.visitGenericParam) v.visitGenericParam(param);
  else walkGenericParam(v, param);
}

export function visitGenericArgs(v: Visitor, args: GenericArgs): void {
  if (v.visitGenericArgs) v.visitGenericArgs(args);
  else walkGenericArgs(v, args);
}

export function visitGenericArg(v: Visitor, arg: GenericArg): void {
  if (v.visitGenericArg) v.visitGenericArg(arg);
  else walkGenericArg(v, arg);
}

// Leaves: nothing to walk into
export function visitIdentifier(v: Visitor, ident: Identifier): void {
  v.visitIdentifier?.(ident);
}

export function visitValue(v: Visitor, value: Value): void {
  v.visitValue?.(value);
}

// =============================================================================
// DEFAULT WALKS
// =============================================================================

export function walkCddl(v: Visitor, cddl: CDDL): void {
  for (const rule of cddl.rules) {
    visitRule(v, rule);
  }
}

export function walkRule(v: Visitor, rule: Rule): void {
  if (rule.rule.kind === "type_rule") {
    visitTypeRule(v, rule.rule);
  } else {
    visitGroupRule(v, rule.rule);
  }
}

export function walkTypeRule(v: Visitor, rule: TypeRule): void {
  visitIdentifier(v, rule.name);
  if (rule.genericParams) visitGenericParams(v, rule.genericParams);
  visitType(v, rule.value);
}

export function walkGroupRule(v: Visitor, rule: GroupRule): void {
  visitIdentifier(v, rule.name);
  if (rule.genericParams) visitGenericParams(v, rule.genericParams);
  visitGroupEntry(v, rule.entry);
}

export function walkType(v: Visitor, type: Type): void {
  for (const choice of type.typeChoices) {
    visitTypeChoice(v, choice);
  }
}

export function walkTypeChoice(v: Visitor, choice: TypeChoice): void {
  visitType1(v, choice.type1);
}

export function walkType1(v: Visitor, type1: Type1): void {
  visitType2(v, type1.type2);
  if (type1.operator) visitOperator(v, type1.operator);
}

export function walkOperator(v: Visitor, operator: Operator): void {
  visitType2(v, operator.type2);
}

export function walkType2(v: Visitor, type2: Type2): void {
  switch (type2.kind) {
    case "int_value":
    case "uint_value":
    case "float_value":
    case "text_value":
    case "utf8_bytes":
    case "b16_bytes":
    case "b64_bytes": {
      const value = type2Value(type2);
      if (value) visitValue(v, value);
      return;
    }
    case "typename":
    case "unwrap":
    case "choice_from_group":
      visitIdentifier(v, type2.ident);
      if (type2.genericArgs) visitGenericArgs(v, type2.genericArgs);
      return;
    case "parenthesized_type":
      visitType(v, type2.pt);
      return;
    case "map":
    case "array":
    case "choice_from_inline_group":
      visitGroup(v, type2.group);
      return;
    case "tagged_data":
      visitType(v, type2.t);
      return;
    case "data_major_type":
    case "any":
      return;
    default: {
      const unreachable: never = type2;
      throw new Error(`Unhandled type2 node: ${String(unreachable)}`);
    }
  }
}

export function walkGroup(v: Visitor, group: Group): void {
  for (const choice of group.groupChoices) {
    visitGroupChoice(v, choice);
  }
}

export function walkGroupChoice(v: Visitor, choice: GroupChoice): void {
  for (const { entry } of choice.groupEntries) {
    visitGroupEntry(v, entry);
  }
}

export function walkGroupEntry(v: Visitor, entry: GroupEntry): void {
  switch (entry.kind) {
    case "value_member_key":
      visitValueMemberKeyEntry(v, entry.ge);
      return;
    case "type_groupname":
      visitTypeGroupnameEntry(v, entry.ge);
      return;
    case "inline_group":
      if (entry.occur) visitOccurrence(v, entry.occur);
      visitGroup(v, entry.group);
      return;
  }
}

export function walkValueMemberKeyEntry(v: Visitor, entry: ValueMemberKeyEntry): void {
  if (entry.occur) visitOccurrence(v, entry.occur);
  if (entry.memberKey) visitMemberKey(v, entry.memberKey);
  visitType(v, entry.entryType);
}

export function walkTypeGroupnameEntry(v: Visitor, entry: TypeGroupnameEntry): void {
  if (entry.occur) visitOccurrence(v, entry.occur);
  visitIdentifier(v, entry.name);
  if (entry.genericArgs) visitGenericArgs(v, entry.genericArgs);
}

export function walkMemberKey(v: Visitor, key: MemberKey): void {
  switch (key.kind) {
    case "type1":
      visitType1(v, key.t1);
      return;
    case "bareword":
      visitIdentifier(v, key.ident);
      return;
    case "value":
      visitValue(v, key.value);
      return;
    case "non_member_key":
      visitNonMemberKey(v, key.nonMemberKey);
      return;
  }
}

export function walkNonMemberKey(v: Visitor, key: NonMemberKey): void {
  if (key.kind === "group") {
    visitGroup(v, key.group);
  } else {
    visitType(v, key.type);
  }
}

export function walkGenericParams(v: Visitor, params: GenericParams): void {
  for (const param of params.params) {
    visitGenericParam(v, param);
  }
}

export function walkGenericParam(v: Visitor, param: GenericParam): void {
  visitIdentifier(v, param.param);
}

export function walkGenericArgs(v: Visitor, args: GenericArgs): void {
  for (const arg of args.args) {
    visitGenericArg(v, arg);
  }
}

export function walkGenericArg(v: Visitor, arg: GenericArg): void {
  visitType1(v, arg.arg);
}

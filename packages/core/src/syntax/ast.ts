/**
 * AST node types for CDDL documents
 *
 * Parents own their children by value and never point back up. Navigation
 * upwards goes through the parent index in ../visitor/parent-index.ts.
 */

import type { SourceSpan } from "./errors.js";

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base AST node with location info */
export interface ASTNode {
  span?: SourceSpan;
}

// =============================================================================
// LEAVES
// =============================================================================

/** Identifier, optionally prefixed by a `$` (type) or `$$` (group) socket */
export interface Identifier extends ASTNode {
  kind: "identifier";
  ident: string;
  socket?: "$" | "$$";
}

export type ByteEncoding = "utf8" | "b16" | "b64";

/**
 * Literal value. Values carry no span, so equal literals are equal nodes
 * wherever they appear. Integers are bigints so that 64-bit literals stay
 * exact.
 */
export type Value =
  | { kind: "value"; type: "int" | "uint"; value: bigint }
  | { kind: "value"; type: "float"; value: number }
  | { kind: "value"; type: "text"; value: string }
  | { kind: "value"; type: "bytes"; encoding: ByteEncoding; value: string };

// =============================================================================
// DOCUMENT AND RULES
// =============================================================================

/** Complete CDDL document */
export interface CDDL extends ASTNode {
  kind: "cddl";
  rules: Rule[];
}

/** Top-level rule wrapper around a type rule or a group rule */
export interface Rule extends ASTNode {
  kind: "rule";
  rule: TypeRule | GroupRule;
}

/** name [<params>] (= | /=) type */
export interface TypeRule extends ASTNode {
  kind: "type_rule";
  name: Identifier;
  genericParams?: GenericParams;
  isTypeChoiceAlternate: boolean;
  value: Type;
}

/** name [<params>] (= | //=) grpent */
export interface GroupRule extends ASTNode {
  kind: "group_rule";
  name: Identifier;
  genericParams?: GenericParams;
  isGroupChoiceAlternate: boolean;
  entry: GroupEntry;
}

// =============================================================================
// TYPES
// =============================================================================

/** type1 *( "/" type1 ); never empty */
export interface Type extends ASTNode {
  kind: "type";
  typeChoices: TypeChoice[];
}

export interface TypeChoice extends ASTNode {
  kind: "type_choice";
  type1: Type1;
}

export interface Type1 extends ASTNode {
  kind: "type1";
  type2: Type2;
  operator?: Operator;
}

export type RangeCtlOp =
  | { kind: "range"; inclusive: boolean }
  | { kind: "control"; name: string };

/**
 * Range or control operator. For a range the lower bound is the owning
 * Type1's type2 and the upper bound is `type2` here.
 */
export interface Operator extends ASTNode {
  kind: "operator";
  operator: RangeCtlOp;
  type2: Type2;
}

export type Type2 =
  | IntValueType2
  | UintValueType2
  | FloatValueType2
  | TextValueType2
  | ByteStringType2
  | TypenameType2
  | ParenthesizedType2
  | MapType2
  | ArrayType2
  | UnwrapType2
  | ChoiceFromInlineGroupType2
  | ChoiceFromGroupType2
  | TaggedDataType2
  | DataMajorType2
  | AnyType2;

export interface IntValueType2 extends ASTNode {
  kind: "int_value";
  value: bigint;
}

export interface UintValueType2 extends ASTNode {
  kind: "uint_value";
  value: bigint;
}

export interface FloatValueType2 extends ASTNode {
  kind: "float_value";
  value: number;
}

/** Text literal; `value` holds the decoded content without quotes */
export interface TextValueType2 extends ASTNode {
  kind: "text_value";
  value: string;
}

export interface ByteStringType2 extends ASTNode {
  kind: "utf8_bytes" | "b16_bytes" | "b64_bytes";
  value: string;
}

export interface TypenameType2 extends ASTNode {
  kind: "typename";
  ident: Identifier;
  genericArgs?: GenericArgs;
}

export interface ParenthesizedType2 extends ASTNode {
  kind: "parenthesized_type";
  pt: Type;
}

export interface MapType2 extends ASTNode {
  kind: "map";
  group: Group;
}

export interface ArrayType2 extends ASTNode {
  kind: "array";
  group: Group;
}

/** ~typename */
export interface UnwrapType2 extends ASTNode {
  kind: "unwrap";
  ident: Identifier;
  genericArgs?: GenericArgs;
}

/** &( group ) */
export interface ChoiceFromInlineGroupType2 extends ASTNode {
  kind: "choice_from_inline_group";
  group: Group;
}

/** &groupname */
export interface ChoiceFromGroupType2 extends ASTNode {
  kind: "choice_from_group";
  ident: Identifier;
  genericArgs?: GenericArgs;
}

/** #6.tag( type ) */
export interface TaggedDataType2 extends ASTNode {
  kind: "tagged_data";
  tag?: bigint;
  t: Type;
}

/** #mt or #mt.constraint */
export interface DataMajorType2 extends ASTNode {
  kind: "data_major_type";
  mt: number;
  constraint?: bigint;
}

/** # */
export interface AnyType2 extends ASTNode {
  kind: "any";
}

// =============================================================================
// GROUPS
// =============================================================================

/** grpchoice *( "//" grpchoice ); never empty */
export interface Group extends ASTNode {
  kind: "group";
  groupChoices: GroupChoice[];
}

export interface GroupChoiceEntry {
  entry: GroupEntry;
  trailingComma: boolean;
}

export interface GroupChoice extends ASTNode {
  kind: "group_choice";
  groupEntries: GroupChoiceEntry[];
}

export type GroupEntry =
  | { kind: "value_member_key"; ge: ValueMemberKeyEntry; span?: SourceSpan }
  | { kind: "type_groupname"; ge: TypeGroupnameEntry; span?: SourceSpan }
  | { kind: "inline_group"; occur?: Occurrence; group: Group; span?: SourceSpan };

/** [occur] [memberkey] type */
export interface ValueMemberKeyEntry extends ASTNode {
  kind: "value_member_key_entry";
  occur?: Occurrence;
  memberKey?: MemberKey;
  entryType: Type;
}

/** [occur] groupname [genericarg] */
export interface TypeGroupnameEntry extends ASTNode {
  kind: "type_groupname_entry";
  occur?: Occurrence;
  name: Identifier;
  genericArgs?: GenericArgs;
}

export type Occur =
  | { kind: "optional" }
  | { kind: "zero_or_more" }
  | { kind: "one_or_more" }
  | { kind: "exact"; lower?: bigint; upper?: bigint };

export interface Occurrence extends ASTNode {
  kind: "occurrence";
  occur: Occur;
}

export type MemberKey =
  | { kind: "type1"; t1: Type1; isCut: boolean; span?: SourceSpan }
  | { kind: "bareword"; ident: Identifier; span?: SourceSpan }
  | { kind: "value"; value: Value; span?: SourceSpan }
  | { kind: "non_member_key"; nonMemberKey: NonMemberKey; span?: SourceSpan };

/** Parenthesized expression in key position */
export type NonMemberKey =
  | { kind: "group"; group: Group; span?: SourceSpan }
  | { kind: "type"; type: Type; span?: SourceSpan };

// =============================================================================
// GENERICS
// =============================================================================

export interface GenericParams extends ASTNode {
  kind: "generic_params";
  params: GenericParam[];
}

export interface GenericParam extends ASTNode {
  kind: "generic_param";
  param: Identifier;
}

export interface GenericArgs extends ASTNode {
  kind: "generic_args";
  args: GenericArg[];
}

export interface GenericArg extends ASTNode {
  kind: "generic_arg";
  arg: Type1;
}

// =============================================================================
// HELPERS
// =============================================================================

/** Rule name, whichever kind of rule it is */
export function ruleName(rule: Rule): string {
  return rule.rule.name.ident;
}

/** The Value leaf of a literal Type2, if it has one */
export function type2Value(t2: Type2): Value | undefined {
  switch (t2.kind) {
    case "int_value":
      return { kind: "value", type: "int", value: t2.value };
    case "uint_value":
      return { kind: "value", type: "uint", value: t2.value };
    case "float_value":
      return { kind: "value", type: "float", value: t2.value };
    case "text_value":
      return { kind: "value", type: "text", value: t2.value };
    case "utf8_bytes":
      return { kind: "value", type: "bytes", encoding: "utf8", value: t2.value };
    case "b16_bytes":
      return { kind: "value", type: "bytes", encoding: "b16", value: t2.value };
    case "b64_bytes":
      return { kind: "value", type: "bytes", encoding: "b64", value: t2.value };
    default:
      return undefined;
  }
}

const BYTE_KINDS = {
  utf8: "utf8_bytes",
  b16: "b16_bytes",
  b64: "b64_bytes",
} as const satisfies Record<ByteEncoding, ByteStringType2["kind"]>;

/** Build the literal Type2 for a Value */
export function valueToType2(value: Value, span?: SourceSpan): Type2 {
  switch (value.type) {
    case "int":
      return { kind: "int_value", value: value.value, span };
    case "uint":
      return { kind: "uint_value", value: value.value, span };
    case "float":
      return { kind: "float_value", value: value.value, span };
    case "text":
      return { kind: "text_value", value: value.value, span };
    case "bytes":
      return { kind: BYTE_KINDS[value.encoding], value: value.value, span };
  }
}

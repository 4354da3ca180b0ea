/**
 * Compact text rendering of AST nodes, used in diagnostics and tree listings.
 * Comments and original whitespace are not kept.
 */

import type {
  ByteEncoding,
  GenericArgs,
  GenericParams,
  Group,
  GroupChoice,
  GroupEntry,
  Identifier,
  MemberKey,
  NonMemberKey,
  Occurrence,
  Operator,
  Rule,
  Type,
  Type1,
  Type2,
  Value,
} from "./ast.js";

const TEXT_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
};

/** Quote decoded text, escaping what the lexer unescapes */
function quoteText(text: string): string {
  return `"${text.replace(/[\\"\n\t\r]/g, (char) => TEXT_ESCAPES[char] ?? char)}"`;
}

function formatFloat(value: number): string {
  const text = String(value);
  // Exponent forms such as 1e+21 already read as floats
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function formatBytes(encoding: ByteEncoding, bytes: string): string {
  const body = bytes.replace(/'/g, "\\'");
  if (encoding === "b16") return `h'${body}'`;
  if (encoding === "b64") return `b64'${body}'`;
  return `'${body}'`;
}

export function formatValue(value: Value): string {
  switch (value.type) {
    case "int":
    case "uint":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "text":
      return quoteText(value.value);
    case "bytes":
      return formatBytes(value.encoding, value.value);
  }
}

export function formatIdentifier(ident: Identifier): string {
  return `${ident.socket ?? ""}${ident.ident}`;
}

export function formatGenericParams(params: GenericParams): string {
  return `<${params.params.map((p) => formatIdentifier(p.param)).join(", ")}>`;
}

export function formatGenericArgs(args: GenericArgs): string {
  return `<${args.args.map((a) => formatType1(a.arg)).join(", ")}>`;
}

export function formatType(t: Type): string {
  return t.typeChoices.map((tc) => formatType1(tc.type1)).join(" / ");
}

export function formatType1(t1: Type1): string {
  const type2 = formatType2(t1.type2);
  return t1.operator ? `${type2} ${formatOperator(t1.operator)}` : type2;
}

export function formatOperator(op: Operator): string {
  const symbol =
    op.operator.kind === "range" ? (op.operator.inclusive ? ".." : "...") : `.${op.operator.name}`;
  return `${symbol} ${formatType2(op.type2)}`;
}

export function formatType2(t2: Type2): string {
  const args = (genericArgs?: GenericArgs): string => (genericArgs ? formatGenericArgs(genericArgs) : "");

  switch (t2.kind) {
    case "int_value":
    case "uint_value":
      return t2.value.toString();
    case "float_value":
      return formatFloat(t2.value);
    case "text_value":
      return quoteText(t2.value);
    case "utf8_bytes":
      return formatBytes("utf8", t2.value);
    case "b16_bytes":
      return formatBytes("b16", t2.value);
    case "b64_bytes":
      return formatBytes("b64", t2.value);
    case "typename":
      return `${formatIdentifier(t2.ident)}${args(t2.genericArgs)}`;
    case "parenthesized_type":
      return `(${formatType(t2.pt)})`;
    case "map":
      return `{ ${formatGroup(t2.group)} }`;
    case "array":
      return `[ ${formatGroup(t2.group)} ]`;
    case "unwrap":
      return `~${formatIdentifier(t2.ident)}${args(t2.genericArgs)}`;
    case "choice_from_inline_group":
      return `&( ${formatGroup(t2.group)} )`;
    case "choice_from_group":
      return `&${formatIdentifier(t2.ident)}${args(t2.genericArgs)}`;
    case "tagged_data":
      return `#6${t2.tag === undefined ? "" : `.${t2.tag}`}(${formatType(t2.t)})`;
    case "data_major_type":
      return `#${t2.mt}${t2.constraint === undefined ? "" : `.${t2.constraint}`}`;
    case "any":
      return "#";
  }
}

export function formatGroup(group: Group): string {
  return group.groupChoices.map(formatGroupChoice).join(" // ");
}

export function formatGroupChoice(choice: GroupChoice): string {
  return choice.groupEntries
    .map(({ entry, trailingComma }) => `${formatGroupEntry(entry)}${trailingComma ? "," : ""}`)
    .join(" ");
}

export function formatOccurrence(occurrence: Occurrence): string {
  const occur = occurrence.occur;
  switch (occur.kind) {
    case "optional":
      return "?";
    case "zero_or_more":
      return "*";
    case "one_or_more":
      return "+";
    case "exact":
      return `${occur.lower ?? ""}*${occur.upper ?? ""}`;
  }
}

export function formatMemberKey(key: MemberKey): string {
  switch (key.kind) {
    case "type1":
      return `${formatType1(key.t1)}${key.isCut ? " ^" : ""} =>`;
    case "bareword":
      return `${formatIdentifier(key.ident)}:`;
    case "value":
      return `${formatValue(key.value)}:`;
    case "non_member_key":
      return `${formatNonMemberKey(key.nonMemberKey)} =>`;
  }
}

export function formatNonMemberKey(key: NonMemberKey): string {
  return key.kind === "group" ? `(${formatGroup(key.group)})` : `(${formatType(key.type)})`;
}

export function formatGroupEntry(entry: GroupEntry): string {
  const prefix = (occur?: Occurrence): string => (occur ? `${formatOccurrence(occur)} ` : "");

  switch (entry.kind) {
    case "value_member_key": {
      const { occur, memberKey, entryType } = entry.ge;
      const key = memberKey ? `${formatMemberKey(memberKey)} ` : "";
      return `${prefix(occur)}${key}${formatType(entryType)}`;
    }
    case "type_groupname": {
      const { occur, name, genericArgs } = entry.ge;
      return `${prefix(occur)}${formatIdentifier(name)}${genericArgs ? formatGenericArgs(genericArgs) : ""}`;
    }
    case "inline_group":
      return `${prefix(entry.occur)}( ${formatGroup(entry.group)} )`;
  }
}

export function formatRule(rule: Rule): string {
  const inner = rule.rule;
  const params = inner.genericParams ? formatGenericParams(inner.genericParams) : "";
  const name = `${formatIdentifier(inner.name)}${params}`;

  if (inner.kind === "type_rule") {
    return `${name} ${inner.isTypeChoiceAlternate ? "/=" : "="} ${formatType(inner.value)}`;
  }
  return `${name} ${inner.isGroupChoiceAlternate ? "//=" : "="} ${formatGroupEntry(inner.entry)}`;
}

/**
 * Shared document loading and rendering helpers for CLI commands
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import {
  type CDDL,
  type CddlError,
  type ParentIndexEntry,
  type ParseResult,
  type Rule,
  formatRule,
  parse,
} from "@cddl-tree/core";

export interface LoadedDocument {
  path: string;
  source: string;
  result: ParseResult;
}

export interface ErrorSummary {
  code: string;
  message: string;
  line?: number;
  column?: number;
}

export async function loadDocument(path: string): Promise<LoadedDocument> {
  const source = await readFile(path, "utf8");
  return { path, source, result: parse(source) };
}

/**
 * Expand the given paths into .cddl files, searching directories recursively.
 * Plain files are kept whatever their extension.
 */
export async function collectCddlFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const path of paths) {
    const info = await stat(path);
    if (info.isDirectory()) {
      files.push(...(await collectFromDirectory(path)));
    } else {
      files.push(path);
    }
  }

  return files;
}

async function collectFromDirectory(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFromDirectory(fullPath)));
      continue;
    }

    if (entry.isFile() && entry.name.endsWith(".cddl")) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

export function summarizeError(error: CddlError): ErrorSummary {
  return {
    code: error.code,
    message: error.message,
    line: error.location?.line,
    column: error.location?.column,
  };
}

export function describeRule(rule: Rule): string {
  const inner = rule.rule;
  if (inner.kind === "type_rule") {
    return inner.isTypeChoiceAlternate ? "type choice alternate" : "type rule";
  }
  return inner.isGroupChoiceAlternate ? "group choice alternate" : "group rule";
}

/** AST as JSON; integer literals become decimal strings */
export function astToJson(cddl: CDDL, pretty = false): string {
  return JSON.stringify(
    cddl,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    pretty ? 2 : undefined
  );
}

/** One line per rule: kind and compact text */
export function summarizeRules(cddl: CDDL): string[] {
  return cddl.rules.map((rule) => `${describeRule(rule).padEnd(22)} ${formatRule(rule)}`);
}

export function formatEntryLine(entry: ParentIndexEntry): string {
  const parent = entry.parent === undefined ? "" : ` <- #${entry.parent}`;
  const children =
    entry.children.length === 0 ? "" : ` -> ${entry.children.map((child) => `#${child}`).join(", ")}`;
  return `#${entry.index} ${entry.kind} ${entry.label}${parent}${children}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

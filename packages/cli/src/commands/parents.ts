/**
 * Parents Command
 * Builds the parent index for a CDDL file and lists every node with its
 * parent and children
 */

import { type NodeKind, PARENT_KINDS, type ParentIndexEntry, buildParentIndex, formatErrors } from "@cddl-tree/core";
import chalk from "chalk";
import ora from "ora";
import { errorMessage, formatEntryLine, loadDocument } from "./document.js";

interface ParentsOptions {
  kind?: string;
  json?: boolean;
}

function isNodeKindName(value: string): value is NodeKind {
  return Object.keys(PARENT_KINDS).includes(value);
}

/** Entries of the given kind, or all entries */
export function selectEntries(entries: ParentIndexEntry[], kind?: NodeKind): ParentIndexEntry[] {
  return kind === undefined ? entries : entries.filter((entry) => entry.kind === kind);
}

export async function parentsCommand(file: string, options: ParentsOptions): Promise<void> {
  let kind: NodeKind | undefined;
  if (options.kind !== undefined) {
    if (!isNodeKindName(options.kind)) {
      console.log(chalk.red(`Unknown node kind: ${options.kind}`));
      console.log(chalk.dim(`Kinds: ${Object.keys(PARENT_KINDS).join(", ")}`));
      process.exit(1);
    }
    kind = options.kind;
  }

  const spinner = ora(`Indexing ${file}...`).start();

  try {
    const { result } = await loadDocument(file);
    if (!result.success) {
      spinner.fail(chalk.red(`Parsing failed with ${result.errors.length} error(s)`));
      console.log(chalk.red(formatErrors(result.errors)));
      process.exit(1);
    }

    const index = buildParentIndex(result.cddl);
    const entries = selectEntries(index.entries(), kind);
    spinner.succeed(chalk.green(`Indexed ${index.size} node(s)`));

    if (options.json) {
      console.log(JSON.stringify(entries, null, 2));
      return;
    }

    console.log();
    for (const entry of entries) {
      console.log(`  ${formatEntryLine(entry)}`);
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to index: ${errorMessage(error)}`));
    process.exit(1);
  }
}

/**
 * Parse Command
 * Parses a CDDL file and prints its rules or AST
 */

import { writeFile } from "node:fs/promises";
import { formatErrors } from "@cddl-tree/core";
import chalk from "chalk";
import ora from "ora";
import { astToJson, errorMessage, loadDocument, summarizeRules } from "./document.js";

interface ParseOptions {
  output?: string;
  json?: boolean;
  pretty?: boolean;
}

export async function parseCommand(file: string, options: ParseOptions): Promise<void> {
  const spinner = ora(`Parsing ${file}...`).start();

  try {
    const { result } = await loadDocument(file);

    if (!result.success) {
      spinner.fail(chalk.red(`Parsing failed with ${result.errors.length} error(s)`));
      console.log(chalk.red(formatErrors(result.errors)));
      process.exit(1);
    }

    spinner.succeed(chalk.green(`Parsed ${result.cddl.rules.length} rule(s)`));

    if (options.json || options.output) {
      const json = astToJson(result.cddl, options.pretty);

      if (options.output) {
        await writeFile(options.output, json);
        console.log(chalk.dim(`AST written to ${options.output}`));
      } else {
        console.log(json);
      }
      return;
    }

    console.log();
    for (const line of summarizeRules(result.cddl)) {
      console.log(`  ${line}`);
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to parse: ${errorMessage(error)}`));
    process.exit(1);
  }
}

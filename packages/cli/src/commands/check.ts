/**
 * Check Command
 * Parses every given CDDL file (or every .cddl file under a directory)
 * and reports all errors
 */

import { relative } from "node:path";
import chalk from "chalk";
import {
  type ErrorSummary,
  collectCddlFiles,
  errorMessage,
  loadDocument,
  summarizeError,
} from "./document.js";

interface CheckOptions {
  failFast?: boolean;
  json?: boolean;
}

type CheckResultSummary = {
  file: string;
  success: boolean;
  rules: number;
  errors: ErrorSummary[];
};

export async function checkCommand(paths: string[], options: CheckOptions): Promise<void> {
  let files: string[];
  try {
    files = await collectCddlFiles(paths);
  } catch (error) {
    console.log(chalk.red(`Failed to read input: ${errorMessage(error)}`));
    process.exit(1);
  }

  if (files.length === 0) {
    console.log(chalk.yellow("No .cddl files found"));
    process.exit(1);
  }

  const results: CheckResultSummary[] = [];
  let hasErrors = false;

  for (const file of files) {
    const summary = await checkFile(file);
    results.push(summary);

    if (!options.json) {
      if (summary.success) {
        console.log(chalk.green(`✓ ${summary.file}`) + chalk.dim(` (${summary.rules} rules)`));
      } else {
        console.log(chalk.red(`✗ ${summary.file}`));
      }

      for (const error of summary.errors) {
        const lineInfo = error.line !== undefined ? ` (line ${error.line})` : "";
        console.log(chalk.red(`  [${error.code}] ${error.message}${lineInfo}`));
      }
    }

    if (!summary.success) {
      hasErrors = true;
      if (options.failFast) {
        break;
      }
    }
  }

  if (options.json) {
    console.log(JSON.stringify(results, null, 2));
  }

  if (hasErrors) {
    process.exit(1);
  }
}

export async function checkFile(file: string): Promise<CheckResultSummary> {
  const display = relative(process.cwd(), file) || file;

  try {
    const { result } = await loadDocument(file);
    return {
      file: display,
      success: result.success,
      rules: result.success ? result.cddl.rules.length : 0,
      errors: result.errors.map(summarizeError),
    };
  } catch (error) {
    return {
      file: display,
      success: false,
      rules: 0,
      errors: [{ code: "FILE_READ_ERROR", message: `Failed to read file: ${errorMessage(error)}` }],
    };
  }
}

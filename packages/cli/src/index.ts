#!/usr/bin/env node
/**
 * cddl-tree CLI
 * Command-line interface for parsing and inspecting CDDL schemas
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { parentsCommand } from "./commands/parents.js";
import { parseCommand } from "./commands/parse.js";

const program = new Command();

program
  .name("cddl-tree")
  .description("Parse CDDL schemas and navigate their syntax trees")
  .version("0.1.0");

// Parse command
program
  .command("parse <file>")
  .description("Parse a CDDL file and list its rules")
  .option("-o, --output <file>", "Output file for AST JSON")
  .option("--json", "Print the AST as JSON")
  .option("--pretty", "Pretty print JSON output")
  .action(parseCommand);

// Check command
program
  .command("check <paths...>")
  .description("Report parse errors in CDDL files or directories")
  .option("--fail-fast", "Stop after the first failure")
  .option("--json", "Output results as JSON")
  .action(checkCommand);

// Parents command
program
  .command("parents <file>")
  .description("List every node of a CDDL file with its parent and children")
  .option("-k, --kind <kind>", "Only list nodes of this kind")
  .option("--json", "Output results as JSON")
  .action(parentsCommand);

// Parse and run
await program.parseAsync();

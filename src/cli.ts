#!/usr/bin/env node

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  listIdsCommand,
  listKindsCommand,
  runCommand,
  validateCommand,
  whereDefinedCommand,
  whereUsedCommand,
  type CommandResult,
  type IdOptions,
  type ListIdsOptions,
  type ListKindsOptions,
  type ValidateOptions,
  type WhereUsedOptions,
} from "./commands.js";

const __filename_cli = fileURLToPath(import.meta.url);
const __dirname_cli = dirname(__filename_cli);
const pkg: unknown = JSON.parse(readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8"));
const cliPkgVersion =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

async function emit(action: () => Promise<CommandResult>): Promise<void> {
  const { stdout, exitCode } = await runCommand(action);
  console.log(stdout);
  process.exitCode = exitCode;
}

const program = new Command();

program
  .name("tracemark")
  .description("Validate marker-annotated Markdown artifacts against their templates")
  .version(cliPkgVersion)
  .option("--root <dir>", "Project root (default: current directory)")
  .option("--config <path>", "Config file (default: <root>/.tracemark.json)");

program
  .command("validate")
  .description("Validate one artifact, or every registered artifact")
  .option("--artifact <path>", "Artifact to validate")
  .addOption(new Option("--format <format>", "Output format").choices(["json", "markdown"]).default("json"))
  .action(async (_opts, cmd: Command) => {
    await emit(() => validateCommand(cmd.optsWithGlobals<ValidateOptions>()));
  });

program
  .command("list-ids")
  .description("List ID definitions across registered artifacts")
  .option("--artifact <path>", "Only IDs defined in this artifact")
  .option("--pattern <pattern>", "Substring filter on the ID")
  .option("--regex", "Treat --pattern as a regular expression")
  .option("--kind <kind>", "Only IDs from id:<kind> blocks")
  .option("--all", "Include every occurrence, duplicates too")
  .action(async (_opts, cmd: Command) => {
    await emit(() => listIdsCommand(cmd.optsWithGlobals<ListIdsOptions>()));
  });

program
  .command("where-defined")
  .description("Find where an ID is defined")
  .requiredOption("--id <id>", "ID to look up")
  .action(async (_opts, cmd: Command) => {
    await emit(() => whereDefinedCommand(cmd.optsWithGlobals<IdOptions>()));
  });

program
  .command("where-used")
  .description("Find every reference to an ID (any version)")
  .requiredOption("--id <id>", "ID to look up")
  .option("--include-definitions", "Also list the ID's definitions")
  .action(async (_opts, cmd: Command) => {
    await emit(() => whereUsedCommand(cmd.optsWithGlobals<WhereUsedOptions>()));
  });

program
  .command("list-kinds")
  .description("List ID kinds declared by templates, with definition counts")
  .option("--artifact <path>", "Only this artifact")
  .action(async (_opts, cmd: Command) => {
    await emit(() => listKindsCommand(cmd.optsWithGlobals<ListKindsOptions>()));
  });

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});

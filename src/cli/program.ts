import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig } from "../core/config";
import { setLogLevel } from "../logger";
import {
  OUTPUT_FORMATS,
  checkLinksCommand,
  fixFrontmatterCommand,
  fixLinksCommand,
  reportCommand,
  type CommandContext,
  type FixFrontmatterOptions,
  type FixLinksOptions,
  type ReportOptions,
  type ScopeOptions,
} from "./commands";

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function context(configPath: string | undefined): CommandContext {
  const config = loadConfig(configPath);
  setLogLevel(config.paths.log_level);
  return {
    config,
    env: process.env,
    write: (text) => process.stdout.write(text),
  };
}

// Declaring both forms leaves `recursive` undefined when neither is passed.
function withScopeOptions(command: Command): Command {
  return command
    .option("-f, --file <path>", "analyse a single markdown file")
    .option("-d, --dir <path>", "analyse one directory instead of the corpus")
    .option("--recursive", "scan subdirectories (default: analysis.recursive)")
    .option("--no-recursive", "only scan the top level of the directory")
    .option("--timeout <ms>", "abort the scan after this many milliseconds", parseCount)
    .option("-c, --config <path>", "configuration file");
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("docs-health")
    .description("Documentation consistency and quality checks for a markdown corpus")
    .version("1.0.0");

  withScopeOptions(program.command("report"))
    .description("Analyse the corpus and render a health report")
    .addOption(
      new Option("--format <format>", "output format")
        .choices(OUTPUT_FORMATS)
        .default("text"),
    )
    .option("-o, --output <path>", "write the report to this file")
    .option("--lint-issues <count>", "markdown lint findings from an external linter", parseCount)
    .option("--no-history", "do not append a row to the history file")
    .action(async (options: ReportOptions & { config?: string }) => {
      process.exitCode = await reportCommand(options, context(options.config));
    });

  withScopeOptions(program.command("check-links"))
    .description("List broken internal references")
    .action(async (options: ScopeOptions & { config?: string }) => {
      process.exitCode = await checkLinksCommand(options, context(options.config));
    });

  withScopeOptions(program.command("fix-links"))
    .description("Rewrite broken references that match a document by file name")
    .option("--dry-run", "print the proposed fixes without writing")
    .action(async (options: FixLinksOptions & { config?: string }) => {
      process.exitCode = await fixLinksCommand(options, context(options.config));
    });

  withScopeOptions(program.command("fix-frontmatter"))
    .description("Add missing title, description and last_updated fields")
    .option("--dry-run", "print the fields that would be added without writing")
    .action(async (options: FixFrontmatterOptions & { config?: string }) => {
      process.exitCode = await fixFrontmatterCommand(options, context(options.config));
    });

  return program;
}

#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { loadConfig, ConfigError } from "./lib/config.js";
import { CLI_NAME, PACKAGE_VERSION } from "./lib/branding.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function reportFailure(what: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  console.error(`Fatal error during ${what}:`, error);
  process.exit(1);
}

program
  .name(CLI_NAME)
  .description("Curates vulnerability-fix commits into masked, verified repair tasks")
  .version(PACKAGE_VERSION)
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    const opts: { config?: string } = thisCommand.opts();
    globalConfigPath = opts.config;
  });

program
  .command("curate")
  .description("Run the mask/describe/verify loop over every pending commit")
  .option("--max-iters <n>", "Maximum iterations per commit", positiveInt)
  .option("--concurrency <n>", "Commits processed in parallel", positiveInt)
  .option("--no-resume", "Reprocess commits already in the task dataset or rejection log")
  .option("--render", "Write a companion rendering for each accepted task")
  .action(async (options: { maxIters?: number; concurrency?: number; resume: boolean; render?: boolean }) => {
    try {
      const loaded = await loadConfig(globalConfigPath);
      const { curateCommand } = await import("./commands/curate.js");
      await curateCommand(loaded, options);
    } catch (error) {
      reportFailure("curation", error);
    }
  });

program
  .command("stats")
  .description("Write per-task edit statistics of the task dataset")
  .action(async () => {
    try {
      const loaded = await loadConfig(globalConfigPath);
      const { statsCommand } = await import("./commands/stats.js");
      await statsCommand(loaded);
    } catch (error) {
      reportFailure("stats", error);
    }
  });

program
  .command("render")
  .description("Re-render every task of the dataset for inspection")
  .action(async () => {
    try {
      const loaded = await loadConfig(globalConfigPath);
      const { renderCommand } = await import("./commands/render.js");
      await renderCommand(loaded);
    } catch (error) {
      reportFailure("render", error);
    }
  });

program
  .command("check-config")
  .description("Validate and print the effective configuration")
  .option("--json", "Output in JSON format")
  .action(async (options: { json?: boolean }) => {
    try {
      const { checkConfigCommand } = await import("./commands/check-config.js");
      await checkConfigCommand(globalConfigPath, options);
    } catch (error) {
      reportFailure("configuration check", error);
    }
  });

await program.parseAsync(process.argv);

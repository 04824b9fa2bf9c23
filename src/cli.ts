#!/usr/bin/env node

/** CLI entry point for clickup-import. */

import { Command } from "commander";
import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { loadConfig, configExists, createDefaultConfig, resolveSettings, CONFIG_PATH } from "./config.js";
import { describeFailure } from "./errors.js";
import { runImport } from "./importer.js";
import { createLogger } from "./logger.js";

interface ImportCommandOptions {
  csvFile: string;
  listId?: string;
  apiToken?: string;
  dryRun?: boolean;
  output?: string;
  verbose?: boolean;
  config: string;
}

const program = new Command();

program
  .name("clickup-import")
  .description("Bulk-create ClickUp tasks from the rows of a CSV file.")
  .version("0.1.0");

// ─── import ────────────────────────────────────────────────────────
program
  .command("import", { isDefault: true })
  .description("Create one ClickUp task per CSV row")
  .requiredOption("--csv-file <path>", "Path to the CSV file")
  .option("--list-id <id>", "ClickUp list ID (or CLICKUP_LIST_ID)")
  .option("--api-token <token>", "ClickUp API token (or CLICKUP_API_TOKEN)")
  .option("--dry-run", "Show what would happen without creating tasks")
  .option("-o, --output <path>", "Write a results CSV to this path")
  .option("-v, --verbose", "Enable debug logging")
  .option("--config <path>", "Config file to read", CONFIG_PATH)
  .action(async (opts: ImportCommandOptions) => {
    const logger = createLogger({ verbose: opts.verbose });

    try {
      const settings = resolveSettings(opts, process.env, loadConfig(opts.config));
      const mode = opts.dryRun ? "DRY RUN import" : "import";
      console.log(`Starting ${mode} from ${opts.csvFile} to list ${settings.listId}...`);

      await runImport(
        {
          csvFile: opts.csvFile,
          listId: settings.listId,
          token: settings.token,
          baseUrl: settings.baseUrl,
          dryRun: opts.dryRun,
          output: opts.output,
        },
        { logger },
      );
    } catch (e: unknown) {
      logger.error(describeFailure(e));
      process.exitCode = 1;
    }
  });

// ─── setup ─────────────────────────────────────────────────────────
program
  .command("setup")
  .description("Interactive first-time setup: create the config file")
  .action(async () => {
    console.log("=== clickup-import setup ===\n");

    if (configExists()) {
      console.log("Config file already exists. Edit it at:");
      console.log(`  ${CONFIG_PATH}`);
      return;
    }

    console.log("To get a personal API token:");
    console.log("  1. Open ClickUp and go to Settings > Apps");
    console.log('  2. Click "Generate" under API Token and copy it\n');

    const rl = createInterface({ input: stdin, output: stdout });
    const token = await rl.question("Paste your API token (or press Enter to skip): ");
    rl.close();

    const path = createDefaultConfig(token.trim());
    console.log(`\nConfig created at: ${path}`);
    console.log("Set list_id there, then try:");
    console.log("  clickup-import --csv-file tasks.csv --dry-run");
  });

await program.parseAsync();

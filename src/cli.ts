#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import {
  createPatchClient,
  resolveConfig,
  runPatchReport,
  runTitlesExport,
  runTrendReport,
  TOOL_VERSION
} from "./index.js";
import type { ConfigOverrides, ConnectionFlags } from "./index.js";
import { ACTIVE_MODES } from "./config/schema.js";
import type { ActiveMode } from "./config/schema.js";
import { errorMessage, exitCodeFor } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";
import { createTerminalPrompt, promptForTitles } from "./utils/prompt.js";

interface ConnectionOptions extends ConnectionFlags {
  config?: string;
  insecure?: boolean;
  verbose?: boolean;
}

interface ReportCommandOptions extends ConnectionOptions {
  titlesFile?: string;
  interactive?: boolean;
  globalMinVersion?: string;
  activeMode?: ActiveMode;
  topList?: string;
  days?: number;
  org?: string;
  out?: string;
  exportTitles?: string;
}

interface TitlesCommandOptions extends ConnectionOptions {
  output: string;
  includeIds?: boolean;
  includeCurrentVersion?: boolean;
}

interface TrendCommandOptions {
  config?: string;
  inputDir?: string;
  timeframeDays?: number;
  maxSnapshots?: number;
  out?: string;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option("--url <url>", "Jamf Pro base URL (or PBR_URL)")
    .option("--client-id <id>", "API client ID (or PBR_CLIENT_ID)")
    .option("--client-secret <secret>", "API client secret (or PBR_CLIENT_SECRET)")
    .option("--username <name>", "API username (or PBR_USERNAME)")
    .option("--password <password>", "API password (or PBR_PASSWORD)")
    .option("--insecure", "Disable TLS certificate verification", false)
    .option("--config <path>", "Config file path")
    .option("--verbose", "Verbose logging", false);
}

function connectionFlags(options: ConnectionOptions): ConnectionFlags {
  return {
    url: options.url,
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    username: options.username,
    password: options.password
  };
}

async function runCommand(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(errorMessage(error));
    process.exitCode = exitCodeFor(error);
  }
}

const program = new Command();
program.name("pbr").description("Patch baseline compliance reports").version(TOOL_VERSION);

addConnectionOptions(
  program
    .command("report")
    .description("Build a compliance report against baselines or the vendor's latest versions")
    .option("--titles-file <path>", "CSV (title,min_version) or plain list of titles")
    .option("--interactive", "Pick titles and baselines interactively", false)
    .option("--global-min-version <version>", "Baseline for titles without one")
    .addOption(
      new Option("--active-mode <mode>", "Activity handling in vendor-latest mode").choices(
        ACTIVE_MODES
      )
    )
    .option("--top-list <path>", "File of title names or IDs to highlight")
    .option("--days <n>", "Active window in days", parseInteger)
    .option("--org <name>", "Organization name for the report header")
    .option("--out <dir>", "Output directory")
    .option("--export-titles <path>", "Also write the catalog of titles and IDs as CSV")
).action(async (options: ReportCommandOptions) => {
  await runCommand(async () => {
    const logger = createLogger(options.verbose ?? false);
    const overrides: ConfigOverrides = {
      days: options.days,
      activeMode: options.activeMode,
      organization: options.org,
      outDir: options.out,
      insecure: options.insecure
    };
    const config = await resolveConfig(options.config, overrides);
    const client = createPatchClient(config, connectionFlags(options), logger);
    await runPatchReport(
      {
        config,
        titlesFile: options.titlesFile,
        interactive: options.interactive,
        globalMinVersion: options.globalMinVersion,
        topList: options.topList,
        exportTitles: options.exportTitles
      },
      {
        client,
        logger,
        pickTitles: (catalog) => promptForTitles(catalog, createTerminalPrompt())
      }
    );
  });
});

addConnectionOptions(
  program
    .command("titles")
    .description("Export every patch title as a baseline template CSV")
    .option("--output <path>", "Output CSV path", "all_titles_template.csv")
    .option("--include-ids", "Include the title_id column", false)
    .option("--include-current-version", "Include the current_version column (one request per title)", false)
).action(async (options: TitlesCommandOptions) => {
  await runCommand(async () => {
    const logger = createLogger(options.verbose ?? false);
    const config = await resolveConfig(options.config, { insecure: options.insecure });
    const client = createPatchClient(config, connectionFlags(options), logger);
    await runTitlesExport(
      {
        output: options.output,
        includeIds: options.includeIds ?? false,
        includeCurrentVersion: options.includeCurrentVersion ?? false
      },
      { client, logger }
    );
  });
});

program
  .command("trend")
  .description("Merge dated compliance exports into a trend history")
  .option("--input-dir <dir>", "Directory of dated CSV exports")
  .option("--timeframe-days <n>", "Only use exports created within this many days", parseInteger)
  .option("--max-snapshots <n>", "Number of most recent exports to merge", parseInteger)
  .option("--out <dir>", "Output directory")
  .option("--config <path>", "Config file path")
  .option("--verbose", "Verbose logging", false)
  .action(async (options: TrendCommandOptions) => {
    await runCommand(async () => {
      const logger = createLogger(options.verbose ?? false);
      const config = await resolveConfig(options.config, {
        inputDir: options.inputDir,
        timeframeDays: options.timeframeDays,
        maxSnapshots: options.maxSnapshots,
        outDir: options.out
      });
      await runTrendReport({ config }, logger);
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = exitCodeFor(error);
});

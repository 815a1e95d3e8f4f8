import path from "node:path";
import { createRequire } from "node:module";
import { z } from "zod";
import { JamfProClient } from "./api/jamfClient.js";
import type { PatchApi } from "./api/jamfClient.js";
import { calculateActiveRatio } from "./core/activity.js";
import type { FleetActivityRatio } from "./core/activity.js";
import {
  isBaselineMode,
  parseBaselineFile,
  parseBaselineText,
  resolveBaselines
} from "./core/baselines.js";
import type {
  BaselineEntry,
  BaselineSelection,
  BaselineSource,
  TrackedItem
} from "./core/baselines.js";
import {
  buildOverallRows,
  buildTitleDetail,
  runBaselineCompliance,
  selectTopTitles
} from "./core/compliance.js";
import type { ComplianceSummary, OverallRow, PatchSummary } from "./core/compliance.js";
import { buildTrendHistory, failureDistribution } from "./core/trend.js";
import { defaultConfig } from "./config/defaultConfig.js";
import { loadConfig, validateConfig } from "./config/loadConfig.js";
import type { ActiveMode, Config, ReportFormat } from "./config/schema.js";
import { toCsv } from "./report/csv.js";
import { formatPatchReportMarkdown, formatTrendMarkdown } from "./report/markdown.js";
import { buildPatchReport, SCHEMA_VERSION } from "./report/summary.js";
import type {
  PatchReport,
  ReportInfo,
  SkippedTitle,
  TitleDetailEntry,
  TrendReport
} from "./report/summary.js";
import {
  baselineSummaryTable,
  detailTable,
  overallTable,
  reportInfoTable,
  titlesTemplateTable,
  trendTable
} from "./report/tables.js";
import type { Table, TitleTemplateRow } from "./report/tables.js";
import { readSnapshots, selectSnapshotSources } from "./trend/snapshots.js";
import { parseCredentials } from "./utils/auth.js";
import type { CredentialFlags } from "./utils/auth.js";
import { errorMessage, ReportError, UsageError } from "./utils/errors.js";
import {
  pathExists,
  readText,
  toSlug,
  validateOutputDirectory,
  writeJson,
  writeText
} from "./utils/fs.js";
import { silentLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";
import { durationMs, formatReportDate, nowIso } from "./utils/timing.js";
import { normalizeServerUrl } from "./utils/url.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

export const TOOL_VERSION = pkg.version;

export type { PatchApi } from "./api/jamfClient.js";
export type { Config } from "./config/schema.js";
export type { PatchReport, TrendReport } from "./report/summary.js";
export { SCHEMA_VERSION } from "./report/summary.js";
export { compareVersions, isAtLeast, normalizeVersion } from "./core/version.js";

export interface ConfigOverrides {
  days?: number;
  activeMode?: ActiveMode;
  organization?: string;
  outDir?: string;
  insecure?: boolean;
  formats?: ReportFormat[];
  inputDir?: string;
  timeframeDays?: number;
  maxSnapshots?: number;
}

export interface ConnectionFlags extends CredentialFlags {
  url?: string;
}

export type TitlePicker = (catalog: TrackedItem[]) => Promise<BaselineSelection[]>;

export interface RunContext {
  client: PatchApi;
  logger?: Logger;
  /** Drives the interactive selection; required when `interactive` is set. */
  pickTitles?: TitlePicker;
}

export interface ReportRunOptions {
  config: Config;
  titlesFile?: string | null;
  interactive?: boolean;
  globalMinVersion?: string | null;
  topList?: string | null;
  exportTitles?: string | null;
  now?: Date;
}

export interface TitlesExportOptions {
  output: string;
  includeIds: boolean;
  includeCurrentVersion: boolean;
}

export interface TrendRunOptions {
  config: Config;
  now?: Date;
  createdAt?: (filePath: string) => Promise<Date>;
}

export interface RunOutcome<T> {
  report: T;
  outDir: string;
  /** Written files, relative to `outDir`. */
  files: string[];
}

export interface TitlesExportOutcome {
  path: string;
  titles: number;
  /** Titles whose current version could not be looked up; their cell is left blank. */
  skipped: SkippedTitle[];
}

function resolveInsideCwd(target: string): string {
  const resolved = path.resolve(process.cwd(), target);
  try {
    validateOutputDirectory(resolved);
  } catch (error) {
    throw new UsageError(errorMessage(error), { cause: error });
  }
  return resolved;
}

/** Loads the optional config file over the defaults, then applies CLI overrides. */
export async function resolveConfig(
  configPath: string | undefined,
  overrides: ConfigOverrides = {}
): Promise<Config> {
  let base = defaultConfig;
  if (configPath) {
    try {
      base = await loadConfig(path.resolve(process.cwd(), configPath));
    } catch (error) {
      throw new UsageError(errorMessage(error), { cause: error });
    }
  }

  const candidate: Config = {
    server: {
      ...base.server,
      ...(overrides.insecure ? { insecure: true } : {})
    },
    activity: {
      windowDays: overrides.days ?? base.activity.windowDays,
      mode: overrides.activeMode ?? base.activity.mode
    },
    report: {
      ...base.report,
      outDir: overrides.outDir ?? base.report.outDir,
      organization: overrides.organization ?? base.report.organization,
      formats: overrides.formats ?? base.report.formats
    },
    trend: {
      ...base.trend,
      inputDir: overrides.inputDir ?? base.trend.inputDir,
      timeframeDays: overrides.timeframeDays ?? base.trend.timeframeDays,
      maxSnapshots: overrides.maxSnapshots ?? base.trend.maxSnapshots
    }
  };

  try {
    return validateConfig(candidate);
  } catch (error) {
    throw new UsageError(errorMessage(error), { cause: error });
  }
}

export function createPatchClient(
  config: Config,
  flags: ConnectionFlags,
  logger: Logger = silentLogger,
  env: NodeJS.ProcessEnv = process.env
): JamfProClient {
  const server = normalizeServerUrl(flags.url ?? env.PBR_URL ?? config.server.url);
  const credentials = parseCredentials(flags, env);
  if (server.plaintext) {
    logger.warn("Server URL uses plain http; credentials are sent unencrypted");
  }
  if (config.server.insecure) {
    logger.warn("TLS certificate verification is disabled");
  }
  return new JamfProClient({
    baseUrl: server.baseUrl,
    credentials,
    timeoutMs: config.server.timeoutMs,
    pageSize: config.server.pageSize,
    inventoryPageSize: config.server.inventoryPageSize,
    insecure: config.server.insecure,
    logger
  });
}

async function readTopList(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await readText(filePath);
  } catch (error) {
    throw new UsageError(`Top list not found or unreadable: ${filePath}`, { cause: error });
  }
  return parseBaselineText(text, "list").map((entry) => entry.title);
}

async function writeTable(outDir: string, fileName: string, table: Table): Promise<string> {
  await writeText(path.join(outDir, fileName), toCsv(table.headers, table.rows));
  return fileName;
}

function detailFileName(index: number, title: string): string {
  return `details/${String(index + 1).padStart(2, "0")}-${toSlug(title, "title")}.csv`;
}

async function collectBaselineReport(
  options: ReportRunOptions,
  context: RunContext,
  catalog: TrackedItem[],
  fileEntries: BaselineEntry[] | null,
  now: Date
): Promise<{
  source: BaselineSource;
  summaries: ComplianceSummary[];
  details: TitleDetailEntry[];
}> {
  const logger = context.logger ?? silentLogger;
  let interactiveSelections: BaselineSelection[] | null = null;
  if (!fileEntries && options.interactive) {
    if (!context.pickTitles) {
      throw new UsageError("Interactive selection needs a terminal");
    }
    interactiveSelections = await context.pickTitles(catalog);
    if (interactiveSelections.length === 0) {
      throw new UsageError("No titles selected in interactive mode.");
    }
  }

  const resolved = resolveBaselines(
    {
      catalog,
      fileEntries,
      interactiveSelections,
      globalMinVersion: options.globalMinVersion
    },
    logger
  );
  if (resolved.source === "file" && resolved.selections.length === 0) {
    throw new ReportError("No valid titles resolved from the titles file");
  }
  logger.info(`Evaluating ${resolved.selections.length} title(s) against baselines`, {
    source: resolved.source
  });

  const results = await runBaselineCompliance(
    resolved.selections,
    (identifier) => context.client.patchReport(identifier),
    { windowDays: options.config.activity.windowDays, now, logger }
  );

  return {
    source: resolved.source,
    summaries: results.map((result) => result.summary),
    details: results.map((result) => ({
      title: result.selection.displayName,
      titleId: result.selection.identifier,
      file: null,
      rows: result.details
    }))
  };
}

async function collectVendorLatestReport(
  options: ReportRunOptions,
  context: RunContext,
  catalog: TrackedItem[],
  topPicks: string[] | null,
  now: Date
): Promise<{
  fleetActivity: FleetActivityRatio;
  overall: OverallRow[];
  topTitles: OverallRow[] | null;
  details: TitleDetailEntry[];
  skipped: SkippedTitle[];
}> {
  const logger = context.logger ?? silentLogger;
  const { windowDays, mode } = options.config.activity;
  const skipped: SkippedTitle[] = [];

  logger.info("Fetching inventory to compute active ratio");
  const inventory = await context.client.listInventory(["GENERAL"]);
  const fleetActivity = calculateActiveRatio(inventory, windowDays, now);
  logger.info("Inventory totals", {
    total: fleetActivity.totalDevices,
    active: fleetActivity.activeDevices,
    ratio: fleetActivity.ratio.toFixed(4)
  });

  const summaries: { title: TrackedItem; summary: PatchSummary }[] = [];
  for (const title of catalog) {
    try {
      summaries.push({ title, summary: await context.client.patchSummary(title.identifier) });
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Summary failed for ${title.displayName}: ${reason}`);
      skipped.push({ title: title.displayName, titleId: title.identifier, stage: "summary", reason });
    }
  }

  const overall = buildOverallRows(summaries, fleetActivity.ratio);
  const topTitles = topPicks ? selectTopTitles(overall, topPicks) : null;

  // Per-record mode filters detail rows; ratio mode lists every row.
  const detailWindow = mode === "per_record" ? windowDays : 0;
  const details: TitleDetailEntry[] = [];
  for (const title of catalog.slice(0, options.config.report.maxDetailTitles)) {
    try {
      const rows = await context.client.patchReport(title.identifier);
      const detail = buildTitleDetail(title, rows, detailWindow, now);
      details.push({
        title: title.displayName,
        titleId: title.identifier,
        file: null,
        rows: detail.details
      });
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Detail fetch failed for ${title.displayName}: ${reason}`);
      skipped.push({ title: title.displayName, titleId: title.identifier, stage: "detail", reason });
    }
  }

  return { fleetActivity, overall, topTitles, details, skipped };
}

async function writePatchReport(
  report: PatchReport,
  outDir: string,
  formats: ReportFormat[]
): Promise<string[]> {
  const files: string[] = [];

  if (formats.includes("csv")) {
    files.push(await writeTable(outDir, "report_info.csv", reportInfoTable(report.info)));
    if (report.baselineSummary) {
      files.push(
        await writeTable(outDir, "baseline_summary.csv", baselineSummaryTable(report.baselineSummary))
      );
    }
    if (report.overall) {
      files.push(await writeTable(outDir, "overall_summary.csv", overallTable(report.overall)));
    }
    if (report.topTitles) {
      files.push(
        await writeTable(outDir, "top_titles.csv", overallTable(report.topTitles, "Top_Titles"))
      );
    }
    for (const detail of report.details) {
      if (detail.file) {
        files.push(await writeTable(outDir, detail.file, detailTable(detail.title, detail.rows)));
      }
    }
  }

  if (formats.includes("markdown")) {
    await writeText(path.join(outDir, "report.md"), formatPatchReportMarkdown(report));
    files.push("report.md");
  }

  if (formats.includes("json")) {
    await writeJson(path.join(outDir, "summary.json"), report);
    files.push("summary.json");
  }

  return files;
}

/**
 * Produces one compliance report. Baseline mode is chosen when a titles
 * file, interactive selection or global minimum version is given;
 * otherwise the vendor-latest report runs.
 */
export async function runPatchReport(
  options: ReportRunOptions,
  context: RunContext
): Promise<RunOutcome<PatchReport>> {
  const logger = context.logger ?? silentLogger;
  const { config } = options;
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const outDir = resolveInsideCwd(config.report.outDir);
  const baselineMode = isBaselineMode(options);

  // Local inputs are read before any request is made.
  const fileEntries = options.titlesFile ? await parseBaselineFile(options.titlesFile) : null;
  let topPicks: string[] | null = null;
  if (options.topList) {
    if (baselineMode) {
      logger.warn("--top-list applies to the vendor-latest report only; ignoring it");
    } else {
      topPicks = await readTopList(options.topList);
    }
  }

  const catalog = await context.client.listPatchTitles();
  logger.info(`Found ${catalog.length} patch title(s)`);

  if (options.exportTitles) {
    const exportPath = resolveInsideCwd(options.exportTitles);
    const table = titlesTemplateTable(
      catalog.map((item) => ({ title: item.displayName, titleId: item.identifier, currentVersion: "" })),
      { includeIds: true, includeCurrentVersion: false }
    );
    await writeText(exportPath, toCsv(table.headers, table.rows));
    logger.info(`Wrote patch titles list: ${exportPath}`);
  }

  const info: ReportInfo = {
    organization: config.report.organization ?? "",
    reportDate: formatReportDate(now),
    activeWindowDays: config.activity.windowDays,
    mode: baselineMode ? "baseline" : "vendor_latest",
    activeMode: baselineMode ? null : config.activity.mode
  };
  const writeCsv = config.report.formats.includes("csv");
  const withFiles = (details: TitleDetailEntry[]): TitleDetailEntry[] =>
    details.map((detail, index) => ({
      ...detail,
      file: writeCsv ? detailFileName(index, detail.title) : null
    }));

  let report: PatchReport;
  if (baselineMode) {
    const result = await collectBaselineReport(options, context, catalog, fileEntries, now);
    report = buildPatchReport({
      toolVersion: TOOL_VERSION,
      generatedAt: now.toISOString(),
      durationMs: durationMs(startTime),
      info,
      baselineSource: result.source,
      baselineSummary: result.summaries,
      details: withFiles(result.details)
    });
  } else {
    const result = await collectVendorLatestReport(options, context, catalog, topPicks, now);
    report = buildPatchReport({
      toolVersion: TOOL_VERSION,
      generatedAt: now.toISOString(),
      durationMs: durationMs(startTime),
      info,
      fleetActivity: result.fleetActivity,
      overall: result.overall,
      topTitles: result.topTitles,
      details: withFiles(result.details),
      skipped: result.skipped
    });
  }

  const files = await writePatchReport(report, outDir, config.report.formats);
  logger.info(`Report written: ${outDir}`, { files: files.length });
  return { report, outDir, files };
}

/** Writes the baseline template CSV for every catalog title. */
export async function runTitlesExport(
  options: TitlesExportOptions,
  context: RunContext
): Promise<TitlesExportOutcome> {
  const logger = context.logger ?? silentLogger;
  const outputPath = resolveInsideCwd(options.output);
  const catalog = await context.client.listPatchTitles();
  logger.info(`Found ${catalog.length} patch title(s)`);

  const skipped: SkippedTitle[] = [];
  const rows: TitleTemplateRow[] = [];
  for (const item of catalog) {
    let currentVersion = "";
    if (options.includeCurrentVersion) {
      try {
        currentVersion = (await context.client.patchSummary(item.identifier)).latestVersion;
      } catch (error) {
        const reason = errorMessage(error);
        logger.warn(`Current version lookup failed for ${item.displayName}: ${reason}`);
        skipped.push({
          title: item.displayName,
          titleId: item.identifier,
          stage: "current_version",
          reason
        });
      }
    }
    rows.push({ title: item.displayName, titleId: item.identifier, currentVersion });
  }

  const table = titlesTemplateTable(rows, options);
  await writeText(outputPath, toCsv(table.headers, table.rows));
  logger.info(`Wrote ${rows.length} title(s) to ${outputPath}`);
  if (options.includeCurrentVersion) {
    logger.info("current_version required one extra request per title");
  }
  return { path: outputPath, titles: rows.length, skipped };
}

/** Merges dated snapshot exports into a trend history. */
export async function runTrendReport(
  options: TrendRunOptions,
  logger: Logger = silentLogger
): Promise<RunOutcome<TrendReport>> {
  const { config } = options;
  const inputDir = path.resolve(process.cwd(), config.trend.inputDir);
  const outDir = resolveInsideCwd(config.report.outDir);
  if (!(await pathExists(inputDir))) {
    throw new UsageError(`Snapshot directory not found: ${inputDir}`);
  }

  const sources = await selectSnapshotSources(inputDir, {
    timeframeDays: config.trend.timeframeDays,
    maxSnapshots: config.trend.maxSnapshots,
    now: options.now,
    createdAt: options.createdAt,
    logger
  });
  if (sources.length === 0) {
    throw new ReportError(`No snapshot files found in ${inputDir} within the timeframe`);
  }

  const snapshots = await readSnapshots(sources, config.trend.columns, logger);
  const history = buildTrendHistory(snapshots);
  const last = snapshots[snapshots.length - 1];

  const report: TrendReport = {
    schemaVersion: SCHEMA_VERSION,
    toolVersion: TOOL_VERSION,
    generatedAt: options.now ? options.now.toISOString() : nowIso(),
    sources: sources.map((source) => ({
      file: path.basename(source.sourceHandle),
      dateKey: source.dateKey
    })),
    history,
    latest: last
      ? {
          dateKey: last.dateKey,
          distribution: failureDistribution(last.points, config.trend.thresholds)
        }
      : null
  };

  const labels = {
    entityKey: config.trend.columns.entityKey,
    displayLabel: config.trend.columns.displayLabel
  };
  const files: string[] = [];
  const { formats } = config.report;
  if (formats.includes("csv")) {
    files.push(await writeTable(outDir, "trend.csv", trendTable(history, labels)));
  }
  if (formats.includes("markdown")) {
    await writeText(path.join(outDir, "trend.md"), formatTrendMarkdown(report, labels));
    files.push("trend.md");
  }
  if (formats.includes("json")) {
    await writeJson(path.join(outDir, "trend.json"), report);
    files.push("trend.json");
  }

  logger.info(`Trend written: ${outDir}`, { snapshots: sources.length, files: files.length });
  return { report, outDir, files };
}

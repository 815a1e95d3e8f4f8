import { roundTo } from "../core/compliance.js";
import type { FailureCategory } from "../core/trend.js";
import type { CsvCell } from "./csv.js";
import type { PatchReport, TrendReport } from "./summary.js";
import { baselineSummaryTable, overallTable, trendTable } from "./tables.js";
import type { Table } from "./tables.js";

const CATEGORIES: [FailureCategory, string][] = [
  ["pass", "Pass"],
  ["low", "Low"],
  ["medium", "Medium"],
  ["high", "High"]
];

function escapeCell(value: CsvCell): string {
  if (value === null || value === undefined || value === "") {
    return "";
  }
  return String(value).replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function formatPercent(value: number): string {
  return `${Number(value.toFixed(2)).toString()}%`;
}

export function renderTable(lines: string[], table: Table): void {
  lines.push(`| ${table.headers.map(escapeCell).join(" | ")} |`);
  lines.push(`|${table.headers.map(() => "---").join("|")}|`);
  for (const row of table.rows) {
    lines.push(`| ${row.map(escapeCell).join(" | ")} |`);
  }
  lines.push("");
}

export function formatPatchReportMarkdown(report: PatchReport): string {
  const lines: string[] = [];
  const { info } = report;

  lines.push("# Patch Compliance Report");
  lines.push("");
  if (info.organization) {
    lines.push(`- **Organization**: ${info.organization}`);
  }
  lines.push(`- **Report date**: ${info.reportDate}`);
  lines.push(`- **Mode**: ${info.mode === "baseline" ? "baseline" : "vendor latest"}`);
  lines.push(`- **Active window**: ${info.activeWindowDays} days`);
  if (info.activeMode) {
    lines.push(`- **Active mode**: ${info.activeMode}`);
  }
  if (report.baselineSource) {
    lines.push(`- **Baselines from**: ${report.baselineSource}`);
  }
  lines.push("");

  if (report.rollup) {
    lines.push("## Rollup");
    lines.push("");
    lines.push("| Metric | Value |");
    lines.push("|---|---:|");
    lines.push(`| Titles | ${report.rollup.titles} |`);
    lines.push(`| Active devices | ${report.rollup.activeDevices} |`);
    lines.push(`| Compliant | ${report.rollup.compliantDevices} |`);
    lines.push(`| Non-compliant | ${report.rollup.nonCompliantDevices} |`);
    lines.push(`| Compliance | ${formatPercent(report.rollup.compliancePercent)} |`);
    lines.push("");
  }

  if (report.baselineSummary) {
    lines.push("## Baseline Summary");
    lines.push("");
    renderTable(lines, baselineSummaryTable(report.baselineSummary));
  }

  if (report.fleetActivity) {
    const { totalDevices, activeDevices, ratio } = report.fleetActivity;
    lines.push("## Fleet Activity");
    lines.push("");
    lines.push(`- **Inventory**: ${totalDevices} devices`);
    lines.push(`- **Active**: ${activeDevices} devices`);
    lines.push(`- **Active ratio**: ${roundTo(ratio, 4)}`);
    lines.push("");
  }

  if (report.topTitles && report.topTitles.length > 0) {
    lines.push("## Top Titles");
    lines.push("");
    renderTable(lines, overallTable(report.topTitles, "Top_Titles"));
  }

  if (report.overall) {
    lines.push("## Overall Summary");
    lines.push("");
    renderTable(lines, overallTable(report.overall));
  }

  if (report.details.length > 0) {
    lines.push("## Details");
    lines.push("");
    lines.push("| Title | Devices | File |");
    lines.push("|---|---:|---|");
    for (const detail of report.details) {
      lines.push(
        `| ${escapeCell(detail.title)} | ${detail.rows.length} | ${detail.file ? `\`${detail.file}\`` : "n/a"} |`
      );
    }
    lines.push("");
  }

  if (report.skipped.length > 0) {
    lines.push("## Skipped");
    lines.push("");
    for (const skipped of report.skipped) {
      lines.push(`- ${skipped.title} (${skipped.stage}): ${skipped.reason}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function formatTrendMarkdown(
  report: TrendReport,
  labels: { entityKey: string; displayLabel: string }
): string {
  const lines: string[] = [];
  lines.push("# Compliance Trend Report");
  lines.push("");
  lines.push(`- **Generated**: ${report.generatedAt}`);
  lines.push(`- **Snapshots**: ${report.sources.map((source) => source.dateKey).join(", ")}`);
  lines.push("");

  if (report.latest) {
    lines.push(`## Latest Snapshot (${report.latest.dateKey})`);
    lines.push("");
    lines.push("| Category | Devices |");
    lines.push("|---|---:|");
    for (const [category, label] of CATEGORIES) {
      lines.push(`| ${label} | ${report.latest.distribution[category]} |`);
    }
    lines.push("");
  }

  lines.push("## Trend Analysis");
  lines.push("");
  renderTable(lines, trendTable(report.history, labels));
  return lines.join("\n");
}

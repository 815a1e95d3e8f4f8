import type { ComplianceSummary, DeviceDetailRow, OverallRow } from "../core/compliance.js";
import { roundTo } from "../core/compliance.js";
import type { TrendHistory } from "../core/trend.js";
import type { CsvCell } from "./csv.js";

/** A plain labelled table, ready to be written as CSV or Markdown. */
export interface Table {
  name: string;
  headers: string[];
  rows: CsvCell[][];
}

export const BASELINE_SUMMARY_HEADERS = [
  "Title",
  "Baseline (>=)",
  "Active Devices",
  "Compliant (>= baseline)",
  "Non-Compliant",
  "Compliance %"
];

export const OVERALL_HEADERS = [
  "Title",
  "Title ID",
  "Latest Version",
  "Release Date",
  "Hosts (All)",
  "Patched (All)",
  "Out-of-date (All)",
  "Completion % (All)",
  "Patched (Active-scaled)",
  "Out-of-date (Active-scaled)",
  "Completion % (Active-scaled)"
];

export const DETAIL_HEADERS = [
  "Computer Name",
  "Username",
  "Device ID",
  "OS Version",
  "Last Contact Time",
  "Installed Version"
];

export const COMPLIANT_HEADER = "Compliant (>= baseline)";

export function baselineSummaryTable(summaries: ComplianceSummary[]): Table {
  return {
    name: "Baseline_Summary",
    headers: BASELINE_SUMMARY_HEADERS,
    rows: summaries.map((summary) => [
      summary.displayName,
      summary.baseline,
      summary.activeDeviceCount,
      summary.compliantCount,
      summary.nonCompliantCount,
      summary.compliancePercent
    ])
  };
}

export function overallTable(rows: OverallRow[], name = "Overall_Summary"): Table {
  return {
    name,
    headers: OVERALL_HEADERS,
    rows: rows.map((row) => [
      row.title,
      row.titleId,
      row.latestVersion,
      row.releaseDate,
      row.hostsAll,
      row.patchedAll,
      row.outOfDateAll,
      row.completionAll,
      row.patchedScaled,
      row.outOfDateScaled,
      row.completionScaled
    ])
  };
}

/** The compliance column is present only when some row was classified. */
export function detailTable(name: string, rows: DeviceDetailRow[]): Table {
  const classified = rows.some((row) => row.compliant !== null);
  return {
    name,
    headers: classified ? [...DETAIL_HEADERS, COMPLIANT_HEADER] : DETAIL_HEADERS,
    rows: rows.map((row) => {
      const cells: CsvCell[] = [
        row.computerName,
        row.username,
        row.deviceId,
        row.osVersion,
        row.lastContactTime,
        row.installedVersion
      ];
      if (classified) {
        cells.push(row.compliant ? "Yes" : "No");
      }
      return cells;
    })
  };
}

export function reportInfoTable(info: {
  organization: string;
  reportDate: string;
  activeWindowDays: number;
}): Table {
  return {
    name: "Report_Info",
    headers: ["Organization", "Report Date", "Active Window (days)"],
    rows: [[info.organization, info.reportDate, info.activeWindowDays]]
  };
}

/** Absent cells stay blank; averages are rounded to 2 decimals. */
export function trendTable(
  history: TrendHistory,
  labels: { entityKey: string; displayLabel: string }
): Table {
  return {
    name: "Trend Analysis",
    headers: [labels.entityKey, labels.displayLabel, ...history.dates],
    rows: history.rows.map((row) => [
      row.entityKey,
      row.displayLabel,
      ...history.dates.map((date) => {
        const value = row.values[date];
        if (value === undefined) {
          return null;
        }
        return row.kind === "average" ? roundTo(value, 2) : value;
      })
    ])
  };
}

export interface TitleTemplateRow {
  title: string;
  titleId: string;
  currentVersion: string;
}

/** Baseline template: `title,min_version`, with optional `title_id` and `current_version`. */
export function titlesTemplateTable(
  titles: TitleTemplateRow[],
  options: { includeIds: boolean; includeCurrentVersion: boolean }
): Table {
  const headers = ["title"];
  if (options.includeIds) {
    headers.push("title_id");
  }
  headers.push("min_version");
  if (options.includeCurrentVersion) {
    headers.push("current_version");
  }

  return {
    name: "Titles",
    headers,
    rows: titles.map((row) => {
      const cells: CsvCell[] = [row.title];
      if (options.includeIds) {
        cells.push(row.titleId);
      }
      cells.push("");
      if (options.includeCurrentVersion) {
        cells.push(row.currentVersion);
      }
      return cells;
    })
  };
}

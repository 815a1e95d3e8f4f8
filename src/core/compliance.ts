import { z } from "zod";
import { filterActive } from "./activity.js";
import { isRecord } from "./pagination.js";
import { isAtLeast } from "./version.js";
import type { BaselineSelection, TrackedItem } from "./baselines.js";
import { silentLogger, withContext } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export const NO_BASELINE_LABEL = "(none)";

export interface DeviceRecord {
  computerName: string;
  username: string;
  deviceId: string;
  osVersion: string;
  lastContactTime: string;
  installedVersion: string;
}

export interface DeviceDetailRow extends DeviceRecord {
  /** Baseline classification; `null` when no baseline was evaluated. */
  compliant: boolean | null;
}

export interface ComplianceSummary {
  displayName: string;
  baseline: string;
  activeDeviceCount: number;
  compliantCount: number;
  nonCompliantCount: number;
  compliancePercent: number;
}

export interface TitleCompliance {
  selection: BaselineSelection;
  summary: ComplianceSummary;
  details: DeviceDetailRow[];
}

export interface TitleDetail {
  title: TrackedItem;
  details: DeviceDetailRow[];
}

export interface PatchSummary {
  latestVersion: string;
  releaseDate: string;
  hostsOnLatestVersion: number;
  hostsOutOfDate: number;
}

export interface OverallRow {
  title: string;
  titleId: string;
  latestVersion: string;
  releaseDate: string;
  hostsAll: number;
  patchedAll: number;
  outOfDateAll: number;
  completionAll: number;
  patchedScaled: number;
  outOfDateScaled: number;
  completionScaled: number;
}

export type FetchDeviceRecords = (identifier: string) => Promise<unknown[]>;

export interface BaselineRunOptions {
  windowDays: number;
  now?: Date;
  logger?: Logger;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function stringField(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

export function toDeviceRecord(raw: unknown): DeviceRecord {
  const row = isRecord(raw) ? raw : {};
  return {
    computerName: stringField(row, "computerName"),
    username: stringField(row, "username"),
    deviceId: stringField(row, "deviceId"),
    osVersion: stringField(row, "operatingSystemVersion"),
    lastContactTime: stringField(row, "lastContactTime"),
    installedVersion: stringField(row, "version").trim()
  };
}

/**
 * Classifies active devices against one baseline. The non-compliant count is
 * derived from the active count and never drops below zero.
 */
export function summarizeCompliance(
  selection: BaselineSelection,
  records: DeviceRecord[],
  windowDays: number,
  now: Date = new Date()
): { summary: ComplianceSummary; details: DeviceDetailRow[] } {
  const active = filterActive(records, windowDays, now);
  let compliantCount = 0;
  const details = active.map((record): DeviceDetailRow => {
    const compliant = isAtLeast(record.installedVersion, selection.minVersion);
    if (compliant) {
      compliantCount++;
    }
    return { ...record, compliant };
  });

  const activeDeviceCount = active.length;
  return {
    summary: {
      displayName: selection.displayName,
      baseline: selection.minVersion || NO_BASELINE_LABEL,
      activeDeviceCount,
      compliantCount,
      nonCompliantCount: Math.max(activeDeviceCount - compliantCount, 0),
      compliancePercent:
        activeDeviceCount > 0 ? roundTo((compliantCount / activeDeviceCount) * 100, 2) : 0
    },
    details
  };
}

/**
 * Collects and classifies each selection in turn. A failed collection aborts
 * the run; nothing partial is returned.
 */
export async function runBaselineCompliance(
  selections: BaselineSelection[],
  fetchRecords: FetchDeviceRecords,
  options: BaselineRunOptions
): Promise<TitleCompliance[]> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? new Date();
  const results: TitleCompliance[] = [];

  for (const selection of selections) {
    const titleLogger = withContext(logger, { title: selection.displayName });
    titleLogger.info("Fetching patch report");
    const rows = await fetchRecords(selection.identifier);
    const { summary, details } = summarizeCompliance(
      selection,
      rows.map(toDeviceRecord),
      options.windowDays,
      now
    );
    titleLogger.debug("Classified devices", {
      fetched: rows.length,
      active: summary.activeDeviceCount,
      compliant: summary.compliantCount
    });
    results.push({ selection, summary, details });
  }
  return results;
}

// ---------------------------------------------------------------------------
// Vendor-latest mode
// ---------------------------------------------------------------------------

const hostCount = z.coerce.number().int().nonnegative().catch(0);
const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish()
  .catch(null);

const PatchSummarySchema = z.object({
  latestVersion: optionalText,
  releaseDate: optionalText,
  releaseDateTime: optionalText,
  hostsOnLatestVersion: hostCount,
  hostsOutOfDate: hostCount
});

/** Narrows a per-title patch summary, which may arrive as a one-element array. */
export function toPatchSummary(raw: unknown): PatchSummary {
  const candidate = Array.isArray(raw) ? raw[0] : raw;
  const parsed = PatchSummarySchema.parse(isRecord(candidate) ? candidate : {});
  const releaseDate = parsed.releaseDate || parsed.releaseDateTime || "";
  return {
    latestVersion: parsed.latestVersion ?? "",
    releaseDate: releaseDate.slice(0, 10),
    hostsOnLatestVersion: parsed.hostsOnLatestVersion,
    hostsOutOfDate: parsed.hostsOutOfDate
  };
}

/** Percentage of patched hosts, rounded to 2 decimals; 0 when there are no hosts. */
export function completionPercent(patched: number, outOfDate: number): number {
  const total = patched + outOfDate;
  return total > 0 ? roundTo((patched / total) * 100, 2) : 0;
}

export function scaleCount(count: number, ratio: number): number {
  return Math.round(count * ratio);
}

/**
 * Builds the overall table. Scaled counts are rounded before the scaled
 * completion is recomputed from them, so `patchedScaled + outOfDateScaled`
 * can differ from `round(hostsAll * ratio)`.
 */
export function buildOverallRow(title: TrackedItem, summary: PatchSummary, ratio: number): OverallRow {
  const patchedAll = summary.hostsOnLatestVersion;
  const outOfDateAll = summary.hostsOutOfDate;
  const patchedScaled = scaleCount(patchedAll, ratio);
  const outOfDateScaled = scaleCount(outOfDateAll, ratio);

  return {
    title: title.displayName,
    titleId: title.identifier,
    latestVersion: summary.latestVersion,
    releaseDate: summary.releaseDate,
    hostsAll: patchedAll + outOfDateAll,
    patchedAll,
    outOfDateAll,
    completionAll: completionPercent(patchedAll, outOfDateAll),
    patchedScaled,
    outOfDateScaled,
    completionScaled: completionPercent(patchedScaled, outOfDateScaled)
  };
}

export function buildOverallRows(
  summaries: { title: TrackedItem; summary: PatchSummary }[],
  ratio: number
): OverallRow[] {
  return summaries.map(({ title, summary }) => buildOverallRow(title, summary, ratio));
}

/** Rows whose title or title ID appears in `picks` (case-insensitive). */
export function selectTopTitles(rows: OverallRow[], picks: string[]): OverallRow[] {
  const wanted = new Set(picks.map((pick) => pick.trim().toLowerCase()).filter(Boolean));
  return rows.filter(
    (row) => wanted.has(row.title.toLowerCase()) || wanted.has(row.titleId.toLowerCase())
  );
}

/** Detail rows for vendor-latest mode: no baseline, optional per-record activity filter. */
export function buildTitleDetail(
  title: TrackedItem,
  rows: unknown[],
  windowDays: number,
  now: Date = new Date()
): TitleDetail {
  const records = filterActive(rows.map(toDeviceRecord), windowDays, now);
  return {
    title,
    details: records.map((record) => ({ ...record, compliant: null }))
  };
}

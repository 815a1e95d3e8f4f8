import type { FleetActivityRatio } from "../core/activity.js";
import type { BaselineSource } from "../core/baselines.js";
import { roundTo } from "../core/compliance.js";
import type { ComplianceSummary, DeviceDetailRow, OverallRow } from "../core/compliance.js";
import type { FailureDistribution, TrendHistory } from "../core/trend.js";
import type { ActiveMode } from "../config/schema.js";

export const SCHEMA_VERSION = "1.0.0";

export type ReportMode = "baseline" | "vendor_latest";

export interface ReportInfo {
  organization: string;
  reportDate: string;
  activeWindowDays: number;
  mode: ReportMode;
  /** How activity was applied in vendor-latest mode; null in baseline mode. */
  activeMode: ActiveMode | null;
}

export interface TitleDetailEntry {
  title: string;
  titleId: string;
  /** Detail CSV path relative to the output directory, when written. */
  file: string | null;
  rows: DeviceDetailRow[];
}

export interface SkippedTitle {
  title: string;
  titleId: string;
  stage: "summary" | "detail" | "current_version";
  reason: string;
}

export interface BaselineRollup {
  titles: number;
  activeDevices: number;
  compliantDevices: number;
  nonCompliantDevices: number;
  compliancePercent: number;
}

export interface PatchReport {
  schemaVersion: string;
  toolVersion: string;
  generatedAt: string;
  durationMs: number;
  info: ReportInfo;
  baselineSource: BaselineSource | null;
  baselineSummary: ComplianceSummary[] | null;
  rollup: BaselineRollup | null;
  fleetActivity: FleetActivityRatio | null;
  overall: OverallRow[] | null;
  topTitles: OverallRow[] | null;
  details: TitleDetailEntry[];
  skipped: SkippedTitle[];
}

export interface TrendReport {
  schemaVersion: string;
  toolVersion: string;
  generatedAt: string;
  sources: { file: string; dateKey: string }[];
  history: TrendHistory;
  latest: { dateKey: string; distribution: FailureDistribution } | null;
}

/** Totals across every baseline summary, device counts summed per title. */
export function buildBaselineRollup(summaries: ComplianceSummary[]): BaselineRollup {
  const activeDevices = summaries.reduce((sum, item) => sum + item.activeDeviceCount, 0);
  const compliantDevices = summaries.reduce((sum, item) => sum + item.compliantCount, 0);
  return {
    titles: summaries.length,
    activeDevices,
    compliantDevices,
    nonCompliantDevices: Math.max(activeDevices - compliantDevices, 0),
    compliancePercent: activeDevices > 0 ? roundTo((compliantDevices / activeDevices) * 100, 2) : 0
  };
}

export function buildPatchReport(params: {
  toolVersion: string;
  generatedAt: string;
  durationMs: number;
  info: ReportInfo;
  baselineSource?: BaselineSource | null;
  baselineSummary?: ComplianceSummary[] | null;
  fleetActivity?: FleetActivityRatio | null;
  overall?: OverallRow[] | null;
  topTitles?: OverallRow[] | null;
  details: TitleDetailEntry[];
  skipped?: SkippedTitle[];
}): PatchReport {
  const baselineSummary = params.baselineSummary ?? null;
  return {
    schemaVersion: SCHEMA_VERSION,
    toolVersion: params.toolVersion,
    generatedAt: params.generatedAt,
    durationMs: params.durationMs,
    info: params.info,
    baselineSource: params.baselineSource ?? null,
    baselineSummary,
    rollup: baselineSummary ? buildBaselineRollup(baselineSummary) : null,
    fleetActivity: params.fleetActivity ?? null,
    overall: params.overall ?? null,
    topTitles: params.topTitles ?? null,
    details: params.details,
    skipped: params.skipped ?? []
  };
}

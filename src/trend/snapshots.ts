import path from "node:path";
import { readdir } from "node:fs/promises";
import { parseCsvRecords } from "../report/csv.js";
import type { SnapshotPoint, TrendSnapshot } from "../core/trend.js";
import { fileCreatedAt, readText } from "../utils/fs.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import { MS_PER_DAY } from "../utils/timing.js";

export interface SnapshotSource {
  /** Path of the export file. */
  sourceHandle: string;
  /** `YYYY-MM-DD` taken from the file name. */
  dateKey: string;
}

export interface SnapshotColumns {
  entityKey: string;
  displayLabel: string;
  failureCount: string;
}

export interface SnapshotSelectionOptions {
  timeframeDays: number;
  maxSnapshots: number;
  now?: Date;
  logger?: Logger;
  /** Creation-time lookup; defaults to the file's birth time. */
  createdAt?: (filePath: string) => Promise<Date>;
}

const FILE_NAME_DATE = /(\d{4}-\d{2}-\d{2})T\d{2}_\d{2}_\d{2}/;

/** `2025-03-20` from `Compliance_2025-03-20T08_15_00.csv`; null when absent. */
export function extractDateKey(fileName: string): string | null {
  const match = FILE_NAME_DATE.exec(path.basename(fileName));
  return match?.[1] ?? null;
}

/**
 * Picks the export files to merge: `*.csv` created within the timeframe and
 * carrying a date in their name, ordered oldest to newest, keeping only the
 * most recent `maxSnapshots`.
 */
export async function selectSnapshotSources(
  inputDir: string,
  options: SnapshotSelectionOptions
): Promise<SnapshotSource[]> {
  const logger = options.logger ?? silentLogger;
  const createdAt = options.createdAt ?? fileCreatedAt;
  const now = options.now ?? new Date();
  const cutoff = now.getTime() - options.timeframeDays * MS_PER_DAY;

  const entries = await readdir(inputDir, { withFileTypes: true });
  const csvFiles = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".csv"))
    .map((entry) => path.join(inputDir, entry.name))
    .sort();

  const sources: SnapshotSource[] = [];
  for (const filePath of csvFiles) {
    const created = await createdAt(filePath);
    if (created.getTime() < cutoff) {
      logger.debug("Skipping snapshot outside timeframe", { file: path.basename(filePath) });
      continue;
    }
    const dateKey = extractDateKey(filePath);
    if (!dateKey) {
      logger.debug("Skipping snapshot without a date in its name", { file: path.basename(filePath) });
      continue;
    }
    sources.push({ sourceHandle: filePath, dateKey });
  }

  sources.sort((left, right) => left.dateKey.localeCompare(right.dateKey));
  return sources.slice(-options.maxSnapshots);
}

function parseCount(raw: string): number | null {
  const text = raw.trim();
  if (!/^-?\d+(\.\d+)?$/.test(text)) {
    return null;
  }
  return Number(text);
}

/** Converts one export into points; rows without a key or a numeric count are skipped. */
export function snapshotPointsFromCsv(
  text: string,
  dateKey: string,
  columns: SnapshotColumns,
  logger: Logger = silentLogger
): SnapshotPoint[] {
  const { headers, records } = parseCsvRecords(text);
  const missing = [columns.entityKey, columns.failureCount].filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    logger.warn(`Snapshot for ${dateKey} is missing column(s): ${missing.join(", ")}`);
    return [];
  }

  const points: SnapshotPoint[] = [];
  records.forEach((record, index) => {
    const entityKey = (record[columns.entityKey] ?? "").trim();
    const failureCount = parseCount(record[columns.failureCount] ?? "");
    if (!entityKey || failureCount === null) {
      logger.debug("Skipping snapshot row", { dateKey, row: index + 2 });
      return;
    }
    points.push({
      entityKey,
      displayLabel: (record[columns.displayLabel] ?? "").trim(),
      dateKey,
      failureCount
    });
  });
  return points;
}

export async function readSnapshots(
  sources: SnapshotSource[],
  columns: SnapshotColumns,
  logger: Logger = silentLogger
): Promise<TrendSnapshot[]> {
  const snapshots: TrendSnapshot[] = [];
  for (const source of sources) {
    logger.info(`Processing snapshot for ${source.dateKey}`, { file: path.basename(source.sourceHandle) });
    const text = await readText(source.sourceHandle);
    snapshots.push({
      dateKey: source.dateKey,
      points: snapshotPointsFromCsv(text, source.dateKey, columns, logger)
    });
  }
  return snapshots;
}

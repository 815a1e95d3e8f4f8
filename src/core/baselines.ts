import { extname } from "node:path";
import { parseCsvRecords } from "../report/csv.js";
import { BaselineFileError } from "../utils/errors.js";
import { readText } from "../utils/fs.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface TrackedItem {
  identifier: string;
  displayName: string;
}

export interface BaselineSelection {
  identifier: string;
  displayName: string;
  /** Minimum acceptable version; empty means no floor. */
  minVersion: string;
}

/** A title named in a baseline file, not yet matched against the catalog. */
export interface BaselineEntry {
  title: string;
  minVersion: string;
}

export type BaselineFileKind = "csv" | "list";

export interface BaselineSources {
  catalog: TrackedItem[];
  fileEntries?: BaselineEntry[] | null;
  interactiveSelections?: BaselineSelection[] | null;
  globalMinVersion?: string | null;
}

export type BaselineSource = "file" | "interactive" | "catalog";

export interface ResolvedBaselines {
  source: BaselineSource;
  selections: BaselineSelection[];
}

export const TITLE_COLUMN = "title";
export const MIN_VERSION_COLUMN = "min_version";

export function baselineFileKind(path: string): BaselineFileKind {
  return extname(path).toLowerCase() === ".csv" ? "csv" : "list";
}

export function parseBaselineText(text: string, kind: BaselineFileKind): BaselineEntry[] {
  if (kind === "list") {
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
      .map((title) => ({ title, minVersion: "" }));
  }

  const { headers, records } = parseCsvRecords(text);
  if (!headers.includes(TITLE_COLUMN)) {
    throw new BaselineFileError(
      `Baseline CSV must include a '${TITLE_COLUMN}' column; '${MIN_VERSION_COLUMN}' is optional`
    );
  }

  return records
    .map((record) => ({
      title: (record[TITLE_COLUMN] ?? "").trim(),
      minVersion: (record[MIN_VERSION_COLUMN] ?? "").trim()
    }))
    .filter((entry) => entry.title.length > 0);
}

export async function parseBaselineFile(path: string): Promise<BaselineEntry[]> {
  let text: string;
  try {
    text = await readText(path);
  } catch (error) {
    throw new BaselineFileError(`Titles file not found or unreadable: ${path}`, { cause: error });
  }
  return parseBaselineText(text, baselineFileKind(path));
}

/** Keeps the first selection for each identifier. */
export function dedupeSelections(selections: BaselineSelection[]): BaselineSelection[] {
  const seen = new Set<string>();
  const unique: BaselineSelection[] = [];
  for (const selection of selections) {
    if (seen.has(selection.identifier)) {
      continue;
    }
    seen.add(selection.identifier);
    unique.push(selection);
  }
  return unique;
}

/** Case-insensitive display name lookup; the first catalog entry wins on a name clash. */
export function buildNameIndex(catalog: TrackedItem[]): Map<string, TrackedItem> {
  const index = new Map<string, TrackedItem>();
  for (const item of catalog) {
    const key = item.displayName.toLowerCase();
    if (!index.has(key)) {
      index.set(key, item);
    }
  }
  return index;
}

/**
 * Matches file entries to catalog items by exact, case-insensitive name.
 * Names with no match are dropped with a warning.
 */
export function resolveEntries(
  entries: BaselineEntry[],
  catalog: TrackedItem[],
  logger: Logger = silentLogger
): BaselineSelection[] {
  const index = buildNameIndex(catalog);
  const resolved: BaselineSelection[] = [];
  for (const entry of entries) {
    const item = index.get(entry.title.toLowerCase());
    if (!item) {
      logger.warn(`Title not found in catalog, skipping: '${entry.title}'`);
      continue;
    }
    resolved.push({
      identifier: item.identifier,
      displayName: entry.title,
      minVersion: entry.minVersion
    });
  }
  return resolved;
}

export function catalogDefaults(catalog: TrackedItem[]): BaselineSelection[] {
  return catalog.map((item) => ({
    identifier: item.identifier,
    displayName: item.displayName,
    minVersion: ""
  }));
}

/** Fills empty baselines with `globalMinVersion`; explicit baselines are kept. */
export function applyGlobalDefault(
  selections: BaselineSelection[],
  globalMinVersion: string | null | undefined
): BaselineSelection[] {
  const fallback = (globalMinVersion ?? "").trim();
  if (!fallback) {
    return selections;
  }
  return selections.map((selection) =>
    selection.minVersion.trim() ? selection : { ...selection, minVersion: fallback }
  );
}

export function isBaselineMode(flags: {
  titlesFile?: string | null;
  interactive?: boolean;
  globalMinVersion?: string | null;
}): boolean {
  return Boolean(flags.titlesFile || flags.interactive || (flags.globalMinVersion ?? "").trim());
}

/**
 * Picks one construction path (file entries, then interactive picks, then
 * the whole catalog with no baseline), removes duplicate identifiers and
 * applies the global default to whatever is still unset.
 */
export function resolveBaselines(
  sources: BaselineSources,
  logger: Logger = silentLogger
): ResolvedBaselines {
  let source: BaselineSource;
  let selections: BaselineSelection[];

  if (sources.fileEntries) {
    source = "file";
    selections = resolveEntries(sources.fileEntries, sources.catalog, logger);
  } else if (sources.interactiveSelections) {
    source = "interactive";
    selections = sources.interactiveSelections;
  } else {
    source = "catalog";
    selections = catalogDefaults(sources.catalog);
  }

  const unique = dedupeSelections(selections);
  if (unique.length < selections.length) {
    logger.debug(`Dropped ${selections.length - unique.length} duplicate title selection(s)`);
  }

  return {
    source,
    selections: applyGlobalDefault(unique, sources.globalMinVersion)
  };
}

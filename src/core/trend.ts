export interface SnapshotPoint {
  /** Stable identity across snapshots, e.g. a serial number. */
  entityKey: string;
  displayLabel: string;
  dateKey: string;
  failureCount: number;
}

export interface TrendSnapshot {
  dateKey: string;
  points: SnapshotPoint[];
}

export interface TrendRow {
  kind: "entity" | "average";
  entityKey: string;
  displayLabel: string;
  /** Failure count per date; a date is absent when the entity was not reported. */
  values: Record<string, number>;
}

export interface TrendHistory {
  dates: string[];
  /** Entity rows in discovery order, followed by exactly one average row. */
  rows: TrendRow[];
}

export type FailureCategory = "pass" | "low" | "medium" | "high";

export interface FailureThresholds {
  /** Highest failure count still rated "low". */
  lowMax: number;
  /** Highest failure count still rated "medium". */
  mediumMax: number;
}

export type FailureDistribution = Record<FailureCategory, number>;

export const AVERAGE_ROW_KEY = "Average Failed Checks";

export const DEFAULT_FAILURE_THRESHOLDS: FailureThresholds = {
  lowMax: 25,
  mediumMax: 50
};

/**
 * Merges dated snapshots into one row per entity. A later value for the same
 * entity and date replaces the earlier one, and the label is the last one
 * seen. Each date of the trailing average row is the mean of the entities
 * present that date only.
 */
export function buildTrendHistory(snapshots: TrendSnapshot[]): TrendHistory {
  const entities = new Map<string, TrendRow>();
  const dateSet = new Set<string>();

  for (const snapshot of snapshots) {
    for (const point of snapshot.points) {
      const dateKey = point.dateKey || snapshot.dateKey;
      let row = entities.get(point.entityKey);
      if (!row) {
        row = { kind: "entity", entityKey: point.entityKey, displayLabel: "", values: {} };
        entities.set(point.entityKey, row);
      }
      row.displayLabel = point.displayLabel;
      row.values[dateKey] = point.failureCount;
      dateSet.add(dateKey);
    }
  }

  const dates = [...dateSet].sort();
  const rows = [...entities.values()];
  const average: TrendRow = {
    kind: "average",
    entityKey: AVERAGE_ROW_KEY,
    displayLabel: "",
    values: {}
  };

  for (const date of dates) {
    const present = rows
      .map((row) => row.values[date])
      .filter((value): value is number => value !== undefined);
    if (present.length > 0) {
      average.values[date] = present.reduce((sum, value) => sum + value, 0) / present.length;
    }
  }

  return { dates, rows: [...rows, average] };
}

export function classifyFailureCount(
  count: number,
  thresholds: FailureThresholds = DEFAULT_FAILURE_THRESHOLDS
): FailureCategory {
  if (count <= 0) {
    return "pass";
  }
  if (count <= thresholds.lowMax) {
    return "low";
  }
  if (count <= thresholds.mediumMax) {
    return "medium";
  }
  return "high";
}

export function failureDistribution(
  points: SnapshotPoint[],
  thresholds: FailureThresholds = DEFAULT_FAILURE_THRESHOLDS
): FailureDistribution {
  const distribution: FailureDistribution = { pass: 0, low: 0, medium: 0, high: 0 };
  for (const point of points) {
    distribution[classifyFailureCount(point.failureCount, thresholds)]++;
  }
  return distribution;
}

/** Returns the current time as an ISO 8601 string. */
export function nowIso(): string {
  return new Date().toISOString();
}

/** Returns elapsed wall-clock milliseconds since `start` (from `Date.now()`). */
export function durationMs(start: number): number {
  return Date.now() - start;
}

export const MS_PER_DAY = 86_400_000;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock `YYYY-MM-DD HH:MM:SS`, used in report headers. */
export function formatReportDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/** Whole days elapsed from `from` to `to`, floored (negative when `from` is in the future). */
export function wholeDaysBetween(fromMs: number, toMs: number): number {
  return Math.floor((toMs - fromMs) / MS_PER_DAY);
}

import { isRecord } from "./pagination.js";
import { wholeDaysBetween } from "../utils/timing.js";

export type ParsedTimestamp =
  | { kind: "parsed"; epochMs: number }
  | { kind: "unparseable"; raw: string };

export interface FleetActivityRatio {
  totalDevices: number;
  activeDevices: number;
  /** activeDevices / totalDevices, 0 for an empty inventory. */
  ratio: number;
}

// Extended ISO-8601 date-time; `T` or a space between date and time.
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;
// Basic-format fallbacks (`20240102T030405Z`, `20240102T030405+0100`).
const BASIC_DATE_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z|[+-]\d{4})?$/;

interface Components {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millis: number;
  offsetMinutes: number;
}

function parseOffset(zone: string | undefined): number | null {
  if (!zone || zone === "Z" || zone === "z") {
    // No zone: the value is taken as UTC.
    return 0;
  }
  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
  if (!match) {
    return null;
  }
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? "0");
  if (hours > 23 || minutes > 59) {
    return null;
  }
  const sign = match[1] === "-" ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

function toEpoch(parts: Components): number | null {
  const { year, month, day, hour, minute, second, millis, offsetMinutes } = parts;
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const check = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
  // Date.UTC maps years 0-99 onto 1900-1999.
  check.setUTCFullYear(year);
  if (check.getUTCDate() !== day || check.getUTCMonth() !== month - 1) {
    return null;
  }
  return check.getTime() - offsetMinutes * 60_000;
}

function fromIso(raw: string): number | null {
  const match = ISO_DATE_TIME.exec(raw);
  if (!match) {
    return null;
  }
  const offsetMinutes = parseOffset(match[8]);
  if (offsetMinutes === null) {
    return null;
  }
  const fraction = match[7] ?? "0";
  return toEpoch({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? "0"),
    minute: Number(match[5] ?? "0"),
    second: Number(match[6] ?? "0"),
    millis: Math.floor(Number(`0.${fraction}`) * 1000),
    offsetMinutes
  });
}

function fromBasic(raw: string): number | null {
  const match = BASIC_DATE_TIME.exec(raw);
  if (!match) {
    return null;
  }
  const offsetMinutes = parseOffset(match[7]);
  if (offsetMinutes === null) {
    return null;
  }
  return toEpoch({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
    millis: 0,
    offsetMinutes
  });
}

export function parseContactTime(raw: string | null | undefined): ParsedTimestamp {
  const text = (raw ?? "").trim();
  if (!text) {
    return { kind: "unparseable", raw: text };
  }
  const epochMs = fromIso(text) ?? fromBasic(text);
  return epochMs === null ? { kind: "unparseable", raw: text } : { kind: "parsed", epochMs };
}

/**
 * A record is active when it checked in within `windowDays` whole days of
 * `now`. Missing or unparseable timestamps count as inactive; they are
 * common in inventory data and are not reported as errors.
 */
export function isActive(
  lastContactTime: string | null | undefined,
  windowDays: number,
  now: Date = new Date()
): boolean {
  const parsed = parseContactTime(lastContactTime);
  if (parsed.kind === "unparseable") {
    return false;
  }
  return wholeDaysBetween(parsed.epochMs, now.getTime()) <= windowDays;
}

/** Keeps active records. A window of 0 or less disables filtering. */
export function filterActive<T extends { lastContactTime: string }>(
  records: T[],
  windowDays: number,
  now: Date = new Date()
): T[] {
  if (windowDays <= 0) {
    return records;
  }
  return records.filter((record) => isActive(record.lastContactTime, windowDays, now));
}

function inventoryContactTime(item: unknown): string {
  if (!isRecord(item) || !isRecord(item.general)) {
    return "";
  }
  const value = item.general.lastContactTime;
  return typeof value === "string" ? value : "";
}

export function calculateActiveRatio(
  inventory: Iterable<unknown>,
  windowDays: number,
  now: Date = new Date()
): FleetActivityRatio {
  let totalDevices = 0;
  let activeDevices = 0;
  for (const item of inventory) {
    totalDevices++;
    if (isActive(inventoryContactTime(item), windowDays, now)) {
      activeDevices++;
    }
  }
  return {
    totalDevices,
    activeDevices,
    ratio: totalDevices > 0 ? activeDevices / totalDevices : 0
  };
}

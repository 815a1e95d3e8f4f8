import { z } from "zod";

/**
 * Shapes a paged listing may come back in. Every call site goes through
 * {@link coerceEnvelope}; nothing inspects raw responses directly.
 */
export type ResponseEnvelope =
  | { kind: "array"; items: unknown[] }
  | { kind: "keyed"; items: unknown[]; total: number }
  | { kind: "empty" };

export interface PageContents {
  items: unknown[];
  totalEstimate: number;
}

export type PageFetch = (pageIndex: number, pageSize: number) => Promise<unknown>;

export interface CollectOptions {
  pageSize: number;
  /** Called after every page with the running count. */
  onPage?: (pageIndex: number, collected: number, totalEstimate: number) => void;
}

const ALTERNATE_ARRAY_KEYS = ["titles", "items", "data"] as const;

// Servers send `totalCount` as a number or a numeric string.
const TotalCountSchema = z
  .union([z.number(), z.string().regex(/^\s*\d+(\.\d+)?\s*$/).transform(Number)])
  .pipe(z.number().finite().nonnegative());

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function coerceEnvelope(raw: unknown): ResponseEnvelope {
  if (Array.isArray(raw)) {
    return { kind: "array", items: raw };
  }
  if (!isRecord(raw)) {
    return { kind: "empty" };
  }

  const results = raw.results;
  if (Array.isArray(results)) {
    const totalCount = TotalCountSchema.safeParse(raw.totalCount);
    const total = totalCount.success ? Math.trunc(totalCount.data) : results.length;
    return { kind: "keyed", items: results, total };
  }

  for (const key of ALTERNATE_ARRAY_KEYS) {
    const candidate = raw[key];
    if (Array.isArray(candidate)) {
      return { kind: "keyed", items: candidate, total: candidate.length };
    }
  }

  return { kind: "empty" };
}

export function envelopeContents(envelope: ResponseEnvelope): PageContents {
  switch (envelope.kind) {
    case "array":
      return { items: envelope.items, totalEstimate: envelope.items.length };
    case "keyed":
      return { items: envelope.items, totalEstimate: envelope.total };
    case "empty":
      return { items: [], totalEstimate: 0 };
  }
}

/**
 * Drains a paged listing starting at page 0. Stops once the collected count
 * reaches the page's total estimate, or a page comes back empty; the empty
 * page check keeps a backend that over-reports its total from looping
 * forever. A failed page rejects the whole collection.
 */
export async function collectPages(fetchPage: PageFetch, options: CollectOptions): Promise<unknown[]> {
  if (!Number.isInteger(options.pageSize) || options.pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${options.pageSize}`);
  }

  const collected: unknown[] = [];
  for (let pageIndex = 0; ; pageIndex++) {
    const raw = await fetchPage(pageIndex, options.pageSize);
    const { items, totalEstimate } = envelopeContents(coerceEnvelope(raw));
    if (items.length === 0) {
      break;
    }

    collected.push(...items);
    options.onPage?.(pageIndex, collected.length, totalEstimate);
    if (collected.length >= totalEstimate) {
      break;
    }
  }
  return collected;
}

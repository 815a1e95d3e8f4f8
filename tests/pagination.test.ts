import { describe, expect, it, vi } from "vitest";
import { coerceEnvelope, collectPages, envelopeContents } from "../src/core/pagination.js";

describe("coerceEnvelope", () => {
  it("keeps a bare array", () => {
    expect(coerceEnvelope([1, 2])).toEqual({ kind: "array", items: [1, 2] });
  });

  it("reads results with totalCount", () => {
    expect(coerceEnvelope({ results: ["a"], totalCount: 5 })).toEqual({
      kind: "keyed",
      items: ["a"],
      total: 5
    });
    expect(coerceEnvelope({ results: ["a"], totalCount: 3.9 })).toEqual({
      kind: "keyed",
      items: ["a"],
      total: 3
    });
  });

  it("reads a numeric string totalCount", () => {
    expect(coerceEnvelope({ results: ["a", "b"], totalCount: "7" })).toEqual({
      kind: "keyed",
      items: ["a", "b"],
      total: 7
    });
  });

  it("falls back to the page length when totalCount is unusable", () => {
    for (const totalCount of ["seven", "", -3, null, true]) {
      expect(coerceEnvelope({ results: ["a", "b"], totalCount })).toEqual({
        kind: "keyed",
        items: ["a", "b"],
        total: 2
      });
    }
  });

  it("checks titles, items and data in order", () => {
    expect(coerceEnvelope({ titles: [1], items: [1, 2] })).toEqual({
      kind: "keyed",
      items: [1],
      total: 1
    });
    expect(coerceEnvelope({ results: "none", data: [1, 2, 3] })).toEqual({
      kind: "keyed",
      items: [1, 2, 3],
      total: 3
    });
  });

  it("treats anything else as empty", () => {
    expect(coerceEnvelope(null)).toEqual({ kind: "empty" });
    expect(coerceEnvelope("page")).toEqual({ kind: "empty" });
    expect(coerceEnvelope({ totalCount: 4 })).toEqual({ kind: "empty" });
  });
});

describe("envelopeContents", () => {
  it("derives the total estimate per shape", () => {
    expect(envelopeContents({ kind: "array", items: [1, 2] })).toEqual({
      items: [1, 2],
      totalEstimate: 2
    });
    expect(envelopeContents({ kind: "keyed", items: [1], total: 9 })).toEqual({
      items: [1],
      totalEstimate: 9
    });
    expect(envelopeContents({ kind: "empty" })).toEqual({ items: [], totalEstimate: 0 });
  });
});

describe("collectPages", () => {
  it("requests pages until the total is reached", async () => {
    const pages = [["a", "b"], ["c", "d"], ["e"]];
    const fetchPage = vi.fn(async (page: number) => ({ results: pages[page] ?? [], totalCount: 5 }));
    const onPage = vi.fn();

    const items = await collectPages(fetchPage, { pageSize: 2, onPage });

    expect(items).toEqual(["a", "b", "c", "d", "e"]);
    expect(fetchPage.mock.calls).toEqual([
      [0, 2],
      [1, 2],
      [2, 2]
    ]);
    expect(onPage.mock.calls).toEqual([
      [0, 2, 5],
      [1, 4, 5],
      [2, 5, 5]
    ]);
  });

  it("follows a totalCount sent as a string across pages", async () => {
    const pages = [["a", "b"], ["c", "d"]];
    const fetchPage = vi.fn(async (page: number) => ({ results: pages[page] ?? [], totalCount: "4" }));

    const items = await collectPages(fetchPage, { pageSize: 2 });

    expect(items).toEqual(["a", "b", "c", "d"]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("stops on an empty page when the total is over-reported", async () => {
    const fetchPage = vi.fn(async (page: number) =>
      page === 0 ? { results: ["a"], totalCount: 10 } : { results: [], totalCount: 10 }
    );

    await expect(collectPages(fetchPage, { pageSize: 1 })).resolves.toEqual(["a"]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("stops after one bare-array page", async () => {
    const fetchPage = vi.fn(async () => [1, 2, 3]);

    await expect(collectPages(fetchPage, { pageSize: 100 })).resolves.toEqual([1, 2, 3]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("returns nothing for an empty first page", async () => {
    await expect(collectPages(async () => ({}), { pageSize: 10 })).resolves.toEqual([]);
  });

  it("rejects the whole collection when a page fails", async () => {
    const fetchPage = vi.fn(async (page: number) => {
      if (page === 1) {
        throw new Error("page 1 failed");
      }
      return { results: ["a"], totalCount: 3 };
    });

    await expect(collectPages(fetchPage, { pageSize: 1 })).rejects.toThrow("page 1 failed");
  });

  it("rejects a non-positive page size", async () => {
    await expect(collectPages(async () => [], { pageSize: 0 })).rejects.toThrow(RangeError);
  });
});

import { describe, expect, it, vi } from "vitest";
import {
  buildOverallRow,
  buildOverallRows,
  buildTitleDetail,
  completionPercent,
  runBaselineCompliance,
  scaleCount,
  selectTopTitles,
  summarizeCompliance,
  toDeviceRecord,
  toPatchSummary
} from "../src/core/compliance.js";
import type { DeviceRecord } from "../src/core/compliance.js";
import type { BaselineSelection } from "../src/core/baselines.js";
import { applyGlobalDefault } from "../src/core/baselines.js";

const NOW = new Date("2024-06-30T12:00:00Z");

function device(installedVersion: string, lastContactTime = "2024-06-29T08:00:00Z"): DeviceRecord {
  return {
    computerName: `mac-${installedVersion || "none"}`,
    username: "user",
    deviceId: "1",
    osVersion: "14.5",
    lastContactTime,
    installedVersion
  };
}

function selection(minVersion: string): BaselineSelection {
  return { identifier: "7", displayName: "Google Chrome", minVersion };
}

describe("toDeviceRecord", () => {
  it("maps backend fields and trims the installed version", () => {
    expect(
      toDeviceRecord({
        computerName: "mac-01",
        username: "jdoe",
        deviceId: 15,
        operatingSystemVersion: "14.5",
        lastContactTime: "2024-06-29T08:00:00Z",
        version: " 126.0 "
      })
    ).toEqual({
      computerName: "mac-01",
      username: "jdoe",
      deviceId: "15",
      osVersion: "14.5",
      lastContactTime: "2024-06-29T08:00:00Z",
      installedVersion: "126.0"
    });
  });

  it("fills missing fields with empty strings", () => {
    expect(toDeviceRecord(null)).toEqual({
      computerName: "",
      username: "",
      deviceId: "",
      osVersion: "",
      lastContactTime: "",
      installedVersion: ""
    });
  });
});

describe("summarizeCompliance", () => {
  it("classifies newer versions as compliant and older ones as not", () => {
    const { summary, details } = summarizeCompliance(
      selection("129.0"),
      [device("129.0.1"), device("128.9")],
      30,
      NOW
    );

    expect(details.map((row) => row.compliant)).toEqual([true, false]);
    expect(summary).toEqual({
      displayName: "Google Chrome",
      baseline: "129.0",
      activeDeviceCount: 2,
      compliantCount: 1,
      nonCompliantCount: 1,
      compliancePercent: 50
    });
  });

  it("treats every device as compliant without a baseline", () => {
    const { summary, details } = summarizeCompliance(selection(""), [device("")], 30, NOW);

    expect(details[0]?.compliant).toBe(true);
    expect(summary.baseline).toBe("(none)");
    expect(summary.compliancePercent).toBe(100);
  });

  it("counts only active devices", () => {
    const { summary, details } = summarizeCompliance(
      selection("1.0"),
      [device("2.0"), device("2.0", "2023-01-01T00:00:00Z"), device("0.5", "garbage")],
      30,
      NOW
    );

    expect(details).toHaveLength(1);
    expect(summary.activeDeviceCount).toBe(1);
    expect(summary.compliantCount).toBe(1);
  });

  it("keeps the counts consistent and reports 0% with no active devices", () => {
    const { summary } = summarizeCompliance(selection("1.0"), [], 30, NOW);
    expect(summary.activeDeviceCount).toBe(0);
    expect(summary.nonCompliantCount).toBe(0);
    expect(summary.compliancePercent).toBe(0);

    const mixed = summarizeCompliance(
      selection("3.1"),
      [device("3.0"), device("3.1"), device("3.2"), device("")],
      0,
      NOW
    ).summary;
    expect(mixed.compliantCount + mixed.nonCompliantCount).toBe(mixed.activeDeviceCount);
    expect(mixed.compliancePercent).toBe(50);
  });

  it("rounds the percentage to two decimals", () => {
    const { summary } = summarizeCompliance(
      selection("2.0"),
      [device("2.0"), device("1.0"), device("1.0")],
      30,
      NOW
    );
    expect(summary.compliancePercent).toBe(33.33);
  });
});

describe("runBaselineCompliance", () => {
  it("fetches each selection in order", async () => {
    const calls: string[] = [];
    const fetchRecords = vi.fn(async (identifier: string) => {
      calls.push(identifier);
      return [
        {
          computerName: `mac-${identifier}`,
          lastContactTime: "2024-06-29T08:00:00Z",
          version: identifier === "1" ? "10.0" : "1.0"
        }
      ];
    });

    const results = await runBaselineCompliance(
      [
        { identifier: "1", displayName: "First", minVersion: "9.0" },
        { identifier: "2", displayName: "Second", minVersion: "9.0" }
      ],
      fetchRecords,
      { windowDays: 30, now: NOW }
    );

    expect(calls).toEqual(["1", "2"]);
    expect(results.map((result) => result.summary.compliantCount)).toEqual([1, 0]);
    expect(results[1]?.details[0]?.computerName).toBe("mac-2");
  });

  it("aborts on the first failed fetch", async () => {
    const fetchRecords = vi.fn(async (identifier: string) => {
      if (identifier === "1") {
        throw new Error("Failed to get patch report for 1: 500 boom");
      }
      return [];
    });

    await expect(
      runBaselineCompliance(
        [
          { identifier: "1", displayName: "First", minVersion: "" },
          { identifier: "2", displayName: "Second", minVersion: "" }
        ],
        fetchRecords,
        { windowDays: 30, now: NOW }
      )
    ).rejects.toThrow("Failed to get patch report for 1: 500 boom");
    expect(fetchRecords).toHaveBeenCalledTimes(1);
  });
});

describe("global default", () => {
  it("never overwrites an explicit baseline", () => {
    const filled = applyGlobalDefault(
      [
        { identifier: "1", displayName: "Adobe Acrobat Reader", minVersion: "23.008.20458" },
        { identifier: "2", displayName: "Zoom", minVersion: "" }
      ],
      "6.0"
    );
    expect(filled.map((item) => item.minVersion)).toEqual(["23.008.20458", "6.0"]);
  });
});

describe("toPatchSummary", () => {
  it("reads the first element of an array and truncates the release date", () => {
    expect(
      toPatchSummary([
        {
          latestVersion: "126.0.6478.127",
          releaseDate: "2024-06-24T18:00:00Z",
          hostsOnLatestVersion: 40,
          hostsOutOfDate: "10"
        }
      ])
    ).toEqual({
      latestVersion: "126.0.6478.127",
      releaseDate: "2024-06-24",
      hostsOnLatestVersion: 40,
      hostsOutOfDate: 10
    });
  });

  it("falls back to releaseDateTime and zero counts", () => {
    expect(
      toPatchSummary({ latestVersion: 5, releaseDateTime: "2024-01-02 03:04", hostsOutOfDate: "n/a" })
    ).toEqual({
      latestVersion: "5",
      releaseDate: "2024-01-02",
      hostsOnLatestVersion: 0,
      hostsOutOfDate: 0
    });
    expect(toPatchSummary("nope")).toEqual({
      latestVersion: "",
      releaseDate: "",
      hostsOnLatestVersion: 0,
      hostsOutOfDate: 0
    });
  });
});

describe("overall rows", () => {
  const title = { identifier: "7", displayName: "Google Chrome" };
  const summary = {
    latestVersion: "126.0",
    releaseDate: "2024-06-24",
    hostsOnLatestVersion: 40,
    hostsOutOfDate: 10
  };

  it("scales counts by the active ratio, rounding before the percentage", () => {
    expect(buildOverallRow(title, summary, 0.25)).toEqual({
      title: "Google Chrome",
      titleId: "7",
      latestVersion: "126.0",
      releaseDate: "2024-06-24",
      hostsAll: 50,
      patchedAll: 40,
      outOfDateAll: 10,
      completionAll: 80,
      patchedScaled: 10,
      outOfDateScaled: 3,
      completionScaled: 76.92
    });
  });

  it("computes completion with no hosts as zero", () => {
    expect(completionPercent(0, 0)).toBe(0);
    expect(scaleCount(7, 0)).toBe(0);
    const [row] = buildOverallRows([{ title, summary: { ...summary, hostsOnLatestVersion: 0, hostsOutOfDate: 0 } }], 1);
    expect(row?.completionAll).toBe(0);
    expect(row?.completionScaled).toBe(0);
  });

  it("selects highlighted titles by name or ID", () => {
    const rows = buildOverallRows(
      [
        { title, summary },
        { title: { identifier: "9", displayName: "Zoom" }, summary },
        { title: { identifier: "11", displayName: "Slack" }, summary }
      ],
      1
    );

    expect(selectTopTitles(rows, [" google chrome ", "11", ""]).map((row) => row.title)).toEqual([
      "Google Chrome",
      "Slack"
    ]);
  });
});

describe("buildTitleDetail", () => {
  const rows = [
    { computerName: "fresh", lastContactTime: "2024-06-29T00:00:00Z", version: "1.0" },
    { computerName: "stale", lastContactTime: "2023-06-29T00:00:00Z", version: "1.0" }
  ];

  it("lists every row without a classification when the window is disabled", () => {
    const detail = buildTitleDetail({ identifier: "7", displayName: "Zoom" }, rows, 0, NOW);
    expect(detail.details.map((row) => [row.computerName, row.compliant])).toEqual([
      ["fresh", null],
      ["stale", null]
    ]);
  });

  it("filters per record when given a window", () => {
    const detail = buildTitleDetail({ identifier: "7", displayName: "Zoom" }, rows, 30, NOW);
    expect(detail.details.map((row) => row.computerName)).toEqual(["fresh"]);
  });
});

import type { Config } from "./schema.js";

export const defaultConfig: Config = {
  server: {
    timeoutMs: 45_000,
    pageSize: 200,
    inventoryPageSize: 100,
    insecure: false
  },
  activity: {
    windowDays: 30,
    mode: "ratio"
  },
  report: {
    outDir: "reports",
    maxDetailTitles: 50,
    formats: ["json", "markdown", "csv"]
  },
  trend: {
    inputDir: "compliance_reports",
    timeframeDays: 30,
    maxSnapshots: 4,
    columns: {
      entityKey: "Serial Number",
      displayLabel: "Computer Name",
      failureCount: "Compliance - Failed mSCP Results Count"
    },
    thresholds: {
      lowMax: 25,
      mediumMax: 50
    }
  }
};

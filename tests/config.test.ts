import { describe, expect, it } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import { defaultConfig } from "../src/config/defaultConfig.js";
import { loadConfig, mergeConfig, validateConfig } from "../src/config/loadConfig.js";
import { resolveConfig } from "../src/index.js";
import { UsageError } from "../src/utils/errors.js";

async function withConfigFile(content: string, run: (cfgPath: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), "pbr-cfg-"));
  const cfgPath = path.join(dir, "config.json");
  await writeFile(cfgPath, content);
  try {
    await run(cfgPath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("loadConfig", () => {
  it("ships a default config file equal to the built-in defaults", async () => {
    const config = await loadConfig(path.join(process.cwd(), "configs", "default.json"));
    expect(config).toEqual(defaultConfig);
  });

  it("merges a partial file over the defaults section by section", async () => {
    await withConfigFile(
      JSON.stringify({
        server: { url: "https://acme.jamfcloud.com", pageSize: 100 },
        activity: { windowDays: 14 },
        trend: { columns: { entityKey: "Serial" } }
      }),
      async (cfgPath) => {
        const config = await loadConfig(cfgPath);
        expect(config.server).toEqual({
          url: "https://acme.jamfcloud.com",
          timeoutMs: 45_000,
          pageSize: 100,
          inventoryPageSize: 100,
          insecure: false
        });
        expect(config.activity).toEqual({ windowDays: 14, mode: "ratio" });
        expect(config.trend.columns).toEqual({
          entityKey: "Serial",
          displayLabel: "Computer Name",
          failureCount: "Compliance - Failed mSCP Results Count"
        });
        expect(config.report).toEqual(defaultConfig.report);
      }
    );
  });

  it("throws on missing file with cause", async () => {
    const error = await loadConfig("/tmp/nonexistent-pbr-config.json").catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({
      message: "Unable to read config file at /tmp/nonexistent-pbr-config.json",
      cause: expect.anything()
    });
  });

  it("throws on invalid JSON with cause", async () => {
    await withConfigFile("not json{{{", async (cfgPath) => {
      const error = await loadConfig(cfgPath).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(Error);
      expect(error).toMatchObject({
        message: `Invalid JSON in config file at ${cfgPath}`,
        cause: expect.anything()
      });
    });
  });

  it("rejects unknown top-level sections", async () => {
    await withConfigFile(JSON.stringify({ toggles: { a11y: true } }), async (cfgPath) => {
      await expect(loadConfig(cfgPath)).rejects.toThrow("Invalid config:");
    });
  });

  it("reports the failing field path", async () => {
    await withConfigFile(
      JSON.stringify({ activity: { mode: "weekly" } }),
      async (cfgPath) => {
        await expect(loadConfig(cfgPath)).rejects.toThrow(/Invalid config: activity\.mode: /);
      }
    );
  });
});

describe("validateConfig", () => {
  it("rejects inverted failure thresholds", () => {
    const candidate = mergeConfig(defaultConfig, {
      trend: { thresholds: { lowMax: 30, mediumMax: 10 } }
    });
    expect(() => validateConfig(candidate)).toThrow(
      "Invalid config: trend.thresholds: mediumMax must be greater than or equal to lowMax"
    );
  });

  it("rejects duplicate report formats", () => {
    const candidate = mergeConfig(defaultConfig, { report: { formats: ["csv", "csv"] } });
    expect(() => validateConfig(candidate)).toThrow(
      "Invalid config: report.formats: Values must not contain duplicates"
    );
  });

  it("accepts a zero-day window", () => {
    const candidate = mergeConfig(defaultConfig, { activity: { windowDays: 0 } });
    expect(validateConfig(candidate).activity.windowDays).toBe(0);
  });
});

describe("resolveConfig", () => {
  it("applies CLI overrides over the defaults", async () => {
    const config = await resolveConfig(undefined, {
      days: 7,
      activeMode: "per_record",
      organization: "Example Org",
      outDir: "out",
      insecure: true,
      maxSnapshots: 6
    });

    expect(config.activity).toEqual({ windowDays: 7, mode: "per_record" });
    expect(config.report.organization).toBe("Example Org");
    expect(config.report.outDir).toBe("out");
    expect(config.server.insecure).toBe(true);
    expect(config.trend.maxSnapshots).toBe(6);
    expect(config.trend.timeframeDays).toBe(30);
  });

  it("turns config problems into usage errors", async () => {
    await expect(resolveConfig("/tmp/nonexistent-pbr-config.json")).rejects.toBeInstanceOf(
      UsageError
    );
    await expect(resolveConfig(undefined, { timeframeDays: 0 })).rejects.toThrow(
      /^Invalid config: trend\.timeframeDays: /
    );
  });
});

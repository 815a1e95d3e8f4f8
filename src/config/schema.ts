import { z } from "zod";

const MAX_TIMEOUT_MS = 300_000;
const MAX_PAGE_SIZE = 2000;
const MAX_WINDOW_DAYS = 3650;
const MAX_DETAIL_TITLES = 1000;
const MAX_TREND_SNAPSHOTS = 52;
const MAX_PATH_LENGTH = 500;

export const ACTIVE_MODES = ["ratio", "per_record"] as const;
export const REPORT_FORMATS = ["json", "markdown", "csv"] as const;

export const ServerSchema = z.object({
  url: z.string().url().max(MAX_PATH_LENGTH).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
  pageSize: z.number().int().positive().max(MAX_PAGE_SIZE),
  inventoryPageSize: z.number().int().positive().max(MAX_PAGE_SIZE),
  insecure: z.boolean()
});

export const ActivitySchema = z.object({
  windowDays: z.number().int().min(0).max(MAX_WINDOW_DAYS),
  mode: z.enum(ACTIVE_MODES)
});

export const ReportSchema = z.object({
  outDir: z.string().min(1).max(MAX_PATH_LENGTH),
  organization: z.string().max(200).optional(),
  maxDetailTitles: z.number().int().nonnegative().max(MAX_DETAIL_TITLES),
  formats: z
    .array(z.enum(REPORT_FORMATS))
    .min(1)
    .refine((values) => new Set(values).size === values.length, {
      message: "Values must not contain duplicates"
    })
});

export const TrendSchema = z.object({
  inputDir: z.string().min(1).max(MAX_PATH_LENGTH),
  timeframeDays: z.number().int().positive().max(MAX_WINDOW_DAYS),
  maxSnapshots: z.number().int().positive().max(MAX_TREND_SNAPSHOTS),
  columns: z.object({
    entityKey: z.string().min(1).max(200),
    displayLabel: z.string().min(1).max(200),
    failureCount: z.string().min(1).max(200)
  }),
  thresholds: z
    .object({
      lowMax: z.number().int().nonnegative(),
      mediumMax: z.number().int().nonnegative()
    })
    .refine((value) => value.mediumMax >= value.lowMax, {
      message: "mediumMax must be greater than or equal to lowMax"
    })
});

export const ConfigSchema = z.object({
  server: ServerSchema,
  activity: ActivitySchema,
  report: ReportSchema,
  trend: TrendSchema
});

/** File shape: every section optional and merged over the defaults. */
export const ConfigFileSchema = z
  .object({
    server: ServerSchema.partial().optional(),
    activity: ActivitySchema.partial().optional(),
    report: ReportSchema.partial().optional(),
    trend: z
      .object({
        inputDir: TrendSchema.shape.inputDir.optional(),
        timeframeDays: TrendSchema.shape.timeframeDays.optional(),
        maxSnapshots: TrendSchema.shape.maxSnapshots.optional(),
        columns: TrendSchema.shape.columns.partial().optional(),
        thresholds: TrendSchema.shape.thresholds.optional()
      })
      .optional()
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ActiveMode = (typeof ACTIVE_MODES)[number];
export type ReportFormat = (typeof REPORT_FORMATS)[number];
export type TrendSettings = Config["trend"];

import { z } from "zod";
import { ConfigError } from "@/lib/errors";

/**
 * Environment validation for the transfer job.
 * Call loadConfig() once at startup; it throws a ConfigError listing every
 * problem at once instead of failing halfway through a run.
 *
 * SharePoint credentials are only required when DESTINATION=sharepoint.
 */

// Graph upload sessions require chunk sizes in multiples of 320 KiB.
export const UPLOAD_CHUNK_UNIT = 320 * 1024;

const stripQuotes = (value: string) => value.trim().replace(/^['"]|['"]$/g, "");

const optionalString = z
  .string()
  .transform(stripQuotes)
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z
  .object({
    // KoboToolbox
    API_TOKEN: z.string({ required_error: "API_TOKEN is required" }).min(1, "API_TOKEN is required"),
    KOBO_API_URL: z
      .string()
      .url("KOBO_API_URL must be a valid URL")
      .default("https://kf.kobotoolbox.org")
      .transform((url) => url.replace(/\/+$/, "")),

    // Destination
    DESTINATION: z.enum(["sharepoint", "local"]).default("sharepoint"),
    TENANT_ID: optionalString,
    CLIENT_ID: optionalString,
    CLIENT_SECRET: optionalString,
    SITE_ID: optionalString,
    SHAREPOINT_DRIVE_NAME: optionalString,
    LOCAL_DESTINATION_PATH: optionalString,

    // Naming and incrementality
    RUN_FOLDER_PREFIX: z
      .string()
      .regex(/^[\w-]+$/, "RUN_FOLDER_PREFIX may only contain letters, digits, _ and -")
      .default("KoboMedia_Direct_"),
    RUN_FOLDER_MAX_AGE_DAYS: z.coerce.number().int().positive().default(90),
    DATE_COLUMN: z.string().min(1).default("Date"),
    TYPE_COLUMN: z.string().min(1).default("Receipt_Type"),

    // Transfer tuning
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    SUBMISSION_PAGE_SIZE: z.coerce.number().int().min(1).max(30_000).default(1000),
    UPLOAD_CHUNK_SIZE: z.coerce
      .number()
      .int()
      .positive()
      .refine((n) => n % UPLOAD_CHUNK_UNIT === 0, {
        message: `UPLOAD_CHUNK_SIZE must be a multiple of ${UPLOAD_CHUNK_UNIT}`,
      })
      .default(10 * UPLOAD_CHUNK_UNIT),
    SIMPLE_UPLOAD_MAX_BYTES: z.coerce.number().int().nonnegative().default(4 * 1024 * 1024),
    TRANSFER_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

    // Scheduling
    SCHEDULE_CRON: z.string().default("0 2 * * 0"),
    SCHEDULE_TIMEZONE: z.string().default("UTC"),
  })
  .superRefine((env, ctx) => {
    if (env.DESTINATION === "sharepoint") {
      for (const key of ["TENANT_ID", "CLIENT_ID", "CLIENT_SECRET", "SITE_ID"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when DESTINATION=sharepoint`,
          });
        }
      }
    } else if (!env.LOCAL_DESTINATION_PATH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LOCAL_DESTINATION_PATH"],
        message: "LOCAL_DESTINATION_PATH is required when DESTINATION=local",
      });
    }
  });

export interface SharePointSettings {
  kind: "sharepoint";
  tenantId: string;
  clientId: string;
  clientSecret: string;
  siteId: string;
  driveName?: string;
}

export interface LocalSettings {
  kind: "local";
  basePath: string;
}

export type DestinationSettings = SharePointSettings | LocalSettings;

export interface TransferConfig {
  kobo: { apiUrl: string; token: string; pageSize: number };
  destination: DestinationSettings;
  runFolderPrefix: string;
  runFolderMaxAgeDays: number;
  dateColumn: string;
  typeColumn: string;
  httpTimeoutMs: number;
  uploadChunkSize: number;
  simpleUploadMaxBytes: number;
  transferDelayMs: number;
  schedule: { cron: string; timezone: string };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TransferConfig {
  // Treat blank variables (KEY= in .env) as unset so defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;
  const destination: DestinationSettings =
    e.DESTINATION === "local"
      ? { kind: "local", basePath: e.LOCAL_DESTINATION_PATH ?? "" }
      : {
          kind: "sharepoint",
          tenantId: e.TENANT_ID ?? "",
          clientId: e.CLIENT_ID ?? "",
          clientSecret: e.CLIENT_SECRET ?? "",
          siteId: e.SITE_ID ?? "",
          driveName: e.SHAREPOINT_DRIVE_NAME,
        };

  return {
    kobo: { apiUrl: e.KOBO_API_URL, token: e.API_TOKEN, pageSize: e.SUBMISSION_PAGE_SIZE },
    destination,
    runFolderPrefix: e.RUN_FOLDER_PREFIX,
    runFolderMaxAgeDays: e.RUN_FOLDER_MAX_AGE_DAYS,
    dateColumn: e.DATE_COLUMN,
    typeColumn: e.TYPE_COLUMN,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    uploadChunkSize: e.UPLOAD_CHUNK_SIZE,
    simpleUploadMaxBytes: e.SIMPLE_UPLOAD_MAX_BYTES,
    transferDelayMs: e.TRANSFER_DELAY_MS,
    schedule: { cron: e.SCHEDULE_CRON, timezone: e.SCHEDULE_TIMEZONE },
  };
}

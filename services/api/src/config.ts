import path from "node:path";
import { z } from "zod";

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().int().positive().default(5000),
  WEB_ORIGIN: z
    .string()
    .refine((value) => value === "*" || z.string().url().safeParse(value).success, "WEB_ORIGIN must be a valid URL or '*'")
    .default("http://localhost:5000"),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(500 * 1024 * 1024),
  MAX_FILES_PER_REQUEST: z.coerce.number().int().min(2).default(20),
  SCRATCH_DIR: z.preprocess(emptyStringToUndefined, z.string().optional()),
  OUTPUT_DIR: z.preprocess(emptyStringToUndefined, z.string().optional()),
  OUTPUT_URL_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, "OUTPUT_URL_PREFIX must be an absolute URL path")
    .default("/output"),
  OUTPUT_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  OUTPUT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  API_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  API_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  SEGMENTATION_API_URL: z.preprocess(emptyStringToUndefined, z.string().url().optional()),
  SEGMENTATION_API_KEY: z.preprocess(emptyStringToUndefined, z.string().optional()),
  SEGMENTATION_MODEL: z.string().min(1).default("yolo11n-seg"),
  SEGMENTATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000)
}).superRefine((value, ctx) => {
  if (value.NODE_ENV !== "development" && value.WEB_ORIGIN === "*") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["WEB_ORIGIN"],
      message: "WEB_ORIGIN cannot be '*' outside development"
    });
  }

  if (value.NODE_ENV === "production" && value.SEGMENTATION_API_URL?.startsWith("http://") && !value.SEGMENTATION_API_URL.includes("localhost")) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["SEGMENTATION_API_URL"],
      message: "SEGMENTATION_API_URL must use https in production unless it points at localhost"
    });
  }
});

export type ApiConfig = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  webOrigin: string;
  maxUploadBytes: number;
  maxFilesPerRequest: number;
  scratchDir: string;
  outputDir: string;
  outputUrlPrefix: string;
  outputTtlMinutes: number;
  outputSweepIntervalMs: number;
  apiRateLimitWindowMs: number;
  apiRateLimitMax: number;
  segmentationApiUrl?: string;
  segmentationApiKey?: string;
  segmentationModel: string;
  segmentationTimeoutMs: number;
};

/**
 * Load and validate environment variables and return a normalized API configuration.
 *
 * @param env - Environment mapping to read values from; defaults to `process.env`.
 * @param cwd - Base directory for the default scratch and output directories.
 * @returns The validated and normalized `ApiConfig` object.
 * @throws ZodError If environment validation fails (missing or invalid variables).
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ApiConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.API_PORT,
    webOrigin: parsed.WEB_ORIGIN,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    maxFilesPerRequest: parsed.MAX_FILES_PER_REQUEST,
    scratchDir: path.resolve(cwd, parsed.SCRATCH_DIR || "data/uploads"),
    outputDir: path.resolve(cwd, parsed.OUTPUT_DIR || "data/output"),
    outputUrlPrefix: parsed.OUTPUT_URL_PREFIX.replace(/\/+$/, "") || "/output",
    outputTtlMinutes: parsed.OUTPUT_TTL_MINUTES,
    outputSweepIntervalMs: parsed.OUTPUT_SWEEP_INTERVAL_MS,
    apiRateLimitWindowMs: parsed.API_RATE_LIMIT_WINDOW_MS,
    apiRateLimitMax: parsed.API_RATE_LIMIT_MAX,
    segmentationApiUrl: parsed.SEGMENTATION_API_URL,
    segmentationApiKey: parsed.SEGMENTATION_API_KEY,
    segmentationModel: parsed.SEGMENTATION_MODEL,
    segmentationTimeoutMs: parsed.SEGMENTATION_TIMEOUT_MS
  };
}

import { z } from "zod";
import { parseDocumentReference } from "./archive/links";
import type { WalkerConfig } from "./archive/types";
import type { ArchiveJob } from "./ArchiveJob";
import { DEFAULT_MIN_TEXT_LENGTH } from "./archive/extract";
import { ConfigError } from "./errors";
import { DEFAULT_RETRY_OPTIONS } from "./net/$fetch";

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((value) => value === "true" || value === "1");

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  HF_USERNAME: optionalString,
  HF_TOKEN: optionalString,
  HF_DATASET_NAME: optionalString,
  HF_PRIVATE: flag("false"),
  DATA_DIR: z.string().min(1).default("./data"),
  FETCH_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_DELAY_MS: z.coerce.number().int().min(0).default(500),
  FETCH_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  THROTTLE_MS: z.coerce.number().int().min(0).default(250),
  MAX_STOPS: z.coerce.number().int().positive().optional(),
  START_URL: z
    .string()
    .url()
    .refine((url) => parseDocumentReference(url) !== null, {
      message: "must be a doceo table-of-contents URL (…/doceo/document/<TYPE>-<TERM>-<DATE>-TOC_<LANG>.html)",
    })
    .optional(),
  PUBLISH_PARTIAL: flag("true"),
  TOLERATE_MISSING_DOCUMENTS: flag("false"),
});

export type RuntimeConfig = {
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  hub: {
    username?: string;
    token?: string;
    datasetName?: string;
    private: boolean;
  };
  dataDir: string;
  retry: {
    attempts: number;
    delayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
  throttleMs: number;
  maxStops?: number;
  startUrl?: string;
  publishPartial: boolean;
  tolerateMissingDocuments: boolean;
};

export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const e = parsed.data;
  return {
    logLevel: e.LOG_LEVEL,
    hub: {
      username: e.HF_USERNAME,
      token: e.HF_TOKEN,
      datasetName: e.HF_DATASET_NAME,
      private: e.HF_PRIVATE,
    },
    dataDir: e.DATA_DIR,
    retry: {
      attempts: e.FETCH_ATTEMPTS,
      delayMs: e.FETCH_DELAY_MS,
      maxDelayMs: e.FETCH_MAX_DELAY_MS,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    throttleMs: e.THROTTLE_MS,
    maxStops: e.MAX_STOPS,
    startUrl: e.START_URL,
    publishPartial: e.PUBLISH_PARTIAL,
    tolerateMissingDocuments: e.TOLERATE_MISSING_DOCUMENTS,
  };
}

export const buildWalkerConfig = (
  job: ArchiveJob,
  runtime: RuntimeConfig,
): WalkerConfig => ({
  startUrl: runtime.startUrl ?? job.startUrl,
  source: job.dataset.title,
  nextLabel: job.nextLabel,
  previousLabel: job.previousLabel,
  contentSelector: job.contentSelector,
  ignoreSelectors: job.ignoreSelectors ?? [],
  stripPatterns: job.stripPatterns ?? [],
  minTextLength: job.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH,
  throttleMs: runtime.throttleMs,
  maxStops: runtime.maxStops,
  tolerateMissingDocuments: runtime.tolerateMissingDocuments,
  retry: { ...DEFAULT_RETRY_OPTIONS, ...runtime.retry },
});

/** `<user>/<dataset>`, or `null` when no Hub user is configured. */
export const resolveRepoId = (
  job: ArchiveJob,
  runtime: RuntimeConfig,
): string | null =>
  runtime.hub.username
    ? `${runtime.hub.username}/${runtime.hub.datasetName ?? job.dataset.name}`
    : null;

import { join } from "node:path";
import { z } from "zod";
import type {
  DocumentRecord,
  SkippedDocument,
  TerminalState,
  WalkResult,
} from "./archive/types";
import { walkArchive } from "./archive/walker";
import type { ArchiveJob } from "./ArchiveJob";
import { readCache, writeCache } from "./cache";
import { buildWalkerConfig, resolveRepoId, type RuntimeConfig } from "./config";
import { ArchiveError, describeError } from "./errors";
import { logger } from "./log";
import type { PageFetcher } from "./net/$fetch";
import { type DatasetPublisher, publishDataset } from "./publish/hub";

export type PublishOutcome = "published" | "dry-run" | "withheld" | "failed";

export interface ArchiveRunResult {
  jobName: string;
  state: TerminalState;
  collected: number;
  skipped: number;
  truncated: boolean;
  /** `null` when the snapshot could not be written. */
  snapshotPath: string | null;
  publish: PublishOutcome;
  error?: string;
}

export type ArchiveSnapshot = {
  state: TerminalState;
  records: DocumentRecord[];
  skipped: SkippedDocument[];
};

const SnapshotSchema = z.object({
  version: z.string(),
  lastUpdated: z.string(),
  data: z.object({
    state: z.enum(["done", "failed"]),
    records: z.array(
      z.object({
        url: z.string(),
        tocUrl: z.string(),
        date: z.string(),
        text: z.string().min(1),
        source: z.string(),
      }),
    ),
    skipped: z.array(
      z.object({
        url: z.string(),
        reason: z.enum(["extraction", "not-found"]),
        message: z.string(),
      }),
    ),
  }),
});

export type RunOptions = {
  runtime: RuntimeConfig;
  dryRun?: boolean;
  fetchPage?: PageFetcher;
  publish?: DatasetPublisher;
  signal?: AbortSignal;
};

export const snapshotPath = (job: ArchiveJob, runtime: RuntimeConfig) =>
  join(runtime.dataDir, `${job.dataset.name}.json`);

async function publishRecords(
  job: ArchiveJob,
  records: readonly DocumentRecord[],
  options: RunOptions,
): Promise<{ publish: PublishOutcome; error?: string }> {
  const log = logger.child({ module: "runner", job: job.dataset.name });

  if (options.dryRun) {
    log.info(`Dry run, not publishing ${records.length} documents`);
    return { publish: "dry-run" };
  }

  const repoId = resolveRepoId(job, options.runtime);
  const accessToken = options.runtime.hub.token;
  const username = options.runtime.hub.username;
  if (!repoId || !username || !accessToken) {
    const error = "HF_USERNAME and HF_TOKEN are required to publish";
    log.error(error);
    return { publish: "failed", error };
  }

  const publish = options.publish ?? publishDataset;
  try {
    await publish({
      job,
      records,
      repoId,
      credentials: { username, accessToken },
      private: options.runtime.hub.private,
    });
    return { publish: "published" };
  } catch (err) {
    if (!(err instanceof ArchiveError)) throw err;
    log.error(err.message);
    return { publish: "failed", error: describeError(err) };
  }
}

export async function runArchive(
  jobName: string,
  job: ArchiveJob,
  options: RunOptions,
): Promise<ArchiveRunResult> {
  const log = logger.child({ module: "runner", job: job.dataset.name });
  log.info(`Starting walk: ${job.dataset.title}`);

  const result: WalkResult = await walkArchive(
    buildWalkerConfig(job, options.runtime),
    { fetchPage: options.fetchPage, signal: options.signal },
  );

  let path: string | null = snapshotPath(job, options.runtime);
  try {
    await writeCache<ArchiveSnapshot>(path, {
      version: job.version,
      lastUpdated: new Date().toISOString(),
      data: {
        state: result.state,
        records: [...result.records],
        skipped: [...result.skipped],
      },
    });
    log.info(`Wrote ${result.records.length} documents to ${path}`);
  } catch (err) {
    // The collected records are still published below.
    log.error({ err }, `Cannot write snapshot ${path}`);
    path = null;
  }

  const cutShort = result.state === "failed";
  log.info(
    `Completed walk: ${job.dataset.title} (collected: ${result.records.length}, skipped: ${result.skipped.length}, ${
      cutShort
        ? `cut short: ${result.error?.message}`
        : result.truncated
          ? "stopped at the stop limit"
          : "reached the end of the archive"
    })`,
  );

  const base = {
    jobName,
    state: result.state,
    collected: result.records.length,
    skipped: result.skipped.length,
    truncated: result.truncated,
    snapshotPath: path,
  };

  if (result.records.length === 0) {
    log.warn("No documents collected, nothing to publish");
    return { ...base, publish: "withheld", error: result.error?.message };
  }
  if (cutShort && !options.runtime.publishPartial) {
    log.warn("Walk was cut short and PUBLISH_PARTIAL is off, not publishing");
    return { ...base, publish: "withheld", error: result.error?.message };
  }

  const outcome = await publishRecords(job, result.records, options);
  return { ...base, ...outcome, error: outcome.error ?? result.error?.message };
}

/** Publishes the last snapshot written by `runArchive` without walking again. */
export async function publishSnapshot(
  jobName: string,
  job: ArchiveJob,
  options: RunOptions,
): Promise<ArchiveRunResult> {
  const path = snapshotPath(job, options.runtime);
  const cached = await readCache<unknown>(path);
  if (!cached) {
    throw new Error(`No snapshot at ${path}, run the walk first`);
  }

  const parsed = SnapshotSchema.safeParse(cached);
  if (!parsed.success) {
    throw new Error(`Invalid snapshot at ${path}: ${parsed.error.message}`);
  }

  const { state, records, skipped } = parsed.data.data;
  const base = {
    jobName,
    state,
    collected: records.length,
    skipped: skipped.length,
    truncated: false,
    snapshotPath: path,
  };
  if (records.length === 0) {
    return { ...base, publish: "withheld" };
  }

  return { ...base, ...(await publishRecords(job, records, options)) };
}

/**
 * 0 when every job walked to the end, collected something and published it
 * (or was a dry run); 1 when a walk failed or came back empty; 2 when
 * publishing failed.
 */
export const exitCodeFor = (results: readonly ArchiveRunResult[]): number =>
  results.reduce((code, result) => {
    if (result.publish === "failed") return Math.max(code, 2);
    if (result.state === "failed" || result.collected === 0) {
      return Math.max(code, 1);
    }
    return code;
  }, 0);

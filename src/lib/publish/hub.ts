import { createRepo, repoExists, uploadFiles } from "@huggingface/hub";
import type { DocumentRecord } from "../archive/types";
import type { ArchiveJob } from "../ArchiveJob";
import { buildDatasetFiles } from "../datapackage";
import { describeError, PublishError } from "../errors";
import { logger } from "../log";

type DatasetRepo = { type: "dataset"; name: string };

/** The subset of `@huggingface/hub` the publisher talks to. */
export interface HubClient {
  repoExists(params: { repo: DatasetRepo; accessToken: string }): Promise<boolean>;
  createRepo(params: {
    repo: DatasetRepo;
    accessToken: string;
    private: boolean;
  }): Promise<unknown>;
  uploadFiles(params: {
    repo: DatasetRepo;
    accessToken: string;
    files: { path: string; content: Blob }[];
    commitTitle: string;
  }): Promise<unknown>;
}

export const defaultHubClient: HubClient = {
  repoExists,
  createRepo,
  uploadFiles,
};

export type HubCredentials = { username: string; accessToken: string };

export type PublishRequest = {
  job: ArchiveJob;
  records: readonly DocumentRecord[];
  repoId: string;
  credentials: HubCredentials;
  private: boolean;
};

export type DatasetPublisher = (request: PublishRequest) => Promise<void>;

export async function publishDataset(
  request: PublishRequest,
  client: HubClient = defaultHubClient,
): Promise<void> {
  const log = logger.child({ module: "publish", repo: request.repoId });
  const repo: DatasetRepo = { type: "dataset", name: request.repoId };
  const { accessToken } = request.credentials;

  try {
    if (!(await client.repoExists({ repo, accessToken }))) {
      log.info(`Creating dataset repository ${request.repoId}`);
      await client.createRepo({ repo, accessToken, private: request.private });
    }

    const files = buildDatasetFiles(request.job, request.records, request.repoId);
    await client.uploadFiles({
      repo,
      accessToken,
      files: files.map(({ path, content }) => ({
        path,
        content: new Blob([content], { type: "text/plain;charset=utf-8" }),
      })),
      commitTitle: `Update ${request.job.dataset.title}: ${request.records.length} documents`,
    });
  } catch (err) {
    throw new PublishError(
      `Failed to publish ${request.repoId}: ${describeError(err)}`,
      err,
    );
  }

  log.info(`Published ${request.records.length} documents to ${request.repoId}`);
}

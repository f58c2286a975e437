import type { ExtractOptions, NavigationLabels } from "./archive/types";

export interface DatasetMetadata {
  /** Default Hub repository name, also used as the snapshot file name. */
  name: string;
  title: string;
  description: string;
  language: string;
}

export type ArchiveJob = NavigationLabels &
  ExtractOptions & {
    version: string;
    startUrl: string;
    dataset: DatasetMetadata;
  };

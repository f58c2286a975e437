export type VersionedData<T> = {
  /** Version of the job that produced `data`. */
  version: string;
  lastUpdated: string;
  data: T;
};

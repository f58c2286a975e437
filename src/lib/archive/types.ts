import type { ArchiveError } from "../errors";
import type { RetryOptions } from "../net/$fetch";

export type DocumentReference = {
  url: string;
  /** Document-type code, e.g. `TA` (adopted texts) or `CRE` (verbatim reports). */
  type: string;
  term: number;
  /** `YYYY-MM-DD` */
  date: string;
  language: string;
};

export type DocumentRecord = Readonly<{
  url: string;
  tocUrl: string;
  date: string;
  text: string;
  source: string;
}>;

export type SkippedDocument = {
  url: string;
  reason: "extraction" | "not-found";
  message: string;
};

export type WalkState =
  | "start"
  | "fetching"
  | "extracting"
  | "advancing"
  | "done"
  | "failed";

export type TerminalState = Extract<WalkState, "done" | "failed">;

export type ArchiveCursor = {
  reference: DocumentReference;
  /** False only for the start URL. */
  viaNextLink: boolean;
};

export type NavigationLabels = {
  nextLabel: string;
  previousLabel: string;
};

export type ExtractOptions = {
  contentSelector: string;
  ignoreSelectors?: string[];
  stripPatterns?: RegExp[];
  minTextLength?: number;
};

export type WalkerConfig = NavigationLabels &
  Required<ExtractOptions> & {
    startUrl: string;
    source: string;
    throttleMs: number;
    maxStops?: number;
    tolerateMissingDocuments: boolean;
    retry: RetryOptions;
  };

export type WalkResult = {
  state: TerminalState;
  records: readonly DocumentRecord[];
  skipped: readonly SkippedDocument[];
  stops: number;
  truncated: boolean;
  error?: ArchiveError;
};

export type ArchiveErrorCode =
  | "TRANSIENT_NETWORK"
  | "NOT_FOUND"
  | "PERMANENT_FETCH"
  | "MALFORMED_PAGE"
  | "EXTRACTION"
  | "INVALID_REFERENCE"
  | "WALK_ABORTED"
  | "PUBLISH"
  | "CONFIG";

export class ArchiveError extends Error {
  public readonly code: ArchiveErrorCode;
  public readonly retryable: boolean;
  public readonly url?: string;
  public readonly status?: number;

  constructor(
    message: string,
    options: {
      code: ArchiveErrorCode;
      retryable?: boolean;
      url?: string;
      status?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.url = options.url;
    this.status = options.status;
  }
}

type FetchErrorOptions = { url: string; status?: number; cause?: unknown };

/** Timeouts, resets and 5xx. The fetcher retries these before giving up. */
export class TransientNetworkError extends ArchiveError {
  constructor(message: string, options: FetchErrorOptions) {
    super(message, { ...options, code: "TRANSIENT_NETWORK", retryable: true });
  }
}

/** 404 / 410. End of archive when met on a followed "next" link. */
export class NotFoundError extends ArchiveError {
  constructor(message: string, options: FetchErrorOptions) {
    super(message, { ...options, code: "NOT_FOUND" });
  }
}

export class PermanentFetchError extends ArchiveError {
  constructor(message: string, options: FetchErrorOptions) {
    super(message, { ...options, code: "PERMANENT_FETCH" });
  }
}

export class MalformedPageError extends ArchiveError {
  constructor(message: string, url: string) {
    super(message, { code: "MALFORMED_PAGE", url });
  }
}

export class ExtractionError extends ArchiveError {
  constructor(message: string, url?: string) {
    super(message, { code: "EXTRACTION", url });
  }
}

export class InvalidReferenceError extends ArchiveError {
  constructor(url: string) {
    super(`Not a doceo table-of-contents URL: ${url}`, {
      code: "INVALID_REFERENCE",
      url,
    });
  }
}

export class WalkAbortedError extends ArchiveError {
  constructor(url: string, cause?: unknown) {
    super(`Walk aborted before ${url}`, { code: "WALK_ABORTED", url, cause });
  }
}

export class PublishError extends ArchiveError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "PUBLISH", cause });
  }
}

export class ConfigError extends ArchiveError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`, {
      code: "CONFIG",
    });
    this.issues = issues;
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

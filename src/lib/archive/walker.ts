import {
  ArchiveError,
  ExtractionError,
  InvalidReferenceError,
  MalformedPageError,
  NotFoundError,
  WalkAbortedError,
} from "../errors";
import { logger } from "../log";
import { createPageFetcher, type FetchedPage, type PageFetcher } from "../net/$fetch";
import { throttle } from "../net/throttle";
import { extractText } from "./extract";
import { parseDocumentReference, type ResolvedLinks, resolveLinks } from "./links";
import type {
  ArchiveCursor,
  DocumentRecord,
  SkippedDocument,
  WalkerConfig,
  WalkResult,
  WalkState,
} from "./types";

export type WalkOptions = {
  fetchPage?: PageFetcher;
  signal?: AbortSignal;
  onStateChange?: (state: WalkState, cursor: ArchiveCursor) => void;
};

/**
 * Follows the "next" chain from `config.startUrl` one stop at a time.
 *
 * Each stop fetches the table-of-contents page, then the full document it
 * points to. A document whose content cannot be extracted is skipped; a page
 * that breaks the chain ends the walk as `failed`. Either way the records
 * collected so far are returned.
 */
export async function walkArchive(
  config: WalkerConfig,
  options: WalkOptions = {},
): Promise<WalkResult> {
  const log = logger.child({ module: "walker", source: config.source });
  const fetchPage = options.fetchPage ?? createPageFetcher(config.retry);

  const start = parseDocumentReference(config.startUrl);
  if (!start) {
    throw new InvalidReferenceError(config.startUrl);
  }

  const records: DocumentRecord[] = [];
  const skipped: SkippedDocument[] = [];
  const visited = new Set<string>();
  let cursor: ArchiveCursor = { reference: start, viaNextLink: false };
  let stops = 0;

  const enter = (state: WalkState) => {
    log.debug(`${state} ${cursor.reference.url}`);
    options.onStateChange?.(state, cursor);
  };

  const finish = (
    state: "done" | "failed",
    extra: { truncated?: boolean; error?: ArchiveError } = {},
  ): WalkResult => {
    enter(state);
    return {
      state,
      records: Object.freeze([...records]),
      skipped: Object.freeze([...skipped]),
      stops,
      truncated: extra.truncated ?? false,
      error: extra.error,
    };
  };

  enter("start");

  while (true) {
    const { reference } = cursor;

    if (options.signal?.aborted) {
      return finish("failed", {
        error: new WalkAbortedError(reference.url, options.signal.reason),
      });
    }
    if (config.maxStops !== undefined && stops >= config.maxStops) {
      log.info(`Reached the limit of ${config.maxStops} stops`);
      return finish("done", { truncated: true });
    }

    visited.add(reference.url);
    enter("fetching");

    let toc: FetchedPage;
    try {
      toc = await fetchPage(reference.url);
    } catch (err) {
      if (err instanceof NotFoundError && cursor.viaNextLink) {
        log.info(`Next page ${reference.url} does not exist, end of archive`);
        return finish("done");
      }
      if (err instanceof ArchiveError) {
        log.error(`Cannot fetch ${reference.url}: ${err.message}`);
        return finish("failed", { error: err });
      }
      throw err;
    }
    stops++;

    let links: ResolvedLinks;
    try {
      links = resolveLinks(reference.url, toc.$, config);
    } catch (err) {
      if (err instanceof ArchiveError) {
        log.error(err.message);
        return finish("failed", { error: err });
      }
      throw err;
    }

    const { fullDocumentUrl, nextTocUrl: nextUrl } = links;
    try {
      const document = await fetchPage(fullDocumentUrl);
      enter("extracting");
      const text = extractText(document.html, config, fullDocumentUrl);
      records.push(
        Object.freeze({
          url: fullDocumentUrl,
          tocUrl: reference.url,
          date: reference.date,
          text,
          source: config.source,
        }),
      );
    } catch (err) {
      if (err instanceof ExtractionError) {
        log.warn(`[skip] ${fullDocumentUrl}: ${err.message}`);
        skipped.push({ url: fullDocumentUrl, reason: "extraction", message: err.message });
      } else if (err instanceof NotFoundError && config.tolerateMissingDocuments) {
        log.warn(`[skip] ${fullDocumentUrl}: ${err.message}`);
        skipped.push({ url: fullDocumentUrl, reason: "not-found", message: err.message });
      } else if (err instanceof ArchiveError) {
        log.error(`Cannot fetch ${fullDocumentUrl}: ${err.message}`);
        return finish("failed", { error: err });
      } else {
        throw err;
      }
    }

    enter("advancing");
    if (!nextUrl) {
      log.info(`No "${config.nextLabel}" link on ${reference.url}, end of archive`);
      return finish("done");
    }

    const next = parseDocumentReference(nextUrl);
    if (!next || next.date < reference.date) {
      const error = new MalformedPageError(
        next
          ? `"${config.nextLabel}" link on ${reference.url} goes back in time to ${nextUrl}`
          : `"${config.nextLabel}" link on ${reference.url} is not a table of contents: ${nextUrl}`,
        reference.url,
      );
      log.error(error.message);
      return finish("failed", { error });
    }
    if (visited.has(next.url)) {
      log.warn(`Already visited ${next.url}, stopping to avoid a loop`);
      return finish("done");
    }

    log.info(
      `Progress: ${stops} stops - collected: ${records.length}, skipped: ${skipped.length} - next ${next.date}`,
    );
    await throttle(config.throttleMs);
    cursor = { reference: next, viaNextLink: true };
  }
}

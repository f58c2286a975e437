import type * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { InvalidReferenceError, MalformedPageError } from "../errors";
import type { DocumentReference, NavigationLabels } from "./types";

const TOC_URL_PATTERN =
  /^https?:\/\/[^/]+\/doceo\/document\/([A-Z]+)-(\d+)-(\d{4}-\d{2}-\d{2})-TOC_([A-Z]{2})\.html$/;

export const parseDocumentReference = (
  url: string,
): DocumentReference | null => {
  const match = TOC_URL_PATTERN.exec(url);
  if (!match) return null;

  const [, type, term, date, language] = match;
  if (!type || !term || !date || !language) return null;

  return { url, type, term: Number(term), date, language };
};

/**
 * `.../TA-5-1999-07-21-TOC_NL.html` -> `.../TA-5-1999-07-21_NL.html`
 */
export const toFullDocumentUrl = (tocUrl: string): string => {
  const reference = parseDocumentReference(tocUrl);
  if (!reference) {
    throw new InvalidReferenceError(tocUrl);
  }

  const marker = tocUrl.lastIndexOf(`-TOC_${reference.language}.html`);
  return tocUrl.slice(0, marker) + tocUrl.slice(marker + "-TOC".length);
};

const normalizeLabel = (value: string | undefined): string =>
  (value ?? "").replace(/\s+/g, " ").trim().toLowerCase();

// Arrows and punctuation that decorate a navigation label, e.g. "Volgende >".
const LABEL_DECORATION = /^[\s\p{P}\p{S}]+|[\s\p{P}\p{S}]+$/gu;

type Anchor = cheerio.Cheerio<Element>;

const hasLabelAttribute = (anchor: Anchor, wanted: string) =>
  normalizeLabel(anchor.attr("title")) === wanted ||
  normalizeLabel(anchor.attr("aria-label")) === wanted ||
  normalizeLabel(anchor.find("img").attr("alt")) === wanted;

const hasLabelText = (anchor: Anchor, wanted: string) =>
  normalizeLabel(anchor.text()).replace(LABEL_DECORATION, "") === wanted;

/**
 * An anchor labelled by `title`, `aria-label` or an image `alt` wins over one
 * whose visible text is the label. Text that merely contains the label, such
 * as a table-of-contents item, is not navigation.
 */
const findLabelledAnchor = (anchors: Anchor[], label: string): Anchor | undefined => {
  const wanted = normalizeLabel(label);
  return (
    anchors.find((anchor) => hasLabelAttribute(anchor, wanted)) ??
    anchors.find((anchor) => hasLabelText(anchor, wanted))
  );
};

/**
 * Finds the forward-navigation link of a table-of-contents page.
 *
 * Returns `null` when the page has navigation but no usable "next" anchor,
 * which is how the last entry of the archive looks. A page with neither a
 * "next" nor a "previous" anchor is not a table-of-contents page.
 */
export const findNextTocUrl = (
  $: cheerio.CheerioAPI,
  currentUrl: string,
  labels: NavigationLabels,
): string | null => {
  const anchors = $("a")
    .toArray()
    .map((el) => $(el));

  const next = findLabelledAnchor(anchors, labels.nextLabel);
  if (!next) {
    if (!findLabelledAnchor(anchors, labels.previousLabel)) {
      throw new MalformedPageError(
        `No "${labels.nextLabel}" or "${labels.previousLabel}" navigation on ${currentUrl}`,
        currentUrl,
      );
    }
    return null;
  }

  const href = next.attr("href")?.trim();
  if (!href || href.startsWith("#") || href.startsWith("javascript:")) {
    return null;
  }

  try {
    return new URL(href, currentUrl).href;
  } catch (err) {
    throw new MalformedPageError(
      `Unusable "${labels.nextLabel}" link "${href}" on ${currentUrl}: ${err}`,
      currentUrl,
    );
  }
};

export type ResolvedLinks = {
  fullDocumentUrl: string;
  nextTocUrl: string | null;
};

export const resolveLinks = (
  tocUrl: string,
  $: cheerio.CheerioAPI,
  labels: NavigationLabels,
): ResolvedLinks => ({
  fullDocumentUrl: toFullDocumentUrl(tocUrl),
  nextTocUrl: findNextTocUrl($, tocUrl, labels),
});

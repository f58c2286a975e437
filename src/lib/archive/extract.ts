import * as cheerio from "cheerio";
import { type AnyNode, type Element, isTag, isText } from "domhandler";
import { ExtractionError } from "../errors";
import type { ExtractOptions } from "./types";

export const DEFAULT_MIN_TEXT_LENGTH = 50;

const SKIPPED_TAGS = new Set([
  "script",
  "style",
  "noscript",
  "nav",
  "header",
  "footer",
  "form",
  "iframe",
  "template",
]);

const BLOCK_TAGS = new Set([
  "p",
  "div",
  "li",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "tr",
  "td",
  "th",
  "table",
  "section",
  "article",
  "blockquote",
  "pre",
  "dd",
  "dt",
  "ul",
  "ol",
]);

const PAGE_NUMBER = /^[-–—\s]*\d{1,4}(\s*\/\s*\d{1,4})?[-–—\s]*$/;
const SEPARATOR_ONLY = /^[\s\-–—_=*•·.|]+$/;

export const isBoilerplate = (paragraph: string): boolean =>
  PAGE_NUMBER.test(paragraph) || SEPARATOR_ONLY.test(paragraph);

export const locateContent = (
  $: cheerio.CheerioAPI,
  selector: string,
): cheerio.Cheerio<Element> | null => {
  const container = $<Element, string>(selector).first();
  return container.length > 0 ? container : null;
};

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

const collectParagraphs = (root: AnyNode): string[] => {
  const paragraphs: string[] = [];
  let buffer = "";

  const flush = () => {
    const paragraph = collapseWhitespace(buffer);
    if (paragraph) paragraphs.push(paragraph);
    buffer = "";
  };

  const visit = (node: AnyNode) => {
    if (isText(node)) {
      buffer += node.data;
      return;
    }
    if (!isTag(node)) return;

    const tag = node.name.toLowerCase();
    if (SKIPPED_TAGS.has(tag)) return;
    if (tag === "br") {
      flush();
      return;
    }

    const block = BLOCK_TAGS.has(tag);
    if (block) flush();
    for (const child of node.children) visit(child);
    if (block) flush();
  };

  visit(root);
  flush();
  return paragraphs;
};

/**
 * Turns a full-document page into plain text: one paragraph per block
 * element of the content container, separated by a blank line.
 */
export const extractText = (
  html: string,
  options: ExtractOptions,
  url?: string,
): string => {
  const $ = cheerio.load(html);
  const container = locateContent($, options.contentSelector);
  const root = container?.get(0);
  if (!container || !root) {
    throw new ExtractionError(
      `Content container "${options.contentSelector}" not found`,
      url,
    );
  }

  for (const selector of options.ignoreSelectors ?? []) {
    container.find(selector).remove();
  }

  const paragraphs = collectParagraphs(root)
    .map((paragraph) =>
      (options.stripPatterns ?? []).reduce(
        (text, pattern) => text.replace(pattern, " "),
        paragraph,
      ),
    )
    .map(collapseWhitespace)
    .filter((paragraph) => paragraph && !isBoilerplate(paragraph));

  const text = paragraphs.join("\n\n");
  const minLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  if (text.length < minLength) {
    throw new ExtractionError(
      `Extracted text too short (${text.length} < ${minLength} chars)`,
      url,
    );
  }

  return text;
};

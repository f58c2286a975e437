import type { WalkerConfig } from "../src/lib/archive/types";
import type { ArchiveJob } from "../src/lib/ArchiveJob";
import {
  createPageFetcher,
  DEFAULT_RETRY_OPTIONS,
  type FetchLike,
} from "../src/lib/net/$fetch";

export const BASE = "https://www.europarl.europa.eu/doceo/document/";

export const tocName = (date: string) => `TA-5-${date}-TOC_NL.html`;
export const tocUrl = (date: string) => `${BASE}${tocName(date)}`;
export const docUrl = (date: string) => `${BASE}TA-5-${date}_NL.html`;

export const DATES = ["1999-07-21", "1999-07-22", "1999-07-23"] as const;

export function tocPage(links: {
  previous?: string;
  next?: string;
  items?: string[];
}): string {
  const nav = [
    links.previous
      ? `<a href="${links.previous}" title="Vorige">Vorige</a>`
      : "",
    links.next ? `<a href="${links.next}" title="Volgende">Volgende</a>` : "",
  ].join(" ");
  const items = (links.items ?? ["Inhoud"])
    .map((item) => `<li>${item}</li>`)
    .join("");

  // Agenda items come before the navigation, as on the archive's own pages.
  return `<html><body>
    <div id="website-body"><ul>${items}</ul></div>
    <div class="nav_doc">${nav}</div>
  </body></html>`;
}

export const documentParagraphs = (date: string) => [
  `Vergadering van ${date}`,
  "De Voorzitter opent de vergadering.",
];

export const documentText = (date: string) =>
  documentParagraphs(date).join("\n\n");

export function documentPage(
  paragraphs: string[],
  { container = true }: { container?: boolean } = {},
): string {
  const body = paragraphs.map((p) => `<p>${p}</p>`).join("\n");
  const id = container ? "website-body" : "something-else";
  return `<html><head><script>var tracking = true;</script></head><body>
    <header>Europees Parlement</header>
    <div id="${id}">${body}</div>
    <footer>Contact</footer>
  </body></html>`;
}

export type FixtureRoute = string | number | Error;

/** A `fetch` that serves an in-memory site. Unknown URLs answer 404. */
export function fixtureFetch(
  routes: Record<string, FixtureRoute | FixtureRoute[]>,
) {
  const calls: { url: string; headers: Record<string, string> }[] = [];
  const served = new Map<string, number>();

  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, headers: init.headers });
    const route = routes[url];
    const sequence = Array.isArray(route) ? route : [route];
    const index = served.get(url) ?? 0;
    served.set(url, index + 1);
    const answer = sequence[Math.min(index, sequence.length - 1)];

    if (answer instanceof Error) throw answer;
    if (answer === undefined) return new Response("Not Found", { status: 404 });
    if (typeof answer === "number") return new Response("error", { status: answer });
    return new Response(answer, {
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
  };

  return { fetchImpl, calls };
}

export function fixtureFetcher(
  routes: Record<string, FixtureRoute | FixtureRoute[]>,
) {
  const { fetchImpl, calls } = fixtureFetch(routes);
  const fetchPage = createPageFetcher({
    attempts: 2,
    delayMs: 0,
    fetchImpl,
    wait: async () => {},
  });
  return {
    fetchPage,
    calls,
    requested: (url: string) => calls.filter((call) => call.url === url).length,
  };
}

/** Three stops chained by "Volgende" links; the last one only links back. */
export function threePageArchive(): Record<string, FixtureRoute | FixtureRoute[]> {
  const [first, second, third] = DATES;
  return {
    [tocUrl(first)]: tocPage({ next: tocName(second) }),
    [tocUrl(second)]: tocPage({ previous: tocName(first), next: tocName(third) }),
    [tocUrl(third)]: tocPage({ previous: tocName(second) }),
    [docUrl(first)]: documentPage(documentParagraphs(first)),
    [docUrl(second)]: documentPage(documentParagraphs(second)),
    [docUrl(third)]: documentPage(documentParagraphs(third)),
  };
}

export const testWalkerConfig = (
  overrides: Partial<WalkerConfig> = {},
): WalkerConfig => ({
  startUrl: tocUrl(DATES[0]),
  source: "Test Texts",
  nextLabel: "Volgende",
  previousLabel: "Vorige",
  contentSelector: "#website-body",
  ignoreSelectors: [],
  stripPatterns: [],
  minTextLength: 10,
  throttleMs: 0,
  tolerateMissingDocuments: false,
  retry: { ...DEFAULT_RETRY_OPTIONS, attempts: 2, delayMs: 0 },
  ...overrides,
});

export const testJob: ArchiveJob = {
  version: "9.9.9",
  startUrl: tocUrl(DATES[0]),
  nextLabel: "Volgende",
  previousLabel: "Vorige",
  contentSelector: "#website-body",
  minTextLength: 10,
  dataset: {
    name: "Test-Dataset",
    title: "Test Texts",
    description: "Fixture documents",
    language: "nl",
  },
};

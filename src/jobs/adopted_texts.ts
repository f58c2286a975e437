import type { ArchiveJob } from "../lib/ArchiveJob";
import { DUTCH_PROCEDURAL_NOTES } from "./procedural_nl";

export const ADOPTED_TEXTS_VERSION = "0.1.0";

const job: ArchiveJob = {
  version: ADOPTED_TEXTS_VERSION,
  startUrl:
    "https://www.europarl.europa.eu/doceo/document/TA-5-1999-07-21-TOC_NL.html",
  nextLabel: "Volgende",
  previousLabel: "Vorige",
  contentSelector: "#website-body",
  ignoreSelectors: [".doc_box_header", ".nav_doc", ".ep_dropdown"],
  stripPatterns: DUTCH_PROCEDURAL_NOTES,
  dataset: {
    name: "Dutch-European-Parliament-Adopted-Texts",
    title: "European Parliament Adopted Texts (Dutch)",
    description:
      "Texts adopted by the European Parliament since the fifth parliamentary term, in their Dutch version, one record per sitting",
    language: "nl",
  },
};

export default job;

import type { ArchiveJob } from "../lib/ArchiveJob";
import { DUTCH_PROCEDURAL_NOTES } from "./procedural_nl";

export const VERBATIM_REPORTS_VERSION = "0.1.0";

const job: ArchiveJob = {
  version: VERBATIM_REPORTS_VERSION,
  startUrl:
    "https://www.europarl.europa.eu/doceo/document/CRE-5-1999-07-20-TOC_NL.html",
  nextLabel: "Volgende",
  previousLabel: "Vorige",
  contentSelector: "#website-body",
  ignoreSelectors: [".doc_box_header", ".nav_doc", ".ep_dropdown"],
  stripPatterns: DUTCH_PROCEDURAL_NOTES,
  dataset: {
    name: "Dutch-European-Parliament-Verbatim-Reports",
    title: "European Parliament Verbatim Reports (Dutch)",
    description:
      "Verbatim reports of proceedings of the European Parliament plenary sittings, in their Dutch version, one record per sitting",
    language: "nl",
  },
};

export default job;

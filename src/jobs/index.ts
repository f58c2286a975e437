import type { ArchiveJob } from "../lib/ArchiveJob";
import adoptedTexts from "./adopted_texts";
import verbatimReports from "./verbatim_reports";

export const availableJobs = new Map<string, ArchiveJob>([
  ["adopted_texts", adoptedTexts],
  ["verbatim_reports", verbatimReports],
]);

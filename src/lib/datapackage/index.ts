import type { DocumentRecord } from "../archive/types";
import type { ArchiveJob } from "../ArchiveJob";

type DataPackageLicense = {
  title?: string;
} & ({ name: string } | { path: string } | { name: string; path: string });

type DataPackageSource = {
  title: string;
  path?: string;
};

type TableSchemaField = {
  name: keyof DocumentRecord;
  type: "string" | "date";
  format?: string;
  description: string;
};

export interface DataResource {
  name: string;
  path: string;
  format: "jsonl";
  mediatype: string;
  encoding: "utf-8";
  title: string;
  description: string;
  schema: { fields: TableSchemaField[]; primaryKey: string };
}

export interface DataPackage {
  $schema: string;
  name: string;
  title: string;
  description: string;
  version: string;
  homepage: string;
  keywords: string[];
  licenses: DataPackageLicense[];
  sources: DataPackageSource[];
  resources: DataResource[];
  created: string;
}

export type DatasetFile = { path: string; content: string };

export const RECORDS_PATH = "data/train.jsonl";

const FIELDS: TableSchemaField[] = [
  { name: "url", type: "string", format: "uri", description: "Full-document URL" },
  { name: "date", type: "date", description: "Sitting date, taken from the URL" },
  { name: "text", type: "string", description: "Cleaned plain text, paragraphs separated by a blank line" },
  { name: "source", type: "string", description: "Collection the document belongs to" },
  { name: "tocUrl", type: "string", format: "uri", description: "Table-of-contents page the document was reached from" },
];

const SOURCES: DataPackageSource[] = [
  {
    title: "European Parliament - doceo document archive",
    path: "https://www.europarl.europa.eu/doceo/",
  },
];

export const toJsonLines = (records: readonly DocumentRecord[]): string =>
  records
    .map(({ url, date, text, source, tocUrl }) =>
      JSON.stringify({ url, date, text, source, tocUrl }),
    )
    .map((line) => `${line}\n`)
    .join("");

export function buildDataPackage(
  job: ArchiveJob,
  repoId: string,
  created: string,
): DataPackage {
  return {
    $schema: "https://datapackage.org/profiles/2.0/datapackage.json",
    name: job.dataset.name.toLowerCase(),
    title: job.dataset.title,
    description: job.dataset.description,
    version: job.version,
    homepage: `https://huggingface.co/datasets/${repoId}`,
    keywords: ["parliament", "european-parliament", "legislation", job.dataset.language],
    licenses: [
      {
        name: "CC-BY-4.0",
        title: "Creative Commons Attribution 4.0 International",
        path: "https://creativecommons.org/licenses/by/4.0/",
      },
    ],
    sources: SOURCES,
    resources: [
      {
        name: "train",
        path: RECORDS_PATH,
        format: "jsonl",
        mediatype: "application/jsonl",
        encoding: "utf-8",
        title: job.dataset.title,
        description: job.dataset.description,
        schema: { fields: FIELDS, primaryKey: "url" },
      },
    ],
    created,
  };
}

export function buildDatasetCard(
  job: ArchiveJob,
  records: readonly DocumentRecord[],
): string {
  const first = records[0]?.date ?? "n/a";
  const last = records.at(-1)?.date ?? "n/a";

  return [
    "---",
    "license: cc-by-4.0",
    "language:",
    `- ${job.dataset.language}`,
    "configs:",
    "- config_name: default",
    "  data_files:",
    "  - split: train",
    `    path: ${RECORDS_PATH}`,
    "---",
    "",
    `# ${job.dataset.title}`,
    "",
    job.dataset.description,
    "",
    `- Documents: ${records.length}`,
    `- Sittings covered: ${first} to ${last}`,
    `- Source: ${SOURCES[0]?.path}`,
    "",
    "Fields: " + FIELDS.map((field) => `\`${field.name}\``).join(", "),
    "",
  ].join("\n");
}

export const buildDatasetFiles = (
  job: ArchiveJob,
  records: readonly DocumentRecord[],
  repoId: string,
  created = new Date().toISOString(),
): DatasetFile[] => [
  { path: RECORDS_PATH, content: toJsonLines(records) },
  {
    path: "datapackage.json",
    content: JSON.stringify(buildDataPackage(job, repoId, created), null, 2),
  },
  { path: "README.md", content: buildDatasetCard(job, records) },
];

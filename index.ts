#!/usr/bin/env tsx
import "dotenv/config";
import { availableJobs } from "./src/jobs";
import { loadRuntimeConfig, type RuntimeConfig } from "./src/lib/config";
import { ConfigError } from "./src/lib/errors";
import { logger } from "./src/lib/log";
import {
  type ArchiveRunResult,
  exitCodeFor,
  publishSnapshot,
  runArchive,
} from "./src/lib/runArchive";

const args = process.argv.slice(2);
const command = args[0];

let runtime: RuntimeConfig;
try {
  runtime = loadRuntimeConfig();
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  console.error(`[runner] ${error.message}`);
  process.exit(1);
}

const isVerbose = args.includes("--verbose") || args.includes("-v");
logger.level = isVerbose ? "debug" : runtime.logLevel;
if (isVerbose) {
  console.log("[debug] Verbose mode enabled");
}

const isDryRun = args.includes("--dry-run") || args.includes("-n");

function showHelp() {
  console.log("European Parliament doceo archive scraper\n");
  console.log("USAGE");
  console.log("  doceo-scrape walk [--verbose|-v] [--dry-run|-n] <job1> <job2> ...");
  console.log("  doceo-scrape walk [--verbose|-v] [--dry-run|-n] --all");
  console.log("  doceo-scrape publish [--verbose|-v] <job1> <job2> ...");
  console.log("  doceo-scrape --help");
  console.log("");
  console.log("COMMANDS");
  console.log("  walk              Walk the archive, write a snapshot and publish it");
  console.log("  publish           Publish the last snapshot without walking again");
  console.log("");
  console.log("FLAGS");
  console.log("  -v --verbose      Enable debug logging");
  console.log("  -n --dry-run      Walk and write the snapshot, skip publishing");
  console.log("  -h --help         Print this help information and exit");
  console.log("");
  console.log("ENVIRONMENT");
  console.log("  HF_USERNAME, HF_TOKEN   Hugging Face identity used to publish");
  console.log("  PUBLISH_PARTIAL         Publish walks that were cut short (default: true)");
  console.log("  MAX_STOPS, START_URL    Limit or relocate the walk");
  console.log("");
  console.log("EXIT CODES");
  console.log("  0  every walk reached the end and was published");
  console.log("  1  a walk failed or collected nothing");
  console.log("  2  publishing failed");
  console.log("");
  console.log("Available jobs:");
  for (const [jobName, job] of availableJobs) {
    console.log(
      `  ${jobName.padEnd(20)} ${job.dataset.title} (version: ${job.version})`,
    );
  }
}

function selectJobs(): string[] {
  if (args.includes("--all")) {
    return Array.from(availableJobs.keys());
  }

  const jobArgs = args.slice(1).filter((arg) => !arg.startsWith("-"));
  const invalidJobs = jobArgs.filter((jobName) => !availableJobs.has(jobName));
  if (invalidJobs.length > 0) {
    console.error(`[runner] Unknown jobs: ${invalidJobs.join(", ")}`);
    process.exit(1);
  }
  if (jobArgs.length === 0) {
    console.log("[runner] No jobs specified.\n");
    showHelp();
    process.exit(0);
  }
  return jobArgs;
}

if (args.includes("--help") || args.includes("-h") || !command) {
  showHelp();
  process.exit(0);
}

if (command !== "walk" && command !== "publish") {
  console.error(`[runner] Unknown command: ${command}`);
  console.log("");
  showHelp();
  process.exit(1);
}

const controller = new AbortController();
process.once("SIGINT", () => {
  console.log("\n[runner] Interrupted, finishing the current document…");
  controller.abort(new Error("SIGINT"));
});

const jobsToRun = selectJobs();
console.log(`[runner] Running ${jobsToRun.length} job(s): ${jobsToRun.join(", ")}`);

const results: ArchiveRunResult[] = [];
for (const jobName of jobsToRun) {
  const job = availableJobs.get(jobName);
  if (!job) continue;

  console.log(`\n[runner] ${command}: ${job.dataset.title} (version: ${job.version})`);
  try {
    const options = { runtime, dryRun: isDryRun, signal: controller.signal };
    results.push(
      command === "walk"
        ? await runArchive(jobName, job, options)
        : await publishSnapshot(jobName, job, options),
    );
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`[runner] ${jobName} failed:`, errorMessage);
    process.exit(1);
  }
}

console.log("");
for (const result of results) {
  console.log(
    `[runner] ${result.jobName}: ${result.state}, ${result.collected} collected, ${result.skipped} skipped, publish ${result.publish}${result.error ? ` (${result.error})` : ""}`,
  );
}

process.exit(exitCodeFor(results));

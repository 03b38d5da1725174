/**
 * merge-processor.ts — Merge run orchestration
 *
 * PURPOSE:
 *   One full pass of the merger: catalog the camera directories, plan one
 *   job per (date, camera), run the jobs concurrently while a reporter loop
 *   draws live progress, and summarize.
 *
 * FLOW:
 *   buildCatalog → filterByDate? → listGroups → planMerge (per group)
 *     → aggregator.registerGroup (all groups, up front)
 *     → reporter.start()
 *     → runPool(executeMerge, max_parallel)
 *     → reporter.stop() → summary → per-job outcome lines
 *
 * CONCURRENCY:
 *   - One worker per group, bounded by performance_settings.max_parallel
 *     (unbounded when unset)
 *   - Jobs are independent; a failed camera never blocks or undoes another
 *
 * ERROR HANDLING:
 *   executeMerge never throws, so the run always completes and reports
 *   succeeded/total. Only configuration problems stop a run, and those
 *   surface before this module is reached.
 */

import { mkdir } from "fs/promises";
import { buildCatalog, filterByDate, listGroups, summarizeGroup } from "../lib/catalog/build";
import { formatDate } from "../lib/catalog/filename";
import { cameraDisplayName, type AppConfig } from "../lib/config/schema";
import { executeMerge } from "../lib/merge/executor";
import { planMerge } from "../lib/merge/plan";
import type { MergeJob, MergeResult } from "../lib/merge/types";
import { ProgressAggregator } from "../lib/progress/aggregator";
import { renderSummary } from "../lib/progress/render";
import { ProgressReporter, type ProgressOutput } from "../lib/progress/reporter";
import type { ToolRunner } from "../lib/video/commands";
import { formatMegabytes } from "../lib/utils/format";
import { log } from "../lib/utils/logger";
import { runPool } from "../lib/utils/pool";

export interface RunOptions {
  /** YYYYMMDD; restricts the run to one capture date. */
  targetDate?: string;
  /** Print start/end time, file count and size per group before merging. */
  showInfo?: boolean;
  /** Live progress display and the final summary. */
  showProgress?: boolean;
  runTool?: ToolRunner;
  output?: ProgressOutput;
  reporterIntervalMs?: number;
  now?: () => number;
}

export interface RunSummary {
  succeeded: number;
  total: number;
  results: MergeResult[];
  /** Camera tags whose directory was missing. */
  missingCameras: string[];
}

function describeConfig(config: AppConfig, output: ProgressOutput): void {
  const lines = ["Configured camera paths:"];
  for (const [camera, dir] of config.cameraPaths) {
    lines.push(`  ${cameraDisplayName(config, camera)} (${camera}): ${dir}`);
  }
  lines.push(`Output directory: ${config.outputDir}`);
  output.write(lines.join("\n") + "\n");
}

function describeJob(job: MergeJob, output: ProgressOutput): void {
  const summary = summarizeGroup(job.clips);
  if (!summary) return;
  output.write(
    [
      `--- ${job.label} (${job.camera}) ---`,
      `  Start: ${summary.startTime}`,
      `  End: ${summary.endTime}`,
      `  Files: ${summary.fileCount}`,
      `  Total size: ${formatMegabytes(summary.totalBytes)}`,
    ].join("\n") + "\n"
  );
}

/** One line for every job that did not end in a clean success. */
export function outcomeLine(result: MergeResult): string | null {
  if (result.state === "partial_salvage") {
    return `${result.jobId}: salvaged re-encode output after ffmpeg reported an error (${result.outputPath})\n`;
  }
  if (result.ok) return null;
  const kept = result.preservedPath ? `; staged output kept at ${result.preservedPath}` : "";
  return `${result.jobId}: ${result.error ?? "merge failed"}${kept}\n`;
}

export async function runMerge(config: AppConfig, options: RunOptions = {}): Promise<RunSummary> {
  const output = options.output ?? process.stdout;
  const showProgress = options.showProgress ?? true;

  await mkdir(config.outputDir, { recursive: true });

  const { catalog: fullCatalog, missingCameras } = await buildCatalog(
    config.cameraPaths,
    config.videoPattern
  );

  if (fullCatalog.size === 0) {
    output.write("No clips found to merge\n");
    return { succeeded: 0, total: 0, results: [], missingCameras };
  }

  describeConfig(config, output);

  let catalog = fullCatalog;
  if (options.targetDate) {
    catalog = filterByDate(fullCatalog, options.targetDate);
    if (catalog.size === 0) {
      output.write(`No clips found for date ${options.targetDate}\n`);
      log("warn", "run", undefined, "Target date not present in catalog", {
        targetDate: options.targetDate,
      });
      return { succeeded: 0, total: 0, results: [], missingCameras };
    }
    output.write(`Target date: ${formatDate(options.targetDate)}\n`);
  } else {
    output.write(`Dates found: ${catalog.size}\n`);
  }

  const jobs = listGroups(catalog).map((group) =>
    planMerge(group, {
      outputDir: config.outputDir,
      scratchDir: config.scratchDir,
      useLocalStaging: config.useLocalProcessing,
      outputExtension: config.outputExtension,
      cameraName: (camera) => cameraDisplayName(config, camera),
    })
  );

  if (options.showInfo ?? true) {
    for (const job of jobs) describeJob(job, output);
  }

  const aggregator = new ProgressAggregator(options.now);
  for (const job of jobs) {
    aggregator.registerGroup(job.id, job.clips.length, job.totalBytes, job.label);
  }

  const reporter = new ProgressReporter(aggregator, {
    style: config.progressStyle,
    intervalMs: options.reporterIntervalMs,
    output,
  });
  if (showProgress) reporter.start();

  log("info", "run", undefined, `Merging ${jobs.length} groups`, {
    maxParallel: config.maxParallel ?? "unbounded",
    localStaging: config.useLocalProcessing,
  });

  let results: MergeResult[];
  try {
    results = await runPool(jobs, config.maxParallel, (job) =>
      executeMerge(job, {
        copyProfile: config.copyProfile,
        reencodeProfile: config.reencodeProfile,
        toolTimeoutMs: config.toolTimeoutMs,
        runTool: options.runTool,
        progress: aggregator,
      })
    );
  } finally {
    await reporter.stop();
  }

  const succeeded = results.filter((result) => result.ok).length;
  if (showProgress) output.write(renderSummary(aggregator.snapshot()));
  output.write(`Merged: ${succeeded}/${results.length} groups\n`);

  // Written after the reporter has stopped: the bar style clears the screen
  // on every frame, so anything printed during the run is gone by now.
  for (const result of results) {
    const line = outcomeLine(result);
    if (line) output.write(line);
  }

  log("info", "run", undefined, "Run complete", {
    succeeded,
    total: results.length,
    salvaged: results.filter((result) => result.state === "partial_salvage").length,
  });

  return { succeeded, total: results.length, results, missingCameras };
}

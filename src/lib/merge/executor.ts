/**
 * executor.ts — Two-tier merge executor
 *
 * PURPOSE:
 *   Runs one MergeJob through the merge state machine (see types.ts):
 *
 *   1. COPY ATTEMPT — stream copy through the concat demuxer. Fast and
 *      lossless; succeeds for the overwhelming majority of groups.
 *   2. RE-ENCODE ATTEMPT — only after copy exited non-zero. Exactly one
 *      escalation, never more.
 *   3. SALVAGE — if the re-encode exits non-zero but left a non-empty output,
 *      the job counts as a qualified success. ffmpeg often writes a usable
 *      file and then fails on trailing-frame or timestamp warnings.
 *   4. RELOCATION — with local staging, the staged output is moved to the
 *      destination. A failed move fails the job: the job is done when the
 *      file is where the user expects it.
 *   5. CLEANUP — the manifest and any leftover staged output are removed
 *      whatever happened. A staged output whose move failed is kept for
 *      manual recovery. Cleanup failures are logged and dropped.
 *
 *   ToolNotFound ends the job immediately, without a re-encode attempt.
 *
 * CONCURRENCY:
 *   Stateless across jobs. Each job owns its manifest and output paths
 *   (derived from date + camera), and the only shared object it touches is
 *   the ProgressSink.
 *
 * ERROR HANDLING:
 *   Nothing escapes executeMerge. Every failure becomes a MergeResult with a
 *   terminal state, an error code and a status line in the progress sink.
 */

import { copyFile, mkdir, rename, rm, stat, unlink } from "fs/promises";
import { basename, dirname } from "path";
import type { CopyProfile, ReencodeProfile } from "../config/schema";
import { runFFmpeg, type ToolRunner } from "../video/commands";
import { copyArgs, reencodeArgs, writeManifest } from "../video/concat";
import { MergeError, describeError, errnoCode, isMergeError } from "../utils/errors";
import { log } from "../utils/logger";
import type { ProgressSink } from "../progress/aggregator";
import type {
  MergeJob,
  MergeResult,
  MergeState,
  TerminalMergeState,
  TranscodeProfile,
} from "./types";

export interface ExecuteOptions {
  copyProfile: CopyProfile;
  reencodeProfile: ReencodeProfile;
  /** Defaults to the real ffmpeg binary. */
  runTool?: ToolRunner;
  progress?: ProgressSink;
  /** 0 disables the ffmpeg timeout. */
  toolTimeoutMs?: number;
}

interface JobContext {
  job: MergeJob;
  options: ExecuteOptions;
  runTool: ToolRunner;
  /** Where ffmpeg writes: the staging path when staging, else the final path. */
  writePath: string;
  producedBy: TranscodeProfile | null;
  failure: MergeError | null;
  toolStderr?: string;
}

export function isTerminalState(state: MergeState): state is TerminalMergeState {
  return state === "success" || state === "partial_salvage" || state === "failed";
}

function report(
  ctx: JobContext,
  currentFile: number,
  currentFileName: string,
  processedBytes: number,
  status: string
): void {
  ctx.options.progress?.updateGroup(
    ctx.job.id,
    currentFile,
    currentFileName,
    processedBytes,
    `${ctx.job.label} ${status}`
  );
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return 0;
    throw error;
  }
}

async function removeQuietly(path: string, jobId: string | undefined, what: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    log("warn", "merge", jobId, `Could not remove ${what}`, {
      code: "CleanupFailed",
      path,
      error: describeError(error),
    });
  }
}

/**
 * rename() cannot cross filesystems; staging on local disk and delivering to
 * a network share is exactly that case, so fall back to copy + unlink.
 *
 * Once the copy has landed the move counts as done: a source that cannot be
 * unlinked is a cleanup failure. A copy that breaks midway is removed from
 * the destination so no truncated file sits under the final name.
 */
export async function relocate(from: string, to: string, jobId?: string): Promise<void> {
  try {
    await rename(from, to);
    return;
  } catch (error) {
    if (errnoCode(error) !== "EXDEV") throw error;
  }

  try {
    await copyFile(from, to);
  } catch (error) {
    await removeQuietly(to, jobId, "partial destination copy");
    throw error;
  }

  try {
    await unlink(from);
  } catch (error) {
    log("warn", "merge", jobId, "Could not remove staged output after copying it", {
      code: "CleanupFailed",
      path: from,
      error: describeError(error),
    });
  }
}

async function prepare(ctx: JobContext): Promise<void> {
  const { job } = ctx;
  await mkdir(dirname(job.manifestPath), { recursive: true });
  await mkdir(dirname(ctx.writePath), { recursive: true });
  await mkdir(dirname(job.outputPath), { recursive: true });
  await writeManifest(
    job.manifestPath,
    job.clips.map((clip) => clip.path)
  );
}

async function attempt(ctx: JobContext, profile: TranscodeProfile): Promise<boolean> {
  const { job, options } = ctx;
  const args =
    profile === "copy"
      ? copyArgs(job.manifestPath, ctx.writePath, options.copyProfile)
      : reencodeArgs(job.manifestPath, ctx.writePath, options.reencodeProfile);

  const firstClip = job.clips[0]?.fileName ?? "";
  report(ctx, 0, firstClip, 0, profile === "copy" ? "stream copy" : "re-encoding");
  log("info", "merge", job.id, `Running ${profile} merge of ${job.clips.length} clips`, {
    output: ctx.writePath,
  });

  try {
    await ctx.runTool(args, { timeoutMs: options.toolTimeoutMs ?? 0 });
    ctx.producedBy = profile;
    report(ctx, job.clips.length, basename(ctx.writePath), job.totalBytes, `transcoded (${profile})`);
    return true;
  } catch (error) {
    ctx.failure = isMergeError(error)
      ? error
      : new MergeError(describeError(error), "TranscodeFailed");
    ctx.toolStderr = ctx.failure.detail;
    log(ctx.failure.code === "ToolNotFound" ? "error" : "warn", "merge", job.id, `${profile} merge failed`, {
      code: ctx.failure.code,
      error: ctx.failure.message,
    });
    return false;
  }
}

async function step(ctx: JobContext, state: MergeState): Promise<MergeState> {
  const { job } = ctx;
  switch (state) {
    case "planned":
      try {
        await prepare(ctx);
      } catch (error) {
        ctx.failure = new MergeError(`Could not write manifest: ${describeError(error)}`, "TranscodeFailed");
        return "failed";
      }
      return job.profile === "copy" ? "copy_attempt" : "reencode_attempt";

    case "copy_attempt":
      if (await attempt(ctx, "copy")) return "success";
      if (ctx.failure?.code === "ToolNotFound") return "failed";
      // Salvage must only ever look at bytes the re-encode wrote.
      await removeQuietly(ctx.writePath, job.id, "partial copy output");
      return "reencode_attempt";

    case "reencode_attempt": {
      if (await attempt(ctx, "reencode")) return "success";
      if (ctx.failure?.code === "ToolNotFound") return "failed";
      const size = await fileSize(ctx.writePath);
      if (size > 0) {
        ctx.producedBy = "reencode";
        log("warn", "merge", job.id, "Re-encode exited with an error but produced output; salvaging it", {
          output: ctx.writePath,
          sizeBytes: size,
        });
        return "partial_salvage";
      }
      return "failed";
    }

    default:
      return state;
  }
}

export async function executeMerge(job: MergeJob, options: ExecuteOptions): Promise<MergeResult> {
  const startTime = Date.now();
  const ctx: JobContext = {
    job,
    options,
    runTool: options.runTool ?? runFFmpeg,
    writePath: job.stagingPath ?? job.outputPath,
    producedBy: null,
    failure: null,
  };
  const transitions: MergeState[] = ["planned"];
  let preservedPath: string | undefined;

  report(ctx, 0, "", 0, "starting");

  let state: MergeState = "planned";
  try {
    while (!isTerminalState(state)) {
      state = await step(ctx, state);
      transitions.push(state);
    }

    if (state !== "failed" && job.stagingPath) {
      try {
        await relocate(job.stagingPath, job.outputPath, job.id);
        report(ctx, job.clips.length, basename(job.outputPath), job.totalBytes, "moved to destination");
      } catch (error) {
        ctx.failure = new MergeError(
          `Could not move ${job.stagingPath} to ${job.outputPath}: ${describeError(error)}`,
          "RelocationFailed"
        );
        preservedPath = job.stagingPath;
        log("error", "merge", job.id, "Relocation failed; staged output kept for manual recovery", {
          stagedOutput: job.stagingPath,
          destination: job.outputPath,
          error: describeError(error),
        });
        state = "failed";
        transitions.push(state);
      }
    }
  } catch (error) {
    ctx.failure = new MergeError(describeError(error), "TranscodeFailed");
    state = "failed";
    transitions.push(state);
  } finally {
    await removeQuietly(job.manifestPath, job.id, "manifest");
    if (job.stagingPath && !preservedPath) {
      await removeQuietly(job.stagingPath, job.id, "staged output");
    }
  }

  const terminal: TerminalMergeState = isTerminalState(state) ? state : "failed";
  const ok = terminal !== "failed";
  let outputBytes = 0;
  if (ok) {
    try {
      outputBytes = await fileSize(job.outputPath);
    } catch (error) {
      log("warn", "merge", job.id, "Could not read merged output size", {
        output: job.outputPath,
        error: describeError(error),
      });
    }
  }
  const elapsedMs = Date.now() - startTime;

  if (ok) {
    const suffix = terminal === "partial_salvage" ? "done (salvaged)" : `done (${ctx.producedBy ?? "copy"})`;
    report(ctx, job.clips.length, basename(job.outputPath), job.totalBytes, suffix);
    log(terminal === "partial_salvage" ? "warn" : "info", "merge", job.id, `Completed ${job.label}`, {
      state: terminal,
      profile: ctx.producedBy,
      output: job.outputPath,
      sizeBytes: outputBytes,
      elapsedSec: (elapsedMs / 1000).toFixed(1),
    });
  } else {
    const message = ctx.failure?.message ?? "Merge failed";
    report(ctx, 0, "", 0, `failed: ${ctx.failure?.code ?? "TranscodeFailed"}`);
    log("error", "merge", job.id, `Failed ${job.label}`, {
      code: ctx.failure?.code,
      error: message,
      elapsedSec: (elapsedMs / 1000).toFixed(1),
    });
  }

  return {
    jobId: job.id,
    state: terminal,
    ok,
    profile: ok ? ctx.producedBy : null,
    transitions,
    outputPath: job.outputPath,
    outputBytes,
    ...(ok ? {} : { errorCode: ctx.failure?.code ?? "TranscodeFailed", error: ctx.failure?.message ?? "Merge failed" }),
    ...(ctx.toolStderr !== undefined && !ok ? { toolStderr: ctx.toolStderr } : {}),
    ...(preservedPath ? { preservedPath } : {}),
    elapsedMs,
  };
}

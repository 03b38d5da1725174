/**
 * commands.ts — Low-level FFmpeg execution wrapper
 *
 * PURPOSE:
 *   A thin, typed wrapper around the ffmpeg binary. Every merge attempt goes
 *   through runFFmpeg, and the merge executor only ever sees two outcomes
 *   besides success:
 *
 *   - ToolNotFound     the binary could not be spawned at all (ENOENT)
 *   - TranscodeFailed  ffmpeg ran and exited non-zero; stderr is attached
 *
 *   Control flow never depends on stderr text. It is kept for diagnostics.
 *
 * ARCHITECTURE:
 *   - Used by: concat.ts (argument builders), merge/executor.ts (via ToolRunner)
 *   - FFmpeg path is configurable via FFMPEG_PATH env var (for installs where
 *     the binary is not on the system PATH)
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { MergeError, errnoCode } from "../utils/errors";

const execFileAsync = promisify(execFile);

/**
 * Resolved lazily so a .env loaded by the CLI is honoured.
 */
export function getFFmpegPath(): string {
  return process.env.FFMPEG_PATH || "ffmpeg";
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** 0 disables the timeout. */
  timeoutMs?: number;
}

/**
 * Signature shared by runFFmpeg and any in-process stand-in for it.
 */
export type ToolRunner = (args: string[], options?: RunOptions) => Promise<ExecResult>;

function stderrOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string") return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf-8");
  }
  return undefined;
}

/**
 * Execute ffmpeg with the given arguments.
 *
 * @param args - CLI arguments, e.g. ["-f", "concat", "-i", "list.txt", "-c", "copy", "out.mp4"]
 * @throws MergeError ToolNotFound when the binary is missing,
 *         TranscodeFailed (with stderr as detail) on a non-zero exit
 */
export const runFFmpeg: ToolRunner = async (args, options = {}) => {
  const binary = getFFmpegPath();
  try {
    const result = await execFileAsync(binary, args, {
      maxBuffer: 50 * 1024 * 1024, // 50MB buffer — concat of long days gets chatty
      timeout: options.timeoutMs ?? 0,
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOENT") {
      throw new MergeError(
        `FFmpeg not found (${binary}). Install ffmpeg or point FFMPEG_PATH at the binary.`,
        "ToolNotFound"
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new MergeError(`FFmpeg failed: ${message}`, "TranscodeFailed", stderrOf(error) || "N/A");
  }
};

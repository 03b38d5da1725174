/**
 * types.ts — Merge job and outcome types
 *
 * A MergeJob is planned once per Group and consumed once by the executor.
 * The executor walks the state machine below and reports every state it
 * entered, so the path taken (copy, re-encode, salvage) is observable:
 *
 *   planned → copy_attempt → success
 *                          → reencode_attempt → success
 *                                             → partial_salvage
 *                                             → failed
 *                          → failed            (ToolNotFound)
 *
 *   success / partial_salvage → failed when relocation out of the scratch
 *   area fails.
 */

import type { Clip } from "../catalog/types";
import type { MergeErrorCode } from "../utils/errors";

export type MergeState =
  | "planned"
  | "copy_attempt"
  | "reencode_attempt"
  | "success"
  | "partial_salvage"
  | "failed";

export type TerminalMergeState = Extract<MergeState, "success" | "partial_salvage" | "failed">;

export type TranscodeProfile = "copy" | "reencode";

export interface MergeJob {
  id: string;
  date: string;
  camera: string;
  /** Display label for progress and logs, e.g. "2025-09-06 Front". */
  label: string;
  clips: readonly Clip[];
  totalBytes: number;
  manifestPath: string;
  /** Where the merged file must end up. */
  outputPath: string;
  /** Where ffmpeg writes when local staging is on; null otherwise. */
  stagingPath: string | null;
  /** Starts at "copy"; the executor escalates to "reencode" at most once. */
  profile: TranscodeProfile;
}

export interface MergeResult {
  jobId: string;
  state: TerminalMergeState;
  /** True for success and partial_salvage. */
  ok: boolean;
  /** Profile of the attempt that produced the output, null when none did. */
  profile: TranscodeProfile | null;
  transitions: MergeState[];
  outputPath: string;
  outputBytes: number;
  errorCode?: MergeErrorCode;
  error?: string;
  /** stderr of the last failed ffmpeg attempt. */
  toolStderr?: string;
  /** Set when relocation failed and the staged output was kept for recovery. */
  preservedPath?: string;
  elapsedMs: number;
}

/**
 * errors.ts — Merge error taxonomy
 *
 * PURPOSE:
 *   One error class for every failure the merger knows how to name. The
 *   `code` decides how far an error travels:
 *
 *   - ConfigInvalid      fatal at startup, the run never begins
 *   - CameraPathMissing  that camera is skipped, others proceed
 *   - NoMatch            the file is skipped silently
 *   - ToolNotFound       fatal for the affected job only
 *   - TranscodeFailed    escalates copy → re-encode once, then fails the job
 *   - RelocationFailed   fails the job even though the transcode succeeded
 *   - CleanupFailed      always swallowed
 *
 * USAGE:
 *   - throw new MergeError("ffmpeg exited with code 1", "TranscodeFailed", stderr)
 *   - catch at the job boundary → describeError(error) for the status text
 */

export type MergeErrorCode =
  | "ConfigInvalid"
  | "CameraPathMissing"
  | "NoMatch"
  | "ToolNotFound"
  | "TranscodeFailed"
  | "RelocationFailed"
  | "CleanupFailed";

export class MergeError extends Error {
  constructor(
    message: string,
    public code: MergeErrorCode,
    public detail?: string
  ) {
    super(message);
    this.name = "MergeError";
  }
}

export function isMergeError(
  error: unknown,
  code?: MergeErrorCode
): error is MergeError {
  return error instanceof MergeError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

/**
 * Node's system errors carry a string `code` (ENOENT, EXDEV, ...).
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

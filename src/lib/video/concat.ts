/**
 * concat.ts — Clip concatenation commands
 *
 * PURPOSE:
 *   Builds the concat-demuxer manifest and the two ffmpeg command lines the
 *   merge executor tries in order:
 *
 *   1. Stream copy — `-c:v copy -c:a copy`, lossless and near-instant because
 *      nothing is decoded. Works whenever every clip in the group shares the
 *      same codec parameters, which is the normal case for one camera.
 *   2. Re-encode — decodes and re-compresses with the configured codec,
 *      preset, CRF and thread count. Used when stream copy is rejected
 *      (mid-day resolution change, corrupted trailer, odd timestamps).
 *
 * MANIFEST FORMAT:
 *   One `file '<absolute path>'` line per clip, in playback order. Paths are
 *   forward-slashed and single quotes are escaped the way the concat demuxer
 *   expects ('\'' closes, escapes and reopens the quote).
 */

import { writeFile } from "fs/promises";
import type { CopyProfile, ReencodeProfile } from "../config/schema";

export function manifestLine(absolutePath: string): string {
  const normalized = absolutePath.replace(/\\/g, "/").replace(/'/g, "'\\''");
  return `file '${normalized}'`;
}

export function buildManifest(clipPaths: readonly string[]): string {
  return clipPaths.map(manifestLine).join("\n") + "\n";
}

export async function writeManifest(
  manifestPath: string,
  clipPaths: readonly string[]
): Promise<void> {
  await writeFile(manifestPath, buildManifest(clipPaths), "utf-8");
}

function concatInput(manifestPath: string): string[] {
  return ["-f", "concat", "-safe", "0", "-i", manifestPath];
}

export function copyArgs(
  manifestPath: string,
  outputPath: string,
  profile: CopyProfile
): string[] {
  return [
    ...concatInput(manifestPath),
    "-c:v",
    profile.videoCodec,
    "-c:a",
    profile.audioCodec,
    // Clip boundaries restart timestamps; regenerate them so the merged
    // file does not stall at every joint.
    "-avoid_negative_ts",
    "make_zero",
    "-fflags",
    "+genpts",
    "-y",
    outputPath,
  ];
}

export function reencodeArgs(
  manifestPath: string,
  outputPath: string,
  profile: ReencodeProfile
): string[] {
  return [
    ...concatInput(manifestPath),
    "-threads",
    String(profile.threads),
    "-c:v",
    profile.videoCodec,
    "-c:a",
    profile.audioCodec,
    "-preset",
    profile.preset,
    "-crf",
    profile.crf,
    "-avoid_negative_ts",
    "make_zero",
    "-y",
    outputPath,
  ];
}

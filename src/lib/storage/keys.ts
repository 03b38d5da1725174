/**
 * keys.ts — Output and manifest file names
 *
 * PURPOSE:
 *   Deterministic names keyed only by (date, camera). A re-run for the same
 *   group lands on the same path and overwrites the previous result, and two
 *   groups can never collide on a manifest or an output.
 *
 * NAME STRUCTURE:
 *   merged_{YYYY-MM-DD}_{camera}.{ext}   final (and staged) merge output
 *   filelist_{YYYYMMDD}_{camera}.txt     concat manifest, always removed
 */

import { formatDate } from "../catalog/filename";

export function mergeJobId(date: string, camera: string): string {
  return `${date}_${camera}`;
}

export function mergedOutputName(date: string, camera: string, ext: string): string {
  return `merged_${formatDate(date)}_${camera}.${ext}`;
}

export function manifestName(date: string, camera: string): string {
  return `filelist_${date}_${camera}.txt`;
}

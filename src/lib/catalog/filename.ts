/**
 * filename.ts — Clip filename parsing
 *
 * The configured pattern has four capture groups, in order: date, time,
 * sequence, camera position. For the default device naming:
 *
 *   NO20250906-134056-000895F.MP4 → 20250906 / 134056 / 000895 / F
 *
 * The pattern is anchored at the start of the filename, not at the end; add
 * `$` to the pattern itself to reject trailing text.
 */

import type { ClipFields } from "./types";

export function compileClipPattern(source: string): RegExp {
  return new RegExp(`^(?:${source})`);
}

/**
 * Returns null when the name is not a recognized clip.
 */
export function parseClipName(fileName: string, pattern: RegExp): ClipFields | null {
  const match = pattern.exec(fileName);
  if (!match) return null;

  const [, date, time, sequence, camera] = match;
  if (date === undefined || time === undefined || sequence === undefined || camera === undefined) {
    return null;
  }
  return { date, time, sequence, camera };
}

export function formatDate(date: string): string {
  return `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}`;
}

export function formatTime(time: string): string {
  return `${time.slice(0, 2)}:${time.slice(2, 4)}:${time.slice(4, 6)}`;
}

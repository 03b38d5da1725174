/**
 * render.ts — Terminal progress rendering
 *
 * Pure functions from a ProgressSnapshot to text. Two styles:
 *   bar     full-screen redraw, one block per group plus an overall block
 *   simple  one line, rewritten in place with a carriage return
 */

import type { ProgressStyle } from "../config/schema";
import {
  formatDuration,
  formatMegabytes,
  formatPercent,
  formatSpeed,
} from "../utils/format";
import type { GroupSnapshot, OverallSnapshot, ProgressSnapshot } from "./aggregator";

export const BAR_WIDTH = 40;
const CLEAR_SCREEN = "\x1b[2J\x1b[H";

export function progressBar(percentage: number, width = BAR_WIDTH): string {
  const filled = Math.max(0, Math.min(width, Math.floor((width * percentage) / 100)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

function renderGroup(group: GroupSnapshot): string[] {
  const lines = [
    `┌─ ${group.status} ─`,
    `│ [${progressBar(group.percentage)}] ${formatPercent(group.percentage)}`,
    `│ Files: ${group.currentFile}/${group.totalFiles} | Size: ${formatMegabytes(group.processedBytes)}/${formatMegabytes(group.totalBytes)}`,
  ];
  if (group.currentFile > 0) {
    lines.push(
      `│ Remaining: ${formatDuration(group.etaSec)} | Speed: ${formatSpeed(group.throughputBytesPerSec)}`
    );
    if (group.currentFileName) {
      lines.push(`│ Current: ${group.currentFileName}`);
    }
  }
  lines.push("└" + "─".repeat(48));
  return lines;
}

function renderOverall(overall: OverallSnapshot): string[] {
  const lines = [
    `Overall: [${progressBar(overall.percentage)}] ${formatPercent(overall.percentage)}`,
    `Files: ${overall.currentFile}/${overall.totalFiles} | Size: ${formatMegabytes(overall.processedBytes)}/${formatMegabytes(overall.totalBytes)}`,
  ];
  if (overall.currentFile > 0) {
    lines.push(
      `Elapsed: ${formatDuration(overall.elapsedSec)} | Remaining: ${formatDuration(overall.etaSec)} | Avg speed: ${formatSpeed(overall.throughputBytesPerSec)}`
    );
  }
  return lines;
}

export function renderBar(snapshot: ProgressSnapshot): string {
  const lines = ["=== Dashcam Merger - Progress ===", ""];
  for (const group of snapshot.groups) {
    lines.push(...renderGroup(group), "");
  }
  lines.push("=".repeat(50), ...renderOverall(snapshot.overall), "");
  return CLEAR_SCREEN + lines.join("\n") + "\n";
}

export function renderSimple(snapshot: ProgressSnapshot): string {
  const parts = snapshot.groups.map(
    (group) => `${group.status}: ${group.percentage.toFixed(1)}% (${group.currentFile}/${group.totalFiles})`
  );
  const { overall } = snapshot;
  parts.push(`Overall: ${overall.percentage.toFixed(1)}% (${overall.currentFile}/${overall.totalFiles})`);
  return `\r${parts.join(" | ")}`;
}

export function renderSnapshot(snapshot: ProgressSnapshot, style: ProgressStyle): string {
  return style === "bar" ? renderBar(snapshot) : renderSimple(snapshot);
}

export function renderSummary(snapshot: ProgressSnapshot): string {
  const rule = "=".repeat(50);
  const lines = ["", rule, "Summary", rule];
  for (const group of snapshot.groups) {
    lines.push(
      `${group.status}: ${group.totalFiles} files (${formatMegabytes(group.totalBytes)}) ` +
        `time: ${formatDuration(group.elapsedSec)} avg speed: ${formatSpeed(group.throughputBytesPerSec)}`
    );
  }
  const { overall } = snapshot;
  lines.push(
    "",
    `Overall: ${overall.totalFiles} files (${formatMegabytes(overall.totalBytes)}) ` +
      `time: ${formatDuration(overall.elapsedSec)} avg speed: ${formatSpeed(overall.throughputBytesPerSec)}`,
    rule
  );
  return lines.join("\n") + "\n";
}

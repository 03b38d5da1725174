/**
 * build.ts — Catalog builder
 *
 * PURPOSE:
 *   Walks every configured camera directory, keeps the files whose name
 *   parses and whose embedded camera tag matches the directory they sit in,
 *   and groups them as date → camera → clips ordered by (time, sequence).
 *
 * RULES:
 *   - A missing camera directory is a warning, not an error. One camera can
 *     be unplugged while the others still merge.
 *   - Names that do not parse are skipped (debug log only).
 *   - A clip tagged "B" found in the "F" directory is excluded. Misfiled or
 *     renamed clips would otherwise end up spliced into another camera.
 *   - Only regular files directly inside the directory are considered.
 *   - Ordering compares time, then sequence, as text. Sequences are
 *     zero-padded by the device and are not guaranteed to behave as integers.
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import { log } from "../utils/logger";
import { errnoCode } from "../utils/errors";
import { compileClipPattern, formatTime, parseClipName } from "./filename";
import type { Catalog, Clip, Group } from "./types";

export interface CatalogResult {
  catalog: Catalog;
  /** Camera tags whose directory does not exist. */
  missingCameras: string[];
  /** Files ignored for not parsing or for a camera tag mismatch. */
  skippedFiles: number;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareClips(a: Clip, b: Clip): number {
  return compareText(a.time, b.time) || compareText(a.sequence, b.sequence);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") return false;
    throw error;
  }
}

export async function buildCatalog(
  cameraPaths: ReadonlyMap<string, string>,
  videoPattern: string
): Promise<CatalogResult> {
  const pattern = compileClipPattern(videoPattern);
  const catalog: Catalog = new Map();
  const missingCameras: string[] = [];
  let skippedFiles = 0;

  for (const [camera, dir] of cameraPaths) {
    if (!(await isDirectory(dir))) {
      log("warn", "catalog", undefined, `Camera ${camera} path not found, skipping`, {
        camera,
        path: dir,
      });
      missingCameras.push(camera);
      continue;
    }

    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) continue;

      const fields = parseClipName(entry.name, pattern);
      if (!fields) {
        log("debug", "catalog", undefined, `Not a recognized clip: ${entry.name}`, { camera });
        skippedFiles++;
        continue;
      }
      if (fields.camera !== camera) {
        log("debug", "catalog", undefined, `Camera tag mismatch: ${entry.name}`, {
          camera,
          fileCamera: fields.camera,
        });
        skippedFiles++;
        continue;
      }

      const path = join(dir, entry.name);
      const { size } = await stat(path);
      const clip: Clip = { ...fields, path, fileName: entry.name, sizeBytes: size };

      let byCamera = catalog.get(fields.date);
      if (!byCamera) {
        byCamera = new Map();
        catalog.set(fields.date, byCamera);
      }
      const clips = byCamera.get(camera);
      if (clips) {
        clips.push(clip);
      } else {
        byCamera.set(camera, [clip]);
      }
    }
  }

  for (const byCamera of catalog.values()) {
    for (const clips of byCamera.values()) {
      clips.sort(compareClips);
    }
  }

  log("info", "catalog", undefined, "Catalog built", {
    dates: catalog.size,
    clips: countClips(catalog),
    skippedFiles,
    missingCameras,
  });

  return { catalog, missingCameras, skippedFiles };
}

export function countClips(catalog: Catalog): number {
  let total = 0;
  for (const byCamera of catalog.values()) {
    for (const clips of byCamera.values()) total += clips.length;
  }
  return total;
}

/**
 * Restricts the catalog to one YYYYMMDD date. An absent date yields an
 * empty catalog.
 */
export function filterByDate(catalog: Catalog, targetDate: string): Catalog {
  const byCamera = catalog.get(targetDate);
  return byCamera ? new Map([[targetDate, byCamera]]) : new Map();
}

/**
 * Flattens the catalog into groups, dates ascending then cameras ascending.
 */
export function listGroups(catalog: Catalog): Group[] {
  const groups: Group[] = [];
  for (const date of [...catalog.keys()].sort()) {
    const byCamera = catalog.get(date);
    if (!byCamera) continue;
    for (const camera of [...byCamera.keys()].sort()) {
      const clips = byCamera.get(camera);
      if (clips && clips.length > 0) groups.push({ date, camera, clips });
    }
  }
  return groups;
}

export interface GroupSummary {
  startTime: string;
  endTime: string;
  fileCount: number;
  totalBytes: number;
}

export function summarizeGroup(clips: readonly Clip[]): GroupSummary | null {
  const first = clips[0];
  const last = clips[clips.length - 1];
  if (!first || !last) return null;
  return {
    startTime: formatTime(first.time),
    endTime: formatTime(last.time),
    fileCount: clips.length,
    totalBytes: clips.reduce((sum, clip) => sum + clip.sizeBytes, 0),
  };
}

/**
 * plan.ts — Merge planner
 *
 * Turns a Group into a MergeJob. With local staging on, both the manifest and
 * the ffmpeg output live in the local scratch directory and the output is
 * moved to the destination only after the transcode succeeds; this keeps the
 * heavy read/write traffic off network shares. With staging off, everything
 * is written straight into the output directory.
 */

import { join } from "path";
import type { Group } from "../catalog/types";
import { formatDate } from "../catalog/filename";
import { manifestName, mergeJobId, mergedOutputName } from "../storage/keys";
import type { MergeJob } from "./types";

export interface PlanOptions {
  outputDir: string;
  scratchDir: string;
  useLocalStaging: boolean;
  outputExtension: string;
  cameraName?: (camera: string) => string;
}

export function planMerge(group: Group, options: PlanOptions): MergeJob {
  const { date, camera, clips } = group;
  const fileName = mergedOutputName(date, camera, options.outputExtension);
  const workDir = options.useLocalStaging ? options.scratchDir : options.outputDir;
  const displayCamera = options.cameraName ? options.cameraName(camera) : camera;

  return {
    id: mergeJobId(date, camera),
    date,
    camera,
    label: `${formatDate(date)} ${displayCamera}`,
    clips,
    totalBytes: clips.reduce((sum, clip) => sum + clip.sizeBytes, 0),
    manifestPath: join(workDir, manifestName(date, camera)),
    outputPath: join(options.outputDir, fileName),
    stagingPath: options.useLocalStaging ? join(options.scratchDir, fileName) : null,
    profile: "copy",
  };
}

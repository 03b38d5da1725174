/**
 * schema.ts — Configuration document schema
 *
 * PURPOSE:
 *   Describes the JSON configuration document with zod and maps it onto the
 *   validated, camelCase AppConfig the rest of the merger consumes. All
 *   defaulting happens here, once, so no caller ever does a map lookup with
 *   a fallback.
 *
 * DEFAULTS:
 *   output_extension          "mp4"
 *   copy_codec                video "copy", audio "copy"
 *   reencode_settings         libx264 / aac / medium / crf 23 / 4 threads
 *   timeout_ms                0 (ffmpeg runs until it exits)
 *   use_local_processing      true
 *   local_scratch_dir         <os tmpdir>/dashcam-merger
 *   max_parallel              unbounded
 *   progress_style            "bar"
 */

import { tmpdir } from "os";
import { join, resolve } from "path";
import { z } from "zod";

/**
 * Number of capture groups in a regular expression source. Matching the
 * empty alternative always succeeds, and the result has one slot per group.
 */
export function countCaptureGroups(source: string): number {
  const result = new RegExp(`${source}|`).exec("");
  return result ? result.length - 1 : 0;
}

const videoPatternSchema = z
  .string()
  .min(1)
  .superRefine((source, ctx) => {
    try {
      new RegExp(source);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`,
      });
      return;
    }
    const groups = countCaptureGroups(source);
    if (groups !== 4) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must have exactly 4 capture groups (date, time, sequence, camera), found ${groups}`,
      });
    }
  });

export const configDocumentSchema = z.object({
  camera_paths: z
    .record(z.string().min(1), z.string().min(1))
    .refine((paths) => Object.keys(paths).length > 0, {
      message: "at least one camera path is required",
    }),
  camera_names: z.record(z.string(), z.string()).default({}),
  output_dir: z.string().min(1),
  video_pattern: videoPatternSchema,
  output_extension: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, "extension must be alphanumeric, without a dot")
    .default("mp4"),
  ffmpeg_settings: z
    .object({
      copy_codec: z
        .object({
          video: z.string().min(1).default("copy"),
          audio: z.string().min(1).default("copy"),
        })
        .default({}),
      reencode_settings: z
        .object({
          video_codec: z.string().min(1).default("libx264"),
          audio_codec: z.string().min(1).default("aac"),
          preset: z.string().min(1).default("medium"),
          crf: z.union([z.string().min(1), z.number()]).transform(String).default("23"),
          threads: z.number().int().positive().default(4),
        })
        .default({}),
      timeout_ms: z.number().int().nonnegative().default(0),
    })
    .default({}),
  performance_settings: z
    .object({
      use_local_processing: z.boolean().default(true),
      local_scratch_dir: z.string().min(1).optional(),
      max_parallel: z.number().int().positive().nullable().optional(),
    })
    .default({}),
  progress_style: z.enum(["bar", "simple"]).default("bar"),
});

export interface CopyProfile {
  videoCodec: string;
  audioCodec: string;
}

export interface ReencodeProfile {
  videoCodec: string;
  audioCodec: string;
  preset: string;
  crf: string;
  threads: number;
}

export type ProgressStyle = "bar" | "simple";

export interface AppConfig {
  cameraPaths: ReadonlyMap<string, string>;
  cameraNames: ReadonlyMap<string, string>;
  outputDir: string;
  videoPattern: string;
  outputExtension: string;
  copyProfile: CopyProfile;
  reencodeProfile: ReencodeProfile;
  toolTimeoutMs: number;
  useLocalProcessing: boolean;
  scratchDir: string;
  maxParallel: number | null;
  progressStyle: ProgressStyle;
}

export function toAppConfig(doc: z.output<typeof configDocumentSchema>): AppConfig {
  const { ffmpeg_settings: ffmpeg, performance_settings: perf } = doc;
  return {
    cameraPaths: new Map(
      Object.entries(doc.camera_paths).map(([camera, dir]) => [camera, resolve(dir)])
    ),
    cameraNames: new Map(Object.entries(doc.camera_names)),
    outputDir: resolve(doc.output_dir),
    videoPattern: doc.video_pattern,
    outputExtension: doc.output_extension,
    copyProfile: {
      videoCodec: ffmpeg.copy_codec.video,
      audioCodec: ffmpeg.copy_codec.audio,
    },
    reencodeProfile: {
      videoCodec: ffmpeg.reencode_settings.video_codec,
      audioCodec: ffmpeg.reencode_settings.audio_codec,
      preset: ffmpeg.reencode_settings.preset,
      crf: ffmpeg.reencode_settings.crf,
      threads: ffmpeg.reencode_settings.threads,
    },
    toolTimeoutMs: ffmpeg.timeout_ms,
    useLocalProcessing: perf.use_local_processing,
    scratchDir: resolve(perf.local_scratch_dir ?? join(tmpdir(), "dashcam-merger")),
    maxParallel: perf.max_parallel ?? null,
    progressStyle: doc.progress_style,
  };
}

export function cameraDisplayName(config: AppConfig, camera: string): string {
  return config.cameraNames.get(camera) ?? camera;
}

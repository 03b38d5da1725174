import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Group } from "../catalog/types";
import { ProgressAggregator } from "../progress/aggregator";
import { MergeError } from "../utils/errors";
import type { ToolRunner } from "../video/commands";
import { executeMerge, type ExecuteOptions } from "./executor";
import { planMerge } from "./plan";
import type { MergeJob } from "./types";

type Behaviour = "ok" | "fail" | "fail-with-output" | "missing";

interface FakeTool {
  runTool: ToolRunner;
  calls: string[][];
  manifests: string[];
}

function fakeTool(...behaviours: Behaviour[]): FakeTool {
  const calls: string[][] = [];
  const manifests: string[] = [];
  const runTool: ToolRunner = async (args) => {
    calls.push(args);
    manifests.push(await readFile(args[5], "utf-8"));
    const output = args[args.length - 1];
    const behaviour = behaviours[calls.length - 1] ?? "fail";
    switch (behaviour) {
      case "ok":
        await writeFile(output, `merged via call ${calls.length}`);
        return { stdout: "", stderr: "" };
      case "fail-with-output":
        await writeFile(output, "partial");
        throw new MergeError("FFmpeg failed: exit 1", "TranscodeFailed", "Non-monotonous DTS");
      case "missing":
        throw new MergeError("FFmpeg not found (ffmpeg)", "ToolNotFound");
      case "fail":
        throw new MergeError("FFmpeg failed: exit 1", "TranscodeFailed", "Invalid data found");
    }
  };
  return { runTool, calls, manifests };
}

const group: Group = {
  date: "20250906",
  camera: "F",
  clips: [
    {
      date: "20250906",
      time: "134055",
      sequence: "000894",
      camera: "F",
      path: "/nas/F/NO20250906-134055-000894F.MP4",
      fileName: "NO20250906-134055-000894F.MP4",
      sizeBytes: 100,
    },
    {
      date: "20250906",
      time: "134056",
      sequence: "000895",
      camera: "F",
      path: "/nas/F/NO20250906-134056-000895F.MP4",
      fileName: "NO20250906-134056-000895F.MP4",
      sizeBytes: 200,
    },
  ],
};

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "executor-test-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function plan(useLocalStaging: boolean): MergeJob {
  return planMerge(group, {
    outputDir: join(root, "out"),
    scratchDir: join(root, "scratch"),
    useLocalStaging,
    outputExtension: "mp4",
  });
}

function options(tool: FakeTool, progress?: ProgressAggregator): ExecuteOptions {
  return {
    copyProfile: { videoCodec: "copy", audioCodec: "copy" },
    reencodeProfile: { videoCodec: "libx264", audioCodec: "aac", preset: "medium", crf: "23", threads: 4 },
    runTool: tool.runTool,
    progress,
  };
}

describe("executeMerge without staging", () => {
  it("succeeds on the copy attempt", async () => {
    const job = plan(false);
    const tool = fakeTool("ok");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("success");
    expect(result.ok).toBe(true);
    expect(result.profile).toBe("copy");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "success"]);
    expect(tool.calls).toHaveLength(1);
    expect(tool.calls[0]).toContain("-c:v");
    expect(tool.calls[0][tool.calls[0].indexOf("-c:v") + 1]).toBe("copy");
    expect(tool.manifests[0]).toBe(
      "file '/nas/F/NO20250906-134055-000894F.MP4'\nfile '/nas/F/NO20250906-134056-000895F.MP4'\n"
    );
    expect(await readFile(job.outputPath, "utf-8")).toBe("merged via call 1");
    expect(result.outputBytes).toBe("merged via call 1".length);
    expect(await readdir(join(root, "out"))).toEqual(["merged_2025-09-06_F.mp4"]);
  });

  it("escalates to re-encode once when copy fails", async () => {
    const job = plan(false);
    const tool = fakeTool("fail", "ok");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("success");
    expect(result.profile).toBe("reencode");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "reencode_attempt", "success"]);
    expect(tool.calls).toHaveLength(2);
    expect(tool.calls[1][tool.calls[1].indexOf("-c:v") + 1]).toBe("libx264");
    expect(tool.calls[1][tool.calls[1].indexOf("-crf") + 1]).toBe("23");
  });

  it("salvages a non-empty re-encode output despite a non-zero exit", async () => {
    const job = plan(false);
    const tool = fakeTool("fail", "fail-with-output");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("partial_salvage");
    expect(result.ok).toBe(true);
    expect(result.profile).toBe("reencode");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "reencode_attempt", "partial_salvage"]);
    expect(await readFile(job.outputPath, "utf-8")).toBe("partial");
  });

  it("fails when both attempts fail and nothing was written", async () => {
    const job = plan(false);
    const tool = fakeTool("fail", "fail");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("failed");
    expect(result.ok).toBe(false);
    expect(result.profile).toBeNull();
    expect(result.errorCode).toBe("TranscodeFailed");
    expect(result.toolStderr).toBe("Invalid data found");
    expect(tool.calls).toHaveLength(2);
  });

  it("does not salvage output left behind by the failed copy attempt", async () => {
    const job = plan(false);
    const tool = fakeTool("fail-with-output", "fail");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("failed");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "reencode_attempt", "failed"]);
  });

  it("stops without a re-encode attempt when ffmpeg is missing", async () => {
    const job = plan(false);
    const tool = fakeTool("missing", "ok");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("failed");
    expect(result.errorCode).toBe("ToolNotFound");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "failed"]);
    expect(tool.calls).toHaveLength(1);
  });

  it("removes the manifest whatever the outcome", async () => {
    for (const behaviours of [["ok"], ["fail", "fail"], ["missing"]] as const) {
      const job = plan(false);
      await executeMerge(job, options(fakeTool(...behaviours)));
      const left = await readdir(join(root, "out"));
      expect(left).not.toContain("filelist_20250906_F.txt");
    }
  });

  it("overwrites the previous output on a re-run", async () => {
    const job = plan(false);
    await executeMerge(job, options(fakeTool("ok")));
    const second = await executeMerge(job, options(fakeTool("fail", "ok")));

    expect(second.state).toBe("success");
    expect(await readFile(job.outputPath, "utf-8")).toBe("merged via call 2");
  });
});

describe("executeMerge with local staging", () => {
  it("writes to scratch and moves the result to the destination", async () => {
    const job = plan(true);
    const tool = fakeTool("ok");

    const result = await executeMerge(job, options(tool));

    expect(result.state).toBe("success");
    expect(tool.calls[0][tool.calls[0].length - 1]).toBe(job.stagingPath);
    expect(tool.calls[0][5]).toBe(join(root, "scratch", "filelist_20250906_F.txt"));
    expect(await readFile(job.outputPath, "utf-8")).toBe("merged via call 1");
    expect(await readdir(join(root, "scratch"))).toEqual([]);
  });

  it("fails the job and keeps the staged output when the move fails", async () => {
    const job = plan(true);
    // A directory at the destination makes rename() fail.
    await mkdir(job.outputPath, { recursive: true });

    const result = await executeMerge(job, options(fakeTool("ok")));

    expect(result.state).toBe("failed");
    expect(result.errorCode).toBe("RelocationFailed");
    expect(result.transitions).toEqual(["planned", "copy_attempt", "success", "failed"]);
    expect(result.preservedPath).toBe(job.stagingPath);
    expect(await readdir(join(root, "scratch"))).toEqual(["merged_2025-09-06_F.mp4"]);
  });

  it("cleans the scratch area after a failed merge", async () => {
    const job = plan(true);

    await executeMerge(job, options(fakeTool("fail", "fail")));

    expect(await readdir(join(root, "scratch"))).toEqual([]);
  });
});

describe("executeMerge progress reporting", () => {
  it("reports completion with the path taken", async () => {
    const job = plan(false);
    const progress = new ProgressAggregator(() => 1_000);
    progress.registerGroup(job.id, job.clips.length, job.totalBytes, job.label);

    await executeMerge(job, options(fakeTool("fail", "ok"), progress));

    const [state] = progress.snapshot().groups;
    expect(state).toMatchObject({
      currentFile: 2,
      totalFiles: 2,
      processedBytes: 300,
      currentFileName: "merged_2025-09-06_F.mp4",
      status: "2025-09-06 F done (reencode)",
      percentage: 100,
    });
  });

  it("reports a failure status", async () => {
    const job = plan(false);
    const progress = new ProgressAggregator(() => 1_000);
    progress.registerGroup(job.id, job.clips.length, job.totalBytes, job.label);

    await executeMerge(job, options(fakeTool("missing"), progress));

    expect(progress.snapshot().groups[0]?.status).toBe("2025-09-06 F failed: ToolNotFound");
  });
});

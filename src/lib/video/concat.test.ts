import { describe, expect, it } from "vitest";
import { buildManifest, copyArgs, manifestLine, reencodeArgs } from "./concat";

describe("manifest", () => {
  it("lists one single-quoted path per line in order", () => {
    expect(buildManifest(["/a/one.MP4", "/a/two.MP4"])).toBe(
      "file '/a/one.MP4'\nfile '/a/two.MP4'\n"
    );
  });

  it("escapes quotes and backslashes", () => {
    expect(manifestLine("/clips/it's.MP4")).toBe("file '/clips/it'\\''s.MP4'");
    expect(manifestLine("C:\\clips\\a.MP4")).toBe("file 'C:/clips/a.MP4'");
  });
});

describe("ffmpeg arguments", () => {
  it("stream-copies through the concat demuxer", () => {
    expect(copyArgs("/tmp/list.txt", "/out/m.mp4", { videoCodec: "copy", audioCodec: "copy" })).toEqual([
      "-f", "concat", "-safe", "0", "-i", "/tmp/list.txt",
      "-c:v", "copy", "-c:a", "copy",
      "-avoid_negative_ts", "make_zero", "-fflags", "+genpts",
      "-y", "/out/m.mp4",
    ]);
  });

  it("re-encodes with the configured profile", () => {
    const args = reencodeArgs("/tmp/list.txt", "/out/m.mp4", {
      videoCodec: "libx264",
      audioCodec: "aac",
      preset: "fast",
      crf: "28",
      threads: 2,
    });
    expect(args).toEqual([
      "-f", "concat", "-safe", "0", "-i", "/tmp/list.txt",
      "-threads", "2",
      "-c:v", "libx264", "-c:a", "aac",
      "-preset", "fast", "-crf", "28",
      "-avoid_negative_ts", "make_zero",
      "-y", "/out/m.mp4",
    ]);
  });
});

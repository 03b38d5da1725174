import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildCatalog,
  compareClips,
  filterByDate,
  listGroups,
  summarizeGroup,
} from "./build";
import type { Clip } from "./types";

const PATTERN = "NO(\\d{8})-(\\d{6})-(\\d{6})([FB])\\.MP4$";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "catalog-test-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function touch(dir: string, name: string, bytes = 10): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, name), Buffer.alloc(bytes));
}

function clip(time: string, sequence: string): Clip {
  return {
    date: "20250906",
    time,
    sequence,
    camera: "F",
    path: `/clips/${time}-${sequence}`,
    fileName: `${time}-${sequence}`,
    sizeBytes: 1,
  };
}

describe("compareClips", () => {
  it("orders by time then sequence regardless of input order", () => {
    const expected = [clip("134055", "000894"), clip("134056", "000895"), clip("134057F", "000896")];
    const shuffled = [expected[2], expected[0], expected[1]];
    expect(shuffled.sort(compareClips).map((c) => c.time)).toEqual(["134055", "134056", "134057F"]);
    expect(shuffled.map((c) => c.sequence)).toEqual(["000894", "000895", "000896"]);
  });

  it("compares sequences as text, not numbers", () => {
    const sorted = [clip("120000", "10"), clip("120000", "9")].sort(compareClips);
    expect(sorted.map((c) => c.sequence)).toEqual(["10", "9"]);
  });
});

describe("buildCatalog", () => {
  it("groups clips by date and camera in time order", async () => {
    const front = join(root, "F");
    const back = join(root, "B");
    await touch(front, "NO20250906-134057-000896F.MP4", 30);
    await touch(front, "NO20250906-134055-000894F.MP4", 10);
    await touch(front, "NO20250906-134056-000895F.MP4", 20);
    await touch(front, "NO20250907-080000-000001F.MP4", 5);
    await touch(back, "NO20250906-134055-000894B.MP4", 7);

    const { catalog, missingCameras, skippedFiles } = await buildCatalog(
      new Map([
        ["F", front],
        ["B", back],
      ]),
      PATTERN
    );

    expect(missingCameras).toEqual([]);
    expect(skippedFiles).toBe(0);
    expect([...catalog.keys()].sort()).toEqual(["20250906", "20250907"]);

    const front0906 = catalog.get("20250906")?.get("F") ?? [];
    expect(front0906.map((c) => c.sequence)).toEqual(["000894", "000895", "000896"]);
    expect(front0906.map((c) => c.sizeBytes)).toEqual([10, 20, 30]);
    expect(front0906[0]?.path).toBe(join(front, "NO20250906-134055-000894F.MP4"));
    expect(catalog.get("20250906")?.get("B")?.length).toBe(1);
  });

  it("skips files that do not parse or carry another camera tag", async () => {
    const front = join(root, "F");
    await touch(front, "NO20250906-134055-000894F.MP4");
    await touch(front, "NO20250906-134055-000894B.MP4");
    await touch(front, "notes.txt");
    await mkdir(join(front, "NO20250906-134100-000900F.MP4"));

    const { catalog, skippedFiles } = await buildCatalog(new Map([["F", front]]), PATTERN);

    expect(skippedFiles).toBe(2);
    expect(catalog.get("20250906")?.get("F")?.map((c) => c.fileName)).toEqual([
      "NO20250906-134055-000894F.MP4",
    ]);
    expect(catalog.get("20250906")?.has("B")).toBe(false);
  });

  it("warns about a missing camera directory and keeps the others", async () => {
    const front = join(root, "F");
    await touch(front, "NO20250906-134055-000894F.MP4");

    const { catalog, missingCameras } = await buildCatalog(
      new Map([
        ["F", front],
        ["B", join(root, "does-not-exist")],
      ]),
      PATTERN
    );

    expect(missingCameras).toEqual(["B"]);
    expect(listGroups(catalog).map((g) => `${g.date}_${g.camera}`)).toEqual(["20250906_F"]);
  });
});

describe("filterByDate / listGroups / summarizeGroup", () => {
  it("keeps one date and lists groups sorted by date then camera", () => {
    const catalog = new Map([
      ["20250907", new Map([["F", [clip("080000", "000001")]]])],
      [
        "20250906",
        new Map([
          ["F", [clip("134055", "000894")]],
          ["B", [clip("134055", "000894")]],
        ]),
      ],
    ]);

    expect(listGroups(catalog).map((g) => `${g.date}_${g.camera}`)).toEqual([
      "20250906_B",
      "20250906_F",
      "20250907_F",
    ]);
    expect([...filterByDate(catalog, "20250906").keys()]).toEqual(["20250906"]);
    expect(filterByDate(catalog, "20250101").size).toBe(0);
  });

  it("summarizes start, end, count and size", () => {
    const clips = [clip("134055", "000894"), clip("141530", "000895")];
    expect(summarizeGroup(clips)).toEqual({
      startTime: "13:40:55",
      endTime: "14:15:30",
      fileCount: 2,
      totalBytes: 2,
    });
    expect(summarizeGroup([])).toBeNull();
  });
});

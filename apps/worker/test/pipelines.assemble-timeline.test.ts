import { promises as fs } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FfmpegExecutionError, NoClipsError } from "@voxreel/shared/errors/render";
import type { Segment } from "@voxreel/shared/render/segments";

import { ScratchDir } from "../src/lib/tempCleanup";
import { assembleTimeline } from "../src/pipelines/assemble-timeline";
import { createTestContext, ffmpegCalls, filtergraphOf, installFakeFfmpeg, makeTempRoot } from "./helpers";

vi.mock("../src/lib/ffmpegSafe", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/lib/ffmpegSafe")>();
  return { ...actual, runFfmpegSafely: vi.fn(), runFfprobeSafely: vi.fn() };
});

const SEGMENTS: Segment[] = [
  { index: 0, text: "First caption", startTime: 0, endTime: 3, footageUrl: "https://cdn.test/a.mp4" },
  { index: 1, text: "", startTime: 3, endTime: 6, footageUrl: "https://cdn.test/b.mp4" },
];

describe("assembleTimeline", () => {
  let root: string;
  let scratch: ScratchDir;
  let footage: Map<number, string>;

  beforeEach(async () => {
    root = await makeTempRoot();
    scratch = new ScratchDir(join(root, "render-task-1"));
    await scratch.ensure();
    // file content is the duration the fake ffprobe reports
    await fs.writeFile(join(root, "a.mp4"), "5");
    await fs.writeFile(join(root, "b.mp4"), "2");
    footage = new Map([
      [0, join(root, "a.mp4")],
      [1, join(root, "b.mp4")],
    ]);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("trims long footage, loops short footage and adds the trailing pad", async () => {
    installFakeFfmpeg();
    const ctx = createTestContext({ tempDir: root });

    const timeline = await assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: true }, scratch, ctx);

    expect(timeline.clips.map((clip) => [clip.segmentIndex, clip.duration, clip.plan.mode, clip.captioned])).toEqual([
      [0, 3, "trim", true],
      [1, 3, "loop", false],
    ]);
    expect(timeline.clips[1]?.plan.plays).toBe(2);
    expect(timeline.clipsDuration).toBe(6);
    expect(timeline.trailingPadSeconds).toBe(2);
    expect(timeline.totalDuration).toBe(8);
    expect(timeline.path).toBe(join(scratch.path, "timeline.mp4"));

    expect(ffmpegCalls).toHaveLength(3);
    expect(ffmpegCalls[1]).toEqual(expect.arrayContaining(["-stream_loop", "1"]));
    expect(await fs.readFile(join(scratch.path, "caption_0.txt"), "utf8")).toBe("First caption");
    expect(await fs.readFile(join(scratch.path, "clips.txt"), "utf8")).toBe(
      `file '${join(scratch.path, "clip_0.mp4")}'\nfile '${join(scratch.path, "clip_1.mp4")}'\n`,
    );
  });

  it("orders clips by start time", async () => {
    installFakeFfmpeg();
    const ctx = createTestContext({ tempDir: root });
    const reversed = [
      { index: 0, text: "", startTime: 3, endTime: 4.5, footageUrl: "https://cdn.test/a.mp4" },
      { index: 1, text: "", startTime: 0, endTime: 3, footageUrl: "https://cdn.test/b.mp4" },
    ];

    const timeline = await assembleTimeline({ segments: reversed, footage, addSubtitles: false }, scratch, ctx);

    expect(timeline.clips.map((clip) => clip.segmentIndex)).toEqual([1, 0]);
    expect(timeline.clips.map((clip) => clip.duration)).toEqual([3, 1.5]);
  });

  it("falls back to the uncaptioned clip when captioning fails", async () => {
    installFakeFfmpeg({ failWhen: (args) => filtergraphOf(args).includes("drawtext") });
    const ctx = createTestContext({ tempDir: root });

    const timeline = await assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: true }, scratch, ctx);

    expect(timeline.clips.map((clip) => clip.captioned)).toEqual([false, false]);
    expect(timeline.clips).toHaveLength(2);
    expect(ffmpegCalls).toHaveLength(4);
    expect(ctx.logger.events("warn")).toEqual(["render_caption_failed"]);
  });

  it("renders the clip without a caption when the caption file cannot be written", async () => {
    installFakeFfmpeg();
    const ctx = createTestContext({ tempDir: root });
    await fs.mkdir(join(scratch.path, "caption_0.txt"));

    const timeline = await assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: true }, scratch, ctx);

    expect(timeline.clips.map((clip) => [clip.segmentIndex, clip.captioned])).toEqual([
      [0, false],
      [1, false],
    ]);
    expect(filtergraphOf(ffmpegCalls[0] ?? [])).not.toContain("drawtext");
    expect(ctx.logger.events("warn")).toEqual(["render_caption_failed"]);
  });

  it("drops a clip that cannot be created and keeps the rest", async () => {
    installFakeFfmpeg({ failWhen: (args) => args.includes(join(scratch.path, "clip_1.mp4")) });
    const ctx = createTestContext({ tempDir: root });

    const timeline = await assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: false }, scratch, ctx);

    expect(timeline.clips.map((clip) => clip.segmentIndex)).toEqual([0]);
    expect(timeline.droppedSegments).toEqual([1]);
    expect(timeline.totalDuration).toBe(5);
    expect(ctx.logger.events("warn")).toEqual(["render_clip_dropped"]);
  });

  it("drops footage that cannot be probed", async () => {
    installFakeFfmpeg();
    const ctx = createTestContext({ tempDir: root });
    footage.set(1, join(root, "missing.mp4"));

    const timeline = await assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: false }, scratch, ctx);

    expect(timeline.droppedSegments).toEqual([1]);
    expect(ctx.logger.records.find((record) => record.message === "render_clip_dropped")?.context).toMatchObject({
      segmentIndex: 1,
    });
  });

  it("fails when no clip could be created", async () => {
    installFakeFfmpeg({ failWhen: (args) => args.some((arg) => arg.includes("clip_")) });
    const ctx = createTestContext({ tempDir: root });

    await expect(
      assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: false }, scratch, ctx),
    ).rejects.toThrow(new NoClipsError(2).message);
  });

  it("treats a failed concat as fatal", async () => {
    installFakeFfmpeg({ failWhen: (args) => args.includes("concat") });
    const ctx = createTestContext({ tempDir: root });

    await expect(
      assembleTimeline({ segments: SEGMENTS, footage, addSubtitles: false }, scratch, ctx),
    ).rejects.toBeInstanceOf(FfmpegExecutionError);
  });
});

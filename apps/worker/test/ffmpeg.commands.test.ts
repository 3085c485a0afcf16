import { describe, expect, it } from "vitest";

import { planCoverage } from "@voxreel/shared/render/timeline";

import {
  buildAudioMixCommand,
  buildClipCommand,
  buildConcatCommand,
  buildConcatList,
  buildEncodeCommand,
  buildSilentAudioCommand,
  escapeFilterPath,
  wrapCaption,
} from "../src/services/ffmpeg/build-commands";

const FORMAT = { width: 1920, height: 1080, fps: 24 };
const BASE_GRAPH =
  "[0:v]scale=1920:1080:force_original_aspect_ratio=increase,crop=1920:1080," +
  "boxblur=luma_radius=20:luma_power=1:chroma_radius=10[bg];" +
  "[0:v]scale=1920:1080:force_original_aspect_ratio=decrease[fg];" +
  "[bg][fg]overlay=(W-w)/2:(H-h)/2,setsar=1,fps=24[base]";

describe("buildClipCommand", () => {
  it("loops a short source and burns in the caption", () => {
    const { args, filtergraph } = buildClipCommand({
      inputPath: "/in/a.mp4",
      outPath: "/s/clip_0.mp4",
      plan: planCoverage(2, 3),
      format: FORMAT,
      caption: { textFile: "/s/caption_0.txt" },
    });

    expect(filtergraph).toBe(
      `${BASE_GRAPH};[base]drawtext=textfile='/s/caption_0.txt':expansion=none:fontsize=48:fontcolor=white:borderw=2:` +
        "bordercolor=black:line_spacing=8:x=(w-text_w)/2:y=h*0.75-text_h/2[captioned]",
    );
    expect(args).toEqual([
      "-hide_banner",
      "-y",
      "-stream_loop",
      "1",
      "-i",
      "/in/a.mp4",
      "-t",
      "3.000",
      "-filter_complex",
      filtergraph,
      "-map",
      "[captioned]",
      "-an",
      "-c:v",
      "libx264",
      "-preset",
      "veryfast",
      "-crf",
      "20",
      "-pix_fmt",
      "yuv420p",
      "/s/clip_0.mp4",
    ]);
  });

  it("trims a long source without looping or captions", () => {
    const { args, filtergraph } = buildClipCommand({
      inputPath: "/in/b.mp4",
      outPath: "/s/clip_1.mp4",
      plan: planCoverage(12.5, 2.25),
      format: FORMAT,
    });

    expect(filtergraph).toBe(BASE_GRAPH);
    expect(args).not.toContain("-stream_loop");
    expect(args.slice(0, 6)).toEqual(["-hide_banner", "-y", "-i", "/in/b.mp4", "-t", "2.250"]);
    expect(args[args.indexOf("-map") + 1]).toBe("[base]");
  });

  it("passes the configured font file to drawtext", () => {
    const { filtergraph } = buildClipCommand({
      inputPath: "/in/a.mp4",
      outPath: "/s/clip_0.mp4",
      plan: planCoverage(3, 3),
      format: FORMAT,
      caption: { textFile: "/s/caption_0.txt", fontFile: "/fonts/Inter.ttf", fontSize: 40 },
    });

    expect(filtergraph).toContain(
      "drawtext=textfile='/s/caption_0.txt':expansion=none:fontfile='/fonts/Inter.ttf':fontsize=40:",
    );
  });

  it("draws caption text literally", () => {
    const { filtergraph } = buildClipCommand({
      inputPath: "/in/a.mp4",
      outPath: "/s/clip_0.mp4",
      plan: planCoverage(3, 3),
      format: FORMAT,
      caption: { textFile: "/s/caption_0.txt" },
    });

    expect(filtergraph).toContain(":expansion=none:");
  });
});

describe("wrapCaption", () => {
  it("wraps on word boundaries at 42 characters", () => {
    expect(wrapCaption("the quick brown fox jumps over the lazy dog and keeps running far away")).toEqual([
      "the quick brown fox jumps over the lazy",
      "dog and keeps running far away",
    ]);
  });

  it("keeps an overlong word whole and ignores blank text", () => {
    const word = "x".repeat(50);
    expect(wrapCaption(`short ${word} tail`)).toEqual(["short", word, "tail"]);
    expect(wrapCaption("   ")).toEqual([]);
  });

  it("leaves percent signs and backslashes untouched", () => {
    expect(wrapCaption("Sales rose 50% this year, %{pts} and C:\\temp stay as typed")).toEqual([
      "Sales rose 50% this year, %{pts} and",
      "C:\\temp stay as typed",
    ]);
  });
});

describe("concat", () => {
  it("lists clips in order and quotes apostrophes", () => {
    expect(buildConcatList(["/s/clip_0.mp4", "/s/it's.mp4"])).toBe(
      "file '/s/clip_0.mp4'\nfile '/s/it'\\''s.mp4'\n",
    );
  });

  it("joins without re-encoding", () => {
    expect(buildConcatCommand("/s/clips.txt", "/s/timeline.mp4").args).toEqual([
      "-hide_banner",
      "-y",
      "-f",
      "concat",
      "-safe",
      "0",
      "-i",
      "/s/clips.txt",
      "-c",
      "copy",
      "/s/timeline.mp4",
    ]);
  });
});

describe("buildAudioMixCommand", () => {
  it("loops, ducks and fades music under the narration", () => {
    const { args, filtergraph } = buildAudioMixCommand({
      outPath: "/s/audio.m4a",
      totalDuration: 6,
      voice: { path: "/v.mp3", offsetSeconds: 0 },
      music: { path: "/m.mp3", plan: planCoverage(4, 6), volumeExpression: "0.7", fadeOutSeconds: 2 },
    });

    expect(filtergraph).toBe(
      "[0:a]apad,atrim=end=6.000,asetpts=PTS-STARTPTS,aformat=sample_rates=44100:channel_layouts=stereo[voice];" +
        "[1:a]atrim=end=6.000,asetpts=PTS-STARTPTS,volume='0.7':eval=frame,afade=t=out:st=4.000:d=2.000," +
        "aformat=sample_rates=44100:channel_layouts=stereo[music];" +
        "[voice][music]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[mix]",
    );
    expect(args).toEqual([
      "-hide_banner",
      "-y",
      "-i",
      "/v.mp3",
      "-stream_loop",
      "1",
      "-i",
      "/m.mp3",
      "-filter_complex",
      filtergraph,
      "-map",
      "[mix]",
      "-c:a",
      "aac",
      "-b:a",
      "192k",
      "-t",
      "6.000",
      "/s/audio.m4a",
    ]);
  });

  it("shifts the narration by the configured offset", () => {
    const early = buildAudioMixCommand({
      outPath: "/s/audio.m4a",
      totalDuration: 5,
      voice: { path: "/v.mp3", offsetSeconds: -0.5 },
    });
    expect(early.filtergraph).toBe(
      "[0:a]atrim=start=0.500,asetpts=PTS-STARTPTS,apad,atrim=end=5.000,asetpts=PTS-STARTPTS," +
        "aformat=sample_rates=44100:channel_layouts=stereo[voice]",
    );
    expect(early.args[early.args.indexOf("-map") + 1]).toBe("[voice]");

    const late = buildAudioMixCommand({
      outPath: "/s/audio.m4a",
      totalDuration: 5,
      voice: { path: "/v.mp3", offsetSeconds: 1.25 },
    });
    expect(late.filtergraph).toContain("[0:a]adelay=delays=1250:all=1,apad,");
  });

  it("builds a silent track of the requested length", () => {
    expect(buildSilentAudioCommand("/s/audio.m4a", 8).args).toEqual([
      "-hide_banner",
      "-y",
      "-f",
      "lavfi",
      "-i",
      "anullsrc=r=44100:cl=stereo",
      "-t",
      "8.000",
      "-c:a",
      "aac",
      "-b:a",
      "192k",
      "/s/audio.m4a",
    ]);
  });
});

describe("buildEncodeCommand", () => {
  it("pads the last frame and encodes H.264/AAC at 24 fps", () => {
    const { args } = buildEncodeCommand({
      videoPath: "/s/timeline.mp4",
      audioPath: "/s/audio.m4a",
      outPath: "/s/output.mp4",
      totalDuration: 8,
      trailingPadSeconds: 2,
      fps: 24,
    });

    expect(args).toEqual([
      "-hide_banner",
      "-y",
      "-i",
      "/s/timeline.mp4",
      "-i",
      "/s/audio.m4a",
      "-vf",
      "tpad=stop_mode=clone:stop_duration=2.000",
      "-map",
      "0:v:0",
      "-map",
      "1:a:0",
      "-c:v",
      "libx264",
      "-preset",
      "veryfast",
      "-crf",
      "20",
      "-r",
      "24",
      "-pix_fmt",
      "yuv420p",
      "-c:a",
      "aac",
      "-b:a",
      "192k",
      "-movflags",
      "+faststart",
      "-t",
      "8.000",
      "/s/output.mp4",
    ]);
  });

  it("skips the pad filter when no pad is configured", () => {
    const { args } = buildEncodeCommand({
      videoPath: "/s/timeline.mp4",
      audioPath: "/s/audio.m4a",
      outPath: "/s/output.mp4",
      totalDuration: 6,
      trailingPadSeconds: 0,
      fps: 24,
    });
    expect(args).not.toContain("-vf");
  });
});

describe("escapeFilterPath", () => {
  it("escapes colons and quotes in Windows paths", () => {
    expect(escapeFilterPath("C:\\Users\\tester's\\caption.txt")).toBe("'C\\:/Users/tester\\'s/caption.txt'");
  });
});

import { promises as fs } from "node:fs";

import { NoClipsError } from "@voxreel/shared/errors/render";
import { segmentDuration, sortSegments, type Segment } from "@voxreel/shared/render/segments";
import { planCoverage, timelineDuration, type CoveragePlan } from "@voxreel/shared/render/timeline";

import { describeFailure, runFfmpegSafely } from "../lib/ffmpegSafe";
import type { ScratchDir } from "../lib/tempCleanup";
import {
  buildClipCommand,
  buildConcatCommand,
  buildConcatList,
  wrapCaption,
  type CaptionOptions,
} from "../services/ffmpeg/build-commands";
import { probeDuration } from "../services/ffmpeg/probe";
import { runFfmpegCommand } from "../services/ffmpeg/run";
import type { RenderContext } from "./types";

export interface AssembleInput {
  segments: readonly Segment[];
  footage: ReadonlyMap<number, string>;
  addSubtitles: boolean;
}

export interface AssembledClip {
  segmentIndex: number;
  path: string;
  duration: number;
  plan: CoveragePlan;
  captioned: boolean;
}

export interface AssembledTimeline {
  path: string;
  clips: AssembledClip[];
  droppedSegments: number[];
  clipsDuration: number;
  trailingPadSeconds: number;
  /** Clip durations plus the trailing pad. */
  totalDuration: number;
}

async function writeCaption(segment: Segment, scratch: ScratchDir): Promise<string | null> {
  const lines = wrapCaption(segment.text);
  if (lines.length === 0) return null;
  const textFile = scratch.file(`caption_${segment.index}.txt`);
  await fs.writeFile(textFile, lines.join("\n"), "utf8");
  return textFile;
}

async function renderClip(
  segment: Segment,
  sourcePath: string,
  addSubtitles: boolean,
  scratch: ScratchDir,
  ctx: RenderContext,
): Promise<AssembledClip | null> {
  const { settings, logger } = ctx;
  const probe = await probeDuration(sourcePath, settings, logger);
  if (!probe.ok) {
    logger.warn("render_clip_dropped", { segmentIndex: segment.index, reason: `probe failed: ${probe.reason}` });
    return null;
  }

  const plan = planCoverage(probe.durationSeconds, segmentDuration(segment));
  const outPath = scratch.file(`clip_${segment.index}.mp4`);
  const format = { width: settings.width, height: settings.height, fps: settings.fps };

  let caption: CaptionOptions | undefined;
  if (addSubtitles) {
    try {
      const textFile = await writeCaption(segment, scratch);
      if (textFile) caption = { textFile, fontFile: settings.fontFile };
    } catch (error) {
      logger.warn("render_caption_failed", {
        segmentIndex: segment.index,
        reason: `caption file could not be written: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  const attempt = (withCaption: CaptionOptions | undefined) =>
    runFfmpegSafely({
      args: buildClipCommand({ inputPath: sourcePath, outPath, plan, format, caption: withCaption }).args,
      binary: settings.ffmpegPath,
      outputPath: outPath,
      timeoutMs: settings.ffmpegTimeoutMs,
      logger,
    });

  let result = await attempt(caption);
  let captioned = Boolean(caption);

  if (!result.ok && caption) {
    logger.warn("render_caption_failed", { segmentIndex: segment.index, reason: describeFailure("caption", result) });
    result = await attempt(undefined);
    captioned = false;
  }

  if (!result.ok) {
    logger.warn("render_clip_dropped", { segmentIndex: segment.index, reason: describeFailure("clip", result) });
    return null;
  }

  logger.debug("render_clip_created", { segmentIndex: segment.index, mode: plan.mode, plays: plan.plays });
  return { segmentIndex: segment.index, path: outPath, duration: plan.duration, plan, captioned };
}

/**
 * Turns fetched footage into duration-matched, normalized clips in start-time
 * order and joins them into one visual track.
 */
export async function assembleTimeline(
  input: AssembleInput,
  scratch: ScratchDir,
  ctx: RenderContext,
): Promise<AssembledTimeline> {
  const clips: AssembledClip[] = [];
  const droppedSegments: number[] = [];
  let attempted = 0;

  for (const segment of sortSegments(input.segments)) {
    const sourcePath = input.footage.get(segment.index);
    if (!sourcePath) continue;
    attempted += 1;

    const clip = await renderClip(segment, sourcePath, input.addSubtitles, scratch, ctx);
    if (clip) {
      clips.push(clip);
    } else {
      droppedSegments.push(segment.index);
    }
  }

  if (clips.length === 0) {
    throw new NoClipsError(attempted);
  }

  const listPath = scratch.file("clips.txt");
  await fs.writeFile(listPath, buildConcatList(clips.map((clip) => clip.path)), "utf8");

  const timelinePath = scratch.file("timeline.mp4");
  await runFfmpegCommand("concat", buildConcatCommand(listPath, timelinePath), timelinePath, ctx.settings, ctx.logger);

  const clipsDuration = clips.reduce((sum, clip) => sum + clip.duration, 0);
  const trailingPadSeconds = ctx.settings.trailingPadSeconds;

  return {
    path: timelinePath,
    clips,
    droppedSegments,
    clipsDuration,
    trailingPadSeconds,
    totalDuration: timelineDuration(
      clips.map((clip) => clip.duration),
      trailingPadSeconds,
    ),
  };
}

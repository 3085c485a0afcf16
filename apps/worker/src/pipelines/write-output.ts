import type { ScratchDir } from "../lib/tempCleanup";
import { buildEncodeCommand } from "../services/ffmpeg/build-commands";
import { runFfmpegCommand } from "../services/ffmpeg/run";
import type { AssembledTimeline } from "./assemble-timeline";
import type { MixedAudio } from "./mix-audio";
import type { LoggerLike, RenderContext } from "./types";

export interface WriteOutputInput {
  timeline: AssembledTimeline;
  audio: MixedAudio;
  target: { taskId: string; projectId: string };
}

/** Encodes the final mp4 (H.264/AAC) and hands it to the output sink. */
export async function writeOutput(input: WriteOutputInput, scratch: ScratchDir, ctx: RenderContext): Promise<string> {
  const outPath = scratch.file("output.mp4");
  const command = buildEncodeCommand({
    videoPath: input.timeline.path,
    audioPath: input.audio.path,
    outPath,
    totalDuration: input.timeline.totalDuration,
    trailingPadSeconds: input.timeline.trailingPadSeconds,
    fps: ctx.settings.fps,
  });

  await runFfmpegCommand("encode", command, outPath, ctx.settings, ctx.logger);

  const location = await ctx.sink.publish(outPath, input.target);
  ctx.logger.info("render_output_published", { location, durationSeconds: input.timeline.totalDuration });
  return location;
}

/**
 * Deletes every intermediate the render created and the scratch directory if
 * it ends up empty. Runs on every exit path and never throws.
 */
export async function releaseScratch(scratch: ScratchDir, logger: LoggerLike): Promise<void> {
  const { removed } = await scratch.cleanup(logger);
  logger.info("render_scratch_released", { path: scratch.path, removed });
}

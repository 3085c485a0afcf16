import { join } from "node:path";

import { logPipelineStep, type PipelineContext } from "@voxreel/shared/observability/logging";
import type { RenderRequest } from "@voxreel/shared/render/segments";

import { ScratchDir } from "../lib/tempCleanup";
import { assembleTimeline } from "./assemble-timeline";
import { fetchAssets } from "./fetch-assets";
import { mixAudio, type AudioMode } from "./mix-audio";
import type { ProgressSink, RenderContext } from "./types";
import { releaseScratch, writeOutput } from "./write-output";

export interface RenderOutcome {
  outputLocation: string;
  durationSeconds: number;
  includedSegments: number[];
  droppedSegments: number[];
  audioMode: AudioMode;
}

export const PROGRESS = {
  assetsFetched: 50,
  timelineAssembled: 80,
  audioMixed: 90,
} as const;

export function scratchDirFor(tempDir: string, taskId: string): string {
  return join(tempDir, `render-${taskId}`);
}

async function step<T>(pipeline: PipelineContext, name: string, fn: () => Promise<T>): Promise<T> {
  const started = Date.now();
  logPipelineStep(pipeline, name, "start");
  try {
    const value = await fn();
    logPipelineStep(pipeline, name, "success", { elapsedMs: Date.now() - started });
    return value;
  } catch (error) {
    logPipelineStep(pipeline, name, "error", {
      elapsedMs: Date.now() - started,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/**
 * Runs one render: fetch, assemble, mix, encode. The scratch directory is
 * released on every exit path.
 */
export async function renderVideo(
  request: RenderRequest,
  taskId: string,
  ctx: RenderContext,
  onProgress: ProgressSink,
): Promise<RenderOutcome> {
  const pipeline: PipelineContext = { taskId, projectId: request.projectId };
  const scratch = new ScratchDir(scratchDirFor(ctx.settings.tempDir, taskId));

  try {
    await scratch.ensure();

    const assets = await step(pipeline, "fetch_assets", () =>
      fetchAssets(
        {
          segments: request.segments,
          voiceOverPath: request.voiceOverPath,
          musicRef: request.musicRef,
          includeAudio: request.includeAudio,
        },
        scratch,
        ctx,
      ),
    );
    onProgress(PROGRESS.assetsFetched);

    const timeline = await step(pipeline, "assemble_timeline", () =>
      assembleTimeline(
        { segments: request.segments, footage: assets.footage, addSubtitles: request.addSubtitles },
        scratch,
        ctx,
      ),
    );
    onProgress(PROGRESS.timelineAssembled);

    const audio = await step(pipeline, "mix_audio", () =>
      mixAudio(
        {
          totalDuration: timeline.totalDuration,
          segments: request.segments,
          voiceOverPath: assets.voiceOverPath,
          musicPath: assets.musicPath,
          includeAudio: request.includeAudio,
        },
        scratch,
        ctx,
      ),
    );
    onProgress(PROGRESS.audioMixed);

    const outputLocation = await step(pipeline, "write_output", () =>
      writeOutput({ timeline, audio, target: { taskId, projectId: request.projectId } }, scratch, ctx),
    );

    return {
      outputLocation,
      durationSeconds: timeline.totalDuration,
      includedSegments: timeline.clips.map((clip) => clip.segmentIndex),
      droppedSegments: [...assets.skippedSegments, ...assets.failedSegments, ...timeline.droppedSegments].sort(
        (a, b) => a - b,
      ),
      audioMode: audio.mode,
    };
  } finally {
    await releaseScratch(scratch, ctx.logger);
  }
}

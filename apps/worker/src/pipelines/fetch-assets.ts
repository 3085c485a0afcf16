import { NoFootageError, VoiceOverUnavailableError } from "@voxreel/shared/errors/render";
import type { Segment } from "@voxreel/shared/render/segments";

import { fileExists, type ScratchDir } from "../lib/tempCleanup";
import { extensionOf } from "../services/assets";
import type { RenderContext } from "./types";

export interface FetchAssetsInput {
  segments: readonly Segment[];
  voiceOverPath: string;
  musicRef?: string;
  includeAudio: boolean;
}

export interface FetchedAssets {
  /** segment index → local footage file */
  footage: Map<number, string>;
  voiceOverPath?: string;
  musicPath?: string;
  /** Segments without a footage reference. */
  skippedSegments: number[];
  /** Segments whose footage could not be fetched. */
  failedSegments: number[];
}

type Job =
  | { kind: "footage"; segmentIndex: number; reference: string; name: string }
  | { kind: "voice"; reference: string; name: string }
  | { kind: "music"; reference: string; name: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves one reference. Local files are used where they are; remote ones
 * land in the scratch directory under a fixed name and are not fetched again
 * if already there.
 */
async function acquire(job: Job, scratch: ScratchDir, ctx: RenderContext): Promise<string> {
  if (ctx.assets.isLocal(job.reference)) {
    return ctx.assets.fetch(job.reference, job.reference);
  }

  const destination = scratch.file(job.name);
  if (await fileExists(destination)) {
    ctx.logger.info("render_asset_reused", { kind: job.kind, destination });
    return destination;
  }
  return ctx.assets.fetch(job.reference, destination);
}

/**
 * Fetches footage, voice-over and music concurrently and waits for all of them.
 * Footage and music failures reduce the asset set; a missing voice-over or no
 * footage at all ends the render.
 */
export async function fetchAssets(
  input: FetchAssetsInput,
  scratch: ScratchDir,
  ctx: RenderContext,
): Promise<FetchedAssets> {
  const jobs: Job[] = [];
  const skippedSegments: number[] = [];

  for (const segment of input.segments) {
    if (!segment.footageUrl) {
      ctx.logger.warn("render_segment_without_footage", { segmentIndex: segment.index });
      skippedSegments.push(segment.index);
      continue;
    }
    jobs.push({
      kind: "footage",
      segmentIndex: segment.index,
      reference: segment.footageUrl,
      name: `footage_${segment.index}${extensionOf(segment.footageUrl, ".mp4")}`,
    });
  }

  if (jobs.length === 0) {
    throw new NoFootageError(input.segments.length);
  }

  if (input.includeAudio) {
    jobs.push({
      kind: "voice",
      reference: input.voiceOverPath,
      name: `voiceover${extensionOf(input.voiceOverPath, ".mp3")}`,
    });
    if (input.musicRef) {
      jobs.push({ kind: "music", reference: input.musicRef, name: `music${extensionOf(input.musicRef, ".mp3")}` });
    }
  }

  const results = await Promise.allSettled(jobs.map((job) => acquire(job, scratch, ctx)));

  const footage = new Map<number, string>();
  const failedSegments: number[] = [];
  let voiceOverPath: string | undefined;
  let voiceError: unknown;
  let musicPath: string | undefined;

  for (const [position, result] of results.entries()) {
    const job = jobs[position];
    if (!job) continue;

    if (job.kind === "footage") {
      if (result.status === "fulfilled") {
        footage.set(job.segmentIndex, result.value);
      } else {
        failedSegments.push(job.segmentIndex);
        ctx.logger.warn("render_footage_failed", {
          segmentIndex: job.segmentIndex,
          error: errorMessage(result.reason),
        });
      }
    } else if (job.kind === "voice") {
      if (result.status === "fulfilled") {
        voiceOverPath = result.value;
      } else {
        voiceError = result.reason;
      }
    } else if (result.status === "fulfilled") {
      musicPath = result.value;
    } else {
      ctx.logger.warn("render_music_unavailable", { error: errorMessage(result.reason) });
    }
  }

  if (footage.size === 0) {
    throw new NoFootageError(input.segments.length);
  }

  if (input.includeAudio && !voiceOverPath) {
    throw new VoiceOverUnavailableError(
      `Voice-over not available: ${errorMessage(voiceError ?? "not fetched")}`,
      input.voiceOverPath,
    );
  }

  ctx.logger.info("render_assets_fetched", {
    footage: footage.size,
    requested: input.segments.length,
    skipped: skippedSegments.length,
    failed: failedSegments.length,
    music: Boolean(musicPath),
  });

  return { footage, voiceOverPath, musicPath, skippedSegments, failedSegments };
}

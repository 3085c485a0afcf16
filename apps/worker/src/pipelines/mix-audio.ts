import {
  createDuckingEnvelope,
  shiftIntervals,
  toVolumeExpression,
  type DuckingEnvelope,
  type TimeInterval,
} from "@voxreel/shared/render/ducking";
import type { Segment } from "@voxreel/shared/render/segments";
import { planCoverage, type CoveragePlan } from "@voxreel/shared/render/timeline";

import { describeFailure, runFfmpegSafely } from "../lib/ffmpegSafe";
import type { ScratchDir } from "../lib/tempCleanup";
import { buildAudioMixCommand, buildSilentAudioCommand, type MusicTrackInput } from "../services/ffmpeg/build-commands";
import { probeDuration } from "../services/ffmpeg/probe";
import { runFfmpegCommand } from "../services/ffmpeg/run";
import type { RenderContext } from "./types";

export type AudioMode = "voice_with_music" | "voice_only" | "silent";

export interface MixAudioInput {
  totalDuration: number;
  segments: readonly Segment[];
  voiceOverPath?: string;
  musicPath?: string;
  includeAudio: boolean;
}

export interface MixedAudio {
  path: string;
  mode: AudioMode;
  envelope?: DuckingEnvelope;
  musicPlan?: CoveragePlan;
}

/**
 * Narration intervals on the output timeline: the segment ranges, shifted by
 * the voice-over offset so ducking follows the narration as it is heard.
 */
export function narrationIntervals(segments: readonly Segment[], offsetSeconds: number): TimeInterval[] {
  return shiftIntervals(
    segments.map((segment) => ({ start: segment.startTime, end: segment.endTime })),
    offsetSeconds,
  );
}

/**
 * Builds the final audio track. Music problems fall back to narration only;
 * only a failure of the narration-only mix itself is fatal.
 */
export async function mixAudio(input: MixAudioInput, scratch: ScratchDir, ctx: RenderContext): Promise<MixedAudio> {
  const { settings, logger } = ctx;
  const outPath = scratch.file("audio.m4a");

  if (!input.includeAudio || !input.voiceOverPath) {
    await runFfmpegCommand(
      "silent audio",
      buildSilentAudioCommand(outPath, input.totalDuration),
      outPath,
      settings,
      logger,
    );
    return { path: outPath, mode: "silent" };
  }

  const voice = { path: input.voiceOverPath, offsetSeconds: settings.voiceOffsetSeconds };

  if (input.musicPath) {
    const envelope = createDuckingEnvelope(narrationIntervals(input.segments, settings.voiceOffsetSeconds), {
      defaultVolume: settings.music.defaultVolume,
      duckedVolume: settings.music.duckedVolume,
      fadeSeconds: settings.music.duckFadeSeconds,
    });

    const probe = await probeDuration(input.musicPath, settings, logger);
    if (probe.ok) {
      const music: MusicTrackInput = {
        path: input.musicPath,
        plan: planCoverage(probe.durationSeconds, input.totalDuration),
        volumeExpression: toVolumeExpression(envelope),
        fadeOutSeconds: settings.music.fadeOutSeconds,
      };
      const result = await runFfmpegSafely({
        args: buildAudioMixCommand({ outPath, totalDuration: input.totalDuration, voice, music }).args,
        binary: settings.ffmpegPath,
        outputPath: outPath,
        timeoutMs: settings.ffmpegTimeoutMs,
        logger,
      });
      if (result.ok) {
        logger.info("render_audio_mixed", {
          mode: "voice_with_music",
          musicPlays: music.plan.plays,
          duckIntervals: envelope.intervals.length,
        });
        return { path: outPath, mode: "voice_with_music", envelope, musicPlan: music.plan };
      }
      logger.warn("render_music_mix_failed", { reason: describeFailure("music mix", result) });
    } else {
      logger.warn("render_music_mix_failed", { reason: `probe failed: ${probe.reason}` });
    }
  }

  await runFfmpegCommand(
    "voice-over mix",
    buildAudioMixCommand({ outPath, totalDuration: input.totalDuration, voice }),
    outPath,
    settings,
    logger,
  );
  logger.info("render_audio_mixed", { mode: "voice_only" });
  return { path: outPath, mode: "voice_only" };
}

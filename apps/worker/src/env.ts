/**
 * Worker environment variable adapter.
 *
 * All environment variables are defined in packages/shared/src/env.ts (single source of truth).
 * Worker code should import getEnv or loadRenderSettings from this module instead of
 * accessing process.env directly.
 */
import { defaultRenderTempDir, getEnv as getSharedEnv, type Env } from "@voxreel/shared/env";

import type { RenderSettings } from "./pipelines/types";

export function getEnv(): Env {
  return getSharedEnv();
}

function positive(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Render settings derived from the environment. Out-of-range values fall back
 * to the defaults instead of producing an unplayable output.
 */
export function loadRenderSettings(env: Env = getSharedEnv()): RenderSettings {
  return {
    width: Math.trunc(positive(env.RENDER_WIDTH, 1920)),
    height: Math.trunc(positive(env.RENDER_HEIGHT, 1080)),
    fps: positive(env.RENDER_FPS, 24),
    trailingPadSeconds: Math.max(0, env.RENDER_TRAILING_PAD_SEC),
    voiceOffsetSeconds: env.RENDER_VOICE_OFFSET_SEC,
    music: {
      defaultVolume: Math.max(0, env.MUSIC_DEFAULT_VOLUME),
      duckedVolume: Math.max(0, env.MUSIC_DUCKED_VOLUME),
      duckFadeSeconds: Math.max(0, env.MUSIC_DUCK_FADE_SEC),
      fadeOutSeconds: Math.max(0, env.MUSIC_FADE_OUT_SEC),
    },
    fontFile: env.SUBTITLE_FONT_FILE,
    tempDir: env.RENDER_TEMP_DIR ?? defaultRenderTempDir(),
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    ffmpegTimeoutMs: positive(env.FFMPEG_TIMEOUT_MS, 10 * 60 * 1000),
  };
}

export type { Env };

import { runFfprobeSafely } from "../../lib/ffmpegSafe";
import type { LoggerLike, RenderSettings } from "../../pipelines/types";

export type ProbeResult = { ok: true; durationSeconds: number } | { ok: false; reason: string };

type ProbeSettings = Pick<RenderSettings, "ffprobePath" | "ffmpegTimeoutMs">;

export function buildProbeArgs(path: string): string[] {
  return ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", path];
}

export function parseProbeDuration(stdout: string): number | null {
  const first = stdout.trim().split(/\s+/)[0] ?? "";
  const value = Number.parseFloat(first);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/** Container duration in seconds, as reported by ffprobe. */
export async function probeDuration(path: string, settings: ProbeSettings, logger?: LoggerLike): Promise<ProbeResult> {
  const result = await runFfprobeSafely({
    args: buildProbeArgs(path),
    binary: settings.ffprobePath,
    timeoutMs: Math.min(settings.ffmpegTimeoutMs, 60_000),
    logger,
  });

  if (!result.ok) {
    return { ok: false, reason: result.stderrSummary || `ffprobe ${result.kind.toLowerCase()}` };
  }

  const durationSeconds = parseProbeDuration(result.stdout);
  if (durationSeconds === null) {
    return { ok: false, reason: "no usable duration in ffprobe output" };
  }
  return { ok: true, durationSeconds };
}

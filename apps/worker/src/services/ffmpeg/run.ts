import { FfmpegExecutionError, FfmpegTimeoutError } from "@voxreel/shared/errors/render";

import { describeFailure, runFfmpegSafely } from "../../lib/ffmpegSafe";
import type { LoggerLike, RenderSettings } from "../../pipelines/types";
import type { FfmpegCommand } from "./build-commands";

type RunSettings = Pick<RenderSettings, "ffmpegPath" | "ffmpegTimeoutMs">;

/**
 * Runs a built command and throws a typed error on failure. For steps whose
 * failure ends the render; steps with a fallback inspect the safe result instead.
 */
export async function runFfmpegCommand(
  label: string,
  command: FfmpegCommand,
  outputPath: string,
  settings: RunSettings,
  logger?: LoggerLike,
): Promise<void> {
  const result = await runFfmpegSafely({
    args: command.args,
    binary: settings.ffmpegPath,
    outputPath,
    timeoutMs: settings.ffmpegTimeoutMs,
    logger,
  });

  if (result.ok) return;

  const message = describeFailure(label, result);
  if (result.kind === "TIMEOUT") {
    throw new FfmpegTimeoutError(message, settings.ffmpegTimeoutMs, outputPath);
  }
  throw new FfmpegExecutionError(message, result.exitCode, result.signal, outputPath);
}

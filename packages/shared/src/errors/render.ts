/**
 * Render pipeline error classes.
 *
 * Errors extending RenderError are business failures that end a render with a
 * human-readable message on the RenderTask. Process and download errors carry
 * the details needed for logs and Sentry.
 */

export type RenderErrorCode =
  | "invalid_render_request"
  | "voice_over_unavailable"
  | "no_footage"
  | "no_clips"
  | "render_task_not_found";

export class RenderError extends Error {
  constructor(
    message: string,
    public readonly code: RenderErrorCode,
  ) {
    super(message);
    this.name = "RenderError";
  }
}

export class InvalidRenderRequestError extends RenderError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "invalid_render_request");
    this.name = "InvalidRenderRequestError";
  }
}

export class VoiceOverUnavailableError extends RenderError {
  constructor(
    message: string,
    public readonly reference?: string,
  ) {
    super(message, "voice_over_unavailable");
    this.name = "VoiceOverUnavailableError";
  }
}

export class NoFootageError extends RenderError {
  constructor(public readonly requestedSegments: number) {
    super(`No footage available: 0 of ${requestedSegments} segments could be downloaded`, "no_footage");
    this.name = "NoFootageError";
  }
}

export class NoClipsError extends RenderError {
  constructor(public readonly attemptedClips: number) {
    super(`No video clips were created from ${attemptedClips} downloaded footage files`, "no_clips");
    this.name = "NoClipsError";
  }
}

export class RenderTaskNotFoundError extends RenderError {
  constructor(public readonly taskId: string) {
    super(`Render task ${taskId} not found`, "render_task_not_found");
    this.name = "RenderTaskNotFoundError";
  }
}

export class FfmpegTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly outputPath?: string,
  ) {
    super(message);
    this.name = "FfmpegTimeoutError";
  }
}

export class FfmpegExecutionError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number | null,
    public readonly signal?: NodeJS.Signals | null,
    public readonly outputPath?: string,
  ) {
    super(message);
    this.name = "FfmpegExecutionError";
  }
}

export class DownloadFailedError extends Error {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "DownloadFailedError";
  }
}

/** Message recorded on a failed RenderTask. */
export function toFailureMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message.trim();
  }
  const text = String(error).trim();
  return text === "" ? "Render failed" : text;
}

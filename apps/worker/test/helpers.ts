import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";

import { vi } from "vitest";

import { DownloadFailedError } from "@voxreel/shared/errors/render";

import { runFfmpegSafely, runFfprobeSafely, type ToolResult, type ToolRunOptions } from "../src/lib/ffmpegSafe";
import type {
  AssetSource,
  LoggerLike,
  OutputSink,
  RenderContext,
  RenderSettings,
  SentryAdapter,
} from "../src/pipelines/types";

export type LogRecord = { level: "debug" | "info" | "warn" | "error"; message: string; context?: Record<string, unknown> };

export function createLoggerMock(): LoggerLike & { records: LogRecord[]; events(level?: LogRecord["level"]): string[] } {
  const records: LogRecord[] = [];
  const push = (level: LogRecord["level"]) => (message: string, context?: Record<string, unknown>) => {
    records.push({ level, message, context });
  };
  return {
    records,
    events(level) {
      return records.filter((record) => !level || record.level === level).map((record) => record.message);
    },
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}

export function createSentryMock(): SentryAdapter & { captured: unknown[] } {
  const captured: unknown[] = [];
  return {
    captured,
    captureException(error: unknown) {
      captured.push(error);
    },
  };
}

export async function makeTempRoot(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), "voxreel-test-"));
}

export function createTestSettings(tempDir: string, overrides: Partial<RenderSettings> = {}): RenderSettings {
  return {
    width: 1920,
    height: 1080,
    fps: 24,
    trailingPadSeconds: 2,
    voiceOffsetSeconds: 0,
    music: { defaultVolume: 0.7, duckedVolume: 0.2, duckFadeSeconds: 0.3, fadeOutSeconds: 2 },
    tempDir,
    ffmpegPath: "ffmpeg",
    ffprobePath: "ffprobe",
    ffmpegTimeoutMs: 5_000,
    ...overrides,
  };
}

/**
 * Serves `https://` references from a fixed table; everything else is a
 * local path returned as-is. File content doubles as the media duration the
 * fake ffprobe reports.
 */
export class FakeAssetSource implements AssetSource {
  readonly calls: string[] = [];

  constructor(private readonly remote: Record<string, string | Error>) {}

  isLocal(reference: string): boolean {
    return !reference.startsWith("https://");
  }

  async fetch(reference: string, destination: string): Promise<string> {
    this.calls.push(reference);
    if (this.isLocal(reference)) {
      await fs.access(reference);
      return reference;
    }
    const entry = this.remote[reference];
    if (entry === undefined) {
      throw new DownloadFailedError(`Download failed with HTTP 404`, reference, 404);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    await fs.writeFile(destination, entry, "utf8");
    return destination;
  }
}

export class MemorySink implements OutputSink {
  readonly published: { localPath: string; taskId: string; projectId: string; content: string }[] = [];

  async publish(localPath: string, target: { taskId: string; projectId: string }): Promise<string> {
    const content = await fs.readFile(localPath, "utf8");
    this.published.push({ localPath, ...target, content });
    return `memory://${target.projectId}/${target.taskId}.mp4`;
  }
}

export function createTestContext(options: {
  tempDir: string;
  remote?: Record<string, string | Error>;
  settings?: Partial<RenderSettings>;
}): RenderContext & {
  logger: ReturnType<typeof createLoggerMock>;
  sentry: ReturnType<typeof createSentryMock>;
  assets: FakeAssetSource;
  sink: MemorySink;
} {
  return {
    logger: createLoggerMock(),
    sentry: createSentryMock(),
    assets: new FakeAssetSource(options.remote ?? {}),
    sink: new MemorySink(),
    settings: createTestSettings(options.tempDir, options.settings),
  };
}

/** Every ffmpeg invocation the fake saw, in order. */
export const ffmpegCalls: string[][] = [];

/**
 * Replaces the mocked process wrappers: ffmpeg writes a placeholder to its
 * output (the last argument) unless `failWhen` matches; ffprobe reports the
 * probed file's content as its duration.
 * Only usable in files that `vi.mock("../src/lib/ffmpegSafe", ...)`.
 */
export function installFakeFfmpeg(options: { failWhen?: (args: string[]) => boolean } = {}): void {
  ffmpegCalls.length = 0;

  vi.mocked(runFfmpegSafely).mockImplementation(async (run: ToolRunOptions): Promise<ToolResult> => {
    ffmpegCalls.push(run.args);
    if (options.failWhen?.(run.args)) {
      return { ok: false, kind: "EXIT_CODE", exitCode: 1, signal: null, stderrSummary: "simulated failure" };
    }
    const output = run.args[run.args.length - 1];
    if (output) {
      await fs.mkdir(dirname(output), { recursive: true });
      await fs.writeFile(output, `rendered:${basename(output)}`, "utf8");
    }
    return { ok: true, stdout: "" };
  });

  vi.mocked(runFfprobeSafely).mockImplementation(async (run: ToolRunOptions): Promise<ToolResult> => {
    const target = run.args[run.args.length - 1] ?? "";
    try {
      const content = await fs.readFile(target, "utf8");
      return { ok: true, stdout: `${content}\n` };
    } catch {
      return { ok: false, kind: "EXIT_CODE", exitCode: 1, signal: null, stderrSummary: `${target}: No such file` };
    }
  });
}

export function filtergraphOf(args: string[]): string {
  const position = args.indexOf("-filter_complex");
  return position >= 0 ? (args[position + 1] ?? "") : "";
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

import type { RenderStatusView, RenderTask } from "@voxreel/shared/render/renderTask";
import type { RenderRequest } from "@voxreel/shared/render/segments";

export interface LoggerLike {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface StorageAdapter {
  download(bucket: string, path: string, destination: string): Promise<string>;
  upload(bucket: string, path: string, localFile: string, contentType?: string): Promise<void>;
}

export interface SentryAdapter {
  captureException(error: unknown, context?: { tags?: Record<string, string>; extra?: Record<string, unknown> }): void;
}

/**
 * Resolves an asset reference to a readable local file.
 */
export interface AssetSource {
  /** True when the reference already names a file on this machine. */
  isLocal(reference: string): boolean;
  /** Local references resolve to themselves; remote ones are written to `destination`. */
  fetch(reference: string, destination: string): Promise<string>;
}

/** Where a finished render is published. Returns the location recorded on the task. */
export interface OutputSink {
  publish(localPath: string, target: { taskId: string; projectId: string }): Promise<string>;
}

export interface RenderTaskRepository {
  create(task: RenderTask): Promise<RenderTask>;
  getById(taskId: string): Promise<RenderTask | null>;
  update(task: RenderTask): Promise<RenderTask>;
  getLatestCompletedByProject(projectId: string): Promise<RenderTask | null>;
}

/** Inputs the polling worker needs to build a render request for a project. */
export interface RenderSourceRepository {
  loadRenderInput(projectId: string): Promise<RenderRequest>;
  /** Last completed render wins. */
  recordOutput(projectId: string, outputLocation: string): Promise<void>;
}

export interface RenderSettings {
  width: number;
  height: number;
  fps: number;
  trailingPadSeconds: number;
  voiceOffsetSeconds: number;
  music: {
    defaultVolume: number;
    duckedVolume: number;
    duckFadeSeconds: number;
    fadeOutSeconds: number;
  };
  fontFile?: string;
  tempDir: string;
  ffmpegPath: string;
  ffprobePath: string;
  ffmpegTimeoutMs: number;
}

export interface RenderContext {
  logger: LoggerLike;
  sentry: SentryAdapter;
  assets: AssetSource;
  sink: OutputSink;
  settings: RenderSettings;
}

/** Receives whole-number progress percentages as the pipeline advances. */
export type ProgressSink = (progress: number) => void;

export type { RenderStatusView };

/**
 * Safe wrappers around the ffmpeg and ffprobe binaries.
 *
 * - Timeout enforcement (kills the process if it runs too long)
 * - Structured results instead of thrown errors
 * - Stderr summaries with secret-looking lines removed
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { LoggerLike } from "../pipelines/types";

export interface ToolRunOptions {
  /** Command-line arguments */
  args: string[];
  /** Binary to run (default: "ffmpeg" / "ffprobe") */
  binary?: string;
  /** Local file the run is expected to produce, for logging */
  outputPath?: string;
  /** Timeout in milliseconds (default: 5 minutes) */
  timeoutMs?: number;
  logger?: LoggerLike;
}

export type ToolResult =
  | {
      ok: true;
      stdout: string;
      stderrSummary?: string;
    }
  | {
      ok: false;
      kind: "TIMEOUT" | "EXIT_CODE" | "SPAWN_ERROR";
      exitCode?: number | null;
      signal?: NodeJS.Signals | null;
      stderrSummary?: string;
    };

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export function summarizeStderr(stderr: string, maxLines = 10): string {
  const lines = stderr.split("\n").filter((line) => line.trim().length > 0);
  const safeLines = lines.slice(-maxLines).filter((line) => {
    const lower = line.toLowerCase();
    return !lower.includes("password") && !lower.includes("token") && !lower.includes("authorization");
  });
  return safeLines.join("\n").slice(0, 500);
}

function runToolSafely(tool: "ffmpeg" | "ffprobe", options: ToolRunOptions): Promise<ToolResult> {
  const { args, binary = tool, outputPath, timeoutMs = DEFAULT_TIMEOUT_MS, logger } = options;

  return new Promise<ToolResult>((resolve) => {
    let stderr = "";
    let stdout = "";
    let settled = false;

    const settle = (result: ToolResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    let child: ChildProcess;
    try {
      child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.error(`${tool}_spawn_error`, { error: message, outputPath });
      settle({ ok: false, kind: "SPAWN_ERROR", stderrSummary: message });
      return;
    }

    const timeoutHandle = setTimeout(() => {
      if (settled || child.killed) return;
      child.kill("SIGKILL");
      logger?.error(`${tool}_timeout`, { timeoutMs, outputPath });
      settle({ ok: false, kind: "TIMEOUT", signal: "SIGKILL", stderrSummary: summarizeStderr(stderr) });
    }, timeoutMs);

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });

    child.once("error", (error) => {
      clearTimeout(timeoutHandle);
      const message = error instanceof Error ? error.message : String(error);
      logger?.error(`${tool}_spawn_error`, { error: message, outputPath });
      settle({ ok: false, kind: "SPAWN_ERROR", stderrSummary: message });
    });

    child.once("close", (code, signal) => {
      clearTimeout(timeoutHandle);

      if (code === 0) {
        logger?.debug(`${tool}_completed`, { outputPath });
        settle({ ok: true, stdout: stdout.slice(0, 4000), stderrSummary: summarizeStderr(stderr) });
        return;
      }

      logger?.error(`${tool}_failed`, {
        exitCode: code,
        signal,
        outputPath,
        stderrSummary: summarizeStderr(stderr),
      });
      settle({
        ok: false,
        kind: "EXIT_CODE",
        exitCode: code ?? null,
        signal: signal ?? null,
        stderrSummary: summarizeStderr(stderr),
      });
    });
  });
}

/** Runs ffmpeg. Never throws; inspect `ok` on the result. */
export function runFfmpegSafely(options: ToolRunOptions): Promise<ToolResult> {
  return runToolSafely("ffmpeg", options);
}

/** Runs ffprobe. Never throws; inspect `ok` on the result. */
export function runFfprobeSafely(options: ToolRunOptions): Promise<ToolResult> {
  return runToolSafely("ffprobe", options);
}

/** One-line description of a failed run, used as the error message. */
export function describeFailure(label: string, result: Exclude<ToolResult, { ok: true }>): string {
  if (result.kind === "TIMEOUT") {
    return `${label} timed out`;
  }
  if (result.kind === "SPAWN_ERROR") {
    return `${label} could not start: ${result.stderrSummary ?? "spawn error"}`;
  }
  return `${label} failed with exit code ${result.exitCode ?? "unknown"}: ${result.stderrSummary || "no error details"}`;
}

import { promises as fs } from "node:fs";
import { join } from "node:path";

type WarnLogger = { warn?: (msg: string, ctx?: Record<string, unknown>) => void };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isUnsafePath(path: string): boolean {
  return !path || path === "/" || path === ".";
}

/**
 * Safely cleans up a single temporary file.
 * Best-effort: a missing file is fine, any other failure is logged and swallowed.
 */
export async function cleanupTempFileSafe(filePath: string, logger?: WarnLogger): Promise<boolean> {
  if (isUnsafePath(filePath)) {
    logger?.warn?.("temp_file_cleanup_skipped_unsafe_path", { filePath });
    return false;
  }

  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code !== "ENOENT") {
      logger?.warn?.("temp_file_cleanup_failed", { filePath, error: errorMessage(error), code });
    }
    return false;
  }
}

/**
 * Removes a directory only when nothing is left in it, so files the pipeline
 * did not create are never touched.
 */
export async function removeDirIfEmptySafe(path: string, logger?: WarnLogger): Promise<boolean> {
  if (isUnsafePath(path)) {
    logger?.warn?.("temp_dir_cleanup_skipped_unsafe_path", { path });
    return false;
  }

  try {
    await fs.rmdir(path);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOTEMPTY" || code === "EEXIST") {
      logger?.warn?.("temp_dir_not_empty", { path });
    } else if (code !== "ENOENT") {
      logger?.warn?.("temp_dir_cleanup_failed", { path, error: errorMessage(error), code });
    }
    return false;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    const stat = await fs.stat(path);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Per-render working directory. Every intermediate file the pipeline writes is
 * named through `file()` and tracked, and `cleanup()` removes exactly those.
 */
export class ScratchDir {
  private readonly tracked = new Set<string>();

  constructor(public readonly path: string) {}

  async ensure(): Promise<void> {
    await fs.mkdir(this.path, { recursive: true });
  }

  /** Deterministic path for a named intermediate, registered for cleanup. */
  file(name: string): string {
    const full = join(this.path, name);
    this.tracked.add(full);
    return full;
  }

  trackedFiles(): string[] {
    return [...this.tracked];
  }

  async cleanup(logger?: WarnLogger): Promise<{ removed: number }> {
    let removed = 0;
    for (const file of this.tracked) {
      if (await cleanupTempFileSafe(file, logger)) {
        removed += 1;
      }
    }
    this.tracked.clear();
    await removeDirIfEmptySafe(this.path, logger);
    return { removed };
  }
}

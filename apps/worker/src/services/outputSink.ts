import { promises as fs } from "node:fs";
import { join, resolve } from "node:path";

import type { OutputSink, StorageAdapter } from "../pipelines/types";

function timestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
}

/** Copies finished renders into a local directory as `<projectId>_<timestamp>.mp4`. */
export class LocalDirectorySink implements OutputSink {
  constructor(
    private readonly directory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async publish(localPath: string, target: { taskId: string; projectId: string }): Promise<string> {
    const outDir = resolve(this.directory);
    await fs.mkdir(outDir, { recursive: true });
    const destination = join(outDir, `${target.projectId}_${timestamp(this.clock())}.mp4`);
    await fs.copyFile(localPath, destination);
    return destination;
  }
}

/** Uploads finished renders to `renders/<projectId>/<taskId>.mp4` and returns `bucket/key`. */
export class StorageOutputSink implements OutputSink {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly bucket: string,
  ) {}

  async publish(localPath: string, target: { taskId: string; projectId: string }): Promise<string> {
    const key = `renders/${target.projectId}/${target.taskId}.mp4`;
    await this.storage.upload(this.bucket, key, localPath, "video/mp4");
    return `${this.bucket}/${key}`;
  }
}

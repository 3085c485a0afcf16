import {
  clampProgress,
  completeTask,
  failTask,
  startProcessing,
  updateProgress,
  type RenderTask,
  type TransitionResult,
} from "@voxreel/shared/render/renderTask";

import type { LoggerLike, RenderTaskRepository } from "../pipelines/types";

type Clock = () => Date;

/**
 * Owns one RenderTask for the duration of a run. Each accepted transition is
 * written to the repository right away; writes are chained so they land in
 * the order the transitions happened.
 */
export class RenderTaskTracker {
  private current: RenderTask;
  private writes: Promise<void> = Promise.resolve();
  private writeFailures = 0;

  constructor(
    task: RenderTask,
    private readonly repository: RenderTaskRepository,
    private readonly logger: LoggerLike,
    private readonly clock: Clock = () => new Date(),
  ) {
    this.current = task;
  }

  get task(): RenderTask {
    return this.current;
  }

  get failedWrites(): number {
    return this.writeFailures;
  }

  async start(): Promise<boolean> {
    const accepted = this.apply("start", startProcessing(this.current, this.clock));
    await this.flush();
    return accepted;
  }

  /** Synchronous so it can serve as the pipeline's progress sink. */
  progress(value: number): void {
    if (this.current.status === "processing" && clampProgress(value) === this.current.progress) return;
    this.apply("progress", updateProgress(this.current, value, this.clock));
  }

  async complete(outputLocation: string): Promise<boolean> {
    const accepted = this.apply("complete", completeTask(this.current, outputLocation, this.clock));
    await this.flush();
    return accepted;
  }

  async fail(message: string): Promise<boolean> {
    const accepted = this.apply("fail", failTask(this.current, message, this.clock));
    await this.flush();
    return accepted;
  }

  flush(): Promise<void> {
    return this.writes;
  }

  private apply(transition: string, result: TransitionResult): boolean {
    if (!result.ok) {
      this.logger.warn("render_transition_rejected", {
        taskId: this.current.id,
        transition,
        status: this.current.status,
        reason: result.reason,
      });
      return false;
    }

    this.current = result.task;
    const snapshot = result.task;
    this.writes = this.writes.then(() => this.write(snapshot));
    return true;
  }

  private async write(task: RenderTask): Promise<void> {
    try {
      await this.repository.update(task);
    } catch (error) {
      this.writeFailures += 1;
      this.logger.error("render_task_write_failed", {
        taskId: task.id,
        status: task.status,
        progress: task.progress,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

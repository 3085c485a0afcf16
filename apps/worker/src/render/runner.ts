import { RenderError, RenderTaskNotFoundError, toFailureMessage } from "@voxreel/shared/errors/render";
import { createRenderTask, toStatusView, type RenderStatusView, type RenderTask } from "@voxreel/shared/render/renderTask";
import type { RenderRequest } from "@voxreel/shared/render/segments";

import { renderVideo } from "../pipelines/render-video";
import type { RenderContext, RenderSourceRepository, RenderTaskRepository } from "../pipelines/types";
import { RenderTaskTracker } from "./taskTracker";

export interface RenderRunnerOptions {
  repository: RenderTaskRepository;
  context: RenderContext;
  /** When set, completed renders are recorded on the project. */
  sources?: RenderSourceRepository;
  clock?: () => Date;
}

/**
 * Submits renders as background units of work. Callers get a Pending task back
 * immediately and poll `getStatus`; nothing here blocks on a render.
 */
export class RenderRunner {
  private readonly running = new Map<string, Promise<void>>();
  private readonly clock: () => Date;

  constructor(private readonly options: RenderRunnerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async submit(request: RenderRequest): Promise<RenderTask> {
    const task = await this.options.repository.create(createRenderTask(request.projectId, this.clock));
    this.options.context.logger.info("render_submitted", {
      taskId: task.id,
      projectId: task.projectId,
      segments: request.segments.length,
    });
    this.track(task.id, this.execute(task, request));
    return task;
  }

  /**
   * Runs a task that already exists in the repository. Resolves once the task
   * is terminal; failures are recorded on the task, never thrown.
   */
  async execute(task: RenderTask, request: RenderRequest): Promise<void> {
    const { context, repository, sources } = this.options;
    const tracker = new RenderTaskTracker(task, repository, context.logger, this.clock);

    if (!(await tracker.start())) return;

    try {
      const outcome = await renderVideo(request, task.id, context, (progress) => tracker.progress(progress));
      if (!(await tracker.complete(outcome.outputLocation))) {
        const message = "Render output was not published: the output sink returned no location";
        context.logger.error("render_failed", { taskId: task.id, projectId: task.projectId, error: message });
        await tracker.fail(message);
        return;
      }
      context.logger.info("render_completed", {
        taskId: task.id,
        projectId: task.projectId,
        outputLocation: outcome.outputLocation,
        durationSeconds: outcome.durationSeconds,
        droppedSegments: outcome.droppedSegments,
        audioMode: outcome.audioMode,
      });
    } catch (error) {
      const message = toFailureMessage(error);
      if (!(error instanceof RenderError)) {
        context.sentry.captureException(error, {
          tags: { taskId: task.id, projectId: task.projectId },
        });
      }
      context.logger.error("render_failed", { taskId: task.id, projectId: task.projectId, error: message });
      await tracker.fail(message);
      return;
    }

    const location = tracker.task.outputLocation;
    if (sources && location) {
      try {
        await sources.recordOutput(task.projectId, location);
      } catch (error) {
        context.logger.warn("render_output_record_failed", {
          taskId: task.id,
          projectId: task.projectId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  async getStatus(taskId: string): Promise<RenderStatusView> {
    const task = await this.options.repository.getById(taskId);
    if (!task) {
      throw new RenderTaskNotFoundError(taskId);
    }
    return toStatusView(task);
  }

  /** Most recent successful render of a project; later renders win. */
  latestCompleted(projectId: string): Promise<RenderTask | null> {
    return this.options.repository.getLatestCompletedByProject(projectId);
  }

  /** Resolves once the task has finished running in this process. */
  async waitFor(taskId: string): Promise<RenderStatusView> {
    await this.running.get(taskId);
    return this.getStatus(taskId);
  }

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()]);
    }
  }

  private track(taskId: string, run: Promise<void>): void {
    const settled = run
      .catch((error: unknown) => {
        this.options.context.logger.error("render_runner_crashed", {
          taskId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.running.delete(taskId);
      });
    this.running.set(taskId, settled);
  }
}

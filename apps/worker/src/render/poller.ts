import { failTask, type RenderTask } from "@voxreel/shared/render/renderTask";
import { toFailureMessage } from "@voxreel/shared/errors/render";
import type { RenderRequest } from "@voxreel/shared/render/segments";

import type { LoggerLike, RenderSourceRepository, RenderTaskRepository } from "../pipelines/types";
import type { RenderRunner } from "./runner";

export interface PendingTaskSource {
  findNextPending(): Promise<RenderTask | null>;
}

export interface PollDeps {
  pending: PendingTaskSource;
  tasks: RenderTaskRepository;
  sources: RenderSourceRepository;
  runner: Pick<RenderRunner, "execute">;
  logger: LoggerLike;
}

/**
 * Picks up the oldest pending task and renders it to completion.
 * Returns false when there was nothing to do.
 */
export async function pollOnce(deps: PollDeps): Promise<boolean> {
  const task = await deps.pending.findNextPending();
  if (!task) return false;

  deps.logger.info("render_task_claimed", { taskId: task.id, projectId: task.projectId });

  let request: RenderRequest;
  try {
    request = await deps.sources.loadRenderInput(task.projectId);
  } catch (error) {
    const message = toFailureMessage(error);
    deps.logger.error("render_input_invalid", { taskId: task.id, projectId: task.projectId, error: message });
    const failed = failTask(task, message);
    if (failed.ok) {
      await deps.tasks.update(failed.task);
    }
    return true;
  }

  await deps.runner.execute(task, request);
  return true;
}

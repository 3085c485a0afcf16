/**
 * RenderTask lifecycle.
 *
 * Pending → Processing → Complete | Failed. Complete and Failed are terminal:
 * once reached, every further transition is rejected. Transitions are pure and
 * return a new task; persistence is the caller's concern.
 */

import { randomUUID } from "node:crypto";

export type RenderStatus = "pending" | "processing" | "complete" | "failed";

export interface RenderTask {
  readonly id: string;
  readonly projectId: string;
  readonly status: RenderStatus;
  readonly progress: number;
  readonly outputLocation: string | null;
  readonly error: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** What pollers see. */
export interface RenderStatusView {
  status: RenderStatus;
  progress: number;
  output_location: string | null;
  error: string | null;
}

export type TransitionResult =
  | { ok: true; task: RenderTask }
  | { ok: false; task: RenderTask; reason: string };

type Clock = () => Date;

const systemClock: Clock = () => new Date();

export function createRenderTask(projectId: string, clock: Clock = systemClock): RenderTask {
  const now = clock().toISOString();
  return {
    id: `task-${randomUUID()}`,
    projectId,
    status: "pending",
    progress: 0,
    outputLocation: null,
    error: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function isTerminal(task: Pick<RenderTask, "status">): boolean {
  return task.status === "complete" || task.status === "failed";
}

export function isInProgress(task: Pick<RenderTask, "status">): boolean {
  return task.status === "pending" || task.status === "processing";
}

function reject(task: RenderTask, reason: string): TransitionResult {
  return { ok: false, task, reason };
}

export function startProcessing(task: RenderTask, clock: Clock = systemClock): TransitionResult {
  if (task.status !== "pending") {
    return reject(task, `cannot start processing a task in ${task.status} state`);
  }
  return {
    ok: true,
    task: { ...task, status: "processing", progress: 0, error: null, updatedAt: clock().toISOString() },
  };
}

/** Clamps to 0..100 and rounds to a whole percentage. */
export function clampProgress(progress: number): number {
  return Math.round(Math.min(100, Math.max(0, progress)));
}

export function updateProgress(task: RenderTask, progress: number, clock: Clock = systemClock): TransitionResult {
  if (task.status !== "processing") {
    return reject(task, `cannot update progress for a task in ${task.status} state`);
  }
  if (Number.isNaN(progress)) {
    return reject(task, "progress must be a number");
  }
  return {
    ok: true,
    task: { ...task, progress: clampProgress(progress), updatedAt: clock().toISOString() },
  };
}

export function completeTask(task: RenderTask, outputLocation: string, clock: Clock = systemClock): TransitionResult {
  if (isTerminal(task)) {
    return reject(task, `cannot complete a task in ${task.status} state`);
  }
  const location = outputLocation.trim();
  if (!location) {
    return reject(task, "output location cannot be empty");
  }
  return {
    ok: true,
    task: {
      ...task,
      status: "complete",
      progress: 100,
      outputLocation: location,
      error: null,
      updatedAt: clock().toISOString(),
    },
  };
}

export function failTask(task: RenderTask, message: string, clock: Clock = systemClock): TransitionResult {
  if (isTerminal(task)) {
    return reject(task, `cannot fail a task in ${task.status} state`);
  }
  return {
    ok: true,
    task: {
      ...task,
      status: "failed",
      error: message.trim() || "Render failed",
      updatedAt: clock().toISOString(),
    },
  };
}

export function toStatusView(task: RenderTask): RenderStatusView {
  return {
    status: task.status,
    progress: task.progress,
    output_location: task.outputLocation,
    error: task.error,
  };
}

export function describeRenderTask(task: Pick<RenderTask, "status" | "progress">): string {
  if (task.status === "processing") {
    return `Processing (${task.progress}%)`;
  }
  return task.status.charAt(0).toUpperCase() + task.status.slice(1);
}

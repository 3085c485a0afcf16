/**
 * Structured pipeline step logging with Sentry breadcrumbs, so a failed render's
 * Sentry event carries the phases it went through.
 *
 * Never logs secrets (tokens, keys, etc.) - only safe identifiers.
 */

import * as Sentry from "@sentry/node";

import { logger } from "@voxreel/shared/logging/logger";

export type PipelineContext = {
  taskId: string;
  projectId?: string;
};

export type PipelinePhase = "start" | "success" | "error";

function addBreadcrumb(
  category: string,
  message: string,
  level: "info" | "warning" | "error",
  data: Record<string, unknown>,
): void {
  Sentry.addBreadcrumb({
    category,
    message,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Logs a pipeline step (`pipeline_<step>_<phase>`) with structured fields and a Sentry breadcrumb.
 */
export function logPipelineStep(
  ctx: PipelineContext,
  step: string,
  phase: PipelinePhase,
  extra?: Record<string, unknown>,
): void {
  const payload: Record<string, unknown> = {
    service: "worker",
    taskId: ctx.taskId,
    ...(ctx.projectId && { projectId: ctx.projectId }),
    step,
    phase,
    ...extra,
  };

  const event = `pipeline_${step}_${phase}`;

  if (phase === "error") {
    logger.error(event, payload);
    addBreadcrumb("pipeline", event, "error", payload);
  } else {
    logger.info(event, payload);
    addBreadcrumb("pipeline", event, "info", payload);
  }
}

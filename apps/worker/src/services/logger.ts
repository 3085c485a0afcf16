import { logger as sharedLogger } from "@voxreel/shared/logging/logger";

import type { LoggerLike } from "../pipelines/types";

/**
 * Logger adapter that wraps the shared logger for pipeline use.
 * `base` fields (service, taskId) are attached to every line.
 */
export function createLoggerAdapter(base: Record<string, unknown> = { service: "worker" }): LoggerLike {
  return {
    debug(message: string, context?: Record<string, unknown>): void {
      sharedLogger.info(message, { ...base, ...context, level: "debug" });
    },
    info(message: string, context?: Record<string, unknown>): void {
      sharedLogger.info(message, { ...base, ...context });
    },
    warn(message: string, context?: Record<string, unknown>): void {
      sharedLogger.warn(message, { ...base, ...context });
    },
    error(message: string, context?: Record<string, unknown>): void {
      sharedLogger.error(message, { ...base, ...context });
    },
  };
}

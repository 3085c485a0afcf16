import * as Sentry from "@sentry/node";

import { getEnv } from "@voxreel/shared/env";
import { logger } from "@voxreel/shared/logging/logger";

let initialized = false;

export function initSentry(serviceName?: string): void {
  if (initialized) return;

  const env = getEnv();
  if (!env.SENTRY_DSN) {
    logger.warn("sentry_not_configured", { service: serviceName ?? "shared" });
    initialized = true;
    return;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: 1.0,
    initialScope: serviceName ? { tags: { service: serviceName } } : undefined,
  });

  logger.info("sentry_initialized", { service: serviceName ?? "shared", environment: env.NODE_ENV });
  initialized = true;
}

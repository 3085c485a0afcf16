import * as Sentry from "@sentry/node";

import { initSentry } from "@voxreel/shared/sentry";

import type { SentryAdapter } from "../pipelines/types";

/**
 * Reports render failures with `taskId`/`projectId` as searchable Sentry tags;
 * anything else the caller passes goes into `extra`.
 */
export function createSentryAdapter(service = "worker"): SentryAdapter {
  initSentry(service);
  return {
    captureException(error, context): void {
      Sentry.withScope((scope) => {
        scope.setTag("service", service);
        if (context?.tags) scope.setTags(context.tags);
        if (context?.extra) scope.setExtras(context.extra);
        Sentry.captureException(error instanceof Error ? error : new Error(String(error)));
      });
    },
  };
}

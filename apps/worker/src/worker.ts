import "dotenv/config";
import { setTimeout as sleep } from "node:timers/promises";
import { createClient } from "@supabase/supabase-js";

import { logger } from "@voxreel/shared/logging/logger";
import { initSentry } from "@voxreel/shared/sentry";

import { getEnv, loadRenderSettings } from "./env";
import type { OutputSink, RenderContext } from "./pipelines/types";
import { pollOnce, type PollDeps } from "./render/poller";
import { RenderRunner } from "./render/runner";
import { createAssetSource } from "./services/assets";
import { createLoggerAdapter } from "./services/logger";
import { LocalDirectorySink, StorageOutputSink } from "./services/outputSink";
import { SupabaseRenderSourceRepository } from "./services/renderSources";
import { SupabaseRenderTaskRepository } from "./services/renderTasks";
import { createSentryAdapter } from "./services/sentry";
import { createStorageAdapter } from "./services/storage";

const env = getEnv();

function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is not configured`);
  }
  return value;
}

const SUPABASE_URL = requireSetting(env.SUPABASE_URL, "SUPABASE_URL");
const SUPABASE_SERVICE_ROLE_KEY = requireSetting(env.SUPABASE_SERVICE_ROLE_KEY, "SUPABASE_SERVICE_ROLE_KEY");

const POLL_INTERVAL_MS = env.WORKER_POLL_MS > 0 ? Math.trunc(env.WORKER_POLL_MS) : 2000;
const WORKER_ID = `${process.env.HOSTNAME ?? "local"}:${process.pid}:${Date.now()}`;

let shuttingDown = false;

initSentry("worker");

function createPollDeps(): PollDeps & { runner: RenderRunner } {
  const supabase = createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false },
  });
  const storage = createStorageAdapter(supabase);
  const pipelineLogger = createLoggerAdapter({ service: "worker", worker_id: WORKER_ID });

  const sink: OutputSink = env.RENDER_OUTPUT_BUCKET
    ? new StorageOutputSink(storage, env.RENDER_OUTPUT_BUCKET)
    : new LocalDirectorySink(env.RENDER_OUTPUT_DIR);

  const context: RenderContext = {
    logger: pipelineLogger,
    sentry: createSentryAdapter(),
    assets: createAssetSource({ storage, timeoutMs: env.DOWNLOAD_TIMEOUT_MS, logger: pipelineLogger }),
    sink,
    settings: loadRenderSettings(env),
  };

  const tasks = new SupabaseRenderTaskRepository(supabase);
  const sources = new SupabaseRenderSourceRepository(supabase);

  return {
    pending: tasks,
    tasks,
    sources,
    runner: new RenderRunner({ repository: tasks, context, sources }),
    logger: pipelineLogger,
  };
}

async function pollingLoop(deps: PollDeps): Promise<void> {
  while (!shuttingDown) {
    const started = Date.now();
    let worked = false;

    try {
      worked = await pollOnce(deps);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown polling error";
      logger.error("tick_error", { service: "worker", worker_id: WORKER_ID }, { error: message });
    }

    if (worked) continue;

    const elapsed = Date.now() - started;
    await sleep(Math.max(POLL_INTERVAL_MS - elapsed, 100));
  }
}

function registerShutdown(): void {
  const stop = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("worker_shutdown_requested", { service: "worker", worker_id: WORKER_ID }, { signal });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

async function main(): Promise<void> {
  registerShutdown();
  const deps = createPollDeps();

  logger.info(
    "worker_started",
    { service: "worker", worker_id: WORKER_ID },
    { pollIntervalMs: POLL_INTERVAL_MS, tempDir: loadRenderSettings(env).tempDir },
  );

  await pollingLoop(deps);
  await deps.runner.drain();
  logger.info("worker_stopped", { service: "worker", worker_id: WORKER_ID });
}

main().catch((error: unknown) => {
  logger.error("worker_fatal", { service: "worker", worker_id: WORKER_ID }, { error: String(error) });
  process.exitCode = 1;
});

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import type { RenderTask } from "@voxreel/shared/render/renderTask";

import type { RenderTaskRepository } from "../pipelines/types";

/**
 * Polled store used by the runner and tests. Tasks are immutable values, so
 * handing out the stored object never exposes shared mutable state.
 */
export class InMemoryRenderTaskRepository implements RenderTaskRepository {
  private readonly tasks = new Map<string, RenderTask>();

  async create(task: RenderTask): Promise<RenderTask> {
    if (this.tasks.has(task.id)) {
      throw new Error(`render task ${task.id} already exists`);
    }
    this.tasks.set(task.id, task);
    return task;
  }

  async getById(taskId: string): Promise<RenderTask | null> {
    return this.tasks.get(taskId) ?? null;
  }

  async update(task: RenderTask): Promise<RenderTask> {
    if (!this.tasks.has(task.id)) {
      throw new Error(`render task ${task.id} not found`);
    }
    this.tasks.set(task.id, task);
    return task;
  }

  async getLatestCompletedByProject(projectId: string): Promise<RenderTask | null> {
    let latest: RenderTask | null = null;
    for (const task of this.tasks.values()) {
      if (task.projectId !== projectId || task.status !== "complete") continue;
      if (!latest || task.updatedAt > latest.updatedAt) latest = task;
    }
    return latest;
  }

  all(): RenderTask[] {
    return [...this.tasks.values()];
  }
}

const TABLE = "render_tasks";
const COLUMNS = "id,project_id,status,progress,output_file_path,error_message,created_at,updated_at";

const RenderTaskRow = z.object({
  id: z.string(),
  project_id: z.string(),
  status: z.enum(["pending", "processing", "complete", "failed"]),
  progress: z.number(),
  output_file_path: z.string().nullable(),
  error_message: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

type RenderTaskRow = z.infer<typeof RenderTaskRow>;

export function rowToTask(row: RenderTaskRow): RenderTask {
  return {
    id: row.id,
    projectId: row.project_id,
    status: row.status,
    progress: row.progress,
    outputLocation: row.output_file_path,
    error: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function taskToRow(task: RenderTask): RenderTaskRow {
  return {
    id: task.id,
    project_id: task.projectId,
    status: task.status,
    progress: task.progress,
    output_file_path: task.outputLocation,
    error_message: task.error,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

function parseRows(data: unknown): RenderTask[] {
  return z.array(RenderTaskRow).parse(data ?? []).map(rowToTask);
}

/**
 * Render tasks in the Supabase `render_tasks` table. Every call is a direct
 * write-through; nothing is cached or batched.
 */
export class SupabaseRenderTaskRepository implements RenderTaskRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async create(task: RenderTask): Promise<RenderTask> {
    const { data, error } = await this.supabase.from(TABLE).insert(taskToRow(task)).select(COLUMNS);
    if (error) {
      throw new Error(`Failed to create render task ${task.id}: ${error.message}`);
    }
    return parseRows(data)[0] ?? task;
  }

  async getById(taskId: string): Promise<RenderTask | null> {
    const { data, error } = await this.supabase.from(TABLE).select(COLUMNS).eq("id", taskId).limit(1);
    if (error) {
      throw new Error(`Failed to load render task ${taskId}: ${error.message}`);
    }
    return parseRows(data)[0] ?? null;
  }

  async update(task: RenderTask): Promise<RenderTask> {
    const row = taskToRow(task);
    const changes = {
      status: row.status,
      progress: row.progress,
      output_file_path: row.output_file_path,
      error_message: row.error_message,
      updated_at: row.updated_at,
    };
    const { data, error } = await this.supabase.from(TABLE).update(changes).eq("id", task.id).select(COLUMNS);
    if (error) {
      throw new Error(`Failed to update render task ${task.id}: ${error.message}`);
    }
    return parseRows(data)[0] ?? task;
  }

  async getLatestCompletedByProject(projectId: string): Promise<RenderTask | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select(COLUMNS)
      .eq("project_id", projectId)
      .eq("status", "complete")
      .order("updated_at", { ascending: false })
      .limit(1);
    if (error) {
      throw new Error(`Failed to load completed renders for ${projectId}: ${error.message}`);
    }
    return parseRows(data)[0] ?? null;
  }

  /** Oldest pending task, for the polling worker. */
  async findNextPending(): Promise<RenderTask | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select(COLUMNS)
      .eq("status", "pending")
      .order("created_at", { ascending: true })
      .limit(1);
    if (error) {
      throw new Error(`Failed to poll pending render tasks: ${error.message}`);
    }
    return parseRows(data)[0] ?? null;
  }
}

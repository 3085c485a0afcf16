import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { parseRenderRequest, type RenderRequest } from "@voxreel/shared/render/segments";

import type { RenderSourceRepository } from "../pipelines/types";

const ProjectRow = z.object({
  id: z.string(),
  audio_file_path: z.string().nullable(),
});

const SentenceRow = z.object({
  id: z.string(),
  text: z.string().nullable(),
  start_time: z.number(),
  end_time: z.number(),
  selected_footage: z.object({ url: z.string().nullish() }).passthrough().nullable(),
});

const MusicRow = z.object({
  url: z.string(),
});

export interface RenderSourceOptions {
  addSubtitles: boolean;
  includeAudio: boolean;
}

/**
 * Builds render requests from the `projects`, `sentences` and
 * `music_recommendations` tables. The result goes through the same validation
 * as any other request.
 */
export class SupabaseRenderSourceRepository implements RenderSourceRepository {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly options: RenderSourceOptions = { addSubtitles: true, includeAudio: true },
  ) {}

  async loadRenderInput(projectId: string): Promise<RenderRequest> {
    const project = await this.supabase.from("projects").select("id,audio_file_path").eq("id", projectId).limit(1);
    if (project.error) {
      throw new Error(`Failed to load project ${projectId}: ${project.error.message}`);
    }
    const projectRow = z.array(ProjectRow).parse(project.data ?? [])[0];
    if (!projectRow) {
      throw new Error(`project not found: ${projectId}`);
    }

    const sentences = await this.supabase
      .from("sentences")
      .select("id,text,start_time,end_time,selected_footage")
      .eq("project_id", projectId)
      .order("start_time", { ascending: true });
    if (sentences.error) {
      throw new Error(`Failed to load sentences for ${projectId}: ${sentences.error.message}`);
    }

    const music = await this.supabase.from("music_recommendations").select("url").eq("project_id", projectId).limit(1);
    if (music.error) {
      throw new Error(`Failed to load music for ${projectId}: ${music.error.message}`);
    }

    const sentenceRows = z.array(SentenceRow).parse(sentences.data ?? []);
    const musicRow = z.array(MusicRow).parse(music.data ?? [])[0];

    return parseRenderRequest({
      projectId,
      voiceOverPath: projectRow.audio_file_path ?? "",
      musicRef: musicRow?.url,
      addSubtitles: this.options.addSubtitles,
      includeAudio: this.options.includeAudio,
      segments: sentenceRows.map((row, index) => ({
        index,
        text: row.text ?? "",
        start_time: row.start_time,
        end_time: row.end_time,
        footage_url: row.selected_footage?.url ?? undefined,
      })),
    });
  }

  async recordOutput(projectId: string, outputLocation: string): Promise<void> {
    const { error } = await this.supabase
      .from("projects")
      .update({ video_url: outputLocation, updated_at: new Date().toISOString() })
      .eq("id", projectId);
    if (error) {
      throw new Error(`Failed to record output for ${projectId}: ${error.message}`);
    }
  }
}

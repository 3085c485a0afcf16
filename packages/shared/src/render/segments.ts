import { InvalidRenderRequestError } from "@voxreel/shared/errors/render";
import { RENDER_REQUEST } from "@voxreel/shared/schemas/render";

/**
 * A timed unit of narration paired with a footage reference. Immutable once
 * it reaches the pipeline.
 */
export interface Segment {
  readonly index: number;
  readonly text: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly footageUrl?: string;
}

export interface RenderRequest {
  readonly projectId: string;
  readonly segments: readonly Segment[];
  readonly voiceOverPath: string;
  readonly musicRef?: string;
  readonly addSubtitles: boolean;
  readonly includeAudio: boolean;
}

export function segmentDuration(segment: Pick<Segment, "startTime" | "endTime">): number {
  return Math.max(0, segment.endTime - segment.startTime);
}

/** Stable sort by start time; ties keep their index order. */
export function sortSegments(segments: readonly Segment[]): Segment[] {
  return [...segments].sort((a, b) => a.startTime - b.startTime || a.index - b.index);
}

/**
 * Validates an untrusted render request. Segments without an explicit index are
 * numbered by their position in the payload.
 */
export function parseRenderRequest(input: unknown): RenderRequest {
  const result = RENDER_REQUEST.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
    throw new InvalidRenderRequestError(`Invalid render request: ${issues.join("; ")}`, issues);
  }

  const { data } = result;
  const segments = data.segments.map<Segment>((segment, position) => ({
    index: segment.index ?? position,
    text: segment.text,
    startTime: segment.start_time,
    endTime: segment.end_time,
    footageUrl: segment.footage_url,
  }));

  const seen = new Set<number>();
  for (const segment of segments) {
    if (seen.has(segment.index)) {
      throw new InvalidRenderRequestError(`Invalid render request: duplicate segment index ${segment.index}`, [
        `segments: duplicate index ${segment.index}`,
      ]);
    }
    seen.add(segment.index);
  }

  return {
    projectId: data.projectId,
    segments,
    voiceOverPath: data.voiceOverPath,
    musicRef: data.musicRef,
    addSubtitles: data.addSubtitles,
    includeAudio: data.includeAudio,
  };
}

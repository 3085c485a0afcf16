import { describe, expect, it } from "vitest";

import { InvalidRenderRequestError } from "@voxreel/shared/errors/render";
import { parseRenderRequest, segmentDuration, sortSegments } from "@voxreel/shared/render/segments";

const VALID = {
  projectId: "project-1",
  segments: [
    { text: "First", start_time: 0, end_time: 2.5, footage_url: "https://cdn.test/a.mp4" },
    { text: "Second", start_time: 2.5, end_time: 4, footage_url: "  " },
  ],
  voiceOverPath: "voice/project-1.mp3",
};

function issuesOf(input: unknown): string[] {
  try {
    parseRenderRequest(input);
  } catch (error) {
    if (error instanceof InvalidRenderRequestError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseRenderRequest", () => {
  it("applies defaults and numbers segments by position", () => {
    expect(parseRenderRequest(VALID)).toEqual({
      projectId: "project-1",
      segments: [
        { index: 0, text: "First", startTime: 0, endTime: 2.5, footageUrl: "https://cdn.test/a.mp4" },
        { index: 1, text: "Second", startTime: 2.5, endTime: 4, footageUrl: undefined },
      ],
      voiceOverPath: "voice/project-1.mp3",
      musicRef: undefined,
      addSubtitles: true,
      includeAudio: true,
    });
  });

  it("rejects a segment that ends before it starts", () => {
    const input = { ...VALID, segments: [{ text: "Bad", start_time: 3, end_time: 1 }] };

    expect(issuesOf(input)).toEqual(["segments.0.end_time: end_time must be greater than start_time"]);
  });

  it("rejects an empty segment list and a missing voice-over", () => {
    expect(issuesOf({ projectId: "project-1", segments: [], voiceOverPath: " " })).toEqual([
      "segments: at least one segment is required",
      "voiceOverPath: voiceOverPath is required",
    ]);
  });

  it("rejects duplicate indexes", () => {
    const input = {
      ...VALID,
      segments: [
        { index: 1, start_time: 0, end_time: 1 },
        { index: 1, start_time: 1, end_time: 2 },
      ],
    };

    expect(() => parseRenderRequest(input)).toThrow("Invalid render request: duplicate segment index 1");
  });

  it("rejects unknown fields", () => {
    expect(issuesOf({ ...VALID, priority: "high" })).toHaveLength(1);
  });
});

describe("segment helpers", () => {
  it("sorts by start time and breaks ties by index", () => {
    const sorted = sortSegments([
      { index: 2, text: "", startTime: 1, endTime: 2 },
      { index: 1, text: "", startTime: 1, endTime: 3 },
      { index: 0, text: "", startTime: 0, endTime: 1 },
    ]);
    expect(sorted.map((segment) => segment.index)).toEqual([0, 1, 2]);
  });

  it("never reports a negative duration", () => {
    expect(segmentDuration({ startTime: 2, endTime: 1 })).toBe(0);
    expect(segmentDuration({ startTime: 1, endTime: 3.5 })).toBe(2.5);
  });
});

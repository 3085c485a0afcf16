import { z } from "zod";

const optionalReference = z
  .string()
  .nullish()
  .transform((raw) => {
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
  });

export const SEGMENT = z
  .object({
    index: z.number().int().min(0).optional(),
    text: z.string().default(""),
    start_time: z.number().finite().min(0),
    end_time: z.number().finite(),
    footage_url: optionalReference,
  })
  .strict()
  .refine((segment) => segment.end_time > segment.start_time, {
    message: "end_time must be greater than start_time",
    path: ["end_time"],
  });

export const RENDER_REQUEST = z
  .object({
    projectId: z.string().min(1),
    segments: z.array(SEGMENT).min(1, "at least one segment is required"),
    voiceOverPath: z.string().trim().min(1, "voiceOverPath is required"),
    musicRef: optionalReference,
    addSubtitles: z.boolean().default(true),
    includeAudio: z.boolean().default(true),
  })
  .strict();

export type SegmentInput = z.input<typeof SEGMENT>;
export type RenderRequestInput = z.input<typeof RENDER_REQUEST>;

import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/**
 * Centralized, type-safe environment variable schema for the voxreel render worker.
 * This is the single source of truth for all environment variables.
 *
 * Code should import from this module instead of accessing process.env directly.
 */

const numeric = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return fallback;
      const parsed = Number(raw);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${raw}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalString = z
  .string()
  .optional()
  .transform((raw) => (raw && raw.trim() !== "" ? raw.trim() : undefined));

const EnvSchema = z.object({
  // ─── Core ────────────────────────────────────────────────
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  // ─── Supabase (required by the polling worker only) ──────
  SUPABASE_URL: z.string().url({ message: "SUPABASE_URL must be a valid URL" }).optional(),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  // ─── Observability ───────────────────────────────────────
  SENTRY_DSN: z.string().default(""),
  LOG_SAMPLE_RATE: z.string().default("1"),

  // ─── Worker loop ─────────────────────────────────────────
  WORKER_POLL_MS: numeric(2000),

  // ─── Rendering ───────────────────────────────────────────
  RENDER_TEMP_DIR: optionalString,
  RENDER_OUTPUT_DIR: z.string().default("./output"),
  RENDER_OUTPUT_BUCKET: optionalString,
  RENDER_WIDTH: numeric(1920),
  RENDER_HEIGHT: numeric(1080),
  RENDER_FPS: numeric(24),
  RENDER_TRAILING_PAD_SEC: numeric(2),
  RENDER_VOICE_OFFSET_SEC: numeric(0),
  MUSIC_DEFAULT_VOLUME: numeric(0.7),
  MUSIC_DUCKED_VOLUME: numeric(0.2),
  MUSIC_DUCK_FADE_SEC: numeric(0.3),
  MUSIC_FADE_OUT_SEC: numeric(2),
  SUBTITLE_FONT_FILE: optionalString,

  // ─── External tools ──────────────────────────────────────
  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFPROBE_PATH: z.string().default("ffprobe"),
  FFMPEG_TIMEOUT_MS: numeric(10 * 60 * 1000),
  DOWNLOAD_TIMEOUT_MS: numeric(120_000),
});

export type Env = z.infer<typeof EnvSchema>;

// Export the schema for testing purposes
export { EnvSchema };

let cached: Env | null = null;

/**
 * Load and validate environment variables from process.env.
 */
function loadEnvFromProcess(): Env {
  const result = EnvSchema.safeParse(process.env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n  ");
    throw new Error(
      `Environment variable validation failed:\n  ${issues}\n\n` +
        "Please check your .env file or environment configuration.",
    );
  }
  return result.data;
}

/**
 * Get the parsed environment variables.
 * Under NODE_ENV=test this always reads fresh from process.env so tests can
 * change variables between cases; elsewhere the first parse is cached.
 */
export function getEnv(): Env {
  if (process.env.NODE_ENV === "test") {
    return loadEnvFromProcess();
  }

  if (cached) return cached;

  cached = loadEnvFromProcess();
  return cached;
}

export function clearEnvCache(): void {
  cached = null;
}

/** Default scratch root when RENDER_TEMP_DIR is unset. */
export function defaultRenderTempDir(): string {
  return join(tmpdir(), "voxreel-render");
}

import type { CoveragePlan } from "@voxreel/shared/render/timeline";

export interface VideoFormat {
  width: number;
  height: number;
  fps: number;
}

export interface CaptionOptions {
  /** File holding the already-wrapped caption text. */
  textFile: string;
  fontFile?: string;
  fontSize?: number;
}

export interface ClipCommandInput {
  inputPath: string;
  outPath: string;
  plan: CoveragePlan;
  format: VideoFormat;
  caption?: CaptionOptions;
  crf?: number;
  preset?: string;
}

export interface VoiceTrackInput {
  path: string;
  /** Seconds; positive delays the narration, negative skips its start. */
  offsetSeconds: number;
}

export interface MusicTrackInput {
  path: string;
  plan: CoveragePlan;
  /** `volume` filter expression evaluated per frame. */
  volumeExpression: string;
  fadeOutSeconds: number;
}

export interface AudioMixInput {
  outPath: string;
  totalDuration: number;
  voice: VoiceTrackInput;
  music?: MusicTrackInput;
}

export interface EncodeCommandInput {
  videoPath: string;
  audioPath: string;
  outPath: string;
  totalDuration: number;
  trailingPadSeconds: number;
  fps: number;
  crf?: number;
  preset?: string;
}

export interface FfmpegCommand {
  args: string[];
  filtergraph?: string;
}

const DEFAULT_CRF = 20;
const DEFAULT_PRESET = "veryfast";
const DEFAULT_FONT_SIZE = 48;
const AUDIO_BITRATE = "192k";
const AUDIO_RATE = "44100";
export const CAPTION_LINE_WIDTH = 42;

/**
 * One normalized clip: the footage is blurred to fill the frame, the original
 * is fitted on top, and the result is looped or cut to the planned duration.
 * Clips carry no audio; narration and music are mixed separately.
 */
export function buildClipCommand(input: ClipCommandInput): FfmpegCommand {
  const { width, height, fps } = input.format;

  const filterParts: string[] = [];
  filterParts.push(
    `[0:v]scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},` +
      "boxblur=luma_radius=20:luma_power=1:chroma_radius=10[bg]",
  );
  filterParts.push(`[0:v]scale=${width}:${height}:force_original_aspect_ratio=decrease[fg]`);
  filterParts.push(`[bg][fg]overlay=(W-w)/2:(H-h)/2,setsar=1,fps=${fps}[base]`);

  let renderLabel = "[base]";
  if (input.caption) {
    filterParts.push(`${renderLabel}${buildDrawText(input.caption)}[captioned]`);
    renderLabel = "[captioned]";
  }

  const filtergraph = filterParts.join(";");
  const args: string[] = ["-hide_banner", "-y"];

  if (input.plan.plays > 1) {
    args.push("-stream_loop", String(input.plan.plays - 1));
  }

  args.push(
    "-i",
    input.inputPath,
    "-t",
    formatTime(input.plan.duration),
    "-filter_complex",
    filtergraph,
    "-map",
    renderLabel,
    "-an",
    "-c:v",
    "libx264",
    "-preset",
    input.preset ?? DEFAULT_PRESET,
    "-crf",
    String(input.crf ?? DEFAULT_CRF),
    "-pix_fmt",
    "yuv420p",
    input.outPath,
  );

  return { args, filtergraph };
}

function buildDrawText(caption: CaptionOptions): string {
  // Caption text is drawn literally; no % or backslash expansion.
  const options = [`textfile=${escapeFilterPath(caption.textFile)}`, "expansion=none"];
  if (caption.fontFile) {
    options.push(`fontfile=${escapeFilterPath(caption.fontFile)}`);
  }
  options.push(
    `fontsize=${caption.fontSize ?? DEFAULT_FONT_SIZE}`,
    "fontcolor=white",
    "borderw=2",
    "bordercolor=black",
    "line_spacing=8",
    "x=(w-text_w)/2",
    "y=h*0.75-text_h/2",
  );
  return `drawtext=${options.join(":")}`;
}

/**
 * Wraps caption text on word boundaries. Words longer than a line are kept
 * whole on their own line.
 */
export function wrapCaption(text: string, maxLineLength = CAPTION_LINE_WIDTH): string[] {
  const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxLineLength) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/** Concat demuxer list; clips share codec settings so they are joined without re-encoding. */
export function buildConcatList(clipPaths: readonly string[]): string {
  return clipPaths.map((path) => `file '${path.replace(/'/g, "'\\''")}'`).join("\n") + "\n";
}

export function buildConcatCommand(listPath: string, outPath: string): FfmpegCommand {
  return {
    args: ["-hide_banner", "-y", "-f", "concat", "-safe", "0", "-i", listPath, "-c", "copy", outPath],
  };
}

function buildVoiceChain(voice: VoiceTrackInput, totalDuration: number): string {
  const parts: string[] = [];
  if (voice.offsetSeconds < 0) {
    parts.push(`atrim=start=${formatTime(-voice.offsetSeconds)}`, "asetpts=PTS-STARTPTS");
  } else if (voice.offsetSeconds > 0) {
    parts.push(`adelay=delays=${Math.round(voice.offsetSeconds * 1000)}:all=1`);
  }
  parts.push("apad", `atrim=end=${formatTime(totalDuration)}`, "asetpts=PTS-STARTPTS", normalizedFormat());
  return `[0:a]${parts.join(",")}[voice]`;
}

function buildMusicChain(music: MusicTrackInput, totalDuration: number): string {
  const fade = Math.min(Math.max(0, music.fadeOutSeconds), totalDuration);
  const parts = [
    `atrim=end=${formatTime(totalDuration)}`,
    "asetpts=PTS-STARTPTS",
    `volume='${music.volumeExpression}':eval=frame`,
  ];
  if (fade > 0) {
    parts.push(`afade=t=out:st=${formatTime(totalDuration - fade)}:d=${formatTime(fade)}`);
  }
  parts.push(normalizedFormat());
  return `[1:a]${parts.join(",")}[music]`;
}

function normalizedFormat(): string {
  return `aformat=sample_rates=${AUDIO_RATE}:channel_layouts=stereo`;
}

/**
 * Narration padded or cut to the visual length, optionally mixed with looped,
 * ducked and faded background music.
 */
export function buildAudioMixCommand(input: AudioMixInput): FfmpegCommand {
  const { totalDuration, voice, music } = input;
  const args: string[] = ["-hide_banner", "-y", "-i", voice.path];

  const filterParts = [buildVoiceChain(voice, totalDuration)];
  let outLabel = "[voice]";

  if (music) {
    if (music.plan.plays > 1) {
      args.push("-stream_loop", String(music.plan.plays - 1));
    }
    args.push("-i", music.path);
    filterParts.push(buildMusicChain(music, totalDuration));
    filterParts.push("[voice][music]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[mix]");
    outLabel = "[mix]";
  }

  const filtergraph = filterParts.join(";");
  args.push(
    "-filter_complex",
    filtergraph,
    "-map",
    outLabel,
    "-c:a",
    "aac",
    "-b:a",
    AUDIO_BITRATE,
    "-t",
    formatTime(totalDuration),
    input.outPath,
  );

  return { args, filtergraph };
}

/** Silent track for renders without audio. */
export function buildSilentAudioCommand(outPath: string, totalDuration: number): FfmpegCommand {
  return {
    args: [
      "-hide_banner",
      "-y",
      "-f",
      "lavfi",
      "-i",
      `anullsrc=r=${AUDIO_RATE}:cl=stereo`,
      "-t",
      formatTime(totalDuration),
      "-c:a",
      "aac",
      "-b:a",
      AUDIO_BITRATE,
      outPath,
    ],
  };
}

/**
 * Final encode: the concatenated visuals, extended by repeating the last frame
 * for the trailing pad, muxed with the mixed audio.
 */
export function buildEncodeCommand(input: EncodeCommandInput): FfmpegCommand {
  const args: string[] = ["-hide_banner", "-y", "-i", input.videoPath, "-i", input.audioPath];

  if (input.trailingPadSeconds > 0) {
    args.push("-vf", `tpad=stop_mode=clone:stop_duration=${formatTime(input.trailingPadSeconds)}`);
  }

  args.push(
    "-map",
    "0:v:0",
    "-map",
    "1:a:0",
    "-c:v",
    "libx264",
    "-preset",
    input.preset ?? DEFAULT_PRESET,
    "-crf",
    String(input.crf ?? DEFAULT_CRF),
    "-r",
    String(input.fps),
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    "aac",
    "-b:a",
    AUDIO_BITRATE,
    "-movflags",
    "+faststart",
    "-t",
    formatTime(input.totalDuration),
    input.outPath,
  );

  return { args };
}

export function escapeFilterPath(path: string): string {
  const normalized = path.replace(/\\/g, "/");
  const escapedColon = normalized.replace(/:/g, "\\:");
  const escapedQuotes = escapedColon.replace(/'/g, "\\'");
  return `'${escapedQuotes}'`;
}

export function formatTime(value: number): string {
  return value.toFixed(3);
}

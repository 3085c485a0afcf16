/**
 * Background-music ducking envelope.
 *
 * Narration intervals are merged into a disjoint, sorted schedule. Music plays at
 * `defaultVolume` away from narration, at `duckedVolume` while narration is
 * active, and ramps linearly between the two over `fadeSeconds` just before an
 * interval starts and just after it ends.
 */

export interface TimeInterval {
  start: number;
  end: number;
}

export interface DuckingEnvelope {
  readonly intervals: readonly TimeInterval[];
  readonly defaultVolume: number;
  readonly duckedVolume: number;
  readonly fadeSeconds: number;
}

export interface DuckingLevels {
  defaultVolume: number;
  duckedVolume: number;
  fadeSeconds: number;
}

export const DEFAULT_DUCKING_LEVELS: DuckingLevels = {
  defaultVolume: 0.7,
  duckedVolume: 0.2,
  fadeSeconds: 0.3,
};

/**
 * Sorts by start and merges overlapping or touching intervals.
 * Invalid intervals (non-finite bounds, end before start) are dropped.
 */
export function mergeIntervals(intervals: readonly TimeInterval[]): TimeInterval[] {
  const valid = intervals
    .filter((i) => Number.isFinite(i.start) && Number.isFinite(i.end) && i.end >= i.start)
    .map((i) => ({ start: i.start, end: i.end }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: TimeInterval[] = [];
  for (const interval of valid) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push(interval);
    }
  }
  return merged;
}

/** Shifts every interval by `offset` seconds, clamping at zero. */
export function shiftIntervals(intervals: readonly TimeInterval[], offset: number): TimeInterval[] {
  if (offset === 0) return intervals.map((i) => ({ ...i }));
  return intervals
    .map((i) => ({ start: Math.max(0, i.start + offset), end: Math.max(0, i.end + offset) }))
    .filter((i) => i.end > i.start);
}

export function createDuckingEnvelope(
  voiceIntervals: readonly TimeInterval[],
  levels: DuckingLevels = DEFAULT_DUCKING_LEVELS,
): DuckingEnvelope {
  return {
    intervals: mergeIntervals(voiceIntervals),
    defaultVolume: levels.defaultVolume,
    duckedVolume: levels.duckedVolume,
    fadeSeconds: Math.max(0, levels.fadeSeconds),
  };
}

// 0 away from the interval, 1 inside it, linear across the fade margins.
function duckAmount(t: number, interval: TimeInterval, fade: number): number {
  if (fade <= 0) {
    return t >= interval.start && t <= interval.end ? 1 : 0;
  }
  const rampIn = (t - (interval.start - fade)) / fade;
  const rampOut = (interval.end + fade - t) / fade;
  return Math.min(clamp01(rampIn), clamp01(rampOut));
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Music gain at time `t` (seconds from the start of the visual track). */
export function volumeAt(envelope: DuckingEnvelope, t: number): number {
  let amount = 0;
  for (const interval of envelope.intervals) {
    if (interval.start - envelope.fadeSeconds > t) break;
    amount = Math.max(amount, duckAmount(t, interval, envelope.fadeSeconds));
    if (amount === 1) break;
  }
  return envelope.defaultVolume - (envelope.defaultVolume - envelope.duckedVolume) * amount;
}

export function formatExprNumber(value: number): string {
  const rounded = Number(value.toFixed(4));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/**
 * The same envelope as an ffmpeg expression over `t`, for the `volume` filter
 * with `eval=frame`.
 */
export function toVolumeExpression(envelope: DuckingEnvelope): string {
  const base = formatExprNumber(envelope.defaultVolume);
  if (envelope.intervals.length === 0) {
    return base;
  }

  const fade = envelope.fadeSeconds;
  const terms = envelope.intervals.map((interval) => {
    if (fade <= 0) {
      return `between(t,${formatExprNumber(interval.start)},${formatExprNumber(interval.end)})`;
    }
    const rampStart = formatExprNumber(interval.start - fade);
    const rampEnd = formatExprNumber(interval.end + fade);
    const width = formatExprNumber(fade);
    return `min(clip((t-(${rampStart}))/${width},0,1),clip((${rampEnd}-t)/${width},0,1))`;
  });

  const amount = terms.reduce((acc, term) => `max(${acc},${term})`);
  const depth = formatExprNumber(envelope.defaultVolume - envelope.duckedVolume);
  return `${base}-${depth}*${amount}`;
}

/**
 * Duration planning shared by clip assembly and music looping: a source is
 * repeated until it covers the target, then cut to exactly the target.
 */

const EPSILON = 1e-9;

export type CoverageMode = "exact" | "trim" | "loop";

export interface CoveragePlan {
  mode: CoverageMode;
  /** How many times the source plays back to back (1 = no looping). */
  plays: number;
  /** Length of the repeated source before the final cut. */
  coveredDuration: number;
  /** Length after the cut; always equals the requested target. */
  duration: number;
}

export function planCoverage(sourceDuration: number, targetDuration: number): CoveragePlan {
  if (!Number.isFinite(sourceDuration) || sourceDuration <= 0) {
    throw new RangeError(`source duration must be a positive number, got ${sourceDuration}`);
  }
  if (!Number.isFinite(targetDuration) || targetDuration < 0) {
    throw new RangeError(`target duration must be zero or positive, got ${targetDuration}`);
  }

  if (Math.abs(sourceDuration - targetDuration) <= EPSILON) {
    return { mode: "exact", plays: 1, coveredDuration: sourceDuration, duration: targetDuration };
  }

  if (sourceDuration > targetDuration) {
    return { mode: "trim", plays: 1, coveredDuration: sourceDuration, duration: targetDuration };
  }

  const plays = Math.max(1, Math.ceil(targetDuration / sourceDuration - EPSILON));
  return { mode: "loop", plays, coveredDuration: plays * sourceDuration, duration: targetDuration };
}

/** Visual track length: included clips plus the trailing pad reserved for the fade-out. */
export function timelineDuration(clipDurations: readonly number[], trailingPadSeconds: number): number {
  const clips = clipDurations.reduce((sum, duration) => sum + duration, 0);
  return clips + Math.max(0, trailingPadSeconds);
}

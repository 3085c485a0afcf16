import { getEnv } from "@voxreel/shared/env";

const SECRET_KEY_PATTERNS = [/key$/i, /token/i, /secret/i, /password/i, /authorization/i];
const SECRET_VALUE_PATTERNS = [/^bearer\s+\S+/i, /[?&](token|key|signature|x-amz-signature)=/i];

export type LogLevel = "info" | "warn" | "error";

type Primitive = string | number | boolean | null | undefined;
type Redactable = Primitive | Redactable[] | { [key: string]: Redactable };

type NormalisedEntry = {
  ts: string;
  service: string;
  event: string;
  jobId?: string;
  message?: string;
  error?: string;
  meta: Record<string, unknown>;
  level: LogLevel;
  force: boolean;
};

export type LogObserverPayload = {
  level: LogLevel;
  entry: Omit<NormalisedEntry, "level" | "force">;
};

type LogObserver = (payload: LogObserverPayload) => void;

const observers = new Set<LogObserver>();

function sampleRate(): number {
  const rate = Number(getEnv().LOG_SAMPLE_RATE ?? 1);
  if (!Number.isFinite(rate) || rate <= 0) return 0;
  return Math.min(rate, 1);
}

function isRedactableRecord(value: unknown): value is Record<string, Redactable> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redact(value: Redactable): Redactable {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }

  if (typeof value === "string") {
    return SECRET_VALUE_PATTERNS.some((pattern) => pattern.test(value)) ? "[REDACTED]" : value;
  }

  if (isRedactableRecord(value)) {
    const out: Record<string, Redactable> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = SECRET_KEY_PATTERNS.some((pattern) => pattern.test(key)) ? "[REDACTED]" : redact(child);
    }
    return out;
  }

  return value;
}

function toRedactable(value: unknown): Redactable {
  if (value === null || value === undefined) return value;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Error) return value.message;
  if (Array.isArray(value)) return value.map((item) => toRedactable(item));
  if (typeof value === "object") {
    const out: Record<string, Redactable> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = toRedactable(child);
    }
    return out;
  }
  return String(value);
}

export interface LogEntry {
  service?: "worker" | "shared" | string;
  event: string;
  ts?: string;
  jobId?: string;
  message?: string;
  error?: string;
  meta?: Record<string, unknown>;
  level?: LogLevel;
  force?: boolean;
}

function normaliseEntry(entry: LogEntry): NormalisedEntry {
  const lowered = entry.event.toLowerCase();
  const level = entry.level ?? (lowered.includes("error") || lowered.includes("fail") ? "error" : "info");

  return {
    ts: entry.ts ?? new Date().toISOString(),
    service: entry.service ?? "shared",
    event: entry.event,
    jobId: entry.jobId,
    message: entry.message,
    error: entry.error,
    meta: entry.meta ?? {},
    level,
    force: Boolean(entry.force),
  };
}

function shouldSample(level: LogLevel, force: boolean): boolean {
  if (force || level !== "info") return true;
  const rate = sampleRate();
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return Math.random() < rate;
}

export function log(entry: LogEntry): void {
  const { level, force, ...rest } = normaliseEntry(entry);

  if (!shouldSample(level, force)) {
    return;
  }

  const meta = redact(toRedactable(rest.meta));
  const safe: Omit<NormalisedEntry, "level" | "force"> = {
    ...rest,
    meta: isRedactableRecord(meta) ? meta : {},
  };

  const line = JSON.stringify({
    ts: safe.ts,
    service: safe.service,
    event: safe.event,
    jobId: safe.jobId,
    message: safe.message,
    error: safe.error,
    meta: Object.keys(safe.meta).length > 0 ? safe.meta : undefined,
  });

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  for (const observer of observers) {
    try {
      observer({ level, entry: safe });
    } catch (observerError) {
      console.error(
        JSON.stringify({ ts: safe.ts, service: "shared", event: "log_observer_failed", error: String(observerError) }),
      );
    }
  }
}

function pickString(context: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = context[key];
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return undefined;
}

const HOISTED_KEYS = new Set(["service", "jobId", "job_id", "taskId", "message", "error"]);

function contextLog(level: LogLevel, event: string, context?: Record<string, unknown>, meta?: unknown): void {
  const ctx = context ?? {};
  const merged: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(ctx)) {
    if (!HOISTED_KEYS.has(key)) merged[key] = value;
  }

  if (meta && typeof meta === "object") {
    Object.assign(merged, meta);
  } else if (meta !== undefined) {
    merged.payload = meta;
  }

  log({
    service: pickString(ctx, "service") ?? "shared",
    event,
    jobId: pickString(ctx, "jobId", "job_id", "taskId"),
    message: pickString(ctx, "message"),
    error: pickString(ctx, "error"),
    meta: Object.keys(merged).length > 0 ? merged : undefined,
    level,
    force: level !== "info",
  });
}

export const logger = {
  info: (event: string, context?: Record<string, unknown>, meta?: unknown) => contextLog("info", event, context, meta),
  warn: (event: string, context?: Record<string, unknown>, meta?: unknown) => contextLog("warn", event, context, meta),
  error: (event: string, context?: Record<string, unknown>, meta?: unknown) => contextLog("error", event, context, meta),
};

export function onLog(observer: LogObserver): () => void {
  observers.add(observer);
  return () => {
    observers.delete(observer);
  };
}

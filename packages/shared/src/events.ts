import { z } from "zod";
import { MetricName, Tag } from "./validation.js";

// ---------------------------------------------------------------------------
// Telemetry kinds
// ---------------------------------------------------------------------------

/** Each writer is dedicated to one kind; the kind picks the intake route. */
export const TelemetryKind = z.enum(["logs", "metrics"]);
export type TelemetryKind = z.infer<typeof TelemetryKind>;

// ---------------------------------------------------------------------------
// Log event (logs intake v2)
// ---------------------------------------------------------------------------

export const LogStatus = z.enum(["debug", "info", "warn", "error"]);
export type LogStatus = z.infer<typeof LogStatus>;

export const LogEvent = z.object({
  message: z.string(),
  hostname: z.string(),
  service: z.string().min(1),
  ddsource: z.string(),
  status: LogStatus,
  /** Comma-joined `key:value` tags. */
  ddtags: z.string(),
  "dd.trace_id": z.string().optional(),
  "dd.span_id": z.string().optional(),
});
export type LogEvent = z.infer<typeof LogEvent>;

// ---------------------------------------------------------------------------
// Metric sample (series v1)
// ---------------------------------------------------------------------------

export const MetricType = z.enum(["count", "gauge", "rate", "dist"]);
export type MetricType = z.infer<typeof MetricType>;

/** `[unix_seconds, value]` */
export const MetricPoint = z.tuple([z.number().int().nonnegative(), z.number()]);
export type MetricPoint = z.infer<typeof MetricPoint>;

export const MetricSample = z.object({
  metric: MetricName,
  type: MetricType,
  points: z.array(MetricPoint).min(1),
  tags: z.array(Tag),
  interval: z.number().int().positive().optional(),
});
export type MetricSample = z.infer<typeof MetricSample>;

/** Any event a writer can carry. */
export type TelemetryEvent = LogEvent | MetricSample;

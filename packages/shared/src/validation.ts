import { z } from "zod";

// ---------------------------------------------------------------------------
// Destination
// ---------------------------------------------------------------------------

/** Intake site, e.g. `datadoghq.com` or `datadoghq.eu`. Hostname only, no scheme. */
export const Site = z
  .string()
  .min(3)
  .max(253)
  .regex(/^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)+$/, "Invalid site");

export const ApiKey = z.string().min(1, "API key must not be empty");

// ---------------------------------------------------------------------------
// Unified service tagging
// ---------------------------------------------------------------------------

export const ServiceName = z.string().trim().min(1).max(100);
export const EnvName = z.string().trim().min(1).max(100);
export const VersionString = z.string().trim().min(1).max(200);

// ---------------------------------------------------------------------------
// Metrics and tags
// ---------------------------------------------------------------------------

/** Metric names start with a letter and contain alphanumerics, `_` and `.`. */
export const MetricName = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[A-Za-z][A-Za-z0-9_.]*$/, "Invalid metric name");

/** A `key:value` (or bare `value`) annotation. */
export const Tag = z.string().min(1).max(200);

// ---------------------------------------------------------------------------
// Environment booleans
// ---------------------------------------------------------------------------

/** Parse `true/1/yes/on` (case-insensitive) as true; everything else as false. */
export const EnvBoolean = z
  .string()
  .transform((value) => ["true", "1", "yes", "on"].includes(value.trim().toLowerCase()));

import type { DiagnosticLogger } from "./logger.js";

/** Configuration after resolution; every field is set. */
export interface TelemetryConfig {
  apiKey: string;
  site: string;
  hostname: string;
  service: string;
  env: string;
  version: string;
  tracePatch: boolean;
  traceModules: string[];
  logsFlushIntervalMs: number;
  /** Null when metrics flush only on demand. */
  metricsFlushIntervalMs: number | null;
  requestTimeoutMs: number;
  maxBufferSize: number;
  shutdownTimeoutMs: number;
}

/**
 * Options accepted by `resolveConfig()`. Each one is optional: an unset
 * option falls back to its environment variable, then to `.teleflushrc.json`,
 * then to its default.
 */
export interface TelemetryOptions {
  apiKey?: string;
  site?: string;
  hostname?: string;
  service?: string;
  env?: string;
  version?: string;
  /** Use the short git revision of the working tree as the version. */
  versionUseGit?: boolean;
  tracePatch?: boolean;
  traceModules?: string[];
  logsFlushIntervalMs?: number;
  metricsFlushIntervalMs?: number;
  requestTimeoutMs?: number;
  maxBufferSize?: number;
  shutdownTimeoutMs?: number;
}

/** The span active on the current execution path, as reported by the tracer. */
export interface ActiveSpan {
  name: string;
  traceId: string;
  spanId: string;
}

/** Read-only view of the external tracer's current span. */
export interface CorrelationProvider {
  currentSpan(): ActiveSpan | undefined;
}

/** Opaque entry point into the external tracer's instrumentation. */
export interface InstrumentationHook {
  enable(names: readonly string[]): void;
}

export interface TelemetryClientOptions extends TelemetryOptions {
  fetch?: typeof globalThis.fetch;
  logger?: DiagnosticLogger;
  correlation?: CorrelationProvider;
  instrumentation?: InstrumentationHook;
}

export { TelemetryClient, type ClientFlushResult } from "./client/telemetry-client.js";
export {
  createLogSink,
  normalizeLevel,
  type LogRecord,
  type LogSink,
  type LogTarget,
} from "./client/log-sink.js";
export { EventBuffer, type Batch, type EventBufferOptions } from "./core/buffer.js";
export { Scheduler, type SchedulerOptions } from "./core/scheduler.js";
export {
  BufferedWriter,
  type BufferedWriterOptions,
  type FlushResult,
  type WriterState,
} from "./core/writer.js";
export { resolveConfig } from "./core/config.js";
export { KNOWN_INTEGRATIONS, type IntegrationName } from "./core/integrations.js";
export { consoleLogger, type DiagnosticLogger } from "./core/logger.js";
export { HttpTransport, type HttpTransportOptions } from "./transport/http.js";
export type { DeliveryResult, Transport } from "./transport/types.js";
export type {
  ActiveSpan,
  CorrelationProvider,
  InstrumentationHook,
  TelemetryClientOptions,
  TelemetryConfig,
  TelemetryOptions,
} from "./core/types.js";
export { ErrorCode, TeleflushError, isTeleflushError } from "@teleflush/shared/errors";
export type { LogEvent, MetricSample, TelemetryKind } from "@teleflush/shared/events";

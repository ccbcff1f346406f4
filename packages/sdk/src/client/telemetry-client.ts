import { ErrorCode, TeleflushError } from "@teleflush/shared/errors";
import {
  LogEvent,
  type LogStatus,
  MetricSample,
  type TelemetryKind,
} from "@teleflush/shared/events";
import { MetricName } from "@teleflush/shared/validation";
import type { ZodIssue } from "zod";
import { resolveConfig } from "../core/config.js";
import { buildLogEvent, buildMetricSample, unifiedServiceTags } from "../core/events.js";
import { assertKnownIntegrations } from "../core/integrations.js";
import { type DiagnosticLogger, consoleLogger } from "../core/logger.js";
import type {
  CorrelationProvider,
  InstrumentationHook,
  TelemetryClientOptions,
  TelemetryConfig,
} from "../core/types.js";
import { BufferedWriter, type FlushResult } from "../core/writer.js";
import { HttpTransport } from "../transport/http.js";
import { type LogSink, createLogSink } from "./log-sink.js";

export interface ClientFlushResult {
  metrics: FlushResult;
  logs: FlushResult;
}

/**
 * Entry point for application code: buffers logs and metrics and ships them
 * to the intake.
 *
 * Logs flush every `logsFlushIntervalMs` in the background; metrics flush on
 * `flush()`/`shutdown()` unless `metricsFlushIntervalMs` is set. Producer
 * calls never throw for delivery failures.
 */
export class TelemetryClient {
  readonly config: TelemetryConfig;

  private readonly logs: BufferedWriter<LogEvent>;
  private readonly metrics: BufferedWriter<MetricSample>;
  private readonly logger: DiagnosticLogger;
  private readonly correlation?: CorrelationProvider;
  private readonly instrumentation?: InstrumentationHook;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: TelemetryClientOptions = {}) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? consoleLogger;
    this.correlation = options.correlation;
    this.instrumentation = options.instrumentation;

    const transportFor = () =>
      new HttpTransport({
        site: this.config.site,
        apiKey: this.config.apiKey,
        timeoutMs: this.config.requestTimeoutMs,
        fetch: options.fetch,
        logger: this.logger,
      });

    this.logs = new BufferedWriter<LogEvent>({
      kind: "logs",
      transport: transportFor(),
      flushIntervalMs: this.config.logsFlushIntervalMs,
      maxBufferSize: this.config.maxBufferSize,
      logger: this.logger,
    });
    this.metrics = new BufferedWriter<MetricSample>({
      kind: "metrics",
      transport: transportFor(),
      flushIntervalMs: this.config.metricsFlushIntervalMs ?? undefined,
      maxBufferSize: this.config.maxBufferSize,
      logger: this.logger,
    });

    if (this.config.tracePatch) {
      this.instrument(this.config.traceModules);
    }

    this.logs.start();
    this.metrics.start();
  }

  // ---------------------------------------------------------------------------
  // Enqueue
  // ---------------------------------------------------------------------------

  /** Queue a log event. A malformed event is dropped and logged, never thrown. */
  enqueueLog(event: LogEvent): void {
    const parsed = LogEvent.safeParse(event);
    if (!parsed.success) {
      this.reportMalformed("logs", parsed.error.issues);
      return;
    }
    this.logs.enqueue(parsed.data);
  }

  /** Queue a metric sample. A malformed sample is dropped and logged, never thrown. */
  enqueueMetricSample(sample: MetricSample): void {
    const parsed = MetricSample.safeParse(sample);
    if (!parsed.success) {
      this.reportMalformed("metrics", parsed.error.issues);
      return;
    }
    this.metrics.enqueue(parsed.data);
  }

  // ---------------------------------------------------------------------------
  // Logs
  // ---------------------------------------------------------------------------

  log(level: LogStatus, message: string, tags: readonly string[] = []): void {
    this.enqueueLog(
      buildLogEvent(this.config, level, message, tags, this.correlation?.currentSpan()),
    );
  }

  debug(message: string, tags?: readonly string[]): void {
    this.log("debug", message, tags);
  }

  info(message: string, tags?: readonly string[]): void {
    this.log("info", message, tags);
  }

  warning(message: string, tags?: readonly string[]): void {
    this.log("warn", message, tags);
  }

  error(message: string, tags?: readonly string[]): void {
    this.log("error", message, tags);
  }

  /** A sink that host logging front-ends can forward records to. */
  logSink(): LogSink {
    return createLogSink(this);
  }

  // ---------------------------------------------------------------------------
  // Metrics
  // ---------------------------------------------------------------------------

  /**
   * Record a count. Without a name, the active span's name is used as
   * `<span>.count`.
   */
  count(name?: string, value = 1, tags: readonly string[] = []): void {
    let metric = name;
    if (!metric) {
      const span = this.correlation?.currentSpan();
      if (!span) {
        throw new TeleflushError(
          ErrorCode.USAGE.METRIC_NAME_REQUIRED,
          "count() needs a metric name when no span is active",
          400,
        );
      }
      metric = `${spanPrefix(span.name)}.count`;
    }
    this.enqueueMetricSample(
      buildMetricSample(this.metricName(metric), "count", value, this.metricTags(tags), 1),
    );
  }

  /** Record a gauge, prefixed with the active span's name when there is one. */
  gauge(name: string, value: number, tags: readonly string[] = []): void {
    const span = this.correlation?.currentSpan();
    const metric = span ? `${spanPrefix(span.name)}.${name}` : name;
    this.enqueueMetricSample(
      buildMetricSample(this.metricName(metric), "gauge", value, this.metricTags(tags)),
    );
  }

  /**
   * Time `fn` and record the elapsed nanoseconds as a `dist` sample. The
   * sample is recorded whether `fn` returns, throws, resolves or rejects; the
   * outcome is passed through unchanged.
   */
  measure<T>(name: string, fn: () => Promise<T>, tags?: readonly string[]): Promise<T>;
  measure<T>(name: string, fn: () => T, tags?: readonly string[]): T;
  measure<T>(
    name: string,
    fn: () => T | Promise<T>,
    tags: readonly string[] = [],
  ): T | Promise<T> {
    const metric = this.metricName(name);
    const metricTags = this.metricTags(tags);
    const start = process.hrtime.bigint();
    const record = () => {
      const elapsedNs = Number(process.hrtime.bigint() - start);
      this.enqueueMetricSample(buildMetricSample(metric, "dist", elapsedNs, metricTags));
    };

    let outcome: T | Promise<T>;
    try {
      outcome = fn();
    } catch (err) {
      record();
      throw err;
    }

    if (outcome instanceof Promise) {
      const pending: Promise<T> = outcome;
      return pending.finally(record);
    }
    record();
    return outcome;
  }

  // ---------------------------------------------------------------------------
  // Tracer boundary
  // ---------------------------------------------------------------------------

  /** Enable the tracer's instrumentation for the named integrations. */
  instrument(names: readonly string[]): void {
    const integrations = assertKnownIntegrations(names);
    this.instrumentation?.enable(integrations);
  }

  // ---------------------------------------------------------------------------
  // Flush & lifecycle
  // ---------------------------------------------------------------------------

  /** Ship everything buffered: metrics first, then logs. */
  async flush(): Promise<ClientFlushResult> {
    const metrics = await this.metrics.flush();
    const logs = await this.logs.flush();
    return { metrics, logs };
  }

  /**
   * Stop the background schedulers, flush once, then ship whatever was
   * enqueued while that flush was in flight. Bounded by `shutdownTimeoutMs`;
   * events still pending at the deadline are dropped, and nothing enqueued
   * afterwards is sent until an explicit `flush()`. Calling it again returns
   * the same promise.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  /** Events buffered and not yet drained, across both writers. */
  get pending(): number {
    return this.logs.pending + this.metrics.pending;
  }

  private async performShutdown(): Promise<void> {
    let drained = false;
    let timedOut = false;
    const drain = async () => {
      // Timers are cleared synchronously; awaiting joins any in-flight tick
      const stopped = Promise.all([this.metrics.stop(), this.logs.stop()]);
      const flushPending = async () => {
        if (!timedOut && this.metrics.pending > 0) await this.metrics.flush();
        if (!timedOut && this.logs.pending > 0) await this.logs.flush();
      };
      await flushPending();
      await stopped;
      while (!timedOut && this.pending > 0) {
        await flushPending();
      }
      drained = true;
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        if (!drained) {
          timedOut = true;
          const dropped = this.metrics.discard() + this.logs.discard();
          this.logger.warn(
            `[${ErrorCode.DELIVERY.SHUTDOWN_TIMEOUT}] Shutdown timed out, dropped ${dropped} pending events`,
          );
        }
        resolve();
      }, this.config.shutdownTimeoutMs);
    });

    try {
      await Promise.race([drain(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private metricName(name: string): string {
    const parsed = MetricName.safeParse(name);
    if (!parsed.success) {
      throw new TeleflushError(
        ErrorCode.USAGE.INVALID_METRIC_NAME,
        `Invalid metric name "${name}"`,
        400,
        { name },
      );
    }
    return parsed.data;
  }

  private metricTags(tags: readonly string[]): string[] {
    return [...tags, ...unifiedServiceTags(this.config)];
  }

  private reportMalformed(kind: TelemetryKind, issues: readonly ZodIssue[]): void {
    const detail = issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    this.logger.warn(
      `[${ErrorCode.DELIVERY.MALFORMED_EVENT}] Dropped malformed ${kind} event: ${detail}`,
    );
  }
}

/** Span names are free text; map characters a metric name can't hold to `_`. */
function spanPrefix(spanName: string): string {
  const cleaned = spanName.replace(/[^A-Za-z0-9_.]/g, "_");
  return /^[A-Za-z]/.test(cleaned) ? cleaned : `span_${cleaned}`;
}

import { ErrorCode } from "@teleflush/shared/error-codes";
import type { MetricSample, TelemetryEvent, TelemetryKind } from "@teleflush/shared/events";
import type { Batch } from "../core/buffer.js";
import { type DiagnosticLogger, consoleLogger } from "../core/logger.js";
import type { DeliveryResult, Transport } from "./types.js";

export interface HttpTransportOptions {
  site: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof globalThis.fetch;
  logger?: DiagnosticLogger;
}

const DEFAULT_TIMEOUT_MS = 2_000;

interface IntakeRoute {
  url: string;
  rejectedCode: typeof ErrorCode.DELIVERY.LOGS_REJECTED | typeof ErrorCode.DELIVERY.METRICS_REJECTED;
}

export function intakeRoute(site: string, kind: TelemetryKind): IntakeRoute {
  if (kind === "logs") {
    return {
      url: `https://http-intake.logs.${site}/api/v2/logs`,
      rejectedCode: ErrorCode.DELIVERY.LOGS_REJECTED,
    };
  }
  return {
    url: `https://api.${site}/api/v1/series`,
    rejectedCode: ErrorCode.DELIVERY.METRICS_REJECTED,
  };
}

/** Logs go out as a bare JSON array, metrics inside a `series` envelope. */
export function serializeBatch(batch: Batch<TelemetryEvent>, kind: TelemetryKind): string {
  return kind === "logs" ? JSON.stringify(batch) : JSON.stringify({ series: batch });
}

function isMetricSample(event: TelemetryEvent): event is MetricSample {
  return "metric" in event;
}

export class HttpTransport implements Transport {
  private readonly site: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: DiagnosticLogger;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(options: HttpTransportOptions) {
    this.site = options.site;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger;
    this._fetch = options.fetch ?? globalThis.fetch;
  }

  async send(batch: Batch<TelemetryEvent>, kind: TelemetryKind): Promise<DeliveryResult> {
    if (batch.length === 0) {
      return { ok: true, status: null, count: 0 };
    }

    const route = intakeRoute(this.site, kind);
    const body = serializeBatch(batch, kind);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this._fetch(route.url, {
        method: "POST",
        headers: {
          "DD-API-KEY": this.apiKey,
          "Content-Type": "application/json",
        },
        body,
        signal: controller.signal,
      });
      // Always read the body so the connection is released
      const text = await response.text();

      if (response.status >= 300) {
        this.logger.error(
          `[${route.rejectedCode}] ${kind} intake responded ${response.status}, dropped ${batch.length} events: ${text}`,
        );
        return { ok: false, status: response.status, count: batch.length };
      }

      if (kind === "metrics") {
        this.logger.debug(
          `flushed ${batch.length} metrics: ${batch
            .filter(isMetricSample)
            .map((m) => `${m.type}<${m.metric}>`)
            .join(", ")}`,
        );
      }
      return { ok: true, status: response.status, count: batch.length };
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.warn(
          `[${ErrorCode.DELIVERY.REQUEST_TIMEOUT}] ${kind} request timed out after ${this.timeoutMs}ms, dropped ${batch.length} events`,
        );
      } else {
        this.logger.warn(
          `[${ErrorCode.DELIVERY.NETWORK_ERROR}] ${kind} request failed, dropped ${batch.length} events`,
          error,
        );
      }
      return { ok: false, status: null, count: batch.length };
    } finally {
      clearTimeout(timer);
    }
  }
}

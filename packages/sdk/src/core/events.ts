import type { LogEvent, LogStatus, MetricSample, MetricType } from "@teleflush/shared/events";
import type { ActiveSpan, TelemetryConfig } from "./types.js";

export const LOG_SOURCE = "nodejs";

type ServiceIdentity = Pick<TelemetryConfig, "hostname" | "service" | "env" | "version">;

/** `service:`, `env:` and `version:` tags for unified service tagging. */
export function unifiedServiceTags(identity: ServiceIdentity): string[] {
  return [
    `service:${identity.service}`,
    `env:${identity.env}`,
    `version:${identity.version}`,
  ];
}

export function buildLogEvent(
  identity: ServiceIdentity,
  status: LogStatus,
  message: string,
  tags: readonly string[],
  span?: ActiveSpan,
): LogEvent {
  const event: LogEvent = {
    message,
    hostname: identity.hostname,
    service: identity.service,
    ddsource: LOG_SOURCE,
    status,
    ddtags: [...tags, `env:${identity.env}`, `version:${identity.version}`].join(","),
  };
  if (span) {
    event["dd.trace_id"] = span.traceId;
    event["dd.span_id"] = span.spanId;
  }
  return event;
}

export function buildMetricSample(
  name: string,
  type: MetricType,
  value: number,
  tags: readonly string[],
  interval?: number,
): MetricSample {
  return {
    metric: name,
    type,
    points: [[Math.floor(Date.now() / 1000), value]],
    tags: [...tags],
    ...(interval !== undefined ? { interval } : {}),
  };
}

import type { LogEvent, MetricSample } from "@teleflush/shared/events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TelemetryClient } from "../client/telemetry-client.js";
import type { ActiveSpan, TelemetryClientOptions } from "../core/types.js";

const LOGS_URL = "https://http-intake.logs.datadoghq.com/api/v2/logs";
const SERIES_URL = "https://api.datadoghq.com/api/v1/series";
const SERVICE_TAGS = ["service:checkout", "env:test", "version:1.0.0"];

function createMockFetch(status = 202) {
  return vi.fn().mockResolvedValue({ status, text: () => Promise.resolve("{}") });
}

function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createClient(overrides: TelemetryClientOptions = {}) {
  const fetch = createMockFetch();
  const logger = silentLogger();
  const client = new TelemetryClient({
    apiKey: "test-key",
    site: "datadoghq.com",
    hostname: "web-1",
    service: "checkout",
    env: "test",
    version: "1.0.0",
    fetch,
    logger,
    ...overrides,
  });
  return { client, fetch, logger };
}

function requestAt(fetch: ReturnType<typeof createMockFetch>, index: number) {
  const [url, init] = fetch.mock.calls[index] as [string, RequestInit];
  return { url, body: JSON.parse(init.body as string) as unknown };
}

function logsAt(fetch: ReturnType<typeof createMockFetch>, index: number): LogEvent[] {
  return requestAt(fetch, index).body as LogEvent[];
}

function seriesAt(fetch: ReturnType<typeof createMockFetch>, index: number): MetricSample[] {
  return (requestAt(fetch, index).body as { series: MetricSample[] }).series;
}

function spanProvider(span: ActiveSpan | undefined) {
  return { currentSpan: vi.fn(() => span) };
}

describe("TelemetryClient", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("construction", () => {
    it("refuses to start without an API key", () => {
      expect(
        () =>
          new TelemetryClient({
            apiKey: "",
            service: "checkout",
            env: "test",
            version: "1.0.0",
          }),
      ).toThrow("An API key must be set");
    });

    it("exposes the resolved config", () => {
      const { client } = createClient();
      expect(client.config.service).toBe("checkout");
      expect(client.config.logsFlushIntervalMs).toBe(500);
    });
  });

  describe("logs", () => {
    it("builds a v2 log event with unified tags", async () => {
      const { client, fetch } = createClient();

      client.warning("disk almost full", ["team:core"]);
      await client.flush();

      expect(requestAt(fetch, 0).url).toBe(LOGS_URL);
      expect(logsAt(fetch, 0)).toEqual([
        {
          message: "disk almost full",
          hostname: "web-1",
          service: "checkout",
          ddsource: "nodejs",
          status: "warn",
          ddtags: "team:core,env:test,version:1.0.0",
        },
      ]);
    });

    it("maps each helper to its status", async () => {
      const { client, fetch } = createClient();

      client.debug("d");
      client.info("i");
      client.warning("w");
      client.error("e");
      await client.flush();

      expect(logsAt(fetch, 0).map((e) => e.status)).toEqual(["debug", "info", "warn", "error"]);
    });

    it("attaches trace and span ids from the active span", async () => {
      const correlation = spanProvider({ name: "web.request", traceId: "111", spanId: "222" });
      const { client, fetch } = createClient({ correlation });

      client.info("handled");
      await client.flush();

      const [event] = logsAt(fetch, 0);
      expect(event?.["dd.trace_id"]).toBe("111");
      expect(event?.["dd.span_id"]).toBe("222");
    });

    it("passes enqueued log events through unchanged", async () => {
      const { client, fetch } = createClient();
      const event: LogEvent = {
        message: "raw",
        hostname: "other-host",
        service: "other",
        ddsource: "custom",
        status: "error",
        ddtags: "a:b",
      };

      client.enqueueLog(event);
      await client.flush();

      expect(logsAt(fetch, 0)).toEqual([event]);
    });

    it("drops a malformed log event and reports it", async () => {
      const { client, fetch, logger } = createClient();

      client.enqueueLog({
        message: "orphan",
        hostname: "web-1",
        service: "",
        ddsource: "nodejs",
        status: "info",
        ddtags: "",
      });
      await client.flush();

      expect(fetch).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringMatching(/^\[TF-2007\] Dropped malformed logs event: service: /),
      );
    });

    it("flushes logs periodically", async () => {
      const { client, fetch } = createClient();

      client.info("tick");
      await vi.advanceTimersByTimeAsync(500);

      expect(fetch).toHaveBeenCalledOnce();
      expect(requestAt(fetch, 0).url).toBe(LOGS_URL);
      await client.shutdown();
    });

    it("routes records from the log sink", async () => {
      const { client, fetch } = createClient();

      client.logSink().write({ name: "app.db", level: "WARNING", message: "slow query" });
      await client.flush();

      expect(logsAt(fetch, 0)[0]).toMatchObject({ message: "app.db: slow query", status: "warn" });
    });
  });

  describe("metrics", () => {
    it("records a count with interval and service tags", async () => {
      const { client, fetch } = createClient();

      client.count("orders.created", 3, ["region:eu"]);
      await client.flush();

      expect(requestAt(fetch, 0).url).toBe(SERIES_URL);
      expect(seriesAt(fetch, 0)).toEqual([
        {
          metric: "orders.created",
          type: "count",
          interval: 1,
          points: [[1_704_067_200, 3]],
          tags: ["region:eu", ...SERVICE_TAGS],
        },
      ]);
    });

    it("names an unnamed count after the active span", async () => {
      const correlation = spanProvider({ name: "checkout.handler", traceId: "1", spanId: "2" });
      const { client, fetch } = createClient({ correlation });

      client.count();
      await client.flush();

      expect(seriesAt(fetch, 0)[0]).toMatchObject({ metric: "checkout.handler.count", points: [[1_704_067_200, 1]] });
    });

    it("rejects an unnamed count without a span", () => {
      const { client } = createClient();
      expect(() => client.count()).toThrow("count() needs a metric name when no span is active");
    });

    it("prefixes a gauge with the active span name", async () => {
      const correlation = spanProvider({ name: "worker", traceId: "1", spanId: "2" });
      const { client, fetch } = createClient({ correlation });

      client.gauge("queue.depth", 7);
      await client.flush();

      expect(seriesAt(fetch, 0)[0]).toEqual({
        metric: "worker.queue.depth",
        type: "gauge",
        points: [[1_704_067_200, 7]],
        tags: SERVICE_TAGS,
      });
    });

    it("does not mutate the caller's tags", () => {
      const { client } = createClient();
      const tags = ["region:eu"];
      client.gauge("queue.depth", 1, tags);
      expect(tags).toEqual(["region:eu"]);
    });

    it("passes enqueued samples through unchanged", async () => {
      const { client, fetch } = createClient();
      const sample: MetricSample = {
        metric: "custom.rate",
        type: "rate",
        points: [[1_700_000_000, 0.5]],
        tags: [],
        interval: 10,
      };

      client.enqueueMetricSample(sample);
      await client.flush();

      expect(seriesAt(fetch, 0)).toEqual([sample]);
    });

    it("drops a malformed sample and keeps the valid ones", async () => {
      const { client, fetch, logger } = createClient();

      client.enqueueMetricSample({ metric: "bad name", type: "count", points: [], tags: [] });
      client.gauge("queue.depth", 2);
      await client.flush();

      expect(seriesAt(fetch, 0).map((s) => s.metric)).toEqual(["queue.depth"]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringMatching(
          /^\[TF-2007\] Dropped malformed metrics event: metric: Invalid metric name; points: /,
        ),
      );
    });

    it("reports an invalid name with its own code", () => {
      const { client } = createClient();

      const thrown = (() => {
        try {
          client.count("my-metric");
        } catch (err) {
          return err;
        }
        return undefined;
      })();

      expect(thrown).toMatchObject({ code: "TF-1105", message: 'Invalid metric name "my-metric"' });
    });

    it("maps span names that are not valid metric names", async () => {
      const correlation = spanProvider({ name: "http-client", traceId: "1", spanId: "2" });
      const { client, fetch } = createClient({ correlation });

      client.gauge("queue.depth", 1);
      client.count();
      correlation.currentSpan.mockReturnValue({ name: "2fa check", traceId: "1", spanId: "3" });
      client.count();
      await client.flush();

      expect(seriesAt(fetch, 0).map((s) => s.metric)).toEqual([
        "http_client.queue.depth",
        "http_client.count",
        "span_2fa_check.count",
      ]);
    });

    it("only flushes metrics on demand by default", async () => {
      const { client, fetch } = createClient();

      client.gauge("queue.depth", 1);
      await vi.advanceTimersByTimeAsync(60_000);

      expect(fetch).not.toHaveBeenCalled();
      await client.shutdown();
    });

    it("flushes metrics periodically when an interval is configured", async () => {
      const { client, fetch } = createClient({ metricsFlushIntervalMs: 1_000 });

      client.gauge("queue.depth", 1);
      await vi.advanceTimersByTimeAsync(1_000);

      expect(fetch).toHaveBeenCalledOnce();
      expect(requestAt(fetch, 0).url).toBe(SERIES_URL);
      await client.shutdown();
    });
  });

  describe("measure", () => {
    it("returns the result and records one dist sample", async () => {
      const { client, fetch } = createClient();

      const result = client.measure("op.duration", () => 42, ["step:parse"]);
      await client.flush();

      expect(result).toBe(42);
      const series = seriesAt(fetch, 0);
      expect(series).toHaveLength(1);
      expect(series[0]).toMatchObject({
        metric: "op.duration",
        type: "dist",
        tags: ["step:parse", ...SERVICE_TAGS],
      });
      expect(series[0]?.points[0]?.[1]).toBeGreaterThanOrEqual(0);
    });

    it("records the elapsed time in nanoseconds", async () => {
      vi.useRealTimers();
      vi.useFakeTimers({
        toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date", "hrtime"],
      });
      const { client, fetch } = createClient();

      client.measure("op.duration", () => {
        vi.advanceTimersByTime(5);
      });
      await client.flush();

      expect(seriesAt(fetch, 0)[0]?.points[0]?.[1]).toBe(5_000_000);
    });

    it("records the sample when the block throws", async () => {
      const { client, fetch } = createClient();

      expect(() =>
        client.measure("op", () => {
          throw new Error("boom");
        }),
      ).toThrow("boom");
      await client.flush();

      const series = seriesAt(fetch, 0);
      expect(series).toHaveLength(1);
      expect(series[0]?.metric).toBe("op");
      expect(series[0]?.type).toBe("dist");
      expect(series[0]?.points[0]?.[1]).toBeGreaterThanOrEqual(0);
    });

    it("records the sample when an async block rejects", async () => {
      const { client, fetch } = createClient();

      await expect(
        client.measure("op", async () => {
          throw new Error("async boom");
        }),
      ).rejects.toThrow("async boom");
      await client.flush();

      expect(seriesAt(fetch, 0)).toHaveLength(1);
    });

    it("measures until an async block resolves", async () => {
      const { client, fetch } = createClient();

      const pending = client.measure("op", async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return "done";
      });
      expect(client.pending).toBe(0);
      await vi.advanceTimersByTimeAsync(50);

      await expect(pending).resolves.toBe("done");
      await client.flush();
      expect(seriesAt(fetch, 0)).toHaveLength(1);
    });

    it("rejects a missing name before running the block", () => {
      const { client } = createClient();
      const block = vi.fn();

      expect(() => client.measure("", block)).toThrow('Invalid metric name ""');
      expect(block).not.toHaveBeenCalled();
    });
  });

  describe("flush", () => {
    it("flushes metrics before logs", async () => {
      const { client, fetch } = createClient();

      client.info("log first");
      client.gauge("queue.depth", 1);
      const result = await client.flush();

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(requestAt(fetch, 0).url).toBe(SERIES_URL);
      expect(requestAt(fetch, 1).url).toBe(LOGS_URL);
      expect(result).toEqual({
        metrics: { sent: 1, failed: 0, attempts: 1 },
        logs: { sent: 1, failed: 0, attempts: 1 },
      });
    });

    it("splits events between a periodic flush and a concurrent manual flush", async () => {
      const { client, fetch } = createClient();
      let release = () => {};
      fetch.mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            release = () => resolve({ status: 202, text: () => Promise.resolve("{}") });
          }),
      );

      client.info("a");
      client.info("b");
      client.info("c");
      await vi.advanceTimersByTimeAsync(500);
      expect(fetch).toHaveBeenCalledOnce();

      client.info("d");
      client.info("e");
      const manual = await client.flush();
      release();
      await client.shutdown();

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(logsAt(fetch, 0).map((e) => e.message)).toEqual(["a", "b", "c"]);
      expect(logsAt(fetch, 1).map((e) => e.message)).toEqual(["d", "e"]);
      expect(manual.logs).toEqual({ sent: 2, failed: 0, attempts: 1 });
    });

    it("makes no request when nothing is buffered", async () => {
      const { client, fetch } = createClient();
      await client.flush();
      expect(fetch).not.toHaveBeenCalled();
    });

    it("resolves with failures instead of throwing", async () => {
      const { client, fetch, logger } = createClient();
      fetch.mockRejectedValue(new Error("ECONNRESET"));

      client.info("lost");
      const result = await client.flush();

      expect(result.logs).toEqual({ sent: 0, failed: 1, attempts: 1 });
      expect(logger.warn).toHaveBeenCalledWith(
        "[TF-2002] logs request failed, dropped 1 events",
        expect.any(Error),
      );
    });

    it("does not resend a failed batch on the next flush", async () => {
      const { client, fetch } = createClient();
      fetch
        .mockResolvedValueOnce({ status: 500, text: () => Promise.resolve("") })
        .mockResolvedValue({ status: 202, text: () => Promise.resolve("{}") });

      client.info("a");
      client.info("b");
      await client.flush();
      client.info("c");
      const result = await client.flush();

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(logsAt(fetch, 1).map((e) => e.message)).toEqual(["c"]);
      expect(result.logs).toEqual({ sent: 1, failed: 0, attempts: 1 });
    });
  });

  describe("instrumentation", () => {
    it("enables configured modules when tracePatch is on", () => {
      const instrumentation = { enable: vi.fn() };
      createClient({ tracePatch: true, traceModules: ["http", "pg"], instrumentation });
      expect(instrumentation.enable).toHaveBeenCalledWith(["http", "pg"]);
    });

    it("does not touch instrumentation when tracePatch is off", () => {
      const instrumentation = { enable: vi.fn() };
      createClient({ instrumentation });
      expect(instrumentation.enable).not.toHaveBeenCalled();
    });

    it("rejects an unknown integration", () => {
      const instrumentation = { enable: vi.fn() };
      const { client } = createClient({ instrumentation });

      expect(() => client.instrument(["http", "flask"])).toThrow("Unknown integration(s): flask");
      expect(instrumentation.enable).not.toHaveBeenCalled();
    });

    it("accepts known names without a hook", () => {
      const { client } = createClient();
      expect(() => client.instrument(["redis"])).not.toThrow();
    });
  });
});

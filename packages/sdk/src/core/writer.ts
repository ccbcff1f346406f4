import { ErrorCode, TeleflushError } from "@teleflush/shared/errors";
import type { TelemetryEvent, TelemetryKind } from "@teleflush/shared/events";
import type { Transport } from "../transport/types.js";
import { EventBuffer } from "./buffer.js";
import { type DiagnosticLogger, consoleLogger } from "./logger.js";
import { Scheduler } from "./scheduler.js";

/** The logs intake accepts at most 1000 entries per request. */
const DEFAULT_MAX_BATCH_SIZE = 1_000;
const DEFAULT_MAX_BUFFER_SIZE = 10_000;

export type WriterState = "created" | "started" | "stopped";

export interface FlushResult {
  /** Events in batches the intake accepted. */
  sent: number;
  /** Events in batches that were rejected or never got a response. */
  failed: number;
  /** Requests issued. */
  attempts: number;
}

export interface BufferedWriterOptions {
  kind: TelemetryKind;
  transport: Transport;
  /** Periodic flush interval. Writers without one flush only on demand. */
  flushIntervalMs?: number;
  maxBatchSize?: number;
  maxBufferSize?: number;
  logger?: DiagnosticLogger;
}

/**
 * One buffer, its optional scheduler and its transport, dedicated to one
 * telemetry kind.
 *
 * Lifecycle: `created → started → stopped`. Restarting a stopped writer is
 * not supported.
 */
export class BufferedWriter<E extends TelemetryEvent> {
  readonly kind: TelemetryKind;
  private readonly buffer: EventBuffer<E>;
  private readonly scheduler: Scheduler | null;
  private readonly transport: Transport;
  private readonly maxBatchSize: number;
  private currentState: WriterState = "created";

  constructor(options: BufferedWriterOptions) {
    const logger = options.logger ?? consoleLogger;
    this.kind = options.kind;
    this.transport = options.transport;
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.buffer = new EventBuffer<E>({
      maxSize: options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE,
      onOverflow: (dropped) => {
        logger.warn(
          `[${ErrorCode.DELIVERY.BUFFER_OVERFLOW}] Dropped ${dropped} oldest ${this.kind} events`,
        );
      },
    });
    this.scheduler =
      options.flushIntervalMs === undefined
        ? null
        : new Scheduler({
            intervalMs: options.flushIntervalMs,
            task: () => this.flush(),
            name: `${options.kind} writer`,
            logger,
          });
  }

  start(): void {
    if (this.currentState === "started") {
      throw new TeleflushError(
        ErrorCode.USAGE.WRITER_ALREADY_STARTED,
        `${this.kind} writer is already started`,
        400,
      );
    }
    if (this.currentState === "stopped") {
      throw new TeleflushError(
        ErrorCode.USAGE.WRITER_RESTART_UNSUPPORTED,
        `${this.kind} writer was stopped and cannot be restarted`,
        400,
      );
    }
    this.currentState = "started";
    this.scheduler?.start();
  }

  /** Stop periodic flushing. Pending events stay buffered for an explicit flush. */
  async stop(): Promise<void> {
    if (this.currentState === "stopped") return;
    this.currentState = "stopped";
    await this.scheduler?.stop();
  }

  enqueue(event: E): void {
    this.buffer.enqueue(event);
  }

  /**
   * Drain the buffer once and ship the batch, one request per
   * `maxBatchSize` chunk. Resolves after every request completed or failed.
   */
  async flush(): Promise<FlushResult> {
    const batch = this.buffer.drain();
    const result: FlushResult = { sent: 0, failed: 0, attempts: 0 };

    for (let offset = 0; offset < batch.length; offset += this.maxBatchSize) {
      const chunk = batch.slice(offset, offset + this.maxBatchSize);
      const delivery = await this.transport.send(chunk, this.kind);
      result.attempts++;
      if (delivery.ok) {
        result.sent += chunk.length;
      } else {
        result.failed += chunk.length;
      }
    }

    return result;
  }

  /** Drop every pending event without sending. Returns how many were dropped. */
  discard(): number {
    return this.buffer.drain().length;
  }

  get state(): WriterState {
    return this.currentState;
  }

  get pending(): number {
    return this.buffer.size;
  }

  get dropped(): number {
    return this.buffer.dropped;
  }
}

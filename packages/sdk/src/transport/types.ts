import type { TelemetryEvent, TelemetryKind } from "@teleflush/shared/events";
import type { Batch } from "../core/buffer.js";

/** Outcome of one delivery attempt. */
export interface DeliveryResult {
  ok: boolean;
  /** HTTP status, or null when no response was received (or nothing was sent). */
  status: number | null;
  /** Number of events in the attempted batch. */
  count: number;
}

export interface Transport {
  /**
   * Ship one batch in a single request. Never retries and never rejects:
   * failures are reported through the diagnostic logger and the result.
   */
  send(batch: Batch<TelemetryEvent>, kind: TelemetryKind): Promise<DeliveryResult>;
}

import { ErrorCode, TeleflushError } from "@teleflush/shared/errors";
import { type DiagnosticLogger, consoleLogger } from "./logger.js";

export interface SchedulerOptions {
  intervalMs: number;
  task: () => unknown;
  /** Label used in diagnostics. */
  name?: string;
  logger?: DiagnosticLogger;
}

/**
 * Fixed-interval background timer for one flush callback.
 *
 * At most one task run is in flight: a tick that fires while the previous run
 * is still pending is skipped. `stop()` clears the timer and joins the
 * in-flight run; it never runs the task itself.
 */
export class Scheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = false;
  private invocations = 0;

  private readonly intervalMs: number;
  private readonly task: () => unknown;
  private readonly name: string;
  private readonly logger: DiagnosticLogger;

  constructor(options: SchedulerOptions) {
    this.intervalMs = options.intervalMs;
    this.task = options.task;
    this.name = options.name ?? "scheduler";
    this.logger = options.logger ?? consoleLogger;
  }

  /** Start the periodic timer. */
  start(): void {
    if (this.stopped) {
      throw new TeleflushError(
        ErrorCode.USAGE.SCHEDULER_RESTART_UNSUPPORTED,
        `${this.name} was stopped and cannot be restarted`,
        400,
      );
    }
    if (this.timer) {
      throw new TeleflushError(
        ErrorCode.USAGE.SCHEDULER_ALREADY_STARTED,
        `${this.name} is already started`,
        400,
      );
    }

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    // Don't prevent process exit
    if (typeof this.timer === "object" && "unref" in this.timer) {
      this.timer.unref();
    }
  }

  /** Stop firing and wait for a run that is already in flight. */
  async stop(): Promise<void> {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.stopped = true;

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Number of times the task has been invoked. */
  get runs(): number {
    return this.invocations;
  }

  private tick(): void {
    if (this.inFlight) return;
    this.inFlight = this.run().finally(() => {
      this.inFlight = null;
    });
  }

  private async run(): Promise<void> {
    this.invocations++;
    try {
      await this.task();
    } catch (err) {
      this.logger.warn(
        `[${ErrorCode.DELIVERY.BACKGROUND_FLUSH_FAILED}] ${this.name} run failed`,
        err,
      );
    }
  }
}

import { z } from "zod";
import { InterruptedWaitError, ValidationError } from "./errors.js";
import { silentLogger, type SubmissionLogger } from "./logger.js";
import { TIME_UNITS, timeUnitToMillis } from "./time-unit.js";

export const ThrottleConfigSchema = z.object({
  period: z.enum(TIME_UNITS),
  limit: z.number().int().positive(),
});

export type ThrottleConfig = z.infer<typeof ThrottleConfigSchema>;

interface WindowState {
  startMs: number;
  count: number;
  inFlight: number;
}

export interface GateSnapshot {
  state: "open" | "saturated";
  count: number;
  inFlight: number;
  waiting: number;
  limit: number;
  periodMs: number;
  windowStartMs: number;
}

export interface GatePermit {
  readonly grantedAtMs: number;
  release(): void;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  /** Longest time to wait for capacity before failing with `InterruptedWaitError`. */
  timeoutMs?: number;
}

export interface ThrottledGateOptions {
  now?: () => number;
  logger?: SubmissionLogger;
}

type Admission = { admitted: true } | { admitted: false; retryInMs: number };

/**
 * Admits at most `limit` operations per window of `period`. Callers over budget wait
 * for the window to roll over or for an in-flight operation to complete; they are
 * never rejected.
 *
 * `count` holds operations completed in the current window and only grows when a
 * permit is released. Admission also charges operations still in flight, so a window
 * never admits more than `limit` callers even when none of them has finished yet.
 * A permit is charged to the window that granted it only: once that window has
 * ended, its release leaves the current window untouched.
 *
 * Every state transition runs synchronously and replaces the whole window state, so
 * the counter and the window start always change together. Waiting never happens
 * inside a transition.
 */
export class ThrottledGate {
  readonly limit: number;
  readonly periodMs: number;
  private window: WindowState;
  private readonly wakeups = new Set<() => void>();
  private readonly now: () => number;
  private readonly logger: SubmissionLogger;

  constructor(config: ThrottleConfig, options: ThrottledGateOptions = {}) {
    const parsed = ThrottleConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError("Invalid throttle config", { details: parsed.error.flatten() });
    }
    this.limit = parsed.data.limit;
    this.periodMs = timeUnitToMillis(parsed.data.period);
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? silentLogger;
    this.window = { startMs: this.now(), count: 0, inFlight: 0 };
  }

  async acquire(options: AcquireOptions = {}): Promise<GatePermit> {
    const { signal, timeoutMs } = options;
    const deadlineMs = timeoutMs === undefined ? undefined : this.now() + timeoutMs;

    for (;;) {
      if (signal?.aborted) {
        throw new InterruptedWaitError(signal.reason);
      }

      const nowMs = this.now();
      const admission = this.tryAdmit(nowMs);
      if (admission.admitted) {
        return this.createPermit(nowMs, this.window.startMs);
      }

      let waitMs = admission.retryInMs;
      if (deadlineMs !== undefined) {
        if (nowMs >= deadlineMs) {
          throw new InterruptedWaitError(new Error(`Throttle wait exceeded ${timeoutMs}ms`));
        }
        waitMs = Math.min(waitMs, deadlineMs - nowMs);
      }

      this.logger.debug(
        { retryInMs: admission.retryInMs, count: this.window.count, inFlight: this.window.inFlight },
        "throttle saturated, waiting",
      );
      await this.waitForChange(waitMs, signal);
    }
  }

  /** Runs `operation` under one admission, reporting completion whether it succeeds or throws. */
  async run<T>(operation: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const permit = await this.acquire(options);
    try {
      return await operation();
    } finally {
      permit.release();
    }
  }

  snapshot(): GateSnapshot {
    const { startMs, count, inFlight } = this.window;
    const windowOpen = (this.now() - startMs) < this.periodMs;
    return {
      state: windowOpen && (count + inFlight) >= this.limit ? "saturated" : "open",
      count,
      inFlight,
      waiting: this.wakeups.size,
      limit: this.limit,
      periodMs: this.periodMs,
      windowStartMs: startMs,
    };
  }

  private tryAdmit(nowMs: number): Admission {
    const current = this.rollWindow(nowMs);
    if ((current.count + current.inFlight) < this.limit) {
      this.window = { ...current, inFlight: current.inFlight + 1 };
      return { admitted: true };
    }
    this.window = current;
    return { admitted: false, retryInMs: this.periodMs - (nowMs - current.startMs) };
  }

  private complete(grantedInWindowMs: number): void {
    const current = this.rollWindow(this.now());
    if (current.startMs === grantedInWindowMs) {
      this.window = {
        startMs: current.startMs,
        count: current.count + 1,
        inFlight: Math.max(0, current.inFlight - 1),
      };
    } else {
      this.window = current;
    }
    for (const wake of Array.from(this.wakeups)) {
      wake();
    }
  }

  private rollWindow(nowMs: number): WindowState {
    const existing = this.window;
    if ((nowMs - existing.startMs) < this.periodMs) {
      return existing;
    }
    this.logger.debug({ previousCount: existing.count, windowStartMs: nowMs }, "throttle window reset");
    return { startMs: nowMs, count: 0, inFlight: 0 };
  }

  private createPermit(grantedAtMs: number, windowStartMs: number): GatePermit {
    let released = false;
    return {
      grantedAtMs,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.complete(windowStartMs);
      },
    };
  }

  // Resolves on window end or on any release, whichever comes first. The caller
  // re-reads the clock afterwards.
  private waitForChange(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.wakeups.delete(wake);
        signal?.removeEventListener("abort", onAbort);
      };
      const wake = (): void => {
        cleanup();
        resolve();
      };
      const onAbort = (): void => {
        cleanup();
        reject(new InterruptedWaitError(signal?.reason));
      };
      const timer = setTimeout(wake, Math.max(1, timeoutMs));

      this.wakeups.add(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InterruptedWaitError, ValidationError } from "../src/errors.js";
import { ThrottledGate, type GatePermit } from "../src/throttled-gate.js";

function track(pending: Promise<GatePermit>): { admitted: () => boolean; permit: Promise<GatePermit> } {
  let admitted = false;
  const permit = pending.then((value) => {
    admitted = true;
    return value;
  });
  return { admitted: () => admitted, permit };
}

describe("ThrottledGate", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects non-positive and fractional limits", () => {
    expect(() => new ThrottledGate({ period: "second", limit: 0 })).toThrow(ValidationError);
    expect(() => new ThrottledGate({ period: "second", limit: -3 })).toThrow(ValidationError);
    expect(() => new ThrottledGate({ period: "second", limit: 2.5 })).toThrow(ValidationError);
  });

  it("starts open with an empty window", () => {
    const gate = new ThrottledGate({ period: "minute", limit: 3 });

    expect(gate.snapshot()).toEqual({
      state: "open",
      count: 0,
      inFlight: 0,
      waiting: 0,
      limit: 3,
      periodMs: 60_000,
      windowStartMs: 0,
    });
  });

  it("admits a full budget of sequential calls without waiting and holds the next one", async () => {
    const gate = new ThrottledGate({ period: "minute", limit: 100 });

    for (let i = 0; i < 100; i += 1) {
      const permit = await gate.acquire();
      permit.release();
    }
    expect(gate.snapshot().count).toBe(100);
    expect(gate.snapshot().state).toBe("saturated");
    expect(vi.getTimerCount()).toBe(0);

    const next = track(gate.acquire());
    await vi.advanceTimersByTimeAsync(59_999);
    expect(next.admitted()).toBe(false);
    expect(gate.snapshot().waiting).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const permit = await next.permit;
    expect(permit.grantedAtMs).toBe(60_000);
    permit.release();
    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, windowStartMs: 60_000 });
  });

  it("resets the counter on the first call after the window elapses", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 2 });
    await gate.run(async () => undefined);
    await gate.run(async () => undefined);
    expect(gate.snapshot().state).toBe("saturated");

    vi.advanceTimersByTime(1_500);
    const permit = await gate.acquire();

    expect(permit.grantedAtMs).toBe(1_500);
    expect(gate.snapshot()).toMatchObject({ count: 0, inFlight: 1, windowStartMs: 1_500 });
  });

  it("admits a late caller with a fresh window once the first one ends", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 2 });

    (await gate.acquire()).release();
    vi.advanceTimersByTime(10);
    (await gate.acquire()).release();
    vi.advanceTimersByTime(10);

    const late = track(gate.acquire());
    await vi.advanceTimersByTimeAsync(970);
    expect(late.admitted()).toBe(false);

    await vi.advanceTimersByTimeAsync(10);
    const permit = await late.permit;
    expect(permit.grantedAtMs).toBe(1_000);
    permit.release();

    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, windowStartMs: 1_000 });
  });

  it("splits twice the limit of simultaneous callers across two windows", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 5 });
    const admittedAt: number[] = [];
    let maxCharged = 0;

    const callers = Array.from({ length: 10 }, () =>
      gate.run(async () => {
        const { count, inFlight } = gate.snapshot();
        maxCharged = Math.max(maxCharged, count + inFlight);
        admittedAt.push(Date.now());
      }),
    );

    await vi.advanceTimersByTimeAsync(999);
    expect(admittedAt).toEqual([0, 0, 0, 0, 0]);

    await vi.advanceTimersByTimeAsync(1);
    await Promise.all(callers);

    expect(admittedAt).toEqual([0, 0, 0, 0, 0, 1_000, 1_000, 1_000, 1_000, 1_000]);
    expect(maxCharged).toBeLessThanOrEqual(5);
    expect(gate.snapshot()).toMatchObject({ count: 5, inFlight: 0, waiting: 0 });
  });

  it("counts in-flight operations against the budget", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 1 });
    const first = await gate.acquire();

    const second = track(gate.acquire());
    await vi.advanceTimersByTimeAsync(500);
    expect(second.admitted()).toBe(false);

    first.release();
    await vi.advanceTimersByTimeAsync(499);
    expect(second.admitted()).toBe(false);
    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, waiting: 1 });

    await vi.advanceTimersByTimeAsync(1);
    const permit = await second.permit;
    expect(permit.grantedAtMs).toBe(1_000);
  });

  it("does not carry an operation that outlives its window into the next one", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 1 });
    const longRunning = await gate.acquire();

    vi.advanceTimersByTime(1_200);
    const next = await gate.acquire();
    expect(next.grantedAtMs).toBe(1_200);
    expect(gate.snapshot()).toMatchObject({ count: 0, inFlight: 1, windowStartMs: 1_200 });

    vi.advanceTimersByTime(300);
    longRunning.release();
    expect(gate.snapshot()).toMatchObject({ count: 0, inFlight: 1, windowStartMs: 1_200 });

    next.release();
    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, windowStartMs: 1_200 });
  });

  it("gives up waiting once the wait timeout passes", async () => {
    const gate = new ThrottledGate({ period: "minute", limit: 1 });
    (await gate.acquire()).release();

    const outcome = gate.acquire({ timeoutMs: 500 }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(499);
    expect(gate.snapshot().waiting).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const error = await outcome;
    expect(error).toBeInstanceOf(InterruptedWaitError);
    expect(error instanceof InterruptedWaitError && error.cause instanceof Error && error.cause.message)
      .toBe("Throttle wait exceeded 500ms");
    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, waiting: 0 });
    expect(vi.getTimerCount()).toBe(0);
  });

  it("admits within the wait timeout when the window rolls over first", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 1 });
    (await gate.acquire()).release();

    const pending = gate.acquire({ timeoutMs: 5_000 });
    await vi.advanceTimersByTimeAsync(1_000);

    const permit = await pending;
    expect(permit.grantedAtMs).toBe(1_000);
  });

  it("ignores repeated release of the same permit", async () => {
    const gate = new ThrottledGate({ period: "minute", limit: 3 });
    const permit = await gate.acquire();

    permit.release();
    permit.release();

    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0 });
  });

  it("records completion when the guarded operation throws", async () => {
    const gate = new ThrottledGate({ period: "minute", limit: 3 });

    await expect(gate.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0 });
  });

  it("abandons a wait on abort without consuming budget", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 1 });
    (await gate.acquire()).release();

    const controller = new AbortController();
    const waiting = gate.acquire({ signal: controller.signal });
    await vi.advanceTimersByTimeAsync(500);
    expect(gate.snapshot().waiting).toBe(1);

    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(InterruptedWaitError);

    expect(gate.snapshot()).toMatchObject({ count: 1, inFlight: 0, waiting: 0 });
    expect(vi.getTimerCount()).toBe(0);

    await vi.advanceTimersByTimeAsync(500);
    const permit = await gate.acquire();
    expect(permit.grantedAtMs).toBe(1_000);
    expect(gate.snapshot()).toMatchObject({ count: 0, inFlight: 1 });
  });

  it("fails immediately for an already aborted signal", async () => {
    const gate = new ThrottledGate({ period: "second", limit: 1 });

    await expect(gate.acquire({ signal: AbortSignal.abort() })).rejects.toBeInstanceOf(InterruptedWaitError);
    expect(gate.snapshot()).toMatchObject({ count: 0, inFlight: 0, waiting: 0 });
  });

  it("reads time from the injected clock", async () => {
    let nowMs = 5_000;
    const gate = new ThrottledGate({ period: "second", limit: 1 }, { now: () => nowMs });
    (await gate.acquire()).release();
    expect(gate.snapshot().state).toBe("saturated");

    nowMs = 6_000;
    expect(gate.snapshot().state).toBe("open");
    const permit = await gate.acquire();
    expect(permit.grantedAtMs).toBe(6_000);
  });
});

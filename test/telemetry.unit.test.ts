import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createConsoleTelemetrySink,
  createSessionTelemetry,
  formatTelemetryEvent,
  type SessionTelemetryEvent,
} from "../src/telemetry.js";

describe("createSessionTelemetry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stamps events with the time and conversation", () => {
    const events: SessionTelemetryEvent[] = [];
    const telemetry = createSessionTelemetry({ emit: (event) => void events.push(event) }, "c1");

    telemetry.emit({ type: "rating.received", genomeKey: "0001", score: 75 });

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "rating.received",
      conversationId: "c1",
      genomeKey: "0001",
      score: 75,
    });
    expect(Number.isNaN(Date.parse(events[0]?.timestamp ?? ""))).toBe(false);
  });

  it("is a no-op without a sink", async () => {
    const telemetry = createSessionTelemetry(undefined, "c1");
    telemetry.emit({ type: "evolution.failed", error: "boom" });
    await expect(telemetry.flush()).resolves.toBeUndefined();
  });

  it("contains sink failures", async () => {
    const telemetry = createSessionTelemetry(
      {
        emit: () => {
          throw new Error("sink down");
        },
        flush: () => {
          throw new Error("flush down");
        },
      },
      "c1",
    );

    expect(() => telemetry.emit({ type: "evolution.failed", error: "boom" })).not.toThrow();
    await expect(telemetry.flush()).resolves.toBeUndefined();
  });

  it("waits for asynchronous emits before flushing the sink", async () => {
    const order: string[] = [];
    const telemetry = createSessionTelemetry(
      {
        emit: async (event) => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          order.push(event.type);
        },
        flush: async () => {
          order.push("flush");
        },
      },
      "c1",
    );

    telemetry.emit({ type: "session.stopped", reason: "requested", generations: 2 });
    telemetry.emit({ type: "evolution.failed", error: "boom" });
    await telemetry.flush();

    expect(order).toEqual(["session.stopped", "evolution.failed", "flush"]);
  });

  it("swallows rejected asynchronous emits", async () => {
    const telemetry = createSessionTelemetry(
      {
        emit: async () => {
          throw new Error("sink down");
        },
      },
      "c1",
    );

    telemetry.emit({ type: "evolution.failed", error: "boom" });
    await expect(telemetry.flush()).resolves.toBeUndefined();
  });
});

describe("console telemetry", () => {
  const event: SessionTelemetryEvent = {
    type: "render.failed",
    timestamp: "2026-01-01T00:00:00.000Z",
    conversationId: "c1",
    prompt: "a, b",
    error: "offline",
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats one line per event", () => {
    expect(formatTelemetryEvent(event)).toBe(
      '2026-01-01T00:00:00.000Z [tag-breeder] render.failed conversation=c1 prompt="a, b" error="offline"',
    );
    expect(
      formatTelemetryEvent({
        type: "session.stopped",
        timestamp: "2026-01-01T00:00:00.000Z",
        conversationId: "c1",
        reason: "requested",
        generations: 4,
      }),
    ).toBe(
      '2026-01-01T00:00:00.000Z [tag-breeder] session.stopped conversation=c1 reason="requested" generations=4',
    );
  });

  it("writes warnings and other events to stderr", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = createConsoleTelemetrySink();

    void sink.emit(event);
    void sink.emit({
      type: "session.started",
      timestamp: "2026-01-01T00:00:00.000Z",
      conversationId: "c1",
      tagCount: 3,
      tagSource: "bundled",
      genomeLength: 3,
      populationSize: 10,
    });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(formatTelemetryEvent(event));
    expect(error).toHaveBeenCalledTimes(1);
  });
});

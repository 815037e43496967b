import { describe, it, expect, beforeEach } from "vitest";
import { initTelemetry, shutdownTelemetry, getTracer, getMeter } from "../../src/telemetry.js";

describe("telemetry", () => {
  beforeEach(() => {
    process.env.OTEL_SDK_DISABLED = "true";
  });

  it("initTelemetry is a no-op when the SDK is disabled, however often it is called", () => {
    expect(() => {
      initTelemetry();
      initTelemetry();
    }).not.toThrow();
  });

  it("getTracer hands out spans that can be ended", () => {
    initTelemetry();
    const span = getTracer().startSpan("research.task");
    expect(typeof span.end).toBe("function");
    span.end();
  });

  it("getMeter exposes counter and histogram factories", () => {
    const meter = getMeter();
    expect(typeof meter.createCounter).toBe("function");
    expect(typeof meter.createHistogram).toBe("function");
  });

  it("shutdownTelemetry resolves when nothing was started", async () => {
    await expect(shutdownTelemetry()).resolves.toBeUndefined();
  });
});

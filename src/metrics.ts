/**
 * Workflow metrics via OpenTelemetry.
 * Without initTelemetry() the global meter is a no-op, so recording is always safe.
 */
import type { Counter, Histogram } from "@opentelemetry/api";
import { getMeter } from "./telemetry.js";
import { logger } from "./logger.js";

interface Instruments {
  taskSubmitted: Counter;
  taskDuplicate: Counter;
  taskRetry: Counter;
  taskOutcome: Counter;
  taskLatency: Histogram;
  transition: Counter;
  gateDenied: Counter;
  streamDropped: Counter;
  resync: Counter;
}

let instruments: Instruments | null = null;
let warned = false;

function ensureInstruments(): Instruments {
  if (instruments) return instruments;
  const meter = getMeter();
  instruments = {
    taskSubmitted: meter.createCounter("research.task.submitted", {
      description: "Agent tasks accepted by the dispatcher, by task type and lane",
      unit: "1",
    }),
    taskDuplicate: meter.createCounter("research.task.duplicate", {
      description: "Submissions rejected or collapsed by single-flight / idempotency",
      unit: "1",
    }),
    taskRetry: meter.createCounter("research.task.retry", {
      description: "Transient failures retried",
      unit: "1",
    }),
    taskOutcome: meter.createCounter("research.task.outcome", {
      description: "Finished tasks by outcome",
      unit: "1",
    }),
    taskLatency: meter.createHistogram("research.task.latency_ms", {
      description: "Agent task run latency including retries",
      unit: "ms",
    }),
    transition: meter.createCounter("research.phase.transition", {
      description: "Committed phase transitions",
      unit: "1",
    }),
    gateDenied: meter.createCounter("research.phase.gate_denied", {
      description: "Transitions refused by the gate evaluator",
      unit: "1",
    }),
    streamDropped: meter.createCounter("research.delivery.stream_dropped", {
      description: "Stream messages dropped on subscriber buffer overflow",
      unit: "1",
    }),
    resync: meter.createCounter("research.delivery.resync", {
      description: "Resync signals queued for subscribers",
      unit: "1",
    }),
  };
  return instruments;
}

function record(fn: (i: Instruments) => void): void {
  try {
    fn(ensureInstruments());
  } catch (e) {
    if (!warned) {
      warned = true;
      logger.warn("metrics unavailable", { error: e instanceof Error ? e.message : String(e) });
    }
  }
}

export function recordTaskSubmitted(taskType: string, lane: string): void {
  record((i) => i.taskSubmitted.add(1, { task_type: taskType, lane }));
}

export function recordTaskDuplicate(taskType: string, reason: "in_flight" | "cached"): void {
  record((i) => i.taskDuplicate.add(1, { task_type: taskType, reason }));
}

export function recordTaskRetry(taskType: string): void {
  record((i) => i.taskRetry.add(1, { task_type: taskType }));
}

export function recordTaskOutcome(
  taskType: string,
  outcome: "applied" | "failed" | "stale" | "discarded" | "cancelled",
  latencyMs?: number,
): void {
  record((i) => {
    i.taskOutcome.add(1, { task_type: taskType, outcome });
    if (latencyMs !== undefined) i.taskLatency.record(latencyMs, { task_type: taskType });
  });
}

export function recordTransition(from: string, to: string): void {
  record((i) => i.transition.add(1, { from, to }));
}

export function recordGateDenied(from: string, to: string): void {
  record((i) => i.gateDenied.add(1, { from, to }));
}

export function recordStreamDropped(count = 1): void {
  record((i) => i.streamDropped.add(count));
}

export function recordResync(): void {
  record((i) => i.resync.add(1));
}

/** Reset instruments (for tests). */
export function _resetWorkflowMetrics(): void {
  instruments = null;
  warned = false;
}

/**
 * OpenTelemetry setup: traces + metrics for the research workflow service.
 * Call initTelemetry() at process entry so the SDK is registered before the HTTP server starts.
 */
import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { trace, metrics, type Meter, type Tracer } from "@opentelemetry/api";

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME ?? "research-workflow";
const SERVICE_VERSION = "0.1.0";

let sdk: NodeSDK | null = null;

export function initTelemetry(): void {
  if (process.env.OTEL_SDK_DISABLED === "true" || sdk) return;

  const endpoint = (process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318").replace(/\/$/, "");

  sdk = new NodeSDK({
    serviceName: SERVICE_NAME,
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` }),
      exportIntervalMillis: 15000,
    }),
    instrumentations: [new HttpInstrumentation()],
  });
  sdk.start();
}

export function shutdownTelemetry(): Promise<void> {
  if (sdk) {
    const p = sdk.shutdown();
    sdk = null;
    return p;
  }
  return Promise.resolve();
}

export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
}

export function getMeter(): Meter {
  return metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);
}

import {
  MeterProvider,
  PeriodicExportingMetricReader,
} from "@opentelemetry/sdk-metrics";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ActionStep, ObservabilityConfig } from "../types/index.js";

let meterProvider: MeterProvider | null = null;

/**
 * Initialize the OpenTelemetry meter provider for the engine's own activity.
 * Metric readings watched by packets are never recorded here.
 */
export function initMetrics(config: ObservabilityConfig): FrameWatchMetrics {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.resourceAttributes ?? {}),
  });

  const readers = [];

  if (config.metricsEndpoint) {
    const exporter = new OTLPMetricExporter({
      url: config.metricsEndpoint,
    });
    readers.push(
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: config.metricsInterval ?? 15000,
      }),
    );
  }

  const provider = new MeterProvider({ resource, readers });
  meterProvider = provider;

  return createMetrics(provider);
}

export async function shutdownMetrics(): Promise<void> {
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
}

/**
 * FrameWatch metrics — counters, histograms, gauges.
 */
export interface FrameWatchMetrics {
  /** Count and duration of sweeps run */
  sweep: (durationMs: number) => void;
  /** Packets whose actions ran */
  packetFired: (attrs: { executeOnce: boolean }) => void;
  /** Individual action steps that failed */
  actionFailure: (attrs: { step: ActionStep | "evaluate" }) => void;
  /** Registered packets gauge (pass +n / -n) */
  registeredPackets: (delta: number) => void;
}

function createMetrics(provider: MeterProvider): FrameWatchMetrics {
  const meter = provider.getMeter("framewatch");

  const sweepCounter = meter.createCounter("framewatch.sweeps.total", {
    description: "Total per-frame sweeps run",
  });

  const sweepHist = meter.createHistogram("framewatch.sweep.duration_ms", {
    description: "Sweep duration in milliseconds",
    unit: "ms",
  });

  const firedCounter = meter.createCounter("framewatch.packets.fired_total", {
    description: "Total packets whose actions ran",
  });

  const failureCounter = meter.createCounter(
    "framewatch.actions.failures_total",
    { description: "Total action steps or evaluations that failed" },
  );

  const registeredGauge = meter.createUpDownCounter(
    "framewatch.packets.registered",
    { description: "Currently registered packets" },
  );

  return {
    sweep: (durationMs) => {
      sweepCounter.add(1);
      sweepHist.record(durationMs);
    },
    packetFired: (attrs) => firedCounter.add(1, { executeOnce: attrs.executeOnce }),
    actionFailure: (attrs) => failureCounter.add(1, attrs),
    registeredPackets: (delta) => registeredGauge.add(delta),
  };
}

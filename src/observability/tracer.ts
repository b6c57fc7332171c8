import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
} from "@opentelemetry/api";
import {
  NodeTracerProvider,
  BatchSpanProcessor,
} from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let provider: NodeTracerProvider | null = null;

/**
 * Initialize the OpenTelemetry trace provider.
 * Call once at startup.
 */
export function initTracing(config: ObservabilityConfig): void {
  if (provider) return;

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.resourceAttributes ?? {}),
  });

  const spanProcessors = config.traceEndpoint
    ? [new BatchSpanProcessor(new OTLPTraceExporter({ url: config.traceEndpoint }))]
    : [];

  provider = new NodeTracerProvider({ resource, spanProcessors });
  provider.register();
}

/**
 * Shutdown the trace provider. Call on process exit.
 */
export async function shutdownTracing(): Promise<void> {
  if (provider) {
    await provider.shutdown();
    provider = null;
  }
}

/**
 * Get a Tracer scoped to a FrameWatch component.
 */
export function getTracer(component: string): Tracer {
  return trace.getTracer(`framewatch.${component}`);
}

/**
 * Span covering one packet's action pipeline. Without a registered provider
 * this is a no-op span.
 */
export function startFireSpan(packetId: number, packetUid: string): Span {
  return getTracer("engine").startSpan(
    "packet.fire",
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        "framewatch.packet.id": packetId,
        "framewatch.packet.uid": packetUid,
      },
    },
    context.active(),
  );
}

/**
 * End a span with success.
 */
export function endSpanOk(span: Span): void {
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

/**
 * End a span with error.
 */
export function endSpanError(span: Span, error: Error | string): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: typeof error === "string" ? error : error.message,
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.end();
}

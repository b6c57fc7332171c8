export {
  initTracing,
  shutdownTracing,
  getTracer,
  startFireSpan,
  endSpanOk,
  endSpanError,
} from "./tracer.js";

export {
  initMetrics,
  shutdownMetrics,
} from "./metrics.js";

export type { FrameWatchMetrics } from "./metrics.js";

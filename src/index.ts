// FrameWatch — per-frame performance watchdog
// ===========================================
//
// FrameWatch runs inside an interactive application's update loop. Once per
// frame it checks "watch packets" (named bundles of threshold conditions
// over live metrics) and fires their reactions: log lines, screenshots,
// debugger breaks, event hooks and callbacks.
//
// Architecture:
//
//   host frame loop ── tick(dt) ──▶ DebugEngine
//                                     │
//                     ┌───────────────┼────────────────┐
//                     ↓               ↓                ↓
//              PacketRegistry   MetricResolver   ActionPipeline
//              (timers, order)  (MetricSource)   (log / screenshot /
//                                                 break / hooks / callbacks)
//

export { FrameWatch } from "./framewatch.js";
export type { FrameWatchCollaborators } from "./framewatch.js";
export { defaultConfig, resolveConfig } from "../config/default.js";
export type { ConfigOverrides } from "../config/default.js";

// Types
export type {
  MetricVariable,
  Comparator,
  CombinationPolicy,
  MessageSeverity,
  Condition,
  Callback,
  EventHook,
  FireEvent,
  ActionSpec,
  ActionStep,
  ActionFailure,
  PacketDefinition,
  PacketState,
  PipelineResult,
  SweepReport,
  FrameWatchConfig,
  ObservabilityConfig,
  LogLevel,
} from "./types/index.js";

// Engine
export { DebugEngine } from "./engine/debug-engine.js";
export type { DebugEngineOptions } from "./engine/debug-engine.js";

// Packets
export { WatchPacket, defaultActions } from "./packets/packet.js";
export { PacketRegistry } from "./packets/registry.js";

// Conditions
export {
  condition,
  compare,
  approximately,
  evaluateCondition,
  isSatisfied,
} from "./conditions/condition.js";

// Metrics
export {
  MetricResolver,
  SnapshotMetricSource,
  DEFAULT_ACCESSORS,
  UNKNOWN_METRIC_VALUE,
} from "./metrics/source.js";
export type { MetricSource, MetricAccessor, MetricAccessorTable } from "./metrics/source.js";

// Actions
export { ActionPipeline } from "./actions/pipeline.js";
export {
  PinoLogChannel,
  DebuggerStatementBreakService,
} from "./actions/channels.js";
export type { LogChannel, ScreenshotService, BreakService } from "./actions/channels.js";
export { formatTimestamp, formatMessage, screenshotFileName } from "./actions/format.js";

// Errors
export { FrameWatchError, PacketNotFoundError, InvalidPacketError } from "./errors.js";

// Observability
export {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";
export type { FrameWatchMetrics } from "./observability/index.js";

// ============================================================================
// Watch Types — conditions, actions and packets evaluated every frame
// ============================================================================

/**
 * Identifies which reading a condition compares against.
 * Resolved through the MetricResolver accessor table.
 */
export type MetricVariable =
  /** Current frame rate */
  | "fps"
  /** Lowest frame rate seen by the monitor */
  | "fps_min"
  /** Highest frame rate seen by the monitor */
  | "fps_max"
  /** Average frame rate over the monitor's window */
  | "fps_avg"
  /** Allocated memory (MB) */
  | "ram_allocated"
  /** Reserved memory (MB) */
  | "ram_reserved"
  /** Managed heap memory (MB) */
  | "ram_managed"
  /** Peak audio level (dB) */
  | "audio_db";

export type Comparator = "lt" | "lte" | "eq" | "gte" | "gt";

export type CombinationPolicy =
  /** Every condition must evaluate true */
  | "all"
  /** At least one condition must evaluate true */
  | "any";

export type MessageSeverity = "log" | "warning" | "error";

export interface Condition {
  readonly variable: MetricVariable;
  readonly comparator: Comparator;
  readonly threshold: number;
}

// ============================================================================
// Actions
// ============================================================================

export type Callback = () => void;

/**
 * Payload handed to event hooks when a packet fires.
 */
export interface FireEvent {
  id: string;
  packetId: number;
  packetUid: string;
  timestamp: Date;
  /** Formatted log line, or empty when the packet has no message */
  message: string;
}

export type EventHook = (event: FireEvent) => void;

export interface ActionSpec {
  messageSeverity: MessageSeverity;
  /** Empty string means no message is logged */
  message: string;
  captureScreenshot: boolean;
  screenshotNameHint: string;
  /** Ask the host to suspend execution (debugger pause) */
  breakExecution: boolean;
  eventHooks: EventHook[];
  /** Absent entries are skipped at invocation time */
  callbacks: Array<Callback | null | undefined>;
}

// ============================================================================
// Packet definitions
// ============================================================================

/**
 * Plain description of a watch packet. Everything except the id is optional
 * and falls back to the packet defaults.
 */
export interface PacketDefinition {
  id: number;
  active?: boolean;
  executeOnce?: boolean;
  /** Seconds of active time before the first check */
  initDelay?: number;
  /** Seconds of active time before re-checking after a firing */
  recheckDelay?: number;
  conditions?: Condition[];
  policy?: CombinationPolicy;
  actions?: Partial<ActionSpec>;
}

export type PacketState = "cooling" | "eligible";

// ============================================================================
// Sweep results
// ============================================================================

export type ActionStep = "break" | "message" | "screenshot" | "hook" | "callback";

export interface ActionFailure {
  step: ActionStep;
  /** Position within the hook or callback list */
  index?: number;
  error: Error;
}

export interface PipelineResult {
  event: FireEvent;
  failures: ActionFailure[];
}

export interface SweepReport {
  /** Packets whose conditions were checked this frame */
  evaluated: number;
  /** Packets whose actions ran this frame */
  fired: number;
  /** One-shot packets dropped after firing */
  removed: number;
  /** Errors contained while processing packets or running actions */
  failures: number;
}

// ============================================================================
// Observability Configuration
// ============================================================================

export interface ObservabilityConfig {
  /** Whether to start the trace/meter providers at all */
  enabled: boolean;
  /** Service name for traces/metrics */
  serviceName: string;
  /** OTLP endpoint for traces */
  traceEndpoint?: string;
  /** OTLP endpoint for metrics */
  metricsEndpoint?: string;
  /** Metrics export interval (ms) */
  metricsInterval?: number;
  /** Additional resource attributes */
  resourceAttributes?: Record<string, string>;
}

// ============================================================================
// FrameWatch Top-Level Configuration
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface FrameWatchConfig {
  observability: ObservabilityConfig;
  actions: {
    /** Prefix rendered as "[prefix]" at the start of every message */
    messagePrefix: string;
    /** Directory screenshots are written into */
    screenshotDir: string;
  };
  /** Log level for FrameWatch internals */
  logLevel: LogLevel;
}

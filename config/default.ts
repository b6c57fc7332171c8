import type { FrameWatchConfig, LogLevel } from "../src/types/index.js";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "silent"];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

/**
 * Default FrameWatch configuration.
 * All values can be overridden via environment variables or programmatic config.
 */
export const defaultConfig: FrameWatchConfig = {
  observability: {
    enabled: (process.env.FRAMEWATCH_TELEMETRY ?? "false") === "true",
    serviceName: process.env.FRAMEWATCH_SERVICE_NAME ?? "framewatch",
    traceEndpoint: process.env.FRAMEWATCH_OTLP_TRACES_ENDPOINT,
    metricsEndpoint: process.env.FRAMEWATCH_OTLP_METRICS_ENDPOINT,
    metricsInterval: parseInt(process.env.FRAMEWATCH_METRICS_INTERVAL_MS ?? "15000", 10),
  },

  actions: {
    messagePrefix: process.env.FRAMEWATCH_MESSAGE_PREFIX ?? "FrameWatch",
    screenshotDir: process.env.FRAMEWATCH_SCREENSHOT_DIR ?? ".",
  },

  logLevel: parseLogLevel(process.env.FRAMEWATCH_LOG_LEVEL),
};

export interface ConfigOverrides {
  observability?: Partial<FrameWatchConfig["observability"]>;
  actions?: Partial<FrameWatchConfig["actions"]>;
  logLevel?: LogLevel;
}

/**
 * Merge overrides onto the defaults, section by section.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): FrameWatchConfig {
  return {
    observability: { ...defaultConfig.observability, ...overrides.observability },
    actions: { ...defaultConfig.actions, ...overrides.actions },
    logLevel: overrides.logLevel ?? defaultConfig.logLevel,
  };
}

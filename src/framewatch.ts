import type { FrameWatchConfig, SweepReport } from "./types/index.js";
import { DebugEngine, type DebugEngineOptions } from "./engine/debug-engine.js";
import {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";
import type { FrameWatchMetrics } from "./observability/index.js";
import pino from "pino";

/**
 * Host collaborators handed to the engine. Everything except the metric
 * source is optional.
 */
export type FrameWatchCollaborators = Omit<
  DebugEngineOptions,
  "messagePrefix" | "screenshotDir" | "telemetry" | "logger"
>;

/**
 * FrameWatch — the top-level facade.
 *
 * Usage:
 *   const watch = new FrameWatch(config, { metrics: monitors, screenshots });
 *   watch.start();
 *
 *   watch.engine.addSimplePacket(1, condition("fps", "lt", 30), "warning",
 *     "Frame rate dropped", false, () => dumpProfile());
 *
 *   // In the host's frame loop:
 *   watch.tick(deltaSeconds);
 *
 *   await watch.shutdown();
 *
 * There is no global instance; whoever composes the application owns the
 * FrameWatch and passes `watch.engine` to code that registers packets.
 */
export class FrameWatch {
  readonly engine: DebugEngine;
  private config: FrameWatchConfig;
  private logger: pino.Logger;
  private metrics: FrameWatchMetrics | null = null;
  private started = false;
  private telemetryStarted = false;

  constructor(config: FrameWatchConfig, collaborators: FrameWatchCollaborators) {
    this.config = config;
    this.logger = pino({ level: config.logLevel }).child({
      component: "framewatch",
    });

    this.engine = new DebugEngine({
      ...collaborators,
      messagePrefix: config.actions.messagePrefix,
      screenshotDir: config.actions.screenshotDir,
      logger: this.logger,
    });
  }

  /**
   * Start telemetry (when enabled) and mark the watcher as running. Ticks
   * before `start()` are ignored so hosts can register packets during
   * loading.
   */
  start(): void {
    if (this.started) return;

    if (this.config.observability.enabled && !this.telemetryStarted) {
      initTracing(this.config.observability);
      this.metrics = initMetrics(this.config.observability);
      this.engine.setTelemetry(this.metrics);
      this.telemetryStarted = true;
    }

    this.started = true;
    this.logger.info(
      { packets: this.engine.packetCount, telemetry: this.config.observability.enabled },
      "FrameWatch started",
    );
  }

  /**
   * Run one frame's sweep. Call once per host frame.
   */
  tick(deltaSeconds: number): SweepReport {
    if (!this.started) {
      return { evaluated: 0, fired: 0, removed: 0, failures: 0 };
    }
    return this.engine.tick(deltaSeconds);
  }

  get isRunning(): boolean {
    return this.started;
  }

  /**
   * Graceful shutdown: stops ticking and flushes telemetry providers.
   */
  async shutdown(): Promise<void> {
    if (!this.started) return;

    this.logger.info("Shutting down FrameWatch...");
    this.started = false;

    if (this.telemetryStarted) {
      this.engine.setTelemetry(null);
      this.metrics = null;
      this.telemetryStarted = false;

      const results = await Promise.allSettled([shutdownTracing(), shutdownMetrics()]);
      for (const result of results) {
        if (result.status === "rejected") {
          this.logger.error({ err: result.reason }, "Telemetry shutdown failed");
        }
      }
    }

    this.logger.info("FrameWatch shut down");
  }
}

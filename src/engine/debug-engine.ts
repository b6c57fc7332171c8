import type {
  Callback,
  Condition,
  MessageSeverity,
  PacketDefinition,
  SweepReport,
} from "../types/index.js";
import {
  MetricResolver,
  type MetricAccessorTable,
  type MetricSource,
} from "../metrics/source.js";
import { evaluateCondition, isSatisfied } from "../conditions/condition.js";
import { WatchPacket } from "../packets/packet.js";
import { PacketRegistry } from "../packets/registry.js";
import { ActionPipeline } from "../actions/pipeline.js";
import {
  PinoLogChannel,
  type BreakService,
  type LogChannel,
  type ScreenshotService,
} from "../actions/channels.js";
import type { FrameWatchMetrics } from "../observability/metrics.js";
import { endSpanError, endSpanOk, startFireSpan } from "../observability/tracer.js";
import { PacketNotFoundError, toError } from "../errors.js";
import pino from "pino";

export interface DebugEngineOptions {
  metrics: MetricSource;
  logChannel?: LogChannel;
  screenshots?: ScreenshotService;
  breaker?: BreakService;
  /** Replace or add metric accessors without touching evaluation */
  accessors?: Partial<MetricAccessorTable>;
  messagePrefix?: string;
  screenshotDir?: string;
  clock?: () => Date;
  telemetry?: FrameWatchMetrics | null;
  logger?: pino.Logger;
}

/**
 * Owns the watch packets and runs the per-frame sweep.
 *
 * The host calls `tick(delta)` exactly once per frame. The sweep is fully
 * synchronous: actions are fire-and-forget, and any asynchronous work a
 * collaborator starts is its own concern.
 *
 *   tick ─▶ for each packet (snapshot order)
 *             ├─ inactive?        skip
 *             ├─ advance timer
 *             ├─ eligible?        evaluate conditions
 *             └─ satisfied?       run actions, re-arm, mark one-shots
 *        ─▶ compact removed packets
 */
export class DebugEngine {
  private registry: PacketRegistry;
  private pipeline: ActionPipeline;
  private resolver: MetricResolver;
  private source: MetricSource;
  private telemetry: FrameWatchMetrics | null;
  private logger: pino.Logger;
  private sweeping = false;

  constructor(options: DebugEngineOptions) {
    const base = options.logger ?? pino({ level: "info" });
    this.logger = base.child({ component: "framewatch.engine" });
    this.source = options.metrics;
    this.telemetry = options.telemetry ?? null;

    this.registry = new PacketRegistry(base);
    this.resolver = new MetricResolver(options.accessors, (variable) =>
      this.logger.debug({ variable }, "Unknown metric variable, reading as 0"),
    );
    this.pipeline = new ActionPipeline({
      logChannel: options.logChannel ?? new PinoLogChannel(base),
      screenshots: options.screenshots,
      breaker: options.breaker,
      messagePrefix: options.messagePrefix ?? "FrameWatch",
      screenshotDir: options.screenshotDir ?? ".",
      clock: options.clock ?? (() => new Date()),
      metrics: this.telemetry,
      logger: base,
    });
  }

  // ---------------------------------------------------------------------------
  // Per-frame sweep
  // ---------------------------------------------------------------------------

  /**
   * Advance every active packet by `deltaSeconds` and run the actions of
   * those whose conditions hold. Never throws.
   */
  tick(deltaSeconds: number): SweepReport {
    const report: SweepReport = { evaluated: 0, fired: 0, removed: 0, failures: 0 };

    if (this.sweeping) {
      this.logger.warn("tick() called re-entrantly from a packet action; ignored");
      return report;
    }

    const startedAt = performance.now();
    this.sweeping = true;

    try {
      for (const packet of this.registry.snapshot()) {
        // Removed by an earlier packet's callback during this sweep
        if (!this.registry.contains(packet)) continue;
        this.sweepPacket(packet, deltaSeconds, report);
      }
    } finally {
      this.sweeping = false;
      report.removed = this.registry.compact();
      if (report.removed > 0) {
        this.telemetry?.registeredPackets(-report.removed);
      }
    }

    this.telemetry?.sweep(performance.now() - startedAt);
    return report;
  }

  private sweepPacket(packet: WatchPacket, deltaSeconds: number, report: SweepReport): void {
    if (!packet.active) return;

    let satisfied: boolean;
    try {
      if (packet.advance(deltaSeconds) !== "eligible") return;
      report.evaluated++;
      satisfied = isSatisfied(packet.policy, packet.conditions, (cond) =>
        evaluateCondition(cond, this.source, this.resolver),
      );
    } catch (err) {
      report.failures++;
      this.telemetry?.actionFailure({ step: "evaluate" });
      this.logger.error(
        { err: toError(err), id: packet.id, uid: packet.uid },
        "Packet evaluation failed",
      );
      return;
    }

    if (!satisfied) return;

    const span = startFireSpan(packet.id, packet.uid);
    try {
      const { failures } = this.pipeline.run(packet);
      report.failures += failures.length;
      if (failures.length > 0) {
        endSpanError(span, `${failures.length} action(s) failed`);
      } else {
        endSpanOk(span);
      }
    } catch (err) {
      report.failures++;
      endSpanError(span, toError(err));
      this.logger.error({ err: toError(err), id: packet.id }, "Action pipeline failed");
    } finally {
      packet.markExecuted();
      report.fired++;
      this.telemetry?.packetFired({ executeOnce: packet.executeOnce });
      if (packet.executeOnce) {
        this.registry.markForRemoval(packet);
      }
    }

    this.logger.debug(
      { id: packet.id, uid: packet.uid, executeOnce: packet.executeOnce },
      "Packet fired",
    );
  }

  /**
   * Attach or detach the telemetry sink. Used by the facade, which owns the
   * provider lifecycle. A new sink is seeded with the packets already
   * registered.
   */
  setTelemetry(telemetry: FrameWatchMetrics | null): void {
    this.telemetry = telemetry;
    this.pipeline.setMetrics(telemetry);
    if (telemetry && this.registry.totalCount > 0) {
      telemetry.registeredPackets(this.registry.totalCount);
    }
  }

  // ---------------------------------------------------------------------------
  // Management API
  // ---------------------------------------------------------------------------

  /**
   * Register a packet, either a built instance or a plain definition.
   */
  addPacket(packet: WatchPacket | PacketDefinition): WatchPacket {
    const instance = packet instanceof WatchPacket ? packet : new WatchPacket(packet);
    this.registry.add(instance);
    this.telemetry?.registeredPackets(1);
    return instance;
  }

  /**
   * Convenience form: one or many conditions, a message and one or many
   * callbacks, everything else defaulted.
   */
  addSimplePacket(
    id: number,
    conditions: Condition | Condition[],
    messageSeverity: MessageSeverity,
    message: string,
    breakExecution: boolean,
    callbacks: Callback | Callback[],
  ): WatchPacket {
    return this.addPacket({
      id,
      conditions: Array.isArray(conditions) ? conditions : [conditions],
      actions: {
        messageSeverity,
        message,
        breakExecution,
        callbacks: Array.isArray(callbacks) ? callbacks : [callbacks],
      },
    });
  }

  getFirstPacketWithId(id: number): WatchPacket | undefined {
    return this.registry.getFirst(id);
  }

  /**
   * Like `getFirstPacketWithId`, but throws PacketNotFoundError on a miss.
   */
  requireFirstPacketWithId(id: number): WatchPacket {
    const packet = this.registry.getFirst(id);
    if (!packet) throw new PacketNotFoundError(id);
    return packet;
  }

  getAllPacketsWithId(id: number): WatchPacket[] {
    return this.registry.getAll(id);
  }

  removeFirstPacketWithId(id: number): boolean {
    const removed = this.registry.removeFirst(id);
    if (removed) this.telemetry?.registeredPackets(-1);
    return removed;
  }

  removeAllPacketsWithId(id: number): number {
    const removed = this.registry.removeAll(id);
    if (removed > 0) this.telemetry?.registeredPackets(-removed);
    return removed;
  }

  addCallbackToFirstPacketWithId(callback: Callback, id: number): boolean {
    return this.registry.addCallbackToFirst(id, callback);
  }

  addCallbackToAllPacketsWithId(callback: Callback, id: number): number {
    return this.registry.addCallbackToAll(id, callback);
  }

  /**
   * Activate or deactivate every packet with the id. Returns how many
   * packets matched.
   */
  setActiveForId(id: number, active: boolean): number {
    return this.registry.setActive(id, active);
  }

  get packets(): readonly WatchPacket[] {
    return this.registry.getAllPackets();
  }

  get packetCount(): number {
    return this.registry.totalCount;
  }

  clear(): void {
    const count = this.registry.totalCount;
    this.registry.clear();
    if (count > 0) this.telemetry?.registeredPackets(-count);
  }
}

import { nanoid } from "nanoid";
import type {
  ActionFailure,
  ActionStep,
  FireEvent,
  PipelineResult,
} from "../types/index.js";
import type { WatchPacket } from "../packets/packet.js";
import type { BreakService, LogChannel, ScreenshotService } from "./channels.js";
import type { FrameWatchMetrics } from "../observability/metrics.js";
import { formatMessage, screenshotPath } from "./format.js";
import { toError } from "../errors.js";
import pino from "pino";

export interface PipelineOptions {
  logChannel: LogChannel;
  screenshots?: ScreenshotService;
  breaker?: BreakService;
  messagePrefix: string;
  screenshotDir: string;
  clock: () => Date;
  metrics?: FrameWatchMetrics | null;
  logger?: pino.Logger;
}

/**
 * Runs a fired packet's actions in fixed order:
 *
 *   1. execution break
 *   2. message
 *   3. screenshot
 *   4. event hooks
 *   5. callbacks
 *
 * Every step is best-effort. A failing step is reported and the remaining
 * steps still run; nothing thrown by a collaborator escapes `run()`.
 */
export class ActionPipeline {
  private options: PipelineOptions;
  private logger: pino.Logger;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "framewatch.actions",
    });
  }

  /** Swap the telemetry sink, e.g. when providers start or stop. */
  setMetrics(metrics: FrameWatchMetrics | null): void {
    this.options.metrics = metrics;
  }

  run(packet: WatchPacket): PipelineResult {
    const { actions } = packet;
    const now = this.options.clock();
    const failures: ActionFailure[] = [];
    const fail = (step: ActionStep, err: unknown, index?: number) => {
      const error = toError(err);
      failures.push({ step, error, ...(index !== undefined ? { index } : {}) });
      this.options.metrics?.actionFailure({ step });
      this.logger.error(
        { err: error, id: packet.id, uid: packet.uid, step, index },
        "Packet action failed",
      );
    };

    if (actions.breakExecution) {
      if (this.options.breaker) {
        try {
          this.options.breaker.requestBreak();
        } catch (err) {
          fail("break", err);
        }
      } else {
        this.logger.warn({ id: packet.id }, "Execution break requested but no break service is wired");
      }
    }

    const line = actions.message !== ""
      ? formatMessage(this.options.messagePrefix, now, actions.message)
      : "";

    if (line) {
      try {
        this.options.logChannel.write(actions.messageSeverity, line);
      } catch (err) {
        fail("message", err);
      }
    }

    if (actions.captureScreenshot) {
      this.captureScreenshot(packet, now, fail);
    }

    const event: FireEvent = {
      id: nanoid(),
      packetId: packet.id,
      packetUid: packet.uid,
      timestamp: now,
      message: line,
    };

    actions.eventHooks.forEach((hook, i) => {
      try {
        hook(event);
      } catch (err) {
        fail("hook", err, i);
      }
    });

    actions.callbacks.forEach((callback, i) => {
      if (!callback) return;
      try {
        callback();
      } catch (err) {
        fail("callback", err, i);
      }
    });

    return { event, failures };
  }

  private captureScreenshot(
    packet: WatchPacket,
    now: Date,
    fail: (step: ActionStep, err: unknown) => void,
  ): void {
    const service = this.options.screenshots;
    if (!service) {
      this.logger.warn({ id: packet.id }, "Screenshot requested but no screenshot service is wired");
      return;
    }

    const path = screenshotPath(
      this.options.screenshotDir,
      packet.actions.screenshotNameHint,
      now,
    );

    try {
      const pending = service.capture(path);
      if (pending instanceof Promise) {
        pending
          .then(() => this.logger.debug({ id: packet.id, path }, "Screenshot written"))
          .catch((err: unknown) => {
            this.options.metrics?.actionFailure({ step: "screenshot" });
            this.logger.error({ err: toError(err), id: packet.id, path }, "Screenshot write failed");
          });
      }
    } catch (err) {
      fail("screenshot", err);
    }
  }
}

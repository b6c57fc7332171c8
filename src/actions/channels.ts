import type { MessageSeverity } from "../types/index.js";
import pino from "pino";

/**
 * Destination for packet messages.
 */
export interface LogChannel {
  write(severity: MessageSeverity, line: string): void;
}

/**
 * Captures the current visual frame to a file. May complete asynchronously;
 * the engine never waits for it.
 */
export interface ScreenshotService {
  capture(path: string): void | Promise<void>;
}

/**
 * Asks the host to suspend execution (debugger or editor pause).
 */
export interface BreakService {
  requestBreak(): void;
}

/**
 * Routes packet messages into pino: log -> info, warning -> warn,
 * error -> error.
 */
export class PinoLogChannel implements LogChannel {
  private logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "framewatch.channel",
    });
  }

  write(severity: MessageSeverity, line: string): void {
    switch (severity) {
      case "log":
        this.logger.info(line);
        break;
      case "warning":
        this.logger.warn(line);
        break;
      case "error":
        this.logger.error(line);
        break;
    }
  }
}

/**
 * Pauses on a `debugger` statement. Only has an effect when an inspector is
 * attached (`node --inspect`); otherwise it is a no-op.
 */
export class DebuggerStatementBreakService implements BreakService {
  requestBreak(): void {
    // eslint-disable-next-line no-debugger
    debugger;
  }
}

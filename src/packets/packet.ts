import { nanoid } from "nanoid";
import type {
  ActionSpec,
  Callback,
  CombinationPolicy,
  Condition,
  PacketDefinition,
  PacketState,
} from "../types/index.js";
import { COMPARATORS, POLICIES, condition } from "../conditions/condition.js";
import { InvalidPacketError } from "../errors.js";

export const DEFAULT_INIT_DELAY = 2;
export const DEFAULT_RECHECK_DELAY = 2;
export const DEFAULT_SCREENSHOT_HINT = "FrameWatch_Screenshot";

export function defaultActions(overrides: Partial<ActionSpec> = {}): ActionSpec {
  return {
    messageSeverity: overrides.messageSeverity ?? "log",
    message: overrides.message ?? "",
    captureScreenshot: overrides.captureScreenshot ?? false,
    screenshotNameHint: overrides.screenshotNameHint ?? DEFAULT_SCREENSHOT_HINT,
    breakExecution: overrides.breakExecution ?? false,
    eventHooks: [...(overrides.eventHooks ?? [])],
    callbacks: [...(overrides.callbacks ?? [])],
  };
}

/**
 * A watch packet: conditions, a combination policy, cooldown timers and the
 * actions to run when the conditions hold.
 *
 * Timer states:
 *
 *   cooling  --(elapsed >= delay)-->  eligible
 *   eligible --(markExecuted)------>  cooling   (repeating packets)
 *
 * The applicable delay is `initDelay` until the first firing and
 * `recheckDelay` afterwards. One-shot packets are dropped by the engine once
 * they fire, so they never re-enter cooling in practice.
 */
export class WatchPacket {
  /** Caller-assigned, not unique */
  readonly id: number;
  /** Per-instance identity for logs and spans */
  readonly uid: string;
  active: boolean;
  executeOnce: boolean;
  initDelay: number;
  recheckDelay: number;
  readonly conditions: readonly Condition[];
  policy: CombinationPolicy;
  actions: ActionSpec;

  private elapsed = 0;
  private fired = false;
  private eligible = false;

  constructor(def: PacketDefinition) {
    validateDefinition(def);

    this.id = def.id;
    this.uid = nanoid();
    this.active = def.active ?? true;
    this.executeOnce = def.executeOnce ?? true;
    this.initDelay = def.initDelay ?? DEFAULT_INIT_DELAY;
    this.recheckDelay = def.recheckDelay ?? DEFAULT_RECHECK_DELAY;
    this.conditions = Object.freeze(
      (def.conditions ?? []).map((c) => condition(c.variable, c.comparator, c.threshold)),
    );
    this.policy = def.policy ?? "all";
    this.actions = defaultActions(def.actions);
  }

  get state(): PacketState {
    return this.eligible ? "eligible" : "cooling";
  }

  get isEligible(): boolean {
    return this.eligible;
  }

  get hasFired(): boolean {
    return this.fired;
  }

  /** Active time accumulated since the packet last entered cooling. */
  get elapsedSinceEligible(): number {
    return this.elapsed;
  }

  /**
   * Accumulate frame time while cooling. Callers skip inactive packets, so
   * time spent inactive is never counted.
   */
  advance(deltaSeconds: number): PacketState {
    if (this.eligible) return "eligible";

    if (Number.isFinite(deltaSeconds) && deltaSeconds > 0) {
      this.elapsed += deltaSeconds;
    }

    const delay = this.fired ? this.recheckDelay : this.initDelay;
    if (this.elapsed >= delay) {
      this.eligible = true;
      this.elapsed = 0;
    }

    return this.state;
  }

  /** Re-arm the timer after the actions ran. */
  markExecuted(): void {
    this.fired = true;
    this.eligible = false;
    this.elapsed = 0;
  }

  addCallback(callback: Callback): void {
    this.actions.callbacks.push(callback);
  }
}

function validateDefinition(def: PacketDefinition): void {
  if (!Number.isInteger(def.id)) {
    throw new InvalidPacketError("id", `expected an integer, got ${def.id}`);
  }

  for (const field of ["initDelay", "recheckDelay"] as const) {
    const value = def[field];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidPacketError(field, `expected a non-negative number of seconds, got ${value}`);
    }
  }

  if (def.policy !== undefined && !POLICIES.includes(def.policy)) {
    throw new InvalidPacketError("policy", `unknown combination policy "${String(def.policy)}"`);
  }

  (def.conditions ?? []).forEach((cond, i) => {
    if (!COMPARATORS.includes(cond.comparator)) {
      throw new InvalidPacketError(
        `conditions[${i}].comparator`,
        `unknown comparator "${String(cond.comparator)}"`,
      );
    }
    if (!Number.isFinite(cond.threshold)) {
      throw new InvalidPacketError(
        `conditions[${i}].threshold`,
        `expected a finite number, got ${cond.threshold}`,
      );
    }
  });
}

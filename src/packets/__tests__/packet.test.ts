import { describe, it, expect, vi } from "vitest";
import { WatchPacket, DEFAULT_INIT_DELAY, DEFAULT_SCREENSHOT_HINT } from "../packet.js";
import { condition } from "../../conditions/condition.js";
import { InvalidPacketError } from "../../errors.js";
import type { PacketDefinition } from "../../types/index.js";

describe("WatchPacket", () => {
  it("applies defaults", () => {
    const packet = new WatchPacket({ id: 3 });
    expect(packet.active).toBe(true);
    expect(packet.executeOnce).toBe(true);
    expect(packet.initDelay).toBe(DEFAULT_INIT_DELAY);
    expect(packet.policy).toBe("all");
    expect(packet.actions.message).toBe("");
    expect(packet.actions.messageSeverity).toBe("log");
    expect(packet.actions.screenshotNameHint).toBe(DEFAULT_SCREENSHOT_HINT);
    expect(packet.state).toBe("cooling");
    expect(packet.hasFired).toBe(false);
  });

  it("gives each instance its own uid", () => {
    const a = new WatchPacket({ id: 1 });
    const b = new WatchPacket({ id: 1 });
    expect(a.uid).not.toBe(b.uid);
  });

  it("becomes eligible once accumulated time reaches initDelay", () => {
    const packet = new WatchPacket({ id: 1, initDelay: 2 });
    expect(packet.advance(0.5)).toBe("cooling");
    expect(packet.advance(0.5)).toBe("cooling");
    expect(packet.advance(0.5)).toBe("cooling");
    expect(packet.elapsedSinceEligible).toBe(1.5);
    expect(packet.advance(0.5)).toBe("eligible");
    expect(packet.elapsedSinceEligible).toBe(0);
  });

  it("stays eligible without accumulating until it fires", () => {
    const packet = new WatchPacket({ id: 1, initDelay: 0 });
    expect(packet.advance(0)).toBe("eligible");
    expect(packet.advance(5)).toBe("eligible");
    expect(packet.elapsedSinceEligible).toBe(0);
  });

  it("uses recheckDelay after the first firing", () => {
    const packet = new WatchPacket({ id: 1, initDelay: 2, recheckDelay: 1, executeOnce: false });
    packet.advance(2);
    expect(packet.isEligible).toBe(true);

    packet.markExecuted();
    expect(packet.state).toBe("cooling");
    expect(packet.hasFired).toBe(true);

    expect(packet.advance(0.5)).toBe("cooling");
    expect(packet.advance(0.5)).toBe("eligible");
  });

  it("ignores negative and non-finite deltas", () => {
    const packet = new WatchPacket({ id: 1, initDelay: 1 });
    packet.advance(-3);
    packet.advance(Number.NaN);
    packet.advance(Number.POSITIVE_INFINITY);
    expect(packet.elapsedSinceEligible).toBe(0);
    expect(packet.state).toBe("cooling");
  });

  it("copies conditions and callbacks from the definition", () => {
    const conditions = [condition("fps", "lt", 30)];
    const callback = vi.fn();
    const callbacks = [callback];
    const packet = new WatchPacket({ id: 1, conditions, actions: { callbacks } });

    conditions.push(condition("fps", "gt", 200));
    packet.addCallback(vi.fn());

    expect(packet.conditions).toHaveLength(1);
    expect(callbacks).toHaveLength(1);
    expect(packet.actions.callbacks).toHaveLength(2);
  });

  it("keeps its own frozen copies of the conditions", () => {
    const cond = { variable: "fps" as const, comparator: "lt" as const, threshold: 30 };
    const packet = new WatchPacket({ id: 1, conditions: [cond] });

    cond.threshold = 100;

    expect(packet.conditions[0]).toEqual({ variable: "fps", comparator: "lt", threshold: 30 });
    expect(packet.conditions[0]).not.toBe(cond);
    expect(Object.isFrozen(packet.conditions)).toBe(true);
    expect(Object.isFrozen(packet.conditions[0])).toBe(true);
  });

  describe("validation", () => {
    it("rejects a non-integer id", () => {
      expect(() => new WatchPacket({ id: 1.5 })).toThrow(InvalidPacketError);
    });

    it("rejects negative or non-finite delays", () => {
      expect(() => new WatchPacket({ id: 1, initDelay: -1 })).toThrow(
        "Invalid packet field 'initDelay'",
      );
      expect(() => new WatchPacket({ id: 1, recheckDelay: Number.NaN })).toThrow(
        "Invalid packet field 'recheckDelay'",
      );
    });

    it("rejects unknown comparators and non-finite thresholds", () => {
      // Shape of a definition loaded from untyped input
      const def: PacketDefinition = JSON.parse(
        '{"id":1,"conditions":[{"variable":"fps","comparator":"approx","threshold":1}]}',
      );
      expect(() => new WatchPacket(def)).toThrow(
        "Invalid packet field 'conditions[0].comparator'",
      );
      expect(
        () => new WatchPacket({ id: 1, conditions: [condition("fps", "lt", Number.NaN)] }),
      ).toThrow("Invalid packet field 'conditions[0].threshold'");
    });
  });
});

import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { ActionPipeline, type PipelineOptions } from "../pipeline.js";
import { WatchPacket } from "../../packets/packet.js";
import type { ActionSpec, FireEvent } from "../../types/index.js";

const at = new Date(2024, 2, 5, 9, 7, 3);

function makePipeline(overrides: Partial<PipelineOptions> = {}) {
  const logChannel = { write: vi.fn() };
  const pipeline = new ActionPipeline({
    logChannel,
    messagePrefix: "FrameWatch",
    screenshotDir: "shots",
    clock: () => at,
    logger: pino({ level: "silent" }),
    ...overrides,
  });
  return { pipeline, logChannel };
}

function makePacket(actions: Partial<ActionSpec>): WatchPacket {
  return new WatchPacket({ id: 9, actions });
}

describe("ActionPipeline", () => {
  it("runs steps in break, message, screenshot, hooks, callbacks order", () => {
    const calls: string[] = [];
    const { pipeline } = makePipeline({
      logChannel: { write: () => calls.push("message") },
      breaker: { requestBreak: () => calls.push("break") },
      screenshots: { capture: () => { calls.push("screenshot"); } },
    });
    const packet = makePacket({
      message: "low fps",
      breakExecution: true,
      captureScreenshot: true,
      eventHooks: [() => calls.push("hook")],
      callbacks: [() => calls.push("callback-1"), () => calls.push("callback-2")],
    });

    const result = pipeline.run(packet);

    expect(calls).toEqual(["break", "message", "screenshot", "hook", "callback-1", "callback-2"]);
    expect(result.failures).toEqual([]);
  });

  it("writes the formatted message at the packet severity", () => {
    const { pipeline, logChannel } = makePipeline();
    pipeline.run(makePacket({ message: "memory spike", messageSeverity: "warning" }));
    expect(logChannel.write).toHaveBeenCalledWith(
      "warning",
      "[FrameWatch] (2024-03-05 09:07:03): memory spike",
    );
  });

  it("skips the message when it is empty", () => {
    const { pipeline, logChannel } = makePipeline();
    pipeline.run(makePacket({ message: "" }));
    expect(logChannel.write).not.toHaveBeenCalled();
  });

  it("captures the screenshot to a sanitized path", () => {
    const capture = vi.fn();
    const { pipeline } = makePipeline({ screenshots: { capture } });
    pipeline.run(makePacket({ captureScreenshot: true, screenshotNameHint: "Perf Capture" }));
    expect(capture).toHaveBeenCalledWith("shots/Perf_Capture_2024-03-05_09-07-03.png");
  });

  it("hands hooks a fire event describing the packet", () => {
    const hook = vi.fn<(event: FireEvent) => void>();
    const { pipeline } = makePipeline();
    const packet = makePacket({ message: "hit", eventHooks: [hook] });

    const { event } = pipeline.run(packet);

    expect(hook).toHaveBeenCalledWith(event);
    expect(event.packetId).toBe(9);
    expect(event.packetUid).toBe(packet.uid);
    expect(event.timestamp).toBe(at);
    expect(event.message).toBe("[FrameWatch] (2024-03-05 09:07:03): hit");
  });

  it("skips absent callbacks without aborting the rest", () => {
    const after = vi.fn();
    const { pipeline } = makePipeline();
    const result = pipeline.run(makePacket({ callbacks: [null, undefined, after] }));
    expect(after).toHaveBeenCalledTimes(1);
    expect(result.failures).toEqual([]);
  });

  it("reports throwing hooks and callbacks and keeps going", () => {
    const secondHook = vi.fn();
    const lastCallback = vi.fn();
    const { pipeline } = makePipeline();
    const result = pipeline.run(
      makePacket({
        eventHooks: [() => { throw new Error("hook boom"); }, secondHook],
        callbacks: [() => { throw "callback boom"; }, lastCallback],
      }),
    );

    expect(secondHook).toHaveBeenCalledTimes(1);
    expect(lastCallback).toHaveBeenCalledTimes(1);
    expect(result.failures.map((f) => [f.step, f.index, f.error.message])).toEqual([
      ["hook", 0, "hook boom"],
      ["callback", 0, "callback boom"],
    ]);
  });

  it("continues when the break or screenshot service throws", () => {
    const callback = vi.fn();
    const { pipeline, logChannel } = makePipeline({
      breaker: { requestBreak: () => { throw new Error("no debugger"); } },
      screenshots: { capture: () => { throw new Error("disk full"); } },
    });
    const result = pipeline.run(
      makePacket({ breakExecution: true, captureScreenshot: true, message: "x", callbacks: [callback] }),
    );

    expect(logChannel.write).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(result.failures.map((f) => f.step)).toEqual(["break", "screenshot"]);
  });

  it("does not wait for or fail on an asynchronous screenshot rejection", async () => {
    const actionFailure = vi.fn();
    const { pipeline } = makePipeline({
      screenshots: { capture: () => Promise.reject(new Error("write failed")) },
      metrics: {
        sweep: vi.fn(),
        packetFired: vi.fn(),
        actionFailure,
        registeredPackets: vi.fn(),
      },
    });

    const result = pipeline.run(makePacket({ captureScreenshot: true }));
    expect(result.failures).toEqual([]);

    await vi.waitFor(() => {
      expect(actionFailure).toHaveBeenCalledWith({ step: "screenshot" });
    });
  });

  it("skips break and screenshot when no service is wired", () => {
    const callback = vi.fn();
    const { pipeline } = makePipeline();
    const result = pipeline.run(
      makePacket({ breakExecution: true, captureScreenshot: true, callbacks: [callback] }),
    );
    expect(callback).toHaveBeenCalledTimes(1);
    expect(result.failures).toEqual([]);
  });
});

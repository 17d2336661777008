import { describe, it, expect, vi } from "vitest";
import { EventBus } from "./events.js";
import { silentLogger } from "../testing/harness.js";

describe("EventBus", () => {
  it("delivers events to every listener", () => {
    const bus = new EventBus(silentLogger());
    const a = vi.fn();
    const b = vi.fn();
    bus.on(a);
    bus.on(b);

    bus.emit({ type: "BatchOpened", batchId: 1 });

    expect(a).toHaveBeenCalledWith({ type: "BatchOpened", batchId: 1 });
    expect(b).toHaveBeenCalledWith({ type: "BatchOpened", batchId: 1 });
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus(silentLogger());
    const listener = vi.fn();
    const off = bus.on(listener);
    off();
    bus.emit({ type: "BatchClosed", batchId: 1 });
    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount).toBe(0);
  });

  it("logs a failing listener and keeps going", () => {
    const logger = silentLogger();
    const error = vi.spyOn(logger, "error");
    const bus = new EventBus(logger);
    const after = vi.fn();
    bus.on(() => {
      throw new Error("listener broke");
    });
    bus.on(after);

    expect(() => bus.emit({ type: "BatchOpened", batchId: 2 })).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "BatchOpened" }),
      "Event listener failed"
    );
  });

  it("destroy removes all listeners", () => {
    const bus = new EventBus(silentLogger());
    bus.on(vi.fn());
    bus.on(vi.fn());
    expect(bus.listenerCount).toBe(2);
    bus.destroy();
    expect(bus.listenerCount).toBe(0);
  });
});

import { describe, expect, it } from "vitest";
import { LatestFrameSlot } from "../src/LatestFrameSlot";

describe("LatestFrameSlot", () => {
  it("hands out the newest frame once", () => {
    const slot = new LatestFrameSlot<number>();
    slot.put(1);
    slot.put(2);

    expect(slot.take()).toBe(2);
    expect(slot.take()).toBeNull();
    expect(slot.droppedCount).toBe(1);
  });

  it("does not count a frame that was taken as dropped", () => {
    const slot = new LatestFrameSlot<string>();
    slot.put("a");
    slot.take();
    slot.put("b");

    expect(slot.droppedCount).toBe(0);
    expect(slot.take()).toBe("b");

    slot.put("c");
    slot.clear();
    expect(slot.take()).toBeNull();
  });
});

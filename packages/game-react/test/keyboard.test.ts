import { describe, expect, it } from "vitest";
import { bindingForKey } from "../src/keyboard";

describe("bindingForKey", () => {
  it("maps match commands", () => {
    expect(bindingForKey("Space")).toEqual({ type: "COMMAND", command: { type: "START" } });
    expect(bindingForKey("KeyR")).toEqual({ type: "COMMAND", command: { type: "RESTART" } });
    expect(bindingForKey("Escape")).toEqual({ type: "COMMAND", command: { type: "QUIT" } });
  });

  it("maps the block fallback and fullscreen", () => {
    expect(bindingForKey("KeyB")).toEqual({ type: "BLOCK" });
    expect(bindingForKey("KeyF")).toEqual({ type: "FULLSCREEN" });
  });

  it("ignores everything else", () => {
    expect(bindingForKey("KeyQ")).toBeNull();
    expect(bindingForKey("")).toBeNull();
  });
});

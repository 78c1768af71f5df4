import { describe, expect, it } from "vitest";
import { OpponentAI } from "../src";
import type { OpponentStateKind } from "../src";

const TIMINGS = {
  idleMs: 100,
  telegraphMs: 50,
  attackMs: 20,
  vulnerableMs: 200,
  hitStunMs: 30,
  recoveryMs: 40,
  random: () => 0,
};

const TIMED_EDGES = new Set([
  "IDLE>TELEGRAPH",
  "TELEGRAPH>ATTACKING",
  "ATTACKING>VULNERABLE",
  "VULNERABLE>IDLE",
]);

function toVulnerable(ai: OpponentAI): void {
  ai.advance(100);
  ai.advance(50);
  ai.advance(20);
}

describe("OpponentAI (timed cycle)", () => {
  it("cycles idle, telegraph, attacking, vulnerable without skipping", () => {
    const ai = new OpponentAI(TIMINGS);
    const seen: OpponentStateKind[] = [ai.getState().state];
    for (let i = 0; i < 200; i++) {
      const { state } = ai.advance(10);
      if (state !== seen[seen.length - 1]) seen.push(state);
    }

    expect(seen.slice(0, 5)).toEqual(["IDLE", "TELEGRAPH", "ATTACKING", "VULNERABLE", "IDLE"]);
    for (let i = 1; i < seen.length; i++) {
      expect(TIMED_EDGES.has(`${seen[i - 1]}>${seen[i]}`)).toBe(true);
    }
  });

  it("moves one state per advance even when the tick is long", () => {
    const ai = new OpponentAI(TIMINGS);

    expect(ai.advance(10_000).state).toBe("TELEGRAPH");
    expect(ai.getState().remainingMs).toBe(50);
    expect(ai.advance(10_000).state).toBe("ATTACKING");
    expect(ai.advance(10_000).state).toBe("VULNERABLE");
    expect(ai.advance(10_000).state).toBe("IDLE");
  });

  it("ignores non-positive and non-finite ticks", () => {
    const ai = new OpponentAI(TIMINGS);
    ai.advance(0);
    ai.advance(-5);
    ai.advance(Number.NaN);
    expect(ai.getState()).toMatchObject({ state: "IDLE", remainingMs: 100 });
  });

  it("reports the remaining fraction of the current state", () => {
    const ai = new OpponentAI(TIMINGS);
    ai.advance(100);
    const telegraph = ai.advance(25);
    expect(telegraph.state).toBe("TELEGRAPH");
    expect(telegraph.progress).toBeCloseTo(0.5);
  });

  it("counts attacks and picks a side when telegraphing", () => {
    const ai = new OpponentAI({ ...TIMINGS, random: () => 0.7 });
    expect(ai.getState().attackId).toBe(0);
    expect(ai.advance(100).attackSide).toBe("RIGHT");
    expect(ai.advance(50).attackId).toBe(1);
  });

  it("shortens the telegraph in later rounds down to the floor", () => {
    const ai = new OpponentAI({ idleMs: 10, telegraphMs: 600, telegraphRoundStepMs: 50, minTelegraphMs: 200 });

    ai.reset(3);
    expect(ai.advance(10).durationMs).toBe(500);

    ai.reset(20);
    expect(ai.advance(10).durationMs).toBe(200);
  });
});

describe("OpponentAI (hits and illegal transitions)", () => {
  it("enters hit-stun only from vulnerable", () => {
    const ai = new OpponentAI(TIMINGS);
    expect(ai.hit()).toBe(false);

    ai.advance(100);
    expect(ai.getState().state).toBe("TELEGRAPH");
    expect(ai.hit()).toBe(false);

    ai.advance(50);
    expect(ai.getState().state).toBe("ATTACKING");
    expect(ai.hit()).toBe(false);

    ai.advance(20);
    expect(ai.getState().state).toBe("VULNERABLE");
    expect(ai.hit()).toBe(true);
    expect(ai.getState()).toMatchObject({ state: "HIT_STUN", remainingMs: 30 });
    expect(ai.hit()).toBe(false);

    ai.advance(30);
    expect(ai.getState().state).toBe("RECOVERING");
    expect(ai.hit()).toBe(false);

    ai.advance(40);
    expect(ai.getState().state).toBe("IDLE");
  });

  it("treats a request outside the graph as a no-op", () => {
    const ai = new OpponentAI(TIMINGS);
    toVulnerable(ai);
    ai.advance(50);

    expect(ai.transitionTo("VULNERABLE")).toBe(false);
    expect(ai.transitionTo("ATTACKING")).toBe(false);
    expect(ai.getState()).toMatchObject({ state: "VULNERABLE", remainingMs: 150 });
  });

  it("accepts a hit on a vulnerability window that closed this tick", () => {
    const ai = new OpponentAI(TIMINGS);
    toVulnerable(ai);

    expect(ai.advance(200).state).toBe("IDLE");
    expect(ai.hit()).toBe(true);
    expect(ai.getState().state).toBe("HIT_STUN");

    ai.advance(5);
    expect(ai.hit()).toBe(false);
  });

  it("does not honor a stale window on the following tick", () => {
    const ai = new OpponentAI(TIMINGS);
    toVulnerable(ai);
    ai.advance(200);
    ai.advance(5);

    expect(ai.hit()).toBe(false);
    expect(ai.getState().state).toBe("IDLE");
  });
});

import { describe, expect, it } from "vitest";
import type { CombatOutcome, MatchControllerOptions } from "@ringside-kit/combat-core";
import type { HandFrame, Landmark, TrackedHand } from "@ringside-kit/gesture-core";
import { createBoxingMatch } from "../src";

function hand(handedness: "Left" | "Right", [x, y]: [number, number], size = 0.2): TrackedHand {
  const at = (px: number, py: number): Landmark => ({ x: px, y: py });
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => at(x, y));
  landmarks[0] = at(x, y + 0.5 * size);
  [6, 10, 14, 18].forEach((pip, k) => {
    const dx = (-0.3 + 0.2 * k) * size;
    landmarks[pip] = at(x + dx, y - 0.25 * size);
    landmarks[pip + 2] = at(x + dx, y);
  });
  return { handedness, landmarks };
}

const guard = (timestamp: number): HandFrame => ({
  hands: [hand("Left", [0.45, 0.3]), hand("Right", [0.55, 0.3])],
  timestamp,
});
const empty = (timestamp: number): HandFrame => ({ hands: [], timestamp });
const fist = (timestamp: number, size: number): HandFrame => ({
  hands: [hand("Right", [0.5, 0.6], size)],
  timestamp,
});

function setup(outcomes: CombatOutcome[]) {
  const matchOptions: MatchControllerOptions = {
    countdownMs: 0,
    roundDurationMs: 0,
    opponent: { idleMs: 40, telegraphMs: 40, attackMs: 20, vulnerableMs: 200, hitStunMs: 60, recoveryMs: 80, random: () => 0 },
    onOutcome: (outcome) => outcomes.push(outcome),
  };
  const match = createBoxingMatch({ smoothingAlpha: 1 }, matchOptions);
  match.controller.handle({ type: "START" });
  match.controller.tick(20);
  return match;
}

describe("createBoxingMatch", () => {
  it("blocks the opponent's attack with a raised guard", () => {
    const outcomes: CombatOutcome[] = [];
    const { controller } = setup(outcomes);
    let snap = controller.getSnapshot();
    for (let t = 0; t <= 80; t += 20) {
      snap = controller.tick(20, guard(t));
    }

    expect(outcomes).toEqual([{ type: "BLOCKED" }]);
    expect(snap.playerHp).toBe(100);
    expect(snap.opponent.state).toBe("VULNERABLE");
  });

  it("counters a missed guard with a punch into the vulnerable window", () => {
    const outcomes: CombatOutcome[] = [];
    const { controller } = setup(outcomes);
    for (let t = 0; t <= 80; t += 20) {
      controller.tick(20, empty(t));
    }
    controller.tick(20, fist(100, 0.2));
    controller.tick(20, fist(120, 0.2));
    const snap = controller.tick(20, fist(140, 0.3));

    expect(outcomes).toEqual([
      { type: "PLAYER_DAMAGED", damage: 34 },
      { type: "HIT_LANDED", damage: 20 },
    ]);
    expect(snap.action).toBe("PUNCH");
    expect(snap.playerHp).toBe(66);
    expect(snap.opponentHp).toBe(80);
    expect(snap.opponent.state).toBe("HIT_STUN");
  });

  it("stops blocking once the feed goes silent after a single guard frame", () => {
    const outcomes: CombatOutcome[] = [];
    const { controller } = setup(outcomes);
    let snap = controller.tick(20, guard(0));
    for (let i = 0; i < 18; i += 1) {
      snap = controller.tick(20, null);
    }

    expect(outcomes).toEqual([{ type: "BLOCKED" }, { type: "PLAYER_DAMAGED", damage: 34 }]);
    expect(snap.action).toBe("NONE");
    expect(snap.playerHp).toBe(66);
  });
});

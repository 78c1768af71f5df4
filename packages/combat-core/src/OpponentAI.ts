import type { AttackSide, OpponentAIOptions, OpponentSnapshot, OpponentStateKind } from "./types";

const DEFAULTS: Required<OpponentAIOptions> = {
  idleMs: 800,
  telegraphMs: 600,
  attackMs: 150,
  vulnerableMs: 1000,
  hitStunMs: 600,
  recoveryMs: 400,
  telegraphRoundStepMs: 50,
  minTelegraphMs: 200,
  random: Math.random,
  debug: false,
};

const LEGAL_TRANSITIONS: Record<OpponentStateKind, readonly OpponentStateKind[]> = {
  IDLE: ["TELEGRAPH"],
  TELEGRAPH: ["ATTACKING"],
  ATTACKING: ["VULNERABLE"],
  VULNERABLE: ["IDLE", "HIT_STUN"],
  HIT_STUN: ["RECOVERING"],
  RECOVERING: ["IDLE"],
};

// Where each state goes when its timer runs out.
const TIMED_NEXT: Record<OpponentStateKind, OpponentStateKind> = {
  IDLE: "TELEGRAPH",
  TELEGRAPH: "ATTACKING",
  ATTACKING: "VULNERABLE",
  VULNERABLE: "IDLE",
  HIT_STUN: "RECOVERING",
  RECOVERING: "IDLE",
};

export class OpponentAI {
  private readonly options: Required<OpponentAIOptions>;
  private state: OpponentStateKind = "IDLE";
  private stateAtTickStart: OpponentStateKind = "IDLE";
  private remainingMs = 0;
  private durationMs = 0;
  private round = 1;
  private attackSide?: AttackSide;
  private attackId = 0;

  constructor(opts?: OpponentAIOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.enter("IDLE");
  }

  /**
   * Counts the current state down by `dtMs`. At most one timed transition happens
   * per call and the next state always starts with its full duration, so a long
   * tick can delay a state but never skip it.
   */
  advance(dtMs: number): OpponentSnapshot {
    this.stateAtTickStart = this.state;
    if (!Number.isFinite(dtMs) || dtMs <= 0) {
      return this.getState();
    }
    this.remainingMs = Math.max(0, this.remainingMs - dtMs);
    if (this.remainingMs === 0) {
      this.enter(TIMED_NEXT[this.state]);
    }
    return this.getState();
  }

  hit(): boolean {
    if (this.state === "VULNERABLE") {
      return this.transitionTo("HIT_STUN");
    }
    // The window closed during this tick's advance; the hit still counts against it.
    if (this.stateAtTickStart === "VULNERABLE" && this.state === "IDLE") {
      this.enter("HIT_STUN");
      return true;
    }
    this.logRejected("HIT_STUN");
    return false;
  }

  transitionTo(next: OpponentStateKind): boolean {
    if (!LEGAL_TRANSITIONS[this.state].includes(next)) {
      this.logRejected(next);
      return false;
    }
    this.enter(next);
    return true;
  }

  reset(round = 1): void {
    this.round = Math.max(1, Math.floor(round));
    this.attackId = 0;
    this.attackSide = undefined;
    this.enter("IDLE");
    this.stateAtTickStart = "IDLE";
  }

  getState(): OpponentSnapshot {
    return {
      state: this.state,
      remainingMs: this.remainingMs,
      durationMs: this.durationMs,
      progress: this.durationMs > 0 ? this.remainingMs / this.durationMs : 0,
      attackSide: this.attackSide,
      attackId: this.attackId,
      round: this.round,
    };
  }

  private enter(next: OpponentStateKind): void {
    if (this.options.debug && next !== this.state) {
      console.debug(`[OpponentAI] ${this.state} -> ${next}`);
    }
    this.state = next;
    this.durationMs = this.durationFor(next);
    this.remainingMs = this.durationMs;

    if (next === "TELEGRAPH") {
      this.attackSide = this.options.random() < 0.5 ? "LEFT" : "RIGHT";
    } else if (next === "ATTACKING") {
      this.attackId += 1;
    }
  }

  private durationFor(kind: OpponentStateKind): number {
    const o = this.options;
    switch (kind) {
      case "IDLE":
        return Math.max(0, o.idleMs);
      case "TELEGRAPH":
        return Math.max(
          0,
          Math.min(o.telegraphMs, o.minTelegraphMs),
          o.telegraphMs - (this.round - 1) * o.telegraphRoundStepMs
        );
      case "ATTACKING":
        return Math.max(0, o.attackMs);
      case "VULNERABLE":
        return Math.max(0, o.vulnerableMs);
      case "HIT_STUN":
        return Math.max(0, o.hitStunMs);
      case "RECOVERING":
        return Math.max(0, o.recoveryMs);
    }
  }

  private logRejected(next: OpponentStateKind): void {
    if (this.options.debug) {
      console.debug(`[OpponentAI] ignored transition ${this.state} -> ${next}`);
    }
  }
}

export { DEFAULTS as defaultOpponentOptions };

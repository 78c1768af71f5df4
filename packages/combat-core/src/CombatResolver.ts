import type { HpPool } from "./HpPool";
import type { CombatOutcome, CombatResolverOptions, OpponentSnapshot, PlayerAction } from "./types";

const DEFAULTS: Required<CombatResolverOptions> = {
  attackDamage: 34,
  punchDamage: 20,
  debug: false,
};

const NO_OUTCOME: CombatOutcome = { type: "NONE" };

export interface CombatTick {
  action: PlayerAction;
  /** Opponent as it was before this tick's advance. */
  before: OpponentSnapshot;
  after: OpponentSnapshot;
}

export interface Combatants {
  player: HpPool;
  opponent: HpPool;
  ai: { hit(): boolean };
}

export class CombatResolver {
  private readonly options: Required<CombatResolverOptions>;
  private lastResolvedAttackId = 0;
  private lastOutcome: CombatOutcome = NO_OUTCOME;

  constructor(opts?: CombatResolverOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  resolve(tick: CombatTick, combatants: Combatants): CombatOutcome {
    const outcome = this.arbitrate(tick, combatants);
    if (this.options.debug && outcome.type !== "NONE") {
      console.debug(`[CombatResolver] ${tick.action} vs ${tick.after.state}: ${outcome.type}`);
    }
    this.lastOutcome = outcome;
    return outcome;
  }

  getLastOutcome(): CombatOutcome {
    return this.lastOutcome;
  }

  reset(): void {
    this.lastResolvedAttackId = 0;
    this.lastOutcome = NO_OUTCOME;
  }

  private arbitrate({ action, before, after }: CombatTick, combatants: Combatants): CombatOutcome {
    const attack = this.pendingAttack(before, after);
    if (attack) {
      this.lastResolvedAttackId = attack.attackId;
      return this.defend(action, attack, combatants);
    }

    if (action === "PUNCH" && (after.state === "VULNERABLE" || before.state === "VULNERABLE")) {
      if (!combatants.ai.hit()) return NO_OUTCOME;
      const damage = combatants.opponent.damage(this.options.punchDamage);
      return { type: "HIT_LANDED", damage };
    }

    // Whiffs and everything else leave both sides untouched.
    return NO_OUTCOME;
  }

  // Each attack resolves once. An attack that started and ended between two reads
  // is only visible in `before`.
  private pendingAttack(before: OpponentSnapshot, after: OpponentSnapshot): OpponentSnapshot | null {
    if (after.state === "ATTACKING" && after.attackId > this.lastResolvedAttackId) return after;
    if (before.state === "ATTACKING" && before.attackId > this.lastResolvedAttackId) return before;
    return null;
  }

  private defend(action: PlayerAction, attack: OpponentSnapshot, { player }: Combatants): CombatOutcome {
    switch (action) {
      case "BLOCK":
        return { type: "BLOCKED" };
      case "DODGE_LEFT":
        return { type: "DODGED", direction: "LEFT" };
      case "DODGE_RIGHT":
        return { type: "DODGED", direction: "RIGHT" };
      case "NONE":
      case "PUNCH": {
        const damage = player.damage(this.options.attackDamage);
        if (this.options.debug) {
          console.debug(`[CombatResolver] attack #${attack.attackId} landed for ${damage}`);
        }
        return { type: "PLAYER_DAMAGED", damage };
      }
    }
  }
}

export { DEFAULTS as defaultCombatOptions };

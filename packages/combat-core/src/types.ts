export type PlayerAction = "NONE" | "PUNCH" | "BLOCK" | "DODGE_LEFT" | "DODGE_RIGHT";

export const PLAYER_ACTIONS: readonly PlayerAction[] = ["NONE", "PUNCH", "BLOCK", "DODGE_LEFT", "DODGE_RIGHT"];

export type OpponentStateKind = "IDLE" | "TELEGRAPH" | "ATTACKING" | "VULNERABLE" | "HIT_STUN" | "RECOVERING";

export type AttackSide = "LEFT" | "RIGHT";

export type Side = "PLAYER" | "OPPONENT";

export interface OpponentSnapshot {
  state: OpponentStateKind;
  remainingMs: number;
  durationMs: number;
  /** Remaining fraction of the current state, 1 on entry and 0 when it expires. */
  progress: number;
  attackSide?: AttackSide;
  attackId: number;
  round: number;
}

export type CombatOutcome =
  | { type: "NONE" }
  | { type: "HIT_LANDED"; damage: number }
  | { type: "PLAYER_DAMAGED"; damage: number }
  | { type: "BLOCKED" }
  | { type: "DODGED"; direction: AttackSide };

export type MatchPhase = "TITLE" | "COUNTDOWN" | "FIGHTING" | "ROUND_END" | "GAME_OVER" | "VICTORY";

export type MatchCommand = { type: "START" } | { type: "RESTART" } | { type: "QUIT" };

export interface KeyboardInput {
  block: boolean;
}

export interface PlayerActionSource<TInput> {
  update(input: TInput | null): PlayerAction;
  reset(): void;
}

export interface OpponentAIOptions {
  idleMs?: number;
  telegraphMs?: number;
  attackMs?: number;
  vulnerableMs?: number;
  hitStunMs?: number;
  recoveryMs?: number;
  /** Telegraph gets this much shorter every round after the first. */
  telegraphRoundStepMs?: number;
  minTelegraphMs?: number;
  random?: () => number;
  debug?: boolean;
}

export interface CombatResolverOptions {
  attackDamage?: number;
  punchDamage?: number;
  debug?: boolean;
}

export interface MatchControllerOptions {
  playerMaxHp?: number;
  opponentMaxHp?: number;
  countdownMs?: number;
  /**
   * How long the round result stays up before the match moves on.
   * Set to 0 to wait for a START command instead.
   */
  roundEndMs?: number;
  /** 0 disables the round timer; rounds then only end on a knockout. */
  roundDurationMs?: number;
  roundsToWin?: number;
  maxRounds?: number;
  opponent?: OpponentAIOptions;
  combat?: CombatResolverOptions;
  onOutcome?: (outcome: CombatOutcome, snapshot: MatchSnapshot) => void;
  debug?: boolean;
}

export interface MatchSnapshot {
  phase: MatchPhase;
  round: number;
  playerHp: number;
  playerMaxHp: number;
  opponentHp: number;
  opponentMaxHp: number;
  rounds: Side[];
  roundWins: Record<Side, number>;
  opponent: OpponentSnapshot;
  action: PlayerAction;
  outcome: CombatOutcome;
  lastEvent?: { outcome: CombatOutcome; seq: number };
  countdownRemainingMs: number;
  roundEndRemainingMs: number;
  roundElapsedMs: number;
  quitRequested: boolean;
}

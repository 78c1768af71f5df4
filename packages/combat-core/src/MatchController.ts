import { CombatResolver } from "./CombatResolver";
import { HpPool } from "./HpPool";
import { OpponentAI } from "./OpponentAI";
import type {
  CombatOutcome,
  KeyboardInput,
  MatchCommand,
  MatchControllerOptions,
  MatchPhase,
  MatchSnapshot,
  PlayerAction,
  PlayerActionSource,
  Side,
} from "./types";

type MatchSettings = Required<Omit<MatchControllerOptions, "opponent" | "combat" | "onOutcome">>;

const DEFAULTS: MatchSettings = {
  playerMaxHp: 100,
  opponentMaxHp: 100,
  countdownMs: 3000,
  roundEndMs: 2500,
  roundDurationMs: 90_000,
  roundsToWin: 2,
  maxRounds: 3,
  debug: false,
};

const NO_OUTCOME: CombatOutcome = { type: "NONE" };

function mergeSettings(opts?: MatchControllerOptions): MatchSettings {
  const { opponent: _opponent, combat: _combat, onOutcome: _onOutcome, ...rest } = opts ?? {};
  return { ...DEFAULTS, ...rest };
}

/** Keyboard block wins over whatever the gesture classifier saw this tick. */
export function mergePlayerActions(gesture: PlayerAction, keyboard?: KeyboardInput): PlayerAction {
  return keyboard?.block ? "BLOCK" : gesture;
}

export function countWins(rounds: readonly Side[]): Record<Side, number> {
  const wins: Record<Side, number> = { PLAYER: 0, OPPONENT: 0 };
  for (const winner of rounds) wins[winner] += 1;
  return wins;
}

export class MatchController<TInput> {
  private readonly settings: MatchSettings;
  private readonly onOutcome?: MatchControllerOptions["onOutcome"];
  private readonly player: HpPool;
  private readonly opponentHp: HpPool;
  private readonly ai: OpponentAI;
  private readonly resolver: CombatResolver;
  private phase: MatchPhase = "TITLE";
  private round = 1;
  private rounds: Side[] = [];
  private action: PlayerAction = "NONE";
  private outcome: CombatOutcome = NO_OUTCOME;
  private lastEvent?: { outcome: CombatOutcome; seq: number };
  private eventSeq = 0;
  private countdownRemainingMs = 0;
  private roundEndRemainingMs = 0;
  private roundElapsedMs = 0;
  private quitRequested = false;

  constructor(
    private readonly actionSource: PlayerActionSource<TInput>,
    opts?: MatchControllerOptions
  ) {
    this.settings = mergeSettings(opts);
    this.onOutcome = opts?.onOutcome;
    this.player = new HpPool(this.settings.playerMaxHp);
    this.opponentHp = new HpPool(this.settings.opponentMaxHp);
    this.ai = new OpponentAI({ debug: this.settings.debug, ...(opts?.opponent ?? {}) });
    this.resolver = new CombatResolver({ debug: this.settings.debug, ...(opts?.combat ?? {}) });
  }

  handle(command: MatchCommand): void {
    switch (command.type) {
      case "START":
        if (this.phase === "TITLE") {
          this.rounds = [];
          this.startRound(1);
        } else if (this.phase === "ROUND_END") {
          this.finishRound();
        } else {
          this.logIgnored(command);
        }
        break;
      case "RESTART":
        if (this.phase === "GAME_OVER" || this.phase === "VICTORY") {
          this.toTitle();
        } else {
          this.logIgnored(command);
        }
        break;
      case "QUIT":
        this.quitRequested = true;
        break;
      default:
        break;
    }
  }

  tick(dtMs: number, input: TInput | null = null, keyboard?: KeyboardInput): MatchSnapshot {
    const dt = Number.isFinite(dtMs) && dtMs > 0 ? dtMs : 0;
    this.outcome = NO_OUTCOME;

    switch (this.phase) {
      case "COUNTDOWN":
        // Input stays frozen until the bell.
        this.action = "NONE";
        this.countdownRemainingMs = Math.max(0, this.countdownRemainingMs - dt);
        if (this.countdownRemainingMs === 0) {
          this.setPhase("FIGHTING");
        }
        break;
      case "FIGHTING":
        this.fight(dt, input, keyboard);
        break;
      case "ROUND_END":
        if (this.settings.roundEndMs > 0) {
          this.roundEndRemainingMs = Math.max(0, this.roundEndRemainingMs - dt);
          if (this.roundEndRemainingMs === 0) {
            this.finishRound();
          }
        }
        break;
      case "TITLE":
      case "GAME_OVER":
      case "VICTORY":
      default:
        this.action = "NONE";
        break;
    }

    return this.getSnapshot();
  }

  getSnapshot(): MatchSnapshot {
    return {
      phase: this.phase,
      round: this.round,
      playerHp: this.player.current,
      playerMaxHp: this.player.max,
      opponentHp: this.opponentHp.current,
      opponentMaxHp: this.opponentHp.max,
      rounds: [...this.rounds],
      roundWins: countWins(this.rounds),
      opponent: this.ai.getState(),
      action: this.action,
      outcome: this.outcome,
      lastEvent: this.lastEvent,
      countdownRemainingMs: this.countdownRemainingMs,
      roundEndRemainingMs: this.roundEndRemainingMs,
      roundElapsedMs: this.roundElapsedMs,
      quitRequested: this.quitRequested,
    };
  }

  private fight(dt: number, input: TInput | null, keyboard?: KeyboardInput): void {
    this.action = mergePlayerActions(this.actionSource.update(input), keyboard);
    const before = this.ai.getState();
    const after = this.ai.advance(dt);
    this.outcome = this.resolver.resolve(
      { action: this.action, before, after },
      { player: this.player, opponent: this.opponentHp, ai: this.ai }
    );
    this.roundElapsedMs += dt;

    if (this.outcome.type !== "NONE") {
      this.eventSeq += 1;
      this.lastEvent = { outcome: this.outcome, seq: this.eventSeq };
      this.onOutcome?.(this.outcome, this.getSnapshot());
    }

    if (this.player.depleted) {
      this.endRound("OPPONENT");
    } else if (this.opponentHp.depleted) {
      this.endRound("PLAYER");
    } else if (this.settings.roundDurationMs > 0 && this.roundElapsedMs >= this.settings.roundDurationMs) {
      this.endRound(this.player.current > this.opponentHp.current ? "PLAYER" : "OPPONENT");
    }
  }

  private endRound(winner: Side): void {
    if (this.rounds.length < this.settings.maxRounds) {
      this.rounds.push(winner);
    }
    this.roundEndRemainingMs = this.settings.roundEndMs;
    this.setPhase("ROUND_END");
  }

  private finishRound(): void {
    const wins = countWins(this.rounds);
    const { roundsToWin, maxRounds } = this.settings;
    if (wins.PLAYER >= roundsToWin) {
      this.setPhase("VICTORY");
    } else if (wins.OPPONENT >= roundsToWin) {
      this.setPhase("GAME_OVER");
    } else if (this.rounds.length >= maxRounds) {
      this.setPhase(wins.PLAYER > wins.OPPONENT ? "VICTORY" : "GAME_OVER");
    } else {
      this.startRound(this.round + 1);
    }
  }

  private startRound(round: number): void {
    this.round = round;
    this.player.reset();
    this.opponentHp.reset();
    this.ai.reset(round);
    this.resolver.reset();
    this.actionSource.reset();
    this.action = "NONE";
    this.roundElapsedMs = 0;
    this.roundEndRemainingMs = 0;
    this.countdownRemainingMs = this.settings.countdownMs;
    this.setPhase("COUNTDOWN");
  }

  private toTitle(): void {
    this.rounds = [];
    this.round = 1;
    this.player.reset();
    this.opponentHp.reset();
    this.ai.reset(1);
    this.resolver.reset();
    this.actionSource.reset();
    this.action = "NONE";
    this.lastEvent = undefined;
    this.eventSeq = 0;
    this.countdownRemainingMs = 0;
    this.roundEndRemainingMs = 0;
    this.roundElapsedMs = 0;
    this.quitRequested = false;
    this.setPhase("TITLE");
  }

  private setPhase(next: MatchPhase): void {
    if (this.settings.debug && next !== this.phase) {
      console.debug(`[MatchController] ${this.phase} -> ${next} (round ${this.round})`);
    }
    this.phase = next;
  }

  private logIgnored(command: MatchCommand): void {
    if (this.settings.debug) {
      console.debug(`[MatchController] ignored ${command.type} during ${this.phase}`);
    }
  }
}

export { DEFAULTS as defaultMatchOptions };

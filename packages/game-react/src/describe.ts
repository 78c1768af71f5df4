import type { CombatOutcome, MatchSnapshot, OpponentSnapshot } from "@ringside-kit/combat-core";

export function describeOutcome(outcome: CombatOutcome): string {
  switch (outcome.type) {
    case "HIT_LANDED":
      return `Hit! Opponent takes ${outcome.damage}`;
    case "PLAYER_DAMAGED":
      return `Ouch! You take ${outcome.damage}`;
    case "BLOCKED":
      return "Blocked";
    case "DODGED":
      return `Dodged the ${outcome.direction.toLowerCase()} hook`;
    case "NONE":
      return "";
  }
}

export function describePhase(snapshot: MatchSnapshot): string {
  switch (snapshot.phase) {
    case "TITLE":
      return "Press Space to fight";
    case "COUNTDOWN":
      return String(Math.max(1, Math.ceil(snapshot.countdownRemainingMs / 1000)));
    case "FIGHTING":
      return "";
    case "ROUND_END": {
      const winner = snapshot.rounds[snapshot.rounds.length - 1];
      return winner === "PLAYER" ? `Round ${snapshot.round} is yours` : `Round ${snapshot.round} to the opponent`;
    }
    case "VICTORY":
      return "Victory! Press R to play again";
    case "GAME_OVER":
      return "Game over. Press R to try again";
  }
}

/** Fills from 0 to 1 across the wind-up; 0 in every other state. */
export function telegraphProgress(opponent: OpponentSnapshot): number {
  return opponent.state === "TELEGRAPH" ? 1 - opponent.progress : 0;
}

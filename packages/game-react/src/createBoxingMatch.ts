import { MatchController } from "@ringside-kit/combat-core";
import type { MatchControllerOptions } from "@ringside-kit/combat-core";
import { GestureClassifier } from "@ringside-kit/gesture-core";
import type { GestureClassifierOptions, HandFrame } from "@ringside-kit/gesture-core";

export interface BoxingMatch {
  classifier: GestureClassifier;
  controller: MatchController<HandFrame>;
}

export function createBoxingMatch(
  gestureOptions?: GestureClassifierOptions,
  matchOptions?: MatchControllerOptions
): BoxingMatch {
  const classifier = new GestureClassifier(gestureOptions);
  const controller = new MatchController<HandFrame>(classifier, matchOptions);
  return { classifier, controller };
}

import type { PlayerAction } from "@ringside-kit/combat-core";

export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface TrackedHand {
  handedness: Handedness;
  landmarks: Landmark[];
  /** Detector confidence in [0, 1]. Hands without a score are trusted. */
  score?: number;
}

export interface HandFrame {
  hands: TrackedHand[];
  timestamp: number;
}

export interface Point2D {
  x: number;
  y: number;
}

export interface HandSample {
  timestamp: number;
  centroid: Point2D;
  area: number;
  /** Normalized units per second, relative to the previous sample. */
  velocity: Point2D;
  fist: boolean;
}

export interface GestureClassifierOptions {
  historySize?: number;
  minConfidence?: number;
  lossGraceMs?: number;
  /** Consecutive `null` updates that still repeat a held pose; past this the pose counts as lost. */
  maxDroppedFrames?: number;
  /** EMA weight of the newest landmarks; 1 disables smoothing. */
  smoothingAlpha?: number;
  /** Relative bounding-box area growth per second that counts as a punch. */
  punchGrowthThreshold?: number;
  fistSpreadThreshold?: number;
  punchRefractoryMs?: number;
  blockMaxY?: number;
  blockMaxHandDistance?: number;
  blockHoldMs?: number;
  dodgeLeftX?: number;
  dodgeRightX?: number;
  dodgeSustainFrames?: number;
  mirrorX?: boolean;
  debug?: boolean;
}

export interface GestureDebugState {
  action: PlayerAction;
  handCount: number;
  poseLost: boolean;
  dodgeSide?: "LEFT" | "RIGHT";
  dodgeStreak: number;
  refractoryUntil: number;
  lastPunch?: { hand: Handedness; strength: number; timestamp: number };
}

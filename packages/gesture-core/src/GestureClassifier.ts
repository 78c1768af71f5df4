import type { PlayerAction, PlayerActionSource } from "@ringside-kit/combat-core";
import { RingBuffer } from "./RingBuffer";
import type {
  GestureClassifierOptions,
  GestureDebugState,
  HandFrame,
  HandSample,
  Handedness,
  Landmark,
  Point2D,
  TrackedHand,
} from "./types";

const DEFAULTS: Required<GestureClassifierOptions> = {
  historySize: 5,
  minConfidence: 0.5,
  lossGraceMs: 250,
  maxDroppedFrames: 15,
  smoothingAlpha: 0.35,
  punchGrowthThreshold: 2.5,
  fistSpreadThreshold: 1.3,
  punchRefractoryMs: 300,
  blockMaxY: 0.5,
  blockMaxHandDistance: 0.35,
  blockHoldMs: 120,
  dodgeLeftX: 1 / 3,
  dodgeRightX: 2 / 3,
  dodgeSustainFrames: 3,
  mirrorX: false,
  debug: false,
};

// MediaPipe hand landmark indices
const WRIST = 0;
const FINGERS: ReadonlyArray<{ pip: number; tip: number }> = [
  { pip: 6, tip: 8 },
  { pip: 10, tip: 12 },
  { pip: 14, tip: 16 },
  { pip: 18, tip: 20 },
];
const HAND_LANDMARK_COUNT = 21;

type DodgeSide = "LEFT" | "RIGHT";

type ProcessedHand = {
  handedness: Handedness;
  centroid: Point2D;
  fist: boolean;
  history: RingBuffer<HandSample>;
};

type PunchCandidate = { hand: ProcessedHand; strength: number };

export class GestureClassifier implements PlayerActionSource<HandFrame> {
  private readonly options: Required<GestureClassifierOptions>;
  private histories = new Map<Handedness, RingBuffer<HandSample>>();
  private smoothed = new Map<Handedness, Landmark[]>();
  private action: PlayerAction = "NONE";
  private handCount = 0;
  private lastSeenAt?: number;
  private poseLost = true;
  private droppedFrames = 0;
  private lastBlockAt = Number.NEGATIVE_INFINITY;
  private refractoryUntil = Number.NEGATIVE_INFINITY;
  private dodgeSide?: DodgeSide;
  private dodgeStreak = 0;
  private lastPunch?: GestureDebugState["lastPunch"];

  constructor(opts?: GestureClassifierOptions) {
    const merged = { ...DEFAULTS, ...(opts ?? {}) };
    this.options = { ...merged, historySize: Math.max(2, Math.floor(merged.historySize)) };
  }

  /**
   * Classifies the newest frame into exactly one action. `null` means the feed had
   * nothing new this tick: held poses carry over for up to `maxDroppedFrames`
   * updates, punches never do.
   * Never throws.
   */
  update(frame: HandFrame | null): PlayerAction {
    try {
      this.action = frame ? this.classify(frame) : this.repeatHeldAction();
    } catch (err) {
      console.error("gesture-core classification failed", err);
      this.resetTracking();
      this.action = "NONE";
    }
    return this.action;
  }

  reset(): void {
    this.resetTracking();
    this.action = "NONE";
    this.handCount = 0;
    this.lastSeenAt = undefined;
    this.poseLost = true;
    this.droppedFrames = 0;
    this.lastPunch = undefined;
  }

  getDebugState(): GestureDebugState {
    return {
      action: this.action,
      handCount: this.handCount,
      poseLost: this.poseLost,
      dodgeSide: this.dodgeSide,
      dodgeStreak: this.dodgeStreak,
      refractoryUntil: this.refractoryUntil,
      lastPunch: this.lastPunch,
    };
  }

  private classify(frame: HandFrame): PlayerAction {
    this.droppedFrames = 0;
    const now = frame.timestamp;
    if (!Number.isFinite(now)) return "NONE";

    const hands = this.selectHands(Array.isArray(frame.hands) ? frame.hands : []);
    this.handCount = hands.length;
    if (hands.length === 0) {
      return this.handlePoseLoss(now);
    }

    this.lastSeenAt = now;
    this.poseLost = false;
    const processed = hands.map((hand) => this.processHand(hand, now));
    this.dropMissingHands(processed);

    const block = this.detectBlock(processed, now);
    const dodge = this.detectDodge(processed);
    const punch = this.detectPunch(processed, now);

    if (block) return "BLOCK";
    if (dodge) return dodge === "LEFT" ? "DODGE_LEFT" : "DODGE_RIGHT";
    if (punch) {
      this.commitPunch(punch, now);
      return "PUNCH";
    }
    return "NONE";
  }

  private repeatHeldAction(): PlayerAction {
    this.droppedFrames += 1;
    if (this.droppedFrames > this.options.maxDroppedFrames) {
      this.losePose();
      return "NONE";
    }
    return this.action === "PUNCH" ? "NONE" : this.action;
  }

  private handlePoseLoss(now: number): PlayerAction {
    const withinGrace = this.lastSeenAt !== undefined && now - this.lastSeenAt <= this.options.lossGraceMs;
    if (!withinGrace) {
      this.losePose();
      return "NONE";
    }
    return now - this.lastBlockAt <= this.options.blockHoldMs ? "BLOCK" : "NONE";
  }

  private losePose(): void {
    if (!this.poseLost && this.options.debug) {
      console.debug("[GestureClassifier] pose lost, resetting tracking");
    }
    this.poseLost = true;
    this.resetTracking();
  }

  private selectHands(hands: TrackedHand[]): TrackedHand[] {
    const best = new Map<Handedness, TrackedHand>();
    for (const hand of hands) {
      if (!isUsableHand(hand)) continue;
      const score = hand.score ?? 1;
      if (score < this.options.minConfidence) continue;
      const current = best.get(hand.handedness);
      if (!current || score > (current.score ?? 1)) {
        best.set(hand.handedness, hand);
      }
    }
    return [...best.values()];
  }

  private processHand(hand: TrackedHand, now: number): ProcessedHand {
    const landmarks = this.smooth(hand.handedness, hand.landmarks);
    const rawCentroid = averageLandmarks(landmarks);
    const centroid = this.options.mirrorX ? { x: 1 - rawCentroid.x, y: rawCentroid.y } : rawCentroid;
    const fist = isFist(landmarks, this.options.fistSpreadThreshold);
    const history = this.ensureHistory(hand.handedness);

    const previous = history.newest();
    const dtSeconds = previous ? (now - previous.timestamp) / 1000 : 0;
    const velocity =
      previous && dtSeconds > 0
        ? { x: (centroid.x - previous.centroid.x) / dtSeconds, y: (centroid.y - previous.centroid.y) / dtSeconds }
        : { x: 0, y: 0 };

    history.push({ timestamp: now, centroid, area: boundingBoxArea(landmarks), velocity, fist });
    return { handedness: hand.handedness, centroid, fist, history };
  }

  private detectBlock(hands: ProcessedHand[], now: number): boolean {
    if (hands.length >= 2) {
      const [a, b] = hands;
      const guard =
        a.centroid.y < this.options.blockMaxY &&
        b.centroid.y < this.options.blockMaxY &&
        Math.abs(a.centroid.x - b.centroid.x) < this.options.blockMaxHandDistance;
      if (guard) this.lastBlockAt = now;
      return guard;
    }
    // One hand flickered out of view; keep the guard up briefly.
    return now - this.lastBlockAt <= this.options.blockHoldMs;
  }

  private detectDodge(hands: ProcessedHand[]): DodgeSide | undefined {
    const x = hands.reduce((sum, h) => sum + h.centroid.x, 0) / hands.length;
    const side: DodgeSide | undefined =
      x < this.options.dodgeLeftX ? "LEFT" : x > this.options.dodgeRightX ? "RIGHT" : undefined;

    if (side && side === this.dodgeSide) {
      this.dodgeStreak += 1;
    } else {
      this.dodgeSide = side;
      this.dodgeStreak = side ? 1 : 0;
    }
    return side && this.dodgeStreak >= this.options.dodgeSustainFrames ? side : undefined;
  }

  private detectPunch(hands: ProcessedHand[], now: number): PunchCandidate | null {
    if (now < this.refractoryUntil) return null;

    let best: PunchCandidate | null = null;
    for (const hand of hands) {
      if (!hand.fist) continue;
      const oldest = hand.history.oldest();
      const newest = hand.history.newest();
      if (!oldest || !newest || hand.history.size < 2) continue;
      const dtSeconds = (newest.timestamp - oldest.timestamp) / 1000;
      if (dtSeconds <= 0 || oldest.area <= 0) continue;

      const growth = (newest.area - oldest.area) / oldest.area / dtSeconds;
      if (growth <= this.options.punchGrowthThreshold) continue;
      const strength = Math.min(1, growth / (this.options.punchGrowthThreshold * 2));
      if (!best || strength > best.strength) {
        best = { hand, strength };
      }
    }
    return best;
  }

  private commitPunch({ hand, strength }: PunchCandidate, now: number): void {
    this.refractoryUntil = now + this.options.punchRefractoryMs;
    this.lastPunch = { hand: hand.handedness, strength, timestamp: now };
    // The next punch needs a fresh approach, not the tail of this one.
    const newest = hand.history.newest();
    hand.history.clear();
    if (newest) hand.history.push(newest);

    if (this.options.debug) {
      console.debug(`[GestureClassifier] punch (${hand.handedness}, strength ${strength.toFixed(2)})`);
    }
  }

  private smooth(hand: Handedness, landmarks: Landmark[]): Landmark[] {
    const alpha = this.options.smoothingAlpha;
    const previous = this.smoothed.get(hand);
    const next =
      previous && previous.length === landmarks.length && alpha < 1
        ? landmarks.map((lm, i) => ({
            x: alpha * lm.x + (1 - alpha) * previous[i].x,
            y: alpha * lm.y + (1 - alpha) * previous[i].y,
          }))
        : landmarks.map((lm) => ({ x: lm.x, y: lm.y }));
    this.smoothed.set(hand, next);
    return next;
  }

  private ensureHistory(hand: Handedness): RingBuffer<HandSample> {
    let history = this.histories.get(hand);
    if (!history) {
      history = new RingBuffer<HandSample>(this.options.historySize);
      this.histories.set(hand, history);
    }
    return history;
  }

  private dropMissingHands(present: ProcessedHand[]): void {
    const seen = new Set(present.map((h) => h.handedness));
    for (const hand of [...this.histories.keys()]) {
      if (!seen.has(hand)) this.histories.delete(hand);
    }
    for (const hand of [...this.smoothed.keys()]) {
      if (!seen.has(hand)) this.smoothed.delete(hand);
    }
  }

  private resetTracking(): void {
    this.histories.clear();
    this.smoothed.clear();
    this.refractoryUntil = Number.NEGATIVE_INFINITY;
    this.lastBlockAt = Number.NEGATIVE_INFINITY;
    this.dodgeSide = undefined;
    this.dodgeStreak = 0;
  }
}

export { DEFAULTS as defaultGestureClassifierOptions };

function isUsableHand(hand: TrackedHand | null | undefined): hand is TrackedHand {
  if (!hand || (hand.handedness !== "Left" && hand.handedness !== "Right")) return false;
  if (!Array.isArray(hand.landmarks) || hand.landmarks.length === 0) return false;
  if (hand.score !== undefined && !Number.isFinite(hand.score)) return false;
  return hand.landmarks.every((lm) => Boolean(lm) && Number.isFinite(lm.x) && Number.isFinite(lm.y));
}

function averageLandmarks(landmarks: Landmark[]): Point2D {
  const sum = landmarks.reduce(
    (acc, l) => {
      acc.x += l.x;
      acc.y += l.y;
      return acc;
    },
    { x: 0, y: 0 }
  );
  return { x: sum.x / landmarks.length, y: sum.y / landmarks.length };
}

function boundingBoxArea(landmarks: Landmark[]): number {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const l of landmarks) {
    minX = Math.min(minX, l.x);
    minY = Math.min(minY, l.y);
    maxX = Math.max(maxX, l.x);
    maxY = Math.max(maxY, l.y);
  }
  return (maxX - minX) * (maxY - minY);
}

// Curled fingers keep their tips about as close to the wrist as their PIP joints.
function isFist(landmarks: Landmark[], spreadThreshold: number): boolean {
  if (landmarks.length < HAND_LANDMARK_COUNT) return false;
  const wrist = landmarks[WRIST];
  let total = 0;
  for (const { pip, tip } of FINGERS) {
    const pipDistance = distance2D(landmarks[pip], wrist);
    if (pipDistance <= 0) return false;
    total += distance2D(landmarks[tip], wrist) / pipDistance;
  }
  return total / FINGERS.length <= spreadThreshold;
}

function distance2D(a: Landmark, b: Landmark): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

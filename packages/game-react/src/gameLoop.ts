import type { HandFrame } from "@ringside-kit/gesture-core";

/** Longest step one animation frame may feed the match, e.g. after the tab was hidden. */
export const MAX_TICK_MS = 100;

export function tickDelta(now: number, lastTs: number | null): number {
  if (lastTs === null) return 0;
  return Math.min(Math.max(0, now - lastTs), MAX_TICK_MS);
}

/**
 * With the camera on, an empty slot is a dropped frame (`null`). With the camera
 * off there is nothing to wait for, so the classifier sees an empty frame and its
 * loss handling runs on the game clock.
 */
export function nextGameInput(captured: HandFrame | null, cameraActive: boolean, now: number): HandFrame | null {
  if (captured) return captured;
  return cameraActive ? null : { hands: [], timestamp: now };
}
